/**
 * Statement and bank transaction routes.
 *
 * POST /api/v1/statements                       — Ingest a parsed statement
 * GET  /api/v1/transactions                     — List transactions (cursor pagination)
 * GET  /api/v1/transactions/:id                 — Get one transaction
 * POST /api/v1/transactions/:id/draft-entry     — Draft a ledger entry for a transaction
 * GET  /api/v1/transactions/:id/anomalies       — Anomalies against recent lines
 * POST /api/v1/transactions/:id/transfer        — Book a transfer leg to clearing
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  BookTransferSchema,
  DraftEntrySchema,
  ListTransactionsQuerySchema,
  StatementSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate } from "../types/pagination.js";

export function createStatementRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/statements", validateBody(StatementSchema), (c) => {
    const result = c.get("service").ingestStatement(c.req.valid("json"));
    return c.json({ data: result }, 201);
  });

  routes.get("/transactions", validateQuery(ListTransactionsQuerySchema), (c) => {
    const query = c.req.valid("query");
    const txns = c.get("service").listTransactions({
      accountId: query.accountId,
      statementId: query.statementId,
      statuses: query.status,
      fromDate: query.fromDate,
      toDate: query.toDate,
    });

    // Transaction ids are unique per tenant, so they order the pages
    const sorted = [...txns].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    const page = paginate(sorted, query, (t) => t.id, "id");
    return c.json({ data: page.data, pagination: page.pagination });
  });

  routes.get("/transactions/:id", (c) => {
    return c.json({ data: c.get("service").getTransaction(c.req.param("id")) });
  });

  routes.post("/transactions/:id/draft-entry", validateBody(DraftEntrySchema), (c) => {
    const entry = c.get("service").draftEntry(c.req.param("id"), c.req.valid("json"));
    return c.json({ data: entry }, 201);
  });

  routes.get("/transactions/:id/anomalies", (c) => {
    return c.json({ data: c.get("service").detectAnomalies(c.req.param("id")) });
  });

  routes.post("/transactions/:id/transfer", validateBody(BookTransferSchema), (c) => {
    const entry = c
      .get("service")
      .bookTransfer(c.req.param("id"), c.req.valid("json"), c.get("actor"));
    return c.json({ data: entry }, 201);
  });

  return routes;
}
