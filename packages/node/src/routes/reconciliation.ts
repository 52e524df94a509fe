/**
 * Reconciliation routes.
 *
 * POST /api/v1/reconciliation/run                    — Score and route open transactions
 * GET  /api/v1/reconciliation/matches                — List matches (default: awaiting review)
 * GET  /api/v1/reconciliation/matches/:id            — Get one match
 * POST /api/v1/reconciliation/matches/:id/accept     — Accept a proposed match
 * POST /api/v1/reconciliation/matches/:id/reject     — Reject a proposed match
 * POST /api/v1/reconciliation/matches/batch-accept   — Accept many; per-item outcome
 * POST /api/v1/reconciliation/matches/batch-reject   — Reject many; per-item outcome
 * GET  /api/v1/reconciliation/stats                  — Match rate and score histogram
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AcceptMatchSchema,
  BatchAcceptSchema,
  BatchRejectSchema,
  ListMatchesQuerySchema,
  RejectMatchSchema,
  RunReconciliationSchema,
  StatsQuerySchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { createdKey, paginate, sortByCreated } from "../types/pagination.js";

export function createReconciliationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/run", validateBody(RunReconciliationSchema), async (c) => {
    const summary = await c.get("service").runReconciliation(c.req.valid("json"));
    return c.json({ data: summary });
  });

  routes.get("/matches", validateQuery(ListMatchesQuerySchema), (c) => {
    const query = c.req.valid("query");
    const matches = c.get("service").listPending({
      statuses: query.status,
      accountId: query.accountId,
      bankTxnId: query.bankTxnId,
      entryId: query.entryId,
      runId: query.runId,
      minScore: query.minScore,
      maxScore: query.maxScore,
    });

    const page = paginate(sortByCreated(matches), query, createdKey, "created");
    return c.json({ data: page.data, pagination: page.pagination });
  });

  routes.post("/matches/batch-accept", validateBody(BatchAcceptSchema), (c) => {
    const result = c.get("service").batchAccept(c.req.valid("json").items, c.get("actor"));
    return c.json({ data: result });
  });

  routes.post("/matches/batch-reject", validateBody(BatchRejectSchema), (c) => {
    const body = c.req.valid("json");
    const result = c.get("service").batchReject(body.items, body.reason, c.get("actor"));
    return c.json({ data: result });
  });

  routes.get("/matches/:id", (c) => {
    return c.json({ data: c.get("service").getMatch(c.req.param("id")) });
  });

  routes.post("/matches/:id/accept", validateBody(AcceptMatchSchema), (c) => {
    const { version } = c.req.valid("json");
    const match = c.get("service").acceptMatch(c.req.param("id"), version, c.get("actor"));
    return c.json({ data: match });
  });

  routes.post("/matches/:id/reject", validateBody(RejectMatchSchema), (c) => {
    const body = c.req.valid("json");
    const match = c
      .get("service")
      .rejectMatch(c.req.param("id"), body.version, body.reason, c.get("actor"));
    return c.json({ data: match });
  });

  routes.get("/stats", validateQuery(StatsQuerySchema), (c) => {
    return c.json({ data: c.get("service").stats(c.req.valid("query")) });
  });

  return routes;
}
