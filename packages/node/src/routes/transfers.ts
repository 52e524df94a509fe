/**
 * Transfer routes.
 *
 * GET /api/v1/transfers/candidates  — Open lines that read like own-account transfers
 * GET /api/v1/transfers/pairs       — Booked OUT legs paired with their IN legs
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { TransferCandidatesQuerySchema, TransferPairsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createTransferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/candidates", validateQuery(TransferCandidatesQuerySchema), (c) => {
    return c.json({ data: c.get("service").listTransferCandidates(c.req.valid("query")) });
  });

  routes.get("/pairs", validateQuery(TransferPairsQuerySchema), (c) => {
    const { minConfidence } = c.req.valid("query");
    return c.json({ data: c.get("service").findTransferPairs(minConfidence) });
  });

  return routes;
}
