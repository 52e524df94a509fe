/**
 * Consistency check routes.
 *
 * GET  /api/v1/checks              — List checks (filters: status, type, minSeverity)
 * POST /api/v1/checks/run          — Run the detectors; returns the new checks
 * POST /api/v1/checks/:id/resolve  — Resolve a check once
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListChecksQuerySchema, ResolveCheckSchema, RunChecksSchema } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export function createCheckRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListChecksQuerySchema), (c) => {
    const query = c.req.valid("query");
    const checks = c.get("service").listChecks({
      statuses: query.status,
      checkTypes: query.type,
      minSeverity: query.minSeverity,
    });
    return c.json({ data: checks });
  });

  routes.post("/run", validateBody(RunChecksSchema), (c) => {
    const body = c.req.valid("json");
    const created = c.get("service").runChecks(body.asOf, body.statementId);
    return c.json({ data: created });
  });

  routes.post("/:id/resolve", validateBody(ResolveCheckSchema), (c) => {
    const body = c.req.valid("json");
    const check = c
      .get("service")
      .resolveCheck(c.req.param("id"), body.action, body.note, c.get("actor"));
    return c.json({ data: check });
  });

  return routes;
}
