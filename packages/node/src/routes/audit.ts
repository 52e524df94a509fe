/**
 * Audit trail route.
 *
 * GET /api/v1/audit — This tenant's post, void, review and resolve actions, newest first
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuditLog } from "../services/audit-log.js";
import { AuditQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createAuditRoutes(auditLog: AuditLog): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(AuditQuerySchema), (c) => {
    const entries = auditLog.query({
      ...c.req.valid("query"),
      tenantId: c.get("service").tenantId,
    });
    return c.json({ data: entries });
  });

  return routes;
}
