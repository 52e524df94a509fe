/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check: every tenant started and its accounting
 *               equation holds
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TenantRegistry } from "../services/tenant-registry.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(
  tenantRegistry: TenantRegistry,
  clock: () => string,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: clock() });
  });

  routes.get("/ready", (c) => {
    const tenantIds = tenantRegistry.tenantIds();
    const subsystems: Record<string, SubsystemStatus> = {};

    // Tenants are created on first request; none yet still counts as ready
    let allReady = true;
    for (const tenantId of tenantIds) {
      const { ready, equationHolds } = tenantRegistry.getOrCreate(tenantId).checkHealth();
      if (ready && equationHolds) {
        subsystems[tenantId] = { status: "ok" };
      } else {
        allReady = false;
        subsystems[tenantId] = {
          status: "down",
          detail: `ready=${String(ready)}, equationHolds=${String(equationHolds)}`,
        };
      }
    }

    return c.json(
      {
        status: allReady ? "ready" : "not_ready",
        tenants: tenantIds.length,
        subsystems,
        timestamp: clock(),
      },
      allReady ? 200 : 503,
    );
  });

  return routes;
}
