/**
 * Ledger report routes.
 *
 * GET /api/v1/ledger/trial-balance — Debit and credit balance per account and currency
 * GET /api/v1/ledger/equation      — Accounting equation per currency
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/trial-balance", (c) => {
    return c.json({ data: c.get("service").trialBalance() });
  });

  routes.get("/equation", (c) => {
    return c.json({ data: c.get("service").accountingEquation() });
  });

  return routes;
}
