/**
 * Chart of accounts routes.
 *
 * POST /api/v1/accounts                 — Register an account
 * GET  /api/v1/accounts                 — List accounts
 * GET  /api/v1/accounts/:id             — Get one account
 * POST /api/v1/accounts/:id/deactivate  — Deactivate an account
 * GET  /api/v1/accounts/:id/balance     — Balance per currency
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateAccountSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateAccountSchema), (c) => {
    const account = c.get("service").createAccount(c.req.valid("json"));
    return c.json({ data: account }, 201);
  });

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listAccounts() });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getAccount(c.req.param("id")) });
  });

  routes.post("/:id/deactivate", (c) => {
    return c.json({ data: c.get("service").deactivateAccount(c.req.param("id")) });
  });

  routes.get("/:id/balance", (c) => {
    return c.json({ data: c.get("service").getBalance(c.req.param("id")) });
  });

  return routes;
}
