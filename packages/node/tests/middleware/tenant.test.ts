/**
 * Tests for tenant resolution.
 *
 * Each X-Tenant-Id gets an isolated ledger; X-Actor is recorded in the
 * audit log.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, send } from "../setup.js";
import type { ErrorBody } from "../setup.js";

const ACCOUNT = { id: "bank", name: "Bank", type: "asset" };

describe("tenantMiddleware", () => {
  it("uses the default tenant without a header", async () => {
    const { app, tenantRegistry } = createTestApp();

    await send(app, "/api/v1/accounts", "POST", ACCOUNT);

    expect(tenantRegistry.tenantIds()).toEqual(["default"]);
  });

  it("honours a configured default tenant", async () => {
    const { app, tenantRegistry } = createTestApp({ defaultTenantId: "main" });

    await send(app, "/api/v1/accounts");

    expect(tenantRegistry.has("main")).toBe(true);
  });

  it("isolates tenants", async () => {
    const { app } = createTestApp();

    const created = await send(app, "/api/v1/accounts", "POST", ACCOUNT, { "X-Tenant-Id": "a" });
    expect(created.status).toBe(201);

    const inB = await send<{ data: unknown[] }>(app, "/api/v1/accounts", "GET", undefined, {
      "X-Tenant-Id": "b",
    });
    expect(inB.body.data).toEqual([]);

    // Same id is free in another tenant
    const again = await send(app, "/api/v1/accounts", "POST", ACCOUNT, { "X-Tenant-Id": "b" });
    expect(again.status).toBe(201);
  });

  it("rejects a malformed tenant id", async () => {
    const { app, tenantRegistry } = createTestApp();

    const res = await send<ErrorBody>(app, "/api/v1/accounts", "GET", undefined, {
      "X-Tenant-Id": "bad tenant!",
    });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(tenantRegistry.tenantIds()).toEqual([]);
  });

  it("records the actor and tenant in the audit log", async () => {
    const { app, auditLog } = createTestApp();
    const headers = { "X-Tenant-Id": "acme", "X-Actor": "alice" };

    await send(app, "/api/v1/accounts", "POST", ACCOUNT, headers);
    await send(app, "/api/v1/accounts", "POST", { id: "capital", name: "Capital", type: "equity" }, headers);
    const draft = await send<{ data: { id: string; version: number } }>(
      app,
      "/api/v1/entries",
      "POST",
      {
        entryDate: "2025-03-01",
        memo: "Opening capital",
        lines: [
          { accountId: "bank", direction: "debit", money: { amount: "100.00" } },
          { accountId: "capital", direction: "credit", money: { amount: "100.00" } },
        ],
      },
      headers,
    );
    await send(
      app,
      `/api/v1/entries/${draft.body.data.id}/post`,
      "POST",
      { version: draft.body.data.version },
      headers,
    );

    expect(auditLog.query()).toMatchObject([
      { tenantId: "acme", actor: "alice", action: "post", resourceId: draft.body.data.id },
    ]);
  });

  it("defaults the actor to api", async () => {
    const { app, auditLog } = createTestApp();

    await send(app, "/api/v1/accounts", "POST", ACCOUNT);
    await send(app, "/api/v1/accounts", "POST", { id: "capital", name: "Capital", type: "equity" });
    const draft = await send<{ data: { id: string; version: number } }>(app, "/api/v1/entries", "POST", {
      entryDate: "2025-03-01",
      memo: "Opening capital",
      lines: [
        { accountId: "bank", direction: "debit", money: { amount: "100.00" } },
        { accountId: "capital", direction: "credit", money: { amount: "100.00" } },
      ],
    });
    await send(app, `/api/v1/entries/${draft.body.data.id}/post`, "POST", {
      version: draft.body.data.version,
    });

    expect(auditLog.query()[0]?.actor).toBe("api");
  });
});
