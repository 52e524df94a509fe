/**
 * Tests for chart of accounts routes.
 */

import { describe, it, expect } from "vitest";
import type { Account } from "@tallybook/types";
import { createTestApp, NOW, postEntry, seedAccounts, send } from "../setup.js";
import type { ErrorBody } from "../setup.js";

describe("POST /api/v1/accounts", () => {
  it("registers an account in the default currency", async () => {
    const { app } = createTestApp();

    const res = await send<{ data: Account }>(app, "/api/v1/accounts", "POST", {
      id: "bank",
      name: "Operating bank",
      type: "asset",
    });

    expect(res.status).toBe(201);
    expect(res.body.data).toEqual({
      id: "bank",
      name: "Operating bank",
      type: "asset",
      currency: "USD",
      active: true,
      clearing: false,
      createdAt: NOW,
    });
  });

  it("keeps an explicit currency and clearing flag", async () => {
    const { app } = createTestApp();

    const res = await send<{ data: Account }>(app, "/api/v1/accounts", "POST", {
      id: "eur-clearing",
      name: "EUR card clearing",
      type: "asset",
      currency: "EUR",
      clearing: true,
    });

    expect(res.body.data).toMatchObject({ currency: "EUR", clearing: true });
  });

  it("answers 409 for a duplicate id", async () => {
    const { app } = createTestApp();
    await seedAccounts(app);

    const res = await send<ErrorBody>(app, "/api/v1/accounts", "POST", {
      id: "bank",
      name: "Another bank",
      type: "asset",
    });

    expect(res.status).toBe(409);
    expect(res.body.error.code).toBe("DUPLICATE_ACCOUNT_ID");
  });

  it("answers 400 for an unknown account type", async () => {
    const { app } = createTestApp();

    const res = await send<ErrorBody>(app, "/api/v1/accounts", "POST", {
      id: "misc",
      name: "Misc",
      type: "revenue",
    });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(res.body.error.details?.["issues"]).toMatchObject([{ path: "type" }]);
  });
});

describe("GET /api/v1/accounts", () => {
  it("lists accounts in registration order", async () => {
    const { app } = createTestApp();
    await seedAccounts(app);

    const res = await send<{ data: Account[] }>(app, "/api/v1/accounts");

    expect(res.status).toBe(200);
    expect(res.body.data.map((a) => a.id)).toEqual(["bank", "clearing", "sales", "rent", "capital"]);
  });

  it("answers 404 for an unknown account", async () => {
    const { app } = createTestApp();

    const res = await send<ErrorBody>(app, "/api/v1/accounts/nope");

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("ACCOUNT_NOT_FOUND");
  });
});

describe("GET /api/v1/accounts/:id/balance", () => {
  it("reports posted activity per currency", async () => {
    const { app } = createTestApp();
    await seedAccounts(app);
    await postEntry(app, "bank", "capital", "500.00", "2025-03-01", "Opening capital");
    await postEntry(app, "rent", "bank", "120.50", "2025-03-02", "March rent");

    const res = await send<{ data: unknown }>(app, "/api/v1/accounts/bank/balance");

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      accountId: "bank",
      accountType: "asset",
      balances: [
        {
          currency: "USD",
          decimals: 2,
          balance: "379.50",
          totalDebits: "500.00",
          totalCredits: "120.50",
        },
      ],
      homeBalance: { amount: "379.50", currency: "USD", decimals: 2 },
    });
  });

  it("ignores drafts", async () => {
    const { app } = createTestApp();
    await seedAccounts(app);
    await send(app, "/api/v1/entries", "POST", {
      entryDate: "2025-03-01",
      memo: "Not posted",
      lines: [
        { accountId: "bank", direction: "debit", money: { amount: "10.00" } },
        { accountId: "capital", direction: "credit", money: { amount: "10.00" } },
      ],
    });

    const res = await send<{ data: { balances: unknown[] } }>(app, "/api/v1/accounts/bank/balance");

    expect(res.body.data.balances).toEqual([]);
  });
});

describe("POST /api/v1/accounts/:id/deactivate", () => {
  it("deactivates and blocks posting to the account", async () => {
    const { app } = createTestApp();
    await seedAccounts(app);

    const deactivated = await send<{ data: Account }>(app, "/api/v1/accounts/rent/deactivate", "POST");
    expect(deactivated.status).toBe(200);
    expect(deactivated.body.data.active).toBe(false);

    const draft = await send<{ data: { id: string; version: number } }>(app, "/api/v1/entries", "POST", {
      entryDate: "2025-03-02",
      memo: "March rent",
      lines: [
        { accountId: "rent", direction: "debit", money: { amount: "100.00" } },
        { accountId: "bank", direction: "credit", money: { amount: "100.00" } },
      ],
    });
    const posted = await send<ErrorBody>(app, `/api/v1/entries/${draft.body.data.id}/post`, "POST", {
      version: draft.body.data.version,
    });

    expect(posted.status).toBe(422);
    expect(posted.body.error.code).toBe("INACTIVE_ACCOUNT");
  });
});
