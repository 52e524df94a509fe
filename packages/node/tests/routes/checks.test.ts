/**
 * Tests for consistency check routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Hono } from "hono";
import type { ConsistencyCheck } from "@tallybook/reconciler";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { AuditLog } from "../../src/services/audit-log.js";
import { createTestApp, ingest, NOW, postEntry, seedAccounts, send } from "../setup.js";
import type { ErrorBody } from "../setup.js";

const LATER = "2025-03-30T12:00:00.000Z";

let app: Hono<AppEnv>;
let auditLog: AuditLog;

beforeEach(async () => {
  ({ app, auditLog } = createTestApp());
  await seedAccounts(app);
  // One review proposal created at NOW
  await postEntry(app, "bank", "sales", "1500.00", "2025-03-10", "Payroll");
  await ingest(app, { id: "t1", txnDate: "2025-03-10", amount: "1500.00" });
  await send(app, "/api/v1/reconciliation/run", "POST", {});
});

async function runChecks(asOf?: string): Promise<ConsistencyCheck[]> {
  const res = await send<{ data: ConsistencyCheck[] }>(
    app,
    "/api/v1/checks/run",
    "POST",
    asOf === undefined ? {} : { asOf },
  );
  return res.body.data;
}

async function listChecks(query = ""): Promise<ConsistencyCheck[]> {
  const res = await send<{ data: ConsistencyCheck[] }>(app, `/api/v1/checks${query}`);
  return res.body.data;
}

describe("POST /api/v1/checks/run", () => {
  it("finds nothing while the review is fresh", async () => {
    expect(await runChecks()).toEqual([]);
  });

  it("raises a stale review once it outlives the limit", async () => {
    const [check, ...rest] = await runChecks(LATER);

    expect(rest).toEqual([]);
    expect(check).toMatchObject({
      checkType: "stale_review",
      severity: "medium",
      status: "pending",
      relatedTransactionIds: ["t1"],
      details: { createdAt: NOW, ageDays: 15, limitDays: 7 },
      createdAt: NOW,
    });
  });

  it("raises each finding once", async () => {
    await runChecks(LATER);

    expect(await runChecks(LATER)).toEqual([]);
    expect(await listChecks()).toHaveLength(1);
  });

  it("answers 400 for a malformed asOf", async () => {
    const res = await send<ErrorBody>(app, "/api/v1/checks/run", "POST", { asOf: "next week" });

    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/checks", () => {
  beforeEach(async () => {
    await runChecks(LATER);
  });

  it("filters by severity floor", async () => {
    expect(await listChecks("?minSeverity=medium")).toHaveLength(1);
    expect(await listChecks("?minSeverity=high")).toEqual([]);
  });

  it("filters by type and status", async () => {
    expect(await listChecks("?type=stale_review,duplicate_match")).toHaveLength(1);
    expect(await listChecks("?type=duplicate_match")).toEqual([]);
    expect(await listChecks("?status=resolved")).toEqual([]);
  });

  it("answers 400 for an unknown severity", async () => {
    const res = await send<ErrorBody>(app, "/api/v1/checks?minSeverity=urgent");

    expect(res.status).toBe(400);
  });
});

describe("POST /api/v1/checks/:id/resolve", () => {
  it("resolves once and records the action", async () => {
    const [check] = await runChecks(LATER);
    const id = check?.id ?? "";

    const res = await send<{ data: ConsistencyCheck }>(
      app,
      `/api/v1/checks/${id}/resolve`,
      "POST",
      { action: "flag", note: "chasing the customer" },
      { "X-Actor": "controller" },
    );

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({
      status: "resolved",
      resolution: "flag",
      resolutionNote: "chasing the customer",
      resolvedAt: NOW,
    });
    expect(auditLog.query()).toMatchObject([
      {
        action: "resolve",
        resourceType: "check",
        resourceId: id,
        actor: "controller",
        detail: "flag: chasing the customer",
      },
    ]);

    const again = await send<ErrorBody>(app, `/api/v1/checks/${id}/resolve`, "POST", { action: "approve" });
    expect(again.status).toBe(409);
    expect(again.body.error.code).toBe("ALREADY_PROCESSED");
  });

  it("answers 404 for an unknown check", async () => {
    const res = await send<ErrorBody>(app, "/api/v1/checks/nope/resolve", "POST", { action: "approve" });

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("CHECK_NOT_FOUND");
  });

  it("answers 400 for an unknown action", async () => {
    const [check] = await runChecks(LATER);

    const res = await send<ErrorBody>(app, `/api/v1/checks/${check?.id ?? ""}/resolve`, "POST", {
      action: "ignore",
    });

    expect(res.status).toBe(400);
  });
});

describe("POST /api/v1/checks/run for a statement", () => {
  it("adds the anomaly detectors for that statement", async () => {
    const res = await send<{ data: ConsistencyCheck[] }>(app, "/api/v1/checks/run", "POST", {
      statementId: "stmt-1",
    });

    expect(res.status).toBe(200);
    expect(res.body.data.map((c) => [c.checkType, c.severity, c.relatedTransactionIds])).toEqual([
      ["anomaly", "low", ["t1"]],
    ]);
    expect(res.body.data[0]?.details).toMatchObject({ anomalyType: "new_merchant" });
    expect(await listChecks("?type=anomaly")).toHaveLength(1);
  });
});
