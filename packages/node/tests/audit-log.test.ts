/**
 * Tests for the AuditLog service.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AuditLog } from "../src/services/audit-log.js";
import type { AuditLogEntry } from "../src/services/audit-log.js";

type NewEntry = Omit<AuditLogEntry, "timestamp" | "sequence">;

function entry(overrides: Partial<NewEntry> = {}): NewEntry {
  return {
    tenantId: "t1",
    action: "accept",
    resourceType: "match",
    resourceId: "m-1",
    actor: "api",
    ...overrides,
  };
}

describe("AuditLog", () => {
  let log: AuditLog;

  beforeEach(() => {
    log = new AuditLog(() => "2025-03-15T12:00:00.000Z");
  });

  it("starts empty", () => {
    expect(log.size).toBe(0);
    expect(log.query()).toEqual([]);
  });

  it("stamps entries with sequence and clock time", () => {
    const recorded = log.append(entry({ detail: "looks right" }));

    expect(recorded).toEqual({
      tenantId: "t1",
      action: "accept",
      resourceType: "match",
      resourceId: "m-1",
      actor: "api",
      detail: "looks right",
      sequence: 1,
      timestamp: "2025-03-15T12:00:00.000Z",
    });
    expect(log.append(entry()).sequence).toBe(2);
    expect(log.size).toBe(2);
  });

  it("uses wall-clock time by default", () => {
    const wall = new AuditLog();
    expect(wall.append(entry()).timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it("returns entries newest-first", () => {
    log.append(entry({ action: "post", resourceType: "entry", resourceId: "je-1" }));
    log.append(entry({ action: "accept" }));

    const entries = log.query();
    expect(entries.map((e) => e.action)).toEqual(["accept", "post"]);
  });

  it("filters by tenantId", () => {
    log.append(entry({ tenantId: "t1", resourceId: "m-1" }));
    log.append(entry({ tenantId: "t2", resourceId: "m-2" }));

    const t1Entries = log.query({ tenantId: "t1" });
    expect(t1Entries).toHaveLength(1);
    expect(t1Entries[0]!.resourceId).toBe("m-1");
  });

  it("filters by action, resource type and resource id", () => {
    log.append(entry({ action: "accept", resourceId: "m-1" }));
    log.append(entry({ action: "reject", resourceId: "m-2" }));
    log.append(entry({ action: "resolve", resourceType: "check", resourceId: "chk-1" }));

    expect(log.query({ action: "reject" }).map((e) => e.resourceId)).toEqual(["m-2"]);
    expect(log.query({ resourceType: "check" }).map((e) => e.resourceId)).toEqual(["chk-1"]);
    expect(log.query({ resourceId: "m-1" }).map((e) => e.action)).toEqual(["accept"]);
  });

  it("combines multiple filters", () => {
    log.append(entry({ tenantId: "t1", action: "accept" }));
    log.append(entry({ tenantId: "t2", action: "accept" }));
    log.append(entry({ tenantId: "t1", action: "reject" }));

    const results = log.query({ tenantId: "t1", action: "accept" });
    expect(results).toHaveLength(1);
    expect(results[0]!.sequence).toBe(1);
  });

  it("applies limit after ordering", () => {
    for (let i = 1; i <= 5; i++) {
      log.append(entry({ resourceId: `m-${String(i)}` }));
    }

    expect(log.query({ limit: 2 }).map((e) => e.resourceId)).toEqual(["m-5", "m-4"]);
  });
});
