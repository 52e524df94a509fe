/**
 * Tests for TenantRegistry.
 */

import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import { AuditLog } from "../src/services/audit-log.js";
import { TenantRegistry } from "../src/services/tenant-registry.js";

describe("TenantRegistry", () => {
  let registry: TenantRegistry;

  beforeEach(() => {
    registry = new TenantRegistry({
      defaultCurrency: "USD",
      defaultDecimals: 2,
      logger: pino({ level: "silent" }),
      auditLog: new AuditLog(),
    });
  });

  it("creates a service on first access", () => {
    expect(registry.has("acme")).toBe(false);

    const service = registry.getOrCreate("acme");

    expect(service.tenantId).toBe("acme");
    expect(service.isReady()).toBe(true);
    expect(registry.has("acme")).toBe(true);
  });

  it("returns the same instance on later access", () => {
    expect(registry.getOrCreate("acme")).toBe(registry.getOrCreate("acme"));
  });

  it("keeps tenant ledgers apart", () => {
    const a = registry.getOrCreate("a");
    const b = registry.getOrCreate("b");

    a.createAccount({ id: "bank", name: "Bank", type: "asset" });

    expect(a.listAccounts()).toHaveLength(1);
    expect(b.listAccounts()).toHaveLength(0);
    expect(registry.tenantIds()).toEqual(["a", "b"]);
  });

  it("stops and forgets every tenant", async () => {
    const a = registry.getOrCreate("a");
    registry.getOrCreate("b");

    await registry.stopAll();

    expect(a.isReady()).toBe(false);
    expect(registry.tenantIds()).toEqual([]);
  });
});
