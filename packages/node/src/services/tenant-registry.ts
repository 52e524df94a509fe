/**
 * TenantRegistry — Maps tenant IDs to isolated TallybookService instances.
 *
 * Each tenant gets its own ledger and reconciliation engine. The audit
 * log and logger are shared and tagged with the tenant id.
 */

import { TallybookService } from "./tallybook-service.js";
import type { TallybookServiceConfig } from "./tallybook-service.js";

export type TenantDefaults = Omit<TallybookServiceConfig, "tenantId">;

export class TenantRegistry {
  private readonly _tenants = new Map<string, TallybookService>();
  private readonly _defaults: TenantDefaults;

  constructor(defaults: TenantDefaults) {
    this._defaults = defaults;
  }

  /**
   * Get or lazily create the service instance for a tenant.
   */
  getOrCreate(tenantId: string): TallybookService {
    let service = this._tenants.get(tenantId);
    if (service === undefined) {
      service = new TallybookService({ ...this._defaults, tenantId });
      this._tenants.set(tenantId, service);
    }
    return service;
  }

  has(tenantId: string): boolean {
    return this._tenants.has(tenantId);
  }

  tenantIds(): readonly string[] {
    return [...this._tenants.keys()];
  }

  /**
   * Stop every tenant service and forget them.
   */
  async stopAll(): Promise<void> {
    await Promise.all([...this._tenants.values()].map((s) => s.stop()));
    this._tenants.clear();
  }
}
