/**
 * Tenant resolution middleware.
 *
 * Picks the tenant from the X-Tenant-Id header (default tenant
 * otherwise) and provides its TallybookService via c.set("service").
 * The acting user comes from X-Actor and lands in the audit log.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RequestError } from "../types/error.js";
import type { TenantRegistry } from "../services/tenant-registry.js";

export const TENANT_HEADER = "X-Tenant-Id";
export const ACTOR_HEADER = "X-Actor";

const TENANT_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

export function tenantMiddleware(
  tenantRegistry: TenantRegistry,
  defaultTenantId: string,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const tenantId = c.req.header(TENANT_HEADER) ?? defaultTenantId;
    if (!TENANT_ID_PATTERN.test(tenantId)) {
      throw new RequestError(`Invalid ${TENANT_HEADER} header`, { tenantId });
    }

    const actor = c.req.header(ACTOR_HEADER)?.trim();
    c.set("service", tenantRegistry.getOrCreate(tenantId));
    c.set("actor", actor === undefined || actor === "" ? "api" : actor.slice(0, 128));
    await next();
  };
}
