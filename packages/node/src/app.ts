/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests drive the app through app.request() without an
 * HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { ReconcilerConfig } from "@tallybook/reconciler";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { AuditLog } from "./services/audit-log.js";
import { TenantRegistry } from "./services/tenant-registry.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { tenantMiddleware } from "./middleware/tenant.js";
import {
  createAccountRoutes,
  createAuditRoutes,
  createCheckRoutes,
  createEntryRoutes,
  createHealthRoutes,
  createLedgerRoutes,
  createReconciliationRoutes,
  createStatementRoutes,
  createTransferRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly defaultCurrency: string;
  readonly defaultDecimals: number;
  readonly reconciler?: ReconcilerConfig | undefined;
  /** Defaults to a silent logger. */
  readonly logger?: Logger | undefined;
  /** Tenant used when a request carries no X-Tenant-Id. Default: "default" */
  readonly defaultTenantId?: string | undefined;
  readonly clock?: (() => string) | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly tenantRegistry: TenantRegistry;
  readonly auditLog: AuditLog;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const clock = options.clock ?? (() => new Date().toISOString());
  const auditLog = new AuditLog(clock);
  const tenantRegistry = new TenantRegistry({
    defaultCurrency: options.defaultCurrency,
    defaultDecimals: options.defaultDecimals,
    reconciler: options.reconciler,
    logger,
    auditLog,
    clock: options.clock,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));

  // ─── Errors ─────────────────────────────────────────────────────
  app.onError(createErrorHandler(logger));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(tenantRegistry, clock));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", tenantMiddleware(tenantRegistry, options.defaultTenantId ?? "default"));

  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/entries", createEntryRoutes());
  app.route("/api/v1/ledger", createLedgerRoutes());
  app.route("/api/v1", createStatementRoutes());
  app.route("/api/v1/reconciliation", createReconciliationRoutes());
  app.route("/api/v1/transfers", createTransferRoutes());
  app.route("/api/v1/checks", createCheckRoutes());
  app.route("/api/v1/audit", createAuditRoutes(auditLog));

  return { app, tenantRegistry, auditLog };
}
