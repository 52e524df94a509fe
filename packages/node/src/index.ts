/**
 * @tallybook/node — HTTP service for the ledger and reconciler.
 */

export { TallybookService } from "./services/tallybook-service.js";
export type {
  TallybookServiceConfig,
  EntryCheck,
  ServiceHealth,
} from "./services/tallybook-service.js";
export { TenantRegistry } from "./services/tenant-registry.js";
export type { TenantDefaults } from "./services/tenant-registry.js";
export { AuditLog } from "./services/audit-log.js";
export type {
  AuditAction,
  AuditResourceType,
  AuditLogEntry,
  AuditLogQuery,
} from "./services/audit-log.js";
export {
  loadConfig,
  loadReconcilerConfig,
  mergeReconcilerConfig,
  ConfigSchema,
  ReconcilerFileSchema,
} from "./config.js";
export type { AppConfig, ReconcilerFile, ThresholdOverrides } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
