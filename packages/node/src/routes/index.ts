/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createEntryRoutes } from "./entries.js";
export { createLedgerRoutes } from "./ledger.js";
export { createStatementRoutes } from "./statements.js";
export { createReconciliationRoutes } from "./reconciliation.js";
export { createCheckRoutes } from "./checks.js";
export { createTransferRoutes } from "./transfers.js";
export { createAuditRoutes } from "./audit.js";
