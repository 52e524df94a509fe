/**
 * Type barrel — re-exports all public types from @tallybook/node.
 */

// DTOs
export {
  MoneySchema,
  PaginationQuerySchema,
  CreateAccountSchema,
  LineSchema,
  CreateEntrySchema,
  ListEntriesQuerySchema,
  AddLineSchema,
  UpdateLineSchema,
  VersionQuerySchema,
  PostEntrySchema,
  VoidEntrySchema,
  TransactionInputSchema,
  StatementSchema,
  ListTransactionsQuerySchema,
  DraftEntrySchema,
  RunReconciliationSchema,
  StatsQuerySchema,
  ListMatchesQuerySchema,
  AcceptMatchSchema,
  RejectMatchSchema,
  BatchAcceptSchema,
  BatchRejectSchema,
  ListChecksQuerySchema,
  RunChecksSchema,
  ResolveCheckSchema,
  AuditQuerySchema,
} from "./dto.js";
export type {
  MoneyDto,
  CreateAccountDto,
  LineDto,
  CreateEntryDto,
  ListEntriesQuery,
  UpdateLineDto,
  StatementDto,
  ListTransactionsQuery,
  DraftEntryDto,
  RunReconciliationDto,
  ListMatchesQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate, createdKey, sortByCreated } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
