/**
 * Global error handler.
 *
 * Catches every error thrown by route handlers and produces the error
 * envelope. Domain errors keep their own code; the code decides the
 * HTTP status:
 *
 * - entry or statement rejected by the domain rules → 422
 * - malformed request input                         → 400
 * - stale version, already processed, duplicates    → 409
 * - blocked by unresolved consistency checks         → 423
 * - unknown resource                                 → 404
 * - anything else                                    → 500, generic message
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { LedgerError, ValidationError } from "@tallybook/ledger";
import { ReconcilerError } from "@tallybook/reconciler";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope, RequestError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Not found
  ACCOUNT_NOT_FOUND: 404,
  ENTRY_NOT_FOUND: 404,
  LINE_NOT_FOUND: 404,
  MATCH_NOT_FOUND: 404,
  TRANSACTION_NOT_FOUND: 404,
  CHECK_NOT_FOUND: 404,

  // Conflicts
  STALE_VERSION: 409,
  ALREADY_PROCESSED: 409,
  INVALID_TRANSITION: 409,
  DUPLICATE_ACCOUNT_ID: 409,
  DUPLICATE_ENTRY_ID: 409,
  DUPLICATE_TRANSACTION_ID: 409,
  DUPLICATE_MATCH_ID: 409,
  ACCOUNT_IN_USE: 409,

  // Gate
  CONSISTENCY_BLOCKED: 423,

  // Domain validation
  INVALID_TRANSACTION: 422,
  INVALID_SNAPSHOT: 422,
  INVALID_CONFIG: 422,
  NO_CLEARING_ACCOUNT: 422,
  MISSING_FX_RATE: 422,

  // Malformed input
  INVALID_ACTION: 400,
};

export function statusForError(err: Error): ContentfulStatusCode {
  if (err instanceof RequestError) return 400;
  if (err instanceof ValidationError) return 422;
  if (err instanceof LedgerError || err instanceof ReconcilerError) {
    return STATUS_MAP[err.code] ?? 500;
  }
  return 500;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the onError handler. Server errors are logged with the request
 * id; their message never reaches the client.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (!(err instanceof Error)) {
      return err.getResponse();
    }
    if (err instanceof HTTPException) {
      const code = err.status === 404 ? "NOT_FOUND" : err.status < 500 ? "VALIDATION_ERROR" : "INTERNAL_ERROR";
      return c.json(createErrorEnvelope(code, err.message), err.status);
    }

    const status = statusForError(err);
    if (
      status !== 500 &&
      (err instanceof RequestError || err instanceof LedgerError || err instanceof ReconcilerError)
    ) {
      return c.json(createErrorEnvelope(err.code, err.message, err.details), status);
    }

    logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
