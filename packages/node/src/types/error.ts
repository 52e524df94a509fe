/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes produced by the HTTP layer itself. Domain errors pass their own
 * code through unchanged (e.g. UNBALANCED_ENTRY, STALE_VERSION).
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  if (details !== undefined) {
    return { error: { code, message, details } };
  }
  return { error: { code, message } };
}

/**
 * Malformed request input the schema layer cannot catch (e.g. a cursor
 * from another listing). Mapped to 400 VALIDATION_ERROR.
 */
export class RequestError extends Error {
  public readonly code = "VALIDATION_ERROR";
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super(message);
    this.name = "RequestError";
    this.details = details;
  }
}
