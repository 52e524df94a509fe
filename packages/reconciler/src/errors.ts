/**
 * Reconciler errors. Every failure carries a machine-readable code and
 * structured details; stale versions reuse the ledger's ConflictError.
 */

export type ReconcilerErrorCode =
  | "MATCH_NOT_FOUND"
  | "TRANSACTION_NOT_FOUND"
  | "CHECK_NOT_FOUND"
  | "DUPLICATE_TRANSACTION_ID"
  | "DUPLICATE_MATCH_ID"
  | "INVALID_ACTION"
  | "INVALID_TRANSACTION"
  | "INVALID_CONFIG"
  | "ALREADY_PROCESSED"
  | "CONSISTENCY_BLOCKED"
  | "NO_CLEARING_ACCOUNT";

export class ReconcilerError extends Error {
  public readonly code: ReconcilerErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: ReconcilerErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "ReconcilerError";
    this.code = code;
    this.details = details;
  }
}

/**
 * The target is no longer in an actionable status. Distinct from a
 * version conflict: re-fetching will not help.
 */
export class AlreadyProcessedError extends ReconcilerError {
  constructor(kind: string, id: string, status: string) {
    super("ALREADY_PROCESSED", `${kind} "${id}" is already ${status}`, { kind, id, status });
    this.name = "AlreadyProcessedError";
  }
}

/**
 * Batch approval refused while unresolved checks at or above the
 * severity gate name the item.
 */
export class ConsistencyBlockError extends ReconcilerError {
  public readonly blockingCheckIds: readonly string[];

  constructor(matchId: string, blockingCheckIds: readonly string[]) {
    super(
      "CONSISTENCY_BLOCKED",
      `Match "${matchId}" is blocked by unresolved checks: ${blockingCheckIds.join(", ")}`,
      { matchId, blockingCheckIds },
    );
    this.name = "ConsistencyBlockError";
    this.blockingCheckIds = blockingCheckIds;
  }
}
