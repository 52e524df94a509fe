/**
 * Review actions on proposed matches.
 *
 * Every action checks the caller's version before the match status, so
 * a stale caller always sees ConflictError and a caller acting on a
 * decided match sees AlreadyProcessedError.
 */

import type { Ledger } from "@tallybook/ledger";
import { ConflictError, LedgerError, lifecycleStatus } from "@tallybook/ledger";
import type { ConsistencyChecker } from "./consistency-checker.js";
import { AlreadyProcessedError, ConsistencyBlockError, ReconcilerError } from "./errors.js";
import { assertMatchTransition, matchTxnIds } from "./match-store.js";
import type { MatchStore } from "./match-store.js";
import type { TransactionStore } from "./transaction-store.js";
import type {
  BatchItem,
  BatchItemResult,
  BatchResult,
  ReconciliationMatch,
} from "./types.js";

export interface ReviewDeps {
  readonly ledger: Ledger;
  readonly matches: MatchStore;
  readonly transactions: TransactionStore;
  readonly checker: ConsistencyChecker;
  readonly clock: () => string;
}

/**
 * Throws unless every entry can still be reconciled: drafts must
 * validate, posted entries must not be reversed, and nothing may be
 * reconciled already.
 */
export function assertEntriesReady(ledger: Ledger, entryIds: readonly string[]): void {
  for (const id of entryIds) {
    const entry = ledger.getEntry(id);
    const status = lifecycleStatus(entry);
    if (status === "reconciled" || status === "void" || entry.reversalOf !== undefined) {
      throw new AlreadyProcessedError("Entry", id, status);
    }
    if (entry.status === "draft") {
      const result = ledger.validate(entry);
      if (!result.ok) throw result.error;
    }
  }
}

/** Post any drafts, then reconcile every entry. */
export function commitEntries(ledger: Ledger, entryIds: readonly string[]): void {
  for (const id of entryIds) {
    let entry = ledger.getEntry(id);
    if (entry.status === "draft") {
      entry = ledger.post(id, entry.version);
    }
    ledger.reconcile(id, entry.version);
  }
}

/** Error shape recorded against a failed batch item. */
export function describeError(error: unknown): NonNullable<BatchItemResult["error"]> {
  if (error instanceof ReconcilerError || error instanceof LedgerError) {
    return {
      code: error.code,
      message: error.message,
      ...(error.details !== undefined ? { details: error.details } : {}),
    };
  }
  return {
    code: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : String(error),
  };
}

export class MatchReviewer {
  constructor(private readonly deps: ReviewDeps) {}

  getMatch(id: string): ReconciliationMatch {
    const match = this.deps.matches.get(id);
    if (match === undefined) {
      throw new ReconcilerError("MATCH_NOT_FOUND", `Unknown match: "${id}"`, { matchId: id });
    }
    return match;
  }

  accept(matchId: string, version: number): ReconciliationMatch {
    const { ledger, matches, transactions, clock } = this.deps;
    const match = this.actionable(matchId, version, "accepted");
    assertEntriesReady(ledger, match.journalEntryIds);

    const accepted: ReconciliationMatch = {
      ...match,
      status: "accepted",
      version: match.version + 1,
      resolvedAt: clock(),
    };
    matches.replace(accepted, match.version);
    commitEntries(ledger, match.journalEntryIds);
    for (const txnId of matchTxnIds(match)) transactions.setStatus(txnId, "matched");
    return accepted;
  }

  reject(matchId: string, version: number, reason: string): ReconciliationMatch {
    const { matches, transactions, clock } = this.deps;
    const match = this.actionable(matchId, version, "rejected");

    const rejected: ReconciliationMatch = {
      ...match,
      status: "rejected",
      version: match.version + 1,
      resolvedAt: clock(),
      rejectionReason: reason,
    };
    matches.replace(rejected, match.version);
    for (const txnId of matchTxnIds(match)) transactions.setStatus(txnId, "unmatched");
    return rejected;
  }

  /**
   * Accept each item independently. Items named by an unresolved check
   * at or above the severity gate fail with ConsistencyBlockError.
   */
  batchAccept(items: readonly BatchItem[]): BatchResult {
    return this.batch(items, (match, version) => {
      const blocking = this.deps.checker.blockingChecksFor({
        transactionIds: matchTxnIds(match),
        matchIds: [match.id],
        entryIds: match.journalEntryIds,
      });
      if (blocking.length > 0) {
        throw new ConsistencyBlockError(match.id, blocking.map((c) => c.id));
      }
      return this.accept(match.id, version);
    });
  }

  batchReject(items: readonly BatchItem[], reason: string): BatchResult {
    return this.batch(items, (match, version) => this.reject(match.id, version, reason));
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private actionable(
    matchId: string,
    version: number,
    to: "accepted" | "rejected",
  ): ReconciliationMatch {
    const match = this.getMatch(matchId);
    if (match.version !== version) {
      throw new ConflictError(matchId, version, match.version);
    }
    assertMatchTransition(match, to);
    return match;
  }

  private batch(
    items: readonly BatchItem[],
    action: (match: ReconciliationMatch, version: number) => ReconciliationMatch,
  ): BatchResult {
    const results: BatchItemResult[] = items.map((item) => {
      try {
        const match = this.getMatch(item.id);
        return { id: item.id, ok: true, match: action(match, item.version) };
      } catch (error) {
        return { id: item.id, ok: false, error: describeError(error) };
      }
    });
    const succeeded = results.filter((r) => r.ok).length;
    return { succeeded, failed: results.length - succeeded, results };
  }
}
