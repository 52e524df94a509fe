/**
 * Match records and their status machine.
 *
 *   pending ──► auto_accepted
 *      │
 *      ├──► pending_review ──► accepted | rejected
 *      │          │
 *      └──────────┴──► superseded
 *
 * Records are never overwritten in place: every change goes through a
 * compare-and-swap on `version`.
 */

import { ConflictError } from "@tallybook/ledger";
import { AlreadyProcessedError, ReconcilerError } from "./errors.js";
import type { MatchFilter, MatchStatus, ReconciliationMatch } from "./types.js";

export const MATCH_TRANSITIONS: Readonly<Record<MatchStatus, readonly MatchStatus[]>> = {
  pending: ["auto_accepted", "pending_review", "superseded"],
  pending_review: ["accepted", "rejected", "superseded"],
  auto_accepted: [],
  accepted: [],
  rejected: [],
  superseded: [],
} as const;

export function canMatchTransition(from: MatchStatus, to: MatchStatus): boolean {
  switch (from) {
    case "pending":
    case "pending_review":
    case "auto_accepted":
    case "accepted":
    case "rejected":
    case "superseded":
      return MATCH_TRANSITIONS[from].includes(to);
    default: {
      const unreachable: never = from;
      throw new ReconcilerError("INVALID_ACTION", `Unknown match status: "${String(unreachable)}"`);
    }
  }
}

export function assertMatchTransition(match: ReconciliationMatch, to: MatchStatus): void {
  if (!canMatchTransition(match.status, to)) {
    throw new AlreadyProcessedError("Match", match.id, match.status);
  }
}

/** The bank lines a match covers: its group, or just `bankTxnId`. */
export function matchTxnIds(match: ReconciliationMatch): readonly string[] {
  return match.groupTxnIds ?? [match.bankTxnId];
}

export interface MatchStore {
  /** Throws DUPLICATE_MATCH_ID when the id is taken. */
  insert(match: ReconciliationMatch): void;
  get(id: string): ReconciliationMatch | undefined;
  list(filter?: MatchFilter): readonly ReconciliationMatch[];
  /**
   * Replace a stored match if its current version equals
   * `expectedVersion`. Throws ConflictError otherwise.
   */
  replace(match: ReconciliationMatch, expectedVersion: number): void;
}

function matchesFilter(m: ReconciliationMatch, filter: MatchFilter): boolean {
  if (filter.statuses !== undefined && !filter.statuses.includes(m.status)) return false;
  if (filter.bankTxnId !== undefined && !matchTxnIds(m).includes(filter.bankTxnId)) return false;
  if (filter.accountId !== undefined && m.accountId !== filter.accountId) return false;
  if (filter.runId !== undefined && m.runId !== filter.runId) return false;
  if (filter.entryId !== undefined && !m.journalEntryIds.includes(filter.entryId)) return false;
  if (filter.minScore !== undefined && m.matchScore < filter.minScore) return false;
  if (filter.maxScore !== undefined && m.matchScore > filter.maxScore) return false;
  return true;
}

/** Map-backed store; lists in insertion order. */
export class InMemoryMatchStore implements MatchStore {
  private readonly _matches = new Map<string, ReconciliationMatch>();

  insert(match: ReconciliationMatch): void {
    if (this._matches.has(match.id)) {
      throw new ReconcilerError("DUPLICATE_MATCH_ID", `Match already exists: "${match.id}"`);
    }
    this._matches.set(match.id, match);
  }

  get(id: string): ReconciliationMatch | undefined {
    return this._matches.get(id);
  }

  list(filter: MatchFilter = {}): readonly ReconciliationMatch[] {
    return [...this._matches.values()].filter((m) => matchesFilter(m, filter));
  }

  replace(match: ReconciliationMatch, expectedVersion: number): void {
    const current = this._matches.get(match.id);
    if (current === undefined) {
      throw new ReconcilerError("MATCH_NOT_FOUND", `Unknown match: "${match.id}"`, {
        matchId: match.id,
      });
    }
    if (current.version !== expectedVersion) {
      throw new ConflictError(match.id, expectedVersion, current.version);
    }
    this._matches.set(match.id, match);
  }
}
