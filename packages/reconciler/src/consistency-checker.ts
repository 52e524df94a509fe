/**
 * Consistency Checker
 *
 * Scans match, transaction and clearing-account state for problems a
 * reviewer must look at before bulk approval:
 *
 * - duplicate_match        one transaction accepted more than once
 * - duplicate_entry_use    one entry accepted for different transactions
 * - unpaired_transfer      a clearing leg with no opposite leg in time
 * - stale_review           a review waiting longer than allowed
 * - duplicate_transaction  the same bank line ingested twice
 * - pattern_deviation      a match that breaks the payee's pattern
 *
 * A run scoped to one statement also reports, for that statement:
 *
 * - transfer_pair          an outflow and an equal inflow on another
 *                          account within the transfer window
 * - anomaly                a line that stands out (see anomaly.ts)
 *
 * Each finding is stored once, keyed by a fingerprint of its type and
 * related ids. Resolved findings are never raised again.
 */

import type { Ledger } from "@tallybook/ledger";
import { formatAmount, isBalanceBearing, lifecycleStatus, parseAmount } from "@tallybook/ledger";
import type { BankTransaction, Direction, JournalLine } from "@tallybook/types";
import type { CheckStore } from "./check-store.js";
import { detectAnomalies } from "./anomaly.js";
import { severityAtLeast } from "./config.js";
import { absDaysBetween, addDays, elapsedDays } from "./dates.js";
import { AlreadyProcessedError, ReconcilerError } from "./errors.js";
import { hashCanonical } from "./hashing.js";
import { matchTxnIds } from "./match-store.js";
import type { MatchStore } from "./match-store.js";
import { normalizeText } from "./text-similarity.js";
import type { TransactionStore } from "./transaction-store.js";
import type {
  CheckAction,
  CheckFilter,
  CheckType,
  ConsistencyCheck,
  ReconcilerConfig,
  ReconciliationMatch,
  Severity,
} from "./types.js";

export const CHECK_SEVERITY: Readonly<Record<CheckType, Severity>> = {
  duplicate_match: "high",
  duplicate_entry_use: "high",
  unpaired_transfer: "medium",
  stale_review: "medium",
  duplicate_transaction: "high",
  pattern_deviation: "low",
  transfer_pair: "medium",
  anomaly: "medium",
};

const CHECK_ACTIONS: readonly CheckAction[] = ["approve", "reject", "flag"];

const DUPLICATE_DESCRIPTION_LENGTH = 50;
const DUPLICATE_WINDOW_DAYS = 1;

/** A finding before it is stored. */
interface Finding {
  readonly checkType: CheckType;
  readonly transactionIds: readonly string[];
  readonly matchIds: readonly string[];
  readonly entryIds: readonly string[];
  /** Extra discriminator when related ids alone are not unique. */
  readonly subject?: string | undefined;
  /** Overrides CHECK_SEVERITY for this finding. */
  readonly severity?: Severity | undefined;
  readonly details: Readonly<Record<string, unknown>>;
}

export interface RelatedIds {
  readonly transactionIds?: readonly string[] | undefined;
  readonly matchIds?: readonly string[] | undefined;
  readonly entryIds?: readonly string[] | undefined;
}

export interface CheckScope {
  /** Adds the transfer_pair and anomaly detectors for this statement. */
  readonly statementId?: string | undefined;
}

export interface ConsistencyCheckerDeps {
  readonly ledger: Ledger;
  readonly matches: MatchStore;
  readonly transactions: TransactionStore;
  readonly checks: CheckStore;
  readonly config: ReconcilerConfig;
  readonly clock: () => string;
  readonly idGenerator: () => string;
}

const sorted = (ids: Iterable<string>): string[] => [...new Set(ids)].sort();

export function checkFingerprint(finding: Omit<Finding, "details" | "severity">): string {
  return hashCanonical({
    checkType: finding.checkType,
    transactionIds: sorted(finding.transactionIds),
    matchIds: sorted(finding.matchIds),
    entryIds: sorted(finding.entryIds),
    ...(finding.subject !== undefined ? { subject: finding.subject } : {}),
  });
}

export class ConsistencyChecker {
  constructor(private readonly deps: ConsistencyCheckerDeps) {}

  /**
   * Run every detector and store new findings. Returns only the checks
   * created by this pass.
   */
  run(asOf: string = this.deps.clock(), scope: CheckScope = {}): ConsistencyCheck[] {
    const findings = [
      ...this.duplicateMatches(),
      ...this.duplicateEntryUse(),
      ...this.unpairedTransfers(asOf),
      ...this.staleReviews(asOf),
      ...this.duplicateTransactions(),
      ...this.patternDeviations(),
      ...(scope.statementId !== undefined ? this.transferPairs(scope.statementId) : []),
      ...(scope.statementId !== undefined ? this.anomalies(scope.statementId) : []),
    ];

    const created: ConsistencyCheck[] = [];
    for (const finding of findings) {
      const fingerprint = checkFingerprint(finding);
      if (this.deps.checks.findByFingerprint(fingerprint) !== undefined) continue;

      const check: ConsistencyCheck = {
        id: this.deps.idGenerator(),
        checkType: finding.checkType,
        severity: finding.severity ?? CHECK_SEVERITY[finding.checkType],
        status: "pending",
        relatedTransactionIds: sorted(finding.transactionIds),
        relatedMatchIds: sorted(finding.matchIds),
        relatedEntryIds: sorted(finding.entryIds),
        details: finding.details,
        fingerprint,
        createdAt: this.deps.clock(),
      };
      this.deps.checks.insert(check);
      created.push(check);
    }
    return created;
  }

  list(filter?: CheckFilter): readonly ConsistencyCheck[] {
    return this.deps.checks.list(filter);
  }

  resolve(id: string, action: CheckAction, note?: string): ConsistencyCheck {
    if (!CHECK_ACTIONS.includes(action)) {
      throw new ReconcilerError("INVALID_ACTION", `Unknown check action: "${String(action)}"`, {
        action,
        allowed: CHECK_ACTIONS,
      });
    }
    const check = this.deps.checks.get(id);
    if (check === undefined) {
      throw new ReconcilerError("CHECK_NOT_FOUND", `Unknown check: "${id}"`, { checkId: id });
    }
    if (check.status === "resolved") {
      throw new AlreadyProcessedError("Check", id, "resolved");
    }

    const resolved: ConsistencyCheck = {
      ...check,
      status: "resolved",
      resolution: action,
      resolvedAt: this.deps.clock(),
      ...(note !== undefined ? { resolutionNote: note } : {}),
    };
    this.deps.checks.replace(resolved);
    return resolved;
  }

  /**
   * Unresolved checks at or above `gate` that name any of the ids.
   */
  blockingChecksFor(
    related: RelatedIds,
    gate: Severity = this.deps.config.severityGate,
  ): readonly ConsistencyCheck[] {
    const txns = new Set(related.transactionIds ?? []);
    const matches = new Set(related.matchIds ?? []);
    const entries = new Set(related.entryIds ?? []);
    return this.deps.checks
      .list({ statuses: ["pending"] })
      .filter(
        (c) =>
          severityAtLeast(c.severity, gate) &&
          (c.relatedTransactionIds.some((id) => txns.has(id)) ||
            c.relatedMatchIds.some((id) => matches.has(id)) ||
            c.relatedEntryIds.some((id) => entries.has(id))),
      );
  }

  // ─── Detectors ───────────────────────────────────────────────────────

  private acceptedMatches(): readonly ReconciliationMatch[] {
    return this.deps.matches.list({ statuses: ["accepted", "auto_accepted"] });
  }

  private duplicateMatches(): Finding[] {
    const byTxn = new Map<string, ReconciliationMatch[]>();
    for (const m of this.acceptedMatches()) {
      for (const txnId of matchTxnIds(m)) {
        byTxn.set(txnId, [...(byTxn.get(txnId) ?? []), m]);
      }
    }

    const findings: Finding[] = [];
    for (const [txnId, group] of byTxn) {
      if (group.length < 2) continue;
      findings.push({
        checkType: "duplicate_match",
        transactionIds: [txnId],
        matchIds: group.map((m) => m.id),
        entryIds: group.flatMap((m) => m.journalEntryIds),
        details: { matchCount: group.length },
      });
    }
    return findings;
  }

  private duplicateEntryUse(): Finding[] {
    const byEntry = new Map<string, ReconciliationMatch[]>();
    for (const m of this.acceptedMatches()) {
      for (const entryId of m.journalEntryIds) {
        byEntry.set(entryId, [...(byEntry.get(entryId) ?? []), m]);
      }
    }

    const findings: Finding[] = [];
    for (const [entryId, group] of byEntry) {
      const txnIds = sorted(group.flatMap(matchTxnIds));
      if (group.length < 2 || txnIds.length < 2) continue;
      findings.push({
        checkType: "duplicate_entry_use",
        transactionIds: txnIds,
        matchIds: group.map((m) => m.id),
        entryIds: [entryId],
        details: { transactionCount: txnIds.length },
      });
    }
    return findings;
  }

  /**
   * Clearing legs pair one-to-one with an opposite leg of the same
   * amount and currency on the same account within the transfer
   * window. A leg is reported only once the window has fully passed.
   */
  private unpairedTransfers(asOf: string): Finding[] {
    const { ledger, config } = this.deps;
    const clearing = new Set([
      ...config.clearingAccountIds,
      ...ledger.accounts.clearingIds(),
    ]);
    if (clearing.size === 0) return [];

    interface Leg {
      readonly entryId: string;
      readonly entryDate: string;
      readonly line: JournalLine;
      readonly amount: bigint;
    }

    const legs: Leg[] = [];
    for (const entry of ledger.listEntries()) {
      if (!isBalanceBearing(entry) || entry.reversalOf !== undefined) continue;
      if (lifecycleStatus(entry) === "void") continue;
      for (const line of entry.lines) {
        if (!clearing.has(line.accountId)) continue;
        legs.push({
          entryId: entry.id,
          entryDate: entry.entryDate,
          line,
          amount: parseAmount(line.money.amount, line.money.decimals),
        });
      }
    }
    legs.sort((a, b) => a.entryDate.localeCompare(b.entryDate) || a.line.id.localeCompare(b.line.id));

    const paired = new Set<string>();
    const window = config.transferWindowDays;
    for (const leg of legs) {
      if (paired.has(leg.line.id)) continue;
      const opposite: Direction = leg.line.direction === "debit" ? "credit" : "debit";
      const partner = legs.find(
        (other) =>
          !paired.has(other.line.id) &&
          other.entryId !== leg.entryId &&
          other.line.accountId === leg.line.accountId &&
          other.line.direction === opposite &&
          other.line.money.currency === leg.line.money.currency &&
          other.amount === leg.amount &&
          absDaysBetween(leg.entryDate, other.entryDate) <= window,
      );
      if (partner !== undefined) {
        paired.add(leg.line.id);
        paired.add(partner.line.id);
      }
    }

    const asOfDate = asOf.slice(0, 10);
    const findings: Finding[] = [];
    for (const leg of legs) {
      if (paired.has(leg.line.id)) continue;
      if (addDays(leg.entryDate, window) >= asOfDate) continue;

      const balance = ledger
        .getBalance(leg.line.accountId)
        .balances.find((b) => b.currency === leg.line.money.currency);
      const matchIds = this.deps.matches
        .list({ entryId: leg.entryId, statuses: ["accepted", "auto_accepted"] })
        .map((m) => m.id);

      findings.push({
        checkType: "unpaired_transfer",
        transactionIds: [],
        matchIds,
        entryIds: [leg.entryId],
        subject: leg.line.id,
        details: {
          accountId: leg.line.accountId,
          lineId: leg.line.id,
          direction: leg.line.direction,
          amount: leg.line.money.amount,
          currency: leg.line.money.currency,
          entryDate: leg.entryDate,
          windowDays: window,
          clearingBalance: balance?.balance ?? "0",
        },
      });
    }
    return findings;
  }

  private staleReviews(asOf: string): Finding[] {
    const limit = this.deps.config.staleReviewAgeDays;
    return this.deps.matches
      .list({ statuses: ["pending_review"] })
      .filter((m) => elapsedDays(m.createdAt, asOf) > limit)
      .map((m) => ({
        checkType: "stale_review" as const,
        transactionIds: matchTxnIds(m),
        matchIds: [m.id],
        entryIds: m.journalEntryIds,
        details: {
          createdAt: m.createdAt,
          ageDays: Math.floor(elapsedDays(m.createdAt, asOf)),
          limitDays: limit,
        },
      }));
  }

  /**
   * Same account, direction, amount and description prefix, no more
   * than a day apart.
   */
  private duplicateTransactions(): Finding[] {
    const groups = new Map<string, BankTransaction[]>();
    for (const txn of this.deps.transactions.list()) {
      const key = [
        txn.accountId,
        txn.direction,
        txn.money.currency,
        parseAmount(txn.money.amount, txn.money.decimals).toString(),
        normalizeText(txn.description).slice(0, DUPLICATE_DESCRIPTION_LENGTH),
      ].join("|");
      groups.set(key, [...(groups.get(key) ?? []), txn]);
    }

    const findings: Finding[] = [];
    for (const group of groups.values()) {
      if (group.length < 2) continue;
      // Already ordered by date; split where the gap exceeds the window.
      let cluster: BankTransaction[] = [];
      const flush = (): void => {
        if (cluster.length >= 2) {
          findings.push({
            checkType: "duplicate_transaction",
            transactionIds: cluster.map((t) => t.id),
            matchIds: [],
            entryIds: [],
            details: {
              accountId: cluster[0]?.accountId,
              amount: cluster[0]?.money.amount,
              currency: cluster[0]?.money.currency,
              dates: cluster.map((t) => t.txnDate),
            },
          });
        }
      };
      for (const txn of group) {
        const last = cluster[cluster.length - 1];
        if (last !== undefined && absDaysBetween(last.txnDate, txn.txnDate) > DUPLICATE_WINDOW_DAYS) {
          flush();
          cluster = [];
        }
        cluster.push(txn);
      }
      flush();
    }
    return findings;
  }

  private patternDeviations(): Finding[] {
    return this.deps.matches
      .list({ statuses: ["accepted", "auto_accepted", "pending_review"] })
      .filter((m) => m.flags.includes("pattern_deviation"))
      .map((m) => ({
        checkType: "pattern_deviation" as const,
        transactionIds: matchTxnIds(m),
        matchIds: [m.id],
        entryIds: m.journalEntryIds,
        details: { matchScore: m.matchScore, history: m.scoreBreakdown.history },
      }));
  }

  /**
   * Each outflow pairs once with an equal inflow in the same currency
   * on another account within the transfer window, earliest first. At
   * least one leg must belong to the statement.
   */
  private transferPairs(statementId: string): Finding[] {
    const window = this.deps.config.transferWindowDays;
    const all = this.deps.transactions.list();
    const amountOf = (t: BankTransaction): bigint => parseAmount(t.money.amount, t.money.decimals);
    const outs = all.filter((t) => t.direction === "out");
    const ins = all.filter((t) => t.direction === "in");

    const used = new Set<string>();
    const findings: Finding[] = [];
    for (const out of outs) {
      const partner = ins.find(
        (inbound) =>
          !used.has(inbound.id) &&
          (out.statementId === statementId || inbound.statementId === statementId) &&
          inbound.accountId !== out.accountId &&
          inbound.money.currency === out.money.currency &&
          amountOf(inbound) === amountOf(out) &&
          absDaysBetween(out.txnDate, inbound.txnDate) <= window,
      );
      if (partner === undefined) continue;
      used.add(partner.id);
      findings.push({
        checkType: "transfer_pair",
        transactionIds: [out.id, partner.id],
        matchIds: [],
        entryIds: [],
        details: {
          amount: out.money.amount,
          currency: out.money.currency,
          outAccountId: out.accountId,
          inAccountId: partner.accountId,
          outDate: out.txnDate,
          inDate: partner.txnDate,
          amountDelta: formatAmount(0n, out.money.decimals),
          dateDiffDays: absDaysBetween(out.txnDate, partner.txnDate),
        },
      });
    }
    return findings;
  }

  private anomalies(statementId: string): Finding[] {
    const population = this.deps.transactions.list();
    const findings: Finding[] = [];
    for (const txn of population) {
      if (txn.statementId !== statementId) continue;
      for (const anomaly of detectAnomalies(txn, population, this.deps.config.anomaly)) {
        findings.push({
          checkType: "anomaly",
          transactionIds: [txn.id],
          matchIds: [],
          entryIds: [],
          subject: anomaly.anomalyType,
          severity: anomaly.severity,
          details: {
            anomalyType: anomaly.anomalyType,
            message: anomaly.message,
            amount: txn.money.amount,
            currency: txn.money.currency,
            date: txn.txnDate,
          },
        });
      }
    }
    return findings;
  }
}
