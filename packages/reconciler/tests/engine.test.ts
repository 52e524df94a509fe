/**
 * ReconciliationEngine integration tests
 *
 * Runs the full ingest → score → route → review cycle against an
 * in-process ledger.
 */
import { describe, it, expect } from "vitest";
import { ConflictError, Ledger } from "@tallybook/ledger";
import type { BankTransaction } from "@tallybook/types";
import { LedgerCandidateSource } from "../src/candidates.js";
import type { CandidateSource } from "../src/candidates.js";
import { ReconciliationEngine } from "../src/engine.js";
import { AlreadyProcessedError, ReconcilerError } from "../src/errors.js";
import { InMemoryMatchStore } from "../src/match-store.js";
import { InMemoryTransactionStore } from "../src/transaction-store.js";
import { DEFAULT_RECONCILER_CONFIG } from "../src/config.js";
import type { ReconciliationMatch, RunScope } from "../src/types.js";
import { harness, NOW, usd } from "./fixtures.js";

function only<T>(items: readonly T[]): T {
  expect(items).toHaveLength(1);
  const [item] = items;
  if (item === undefined) throw new Error("expected one item");
  return item;
}

describe("ReconciliationEngine", () => {
  describe("ingestStatement", () => {
    it("stores transactions as pending and trusted", () => {
      const { engine, ingest } = harness();
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "1500.00" });

      expect(engine.getTransaction("t1")).toEqual({
        id: "t1",
        accountId: "bank",
        statementId: "stmt-1",
        txnDate: "2025-03-10",
        money: usd("1500.00"),
        direction: "in",
        description: "ACME",
        status: "pending",
        trusted: true,
      });
    });

    it("marks a batch that fails its balance check untrusted", () => {
      const { engine } = harness();
      const result = engine.ingestStatement({
        statementId: "stmt-2",
        accountId: "bank",
        openingBalance: usd("1000.00"),
        closingBalance: usd("2000.00"),
        transactions: [
          { id: "t1", txnDate: "2025-03-10", money: usd("1500.00"), direction: "in", description: "ACME" },
        ],
      });
      expect(result.trusted).toBe(false);
      expect(engine.getTransaction("t1").trusted).toBe(false);
    });

    it("prefers the extractor's own balance verdict", () => {
      const { engine } = harness();
      const result = engine.ingestStatement({
        statementId: "stmt-2",
        accountId: "bank",
        openingBalance: usd("1000.00"),
        closingBalance: usd("2000.00"),
        balanceCheckPassed: true,
        transactions: [],
      });
      expect(result.trusted).toBe(true);
    });

    it("stores nothing when one transaction id is taken", () => {
      const { engine, ingest } = harness();
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "10.00" });

      expect(() =>
        engine.ingestStatement({
          statementId: "stmt-2",
          accountId: "bank",
          transactions: [
            { id: "t2", txnDate: "2025-03-11", money: usd("5.00"), direction: "in", description: "x" },
            { id: "t1", txnDate: "2025-03-11", money: usd("5.00"), direction: "in", description: "x" },
          ],
        }),
      ).toThrow(expect.objectContaining({ code: "DUPLICATE_TRANSACTION_ID" }));
      expect(engine.listTransactions().map((t) => t.id)).toEqual(["t1"]);
    });

    it("rejects an invalid date", () => {
      const { engine } = harness();
      expect(() =>
        engine.ingestStatement({
          statementId: "s",
          accountId: "bank",
          transactions: [
            { id: "t1", txnDate: "2025-02-30", money: usd("5.00"), direction: "in", description: "x" },
          ],
        }),
      ).toThrow(expect.objectContaining({ code: "INVALID_DATE" }));
    });
  });

  describe("run", () => {
    it("auto-accepts an exact reference match and reconciles the entry", async () => {
      const { engine, ledger, post, ingest } = harness();
      const entryId = post("bank", "sales", "1500.00", "2025-03-10", "Invoice INV-1001 ACME Corp");
      ingest({
        id: "t1",
        txnDate: "2025-03-10",
        amount: "1500.00",
        description: "ACME Corp invoice 1001",
        reference: "INV-1001",
      });

      const summary = await engine.run();

      expect(summary).toMatchObject({
        processed: 1,
        autoAccepted: 1,
        pendingReview: 0,
        unmatched: 0,
        superseded: 0,
        skipped: 0,
        aborted: false,
        errors: [],
      });
      const match = only(engine.listMatches({ bankTxnId: "t1" }));
      expect(match).toMatchObject({
        status: "auto_accepted",
        version: 2,
        matchScore: 98,
        weightedScore: 97.5,
        journalEntryIds: [entryId],
        runId: summary.runId,
        resolvedAt: NOW,
      });
      expect(ledger.getEntry(entryId).status).toBe("reconciled");
      expect(engine.getTransaction("t1").status).toBe("matched");
    });

    it("posts a draft entry when auto-accepting it", async () => {
      const { engine, ledger, ingest } = harness();
      const draft = ledger.createDraft({
        entryDate: "2025-03-10",
        memo: "ACME",
        lines: [
          { accountId: "bank", direction: "debit", money: usd("1500.00") },
          { accountId: "sales", direction: "credit", money: usd("1500.00") },
        ],
      });
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "1500.00" });

      await engine.run();

      const entry = ledger.getEntry(draft.id);
      expect(entry.status).toBe("reconciled");
      expect(entry.postedAt).toBe(NOW);
    });

    it("sends a mid-range score to review without touching the entry", async () => {
      const { engine, ledger, post, ingest } = harness();
      const entryId = post("bank", "sales", "1500.00", "2025-03-10", "Payroll");
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "1500.00" });

      const summary = await engine.run();

      expect(summary.pendingReview).toBe(1);
      const match = only(engine.listPending());
      // (100×40 + 100×25 + 0×20 + 100×10 + 50×5) / 100 = 77.5
      expect(match).toMatchObject({ status: "pending_review", version: 2, matchScore: 78 });
      expect(match.scoreBreakdown.description).toBe(0);
      expect(ledger.getEntry(entryId).status).toBe("posted");
      expect(engine.getTransaction("t1").status).toBe("pending");
    });

    it("marks a transaction without candidates unmatched and records nothing", async () => {
      const { engine, ingest } = harness();
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "42.00" });

      const summary = await engine.run();

      expect(summary.unmatched).toBe(1);
      expect(engine.listMatches()).toEqual([]);
      expect(engine.getTransaction("t1").status).toBe("unmatched");
    });

    it("caps an untrusted transaction at review", async () => {
      const { engine, post } = harness();
      post("bank", "sales", "1500.00", "2025-03-10", "ACME");
      engine.ingestStatement({
        statementId: "stmt-2",
        accountId: "bank",
        openingBalance: usd("1000.00"),
        closingBalance: usd("2000.00"),
        transactions: [
          { id: "t1", txnDate: "2025-03-10", money: usd("1500.00"), direction: "in", description: "ACME" },
        ],
      });

      await engine.run();

      const match = only(engine.listMatches());
      expect(match.status).toBe("pending_review");
      expect(match.matchScore).toBe(98);
      expect(match.flags).toEqual(["low_trust"]);
    });

    it("is idempotent on unchanged data", async () => {
      const { engine, post, ingest } = harness();
      post("bank", "sales", "1500.00", "2025-03-10", "Payroll");
      ingest(
        { id: "t1", txnDate: "2025-03-10", amount: "1500.00" },
        { id: "t2", txnDate: "2025-03-10", amount: "9.99", description: "Fee" },
      );

      await engine.run();
      const before = engine.listMatches();
      const second = await engine.run();

      expect(second).toMatchObject({ processed: 2, pendingReview: 0, unmatched: 1, skipped: 1 });
      expect(engine.listMatches()).toEqual(before);
    });

    it("supersedes a pending review with a strictly better candidate", async () => {
      const { engine, post, ingest } = harness();
      post("bank", "sales", "1500.00", "2025-03-10", "Payroll");
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "1500.00" });
      await engine.run();
      const old = only(engine.listPending());

      const better = post("bank", "sales", "1500.00", "2025-03-10", "ACME");
      const summary = await engine.run();

      expect(summary).toMatchObject({ autoAccepted: 1, superseded: 1 });
      const replaced = engine.getMatch(old.id);
      const current = only(engine.listMatches({ statuses: ["auto_accepted"] }));
      expect(current.journalEntryIds).toEqual([better]);
      expect(current.supersedes).toBe(old.id);
      expect(replaced).toMatchObject({ status: "superseded", version: 3, supersededBy: current.id });
    });

    it("never proposes a rejected entry set again", async () => {
      const { engine, post, ingest } = harness();
      post("bank", "sales", "1500.00", "2025-03-10", "Payroll");
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "1500.00" });
      await engine.run();
      const proposed = only(engine.listPending());
      engine.reject(proposed.id, proposed.version, "different customer");

      const summary = await engine.run();

      expect(summary).toMatchObject({ processed: 1, unmatched: 1, pendingReview: 0 });
      expect(only(engine.listMatches()).status).toBe("rejected");
      expect(engine.getTransaction("t1").status).toBe("unmatched");
    });

    it("ranks candidates best first", async () => {
      const { engine, post, ingest } = harness();
      post("bank", "sales", "1500.00", "2025-03-10", "Payroll");
      const acme = post("bank", "sales", "1500.00", "2025-03-10", "ACME");
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "1500.00" });

      const ranked = await engine.rankCandidates(engine.getTransaction("t1"));
      expect(ranked.map((r) => r.score)).toEqual([98, 78]);

      await engine.run();
      expect(only(engine.listMatches()).journalEntryIds).toEqual([acme]);
    });

    it("proposes the next candidate after a rejection", async () => {
      const { engine, post, ingest } = harness();
      post("bank", "sales", "1500.00", "2025-03-10", "Payroll");
      const later = post("bank", "sales", "1500.00", "2025-03-11", "Payroll");
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "1500.00" });
      await engine.run();
      const first = only(engine.listPending());
      engine.reject(first.id, first.version, "wrong entry");

      const summary = await engine.run();

      expect(summary.pendingReview).toBe(1);
      const next = only(engine.listPending());
      expect(next.journalEntryIds).toEqual([later]);
      // one day apart: (100×40 + 90×25 + 0×20 + 100×10 + 50×5) / 100
      expect(next.matchScore).toBe(75);
      expect(engine.getTransaction("t1").status).toBe("pending");
    });

    it("records a failing transaction and carries on", async () => {
      const ledger = new Ledger({ clock: () => NOW });
      ledger.registerAccount({ id: "bank", name: "Bank", type: "asset", currency: "USD" });
      const transactions = new InMemoryTransactionStore();
      const matches = new InMemoryMatchStore();
      const inner = new LedgerCandidateSource(ledger, transactions, matches, DEFAULT_RECONCILER_CONFIG);
      const source: CandidateSource = {
        listOpenTransactions: (scope: RunScope) => inner.listOpenTransactions(scope),
        listHistory: (accountId: string) => inner.listHistory(accountId),
        listCandidateEntries: async (t: BankTransaction, days: number) => {
          if (t.id === "t-bad") throw new Error("source unavailable");
          return inner.listCandidateEntries(t, days);
        },
      };
      const engine = new ReconciliationEngine({ ledger, transactions, matches, candidateSource: source, clock: () => NOW });
      engine.ingestStatement({
        statementId: "s",
        accountId: "bank",
        transactions: [
          { id: "t-bad", txnDate: "2025-03-01", money: usd("1.00"), direction: "in", description: "x" },
          { id: "t-ok", txnDate: "2025-03-02", money: usd("2.00"), direction: "in", description: "y" },
        ],
      });

      const summary = await engine.run();

      expect(summary.processed).toBe(2);
      expect(summary.unmatched).toBe(1);
      expect(summary.errors).toEqual([
        { bankTxnId: "t-bad", code: "INTERNAL_ERROR", message: "source unavailable" },
      ]);
      expect(engine.getTransaction("t-bad").status).toBe("pending");
    });

    it("stops between transactions when aborted", async () => {
      const ledger = new Ledger({ clock: () => NOW });
      ledger.registerAccount({ id: "bank", name: "Bank", type: "asset", currency: "USD" });
      const transactions = new InMemoryTransactionStore();
      const matches = new InMemoryMatchStore();
      const inner = new LedgerCandidateSource(ledger, transactions, matches, DEFAULT_RECONCILER_CONFIG);
      const controller = new AbortController();
      const source: CandidateSource = {
        listOpenTransactions: (scope: RunScope) => inner.listOpenTransactions(scope),
        listHistory: (accountId: string) => inner.listHistory(accountId),
        listCandidateEntries: async (t: BankTransaction, days: number) => {
          controller.abort();
          return inner.listCandidateEntries(t, days);
        },
      };
      const engine = new ReconciliationEngine({ ledger, transactions, matches, candidateSource: source, clock: () => NOW });
      engine.ingestStatement({
        statementId: "s",
        accountId: "bank",
        transactions: [
          { id: "t1", txnDate: "2025-03-01", money: usd("1.00"), direction: "in", description: "x" },
          { id: "t2", txnDate: "2025-03-02", money: usd("2.00"), direction: "in", description: "y" },
        ],
      });

      const summary = await engine.run({}, { signal: controller.signal });

      expect(summary).toMatchObject({ processed: 1, unmatched: 1, aborted: true });
      expect(engine.getTransaction("t1").status).toBe("unmatched");
      expect(engine.getTransaction("t2").status).toBe("pending");
    });

    it("honours the scope limit and account", async () => {
      const { engine, ingest } = harness();
      ingest(
        { id: "t1", txnDate: "2025-03-10", amount: "1.00" },
        { id: "t2", txnDate: "2025-03-11", amount: "2.00" },
      );

      expect((await engine.run({ limit: 1 })).processed).toBe(1);
      expect((await engine.run({ accountId: "other" })).processed).toBe(0);
    });

    it("scores every transaction against the history as it stood when the run began", async () => {
      const { engine, post, ingest } = harness();
      post("bank", "sales", "100.00", "2025-03-10", "ACME");
      post("bank", "sales", "100.00", "2025-03-10", "ACME");
      ingest(
        { id: "ta", txnDate: "2025-03-10", amount: "100.00" },
        { id: "tb", txnDate: "2025-03-10", amount: "100.00" },
      );

      const summary = await engine.run();

      expect(summary.autoAccepted).toBe(2);
      const expected = {
        matchScore: 98,
        weightedScore: 97.5,
        scoreBreakdown: { amount: 100, date: 100, description: 100, businessFit: 100, history: 50 },
      };
      expect(only(engine.listMatches({ bankTxnId: "ta" }))).toMatchObject(expected);
      expect(only(engine.listMatches({ bankTxnId: "tb" }))).toMatchObject(expected);
    });

    it("only considers entries on the transaction's own account", async () => {
      const { engine, ledger, post, ingest } = harness();
      ledger.registerAccount({ id: "savings", name: "Savings", type: "asset", currency: "USD" });
      const elsewhere = post("savings", "sales", "250.00", "2025-03-10", "ACME");
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "250.00" });

      const summary = await engine.run();

      expect(summary).toMatchObject({ processed: 1, autoAccepted: 0, pendingReview: 0, unmatched: 1 });
      expect(engine.listMatches()).toEqual([]);
      expect(ledger.getEntry(elsewhere).status).toBe("posted");
    });
  });

  describe("review", () => {
    async function reviewed(): Promise<{ h: ReturnType<typeof harness>; match: ReconciliationMatch; entryId: string }> {
      const h = harness();
      const entryId = h.post("bank", "sales", "1500.00", "2025-03-10", "Payroll");
      h.ingest({ id: "t1", txnDate: "2025-03-10", amount: "1500.00" });
      await h.engine.run();
      return { h, match: only(h.engine.listPending()), entryId };
    }

    it("accepts a pending review", async () => {
      const { h, match, entryId } = await reviewed();

      const accepted = h.engine.accept(match.id, match.version);

      expect(accepted).toMatchObject({ status: "accepted", version: 3, resolvedAt: NOW });
      expect(h.ledger.getEntry(entryId).status).toBe("reconciled");
      expect(h.engine.getTransaction("t1").status).toBe("matched");
    });

    it("lets exactly one of two accepts on the same version win", async () => {
      const { h, match } = await reviewed();

      const outcomes = [match, match].map((m) => {
        try {
          h.engine.accept(m.id, m.version);
          return "ok";
        } catch (error) {
          return error instanceof ConflictError ? "conflict" : "other";
        }
      });

      expect(outcomes).toEqual(["ok", "conflict"]);
    });

    it("reports an already decided match at its current version", async () => {
      const { h, match } = await reviewed();
      const accepted = h.engine.accept(match.id, match.version);

      expect(() => h.engine.reject(accepted.id, accepted.version, "late")).toThrow(AlreadyProcessedError);
    });

    it("rejects with a reason and leaves entries alone", async () => {
      const { h, match, entryId } = await reviewed();

      const rejected = h.engine.reject(match.id, match.version, "different customer");

      expect(rejected).toMatchObject({ status: "rejected", rejectionReason: "different customer" });
      expect(h.ledger.getEntry(entryId).status).toBe("posted");
      expect(h.engine.getTransaction("t1").status).toBe("unmatched");
    });

    it("refuses to accept when the entry was voided meanwhile", async () => {
      const { h, match, entryId } = await reviewed();
      h.ledger.void(entryId, "duplicate");

      expect(() => h.engine.accept(match.id, match.version)).toThrow(
        expect.objectContaining({ code: "ALREADY_PROCESSED" }),
      );
      expect(h.engine.getMatch(match.id).status).toBe("pending_review");
    });

    it("throws MATCH_NOT_FOUND for an unknown id", () => {
      const { engine } = harness();
      expect(() => engine.getMatch("nope")).toThrow(ReconcilerError);
    });
  });

  describe("batch review", () => {
    async function duplicates(): Promise<{ h: ReturnType<typeof harness>; m1: ReconciliationMatch; m2: ReconciliationMatch }> {
      const h = harness();
      h.post("bank", "sales", "1500.00", "2025-03-10", "Payroll");
      h.ingest(
        { id: "t1", txnDate: "2025-03-10", amount: "1500.00" },
        { id: "t2", txnDate: "2025-03-11", amount: "1500.00" },
      );
      await h.engine.run();
      const m1 = only(h.engine.listPending({ bankTxnId: "t1" }));
      const m2 = only(h.engine.listPending({ bankTxnId: "t2" }));
      return { h, m1, m2 };
    }

    it("blocks items named by an unresolved high-severity check", async () => {
      const { h, m1 } = await duplicates();
      const check = only(h.engine.runConsistencyChecks());
      expect(check.checkType).toBe("duplicate_transaction");

      const result = h.engine.batchAccept([
        { id: m1.id, version: m1.version },
        { id: "missing", version: 1 },
      ]);

      expect(result.succeeded).toBe(0);
      expect(result.failed).toBe(2);
      expect(result.results[0]).toEqual({
        id: m1.id,
        ok: false,
        error: {
          code: "CONSISTENCY_BLOCKED",
          message: `Match "${m1.id}" is blocked by unresolved checks: ${check.id}`,
          details: { matchId: m1.id, blockingCheckIds: [check.id] },
        },
      });
      expect(result.results[1]?.error?.code).toBe("MATCH_NOT_FOUND");
    });

    it("reports each item on its own once the check is resolved", async () => {
      const { h, m1, m2 } = await duplicates();
      const check = only(h.engine.runConsistencyChecks());
      h.engine.resolveCheck(check.id, "approve", "two separate invoices");

      const result = h.engine.batchAccept([
        { id: m1.id, version: m1.version },
        { id: m2.id, version: m2.version },
      ]);

      expect(result.succeeded).toBe(1);
      expect(result.results[0]?.match?.status).toBe("accepted");
      // Both proposals name the same entry, which is now reconciled.
      expect(result.results[1]?.error?.code).toBe("ALREADY_PROCESSED");
    });

    it("fails a stale item with STALE_VERSION", async () => {
      const { h, m1 } = await duplicates();
      const result = h.engine.batchAccept([{ id: m1.id, version: 1 }]);
      expect(result.results[0]?.error?.code).toBe("STALE_VERSION");
    });

    it("rejects without consulting checks", async () => {
      const { h, m2 } = await duplicates();
      h.engine.runConsistencyChecks();

      const result = h.engine.batchReject([{ id: m2.id, version: m2.version }], "duplicate line");

      expect(result.succeeded).toBe(1);
      expect(h.engine.getMatch(m2.id).rejectionReason).toBe("duplicate line");
    });
  });

  describe("stats", () => {
    it("reports match rate and histogram over live matches", async () => {
      const { engine, post, ingest } = harness();
      post("bank", "sales", "1500.00", "2025-03-10", "ACME");
      ingest(
        { id: "t1", txnDate: "2025-03-10", amount: "1500.00" },
        { id: "t2", txnDate: "2025-03-10", amount: "3.00" },
      );
      await engine.run();

      const stats = engine.stats();

      expect(stats.totalTransactions).toBe(2);
      expect(stats.matchedTransactions).toBe(1);
      expect(stats.matchRate).toBe(0.5);
      expect(stats.transactionsByStatus).toEqual({ pending: 0, matched: 1, unmatched: 1 });
      expect(stats.matchesByStatus.auto_accepted).toBe(1);
      expect(stats.scoreHistogram).toHaveLength(10);
      expect(stats.scoreHistogram[9]).toEqual({ from: 90, to: 100, count: 1 });
    });

    it("is zero on an empty book", () => {
      const { engine } = harness();
      expect(engine.stats().matchRate).toBe(0);
    });
  });

  describe("draftEntryForTransaction", () => {
    it("drafts a balanced outflow entry linked to the transaction", async () => {
      const { engine, ledger, ingest } = harness();
      ingest({ id: "t9", txnDate: "2025-03-12", amount: "42.50", direction: "out", description: "Coffee shop" });
      await engine.run();

      const draft = engine.draftEntryForTransaction("t9", { counterAccountId: "rent" });

      expect(draft).toMatchObject({
        status: "draft",
        sourceType: "bank_statement",
        sourceTransactionId: "t9",
        entryDate: "2025-03-12",
        memo: "Coffee shop",
      });
      expect(draft.lines.map((l) => [l.accountId, l.direction, l.money.amount])).toEqual([
        ["rent", "debit", "42.50"],
        ["bank", "credit", "42.50"],
      ]);
      expect(ledger.validate(draft).ok).toBe(true);
    });

    it("refuses a matched transaction", async () => {
      const { engine, post, ingest } = harness();
      post("bank", "sales", "1500.00", "2025-03-10", "ACME");
      ingest({ id: "t1", txnDate: "2025-03-10", amount: "1500.00" });
      await engine.run();

      expect(() => engine.draftEntryForTransaction("t1", { counterAccountId: "sales" })).toThrow(
        AlreadyProcessedError,
      );
    });
  });

  describe("many-to-one groups", () => {
    function settlement(memo: string): { h: ReturnType<typeof harness>; entryId: string } {
      const h = harness();
      const entryId = h.post("bank", "sales", "100.00", "2025-03-10", memo);
      h.ingest(
        { id: "g1", txnDate: "2025-03-10", amount: "60.00", description: "CARD SETTLEMENT" },
        { id: "g2", txnDate: "2025-03-10", amount: "40.00", description: "CARD SETTLEMENT" },
      );
      return { h, entryId };
    }

    it("matches same-day settlement lines to one entry for their total", async () => {
      const { h, entryId } = settlement("CARD SETTLEMENT");

      const summary = await h.engine.run();

      expect(summary).toMatchObject({ processed: 2, autoAccepted: 2, unmatched: 0, errors: [] });
      const match = only(h.engine.listMatches());
      expect(match).toMatchObject({
        bankTxnId: "g1",
        groupTxnIds: ["g1", "g2"],
        journalEntryIds: [entryId],
        status: "auto_accepted",
        flags: ["many_to_one"],
        matchScore: 98,
      });
      expect(h.engine.getTransaction("g1").status).toBe("matched");
      expect(h.engine.getTransaction("g2").status).toBe("matched");
      expect(h.ledger.getEntry(entryId).status).toBe("reconciled");
      expect(only(h.engine.listMatches({ bankTxnId: "g2" })).id).toBe(match.id);
    });

    it("accepts a group review for every member", async () => {
      const { h, entryId } = settlement("Payroll");
      await h.engine.run();
      const match = only(h.engine.listPending());
      expect(match.matchScore).toBe(78);

      h.engine.accept(match.id, match.version);

      expect(h.engine.getTransaction("g1").status).toBe("matched");
      expect(h.engine.getTransaction("g2").status).toBe("matched");
      expect(h.ledger.getEntry(entryId).status).toBe("reconciled");
    });

    it("rejects a group review for every member and never proposes it again", async () => {
      const { h } = settlement("Payroll");
      await h.engine.run();
      const match = only(h.engine.listPending());

      h.engine.reject(match.id, match.version, "separate payouts");
      await h.engine.run();

      expect(h.engine.getTransaction("g1").status).not.toBe("matched");
      expect(h.engine.getTransaction("g2").status).not.toBe("matched");
      expect(h.engine.listMatches().filter((m) => m.groupTxnIds !== undefined)).toEqual([
        expect.objectContaining({ id: match.id, status: "rejected" }),
      ]);
    });

    it("processes members on their own when the group finds no entry", async () => {
      const { engine, ingest } = harness();
      ingest(
        { id: "g1", txnDate: "2025-03-10", amount: "60.00", description: "CARD SETTLEMENT" },
        { id: "g2", txnDate: "2025-03-10", amount: "40.00", description: "CARD SETTLEMENT" },
      );

      const summary = await engine.run();

      expect(summary).toMatchObject({ processed: 2, unmatched: 2 });
      expect(engine.getTransaction("g1").status).toBe("unmatched");
    });
  });

  describe("transfers", () => {
    it("lists open lines that read like transfers", () => {
      const { engine, ingest } = harness();
      ingest(
        { id: "x1", txnDate: "2025-03-10", amount: "500.00", direction: "out", description: "FAST transfer to savings" },
        { id: "x2", txnDate: "2025-03-10", amount: "12.00", direction: "out", description: "Breakfast cafe" },
        { id: "x3", txnDate: "2025-03-11", amount: "80.00", description: "ACME" },
      );

      expect(engine.listTransferCandidates().map((t) => t.id)).toEqual(["x1"]);
    });

    it("books a leg against the clearing account and matches it on the next run", async () => {
      const { engine, ledger, ingest } = harness();
      ingest({
        id: "x1",
        txnDate: "2025-03-10",
        amount: "500.00",
        direction: "out",
        description: "FAST transfer to savings",
        reference: "TRF-1",
      });

      const entry = engine.bookTransfer("x1");

      expect(entry).toMatchObject({
        status: "posted",
        sourceType: "system_adjustment",
        sourceTransactionId: "x1",
        memo: "Transfer OUT: FAST transfer to savings",
      });
      expect(entry.lines.map((l) => [l.accountId, l.direction, l.money.amount])).toEqual([
        ["clearing", "debit", "500.00"],
        ["bank", "credit", "500.00"],
      ]);
      expect(engine.getTransaction("x1").status).toBe("pending");

      await engine.run();

      // (100×40 + 100×25 + 100×20 + 85×10 + 50×5) / 100
      expect(only(engine.listMatches({ bankTxnId: "x1" }))).toMatchObject({
        status: "auto_accepted",
        matchScore: 96,
        journalEntryIds: [entry.id],
      });
      expect(ledger.getEntry(entry.id).status).toBe("reconciled");
      expect(() => engine.bookTransfer("x1")).toThrow(AlreadyProcessedError);
    });

    it("refuses an account that is not a clearing account", () => {
      const { engine, ledger, ingest } = harness();
      ingest({ id: "x1", txnDate: "2025-03-10", amount: "500.00", direction: "out", description: "Transfer" });

      expect(() => engine.bookTransfer("x1", { clearingAccountId: "sales" })).toThrow(
        expect.objectContaining({ code: "NO_CLEARING_ACCOUNT" }),
      );
      expect(ledger.listEntries()).toEqual([]);
    });

    it("pairs booked OUT and IN legs on the clearing account", () => {
      const { engine, ingest } = harness();
      ingest(
        { id: "x1", txnDate: "2025-03-10", amount: "500.00", direction: "out", description: "Transfer to savings" },
        { id: "x2", txnDate: "2025-03-11", amount: "500.00", direction: "in", description: "Transfer to savings" },
      );
      const out = engine.bookTransfer("x1");
      const inbound = engine.bookTransfer("x2");

      // (100×40 + 100×30 + 95×20) / 90 = 98.9
      expect(engine.findTransferPairs()).toEqual([
        {
          clearingAccountId: "clearing",
          outEntryId: out.id,
          inEntryId: inbound.id,
          amount: usd("500.00"),
          outDate: "2025-03-10",
          inDate: "2025-03-11",
          dateDiffDays: 1,
          confidence: 99,
          breakdown: { amount: 100, description: 100, date: 95 },
        },
      ]);
      expect(engine.findTransferPairs(100)).toEqual([]);
    });
  });

  describe("detectAnomalies", () => {
    it("flags a payee seen for the first time", () => {
      const { engine, ingest } = harness();
      ingest({ id: "n1", txnDate: "2025-03-10", amount: "75.00", description: "Northwind Traders" });

      expect(engine.detectAnomalies("n1")).toEqual([
        {
          anomalyType: "new_merchant",
          severity: "low",
          message: "Payee has no history in the last 90 days",
        },
      ]);
    });
  });
});
