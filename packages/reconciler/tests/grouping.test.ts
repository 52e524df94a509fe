/**
 * Many-to-one grouping tests
 */
import { describe, it, expect } from "vitest";
import { DEFAULT_BATCH_KEYWORDS, DEFAULT_RECONCILER_CONFIG as config } from "../src/config.js";
import {
  buildManyToOneGroups,
  groupFingerprint,
  groupTransaction,
  isBatchDescription,
  scoreGroup,
} from "../src/grouping.js";
import { candidate, txn, usd } from "./fixtures.js";

describe("isBatchDescription", () => {
  it("finds a keyword inside the normalised text", () => {
    expect(isBatchDescription("VISA Settlements #0312", DEFAULT_BATCH_KEYWORDS)).toBe(true);
    expect(isBatchDescription("Payroll BULK", DEFAULT_BATCH_KEYWORDS)).toBe(true);
  });

  it("ignores lines without a keyword or text", () => {
    expect(isBatchDescription("Coffee shop", DEFAULT_BATCH_KEYWORDS)).toBe(false);
    expect(isBatchDescription("--", DEFAULT_BATCH_KEYWORDS)).toBe(false);
  });
});

describe("buildManyToOneGroups", () => {
  it("groups same-day batch lines by account, direction and description", () => {
    const lines = [
      txn({ id: "g2", money: usd("40.00"), description: "Card settlement" }),
      txn({ id: "g1", money: usd("60.00"), description: "CARD SETTLEMENT" }),
      txn({ id: "g3", txnDate: "2025-03-11", description: "Card settlement" }),
      txn({ id: "g4", direction: "out", description: "Card settlement" }),
      txn({ id: "c1", description: "Coffee" }),
      txn({ id: "c2", description: "Coffee" }),
    ];

    const groups = buildManyToOneGroups(lines, DEFAULT_BATCH_KEYWORDS);

    expect(groups.map((g) => [g.key, g.transactions.map((t) => t.id)])).toEqual([
      ["bank|in|USD|2025-03-10|card settlement", ["g1", "g2"]],
    ]);
  });
});

describe("groupTransaction", () => {
  it("stands for the group with the summed amount", () => {
    const composite = groupTransaction({
      key: "k",
      transactions: [
        txn({ id: "g1", money: usd("60.00") }),
        txn({ id: "g2", money: usd("40.25"), trusted: false }),
      ],
    });

    expect(composite).toMatchObject({ id: "g1", money: usd("100.25"), trusted: false });
  });

  it("throws INVALID_TRANSACTION for an empty group", () => {
    expect(() => groupTransaction({ key: "k", transactions: [] })).toThrow(
      expect.objectContaining({ code: "INVALID_TRANSACTION" }),
    );
  });
});

describe("scoreGroup", () => {
  const context = { config, history: [] };

  it("adds the group bonus to the amount and flags the result", () => {
    const composite = txn({ money: usd("100.00"), description: "CARD SETTLEMENT" });

    const result = scoreGroup(composite, candidate({ amount: usd("99.60") }), context);

    // fee band 90 + 5; (95×40 + 100×25 + 0×20 + 100×10 + 50×5) / 100
    expect(result.breakdown).toEqual({ amount: 95, date: 100, description: 0, businessFit: 100, history: 50 });
    expect(result.weighted).toBe(75.5);
    expect(result.score).toBe(76);
    expect(result.flags).toEqual(["many_to_one"]);
  });

  it("caps the amount dimension at 100", () => {
    const composite = txn({ money: usd("1500.00") });
    expect(scoreGroup(composite, candidate(), context).breakdown.amount).toBe(100);
  });
});

describe("groupFingerprint", () => {
  it("ignores member order", () => {
    expect(groupFingerprint(["g2", "g1"], ["e1"])).toBe(groupFingerprint(["g1", "g2"], ["e1"]));
    expect(groupFingerprint(["g1"], ["e1"])).not.toBe(groupFingerprint(["g1", "g2"], ["e1"]));
  });
});
