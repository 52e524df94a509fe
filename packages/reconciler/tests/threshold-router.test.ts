import { describe, it, expect } from "vitest";
import { DEFAULT_THRESHOLDS } from "../src/config.js";
import { classify, route } from "../src/threshold-router.js";
import type { ScoreResult } from "../src/types.js";
import { txn } from "./fixtures.js";

function result(score: number): ScoreResult {
  return {
    entryIds: ["e1"],
    score,
    weighted: score,
    breakdown: { amount: 0, date: 0, description: 0, businessFit: 0, history: 0 },
    flags: [],
  };
}

describe("classify", () => {
  it.each([
    [100, "auto_accept"],
    [85, "auto_accept"],
    [84, "review"],
    [60, "review"],
    [59, "unmatched"],
    [0, "unmatched"],
  ] as const)("routes %i to %s", (score, expected) => {
    expect(classify(score, DEFAULT_THRESHOLDS)).toBe(expected);
  });

  it("follows custom thresholds", () => {
    expect(classify(90, { autoAccept: 95, review: 70 })).toBe("review");
    expect(classify(69, { autoAccept: 95, review: 70 })).toBe("unmatched");
  });
});

describe("route", () => {
  const context = { thresholds: DEFAULT_THRESHOLDS, hasRejectedMatch: false };

  it("routes a missing candidate to unmatched", () => {
    expect(route(txn(), undefined, context)).toEqual({
      decision: "unmatched",
      uncapped: "unmatched",
      flags: [],
    });
  });

  it("auto-accepts a trusted high score", () => {
    expect(route(txn(), result(92), context).decision).toBe("auto_accept");
  });

  it("caps untrusted transactions at review and flags them", () => {
    const routed = route(txn({ trusted: false }), result(92), context);
    expect(routed).toEqual({ decision: "review", uncapped: "auto_accept", flags: ["low_trust"] });
  });

  it("caps transactions with a rejected match at review", () => {
    const routed = route(txn(), result(99), { ...context, hasRejectedMatch: true });
    expect(routed.decision).toBe("review");
  });

  it("never lifts a low score", () => {
    expect(route(txn({ trusted: false }), result(40), context).decision).toBe("unmatched");
  });
});
