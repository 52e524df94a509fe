/**
 * Threshold Router
 *
 * Turns the best score for a transaction into a routing decision, then
 * caps it for transactions that cannot be trusted blindly: ones from a
 * statement that failed its balance check, and ones a reviewer has
 * already rejected a match for.
 */

import type { BankTransaction } from "@tallybook/types";
import type { MatchFlag, RouteDecision, ScoreResult, Thresholds } from "./types.js";

export interface RouteContext {
  readonly thresholds: Thresholds;
  /** A reviewer already rejected a match for this transaction. */
  readonly hasRejectedMatch: boolean;
}

export interface Route {
  readonly decision: RouteDecision;
  /** The classification before caps were applied. */
  readonly uncapped: RouteDecision;
  readonly flags: readonly MatchFlag[];
}

export function classify(score: number, thresholds: Thresholds): RouteDecision {
  if (score >= thresholds.autoAccept) return "auto_accept";
  if (score >= thresholds.review) return "review";
  return "unmatched";
}

export function route(
  txn: BankTransaction,
  best: ScoreResult | undefined,
  context: RouteContext,
): Route {
  if (best === undefined) {
    return { decision: "unmatched", uncapped: "unmatched", flags: [] };
  }

  const uncapped = classify(best.score, context.thresholds);
  const capped = uncapped === "auto_accept" && (!txn.trusted || context.hasRejectedMatch);

  const flags = [...best.flags];
  if (!txn.trusted && !flags.includes("low_trust")) flags.push("low_trust");

  return { decision: capped ? "review" : uncapped, uncapped, flags };
}
