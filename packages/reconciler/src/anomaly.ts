/**
 * Anomaly detection
 *
 * Flags a bank line that stands out against the other lines already
 * ingested. The population is passed in, so the checks stay pure.
 *
 * - large_amount     more than N× the recent same-direction average
 * - frequency_spike  too many same-day lines for one payee
 * - new_merchant     payee not seen in the recent past
 * - weekend_large    weekend line well above the recent average
 */

import { applyRate, parseAmount, scaleDecimal } from "@tallybook/ledger";
import type { BankTransaction } from "@tallybook/types";
import { addDays, isWeekend } from "./dates.js";
import { payeeKey, tokenize } from "./text-similarity.js";
import type { Anomaly, AnomalyConfig } from "./types.js";

interface Average {
  readonly total: bigint;
  readonly count: bigint;
}

function scaled(txn: BankTransaction, decimals: number): bigint {
  return txn.money.decimals === decimals
    ? parseAmount(txn.money.amount, decimals)
    : scaleDecimal(txn.money.amount, decimals);
}

/**
 * Other lines in the same currency and direction dated within the
 * lookback window up to and including the line's own date.
 */
function recentAverage(
  txn: BankTransaction,
  population: readonly BankTransaction[],
  config: AnomalyConfig,
): Average {
  const from = addDays(txn.txnDate, -config.lookbackDays);
  let total = 0n;
  let count = 0n;
  for (const other of population) {
    if (other.id === txn.id) continue;
    if (other.direction !== txn.direction || other.money.currency !== txn.money.currency) continue;
    if (other.txnDate < from || other.txnDate > txn.txnDate) continue;
    total += scaled(other, txn.money.decimals);
    count += 1n;
  }
  return { total, count };
}

/** amount > average × multiple, without dividing. */
function exceeds(amount: bigint, average: Average, multiple: string): boolean {
  if (average.count === 0n || average.total === 0n) return false;
  return amount * average.count > applyRate(average.total, multiple);
}

/** `population` is every ingested line, this one included. */
export function detectAnomalies(
  txn: BankTransaction,
  population: readonly BankTransaction[],
  config: AnomalyConfig,
): Anomaly[] {
  const anomalies: Anomaly[] = [];
  const amount = scaled(txn, txn.money.decimals);
  const average = recentAverage(txn, population, config);

  if (exceeds(amount, average, config.largeAmountMultiple)) {
    anomalies.push({
      anomalyType: "large_amount",
      severity: "high",
      message: `Amount is more than ${config.largeAmountMultiple}x the ${String(config.lookbackDays)}-day average for this direction`,
    });
  }

  const payee = payeeKey(txn.description);
  if (payee !== "") {
    const samePayee = population.filter((t) => tokenize(t.description).includes(payee));

    const sameDay = samePayee.filter((t) => t.txnDate === txn.txnDate).length;
    if (sameDay > config.spikeCount) {
      anomalies.push({
        anomalyType: "frequency_spike",
        severity: "medium",
        message: `More than ${String(config.spikeCount)} transactions for this payee on one day`,
      });
    }

    const since = addDays(txn.txnDate, -config.newMerchantDays);
    const recent = samePayee.filter((t) => t.txnDate >= since && t.txnDate <= txn.txnDate).length;
    if (recent <= 1) {
      anomalies.push({
        anomalyType: "new_merchant",
        severity: "low",
        message: `Payee has no history in the last ${String(config.newMerchantDays)} days`,
      });
    }
  }

  if (isWeekend(txn.txnDate) && exceeds(amount, average, config.weekendMultiple)) {
    anomalies.push({
      anomalyType: "weekend_large",
      severity: "medium",
      message: "Large weekend transaction compared to the recent average",
    });
  }

  return anomalies;
}
