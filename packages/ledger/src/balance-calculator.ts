/**
 * @tallybook/ledger — Balance calculation engine.
 *
 * Computes account balances, trial balances and the accounting
 * equation from posted and reconciled entries. Reversal entries are
 * posted too, so a voided posting nets to zero here.
 *
 * Rules:
 * - Balances are computed per-currency (never cross-currency)
 * - The home balance converts foreign lines at their own fx rate
 * - Normal balance rules determine sign conventions
 * - Drafts and voided drafts never count
 */

import type { Account, AccountType, JournalEntry, JournalLine, Money } from "@tallybook/types";
import type { AccountRegistry } from "./accounts.js";
import type {
  AccountBalance,
  CurrencyBalance,
  EquationLine,
  EquationReport,
  TrialBalance,
  TrialBalanceLine,
} from "./types.js";
import { LedgerError, NORMAL_BALANCE } from "./types.js";
import { convertMoney, formatAmount, parseAmount } from "./money-math.js";
import { withinDisplayTolerance } from "./reporting.js";

interface BalanceAccumulator {
  readonly accountId: string;
  readonly currency: string;
  readonly decimals: number;
  totalDebits: bigint;
  totalCredits: bigint;
}

/** Entries whose lines count toward balances. */
export function isBalanceBearing(entry: JournalEntry): boolean {
  return entry.status === "posted" || entry.status === "reconciled";
}

function balanceLines(entries: readonly JournalEntry[]): JournalLine[] {
  return entries.filter(isBalanceBearing).flatMap((e) => e.lines);
}

function buildAccumulators(lines: readonly JournalLine[]): Map<string, BalanceAccumulator> {
  const accumulators = new Map<string, BalanceAccumulator>();

  for (const line of lines) {
    const key = `${line.accountId}::${line.money.currency}`;
    let acc = accumulators.get(key);

    if (acc === undefined) {
      acc = {
        accountId: line.accountId,
        currency: line.money.currency,
        decimals: line.money.decimals,
        totalDebits: 0n,
        totalCredits: 0n,
      };
      accumulators.set(key, acc);
    }

    const amount = parseAmount(line.money.amount, line.money.decimals);
    if (line.direction === "debit") {
      acc.totalDebits += amount;
    } else {
      acc.totalCredits += amount;
    }
  }

  return accumulators;
}

function normalNet(acc: BalanceAccumulator, type: AccountType): bigint {
  return NORMAL_BALANCE[type] === "debit"
    ? acc.totalDebits - acc.totalCredits
    : acc.totalCredits - acc.totalDebits;
}

/** Scale used for a home balance when no line is in the account's currency. */
const HOME_DECIMALS_FALLBACK = 2;

/**
 * Net of every line in the account's own currency. Foreign lines go
 * through `fxRate` (account currency per unit of line currency).
 */
function homeBalance(account: Account, lines: readonly JournalLine[]): Money {
  const decimals =
    lines.find((l) => l.money.currency === account.currency)?.money.decimals ?? HOME_DECIMALS_FALLBACK;
  const debitNormal = NORMAL_BALANCE[account.type] === "debit";

  let net = 0n;
  for (const line of lines) {
    let money = line.money;
    if (money.currency !== account.currency) {
      if (line.fxRate === undefined) {
        throw new LedgerError(
          "MISSING_FX_RATE",
          `Line "${line.id}" is in ${money.currency} on account "${account.id}" and has no fx rate`,
          { accountId: account.id, lineId: line.id, currency: money.currency },
        );
      }
      money = convertMoney(money, line.fxRate, account.currency, decimals);
    }
    const scaled = parseAmount(money.amount, decimals);
    net += (line.direction === "debit") === debitNormal ? scaled : -scaled;
  }

  return { amount: formatAmount(net, decimals), currency: account.currency, decimals };
}

/**
 * Compute the balance for a single account across all currencies,
 * plus its total in the account's own currency.
 */
export function computeAccountBalance(
  accountId: string,
  entries: readonly JournalEntry[],
  accounts: AccountRegistry,
): AccountBalance {
  const account = accounts.assertExists(accountId);
  const lines = balanceLines(entries).filter((l) => l.accountId === accountId);

  const balances: CurrencyBalance[] = [];
  for (const acc of buildAccumulators(lines).values()) {
    balances.push({
      currency: acc.currency,
      decimals: acc.decimals,
      balance: formatAmount(normalNet(acc, account.type), acc.decimals),
      totalDebits: formatAmount(acc.totalDebits, acc.decimals),
      totalCredits: formatAmount(acc.totalCredits, acc.decimals),
    });
  }

  return {
    accountId,
    accountType: account.type,
    balances,
    homeBalance: homeBalance(account, lines),
  };
}

/**
 * Compute the trial balance.
 *
 * Each account+currency nets into the debit column or the credit
 * column, whatever its normal side.
 */
export function computeTrialBalance(
  entries: readonly JournalEntry[],
  accounts: AccountRegistry,
  timestamp: string,
): TrialBalance {
  const lines: TrialBalanceLine[] = [];
  const currencyTotals = new Map<string, { debits: bigint; credits: bigint }>();

  for (const acc of buildAccumulators(balanceLines(entries)).values()) {
    const accountType = accounts.getType(acc.accountId);
    const netDebit = acc.totalDebits - acc.totalCredits;
    const debitBalance = netDebit > 0n ? netDebit : 0n;
    const creditBalance = netDebit < 0n ? -netDebit : 0n;

    lines.push({
      accountId: acc.accountId,
      accountType,
      currency: acc.currency,
      decimals: acc.decimals,
      debitBalance: formatAmount(debitBalance, acc.decimals),
      creditBalance: formatAmount(creditBalance, acc.decimals),
    });

    const totals = currencyTotals.get(acc.currency) ?? { debits: 0n, credits: 0n };
    totals.debits += debitBalance;
    totals.credits += creditBalance;
    currencyTotals.set(acc.currency, totals);
  }

  const balanced = [...currencyTotals.values()].every((t) => t.debits === t.credits);
  return { lines, generatedAt: timestamp, balanced };
}

/**
 * Check assets = liabilities + equity + income − expenses per currency.
 * `holds` is exact; `withinDisplayTolerance` is for reporting only.
 */
export function computeAccountingEquation(
  entries: readonly JournalEntry[],
  accounts: AccountRegistry,
  timestamp: string,
): EquationReport {
  const totals = new Map<string, { decimals: number; byType: Record<AccountType, bigint> }>();

  for (const acc of buildAccumulators(balanceLines(entries)).values()) {
    const type = accounts.getType(acc.accountId);
    let bucket = totals.get(acc.currency);
    if (bucket === undefined) {
      bucket = {
        decimals: acc.decimals,
        byType: { asset: 0n, liability: 0n, equity: 0n, income: 0n, expense: 0n },
      };
      totals.set(acc.currency, bucket);
    }
    bucket.byType[type] += normalNet(acc, type);
  }

  const lines: EquationLine[] = [];
  for (const [currency, { decimals, byType }] of totals) {
    const difference =
      byType.asset - (byType.liability + byType.equity + byType.income - byType.expense);
    lines.push({
      currency,
      decimals,
      assets: formatAmount(byType.asset, decimals),
      liabilities: formatAmount(byType.liability, decimals),
      equity: formatAmount(byType.equity, decimals),
      income: formatAmount(byType.income, decimals),
      expenses: formatAmount(byType.expense, decimals),
      difference: formatAmount(difference, decimals),
      holds: difference === 0n,
      withinDisplayTolerance: withinDisplayTolerance(
        { amount: formatAmount(difference, decimals), currency, decimals },
        { amount: formatAmount(0n, decimals), currency, decimals },
      ),
    });
  }

  lines.sort((a, b) => a.currency.localeCompare(b.currency));
  return { lines, holds: lines.every((l) => l.holds), generatedAt: timestamp };
}
