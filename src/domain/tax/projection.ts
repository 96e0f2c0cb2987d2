import { invalidInput } from "../../shared/errors.js";
import { daysBetween, isoDate, parseIsoDate } from "../../shared/dates.js";
import { roundCurrency } from "../../shared/money.js";
import type { FinancialProjection } from "./types.js";

export interface CategorizedAmount {
  date: string;
  amount: number;
  category: string;
}

export type TransactionProjectionMethod = "ytd_annualized" | "prior_year";

function totalsByCategory(transactions: readonly CategorizedAmount[], from: string, to: string): Map<string, number> {
  const totals = new Map<string, number>();
  for (const transaction of transactions) {
    if (transaction.date < from || transaction.date > to) {
      continue;
    }
    totals.set(transaction.category, (totals.get(transaction.category) ?? 0) + transaction.amount);
  }
  return totals;
}

/**
 * Splits category totals into income (positive) and expenses (negative) and
 * scales them by `factor`.
 */
function summarize(totals: Map<string, number>, factor: number, method: TransactionProjectionMethod): FinancialProjection {
  let grossIncome = 0;
  let totalExpenses = 0;
  for (const total of totals.values()) {
    if (total > 0) {
      grossIncome += total * factor;
    } else {
      totalExpenses += Math.abs(total * factor);
    }
  }

  return {
    grossIncome: roundCurrency(grossIncome),
    totalExpenses: roundCurrency(totalExpenses),
    netIncome: roundCurrency(grossIncome - totalExpenses),
    projectionMethod: method
  };
}

export function projectFinancials(
  transactions: readonly CategorizedAmount[],
  taxYear: number,
  method: TransactionProjectionMethod,
  asOf: string
): FinancialProjection {
  if (method === "prior_year") {
    const priorYear = taxYear - 1;
    return summarize(totalsByCategory(transactions, isoDate(priorYear, 1, 1), isoDate(priorYear, 12, 31)), 1, method);
  }

  if (method !== "ytd_annualized") {
    throw invalidInput(`Unsupported projection method ${String(method)}.`);
  }

  const yearStart = isoDate(taxYear, 1, 1);
  const daysElapsed = daysBetween(parseIsoDate(yearStart), parseIsoDate(asOf, "asOf"));
  const factor = daysElapsed > 0 ? 365 / daysElapsed : 1;

  return summarize(totalsByCategory(transactions, yearStart, asOf), factor, method);
}
