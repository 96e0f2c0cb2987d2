import { roundCurrency, sumCurrency } from "../../shared/money.js";
import type { ClassifiedTransaction, TransactionInput } from "./types.js";

export const LARGE_AMOUNT_THRESHOLD = 10000;
export const ROUND_AMOUNT_MINIMUM = 100;
const DUPLICATE_DESCRIPTION_PREFIX = 50;

export interface CategoryTotal {
  count: number;
  total: number;
}

export interface BatchSummary {
  totalTransactions: number;
  totalDebits: number;
  totalCredits: number;
  netChange: number;
  lowConfidenceCount: number;
  categories: Record<string, CategoryTotal>;
}

export interface FlaggedTransaction {
  index: number;
  referenceId: string | null;
  date: string;
  amount: number;
  description: string;
}

export interface DuplicateTransaction extends FlaggedTransaction {
  originalIndex: number;
}

export interface ReviewExceptions {
  duplicates: DuplicateTransaction[];
  largeAmounts: FlaggedTransaction[];
  roundAmounts: FlaggedTransaction[];
}

export function summarizeBatch(transactions: readonly ClassifiedTransaction[]): BatchSummary {
  const categories: Record<string, CategoryTotal> = {};

  for (const transaction of transactions) {
    const entry = categories[transaction.category] ?? { count: 0, total: 0 };
    entry.count += 1;
    entry.total = roundCurrency(entry.total + transaction.amount);
    categories[transaction.category] = entry;
  }

  // Debits are reported as a positive magnitude.
  const totalDebits = sumCurrency(transactions.filter((item) => item.amount < 0).map((item) => -item.amount));
  const totalCredits = sumCurrency(transactions.filter((item) => item.amount > 0).map((item) => item.amount));

  return {
    totalTransactions: transactions.length,
    totalDebits,
    totalCredits,
    netChange: roundCurrency(totalCredits - totalDebits),
    lowConfidenceCount: transactions.filter((item) => item.needsReview).length,
    categories
  };
}

function flag(transaction: TransactionInput, index: number): FlaggedTransaction {
  return {
    index,
    referenceId: transaction.referenceId ?? null,
    date: transaction.date,
    amount: transaction.amount,
    description: transaction.description
  };
}

export function findReviewExceptions(transactions: readonly TransactionInput[]): ReviewExceptions {
  const seen = new Map<string, number>();
  const duplicates: DuplicateTransaction[] = [];

  transactions.forEach((transaction, index) => {
    const key = [transaction.date, transaction.amount, transaction.description.slice(0, DUPLICATE_DESCRIPTION_PREFIX)].join("|");
    const originalIndex = seen.get(key);
    if (originalIndex === undefined) {
      seen.set(key, index);
      return;
    }

    duplicates.push({ ...flag(transaction, index), originalIndex });
  });

  return {
    duplicates,
    largeAmounts: transactions
      .map(flag)
      .filter((item) => Math.abs(item.amount) > LARGE_AMOUNT_THRESHOLD),
    roundAmounts: transactions
      .map(flag)
      .filter((item) => item.amount % 100 === 0 && Math.abs(item.amount) >= ROUND_AMOUNT_MINIMUM)
  };
}
