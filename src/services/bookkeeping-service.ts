import { classifyTransaction } from "../domain/categorization/engine.js";
import { findReviewExceptions, summarizeBatch } from "../domain/categorization/review.js";
import type { BatchSummary, ReviewExceptions } from "../domain/categorization/review.js";
import type { ClassifiedTransaction, TransactionInput, TransactionType } from "../domain/categorization/types.js";
import { isoDate, parseIsoDate, parseIsoMonth } from "../shared/dates.js";
import { invalidInput, settleItem } from "../shared/errors.js";
import type { ItemResult } from "../shared/errors.js";
import { createId } from "../shared/hash.js";
import { auditActions, writeAuditEvent } from "./audit-service.js";
import type { EngineContext } from "./context.js";
import type { RequestMeta } from "./types.js";

export interface ClassifyBatchInput {
  clientId: string;
  transactions: TransactionInput[];
}

export interface ClassifyBatchResult {
  batchId: string;
  clientId: string;
  processed: number;
  failed: number;
  items: Array<ItemResult<ClassifiedTransaction>>;
  summary: BatchSummary;
  reviewExceptions: ReviewExceptions;
}

export interface StoredTransaction extends ClassifiedTransaction {
  id: string;
  batchId: string;
}

export interface ReconcilePeriodInput {
  clientId: string;
  period: string;
}

export type ReconciliationIssueType = "duplicates" | "large_amounts" | "round_amounts";

export interface ReconciliationIssue {
  type: ReconciliationIssueType;
  count: number;
  transactionIds: string[];
}

export interface PeriodReconciliation {
  reconciliationId: string;
  clientId: string;
  period: string;
  totalTransactions: number;
  totalDebits: number;
  totalCredits: number;
  /** Net of the period's credits and debits; every period opens at zero. */
  endingBalance: number;
  issues: ReconciliationIssue[];
  status: "completed" | "needs_review";
}

interface TransactionRow {
  id: string;
  batch_id: string;
  transaction_date: string;
  description: string;
  amount: number;
  type: string;
  category: string;
  subcategory: string;
  confidence: number;
  needs_review: number;
  reference_id: string | null;
}

function classifyItem(transaction: TransactionInput, context: EngineContext): ClassifiedTransaction {
  parseIsoDate(transaction.date, "transaction.date");
  return classifyTransaction(transaction, context.classificationRules);
}

export async function classifyTransactions(
  context: EngineContext,
  input: ClassifyBatchInput,
  meta: RequestMeta = { actorType: "api" }
): Promise<ClassifyBatchResult> {
  if (input.clientId.trim().length === 0) {
    throw invalidInput("clientId is required.");
  }
  if (input.transactions.length === 0) {
    throw invalidInput("At least one transaction is required.");
  }

  const batchId = createId();
  const items = input.transactions.map((transaction) => settleItem(() => classifyItem(transaction, context)));
  const classified = items.flatMap((item) => (item.ok ? [item.value] : []));
  const createdAt = context.clock().toISOString();

  const insert = context.db.prepare(
    `INSERT INTO classified_transactions (
       id, client_id, batch_id, transaction_date, description, amount, type,
       category, subcategory, confidence, needs_review, reference_id, created_at
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  context.db.transaction(() => {
    for (const transaction of classified) {
      insert.run(
        createId(),
        input.clientId,
        batchId,
        transaction.date,
        transaction.description,
        transaction.amount,
        transaction.type,
        transaction.category,
        transaction.subcategory,
        transaction.confidence,
        transaction.needsReview ? 1 : 0,
        transaction.referenceId ?? null,
        createdAt
      );
    }
    writeAuditEvent(
      context.db,
      {
        actorType: meta.actorType,
        action: auditActions.TRANSACTIONS_CLASSIFIED,
        entityType: "classification_batch",
        entityId: batchId,
        requestId: meta.requestId ?? null,
        payload: { clientId: input.clientId, processed: classified.length }
      },
      context.clock()
    );
  })();

  const failed = items.length - classified.length;
  if (failed > 0) {
    context.logger.warn({ batchId, clientId: input.clientId, failed }, "transactions rejected during classification");
  }
  context.logger.info({ batchId, clientId: input.clientId, processed: classified.length }, "classified transaction batch");

  return {
    batchId,
    clientId: input.clientId,
    processed: classified.length,
    failed,
    items,
    summary: summarizeBatch(classified),
    reviewExceptions: findReviewExceptions(input.transactions)
  };
}

function parseType(value: string): TransactionType {
  return value === "debit" ? "debit" : "credit";
}

export function listClassifiedTransactions(
  context: EngineContext,
  clientId: string,
  options: { lowConfidenceOnly?: boolean; from?: string; to?: string } = {}
): StoredTransaction[] {
  const rows = context.db
    .prepare<[string, number, string, string], TransactionRow>(
      `SELECT * FROM classified_transactions
       WHERE client_id = ? AND needs_review >= ? AND transaction_date >= ? AND transaction_date <= ?
       ORDER BY transaction_date ASC, created_at ASC, id ASC`
    )
    .all(clientId, options.lowConfidenceOnly ? 1 : 0, options.from ?? "0000-01-01", options.to ?? "9999-12-31");

  return rows.map((row) => ({
    id: row.id,
    batchId: row.batch_id,
    date: row.transaction_date,
    description: row.description,
    amount: row.amount,
    referenceId: row.reference_id,
    type: parseType(row.type),
    category: row.category,
    subcategory: row.subcategory,
    confidence: row.confidence,
    needsReview: row.needs_review === 1
  }));
}

/**
 * Reconciles one calendar month of a client's stored transactions. Duplicates,
 * large amounts and round amounts are reported as issues; any issue leaves the
 * period in `needs_review`.
 */
export function reconcilePeriod(
  context: EngineContext,
  input: ReconcilePeriodInput,
  meta: RequestMeta = { actorType: "api" }
): PeriodReconciliation {
  const { year, month } = parseIsoMonth(input.period);
  const transactions = listClassifiedTransactions(context, input.clientId, {
    from: isoDate(year, month, 1),
    to: isoDate(year, month + 1, 0)
  });
  if (transactions.length === 0) {
    throw invalidInput(`No classified transactions for ${input.clientId} in ${input.period}.`, {
      clientId: input.clientId,
      period: input.period
    });
  }

  const summary = summarizeBatch(transactions);
  const exceptions = findReviewExceptions(transactions);
  const idsAt = (indexes: number[]) => indexes.flatMap((index) => transactions[index]?.id ?? []);
  const issues: ReconciliationIssue[] = [
    { type: "duplicates" as const, indexes: exceptions.duplicates.map((item) => item.index) },
    { type: "large_amounts" as const, indexes: exceptions.largeAmounts.map((item) => item.index) },
    { type: "round_amounts" as const, indexes: exceptions.roundAmounts.map((item) => item.index) }
  ]
    .filter((issue) => issue.indexes.length > 0)
    .map((issue) => ({ type: issue.type, count: issue.indexes.length, transactionIds: idsAt(issue.indexes) }));

  const reconciliation: PeriodReconciliation = {
    reconciliationId: createId(),
    clientId: input.clientId,
    period: input.period,
    totalTransactions: summary.totalTransactions,
    totalDebits: summary.totalDebits,
    totalCredits: summary.totalCredits,
    endingBalance: summary.netChange,
    issues,
    status: issues.length === 0 ? "completed" : "needs_review"
  };

  const createdAt = context.clock().toISOString();
  context.db.transaction(() => {
    context.db
      .prepare(
        `INSERT INTO reconciliations (
           id, client_id, period, total_transactions, total_debits, total_credits,
           ending_balance, status, issues_json, created_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        reconciliation.reconciliationId,
        reconciliation.clientId,
        reconciliation.period,
        reconciliation.totalTransactions,
        reconciliation.totalDebits,
        reconciliation.totalCredits,
        reconciliation.endingBalance,
        reconciliation.status,
        JSON.stringify(issues),
        createdAt
      );
    writeAuditEvent(
      context.db,
      {
        actorType: meta.actorType,
        action: auditActions.PERIOD_RECONCILED,
        entityType: "reconciliation",
        entityId: reconciliation.reconciliationId,
        requestId: meta.requestId ?? null,
        payload: { clientId: input.clientId, period: input.period, status: reconciliation.status }
      },
      context.clock()
    );
  })();

  const logFields = { reconciliationId: reconciliation.reconciliationId, clientId: input.clientId, period: input.period };
  if (issues.length > 0) {
    context.logger.warn({ ...logFields, issues: issues.map((issue) => issue.type) }, "period needs review");
  } else {
    context.logger.info(logFields, "reconciled period");
  }

  return reconciliation;
}
