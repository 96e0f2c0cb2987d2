import { parseFilingStatus } from "../domain/payroll/withholding.js";
import { optimizeDeductions } from "../domain/tax/deductions.js";
import type { DeductionAnalysis, ExpenseBreakdown } from "../domain/tax/deductions.js";
import { computeEntityTax, parseEntityType } from "../domain/tax/entity-strategies.js";
import { buildTaxPlan } from "../domain/tax/planning.js";
import { projectFinancials } from "../domain/tax/projection.js";
import type { TransactionProjectionMethod } from "../domain/tax/projection.js";
import type { FinancialProjection, TaxCalculationResult, TaxPlan } from "../domain/tax/types.js";
import { formatIsoDate, isoDate } from "../shared/dates.js";
import { invalidInput, requireNonNegative } from "../shared/errors.js";
import { createId } from "../shared/hash.js";
import { roundCurrency } from "../shared/money.js";
import { auditActions, writeAuditEvent } from "./audit-service.js";
import { listClassifiedTransactions } from "./bookkeeping-service.js";
import type { EngineContext } from "./context.js";
import type { RequestMeta } from "./types.js";

export type ProjectionInput =
  | { method: "provided"; grossIncome: number; businessExpenses: number }
  | { method: TransactionProjectionMethod; asOf?: string };

export interface TaxLiabilityInput {
  clientId: string;
  taxYear: number;
  entityType: string;
  state: string;
  filingStatus?: string;
  ownershipShare?: number;
  priorYearTax?: number | null;
  projection: ProjectionInput;
}

export interface TaxLiabilityResult {
  calculationId: string;
  clientId: string;
  taxYear: number;
  rulesetId: string;
  projection: FinancialProjection;
  result: TaxCalculationResult;
  plan: TaxPlan;
}

export interface TaxCalculationSummary {
  id: string;
  taxYear: number;
  entityType: string;
  rulesetId: string;
  totalTax: number;
  effectiveRate: number;
  createdAt: string;
}

interface TaxCalculationRow {
  id: string;
  tax_year: number;
  entity_type: string;
  ruleset_id: string;
  total_tax: number;
  effective_rate: number;
  created_at: string;
}

function resolveProjection(context: EngineContext, input: TaxLiabilityInput): FinancialProjection {
  const { projection } = input;
  if (projection.method === "provided") {
    const grossIncome = requireNonNegative(projection.grossIncome, "projection.grossIncome");
    const totalExpenses = requireNonNegative(projection.businessExpenses, "projection.businessExpenses");
    return {
      grossIncome,
      totalExpenses,
      netIncome: roundCurrency(grossIncome - totalExpenses),
      projectionMethod: "provided"
    };
  }

  // Without an explicit date, project up to today or the end of the tax year, whichever is earlier.
  const yearEnd = isoDate(input.taxYear, 12, 31);
  const today = formatIsoDate(context.clock());
  const asOf = projection.asOf ?? (today < yearEnd ? today : yearEnd);

  const transactions = listClassifiedTransactions(context, input.clientId).map((transaction) => ({
    date: transaction.date,
    amount: transaction.amount,
    category: transaction.category
  }));
  return projectFinancials(transactions, input.taxYear, projection.method, asOf);
}

/**
 * Projects the year's figures, runs the entity strategy under the ruleset
 * active for `taxYear` and builds the quarterly plan. The calculation is
 * stored with the ruleset id that produced it.
 */
export async function calculateTaxLiability(
  context: EngineContext,
  input: TaxLiabilityInput,
  meta: RequestMeta = { actorType: "api" }
): Promise<TaxLiabilityResult> {
  if (!Number.isInteger(input.taxYear)) {
    throw invalidInput("taxYear must be an integer.", { taxYear: input.taxYear });
  }

  const entityType = parseEntityType(input.entityType);
  const filingStatus = parseFilingStatus(input.filingStatus ?? "SINGLE");
  const { federal } = context.rulesetsFor(input.taxYear);
  const projection = resolveProjection(context, input);

  const result = computeEntityTax(
    entityType,
    {
      grossIncome: projection.grossIncome,
      businessExpenses: projection.totalExpenses,
      filingStatus,
      ownershipShare: input.ownershipShare
    },
    input.state,
    federal
  );
  const plan = buildTaxPlan(input.taxYear, result, federal.planning, input.priorYearTax);

  const calculationId = createId();
  context.db.transaction(() => {
    context.db
      .prepare(
        `INSERT INTO tax_calculations (
           id, client_id, tax_year, entity_type, ruleset_id, total_tax, effective_rate, result_json, created_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        calculationId,
        input.clientId,
        input.taxYear,
        entityType,
        federal.id,
        result.totalTax,
        result.effectiveRate,
        JSON.stringify({ projection, result, plan }),
        context.clock().toISOString()
      );

    writeAuditEvent(
      context.db,
      {
        actorType: meta.actorType,
        action: auditActions.TAX_LIABILITY_CALCULATED,
        entityType: "tax_calculation",
        entityId: calculationId,
        requestId: meta.requestId ?? null,
        payload: { clientId: input.clientId, taxYear: input.taxYear, rulesetId: federal.id }
      },
      context.clock()
    );
  })();

  context.logger.info(
    { calculationId, clientId: input.clientId, taxYear: input.taxYear, entityType, rulesetId: federal.id },
    "tax liability calculated"
  );

  return {
    calculationId,
    clientId: input.clientId,
    taxYear: input.taxYear,
    rulesetId: federal.id,
    projection,
    result,
    plan
  };
}

export function listTaxCalculations(context: EngineContext, clientId: string, taxYear?: number): TaxCalculationSummary[] {
  const rows =
    taxYear === undefined
      ? context.db
          .prepare<[string], TaxCalculationRow>(
            "SELECT * FROM tax_calculations WHERE client_id = ? ORDER BY created_at DESC, id DESC"
          )
          .all(clientId)
      : context.db
          .prepare<[string, number], TaxCalculationRow>(
            "SELECT * FROM tax_calculations WHERE client_id = ? AND tax_year = ? ORDER BY created_at DESC, id DESC"
          )
          .all(clientId, taxYear);

  return rows.map((row) => ({
    id: row.id,
    taxYear: row.tax_year,
    entityType: row.entity_type,
    rulesetId: row.ruleset_id,
    totalTax: row.total_tax,
    effectiveRate: row.effective_rate,
    createdAt: row.created_at
  }));
}

export interface DeductionRequest {
  taxYear: number;
  clientId?: string;
  expenses?: ExpenseBreakdown;
}

/** Debit totals per category and subcategory from a client's classified transactions in one tax year. */
export function expensesFromTransactions(context: EngineContext, clientId: string, taxYear: number): ExpenseBreakdown {
  const expenses: ExpenseBreakdown = {};
  const transactions = listClassifiedTransactions(context, clientId, {
    from: isoDate(taxYear, 1, 1),
    to: isoDate(taxYear, 12, 31)
  });

  for (const transaction of transactions) {
    if (transaction.type !== "debit") {
      continue;
    }
    const category = expenses[transaction.category] ?? {};
    category[transaction.subcategory] = roundCurrency((category[transaction.subcategory] ?? 0) + Math.abs(transaction.amount));
    expenses[transaction.category] = category;
  }

  return expenses;
}

export function analyzeDeductions(context: EngineContext, request: DeductionRequest): DeductionAnalysis {
  const { federal } = context.rulesetsFor(request.taxYear);

  if (request.expenses) {
    return optimizeDeductions(request.expenses, federal.deductions);
  }
  if (!request.clientId) {
    throw invalidInput("Either expenses or clientId is required.");
  }

  return optimizeDeductions(expensesFromTransactions(context, request.clientId, request.taxYear), federal.deductions);
}
