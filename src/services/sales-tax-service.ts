import { aggregateSales, computeJurisdictionTax, lookupJurisdiction } from "../domain/sales-tax/calculator.js";
import type { JurisdictionTax, SaleInput, SalesGroup } from "../domain/sales-tax/calculator.js";
import { deriveFiling } from "../domain/sales-tax/filing.js";
import type { FilingRequirement } from "../domain/sales-tax/filing.js";
import { NexusThresholdTracker, buildNexusAnalysis } from "../domain/sales-tax/nexus.js";
import type { NexusAlert, NexusAnalysis } from "../domain/sales-tax/nexus.js";
import { parseIsoMonth } from "../shared/dates.js";
import { invalidInput, settleItem, settleItemAsync } from "../shared/errors.js";
import type { ErrorPayload, ItemResult } from "../shared/errors.js";
import { createId } from "../shared/hash.js";
import { roundCurrency, sumCurrency } from "../shared/money.js";
import { auditActions, writeAuditEvent } from "./audit-service.js";
import type { EngineContext } from "./context.js";
import type { RequestMeta } from "./types.js";

export interface SalesTaxInput {
  clientId: string;
  /** `YYYY-MM` */
  period: string;
  sales: SaleInput[];
}

export interface SalesTaxResult {
  calculationBatchId: string;
  clientId: string;
  period: string;
  rulesetId: string;
  totalTransactions: number;
  totalTaxDue: number;
  jurisdictions: Array<ItemResult<JurisdictionTax>>;
  nexusAlerts: NexusAlert[];
  nexusFailures: Array<{ jurisdiction: string; error: ErrorPayload }>;
}

interface JurisdictionActivity {
  jurisdiction: string;
  salesAmount: number;
  transactionCount: number;
}

// Nexus thresholds count a jurisdiction's sales across levels.
function activityByJurisdiction(groups: readonly JurisdictionTax[]): JurisdictionActivity[] {
  const activity = new Map<string, JurisdictionActivity>();
  for (const group of groups) {
    const current = activity.get(group.jurisdiction) ?? { jurisdiction: group.jurisdiction, salesAmount: 0, transactionCount: 0 };
    current.salesAmount = roundCurrency(current.salesAmount + group.grossSales);
    current.transactionCount += group.transactionCount;
    activity.set(group.jurisdiction, current);
  }
  return [...activity.values()];
}

function persistGroups(context: EngineContext, batchId: string, input: SalesTaxInput, groups: readonly JurisdictionTax[]): void {
  const insert = context.db.prepare(
    `INSERT INTO sales_tax_calculations (
       id, client_id, period, jurisdiction, level, gross_sales, taxable_sales, exempt_sales, tax_rate, tax_due, created_at
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const createdAt = context.clock().toISOString();

  context.db.transaction(() => {
    for (const group of groups) {
      insert.run(
        createId(),
        input.clientId,
        input.period,
        group.jurisdiction,
        group.level,
        group.grossSales,
        group.taxableSales,
        group.exemptSales,
        group.taxRate,
        group.taxDue,
        createdAt
      );
    }
  })();
}

/**
 * Taxes a period's sales per jurisdiction and level, then adds each
 * jurisdiction's sales to the client's nexus totals. A jurisdiction that fails
 * (unknown code, bad amount) is reported in place and does not stop the rest.
 */
export async function calculateSalesTax(
  context: EngineContext,
  input: SalesTaxInput,
  meta: RequestMeta = { actorType: "api" }
): Promise<SalesTaxResult> {
  if (input.clientId.trim().length === 0) {
    throw invalidInput("clientId is required.");
  }
  if (input.sales.length === 0) {
    throw invalidInput("At least one sale is required.");
  }

  const { year } = parseIsoMonth(input.period);
  const { salesTax } = context.rulesetsFor(year);
  const groups: SalesGroup[] = aggregateSales(input.sales);

  const jurisdictions = groups.map((group) => settleItem(() => computeJurisdictionTax(group, input.period, salesTax)));
  const computed = jurisdictions.flatMap((item) => (item.ok ? [item.value] : []));

  const calculationBatchId = createId();
  persistGroups(context, calculationBatchId, input, computed);

  const tracker = new NexusThresholdTracker(context.nexusStore, salesTax, () => context.clock());
  const nexusAlerts: NexusAlert[] = [];
  const nexusFailures: SalesTaxResult["nexusFailures"] = [];

  for (const activity of activityByJurisdiction(computed)) {
    const outcome = await settleItemAsync(() =>
      tracker.recordSales({
        clientId: input.clientId,
        jurisdiction: activity.jurisdiction,
        salesAmount: activity.salesAmount,
        transactionCount: activity.transactionCount
      })
    );

    if (!outcome.ok) {
      nexusFailures.push({ jurisdiction: activity.jurisdiction, error: outcome.error });
      continue;
    }

    const { alert, statusChanged } = outcome.value;
    if (!alert) {
      continue;
    }

    nexusAlerts.push(alert);
    context.logger.warn({ clientId: input.clientId, jurisdiction: alert.jurisdiction, status: alert.status }, alert.message);
    if (statusChanged) {
      writeAuditEvent(
        context.db,
        {
          actorType: meta.actorType,
          action: auditActions.NEXUS_THRESHOLD_CROSSED,
          entityType: "nexus_record",
          entityId: `${input.clientId}:${alert.jurisdiction}`,
          requestId: meta.requestId ?? null,
          payload: { status: alert.status, thresholdType: alert.thresholdType, currentAmount: alert.currentAmount }
        },
        context.clock()
      );
    }
  }

  writeAuditEvent(
    context.db,
    {
      actorType: meta.actorType,
      action: auditActions.SALES_TAX_CALCULATED,
      entityType: "sales_tax_batch",
      entityId: calculationBatchId,
      requestId: meta.requestId ?? null,
      payload: { clientId: input.clientId, period: input.period, jurisdictions: computed.length }
    },
    context.clock()
  );

  const failed = jurisdictions.length - computed.length;
  if (failed > 0) {
    context.logger.warn({ calculationBatchId, failed }, "sales-tax jurisdictions rejected");
  }
  context.logger.info(
    { calculationBatchId, clientId: input.clientId, period: input.period, jurisdictions: computed.length },
    "sales tax calculated"
  );

  return {
    calculationBatchId,
    clientId: input.clientId,
    period: input.period,
    rulesetId: salesTax.id,
    totalTransactions: input.sales.length,
    totalTaxDue: sumCurrency(computed.map((group) => group.taxDue)),
    jurisdictions,
    nexusAlerts,
    nexusFailures
  };
}

export interface FilingRequest {
  jurisdiction: string;
  taxDue: number;
  period: string;
}

export function deriveFilingRequirement(context: EngineContext, request: FilingRequest): FilingRequirement | null {
  const { year } = parseIsoMonth(request.period);
  const jurisdiction = lookupJurisdiction(request.jurisdiction, context.rulesetsFor(year).salesTax);
  return deriveFiling(request.taxDue, request.period, jurisdiction.filing);
}

export async function analyzeNexus(context: EngineContext, clientId: string): Promise<NexusAnalysis> {
  const records = await context.nexusStore.listByClient(clientId);
  const ordered = [...records].sort((left, right) => right.cumulativeSales - left.cumulativeSales);
  return buildNexusAnalysis(clientId, ordered);
}
