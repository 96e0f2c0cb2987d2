import { invalidInput, requireNonNegative } from "../../shared/errors.js";
import { roundCurrency } from "../../shared/money.js";
import type { SalesTaxConfig } from "../rulesets/types.js";
import { lookupJurisdiction } from "./calculator.js";

export type NexusStatus = "monitoring" | "approaching" | "exceeded";

const statusRank: Record<NexusStatus, number> = {
  monitoring: 0,
  approaching: 1,
  exceeded: 2
};

export interface NexusKey {
  clientId: string;
  jurisdiction: string;
}

export interface NexusRecord {
  clientId: string;
  jurisdiction: string;
  thresholdSalesAmount: number;
  thresholdTransactionCount: number | null;
  cumulativeSales: number;
  cumulativeTransactionCount: number;
  status: NexusStatus;
  exceededAt: string | null;
  updatedAt: string;
}

export type NexusMutator = (current: NexusRecord | null) => NexusRecord;

/**
 * Keyed nexus state. `update` must run the read-modify-write for one key
 * atomically: concurrent calls for the same key observe each other's writes.
 */
export interface NexusStore {
  get(key: NexusKey): Promise<NexusRecord | null>;
  update(key: NexusKey, mutator: NexusMutator): Promise<NexusRecord>;
  listByClient(clientId: string): Promise<NexusRecord[]>;
}

export class InMemoryNexusStore implements NexusStore {
  private readonly records = new Map<string, NexusRecord>();

  private static keyOf(key: NexusKey): string {
    return `${key.clientId}\u0000${key.jurisdiction}`;
  }

  async get(key: NexusKey): Promise<NexusRecord | null> {
    const record = this.records.get(InMemoryNexusStore.keyOf(key));
    return record ? { ...record } : null;
  }

  // No await between read and write, so the update cannot interleave.
  async update(key: NexusKey, mutator: NexusMutator): Promise<NexusRecord> {
    const storageKey = InMemoryNexusStore.keyOf(key);
    const current = this.records.get(storageKey);
    const next = mutator(current ? { ...current } : null);
    this.records.set(storageKey, { ...next });
    return { ...next };
  }

  async listByClient(clientId: string): Promise<NexusRecord[]> {
    return [...this.records.values()].filter((record) => record.clientId === clientId).map((record) => ({ ...record }));
  }
}

export interface RecordSalesInput {
  clientId: string;
  jurisdiction: string;
  salesAmount: number;
  transactionCount?: number;
}

export interface NexusAlert {
  type: "nexus_threshold_exceeded" | "nexus_threshold_warning";
  clientId: string;
  jurisdiction: string;
  status: Exclude<NexusStatus, "monitoring">;
  action: "register" | "monitor";
  thresholdType: "sales" | "transactions";
  thresholdAmount: number;
  currentAmount: number;
  message: string;
}

export interface RecordSalesResult {
  record: NexusRecord | null;
  alert: NexusAlert | null;
  /** True when this call moved the record into a later status. */
  statusChanged: boolean;
}

export interface NexusStateSummary {
  jurisdiction: string;
  cumulativeSales: number;
  thresholdAmount: number;
  thresholdPercentage: number;
  status: NexusStatus;
}

export interface NexusRecommendation {
  type: "registration_required" | "nexus_monitoring" | "compliance_system";
  priority: "high" | "medium";
  jurisdiction: string | null;
  title: string;
  description: string;
  action: string;
}

export interface NexusAnalysis {
  clientId: string;
  totalJurisdictionsMonitored: number;
  jurisdictionsWithNexus: number;
  jurisdictionsApproachingNexus: number;
  registrationRequired: NexusStateSummary[];
  monitoring: NexusStateSummary[];
  recommendations: NexusRecommendation[];
}

const MONITORING_RECOMMENDATION_PERCENT = 50;

interface Evaluation {
  status: NexusStatus;
  thresholdType: "sales" | "transactions";
}

function evaluate(record: NexusRecord, approachingRatio: number): Evaluation {
  const salesThreshold = record.thresholdSalesAmount;
  const countThreshold = record.thresholdTransactionCount;
  const countReached = (ratio: number) =>
    countThreshold !== null && record.cumulativeTransactionCount >= countThreshold * ratio;

  if (record.cumulativeSales >= salesThreshold) {
    return { status: "exceeded", thresholdType: "sales" };
  }
  if (countReached(1)) {
    return { status: "exceeded", thresholdType: "transactions" };
  }
  if (record.cumulativeSales >= salesThreshold * approachingRatio) {
    return { status: "approaching", thresholdType: "sales" };
  }
  if (countReached(approachingRatio)) {
    return { status: "approaching", thresholdType: "transactions" };
  }
  return { status: "monitoring", thresholdType: "sales" };
}

function buildAlert(record: NexusRecord, evaluation: Evaluation): NexusAlert | null {
  if (evaluation.status === "monitoring") {
    return null;
  }

  const bySales = evaluation.thresholdType === "sales";
  const thresholdAmount = bySales ? record.thresholdSalesAmount : record.thresholdTransactionCount ?? 0;
  const currentAmount = bySales ? record.cumulativeSales : record.cumulativeTransactionCount;
  const exceeded = evaluation.status === "exceeded";

  return {
    type: exceeded ? "nexus_threshold_exceeded" : "nexus_threshold_warning",
    clientId: record.clientId,
    jurisdiction: record.jurisdiction,
    status: evaluation.status,
    action: exceeded ? "register" : "monitor",
    thresholdType: evaluation.thresholdType,
    thresholdAmount,
    currentAmount,
    message: exceeded
      ? `${bySales ? "Sales" : "Transaction"} threshold exceeded in ${record.jurisdiction}`
      : `Approaching ${bySales ? "sales" : "transaction"} threshold in ${record.jurisdiction}`
  };
}

/**
 * Accumulates sales per client and jurisdiction against economic-nexus
 * thresholds. Status only moves forward and `exceeded` is terminal. Every call
 * that leaves the record at or above the approaching band returns an alert
 * for its status; `exceededAt` keeps the first crossing.
 */
export class NexusThresholdTracker {
  constructor(
    private readonly store: NexusStore,
    private readonly config: SalesTaxConfig,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async recordSales(input: RecordSalesInput): Promise<RecordSalesResult> {
    requireNonNegative(input.salesAmount, "salesAmount");
    const transactionCount = input.transactionCount ?? 0;
    if (!Number.isInteger(transactionCount) || transactionCount < 0) {
      throw invalidInput("transactionCount must be a non-negative integer.", { transactionCount });
    }
    if (input.clientId.trim().length === 0) {
      throw invalidInput("clientId is required.");
    }

    const jurisdiction = lookupJurisdiction(input.jurisdiction, this.config);
    const salesThreshold = jurisdiction.nexusSalesThreshold;
    if (salesThreshold === null) {
      return { record: null, alert: null, statusChanged: false };
    }

    let alert: NexusAlert | null = null;
    let statusChanged = false;
    const key: NexusKey = { clientId: input.clientId, jurisdiction: jurisdiction.code };

    const record = await this.store.update(key, (current) => {
      const now = this.clock().toISOString();
      const previousStatus: NexusStatus = current?.status ?? "monitoring";
      const next: NexusRecord = {
        clientId: key.clientId,
        jurisdiction: key.jurisdiction,
        thresholdSalesAmount: salesThreshold,
        thresholdTransactionCount: jurisdiction.nexusTransactionThreshold,
        cumulativeSales: roundCurrency((current?.cumulativeSales ?? 0) + input.salesAmount),
        cumulativeTransactionCount: (current?.cumulativeTransactionCount ?? 0) + transactionCount,
        status: previousStatus,
        exceededAt: current?.exceededAt ?? null,
        updatedAt: now
      };

      const evaluation = evaluate(next, this.config.approachingRatio);
      statusChanged = statusRank[evaluation.status] > statusRank[previousStatus];
      if (statusChanged) {
        next.status = evaluation.status;
      }
      if (next.status === "exceeded") {
        next.exceededAt = next.exceededAt ?? now;
      }
      alert = buildAlert(next, { status: next.status, thresholdType: evaluation.thresholdType });

      return next;
    });

    return { record, alert, statusChanged };
  }
}

function summarizeRecord(record: NexusRecord): NexusStateSummary {
  return {
    jurisdiction: record.jurisdiction,
    cumulativeSales: record.cumulativeSales,
    thresholdAmount: record.thresholdSalesAmount,
    thresholdPercentage:
      record.thresholdSalesAmount > 0 ? roundCurrency((record.cumulativeSales / record.thresholdSalesAmount) * 100) : 0,
    status: record.status
  };
}

function formatDollars(value: number): string {
  return `$${Math.round(value).toLocaleString("en-US")}`;
}

export function buildNexusAnalysis(clientId: string, records: readonly NexusRecord[]): NexusAnalysis {
  const summaries = records.map(summarizeRecord);
  const registrationRequired = summaries.filter((item) => item.status === "exceeded");
  const monitoring = summaries.filter((item) => item.status !== "exceeded");
  const recommendations: NexusRecommendation[] = [];

  for (const item of registrationRequired) {
    recommendations.push({
      type: "registration_required",
      priority: "high",
      jurisdiction: item.jurisdiction,
      title: `Sales Tax Registration Required - ${item.jurisdiction}`,
      description: `Sales of ${formatDollars(item.cumulativeSales)} exceed threshold of ${formatDollars(item.thresholdAmount)}`,
      action: "Register for sales tax collection"
    });
  }

  for (const item of monitoring) {
    if (item.thresholdPercentage > MONITORING_RECOMMENDATION_PERCENT) {
      recommendations.push({
        type: "nexus_monitoring",
        priority: "medium",
        jurisdiction: item.jurisdiction,
        title: `Monitor Sales Activity - ${item.jurisdiction}`,
        description: `Sales at ${Math.round(item.thresholdPercentage)}% of nexus threshold`,
        action: "Continue monitoring sales activity"
      });
    }
  }

  if (registrationRequired.length > 0) {
    recommendations.push({
      type: "compliance_system",
      priority: "high",
      jurisdiction: null,
      title: "Implement Sales Tax Compliance System",
      description: `Active nexus in ${registrationRequired.length} jurisdictions requires systematic compliance`,
      action: "Set up automated sales tax calculation and filing"
    });
  }

  return {
    clientId,
    totalJurisdictionsMonitored: records.length,
    jurisdictionsWithNexus: registrationRequired.length,
    jurisdictionsApproachingNexus: summaries.filter((item) => item.status === "approaching").length,
    registrationRequired,
    monitoring,
    recommendations
  };
}
