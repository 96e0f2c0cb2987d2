import { statSync } from "node:fs";
import path from "node:path";

import { classifyBatchSchema, payrollRunSchema, salesTaxCalculateSchema } from "../api/schemas.js";
import { defaultRulesetSource, loadFederalRuleset, loadRulesetMeta, loadSalesTaxRuleset } from "../domain/rulesets/loader.js";
import type { RulesetSource } from "../domain/rulesets/loader.js";
import { settleItem } from "../shared/errors.js";
import { classifyTransactions } from "../services/bookkeeping-service.js";
import type { EngineContext } from "../services/context.js";
import { runPayroll } from "../services/payroll-service.js";
import { calculateSalesTax } from "../services/sales-tax-service.js";
import type { RequestMeta } from "../services/types.js";

const workerMeta: RequestMeta = { actorType: "worker" };

// Job payloads are validated with the same schemas as the HTTP bodies.
export async function handleClassifyTransactions(context: EngineContext, data: unknown) {
  return classifyTransactions(context, classifyBatchSchema.parse(data), workerMeta);
}

export async function handleRunPayroll(context: EngineContext, data: unknown) {
  return runPayroll(context, payrollRunSchema.parse(data), workerMeta);
}

export async function handleCalculateSalesTax(context: EngineContext, data: unknown) {
  return calculateSalesTax(context, salesTaxCalculateSchema.parse(data), workerMeta);
}

export interface RulesetCheckEntry {
  id: string;
  status: string;
  modifiedAt: string | null;
  valid: boolean;
  error: string | null;
}

export interface RulesetCheckReport {
  staleCount: number;
  invalidCount: number;
  entries: RulesetCheckEntry[];
}

/** Re-verifies every registered ruleset file and reports stale or invalid versions. */
export async function handleRulesetUpdateCheck(
  context: EngineContext,
  source: RulesetSource = defaultRulesetSource()
): Promise<RulesetCheckReport> {
  const meta = loadRulesetMeta(source);

  const entries = meta.versions.map((entry): RulesetCheckEntry => {
    const absolutePath = path.resolve(source.root, entry.path);
    const stats = statSync(absolutePath, { throwIfNoEntry: false });
    const outcome = settleItem(() =>
      entry.jurisdiction === "federal" ? loadFederalRuleset(entry.id, source).id : loadSalesTaxRuleset(entry.id, source).id
    );

    return {
      id: entry.id,
      status: entry.status,
      modifiedAt: stats ? stats.mtime.toISOString() : null,
      valid: outcome.ok,
      error: outcome.ok ? null : outcome.error.message
    };
  });

  const report: RulesetCheckReport = {
    staleCount: entries.filter((entry) => entry.status === "stale").length,
    invalidCount: entries.filter((entry) => !entry.valid).length,
    entries
  };

  if (report.staleCount > 0 || report.invalidCount > 0) {
    context.logger.warn(report, "ruleset_update_check found problems");
  } else {
    context.logger.info({ checked: entries.length }, "ruleset_update_check completed");
  }

  return report;
}
