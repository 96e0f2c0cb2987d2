import { readFileSync } from "node:fs";
import path from "node:path";

import { env } from "../../config/env.js";
import { configurationError } from "../../shared/errors.js";
import { hexDigestsEqual, hmacSha256 } from "../../shared/hash.js";
import { buildRateTable } from "../tax/brackets.js";
import {
  federalRulesetFileSchema,
  rulesetMetaSchema,
  salesTaxRulesetFileSchema
} from "./schemas.js";
import type { BracketDefinition, FederalRulesetFile, SalesTaxRulesetFile } from "./schemas.js";
import type {
  EngineRulesets,
  FederalConfig,
  FilingStatusCode,
  RateTable,
  RulesetMeta,
  SalesTaxConfig,
  SalesTaxJurisdiction
} from "./types.js";

export interface RulesetSource {
  root: string;
  signingSecret: string;
}

export function defaultRulesetSource(): RulesetSource {
  return {
    root: path.resolve(process.cwd(), env.RULESET_ROOT),
    signingSecret: env.RULESET_SIGNING_SECRET
  };
}

function readJsonFile(source: RulesetSource, filePath: string): unknown {
  const absolutePath = path.resolve(source.root, filePath);
  let contents: string;
  try {
    contents = readFileSync(absolutePath, "utf8");
  } catch (error) {
    throw configurationError(`Ruleset file ${filePath} could not be read.`, {
      path: absolutePath,
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  try {
    return JSON.parse(contents);
  } catch {
    throw configurationError(`Ruleset file ${filePath} is not valid JSON.`, { path: absolutePath });
  }
}

export function signRulesetPayload(payload: object, secret: string): string {
  return hmacSha256(secret, JSON.stringify(payload));
}

// Checked against the file as written, before schema parsing normalizes it.
function verifyRulesetSignature(raw: unknown, filePath: string, secret: string): void {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw configurationError(`Ruleset file ${filePath} must contain a JSON object.`);
  }

  const signature = "rulesetSignature" in raw ? raw.rulesetSignature : undefined;
  const unsignedPayload = Object.fromEntries(Object.entries(raw).filter(([key]) => key !== "rulesetSignature"));
  const expected = signRulesetPayload(unsignedPayload, secret);

  if (typeof signature !== "string" || !hexDigestsEqual(signature, expected)) {
    throw configurationError(`Ruleset signature mismatch for ${filePath}.`, {
      code: "RULESET_SIGNATURE_INVALID"
    });
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !(value instanceof Map)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function loadRulesetMeta(source: RulesetSource = defaultRulesetSource()): RulesetMeta {
  const parsed = rulesetMetaSchema.safeParse(readJsonFile(source, "meta.json"));
  if (!parsed.success) {
    throw configurationError("Ruleset meta.json is malformed.", { issues: parsed.error.flatten().fieldErrors });
  }
  return parsed.data;
}

function readVersionFile(meta: RulesetMeta, version: string, jurisdiction: "federal" | "sales-tax", source: RulesetSource) {
  const entry = meta.versions.find((item) => item.id === version && item.jurisdiction === jurisdiction);
  if (!entry) {
    throw configurationError(`Ruleset ${version} (${jurisdiction}) is not listed in meta.json.`, { version });
  }

  const raw = readJsonFile(source, entry.path);
  verifyRulesetSignature(raw, entry.path, source.signingSecret);
  return { entry, raw };
}

function buildTables(
  file: { id: string; taxYear: number },
  jurisdiction: string,
  bracketsByStatus: Record<FilingStatusCode, BracketDefinition[]>
): Record<FilingStatusCode, RateTable> {
  const build = (status: FilingStatusCode) =>
    buildRateTable({
      id: `${file.id}:${jurisdiction}:${status}`,
      jurisdiction,
      year: file.taxYear,
      filingStatus: status,
      brackets: bracketsByStatus[status]
    });

  return {
    SINGLE: build("SINGLE"),
    MARRIED_FILING_JOINTLY: build("MARRIED_FILING_JOINTLY"),
    MARRIED_FILING_SEPARATELY: build("MARRIED_FILING_SEPARATELY"),
    HEAD_OF_HOUSEHOLD: build("HEAD_OF_HOUSEHOLD")
  };
}

export function compileFederalRuleset(file: FederalRulesetFile): FederalConfig {
  return deepFreeze({
    id: file.id,
    taxYear: file.taxYear,
    standardDeduction: file.standardDeduction,
    incomeTables: buildTables(file, "federal-income", file.incomeBrackets),
    selfEmploymentTax: file.selfEmploymentTax,
    withholding: {
      perAllowanceAmount: file.withholding.perAllowanceAmount,
      standardDeduction: file.standardDeduction,
      tables: buildTables(file, "federal-withholding", file.withholding.brackets)
    },
    fica: file.fica,
    payroll: file.payroll,
    entityTax: file.entityTax,
    planning: file.planning,
    deductions: file.deductions
  });
}

export function compileSalesTaxRuleset(file: SalesTaxRulesetFile): SalesTaxConfig {
  const jurisdictions = new Map<string, SalesTaxJurisdiction>();
  for (const item of file.jurisdictions) {
    const code = item.code.toUpperCase();
    if (jurisdictions.has(code)) {
      throw configurationError(`Sales-tax ruleset ${file.id} lists ${code} twice.`, { code });
    }

    jurisdictions.set(
      code,
      deepFreeze({
        code,
        stateRate: item.stateRate,
        averageLocalRate: item.averageLocalRate,
        combinedAverageRate: item.combinedAverageRate,
        nexusSalesThreshold: item.nexusSalesThreshold,
        nexusTransactionThreshold: item.nexusTransactionThreshold,
        filing: item.filing ?? file.filing
      })
    );
  }

  return Object.freeze({
    id: file.id,
    taxYear: file.taxYear,
    approachingRatio: file.nexus.approachingRatio,
    jurisdictions
  });
}

export function loadFederalRuleset(
  version = env.DEFAULT_RULESET_FEDERAL,
  source: RulesetSource = defaultRulesetSource()
): FederalConfig {
  const { entry, raw } = readVersionFile(loadRulesetMeta(source), version, "federal", source);
  const parsed = federalRulesetFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw configurationError(`Federal ruleset ${version} is malformed.`, {
      path: entry.path,
      issues: parsed.error.flatten().fieldErrors
    });
  }

  return compileFederalRuleset(parsed.data);
}

export function loadSalesTaxRuleset(
  version = env.DEFAULT_RULESET_SALES_TAX,
  source: RulesetSource = defaultRulesetSource()
): SalesTaxConfig {
  const { entry, raw } = readVersionFile(loadRulesetMeta(source), version, "sales-tax", source);
  const parsed = salesTaxRulesetFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw configurationError(`Sales-tax ruleset ${version} is malformed.`, {
      path: entry.path,
      issues: parsed.error.flatten().fieldErrors
    });
  }

  return compileSalesTaxRuleset(parsed.data);
}

export function resolveActiveRulesetsForTaxYear(
  taxYear: number,
  source: RulesetSource = defaultRulesetSource()
): { federal: string; salesTax: string } {
  const meta = loadRulesetMeta(source);
  const taxYearEntry = meta.activeByTaxYear?.[String(taxYear)];

  return {
    federal: taxYearEntry?.federal ?? meta.active.federal,
    salesTax: taxYearEntry?.salesTax ?? meta.active.salesTax
  };
}

export function loadEngineRulesets(taxYear: number, source: RulesetSource = defaultRulesetSource()): EngineRulesets {
  const active = resolveActiveRulesetsForTaxYear(taxYear, source);

  return Object.freeze({
    taxYear,
    federal: loadFederalRuleset(active.federal, source),
    salesTax: loadSalesTaxRuleset(active.salesTax, source)
  });
}
