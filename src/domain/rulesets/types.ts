export const filingStatusCodes = [
  "SINGLE",
  "MARRIED_FILING_JOINTLY",
  "MARRIED_FILING_SEPARATELY",
  "HEAD_OF_HOUSEHOLD"
] as const;

export type FilingStatusCode = (typeof filingStatusCodes)[number];

/**
 * One marginal-rate bracket. `max` is exclusive and `null` only on the last
 * bracket of a table. `base` is the cumulative tax owed at `min`, derived from
 * the brackets below it when the table is built.
 */
export interface Bracket {
  readonly min: number;
  readonly max: number | null;
  readonly rate: number;
  readonly base: number;
}

export interface RateTable {
  readonly id: string;
  readonly jurisdiction: string;
  readonly year: number;
  readonly filingStatus: FilingStatusCode | null;
  readonly brackets: readonly Bracket[];
}

export interface FicaRates {
  readonly socialSecurityRate: number;
  readonly socialSecurityWageBase: number;
  readonly medicareRate: number;
  readonly additionalMedicareRate: number;
  readonly additionalMedicareThreshold: number;
}

export interface SelfEmploymentTaxRates {
  readonly netEarningsFactor: number;
  readonly socialSecurityRate: number;
  readonly socialSecurityWageBase: number;
  readonly medicareRate: number;
  readonly additionalMedicareRate: number;
  readonly additionalMedicareThreshold: Readonly<Record<FilingStatusCode, number>>;
}

export interface WithholdingConfig {
  readonly perAllowanceAmount: number;
  readonly standardDeduction: Readonly<Record<FilingStatusCode, number>>;
  readonly tables: Readonly<Record<FilingStatusCode, RateTable>>;
}

export interface PayrollPolicy {
  readonly minimumWage: number;
  readonly overtimeMultiplier: number;
  readonly regularHoursThreshold: number;
  readonly stateWithholdingRate: number;
  readonly highWithholdingRatio: number;
  readonly payDateOffsetDays: number;
  readonly employer: {
    readonly futaRate: number;
    readonly futaWageBase: number;
    readonly sutaRate: number;
    readonly sutaWageBase: number;
  };
  readonly deposits: {
    readonly nextBusinessDayThreshold: number;
    readonly semiWeeklyThreshold: number;
    readonly monthlyDueDay: number;
  };
}

export interface EntityTaxPolicy {
  readonly corporateRate: number;
  readonly stateIncomeTaxRate: number;
  readonly stateCorporateTaxRate: number;
  readonly noIncomeTaxStates: readonly string[];
  readonly sCorporation: {
    readonly reasonableSalaryRatio: number;
    readonly reasonableSalaryCeiling: number;
    readonly payrollTaxRate: number;
  };
}

export interface PlanningPolicy {
  readonly safeHarborMultiplier: number;
  readonly highEffectiveRateThreshold: number;
  readonly taxReductionSavingsRatio: number;
  readonly entityElectionIncomeThreshold: number;
  readonly entityElectionSavingsRatio: number;
  readonly retirementIncomeThreshold: number;
  readonly retirementContributionRatio: number;
  readonly retirementContributionCap: number;
}

export interface DeductibilityRule {
  readonly category: string;
  readonly deductiblePercent: number;
  readonly notes: string;
  readonly documentation: readonly string[];
}

export interface DeductionPolicy {
  readonly assumedTaxRate: number;
  readonly section179: {
    readonly maxDeduction: number;
    readonly phaseOutThreshold: number;
  };
  readonly categories: readonly DeductibilityRule[];
  readonly defaultDeductiblePercent: number;
  readonly defaultNotes: string;
  readonly defaultDocumentation: readonly string[];
}

export interface FederalConfig {
  readonly id: string;
  readonly taxYear: number;
  readonly standardDeduction: Readonly<Record<FilingStatusCode, number>>;
  readonly incomeTables: Readonly<Record<FilingStatusCode, RateTable>>;
  readonly selfEmploymentTax: SelfEmploymentTaxRates;
  readonly withholding: WithholdingConfig;
  readonly fica: FicaRates;
  readonly payroll: PayrollPolicy;
  readonly entityTax: EntityTaxPolicy;
  readonly planning: PlanningPolicy;
  readonly deductions: DeductionPolicy;
}

export interface FilingThresholds {
  readonly monthlyThreshold: number;
  readonly quarterlyThreshold: number;
}

export interface SalesTaxJurisdiction {
  readonly code: string;
  readonly stateRate: number;
  readonly averageLocalRate: number;
  readonly combinedAverageRate: number;
  /** `null` when the jurisdiction has no sales-tax regime. */
  readonly nexusSalesThreshold: number | null;
  readonly nexusTransactionThreshold: number | null;
  readonly filing: FilingThresholds;
}

export interface SalesTaxConfig {
  readonly id: string;
  readonly taxYear: number;
  readonly approachingRatio: number;
  readonly jurisdictions: ReadonlyMap<string, SalesTaxJurisdiction>;
}

/**
 * The complete, frozen configuration for one calculation run. Components receive
 * it (or a slice of it) explicitly; nothing reads rate tables from module state.
 */
export interface EngineRulesets {
  readonly taxYear: number;
  readonly federal: FederalConfig;
  readonly salesTax: SalesTaxConfig;
}

export interface RulesetMetaEntry {
  id: string;
  jurisdiction: "federal" | "sales-tax";
  path: string;
  effectiveFrom: string;
  status: "validated" | "stale" | "draft";
  validatedAt: string;
}

export interface RulesetMeta {
  active: {
    federal: string;
    salesTax: string;
  };
  activeByTaxYear?: Record<string, { federal: string; salesTax: string }>;
  versions: RulesetMetaEntry[];
}
