import type { FilingStatusCode } from "../rulesets/types.js";

export const entityTypes = ["sole_proprietorship", "s_corporation", "c_corporation", "partnership"] as const;

export type EntityType = (typeof entityTypes)[number];

export type ProjectionMethod = "ytd_annualized" | "prior_year" | "provided";

export interface FinancialProjection {
  grossIncome: number;
  totalExpenses: number;
  netIncome: number;
  projectionMethod: ProjectionMethod;
}

export interface EntityTaxInput {
  grossIncome: number;
  businessExpenses: number;
  filingStatus: FilingStatusCode;
  /** Partner's distributive share in (0, 1]; partnerships only. */
  ownershipShare?: number;
}

export interface TaxAdjustments {
  businessExpenses: number;
  standardDeduction?: number;
  reasonableSalary?: number;
  distribution?: number;
  payrollTax?: number;
  ownershipShare?: number;
}

export interface SelfEmploymentTaxBreakdown {
  netEarnings: number;
  socialSecurity: number;
  medicare: number;
  additionalMedicare: number;
  total: number;
}

export interface TaxCalculationResult {
  entityType: EntityType;
  grossIncome: number;
  adjustedGrossIncome: number;
  taxableIncome: number;
  federalTax: number;
  stateTax: number;
  selfEmploymentTax?: number;
  totalTax: number;
  effectiveRate: number;
  marginalRate: number;
  adjustments: TaxAdjustments;
}

export interface QuarterlyEstimate {
  quarterlyAmount: number;
  annualTotal: number;
  safeHarborAmount: number;
  payments: Array<{ quarter: 1 | 2 | 3 | 4; dueDate: string; amount: number }>;
}

export type RecommendationType = "tax_reduction" | "entity_election" | "retirement_planning";

export interface TaxRecommendation {
  type: RecommendationType;
  priority: "high" | "medium" | "low";
  title: string;
  description: string;
  estimatedSavings: number;
}

export interface TaxPlan {
  quarterlyEstimates: QuarterlyEstimate;
  recommendations: TaxRecommendation[];
}
