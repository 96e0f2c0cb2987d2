import { roundCurrency } from "../../shared/money.js";
import type { PlanningPolicy } from "../rulesets/types.js";
import type { QuarterlyEstimate, TaxCalculationResult, TaxPlan, TaxRecommendation } from "./types.js";

export function buildQuarterlyEstimates(
  taxYear: number,
  annualTax: number,
  policy: PlanningPolicy,
  priorYearTax?: number | null
): QuarterlyEstimate {
  const quarterlyAmount = roundCurrency(annualTax / 4);
  const safeHarborBase = priorYearTax ?? annualTax;

  return {
    quarterlyAmount,
    annualTotal: annualTax,
    safeHarborAmount: roundCurrency(safeHarborBase * policy.safeHarborMultiplier),
    payments: [
      { quarter: 1, dueDate: `${taxYear}-04-15`, amount: quarterlyAmount },
      { quarter: 2, dueDate: `${taxYear}-06-15`, amount: quarterlyAmount },
      { quarter: 3, dueDate: `${taxYear}-09-15`, amount: quarterlyAmount },
      { quarter: 4, dueDate: `${taxYear + 1}-01-15`, amount: quarterlyAmount }
    ]
  };
}

export function buildRecommendations(result: TaxCalculationResult, policy: PlanningPolicy): TaxRecommendation[] {
  const recommendations: TaxRecommendation[] = [];

  if (result.effectiveRate > policy.highEffectiveRateThreshold) {
    recommendations.push({
      type: "tax_reduction",
      priority: "high",
      title: "High Tax Rate - Consider Tax Strategies",
      description: `Effective tax rate is above ${Math.round(policy.highEffectiveRateThreshold * 100)}%. Consider retirement contributions, equipment purchases, or entity restructuring.`,
      estimatedSavings: roundCurrency(result.totalTax * policy.taxReductionSavingsRatio)
    });
  }

  if (result.entityType === "sole_proprietorship" && result.grossIncome > policy.entityElectionIncomeThreshold) {
    recommendations.push({
      type: "entity_election",
      priority: "medium",
      title: "Consider S-Corp Election",
      description: "At this income level an S-Corp election could reduce self-employment taxes.",
      estimatedSavings: roundCurrency((result.selfEmploymentTax ?? 0) * policy.entityElectionSavingsRatio)
    });
  }

  if (result.taxableIncome > policy.retirementIncomeThreshold) {
    const contribution = Math.min(
      policy.retirementContributionCap,
      result.taxableIncome * policy.retirementContributionRatio
    );
    recommendations.push({
      type: "retirement_planning",
      priority: "medium",
      title: "Maximize Retirement Contributions",
      description: "Consider SEP-IRA or Solo 401(k) contributions to reduce taxable income.",
      estimatedSavings: roundCurrency(contribution * result.marginalRate)
    });
  }

  return recommendations;
}

export function buildTaxPlan(
  taxYear: number,
  result: TaxCalculationResult,
  policy: PlanningPolicy,
  priorYearTax?: number | null
): TaxPlan {
  return {
    quarterlyEstimates: buildQuarterlyEstimates(taxYear, result.totalTax, policy, priorYearTax),
    recommendations: buildRecommendations(result, policy)
  };
}
