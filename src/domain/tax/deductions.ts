import { requireNonNegative } from "../../shared/errors.js";
import { roundCurrency, sumCurrency } from "../../shared/money.js";
import type { DeductionPolicy } from "../rulesets/types.js";

export type ExpenseBreakdown = Record<string, Record<string, number>>;

export interface CategoryDeduction {
  total: number;
  subcategories: Record<string, number>;
  deductiblePercent: number;
  deductibleAmount: number;
  notes: string;
  documentationNeeded: string[];
}

export type DeductionRecommendationType =
  | "meals_optimization"
  | "vehicle_method"
  | "depreciation_strategy"
  | "section_179";

export interface DeductionRecommendation {
  type: DeductionRecommendationType;
  priority: "high" | "medium";
  title: string;
  description: string;
  estimatedImpact: number;
}

export interface Section179Analysis {
  totalEquipment: number;
  eligibleAmount: number;
  maxDeduction: number;
  estimatedSavings: number;
  phaseOutApplies: boolean;
}

export interface DeductionAnalysis {
  totalExpenses: number;
  categories: Record<string, CategoryDeduction>;
  recommendations: DeductionRecommendation[];
  section179: Section179Analysis | null;
}

const MEALS_REVIEW_THRESHOLD = 5000;
const VEHICLE_REVIEW_THRESHOLD = 10000;
const EQUIPMENT_REVIEW_THRESHOLD = 2500;
const VEHICLE_METHOD_IMPROVEMENT = 0.1;

function formatDollars(value: number): string {
  return `$${Math.round(value).toLocaleString("en-US")}`;
}

export function analyzeSection179(totalEquipment: number, policy: DeductionPolicy): Section179Analysis {
  const { maxDeduction, phaseOutThreshold } = policy.section179;
  const eligibleAmount = Math.min(totalEquipment, maxDeduction);

  return {
    totalEquipment,
    eligibleAmount,
    maxDeduction,
    estimatedSavings: roundCurrency(eligibleAmount * policy.assumedTaxRate),
    phaseOutApplies: totalEquipment > phaseOutThreshold
  };
}

function categoryRecommendations(
  category: string,
  total: number,
  deductiblePercent: number,
  policy: DeductionPolicy
): DeductionRecommendation[] {
  if (category === "Meals & Entertainment" && total > MEALS_REVIEW_THRESHOLD) {
    return [
      {
        type: "meals_optimization",
        priority: "medium",
        title: "Optimize Meal Deductions",
        description: `${formatDollars(total)} in meals - ensure proper documentation for the ${deductiblePercent}% deduction`,
        estimatedImpact: roundCurrency(((total * deductiblePercent) / 100) * policy.assumedTaxRate)
      }
    ];
  }

  if (category === "Vehicle Expenses" && total > VEHICLE_REVIEW_THRESHOLD) {
    return [
      {
        type: "vehicle_method",
        priority: "medium",
        title: "Compare Vehicle Deduction Methods",
        description: "Compare the actual expense method with the standard mileage rate",
        estimatedImpact: roundCurrency(total * VEHICLE_METHOD_IMPROVEMENT)
      }
    ];
  }

  if (category === "Equipment" && total > EQUIPMENT_REVIEW_THRESHOLD) {
    return [
      {
        type: "depreciation_strategy",
        priority: "high",
        title: "Equipment Depreciation Strategy",
        description: `${formatDollars(total)} in equipment - consider Section 179 vs. bonus depreciation`,
        estimatedImpact: roundCurrency(total * policy.assumedTaxRate)
      }
    ];
  }

  return [];
}

export function optimizeDeductions(expenses: ExpenseBreakdown, policy: DeductionPolicy): DeductionAnalysis {
  const categories: Record<string, CategoryDeduction> = {};
  const recommendations: DeductionRecommendation[] = [];

  for (const [category, subcategories] of Object.entries(expenses)) {
    for (const [subcategory, amount] of Object.entries(subcategories)) {
      requireNonNegative(amount, `${category}.${subcategory}`);
    }

    const total = sumCurrency(Object.values(subcategories));
    const rule = policy.categories.find((item) => item.category === category);
    const deductiblePercent = rule?.deductiblePercent ?? policy.defaultDeductiblePercent;

    categories[category] = {
      total,
      subcategories: { ...subcategories },
      deductiblePercent,
      deductibleAmount: roundCurrency((total * deductiblePercent) / 100),
      notes: rule?.notes ?? policy.defaultNotes,
      documentationNeeded: [...(rule?.documentation ?? policy.defaultDocumentation)]
    };

    recommendations.push(...categoryRecommendations(category, total, deductiblePercent, policy));
  }

  const equipment = categories["Equipment"];
  const section179 = equipment ? analyzeSection179(equipment.total, policy) : null;
  if (section179 && section179.eligibleAmount > 0) {
    recommendations.push({
      type: "section_179",
      priority: "high",
      title: "Section 179 Deduction Opportunity",
      description: `Consider a Section 179 deduction for ${formatDollars(section179.eligibleAmount)} in equipment purchases`,
      estimatedImpact: section179.estimatedSavings
    });
  }

  return {
    totalExpenses: sumCurrency(Object.values(categories).map((item) => item.total)),
    categories,
    recommendations,
    section179
  };
}
