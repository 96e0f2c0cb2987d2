import { describe, expect, it } from "vitest";

import { loadFederalRuleset } from "../src/domain/rulesets/loader.js";
import { computeEntityTax, parseEntityType } from "../src/domain/tax/entity-strategies.js";
import { buildQuarterlyEstimates, buildTaxPlan } from "../src/domain/tax/planning.js";
import { computeSelfEmploymentTax } from "../src/domain/tax/self-employment.js";
import { EngineError } from "../src/shared/errors.js";

const federal = loadFederalRuleset("IRS-2024.1");

describe("entity tax strategies", () => {
  it("taxes a sole proprietor on AGI with self-employment and state tax", () => {
    const result = computeEntityTax(
      "sole_proprietorship",
      { grossIncome: 150000, businessExpenses: 30000, filingStatus: "SINGLE" },
      "ca",
      federal
    );

    expect(result).toEqual({
      entityType: "sole_proprietorship",
      grossIncome: 150000,
      adjustedGrossIncome: 120000,
      taxableIncome: 105400,
      federalTax: 18338.5,
      stateTax: 5270,
      selfEmploymentTax: 16955.46,
      totalTax: 40563.96,
      effectiveRate: 0.338,
      marginalRate: 0.24,
      adjustments: { businessExpenses: 30000, standardDeduction: 14600 }
    });
  });

  it("skips state income tax in states without one", () => {
    const result = computeEntityTax(
      "sole_proprietorship",
      { grossIncome: 60000, businessExpenses: 10000, filingStatus: "SINGLE" },
      "TX",
      federal
    );
    expect(result.stateTax).toBe(0);
    expect(result.federalTax).toBe(4016);
    expect(result.selfEmploymentTax).toBe(7064.78);
    expect(result.totalTax).toBe(11080.78);
  });

  it("splits S-corp income into a reasonable salary and a distribution", () => {
    const result = computeEntityTax(
      "s_corporation",
      { grossIncome: 150000, businessExpenses: 30000, filingStatus: "SINGLE" },
      "CA",
      federal
    );

    expect(result.adjustments).toEqual({
      businessExpenses: 30000,
      reasonableSalary: 48000,
      distribution: 72000,
      payrollTax: 7344
    });
    expect(result.federalTax).toBe(21842.5);
    expect(result.stateTax).toBe(6000);
    expect(result.totalTax).toBe(35186.5);
    expect(result.effectiveRate).toBe(0.2932);
    expect(result.selfEmploymentTax).toBeUndefined();
  });

  it("applies the flat corporate rate to C corporations", () => {
    const result = computeEntityTax(
      "c_corporation",
      { grossIncome: 150000, businessExpenses: 30000, filingStatus: "SINGLE" },
      "CA",
      federal
    );
    expect(result.federalTax).toBe(25200);
    expect(result.stateTax).toBe(7200);
    expect(result.totalTax).toBe(32400);
    expect(result.effectiveRate).toBe(0.27);
    expect(result.marginalRate).toBe(0.21);
  });

  it("taxes a partner on their ownership share", () => {
    const result = computeEntityTax(
      "partnership",
      { grossIncome: 300000, businessExpenses: 100000, filingStatus: "SINGLE", ownershipShare: 0.5 },
      "FL",
      federal
    );
    expect(result.grossIncome).toBe(150000);
    expect(result.adjustedGrossIncome).toBe(100000);
    expect(result.totalTax).toBe(27970.55);
    expect(result.adjustments.ownershipShare).toBe(0.5);

    expect(() =>
      computeEntityTax(
        "partnership",
        { grossIncome: 1, businessExpenses: 0, filingStatus: "SINGLE", ownershipShare: 1.5 },
        "FL",
        federal
      )
    ).toThrow(EngineError);
  });

  it("reports zero effective rate when there is no income", () => {
    const result = computeEntityTax(
      "sole_proprietorship",
      { grossIncome: 0, businessExpenses: 0, filingStatus: "SINGLE" },
      "CA",
      federal
    );
    expect(result.totalTax).toBe(0);
    expect(result.effectiveRate).toBe(0);
  });

  it("accepts aliases and rejects unknown entity types", () => {
    expect(parseEntityType("S_Corp")).toBe("s_corporation");
    expect(parseEntityType("single_member_llc")).toBe("sole_proprietorship");

    try {
      parseEntityType("trust");
      throw new Error("expected UnsupportedEntityType");
    } catch (error) {
      expect(error instanceof EngineError ? error.code : null).toBe("UnsupportedEntityType");
    }
  });
});

describe("self-employment tax", () => {
  it("caps Social Security at the wage base and adds Additional Medicare above the threshold", () => {
    const breakdown = computeSelfEmploymentTax(300000, "SINGLE", federal.selfEmploymentTax);
    // net earnings 277050; SS on 168600; Medicare on all; 0.9% above 200000
    expect(breakdown).toEqual({
      netEarnings: 277050,
      socialSecurity: 20906.4,
      medicare: 8034.45,
      additionalMedicare: 693.45,
      total: 29634.3
    });
  });

  it("is zero for a loss", () => {
    expect(computeSelfEmploymentTax(-500, "SINGLE", federal.selfEmploymentTax).total).toBe(0);
  });
});

describe("tax planning", () => {
  it("splits the annual tax into four estimated payments", () => {
    const estimates = buildQuarterlyEstimates(2024, 40563.96, federal.planning);
    expect(estimates.quarterlyAmount).toBe(10140.99);
    expect(estimates.safeHarborAmount).toBe(44620.36);
    expect(estimates.payments.map((payment) => payment.dueDate)).toEqual([
      "2024-04-15",
      "2024-06-15",
      "2024-09-15",
      "2025-01-15"
    ]);
  });

  it("bases the safe harbor on prior-year tax when given", () => {
    expect(buildQuarterlyEstimates(2024, 40563.96, federal.planning, 35000).safeHarborAmount).toBe(38500);
  });

  it("recommends tax reduction, an S-corp election and retirement savings", () => {
    const result = computeEntityTax(
      "sole_proprietorship",
      { grossIncome: 150000, businessExpenses: 30000, filingStatus: "SINGLE" },
      "CA",
      federal
    );
    const plan = buildTaxPlan(2024, result, federal.planning);

    expect(plan.recommendations.map((item) => [item.type, item.estimatedSavings])).toEqual([
      ["tax_reduction", 4056.4],
      ["entity_election", 8477.73],
      ["retirement_planning", 6324]
    ]);
  });
});
