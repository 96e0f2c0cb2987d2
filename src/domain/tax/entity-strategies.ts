import { EngineError, invalidInput, requireNonNegative } from "../../shared/errors.js";
import { roundCurrency, roundRate, sumCurrency } from "../../shared/money.js";
import type { FederalConfig } from "../rulesets/types.js";
import { computeTax, marginalRate } from "./brackets.js";
import { computeSelfEmploymentTax } from "./self-employment.js";
import type { EntityTaxInput, EntityType, TaxCalculationResult } from "./types.js";

const entityTypeAliases: Record<string, EntityType> = {
  sole_proprietorship: "sole_proprietorship",
  single_member_llc: "sole_proprietorship",
  s_corporation: "s_corporation",
  s_corp: "s_corporation",
  c_corporation: "c_corporation",
  c_corp: "c_corporation",
  corporation: "c_corporation",
  partnership: "partnership",
  multi_member_llc: "partnership"
};

export function parseEntityType(value: string): EntityType {
  const alias = entityTypeAliases[value.trim().toLowerCase()];
  if (!alias) {
    throw new EngineError("UnsupportedEntityType", `Entity type ${value} is not supported.`, { entityType: value });
  }
  return alias;
}

type EntityTaxStrategy = (input: EntityTaxInput, state: string, federal: FederalConfig) => TaxCalculationResult;

function effectiveRate(totalTax: number, adjustedGrossIncome: number): number {
  return adjustedGrossIncome > 0 ? roundRate(totalTax / adjustedGrossIncome) : 0;
}

function stateIncomeRate(state: string, federal: FederalConfig, rate: number): number {
  return federal.entityTax.noIncomeTaxStates.includes(state) ? 0 : rate;
}

function individualTax(
  entityType: EntityType,
  input: EntityTaxInput,
  state: string,
  federal: FederalConfig
): TaxCalculationResult {
  const adjustedGrossIncome = roundCurrency(input.grossIncome - input.businessExpenses);
  const standardDeduction = federal.standardDeduction[input.filingStatus];
  const taxableIncome = roundCurrency(Math.max(0, adjustedGrossIncome - standardDeduction));
  const table = federal.incomeTables[input.filingStatus];

  const federalTax = computeTax(taxableIncome, table);
  const selfEmployment = computeSelfEmploymentTax(adjustedGrossIncome, input.filingStatus, federal.selfEmploymentTax);
  const stateTax = roundCurrency(taxableIncome * stateIncomeRate(state, federal, federal.entityTax.stateIncomeTaxRate));
  const totalTax = sumCurrency([federalTax, selfEmployment.total, stateTax]);

  return {
    entityType,
    grossIncome: input.grossIncome,
    adjustedGrossIncome,
    taxableIncome,
    federalTax,
    stateTax,
    selfEmploymentTax: selfEmployment.total,
    totalTax,
    effectiveRate: effectiveRate(totalTax, adjustedGrossIncome),
    marginalRate: marginalRate(taxableIncome, table),
    adjustments: {
      businessExpenses: input.businessExpenses,
      standardDeduction
    }
  };
}

const soleProprietorship: EntityTaxStrategy = (input, state, federal) =>
  individualTax("sole_proprietorship", input, state, federal);

// Owner salary carries payroll tax; the remaining distribution carries none.
const sCorporation: EntityTaxStrategy = (input, state, federal) => {
  const policy = federal.entityTax.sCorporation;
  const netIncome = roundCurrency(input.grossIncome - input.businessExpenses);
  const taxableIncome = Math.max(0, netIncome);
  const reasonableSalary = roundCurrency(
    Math.max(0, Math.min(netIncome * policy.reasonableSalaryRatio, policy.reasonableSalaryCeiling))
  );
  const payrollTax = roundCurrency(reasonableSalary * policy.payrollTaxRate);
  const table = federal.incomeTables[input.filingStatus];

  const federalTax = computeTax(taxableIncome, table);
  const stateTax = roundCurrency(taxableIncome * stateIncomeRate(state, federal, federal.entityTax.stateIncomeTaxRate));
  const totalTax = sumCurrency([federalTax, payrollTax, stateTax]);

  return {
    entityType: "s_corporation",
    grossIncome: input.grossIncome,
    adjustedGrossIncome: netIncome,
    taxableIncome,
    federalTax,
    stateTax,
    totalTax,
    effectiveRate: effectiveRate(totalTax, netIncome),
    marginalRate: marginalRate(taxableIncome, table),
    adjustments: {
      businessExpenses: input.businessExpenses,
      reasonableSalary,
      distribution: roundCurrency(netIncome - reasonableSalary),
      payrollTax
    }
  };
};

const cCorporation: EntityTaxStrategy = (input, state, federal) => {
  const policy = federal.entityTax;
  const netIncome = roundCurrency(input.grossIncome - input.businessExpenses);
  const taxableIncome = Math.max(0, netIncome);
  const federalTax = roundCurrency(taxableIncome * policy.corporateRate);
  const stateTax = roundCurrency(taxableIncome * stateIncomeRate(state, federal, policy.stateCorporateTaxRate));
  const totalTax = sumCurrency([federalTax, stateTax]);

  return {
    entityType: "c_corporation",
    grossIncome: input.grossIncome,
    adjustedGrossIncome: netIncome,
    taxableIncome,
    federalTax,
    stateTax,
    totalTax,
    effectiveRate: effectiveRate(totalTax, netIncome),
    marginalRate: policy.corporateRate,
    adjustments: {
      businessExpenses: input.businessExpenses
    }
  };
};

const partnership: EntityTaxStrategy = (input, state, federal) => {
  const ownershipShare = input.ownershipShare ?? 1;
  if (!Number.isFinite(ownershipShare) || ownershipShare <= 0 || ownershipShare > 1) {
    throw invalidInput("ownershipShare must be greater than 0 and at most 1.", { ownershipShare });
  }

  const share: EntityTaxInput = {
    ...input,
    grossIncome: roundCurrency(input.grossIncome * ownershipShare),
    businessExpenses: roundCurrency(input.businessExpenses * ownershipShare)
  };
  const result = individualTax("partnership", share, state, federal);

  return {
    ...result,
    adjustments: { ...result.adjustments, ownershipShare }
  };
};

const strategies: Record<EntityType, EntityTaxStrategy> = {
  sole_proprietorship: soleProprietorship,
  s_corporation: sCorporation,
  c_corporation: cCorporation,
  partnership
};

export function computeEntityTax(
  entityType: EntityType,
  input: EntityTaxInput,
  jurisdictionState: string,
  federal: FederalConfig
): TaxCalculationResult {
  requireNonNegative(input.grossIncome, "grossIncome");
  requireNonNegative(input.businessExpenses, "businessExpenses");

  return strategies[entityType](input, jurisdictionState.trim().toUpperCase(), federal);
}
