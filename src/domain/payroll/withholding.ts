import { configurationError, invalidInput, requireNonNegative } from "../../shared/errors.js";
import { roundCurrency } from "../../shared/money.js";
import { filingStatusCodes } from "../rulesets/types.js";
import type { FicaRates, FilingStatusCode, WithholdingConfig } from "../rulesets/types.js";
import { computeTax } from "../tax/brackets.js";

export interface WithholdingInput {
  annualizedGross: number;
  filingStatus: string;
  allowances: number;
  /** Annual flat amount added after the bracket lookup. */
  additionalFlatAmount: number;
}

export interface FicaBreakdown {
  socialSecurity: number;
  medicare: number;
  additionalMedicare: number;
}

export function isFilingStatus(value: string): value is FilingStatusCode {
  return filingStatusCodes.some((code) => code === value);
}

export function parseFilingStatus(value: string): FilingStatusCode {
  const normalized = value.trim().toUpperCase();
  if (!isFilingStatus(normalized)) {
    throw invalidInput(`Unknown filing status ${value}.`, { filingStatus: value });
  }
  return normalized;
}

/**
 * Annual federal income-tax withholding. Callers divide the result by the
 * number of pay periods in a year.
 */
export function computeWithholding(input: WithholdingInput, config: WithholdingConfig): number {
  requireNonNegative(input.annualizedGross, "annualizedGross");
  requireNonNegative(input.additionalFlatAmount, "additionalFlatAmount");
  if (!Number.isInteger(input.allowances) || input.allowances < 0) {
    throw invalidInput("allowances must be a non-negative integer.", { allowances: input.allowances });
  }

  const filingStatus = parseFilingStatus(input.filingStatus);
  const table = config.tables[filingStatus];
  const standardDeduction = config.standardDeduction[filingStatus];
  if (!table || standardDeduction === undefined) {
    throw configurationError(`No withholding table for ${filingStatus}.`, { filingStatus });
  }

  const taxableBase = Math.max(
    0,
    input.annualizedGross - input.allowances * config.perAllowanceAmount - standardDeduction
  );

  return roundCurrency(computeTax(taxableBase, table) + input.additionalFlatAmount);
}

/**
 * Per-period FICA on one paycheck. The Social Security wage base is prorated
 * across periods; the Additional Medicare threshold is compared against the
 * annualized gross and never prorated.
 */
export function computeFica(grossPay: number, periodsPerYear: number, fica: FicaRates): FicaBreakdown {
  requireNonNegative(grossPay, "grossPay");
  if (!Number.isInteger(periodsPerYear) || periodsPerYear <= 0) {
    throw invalidInput("periodsPerYear must be a positive integer.", { periodsPerYear });
  }

  const socialSecurityWages = Math.min(grossPay, fica.socialSecurityWageBase / periodsPerYear);
  const additionalMedicare =
    grossPay * periodsPerYear > fica.additionalMedicareThreshold ? grossPay * fica.additionalMedicareRate : 0;

  return {
    socialSecurity: roundCurrency(socialSecurityWages * fica.socialSecurityRate),
    medicare: roundCurrency(grossPay * fica.medicareRate),
    additionalMedicare: roundCurrency(additionalMedicare)
  };
}
