import { requireFinite } from "../../shared/errors.js";
import { roundCurrency, sumCurrency } from "../../shared/money.js";
import type { FilingStatusCode, SelfEmploymentTaxRates } from "../rulesets/types.js";
import type { SelfEmploymentTaxBreakdown } from "./types.js";

const zeroBreakdown: SelfEmploymentTaxBreakdown = {
  netEarnings: 0,
  socialSecurity: 0,
  medicare: 0,
  additionalMedicare: 0,
  total: 0
};

/**
 * Self-employment tax on net business earnings. Social Security is capped at
 * the wage base, Medicare is not, and Additional Medicare applies above the
 * filing-status threshold.
 */
export function computeSelfEmploymentTax(
  netIncome: number,
  filingStatus: FilingStatusCode,
  rates: SelfEmploymentTaxRates
): SelfEmploymentTaxBreakdown {
  requireFinite(netIncome, "netIncome");
  if (netIncome <= 0) {
    return { ...zeroBreakdown };
  }

  const netEarnings = roundCurrency(netIncome * rates.netEarningsFactor);
  const socialSecurity = roundCurrency(Math.min(netEarnings, rates.socialSecurityWageBase) * rates.socialSecurityRate);
  const medicare = roundCurrency(netEarnings * rates.medicareRate);
  const threshold = rates.additionalMedicareThreshold[filingStatus];
  const additionalMedicare = roundCurrency(Math.max(0, netEarnings - threshold) * rates.additionalMedicareRate);

  return {
    netEarnings,
    socialSecurity,
    medicare,
    additionalMedicare,
    total: sumCurrency([socialSecurity, medicare, additionalMedicare])
  };
}
