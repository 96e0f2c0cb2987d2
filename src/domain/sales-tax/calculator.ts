import { EngineError, invalidInput, requireFinite } from "../../shared/errors.js";
import { roundCurrency } from "../../shared/money.js";
import type { SalesTaxConfig, SalesTaxJurisdiction } from "../rulesets/types.js";
import { deriveFiling } from "./filing.js";
import type { FilingRequirement } from "./filing.js";

export type JurisdictionLevel = "state" | "local";

export interface SaleInput {
  jurisdiction: string;
  level?: JurisdictionLevel;
  amount: number;
  taxable?: boolean;
}

export interface SalesGroup {
  jurisdiction: string;
  level: JurisdictionLevel;
  transactionCount: number;
  grossSales: number;
  taxableSales: number;
  exemptSales: number;
}

export interface JurisdictionTax extends SalesGroup {
  taxRate: number;
  taxDue: number;
  filing: FilingRequirement | null;
}

export function aggregateSales(sales: readonly SaleInput[]): SalesGroup[] {
  const groups = new Map<string, SalesGroup>();

  sales.forEach((sale, index) => {
    requireFinite(sale.amount, `sales[${index}].amount`);
    const jurisdiction = sale.jurisdiction.trim().toUpperCase();
    if (jurisdiction.length === 0) {
      throw invalidInput(`sales[${index}].jurisdiction is required.`);
    }

    const level = sale.level ?? "state";
    const key = `${jurisdiction}:${level}`;
    const group = groups.get(key) ?? {
      jurisdiction,
      level,
      transactionCount: 0,
      grossSales: 0,
      taxableSales: 0,
      exemptSales: 0
    };

    group.transactionCount += 1;
    group.grossSales = roundCurrency(group.grossSales + sale.amount);
    if (sale.taxable ?? true) {
      group.taxableSales = roundCurrency(group.taxableSales + sale.amount);
    } else {
      group.exemptSales = roundCurrency(group.exemptSales + sale.amount);
    }
    groups.set(key, group);
  });

  return [...groups.values()];
}

export function lookupJurisdiction(code: string, config: SalesTaxConfig): SalesTaxJurisdiction {
  const jurisdiction = config.jurisdictions.get(code.trim().toUpperCase());
  if (!jurisdiction) {
    throw new EngineError("UnsupportedJurisdiction", `Jurisdiction ${code} is not in sales-tax ruleset ${config.id}.`, {
      jurisdiction: code
    });
  }
  return jurisdiction;
}

// State-level sales use the state rate; local sales use the combined average.
export function taxRateFor(jurisdiction: SalesTaxJurisdiction, level: JurisdictionLevel): number {
  return level === "state" ? jurisdiction.stateRate : jurisdiction.combinedAverageRate;
}

export function computeJurisdictionTax(group: SalesGroup, period: string, config: SalesTaxConfig): JurisdictionTax {
  const jurisdiction = lookupJurisdiction(group.jurisdiction, config);
  const taxRate = taxRateFor(jurisdiction, group.level);
  const taxDue = roundCurrency(group.taxableSales * taxRate);

  return {
    ...group,
    taxRate,
    taxDue,
    filing: deriveFiling(taxDue, period, jurisdiction.filing)
  };
}
