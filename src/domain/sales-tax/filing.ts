import { requireFinite } from "../../shared/errors.js";
import { isoDate, parseIsoMonth } from "../../shared/dates.js";
import type { FilingThresholds } from "../rulesets/types.js";

export type FilingFrequency = "monthly" | "quarterly" | "annual";

export interface FilingRequirement {
  frequency: FilingFrequency;
  dueDate: string;
}

const FILING_DUE_DAY = 20;
const ANNUAL_DUE_DAY = 31;

/**
 * Filing frequency and due date for one jurisdiction's tax due in a `YYYY-MM`
 * period, or `null` when nothing is due.
 */
export function deriveFiling(taxDue: number, period: string, rules: FilingThresholds): FilingRequirement | null {
  requireFinite(taxDue, "taxDue");
  const { year, month } = parseIsoMonth(period);

  if (taxDue <= 0) {
    return null;
  }

  if (taxDue > rules.monthlyThreshold) {
    return { frequency: "monthly", dueDate: isoDate(year, month + 1, FILING_DUE_DAY) };
  }

  if (taxDue > rules.quarterlyThreshold) {
    const quarterEnd = Math.ceil(month / 3) * 3;
    return { frequency: "quarterly", dueDate: isoDate(year, quarterEnd + 1, FILING_DUE_DAY) };
  }

  return { frequency: "annual", dueDate: isoDate(year + 1, 1, ANNUAL_DUE_DAY) };
}
