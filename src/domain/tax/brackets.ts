import { EngineError, invalidInput } from "../../shared/errors.js";
import type { EngineErrorKind } from "../../shared/errors.js";
import { roundCurrency } from "../../shared/money.js";
import type { BracketDefinition } from "../rulesets/schemas.js";
import type { Bracket, FilingStatusCode, RateTable } from "../rulesets/types.js";

export interface RateTableDefinition {
  id: string;
  jurisdiction: string;
  year: number;
  filingStatus: FilingStatusCode | null;
  brackets: readonly BracketDefinition[];
}

function findBracketDefect(brackets: readonly BracketDefinition[]): string | null {
  if (brackets.length === 0) {
    return "rate table has no brackets";
  }

  const first = brackets[0];
  if (first && first.min !== 0) {
    return "first bracket must start at 0";
  }

  for (let index = 0; index < brackets.length; index += 1) {
    const bracket = brackets[index];
    if (!bracket) {
      continue;
    }

    if (!Number.isFinite(bracket.rate) || bracket.rate < 0 || bracket.rate > 1) {
      return `bracket ${index} has a rate outside [0, 1]`;
    }

    const isLast = index === brackets.length - 1;
    if (isLast) {
      if (bracket.max !== null) {
        return "last bracket must be unbounded";
      }
      continue;
    }

    if (bracket.max === null || bracket.max <= bracket.min) {
      return `bracket ${index} must have a max above its min`;
    }

    const next = brackets[index + 1];
    if (next && next.min !== bracket.max) {
      return `bracket ${index + 1} does not start where bracket ${index} ends`;
    }
  }

  return null;
}

function assertWellFormed(brackets: readonly BracketDefinition[], kind: EngineErrorKind, tableId: string): void {
  const defect = findBracketDefect(brackets);
  if (defect) {
    throw new EngineError(kind, `Malformed rate table ${tableId}: ${defect}.`, { tableId });
  }
}

/**
 * Validates a raw bracket list and precomputes each bracket's `base`, the tax
 * owed on all income below its floor. Raises `ConfigurationError` for gaps,
 * overlaps, a bounded last bracket or an out-of-range rate.
 */
export function buildRateTable(definition: RateTableDefinition): RateTable {
  assertWellFormed(definition.brackets, "ConfigurationError", definition.id);

  let base = 0;
  const brackets: Bracket[] = definition.brackets.map((bracket, index) => {
    if (index > 0) {
      const previous = definition.brackets[index - 1];
      if (previous) {
        base = roundCurrency(base + previous.rate * (bracket.min - previous.min));
      }
    }

    return Object.freeze({ min: bracket.min, max: bracket.max, rate: bracket.rate, base });
  });

  return Object.freeze({
    id: definition.id,
    jurisdiction: definition.jurisdiction,
    year: definition.year,
    filingStatus: definition.filingStatus,
    brackets: Object.freeze(brackets)
  });
}

function assertIncome(income: number): void {
  if (!Number.isFinite(income) || income < 0) {
    throw invalidInput("Taxable income must be a finite, non-negative number.", { income });
  }
}

// Boundaries belong to the upper bracket: min <= income < max.
function locateBracket(income: number, table: RateTable): Bracket {
  assertWellFormed(table.brackets, "InvalidInput", table.id);

  const located = table.brackets.find((bracket) => bracket.max === null || income < bracket.max);
  if (!located) {
    throw invalidInput(`Rate table ${table.id} does not cover ${income}.`, { tableId: table.id });
  }

  return located;
}

export function computeTax(taxableIncome: number, table: RateTable): number {
  assertIncome(taxableIncome);
  const bracket = locateBracket(taxableIncome, table);
  return roundCurrency(bracket.base + bracket.rate * (taxableIncome - bracket.min));
}

export function marginalRate(taxableIncome: number, table: RateTable): number {
  assertIncome(taxableIncome);
  return locateBracket(taxableIncome, table).rate;
}
