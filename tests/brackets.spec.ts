import { describe, expect, it } from "vitest";

import { loadFederalRuleset } from "../src/domain/rulesets/loader.js";
import { buildRateTable, computeTax, marginalRate } from "../src/domain/tax/brackets.js";
import { EngineError } from "../src/shared/errors.js";

function expectEngineError(run: () => unknown, kind: string) {
  try {
    run();
  } catch (error) {
    expect(error).toBeInstanceOf(EngineError);
    if (error instanceof EngineError) {
      expect(error.code).toBe(kind);
    }
    return;
  }
  throw new Error(`expected ${kind}`);
}

describe("bracket calculator", () => {
  const federal = loadFederalRuleset("IRS-2024.1");
  const single = federal.incomeTables.SINGLE;

  it("applies each bracket's rate only to income inside it", () => {
    expect(computeTax(50000, single)).toBe(6053);
    expect(computeTax(1000000, single)).toBe(328187.75);
  });

  it("returns zero tax on zero income", () => {
    expect(computeTax(0, single)).toBe(0);
    expect(marginalRate(0, single)).toBe(0.1);
  });

  it("places a boundary value in the upper bracket", () => {
    expect(computeTax(11600, single)).toBe(1160);
    expect(marginalRate(11600, single)).toBe(0.12);
    expect(marginalRate(11599.99, single)).toBe(0.1);
  });

  it("precomputes the tax owed below each bracket floor", () => {
    expect(single.brackets.map((bracket) => bracket.base)).toEqual([0, 1160, 5426, 17168.5, 39110.5, 55678.5, 183647.25]);
  });

  it("never lowers tax as income rises and has no jump at a bracket floor", () => {
    for (const table of Object.values(federal.incomeTables)) {
      const incomes: number[] = [];
      for (let income = 0; income <= 700000; income += 250) {
        incomes.push(income);
      }
      for (const bracket of table.brackets.slice(1)) {
        incomes.push(bracket.min - 0.01, bracket.min, bracket.min + 0.01);
      }
      incomes.sort((left, right) => left - right);

      let previous = 0;
      for (const income of incomes) {
        const tax = computeTax(income, table);
        expect(tax).toBeGreaterThanOrEqual(previous);
        previous = tax;
      }

      for (const bracket of table.brackets.slice(1)) {
        expect(computeTax(bracket.min, table)).toBe(bracket.base);
        expect(computeTax(bracket.min, table) - computeTax(bracket.min - 0.01, table)).toBeLessThan(0.011);
        expect(computeTax(bracket.min + 0.01, table) - computeTax(bracket.min, table)).toBeLessThan(0.011);
      }
    }
  });

  it("rejects negative or non-finite income", () => {
    expectEngineError(() => computeTax(-1, single), "InvalidInput");
    expectEngineError(() => computeTax(Number.NaN, single), "InvalidInput");
  });

  it("raises a configuration error for gaps and bounded last brackets", () => {
    expectEngineError(
      () =>
        buildRateTable({
          id: "gap",
          jurisdiction: "federal",
          year: 2024,
          filingStatus: "SINGLE",
          brackets: [
            { min: 0, max: 1000, rate: 0.1 },
            { min: 1500, max: null, rate: 0.2 }
          ]
        }),
      "ConfigurationError"
    );

    expectEngineError(
      () =>
        buildRateTable({
          id: "bounded",
          jurisdiction: "federal",
          year: 2024,
          filingStatus: null,
          brackets: [{ min: 0, max: 1000, rate: 0.1 }]
        }),
      "ConfigurationError"
    );
  });

  it("treats a hand-built malformed table as invalid input at lookup", () => {
    const malformed = {
      id: "broken",
      jurisdiction: "federal",
      year: 2024,
      filingStatus: null,
      brackets: [{ min: 100, max: null, rate: 0.1, base: 0 }]
    };
    expectEngineError(() => computeTax(50, malformed), "InvalidInput");
  });
});
