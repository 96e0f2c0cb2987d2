import { cpSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  defaultRulesetSource,
  loadEngineRulesets,
  loadFederalRuleset,
  resolveActiveRulesetsForTaxYear,
  signRulesetPayload
} from "../src/domain/rulesets/loader.js";
import type { RulesetSource } from "../src/domain/rulesets/loader.js";
import { EngineError } from "../src/shared/errors.js";

function expectConfigurationError(run: () => unknown, message: string) {
  try {
    run();
  } catch (error) {
    expect(error).toBeInstanceOf(EngineError);
    if (error instanceof EngineError) {
      expect(error.code).toBe("ConfigurationError");
      expect(error.message).toBe(message);
    }
    return;
  }
  throw new Error("expected a configuration error");
}

function readObject(filePath: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${filePath} is not a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

describe("ruleset registry", () => {
  it("resolves the rulesets registered for a tax year", () => {
    expect(resolveActiveRulesetsForTaxYear(2025)).toEqual({ federal: "IRS-2025.1", salesTax: "SALES-2024.1" });
    expect(resolveActiveRulesetsForTaxYear(2031)).toEqual({ federal: "IRS-2024.1", salesTax: "SALES-2024.1" });
  });

  it("compiles a frozen configuration for the requested year", () => {
    const rulesets = loadEngineRulesets(2025);

    expect(rulesets.taxYear).toBe(2025);
    expect(rulesets.federal.id).toBe("IRS-2025.1");
    expect(rulesets.federal.deductions.section179.maxDeduction).toBe(1250000);
    expect(rulesets.salesTax.jurisdictions.get("CA")?.stateRate).toBe(0.0725);
    expect(Object.isFrozen(rulesets.federal.incomeTables.SINGLE.brackets)).toBe(true);
    expect(Object.isFrozen(rulesets.federal.payroll)).toBe(true);
  });

  it("fails on a version missing from meta.json", () => {
    expectConfigurationError(() => loadFederalRuleset("IRS-1999.1"), "Ruleset IRS-1999.1 (federal) is not listed in meta.json.");
  });
});

describe("ruleset signatures", () => {
  let root: string;
  let source: RulesetSource;
  let federalPath: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), "rulesets-"));
    cpSync(defaultRulesetSource().root, root, { recursive: true });
    source = { root, signingSecret: defaultRulesetSource().signingSecret };
    federalPath = path.join(root, "federal", "IRS-2024.1.json");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("rejects a file edited after signing", () => {
    const file = readObject(federalPath);
    writeFileSync(federalPath, JSON.stringify({ ...file, taxYear: 2023 }));

    expectConfigurationError(
      () => loadFederalRuleset("IRS-2024.1", source),
      "Ruleset signature mismatch for federal/IRS-2024.1.json."
    );
  });

  it("rejects files signed with another secret", () => {
    expectConfigurationError(
      () => loadFederalRuleset("IRS-2024.1", { root, signingSecret: "some-other-secret" }),
      "Ruleset signature mismatch for federal/IRS-2024.1.json."
    );
  });

  it("accepts an edited file once it is signed again", () => {
    const { rulesetSignature: _previous, ...unsigned } = readObject(federalPath);
    const standardDeduction = { SINGLE: 15000, MARRIED_FILING_JOINTLY: 30000, MARRIED_FILING_SEPARATELY: 15000, HEAD_OF_HOUSEHOLD: 22500 };
    const edited = { ...unsigned, standardDeduction };
    writeFileSync(federalPath, JSON.stringify({ ...edited, rulesetSignature: signRulesetPayload(edited, source.signingSecret) }));

    const federal = loadFederalRuleset("IRS-2024.1", source);
    expect(federal.standardDeduction.SINGLE).toBe(15000);
    expect(federal.withholding.standardDeduction.HEAD_OF_HOUSEHOLD).toBe(22500);
  });

  it("reports a signed but malformed file", () => {
    const { rulesetSignature: _previous, ...unsigned } = readObject(federalPath);
    const edited = { ...unsigned, incomeBrackets: "none" };
    writeFileSync(federalPath, JSON.stringify({ ...edited, rulesetSignature: signRulesetPayload(edited, source.signingSecret) }));

    expectConfigurationError(() => loadFederalRuleset("IRS-2024.1", source), "Federal ruleset IRS-2024.1 is malformed.");
  });
});
