import { describe, expect, it } from "vitest";

import {
  checkPayrollCompliance,
  computeEmployerTaxes,
  computePayrollLine,
  determineDepositRequirement,
  parsePayPeriod
} from "../src/domain/payroll/payroll.js";
import type { EmployeePayInput } from "../src/domain/payroll/payroll.js";
import { computeFica, computeWithholding, parseFilingStatus } from "../src/domain/payroll/withholding.js";
import { loadFederalRuleset } from "../src/domain/rulesets/loader.js";
import { EngineError } from "../src/shared/errors.js";

const federal = loadFederalRuleset("IRS-2024.1");

function hourly(overrides: Partial<EmployeePayInput> = {}): EmployeePayInput {
  return {
    employeeId: "emp-1",
    payBasis: "hourly",
    hoursWorked: 80,
    overtimeHours: 5,
    rateOrSalary: 25,
    filingStatus: "SINGLE",
    allowances: 0,
    additionalWithholding: 0,
    ...overrides
  };
}

describe("withholding composer", () => {
  it("withholds the annual bracket tax after the standard deduction", () => {
    const annual = computeWithholding(
      { annualizedGross: 56875, filingStatus: "SINGLE", allowances: 0, additionalFlatAmount: 0 },
      federal.withholding
    );
    expect(annual).toBe(4841);
  });

  it("reduces the base by allowances and adds the flat amount after lookup", () => {
    const annual = computeWithholding(
      { annualizedGross: 56875, filingStatus: "single", allowances: 1, additionalFlatAmount: 260 },
      federal.withholding
    );
    // 56875 - 4300 - 14600 = 37975 -> 1160 + 0.12 * 26375 = 4325, plus 260
    expect(annual).toBe(4585);
  });

  it("floors the taxable base at zero", () => {
    const annual = computeWithholding(
      { annualizedGross: 10000, filingStatus: "SINGLE", allowances: 2, additionalFlatAmount: 0 },
      federal.withholding
    );
    expect(annual).toBe(0);
  });

  it("rejects unknown filing statuses", () => {
    expect(() => parseFilingStatus("WIDOWER")).toThrow(EngineError);
    expect(parseFilingStatus(" head_of_household ")).toBe("HEAD_OF_HOUSEHOLD");
  });

  it("prorates the Social Security wage base and applies Additional Medicare on annualized pay", () => {
    expect(computeFica(2187.5, 26, federal.fica)).toEqual({
      socialSecurity: 135.63,
      medicare: 31.72,
      additionalMedicare: 0
    });
    expect(computeFica(10000, 52, federal.fica)).toEqual({
      socialSecurity: 201.02,
      medicare: 145,
      additionalMedicare: 90
    });
  });
});

describe("payroll line", () => {
  it("composes an hourly biweekly paycheck", () => {
    const line = computePayrollLine(hourly(), 26, federal);

    expect(line).toEqual({
      employeeId: "emp-1",
      hoursWorked: 80,
      overtimeHours: 5,
      grossPay: 2187.5,
      federalWithholding: 186.19,
      stateWithholding: 109.38,
      socialSecurity: 135.63,
      medicare: 31.72,
      additionalMedicare: 0,
      otherDeductions: 0,
      totalTaxes: 462.92,
      netPay: 1724.58,
      flags: []
    });
  });

  it("divides an annual salary across pay periods", () => {
    const line = computePayrollLine(
      hourly({ payBasis: "salary", rateOrSalary: 52000, hoursWorked: 0, overtimeHours: 0 }),
      26,
      federal
    );
    expect(line.grossPay).toBe(2000);
    expect(line.federalWithholding).toBe(163.69);
  });

  it("spreads additional withholding across the year's paychecks", () => {
    // (4841 + 260) / 26
    const line = computePayrollLine(hourly({ additionalWithholding: 260 }), 26, federal);
    expect(line.federalWithholding).toBe(196.19);
    expect(line.totalTaxes).toBe(472.92);
    expect(line.netPay).toBe(1714.58);
  });

  it("fails when deductions push net pay below zero", () => {
    expect(() => computePayrollLine(hourly({ otherDeductions: 5000 }), 26, federal)).toThrow(
      "Net pay for emp-1 would be negative."
    );
  });

  it("caps FUTA and SUTA at the year-to-date wage base", () => {
    const line = computePayrollLine(hourly(), 26, federal);

    expect(computeEmployerTaxes(line, 0, federal)).toEqual({
      socialSecurity: 135.63,
      medicare: 31.72,
      futa: 13.13,
      suta: 59.06,
      total: 239.54
    });

    const capped = computeEmployerTaxes(line, 6000, federal);
    expect(capped.futa).toBe(6);
    expect(capped.suta).toBe(27);
    expect(computeEmployerTaxes(line, 9000, federal).futa).toBe(0);
  });
});

describe("pay period and deposits", () => {
  it("sets the pay date three days after the period ends", () => {
    expect(parsePayPeriod("2024-03-04 to 2024-03-17", federal.payroll)).toEqual({
      start: "2024-03-04",
      end: "2024-03-17",
      payDate: "2024-03-20"
    });
  });

  it("rejects malformed and inverted periods", () => {
    expect(() => parsePayPeriod("2024-03-04/2024-03-17", federal.payroll)).toThrow(EngineError);
    expect(() => parsePayPeriod("2024-03-17 to 2024-03-04", federal.payroll)).toThrow("Pay period ends before it starts.");
  });

  it("deposits monthly on the 15th of the following month", () => {
    expect(determineDepositRequirement(462.92, "2024-03-20", federal.payroll)).toEqual({
      totalAmount: 462.92,
      depositSchedule: "monthly",
      depositDate: "2024-04-15"
    });
    expect(determineDepositRequirement(100, "2024-12-06", federal.payroll).depositDate).toBe("2025-01-15");
  });

  it("moves semi-weekly deposits to the following Wednesday or Friday", () => {
    expect(determineDepositRequirement(60000, "2024-03-20", federal.payroll).depositDate).toBe("2024-03-27");
    expect(determineDepositRequirement(60000, "2024-03-23", federal.payroll).depositDate).toBe("2024-03-29");
    expect(determineDepositRequirement(60000, "2024-03-19", federal.payroll).depositDate).toBe("2024-03-22");
  });

  it("skips the weekend for next-business-day deposits", () => {
    const requirement = determineDepositRequirement(150000, "2024-03-22", federal.payroll);
    expect(requirement.depositSchedule).toBe("next_business_day");
    expect(requirement.depositDate).toBe("2024-03-25");
  });
});

describe("payroll compliance", () => {
  it("raises alerts for sub-minimum pay and unrecorded overtime", () => {
    const underpaid = computePayrollLine(
      hourly({ employeeId: "emp-2", hoursWorked: 40, overtimeHours: 0, rateOrSalary: 5 }),
      26,
      federal
    );
    const noOvertime = computePayrollLine(hourly({ employeeId: "emp-3", hoursWorked: 45, overtimeHours: 0 }), 26, federal);

    expect(underpaid.flags).toEqual(["BELOW_MINIMUM_WAGE"]);
    expect(noOvertime.flags).toEqual(["OVERTIME_NOT_RECORDED"]);

    const alerts = checkPayrollCompliance([underpaid, noOvertime]);
    expect(alerts.map((alert) => [alert.type, alert.severity, alert.employeeId])).toEqual([
      ["minimum_wage_violation", "high", "emp-2"],
      ["overtime_compliance", "medium", "emp-3"]
    ]);
    expect(alerts[0]?.message).toBe("Effective rate $5.00 below minimum wage");
    expect(alerts[1]?.message).toBe("Employee worked 45 hours with no overtime recorded");
  });
});
