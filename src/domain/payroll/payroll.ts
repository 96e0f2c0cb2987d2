import { invalidInput, requireNonNegative } from "../../shared/errors.js";
import { addDays, formatIsoDate, isoDate, parseIsoDate } from "../../shared/dates.js";
import { roundCurrency, roundRate, sumCurrency } from "../../shared/money.js";
import type { FederalConfig, PayrollPolicy } from "../rulesets/types.js";
import { computeFica, computeWithholding } from "./withholding.js";

export const payFrequencies = {
  weekly: 52,
  biweekly: 26,
  semimonthly: 24,
  monthly: 12
} as const;

export type PayFrequency = keyof typeof payFrequencies;
export type PayBasis = "hourly" | "salary";
export type PayrollFlag = "BELOW_MINIMUM_WAGE" | "OVERTIME_NOT_RECORDED" | "HIGH_WITHHOLDING";

export interface EmployeePayInput {
  employeeId: string;
  payBasis: PayBasis;
  hoursWorked: number;
  overtimeHours: number;
  /** Hourly rate for hourly employees, annual salary for salaried ones. */
  rateOrSalary: number;
  filingStatus: string;
  allowances: number;
  /** Annual flat amount added to the bracket withholding before it is split across periods. */
  additionalWithholding: number;
  otherDeductions?: number;
  /** Wages paid earlier in the calendar year, before this run. */
  ytdGrossWages?: number;
}

export interface PayrollLine {
  employeeId: string;
  hoursWorked: number;
  overtimeHours: number;
  grossPay: number;
  federalWithholding: number;
  stateWithholding: number;
  socialSecurity: number;
  medicare: number;
  additionalMedicare: number;
  otherDeductions: number;
  totalTaxes: number;
  netPay: number;
  flags: PayrollFlag[];
}

export interface PayPeriod {
  start: string;
  end: string;
  payDate: string;
}

export interface EmployerTaxes {
  socialSecurity: number;
  medicare: number;
  futa: number;
  suta: number;
  total: number;
}

export type DepositSchedule = "next_business_day" | "semi_weekly" | "monthly";

export interface DepositRequirement {
  totalAmount: number;
  depositSchedule: DepositSchedule;
  depositDate: string;
}

export type ComplianceAlertType = "minimum_wage_violation" | "overtime_compliance" | "high_withholding";

export interface ComplianceAlert {
  type: ComplianceAlertType;
  severity: "high" | "medium" | "low";
  employeeId: string;
  message: string;
  recommendation: string;
}

export function periodsPerYear(frequency: PayFrequency): number {
  return payFrequencies[frequency];
}

export function parsePayPeriod(value: string, policy: PayrollPolicy): PayPeriod {
  const parts = value.split(" to ");
  const [startText, endText] = parts;
  if (parts.length !== 2 || startText === undefined || endText === undefined) {
    throw invalidInput("Pay period must be formatted 'YYYY-MM-DD to YYYY-MM-DD'.", { payPeriod: value });
  }

  const start = parseIsoDate(startText, "payPeriod.start");
  const end = parseIsoDate(endText, "payPeriod.end");
  if (end.getTime() < start.getTime()) {
    throw invalidInput("Pay period ends before it starts.", { payPeriod: value });
  }

  return {
    start: formatIsoDate(start),
    end: formatIsoDate(end),
    payDate: formatIsoDate(addDays(end, policy.payDateOffsetDays))
  };
}

export function computeGrossPay(input: EmployeePayInput, periods: number, policy: PayrollPolicy): number {
  requireNonNegative(input.rateOrSalary, "rateOrSalary");

  if (input.payBasis === "salary") {
    return roundCurrency(input.rateOrSalary / periods);
  }

  requireNonNegative(input.hoursWorked, "hoursWorked");
  requireNonNegative(input.overtimeHours, "overtimeHours");
  const regularPay = input.hoursWorked * input.rateOrSalary;
  const overtimePay = input.overtimeHours * input.rateOrSalary * policy.overtimeMultiplier;
  return roundCurrency(regularPay + overtimePay);
}

function detectFlags(input: EmployeePayInput, grossPay: number, totalTaxes: number, policy: PayrollPolicy): PayrollFlag[] {
  const flags: PayrollFlag[] = [];
  const hours = input.hoursWorked + input.overtimeHours;

  if (hours > 0 && grossPay / hours < policy.minimumWage) {
    flags.push("BELOW_MINIMUM_WAGE");
  }
  if (input.hoursWorked > policy.regularHoursThreshold && input.overtimeHours === 0) {
    flags.push("OVERTIME_NOT_RECORDED");
  }
  if (grossPay > 0 && totalTaxes / grossPay > policy.highWithholdingRatio) {
    flags.push("HIGH_WITHHOLDING");
  }

  return flags;
}

/**
 * Builds one employee's line for a pay period. Fails with `InvalidInput` when
 * taxes and deductions would take net pay below zero.
 */
export function computePayrollLine(input: EmployeePayInput, periods: number, federal: FederalConfig): PayrollLine {
  const policy = federal.payroll;
  const otherDeductions = roundCurrency(requireNonNegative(input.otherDeductions ?? 0, "otherDeductions"));
  requireNonNegative(input.additionalWithholding, "additionalWithholding");

  const grossPay = computeGrossPay(input, periods, policy);
  const annualWithholding = computeWithholding(
    {
      annualizedGross: grossPay * periods,
      filingStatus: input.filingStatus,
      allowances: input.allowances,
      additionalFlatAmount: input.additionalWithholding
    },
    federal.withholding
  );

  const federalWithholding = roundCurrency(annualWithholding / periods);
  const stateWithholding = roundCurrency(grossPay * policy.stateWithholdingRate);
  const fica = computeFica(grossPay, periods, federal.fica);
  const totalTaxes = sumCurrency([
    federalWithholding,
    stateWithholding,
    fica.socialSecurity,
    fica.medicare,
    fica.additionalMedicare
  ]);
  const netPay = roundCurrency(grossPay - totalTaxes - otherDeductions);

  if (netPay < 0) {
    throw invalidInput(`Net pay for ${input.employeeId} would be negative.`, {
      employeeId: input.employeeId,
      grossPay,
      totalTaxes,
      otherDeductions
    });
  }

  return {
    employeeId: input.employeeId,
    hoursWorked: input.hoursWorked,
    overtimeHours: input.overtimeHours,
    grossPay,
    federalWithholding,
    stateWithholding,
    socialSecurity: fica.socialSecurity,
    medicare: fica.medicare,
    additionalMedicare: fica.additionalMedicare,
    otherDeductions,
    totalTaxes,
    netPay,
    flags: detectFlags(input, grossPay, totalTaxes, policy)
  };
}

function cappedWages(grossPay: number, ytdBefore: number, wageBase: number): number {
  return Math.max(0, Math.min(grossPay, wageBase - ytdBefore));
}

export function computeEmployerTaxes(line: PayrollLine, ytdGrossWages: number, federal: FederalConfig): EmployerTaxes {
  const { employer } = federal.payroll;
  const futa = roundCurrency(cappedWages(line.grossPay, ytdGrossWages, employer.futaWageBase) * employer.futaRate);
  const suta = roundCurrency(cappedWages(line.grossPay, ytdGrossWages, employer.sutaWageBase) * employer.sutaRate);

  return {
    socialSecurity: line.socialSecurity,
    medicare: line.medicare,
    futa,
    suta,
    total: sumCurrency([line.socialSecurity, line.medicare, futa, suta])
  };
}

function nextBusinessDay(date: Date): Date {
  let next = addDays(date, 1);
  while (next.getUTCDay() === 0 || next.getUTCDay() === 6) {
    next = addDays(next, 1);
  }
  return next;
}

// Wednesday to Friday paydays deposit the following Wednesday; Saturday to Tuesday the following Friday.
function semiWeeklyDepositDate(payDate: Date): Date {
  const weekday = payDate.getUTCDay();
  if (weekday >= 3 && weekday <= 5) {
    return addDays(payDate, 10 - weekday);
  }

  return addDays(payDate, (12 - weekday) % 7);
}

export function determineDepositRequirement(totalTaxes: number, payDate: string, policy: PayrollPolicy): DepositRequirement {
  const date = parseIsoDate(payDate, "payDate");
  const { deposits } = policy;

  if (totalTaxes >= deposits.nextBusinessDayThreshold) {
    return { totalAmount: totalTaxes, depositSchedule: "next_business_day", depositDate: formatIsoDate(nextBusinessDay(date)) };
  }

  if (totalTaxes >= deposits.semiWeeklyThreshold) {
    return { totalAmount: totalTaxes, depositSchedule: "semi_weekly", depositDate: formatIsoDate(semiWeeklyDepositDate(date)) };
  }

  return {
    totalAmount: totalTaxes,
    depositSchedule: "monthly",
    depositDate: isoDate(date.getUTCFullYear(), date.getUTCMonth() + 2, deposits.monthlyDueDay)
  };
}

export function checkPayrollCompliance(lines: readonly PayrollLine[]): ComplianceAlert[] {
  const alerts: ComplianceAlert[] = [];

  for (const line of lines) {
    const hours = line.hoursWorked + line.overtimeHours;
    if (line.flags.includes("BELOW_MINIMUM_WAGE")) {
      alerts.push({
        type: "minimum_wage_violation",
        severity: "high",
        employeeId: line.employeeId,
        message: `Effective rate $${(line.grossPay / hours).toFixed(2)} below minimum wage`,
        recommendation: "Review hourly rate and ensure compliance"
      });
    }
    if (line.flags.includes("OVERTIME_NOT_RECORDED")) {
      alerts.push({
        type: "overtime_compliance",
        severity: "medium",
        employeeId: line.employeeId,
        message: `Employee worked ${line.hoursWorked} hours with no overtime recorded`,
        recommendation: "Verify overtime exemption status or correct hours"
      });
    }
    if (line.flags.includes("HIGH_WITHHOLDING")) {
      alerts.push({
        type: "high_withholding",
        severity: "low",
        employeeId: line.employeeId,
        message: `High withholding rate: ${(roundRate(line.totalTaxes / line.grossPay) * 100).toFixed(1)}%`,
        recommendation: "Review withholding elections and deductions"
      });
    }
  }

  return alerts;
}
