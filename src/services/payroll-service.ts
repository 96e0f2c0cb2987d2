import {
  checkPayrollCompliance,
  computeEmployerTaxes,
  computePayrollLine,
  determineDepositRequirement,
  parsePayPeriod,
  periodsPerYear
} from "../domain/payroll/payroll.js";
import type {
  ComplianceAlert,
  DepositRequirement,
  EmployeePayInput,
  EmployerTaxes,
  PayFrequency,
  PayPeriod,
  PayrollLine
} from "../domain/payroll/payroll.js";
import { parseIsoDate } from "../shared/dates.js";
import { invalidInput, settleItem } from "../shared/errors.js";
import type { ItemResult } from "../shared/errors.js";
import { createId } from "../shared/hash.js";
import { sumCurrency } from "../shared/money.js";
import { auditActions, writeAuditEvent } from "./audit-service.js";
import type { EngineContext } from "./context.js";
import type { RequestMeta } from "./types.js";

export interface PayrollRunInput {
  clientId: string;
  payPeriod: string;
  payFrequency?: PayFrequency;
  employees: EmployeePayInput[];
}

export interface EmployeePayrollResult extends PayrollLine {
  employerTaxes: EmployerTaxes;
}

export interface PayrollTotals {
  grossPay: number;
  netPay: number;
  employeeTaxes: number;
  employerTaxes: number;
}

export interface PayrollRunResult {
  payrollRunId: string;
  clientId: string;
  payPeriod: PayPeriod;
  payFrequency: PayFrequency;
  taxYear: number;
  rulesetId: string;
  employeeCount: number;
  failed: number;
  employees: Array<ItemResult<EmployeePayrollResult>>;
  totals: PayrollTotals;
  depositRequirement: DepositRequirement;
  complianceAlerts: ComplianceAlert[];
}

// Payroll is taxed under the ruleset of the year the period ends in.
function periodTaxYear(payPeriod: string): number {
  const end = payPeriod.split(" to ")[1];
  if (end === undefined) {
    throw invalidInput("Pay period must be formatted 'YYYY-MM-DD to YYYY-MM-DD'.", { payPeriod });
  }
  return parseIsoDate(end, "payPeriod.end").getUTCFullYear();
}

export async function runPayroll(
  context: EngineContext,
  input: PayrollRunInput,
  meta: RequestMeta = { actorType: "api" }
): Promise<PayrollRunResult> {
  if (input.employees.length === 0) {
    throw invalidInput("At least one employee is required.");
  }

  const taxYear = periodTaxYear(input.payPeriod);
  const { federal } = context.rulesetsFor(taxYear);
  const payPeriod = parsePayPeriod(input.payPeriod, federal.payroll);

  const payFrequency = input.payFrequency ?? "biweekly";
  const periods = periodsPerYear(payFrequency);

  const employees = input.employees.map((employee) =>
    settleItem<EmployeePayrollResult>(() => {
      const line = computePayrollLine(employee, periods, federal);
      return { ...line, employerTaxes: computeEmployerTaxes(line, employee.ytdGrossWages ?? 0, federal) };
    })
  );
  const lines = employees.flatMap((item) => (item.ok ? [item.value] : []));

  const totals: PayrollTotals = {
    grossPay: sumCurrency(lines.map((line) => line.grossPay)),
    netPay: sumCurrency(lines.map((line) => line.netPay)),
    employeeTaxes: sumCurrency(lines.map((line) => line.totalTaxes)),
    employerTaxes: sumCurrency(lines.map((line) => line.employerTaxes.total))
  };
  const depositRequirement = determineDepositRequirement(totals.employeeTaxes, payPeriod.payDate, federal.payroll);
  const complianceAlerts = checkPayrollCompliance(lines);

  const payrollRunId = createId();
  const createdAt = context.clock().toISOString();
  const insertLine = context.db.prepare(
    `INSERT INTO payroll_lines (
       id, payroll_run_id, employee_id, hours_worked, overtime_hours, gross_pay, federal_withholding,
       state_withholding, social_security, medicare, additional_medicare, other_deductions,
       total_taxes, net_pay, flags
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );

  context.db.transaction(() => {
    context.db
      .prepare(
        `INSERT INTO payroll_runs (
           id, client_id, pay_period_start, pay_period_end, pay_date, pay_frequency,
           total_gross, total_net, total_taxes, employer_taxes, created_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        payrollRunId,
        input.clientId,
        payPeriod.start,
        payPeriod.end,
        payPeriod.payDate,
        payFrequency,
        totals.grossPay,
        totals.netPay,
        totals.employeeTaxes,
        totals.employerTaxes,
        createdAt
      );

    for (const line of lines) {
      insertLine.run(
        createId(),
        payrollRunId,
        line.employeeId,
        line.hoursWorked,
        line.overtimeHours,
        line.grossPay,
        line.federalWithholding,
        line.stateWithholding,
        line.socialSecurity,
        line.medicare,
        line.additionalMedicare,
        line.otherDeductions,
        line.totalTaxes,
        line.netPay,
        JSON.stringify(line.flags)
      );
    }

    writeAuditEvent(
      context.db,
      {
        actorType: meta.actorType,
        action: auditActions.PAYROLL_RUN_CREATED,
        entityType: "payroll_run",
        entityId: payrollRunId,
        requestId: meta.requestId ?? null,
        payload: { clientId: input.clientId, employeeCount: lines.length, totalGross: totals.grossPay }
      },
      context.clock()
    );
  })();

  const failed = employees.length - lines.length;
  if (failed > 0) {
    context.logger.warn({ payrollRunId, failed }, "employees skipped in payroll run");
  }
  if (complianceAlerts.length > 0) {
    context.logger.warn({ payrollRunId, alerts: complianceAlerts.length }, "payroll compliance alerts raised");
  }
  context.logger.info({ payrollRunId, clientId: input.clientId, employeeCount: lines.length }, "payroll run created");

  return {
    payrollRunId,
    clientId: input.clientId,
    payPeriod,
    payFrequency,
    taxYear,
    rulesetId: federal.id,
    employeeCount: lines.length,
    failed,
    employees,
    totals,
    depositRequirement,
    complianceAlerts
  };
}
