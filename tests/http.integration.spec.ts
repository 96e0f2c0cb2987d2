import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildApp } from "../src/app.js";
import { InMemoryNexusStore } from "../src/domain/sales-tax/nexus.js";
import { openDatabase } from "../src/infrastructure/database.js";
import type { SqliteDatabase } from "../src/infrastructure/database.js";
import { createEngineContext } from "../src/services/context.js";

type App = Awaited<ReturnType<typeof buildApp>>;

const clock = () => new Date("2024-05-31T12:00:00.000Z");

describe("http integration", () => {
  let app: App;
  let db: SqliteDatabase;

  beforeEach(async () => {
    db = openDatabase(":memory:");
    app = await buildApp({ context: createEngineContext({ db, nexusStore: new InMemoryNexusStore(), clock }) });
  });

  afterEach(async () => {
    await app.close();
    db.close();
  });

  const classifyPayload = {
    clientId: "client-1",
    transactions: [
      { date: "2024-03-01", description: "SHELL OIL #1234", amount: -45.2 },
      { date: "2024-03-02", description: "CLIENT DEPOSIT", amount: 1200 }
    ]
  };

  it("serves health and the active rulesets", async () => {
    const health = await app.inject({ method: "GET", url: "/v1/health" });
    expect(health.json()).toEqual({ ok: true, version: "v1" });

    const rulesets = await app.inject({ method: "GET", url: "/v1/rulesets/active?year=2025" });
    expect(rulesets.statusCode).toBe(200);
    expect(rulesets.json()).toEqual({
      taxYear: 2025,
      federal: { id: "IRS-2025.1", taxYear: 2025 },
      salesTax: { id: "SALES-2024.1", taxYear: 2024 }
    });

    const missing = await app.inject({ method: "GET", url: "/v1/clients?page=2" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toMatchObject({ errorKind: "NotFound", message: "Route GET /v1/clients not found." });
  });

  it("classifies a batch once and replays it for the same key", async () => {
    const first = await app.inject({
      method: "POST",
      url: "/v1/bookkeeping/classify",
      headers: { "idempotency-key": "classify-batch-001" },
      payload: classifyPayload
    });
    expect(first.statusCode).toBe(200);
    const body = first.json();
    expect(body.items.map((item: { ok: boolean; value: { category: string } }) => item.value.category)).toEqual([
      "Vehicle Expenses",
      "Income"
    ]);
    expect(body.summary.netChange).toBe(1154.8);

    const replay = await app.inject({
      method: "POST",
      url: "/v1/bookkeeping/classify",
      headers: { "idempotency-key": "classify-batch-001" },
      payload: classifyPayload
    });
    expect(replay.statusCode).toBe(200);
    expect(replay.headers["idempotent-replay"]).toBe("true");
    expect(replay.json().batchId).toBe(body.batchId);

    const listed = await app.inject({ method: "GET", url: "/v1/bookkeeping/transactions?clientId=client-1" });
    expect(listed.json().total).toBe(2);

    const review = await app.inject({
      method: "GET",
      url: "/v1/bookkeeping/transactions?clientId=client-1&lowConfidence=true"
    });
    expect(review.json().items.map((item: { description: string }) => item.description)).toEqual(["CLIENT DEPOSIT"]);
  });

  it("rejects a reused key with a different payload and a missing key", async () => {
    await app.inject({
      method: "POST",
      url: "/v1/bookkeeping/classify",
      headers: { "idempotency-key": "classify-batch-002" },
      payload: classifyPayload
    });

    const conflict = await app.inject({
      method: "POST",
      url: "/v1/bookkeeping/classify",
      headers: { "idempotency-key": "classify-batch-002" },
      payload: { ...classifyPayload, clientId: "client-2" }
    });
    expect(conflict.statusCode).toBe(409);
    expect(conflict.json().errorKind).toBe("IdempotencyConflict");

    const missing = await app.inject({ method: "POST", url: "/v1/bookkeeping/classify", payload: classifyPayload });
    expect(missing.statusCode).toBe(400);
    expect(missing.json().errorKind).toBe("IdempotencyKeyRequired");
  });

  it("reconciles a classified month and marks round amounts for review", async () => {
    await app.inject({
      method: "POST",
      url: "/v1/bookkeeping/classify",
      headers: { "idempotency-key": "classify-batch-004" },
      payload: classifyPayload
    });

    const response = await app.inject({
      method: "POST",
      url: "/v1/bookkeeping/reconcile",
      headers: { "idempotency-key": "reconcile-2024-03" },
      payload: { clientId: "client-1", period: "2024-03" }
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      totalTransactions: 2,
      totalDebits: 45.2,
      totalCredits: 1200,
      endingBalance: 1154.8,
      status: "needs_review"
    });
    expect(response.json().issues.map((issue: { type: string; count: number }) => [issue.type, issue.count])).toEqual([
      ["round_amounts", 1]
    ]);

    const empty = await app.inject({
      method: "POST",
      url: "/v1/bookkeeping/reconcile",
      headers: { "idempotency-key": "reconcile-2024-04" },
      payload: { clientId: "client-1", period: "2024-04" }
    });
    expect(empty.statusCode).toBe(400);
    expect(empty.json().errorKind).toBe("InvalidInput");
  });

  it("reports request validation failures as InvalidInput", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/v1/bookkeeping/classify",
      headers: { "idempotency-key": "classify-batch-003" },
      payload: { clientId: "client-1", transactions: [] }
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().errorKind).toBe("InvalidInput");
  });

  it("runs payroll and reports rejected employees in place", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/v1/payroll/runs",
      headers: { "idempotency-key": "payroll-run-001" },
      payload: {
        clientId: "client-1",
        payPeriod: "2024-03-04 to 2024-03-17",
        employees: [
          { employeeId: "emp-1", payBasis: "hourly", hoursWorked: 80, overtimeHours: 5, rateOrSalary: 25 },
          { employeeId: "emp-2", payBasis: "hourly", hoursWorked: 80, rateOrSalary: 25, filingStatus: "WIDOWER" }
        ]
      }
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.rulesetId).toBe("IRS-2024.1");
    expect(body.failed).toBe(1);
    expect(body.employees[0].value.netPay).toBe(1724.58);
    expect(body.employees[1].ok).toBe(false);
    expect(body.employees[1].error.errorKind).toBe("InvalidInput");
    expect(body.totals.employeeTaxes).toBe(462.92);
    expect(body.depositRequirement).toEqual({ totalAmount: 462.92, depositSchedule: "monthly", depositDate: "2024-04-15" });
  });

  it("calculates and lists tax liability", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/v1/tax/liability",
      headers: { "idempotency-key": "tax-liability-001" },
      payload: {
        clientId: "client-1",
        taxYear: 2024,
        entityType: "sole_proprietorship",
        state: "CA",
        projection: { method: "provided", grossIncome: 150000, businessExpenses: 30000 }
      }
    });
    expect(response.statusCode).toBe(200);
    expect(response.json().result.totalTax).toBe(40563.96);
    expect(response.json().plan.quarterlyEstimates.quarterlyAmount).toBe(10140.99);

    const listed = await app.inject({ method: "GET", url: "/v1/tax/calculations?clientId=client-1&year=2024" });
    expect(listed.json().items).toEqual([
      {
        id: response.json().calculationId,
        taxYear: 2024,
        entityType: "sole_proprietorship",
        rulesetId: "IRS-2024.1",
        totalTax: 40563.96,
        effectiveRate: 0.338,
        createdAt: "2024-05-31T12:00:00.000Z"
      }
    ]);
  });

  it("answers an unsupported entity type with 422", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/v1/tax/liability",
      headers: { "idempotency-key": "tax-liability-002" },
      payload: {
        clientId: "client-1",
        taxYear: 2024,
        entityType: "trust",
        state: "CA",
        projection: { method: "provided", grossIncome: 1000, businessExpenses: 0 }
      }
    });
    expect(response.statusCode).toBe(422);
    expect(response.json().errorKind).toBe("UnsupportedEntityType");
  });

  it("does not count replayed sales twice toward nexus", async () => {
    const request = {
      method: "POST" as const,
      url: "/v1/sales-tax/calculate",
      headers: { "idempotency-key": "sales-tax-2024-05" },
      payload: {
        clientId: "client-1",
        period: "2024-05",
        sales: [
          { jurisdiction: "FL", amount: 60000 },
          { jurisdiction: "FL", amount: 45000 }
        ]
      }
    };

    const first = await app.inject(request);
    expect(first.statusCode).toBe(200);
    expect(first.json().totalTaxDue).toBe(6300);
    expect(first.json().nexusAlerts.map((alert: { type: string }) => alert.type)).toEqual(["nexus_threshold_exceeded"]);

    const replay = await app.inject(request);
    expect(replay.headers["idempotent-replay"]).toBe("true");

    const nexus = await app.inject({ method: "GET", url: "/v1/sales-tax/nexus?clientId=client-1" });
    expect(nexus.json().registrationRequired).toEqual([
      { jurisdiction: "FL", cumulativeSales: 105000, thresholdAmount: 100000, thresholdPercentage: 105, status: "exceeded" }
    ]);
  });

  it("derives filing requirements and rejects unknown jurisdictions", async () => {
    const filing = await app.inject({
      method: "POST",
      url: "/v1/sales-tax/filing",
      payload: { jurisdiction: "fl", taxDue: 6300, period: "2024-05" }
    });
    expect(filing.json()).toEqual({
      jurisdiction: "FL",
      period: "2024-05",
      filing: { frequency: "quarterly", dueDate: "2024-07-20" }
    });

    const unknown = await app.inject({
      method: "POST",
      url: "/v1/sales-tax/filing",
      payload: { jurisdiction: "ZZ", taxDue: 10, period: "2024-05" }
    });
    expect(unknown.statusCode).toBe(422);
    expect(unknown.json().errorKind).toBe("UnsupportedJurisdiction");

    const blank = await app.inject({
      method: "POST",
      url: "/v1/sales-tax/filing",
      payload: { jurisdiction: "   ", taxDue: 10, period: "2024-05" }
    });
    expect(blank.statusCode).toBe(400);
    expect(blank.json().errorKind).toBe("InvalidInput");

    const padded = await app.inject({
      method: "POST",
      url: "/v1/sales-tax/filing",
      payload: { jurisdiction: " fl ", taxDue: 6300, period: "2024-05" }
    });
    expect(padded.json().jurisdiction).toBe("FL");
  });
});
