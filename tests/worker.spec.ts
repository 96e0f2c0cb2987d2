import { cpSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { defaultRulesetSource } from "../src/domain/rulesets/loader.js";
import { InMemoryNexusStore } from "../src/domain/sales-tax/nexus.js";
import { openDatabase } from "../src/infrastructure/database.js";
import type { SqliteDatabase } from "../src/infrastructure/database.js";
import { createEngineContext } from "../src/services/context.js";
import type { EngineContext } from "../src/services/context.js";
import { listAuditEvents } from "../src/services/audit-service.js";
import {
  handleCalculateSalesTax,
  handleClassifyTransactions,
  handleRulesetUpdateCheck,
  handleRunPayroll
} from "../src/worker/handlers.js";

describe("worker handlers", () => {
  let db: SqliteDatabase;
  let context: EngineContext;

  beforeEach(() => {
    db = openDatabase(":memory:");
    context = createEngineContext({
      db,
      nexusStore: new InMemoryNexusStore(),
      clock: () => new Date("2024-05-31T12:00:00.000Z")
    });
  });

  afterEach(() => {
    db.close();
  });

  it("classifies job payloads and records the worker as the actor", async () => {
    const result = await handleClassifyTransactions(context, {
      clientId: "client-1",
      transactions: [{ date: "2024-03-01", description: "SHELL OIL #1234", amount: -45.2 }]
    });

    expect(result.processed).toBe(1);
    expect(listAuditEvents(db, "classification_batch", result.batchId).map((event) => [event.action, event.actorType])).toEqual([
      ["TRANSACTIONS_CLASSIFIED", "worker"]
    ]);
  });

  it("applies the request defaults to payroll jobs", async () => {
    const result = await handleRunPayroll(context, {
      clientId: "client-1",
      payPeriod: "2024-03-04 to 2024-03-17",
      employees: [{ employeeId: "emp-1", payBasis: "salary", rateOrSalary: 52000 }]
    });

    expect(result.payFrequency).toBe("biweekly");
    expect(result.totals.grossPay).toBe(2000);
  });

  it("rejects malformed job payloads before touching the services", async () => {
    await expect(handleCalculateSalesTax(context, { clientId: "client-1", period: "May 2024", sales: [] })).rejects.toThrow(
      ZodError
    );
    await expect(
      handleCalculateSalesTax(context, { clientId: "client-1", period: "2024-05", sales: [{ jurisdiction: "  ", amount: 100 }] })
    ).rejects.toThrow(ZodError);
  });

  it("tracks nexus from sales-tax jobs", async () => {
    const result = await handleCalculateSalesTax(context, {
      clientId: "client-1",
      period: "2024-05",
      sales: [{ jurisdiction: "TX", amount: 1000 }]
    });

    expect(result.totalTaxDue).toBe(62.5);
    expect((await context.nexusStore.get({ clientId: "client-1", jurisdiction: "TX" }))?.cumulativeSales).toBe(1000);
  });
});

describe("ruleset update check", () => {
  let root: string;
  let db: SqliteDatabase;

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), "ruleset-check-"));
    cpSync(defaultRulesetSource().root, root, { recursive: true });
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
    rmSync(root, { recursive: true, force: true });
  });

  it("verifies every registered version", async () => {
    const report = await handleRulesetUpdateCheck(createEngineContext({ db }), {
      root,
      signingSecret: defaultRulesetSource().signingSecret
    });

    expect(report.invalidCount).toBe(0);
    expect(report.staleCount).toBe(0);
    expect(report.entries.map((entry) => [entry.id, entry.valid])).toEqual([
      ["IRS-2024.1", true],
      ["IRS-2025.1", true],
      ["SALES-2024.1", true]
    ]);
  });

  it("reports a tampered file without failing the check", async () => {
    writeFileSync(path.join(root, "sales-tax", "SALES-2024.1.json"), JSON.stringify({ id: "SALES-2024.1" }));

    const report = await handleRulesetUpdateCheck(createEngineContext({ db }), {
      root,
      signingSecret: defaultRulesetSource().signingSecret
    });

    expect(report.invalidCount).toBe(1);
    expect(report.entries[2]).toMatchObject({
      id: "SALES-2024.1",
      valid: false,
      error: "Ruleset signature mismatch for sales-tax/SALES-2024.1.json."
    });
  });
});
