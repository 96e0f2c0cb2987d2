import { mkdirSync } from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import { env } from "../config/env.js";
import { logger } from "./logger.js";

export type SqliteDatabase = Database.Database;
export type Statement<BindParameters extends unknown[], Result = unknown> = Database.Statement<BindParameters, Result>;

const log = logger.child({ component: "migrations" });

export interface Migration {
  version: number;
  description: string;
  up: (db: SqliteDatabase) => void;
}

export const migrations: Migration[] = [
  {
    version: 1,
    description: "Create nexus_records table",
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS nexus_records (
          client_id                    TEXT NOT NULL,
          jurisdiction                 TEXT NOT NULL,
          threshold_sales_amount       REAL NOT NULL,
          threshold_transaction_count  INTEGER,
          cumulative_sales             REAL NOT NULL DEFAULT 0,
          cumulative_transaction_count INTEGER NOT NULL DEFAULT 0,
          status                       TEXT NOT NULL DEFAULT 'monitoring',
          exceeded_at                  TEXT,
          updated_at                   TEXT NOT NULL,
          PRIMARY KEY (client_id, jurisdiction)
        )
      `);
    }
  },
  {
    version: 2,
    description: "Create bookkeeping and payroll tables",
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS classified_transactions (
          id               TEXT PRIMARY KEY,
          client_id        TEXT NOT NULL,
          batch_id         TEXT NOT NULL,
          transaction_date TEXT NOT NULL,
          description      TEXT NOT NULL,
          amount           REAL NOT NULL,
          type             TEXT NOT NULL,
          category         TEXT NOT NULL,
          subcategory      TEXT NOT NULL,
          confidence       REAL NOT NULL,
          needs_review     INTEGER NOT NULL,
          reference_id     TEXT,
          created_at       TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_classified_transactions_client
          ON classified_transactions(client_id, transaction_date);

        CREATE TABLE IF NOT EXISTS payroll_runs (
          id               TEXT PRIMARY KEY,
          client_id        TEXT NOT NULL,
          pay_period_start TEXT NOT NULL,
          pay_period_end   TEXT NOT NULL,
          pay_date         TEXT NOT NULL,
          pay_frequency    TEXT NOT NULL,
          total_gross      REAL NOT NULL,
          total_net        REAL NOT NULL,
          total_taxes      REAL NOT NULL,
          employer_taxes   REAL NOT NULL,
          created_at       TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS payroll_lines (
          id                   TEXT PRIMARY KEY,
          payroll_run_id       TEXT NOT NULL REFERENCES payroll_runs(id),
          employee_id          TEXT NOT NULL,
          hours_worked         REAL NOT NULL,
          overtime_hours       REAL NOT NULL,
          gross_pay            REAL NOT NULL,
          federal_withholding  REAL NOT NULL,
          state_withholding    REAL NOT NULL,
          social_security      REAL NOT NULL,
          medicare             REAL NOT NULL,
          additional_medicare  REAL NOT NULL,
          other_deductions     REAL NOT NULL,
          total_taxes          REAL NOT NULL,
          net_pay              REAL NOT NULL,
          flags                TEXT NOT NULL
        );
      `);
    }
  },
  {
    version: 3,
    description: "Create tax and sales-tax calculation tables",
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS tax_calculations (
          id               TEXT PRIMARY KEY,
          client_id        TEXT NOT NULL,
          tax_year         INTEGER NOT NULL,
          entity_type      TEXT NOT NULL,
          ruleset_id       TEXT NOT NULL,
          total_tax        REAL NOT NULL,
          effective_rate   REAL NOT NULL,
          result_json      TEXT NOT NULL,
          created_at       TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_tax_calculations_client ON tax_calculations(client_id, tax_year);

        CREATE TABLE IF NOT EXISTS sales_tax_calculations (
          id             TEXT PRIMARY KEY,
          client_id      TEXT NOT NULL,
          period         TEXT NOT NULL,
          jurisdiction   TEXT NOT NULL,
          level          TEXT NOT NULL,
          gross_sales    REAL NOT NULL,
          taxable_sales  REAL NOT NULL,
          exempt_sales   REAL NOT NULL,
          tax_rate       REAL NOT NULL,
          tax_due        REAL NOT NULL,
          created_at     TEXT NOT NULL
        );
      `);
    }
  },
  {
    version: 4,
    description: "Create audit and idempotency tables",
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS audit_events (
          id           TEXT PRIMARY KEY,
          actor_type   TEXT NOT NULL,
          actor_id     TEXT,
          action       TEXT NOT NULL,
          entity_type  TEXT NOT NULL,
          entity_id    TEXT,
          request_id   TEXT,
          payload_json TEXT,
          created_at   TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS idempotency_records (
          id              TEXT PRIMARY KEY,
          method          TEXT NOT NULL,
          route           TEXT NOT NULL,
          idempotency_key TEXT NOT NULL,
          payload_hash    TEXT NOT NULL,
          status          TEXT NOT NULL,
          response_code   INTEGER,
          response_json   TEXT,
          expires_at      TEXT NOT NULL,
          created_at      TEXT NOT NULL,
          UNIQUE (method, route, idempotency_key)
        );
      `);
    }
  },
  {
    version: 5,
    description: "Create period reconciliation table",
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS reconciliations (
          id                  TEXT PRIMARY KEY,
          client_id           TEXT NOT NULL,
          period              TEXT NOT NULL,
          total_transactions  INTEGER NOT NULL,
          total_debits        REAL NOT NULL,
          total_credits       REAL NOT NULL,
          ending_balance      REAL NOT NULL,
          status              TEXT NOT NULL,
          issues_json         TEXT NOT NULL,
          created_at          TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_reconciliations_client ON reconciliations(client_id, period);
      `);
    }
  }
];

export function getCurrentVersion(db: SqliteDatabase): number {
  const row = db.prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_migrations").get();
  return row?.v ?? 0;
}

/**
 * Applies pending migrations in order inside one transaction; a failure rolls
 * all of them back.
 */
export function runMigrations(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version     INTEGER PRIMARY KEY,
      applied_at  TEXT NOT NULL DEFAULT (datetime('now')),
      description TEXT
    )
  `);

  const currentVersion = getCurrentVersion(db);
  const pending = migrations.filter((migration) => migration.version > currentVersion);
  if (pending.length === 0) {
    return;
  }

  const record = db.prepare("INSERT INTO schema_migrations (version, description) VALUES (?, ?)");
  db.transaction(() => {
    for (const migration of pending) {
      log.info({ version: migration.version, description: migration.description }, "applying migration");
      migration.up(db);
      record.run(migration.version, migration.description);
    }
  })();
}

export function openDatabase(databasePath: string = env.DATABASE_PATH): SqliteDatabase {
  if (databasePath !== ":memory:") {
    mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
  }

  const db = new Database(databasePath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  runMigrations(db);
  return db;
}
