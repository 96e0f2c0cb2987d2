import type { NexusKey, NexusMutator, NexusRecord, NexusStatus, NexusStore } from "../domain/sales-tax/nexus.js";
import type { SqliteDatabase, Statement } from "./database.js";

interface NexusRow {
  client_id: string;
  jurisdiction: string;
  threshold_sales_amount: number;
  threshold_transaction_count: number | null;
  cumulative_sales: number;
  cumulative_transaction_count: number;
  status: string;
  exceeded_at: string | null;
  updated_at: string;
}

function parseStatus(value: string): NexusStatus {
  return value === "approaching" || value === "exceeded" ? value : "monitoring";
}

function toRecord(row: NexusRow): NexusRecord {
  return {
    clientId: row.client_id,
    jurisdiction: row.jurisdiction,
    thresholdSalesAmount: row.threshold_sales_amount,
    thresholdTransactionCount: row.threshold_transaction_count,
    cumulativeSales: row.cumulative_sales,
    cumulativeTransactionCount: row.cumulative_transaction_count,
    status: parseStatus(row.status),
    exceededAt: row.exceeded_at,
    updatedAt: row.updated_at
  };
}

export class SqliteNexusStore implements NexusStore {
  private readonly selectOne: Statement<[string, string], NexusRow>;
  private readonly selectByClient: Statement<[string], NexusRow>;
  private readonly upsert: Statement<[NexusRow]>;

  constructor(private readonly db: SqliteDatabase) {
    this.selectOne = db.prepare<[string, string], NexusRow>(
      "SELECT * FROM nexus_records WHERE client_id = ? AND jurisdiction = ?"
    );
    this.selectByClient = db.prepare<[string], NexusRow>(
      "SELECT * FROM nexus_records WHERE client_id = ? ORDER BY cumulative_sales DESC"
    );
    this.upsert = db.prepare<[NexusRow]>(`
      INSERT INTO nexus_records (
        client_id, jurisdiction, threshold_sales_amount, threshold_transaction_count,
        cumulative_sales, cumulative_transaction_count, status, exceeded_at, updated_at
      ) VALUES (
        @client_id, @jurisdiction, @threshold_sales_amount, @threshold_transaction_count,
        @cumulative_sales, @cumulative_transaction_count, @status, @exceeded_at, @updated_at
      )
      ON CONFLICT (client_id, jurisdiction) DO UPDATE SET
        threshold_sales_amount = excluded.threshold_sales_amount,
        threshold_transaction_count = excluded.threshold_transaction_count,
        cumulative_sales = excluded.cumulative_sales,
        cumulative_transaction_count = excluded.cumulative_transaction_count,
        status = excluded.status,
        exceeded_at = excluded.exceeded_at,
        updated_at = excluded.updated_at
    `);
  }

  async get(key: NexusKey): Promise<NexusRecord | null> {
    const row = this.selectOne.get(key.clientId, key.jurisdiction);
    return row ? toRecord(row) : null;
  }

  // BEGIN IMMEDIATE takes the write lock before the read.
  async update(key: NexusKey, mutator: NexusMutator): Promise<NexusRecord> {
    const apply = this.db.transaction((): NexusRecord => {
      const row = this.selectOne.get(key.clientId, key.jurisdiction);
      const next = mutator(row ? toRecord(row) : null);
      this.upsert.run({
        client_id: key.clientId,
        jurisdiction: key.jurisdiction,
        threshold_sales_amount: next.thresholdSalesAmount,
        threshold_transaction_count: next.thresholdTransactionCount,
        cumulative_sales: next.cumulativeSales,
        cumulative_transaction_count: next.cumulativeTransactionCount,
        status: next.status,
        exceeded_at: next.exceededAt,
        updated_at: next.updatedAt
      });
      return next;
    });

    return apply.immediate();
  }

  async listByClient(clientId: string): Promise<NexusRecord[]> {
    return this.selectByClient.all(clientId).map(toRecord);
  }
}
