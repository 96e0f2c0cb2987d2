import type { SqliteDatabase } from "../infrastructure/database.js";
import { createId } from "../shared/hash.js";

export const auditActions = {
  TRANSACTIONS_CLASSIFIED: "TRANSACTIONS_CLASSIFIED",
  PAYROLL_RUN_CREATED: "PAYROLL_RUN_CREATED",
  TAX_LIABILITY_CALCULATED: "TAX_LIABILITY_CALCULATED",
  SALES_TAX_CALCULATED: "SALES_TAX_CALCULATED",
  NEXUS_THRESHOLD_CROSSED: "NEXUS_THRESHOLD_CROSSED",
  PERIOD_RECONCILED: "PERIOD_RECONCILED"
} as const;

export type AuditAction = (typeof auditActions)[keyof typeof auditActions];

export interface AuditInput {
  actorType: "api" | "worker";
  actorId?: string | null;
  action: AuditAction;
  entityType: string;
  entityId?: string | null;
  requestId?: string | null;
  payload?: Record<string, unknown>;
}

interface AuditRow {
  id: string;
  actor_type: string;
  actor_id: string | null;
  action: string;
  entity_type: string;
  entity_id: string | null;
  request_id: string | null;
  payload_json: string | null;
  created_at: string;
}

export function writeAuditEvent(db: SqliteDatabase, input: AuditInput, now: Date = new Date()): string {
  const id = createId();
  db.prepare(
    `INSERT INTO audit_events (id, actor_type, actor_id, action, entity_type, entity_id, request_id, payload_json, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    id,
    input.actorType,
    input.actorId ?? null,
    input.action,
    input.entityType,
    input.entityId ?? null,
    input.requestId ?? null,
    input.payload ? JSON.stringify(input.payload) : null,
    now.toISOString()
  );
  return id;
}

export interface AuditEventSummary {
  id: string;
  actorType: string;
  action: string;
  createdAt: string;
}

export function listAuditEvents(db: SqliteDatabase, entityType: string, entityId: string): AuditEventSummary[] {
  return db
    .prepare<[string, string], AuditRow>(
      "SELECT * FROM audit_events WHERE entity_type = ? AND entity_id = ? ORDER BY created_at ASC, id ASC"
    )
    .all(entityType, entityId)
    .map((row) => ({ id: row.id, actorType: row.actor_type, action: row.action, createdAt: row.created_at }));
}
