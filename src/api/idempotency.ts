import type { FastifyReply, FastifyRequest } from "fastify";

import type { SqliteDatabase } from "../infrastructure/database.js";
import { createId, sha256 } from "../shared/hash.js";

const IDEMPOTENCY_TTL_MS = 1000 * 60 * 60 * 24 * 7;

type IdempotencyStatus = "PROCESSING" | "COMPLETED" | "FAILED";

interface IdempotencyRow {
  id: string;
  payload_hash: string;
  status: IdempotencyStatus;
  response_code: number | null;
  response_json: string | null;
  expires_at: string;
}

export interface IdempotencyContext {
  recordId: string;
  route: string;
  requestHash: string;
}

declare module "fastify" {
  interface FastifyRequest {
    idempotency?: IdempotencyContext;
  }
}

function buildRoute(request: FastifyRequest): string {
  return request.routeOptions.url ?? request.url.split("?")[0] ?? request.url;
}

function buildRequestHash(request: FastifyRequest): string {
  return sha256(JSON.stringify(request.body ?? null));
}

export interface IdempotencyHooks {
  requireIdempotencyKey(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined>;
  persistIdempotentResponse(request: FastifyRequest, reply: FastifyReply, payload: unknown): Promise<unknown>;
}

/**
 * Request deduplication for mutating endpoints, keyed by method, route and the
 * `Idempotency-Key` header. A completed request is replayed verbatim; the same
 * key with a different body is a conflict.
 */
export function createIdempotencyHooks(db: SqliteDatabase, clock: () => Date = () => new Date()): IdempotencyHooks {
  const findRecord = db.prepare<[string, string, string], IdempotencyRow>(
    "SELECT * FROM idempotency_records WHERE method = ? AND route = ? AND idempotency_key = ?"
  );
  const deleteRecord = db.prepare<[string]>("DELETE FROM idempotency_records WHERE id = ?");
  const insertRecord = db.prepare<[string, string, string, string, string, string, string]>(
    `INSERT INTO idempotency_records (id, method, route, idempotency_key, payload_hash, status, expires_at, created_at)
     VALUES (?, ?, ?, ?, ?, 'PROCESSING', ?, ?)`
  );
  const completeRecord = db.prepare<[number, string, string]>(
    "UPDATE idempotency_records SET status = 'COMPLETED', response_code = ?, response_json = ? WHERE id = ?"
  );
  const failRecord = db.prepare<[string]>(
    "UPDATE idempotency_records SET status = 'FAILED' WHERE id = ? AND status = 'PROCESSING'"
  );

  // Lookup and claim run in one transaction so two requests cannot both claim a key.
  const claim = db.transaction(
    (method: string, route: string, key: string, requestHash: string, now: Date): { active: IdempotencyRow | null; recordId: string | null } => {
      const existing = findRecord.get(method, route, key);
      if (existing && existing.expires_at > now.toISOString() && existing.status !== "FAILED") {
        return { active: existing, recordId: null };
      }
      if (existing) {
        deleteRecord.run(existing.id);
      }

      const recordId = createId();
      insertRecord.run(
        recordId,
        method,
        route,
        key,
        requestHash,
        new Date(now.getTime() + IDEMPOTENCY_TTL_MS).toISOString(),
        now.toISOString()
      );
      return { active: null, recordId };
    }
  );

  return {
    async requireIdempotencyKey(request, reply) {
      const headerValue = request.headers["idempotency-key"];
      if (typeof headerValue !== "string" || headerValue.trim().length < 8) {
        return reply.code(400).send({
          errorKind: "IdempotencyKeyRequired",
          message: "Idempotency-Key header is required for this endpoint.",
          details: { ttlHours: IDEMPOTENCY_TTL_MS / (1000 * 60 * 60) },
          requestId: request.id
        });
      }

      const route = buildRoute(request);
      const requestHash = buildRequestHash(request);
      const idempotencyKey = headerValue.trim();
      const { active, recordId } = claim(request.method, route, idempotencyKey, requestHash, clock());

      if (active) {
        if (active.payload_hash !== requestHash) {
          return reply.code(409).send({
            errorKind: "IdempotencyConflict",
            message: "The same Idempotency-Key cannot be reused with a different payload.",
            details: { idempotencyKey, status: active.status },
            requestId: request.id
          });
        }

        if (active.status === "COMPLETED" && active.response_json !== null) {
          return reply
            .code(active.response_code ?? 200)
            .header("content-type", "application/json; charset=utf-8")
            .header("idempotent-replay", "true")
            .send(active.response_json);
        }

        return reply.code(202).send({
          errorKind: "IdempotencyInFlight",
          message: "A request with the same Idempotency-Key is still processing. Retry later.",
          details: { idempotencyKey, status: active.status },
          requestId: request.id
        });
      }

      if (recordId !== null) {
        request.idempotency = { recordId, route, requestHash };
      }
      return undefined;
    },

    async persistIdempotentResponse(request, reply, payload) {
      const context = request.idempotency;
      if (!context) {
        return payload;
      }

      if (reply.statusCode >= 400 || typeof payload !== "string") {
        failRecord.run(context.recordId);
      } else {
        completeRecord.run(reply.statusCode, payload, context.recordId);
      }
      return payload;
    }
  };
}
