import cors from "@fastify/cors";
import fastifyRateLimit from "@fastify/rate-limit";
import sensible from "@fastify/sensible";
import Fastify from "fastify";
import type { FastifyError, FastifyRequest } from "fastify";
import { ZodError } from "zod";

import { createIdempotencyHooks } from "./api/idempotency.js";
import { buildOpenApiDocument } from "./api/openapi.js";
import {
  classifyBatchSchema,
  deductionOptimizeSchema,
  filingRequirementSchema,
  nexusQuerySchema,
  payrollRunSchema,
  reconcilePeriodSchema,
  salesTaxCalculateSchema,
  taxCalculationsQuerySchema,
  taxLiabilitySchema,
  transactionListQuerySchema,
  yearQuerySchema
} from "./api/schemas.js";
import { env } from "./config/env.js";
import { EngineError } from "./shared/errors.js";
import { classifyTransactions, listClassifiedTransactions, reconcilePeriod } from "./services/bookkeeping-service.js";
import { createEngineContext } from "./services/context.js";
import type { EngineContext } from "./services/context.js";
import { runPayroll } from "./services/payroll-service.js";
import { analyzeNexus, calculateSalesTax, deriveFilingRequirement } from "./services/sales-tax-service.js";
import { analyzeDeductions, calculateTaxLiability, listTaxCalculations } from "./services/tax-service.js";
import type { RequestMeta } from "./services/types.js";

export interface BuildAppOptions {
  context?: EngineContext;
}

function requestMeta(request: FastifyRequest): RequestMeta {
  return { actorType: "api", requestId: request.id };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const apiPrefix = "/v1";
  const context = options.context ?? createEngineContext();
  const app = Fastify({
    loggerInstance: context.logger,
    disableRequestLogging: env.NODE_ENV === "test"
  });
  const idempotency = createIdempotencyHooks(context.db, context.clock);

  await app.register(sensible);
  await app.register(cors, {
    origin: env.CORS_ORIGINS.includes("*") ? true : env.CORS_ORIGINS,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Idempotency-Key"],
    credentials: false
  });
  await app.register(fastifyRateLimit, {
    max: env.RATE_LIMIT_MAX,
    timeWindow: "1 minute"
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        errorKind: "InvalidInput",
        message: "Request validation failed.",
        details: error.flatten(),
        requestId: request.id
      });
    }

    if (error instanceof EngineError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, "engine configuration failure");
      }
      return reply.code(error.statusCode).send({
        ...error.toPayload(),
        details: error.details,
        requestId: request.id
      });
    }

    const statusCode = typeof error.statusCode === "number" ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "unhandled request failure");
    }

    return reply.code(statusCode).send({
      errorKind: statusCode >= 500 ? "InternalError" : statusCode === 404 ? "NotFound" : (error.code ?? "RequestError"),
      message: statusCode >= 500 ? "Internal server error." : error.message,
      details: null,
      requestId: request.id
    });
  });

  app.setNotFoundHandler(async (request) => {
    throw app.httpErrors.notFound(`Route ${request.method} ${request.url.split("?")[0] ?? request.url} not found.`);
  });

  app.addHook("onSend", idempotency.persistIdempotentResponse);

  app.get("/health", async () => ({
    ok: true
  }));

  app.get("/openapi.json", async () => buildOpenApiDocument());

  app.get(`${apiPrefix}/health`, async () => ({
    ok: true,
    version: "v1"
  }));

  app.get(`${apiPrefix}/rulesets/active`, async (request) => {
    const { year } = yearQuerySchema.parse(request.query);
    const rulesets = context.rulesetsFor(year);
    return {
      taxYear: rulesets.taxYear,
      federal: { id: rulesets.federal.id, taxYear: rulesets.federal.taxYear },
      salesTax: { id: rulesets.salesTax.id, taxYear: rulesets.salesTax.taxYear }
    };
  });

  app.post(`${apiPrefix}/bookkeeping/classify`, { preHandler: idempotency.requireIdempotencyKey }, async (request) => {
    const body = classifyBatchSchema.parse(request.body);
    return classifyTransactions(context, body, requestMeta(request));
  });

  app.get(`${apiPrefix}/bookkeeping/transactions`, async (request) => {
    const query = transactionListQuerySchema.parse(request.query);
    const items = listClassifiedTransactions(context, query.clientId, {
      lowConfidenceOnly: query.lowConfidence,
      from: query.from,
      to: query.to
    });
    return { items, total: items.length };
  });

  app.post(`${apiPrefix}/bookkeeping/reconcile`, { preHandler: idempotency.requireIdempotencyKey }, async (request) => {
    const body = reconcilePeriodSchema.parse(request.body);
    return reconcilePeriod(context, body, requestMeta(request));
  });

  app.post(`${apiPrefix}/payroll/runs`, { preHandler: idempotency.requireIdempotencyKey }, async (request) => {
    const body = payrollRunSchema.parse(request.body);
    return runPayroll(context, body, requestMeta(request));
  });

  app.post(`${apiPrefix}/tax/liability`, { preHandler: idempotency.requireIdempotencyKey }, async (request) => {
    const body = taxLiabilitySchema.parse(request.body);
    return calculateTaxLiability(context, body, requestMeta(request));
  });

  app.get(`${apiPrefix}/tax/calculations`, async (request) => {
    const query = taxCalculationsQuerySchema.parse(request.query);
    return { items: listTaxCalculations(context, query.clientId, query.year) };
  });

  app.post(`${apiPrefix}/tax/deductions/optimize`, async (request) => {
    const body = deductionOptimizeSchema.parse(request.body);
    return analyzeDeductions(context, body);
  });

  app.post(`${apiPrefix}/sales-tax/calculate`, { preHandler: idempotency.requireIdempotencyKey }, async (request) => {
    const body = salesTaxCalculateSchema.parse(request.body);
    return calculateSalesTax(context, body, requestMeta(request));
  });

  app.post(`${apiPrefix}/sales-tax/filing`, async (request) => {
    const body = filingRequirementSchema.parse(request.body);
    return { jurisdiction: body.jurisdiction.toUpperCase(), period: body.period, filing: deriveFilingRequirement(context, body) };
  });

  app.get(`${apiPrefix}/sales-tax/nexus`, async (request) => {
    const { clientId } = nexusQuerySchema.parse(request.query);
    return analyzeNexus(context, clientId);
  });

  if (!options.context) {
    app.addHook("onClose", async () => {
      context.db.close();
    });
  }

  return app;
}
