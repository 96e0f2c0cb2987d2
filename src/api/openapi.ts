import { entityTypes } from "../domain/tax/types.js";

const idempotencyHeader = {
  name: "Idempotency-Key",
  in: "header",
  required: true,
  schema: { type: "string", minLength: 8 }
};

function queryParameter(name: string, type: "string" | "integer" | "boolean", required: boolean) {
  return { name, in: "query", required, schema: { type } };
}

const errorResponses = {
  "400": { description: "Invalid input", content: { "application/json": { schema: { $ref: "#/components/schemas/ErrorResponse" } } } },
  "422": { description: "Unsupported entity type or jurisdiction" }
};

export function buildOpenApiDocument() {
  return {
    openapi: "3.1.0",
    info: {
      title: "Tax Obligation Engine API",
      version: "1.0.0",
      description: "Bookkeeping classification, payroll, entity tax planning and sales-tax nexus for small-business clients."
    },
    servers: [
      {
        url: "/v1"
      }
    ],
    components: {
      schemas: {
        ErrorResponse: {
          type: "object",
          required: ["errorKind", "message", "details", "requestId"],
          properties: {
            errorKind: { type: "string" },
            message: { type: "string" },
            details: {},
            requestId: { type: ["string", "null"] }
          }
        },
        EntityType: {
          type: "string",
          enum: [...entityTypes]
        }
      }
    },
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: { "200": { description: "Service health" } }
        }
      },
      "/rulesets/active": {
        get: {
          summary: "Rulesets active for a tax year",
          parameters: [queryParameter("year", "integer", true)],
          responses: { "200": { description: "Federal and sales-tax ruleset ids" }, "500": { description: "Ruleset missing or signature invalid" } }
        }
      },
      "/bookkeeping/classify": {
        post: {
          summary: "Classify a batch of bank transactions",
          parameters: [idempotencyHeader],
          responses: {
            "200": { description: "Per-transaction results, batch summary and review exceptions" },
            "409": { description: "Idempotency-Key reused with a different payload" },
            ...errorResponses
          }
        }
      },
      "/bookkeeping/transactions": {
        get: {
          summary: "List classified transactions",
          parameters: [
            queryParameter("clientId", "string", true),
            queryParameter("lowConfidence", "boolean", false),
            queryParameter("from", "string", false),
            queryParameter("to", "string", false)
          ],
          responses: { "200": { description: "Classified transactions" } }
        }
      },
      "/bookkeeping/reconcile": {
        post: {
          summary: "Reconcile a month of classified transactions",
          parameters: [idempotencyHeader],
          responses: {
            "200": { description: "Period totals, issues and completed or needs_review status" },
            "409": { description: "Idempotency-Key reused with a different payload" },
            ...errorResponses
          }
        }
      },
      "/payroll/runs": {
        post: {
          summary: "Run payroll for a pay period",
          parameters: [idempotencyHeader],
          responses: {
            "200": { description: "Payroll lines, totals, deposit requirement and compliance alerts" },
            "409": { description: "Idempotency-Key reused with a different payload" },
            ...errorResponses
          }
        }
      },
      "/tax/liability": {
        post: {
          summary: "Calculate entity tax liability and quarterly plan",
          parameters: [idempotencyHeader],
          responses: {
            "200": { description: "Tax result, quarterly estimates and recommendations" },
            "409": { description: "Idempotency-Key reused with a different payload" },
            ...errorResponses
          }
        }
      },
      "/tax/calculations": {
        get: {
          summary: "List stored tax calculations",
          parameters: [queryParameter("clientId", "string", true), queryParameter("year", "integer", false)],
          responses: { "200": { description: "Calculation summaries, newest first" } }
        }
      },
      "/tax/deductions/optimize": {
        post: {
          summary: "Deduction analysis with Section 179",
          responses: { "200": { description: "Deductible amounts and recommendations" }, ...errorResponses }
        }
      },
      "/sales-tax/calculate": {
        post: {
          summary: "Calculate sales tax and update nexus totals",
          parameters: [idempotencyHeader],
          responses: {
            "200": { description: "Per-jurisdiction tax, filing requirements and nexus alerts" },
            "409": { description: "Idempotency-Key reused with a different payload" },
            ...errorResponses
          }
        }
      },
      "/sales-tax/filing": {
        post: {
          summary: "Derive filing frequency and due date",
          responses: { "200": { description: "Filing requirement, or null when nothing is due" }, ...errorResponses }
        }
      },
      "/sales-tax/nexus": {
        get: {
          summary: "Nexus analysis for a client",
          parameters: [queryParameter("clientId", "string", true)],
          responses: { "200": { description: "Jurisdictions with nexus, monitoring and recommendations" } }
        }
      }
    }
  };
}
