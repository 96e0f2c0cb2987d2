import { z } from "zod";

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");
const isoMonthSchema = z.string().regex(/^\d{4}-\d{2}$/, "Expected YYYY-MM");
const taxYearSchema = z.coerce.number().int().min(2000).max(2100);
const clientIdSchema = z.string().trim().min(1).max(120);
const amountSchema = z.number();

export const yearQuerySchema = z.object({
  year: taxYearSchema
});

export const classifyBatchSchema = z.object({
  clientId: clientIdSchema,
  transactions: z
    .array(
      z.object({
        date: isoDateSchema,
        description: z.string().min(1).max(500),
        amount: amountSchema,
        referenceId: z.string().max(120).optional()
      })
    )
    .min(1)
    .max(5000)
});

export const transactionListQuerySchema = z.object({
  clientId: clientIdSchema,
  lowConfidence: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional()
});

export const reconcilePeriodSchema = z.object({
  clientId: clientIdSchema,
  period: isoMonthSchema
});

export const payrollRunSchema = z.object({
  clientId: clientIdSchema,
  payPeriod: z.string().min(1),
  payFrequency: z.enum(["weekly", "biweekly", "semimonthly", "monthly"]).default("biweekly"),
  employees: z
    .array(
      z.object({
        employeeId: z.string().min(1).max(120),
        payBasis: z.enum(["hourly", "salary"]),
        hoursWorked: amountSchema.default(0),
        overtimeHours: amountSchema.default(0),
        rateOrSalary: amountSchema,
        filingStatus: z.string().min(1).default("SINGLE"),
        allowances: z.number().int().default(0),
        additionalWithholding: amountSchema.default(0),
        otherDeductions: amountSchema.optional(),
        ytdGrossWages: amountSchema.optional()
      })
    )
    .min(1)
    .max(1000)
});

const projectionSchema = z.discriminatedUnion("method", [
  z.object({
    method: z.literal("provided"),
    grossIncome: amountSchema,
    businessExpenses: amountSchema
  }),
  z.object({
    method: z.enum(["ytd_annualized", "prior_year"]),
    asOf: isoDateSchema.optional()
  })
]);

export const taxLiabilitySchema = z.object({
  clientId: clientIdSchema,
  taxYear: taxYearSchema,
  // Left as a string so unknown types reach the engine and surface as UnsupportedEntityType.
  entityType: z.string().min(1),
  state: z.string().trim().min(2).max(2),
  filingStatus: z.string().min(1).optional(),
  ownershipShare: amountSchema.optional(),
  priorYearTax: amountSchema.nullable().optional(),
  projection: projectionSchema
});

export const taxCalculationsQuerySchema = z.object({
  clientId: clientIdSchema,
  year: taxYearSchema.optional()
});

export const deductionOptimizeSchema = z
  .object({
    taxYear: taxYearSchema,
    clientId: clientIdSchema.optional(),
    expenses: z.record(z.string(), z.record(z.string(), amountSchema)).optional()
  })
  .refine((value) => value.expenses !== undefined || value.clientId !== undefined, {
    message: "Either expenses or clientId is required.",
    path: ["expenses"]
  });

export const salesTaxCalculateSchema = z.object({
  clientId: clientIdSchema,
  period: isoMonthSchema,
  sales: z
    .array(
      z.object({
        jurisdiction: z.string().trim().min(1).max(8),
        level: z.enum(["state", "local"]).default("state"),
        amount: amountSchema,
        taxable: z.boolean().default(true)
      })
    )
    .min(1)
    .max(10000)
});

export const filingRequirementSchema = z.object({
  jurisdiction: z.string().trim().min(1).max(8),
  taxDue: amountSchema,
  period: isoMonthSchema
});

export const nexusQuerySchema = z.object({
  clientId: clientIdSchema
});
