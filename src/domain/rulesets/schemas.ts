import { z } from "zod";

import { filingStatusCodes } from "./types.js";

const rate = z.number().min(0).max(1);
const amount = z.number().min(0);

export const filingStatusSchema = z.enum(filingStatusCodes);

export const bracketDefinitionSchema = z.object({
  min: amount,
  max: amount.nullable(),
  rate
});

export type BracketDefinition = z.infer<typeof bracketDefinitionSchema>;

const bracketsByStatus = z.record(filingStatusSchema, z.array(bracketDefinitionSchema).min(1));
const amountByStatus = z.record(filingStatusSchema, amount);

const rulesetHeader = {
  id: z.string().min(1),
  taxYear: z.number().int().min(2000).max(2100),
  effectiveFrom: z.string(),
  status: z.enum(["validated", "stale", "draft"]),
  changelog: z.array(z.string()),
  notes: z.array(z.string()).optional(),
  rulesetSignature: z.string().min(1)
};

export const federalRulesetFileSchema = z.object({
  ...rulesetHeader,
  jurisdiction: z.literal("federal"),
  standardDeduction: amountByStatus,
  incomeBrackets: bracketsByStatus,
  selfEmploymentTax: z.object({
    netEarningsFactor: rate,
    socialSecurityRate: rate,
    socialSecurityWageBase: amount,
    medicareRate: rate,
    additionalMedicareRate: rate,
    additionalMedicareThreshold: amountByStatus
  }),
  withholding: z.object({
    perAllowanceAmount: amount,
    brackets: bracketsByStatus
  }),
  fica: z.object({
    socialSecurityRate: rate,
    socialSecurityWageBase: amount,
    medicareRate: rate,
    additionalMedicareRate: rate,
    additionalMedicareThreshold: amount
  }),
  payroll: z.object({
    minimumWage: amount,
    overtimeMultiplier: z.number().min(1),
    regularHoursThreshold: amount,
    stateWithholdingRate: rate,
    highWithholdingRatio: rate,
    payDateOffsetDays: z.number().int().min(0),
    employer: z.object({
      futaRate: rate,
      futaWageBase: amount,
      sutaRate: rate,
      sutaWageBase: amount
    }),
    deposits: z.object({
      nextBusinessDayThreshold: amount,
      semiWeeklyThreshold: amount,
      monthlyDueDay: z.number().int().min(1).max(28)
    })
  }),
  entityTax: z.object({
    corporateRate: rate,
    stateIncomeTaxRate: rate,
    stateCorporateTaxRate: rate,
    noIncomeTaxStates: z.array(z.string().length(2)),
    sCorporation: z.object({
      reasonableSalaryRatio: rate,
      reasonableSalaryCeiling: amount,
      payrollTaxRate: rate
    })
  }),
  planning: z.object({
    safeHarborMultiplier: z.number().min(1),
    highEffectiveRateThreshold: rate,
    taxReductionSavingsRatio: rate,
    entityElectionIncomeThreshold: amount,
    entityElectionSavingsRatio: rate,
    retirementIncomeThreshold: amount,
    retirementContributionRatio: rate,
    retirementContributionCap: amount
  }),
  deductions: z.object({
    assumedTaxRate: rate,
    section179: z.object({
      maxDeduction: amount,
      phaseOutThreshold: amount
    }),
    defaultDeductiblePercent: z.number().min(0).max(100),
    defaultNotes: z.string(),
    defaultDocumentation: z.array(z.string()),
    categories: z.array(
      z.object({
        category: z.string().min(1),
        deductiblePercent: z.number().min(0).max(100),
        notes: z.string(),
        documentation: z.array(z.string())
      })
    )
  })
});

export type FederalRulesetFile = z.infer<typeof federalRulesetFileSchema>;

const filingThresholdsSchema = z.object({
  monthlyThreshold: amount,
  quarterlyThreshold: amount
});

export const salesTaxRulesetFileSchema = z.object({
  ...rulesetHeader,
  jurisdiction: z.literal("sales-tax"),
  nexus: z.object({
    approachingRatio: z.number().gt(0).lt(1)
  }),
  filing: filingThresholdsSchema,
  jurisdictions: z.array(
    z.object({
      code: z.string().min(2).max(8),
      stateRate: rate,
      averageLocalRate: rate,
      combinedAverageRate: rate,
      nexusSalesThreshold: amount.nullable(),
      nexusTransactionThreshold: z.number().int().positive().nullable(),
      filing: filingThresholdsSchema.optional()
    })
  )
});

export type SalesTaxRulesetFile = z.infer<typeof salesTaxRulesetFileSchema>;

export const rulesetMetaSchema = z.object({
  active: z.object({
    federal: z.string(),
    salesTax: z.string()
  }),
  activeByTaxYear: z.record(z.string(), z.object({ federal: z.string(), salesTax: z.string() })).optional(),
  versions: z.array(
    z.object({
      id: z.string(),
      jurisdiction: z.enum(["federal", "sales-tax"]),
      path: z.string(),
      effectiveFrom: z.string(),
      status: z.enum(["validated", "stale", "draft"]),
      validatedAt: z.string()
    })
  )
});
