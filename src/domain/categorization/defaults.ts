import type { ClassificationRuleSet } from "./types.js";

export const PATTERN_CONFIDENCE = 0.9;
export const MIN_AMOUNT_CONFIDENCE = 0.7;
export const MAX_AMOUNT_CONFIDENCE = 0.6;

// Order matters: "gas" is claimed by Vehicle Expenses before the utilities rule sees it.
export const defaultClassificationRules: ClassificationRuleSet = {
  patterns: [
    { pattern: "amazon|amzn", category: "Office Supplies", subcategory: "General", confidence: PATTERN_CONFIDENCE },
    { pattern: "gas|fuel|shell|exxon|bp", category: "Vehicle Expenses", subcategory: "Fuel", confidence: PATTERN_CONFIDENCE },
    {
      pattern: "office depot|staples|best buy",
      category: "Office Supplies",
      subcategory: "Equipment",
      confidence: PATTERN_CONFIDENCE
    },
    {
      pattern: "restaurant|cafe|food|dining",
      category: "Meals & Entertainment",
      subcategory: "Business Meals",
      confidence: PATTERN_CONFIDENCE
    },
    { pattern: "hotel|motel|lodging|airbnb", category: "Travel", subcategory: "Lodging", confidence: PATTERN_CONFIDENCE },
    { pattern: "airline|flight|airport", category: "Travel", subcategory: "Airfare", confidence: PATTERN_CONFIDENCE },
    {
      pattern: "internet|phone|verizon|att|comcast",
      category: "Utilities",
      subcategory: "Communications",
      confidence: PATTERN_CONFIDENCE
    },
    {
      pattern: "electric|power|gas company|water",
      category: "Utilities",
      subcategory: "Basic Utilities",
      confidence: PATTERN_CONFIDENCE
    },
    { pattern: "insurance", category: "Insurance", subcategory: "General", confidence: PATTERN_CONFIDENCE },
    { pattern: "bank fee|service charge", category: "Bank Charges", subcategory: "Fees", confidence: PATTERN_CONFIDENCE },
    { pattern: "payroll|salary|wages", category: "Payroll", subcategory: "Wages", confidence: PATTERN_CONFIDENCE },
    { pattern: "rent|lease", category: "Rent", subcategory: "Office Rent", confidence: PATTERN_CONFIDENCE },
    { pattern: "legal|attorney|law", category: "Professional Services", subcategory: "Legal", confidence: PATTERN_CONFIDENCE },
    {
      pattern: "accounting|bookkeeping|cpa",
      category: "Professional Services",
      subcategory: "Accounting",
      confidence: PATTERN_CONFIDENCE
    },
    {
      pattern: "marketing|advertising|google ads",
      category: "Marketing",
      subcategory: "Advertising",
      confidence: PATTERN_CONFIDENCE
    },
    {
      pattern: "software|subscription|saas",
      category: "Software",
      subcategory: "Subscriptions",
      confidence: PATTERN_CONFIDENCE
    }
  ],
  amountRules: [
    { bound: "min", value: 5000, category: "Equipment", subcategory: "Major Equipment", confidence: MIN_AMOUNT_CONFIDENCE },
    { bound: "max", value: 25, category: "Office Supplies", subcategory: "Miscellaneous", confidence: MAX_AMOUNT_CONFIDENCE }
  ]
};
