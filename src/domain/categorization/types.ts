export type TransactionType = "debit" | "credit";

export interface ClassificationRule {
  pattern: string;
  category: string;
  subcategory: string;
  confidence: number;
}

export interface AmountRule {
  bound: "min" | "max";
  value: number;
  category: string;
  subcategory: string;
  confidence: number;
}

/** Pattern rules are evaluated in order and the first match wins. */
export type OrderedRuleList = readonly ClassificationRule[];

export interface ClassificationRuleSet {
  patterns: OrderedRuleList;
  amountRules: readonly AmountRule[];
}

export interface TransactionInput {
  date: string;
  description: string;
  amount: number;
  referenceId?: string | null;
}

export interface Classification {
  category: string;
  subcategory: string;
  confidence: number;
}

export interface ClassifiedTransaction extends TransactionInput, Classification {
  type: TransactionType;
  needsReview: boolean;
}
