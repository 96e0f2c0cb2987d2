import { configurationError, invalidInput } from "../../shared/errors.js";
import type { AmountRule, Classification, ClassificationRuleSet, ClassifiedTransaction, TransactionInput } from "./types.js";

export const REVIEW_CONFIDENCE_THRESHOLD = 0.7;
export const DEFAULT_CONFIDENCE = 0.3;

interface CompiledPatternRule {
  matcher: RegExp;
  classification: Classification;
}

const compiledRuleCache = new WeakMap<ClassificationRuleSet, CompiledPatternRule[]>();

function compilePatterns(rules: ClassificationRuleSet): CompiledPatternRule[] {
  const cached = compiledRuleCache.get(rules);
  if (cached) {
    return cached;
  }

  const compiled = rules.patterns.map((rule, index) => {
    let matcher: RegExp;
    try {
      matcher = new RegExp(rule.pattern, "i");
    } catch {
      throw configurationError(`Classification rule ${index} has an invalid pattern.`, { pattern: rule.pattern });
    }

    return {
      matcher,
      classification: { category: rule.category, subcategory: rule.subcategory, confidence: rule.confidence }
    };
  });

  compiledRuleCache.set(rules, compiled);
  return compiled;
}

function matchesAmountRule(rule: AmountRule, amount: number): boolean {
  const magnitude = Math.abs(amount);
  return rule.bound === "min" ? magnitude >= rule.value : magnitude <= rule.value;
}

export function classify(description: string, amount: number, rules: ClassificationRuleSet): Classification {
  if (description.trim().length === 0) {
    throw invalidInput("Transaction description must not be empty.");
  }
  if (!Number.isFinite(amount)) {
    throw invalidInput("Transaction amount must be a finite number.", { amount });
  }

  for (const rule of compilePatterns(rules)) {
    if (rule.matcher.test(description)) {
      return { ...rule.classification };
    }
  }

  const amountRule = rules.amountRules.find((rule) => matchesAmountRule(rule, amount));
  if (amountRule) {
    return { category: amountRule.category, subcategory: amountRule.subcategory, confidence: amountRule.confidence };
  }

  return amount > 0
    ? { category: "Income", subcategory: "Unclassified Income", confidence: DEFAULT_CONFIDENCE }
    : { category: "Expenses", subcategory: "Unclassified Expenses", confidence: DEFAULT_CONFIDENCE };
}

export function classifyTransaction(transaction: TransactionInput, rules: ClassificationRuleSet): ClassifiedTransaction {
  const classification = classify(transaction.description, transaction.amount, rules);

  return {
    ...transaction,
    ...classification,
    type: transaction.amount < 0 ? "debit" : "credit",
    needsReview: classification.confidence < REVIEW_CONFIDENCE_THRESHOLD
  };
}
