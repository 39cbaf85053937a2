import type { CategorizedTransactionDTO } from '../../../application/dto/CategorizedTransactionDTO.js';
import type { CategorizationInput, CategorizerPort } from '../../../application/ports/CategorizerPort.js';
import categoryRuleData from '../../../domain/data/category-rules.json' with { type: 'json' };

interface Rule {
  test: (input: string) => boolean;
  category: string;
  subCategory?: string;
}

// First match wins, so specific merchants sit above the broad keywords.
const rules: Rule[] = categoryRuleData.map((entry) => {
  const pattern = new RegExp(entry.pattern, 'i');
  return { test: (input) => pattern.test(input), category: entry.category, subCategory: entry.subCategory };
});

export class RuleBasedCategorizer implements CategorizerPort {
  categorize(transactions: CategorizationInput[]): Record<string, CategorizedTransactionDTO> {
    const categorized: Record<string, CategorizedTransactionDTO> = {};

    for (const txn of transactions) {
      const haystack = txn.merchant ? `${txn.merchant} ${txn.description}` : txn.description;
      const rule = rules.find((candidate) => candidate.test(haystack));

      if (rule) {
        categorized[txn.recordKey] = {
          recordKey: txn.recordKey,
          category: rule.category,
          subCategory: rule.subCategory,
          confidence: 0.75,
        };
        continue;
      }

      // Smart default based on amount
      let defaultCategory = 'Other';
      let defaultSubCategory = 'General';
      let confidence = 0.3;

      if (txn.amount > 0) {
        defaultCategory = 'Income';
        defaultSubCategory = 'Other Income';
        confidence = 0.4;
      } else if (Math.abs(txn.amount) > 500) {
        // Large debits are more often bills than purchases.
        defaultCategory = 'Bills & Utilities';
        defaultSubCategory = 'Other Bills';
        confidence = 0.35;
      } else if (txn.amount < 0) {
        defaultCategory = 'Shopping';
        defaultSubCategory = 'General Merchandise';
        confidence = 0.35;
      }

      categorized[txn.recordKey] = {
        recordKey: txn.recordKey,
        category: defaultCategory,
        subCategory: defaultSubCategory,
        confidence,
      };
    }

    return categorized;
  }
}
