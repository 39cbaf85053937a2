import type { AccountClassifierPort } from '../../../application/ports/AccountClassifierPort.js';
import bankRuleData from '../../../domain/data/bank-rules.json' with { type: 'json' };
import { UNKNOWN_BANK, type AccountType, type Classification } from '../../../domain/entities/Classification.js';
import { normalizeFileName } from '../extractors/FieldPatterns.js';

interface Rule<T> {
  test: (input: string) => boolean;
  value: T;
}

const bankRules: Rule<string>[] = bankRuleData.map((entry) => {
  const pattern = new RegExp(entry.pattern, 'i');
  return { test: (input) => pattern.test(input), value: entry.bankName };
});

// Order matters: the IRA rules must run before the generic investment rule.
const accountTypeRules: Rule<AccountType>[] = [
  { test: (input) => /\broth\s*ira\b/i.test(input), value: 'roth_ira' },
  {
    test: (input) => /\b(?:rollover|traditional)\s*ira\b|\bira\s+account\b/i.test(input),
    value: 'traditional_ira',
  },
  {
    test: (input) => /\bbrokerage\b|\binvestment\s+account\b|\bindividual\s+(?:taxable|investment)\b/i.test(input),
    value: 'investment_account',
  },
  {
    test: (input) =>
      /\bcredit\s*card\b|\bcredit\s+limit\b|\bavailable\s+credit\b|\bminimum\s+payment\b|\bcard\s*member\b/i.test(input),
    value: 'credit_card',
  },
  { test: (input) => /\bsavings\b/i.test(input), value: 'savings' },
  { test: (input) => /\bchecking\b/i.test(input), value: 'checking' },
];

const resolve = <T>(rules: Rule<T>[], fileName: string, text: string): T | undefined =>
  rules.find((rule) => rule.test(fileName))?.value ?? rules.find((rule) => rule.test(text))?.value;

/**
 * Resolves the issuing bank and account type. Every rule list is tried against the
 * filename before the document text; the first match wins and misses become `unknown`.
 */
export class RuleBasedAccountClassifier implements AccountClassifierPort {
  classify(fileName: string, text: string): Classification {
    const name = normalizeFileName(fileName);

    return {
      bankName: resolve(bankRules, name, text) ?? UNKNOWN_BANK,
      accountType: resolve(accountTypeRules, name, text) ?? 'unknown',
    };
  }
}
