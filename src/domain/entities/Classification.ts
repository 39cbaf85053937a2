export const ACCOUNT_TYPES = [
  'credit_card',
  'checking',
  'savings',
  'roth_ira',
  'traditional_ira',
  'investment_account',
  'unknown',
] as const;

export type AccountType = (typeof ACCOUNT_TYPES)[number];

export const DOCUMENT_KINDS = ['tax', 'paystub', 'investment', 'statement', 'unclassified'] as const;

export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

export const UNKNOWN_BANK = 'unknown';

const investmentAccountTypes: ReadonlySet<AccountType> = new Set<AccountType>([
  'roth_ira',
  'traditional_ira',
  'investment_account',
]);

export interface Classification {
  bankName: string;
  accountType: AccountType;
}

export const isInvestmentAccountType = (accountType: AccountType): boolean => investmentAccountTypes.has(accountType);

export const isUnrecognized = (classification: Classification): boolean =>
  classification.bankName === UNKNOWN_BANK && classification.accountType === 'unknown';
