import type { AccountType } from './Classification.js';

export const INVESTMENT_TRANSACTION_TYPES = ['buy', 'sell', 'dividend', 'contribution', 'withdrawal'] as const;

export type InvestmentTransactionType = (typeof INVESTMENT_TRANSACTION_TYPES)[number];

export interface Holding {
  ticker?: string;
  name: string;
  quantity: number;
  value: number;
}

export interface InvestmentTransaction {
  date?: string; // ISO date
  type: InvestmentTransactionType;
  ticker?: string;
  quantity?: number;
  price?: number;
  amount: number;
}

export interface InvestmentAccount {
  id?: number;
  bankName: string;
  accountType: AccountType;
  portfolioValue?: number;
  statementDate?: string; // ISO date
  sourceFile: string;
  holdings: Holding[];
  transactions: InvestmentTransaction[];
}
