import type { AccountType } from './Classification.js';

export interface Transaction {
  id?: number;
  date: string; // ISO date
  amount: number;
  description: string;
  merchant?: string;
  category?: string;
  subCategory?: string;
  categoryConfidence?: number;
  bankName: string;
  accountType: AccountType;
  sourceFile: string;
  isRecurring: boolean;
}
