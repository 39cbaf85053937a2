import type { AccountType } from './Classification.js';

export interface AccountBalance {
  id?: number;
  statementDate?: string; // ISO date
  balance: number;
  creditLimit?: number;
  availableCredit?: number;
  minimumPayment?: number;
  paymentDueDate?: string; // ISO date
  apr?: number;
  bankName: string;
  accountType: AccountType;
  sourceFile: string;
}
