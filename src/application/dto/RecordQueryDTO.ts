import { z } from 'zod';
import { ACCOUNT_TYPES } from '../../domain/entities/Classification.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

const booleanFlag = z.union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')]);

export const TransactionFilterSchema = z.object({
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
  category: z.string().min(1).optional(),
  bankName: z.string().min(1).optional(),
  accountType: z.enum(ACCOUNT_TYPES).optional(),
  isRecurring: booleanFlag.optional(),
});

export type TransactionFilterDTO = z.infer<typeof TransactionFilterSchema>;

export const BalanceFilterSchema = TransactionFilterSchema.pick({
  startDate: true,
  endDate: true,
  bankName: true,
  accountType: true,
});

export type BalanceFilterDTO = z.infer<typeof BalanceFilterSchema>;

export const TaxDocumentFilterSchema = z.object({
  taxYear: z.coerce.number().int().min(1900).max(2100).optional(),
});

export type TaxDocumentFilterDTO = z.infer<typeof TaxDocumentFilterSchema>;

export interface StoreStatisticsDTO {
  importedFiles: number;
  unclassifiedFiles: number;
  transactions: number;
  recurringTransactions: number;
  balances: number;
  investmentAccounts: number;
  holdings: number;
  investmentTransactions: number;
  paystubs: number;
  taxDocuments: number;
  earliestTransactionDate: string | null;
  latestTransactionDate: string | null;
}
