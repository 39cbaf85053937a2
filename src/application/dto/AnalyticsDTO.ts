import { z } from 'zod';
import { TransactionFilterSchema } from './RecordQueryDTO.js';

export const DateRangeSchema = TransactionFilterSchema.pick({ startDate: true, endDate: true });

export type DateRangeDTO = z.infer<typeof DateRangeSchema>;

export const MonthlySummaryQuerySchema = z.object({
  year: z.coerce.number().int().min(1900).max(2100).optional(),
});

export const TopMerchantsQuerySchema = DateRangeSchema.extend({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const SpendingTrendsQuerySchema = z.object({
  months: z.coerce.number().int().min(1).max(120).default(12),
  category: z.string().min(1).optional(),
});

export type SpendingTrendsQueryDTO = z.infer<typeof SpendingTrendsQuerySchema>;

export const DebtPayoffQuerySchema = z.object({
  monthlyPayment: z.coerce.number().positive(),
});

export interface MonthlySummaryDTO {
  month: string; // YYYY-MM
  transactionCount: number;
  income: number;
  spending: number;
  net: number;
  averageTransaction: number;
}

export interface CategorySpendingDTO {
  category: string;
  transactionCount: number;
  totalSpending: number;
  averageTransaction: number;
  percentage: number;
}

export interface MerchantSpendingDTO {
  merchant: string;
  transactionCount: number;
  totalSpending: number;
  averageTransaction: number;
  firstTransaction: string;
  lastTransaction: string;
}

export interface SpendingTrendDTO {
  month: string;
  spending: number;
  change: {
    amount: number;
    percent: number;
    direction: 'up' | 'down' | 'stable';
  } | null;
}
