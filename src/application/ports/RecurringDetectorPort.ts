import type { Transaction } from '../../domain/entities/Transaction.js';

export type RecurringCadence = 'weekly' | 'biweekly' | 'monthly' | 'quarterly' | 'yearly';

export interface RecurringSeries {
  merchant: string;
  cadence: RecurringCadence;
  averageAmount: number;
  averageIntervalDays: number;
  transactionIds: number[];
}

export interface RecurringDetectorPort {
  detect(transactions: Transaction[]): RecurringSeries[];
}
