import type { AccountType } from './Classification.js';

export interface Paystub {
  id?: number;
  payDate?: string; // ISO date
  payPeriodStart?: string;
  payPeriodEnd?: string;
  employerName?: string;
  gross?: number;
  regularHours?: number;
  overtimeHours?: number;
  regularRate?: number;
  overtimeRate?: number;
  bonus?: number;
  commission?: number;
  net?: number;
  deductions: Record<string, number>;
  totalDeductions?: number;
  ytdGross?: number;
  ytdNet?: number;
  ytdTaxes?: number;
  bankName: string;
  accountType: AccountType;
  sourceFile: string;
}
