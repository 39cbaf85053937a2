import type { AccountType } from './Classification.js';

export const TAX_FORM_KINDS = ['1099-INT', '1099-DIV', '1099-B', 'W-2'] as const;

export type TaxFormKind = (typeof TAX_FORM_KINDS)[number];

export interface TaxDocument {
  id?: number;
  taxYear: number;
  formKind: TaxFormKind;
  payerName?: string;
  fields: Record<string, number>;
  bankName: string;
  accountType: AccountType;
  sourceFile: string;
}
