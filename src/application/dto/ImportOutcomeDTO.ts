import { z } from 'zod';
import { DOCUMENT_KINDS } from '../../domain/entities/Classification.js';

export const RecordTallySchema = z.object({
  transactions: z.number().int().nonnegative(),
  balances: z.number().int().nonnegative(),
  investmentAccounts: z.number().int().nonnegative(),
  paystubs: z.number().int().nonnegative(),
  taxDocuments: z.number().int().nonnegative(),
});

export type RecordTallyDTO = z.infer<typeof RecordTallySchema>;

export const ImportOutcomeSchema = z.object({
  fileIdentity: z.string(),
  sourceFile: z.string(),
  status: z.enum(['imported', 'skipped', 'failed']),
  documentKind: z.enum(DOCUMENT_KINDS).optional(),
  unclassified: z.boolean(),
  inserted: RecordTallySchema,
  duplicates: RecordTallySchema,
  enrichment: z.enum(['ok', 'partial', 'not_run']),
  error: z.string().optional(),
});

export type ImportOutcomeDTO = z.infer<typeof ImportOutcomeSchema>;

export const emptyTally = (): RecordTallyDTO => ({
  transactions: 0,
  balances: 0,
  investmentAccounts: 0,
  paystubs: 0,
  taxDocuments: 0,
});

export const sumTally = (tally: RecordTallyDTO): number =>
  tally.transactions + tally.balances + tally.investmentAccounts + tally.paystubs + tally.taxDocuments;
