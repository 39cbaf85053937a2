import { z } from 'zod';

export const CategorizedTransactionSchema = z.object({
  recordKey: z.string(),
  category: z.string(),
  subCategory: z.string().optional(),
  confidence: z.number().min(0).max(1),
});

export type CategorizedTransactionDTO = z.infer<typeof CategorizedTransactionSchema>;
