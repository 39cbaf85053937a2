import { z } from 'zod';

export const TabularRowSchema = z.record(z.union([z.string(), z.number(), z.null()]));

export type TabularRowDTO = z.infer<typeof TabularRowSchema>;

export const DocumentInputSchema = z
  .object({
    fileIdentity: z.string().min(1),
    fileName: z.string().min(1),
    sourcePath: z.string().min(1),
    text: z.string().optional(),
    rows: z.array(TabularRowSchema).optional(),
  })
  .refine((input) => input.text !== undefined || input.rows !== undefined, {
    message: 'Document input requires text or rows',
  });

export type DocumentInputDTO = z.infer<typeof DocumentInputSchema>;
