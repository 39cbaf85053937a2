import type { CategorizedTransactionDTO } from '../dto/CategorizedTransactionDTO.js';

export interface CategorizationInput {
  recordKey: string;
  description: string;
  merchant?: string;
  amount: number;
}

export interface CategorizerPort {
  categorize(transactions: CategorizationInput[]): Record<string, CategorizedTransactionDTO>;
}
