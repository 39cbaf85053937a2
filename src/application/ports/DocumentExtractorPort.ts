import type { AccountBalance } from '../../domain/entities/AccountBalance.js';
import type { Classification } from '../../domain/entities/Classification.js';
import type { InvestmentAccount } from '../../domain/entities/InvestmentAccount.js';
import type { Paystub } from '../../domain/entities/Paystub.js';
import type { TaxDocument } from '../../domain/entities/TaxDocument.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import type { TabularRowDTO } from '../dto/DocumentInputDTO.js';

export interface ExtractionSource {
  text: string;
  rows?: TabularRowDTO[];
  sourceFile: string;
}

export interface ExtractedRecordMap {
  tax: TaxDocument;
  paystub: Paystub;
  investment: InvestmentAccount;
  balance: AccountBalance;
  transaction: Transaction;
}

export type ExtractorKind = keyof ExtractedRecordMap;

/** Extractors return `[]` when nothing matches; they do not throw on malformed input. */
export interface DocumentExtractorPort<K extends ExtractorKind> {
  readonly kind: K;
  extract(source: ExtractionSource, classification: Classification): Array<ExtractedRecordMap[K]>;
}

export type ExtractorSet = { [K in ExtractorKind]: DocumentExtractorPort<K> };
