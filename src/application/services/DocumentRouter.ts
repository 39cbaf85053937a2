import type { Logger } from 'winston';
import type { AccountBalance } from '../../domain/entities/AccountBalance.js';
import {
  isInvestmentAccountType,
  isUnrecognized,
  type Classification,
} from '../../domain/entities/Classification.js';
import type { InvestmentAccount } from '../../domain/entities/InvestmentAccount.js';
import type { Paystub } from '../../domain/entities/Paystub.js';
import type { TaxDocument } from '../../domain/entities/TaxDocument.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { isWithinRange } from '../../domain/services/DateNormalizer.js';
import type { ExtractionSource, ExtractorSet } from '../ports/DocumentExtractorPort.js';

export type RoutedDocument =
  | { kind: 'tax'; taxDocuments: TaxDocument[] }
  | { kind: 'paystub'; paystubs: Paystub[] }
  | { kind: 'investment'; investmentAccounts: InvestmentAccount[] }
  | { kind: 'statement'; balances: AccountBalance[]; transactions: Transaction[] }
  | { kind: 'unclassified' };

export interface DateWindow {
  start: string;
  end: string;
}

export interface DocumentRouterOptions {
  dateRange?: DateWindow;
}

export const countRoutedRecords = (document: RoutedDocument): number => {
  switch (document.kind) {
    case 'tax':
      return document.taxDocuments.length;
    case 'paystub':
      return document.paystubs.length;
    case 'investment':
      return document.investmentAccounts.length;
    case 'statement':
      return document.balances.length + document.transactions.length;
    case 'unclassified':
      return 0;
  }
};

/**
 * Picks exactly one record family per document. The first branch that yields records wins;
 * later extractors never see a document an earlier one claimed.
 */
export class DocumentRouter {
  constructor(
    private readonly extractors: ExtractorSet,
    private readonly logger: Logger,
    private readonly options: DocumentRouterOptions = {},
  ) {}

  route(source: ExtractionSource, classification: Classification): RoutedDocument {
    const routed = this.resolve(source, classification);
    this.logger.debug('Document routed', {
      sourceFile: source.sourceFile,
      kind: routed.kind,
      records: countRoutedRecords(routed),
    });
    return routed;
  }

  private resolve(source: ExtractionSource, classification: Classification): RoutedDocument {
    const taxDocuments = this.extractors.tax.extract(source, classification);
    if (taxDocuments.length > 0) {
      return { kind: 'tax', taxDocuments };
    }

    const paystubs = this.extractors.paystub.extract(source, classification);
    if (paystubs.length > 0) {
      return { kind: 'paystub', paystubs };
    }

    const investmentAccounts = this.extractors.investment.extract(source, classification);
    if (investmentAccounts.length > 0) {
      return {
        kind: 'investment',
        investmentAccounts: investmentAccounts.map((account) => ({
          ...account,
          // Undated activity is kept.
          transactions: account.transactions.filter((txn) => txn.date === undefined || this.inWindow(txn.date)),
        })),
      };
    }

    const balances = isInvestmentAccountType(classification.accountType)
      ? []
      : this.extractors.balance.extract(source, classification);
    const transactions = this.extractors.transaction
      .extract(source, classification)
      .filter((txn) => this.inWindow(txn.date));

    if (balances.length === 0 && transactions.length === 0 && isUnrecognized(classification)) {
      return { kind: 'unclassified' };
    }

    return { kind: 'statement', balances, transactions };
  }

  private inWindow(isoDate: string): boolean {
    return this.options.dateRange ? isWithinRange(isoDate, this.options.dateRange) : true;
  }
}
