import type { AccountBalance } from '../../domain/entities/AccountBalance.js';
import type { InvestmentAccount } from '../../domain/entities/InvestmentAccount.js';
import type { Paystub } from '../../domain/entities/Paystub.js';
import type { TaxDocument } from '../../domain/entities/TaxDocument.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import {
  buildBalanceKey,
  buildInvestmentAccountKey,
  buildPaystubKey,
  buildTaxDocumentKey,
  buildTransactionKey,
} from '../../domain/services/RecordKeys.js';
import { emptyTally, type RecordTallyDTO } from '../dto/ImportOutcomeDTO.js';
import type { RecordKind, StoragePort } from '../ports/StoragePort.js';
import type { RoutedDocument } from './DocumentRouter.js';

export interface KeyedRecord<T> {
  key: string;
  record: T;
}

export interface PersistencePlan {
  taxDocuments: KeyedRecord<TaxDocument>[];
  paystubs: KeyedRecord<Paystub>[];
  investmentAccounts: KeyedRecord<InvestmentAccount>[];
  balances: KeyedRecord<AccountBalance>[];
  transactions: KeyedRecord<Transaction>[];
  duplicates: RecordTallyDTO;
}

/**
 * Splits a routed document into new records and duplicates. A record is a duplicate when
 * its key is already stored or appeared earlier in the same document.
 */
export class DeduplicationService {
  constructor(private readonly storage: StoragePort) {}

  plan(document: RoutedDocument): PersistencePlan {
    const plan: PersistencePlan = {
      taxDocuments: [],
      paystubs: [],
      investmentAccounts: [],
      balances: [],
      transactions: [],
      duplicates: emptyTally(),
    };

    switch (document.kind) {
      case 'tax': {
        const { kept, duplicates } = this.keep('tax_document', document.taxDocuments, buildTaxDocumentKey);
        plan.taxDocuments = kept;
        plan.duplicates.taxDocuments = duplicates;
        break;
      }
      case 'paystub': {
        const { kept, duplicates } = this.keep('paystub', document.paystubs, buildPaystubKey);
        plan.paystubs = kept;
        plan.duplicates.paystubs = duplicates;
        break;
      }
      case 'investment': {
        const { kept, duplicates } = this.keep('investment_account', document.investmentAccounts, buildInvestmentAccountKey);
        plan.investmentAccounts = kept;
        plan.duplicates.investmentAccounts = duplicates;
        break;
      }
      case 'statement': {
        const balances = this.keep('balance', document.balances, buildBalanceKey);
        const transactions = this.keep('transaction', document.transactions, buildTransactionKey);
        plan.balances = balances.kept;
        plan.transactions = transactions.kept;
        plan.duplicates.balances = balances.duplicates;
        plan.duplicates.transactions = transactions.duplicates;
        break;
      }
      case 'unclassified':
        break;
    }

    return plan;
  }

  private keep<T>(kind: RecordKind, records: T[], keyOf: (record: T) => string): { kept: KeyedRecord<T>[]; duplicates: number } {
    const seen = new Set<string>();
    const kept: KeyedRecord<T>[] = [];

    for (const record of records) {
      const key = keyOf(record);
      if (seen.has(key) || this.storage.hasRecordKey(kind, key)) {
        continue;
      }
      seen.add(key);
      kept.push({ key, record });
    }

    return { kept, duplicates: records.length - kept.length };
  }
}
