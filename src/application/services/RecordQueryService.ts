import type { AccountBalance } from '../../domain/entities/AccountBalance.js';
import type { ImportedFile } from '../../domain/entities/ImportedFile.js';
import type { InvestmentAccount } from '../../domain/entities/InvestmentAccount.js';
import type { Paystub } from '../../domain/entities/Paystub.js';
import type { TaxDocument } from '../../domain/entities/TaxDocument.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import type { BalanceFilterDTO, StoreStatisticsDTO, TransactionFilterDTO } from '../dto/RecordQueryDTO.js';
import type { StoragePort } from '../ports/StoragePort.js';

const isNewer = (candidate: AccountBalance, current: AccountBalance): boolean => {
  const candidateDate = candidate.statementDate ?? '';
  const currentDate = current.statementDate ?? '';
  if (candidateDate !== currentDate) {
    return candidateDate > currentDate;
  }
  return (candidate.id ?? 0) > (current.id ?? 0);
};

/** Read side of the store, shaped for exporters and the HTTP API. */
export class RecordQueryService {
  constructor(private readonly storage: StoragePort) {}

  listTransactions(filter: TransactionFilterDTO = {}): Transaction[] {
    return this.storage.listTransactions(filter);
  }

  listBalances(filter: BalanceFilterDTO = {}): AccountBalance[] {
    return this.storage.listBalances(filter);
  }

  // Every statement's balance is stored; exporters usually want only the newest per account.
  listLatestBalances(): AccountBalance[] {
    const latest = new Map<string, AccountBalance>();

    for (const balance of this.storage.listBalances({})) {
      const account = `${balance.bankName}\u0000${balance.accountType}`;
      const current = latest.get(account);
      if (!current || isNewer(balance, current)) {
        latest.set(account, balance);
      }
    }

    return [...latest.values()].sort(
      (a, b) => a.bankName.localeCompare(b.bankName) || a.accountType.localeCompare(b.accountType),
    );
  }

  listPaystubs(): Paystub[] {
    return this.storage.listPaystubs();
  }

  listTaxDocuments(taxYear?: number): TaxDocument[] {
    return this.storage.listTaxDocuments(taxYear);
  }

  listInvestmentAccounts(): InvestmentAccount[] {
    return this.storage.listInvestmentAccounts();
  }

  listImportedFiles(): ImportedFile[] {
    return this.storage.listImportedFiles();
  }

  getStatistics(): StoreStatisticsDTO {
    return this.storage.getStatistics();
  }
}
