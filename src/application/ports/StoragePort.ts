import type { AccountBalance } from '../../domain/entities/AccountBalance.js';
import type { Classification } from '../../domain/entities/Classification.js';
import type { ImportedFile } from '../../domain/entities/ImportedFile.js';
import type { Holding, InvestmentAccount, InvestmentTransaction } from '../../domain/entities/InvestmentAccount.js';
import type { Paystub } from '../../domain/entities/Paystub.js';
import type { TaxDocument } from '../../domain/entities/TaxDocument.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import type { BalanceFilterDTO, StoreStatisticsDTO, TransactionFilterDTO } from '../dto/RecordQueryDTO.js';

export type RecordKind = 'transaction' | 'balance' | 'investment_account' | 'paystub' | 'tax_document';

/**
 * Synchronous store contract. Every write made inside `runInTransaction` commits or
 * rolls back together; a nested call runs as a savepoint inside the outer one.
 */
export interface StoragePort {
  runInTransaction<T>(work: () => T): T;

  findImportedFile(fileIdentity: string): ImportedFile | null;
  recordImportedFile(file: ImportedFile): void;
  hasRecordKey(kind: RecordKind, dedupeKey: string): boolean;

  insertTransaction(transaction: Transaction, dedupeKey: string): number;
  insertBalance(balance: AccountBalance, dedupeKey: string): number;
  insertInvestmentAccount(account: InvestmentAccount, dedupeKey: string): number;
  insertHolding(investmentAccountId: number, holding: Holding): number;
  insertInvestmentTransaction(investmentAccountId: number, transaction: InvestmentTransaction): number;
  insertPaystub(paystub: Paystub, dedupeKey: string): number;
  insertTaxDocument(document: TaxDocument, dedupeKey: string): number;

  loadAccountTransactions(account: Classification): Transaction[];
  markTransactionsRecurring(transactionIds: number[]): number;

  listTransactions(filter: TransactionFilterDTO): Transaction[];
  listBalances(filter: BalanceFilterDTO): AccountBalance[];
  listPaystubs(): Paystub[];
  listTaxDocuments(taxYear?: number): TaxDocument[];
  listInvestmentAccounts(): InvestmentAccount[];
  listImportedFiles(): ImportedFile[];
  getStatistics(): StoreStatisticsDTO;

  close(): void;
}
