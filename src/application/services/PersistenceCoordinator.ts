import type { Logger } from 'winston';
import type { Classification } from '../../domain/entities/Classification.js';
import type { ImportedFile } from '../../domain/entities/ImportedFile.js';
import { emptyTally, type RecordTallyDTO } from '../dto/ImportOutcomeDTO.js';
import { EnrichmentFailure } from '../errors/IngestionErrors.js';
import type { RecurringDetectorPort } from '../ports/RecurringDetectorPort.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { DeduplicationService } from './DeduplicationService.js';
import type { RoutedDocument } from './DocumentRouter.js';

export interface CommitResult {
  inserted: RecordTallyDTO;
  duplicates: RecordTallyDTO;
}

export interface RecurringResult {
  series: number;
  flagged: number;
  failures: EnrichmentFailure[];
}

/**
 * Owns the unit of work for one document: dedupe, insert, then mark the file imported.
 * Nothing is visible to the store unless all of it commits.
 */
export class PersistenceCoordinator {
  private readonly deduplication: DeduplicationService;

  constructor(
    private readonly storage: StoragePort,
    private readonly recurringDetector: RecurringDetectorPort,
    private readonly logger: Logger,
  ) {
    this.deduplication = new DeduplicationService(storage);
  }

  commit(document: RoutedDocument, file: Omit<ImportedFile, 'recordCount'>): CommitResult {
    return this.storage.runInTransaction(() => {
      const plan = this.deduplication.plan(document);
      const inserted = emptyTally();

      for (const { key, record } of plan.investmentAccounts) {
        const accountId = this.storage.insertInvestmentAccount(record, key);
        for (const holding of record.holdings) {
          this.storage.insertHolding(accountId, holding);
        }
        for (const txn of record.transactions) {
          this.storage.insertInvestmentTransaction(accountId, txn);
        }
        inserted.investmentAccounts += 1;
      }

      for (const { key, record } of plan.taxDocuments) {
        this.storage.insertTaxDocument(record, key);
        inserted.taxDocuments += 1;
      }
      for (const { key, record } of plan.paystubs) {
        this.storage.insertPaystub(record, key);
        inserted.paystubs += 1;
      }
      for (const { key, record } of plan.balances) {
        this.storage.insertBalance(record, key);
        inserted.balances += 1;
      }
      for (const { key, record } of plan.transactions) {
        this.storage.insertTransaction(record, key);
        inserted.transactions += 1;
      }

      this.storage.recordImportedFile({
        ...file,
        recordCount:
          inserted.investmentAccounts + inserted.taxDocuments + inserted.paystubs + inserted.balances + inserted.transactions,
      });

      return { inserted, duplicates: plan.duplicates };
    });
  }

  /**
   * Flags recurring expenses per account. Runs after the primary commit; a failure for one
   * account is logged and returned, never thrown.
   */
  detectRecurring(accounts: Classification[], sourceFile: string): RecurringResult {
    const result: RecurringResult = { series: 0, flagged: 0, failures: [] };

    for (const account of accounts) {
      try {
        const { series, flagged } = this.storage.runInTransaction(() => {
          const detected = this.recurringDetector.detect(this.storage.loadAccountTransactions(account));
          const ids = detected.flatMap((entry) => entry.transactionIds);
          return { series: detected.length, flagged: this.storage.markTransactionsRecurring(ids) };
        });
        result.series += series;
        result.flagged += flagged;
      } catch (error) {
        const failure = new EnrichmentFailure('recurring_detection', sourceFile, error);
        this.logger.error(failure.message, {
          sourceFile,
          bankName: account.bankName,
          accountType: account.accountType,
          error,
        });
        result.failures.push(failure);
      }
    }

    if (result.flagged > 0) {
      this.logger.info('Recurring transactions flagged', { sourceFile, series: result.series, flagged: result.flagged });
    }

    return result;
  }
}
