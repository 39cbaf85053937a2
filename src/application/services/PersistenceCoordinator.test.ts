import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { InvestmentAccount } from '../../domain/entities/InvestmentAccount.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { CadenceRecurringDetector } from '../../infrastructure/adapters/recurring/CadenceRecurringDetector.js';
import { SqliteStorageAdapter } from '../../infrastructure/adapters/storage/SqliteStorageAdapter.js';
import { createSilentLogger } from '../../infrastructure/logging/Logger.js';
import { DeduplicationService } from './DeduplicationService.js';
import { PersistenceCoordinator } from './PersistenceCoordinator.js';

const file = {
  fileIdentity: 'sha256:abc',
  sourcePath: '/in/fidelity.pdf',
  sourceFile: 'fidelity.pdf',
  documentKind: 'investment' as const,
  unclassified: false,
  importedAt: '2024-04-01T00:00:00.000Z',
};

const account: InvestmentAccount = {
  bankName: 'Fidelity',
  accountType: 'roth_ira',
  portfolioValue: 12500,
  statementDate: '2024-03-31',
  sourceFile: 'fidelity.pdf',
  holdings: [
    { ticker: 'VTI', name: 'Vanguard Total Stock Market ETF', quantity: 10, value: 2500 },
    { ticker: 'BND', name: 'Vanguard Total Bond Market ETF', quantity: 100, value: 10000 },
  ],
  transactions: [{ date: '2024-03-15', type: 'contribution', amount: 500 }],
};

const charge = (date: string): Transaction => ({
  date,
  amount: -9.99,
  description: 'SPOTIFY USA',
  merchant: 'Spotify',
  bankName: 'Citi',
  accountType: 'credit_card',
  sourceFile: 'citi.pdf',
  isRecurring: false,
});

describe('PersistenceCoordinator', () => {
  let storage: SqliteStorageAdapter;
  let coordinator: PersistenceCoordinator;

  beforeEach(() => {
    storage = new SqliteStorageAdapter(':memory:');
    coordinator = new PersistenceCoordinator(storage, new CadenceRecurringDetector(), createSilentLogger());
  });

  afterEach(() => {
    storage.close();
  });

  it('writes the account, its children and the imported file together', () => {
    const result = coordinator.commit({ kind: 'investment', investmentAccounts: [account] }, file);

    expect(result.inserted.investmentAccounts).toBe(1);
    expect(storage.getStatistics()).toMatchObject({ investmentAccounts: 1, holdings: 2, investmentTransactions: 1 });
    expect(storage.findImportedFile('sha256:abc')?.recordCount).toBe(1);
  });

  it('counts a repeated statement as a duplicate', () => {
    coordinator.commit({ kind: 'investment', investmentAccounts: [account] }, file);
    const again = coordinator.commit({ kind: 'investment', investmentAccounts: [account] }, file);

    expect(again.inserted.investmentAccounts).toBe(0);
    expect(again.duplicates.investmentAccounts).toBe(1);
    expect(storage.getStatistics().holdings).toBe(2);
  });

  it('flags recurring charges per account after commit', () => {
    coordinator.commit(
      { kind: 'statement', balances: [], transactions: [charge('2024-01-03'), charge('2024-02-03'), charge('2024-03-03')] },
      { ...file, documentKind: 'statement' },
    );

    const result = coordinator.detectRecurring([{ bankName: 'Citi', accountType: 'credit_card' }], 'citi.pdf');

    expect(result).toEqual({ series: 1, flagged: 3, failures: [] });
    expect(storage.listTransactions({ isRecurring: true })).toHaveLength(3);
  });

  it('collects a failing detector as an enrichment failure', () => {
    const failing = new PersistenceCoordinator(
      storage,
      {
        detect: () => {
          throw new Error('boom');
        },
      },
      createSilentLogger(),
    );

    const result = failing.detectRecurring([{ bankName: 'Citi', accountType: 'credit_card' }], 'citi.pdf');

    expect(result.flagged).toBe(0);
    expect(result.failures.map((failure) => failure.message)).toEqual(['recurring_detection failed for citi.pdf: boom']);
  });
});

describe('DeduplicationService', () => {
  it('collapses repeats inside one document and skips stored keys', () => {
    const storage = new SqliteStorageAdapter(':memory:');
    const deduplication = new DeduplicationService(storage);
    const coordinator = new PersistenceCoordinator(storage, new CadenceRecurringDetector(), createSilentLogger());
    coordinator.commit({ kind: 'statement', balances: [], transactions: [charge('2024-01-03')] }, { ...file, documentKind: 'statement' });

    const plan = deduplication.plan({
      kind: 'statement',
      balances: [],
      transactions: [charge('2024-01-03'), charge('2024-02-03'), charge('2024-02-03')],
    });

    expect(plan.transactions.map(({ record }) => record.date)).toEqual(['2024-02-03']);
    expect(plan.duplicates.transactions).toBe(2);
    storage.close();
  });
});
