import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StoreUnavailableError } from '../../../application/errors/IngestionErrors.js';
import type { Transaction } from '../../../domain/entities/Transaction.js';
import { SqliteStorageAdapter } from './SqliteStorageAdapter.js';

const transaction = (overrides: Partial<Transaction> = {}): Transaction => ({
  date: '2024-01-15',
  amount: -45.67,
  description: 'AMAZON MKTPLACE PMTS',
  merchant: 'Amazon',
  bankName: 'Chase',
  accountType: 'credit_card',
  sourceFile: 'chase-jan.pdf',
  isRecurring: false,
  ...overrides,
});

describe('SqliteStorageAdapter', () => {
  let storage: SqliteStorageAdapter;

  beforeEach(() => {
    storage = new SqliteStorageAdapter(':memory:');
  });

  afterEach(() => {
    storage.close();
  });

  it('round-trips transactions and reports their dedupe keys', () => {
    const id = storage.insertTransaction(transaction({ category: 'Shopping' }), 'key-1');

    expect(storage.hasRecordKey('transaction', 'key-1')).toBe(true);
    expect(storage.hasRecordKey('transaction', 'key-2')).toBe(false);
    expect(storage.hasRecordKey('balance', 'key-1')).toBe(false);
    expect(storage.listTransactions({})).toEqual([
      {
        id,
        date: '2024-01-15',
        amount: -45.67,
        description: 'AMAZON MKTPLACE PMTS',
        merchant: 'Amazon',
        category: 'Shopping',
        bankName: 'Chase',
        accountType: 'credit_card',
        sourceFile: 'chase-jan.pdf',
        isRecurring: false,
      },
    ]);
  });

  it('keeps the sub-category and confidence of a categorized transaction', () => {
    storage.insertTransaction(
      transaction({ category: 'Entertainment', subCategory: 'Streaming Services', categoryConfidence: 0.75 }),
      'key-1',
    );

    expect(storage.listTransactions({})[0]).toMatchObject({
      category: 'Entertainment',
      subCategory: 'Streaming Services',
      categoryConfidence: 0.75,
    });
  });

  it('rejects a second row with the same dedupe key', () => {
    storage.insertTransaction(transaction(), 'key-1');
    expect(() => storage.insertTransaction(transaction({ sourceFile: 'other.pdf' }), 'key-1')).toThrow();
  });

  it('filters transactions by date range, account and recurring flag', () => {
    storage.insertTransaction(transaction({ date: '2024-01-05' }), 'a');
    const febId = storage.insertTransaction(transaction({ date: '2024-02-05', isRecurring: true }), 'b');
    storage.insertTransaction(transaction({ date: '2024-03-05', bankName: 'Citi' }), 'c');

    expect(storage.listTransactions({ startDate: '2024-02-01' }).map((txn) => txn.date)).toEqual([
      '2024-02-05',
      '2024-03-05',
    ]);
    expect(storage.listTransactions({ bankName: 'Chase', endDate: '2024-01-31' }).map((txn) => txn.date)).toEqual([
      '2024-01-05',
    ]);
    expect(storage.listTransactions({ isRecurring: true }).map((txn) => txn.id)).toEqual([febId]);
  });

  it('rolls back every write when the unit of work throws', () => {
    expect(() =>
      storage.runInTransaction(() => {
        storage.insertTransaction(transaction(), 'a');
        storage.insertTransaction(transaction({ date: '2024-01-16' }), 'b');
        throw new Error('boom');
      }),
    ).toThrow('boom');

    expect(storage.listTransactions({})).toEqual([]);
  });

  it('undoes only the inner unit of work when a nested one throws', () => {
    storage.runInTransaction(() => {
      storage.insertTransaction(transaction(), 'outer');
      expect(() =>
        storage.runInTransaction(() => {
          storage.insertTransaction(transaction({ date: '2024-01-16' }), 'inner');
          throw new Error('inner failed');
        }),
      ).toThrow('inner failed');
    });

    expect(storage.listTransactions({}).map((txn) => txn.date)).toEqual(['2024-01-15']);
  });

  it('upserts imported files', () => {
    const file = {
      fileIdentity: 'sha256:abc',
      sourcePath: '/in/chase.pdf',
      sourceFile: 'chase.pdf',
      documentKind: 'statement' as const,
      recordCount: 3,
      unclassified: false,
      importedAt: '2024-02-01T00:00:00.000Z',
    };
    storage.recordImportedFile(file);
    storage.recordImportedFile({ ...file, recordCount: 5, importedAt: '2024-03-01T00:00:00.000Z' });

    expect(storage.findImportedFile('sha256:abc')).toEqual({
      ...file,
      recordCount: 5,
      importedAt: '2024-03-01T00:00:00.000Z',
    });
    expect(storage.findImportedFile('sha256:missing')).toBeNull();
    expect(storage.listImportedFiles()).toHaveLength(1);
  });

  it('stores investment accounts with their holdings and transactions', () => {
    const account = {
      bankName: 'Fidelity',
      accountType: 'roth_ira' as const,
      portfolioValue: 12500,
      statementDate: '2024-03-31',
      sourceFile: 'fidelity-q1.pdf',
      holdings: [],
      transactions: [],
    };
    const accountId = storage.insertInvestmentAccount(account, 'inv-1');
    storage.insertHolding(accountId, { ticker: 'VTI', name: 'Vanguard Total Stock Market', quantity: 10, value: 2500 });
    storage.insertInvestmentTransaction(accountId, { date: '2024-03-15', type: 'dividend', ticker: 'VTI', amount: 12.5 });

    expect(storage.listInvestmentAccounts()).toEqual([
      {
        id: accountId,
        bankName: 'Fidelity',
        accountType: 'roth_ira',
        portfolioValue: 12500,
        statementDate: '2024-03-31',
        sourceFile: 'fidelity-q1.pdf',
        holdings: [{ ticker: 'VTI', name: 'Vanguard Total Stock Market', quantity: 10, value: 2500 }],
        transactions: [
          {
            date: '2024-03-15',
            type: 'dividend',
            ticker: 'VTI',
            quantity: undefined,
            price: undefined,
            amount: 12.5,
          },
        ],
      },
    ]);
  });

  it('keeps paystub deductions and tax fields as amount maps', () => {
    storage.insertPaystub(
      {
        payDate: '2024-01-31',
        gross: 5000,
        net: 3800,
        deductions: { federal_tax: 700, social_security: 310 },
        bankName: 'unknown',
        accountType: 'unknown',
        sourceFile: 'stub.pdf',
      },
      'stub-1',
    );
    storage.insertTaxDocument(
      {
        taxYear: 2023,
        formKind: '1099-DIV',
        fields: { ordinary_dividends: 420.5 },
        bankName: 'Vanguard',
        accountType: 'investment_account',
        sourceFile: '1099-div.pdf',
      },
      'tax-1',
    );

    expect(storage.listPaystubs()[0]?.deductions).toEqual({ federal_tax: 700, social_security: 310 });
    expect(storage.listPaystubs()[0]?.regularHours).toBeUndefined();
    expect(storage.listTaxDocuments(2023)[0]?.fields).toEqual({ ordinary_dividends: 420.5 });
    expect(storage.listTaxDocuments(2022)).toEqual([]);
  });

  it('stores paystub hours, rates, bonus and commission', () => {
    storage.insertPaystub(
      {
        payDate: '2024-03-15',
        gross: 2956.25,
        regularHours: 80,
        overtimeHours: 5.5,
        regularRate: 25,
        overtimeRate: 37.5,
        bonus: 500,
        commission: 250,
        deductions: {},
        bankName: 'unknown',
        accountType: 'unknown',
        sourceFile: 'march.pdf',
      },
      'stub-1',
    );

    expect(storage.listPaystubs()[0]).toMatchObject({
      regularHours: 80,
      overtimeHours: 5.5,
      regularRate: 25,
      overtimeRate: 37.5,
      bonus: 500,
      commission: 250,
    });
  });

  it('marks recurring transactions once and counts statistics', () => {
    const first = storage.insertTransaction(transaction({ date: '2024-01-01' }), 'a');
    const second = storage.insertTransaction(transaction({ date: '2024-02-01' }), 'b');
    storage.insertBalance(
      { statementDate: '2024-01-31', balance: 1200, bankName: 'Chase', accountType: 'credit_card', sourceFile: 'chase-jan.pdf' },
      'bal-1',
    );

    expect(storage.markTransactionsRecurring([first, second])).toBe(2);
    expect(storage.markTransactionsRecurring([first])).toBe(0);
    expect(storage.loadAccountTransactions({ bankName: 'Chase', accountType: 'credit_card' })).toHaveLength(2);
    expect(storage.getStatistics()).toEqual({
      importedFiles: 0,
      unclassifiedFiles: 0,
      transactions: 2,
      recurringTransactions: 2,
      balances: 1,
      investmentAccounts: 0,
      holdings: 0,
      investmentTransactions: 0,
      paystubs: 0,
      taxDocuments: 0,
      earliestTransactionDate: '2024-01-01',
      latestTransactionDate: '2024-02-01',
    });
  });

  it('raises StoreUnavailableError when the database cannot be opened', () => {
    expect(() => new SqliteStorageAdapter('/nonexistent-dir/for-sure/ledger.db')).toThrow(StoreUnavailableError);
  });
});

describe('SqliteStorageAdapter on disk', () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-store-'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('writes committed records to the file and reads them back after reopening', () => {
    const location = path.join(directory, 'ledger.db');
    const first = new SqliteStorageAdapter(location);
    first.runInTransaction(() => first.insertTransaction(transaction(), 'key-1'));
    first.close();

    const reopened = new SqliteStorageAdapter(location);
    expect(reopened.hasRecordKey('transaction', 'key-1')).toBe(true);
    expect(reopened.listTransactions({}).map((txn) => txn.description)).toEqual(['AMAZON MKTPLACE PMTS']);
    reopened.close();
  });

  it('leaves nothing on disk from a unit of work that threw', () => {
    const location = path.join(directory, 'ledger.db');
    const first = new SqliteStorageAdapter(location);
    expect(() =>
      first.runInTransaction(() => {
        first.insertTransaction(transaction(), 'key-1');
        throw new Error('parse failed');
      }),
    ).toThrow('parse failed');
    first.close();

    const reopened = new SqliteStorageAdapter(location);
    expect(reopened.getStatistics().transactions).toBe(0);
    reopened.close();
  });
});
