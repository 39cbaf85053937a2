import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AccountBalance } from '../../domain/entities/AccountBalance.js';
import { SqliteStorageAdapter } from '../../infrastructure/adapters/storage/SqliteStorageAdapter.js';
import { RecordQueryService } from './RecordQueryService.js';

const balance = (overrides: Partial<AccountBalance>): AccountBalance => ({
  statementDate: '2024-01-31',
  balance: 100,
  bankName: 'Chase',
  accountType: 'checking',
  sourceFile: 'chase.pdf',
  ...overrides,
});

describe('RecordQueryService', () => {
  let storage: SqliteStorageAdapter;
  let service: RecordQueryService;

  beforeEach(() => {
    storage = new SqliteStorageAdapter(':memory:');
    service = new RecordQueryService(storage);
  });

  afterEach(() => {
    storage.close();
  });

  it('returns every stored balance but only the newest per account as latest', () => {
    storage.insertBalance(balance({ statementDate: '2024-02-29', balance: 250, sourceFile: 'chase-feb.pdf' }), 'a');
    storage.insertBalance(balance({ statementDate: '2024-01-31', balance: 100, sourceFile: 'chase-jan.pdf' }), 'b');
    storage.insertBalance(
      balance({ statementDate: '2024-02-15', balance: 900, bankName: 'Citi', accountType: 'credit_card' }),
      'c',
    );
    storage.insertBalance(balance({ statementDate: '2024-02-29', balance: 275, sourceFile: 'chase-feb-corrected.pdf' }), 'd');

    expect(service.listBalances()).toHaveLength(4);
    expect(service.listLatestBalances().map((entry) => [entry.bankName, entry.accountType, entry.balance])).toEqual([
      ['Chase', 'checking', 275],
      ['Citi', 'credit_card', 900],
    ]);
  });

  it('filters balances by account', () => {
    storage.insertBalance(balance({}), 'a');
    storage.insertBalance(balance({ bankName: 'Citi', accountType: 'credit_card' }), 'b');

    expect(service.listBalances({ accountType: 'credit_card' }).map((entry) => entry.bankName)).toEqual(['Citi']);
  });
});
