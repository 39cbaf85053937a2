import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AccountBalance } from '../../domain/entities/AccountBalance.js';
import { DebtPayoffCalculator } from '../../domain/services/DebtPayoffCalculator.js';
import { SqliteStorageAdapter } from '../../infrastructure/adapters/storage/SqliteStorageAdapter.js';
import { DebtPayoffService } from './DebtPayoffService.js';
import { RecordQueryService } from './RecordQueryService.js';

const card = (overrides: Partial<AccountBalance>): AccountBalance => ({
  statementDate: '2024-02-15',
  balance: 0,
  bankName: 'Chase',
  accountType: 'credit_card',
  sourceFile: 'statement.pdf',
  ...overrides,
});

describe('DebtPayoffService', () => {
  let storage: SqliteStorageAdapter;
  let service: DebtPayoffService;

  beforeEach(() => {
    storage = new SqliteStorageAdapter(':memory:');
    service = new DebtPayoffService(
      new RecordQueryService(storage),
      new DebtPayoffCalculator(() => new Date(2024, 0, 15)),
    );

    storage.insertBalance(card({ balance: 1000, apr: 12, minimumPayment: 100 }), 'chase');
    storage.insertBalance(card({ bankName: 'Citi', statementDate: '2024-01-31', balance: 900, minimumPayment: 45 }), 'citi-jan');
    storage.insertBalance(card({ bankName: 'Citi', statementDate: '2024-02-29', balance: 300, minimumPayment: 100 }), 'citi-feb');
    storage.insertBalance(card({ bankName: 'Chase', accountType: 'checking', balance: 5000 }), 'checking');
    storage.insertBalance(card({ bankName: 'Amex', balance: 0, minimumPayment: 0 }), 'amex');
  });

  afterEach(() => {
    storage.close();
  });

  it('takes the newest balance of each card that still owes money', () => {
    expect(service.listDebts()).toEqual([
      { name: 'Chase', balance: 1000, apr: 12, minimumPayment: 100 },
      { name: 'Citi', balance: 300, apr: 0, minimumPayment: 100 },
    ]);
  });

  it('compares snowball and avalanche plans for the stored cards', () => {
    const comparison = service.compareStrategies(400);

    expect(comparison.snowball.debts.map((debt) => debt.name)).toEqual(['Citi', 'Chase']);
    expect(comparison.avalanche.debts.map((debt) => debt.name)).toEqual(['Chase', 'Citi']);
    expect([comparison.snowball.totalInterest, comparison.avalanche.totalInterest]).toEqual([25.53, 22.48]);
    expect(comparison.recommendation).toBe('Avalanche strategy saves more money in interest');
  });
});
