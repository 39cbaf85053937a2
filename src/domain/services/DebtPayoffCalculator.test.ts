import { describe, expect, it } from 'vitest';
import { DebtPayoffCalculator, type Debt } from './DebtPayoffCalculator.js';

const debts: Debt[] = [
  { name: 'Chase', balance: 1000, apr: 12, minimumPayment: 100 },
  { name: 'Citi', balance: 300, apr: 0, minimumPayment: 100 },
];

describe('DebtPayoffCalculator', () => {
  const calculator = new DebtPayoffCalculator(() => new Date(2024, 0, 15));

  it('pays the smallest balance first under the snowball strategy', () => {
    expect(calculator.plan(debts, 400, 'snowball')).toEqual({
      strategy: 'snowball',
      totalDebt: 1300,
      totalInterest: 25.53,
      totalPaid: 1325.53,
      monthsToPayoff: 4,
      payoffDate: '2024-05-15',
      feasible: true,
      debts: [
        { name: 'Citi', startingBalance: 300, totalInterest: 0, monthsToPayoff: 1, payoffDate: '2024-02-15' },
        { name: 'Chase', startingBalance: 1000, totalInterest: 25.53, monthsToPayoff: 4, payoffDate: '2024-05-15' },
      ],
    });
  });

  it('pays the highest rate first under the avalanche strategy', () => {
    const plan = calculator.plan(debts, 400, 'avalanche');

    expect(plan).toMatchObject({ totalInterest: 22.48, totalPaid: 1322.48, monthsToPayoff: 4, feasible: true });
    expect(plan.debts.map((debt) => [debt.name, debt.monthsToPayoff, debt.totalInterest])).toEqual([
      ['Chase', 4, 22.48],
      ['Citi', 3, 0],
    ]);
  });

  it('recommends avalanche when it costs less interest over the same months', () => {
    expect(calculator.compare(debts, 400).recommendation).toBe('Avalanche strategy saves more money in interest');
  });

  it('marks a budget that never outpaces interest as infeasible', () => {
    const comparison = calculator.compare([{ name: 'Store card', balance: 1000, apr: 24, minimumPayment: 10 }], 10);

    expect(comparison.snowball).toMatchObject({ feasible: false, monthsToPayoff: null, payoffDate: null });
    expect(comparison.snowball.debts[0]).toMatchObject({ monthsToPayoff: null, payoffDate: null });
    expect(comparison.recommendation).toBe('Both strategies are similar - choose based on preference');
  });

  it('treats an empty debt list as already paid off', () => {
    expect(calculator.plan([], 250, 'avalanche')).toEqual({
      strategy: 'avalanche',
      totalDebt: 0,
      totalInterest: 0,
      totalPaid: 0,
      monthsToPayoff: 0,
      payoffDate: '2024-01-15',
      feasible: true,
      debts: [],
    });
  });
});
