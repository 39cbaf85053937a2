import { describe, expect, it } from 'vitest';
import { InvestmentStatementExtractor } from './InvestmentStatementExtractor.js';

describe('InvestmentStatementExtractor', () => {
  const extractor = new InvestmentStatementExtractor();

  it('extracts portfolio value, holdings and dated activity', () => {
    const text = [
      'Example Brokerage Services',
      'Individual Brokerage Account',
      'Statement Date: 03/31/2024',
      'Portfolio Value: $25,480.00',
      'Holdings',
      'Vanguard Total Stock Market ETF (VTI) 50 12,250.00',
      'AAPL 20 3,400.00',
      '03/05/2024 Buy 10 AAPL @ 170.00',
      '03/15/2024 Dividend VTI 45.20',
      '03/20/2024 Contribution $500.00',
    ].join('\n');

    const [account] = extractor.extract(
      { text, sourceFile: 'brokerage_q1.pdf' },
      { bankName: 'Fidelity', accountType: 'unknown' },
    );

    expect(account.accountType).toBe('investment_account');
    expect(account.bankName).toBe('Fidelity');
    expect(account.statementDate).toBe('2024-03-31');
    expect(account.portfolioValue).toBe(25480);
    expect(account.holdings).toEqual([
      { ticker: 'VTI', name: 'Vanguard Total Stock Market ETF', quantity: 50, value: 12250 },
      { ticker: 'AAPL', name: 'AAPL', quantity: 20, value: 3400 },
    ]);
    expect(account.transactions).toEqual([
      { date: '2024-03-05', type: 'buy', ticker: 'AAPL', quantity: 10, price: 170, amount: 1700 },
      { date: '2024-03-15', type: 'dividend', ticker: 'VTI', amount: 45.2 },
      { date: '2024-03-20', type: 'contribution', amount: 500 },
    ]);
  });

  it('keeps the classified retirement account type', () => {
    const [account] = extractor.extract(
      { text: 'Account Value: 10,000.00\nVTI 10 2,450.00', sourceFile: 'roth.pdf' },
      { bankName: 'Vanguard', accountType: 'roth_ira' },
    );

    expect(account.accountType).toBe('roth_ira');
    expect(account.portfolioValue).toBe(10000);
    expect(account.holdings).toHaveLength(1);
    expect(account.statementDate).toBeUndefined();
    expect(account.transactions).toEqual([]);
  });

  it('yields nothing without a portfolio value or holdings', () => {
    expect(
      extractor.extract(
        { text: 'Roth IRA\nContribution 6,500.00', sourceFile: 'ira.txt' },
        { bankName: 'Vanguard', accountType: 'roth_ira' },
      ),
    ).toEqual([]);
  });

  it('ignores deposit statements', () => {
    expect(
      extractor.extract(
        { text: 'Everyday Checking\nEnding Balance: 1,200.00', sourceFile: 'checking.pdf' },
        { bankName: 'Chase', accountType: 'checking' },
      ),
    ).toEqual([]);
  });
});
