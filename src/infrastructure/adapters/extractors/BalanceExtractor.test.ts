import { describe, expect, it } from 'vitest';
import { BalanceExtractor } from './BalanceExtractor.js';

describe('BalanceExtractor', () => {
  const extractor = new BalanceExtractor();

  it('reads a credit card summary', () => {
    const text = [
      'Freedom Credit Card',
      'Statement Date: 02/05/2024',
      'Previous Balance: $800.00',
      'New Balance: $1,234.56',
      'Credit Limit: $5,000.00',
      'Available Credit: $3,765.44',
      'Minimum Payment Due: $35.00',
      'Payment Due Date: 03/01/2024',
      'Purchase APR: 24.99%',
    ].join('\n');

    expect(extractor.extract({ text, sourceFile: 'card.pdf' }, { bankName: 'Chase', accountType: 'credit_card' })).toEqual([
      {
        statementDate: '2024-02-05',
        balance: 1234.56,
        creditLimit: 5000,
        availableCredit: 3765.44,
        minimumPayment: 35,
        paymentDueDate: '2024-03-01',
        apr: 24.99,
        bankName: 'Chase',
        accountType: 'credit_card',
        sourceFile: 'card.pdf',
      },
    ]);
  });

  it('derives a card balance from limit and available credit', () => {
    const [balance] = extractor.extract(
      { text: 'Credit Limit: 2,000.00\nAvailable Credit: 1,500.00', sourceFile: 'card.txt' },
      { bankName: 'Citi', accountType: 'credit_card' },
    );

    expect(balance.balance).toBe(500);
    expect(balance.statementDate).toBeUndefined();
  });

  it('takes the ending balance and period end for deposit accounts', () => {
    const text = 'Beginning Balance: 1,000.00\nEnding Balance: 1,450.25\nStatement Period: 01/01/2024 to 01/31/2024';

    const [balance] = extractor.extract({ text, sourceFile: 'checking.pdf' }, { bankName: 'Chase', accountType: 'checking' });

    expect(balance.balance).toBe(1450.25);
    expect(balance.statementDate).toBe('2024-01-31');
    expect(balance.creditLimit).toBeUndefined();
    expect(balance.minimumPayment).toBeUndefined();
  });

  it('returns nothing when no balance is printed', () => {
    expect(
      extractor.extract({ text: 'Account summary only', sourceFile: 'x.pdf' }, { bankName: 'Chase', accountType: 'checking' }),
    ).toEqual([]);
  });
});
