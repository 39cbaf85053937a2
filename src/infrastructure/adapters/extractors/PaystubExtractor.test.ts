import { describe, expect, it } from 'vitest';
import type { Classification } from '../../../domain/entities/Classification.js';
import { PaystubExtractor } from './PaystubExtractor.js';

const classification: Classification = { bankName: 'unknown', accountType: 'unknown' };

const stub = (payDate: string, gross: string, net: string): string =>
  [
    `Pay Date: ${payDate}`,
    `Gross Pay: ${gross}`,
    'Federal Tax: 300.00',
    'Social Security: 186.00',
    'Medicare: 43.50',
    `Net Pay: ${net}`,
  ].join('\n');

describe('PaystubExtractor', () => {
  const extractor = new PaystubExtractor();

  it('extracts pay dates, earnings, deductions and year-to-date figures', () => {
    const text = [
      'Earnings Statement',
      'Employer: Acme Widgets Inc',
      'Pay Date: 01/15/2024',
      'Pay Period: 01/01/2024 - 01/14/2024',
      'Gross Pay: $3,000.00',
      'Federal Tax: 300.00',
      'State Tax: 120.00',
      'Social Security: 186.00',
      'Medicare: 43.50',
      '401(k): 150.00',
      'Net Pay: $2,200.50',
      'YTD Gross: 3,000.00',
      'YTD Net: 2,200.50',
    ].join('\n');

    expect(extractor.extract({ text, sourceFile: 'paystub_jan.pdf' }, classification)).toEqual([
      {
        payDate: '2024-01-15',
        payPeriodStart: '2024-01-01',
        payPeriodEnd: '2024-01-14',
        employerName: 'Acme Widgets Inc',
        gross: 3000,
        net: 2200.5,
        deductions: {
          federal_tax: 300,
          state_tax: 120,
          social_security: 186,
          medicare: 43.5,
          retirement_401k: 150,
        },
        totalDeductions: 799.5,
        ytdGross: 3000,
        ytdNet: 2200.5,
        ytdTaxes: undefined,
        bankName: 'unknown',
        accountType: 'unknown',
        sourceFile: 'paystub_jan.pdf',
      },
    ]);
  });

  it('splits a file holding several paystubs and shares the header employer', () => {
    const text = ['Payroll export', 'Company: Acme Widgets Inc', stub('01/15/2024', '3,000.00', '2,470.50'), stub('01/31/2024', '3,100.00', '2,570.50')].join(
      '\n',
    );

    const paystubs = extractor.extract({ text, sourceFile: 'payroll.txt' }, classification);

    expect(paystubs.map((paystub) => [paystub.payDate, paystub.gross, paystub.net, paystub.employerName])).toEqual([
      ['2024-01-15', 3000, 2470.5, 'Acme Widgets Inc'],
      ['2024-01-31', 3100, 2570.5, 'Acme Widgets Inc'],
    ]);
    expect(paystubs[1].totalDeductions).toBe(529.5);
  });

  it('keeps a stub that announces the next pay date as one paystub', () => {
    const text = ['Earnings Statement', 'Employer: Acme Widgets Inc', stub('01/31/2024', '3,000.00', '2,470.50'), 'Next Pay Date: 02/15/2024'].join(
      '\n',
    );

    const paystubs = extractor.extract({ text, sourceFile: 'acme_jan.pdf' }, classification);

    expect(paystubs.map((paystub) => [paystub.payDate, paystub.gross, paystub.net])).toEqual([['2024-01-31', 3000, 2470.5]]);
  });

  it('does not split on a later pay date that carries no earnings', () => {
    const text = [stub('01/31/2024', '3,000.00', '2,470.50'), 'Questions about your pay date? Call payroll.', 'Pay Date: 02/15/2024'].join(
      '\n',
    );

    const paystubs = extractor.extract({ text, sourceFile: 'acme_jan.pdf' }, classification);

    expect(paystubs).toHaveLength(1);
    expect(paystubs[0].payDate).toBe('2024-01-31');
  });

  it('reads hours, rates, bonus and commission', () => {
    const text = [
      'Pay Statement',
      'Pay Date: 03/15/2024',
      'Regular Hours: 80.00',
      'Regular Rate: $25.00',
      'Overtime Hours: 5.5',
      'Overtime Rate: $37.50',
      'Bonus: 500.00',
      'Commission: 250.00',
      'YTD Bonus: 1,500.00',
      'Gross Pay: 2,956.25',
      'Net Pay: 2,300.00',
    ].join('\n');

    const [paystub] = extractor.extract({ text, sourceFile: 'march.pdf' }, classification);

    expect(paystub).toMatchObject({
      regularHours: 80,
      regularRate: 25,
      overtimeHours: 5.5,
      overtimeRate: 37.5,
      bonus: 500,
      commission: 250,
      gross: 2956.25,
    });
  });

  it('prefers a stated deduction total over the computed one', () => {
    const text = `${stub('02/15/2024', '3,000.00', '2,400.00')}\nTotal Deductions: 600.00`;

    const [paystub] = extractor.extract({ text, sourceFile: 'feb.pdf' }, classification);

    expect(paystub.totalDeductions).toBe(600);
  });

  it('ignores documents with too few paystub signals', () => {
    const text = 'Gross Pay: 100.00\nSomething else entirely';

    expect(extractor.extract({ text, sourceFile: 'note.txt' }, classification)).toEqual([]);
  });

  it('drops a segment without pay date, gross or net', () => {
    const text = 'Pay stub\nPayroll department\nMedicare information\nFederal Tax: 10.00';

    expect(extractor.extract({ text, sourceFile: 'memo.txt' }, classification)).toEqual([]);
  });
});
