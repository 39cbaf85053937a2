import type { DocumentExtractorPort, ExtractionSource } from '../../../application/ports/DocumentExtractorPort.js';
import type { Classification } from '../../../domain/entities/Classification.js';
import type { AccountBalance } from '../../../domain/entities/AccountBalance.js';
import { roundCurrency } from '../../../domain/services/AmountParser.js';
import { AMOUNT, DATE, RANGE_SEPARATOR, findAmount, findDate, labelled } from './FieldPatterns.js';

const amounts = (...labels: string[]): RegExp[] => labels.map((label) => labelled(label, AMOUNT));
const dates = (...labels: string[]): RegExp[] => labels.map((label) => labelled(label, DATE));

const creditCardBalancePatterns = amounts(
  String.raw`new\s+balance`,
  String.raw`statement\s+balance`,
  String.raw`current\s+balance`,
  String.raw`outstanding\s+balance`,
  String.raw`total\s+balance`,
  String.raw`account\s+balance`,
);

const depositBalancePatterns = amounts(
  String.raw`ending\s+balance`,
  String.raw`closing\s+balance`,
  String.raw`new\s+balance`,
  String.raw`current\s+balance`,
  String.raw`account\s+balance`,
  String.raw`available\s+balance`,
  String.raw`(?<!previous\s)(?<!beginning\s)(?<!opening\s)\bbalance`,
);

const creditLimitPatterns = amounts(String.raw`credit\s+limit`, String.raw`credit\s+line`);
const availableCreditPatterns = amounts(
  String.raw`available\s+credit`,
  String.raw`credit\s+available`,
  String.raw`available\s+to\s+spend`,
);
const minimumPaymentPatterns = amounts(
  String.raw`minimum\s+payment(?:\s+due)?`,
  String.raw`min\.?\s+payment(?:\s+due)?`,
  String.raw`payment\s+due`,
);

const statementDatePatterns = dates(String.raw`statement\s+date`, String.raw`closing\s+date`);
const statementPeriodPattern = new RegExp(
  String.raw`(?:statement|billing)\s+period[:\s]+` + DATE + RANGE_SEPARATOR + DATE,
  'i',
);
const asOfPatterns = dates(String.raw`as\s+of`);
const dueDatePatterns = dates(String.raw`payment\s+due\s+date`, String.raw`due\s+date`);
const aprPattern = /(?:\bapr|annual\s+percentage\s+rate|interest\s+rate)[:\s]+(\d{1,2}(?:\.\d+)?)\s*%?/i;

/**
 * Statement-level balances. Credit cards fall back to `limit - available credit`
 * when no balance line is printed.
 */
export class BalanceExtractor implements DocumentExtractorPort<'balance'> {
  readonly kind = 'balance' as const;

  extract(source: ExtractionSource, classification: Classification): AccountBalance[] {
    if (!source.text) {
      return [];
    }

    const text = source.text;
    const isCreditCard = classification.accountType === 'credit_card';

    const creditLimit = isCreditCard ? findAmount(text, creditLimitPatterns) : undefined;
    const availableCredit = isCreditCard ? findAmount(text, availableCreditPatterns) : undefined;

    let balance = findAmount(text, isCreditCard ? creditCardBalancePatterns : depositBalancePatterns);
    if (balance === undefined && creditLimit !== undefined && availableCredit !== undefined) {
      balance = roundCurrency(creditLimit - availableCredit);
    }

    if (balance === undefined) {
      return [];
    }

    const apr = aprPattern.exec(text);

    return [
      {
        statementDate:
          findDate(text, statementDatePatterns) ??
          findDate(text, [statementPeriodPattern], 2) ??
          findDate(text, asOfPatterns),
        balance,
        creditLimit,
        availableCredit,
        minimumPayment: findAmount(text, minimumPaymentPatterns),
        paymentDueDate: findDate(text, dueDatePatterns),
        apr: apr ? Number(apr[1]) : undefined,
        bankName: classification.bankName,
        accountType: classification.accountType,
        sourceFile: source.sourceFile,
      },
    ];
  }
}
