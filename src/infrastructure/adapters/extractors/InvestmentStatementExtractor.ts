import type { DocumentExtractorPort, ExtractionSource } from '../../../application/ports/DocumentExtractorPort.js';
import { isInvestmentAccountType, type AccountType, type Classification } from '../../../domain/entities/Classification.js';
import type {
  Holding,
  InvestmentAccount,
  InvestmentTransaction,
  InvestmentTransactionType,
} from '../../../domain/entities/InvestmentAccount.js';
import { parseAmount, roundCurrency } from '../../../domain/services/AmountParser.js';
import { normalizeDate } from '../../../domain/services/DateNormalizer.js';
import {
  AMOUNT,
  DATE,
  RANGE_SEPARATOR,
  countKeywords,
  findAmount,
  findDate,
  labelled,
  normalizeFileName,
} from './FieldPatterns.js';

const accountTypeSignals: Array<{ accountType: AccountType; pattern: RegExp }> = [
  { accountType: 'roth_ira', pattern: /\broth\s+(?:ira|individual\s+retirement)\b/i },
  { accountType: 'traditional_ira', pattern: /\b(?:traditional|rollover)\s+ira\b|\bira\s+account\b|\bindividual\s+retirement\s+account\b/i },
  { accountType: 'investment_account', pattern: /\b(?:investment|brokerage|securities|trading)\s+account\b/i },
];

const investmentKeywords = [
  'portfolio',
  'securities',
  'stocks',
  'shares',
  'holdings',
  'dividend',
  'capital gains',
  'cost basis',
  'market value',
  'brokerage',
  'trading',
  'equity',
  'mutual fund',
  'etf',
] as const;

const portfolioValuePatterns = [
  String.raw`portfolio\s+value`,
  String.raw`total\s+account\s+value`,
  String.raw`account\s+value`,
  String.raw`total\s+value`,
  String.raw`total\s+assets`,
  String.raw`account\s+balance`,
].map((label) => labelled(label, AMOUNT));

const statementDatePatterns = [
  labelled(String.raw`statement\s+date`, DATE),
  labelled(String.raw`as\s+of`, DATE),
  labelled(String.raw`period\s+ending`, DATE),
];
const statementPeriodPattern = new RegExp(String.raw`statement\s+period[:\s]+` + DATE + RANGE_SEPARATOR + DATE, 'i');

const NUMBER = String.raw`(\d[\d,]*(?:\.\d+)?)`;

const namedHolding = new RegExp(String.raw`^([A-Za-z][A-Za-z0-9&,.' -]*?)\s+\(([A-Z]{1,5})\)\s+${NUMBER}\s+\$?${NUMBER}$`);
const sharesHolding = new RegExp(String.raw`^([A-Za-z][A-Za-z0-9&,.' ]*?)\s+-\s+${NUMBER}\s+shares?\s+-\s+\$?${NUMBER}$`, 'i');
const tickerHolding = new RegExp(String.raw`^([A-Z]{1,5})\s+${NUMBER}\s+\$?${NUMBER}$`);

interface TransactionRule {
  type: InvestmentTransactionType;
  pattern: RegExp;
  read: (match: RegExpExecArray) => Omit<InvestmentTransaction, 'type' | 'date'> | null;
}

const toNumber = (raw: string | undefined): number | null => (raw === undefined ? null : parseAmount(raw));

const trade = (match: RegExpExecArray): Omit<InvestmentTransaction, 'type' | 'date'> | null => {
  const quantity = toNumber(match[1]);
  const price = toNumber(match[3]);
  if (quantity === null || price === null) {
    return null;
  }

  return { ticker: match[2].toUpperCase(), quantity, price, amount: roundCurrency(quantity * price) };
};

const cashFlow = (group: number) => (match: RegExpExecArray): Omit<InvestmentTransaction, 'type' | 'date'> | null => {
  const amount = toNumber(match[group]);
  return amount === null ? null : { amount: Math.abs(amount) };
};

const transactionRules: TransactionRule[] = [
  {
    type: 'buy',
    pattern: new RegExp(String.raw`\b(?:buy|bought|purchased?)\s+${NUMBER}\s+(?:shares?\s+(?:of\s+)?)?([A-Za-z]{1,5})\s+@\s*\$?${NUMBER}`, 'i'),
    read: trade,
  },
  {
    type: 'sell',
    pattern: new RegExp(String.raw`\b(?:sell|sold)\s+${NUMBER}\s+(?:shares?\s+(?:of\s+)?)?([A-Za-z]{1,5})\s+@\s*\$?${NUMBER}`, 'i'),
    read: trade,
  },
  {
    type: 'dividend',
    pattern: new RegExp(String.raw`\bdividend\s+(?:payment|received|reinvested)\s+\$?${NUMBER}`, 'i'),
    read: cashFlow(1),
  },
  {
    type: 'dividend',
    pattern: new RegExp(String.raw`\bdividend\s+([A-Za-z]{1,5})\s+\$?${NUMBER}`, 'i'),
    read: (match) => {
      const amount = toNumber(match[2]);
      return amount === null ? null : { ticker: match[1].toUpperCase(), amount };
    },
  },
  {
    type: 'contribution',
    pattern: new RegExp(String.raw`\b(?:contribution|contributed)\s+\$?${NUMBER}`, 'i'),
    read: cashFlow(1),
  },
  {
    type: 'withdrawal',
    pattern: new RegExp(String.raw`\b(?:withdrawal|withdrew|distribution)\s+\$?${NUMBER}`, 'i'),
    read: cashFlow(1),
  },
];

const lineDate = new RegExp(DATE);

/**
 * Reads brokerage and retirement statements: portfolio value, positions, and
 * buy/sell/dividend/contribution/withdrawal activity. Yields nothing unless a
 * portfolio value or at least one holding is found.
 */
export class InvestmentStatementExtractor implements DocumentExtractorPort<'investment'> {
  readonly kind = 'investment' as const;

  isInvestmentStatement(text: string, sourceFile: string, classification: Classification): boolean {
    return (
      isInvestmentAccountType(classification.accountType) ||
      this.detectAccountType(text, sourceFile) !== undefined ||
      countKeywords(text, investmentKeywords) >= 3
    );
  }

  extract(source: ExtractionSource, classification: Classification): InvestmentAccount[] {
    if (!source.text || !this.isInvestmentStatement(source.text, source.sourceFile, classification)) {
      return [];
    }

    const portfolioValue = findAmount(source.text, portfolioValuePatterns);
    const holdings = this.extractHoldings(source.text);

    if (portfolioValue === undefined && holdings.length === 0) {
      return [];
    }

    const statementDate =
      findDate(source.text, [statementDatePatterns[0]]) ??
      findDate(source.text, [statementPeriodPattern], 2) ??
      findDate(source.text, statementDatePatterns.slice(1));

    const accountType = isInvestmentAccountType(classification.accountType)
      ? classification.accountType
      : (this.detectAccountType(source.text, source.sourceFile) ?? 'investment_account');

    return [
      {
        bankName: classification.bankName,
        accountType,
        portfolioValue,
        statementDate,
        sourceFile: source.sourceFile,
        holdings,
        transactions: this.extractTransactions(source.text, statementDate),
      },
    ];
  }

  private detectAccountType(text: string, sourceFile: string): AccountType | undefined {
    const name = normalizeFileName(sourceFile);
    return (
      accountTypeSignals.find((signal) => signal.pattern.test(name))?.accountType ??
      accountTypeSignals.find((signal) => signal.pattern.test(text))?.accountType
    );
  }

  private extractHoldings(text: string): Holding[] {
    const holdings: Holding[] = [];

    for (const line of text.split('\n').map((entry) => entry.trim())) {
      const named = namedHolding.exec(line);
      if (named) {
        const quantity = parseAmount(named[3]);
        const value = parseAmount(named[4]);
        if (quantity !== null && value !== null) {
          holdings.push({ ticker: named[2], name: named[1].trim(), quantity, value });
        }
        continue;
      }

      const shares = sharesHolding.exec(line);
      if (shares) {
        const quantity = parseAmount(shares[2]);
        const value = parseAmount(shares[3]);
        if (quantity !== null && value !== null) {
          holdings.push({ name: shares[1].trim(), quantity, value });
        }
        continue;
      }

      const ticker = tickerHolding.exec(line);
      if (ticker) {
        const quantity = parseAmount(ticker[2]);
        const value = parseAmount(ticker[3]);
        if (quantity !== null && value !== null) {
          holdings.push({ ticker: ticker[1], name: ticker[1], quantity, value });
        }
      }
    }

    return holdings;
  }

  private extractTransactions(text: string, statementDate: string | undefined): InvestmentTransaction[] {
    const transactions: InvestmentTransaction[] = [];
    let currentDate = statementDate;

    for (const line of text.split('\n')) {
      const dateMatch = lineDate.exec(line);
      if (dateMatch) {
        currentDate = normalizeDate(dateMatch[1]) ?? currentDate;
      }

      for (const rule of transactionRules) {
        const match = rule.pattern.exec(line);
        const parsed = match ? rule.read(match) : null;
        if (parsed) {
          transactions.push({ date: currentDate, type: rule.type, ...parsed });
          break;
        }
      }
    }

    return transactions;
  }
}
