import type { TabularRowDTO } from '../../../application/dto/DocumentInputDTO.js';
import type { DocumentExtractorPort, ExtractionSource } from '../../../application/ports/DocumentExtractorPort.js';
import type { Classification } from '../../../domain/entities/Classification.js';
import type { Transaction } from '../../../domain/entities/Transaction.js';
import { parseAmount, roundCurrency } from '../../../domain/services/AmountParser.js';
import { normalizeDate } from '../../../domain/services/DateNormalizer.js';
import { extractMerchant } from '../../../domain/services/MerchantExtractor.js';
import { inferStatementYear } from './FieldPatterns.js';

const DATE_TOKEN = String.raw`(\d{1,2}[/-]\d{1,2}(?:[/-]\d{2,4})?)`;
const MONEY = String.raw`[-+]?\(?[-+]?\$?\s?\d[\d,]*\.\d{2}\)?(?:\s?(?:CR|DR)\b)?`;

const linePatterns = [
  // "01/15/2024  AMAZON.COM  -45.67  1,234.56"
  new RegExp(String.raw`^${DATE_TOKEN}\s+(.+?)\s+(${MONEY})\s+(${MONEY})$`, 'i'),
  // "01/15 STARBUCKS STORE 1234 5.75"
  new RegExp(String.raw`^${DATE_TOKEN}\s+(.+?)\s+(${MONEY})$`, 'i'),
];

const postingDatePrefix = /^\d{1,2}[/-]\d{1,2}(?:[/-]\d{2,4})?\s+/;
const headerWords = /^(?:date|description|amount|balance|transaction|posting|reference|details)$/i;
const summaryLine = /\b(?:beginning|ending|opening|closing|previous|new|daily)\s+balance\b|^total\b/i;

const dateColumns = ['date', 'transaction_date', 'trans_date', 'post_date', 'posted_date', 'posting_date'];
const amountColumns = ['amount', 'transaction_amount'];
const debitColumns = ['debit', 'debits', 'withdrawal', 'withdrawals'];
const creditColumns = ['credit', 'credits', 'deposit', 'deposits'];
const descriptionColumns = ['description', 'memo', 'details', 'transaction_description', 'payee', 'name'];

const normalizeColumn = (column: string): string => column.trim().toLowerCase().replace(/[\s-]+/g, '_');

const pick = (row: Map<string, string | number>, columns: string[]): string | number | undefined => {
  for (const column of columns) {
    const value = row.get(column);
    if (value !== undefined && value !== '') {
      return value;
    }
  }

  return undefined;
};

/**
 * Pulls dated, signed line items from statement text, or maps spreadsheet rows by
 * their column headers when the document is tabular.
 */
export class TransactionExtractor implements DocumentExtractorPort<'transaction'> {
  readonly kind = 'transaction' as const;

  extract(source: ExtractionSource, classification: Classification): Transaction[] {
    if (source.rows && source.rows.length > 0) {
      return this.extractFromRows(source.rows, source.sourceFile, classification);
    }

    return this.extractFromText(source.text, source.sourceFile, classification);
  }

  private extractFromText(text: string, sourceFile: string, classification: Classification): Transaction[] {
    const transactions: Transaction[] = [];
    const fallbackYear = inferStatementYear(text);

    for (const line of text.split('\n')) {
      const trimmed = line.trim();
      if (trimmed.length < 10) {
        continue;
      }

      for (const pattern of linePatterns) {
        const match = pattern.exec(trimmed);
        if (!match) {
          continue;
        }

        const description = match[2].replace(postingDatePrefix, '').trim();
        if (description.length < 3 || headerWords.test(description) || summaryLine.test(description)) {
          break;
        }

        const date = normalizeDate(match[1], fallbackYear);
        const amount = parseAmount(match[3]);
        if (date && amount !== null && amount !== 0) {
          transactions.push(this.build({ date, amount, description }, sourceFile, classification));
          break;
        }
      }
    }

    return transactions;
  }

  private extractFromRows(rows: TabularRowDTO[], sourceFile: string, classification: Classification): Transaction[] {
    const transactions: Transaction[] = [];

    for (const raw of rows) {
      const row = new Map<string, string | number>();
      for (const [column, value] of Object.entries(raw)) {
        if (value !== null) {
          row.set(normalizeColumn(column), typeof value === 'string' ? value.trim() : value);
        }
      }

      const dateValue = pick(row, dateColumns);
      const date = dateValue === undefined ? null : normalizeDate(String(dateValue));
      const amount = this.resolveRowAmount(row);
      if (!date || amount === null || amount === 0) {
        continue;
      }

      const description = String(pick(row, descriptionColumns) ?? '').trim();
      transactions.push(this.build({ date, amount, description }, sourceFile, classification));
    }

    return transactions;
  }

  private resolveRowAmount(row: Map<string, string | number>): number | null {
    const amount = parseAmount(pick(row, amountColumns));
    if (amount !== null) {
      return amount;
    }

    const debit = parseAmount(pick(row, debitColumns));
    if (debit !== null && debit !== 0) {
      return -Math.abs(debit);
    }

    const credit = parseAmount(pick(row, creditColumns));
    return credit === null ? null : Math.abs(credit);
  }

  private build(
    item: { date: string; amount: number; description: string },
    sourceFile: string,
    classification: Classification,
  ): Transaction {
    return {
      date: item.date,
      amount: roundCurrency(item.amount),
      description: item.description,
      merchant: extractMerchant(item.description),
      bankName: classification.bankName,
      accountType: classification.accountType,
      sourceFile,
      isRecurring: false,
    };
  }
}
