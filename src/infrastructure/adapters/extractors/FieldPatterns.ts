import { parseAmount } from '../../../domain/services/AmountParser.js';
import { normalizeDate } from '../../../domain/services/DateNormalizer.js';

// A labelled money value: `$1,234.56`, `(45.67)`, `-12.00`, `150.00 CR`. Never the start of a date.
export const AMOUNT = String.raw`(\(?[-+]?\$?\s?\d[\d,]*(?:\.\d+)?\)?(?:\s?(?:CR|DR)\b)?)(?![\d/]|-\d)`;

export const DATE = String.raw`(\d{4}[/-]\d{1,2}[/-]\d{1,2}|\d{1,2}[/-]\d{1,2}[/-]\d{2,4}|[A-Za-z]{3,9}\s+\d{1,2},?\s+\d{4}|\d{1,2}\s+[A-Za-z]{3,9}\s+\d{4})`;

export const RANGE_SEPARATOR = String.raw`\s*(?:-|–|to|through)\s*`;

/** `label` followed by a colon or whitespace, then `capture`. Case-insensitive. */
export const labelled = (label: string, capture: string): RegExp => new RegExp(`${label}[:\\s]+${capture}`, 'i');

// Skips year-to-date columns so `YTD Net Pay` is not read as the current net pay.
export const current = (label: string): string => String.raw`(?<!ytd\s)(?<!to\sdate\s)` + label;

export const findAmount = (text: string, patterns: RegExp[]): number | undefined => {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    const value = match ? parseAmount(match[1]) : null;
    if (value !== null) {
      return value;
    }
  }

  return undefined;
};

export const findDate = (text: string, patterns: RegExp[], group = 1): string | undefined => {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    const value = match ? normalizeDate(match[group]) : null;
    if (value) {
      return value;
    }
  }

  return undefined;
};

export const findText = (text: string, patterns: RegExp[]): string | undefined => {
  for (const pattern of patterns) {
    const value = pattern.exec(text)?.[1]?.trim();
    if (value) {
      return value;
    }
  }

  return undefined;
};

export const countKeywords = (text: string, keywords: readonly string[]): number => {
  const lower = text.toLowerCase();
  return keywords.filter((keyword) => lower.includes(keyword)).length;
};

const anyFullDate = new RegExp(DATE);

/** Year of the first complete date in the text; used to date `MM/DD` statement lines. */
export const inferStatementYear = (text: string): number | undefined => {
  const date = findDate(text, [anyFullDate]);
  return date ? Number(date.slice(0, 4)) : undefined;
};

// Filenames separate words with `_`, `-` and `.`.
export const normalizeFileName = (fileName: string): string => fileName.replace(/[_\-.]+/g, ' ');
