import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';

dayjs.extend(customParseFormat);

const ISO_FORMAT = 'YYYY-MM-DD';

const supportedFormats = [
  'YYYY-MM-DD',
  'YYYY/MM/DD',
  'MM/DD/YYYY',
  'M/D/YYYY',
  'MM-DD-YYYY',
  'M-D-YYYY',
  'MM/DD/YY',
  'M/D/YY',
  'MM-DD-YY',
  'M-D-YY',
  'MMM D, YYYY',
  'MMMM D, YYYY',
  'MMM D YYYY',
  'MMMM D YYYY',
  'D MMM YYYY',
  'D MMMM YYYY',
  'DD MMM YYYY',
  'DD MMMM YYYY',
];

const monthDayOnly = /^(\d{1,2})[/-](\d{1,2})$/;

const titleCaseWords = (input: string): string =>
  input.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

/**
 * Normalizes a statement date to `YYYY-MM-DD`.
 *
 * `MM/DD` dates carry no year; they take `fallbackYear` when given, otherwise they are rejected.
 */
export const normalizeDate = (raw: string | null | undefined, fallbackYear?: number): string | null => {
  if (!raw) {
    return null;
  }

  const text = titleCaseWords(raw.trim().replace(/\s+/g, ' '));
  if (!text) {
    return null;
  }

  const partial = monthDayOnly.exec(text);
  if (partial) {
    if (fallbackYear === undefined) {
      return null;
    }

    const candidate = `${fallbackYear}-${partial[1].padStart(2, '0')}-${partial[2].padStart(2, '0')}`;
    const parsed = dayjs(candidate, ISO_FORMAT, true);
    return parsed.isValid() ? parsed.format(ISO_FORMAT) : null;
  }

  const parsed = dayjs(text, supportedFormats, true);
  return parsed.isValid() ? parsed.format(ISO_FORMAT) : null;
};

export const isWithinRange = (isoDate: string, range: { start: string; end: string }): boolean =>
  isoDate >= range.start && isoDate <= range.end;
