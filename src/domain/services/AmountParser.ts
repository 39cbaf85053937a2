const debitCreditMarker = /\s*(CR|DR)$/i;
const numericBody = /^(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d*)?$|^\.\d+$/;

/**
 * Parses a statement amount such as `$1,234.56`, `(45.67)`, `-12.00`, `12.00-` or `150.00 DR`.
 * Returns null when the text is not a number.
 */
export const parseAmount = (raw: string | number | null | undefined): number | null => {
  if (raw === null || raw === undefined) {
    return null;
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }

  let text = raw.trim();
  let negative = false;

  const marker = debitCreditMarker.exec(text);
  if (marker && marker.index > 0) {
    negative = marker[1].toUpperCase() === 'DR';
    text = text.slice(0, marker.index).trim();
  }

  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1).trim();
  }

  text = text.replace(/[$\s]/g, '');

  if (text.startsWith('-')) {
    negative = true;
    text = text.slice(1);
  } else if (text.startsWith('+')) {
    text = text.slice(1);
  } else if (text.endsWith('-')) {
    negative = true;
    text = text.slice(0, -1);
  }

  if (!numericBody.test(text)) {
    return null;
  }

  const value = Number(text.replace(/,/g, ''));
  if (!Number.isFinite(value)) {
    return null;
  }

  return negative && value !== 0 ? -value : value;
};

export const roundCurrency = (value: number): number => Math.round(value * 100) / 100;
