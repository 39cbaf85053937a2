const repeatingWhitespace = /\s+/g;
const punctuation = /[^\w\s]/g;

export const normalizeDescription = (input: string): string => {
  return input
    .normalize('NFKD')
    .replace(punctuation, ' ')
    .replace(repeatingWhitespace, ' ')
    .trim()
    .toLowerCase();
};

// Merchant wins over the raw description so that "AMAZON.COM*1X2" and "Amazon" collapse to one key.
export const normalizeCounterparty = (merchant: string | undefined, description: string): string => {
  const preferred = merchant && merchant.trim().length > 0 ? merchant : description;
  return normalizeDescription(preferred);
};
