import merchantAliases from '../data/merchant-aliases.json' with { type: 'json' };

interface MerchantAlias {
  pattern: RegExp;
  merchant: string;
}

const aliases: MerchantAlias[] = merchantAliases.map((entry) => ({
  pattern: new RegExp(entry.pattern, 'i'),
  merchant: entry.merchant,
}));

const cleanupPatterns = [
  /#\s*\d+/g,
  /\b\d{4,}\b/g,
  /\b(?:POS|DEBIT|CREDIT|PURCHASE|PAYMENT|ONLINE|CHECKCARD|CARD)\b/gi,
  /[*]/g,
];

const corporateSuffix = /^(?:LLC|INC|CORP|LTD|CO)\.?$/i;

const toTitleCase = (word: string): string => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

/**
 * Resolves a display merchant from a raw statement description.
 * Known aliases win; otherwise the first three meaningful words are kept.
 */
export const extractMerchant = (description: string): string | undefined => {
  const trimmed = description.trim();
  if (!trimmed) {
    return undefined;
  }

  const alias = aliases.find((candidate) => candidate.pattern.test(trimmed));
  if (alias) {
    return alias.merchant;
  }

  let cleaned = trimmed;
  for (const pattern of cleanupPatterns) {
    cleaned = cleaned.replace(pattern, ' ');
  }

  const words = cleaned
    .split(/\s+/)
    .filter((word) => word.length > 0 && !corporateSuffix.test(word))
    .slice(0, 3);

  const merchant = words.map(toTitleCase).join(' ');
  return merchant.length > 2 ? merchant : undefined;
};
