const CURRENCY_NOISE = /[¥円,\s]|JPY/gi;
const NUMBER_PATTERN = /\d+(?:\.\d+)?/;

/**
 * Parses localized price text such as "￥1,280", "1,280円" or "¥ 980.50".
 * Returns undefined when no number can be read.
 */
export function parsePrice(text: string | null | undefined): number | undefined {
  if (!text) {
    return undefined;
  }
  const cleaned = text.normalize('NFKC').replace(CURRENCY_NOISE, '');
  const match = cleaned.match(NUMBER_PATTERN);
  if (!match) {
    return undefined;
  }
  const value = Number.parseFloat(match[0]);
  return Number.isFinite(value) ? value : undefined;
}
