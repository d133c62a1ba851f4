import * as cheerio from 'cheerio';
import type { ItemHandle } from './types.js';

/**
 * Product card containers, most specific first. The first selector that matches
 * any card decides the set; links outside cards (header, carousels, sponsored
 * strips) are never returned.
 */
export const CARD_SELECTORS: readonly string[] = [
  "div.a-cardui._dmFsd_cardItem_1LFgv[data-a-card-type='basic']",
  'div.a-cardui._dmFsd_cardItem_1LFgv',
  'div[data-component-type="s-search-result"]'
];

export const PRODUCT_LINK_SELECTOR = 'a[href*="/dp/"], a[href*="/gp/product/"]';

function normalizeUrl(value: string, baseUrl: string): string {
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return value;
  }
}

/**
 * One handle per product card, in document order: the card's first product
 * link resolved against `baseUrl`. Cards without a product link are skipped.
 */
export function extractItemHandles(
  html: string,
  baseUrl: string,
  cardSelectors: readonly string[] = CARD_SELECTORS,
  linkSelector: string = PRODUCT_LINK_SELECTOR
): ItemHandle[] {
  const $ = cheerio.load(html);
  for (const selector of cardSelectors) {
    const cards = $(selector);
    if (cards.length === 0) {
      continue;
    }
    const handles: ItemHandle[] = [];
    cards.each((_, card) => {
      const href = $(card).find(linkSelector).first().attr('href')?.trim();
      if (href) {
        handles.push({ href: normalizeUrl(href, baseUrl), position: handles.length });
      }
    });
    return handles;
  }
  return [];
}
