import { extractProductId } from './identifier.js';
import {
  MetaContentStrategy,
  SelectorAttributeStrategy,
  SelectorTextStrategy,
  UrlPatternStrategy
} from './strategies.js';
import type { FieldStrategy } from './strategies.js';

export type ProductField = 'asin' | 'name' | 'quantity' | 'referencePrice' | 'unitPrice';

/**
 * One entry of the business quantity-price picker. Quantity and unit price are
 * read from the same element so they describe the same tier.
 */
export const QUANTITY_TIER_SELECTOR = 'li[data-minimum-quantity][data-numeric-value]';

/** Lookup order per field; the first strategy that yields a value wins. */
export const FIELD_STRATEGIES: Record<ProductField, readonly FieldStrategy[]> = {
  asin: [
    new UrlPatternStrategy(extractProductId, 'url(/dp|/gp/product)'),
    new SelectorAttributeStrategy('input#ASIN', 'value'),
    new SelectorAttributeStrategy('[data-asin]:not([data-asin=""])', 'data-asin')
  ],
  name: [
    new SelectorTextStrategy('#productTitle'),
    new SelectorTextStrategy('#title'),
    new SelectorTextStrategy('span.a-truncate-full'),
    new MetaContentStrategy('title'),
    new MetaContentStrategy('og:title')
  ],
  quantity: [
    new SelectorAttributeStrategy('li[data-minimum-quantity]', 'data-minimum-quantity'),
    new SelectorTextStrategy('#quantity option[selected]'),
    new SelectorTextStrategy('#selectQuantity .a-dropdown-prompt')
  ],
  referencePrice: [
    new SelectorTextStrategy('#corePriceDisplay_desktop_feature_div .basisPrice .a-offscreen'),
    new SelectorTextStrategy('span.a-price.a-text-price[data-a-strike="true"] .a-offscreen'),
    new SelectorTextStrategy('span[data-a-strike="true"] .a-offscreen'),
    new SelectorTextStrategy('#listPrice'),
    new SelectorTextStrategy('.a-text-price .a-offscreen')
  ],
  unitPrice: [
    new SelectorTextStrategy('#corePriceDisplay_desktop_feature_div .priceToPay .a-offscreen'),
    new SelectorTextStrategy('#corePrice_feature_div .a-price:not(.a-text-price) .a-offscreen'),
    new SelectorTextStrategy('#priceblock_ourprice'),
    new SelectorTextStrategy('span.a-price-whole')
  ]
};
