import { parsePrice } from './price.js';
import { FIELD_STRATEGIES, QUANTITY_TIER_SELECTOR } from './selectors.js';
import type { ProductField } from './selectors.js';
import { firstMatch } from './strategies.js';
import type { FieldStrategy } from './strategies.js';
import type { DetailView, ProductRecord } from './types.js';

export type FieldStrategyTable = Record<ProductField, readonly FieldStrategy[]>;

const asText = (raw: string): string | undefined => raw || undefined;

interface QuantityTier {
  quantity: string;
  unitPrice: number;
}

function readFirstTier(view: DetailView): QuantityTier | undefined {
  try {
    const quantity = view.attribute(QUANTITY_TIER_SELECTOR, 'data-minimum-quantity');
    const unitPrice = parsePrice(view.attribute(QUANTITY_TIER_SELECTOR, 'data-numeric-value'));
    return quantity && unitPrice !== undefined ? { quantity, unitPrice } : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reads a product record from a loaded detail page. Fields that no strategy can
 * read stay absent (`name` becomes an empty string). When the page lists
 * quantity tiers, quantity and unit price both come from the first one.
 *
 * `knownAsin` is the identifier the listing link was admitted under; it takes
 * precedence over whatever the page reports so the record keeps its dedup key.
 */
export function extractProduct(
  view: DetailView,
  knownAsin?: string,
  strategies: FieldStrategyTable = FIELD_STRATEGIES
): ProductRecord {
  const record: ProductRecord = {
    asin: knownAsin ?? firstMatch(view, strategies.asin, asText) ?? '',
    name: firstMatch(view, strategies.name, asText) ?? ''
  };

  const tier = readFirstTier(view);
  const quantity = tier ? tier.quantity : firstMatch(view, strategies.quantity, asText);
  if (quantity !== undefined) {
    record.quantity = quantity;
  }
  const referencePrice = firstMatch(view, strategies.referencePrice, parsePrice);
  if (referencePrice !== undefined) {
    record.referencePrice = referencePrice;
  }
  const unitPrice = tier ? tier.unitPrice : firstMatch(view, strategies.unitPrice, parsePrice);
  if (unitPrice !== undefined) {
    record.unitPrice = unitPrice;
  }

  return record;
}
