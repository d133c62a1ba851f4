import type { ProductRecord } from './types.js';

export interface Discount {
  discountAmount: number;
  discountRate: number;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Amount (whole yen) and rate (one decimal) of the saving from `referencePrice`
 * to `unitPrice`.
 * Undefined unless both prices are known and the reference price is positive.
 * A zero or negative saving is returned as is.
 */
export function computeDiscount(
  referencePrice: number | undefined,
  unitPrice: number | undefined
): Discount | undefined {
  if (referencePrice === undefined || unitPrice === undefined) {
    return undefined;
  }
  if (!Number.isFinite(referencePrice) || !Number.isFinite(unitPrice) || referencePrice <= 0) {
    return undefined;
  }
  const amount = referencePrice - unitPrice;
  return {
    discountAmount: round(amount, 0),
    discountRate: round((amount / referencePrice) * 100, 1)
  };
}

export function applyDiscount(record: ProductRecord): ProductRecord {
  const { discountAmount: _amount, discountRate: _rate, ...rest } = record;
  const discount = computeDiscount(record.referencePrice, record.unitPrice);
  return discount ? { ...rest, ...discount } : rest;
}
