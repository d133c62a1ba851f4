// Matches /dp/<ASIN> and /gp/product/<ASIN>; the ASIN must end the path segment.
const PRODUCT_ID_PATTERN = /\/(?:dp|gp\/product)\/([A-Z0-9]{10})(?=[/?#]|$)/;

export function extractProductId(url: string): string | null {
  const match = url.match(PRODUCT_ID_PATTERN);
  return match?.[1] ?? null;
}
