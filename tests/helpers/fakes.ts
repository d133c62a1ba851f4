import { HtmlDetailView } from '../../src/scrapers/businessDiscounts/detailView.js';
import type {
  DetailOpener,
  DetailSession,
  ItemHandle,
  ListingSurface
} from '../../src/scrapers/businessDiscounts/types.js';

export const BASE_URL = 'https://www.amazon.co.jp';

export function productUrl(asin: string): string {
  return `${BASE_URL}/dp/${asin}`;
}

export interface ProductPageFields {
  title?: string;
  reference?: string;
  price?: string;
  quantity?: string;
  tiers?: Array<{ quantity: string; price: string }>;
}

export function productPage(fields: ProductPageFields): string {
  const parts: string[] = [];
  if (fields.title !== undefined) {
    parts.push(`<h1><span id="productTitle">  ${fields.title}  </span></h1>`);
  }
  parts.push('<div id="corePriceDisplay_desktop_feature_div">');
  if (fields.price !== undefined) {
    parts.push(`<span class="a-price priceToPay"><span class="a-offscreen">${fields.price}</span></span>`);
  }
  if (fields.reference !== undefined) {
    parts.push(
      `<span class="a-price a-text-price" data-a-strike="true"><span class="a-offscreen">${fields.reference}</span></span>`
    );
  }
  parts.push('</div>');
  if (fields.quantity !== undefined) {
    parts.push(`<ul><li data-minimum-quantity="${fields.quantity}"></li></ul>`);
  }
  if (fields.tiers) {
    const items = fields.tiers.map(
      tier => `<li data-minimum-quantity="${tier.quantity}" data-numeric-value="${tier.price}"></li>`
    );
    parts.push(`<ul class="quantity-picker">${items.join('')}</ul>`);
  }
  return `<html><body>${parts.join('')}</body></html>`;
}

/**
 * Listing whose visible links depend on how many times it has been scrolled.
 * Frame `n` is shown after `n` scrolls; the last frame repeats once exhausted.
 */
export class FakeListing implements ListingSurface {
  scrolls = 0;
  discoverCalls = 0;
  readonly scrolledPixels: number[] = [];

  constructor(private readonly frames: (scrolls: number) => string[]) {}

  static fromFrames(frames: string[][]): FakeListing {
    return new FakeListing(scrolls => frames[Math.min(scrolls, frames.length - 1)] ?? []);
  }

  async discover(): Promise<ItemHandle[]> {
    this.discoverCalls += 1;
    return this.frames(this.scrolls).map((href, position) => ({ href, position }));
  }

  async scrollBy(pixels: number): Promise<void> {
    this.scrolls += 1;
    this.scrolledPixels.push(pixels);
  }
}

export class FakeOpener implements DetailOpener {
  readonly opened: string[] = [];
  closed = 0;
  maxOpen = 0;
  private openCount = 0;

  constructor(
    private readonly pages: Record<string, string>,
    private readonly failing: ReadonlySet<string> = new Set()
  ) {}

  async open(handle: ItemHandle): Promise<DetailSession> {
    if (this.failing.has(handle.href)) {
      throw new Error(`Navigation timeout for ${handle.href}`);
    }
    this.opened.push(handle.href);
    this.openCount += 1;
    this.maxOpen = Math.max(this.maxOpen, this.openCount);
    const html = this.pages[handle.href] ?? '<html><body></body></html>';
    return {
      view: new HtmlDetailView(html, handle.href),
      close: async () => {
        this.openCount -= 1;
        this.closed += 1;
      }
    };
  }
}

export const noSleep = async (): Promise<void> => undefined;
