import * as cheerio from 'cheerio';
import type { DetailView } from './types.js';

function clean(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.replace(/\s+/g, ' ').trim();
  return trimmed ? trimmed : null;
}

/**
 * DetailView over a snapshot of a product page's HTML.
 */
export class HtmlDetailView implements DetailView {
  private readonly $: cheerio.CheerioAPI;

  constructor(html: string, private readonly pageUrl: string) {
    this.$ = cheerio.load(html);
  }

  url(): string {
    return this.pageUrl;
  }

  text(selector: string): string | null {
    return clean(this.$(selector).first().text());
  }

  attribute(selector: string, name: string): string | null {
    return clean(this.$(selector).first().attr(name));
  }
}
