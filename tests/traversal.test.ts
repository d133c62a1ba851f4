import { describe, expect, it, vi } from 'vitest';
import {
  ScrollScraper,
  TraversalAbortedError,
  withDetailSession
} from '../src/scrapers/businessDiscounts/traversal.js';
import type { TraversalEvent } from '../src/scrapers/businessDiscounts/types.js';
import { FakeListing, FakeOpener, noSleep, productPage, productUrl } from './helpers/fakes.js';

const FIVE = ['B000000001', 'B000000002', 'B000000003', 'B000000004', 'B000000005'];

function pagesFor(asins: string[]): Record<string, string> {
  return Object.fromEntries(
    asins.map((asin, index) => [
      productUrl(asin),
      productPage({ title: `Item ${index + 1}`, reference: '￥1,000', price: '￥900', quantity: '1' })
    ])
  );
}

function syntheticAsin(n: number): string {
  return `B${String(n).padStart(9, '0')}`;
}

describe('ScrollScraper', () => {
  it('collects five items visible on the first pass and stops after three empty passes', async () => {
    const listing = FakeListing.fromFrames([FIVE.map(productUrl)]);
    const opener = new FakeOpener(pagesFor(FIVE));
    const events: TraversalEvent[] = [];
    const sleep = vi.fn(async (_ms: number) => undefined);

    const result = await new ScrollScraper({ listing, opener, sleep, listener: event => events.push(event) }).run();

    expect(result.records.map(record => record.asin)).toEqual(FIVE);
    expect(result.records[0]).toEqual({
      asin: 'B000000001',
      name: 'Item 1',
      quantity: '1',
      referencePrice: 1000,
      unitPrice: 900,
      discountAmount: 100,
      discountRate: 10
    });
    expect(result.reason).toBe('empty-passes');
    expect(result.state).toEqual({ offset: 1500, consecutiveEmptyPasses: 3, totalPasses: 3 });
    expect(result.stats).toEqual({ discovered: 5, processed: 5, duplicates: 15, skipped: 0, failed: 0 });
    expect(listing.discoverCalls).toBe(4);
    expect(listing.scrolledPixels).toEqual([500, 500, 500]);

    const discovered = events.filter(event => event.type === 'discovered');
    expect(discovered.map(event => (event.type === 'discovered' ? event.fresh : -1))).toEqual([5, 0, 0, 0]);
    expect(events.filter(event => event.type === 'terminated')).toHaveLength(1);

    expect(sleep.mock.calls.map(call => call[0])).toEqual([1000, 1000, 1000, 1000, 1000, 1500, 1500, 1500]);
  });

  it('opens one detail tab at a time and closes every one', async () => {
    const listing = FakeListing.fromFrames([FIVE.map(productUrl)]);
    const opener = new FakeOpener(pagesFor(FIVE));

    await new ScrollScraper({ listing, opener, sleep: noSleep }).run();

    expect(opener.opened).toEqual(FIVE.map(productUrl));
    expect(opener.maxOpen).toBe(1);
    expect(opener.closed).toBe(5);
  });

  it('excludes links whose identifier is not ten characters', async () => {
    const malformed = 'https://www.amazon.co.jp/dp/B000123456X';
    const listing = FakeListing.fromFrames([[malformed, productUrl('B000000001')]]);
    const opener = new FakeOpener(pagesFor(['B000000001']));

    const result = await new ScrollScraper({ listing, opener, sleep: noSleep }).run();

    expect(opener.opened).toEqual([productUrl('B000000001')]);
    expect(result.records.map(record => record.asin)).toEqual(['B000000001']);
    expect(result.stats.processed).toBe(1);
    expect(result.stats.skipped).toBe(4);
  });

  it('leaves the discount absent when the reference price is missing', async () => {
    const asin = 'B0ABCDEFGH';
    const listing = FakeListing.fromFrames([[productUrl(asin)]]);
    const opener = new FakeOpener({ [productUrl(asin)]: productPage({ title: 'Toner cartridge', price: '￥3,980' }) });

    const result = await new ScrollScraper({ listing, opener, sleep: noSleep }).run();

    expect(result.records).toEqual([{ asin, name: 'Toner cartridge', unitPrice: 3980 }]);
  });

  it('stops after three consecutive empty passes even when earlier passes found items', async () => {
    const a = productUrl('B000000001');
    const b = productUrl('B000000002');
    const listing = FakeListing.fromFrames([[a], [a, b]]);
    const opener = new FakeOpener(pagesFor(['B000000001', 'B000000002']));

    const result = await new ScrollScraper({ listing, opener, sleep: noSleep }).run();

    expect(result.records).toHaveLength(2);
    expect(result.reason).toBe('empty-passes');
    expect(result.state.totalPasses).toBe(4);
  });

  it('resets the empty-pass counter when new items appear', async () => {
    const a = productUrl('B000000001');
    const b = productUrl('B000000002');
    const listing = FakeListing.fromFrames([[a], [a], [a, b]]);
    const opener = new FakeOpener(pagesFor(['B000000001', 'B000000002']));

    const result = await new ScrollScraper({ listing, opener, sleep: noSleep }).run();

    expect(result.records).toHaveLength(2);
    expect(result.state).toEqual({ offset: 2500, consecutiveEmptyPasses: 3, totalPasses: 5 });
  });

  it('never scrolls more than twenty times', async () => {
    const listing = new FakeListing(scrolls => [productUrl(syntheticAsin(scrolls + 1))]);
    const opener = new FakeOpener({});

    const result = await new ScrollScraper({ listing, opener, sleep: noSleep }).run();

    expect(result.reason).toBe('scroll-cap');
    expect(listing.scrolls).toBe(20);
    expect(result.state.totalPasses).toBe(20);
    expect(result.records).toHaveLength(21);
  });

  it('honours a smaller cap and threshold from options', async () => {
    const listing = new FakeListing(scrolls => [productUrl(syntheticAsin(scrolls + 1))]);
    const result = await new ScrollScraper({
      listing,
      opener: new FakeOpener({}),
      sleep: noSleep,
      options: { maxScrollSteps: 2, scrollStep: 300 }
    }).run();

    expect(result.reason).toBe('scroll-cap');
    expect(listing.scrolledPixels).toEqual([300, 300]);
    expect(result.state.offset).toBe(600);
  });

  it('skips an item that fails to open and carries on with the batch', async () => {
    const asins = ['B000000001', 'B000000002', 'B000000003'];
    const listing = FakeListing.fromFrames([asins.map(productUrl)]);
    const opener = new FakeOpener(pagesFor(asins), new Set([productUrl('B000000002')]));
    const events: TraversalEvent[] = [];

    const result = await new ScrollScraper({ listing, opener, sleep: noSleep, listener: e => events.push(e) }).run();

    expect(result.records.map(record => record.asin)).toEqual(['B000000001', 'B000000003']);
    expect(result.stats.failed).toBe(1);
    expect(result.stats.processed).toBe(2);
    const failure = events.find(event => event.type === 'item-failed');
    expect(failure).toMatchObject({ type: 'item-failed', asin: 'B000000002', href: productUrl('B000000002') });
    expect(opener.opened).toEqual([productUrl('B000000001'), productUrl('B000000003')]);
  });

  it('aborts with the item kept when a progress listener throws', async () => {
    const listing = FakeListing.fromFrames([[productUrl('B000000001')]]);
    const opener = new FakeOpener(pagesFor(['B000000001']));
    const events: string[] = [];
    const listener = (event: TraversalEvent): void => {
      events.push(event.type);
      if (event.type === 'item') {
        throw new Error('display closed');
      }
    };

    const error = await new ScrollScraper({ listing, opener, sleep: noSleep, listener }).run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TraversalAbortedError);
    if (error instanceof TraversalAbortedError) {
      expect(error.records.map(record => record.asin)).toEqual(['B000000001']);
      expect(error.stats.processed).toBe(1);
      expect(error.stats.failed).toBe(0);
    }
    expect(events).toEqual(['discovered', 'item']);
    expect(opener.closed).toBe(1);
  });

  it('processes a product linked twice on the same pass once', async () => {
    const url = productUrl('B000000001');
    const listing = FakeListing.fromFrames([[url, `${url}?th=1`, productUrl('B000000002')]]);
    const opener = new FakeOpener(pagesFor(['B000000001', 'B000000002']));

    const result = await new ScrollScraper({ listing, opener, sleep: noSleep }).run();

    expect(opener.opened).toEqual([url, productUrl('B000000002')]);
    expect(result.records).toHaveLength(2);
  });

  it('follows document order within a batch', async () => {
    const listing = new FakeListing(() => []);
    listing.discover = async () => [
      { href: productUrl('B000000002'), position: 1 },
      { href: productUrl('B000000001'), position: 0 }
    ];
    const opener = new FakeOpener({});

    await new ScrollScraper({ listing, opener, sleep: noSleep }).run();

    expect(opener.opened).toEqual([productUrl('B000000001'), productUrl('B000000002')]);
  });

  it('keeps the records collected before discovery fails', async () => {
    const listing = FakeListing.fromFrames([FIVE.map(productUrl)]);
    const discover = listing.discover.bind(listing);
    listing.discover = async () => {
      if (listing.discoverCalls >= 1) {
        throw new Error('page crashed');
      }
      return discover();
    };
    const opener = new FakeOpener(pagesFor(FIVE));

    const error = await new ScrollScraper({ listing, opener, sleep: noSleep }).run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TraversalAbortedError);
    if (error instanceof TraversalAbortedError) {
      expect(error.records).toHaveLength(5);
      expect(error.stats.processed).toBe(5);
      expect(error.message).toBe('Traversal aborted after 5 record(s): page crashed');
    }
  });

  it('starts every run with an empty visited set', async () => {
    const listing = FakeListing.fromFrames([FIVE.map(productUrl)]);
    const scraper = new ScrollScraper({ listing, opener: new FakeOpener(pagesFor(FIVE)), sleep: noSleep });

    const first = await scraper.run();
    const second = await scraper.run();

    expect(first.records).toHaveLength(5);
    expect(second.records).toHaveLength(5);
  });
});

describe('withDetailSession', () => {
  it('closes the session when the callback throws', async () => {
    const opener = new FakeOpener({});
    const handle = { href: productUrl('B000000001'), position: 0 };

    await expect(
      withDetailSession(opener, handle, () => {
        throw new Error('extraction failed');
      })
    ).rejects.toThrow('extraction failed');
    expect(opener.closed).toBe(1);
  });

  it('returns the callback result and closes the session', async () => {
    const opener = new FakeOpener({ [productUrl('B000000001')]: productPage({ title: 'Pens' }) });
    const name = await withDetailSession(opener, { href: productUrl('B000000001'), position: 0 }, view =>
      view.text('#productTitle')
    );
    expect(name).toBe('Pens');
    expect(opener.closed).toBe(1);
  });
});
