import { applyDiscount } from './discount.js';
import { extractProduct } from './extractor.js';
import { DedupTracker } from './tracker.js';
import type {
  DetailOpener,
  DetailView,
  ItemHandle,
  ListingSurface,
  ProductRecord,
  ScrollState,
  TerminationReason,
  TraversalListener,
  TraversalOptions,
  TraversalResult,
  TraversalStats
} from './types.js';

export const DEFAULT_TRAVERSAL_OPTIONS: TraversalOptions = {
  scrollStep: 500,
  settleDelayMs: 1500,
  itemDelayMs: 1000,
  emptyPassThreshold: 3,
  maxScrollSteps: 20
};

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Raised when discovery or scrolling fails mid-run. Carries whatever was
 * collected before the failure.
 */
export class TraversalAbortedError extends Error {
  constructor(
    readonly records: ProductRecord[],
    readonly state: ScrollState,
    readonly stats: TraversalStats,
    cause: unknown
  ) {
    super(`Traversal aborted after ${records.length} record(s): ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause
    });
    this.name = 'TraversalAbortedError';
  }
}

/**
 * Opens a detail session for `handle`, runs `use` on its view and closes the
 * session on every path out.
 */
export async function withDetailSession<T>(
  opener: DetailOpener,
  handle: ItemHandle,
  use: (view: DetailView) => T | Promise<T>
): Promise<T> {
  const session = await opener.open(handle);
  try {
    return await use(session.view);
  } finally {
    await session.close();
  }
}

export interface ScrollScraperDeps {
  listing: ListingSurface;
  opener: DetailOpener;
  options?: Partial<TraversalOptions>;
  listener?: TraversalListener;
  sleep?: (ms: number) => Promise<void>;
}

interface PendingItem {
  handle: ItemHandle;
  asin: string;
}

interface RunContext {
  tracker: DedupTracker;
  records: ProductRecord[];
  state: ScrollState;
  stats: TraversalStats;
}

export class ScrollScraper {
  private readonly listing: ListingSurface;
  private readonly opener: DetailOpener;
  private readonly options: TraversalOptions;
  private readonly listener: TraversalListener;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(deps: ScrollScraperDeps) {
    this.listing = deps.listing;
    this.opener = deps.opener;
    this.options = { ...DEFAULT_TRAVERSAL_OPTIONS, ...deps.options };
    this.listener = deps.listener ?? (() => undefined);
    this.wait = deps.sleep ?? sleep;
  }

  async run(): Promise<TraversalResult> {
    const ctx: RunContext = {
      tracker: new DedupTracker(),
      records: [],
      state: { offset: 0, consecutiveEmptyPasses: 0, totalPasses: 0 },
      stats: { discovered: 0, processed: 0, duplicates: 0, skipped: 0, failed: 0 }
    };

    try {
      for (let pass = 1; ; pass += 1) {
        const batch = await this.discover(ctx, pass);
        ctx.state.consecutiveEmptyPasses = batch.length === 0 ? ctx.state.consecutiveEmptyPasses + 1 : 0;

        for (const item of batch) {
          await this.processItem(ctx, item);
        }

        const reason = this.terminationReason(ctx.state);
        if (reason) {
          this.listener({ type: 'terminated', reason, state: { ...ctx.state }, stats: { ...ctx.stats } });
          return { records: [...ctx.records], state: { ...ctx.state }, stats: { ...ctx.stats }, reason };
        }

        await this.listing.scrollBy(this.options.scrollStep);
        ctx.state.offset += this.options.scrollStep;
        ctx.state.totalPasses += 1;
        this.listener({ type: 'scrolled', state: { ...ctx.state } });
        await this.wait(this.options.settleDelayMs);
      }
    } catch (error) {
      throw new TraversalAbortedError([...ctx.records], { ...ctx.state }, { ...ctx.stats }, error);
    }
  }

  private terminationReason(state: ScrollState): TerminationReason | null {
    if (state.consecutiveEmptyPasses >= this.options.emptyPassThreshold) {
      return 'empty-passes';
    }
    if (state.totalPasses >= this.options.maxScrollSteps) {
      return 'scroll-cap';
    }
    return null;
  }

  private async discover(ctx: RunContext, pass: number): Promise<PendingItem[]> {
    const handles = [...(await this.listing.discover())].sort((a, b) => a.position - b.position);
    const batch: PendingItem[] = [];
    const inBatch = new Set<string>();

    for (const handle of handles) {
      const admission = ctx.tracker.admit(handle.href);
      if (admission.status === 'malformed') {
        continue;
      }
      if (admission.status === 'seen' || inBatch.has(admission.asin)) {
        ctx.stats.duplicates += 1;
        continue;
      }
      inBatch.add(admission.asin);
      batch.push({ handle, asin: admission.asin });
    }

    ctx.stats.discovered += batch.length;
    ctx.stats.skipped = ctx.tracker.skipped;
    this.listener({ type: 'discovered', pass, found: handles.length, fresh: batch.length });
    return batch;
  }

  // Listener errors are not item failures; they propagate and abort the run.
  private async processItem(ctx: RunContext, item: PendingItem): Promise<void> {
    let record: ProductRecord | null = null;
    let failure: unknown = null;
    try {
      record = await withDetailSession(this.opener, item.handle, view =>
        applyDiscount(extractProduct(view, item.asin))
      );
      ctx.records.push(record);
      ctx.stats.processed += 1;
    } catch (error) {
      ctx.stats.failed += 1;
      failure = error;
    } finally {
      ctx.tracker.mark(item.asin);
    }

    if (record) {
      this.listener({ type: 'item', record, index: ctx.records.length });
    } else {
      this.listener({ type: 'item-failed', asin: item.asin, href: item.handle.href, error: failure });
    }
    await this.wait(this.options.itemDelayMs);
  }
}
