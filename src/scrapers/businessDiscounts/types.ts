export interface ProductRecord {
  asin: string;
  name: string;
  quantity?: string;
  referencePrice?: number;
  unitPrice?: number;
  discountRate?: number;
  discountAmount?: number;
}

/** A product link found on the listing page, in document order. */
export interface ItemHandle {
  href: string;
  position: number;
}

export interface ListingSurface {
  discover(): Promise<ItemHandle[]>;
  scrollBy(pixels: number): Promise<void>;
}

/** Read-only, selector-based access to a loaded product page. */
export interface DetailView {
  url(): string;
  text(selector: string): string | null;
  attribute(selector: string, name: string): string | null;
}

export interface DetailSession {
  view: DetailView;
  close(): Promise<void>;
}

export interface DetailOpener {
  open(handle: ItemHandle): Promise<DetailSession>;
}

export interface ScrollState {
  offset: number;
  consecutiveEmptyPasses: number;
  totalPasses: number;
}

export interface TraversalStats {
  discovered: number;
  processed: number;
  duplicates: number;
  skipped: number;
  failed: number;
}

export type TerminationReason = 'empty-passes' | 'scroll-cap';

export interface TraversalResult {
  records: ProductRecord[];
  state: ScrollState;
  stats: TraversalStats;
  reason: TerminationReason;
}

export type TraversalEvent =
  | { type: 'discovered'; pass: number; found: number; fresh: number }
  | { type: 'item'; record: ProductRecord; index: number }
  | { type: 'item-failed'; asin: string; href: string; error: unknown }
  | { type: 'scrolled'; state: ScrollState }
  | { type: 'terminated'; reason: TerminationReason; state: ScrollState; stats: TraversalStats };

export type TraversalListener = (event: TraversalEvent) => void;

export interface TraversalOptions {
  scrollStep: number;
  settleDelayMs: number;
  itemDelayMs: number;
  emptyPassThreshold: number;
  maxScrollSteps: number;
}
