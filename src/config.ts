import path from 'path';

export const DEFAULT_LISTING_URL = 'https://www.amazon.co.jp/ab/business-discounts';
export const DEFAULT_STORAGE_STATE = 'amazon_session.json';

export interface CollectorConfig {
  listingUrl: string;
  sheetId?: string;
  sheetTab: string;
  storageStatePath: string;
  headless: boolean;
  scrollStep: number;
  settleDelayMs: number;
  itemDelayMs: number;
  waitAfterLoadMs: number;
  timeoutMs: number;
  csvPath?: string;
  verbose: boolean;
  categories: string[];
  minDiscountPercent?: number;
  sortByDiscount: boolean;
}

function intOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function listOf(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

function percentOr(value: string | undefined, fallback: number | undefined): number | undefined {
  const parsed = intOr(value, -1);
  return parsed > 0 && parsed <= 100 ? parsed : fallback;
}

function parseArgs(argv: readonly string[], defaults: CollectorConfig): Partial<CollectorConfig> {
  const config: Partial<CollectorConfig> = {};
  const categories: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === '--url' && next) {
      config.listingUrl = next;
      i += 1;
    } else if (arg === '--sheet-id' && next) {
      config.sheetId = next;
      i += 1;
    } else if (arg === '--tab' && next) {
      config.sheetTab = next;
      i += 1;
    } else if (arg === '--storage-state' && next) {
      config.storageStatePath = next;
      i += 1;
    } else if (arg === '--headful') {
      config.headless = false;
    } else if (arg === '--scroll-step' && next) {
      config.scrollStep = intOr(next, defaults.scrollStep);
      i += 1;
    } else if (arg === '--settle-delay' && next) {
      config.settleDelayMs = intOr(next, defaults.settleDelayMs);
      i += 1;
    } else if (arg === '--item-delay' && next) {
      config.itemDelayMs = intOr(next, defaults.itemDelayMs);
      i += 1;
    } else if (arg === '--wait-after-load' && next) {
      config.waitAfterLoadMs = intOr(next, defaults.waitAfterLoadMs);
      i += 1;
    } else if (arg === '--timeout' && next) {
      config.timeoutMs = intOr(next, defaults.timeoutMs);
      i += 1;
    } else if (arg === '--csv' && next) {
      config.csvPath = next;
      i += 1;
    } else if (arg === '--verbose') {
      config.verbose = true;
    } else if (arg === '--category' && next) {
      categories.push(...listOf(next));
      i += 1;
    } else if (arg === '--min-discount' && next) {
      config.minDiscountPercent = percentOr(next, defaults.minDiscountPercent);
      i += 1;
    } else if (arg === '--sort-by-discount') {
      config.sortByDiscount = true;
    }
  }
  if (categories.length > 0) {
    config.categories = categories;
  }
  return config;
}

/**
 * Defaults come from COLLECTOR_* environment variables; command-line flags win.
 */
export function buildConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): CollectorConfig {
  const defaults: CollectorConfig = {
    listingUrl: env.COLLECTOR_LISTING_URL || DEFAULT_LISTING_URL,
    sheetId: env.COLLECTOR_SHEET_ID || undefined,
    sheetTab: env.COLLECTOR_SHEET_TAB || 'Sheet1',
    storageStatePath: env.COLLECTOR_STORAGE_STATE || path.join(process.cwd(), DEFAULT_STORAGE_STATE),
    headless: env.COLLECTOR_HEADLESS !== 'false',
    scrollStep: intOr(env.COLLECTOR_SCROLL_STEP, 500),
    settleDelayMs: intOr(env.COLLECTOR_SETTLE_DELAY_MS, 1500),
    itemDelayMs: intOr(env.COLLECTOR_ITEM_DELAY_MS, 1000),
    waitAfterLoadMs: intOr(env.COLLECTOR_WAIT_AFTER_LOAD_MS, 500),
    timeoutMs: intOr(env.COLLECTOR_TIMEOUT_MS, 30000),
    csvPath: env.COLLECTOR_CSV_PATH || undefined,
    verbose: env.COLLECTOR_VERBOSE === 'true',
    categories: listOf(env.COLLECTOR_CATEGORIES),
    minDiscountPercent: percentOr(env.COLLECTOR_MIN_DISCOUNT, undefined),
    sortByDiscount: env.COLLECTOR_SORT_BY_DISCOUNT === 'true'
  };

  return { ...defaults, ...parseArgs(argv, defaults) };
}
