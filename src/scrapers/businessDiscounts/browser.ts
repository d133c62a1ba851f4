import fs from 'fs/promises';
import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import { HtmlDetailView } from './detailView.js';
import type { ListingControls } from './filters.js';
import { CARD_SELECTORS, extractItemHandles } from './listingCards.js';
import type { DetailOpener, DetailSession, ItemHandle, ListingSurface } from './types.js';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface BrowserSessionConfig {
  headless: boolean;
  storageStatePath?: string;
  timeoutMs: number;
  userAgent?: string;
}

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  close(): Promise<void>;
}

export type StorageStateCheck =
  | { status: 'ok'; path: string }
  | { status: 'missing'; path: string }
  | { status: 'invalid'; path: string; reason: string };

/**
 * A saved session is only reused when the file exists and holds JSON.
 */
export async function checkStorageState(filePath: string): Promise<StorageStateCheck> {
  let raw: string;
  try {
    raw = (await fs.readFile(filePath, 'utf8')).trim();
  } catch {
    return { status: 'missing', path: filePath };
  }
  if (!raw) {
    return { status: 'invalid', path: filePath, reason: 'file is empty' };
  }
  try {
    JSON.parse(raw);
  } catch (error) {
    return { status: 'invalid', path: filePath, reason: error instanceof Error ? error.message : String(error) };
  }
  return { status: 'ok', path: filePath };
}

export async function launchBrowserSession(config: BrowserSessionConfig): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: config.headless,
    args: ['--disable-blink-features=AutomationControlled', '--lang=ja-JP']
  });
  try {
    const context = await browser.newContext({
      locale: 'ja-JP',
      timezoneId: 'Asia/Tokyo',
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      viewport: { width: 1366, height: 900 },
      storageState: config.storageStatePath
    });
    context.setDefaultTimeout(config.timeoutMs);
    const page = await context.newPage();
    return { browser, context, page, close: () => browser.close() };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

export class PlaywrightListing implements ListingSurface {
  constructor(
    private readonly page: Page,
    private readonly cardSelectors: readonly string[] = CARD_SELECTORS
  ) {}

  async open(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  async discover(): Promise<ItemHandle[]> {
    return extractItemHandles(await this.page.content(), this.page.url(), this.cardSelectors);
  }

  async scrollBy(pixels: number): Promise<void> {
    await this.page.mouse.wheel(0, pixels);
  }
}

export class PlaywrightListingControls implements ListingControls {
  constructor(
    private readonly page: Page,
    private readonly clickTimeoutMs = 3000
  ) {}

  async click(candidates: readonly string[]): Promise<boolean> {
    for (const selector of candidates) {
      const target = this.page.locator(selector).first();
      if ((await target.count()) > 0) {
        await target.click({ force: true, timeout: this.clickTimeoutMs });
        return true;
      }
    }
    return false;
  }
}

export interface DetailOpenerOptions {
  timeoutMs: number;
  waitAfterLoadMs: number;
}

/**
 * Opens each product in its own tab of the shared context and snapshots the
 * loaded HTML. The tab stays open until the session is closed.
 */
export class PlaywrightDetailOpener implements DetailOpener {
  constructor(
    private readonly context: BrowserContext,
    private readonly options: DetailOpenerOptions
  ) {}

  async open(handle: ItemHandle): Promise<DetailSession> {
    const page = await this.context.newPage();
    try {
      await page.goto(handle.href, { waitUntil: 'domcontentloaded', timeout: this.options.timeoutMs });
      if (this.options.waitAfterLoadMs > 0) {
        await page.waitForTimeout(this.options.waitAfterLoadMs);
      }
      const html = await page.content();
      return {
        view: new HtmlDetailView(html, page.url()),
        close: () => page.close()
      };
    } catch (error) {
      await page.close();
      throw error;
    }
  }
}
