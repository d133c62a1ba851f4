#!/usr/bin/env node

import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import ora from 'ora';
import type { Page } from 'playwright';
import fs from 'fs/promises';
import path from 'path';
import { buildConfig } from './config.js';
import type { CollectorConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { runCollection } from './collector.js';
import type { CollectionOutcome, RecordSink } from './collector.js';
import { createAccessTokenSource, defaultKeyPath, GoogleSheetsClient } from './googleSheetsSync.js';
import { SheetSink } from './sheetSink.js';
import {
  checkStorageState,
  launchBrowserSession,
  PlaywrightDetailOpener,
  PlaywrightListing,
  PlaywrightListingControls
} from './scrapers/businessDiscounts/browser.js';
import { applyListingFilters } from './scrapers/businessDiscounts/filters.js';
import type { ListingFilters } from './scrapers/businessDiscounts/filters.js';
import { ScrollScraper } from './scrapers/businessDiscounts/traversal.js';
import type { TraversalResult } from './scrapers/businessDiscounts/types.js';
import { ProgressPrinter } from './progress.js';

async function applyFilters(page: Page, config: CollectorConfig): Promise<void> {
  const filters: ListingFilters = {
    categories: config.categories,
    minDiscountPercent: config.minDiscountPercent,
    sortByDiscount: config.sortByDiscount
  };
  if (filters.categories.length === 0 && filters.minDiscountPercent === undefined && !filters.sortByDiscount) {
    return;
  }

  const spinner = ora({ text: 'Applying listing filters...', color: 'cyan' }).start();
  const outcomes = await applyListingFilters(new PlaywrightListingControls(page), filters);
  spinner.stop();
  for (const outcome of outcomes) {
    const label = `${outcome.step}: ${outcome.detail}`;
    console.log(outcome.status === 'applied' ? chalk.green(`  ✓ ${label}`) : chalk.yellow(`  ! ${label}`));
  }
}

async function traverse(config: CollectorConfig, printer: ProgressPrinter): Promise<TraversalResult> {
  const storage = await checkStorageState(config.storageStatePath);
  if (storage.status === 'invalid') {
    console.log(chalk.yellow(`Ignoring saved session ${storage.path}: ${storage.reason}`));
  } else if (storage.status === 'missing') {
    console.log(chalk.dim(`No saved session at ${storage.path}; continuing without one`));
  }

  const launchSpinner = ora({ text: 'Launching Chromium...', color: 'cyan' }).start();
  const session = await launchBrowserSession({
    headless: config.headless,
    storageStatePath: storage.status === 'ok' ? storage.path : undefined,
    timeoutMs: config.timeoutMs
  }).catch(error => {
    launchSpinner.fail(chalk.red('Browser launch failed'));
    throw error;
  });

  try {
    const listing = new PlaywrightListing(session.page);
    launchSpinner.text = `Opening ${config.listingUrl}...`;
    await listing.open(config.listingUrl, config.timeoutMs);
    launchSpinner.succeed(chalk.green('Listing page loaded'));
    await applyFilters(session.page, config);

    const scraper = new ScrollScraper({
      listing,
      opener: new PlaywrightDetailOpener(session.context, {
        timeoutMs: config.timeoutMs,
        waitAfterLoadMs: config.waitAfterLoadMs
      }),
      options: {
        scrollStep: config.scrollStep,
        settleDelayMs: config.settleDelayMs,
        itemDelayMs: config.itemDelayMs
      },
      listener: printer.handle
    });

    printer.start();
    try {
      const result = await scraper.run();
      printer.succeed(`Collected ${result.records.length} product(s)`);
      return result;
    } catch (error) {
      printer.fail('Collection stopped early');
      throw error;
    }
  } finally {
    if (launchSpinner.isSpinning) {
      launchSpinner.fail(chalk.red('Listing page failed to load'));
    }
    await session.close();
  }
}

function printSummary(outcome: CollectionOutcome, config: CollectorConfig): void {
  const table = new Table({
    style: { head: ['cyan'], border: ['grey'] },
    colWidths: [24, 44]
  });
  const stats = outcome.stats;
  table.push(
    [chalk.bold('Records collected'), chalk.cyan(String(outcome.records.length))],
    [chalk.bold('New links discovered'), String(stats?.discovered ?? 0)],
    [chalk.bold('Repeated links'), String(stats?.duplicates ?? 0)],
    [chalk.bold('Unparseable links'), String(stats?.skipped ?? 0)],
    [chalk.bold('Failed items'), stats && stats.failed > 0 ? chalk.yellow(String(stats.failed)) : '0']
  );
  if (outcome.status !== 'aborted') {
    table.push(
      [chalk.bold('Scrolls'), String(outcome.traversal.state.totalPasses)],
      [chalk.bold('Stopped because'), outcome.traversal.reason === 'empty-passes' ? 'no new products' : 'scroll limit']
    );
  }
  if (outcome.localCopy) {
    table.push([
      chalk.bold('Local CSV'),
      outcome.localCopy.ok
        ? chalk.green(outcome.localCopy.path)
        : chalk.yellow(`${outcome.localCopy.path}: ${outcome.localCopy.error.message}`)
    ]);
  }
  console.log(table.toString());

  let message: string;
  let color: 'green' | 'yellow' | 'red';
  switch (outcome.status) {
    case 'delivered':
      message = chalk.green.bold(`✓ Wrote ${outcome.rowsWritten} row(s) to "${config.sheetTab}"`);
      color = 'green';
      break;
    case 'write-failed':
      message =
        chalk.yellow.bold(`Collection finished but the sheet write failed (${outcome.stage})\n\n`) +
        chalk.yellow(outcome.error.message);
      color = 'yellow';
      break;
    case 'aborted':
      message = chalk.red.bold('Collection aborted\n\n') + chalk.red(outcome.error.message);
      color = 'red';
      break;
  }
  console.log(boxen(message, { padding: 1, margin: { top: 1, bottom: 1 }, borderStyle: 'round', borderColor: color }));
}

async function runCollect(config: CollectorConfig): Promise<void> {
  console.log(chalk.bold.cyan('\n━━━━━━━━ BUSINESS DISCOUNT COLLECTOR ━━━━━━━━\n'));
  if (!config.sheetId) {
    console.log(chalk.red('No spreadsheet configured. Set COLLECTOR_SHEET_ID or pass --sheet-id.'));
    process.exitCode = 1;
    return;
  }

  const printer = new ProgressPrinter({ verbose: config.verbose });
  const sheet = new SheetSink(
    new GoogleSheetsClient({ spreadsheetId: config.sheetId, tokenSource: createAccessTokenSource() }),
    config.sheetTab
  );
  const sink: RecordSink = {
    write: async records => {
      const spinner = ora({ text: `Writing ${records.length} row(s) to "${config.sheetTab}"...`, color: 'cyan' }).start();
      const result = await sheet.write(records);
      if (result.ok) {
        spinner.succeed(chalk.green('Sheet updated'));
      } else {
        spinner.fail(chalk.red(`Sheet write failed at ${result.stage}`));
      }
      return result;
    }
  };

  const outcome = await runCollection({
    collect: () => traverse(config, printer),
    sink,
    csvPath: config.csvPath
  });

  printSummary(outcome, config);
  process.exitCode = outcome.status === 'delivered' ? 0 : 1;
}

async function runDoctor(config: CollectorConfig, envLoaded: boolean): Promise<void> {
  console.log(chalk.bold.cyan('\n━━━━━━━━ COLLECTOR DOCTOR ━━━━━━━━\n'));

  const checks: Array<{ label: string; ok: boolean; required: boolean; detail?: string }> = [];

  checks.push({ label: '.env file', ok: envLoaded, required: false, detail: path.join(process.cwd(), '.env') });
  checks.push({
    label: 'Spreadsheet id',
    ok: Boolean(config.sheetId),
    required: true,
    detail: config.sheetId ? `${config.sheetId} / ${config.sheetTab}` : 'set COLLECTOR_SHEET_ID'
  });

  const key = defaultKeyPath();
  try {
    await fs.access(key.path);
    checks.push({ label: 'Service account key', ok: true, required: false, detail: key.path });
  } catch {
    checks.push({
      label: 'Service account key',
      ok: false,
      required: key.explicit,
      detail: key.explicit ? `${key.path} not readable` : 'not found; gcloud login will be used'
    });
  }

  const storage = await checkStorageState(config.storageStatePath);
  checks.push({
    label: 'Saved session',
    ok: storage.status === 'ok',
    required: false,
    detail: storage.status === 'invalid' ? `${storage.path}: ${storage.reason}` : storage.path
  });

  const table = new Table({
    style: { head: ['cyan'], border: ['grey'] },
    colWidths: [24, 60]
  });
  for (const check of checks) {
    const mark = check.ok ? chalk.green('✓') : check.required ? chalk.red('✗') : chalk.yellow('!');
    table.push([`${mark} ${check.label}`, check.detail ?? '']);
  }
  console.log(table.toString());

  if (checks.some(check => check.required && !check.ok)) {
    process.exitCode = 1;
  }
}

function printHelp(): void {
  console.log(`
Usage:
  discount-collector [command] [options]

Commands:
  (none)                 Collect the listing and write it to the sheet
  doctor                 Check configuration, credentials and saved session
  -h, --help             Show this help menu

Options:
  --url <url>            Listing page (COLLECTOR_LISTING_URL)
  --sheet-id <id>        Target spreadsheet (COLLECTOR_SHEET_ID)
  --tab <title>          Target tab, created if missing (COLLECTOR_SHEET_TAB)
  --storage-state <file> Saved browser session (COLLECTOR_STORAGE_STATE)
  --headful              Show the browser window
  --scroll-step <px>     Pixels per scroll step (default 500)
  --settle-delay <ms>    Wait after each scroll (default 1500)
  --item-delay <ms>      Wait after each product (default 1000)
  --wait-after-load <ms> Wait after a product page loads (default 500)
  --timeout <ms>         Navigation timeout (default 30000)
  --csv <file>           Also write the records to a local CSV file
  --category <label>     Tick a listing category before collecting (repeatable)
  --min-discount <pct>   Apply the listing's minimum business discount filter
  --sort-by-discount     Sort the listing by business discount, descending
  --verbose              Print one line per product
`.trim());
  console.log('');
}

async function main(): Promise<void> {
  const envLoaded = await loadDotEnv();
  const argv = process.argv.slice(2);
  const config = buildConfig(argv);

  if (argv.includes('-h') || argv.includes('--help') || argv[0] === 'help') {
    printHelp();
  } else if (argv[0] === 'doctor') {
    await runDoctor(config, envLoaded);
  } else if (argv.length > 0 && !argv[0].startsWith('--')) {
    console.log(chalk.red(`Unknown command: ${argv[0]}`));
    printHelp();
    process.exitCode = 1;
  } else {
    await runCollect(config);
  }
}

main().catch(error => {
  console.error(chalk.red.bold('\n❌ Fatal error:'), error);
  process.exitCode = 1;
});
