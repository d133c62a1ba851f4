import chalk from 'chalk';
import ora from 'ora';
import type { TraversalEvent } from './scrapers/businessDiscounts/types.js';

/** The part of an ora spinner the printer drives. */
export interface ProgressSpinner {
  text: string;
  start(text?: string): unknown;
  warn(text?: string): unknown;
  succeed(text?: string): unknown;
  fail(text?: string): unknown;
}

export interface ProgressPrinterOptions {
  verbose: boolean;
  interactive?: boolean;
  createSpinner?: (text: string) => ProgressSpinner;
  writeLine?: (line: string) => void;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatPrice(value: number | undefined): string {
  return value === undefined ? chalk.dim('—') : `¥${value.toLocaleString('ja-JP')}`;
}

/**
 * Prints traversal events. On an interactive terminal without `verbose` a
 * spinner carries the running counts; failed items are always printed with
 * their reason.
 */
export class ProgressPrinter {
  private spinner: ProgressSpinner | null = null;
  private pass = 0;
  private processed = 0;
  private failed = 0;
  private readonly verbose: boolean;
  private readonly interactive: boolean;
  private readonly createSpinner: (text: string) => ProgressSpinner;
  private readonly writeLine: (line: string) => void;

  constructor(options: ProgressPrinterOptions) {
    this.verbose = options.verbose;
    this.interactive = options.interactive ?? Boolean(process.stdout.isTTY);
    this.createSpinner = options.createSpinner ?? (text => ora({ text, color: 'cyan' }));
    this.writeLine = options.writeLine ?? (line => console.log(line));
  }

  start(): void {
    if (this.interactive && !this.verbose) {
      this.spinner = this.createSpinner('Collecting products...');
      this.spinner.start();
    }
  }

  handle = (event: TraversalEvent): void => {
    switch (event.type) {
      case 'discovered':
        this.pass = event.pass;
        this.log(chalk.dim(`[Pass ${event.pass}] ${event.found} link(s) visible, ${event.fresh} new`));
        break;
      case 'item':
        this.processed += 1;
        if (this.verbose) {
          const { record } = event;
          this.writeLine(
            `  ${chalk.green('✓')} [${event.index}] ${chalk.cyan(record.asin)} ${record.name.slice(0, 50)} ` +
              `${formatPrice(record.unitPrice)}` +
              (record.discountRate === undefined ? '' : chalk.magenta(` (${record.discountRate}% off)`))
          );
        }
        break;
      case 'item-failed':
        this.failed += 1;
        this.warn(`Skipped ${event.asin}: ${describeError(event.error)}`);
        break;
      case 'scrolled':
        this.log(chalk.dim(`[Scroll ${event.state.totalPasses}] offset ${event.state.offset}px`));
        break;
      case 'terminated':
        this.log(
          chalk.dim(
            event.reason === 'empty-passes'
              ? `No new products after ${event.state.consecutiveEmptyPasses} consecutive passes`
              : `Reached the scroll limit (${event.state.totalPasses} scrolls)`
          )
        );
        break;
    }
    if (this.spinner) {
      this.spinner.text = this.progressText();
    }
  };

  succeed(text: string): void {
    if (this.spinner) {
      this.spinner.succeed(chalk.green(text));
    } else {
      this.writeLine(chalk.green(`✓ ${text}`));
    }
  }

  fail(text: string): void {
    if (this.spinner) {
      this.spinner.fail(chalk.red(text));
    } else {
      this.writeLine(chalk.red(`✗ ${text}`));
    }
  }

  private progressText(): string {
    return `Collecting products... pass ${this.pass} · ${this.processed} collected · ${this.failed} failed`;
  }

  // Persists the line above the spinner, then resumes it.
  private warn(line: string): void {
    if (this.spinner) {
      this.spinner.warn(chalk.yellow(line));
      this.spinner.start(this.progressText());
    } else {
      this.writeLine(chalk.yellow(`  ✗ ${line}`));
    }
  }

  private log(line: string): void {
    if (!this.spinner) {
      this.writeLine(line);
    }
  }
}
