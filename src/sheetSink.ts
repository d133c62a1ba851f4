import type { ProductRecord } from './scrapers/businessDiscounts/types.js';

export type SheetValue = string | number;

export interface DestinationStoreClient {
  authenticate(): Promise<void>;
  open(tableId: string): Promise<void>;
  clear(): Promise<void>;
  bulkWrite(header: readonly string[], rows: readonly SheetValue[][]): Promise<void>;
}

export const SHEET_HEADER = [
  'ASIN',
  'Product Name',
  'Number of Products',
  'Reference Price (JPY)',
  'Price per Unit (JPY)',
  'Discount Rate (%)',
  'Discount Amount (JPY)'
] as const;

export type SinkStage = 'auth' | 'open' | 'clear' | 'write';

export type SinkResult =
  | { ok: true; rowsWritten: number }
  | { ok: false; stage: SinkStage; error: Error };

function cell(value: string | number | undefined): SheetValue {
  return value === undefined ? '' : value;
}

export function toSheetRow(record: ProductRecord): SheetValue[] {
  return [
    record.asin,
    record.name,
    cell(record.quantity),
    cell(record.referencePrice),
    cell(record.unitPrice),
    cell(record.discountRate),
    cell(record.discountAmount)
  ];
}

/**
 * Replaces the contents of one table with the header and the given records.
 *
 * Nothing is retried. A failure after `clear` leaves the table empty; the
 * result names the stage that failed so the caller can decide what to do.
 */
export class SheetSink {
  constructor(
    private readonly client: DestinationStoreClient,
    private readonly tableId: string
  ) {}

  async write(records: readonly ProductRecord[]): Promise<SinkResult> {
    const rows = records.map(toSheetRow);
    let stage: SinkStage = 'auth';
    try {
      await this.client.authenticate();
      stage = 'open';
      await this.client.open(this.tableId);
      stage = 'clear';
      await this.client.clear();
      stage = 'write';
      await this.client.bulkWrite(SHEET_HEADER, rows);
      return { ok: true, rowsWritten: rows.length };
    } catch (error) {
      return { ok: false, stage, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }
}
