import { createObjectCsvWriter } from 'csv-writer';
import fs from 'fs/promises';
import path from 'path';
import { SHEET_HEADER, toSheetRow } from './sheetSink.js';
import type { ProductRecord } from './scrapers/businessDiscounts/types.js';

const COLUMN_IDS = [
  'asin',
  'name',
  'quantity',
  'referencePrice',
  'unitPrice',
  'discountRate',
  'discountAmount'
] as const;

/**
 * Writes the records to a local CSV file with the same columns as the sheet,
 * replacing the file if it exists.
 */
export async function exportRecordsCsv(filePath: string, records: readonly ProductRecord[]): Promise<number> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const writer = createObjectCsvWriter({
    path: filePath,
    header: COLUMN_IDS.map((id, index) => ({ id, title: SHEET_HEADER[index] })),
    append: false
  });

  const rows = records.map(record => {
    const values = toSheetRow(record);
    const row: Record<string, string | number> = {};
    COLUMN_IDS.forEach((id, index) => {
      row[id] = values[index];
    });
    return row;
  });

  await writer.writeRecords(rows);
  return rows.length;
}
