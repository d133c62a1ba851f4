import { exportRecordsCsv } from './csvExport.js';
import type { SinkResult, SinkStage } from './sheetSink.js';
import { TraversalAbortedError } from './scrapers/businessDiscounts/traversal.js';
import type {
  ProductRecord,
  TraversalResult,
  TraversalStats
} from './scrapers/businessDiscounts/types.js';

export type LocalCopy =
  | { path: string; ok: true; rows: number }
  | { path: string; ok: false; error: Error };

interface OutcomeBase {
  records: readonly ProductRecord[];
  stats: TraversalStats | null;
  localCopy?: LocalCopy;
}

export type CollectionOutcome =
  | (OutcomeBase & { status: 'delivered'; traversal: TraversalResult; rowsWritten: number })
  | (OutcomeBase & { status: 'write-failed'; traversal: TraversalResult; stage: SinkStage; error: Error })
  | (OutcomeBase & { status: 'aborted'; error: Error });

export interface RecordSink {
  write(records: readonly ProductRecord[]): Promise<SinkResult>;
}

export interface CollectionDeps {
  collect: () => Promise<TraversalResult>;
  sink: RecordSink;
  csvPath?: string;
  exportCsv?: (filePath: string, records: readonly ProductRecord[]) => Promise<number>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function writeLocalCopy(deps: CollectionDeps, records: readonly ProductRecord[]): Promise<LocalCopy | undefined> {
  if (!deps.csvPath) {
    return undefined;
  }
  const exportCsv = deps.exportCsv ?? exportRecordsCsv;
  try {
    const rows = await exportCsv(deps.csvPath, records);
    return { path: deps.csvPath, ok: true, rows };
  } catch (error) {
    return { path: deps.csvPath, ok: false, error: toError(error) };
  }
}

/**
 * Runs one collection and hands the records to the sink.
 *
 * An aborted collection is not written to the sink, since that would replace
 * the table with a partial result; its records are still returned (and copied
 * to the local CSV when one is configured).
 */
export async function runCollection(deps: CollectionDeps): Promise<CollectionOutcome> {
  let traversal: TraversalResult;
  try {
    traversal = await deps.collect();
  } catch (error) {
    const records = error instanceof TraversalAbortedError ? error.records : [];
    const stats = error instanceof TraversalAbortedError ? error.stats : null;
    const localCopy = await writeLocalCopy(deps, records);
    return { status: 'aborted', records, stats, error: toError(error), localCopy };
  }

  const records = traversal.records;
  const localCopy = await writeLocalCopy(deps, records);
  const result = await deps.sink.write([...records]);
  if (result.ok) {
    return { status: 'delivered', records, stats: traversal.stats, traversal, rowsWritten: result.rowsWritten, localCopy };
  }
  return {
    status: 'write-failed',
    records,
    stats: traversal.stats,
    traversal,
    stage: result.stage,
    error: result.error,
    localCopy
  };
}
