import { errorMessage } from '../shared/errors.js';
import { debug, debugTimed, log } from '../shared/debug.js';
import type { StageSummary } from '../shared/types.js';

/**
 * The two operations a stage needs from a staging table.
 */
export interface BatchStore<Row, Status, Update> {
  selectBatch(status: Status, limit: number): Row[];
  applyUpdates(updates: readonly Update[]): number;
}

export interface StageOptions<Row, Status, Update> {
  /** Label used in logs and in the returned summary, e.g. "drug.stage1". */
  stage: string;
  store: BatchStore<Row, Status, Update>;
  /** Rows are selected at exactly this status. */
  status: Status;
  batchSize: number;
  /** Resolves one row into its transition. May reject. */
  resolveRow: (row: Row) => Promise<Update>;
  /** Transition recorded when `resolveRow` rejects. */
  failRow: (row: Row, message: string) => Update;
  isFailure: (update: Update) => boolean;
}

/**
 * Drives every row at `status` through one stage, a batch at a time.
 *
 * A row's failure never aborts its batch. Each batch is written in one
 * transaction, then the next batch is selected; the loop ends when no rows
 * remain at `status`, or when a batch moves no rows.
 */
export async function runStage<Row, Status, Update>(
  options: StageOptions<Row, Status, Update>,
): Promise<StageSummary> {
  const { stage, store, status, batchSize, resolveRow, failRow, isFailure } = options;
  const summary: StageSummary = { stage, processed: 0, advanced: 0, failed: 0 };

  for (;;) {
    const batch = store.selectBatch(status, batchSize);
    if (batch.length === 0) {
      break;
    }

    const updates: Update[] = [];
    for (const row of batch) {
      let update: Update;
      try {
        update = await resolveRow(row);
      } catch (err) {
        update = failRow(row, errorMessage(err));
      }
      updates.push(update);
      if (isFailure(update)) {
        summary.failed++;
      } else {
        summary.advanced++;
      }
    }

    const changed = debugTimed('stage', `${stage} batch write`, () => store.applyUpdates(updates));
    summary.processed += batch.length;
    debug('stage', 'Batch written', { stage, rows: batch.length, changed });

    if (changed === 0) {
      // No row moved, so the next select would return the same batch
      break;
    }
  }

  log('info', 'stage', `${stage} completed`, {
    processed: summary.processed,
    advanced: summary.advanced,
    failed: summary.failed,
  });
  return summary;
}
