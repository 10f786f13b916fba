import type { CombinationSourceClient } from '../clients/types.js';
import type { FailedIndexPolicy } from '../shared/config.js';
import { log } from '../shared/debug.js';
import {
  CellLineNotResolvableError,
  DrugNotResolvableError,
  errorMessage,
} from '../shared/errors.js';
import type { RunSummary } from '../shared/types.js';
import type { CellLineResolver } from './cell-line-resolver.js';
import type { AuditLog, AuditStage, CheckpointStore } from './checkpoint.js';
import type { DrugResolver } from './drug-resolver.js';
import type { ExperimentPipeline } from './experiment-pipeline.js';
import type { ScoreEngine } from './score-engine.js';

export interface StreamingPipelineDeps {
  source: CombinationSourceClient;
  drugs: DrugResolver;
  cellLines: CellLineResolver;
  scores: ScoreEngine;
  experiments: ExperimentPipeline;
  checkpoint: CheckpointStore;
  audit: AuditLog;
}

export interface StreamRange {
  /** First index, used only when there is no checkpoint. */
  start: number;
  /** Exclusive. */
  end: number;
  step: number;
}

type IndexOutcome = { kind: 'succeeded'; experimentId: number } | { kind: 'skipped' };

/**
 * Processes DrugCombDB combinations one index at a time: drugs and cell
 * line are resolved concurrently, then joined, classified and persisted.
 *
 * Unresolvable entities skip their index and are audited. Any other error
 * is audited, logged and counted; the run continues with the next index.
 * The checkpoint is written only after an index fully succeeds.
 */
export class StreamingPipeline {
  private readonly deps: StreamingPipelineDeps;
  private readonly policy: FailedIndexPolicy;

  constructor(deps: StreamingPipelineDeps, policy: FailedIndexPolicy = 'skip') {
    this.deps = deps;
    this.policy = policy;
  }

  async run(range: StreamRange): Promise<RunSummary> {
    if (!Number.isInteger(range.step) || range.step < 1) {
      throw new RangeError(`step must be a positive integer, got ${range.step}`);
    }

    const lastDone = this.deps.checkpoint.load();
    const start = lastDone !== null ? lastDone + 1 : range.start;
    const summary: RunSummary = { succeeded: 0, skipped: 0, failed: 0 };
    // Under 'retry' the first failure pins the checkpoint for the rest of the run
    let frozen = false;

    log('info', 'stream', `Starting from ${start} to ${range.end} (step=${range.step})`, {
      resumeFrom: lastDone,
      policy: this.policy,
    });

    for (let i = start; i < range.end; i += range.step) {
      try {
        const outcome = await this.processIndex(i);
        if (outcome.kind === 'skipped') {
          summary.skipped++;
          log('info', 'stream', `Skipped combination ${i}`);
          continue;
        }
        summary.succeeded++;
        log('info', 'stream', `Processed combination ${i} -> experiment ${outcome.experimentId}`);
        if (!frozen) {
          this.deps.checkpoint.save(i);
        }
      } catch (err) {
        summary.failed++;
        log('error', 'stream', `Failed to process combination ${i}`, { error: errorMessage(err) });
        if (this.policy === 'retry') {
          frozen = true;
        }
      }
    }

    log('info', 'stream', 'Run completed', { ...summary });
    return summary;
  }

  private async processIndex(index: number): Promise<IndexOutcome> {
    const record = await this.deps.source.getCombination(index);
    if (!record) {
      log('warn', 'stream', `No combination at index ${index}`);
      return { kind: 'skipped' };
    }

    const drugNames = [record.drug1, record.drug2];
    const [drugOutcome, cellOutcome] = await Promise.allSettled([
      this.deps.drugs.fetch(drugNames),
      this.deps.cellLines.fetch(record.cellLine),
    ]);

    if (drugOutcome.status === 'rejected') {
      return this.handleRejection(index, 'drug', drugOutcome.reason);
    }
    if (cellOutcome.status === 'rejected') {
      return this.handleRejection(index, 'cell_line', cellOutcome.reason);
    }

    const fetchedDrugs = drugOutcome.value;
    const fetchedCellLine = cellOutcome.value;
    this.deps.drugs.persist(fetchedDrugs);
    this.deps.cellLines.persist(fetchedCellLine);

    const { scores, classification } = this.deps.scores.run(record);
    const experimentId = this.deps.experiments.run({
      drugIds: fetchedDrugs.map((d) => d.chembl.drugId),
      cellLineId: fetchedCellLine.cellLine.cellLineId,
      classification,
      scores,
      drugNames,
      combinationId: index,
    });
    return { kind: 'succeeded', experimentId };
  }

  /**
   * Audits a failed resolution. Unresolvable entities skip the index; any
   * other error is rethrown.
   */
  private handleRejection(index: number, stage: AuditStage, reason: unknown): IndexOutcome {
    if (reason instanceof DrugNotResolvableError) {
      log('warn', 'stream', `Skipping combination ${index}: unresolved drug ${reason.drugName}`, {
        reason: reason.reason,
      });
      this.deps.audit.recordUnresolvable(index, stage, reason.drugName, reason.code);
      return { kind: 'skipped' };
    }
    if (reason instanceof CellLineNotResolvableError) {
      log('warn', 'stream', `Skipping combination ${index}: unresolved cell line ${reason.cellLineName}`);
      this.deps.audit.recordUnresolvable(index, stage, reason.cellLineName, null);
      return { kind: 'skipped' };
    }
    this.deps.audit.recordFailure(index, stage, reason);
    throw reason;
  }
}
