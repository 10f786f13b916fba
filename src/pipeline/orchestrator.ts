import { debug, log } from '../shared/debug.js';
import { errorMessage } from '../shared/errors.js';
import type { CombinationRecord, RunSummary } from '../shared/types.js';
import type { LocalMirror } from '../staging/source-mirror.js';
import type { StagingCellLineStore } from '../staging/staging-cell-lines.js';
import type { StagingDrugStore } from '../staging/staging-drugs.js';
import type { StagedCellLinePipeline } from './cell-line-pipeline.js';
import type { StagedDrugPipeline } from './drug-pipeline.js';
import type { ExperimentPipeline } from './experiment-pipeline.js';
import { normalizeDrugName } from './normalize.js';
import type { ScoreEngine } from './score-engine.js';

export interface BatchOrchestratorDeps {
  mirror: LocalMirror;
  drugPipeline: StagedDrugPipeline;
  cellLinePipeline: StagedCellLinePipeline;
  drugStaging: StagingDrugStore;
  cellLineStaging: StagingCellLineStore;
  scores: ScoreEngine;
  experiments: ExperimentPipeline;
}

export interface UniqueEntities {
  drugNames: Set<string>;
  cellLineNames: Set<string>;
}

/**
 * Distinct drug names (normalized) and cell line names referenced by the
 * combinations, so each entity is resolved once however often it appears.
 */
export function extractUniqueEntities(records: readonly CombinationRecord[]): UniqueEntities {
  const drugNames = new Set<string>();
  const cellLineNames = new Set<string>();
  for (const record of records) {
    drugNames.add(normalizeDrugName(record.drug1));
    drugNames.add(normalizeDrugName(record.drug2));
    cellLineNames.add(record.cellLine);
  }
  return { drugNames, cellLineNames };
}

/**
 * Batch run against the local DrugCombDB mirror:
 *
 * 1. Read pending combinations.
 * 2. Resolve their distinct drugs and cell lines through the staged
 *    pipelines, both entity types at once.
 * 3. Join each combination back to the resolved ids, classify and persist.
 *
 * Combinations missing a resolved drug or cell line stay pending and are
 * counted as skipped; a persistence failure marks the row `error`.
 */
export class BatchOrchestrator {
  private readonly deps: BatchOrchestratorDeps;

  constructor(deps: BatchOrchestratorDeps) {
    this.deps = deps;
  }

  async run(): Promise<RunSummary> {
    log('info', 'batch', 'Starting batch run');

    const records = this.deps.mirror.pendingCombinations();
    const { drugNames, cellLineNames } = extractUniqueEntities(records);
    log('info', 'batch', 'Pending combinations loaded', {
      combinations: records.length,
      drugs: drugNames.size,
      cellLines: cellLineNames.size,
    });

    await Promise.all([
      this.deps.drugPipeline.run(drugNames),
      this.deps.cellLinePipeline.run(cellLineNames),
    ]);

    const summary = this.persistExperiments(records);
    log('info', 'batch', 'Batch run completed', { ...summary });
    return summary;
  }

  private persistExperiments(records: readonly CombinationRecord[]): RunSummary {
    const drugMap = this.deps.drugStaging.resolvedMap();
    const cellMap = this.deps.cellLineStaging.resolvedMap();
    const summary: RunSummary = { succeeded: 0, skipped: 0, failed: 0 };

    for (const record of records) {
      const drug1 = drugMap.get(normalizeDrugName(record.drug1));
      const drug2 = drugMap.get(normalizeDrugName(record.drug2));
      const cellLineId = cellMap.get(record.cellLine);

      if (!drug1 || !drug2 || !cellLineId) {
        summary.skipped++;
        debug('batch', 'Unresolved combination', {
          id: record.id,
          drug1: drug1 ?? null,
          drug2: drug2 ?? null,
          cellLine: cellLineId ?? null,
        });
        continue;
      }

      try {
        const { scores, classification } = this.deps.scores.run(record);
        this.deps.experiments.run({
          drugIds: [drug1, drug2],
          cellLineId,
          classification,
          scores,
          drugNames: [record.drug1, record.drug2],
          combinationId: record.id,
        });
        this.deps.mirror.setStatus(record.id, 'processed');
        summary.succeeded++;
      } catch (err) {
        log('error', 'batch', `Failed to persist experiment for combination ${record.id}`, {
          error: errorMessage(err),
        });
        this.deps.mirror.setStatus(record.id, 'error');
        summary.failed++;
      }
    }

    return summary;
  }
}
