import type BetterSqlite3 from 'better-sqlite3';

import { log } from '../shared/debug.js';
import type { Classification, ResolvedScore } from '../shared/types.js';
import type { CombinationRepository } from '../warehouse/combination-repository.js';
import type { ExperimentRepository } from '../warehouse/experiment-repository.js';
import { withUnitOfWork } from '../warehouse/unit-of-work.js';
import { classificationName } from './score-engine.js';

/** Name of the experiment_source row for everything this pipeline loads. */
export const EXPERIMENT_SOURCE = 'DrugCombDB';

export interface ExperimentInput {
  /** Cured (ChEMBL) ids of the combined drugs. */
  drugIds: readonly string[];
  cellLineId: string;
  classification: Classification;
  scores: ResolvedScore[];
  /** For log context only. */
  drugNames: readonly string[];
  /** Source combination id, for log context only. */
  combinationId: number;
}

/**
 * Combination → classification → source → experiment, each get-or-create,
 * committed together or not at all.
 */
export class ExperimentPipeline {
  private readonly db: BetterSqlite3.Database;
  private readonly combinations: CombinationRepository;
  private readonly experiments: ExperimentRepository;

  constructor(
    db: BetterSqlite3.Database,
    combinations: CombinationRepository,
    experiments: ExperimentRepository,
  ) {
    this.db = db;
    this.combinations = combinations;
    this.experiments = experiments;
  }

  /**
   * Returns the experiment id, existing or new.
   */
  run(input: ExperimentInput): number {
    const name = classificationName(input.classification);
    if (input.classification === 0) {
      log('warn', 'experiment', `Combination ${input.combinationId} is classified as Additive`, {
        drugs: input.drugNames.join(', '),
      });
    }

    try {
      return withUnitOfWork(this.db, () => {
        const combinationId = this.combinations.getOrCreate(input.drugIds);
        const classificationId = this.experiments.getOrCreateClassification(name);
        const sourceId = this.experiments.getOrCreateSource(EXPERIMENT_SOURCE);

        return this.experiments.getOrCreate({
          drugCombinationId: combinationId,
          cellLineId: input.cellLineId,
          classificationId,
          sourceId,
          scores: input.scores,
        });
      });
    } catch (error) {
      // Rolled back: ids cached inside the unit were never committed
      this.combinations.forget(input.drugIds);
      this.experiments.forgetNames(name, EXPERIMENT_SOURCE);
      throw error;
    }
  }
}
