import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { Experiment } from '../../shared/types.js';
import { openTestDatabase } from '../../storage/__tests__/test-utils.js';
import { CombinationRepository } from '../combination-repository.js';
import { ExperimentRepository, computeExperimentHash } from '../experiment-repository.js';
import { ScoreRepository } from '../score-repository.js';
import { seedWarehouse } from './fixtures.js';

describe('ExperimentRepository', () => {
  let ctx: ReturnType<typeof openTestDatabase>;
  let experiment: Experiment;

  beforeEach(() => {
    ctx = openTestDatabase(['warehouse']);
    seedWarehouse(ctx.edb.db, ['CHEMBL_A', 'CHEMBL_B']);
    const dcId = new CombinationRepository(ctx.edb.db).getOrCreate(['CHEMBL_A', 'CHEMBL_B']);
    const scores = new ScoreRepository(ctx.edb.db);
    const experiments = new ExperimentRepository(ctx.edb.db);
    experiment = {
      drugCombinationId: dcId,
      cellLineId: 'CVCL_TEST',
      classificationId: experiments.getOrCreateClassification('Synergistic'),
      sourceId: experiments.getOrCreateSource('DrugCombDB'),
      scores: [
        { scoreName: 'HSA', scoreValue: 5.5369, scoreId: scores.getOrCreate('HSA') },
        { scoreName: 'ZIP', scoreValue: 1.7183, scoreId: scores.getOrCreate('ZIP') },
      ],
    };
  });

  afterEach(() => {
    ctx.cleanup();
  });

  it('hashes independently of score order', () => {
    const reversed = { ...experiment, scores: [...experiment.scores].reverse() };
    expect(computeExperimentHash(reversed)).toBe(computeExperimentHash(experiment));
    expect(computeExperimentHash({ ...experiment, cellLineId: 'CVCL_OTHER' })).not.toBe(
      computeExperimentHash(experiment),
    );
  });

  it('stores an experiment once with its scores', () => {
    const repo = new ExperimentRepository(ctx.edb.db);
    const id = repo.getOrCreate(experiment);
    expect(new ExperimentRepository(ctx.edb.db).getOrCreate(experiment)).toBe(id);

    const count = ctx.edb.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM experiment').get();
    expect(count?.n).toBe(1);
    expect(repo.scoresOf(id)).toEqual([
      { scoreId: experiment.scores[0].scoreId, scoreValue: 5.5369 },
      { scoreId: experiment.scores[1].scoreId, scoreValue: 1.7183 },
    ]);
  });

  it('backfills scores missing from a stored experiment', () => {
    const id = new ExperimentRepository(ctx.edb.db).getOrCreate(experiment);
    ctx.edb.db
      .prepare<[number, number]>('DELETE FROM experiment_score WHERE experiment_id = ? AND score_id = ?')
      .run(id, experiment.scores[1].scoreId);

    const repo = new ExperimentRepository(ctx.edb.db);
    expect(repo.getOrCreate(experiment)).toBe(id);
    expect(repo.scoresOf(id)).toHaveLength(2);
  });

  it('reuses classification and source rows', () => {
    const repo = new ExperimentRepository(ctx.edb.db);
    expect(repo.getOrCreateClassification('Synergistic')).toBe(experiment.classificationId);
    expect(repo.getOrCreateSource('DrugCombDB')).toBe(experiment.sourceId);
    expect(repo.getOrCreateClassification('Additive')).not.toBe(experiment.classificationId);
  });
});
