import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';

import type { FailedIndexPolicy } from '../../shared/config.js';
import { openTestDatabase } from '../../storage/__tests__/test-utils.js';
import { CellLineRepository } from '../../warehouse/cell-line-repository.js';
import { CombinationRepository } from '../../warehouse/combination-repository.js';
import { DrugRepository } from '../../warehouse/drug-repository.js';
import { ExperimentRepository } from '../../warehouse/experiment-repository.js';
import { ScoreRepository } from '../../warehouse/score-repository.js';
import { SourceRepository } from '../../warehouse/source-repository.js';
import { AuditLog, CheckpointStore } from '../checkpoint.js';
import { CellLineResolver } from '../cell-line-resolver.js';
import { DrugResolver } from '../drug-resolver.js';
import { ExperimentPipeline } from '../experiment-pipeline.js';
import { ScoreEngine } from '../score-engine.js';
import { StreamingPipeline } from '../streaming-pipeline.js';
import { fakeClients, sampleWorld, type FakeClients, type FakeWorld } from './fakes.js';

describe('StreamingPipeline', () => {
  let ctx: ReturnType<typeof openTestDatabase>;
  let world: FakeWorld;
  let clients: FakeClients;
  let checkpoint: CheckpointStore;
  let audit: AuditLog;

  beforeEach(() => {
    ctx = openTestDatabase(['warehouse']);
    world = sampleWorld();
    clients = fakeClients(world);
    checkpoint = new CheckpointStore(join(ctx.dir, 'checkpoints', 'stream.chkpt'));
    audit = new AuditLog(join(ctx.dir, 'audit', 'skipped.jsonl'));
  });

  afterEach(() => {
    ctx.cleanup();
  });

  function pipeline(policy: FailedIndexPolicy = 'skip'): StreamingPipeline {
    const db = ctx.edb.db;
    const sourceIds = new SourceRepository(db).resolveSourceIds();
    return new StreamingPipeline(
      {
        source: clients.source,
        drugs: new DrugResolver({ drugs: new DrugRepository(db), sourceIds, ...clients }),
        cellLines: new CellLineResolver({ cellLines: new CellLineRepository(db), sourceIds, ...clients }),
        scores: new ScoreEngine(new ScoreRepository(db)),
        experiments: new ExperimentPipeline(db, new CombinationRepository(db), new ExperimentRepository(db)),
        checkpoint,
        audit,
      },
      policy,
    );
  }

  function count(table: string): number {
    return ctx.edb.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
  }

  function addCombination(id: number, drug1: string, drug2: string, cellLine = 'A2058'): void {
    world.combinations.set(id, {
      id,
      drug1,
      drug2,
      cellLine,
      source: 'ONEIL',
      hsa: id,
      bliss: id,
      loewe: null,
      zip: null,
    });
  }

  it('loads one combination end to end and checkpoints it', async () => {
    const summary = await pipeline().run({ start: 1, end: 2, step: 1 });

    expect(summary).toEqual({ succeeded: 1, skipped: 0, failed: 0 });
    expect(checkpoint.load()).toBe(1);
    expect(count('experiment')).toBe(1);
    expect(count('experiment_score')).toBe(4);

    const classification = ctx.edb.db
      .prepare<[], { classification_name: string }>(
        `SELECT c.classification_name FROM experiment e
         JOIN experiment_classification c ON c.classification_id = e.classification_id`,
      )
      .get();
    expect(classification?.classification_name).toBe('Synergistic');
  });

  it('resumes after the checkpoint', async () => {
    addCombination(2, '5-FU', 'ABT-888');
    checkpoint.save(1);

    const summary = await pipeline().run({ start: 1, end: 3, step: 1 });

    expect(summary).toEqual({ succeeded: 1, skipped: 0, failed: 0 });
    expect(clients.source.getCombination.mock.calls.map(([i]) => i)).toEqual([2]);
    expect(checkpoint.load()).toBe(2);
  });

  it('walks the range by step', async () => {
    addCombination(3, '5-FU', 'ABT-888');
    await pipeline().run({ start: 1, end: 5, step: 2 });
    expect(clients.source.getCombination.mock.calls.map(([i]) => i)).toEqual([1, 3]);
  });

  it('audits and skips an unresolvable drug without checkpointing', async () => {
    world.combinations.clear();
    addCombination(1, 'ABT-888', 'Unknown(approved)');

    const summary = await pipeline().run({ start: 1, end: 2, step: 1 });

    expect(summary).toEqual({ succeeded: 0, skipped: 1, failed: 0 });
    expect(checkpoint.load()).toBeNull();
    expect(audit.read()).toEqual([
      expect.objectContaining({ combination_id: 1, stage: 'drug', entity: 'Unknown', code: 1 }),
    ]);
    expect(count('experiment')).toBe(0);
  });

  it('audits and skips an unresolvable cell line', async () => {
    world.combinations.clear();
    addCombination(1, '5-FU', 'ABT-888', 'Nowhere');

    const summary = await pipeline().run({ start: 1, end: 2, step: 1 });

    expect(summary.skipped).toBe(1);
    expect(audit.read()).toEqual([
      expect.objectContaining({ combination_id: 1, stage: 'cell_line', entity: 'Nowhere', code: null }),
    ]);
  });

  it('skips an index with no combination', async () => {
    const summary = await pipeline().run({ start: 5, end: 6, step: 1 });
    expect(summary).toEqual({ succeeded: 0, skipped: 1, failed: 0 });
    expect(checkpoint.load()).toBeNull();
  });

  describe('service failures', () => {
    beforeEach(() => {
      addCombination(2, '5-FU', 'Flaky');
      addCombination(3, '5-FU', 'ABT-888');
      clients.source.getDrug.mockImplementation(async (name) => {
        if (name === 'Flaky') throw new Error('HTTP 503');
        return world.sourceDrugs.get(name) ?? null;
      });
    });

    it('keeps advancing the checkpoint under the skip policy', async () => {
      const summary = await pipeline('skip').run({ start: 1, end: 4, step: 1 });

      expect(summary).toEqual({ succeeded: 2, skipped: 0, failed: 1 });
      expect(checkpoint.load()).toBe(3);
      expect(audit.read()).toEqual([
        expect.objectContaining({ combination_id: 2, stage: 'drug', message: 'HTTP 503' }),
      ]);
    });

    it('holds the checkpoint before the first failure under the retry policy', async () => {
      const summary = await pipeline('retry').run({ start: 1, end: 4, step: 1 });

      expect(summary).toEqual({ succeeded: 2, skipped: 0, failed: 1 });
      expect(checkpoint.load()).toBe(1);
    });
  });

  it('rejects a non-positive step', async () => {
    await expect(pipeline().run({ start: 1, end: 2, step: 0 })).rejects.toThrow(RangeError);
  });
});
