import type BetterSqlite3 from 'better-sqlite3';
import { createHash } from 'node:crypto';

import { LruCache } from '../shared/cache.js';
import { debug } from '../shared/debug.js';
import type { Experiment, ResolvedScore } from '../shared/types.js';
import { insertIfAbsent, withUnitOfWork } from './unit-of-work.js';

/**
 * Scores ordered by (scoreId, scoreValue), the order used for hashing.
 */
export function sortScores(scores: readonly ResolvedScore[]): ResolvedScore[] {
  return [...scores].sort((a, b) => a.scoreId - b.scoreId || a.scoreValue - b.scoreValue);
}

/**
 * Content hash identifying an experiment. Independent of score order, so
 * re-runs and overlapping source ranges map onto the same row.
 */
export function computeExperimentHash(experiment: Experiment): string {
  const canonical = JSON.stringify({
    combination: experiment.drugCombinationId,
    cellLine: experiment.cellLineId,
    classification: experiment.classificationId,
    source: experiment.sourceId,
    scores: sortScores(experiment.scores).map((s) => [s.scoreId, s.scoreValue]),
  });
  return createHash('sha256').update(canonical).digest('hex');
}

type ExperimentParams = [number, string, number, number, string];

/**
 * Experiments, their classification and source lookups, and their scores.
 */
export class ExperimentRepository {
  private readonly db: BetterSqlite3.Database;
  private readonly cache = new LruCache<string, number>(10_000);
  private readonly classificationCache = new Map<string, number>();
  private readonly sourceCache = new Map<string, number>();

  private readonly stmtInsertExperiment: BetterSqlite3.Statement<ExperimentParams>;
  private readonly stmtGetByHash: BetterSqlite3.Statement<[string], { experiment_id: number }>;
  private readonly stmtInsertScore: BetterSqlite3.Statement<[number, number, number]>;
  private readonly stmtCountScores: BetterSqlite3.Statement<[number], { count: number }>;
  private readonly stmtScores: BetterSqlite3.Statement<[number], { score_id: number; score_value: number }>;
  private readonly stmtGetClassification: BetterSqlite3.Statement<[string], { classification_id: number }>;
  private readonly stmtInsertClassification: BetterSqlite3.Statement<[string]>;
  private readonly stmtGetSource: BetterSqlite3.Statement<[string], { source_id: number }>;
  private readonly stmtInsertSource: BetterSqlite3.Statement<[string]>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtInsertExperiment = db.prepare<ExperimentParams>(`
      INSERT INTO experiment (dc_id, cell_line_id, classification_id, source_id, experiment_hash)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(experiment_hash) DO NOTHING
    `);

    this.stmtGetByHash = db.prepare<[string], { experiment_id: number }>(
      'SELECT experiment_id FROM experiment WHERE experiment_hash = ?',
    );

    this.stmtInsertScore = db.prepare<[number, number, number]>(`
      INSERT INTO experiment_score (experiment_id, score_id, score_value)
      VALUES (?, ?, ?)
      ON CONFLICT(experiment_id, score_id) DO NOTHING
    `);

    this.stmtCountScores = db.prepare<[number], { count: number }>(
      'SELECT COUNT(*) AS count FROM experiment_score WHERE experiment_id = ?',
    );

    this.stmtScores = db.prepare<[number], { score_id: number; score_value: number }>(
      'SELECT score_id, score_value FROM experiment_score WHERE experiment_id = ? ORDER BY score_id',
    );

    this.stmtGetClassification = db.prepare<[string], { classification_id: number }>(
      'SELECT classification_id FROM experiment_classification WHERE classification_name = ?',
    );
    this.stmtInsertClassification = db.prepare<[string]>(`
      INSERT INTO experiment_classification (classification_name) VALUES (?)
      ON CONFLICT(classification_name) DO NOTHING
    `);

    this.stmtGetSource = db.prepare<[string], { source_id: number }>(
      'SELECT source_id FROM experiment_source WHERE source_name = ?',
    );
    this.stmtInsertSource = db.prepare<[string]>(`
      INSERT INTO experiment_source (source_name) VALUES (?)
      ON CONFLICT(source_name) DO NOTHING
    `);
  }

  getOrCreateClassification(name: string): number {
    return this.getOrCreateNamed(
      name,
      this.classificationCache,
      () => this.stmtGetClassification.get(name)?.classification_id,
      () => insertIfAbsent(this.stmtInsertClassification, name).rowid,
    );
  }

  getOrCreateSource(name: string): number {
    return this.getOrCreateNamed(
      name,
      this.sourceCache,
      () => this.stmtGetSource.get(name)?.source_id,
      () => insertIfAbsent(this.stmtInsertSource, name).rowid,
    );
  }

  /**
   * Returns the id of the experiment with this content, creating it and its
   * scores when absent. When the hash already exists but holds a different
   * number of scores, the missing ones are added; scores already present
   * are left alone.
   */
  getOrCreate(experiment: Experiment): number {
    const hash = computeExperimentHash(experiment);

    const cached = this.cache.get(hash);
    if (cached !== undefined) {
      return cached;
    }

    const id = withUnitOfWork(this.db, () => {
      const outcome = insertIfAbsent(
        this.stmtInsertExperiment,
        experiment.drugCombinationId,
        experiment.cellLineId,
        experiment.classificationId,
        experiment.sourceId,
        hash,
      );

      if (outcome.rowid !== null) {
        for (const score of experiment.scores) {
          this.stmtInsertScore.run(outcome.rowid, score.scoreId, score.scoreValue);
        }
        debug('db', 'Experiment created', { id: outcome.rowid, scores: experiment.scores.length });
        return outcome.rowid;
      }

      const row = this.stmtGetByHash.get(hash);
      if (!row) {
        throw new Error(`Experiment ${hash} vanished after insert`);
      }
      const stored = this.stmtCountScores.get(row.experiment_id)?.count ?? 0;
      if (stored !== experiment.scores.length) {
        let added = 0;
        for (const score of experiment.scores) {
          if (!insertIfAbsent(this.stmtInsertScore, row.experiment_id, score.scoreId, score.scoreValue).existed) {
            added++;
          }
        }
        debug('db', 'Backfilled experiment scores', { id: row.experiment_id, added });
      }
      return row.experiment_id;
    });

    this.cache.set(hash, id);
    return id;
  }

  /**
   * Drops cached classification and source ids recorded inside a unit of
   * work that was rolled back.
   */
  forgetNames(classification: string, source: string): void {
    this.classificationCache.delete(classification);
    this.sourceCache.delete(source);
  }

  scoresOf(experimentId: number): Array<{ scoreId: number; scoreValue: number }> {
    return this.stmtScores
      .all(experimentId)
      .map((r) => ({ scoreId: r.score_id, scoreValue: r.score_value }));
  }

  private getOrCreateNamed(
    name: string,
    cache: Map<string, number>,
    find: () => number | undefined,
    insert: () => number | null,
  ): number {
    const cached = cache.get(name);
    if (cached !== undefined) {
      return cached;
    }
    const id = find() ?? insert() ?? find();
    if (id === undefined) {
      throw new Error(`'${name}' could not be stored`);
    }
    cache.set(name, id);
    return id;
  }
}
