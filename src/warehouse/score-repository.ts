import type BetterSqlite3 from 'better-sqlite3';

import { LruCache } from '../shared/cache.js';
import { insertIfAbsent } from './unit-of-work.js';

/**
 * Score metadata (HSA, Bliss, Loewe, ZIP). Ids are cached for the lifetime
 * of the repository.
 */
export class ScoreRepository {
  private readonly cache = new LruCache<string, number>(64);

  private readonly stmtGet: BetterSqlite3.Statement<[string], { score_id: number }>;
  private readonly stmtInsert: BetterSqlite3.Statement<[string]>;

  constructor(db: BetterSqlite3.Database) {
    this.stmtGet = db.prepare<[string], { score_id: number }>(
      'SELECT score_id FROM score WHERE score_name = ?',
    );
    this.stmtInsert = db.prepare<[string]>(
      'INSERT INTO score (score_name) VALUES (?) ON CONFLICT(score_name) DO NOTHING',
    );
  }

  getOrCreate(scoreName: string): number {
    const cached = this.cache.get(scoreName);
    if (cached !== undefined) {
      return cached;
    }

    let id = this.stmtGet.get(scoreName)?.score_id;
    if (id === undefined) {
      const outcome = insertIfAbsent(this.stmtInsert, scoreName);
      id = outcome.rowid ?? this.stmtGet.get(scoreName)?.score_id;
    }
    if (id === undefined) {
      throw new Error(`Score '${scoreName}' could not be stored`);
    }

    this.cache.set(scoreName, id);
    return id;
  }
}
