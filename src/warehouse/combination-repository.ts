import type BetterSqlite3 from 'better-sqlite3';

import { LruCache } from '../shared/cache.js';
import { debug } from '../shared/debug.js';
import { InvariantError } from '../shared/errors.js';
import { insertIfAbsent, withUnitOfWork } from './unit-of-work.js';

/**
 * Deduplicated, sorted drug ids. Throws when fewer than two remain.
 */
export function normalizeCombination(drugIds: readonly string[]): string[] {
  const unique = [...new Set(drugIds)].sort();
  if (unique.length < 2) {
    throw new InvariantError(
      `A drug combination needs at least two distinct drugs, got [${drugIds.join(', ')}]`,
    );
  }
  return unique;
}

/**
 * Canonical text form of a combination, stored in a UNIQUE column so two
 * writers cannot both create the same set.
 */
export function combinationKey(sortedIds: readonly string[]): string {
  return sortedIds.join('|');
}

/**
 * Drug combinations are unordered sets of two or more cured drug ids, stored
 * as one drug_combination row plus one drug_comb_drug row per member.
 */
export class CombinationRepository {
  private readonly db: BetterSqlite3.Database;
  private readonly cache = new LruCache<string, number>(10_000);

  /** Exact-set lookup statements, one per set size. */
  private readonly stmtExactSet = new Map<number, BetterSqlite3.Statement<unknown[], { dc_id: number }>>();
  private readonly stmtInsertCombination: BetterSqlite3.Statement<[string]>;
  private readonly stmtGetByKey: BetterSqlite3.Statement<[string], { dc_id: number }>;
  private readonly stmtInsertMember: BetterSqlite3.Statement<[number, string]>;
  private readonly stmtMembers: BetterSqlite3.Statement<[number], { drug_id: string }>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtInsertCombination = db.prepare<[string]>(`
      INSERT INTO drug_combination (combination_key) VALUES (?)
      ON CONFLICT(combination_key) DO NOTHING
    `);

    this.stmtGetByKey = db.prepare<[string], { dc_id: number }>(
      'SELECT dc_id FROM drug_combination WHERE combination_key = ?',
    );

    this.stmtInsertMember = db.prepare<[number, string]>(`
      INSERT INTO drug_comb_drug (dc_id, drug_id) VALUES (?, ?)
      ON CONFLICT(dc_id, drug_id) DO NOTHING
    `);

    this.stmtMembers = db.prepare<[number], { drug_id: string }>(
      'SELECT drug_id FROM drug_comb_drug WHERE dc_id = ? ORDER BY drug_id',
    );
  }

  /**
   * Returns the id of the combination whose members are exactly `drugIds`
   * (order and repeats ignored), creating it when absent.
   *
   * The in-process cache assumes a single writer process; the UNIQUE
   * combination_key turns a lost race into a lookup instead of a duplicate.
   */
  getOrCreate(drugIds: readonly string[]): number {
    const members = normalizeCombination(drugIds);
    const key = combinationKey(members);

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const id = withUnitOfWork(this.db, () => {
      const existing = this.findExact(members);
      if (existing !== null) {
        return existing;
      }

      const outcome = insertIfAbsent(this.stmtInsertCombination, key);
      if (outcome.rowid === null) {
        const row = this.stmtGetByKey.get(key);
        if (!row) {
          throw new Error(`Combination '${key}' vanished after insert`);
        }
        return row.dc_id;
      }

      for (const drugId of members) {
        this.stmtInsertMember.run(outcome.rowid, drugId);
      }
      debug('db', 'Drug combination created', { id: outcome.rowid, members });
      return outcome.rowid;
    });

    this.cache.set(key, id);
    return id;
  }

  /**
   * Drops the cached id for `drugIds`, after the unit that created it was
   * rolled back.
   */
  forget(drugIds: readonly string[]): void {
    this.cache.delete(combinationKey([...new Set(drugIds)].sort()));
  }

  /**
   * Set-equality lookup over the junction table: a combination matches when
   * it has exactly N members and all N are in the requested set.
   */
  findExact(sortedIds: readonly string[]): number | null {
    const n = sortedIds.length;
    let stmt = this.stmtExactSet.get(n);
    if (!stmt) {
      const placeholders = sortedIds.map(() => '?').join(', ');
      stmt = this.db.prepare<unknown[], { dc_id: number }>(`
        SELECT dc_id
        FROM drug_comb_drug
        GROUP BY dc_id
        HAVING COUNT(*) = ?
          AND SUM(drug_id IN (${placeholders})) = ?
        LIMIT 1
      `);
      this.stmtExactSet.set(n, stmt);
    }
    const row = stmt.get(n, ...sortedIds, n);
    return row?.dc_id ?? null;
  }

  members(combinationId: number): string[] {
    return this.stmtMembers.all(combinationId).map((r) => r.drug_id);
  }
}
