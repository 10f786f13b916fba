import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import type { SourceIds, SourceName } from '../shared/types.js';
import { insertIfAbsent, withUnitOfWork } from './unit-of-work.js';

/**
 * Registry of data sources. A source id is the namespace of every drug and
 * cell line id stored against it.
 */
export class SourceRepository {
  private readonly db: BetterSqlite3.Database;
  private readonly cache = new Map<string, number>();

  private readonly stmtGetByName: BetterSqlite3.Statement<[string], { source_id: number }>;
  private readonly stmtInsert: BetterSqlite3.Statement<[string]>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtGetByName = db.prepare<[string], { source_id: number }>(
      'SELECT source_id FROM source WHERE name = ?',
    );

    this.stmtInsert = db.prepare<[string]>(
      'INSERT INTO source (name) VALUES (?) ON CONFLICT(name) DO NOTHING',
    );
  }

  getOrCreate(name: string): number {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const id = withUnitOfWork(this.db, () => {
      const outcome = insertIfAbsent(this.stmtInsert, name);
      if (outcome.rowid !== null) {
        return outcome.rowid;
      }
      const row = this.stmtGetByName.get(name);
      if (!row) {
        throw new Error(`Source '${name}' vanished after insert`);
      }
      return row.source_id;
    });

    debug('db', 'Source resolved', { name, id });
    this.cache.set(name, id);
    return id;
  }

  /**
   * Resolves the three sources every run needs.
   */
  resolveSourceIds(): SourceIds {
    const lookup = (name: SourceName): number => this.getOrCreate(name);
    return {
      chembl: lookup('CHEMBL'),
      pubchem: lookup('PubChem'),
      cellosaurus: lookup('Cellosaurus'),
    };
  }
}
