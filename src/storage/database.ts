import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { debug, log } from '../shared/debug.js';
import type { DatabaseConfig } from '../shared/types.js';
import { runMigrations, type MigrationScope } from './migrations.js';

/**
 * Wrapper around a configured better-sqlite3 database instance.
 * Provides lifecycle methods (close, checkpoint).
 */
export interface EtlDatabase {
  db: Database.Database;
  path: string;
  close(): void;
  checkpoint(): void;
}

/**
 * Opens a SQLite database with WAL mode, correct PRAGMA order and the
 * schema migrations of each requested scope.
 *
 * Single connection per store -- better-sqlite3 is synchronous, so connection
 * pooling adds zero benefit. The staging store, the warehouse and the local
 * mirror may live in one file (tests) or three.
 *
 * @param config - Database path and busy timeout configuration
 * @param scopes - Which schemas to migrate ('staging', 'warehouse', 'mirror')
 */
export function openDatabase(config: DatabaseConfig, scopes: MigrationScope[]): EtlDatabase {
  // 1. Ensure directory exists
  mkdirSync(dirname(config.dbPath), { recursive: true });

  // 2. Create connection
  const db = new Database(config.dbPath);

  // 3. Set PRAGMAs in correct order
  //    WAL mode MUST be first -- synchronous = NORMAL is only safe with WAL
  const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true });
  if (journalMode !== 'wal') {
    log('warn', 'db', `WAL mode not active (got '${String(journalMode)}')`, { path: config.dbPath });
  }

  // busy_timeout -- per-connection, must set every time
  db.pragma(`busy_timeout = ${config.busyTimeout}`);

  db.pragma('synchronous = NORMAL');

  // cache_size -- negative = KiB (64MB)
  db.pragma('cache_size = -64000');

  // foreign_keys -- per-connection, not persistent
  db.pragma('foreign_keys = ON');

  db.pragma('temp_store = MEMORY');

  // 4. Run migrations
  for (const scope of scopes) {
    runMigrations(db, scope);
  }

  debug('db', 'Database opened', { path: config.dbPath, scopes });

  return {
    db,
    path: config.dbPath,

    close(): void {
      try {
        // Flush WAL before shutdown
        db.pragma('wal_checkpoint(PASSIVE)');
      } catch (err) {
        // If checkpoint fails (e.g., locked), still close
        debug('db', 'WAL checkpoint on close failed', { error: String(err) });
      }
      db.close();
    },

    checkpoint(): void {
      db.pragma('wal_checkpoint(PASSIVE)');
    },
  };
}
