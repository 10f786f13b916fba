import type BetterSqlite3 from 'better-sqlite3';

/**
 * Runs `work` as one unit: committed when it returns, rolled back when it
 * throws (the error is rethrown). Nested calls become savepoints, so a
 * repository method can call another without opening a second transaction.
 */
export function withUnitOfWork<T>(db: BetterSqlite3.Database, work: () => T): T {
  return db.transaction(work)();
}

export interface InsertOutcome {
  /** True when a row with the same unique key was already stored. */
  existed: boolean;
  /** Rowid of the inserted row; null when nothing was inserted. */
  rowid: number | null;
}

/**
 * Idempotent insert. `stmt` must be an `INSERT ... ON CONFLICT DO NOTHING`
 * statement, so a duplicate key is reported as `existed` instead of raising.
 */
export function insertIfAbsent<P extends unknown[]>(
  stmt: BetterSqlite3.Statement<P>,
  ...params: P
): InsertOutcome {
  const result = stmt.run(...params);
  if (result.changes === 0) {
    return { existed: true, rowid: null };
  }
  return { existed: false, rowid: Number(result.lastInsertRowid) };
}
