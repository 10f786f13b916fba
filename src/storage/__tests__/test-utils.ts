import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { DatabaseConfig } from '../../shared/types.js';
import { openDatabase, type EtlDatabase } from '../database.js';
import type { MigrationScope } from '../migrations.js';

/**
 * Creates a temporary database directory and returns a DatabaseConfig
 * pointing to it, along with a cleanup function.
 *
 * Each test should use its own temp directory to avoid cross-test interference.
 */
export function createTempDb(): {
  dir: string;
  config: DatabaseConfig;
  cleanup: () => void;
} {
  const dir = mkdtempSync(join(tmpdir(), 'disnet-etl-test-'));
  const config: DatabaseConfig = {
    dbPath: join(dir, 'test.db'),
    busyTimeout: 5000,
  };

  const cleanup = () => {
    rmSync(dir, { recursive: true, force: true });
  };

  return { dir, config, cleanup };
}

/**
 * One temporary file holding every requested schema (all three by default).
 */
export function openTestDatabase(
  scopes: MigrationScope[] = ['staging', 'warehouse', 'mirror'],
): { edb: EtlDatabase; dir: string; cleanup: () => void } {
  const temp = createTempDb();
  const edb = openDatabase(temp.config, scopes);
  return {
    edb,
    dir: temp.dir,
    cleanup: () => {
      if (edb.db.open) {
        edb.close();
      }
      temp.cleanup();
    },
  };
}
