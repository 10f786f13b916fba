import type BetterSqlite3 from 'better-sqlite3';

/**
 * A versioned schema migration.
 * Migrations are applied in order and tracked per scope in the _migrations table.
 */
export interface Migration {
  version: number;
  name: string;
  up: string; // SQL to execute
}

export type MigrationScope = 'staging' | 'warehouse' | 'mirror';

/**
 * Staging store: one row per natural key, resolution columns filled in as
 * the row advances through its status codes.
 *
 * Migration 001: staging_drugs keyed by normalized drug name.
 * Migration 002: staging_cell_lines keyed by the cell line name as published.
 */
const STAGING_MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_staging_drugs',
    up: `
      CREATE TABLE staging_drugs (
        drug_name TEXT PRIMARY KEY,
        pubchem_id TEXT,
        official_name TEXT,
        smiles TEXT,
        chembl_id TEXT,
        inchi_key TEXT,
        pref_name TEXT,
        molecule_type TEXT,
        canonical_smiles TEXT,
        standard_inchi_key TEXT,
        status INTEGER NOT NULL DEFAULT 0,
        error_code INTEGER,
        error_msg TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX idx_staging_drugs_status ON staging_drugs(status);
    `,
  },
  {
    version: 2,
    name: 'create_staging_cell_lines',
    up: `
      CREATE TABLE staging_cell_lines (
        original_name TEXT PRIMARY KEY,
        cosmic_id TEXT,
        cellosaurus_accession TEXT,
        tissue TEXT,
        ncit_code TEXT,
        umls_cui TEXT,
        disease_name TEXT,
        resolution_path TEXT,
        status INTEGER NOT NULL DEFAULT 0,
        error_code INTEGER,
        error_msg TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX idx_staging_cell_lines_status ON staging_cell_lines(status);
    `,
  },
];

/**
 * Destination warehouse (DISNET drug layer).
 *
 * Migration 001: sources, diseases, raw + cured drugs and the foreign map.
 * Migration 002: cell lines (FK to disease).
 * Migration 003: scores, combinations (junction table + canonical key).
 * Migration 004: experiments keyed by content hash, with their scores.
 */
const WAREHOUSE_MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_drugs',
    up: `
      CREATE TABLE source (
        source_id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE
      );

      CREATE TABLE disease (
        disease_id TEXT PRIMARY KEY,
        disease_name TEXT NOT NULL
      );

      CREATE TABLE drug_raw (
        drug_id TEXT NOT NULL,
        source_id INTEGER NOT NULL REFERENCES source(source_id),
        drug_name TEXT NOT NULL,
        molecular_type TEXT,
        chemical_structure TEXT,
        inchi_key TEXT,
        PRIMARY KEY (drug_id, source_id)
      );

      CREATE TABLE drug (
        drug_id TEXT PRIMARY KEY,
        source_id INTEGER NOT NULL REFERENCES source(source_id),
        drug_name TEXT NOT NULL,
        molecular_type TEXT,
        chemical_structure TEXT,
        inchi_key TEXT
      );

      CREATE TABLE foreign_to_chembl (
        foreign_id TEXT NOT NULL,
        foreign_source_id INTEGER NOT NULL,
        chembl_id TEXT NOT NULL REFERENCES drug(drug_id),
        PRIMARY KEY (foreign_id, foreign_source_id),
        FOREIGN KEY (foreign_id, foreign_source_id) REFERENCES drug_raw(drug_id, source_id)
      );
    `,
  },
  {
    version: 2,
    name: 'create_cell_lines',
    up: `
      CREATE TABLE cell_line (
        cell_line_id TEXT PRIMARY KEY,
        cell_line_name TEXT NOT NULL UNIQUE,
        source_id INTEGER REFERENCES source(source_id),
        tissue TEXT,
        disease_id TEXT REFERENCES disease(disease_id)
      );
    `,
  },
  {
    version: 3,
    name: 'create_scores_and_combinations',
    up: `
      CREATE TABLE score (
        score_id INTEGER PRIMARY KEY AUTOINCREMENT,
        score_name TEXT NOT NULL UNIQUE
      );

      CREATE TABLE drug_combination (
        dc_id INTEGER PRIMARY KEY AUTOINCREMENT,
        combination_key TEXT NOT NULL UNIQUE
      );

      CREATE TABLE drug_comb_drug (
        dc_id INTEGER NOT NULL REFERENCES drug_combination(dc_id) ON DELETE CASCADE,
        drug_id TEXT NOT NULL REFERENCES drug(drug_id),
        PRIMARY KEY (dc_id, drug_id)
      );

      CREATE INDEX idx_drug_comb_drug_drug ON drug_comb_drug(drug_id);
    `,
  },
  {
    version: 4,
    name: 'create_experiments',
    up: `
      CREATE TABLE experiment_classification (
        classification_id INTEGER PRIMARY KEY AUTOINCREMENT,
        classification_name TEXT NOT NULL UNIQUE
      );

      CREATE TABLE experiment_source (
        source_id INTEGER PRIMARY KEY AUTOINCREMENT,
        source_name TEXT NOT NULL UNIQUE
      );

      CREATE TABLE experiment (
        experiment_id INTEGER PRIMARY KEY AUTOINCREMENT,
        dc_id INTEGER NOT NULL REFERENCES drug_combination(dc_id),
        cell_line_id TEXT NOT NULL REFERENCES cell_line(cell_line_id),
        classification_id INTEGER NOT NULL REFERENCES experiment_classification(classification_id),
        source_id INTEGER NOT NULL REFERENCES experiment_source(source_id),
        experiment_hash TEXT NOT NULL UNIQUE
      );

      CREATE TABLE experiment_score (
        experiment_id INTEGER NOT NULL REFERENCES experiment(experiment_id),
        score_id INTEGER NOT NULL REFERENCES score(score_id),
        score_value REAL NOT NULL,
        PRIMARY KEY (experiment_id, score_id)
      );
    `,
  },
];

/**
 * Local mirror of the DrugCombDB dump. Usually populated by an external
 * import; created here so a fresh file can be filled and processed.
 */
const MIRROR_MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_mirror_tables',
    up: `
      CREATE TABLE IF NOT EXISTS drug_combinations (
        id INTEGER PRIMARY KEY,
        drug1 TEXT NOT NULL,
        drug2 TEXT NOT NULL,
        cell_line TEXT NOT NULL,
        hsa REAL,
        bliss REAL,
        loewe REAL,
        zip REAL,
        source TEXT,
        status TEXT NOT NULL DEFAULT 'pending'
      );

      CREATE INDEX IF NOT EXISTS idx_drug_combinations_status ON drug_combinations(status);

      CREATE TABLE IF NOT EXISTS drugs (
        drug_name TEXT PRIMARY KEY,
        pubchem_cid TEXT,
        smiles TEXT
      );

      CREATE TABLE IF NOT EXISTS cell_lines (
        cell_name TEXT PRIMARY KEY,
        cosmic_id TEXT
      );
    `,
  },
];

export const MIGRATIONS: Record<MigrationScope, Migration[]> = {
  staging: STAGING_MIGRATIONS,
  warehouse: WAREHOUSE_MIGRATIONS,
  mirror: MIRROR_MIGRATIONS,
};

/**
 * Applies every unapplied migration of one scope, each in its own transaction.
 * Safe to call on every open.
 */
export function runMigrations(db: BetterSqlite3.Database, scope: MigrationScope): void {
  // Create tracking table
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      scope TEXT NOT NULL,
      version INTEGER NOT NULL,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (scope, version)
    )
  `);

  // Get current max applied version
  const row = db
    .prepare<[string], { version: number }>(
      'SELECT COALESCE(MAX(version), 0) AS version FROM _migrations WHERE scope = ?',
    )
    .get(scope);
  const maxVersion = row?.version ?? 0;

  const insertMigration = db.prepare<[string, number, string]>(
    'INSERT INTO _migrations (scope, version, name) VALUES (?, ?, ?)',
  );

  const applyMigration = db.transaction((m: Migration) => {
    db.exec(m.up);
    insertMigration.run(scope, m.version, m.name);
  });

  for (const migration of MIGRATIONS[scope]) {
    if (migration.version <= maxVersion) {
      continue;
    }
    applyMigration(migration);
  }
}
