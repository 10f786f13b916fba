import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import { assertCellLineTransition, CellLineStage } from './status.js';

/** How a cell line reached its accession. */
export type ResolutionPath = 'cosmic' | 'drugcombdb';

interface StagingCellLineRow {
  original_name: string;
  cosmic_id: string | null;
  cellosaurus_accession: string | null;
  tissue: string | null;
  ncit_code: string | null;
  umls_cui: string | null;
  disease_name: string | null;
  resolution_path: string | null;
  status: number;
  error_code: number | null;
  error_msg: string | null;
}

export interface StagedCellLine {
  originalName: string;
  cosmicId: string | null;
  accession: string | null;
  tissue: string | null;
  ncitCode: string | null;
  umlsCui: string | null;
  diseaseName: string | null;
  resolutionPath: ResolutionPath | null;
  status: CellLineStage;
  errorCode: number | null;
  errorMsg: string | null;
}

export type StagedCellLineFields = Partial<
  Pick<
    StagedCellLine,
    'cosmicId' | 'accession' | 'tissue' | 'ncitCode' | 'umlsCui' | 'diseaseName' | 'resolutionPath'
  >
>;

export interface CellLineStagingUpdate {
  originalName: string;
  from: CellLineStage;
  to: CellLineStage;
  fields?: StagedCellLineFields;
  errorCode?: number | null;
  errorMsg?: string | null;
}

interface UpdateParams {
  original_name: string;
  from_status: number;
  to_status: number;
  cosmic_id: string | null;
  cellosaurus_accession: string | null;
  tissue: string | null;
  ncit_code: string | null;
  umls_cui: string | null;
  disease_name: string | null;
  resolution_path: string | null;
  error_code: number | null;
  error_msg: string | null;
}

function toResolutionPath(value: string | null): ResolutionPath | null {
  return value === 'cosmic' || value === 'drugcombdb' ? value : null;
}

function rowToStagedCellLine(row: StagingCellLineRow): StagedCellLine {
  return {
    originalName: row.original_name,
    cosmicId: row.cosmic_id,
    accession: row.cellosaurus_accession,
    tissue: row.tissue,
    ncitCode: row.ncit_code,
    umlsCui: row.umls_cui,
    diseaseName: row.disease_name,
    resolutionPath: toResolutionPath(row.resolution_path),
    status: row.status,
    errorCode: row.error_code,
    errorMsg: row.error_msg,
  };
}

/**
 * staging_cell_lines: per-cell-line resolution progress, keyed by the name
 * as it appears in the combination source.
 */
export class StagingCellLineStore {
  private readonly db: BetterSqlite3.Database;

  private readonly stmtStage: BetterSqlite3.Statement<[string]>;
  private readonly stmtSelectBatch: BetterSqlite3.Statement<[number, number], StagingCellLineRow>;
  private readonly stmtUpdate: BetterSqlite3.Statement<[UpdateParams]>;
  private readonly stmtGet: BetterSqlite3.Statement<[string], StagingCellLineRow>;
  private readonly stmtCounts: BetterSqlite3.Statement<[], { status: number; count: number }>;
  private readonly stmtResolvedPage: BetterSqlite3.Statement<[string, number], StagingCellLineRow>;
  private readonly stmtResolvedIds: BetterSqlite3.Statement<
    [],
    { original_name: string; cellosaurus_accession: string }
  >;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtStage = db.prepare<[string]>(
      'INSERT OR IGNORE INTO staging_cell_lines (original_name) VALUES (?)',
    );

    this.stmtSelectBatch = db.prepare<[number, number], StagingCellLineRow>(`
      SELECT * FROM staging_cell_lines
      WHERE status = ?
      ORDER BY original_name
      LIMIT ?
    `);

    this.stmtUpdate = db.prepare<UpdateParams>(`
      UPDATE staging_cell_lines SET
        status = @to_status,
        cosmic_id = COALESCE(@cosmic_id, cosmic_id),
        cellosaurus_accession = COALESCE(@cellosaurus_accession, cellosaurus_accession),
        tissue = COALESCE(@tissue, tissue),
        ncit_code = COALESCE(@ncit_code, ncit_code),
        umls_cui = COALESCE(@umls_cui, umls_cui),
        disease_name = COALESCE(@disease_name, disease_name),
        resolution_path = COALESCE(@resolution_path, resolution_path),
        error_code = @error_code,
        error_msg = @error_msg,
        updated_at = datetime('now')
      WHERE original_name = @original_name AND status = @from_status
    `);

    this.stmtGet = db.prepare<[string], StagingCellLineRow>(
      'SELECT * FROM staging_cell_lines WHERE original_name = ?',
    );

    this.stmtCounts = db.prepare<[], { status: number; count: number }>(
      'SELECT status, COUNT(*) AS count FROM staging_cell_lines GROUP BY status',
    );

    this.stmtResolvedPage = db.prepare<[string, number], StagingCellLineRow>(`
      SELECT * FROM staging_cell_lines
      WHERE status = ${CellLineStage.MAPPED} AND original_name > ?
      ORDER BY original_name
      LIMIT ?
    `);

    this.stmtResolvedIds = db.prepare<
      [],
      { original_name: string; cellosaurus_accession: string }
    >(`
      SELECT original_name, cellosaurus_accession FROM staging_cell_lines
      WHERE status = ${CellLineStage.MAPPED} AND cellosaurus_accession IS NOT NULL
    `);
  }

  stage(names: Iterable<string>): number {
    const insertAll = this.db.transaction((list: Iterable<string>) => {
      let inserted = 0;
      for (const name of list) {
        inserted += this.stmtStage.run(name).changes;
      }
      return inserted;
    });
    const inserted = insertAll(names);
    debug('cell', 'Staged cell lines', { inserted });
    return inserted;
  }

  selectBatch(status: CellLineStage, limit: number): StagedCellLine[] {
    return this.stmtSelectBatch.all(status, limit).map(rowToStagedCellLine);
  }

  applyUpdates(updates: readonly CellLineStagingUpdate[]): number {
    for (const u of updates) {
      assertCellLineTransition(u.from, u.to);
    }
    const writeAll = this.db.transaction((list: readonly CellLineStagingUpdate[]) => {
      let changed = 0;
      for (const u of list) {
        const f = u.fields ?? {};
        changed += this.stmtUpdate.run({
          original_name: u.originalName,
          from_status: u.from,
          to_status: u.to,
          cosmic_id: f.cosmicId ?? null,
          cellosaurus_accession: f.accession ?? null,
          tissue: f.tissue ?? null,
          ncit_code: f.ncitCode ?? null,
          umls_cui: f.umlsCui ?? null,
          disease_name: f.diseaseName ?? null,
          resolution_path: f.resolutionPath ?? null,
          error_code: u.errorCode ?? null,
          error_msg: u.errorMsg ?? null,
        }).changes;
      }
      return changed;
    });
    return writeAll(updates);
  }

  get(originalName: string): StagedCellLine | null {
    const row = this.stmtGet.get(originalName);
    return row ? rowToStagedCellLine(row) : null;
  }

  countByStatus(): Map<number, number> {
    return new Map(this.stmtCounts.all().map((r) => [r.status, r.count]));
  }

  listResolved(afterName: string, limit: number): StagedCellLine[] {
    return this.stmtResolvedPage.all(afterName, limit).map(rowToStagedCellLine);
  }

  /**
   * Original cell line name → Cellosaurus accession for every mapped row.
   */
  resolvedMap(): Map<string, string> {
    return new Map(
      this.stmtResolvedIds.all().map((r) => [r.original_name, r.cellosaurus_accession]),
    );
  }
}
