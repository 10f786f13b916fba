import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import type { CellLine, Disease } from '../shared/types.js';
import { insertIfAbsent, withUnitOfWork } from './unit-of-work.js';

interface CellLineRow {
  cell_line_id: string;
  cell_line_name: string;
  source_id: number | null;
  tissue: string | null;
  disease_id: string | null;
}

type CellLineParams = [string, string, number, string | null, string | null];

/**
 * Cell lines and the diseases they model. A disease must be stored before
 * any cell line that references it.
 */
export class CellLineRepository {
  private readonly db: BetterSqlite3.Database;

  private readonly stmtInsertDisease: BetterSqlite3.Statement<[string, string]>;
  private readonly stmtInsertCellLine: BetterSqlite3.Statement<CellLineParams>;
  private readonly stmtGetByName: BetterSqlite3.Statement<[string], CellLineRow>;
  private readonly stmtGetDisease: BetterSqlite3.Statement<[string], { disease_id: string; disease_name: string }>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtInsertDisease = db.prepare<[string, string]>(`
      INSERT INTO disease (disease_id, disease_name) VALUES (?, ?)
      ON CONFLICT(disease_id) DO NOTHING
    `);

    this.stmtInsertCellLine = db.prepare<CellLineParams>(`
      INSERT INTO cell_line (cell_line_id, cell_line_name, source_id, tissue, disease_id)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT DO NOTHING
    `);

    this.stmtGetByName = db.prepare<[string], CellLineRow>(
      'SELECT * FROM cell_line WHERE cell_line_name = ?',
    );

    this.stmtGetDisease = db.prepare<[string], { disease_id: string; disease_name: string }>(
      'SELECT disease_id, disease_name FROM disease WHERE disease_id = ?',
    );
  }

  /**
   * Inserts a disease; a duplicate CUI is not an error. Returns true when a
   * row was written.
   */
  addDisease(disease: Disease): boolean {
    return !insertIfAbsent(this.stmtInsertDisease, disease.umlsCui, disease.name).existed;
  }

  /**
   * Inserts a cell line; a duplicate accession or name is not an error.
   * Returns true when a row was written.
   */
  addCellLine(cellLine: CellLine): boolean {
    const outcome = insertIfAbsent(
      this.stmtInsertCellLine,
      cellLine.cellLineId,
      cellLine.name,
      cellLine.sourceId,
      cellLine.tissue,
      cellLine.diseaseId,
    );
    debug('db', 'Cell line stored', { id: cellLine.cellLineId, existed: outcome.existed });
    return !outcome.existed;
  }

  /**
   * Disease (when known) then cell line, as one unit of work.
   */
  persist(cellLine: CellLine, disease: Disease | null): void {
    withUnitOfWork(this.db, () => {
      if (disease) {
        this.addDisease(disease);
      }
      this.addCellLine(cellLine);
    });
  }

  getByName(name: string): CellLine | null {
    const row = this.stmtGetByName.get(name);
    if (!row) return null;
    return {
      cellLineId: row.cell_line_id,
      name: row.cell_line_name,
      sourceId: row.source_id ?? 0,
      tissue: row.tissue,
      diseaseId: row.disease_id,
    };
  }

  getDisease(umlsCui: string): Disease | null {
    const row = this.stmtGetDisease.get(umlsCui);
    return row ? { umlsCui: row.disease_id, name: row.disease_name } : null;
  }
}
