import type BetterSqlite3 from 'better-sqlite3';

import { parsePubchemCid } from '../clients/drugcombdb.js';
import type { SourceDrug } from '../clients/types.js';
import { normalizeDrugName } from '../pipeline/normalize.js';
import type { CombinationRecord } from '../shared/types.js';

export type MirrorStatus = 'pending' | 'processed' | 'error';

interface CombinationRow {
  id: number;
  drug1: string;
  drug2: string;
  cell_line: string;
  hsa: number | null;
  bliss: number | null;
  loewe: number | null;
  zip: number | null;
  source: string | null;
}

interface MirrorDrugRow {
  drug_name: string;
  pubchem_cid: string | null;
  smiles: string | null;
}

/**
 * Read access to a local copy of the DrugCombDB dump, plus the per-row
 * processing status that makes batch runs re-runnable.
 */
export class LocalMirror {
  private readonly stmtPending: BetterSqlite3.Statement<[], CombinationRow>;
  private readonly stmtAllDrugs: BetterSqlite3.Statement<[], MirrorDrugRow>;
  private readonly stmtFindCosmic: BetterSqlite3.Statement<[string], { cosmic_id: string | null }>;
  private readonly stmtSetStatus: BetterSqlite3.Statement<[MirrorStatus, number]>;
  private readonly stmtCounts: BetterSqlite3.Statement<[], { status: string; count: number }>;
  /** Dump drugs keyed by normalized name, loaded on first lookup. */
  private drugsByName: Map<string, MirrorDrugRow> | null = null;

  constructor(db: BetterSqlite3.Database) {
    this.stmtPending = db.prepare<[], CombinationRow>(`
      SELECT id, drug1, drug2, cell_line, hsa, bliss, loewe, zip, source
      FROM drug_combinations
      WHERE status = 'pending'
      ORDER BY id
    `);

    this.stmtAllDrugs = db.prepare<[], MirrorDrugRow>(
      'SELECT drug_name, pubchem_cid, smiles FROM drugs ORDER BY drug_name',
    );

    this.stmtFindCosmic = db.prepare<[string], { cosmic_id: string | null }>(
      'SELECT cosmic_id FROM cell_lines WHERE cell_name = ?',
    );

    this.stmtSetStatus = db.prepare<[MirrorStatus, number]>(
      'UPDATE drug_combinations SET status = ? WHERE id = ?',
    );

    this.stmtCounts = db.prepare<[], { status: string; count: number }>(
      'SELECT status, COUNT(*) AS count FROM drug_combinations GROUP BY status',
    );
  }

  pendingCombinations(): CombinationRecord[] {
    return this.stmtPending.all().map((row) => ({
      id: row.id,
      drug1: row.drug1,
      drug2: row.drug2,
      cellLine: row.cell_line,
      source: row.source,
      hsa: row.hsa,
      bliss: row.bliss,
      loewe: row.loewe,
      zip: row.zip,
    }));
  }

  /**
   * PubChem CID and structure for a drug name, or null when the dump has no
   * usable CID for it.
   */
  findDrug(drugName: string): SourceDrug | null {
    const row = this.drugIndex().get(normalizeDrugName(drugName));
    const foreignId = parsePubchemCid(row?.pubchem_cid);
    if (!row || !foreignId) return null;
    return { foreignId, officialName: row.drug_name, structure: row.smiles };
  }

  findCosmicId(cellLineName: string): string | null {
    const cosmicId = this.stmtFindCosmic.get(cellLineName)?.cosmic_id?.trim();
    return cosmicId ? cosmicId : null;
  }

  setStatus(combinationId: number, status: MirrorStatus): void {
    this.stmtSetStatus.run(status, combinationId);
  }

  countByStatus(): Map<string, number> {
    return new Map(this.stmtCounts.all().map((r) => [r.status, r.count]));
  }

  /**
   * Dump names may still carry the "(approved)" marker that staged names
   * lose, so both sides are keyed by `normalizeDrugName`. When two rows
   * normalize alike, the one already spelled without a marker wins.
   */
  private drugIndex(): Map<string, MirrorDrugRow> {
    if (this.drugsByName) {
      return this.drugsByName;
    }
    const index = new Map<string, MirrorDrugRow>();
    for (const row of this.stmtAllDrugs.all()) {
      const key = normalizeDrugName(row.drug_name);
      if (!index.has(key) || row.drug_name === key) {
        index.set(key, row);
      }
    }
    this.drugsByName = index;
    return index;
  }
}
