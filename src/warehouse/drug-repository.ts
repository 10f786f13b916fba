import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import type { Drug, ForeignMap } from '../shared/types.js';
import { insertIfAbsent, withUnitOfWork } from './unit-of-work.js';

interface DrugRow {
  drug_id: string;
  source_id: number;
  drug_name: string;
  molecular_type: string | null;
  chemical_structure: string | null;
  inchi_key: string | null;
}

type DrugParams = [string, number, string, string | null, string | null, string | null];

function rowToDrug(row: DrugRow): Drug {
  return {
    drugId: row.drug_id,
    sourceId: row.source_id,
    drugName: row.drug_name,
    molecularType: row.molecular_type,
    chemicalStructure: row.chemical_structure,
    inchiKey: row.inchi_key,
  };
}

function drugParams(drug: Drug): DrugParams {
  return [
    drug.drugId,
    drug.sourceId,
    drug.drugName,
    drug.molecularType,
    drug.chemicalStructure,
    drug.inchiKey,
  ];
}

/**
 * Raw (foreign-source) drugs, cured ChEMBL drugs and the mapping between them.
 *
 * Rows are created once and never updated; a second insert of the same key
 * is absorbed and reported through the return value.
 */
export class DrugRepository {
  private readonly db: BetterSqlite3.Database;
  /** Keyed by `${sourceId}:${drugId}` for raw drugs, drugId for cured. */
  private readonly known = new Set<string>();

  private readonly stmtInsertRaw: BetterSqlite3.Statement<DrugParams>;
  private readonly stmtInsertCured: BetterSqlite3.Statement<DrugParams>;
  private readonly stmtInsertMap: BetterSqlite3.Statement<[string, number, string]>;
  private readonly stmtGetCured: BetterSqlite3.Statement<[string], DrugRow>;
  private readonly stmtGetRaw: BetterSqlite3.Statement<[string, number], DrugRow>;
  private readonly stmtGetMap: BetterSqlite3.Statement<[string, number], { chembl_id: string }>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtInsertRaw = db.prepare<DrugParams>(`
      INSERT INTO drug_raw (drug_id, source_id, drug_name, molecular_type, chemical_structure, inchi_key)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(drug_id, source_id) DO NOTHING
    `);

    this.stmtInsertCured = db.prepare<DrugParams>(`
      INSERT INTO drug (drug_id, source_id, drug_name, molecular_type, chemical_structure, inchi_key)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(drug_id) DO NOTHING
    `);

    this.stmtInsertMap = db.prepare<[string, number, string]>(`
      INSERT INTO foreign_to_chembl (foreign_id, foreign_source_id, chembl_id)
      VALUES (?, ?, ?)
      ON CONFLICT(foreign_id, foreign_source_id) DO NOTHING
    `);

    this.stmtGetCured = db.prepare<[string], DrugRow>('SELECT * FROM drug WHERE drug_id = ?');
    this.stmtGetRaw = db.prepare<[string, number], DrugRow>(
      'SELECT * FROM drug_raw WHERE drug_id = ? AND source_id = ?',
    );
    this.stmtGetMap = db.prepare<[string, number], { chembl_id: string }>(
      'SELECT chembl_id FROM foreign_to_chembl WHERE foreign_id = ? AND foreign_source_id = ?',
    );
  }

  /**
   * Stores a raw drug if absent. Returns its id.
   */
  getOrCreateRawDrug(drug: Drug): string {
    const key = `${drug.sourceId}:${drug.drugId}`;
    if (!this.known.has(key)) {
      const outcome = insertIfAbsent(this.stmtInsertRaw, ...drugParams(drug));
      debug('db', 'Raw drug stored', { drugId: drug.drugId, existed: outcome.existed });
      this.known.add(key);
    }
    return drug.drugId;
  }

  /**
   * Stores a cured (ChEMBL) drug if absent. Returns its id.
   */
  getOrCreateChemblDrug(drug: Drug): string {
    if (!this.known.has(drug.drugId)) {
      const outcome = insertIfAbsent(this.stmtInsertCured, ...drugParams(drug));
      debug('db', 'Cured drug stored', { drugId: drug.drugId, existed: outcome.existed });
      this.known.add(drug.drugId);
    }
    return drug.drugId;
  }

  /**
   * Records the raw→cured mapping. Returns false when it already existed.
   */
  mapForeignToChembl(mapping: ForeignMap): boolean {
    const outcome = insertIfAbsent(
      this.stmtInsertMap,
      mapping.foreignId,
      mapping.foreignSourceId,
      mapping.chemblId,
    );
    return !outcome.existed;
  }

  /**
   * Raw drug, cured drug and their mapping as one unit of work, in FK order.
   */
  persistResolved(raw: Drug, cured: Drug): void {
    try {
      withUnitOfWork(this.db, () => {
        this.getOrCreateRawDrug(raw);
        this.getOrCreateChemblDrug(cured);
        this.mapForeignToChembl({
          foreignId: raw.drugId,
          foreignSourceId: raw.sourceId,
          chemblId: cured.drugId,
        });
      });
    } catch (error) {
      // Rolled back: forget keys recorded inside the unit
      this.known.delete(`${raw.sourceId}:${raw.drugId}`);
      this.known.delete(cured.drugId);
      throw error;
    }
  }

  getChemblDrug(drugId: string): Drug | null {
    const row = this.stmtGetCured.get(drugId);
    return row ? rowToDrug(row) : null;
  }

  getRawDrug(drugId: string, sourceId: number): Drug | null {
    const row = this.stmtGetRaw.get(drugId, sourceId);
    return row ? rowToDrug(row) : null;
  }

  getChemblIdFor(foreignId: string, foreignSourceId: number): string | null {
    return this.stmtGetMap.get(foreignId, foreignSourceId)?.chembl_id ?? null;
  }
}
