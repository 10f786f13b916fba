import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import { assertDrugTransition, DrugStage } from './status.js';

/**
 * Raw staging_drugs row (snake_case column names).
 */
interface StagingDrugRow {
  drug_name: string;
  pubchem_id: string | null;
  official_name: string | null;
  smiles: string | null;
  chembl_id: string | null;
  inchi_key: string | null;
  pref_name: string | null;
  molecule_type: string | null;
  canonical_smiles: string | null;
  standard_inchi_key: string | null;
  status: number;
  error_code: number | null;
  error_msg: string | null;
}

export interface StagedDrug {
  drugName: string;
  pubchemId: string | null;
  officialName: string | null;
  smiles: string | null;
  chemblId: string | null;
  inchiKey: string | null;
  prefName: string | null;
  moleculeType: string | null;
  canonicalSmiles: string | null;
  standardInchiKey: string | null;
  status: DrugStage;
  errorCode: number | null;
  errorMsg: string | null;
}

export type StagedDrugFields = Partial<
  Pick<
    StagedDrug,
    | 'pubchemId'
    | 'officialName'
    | 'smiles'
    | 'chemblId'
    | 'inchiKey'
    | 'prefName'
    | 'moleculeType'
    | 'canonicalSmiles'
    | 'standardInchiKey'
  >
>;

/**
 * One row's move out of its current status. Columns not named in `fields`
 * keep their value.
 */
export interface DrugStagingUpdate {
  drugName: string;
  from: DrugStage;
  to: DrugStage;
  fields?: StagedDrugFields;
  errorCode?: number | null;
  errorMsg?: string | null;
}

interface UpdateParams {
  drug_name: string;
  from_status: number;
  to_status: number;
  pubchem_id: string | null;
  official_name: string | null;
  smiles: string | null;
  chembl_id: string | null;
  inchi_key: string | null;
  pref_name: string | null;
  molecule_type: string | null;
  canonical_smiles: string | null;
  standard_inchi_key: string | null;
  error_code: number | null;
  error_msg: string | null;
}

function rowToStagedDrug(row: StagingDrugRow): StagedDrug {
  return {
    drugName: row.drug_name,
    pubchemId: row.pubchem_id,
    officialName: row.official_name,
    smiles: row.smiles,
    chemblId: row.chembl_id,
    inchiKey: row.inchi_key,
    prefName: row.pref_name,
    moleculeType: row.molecule_type,
    canonicalSmiles: row.canonical_smiles,
    standardInchiKey: row.standard_inchi_key,
    status: row.status,
    errorCode: row.error_code,
    errorMsg: row.error_msg,
  };
}

/**
 * staging_drugs: per-drug resolution progress, keyed by normalized name.
 *
 * Updates only touch rows still at the status they were selected at, which
 * makes every stage safe to re-run after an interruption.
 */
export class StagingDrugStore {
  private readonly db: BetterSqlite3.Database;

  private readonly stmtStage: BetterSqlite3.Statement<[string]>;
  private readonly stmtSelectBatch: BetterSqlite3.Statement<[number, number], StagingDrugRow>;
  private readonly stmtUpdate: BetterSqlite3.Statement<[UpdateParams]>;
  private readonly stmtGet: BetterSqlite3.Statement<[string], StagingDrugRow>;
  private readonly stmtCounts: BetterSqlite3.Statement<[], { status: number; count: number }>;
  private readonly stmtResolvedPage: BetterSqlite3.Statement<[string, number], StagingDrugRow>;
  private readonly stmtResolvedIds: BetterSqlite3.Statement<[], { drug_name: string; chembl_id: string }>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtStage = db.prepare<[string]>(
      'INSERT OR IGNORE INTO staging_drugs (drug_name) VALUES (?)',
    );

    this.stmtSelectBatch = db.prepare<[number, number], StagingDrugRow>(`
      SELECT * FROM staging_drugs
      WHERE status = ?
      ORDER BY drug_name
      LIMIT ?
    `);

    this.stmtUpdate = db.prepare<UpdateParams>(`
      UPDATE staging_drugs SET
        status = @to_status,
        pubchem_id = COALESCE(@pubchem_id, pubchem_id),
        official_name = COALESCE(@official_name, official_name),
        smiles = COALESCE(@smiles, smiles),
        chembl_id = COALESCE(@chembl_id, chembl_id),
        inchi_key = COALESCE(@inchi_key, inchi_key),
        pref_name = COALESCE(@pref_name, pref_name),
        molecule_type = COALESCE(@molecule_type, molecule_type),
        canonical_smiles = COALESCE(@canonical_smiles, canonical_smiles),
        standard_inchi_key = COALESCE(@standard_inchi_key, standard_inchi_key),
        error_code = @error_code,
        error_msg = @error_msg,
        updated_at = datetime('now')
      WHERE drug_name = @drug_name AND status = @from_status
    `);

    this.stmtGet = db.prepare<[string], StagingDrugRow>(
      'SELECT * FROM staging_drugs WHERE drug_name = ?',
    );

    this.stmtCounts = db.prepare<[], { status: number; count: number }>(
      'SELECT status, COUNT(*) AS count FROM staging_drugs GROUP BY status',
    );

    this.stmtResolvedPage = db.prepare<[string, number], StagingDrugRow>(`
      SELECT * FROM staging_drugs
      WHERE status = ${DrugStage.FETCHED} AND drug_name > ?
      ORDER BY drug_name
      LIMIT ?
    `);

    this.stmtResolvedIds = db.prepare<[], { drug_name: string; chembl_id: string }>(`
      SELECT drug_name, chembl_id FROM staging_drugs
      WHERE status = ${DrugStage.FETCHED} AND chembl_id IS NOT NULL
    `);
  }

  /**
   * Inserts each name not already staged. Returns how many rows were added.
   */
  stage(names: Iterable<string>): number {
    const insertAll = this.db.transaction((list: Iterable<string>) => {
      let inserted = 0;
      for (const name of list) {
        inserted += this.stmtStage.run(name).changes;
      }
      return inserted;
    });
    const inserted = insertAll(names);
    debug('drug', 'Staged drugs', { inserted });
    return inserted;
  }

  selectBatch(status: DrugStage, limit: number): StagedDrug[] {
    return this.stmtSelectBatch.all(status, limit).map(rowToStagedDrug);
  }

  /**
   * Writes a batch of transitions in one transaction. Returns how many rows
   * were changed; a row that has already left `from` is skipped.
   */
  applyUpdates(updates: readonly DrugStagingUpdate[]): number {
    for (const u of updates) {
      assertDrugTransition(u.from, u.to);
    }
    const writeAll = this.db.transaction((list: readonly DrugStagingUpdate[]) => {
      let changed = 0;
      for (const u of list) {
        const f = u.fields ?? {};
        changed += this.stmtUpdate.run({
          drug_name: u.drugName,
          from_status: u.from,
          to_status: u.to,
          pubchem_id: f.pubchemId ?? null,
          official_name: f.officialName ?? null,
          smiles: f.smiles ?? null,
          chembl_id: f.chemblId ?? null,
          inchi_key: f.inchiKey ?? null,
          pref_name: f.prefName ?? null,
          molecule_type: f.moleculeType ?? null,
          canonical_smiles: f.canonicalSmiles ?? null,
          standard_inchi_key: f.standardInchiKey ?? null,
          error_code: u.errorCode ?? null,
          error_msg: u.errorMsg ?? null,
        }).changes;
      }
      return changed;
    });
    return writeAll(updates);
  }

  get(drugName: string): StagedDrug | null {
    const row = this.stmtGet.get(drugName);
    return row ? rowToStagedDrug(row) : null;
  }

  countByStatus(): Map<number, number> {
    return new Map(this.stmtCounts.all().map((r) => [r.status, r.count]));
  }

  /**
   * Terminal-success rows in name order, starting after `afterName`.
   */
  listResolved(afterName: string, limit: number): StagedDrug[] {
    return this.stmtResolvedPage.all(afterName, limit).map(rowToStagedDrug);
  }

  /**
   * Normalized drug name → ChEMBL id for every terminal-success row.
   */
  resolvedMap(): Map<string, string> {
    return new Map(this.stmtResolvedIds.all().map((r) => [r.drug_name, r.chembl_id]));
  }
}
