import type BetterSqlite3 from 'better-sqlite3';

import type { Drug, SourceIds } from '../../shared/types.js';
import { CellLineRepository } from '../cell-line-repository.js';
import { DrugRepository } from '../drug-repository.js';
import { SourceRepository } from '../source-repository.js';

export function chemblDrug(drugId: string, sourceId: number): Drug {
  return {
    drugId,
    sourceId,
    drugName: drugId,
    molecularType: 'Small molecule',
    chemicalStructure: null,
    inchiKey: null,
  };
}

/**
 * Stores the sources, the given cured drugs and cell line CVCL_TEST so
 * combinations and experiments can reference them.
 */
export function seedWarehouse(db: BetterSqlite3.Database, drugIds: string[]): SourceIds {
  const sourceIds = new SourceRepository(db).resolveSourceIds();
  const drugs = new DrugRepository(db);
  for (const id of drugIds) {
    drugs.getOrCreateChemblDrug(chemblDrug(id, sourceIds.chembl));
  }
  new CellLineRepository(db).persist(
    { cellLineId: 'CVCL_TEST', sourceId: sourceIds.cellosaurus, name: 'TEST-1', tissue: 'lung', diseaseId: 'C0000001' },
    { umlsCui: 'C0000001', name: 'test disease' },
  );
  return sourceIds;
}
