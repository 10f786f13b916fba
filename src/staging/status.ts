import { InvariantError } from '../shared/errors.js';

/**
 * Drug staging status.
 *
 * PENDING → RAW_RESOLVED → CANONICAL_MAPPED → FETCHED, or → FAILED from
 * any non-terminal state.
 */
export enum DrugStage {
  FAILED = -1,
  PENDING = 0,
  /** PubChem CID (and structure) found locally or in DrugCombDB. */
  RAW_RESOLVED = 1,
  /** UniChem mapped the CID to a ChEMBL id. */
  CANONICAL_MAPPED = 2,
  /** ChEMBL molecule record fetched. Terminal success. */
  FETCHED = 3,
}

/**
 * Cell line staging status.
 *
 * PENDING → ACCESSION_FOUND → DISEASE_FOUND → MAPPED, with the COSMIC fast
 * path jumping PENDING → DISEASE_FOUND.
 */
export enum CellLineStage {
  FAILED = -1,
  PENDING = 0,
  /** Cellosaurus accession known, disease not yet looked up. */
  ACCESSION_FOUND = 1,
  /** Accession and NCIt disease lookup done (the code may be null). */
  DISEASE_FOUND = 2,
  /** UMLS mapping attempted. Terminal success. */
  MAPPED = 3,
}

const DRUG_TRANSITIONS: ReadonlyMap<DrugStage, readonly DrugStage[]> = new Map([
  [DrugStage.PENDING, [DrugStage.RAW_RESOLVED, DrugStage.FAILED]],
  [DrugStage.RAW_RESOLVED, [DrugStage.CANONICAL_MAPPED, DrugStage.FAILED]],
  [DrugStage.CANONICAL_MAPPED, [DrugStage.FETCHED, DrugStage.FAILED]],
  [DrugStage.FETCHED, []],
  [DrugStage.FAILED, []],
]);

const CELL_LINE_TRANSITIONS: ReadonlyMap<CellLineStage, readonly CellLineStage[]> = new Map([
  [
    CellLineStage.PENDING,
    [CellLineStage.ACCESSION_FOUND, CellLineStage.DISEASE_FOUND, CellLineStage.FAILED],
  ],
  [CellLineStage.ACCESSION_FOUND, [CellLineStage.DISEASE_FOUND, CellLineStage.FAILED]],
  [CellLineStage.DISEASE_FOUND, [CellLineStage.MAPPED, CellLineStage.FAILED]],
  [CellLineStage.MAPPED, []],
  [CellLineStage.FAILED, []],
]);

export function canDrugTransition(from: DrugStage, to: DrugStage): boolean {
  return DRUG_TRANSITIONS.get(from)?.includes(to) ?? false;
}

export function canCellLineTransition(from: CellLineStage, to: CellLineStage): boolean {
  return CELL_LINE_TRANSITIONS.get(from)?.includes(to) ?? false;
}

export function assertDrugTransition(from: DrugStage, to: DrugStage): void {
  if (!canDrugTransition(from, to)) {
    throw new InvariantError(`Illegal drug staging transition ${from} → ${to}`);
  }
}

export function assertCellLineTransition(from: CellLineStage, to: CellLineStage): void {
  if (!canCellLineTransition(from, to)) {
    throw new InvariantError(`Illegal cell line staging transition ${from} → ${to}`);
  }
}

export function isTerminal(status: number): boolean {
  return status === -1 || status === 3;
}
