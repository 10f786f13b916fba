import type { CombinationRecord } from '../shared/types.js';

// =============================================================================
// Response shapes (camelCase, already unwrapped from each API's envelope)
// =============================================================================

/** A drug as DrugCombDB describes it: PubChem CID plus structure. */
export interface SourceDrug {
  /** PubChem CID without prefix or zero padding, e.g. "3385" */
  foreignId: string;
  officialName: string | null;
  structure: string | null;
}

export interface SourceCellLine {
  accession: string;
  tissue: string | null;
}

export interface CompoundMapping {
  chemblId: string | null;
  inchiKey: string | null;
}

export interface CellosaurusHit {
  accession: string | null;
  ncitCode: string | null;
  tissue: string | null;
}

export interface UmlsConcept {
  cui: string;
  name: string;
}

export interface ChemblMolecule {
  chemblId: string;
  prefName: string | null;
  moleculeType: string | null;
  canonicalSmiles: string | null;
  inchiKey: string | null;
}

// =============================================================================
// Client contracts
// =============================================================================
// Each method resolves to null for "not found" and rejects on transport or
// payload failures.

/** DrugCombDB: the combination source. */
export interface CombinationSourceClient {
  getCombination(index: number): Promise<CombinationRecord | null>;
  getDrug(name: string): Promise<SourceDrug | null>;
  getCellLine(name: string): Promise<SourceCellLine | null>;
}

/** UniChem: PubChem CID → ChEMBL id + InChI key. */
export interface CrossReferenceClient {
  getCompoundMapping(pubchemId: string): Promise<CompoundMapping | null>;
}

/** Cellosaurus: accession → NCIt disease; COSMIC id → accession + disease + site. */
export interface CellLineMetadataClient {
  getDisease(accession: string): Promise<string | null>;
  searchByCosmicId(cosmicId: string): Promise<CellosaurusHit | null>;
}

/** UMLS: NCIt code → CUI + preferred name. */
export interface TerminologyClient {
  ncitToCui(ncitCode: string): Promise<UmlsConcept | null>;
}

/** ChEMBL: molecule record by ChEMBL id. */
export interface MoleculeClient {
  getMolecule(chemblId: string): Promise<ChemblMolecule | null>;
}
