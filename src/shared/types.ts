// =============================================================================
// Configuration Types
// =============================================================================

export interface DatabaseConfig {
  dbPath: string;
  busyTimeout: number;
}

// =============================================================================
// Sources
// =============================================================================

/**
 * Names of the rows in the warehouse `source` table. Their numeric ids are
 * resolved once per run and determine the namespace of every drug_id.
 */
export type SourceName = 'CHEMBL' | 'PubChem' | 'Cellosaurus';

export interface SourceIds {
  chembl: number;
  pubchem: number;
  cellosaurus: number;
}

// =============================================================================
// Domain Entities (camelCase)
// =============================================================================

/**
 * A drug record. The namespace of `drugId` is fixed by `sourceId`: a PubChem
 * CID for raw drugs, a ChEMBL id for cured drugs. Ids from different sources
 * are never compared.
 */
export interface Drug {
  drugId: string;
  drugName: string;
  sourceId: number;
  molecularType: string | null;
  chemicalStructure: string | null;
  inchiKey: string | null;
}

/**
 * Maps a raw (foreign-source) drug onto its cured ChEMBL record.
 */
export interface ForeignMap {
  foreignId: string;
  foreignSourceId: number;
  chemblId: string;
}

export interface Disease {
  umlsCui: string;
  name: string;
}

export interface CellLine {
  /** Cellosaurus accession, e.g. CVCL_1059 */
  cellLineId: string;
  sourceId: number;
  name: string;
  /** UMLS CUI of the associated disease */
  diseaseId: string | null;
  tissue: string | null;
}

export const SCORE_NAMES = ['HSA', 'Bliss', 'Loewe', 'ZIP'] as const;
export type ScoreName = (typeof SCORE_NAMES)[number];

export interface Score {
  scoreName: ScoreName;
  scoreValue: number;
  scoreId: number | null;
}

/** A score whose id has been resolved against the warehouse. */
export interface ResolvedScore extends Score {
  scoreId: number;
}

export type Classification = -1 | 0 | 1;

export type ClassificationName = 'Synergistic' | 'Additive' | 'Antagonistic';

export interface Experiment {
  drugCombinationId: number;
  cellLineId: string;
  classificationId: number;
  sourceId: number;
  scores: ResolvedScore[];
}

// =============================================================================
// Source Records (DrugCombDB-shaped)
// =============================================================================

/**
 * One drug-combination experiment as published by DrugCombDB.
 */
export interface CombinationRecord {
  id: number;
  drug1: string;
  drug2: string;
  cellLine: string;
  source: string | null;
  hsa: number | null;
  bliss: number | null;
  loewe: number | null;
  zip: number | null;
}

export interface ScoreInput {
  hsa: number | null;
  bliss: number | null;
  loewe: number | null;
  zip: number | null;
}

// =============================================================================
// Summaries
// =============================================================================

export interface StageSummary {
  stage: string;
  processed: number;
  advanced: number;
  failed: number;
}

export interface RunSummary {
  succeeded: number;
  skipped: number;
  failed: number;
}
