import type {
  CombinationSourceClient,
  CrossReferenceClient,
  MoleculeClient,
  SourceDrug,
} from '../clients/types.js';
import { debug, log } from '../shared/debug.js';
import { describeDrugError, DrugErrorCode, errorMessage } from '../shared/errors.js';
import { resolved, unresolvable, type Resolution } from '../shared/result.js';
import type { Drug, SourceIds, StageSummary } from '../shared/types.js';
import type { LocalMirror } from '../staging/source-mirror.js';
import { runStage } from '../staging/stage-runner.js';
import type {
  DrugStagingUpdate,
  StagedDrug,
  StagedDrugFields,
  StagingDrugStore,
} from '../staging/staging-drugs.js';
import { DrugStage } from '../staging/status.js';
import type { DrugRepository } from '../warehouse/drug-repository.js';
import { uniqueDrugNames } from './normalize.js';

export interface StagedDrugPipelineDeps {
  staging: StagingDrugStore;
  drugs: DrugRepository;
  sourceIds: SourceIds;
  source: CombinationSourceClient;
  crossRef: CrossReferenceClient;
  molecules: MoleculeClient;
  /** Local DrugCombDB dump, consulted before the network. */
  mirror?: LocalMirror | null;
}

export interface StagedDrugPipelineOptions {
  batchSize: number;
  /** Never call the combination source; a name missing locally fails. */
  localMode: boolean;
}

function transition(
  row: StagedDrug,
  to: DrugStage,
  result: Resolution<StagedDrugFields>,
): DrugStagingUpdate {
  if (result.kind === 'resolved') {
    return { drugName: row.drugName, from: row.status, to, fields: result.value };
  }
  return {
    drugName: row.drugName,
    from: row.status,
    to: DrugStage.FAILED,
    errorCode: result.code,
    errorMsg: result.message,
  };
}

function notFound(code: DrugErrorCode): Resolution<StagedDrugFields> {
  return unresolvable(describeDrugError(code), code);
}

/**
 * Resolves drug names to ChEMBL records through the staging table:
 *
 *   0 pending → 1 PubChem CID (local dump, else DrugCombDB)
 *             → 2 ChEMBL id (UniChem) → 3 ChEMBL molecule (ChEMBL)
 *
 * Each stage only selects rows at its own input status, so re-running a
 * finished stage makes no requests. `persist()` then writes every status-3
 * row to the warehouse.
 */
export class StagedDrugPipeline {
  private readonly deps: StagedDrugPipelineDeps;
  private readonly options: StagedDrugPipelineOptions;

  constructor(deps: StagedDrugPipelineDeps, options: StagedDrugPipelineOptions) {
    this.deps = deps;
    this.options = options;
  }

  /**
   * Stages normalized names. Re-staging a known name is a no-op.
   */
  stage0(names: Iterable<string>): number {
    const unique = uniqueDrugNames(names);
    const inserted = this.deps.staging.stage(unique);
    log('info', 'drug', 'Drugs staged', { unique: unique.length, inserted });
    return inserted;
  }

  stage1(): Promise<StageSummary> {
    return this.runDrugStage('drug.stage1', DrugStage.PENDING, DrugStage.RAW_RESOLVED, (row) =>
      this.resolveRaw(row),
    );
  }

  stage2(): Promise<StageSummary> {
    return this.runDrugStage(
      'drug.stage2',
      DrugStage.RAW_RESOLVED,
      DrugStage.CANONICAL_MAPPED,
      (row) => this.resolveMapping(row),
    );
  }

  stage3(): Promise<StageSummary> {
    return this.runDrugStage('drug.stage3', DrugStage.CANONICAL_MAPPED, DrugStage.FETCHED, (row) =>
      this.resolveMolecule(row),
    );
  }

  /**
   * Writes raw drug, cured drug and mapping for every fully resolved row.
   * A row that fails to persist is logged and left for the next run.
   */
  persist(): StageSummary {
    const summary: StageSummary = { stage: 'drug.persist', processed: 0, advanced: 0, failed: 0 };
    let after = '';

    for (;;) {
      const page = this.deps.staging.listResolved(after, this.options.batchSize);
      if (page.length === 0) {
        break;
      }
      for (const row of page) {
        summary.processed++;
        try {
          const pair = this.toDrugs(row);
          this.deps.drugs.persistResolved(pair.raw, pair.cured);
          summary.advanced++;
        } catch (err) {
          summary.failed++;
          log('error', 'drug', 'Failed to persist drug', {
            drugName: row.drugName,
            error: errorMessage(err),
          });
        }
      }
      after = page[page.length - 1].drugName;
    }

    log('info', 'stage', 'drug.persist completed', {
      processed: summary.processed,
      persisted: summary.advanced,
      failed: summary.failed,
    });
    return summary;
  }

  /**
   * All stages in order, then persistence.
   */
  async run(names: Iterable<string>): Promise<StageSummary[]> {
    this.stage0(names);
    const summaries = [await this.stage1(), await this.stage2(), await this.stage3()];
    summaries.push(this.persist());
    return summaries;
  }

  private runDrugStage(
    stage: string,
    from: DrugStage,
    to: DrugStage,
    resolve: (row: StagedDrug) => Promise<Resolution<StagedDrugFields>>,
  ): Promise<StageSummary> {
    return runStage({
      stage,
      store: this.deps.staging,
      status: from,
      batchSize: this.options.batchSize,
      resolveRow: async (row: StagedDrug) => transition(row, to, await resolve(row)),
      failRow: (row: StagedDrug, message: string): DrugStagingUpdate => ({
        drugName: row.drugName,
        from,
        to: DrugStage.FAILED,
        errorCode: null,
        errorMsg: message,
      }),
      isFailure: (update: DrugStagingUpdate) => update.to === DrugStage.FAILED,
    });
  }

  private async resolveRaw(row: StagedDrug): Promise<Resolution<StagedDrugFields>> {
    let found: SourceDrug | null = this.deps.mirror?.findDrug(row.drugName) ?? null;
    if (found) {
      debug('drug', 'Resolved from local dump', { drugName: row.drugName });
    } else if (!this.options.localMode) {
      found = await this.deps.source.getDrug(row.drugName);
    }
    if (!found) {
      return notFound(DrugErrorCode.NOT_FOUND_IN_SOURCE);
    }
    return resolved({
      pubchemId: found.foreignId,
      officialName: found.officialName,
      smiles: found.structure,
    });
  }

  private async resolveMapping(row: StagedDrug): Promise<Resolution<StagedDrugFields>> {
    if (!row.pubchemId) {
      return notFound(DrugErrorCode.NOT_FOUND_IN_SOURCE);
    }
    const mapping = await this.deps.crossRef.getCompoundMapping(row.pubchemId);
    if (!mapping?.chemblId) {
      return notFound(DrugErrorCode.NOT_FOUND_IN_CROSSREF);
    }
    return resolved({ chemblId: mapping.chemblId, inchiKey: mapping.inchiKey });
  }

  private async resolveMolecule(row: StagedDrug): Promise<Resolution<StagedDrugFields>> {
    if (!row.chemblId) {
      return notFound(DrugErrorCode.NOT_FOUND_IN_CROSSREF);
    }
    const molecule = await this.deps.molecules.getMolecule(row.chemblId);
    if (!molecule) {
      return notFound(DrugErrorCode.NOT_FOUND_IN_CANONICAL);
    }
    return resolved({
      prefName: molecule.prefName,
      moleculeType: molecule.moleculeType,
      canonicalSmiles: molecule.canonicalSmiles,
      standardInchiKey: molecule.inchiKey,
    });
  }

  private toDrugs(row: StagedDrug): { raw: Drug; cured: Drug } {
    if (!row.pubchemId || !row.chemblId) {
      throw new Error(`Staged drug '${row.drugName}' is resolved but lacks its ids`);
    }
    return {
      raw: {
        drugId: row.pubchemId,
        drugName: row.officialName ?? row.drugName,
        sourceId: this.deps.sourceIds.pubchem,
        molecularType: null,
        chemicalStructure: row.smiles,
        inchiKey: row.inchiKey,
      },
      cured: {
        drugId: row.chemblId,
        drugName: row.prefName ?? row.chemblId,
        sourceId: this.deps.sourceIds.chembl,
        molecularType: row.moleculeType,
        chemicalStructure: row.canonicalSmiles,
        inchiKey: row.standardInchiKey,
      },
    };
  }
}
