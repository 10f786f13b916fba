import type {
  CellLineMetadataClient,
  CombinationSourceClient,
  TerminologyClient,
} from '../clients/types.js';
import { debug, log } from '../shared/debug.js';
import { errorMessage } from '../shared/errors.js';
import { resolved, unresolvable, type Resolution } from '../shared/result.js';
import type { CellLine, Disease, SourceIds, StageSummary } from '../shared/types.js';
import type { LocalMirror } from '../staging/source-mirror.js';
import { runStage } from '../staging/stage-runner.js';
import type {
  CellLineStagingUpdate,
  StagedCellLine,
  StagedCellLineFields,
  StagingCellLineStore,
} from '../staging/staging-cell-lines.js';
import { CellLineStage } from '../staging/status.js';
import type { CellLineRepository } from '../warehouse/cell-line-repository.js';

export interface StagedCellLinePipelineDeps {
  staging: StagingCellLineStore;
  cellLines: CellLineRepository;
  sourceIds: SourceIds;
  source: CombinationSourceClient;
  cellosaurus: CellLineMetadataClient;
  terminology: TerminologyClient;
  /** Local DrugCombDB dump holding COSMIC ids by cell line name. */
  mirror?: LocalMirror | null;
}

export interface StagedCellLinePipelineOptions {
  batchSize: number;
  /** Never fall back to DrugCombDB; a name without a usable COSMIC id fails. */
  localMode: boolean;
}

/** Where a row lands and what it learned on the way. */
interface Step {
  to: CellLineStage;
  fields: StagedCellLineFields;
}

function toUpdate(row: StagedCellLine, result: Resolution<Step>): CellLineStagingUpdate {
  if (result.kind === 'resolved') {
    return {
      originalName: row.originalName,
      from: row.status,
      to: result.value.to,
      fields: result.value.fields,
    };
  }
  return {
    originalName: row.originalName,
    from: row.status,
    to: CellLineStage.FAILED,
    errorCode: result.code,
    errorMsg: result.message,
  };
}

/**
 * Resolves cell line names to Cellosaurus accessions and UMLS diseases
 * through the staging table:
 *
 *   0 pending → 2 accession + NCIt disease (COSMIC id, one Cellosaurus search)
 *   0 pending → 1 accession (DrugCombDB) → 2 NCIt disease (Cellosaurus)
 *   0 pending → 1 accession (COSMIC hit without a disease, local mode only)
 *   2 → 3 UMLS CUI, or none when the cell line has no mappable disease
 *
 * A missing disease is not a failure; only an unknown cell line or a service
 * error ends at -1.
 */
export class StagedCellLinePipeline {
  private readonly deps: StagedCellLinePipelineDeps;
  private readonly options: StagedCellLinePipelineOptions;

  constructor(deps: StagedCellLinePipelineDeps, options: StagedCellLinePipelineOptions) {
    this.deps = deps;
    this.options = options;
  }

  stage0(names: Iterable<string>): number {
    const unique = [...new Set(names)].filter((name) => name.trim() !== '');
    const inserted = this.deps.staging.stage(unique);
    log('info', 'cell', 'Cell lines staged', { unique: unique.length, inserted });
    return inserted;
  }

  stage1(): Promise<StageSummary> {
    return this.runCellStage('cell.stage1', CellLineStage.PENDING, (row) => this.resolveAccession(row));
  }

  stage2(): Promise<StageSummary> {
    return this.runCellStage('cell.stage2', CellLineStage.ACCESSION_FOUND, (row) =>
      this.resolveDisease(row),
    );
  }

  stage3(): Promise<StageSummary> {
    return this.runCellStage('cell.stage3', CellLineStage.DISEASE_FOUND, (row) =>
      this.resolveConcept(row),
    );
  }

  /**
   * Writes every mapped row: the disease first (when one was found), then
   * the cell line referencing it.
   */
  persist(): StageSummary {
    const summary: StageSummary = { stage: 'cell.persist', processed: 0, advanced: 0, failed: 0 };
    let after = '';

    for (;;) {
      const page = this.deps.staging.listResolved(after, this.options.batchSize);
      if (page.length === 0) {
        break;
      }
      for (const row of page) {
        summary.processed++;
        try {
          const { cellLine, disease } = this.toEntities(row);
          this.deps.cellLines.persist(cellLine, disease);
          summary.advanced++;
        } catch (err) {
          summary.failed++;
          log('error', 'cell', 'Failed to persist cell line', {
            cellLine: row.originalName,
            error: errorMessage(err),
          });
        }
      }
      after = page[page.length - 1].originalName;
    }

    log('info', 'stage', 'cell.persist completed', {
      processed: summary.processed,
      persisted: summary.advanced,
      failed: summary.failed,
    });
    return summary;
  }

  async run(names: Iterable<string>): Promise<StageSummary[]> {
    this.stage0(names);
    const summaries = [await this.stage1(), await this.stage2(), await this.stage3()];
    summaries.push(this.persist());
    return summaries;
  }

  private runCellStage(
    stage: string,
    from: CellLineStage,
    resolve: (row: StagedCellLine) => Promise<Resolution<Step>>,
  ): Promise<StageSummary> {
    return runStage({
      stage,
      store: this.deps.staging,
      status: from,
      batchSize: this.options.batchSize,
      resolveRow: async (row: StagedCellLine) => toUpdate(row, await resolve(row)),
      failRow: (row: StagedCellLine, message: string): CellLineStagingUpdate => ({
        originalName: row.originalName,
        from,
        to: CellLineStage.FAILED,
        errorCode: null,
        errorMsg: message,
      }),
      isFailure: (update: CellLineStagingUpdate) => update.to === CellLineStage.FAILED,
    });
  }

  private async resolveAccession(row: StagedCellLine): Promise<Resolution<Step>> {
    const cosmicId = this.deps.mirror?.findCosmicId(row.originalName) ?? null;
    const hit = cosmicId ? await this.deps.cellosaurus.searchByCosmicId(cosmicId) : null;

    if (hit?.accession && hit.tissue && hit.ncitCode) {
      debug('cell', 'Resolved through COSMIC id', { cellLine: row.originalName, cosmicId });
      return resolved<Step>({
        to: CellLineStage.DISEASE_FOUND,
        fields: {
          cosmicId,
          accession: hit.accession,
          tissue: hit.tissue,
          ncitCode: hit.ncitCode,
          resolutionPath: 'cosmic',
        },
      });
    }

    if (this.options.localMode) {
      if (hit?.accession) {
        // Offline runs keep the confirmed accession; stage 2 looks up the disease
        return resolved<Step>({
          to: CellLineStage.ACCESSION_FOUND,
          fields: { cosmicId, accession: hit.accession, tissue: hit.tissue, resolutionPath: 'cosmic' },
        });
      }
      return unresolvable(
        cosmicId
          ? `COSMIC id ${cosmicId} did not resolve in Cellosaurus`
          : 'no COSMIC id in the local dump',
      );
    }

    const found = await this.deps.source.getCellLine(row.originalName);
    if (!found) {
      return unresolvable('not found in DrugCombDB');
    }
    return resolved<Step>({
      to: CellLineStage.ACCESSION_FOUND,
      fields: {
        cosmicId,
        accession: found.accession,
        tissue: found.tissue,
        resolutionPath: 'drugcombdb',
      },
    });
  }

  private async resolveDisease(row: StagedCellLine): Promise<Resolution<Step>> {
    if (!row.accession) {
      return unresolvable('no Cellosaurus accession');
    }
    const ncitCode = await this.deps.cellosaurus.getDisease(row.accession);
    return resolved<Step>({ to: CellLineStage.DISEASE_FOUND, fields: { ncitCode } });
  }

  private async resolveConcept(row: StagedCellLine): Promise<Resolution<Step>> {
    if (!row.ncitCode) {
      return resolved<Step>({ to: CellLineStage.MAPPED, fields: {} });
    }
    const concept = await this.deps.terminology.ncitToCui(row.ncitCode);
    if (!concept) {
      debug('cell', 'No UMLS concept for NCIt code', { ncitCode: row.ncitCode });
      return resolved<Step>({ to: CellLineStage.MAPPED, fields: {} });
    }
    return resolved<Step>({
      to: CellLineStage.MAPPED,
      fields: { umlsCui: concept.cui, diseaseName: concept.name },
    });
  }

  private toEntities(row: StagedCellLine): { cellLine: CellLine; disease: Disease | null } {
    if (!row.accession) {
      throw new Error(`Staged cell line '${row.originalName}' is mapped but has no accession`);
    }
    const disease = row.umlsCui ? { umlsCui: row.umlsCui, name: row.diseaseName ?? row.umlsCui } : null;
    return {
      cellLine: {
        cellLineId: row.accession,
        sourceId: this.deps.sourceIds.cellosaurus,
        name: row.originalName,
        tissue: row.tissue,
        diseaseId: disease?.umlsCui ?? null,
      },
      disease,
    };
  }
}
