import type { CellLineMetadataClient, CombinationSourceClient, TerminologyClient } from '../clients/types.js';
import { LruCache } from '../shared/cache.js';
import { debug } from '../shared/debug.js';
import { CellLineNotResolvableError } from '../shared/errors.js';
import type { CellLine, Disease, SourceIds } from '../shared/types.js';
import type { CellLineRepository } from '../warehouse/cell-line-repository.js';

export interface CellLineFetchResult {
  cellLine: CellLine;
  disease: Disease | null;
  /** True when served from the resolver's cache. */
  cached: boolean;
}

export interface CellLineResolverDeps {
  cellLines: CellLineRepository;
  sourceIds: SourceIds;
  source: CombinationSourceClient;
  cellosaurus: CellLineMetadataClient;
  terminology: TerminologyClient;
}

/**
 * Resolves one cell line at a time, without staging:
 * DrugCombDB accession → Cellosaurus NCIt disease → UMLS CUI.
 *
 * Successes and unresolvable names are cached separately, so a known-bad
 * name is rejected again without a request.
 */
export class CellLineResolver {
  private readonly deps: CellLineResolverDeps;
  private readonly cache: LruCache<string, CellLineFetchResult>;
  private readonly errorCache: LruCache<string, CellLineNotResolvableError>;
  /** Accessions written by this resolver. */
  private readonly persisted: LruCache<string, true>;

  constructor(deps: CellLineResolverDeps, cacheSize = 1000) {
    this.deps = deps;
    this.cache = new LruCache(cacheSize);
    this.errorCache = new LruCache(cacheSize);
    this.persisted = new LruCache(cacheSize);
  }

  async fetch(name: string): Promise<CellLineFetchResult> {
    const cached = this.cache.get(name);
    if (cached) {
      return { ...cached, cached: true };
    }
    const knownBad = this.errorCache.get(name);
    if (knownBad) {
      throw knownBad;
    }

    const found = await this.deps.source.getCellLine(name);
    if (!found) {
      const error = new CellLineNotResolvableError(name, 'not found in DrugCombDB');
      this.errorCache.set(name, error);
      throw error;
    }

    let disease: Disease | null = null;
    const ncitCode = await this.deps.cellosaurus.getDisease(found.accession);
    if (ncitCode) {
      const concept = await this.deps.terminology.ncitToCui(ncitCode);
      if (concept) {
        disease = { umlsCui: concept.cui, name: concept.name };
      }
    }

    const result: CellLineFetchResult = {
      cellLine: {
        cellLineId: found.accession,
        sourceId: this.deps.sourceIds.cellosaurus,
        name,
        tissue: found.tissue,
        diseaseId: disease?.umlsCui ?? null,
      },
      disease,
      cached: false,
    };
    debug('cell', 'Cell line resolved', { name, accession: found.accession, cui: disease?.umlsCui });
    this.cache.set(name, result);
    return result;
  }

  /**
   * Disease then cell line, once per accession while it stays in the
   * resolver's bounded memory of written accessions.
   */
  persist(result: CellLineFetchResult): void {
    const accession = result.cellLine.cellLineId;
    if (this.persisted.has(accession)) {
      return;
    }
    this.deps.cellLines.persist(result.cellLine, result.disease);
    this.persisted.set(accession, true);
  }
}
