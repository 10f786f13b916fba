import type { CombinationSourceClient, CrossReferenceClient, MoleculeClient } from '../clients/types.js';
import { LruCache } from '../shared/cache.js';
import { debug } from '../shared/debug.js';
import { describeDrugError, DrugErrorCode, DrugNotResolvableError } from '../shared/errors.js';
import { resolved, unresolvable, type Resolution } from '../shared/result.js';
import type { Drug, SourceIds } from '../shared/types.js';
import type { DrugRepository } from '../warehouse/drug-repository.js';
import { normalizeDrugName } from './normalize.js';

/** A drug as published (PubChem CID) and its cured ChEMBL record. */
export interface DrugFetchResult {
  raw: Drug;
  chembl: Drug;
}

export type DrugResolution = Resolution<DrugFetchResult, DrugErrorCode>;

export interface DrugResolverDeps {
  drugs: DrugRepository;
  sourceIds: SourceIds;
  source: CombinationSourceClient;
  crossRef: CrossReferenceClient;
  molecules: MoleculeClient;
}

function notFound(code: DrugErrorCode): DrugResolution {
  return unresolvable(describeDrugError(code), code);
}

/**
 * Resolves the drugs of one combination at a time, without staging:
 * DrugCombDB → UniChem → ChEMBL. Results are cached by normalized name for
 * the lifetime of the resolver; failures are not cached.
 */
export class DrugResolver {
  private readonly deps: DrugResolverDeps;
  private readonly cache: LruCache<string, DrugFetchResult>;

  constructor(deps: DrugResolverDeps, cacheSize = 1000) {
    this.deps = deps;
    this.cache = new LruCache(cacheSize);
  }

  /**
   * Resolves every name, in order. Throws DrugNotResolvableError for the
   * first name that cannot be resolved; service errors propagate.
   */
  async fetch(names: readonly string[]): Promise<DrugFetchResult[]> {
    const results: DrugFetchResult[] = [];
    for (const name of names) {
      const outcome = await this.resolve(name);
      if (outcome.kind === 'unresolvable') {
        throw new DrugNotResolvableError(normalizeDrugName(name), outcome.code);
      }
      results.push(outcome.value);
    }
    return results;
  }

  async resolve(name: string): Promise<DrugResolution> {
    const drugName = normalizeDrugName(name);
    const cached = this.cache.get(drugName);
    if (cached) {
      return resolved(cached);
    }

    const sourceDrug = await this.deps.source.getDrug(drugName);
    if (!sourceDrug) {
      return notFound(DrugErrorCode.NOT_FOUND_IN_SOURCE);
    }

    const mapping = await this.deps.crossRef.getCompoundMapping(sourceDrug.foreignId);
    if (!mapping?.chemblId) {
      return notFound(DrugErrorCode.NOT_FOUND_IN_CROSSREF);
    }

    const molecule = await this.deps.molecules.getMolecule(mapping.chemblId);
    if (!molecule) {
      return notFound(DrugErrorCode.NOT_FOUND_IN_CANONICAL);
    }

    const result: DrugFetchResult = {
      raw: {
        drugId: sourceDrug.foreignId,
        drugName: sourceDrug.officialName ?? drugName,
        sourceId: this.deps.sourceIds.pubchem,
        molecularType: null,
        chemicalStructure: sourceDrug.structure,
        inchiKey: mapping.inchiKey,
      },
      chembl: {
        drugId: molecule.chemblId,
        drugName: molecule.prefName ?? molecule.chemblId,
        sourceId: this.deps.sourceIds.chembl,
        molecularType: molecule.moleculeType,
        chemicalStructure: molecule.canonicalSmiles,
        inchiKey: molecule.inchiKey,
      },
    };
    debug('drug', 'Drug resolved', { drugName, chemblId: molecule.chemblId });
    this.cache.set(drugName, result);
    return resolved(result);
  }

  /**
   * Writes raw drug, cured drug and their mapping for each result.
   */
  persist(results: readonly DrugFetchResult[]): void {
    for (const result of results) {
      this.deps.drugs.persistResolved(result.raw, result.chembl);
    }
  }
}
