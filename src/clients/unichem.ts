import { z } from 'zod';

import { buildUrl, postJson, type HttpOptions } from './http.js';
import type { CompoundMapping, CrossReferenceClient } from './types.js';

/** UniChem source ids. */
export const UNICHEM_CHEMBL_SOURCE = 1;
export const UNICHEM_PUBCHEM_SOURCE = 22;

const CompoundsResponseSchema = z.object({
  compounds: z
    .array(
      z.object({
        standardInchiKey: z.string().nullish(),
        sources: z
          .array(
            z.object({
              id: z.number(),
              compoundId: z.string(),
            }),
          )
          .nullish(),
      }),
    )
    .nullish(),
});

/**
 * UniChem cross-reference lookups, from a PubChem CID to ChEMBL.
 */
export class UniChemClient implements CrossReferenceClient {
  private readonly baseUrl: string;
  private readonly http: HttpOptions;

  constructor(baseUrl: string, http: HttpOptions = {}) {
    this.baseUrl = baseUrl;
    this.http = http;
  }

  /**
   * Returns null when UniChem knows no compound for the CID. When it does,
   * `chemblId` is null if none of its sources is ChEMBL.
   */
  async getCompoundMapping(pubchemId: string): Promise<CompoundMapping | null> {
    const url = buildUrl(this.baseUrl, 'compounds/');
    const body = await postJson(
      url,
      { compound: pubchemId, sourceID: UNICHEM_PUBCHEM_SOURCE, type: 'sourceID' },
      CompoundsResponseSchema,
      this.http,
    );

    // Only one compound expected since the lookup is by source id
    const compound = body?.compounds?.[0];
    if (!compound) return null;

    const chembl = (compound.sources ?? []).find((s) => s.id === UNICHEM_CHEMBL_SOURCE);
    return {
      chemblId: chembl?.compoundId ?? null,
      inchiKey: compound.standardInchiKey ?? null,
    };
  }
}
