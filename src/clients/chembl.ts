/**
 * ChEMBL REST API: molecule records by ChEMBL id.
 */

import { z } from 'zod';

import { buildUrl, getJson, type HttpOptions } from './http.js';
import type { ChemblMolecule, MoleculeClient } from './types.js';

const MoleculeResponseSchema = z.object({
  molecules: z.array(
    z.object({
      molecule_chembl_id: z.string(),
      pref_name: z.string().nullish(),
      molecule_type: z.string().nullish(),
      molecule_structures: z
        .object({
          canonical_smiles: z.string().nullish(),
          standard_inchi_key: z.string().nullish(),
        })
        .nullish(),
    }),
  ),
});

export class ChemblClient implements MoleculeClient {
  private readonly baseUrl: string;
  private readonly http: HttpOptions;

  constructor(baseUrl: string, http: HttpOptions = {}) {
    this.baseUrl = baseUrl;
    this.http = http;
  }

  async getMolecule(chemblId: string): Promise<ChemblMolecule | null> {
    const url = buildUrl(this.baseUrl, 'molecule.json', {
      molecule_chembl_id: chemblId,
      only: 'molecule_chembl_id,pref_name,molecule_type,molecule_structures',
    });
    const body = await getJson(url, MoleculeResponseSchema, this.http);
    const molecule = body?.molecules[0];
    if (!molecule) return null;
    return {
      chemblId: molecule.molecule_chembl_id,
      prefName: molecule.pref_name ?? null,
      moleculeType: molecule.molecule_type ?? null,
      canonicalSmiles: molecule.molecule_structures?.canonical_smiles ?? null,
      inchiKey: molecule.molecule_structures?.standard_inchi_key ?? null,
    };
  }
}
