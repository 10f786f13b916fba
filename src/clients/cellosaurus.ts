import { z } from 'zod';

import { buildUrl, getJson, type HttpOptions } from './http.js';
import type { CellLineMetadataClient, CellosaurusHit } from './types.js';

const CellLineEntrySchema = z.object({
  'accession-list': z.array(z.object({ value: z.string() })).nullish(),
  'disease-list': z.array(z.object({ accession: z.string().nullish() })).nullish(),
  'derived-from-site-list': z
    .array(z.object({ site: z.object({ value: z.string().nullish() }).nullish() }))
    .nullish(),
});

const CellosaurusResponseSchema = z.object({
  Cellosaurus: z
    .object({
      'cell-line-list': z.array(CellLineEntrySchema).nullish(),
    })
    .nullish(),
});

type CellosaurusResponse = z.infer<typeof CellosaurusResponseSchema>;

function firstEntry(body: CellosaurusResponse | null) {
  return body?.Cellosaurus?.['cell-line-list']?.[0] ?? null;
}

/**
 * Cellosaurus cell line knowledge base.
 */
export class CellosaurusClient implements CellLineMetadataClient {
  private readonly baseUrl: string;
  private readonly http: HttpOptions;

  constructor(baseUrl: string, http: HttpOptions = {}) {
    this.baseUrl = baseUrl;
    this.http = http;
  }

  /**
   * NCIt accession of the first disease linked to a cell line, or null.
   */
  async getDisease(accession: string): Promise<string | null> {
    const url = buildUrl(this.baseUrl, `cell-line/${encodeURIComponent(accession)}`, {
      fields: 'din', // din: diseases from NCIt
      format: 'json',
    });
    const entry = firstEntry(await getJson(url, CellosaurusResponseSchema, this.http));
    return entry?.['disease-list']?.[0]?.accession ?? null;
  }

  /**
   * Accession, NCIt disease and site of the cell line cross-referenced to a
   * COSMIC cell line id, in one request.
   */
  async searchByCosmicId(cosmicId: string): Promise<CellosaurusHit | null> {
    const url = buildUrl(this.baseUrl, 'search/cell-line', {
      q: `dr:Cosmic-CLP;${cosmicId}`,
      fields: 'ac,din,site',
      format: 'json',
    });
    const entry = firstEntry(await getJson(url, CellosaurusResponseSchema, this.http));
    if (!entry) return null;
    return {
      accession: entry['accession-list']?.[0]?.value ?? null,
      ncitCode: entry['disease-list']?.[0]?.accession ?? null,
      tissue: entry['derived-from-site-list']?.[0]?.site?.value ?? null,
    };
  }
}
