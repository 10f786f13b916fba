/**
 * DrugCombDB REST API: combinations by index, drugs and cell lines by name.
 * Every response is wrapped in `{ code, msg, data }`.
 */

import { z } from 'zod';

import { PayloadError } from '../shared/errors.js';
import type { CombinationRecord } from '../shared/types.js';
import { buildUrl, getJson, type HttpOptions } from './http.js';
import type { CombinationSourceClient, SourceCellLine, SourceDrug } from './types.js';

/** Scores arrive as numbers, numeric strings, or not at all. */
const ScoreField = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined || v === '') return null;
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  });

const CombinationSchema = z.object({
  id: z.number(),
  drug1: z.string(),
  drug2: z.string(),
  cellName: z.string(),
  source: z.string().nullish(),
  HSA: ScoreField,
  Bliss: ScoreField,
  Loewe: ScoreField,
  ZIP: ScoreField,
});

const DrugSchema = z.object({
  drugNameOfficial: z.string().nullish(),
  cIds: z.string().nullish(),
  smilesString: z.string().nullish(),
});

const CellLineSchema = z.object({
  cellosaurus_assession: z.string().nullish(),
  tissue: z.string().nullish(),
});

function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    code: z.number(),
    msg: z.string().nullish(),
    data: data.nullish(),
  });
}

/**
 * "CIDs00003385" → "3385"; bare digits pass through. Returns null for
 * anything that is not a CID.
 */
export function parsePubchemCid(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const match = /^(?:CID[sm]?)?0*(\d+)$/i.exec(raw.trim());
  return match ? match[1] : null;
}

export class DrugCombDbClient implements CombinationSourceClient {
  private readonly baseUrl: string;
  private readonly http: HttpOptions;

  constructor(baseUrl: string, http: HttpOptions = {}) {
    this.baseUrl = baseUrl;
    this.http = http;
  }

  async getCombination(index: number): Promise<CombinationRecord | null> {
    const url = buildUrl(this.baseUrl, `integration/list/${index}`);
    const data = this.unwrap(url, await getJson(url, envelope(CombinationSchema), this.http));
    if (!data) return null;
    return {
      id: data.id,
      drug1: data.drug1,
      drug2: data.drug2,
      cellLine: data.cellName,
      source: data.source ?? null,
      hsa: data.HSA,
      bliss: data.Bliss,
      loewe: data.Loewe,
      zip: data.ZIP,
    };
  }

  async getDrug(name: string): Promise<SourceDrug | null> {
    const url = buildUrl(this.baseUrl, `chemical/info/${encodeURIComponent(name)}`);
    const data = this.unwrap(url, await getJson(url, envelope(DrugSchema), this.http));
    const foreignId = parsePubchemCid(data?.cIds);
    if (!data || !foreignId) return null;
    return {
      foreignId,
      officialName: data.drugNameOfficial ?? null,
      structure: data.smilesString ?? null,
    };
  }

  async getCellLine(name: string): Promise<SourceCellLine | null> {
    const url = buildUrl(this.baseUrl, 'cellLine/cellName', { cellName: name });
    const data = this.unwrap(url, await getJson(url, envelope(CellLineSchema), this.http));
    if (!data?.cellosaurus_assession) return null;
    return { accession: data.cellosaurus_assession, tissue: data.tissue ?? null };
  }

  /**
   * Envelope code 200 → data; 404 or missing data → null; anything else is
   * an error reported by the service.
   */
  private unwrap<T>(
    url: string,
    body: { code: number; msg?: string | null; data?: T | null } | null,
  ): T | null {
    if (body === null || body.code === 404) return null;
    if (body.code !== 200) {
      throw new PayloadError(url, `API returned error code ${body.code}: ${body.msg ?? ''}`.trim());
    }
    return body.data ?? null;
  }
}
