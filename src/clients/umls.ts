import { z } from 'zod';

import { buildUrl, getJson, type HttpOptions } from './http.js';
import type { TerminologyClient, UmlsConcept } from './types.js';

const SearchResponseSchema = z.object({
  result: z.object({
    results: z.array(z.object({ ui: z.string(), name: z.string() })),
  }),
});

/**
 * UMLS Terminology Services: exact source-code search in the NCI vocabulary.
 */
export class UmlsClient implements TerminologyClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly http: HttpOptions;

  constructor(baseUrl: string, apiKey: string, http: HttpOptions = {}) {
    this.baseUrl = baseUrl;
    this.apiKey = apiKey;
    this.http = http;
  }

  async ncitToCui(ncitCode: string): Promise<UmlsConcept | null> {
    const url = buildUrl(this.baseUrl, 'search/current', {
      string: ncitCode,
      inputType: 'sourceUi',
      searchType: 'exact',
      sabs: 'NCI',
      apiKey: this.apiKey,
    });
    const body = await getJson(url, SearchResponseSchema, this.http);
    const hit = body?.result.results[0];
    // UTS reports an empty search as a single "NONE" result
    if (!hit || hit.ui === 'NONE') return null;
    return { cui: hit.ui, name: hit.name };
  }
}
