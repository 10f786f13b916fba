/**
 * Error taxonomy.
 *
 * - Unresolvable entities (DrugNotResolvableError, CellLineNotResolvableError)
 *   are expected and carry a reason; they skip one combination, never a run.
 * - HttpError / PayloadError are transient service failures.
 * - InvariantError is a programming or data error and is never caught locally.
 */

export const DrugErrorCode = {
  NOT_FOUND_IN_SOURCE: 1,
  NOT_FOUND_IN_CROSSREF: 2,
  NOT_FOUND_IN_CANONICAL: 3,
} as const;

export type DrugErrorCode = (typeof DrugErrorCode)[keyof typeof DrugErrorCode];

const DRUG_REASONS: Record<DrugErrorCode, string> = {
  [DrugErrorCode.NOT_FOUND_IN_SOURCE]: 'not found in DrugCombDB, despite being in a combination',
  [DrugErrorCode.NOT_FOUND_IN_CROSSREF]: 'no ChEMBL mapping in UniChem',
  [DrugErrorCode.NOT_FOUND_IN_CANONICAL]: 'not found in ChEMBL, despite being mapped in UniChem',
};

export function describeDrugError(code: DrugErrorCode): string {
  return DRUG_REASONS[code];
}

export class DrugNotResolvableError extends Error {
  readonly drugName: string;
  readonly code: DrugErrorCode;

  constructor(drugName: string, code: DrugErrorCode) {
    super(`Drug '${drugName}' could not be resolved: ${DRUG_REASONS[code]}`);
    this.name = 'DrugNotResolvableError';
    this.drugName = drugName;
    this.code = code;
  }

  get reason(): string {
    return DRUG_REASONS[this.code];
  }
}

export class CellLineNotResolvableError extends Error {
  readonly cellLineName: string;
  readonly reason: string | null;

  constructor(cellLineName: string, reason: string | null = null) {
    super(`Cell line '${cellLineName}' could not be resolved${reason ? `: ${reason}` : ''}`);
    this.name = 'CellLineNotResolvableError';
    this.cellLineName = cellLineName;
    this.reason = reason;
  }
}

export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
  }
}

/**
 * A response body that does not have the documented shape, or an API
 * envelope reporting an error code.
 */
export class PayloadError extends Error {
  readonly url: string;

  constructor(url: string, detail: string) {
    super(`Unexpected payload from ${url}: ${detail}`);
    this.name = 'PayloadError';
    this.url = url;
  }
}

export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
