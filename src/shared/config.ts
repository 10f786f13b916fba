import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join } from 'node:path';

import { z } from 'zod';

import type { DatabaseConfig } from './types.js';

/**
 * Cached debug-enabled flag.
 * Resolved once per process -- debug mode does not change at runtime.
 */
let _debugCached: boolean | null = null;

let _configCached: EtlConfig | null = null;

/**
 * Default busy timeout in milliseconds.
 * Must be >= 5000ms to prevent SQLITE_BUSY when the CLI and a test run share a file.
 */
export const DEFAULT_BUSY_TIMEOUT = 5000;

/**
 * Returns the data directory holding databases, checkpoints, audit and logs.
 * Default: ~/.disnet-etl/
 *
 * Supports DISNET_ETL_DATA_DIR env var override for testing.
 */
export function getConfigDir(): string {
  const dir = process.env.DISNET_ETL_DATA_DIR || join(homedir(), '.disnet-etl');
  mkdirSync(dir, { recursive: true });
  return dir;
}

function readConfigFile(): Record<string, unknown> {
  try {
    const raw = readFileSync(join(getConfigDir(), 'config.json'), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? { ...parsed }
      : {};
  } catch {
    // Config file doesn't exist or is invalid -- defaults apply
    return {};
  }
}

/**
 * Returns whether debug logging is enabled for this process.
 *
 * Resolution order:
 * 1. `DISNET_ETL_DEBUG` env var -- `"1"` or `"true"` enables debug mode
 * 2. `config.json` -- `{ "debug": true }` enables debug mode
 * 3. Default: disabled
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.DISNET_ETL_DEBUG;
  if (envVal === '1' || envVal === 'true') {
    _debugCached = true;
    return true;
  }

  _debugCached = readConfigFile().debug === true;
  return _debugCached;
}

// =============================================================================
// ETL configuration
// =============================================================================

export const EndpointsSchema = z.object({
  drugCombDb: z.string().url().default('http://drugcombdb.denglab.org:8888/'),
  cellosaurus: z.string().url().default('https://api.cellosaurus.org/'),
  umls: z.string().url().default('https://uts-ws.nlm.nih.gov/rest/'),
  uniChem: z.string().url().default('https://www.ebi.ac.uk/unichem/api/v1/'),
  chembl: z.string().url().default('https://www.ebi.ac.uk/chembl/api/data/'),
});

export const HttpConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10).default(3),
  initialBackoffMs: z.number().int().min(0).default(500),
});

/**
 * What the streaming pipeline does with an index that failed on a
 * transient error:
 * - `skip`: the checkpoint keeps advancing past later successes, so the
 *   failed index is never revisited unless the checkpoint is removed.
 * - `retry`: the checkpoint stops advancing at the first failure of the
 *   run, so the next run starts again from that index.
 */
export const FailedIndexPolicySchema = z.enum(['skip', 'retry']);
export type FailedIndexPolicy = z.infer<typeof FailedIndexPolicySchema>;

export const EtlConfigSchema = z.object({
  batchSize: z.number().int().min(1).max(100_000).default(1000),
  localMode: z.boolean().default(false),
  failedIndexPolicy: FailedIndexPolicySchema.default('skip'),
  busyTimeout: z.number().int().min(0).default(DEFAULT_BUSY_TIMEOUT),
  stagingDbPath: z.string().default('staging.db'),
  warehouseDbPath: z.string().default('disnet.db'),
  mirrorDbPath: z.string().default('drugcombs.sqlite'),
  checkpointPath: z.string().default('checkpoints/dcdb_pipeline.chkpt'),
  auditPath: z.string().default('audit/skipped_dcdb.jsonl'),
  logPath: z.string().default('logs/dcdb_pipeline.log'),
  http: HttpConfigSchema.default({}),
  endpoints: EndpointsSchema.default({}),
});

export type EtlConfig = z.infer<typeof EtlConfigSchema>;

/**
 * Resolves a configured path against the data directory unless it is absolute.
 */
export function resolveDataPath(path: string): string {
  return isAbsolute(path) ? path : join(getConfigDir(), path);
}

/**
 * Loads `config.json` from the data directory, validated and merged over
 * defaults. Invalid files raise a ZodError naming the offending keys.
 * The result is cached for the process lifetime.
 */
export function loadEtlConfig(): EtlConfig {
  if (_configCached !== null) {
    return _configCached;
  }
  // Unknown keys (including `debug`) are stripped by the schema
  _configCached = EtlConfigSchema.parse(readConfigFile());
  return _configCached;
}

/**
 * Clears cached config and debug flag. Tests only.
 */
export function resetConfigCache(): void {
  _configCached = null;
  _debugCached = null;
}

/**
 * UMLS terminology services need a personal API key.
 */
export function getUmlsApiKey(): string {
  const key = process.env.UMLS_API_KEY;
  if (!key) {
    throw new Error('UMLS_API_KEY is not set');
  }
  return key;
}

/**
 * Database configuration for a store path taken from EtlConfig.
 */
export function getDatabaseConfig(path: string, config: EtlConfig = loadEtlConfig()): DatabaseConfig {
  return {
    dbPath: resolveDataPath(path),
    busyTimeout: config.busyTimeout,
  };
}
