import { existsSync } from 'node:fs';

import { CellosaurusClient } from '../clients/cellosaurus.js';
import { ChemblClient } from '../clients/chembl.js';
import { DrugCombDbClient } from '../clients/drugcombdb.js';
import type { HttpOptions } from '../clients/http.js';
import type {
  CellLineMetadataClient,
  CombinationSourceClient,
  CrossReferenceClient,
  MoleculeClient,
  TerminologyClient,
} from '../clients/types.js';
import { UmlsClient } from '../clients/umls.js';
import { UniChemClient } from '../clients/unichem.js';
import { getDatabaseConfig, getUmlsApiKey, type EtlConfig } from '../shared/config.js';
import { openDatabase, type EtlDatabase } from '../storage/database.js';

export interface EtlClients {
  source: CombinationSourceClient;
  crossRef: CrossReferenceClient;
  cellosaurus: CellLineMetadataClient;
  terminology: TerminologyClient;
  molecules: MoleculeClient;
}

export interface EtlStores {
  staging: EtlDatabase;
  warehouse: EtlDatabase;
  /** Null when the mirror file does not exist and was not required. */
  mirror: EtlDatabase | null;
  close(): void;
}

/**
 * Live clients for every external service, configured from EtlConfig.
 * Throws when UMLS_API_KEY is not set.
 */
export function createClients(config: EtlConfig): EtlClients {
  const http: HttpOptions = {
    maxRetries: config.http.maxRetries,
    initialBackoffMs: config.http.initialBackoffMs,
  };
  const { endpoints } = config;
  return {
    source: new DrugCombDbClient(endpoints.drugCombDb, http),
    crossRef: new UniChemClient(endpoints.uniChem, http),
    cellosaurus: new CellosaurusClient(endpoints.cellosaurus, http),
    terminology: new UmlsClient(endpoints.umls, getUmlsApiKey(), http),
    molecules: new ChemblClient(endpoints.chembl, http),
  };
}

/**
 * Opens the staging store and the warehouse, and the local mirror when it
 * exists or `requireMirror` is set (a missing mirror file is then created
 * empty).
 */
export function openStores(config: EtlConfig, requireMirror: boolean): EtlStores {
  const staging = openDatabase(getDatabaseConfig(config.stagingDbPath, config), ['staging']);
  const warehouse = openDatabase(getDatabaseConfig(config.warehouseDbPath, config), ['warehouse']);

  const mirrorConfig = getDatabaseConfig(config.mirrorDbPath, config);
  const mirror =
    requireMirror || existsSync(mirrorConfig.dbPath) ? openDatabase(mirrorConfig, ['mirror']) : null;

  return {
    staging,
    warehouse,
    mirror,
    close(): void {
      mirror?.close();
      warehouse.close();
      staging.close();
    },
  };
}
