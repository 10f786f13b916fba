import { AuditLog, CheckpointStore } from '../pipeline/checkpoint.js';
import { StagedCellLinePipeline } from '../pipeline/cell-line-pipeline.js';
import { CellLineResolver } from '../pipeline/cell-line-resolver.js';
import { StagedDrugPipeline } from '../pipeline/drug-pipeline.js';
import { DrugResolver } from '../pipeline/drug-resolver.js';
import { ExperimentPipeline } from '../pipeline/experiment-pipeline.js';
import { BatchOrchestrator } from '../pipeline/orchestrator.js';
import { ScoreEngine } from '../pipeline/score-engine.js';
import { StreamingPipeline, type StreamRange } from '../pipeline/streaming-pipeline.js';
import { resolveDataPath, type EtlConfig } from '../shared/config.js';
import type { RunSummary } from '../shared/types.js';
import { LocalMirror } from '../staging/source-mirror.js';
import { StagingCellLineStore } from '../staging/staging-cell-lines.js';
import { StagingDrugStore } from '../staging/staging-drugs.js';
import { CellLineRepository } from '../warehouse/cell-line-repository.js';
import { CombinationRepository } from '../warehouse/combination-repository.js';
import { DrugRepository } from '../warehouse/drug-repository.js';
import { ExperimentRepository } from '../warehouse/experiment-repository.js';
import { ScoreRepository } from '../warehouse/score-repository.js';
import { SourceRepository } from '../warehouse/source-repository.js';
import { createClients, openStores, type EtlClients } from './context.js';
import { collectStatus, formatStatus } from './status.js';

/**
 * `stream`: combination-by-index integration with checkpoint and audit.
 */
export async function runStreamCommand(
  range: StreamRange,
  config: EtlConfig,
  clients: EtlClients = createClients(config),
): Promise<RunSummary> {
  const stores = openStores(config, false);
  try {
    const db = stores.warehouse.db;
    const sourceIds = new SourceRepository(db).resolveSourceIds();

    const pipeline = new StreamingPipeline(
      {
        source: clients.source,
        drugs: new DrugResolver({ drugs: new DrugRepository(db), sourceIds, ...clients }),
        cellLines: new CellLineResolver({ cellLines: new CellLineRepository(db), sourceIds, ...clients }),
        scores: new ScoreEngine(new ScoreRepository(db)),
        experiments: new ExperimentPipeline(db, new CombinationRepository(db), new ExperimentRepository(db)),
        checkpoint: new CheckpointStore(resolveDataPath(config.checkpointPath)),
        audit: new AuditLog(resolveDataPath(config.auditPath)),
      },
      config.failedIndexPolicy,
    );
    return await pipeline.run(range);
  } finally {
    stores.close();
  }
}

/**
 * `local`: staged batch integration of the local mirror's pending rows.
 */
export async function runLocalCommand(
  config: EtlConfig,
  clients: EtlClients = createClients(config),
): Promise<RunSummary> {
  const stores = openStores(config, true);
  try {
    const db = stores.warehouse.db;
    const sourceIds = new SourceRepository(db).resolveSourceIds();
    const mirror = stores.mirror ? new LocalMirror(stores.mirror.db) : null;
    if (!mirror) {
      throw new Error('Local mirror database could not be opened');
    }
    const drugStaging = new StagingDrugStore(stores.staging.db);
    const cellLineStaging = new StagingCellLineStore(stores.staging.db);
    const options = { batchSize: config.batchSize, localMode: config.localMode };

    const orchestrator = new BatchOrchestrator({
      mirror,
      drugStaging,
      cellLineStaging,
      drugPipeline: new StagedDrugPipeline(
        { staging: drugStaging, drugs: new DrugRepository(db), sourceIds, mirror, ...clients },
        options,
      ),
      cellLinePipeline: new StagedCellLinePipeline(
        { staging: cellLineStaging, cellLines: new CellLineRepository(db), sourceIds, mirror, ...clients },
        options,
      ),
      scores: new ScoreEngine(new ScoreRepository(db)),
      experiments: new ExperimentPipeline(db, new CombinationRepository(db), new ExperimentRepository(db)),
    });
    return await orchestrator.run();
  } finally {
    stores.close();
  }
}

/**
 * `status`: human-readable progress report.
 */
export function runStatusCommand(config: EtlConfig): string {
  const stores = openStores(config, false);
  try {
    return formatStatus(
      collectStatus({
        drugStaging: new StagingDrugStore(stores.staging.db),
        cellLineStaging: new StagingCellLineStore(stores.staging.db),
        checkpoint: new CheckpointStore(resolveDataPath(config.checkpointPath)),
        audit: new AuditLog(resolveDataPath(config.auditPath)),
        mirror: stores.mirror ? new LocalMirror(stores.mirror.db) : null,
      }),
    );
  } finally {
    stores.close();
  }
}
