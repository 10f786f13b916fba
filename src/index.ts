// Library entry point: storage, clients, staging and pipelines.

export { openDatabase, type EtlDatabase } from './storage/database.js';
export { runMigrations, MIGRATIONS, type Migration, type MigrationScope } from './storage/migrations.js';

export * from './shared/types.js';
export * from './shared/errors.js';
export * from './shared/result.js';
export { LruCache } from './shared/cache.js';
export { loadEtlConfig, getDatabaseConfig, EtlConfigSchema, type EtlConfig } from './shared/config.js';

export * from './clients/types.js';
export { DrugCombDbClient, parsePubchemCid } from './clients/drugcombdb.js';
export { UniChemClient } from './clients/unichem.js';
export { CellosaurusClient } from './clients/cellosaurus.js';
export { UmlsClient } from './clients/umls.js';
export { ChemblClient } from './clients/chembl.js';
export { fetchWithRetry, type HttpOptions } from './clients/http.js';

export { DrugStage, CellLineStage } from './staging/status.js';
export { StagingDrugStore, type StagedDrug } from './staging/staging-drugs.js';
export { StagingCellLineStore, type StagedCellLine } from './staging/staging-cell-lines.js';
export { LocalMirror } from './staging/source-mirror.js';

export { SourceRepository } from './warehouse/source-repository.js';
export { DrugRepository } from './warehouse/drug-repository.js';
export { CellLineRepository } from './warehouse/cell-line-repository.js';
export { ScoreRepository } from './warehouse/score-repository.js';
export { CombinationRepository } from './warehouse/combination-repository.js';
export { ExperimentRepository, computeExperimentHash } from './warehouse/experiment-repository.js';

export { normalizeDrugName } from './pipeline/normalize.js';
export { StagedDrugPipeline } from './pipeline/drug-pipeline.js';
export { StagedCellLinePipeline } from './pipeline/cell-line-pipeline.js';
export { DrugResolver, type DrugFetchResult } from './pipeline/drug-resolver.js';
export { CellLineResolver, type CellLineFetchResult } from './pipeline/cell-line-resolver.js';
export { ScoreEngine, classifyScores } from './pipeline/score-engine.js';
export { ExperimentPipeline } from './pipeline/experiment-pipeline.js';
export { BatchOrchestrator } from './pipeline/orchestrator.js';
export { StreamingPipeline, type StreamRange } from './pipeline/streaming-pipeline.js';
export { CheckpointStore, AuditLog } from './pipeline/checkpoint.js';
