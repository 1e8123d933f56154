// Engine surface for collectors and scripts that run the reconciliation in-process
export {
  config,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_RELIABILITY_WEIGHTS,
  loadEngineConfig,
  type EngineConfig,
  type ReliabilityTable,
} from './lib/config.js';
export * from './lib/errors.js';
export { createRunLogger, logger, type Logger } from './lib/logger.js';
export { MemoryRecordStore, type RecordStore } from './lib/store.js';
export { DynamoRecordStore } from './lib/dynamoStore.js';
export { parseObservation } from './lib/validation.js';

export { resolveField, mergeFieldValue, weightLookup } from './lib/services/mergePolicy.js';
export {
  EntityIndex,
  match,
  candidateKeysFor,
  pairKeysFor,
  type MatchDecision,
} from './lib/services/matcher.js';
export { computeScores, qualityStatus, sizeCategory } from './lib/services/scoring.js';
export {
  ReconciliationEngine,
  type ReconcileOptions,
  type ReconcileResult,
  type ReconciliationDeps,
} from './lib/services/reconciliation.js';
export { ResearchScheduler, type SchedulerDeps } from './lib/services/scheduler.js';
export {
  BatchOrchestrator,
  type BatchOptions,
  type Collector,
  type OrchestratorDeps,
} from './lib/services/orchestrator.js';
export * as tasks from './lib/services/tasks.js';
export { summarizeProfiles } from './lib/services/stats.js';
export { handler } from './handlers/api.js';
