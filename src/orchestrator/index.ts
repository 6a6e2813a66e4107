/**
 * Orchestrator Module
 */

export {
  runJobs,
  decideNextStep,
  type JobState,
  type NextStep,
  type OrchestratorOptions,
} from './jobOrchestrator.js';
export {
  createFetchResult,
  createMissingUrlResult,
  summarizeBatch,
  toSerializableResult,
  buildBatchFile,
  type FetchResult,
  type BatchSummary,
} from './result.js';
