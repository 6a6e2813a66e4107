/**
 * Bird Module
 *
 * Subprocess layer around the bird CLI.
 */

export * from './types.js';
export { detectBird, clearDetectionCache } from './cli-detector.js';
export { invokeProcess, buildProcessEnvironment, buildBirdEnvironment } from './process-invoker.js';
export {
  CLASSIFICATION_RULES,
  classifyFailure,
  classifyProcessResult,
  describeFailure,
  isRetryableKind,
  type ClassificationRule,
} from './classifier.js';
export { BirdClient, type BirdClientOptions, type PostFetcher } from './client.js';
