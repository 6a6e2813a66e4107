/**
 * Type Definitions
 *
 * Re-exports the Zod-inferred types from schemas and defines the
 * default run configuration and bird timeouts.
 */

// ============================================
// Re-export all schema types
// ============================================

export type {
  // CanonicalRecord types
  MediaType,
  MediaItem,
  CanonicalRecord,

  // FetchOutcome types
  FailureKind,
  FetchInput,
  FetchOutcome,
  SerializedResult,
  BatchFile,

  // FetchConfig types
  BackoffStrategy,
  OutputFormat,
  FetchConfig,

  // Validation result types
  ValidationResult,
} from '../schemas/index.js';

import type { FetchConfig } from '../schemas/index.js';

// ============================================
// Bird Timeouts
// ============================================

/**
 * Timeout for `bird read` in milliseconds
 */
export const FETCH_TIMEOUT_MS = 60_000;

/**
 * Timeout for `bird query-ids --fresh` in milliseconds.
 * Longer than a read: the refresh scrapes X's web bundle.
 */
export const REFRESH_TIMEOUT_MS = 120_000;

/**
 * Timeout for `bird --version` in milliseconds
 */
export const VERSION_TIMEOUT_MS = 10_000;

/**
 * Timeout for `bird whoami` in milliseconds
 */
export const WHOAMI_TIMEOUT_MS = 30_000;

// ============================================
// Default Configuration
// ============================================

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: FetchConfig = {
  concurrency: 5,
  maxAttempts: 5,
  retryDelayMs: 10_000,
  backoff: 'fixed',
  timeoutMs: FETCH_TIMEOUT_MS,
  refreshTimeoutMs: REFRESH_TIMEOUT_MS,
  outputDir: 'output',
  format: 'json',
  verbose: false,
};

/**
 * Upper bound for exponential backoff waits in milliseconds
 */
export const MAX_RETRY_DELAY_MS = 120_000;
