/**
 * Result Aggregate
 *
 * Immutable (input, outcome) pairs produced by the job orchestrator, plus
 * the summaries and serialized forms the CLI writes out.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  SCHEMA_VERSION,
  type BatchFile,
  type FailureKind,
  type FetchInput,
  type FetchOutcome,
  type SerializedResult,
} from '../schemas/index.js';

// ============================================
// Types
// ============================================

/**
 * One input paired with its final outcome
 */
export interface FetchResult {
  readonly input: Readonly<FetchInput>;
  readonly outcome: Readonly<FetchOutcome>;
}

/**
 * Counts over a finished batch
 */
export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  failuresByKind: Partial<Record<FailureKind, number>>;
}

// ============================================
// Construction
// ============================================

/**
 * Pair an input with its outcome. Both are frozen.
 */
export function createFetchResult(input: FetchInput, outcome: FetchOutcome): FetchResult {
  return Object.freeze({
    input: Object.freeze({ ...input }),
    outcome: Object.freeze(outcome),
  });
}

/**
 * Failure recorded for a blank URL argument. Nothing was invoked.
 */
export function createMissingUrlResult(): FetchResult {
  return createFetchResult(
    { url: '' },
    { success: false, kind: 'Unclassified', message: 'No URL provided', attempts: 0 }
  );
}

// ============================================
// Aggregation
// ============================================

/**
 * Summarize a batch
 */
export function summarizeBatch(results: readonly FetchResult[]): BatchSummary {
  const failuresByKind: Partial<Record<FailureKind, number>> = {};
  let succeeded = 0;

  for (const { outcome } of results) {
    if (outcome.success) {
      succeeded++;
    } else {
      failuresByKind[outcome.kind] = (failuresByKind[outcome.kind] ?? 0) + 1;
    }
  }

  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    failuresByKind,
  };
}

// ============================================
// Serialization
// ============================================

/**
 * Flatten a result into the shape written to output files
 */
export function toSerializableResult(result: FetchResult): SerializedResult {
  const { input, outcome } = result;

  if (outcome.success) {
    return {
      success: true,
      url: input.url,
      attempts: outcome.attempts,
      data: outcome.record,
    };
  }

  return {
    success: false,
    url: input.url,
    attempts: outcome.attempts,
    error: outcome.message,
    failureKind: outcome.kind,
  };
}

/**
 * Build the JSON batch file for a finished run
 *
 * @param results - Ordered results
 * @param generatedAt - Timestamp to record (default: now)
 */
export function buildBatchFile(results: readonly FetchResult[], generatedAt: Date = new Date()): BatchFile {
  const summary = summarizeBatch(results);

  return {
    schemaVersion: SCHEMA_VERSION,
    runId: uuidv4(),
    generatedAt: generatedAt.toISOString(),
    total: summary.total,
    succeeded: summary.succeeded,
    failed: summary.failed,
    results: results.map(toSerializableResult),
  };
}
