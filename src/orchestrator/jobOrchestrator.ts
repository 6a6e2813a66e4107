/**
 * Job Orchestrator
 *
 * Runs one fetch job per input on a bounded worker pool. Each job is an
 * explicit state machine:
 *
 *   Pending -> Invoking -> Classifying -> Retrying | Refreshing | Succeeded | Failed
 *
 * Retry waits suspend only the worker that owns the job. Nothing escapes
 * a job except its outcome; results come back in input order.
 */

import type {
  BackoffStrategy,
  CanonicalRecord,
  FailureKind,
  FetchInput,
  FetchOutcome,
} from '../schemas/index.js';
import type { PostFetcher } from '../bird/client.js';
import type { ProcessResult } from '../bird/types.js';
import { classifyProcessResult, describeFailure, isRetryableKind } from '../bird/classifier.js';
import { parsePostOutput } from '../processing/normalize.js';
import { processWithConcurrency } from '../utils/concurrency.js';
import { retryDelayFor, sleep as defaultSleep } from '../utils/retry.js';
import { consoleLogSink, formatDuration, type LogSink } from '../utils/logger.js';
import { MAX_RETRY_DELAY_MS } from '../types/index.js';
import { createFetchResult, type FetchResult } from './result.js';

// ============================================
// Types
// ============================================

/**
 * States a job passes through
 */
export type JobState =
  | 'Pending'
  | 'Invoking'
  | 'Classifying'
  | 'Retrying'
  | 'Refreshing'
  | 'Succeeded'
  | 'Failed';

/**
 * What a job does after a classified failure
 */
export type NextStep = 'retry' | 'refresh' | 'fail';

/**
 * Options for runJobs
 */
export interface OrchestratorOptions {
  /** Maximum jobs in flight */
  concurrency: number;
  /** Maximum invocations per job, including the first */
  maxAttempts: number;
  /** Wait before each retry (base delay for exponential backoff) */
  retryDelayMs: number;
  backoff?: BackoffStrategy;
  /** Cap for exponential backoff */
  maxRetryDelayMs?: number;
  /** Failure classifier (default: classifyProcessResult) */
  classify?: (result: ProcessResult) => FailureKind;
  /** stdout normalizer (default: parsePostOutput) */
  normalize?: (stdout: string, sourceUrl: string) => CanonicalRecord;
  logger?: LogSink;
  /** Called once per finished job, in completion order */
  onResult?: (result: FetchResult, index: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

// ============================================
// Policy
// ============================================

/**
 * Decide what follows a classified failure.
 *
 * AuthExpired and ToolMissing fail immediately. Otherwise a job retries
 * while attempts remain; NotFoundOrStale refreshes query IDs first, once
 * per job.
 *
 * @param kind - Classification of the latest attempt
 * @param attempts - Invocations consumed so far
 * @param maxAttempts - Invocation budget
 * @param refreshed - Whether this job already ran a refresh
 */
export function decideNextStep(
  kind: FailureKind,
  attempts: number,
  maxAttempts: number,
  refreshed: boolean = false
): NextStep {
  if (!isRetryableKind(kind) || attempts >= maxAttempts) {
    return 'fail';
  }
  if (kind === 'NotFoundOrStale' && !refreshed) {
    return 'refresh';
  }
  return 'retry';
}

// ============================================
// Single Job
// ============================================

interface AttemptFailure {
  kind: FailureKind;
  message: string;
}

type AttemptResult = { success: true; record: CanonicalRecord } | ({ success: false } & AttemptFailure);

/**
 * Run one job's state machine to completion
 */
async function runJob(
  input: FetchInput,
  client: PostFetcher,
  options: OrchestratorOptions
): Promise<FetchOutcome> {
  const logger = options.logger ?? consoleLogSink;
  const classify = options.classify ?? classifyProcessResult;
  const normalize = options.normalize ?? parsePostOutput;
  const sleep = options.sleep ?? defaultSleep;
  const backoff = options.backoff ?? 'fixed';
  const maxRetryDelayMs = options.maxRetryDelayMs ?? MAX_RETRY_DELAY_MS;
  const maxAttempts = Math.max(1, options.maxAttempts);

  let state: JobState = 'Pending';
  let attempts = 0;
  let refreshed = false;

  const transition = (next: JobState): void => {
    logger.verbose(`[${input.url}] ${state} -> ${next}`);
    state = next;
  };

  /**
   * Invoking + Classifying for a single attempt
   */
  const attempt = async (): Promise<AttemptResult> => {
    transition('Invoking');
    attempts++;

    let result: ProcessResult;
    try {
      result = await client.readPost(input);
    } catch (error) {
      // A client that rejects instead of resolving a ProcessResult
      const message = error instanceof Error ? error.message : String(error);
      transition('Classifying');
      return { success: false, kind: 'Unclassified', message };
    }

    if (result.status === 'exited' && result.exitCode === 0) {
      try {
        return { success: true, record: normalize(result.stdout, input.url) };
      } catch (error) {
        transition('Classifying');
        const message = error instanceof Error ? error.message : String(error);
        return { success: false, kind: classify(result), message };
      }
    }

    transition('Classifying');
    const kind = classify(result);
    return { success: false, kind, message: describeFailure(kind, result.stderr.trim()) };
  };

  for (;;) {
    const outcome = await attempt();

    if (outcome.success) {
      transition('Succeeded');
      return { success: true, record: outcome.record, attempts };
    }

    const step = decideNextStep(outcome.kind, attempts, maxAttempts, refreshed);

    if (step === 'fail') {
      transition('Failed');
      logger.verbose(`[${input.url}] ${outcome.kind} after ${attempts} attempt(s): ${outcome.message}`);
      return { success: false, kind: outcome.kind, message: outcome.message, attempts };
    }

    if (step === 'refresh') {
      transition('Refreshing');
      refreshed = true;
      try {
        await client.refreshQueryIds();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Query ID refresh failed: ${message}`);
      }
    }

    transition('Retrying');
    const delay = retryDelayFor(backoff, attempts, options.retryDelayMs, maxRetryDelayMs);

    if (outcome.kind === 'RateLimited') {
      logger.warn(
        `Rate limited on ${input.url}. Retrying in ${formatDuration(delay)}... ` +
          `(attempt ${attempts}/${maxAttempts})`
      );
    } else {
      logger.verbose(
        `[${input.url}] ${outcome.kind}: retrying in ${formatDuration(delay)} (attempt ${attempts}/${maxAttempts})`
      );
    }

    await sleep(delay);
  }
}

// ============================================
// Batch
// ============================================

/**
 * Run every input through its job state machine with bounded concurrency.
 *
 * @param inputs - Fetch inputs
 * @param client - Post fetcher (BirdClient or a stand-in)
 * @param options - Pool size, retry policy and injectable collaborators
 * @returns One result per input, in input order
 */
export async function runJobs(
  inputs: readonly FetchInput[],
  client: PostFetcher,
  options: OrchestratorOptions
): Promise<FetchResult[]> {
  return processWithConcurrency(
    inputs,
    async (input, index) => {
      const outcome = await runJob(input, client, options);
      const result = createFetchResult(input, outcome);
      options.onResult?.(result, index);
      return result;
    },
    options.concurrency
  );
}
