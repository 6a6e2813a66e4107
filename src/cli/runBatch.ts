/**
 * Batch Execution
 *
 * The scrape command: resolve configuration, run the job orchestrator
 * over every URL, write one output file and pick the exit code.
 *
 * Per-URL failures never abort the batch; they are recorded in the output.
 */

import { buildConfig, type FetchConfig } from '../config.js';
import { BirdClient, type BirdClientOptions, type PostFetcher } from '../bird/client.js';
import { runJobs, type OrchestratorOptions } from '../orchestrator/jobOrchestrator.js';
import {
  buildBatchFile,
  createMissingUrlResult,
  summarizeBatch,
  toSerializableResult,
  type FetchResult,
} from '../orchestrator/result.js';
import { formatBatchMarkdown, formatSamplePost } from '../output/markdown.js';
import { normalizeXUrl } from '../processing/urls.js';
import { BatchFileSchema, type FetchInput } from '../schemas/index.js';
import {
  generateBatchOutputPath,
  validateOutputDir,
  writeJSON,
  writeMarkdown,
} from '../utils/fileWriter.js';
import {
  logBatchResult,
  logConfig,
  logError,
  logPanel,
  logProgress,
  logStage,
  logVerbose,
  logWarning,
  setVerbose,
} from '../utils/logger.js';
import { getBatchExitCode, EXIT_CODES, type ExitCode } from './errorHandler.js';
import { runPreflightChecks, type PreflightResult } from './preflight.js';
import type { ScrapeOptions } from './program.js';

// ============================================
// Types
// ============================================

/**
 * Collaborators replaceable in tests
 */
export interface BatchDependencies {
  preflight?: () => Promise<PreflightResult>;
  createClient?: (options: BirdClientOptions) => PostFetcher;
  sleep?: OrchestratorOptions['sleep'];
  now?: () => Date;
}

/**
 * Outcome of a scrape run
 */
export interface BatchRunResult {
  exitCode: ExitCode;
  results: FetchResult[];
  outputPath?: string;
}

// ============================================
// Helpers
// ============================================

/**
 * Turn raw CLI arguments into fetch inputs, one per argument: trimmed,
 * twitter.com rewritten to x.com. A blank argument yields null.
 */
export function toFetchInputs(urls: readonly string[]): Array<FetchInput | null> {
  return urls.map((url) => {
    const trimmed = url.trim();
    return trimmed.length > 0 ? { url: normalizeXUrl(trimmed) } : null;
  });
}

function isFetchInput(input: FetchInput | null): input is FetchInput {
  return input !== null;
}

/**
 * Rebuild argument order: fetched results fill the non-blank slots,
 * blank slots get a "No URL provided" failure
 */
export function mergeWithBlanks(
  inputs: ReadonlyArray<FetchInput | null>,
  fetched: readonly FetchResult[]
): FetchResult[] {
  let next = 0;
  return inputs.map((input) => {
    if (input === null) {
      return createMissingUrlResult();
    }
    const result = fetched[next++];
    if (!result) {
      throw new Error(`Missing result for ${input.url}`);
    }
    return result;
  });
}

/**
 * Format for the written file: an explicit --format wins, otherwise a
 * .md output file implies markdown
 */
export function resolveOutputFormat(options: ScrapeOptions, config: FetchConfig): FetchConfig['format'] {
  if (options.format === undefined && options.output?.toLowerCase().endsWith('.md')) {
    return 'markdown';
  }
  return config.format;
}

/**
 * Fetch inputs with the configured orchestrator policy
 */
export async function fetchAll(
  inputs: readonly FetchInput[],
  client: PostFetcher,
  config: FetchConfig,
  sleep?: OrchestratorOptions['sleep']
): Promise<FetchResult[]> {
  let completed = 0;

  return runJobs(inputs, client, {
    concurrency: config.concurrency,
    maxAttempts: config.maxAttempts,
    retryDelayMs: config.retryDelayMs,
    backoff: config.backoff,
    sleep,
    onResult: (result) => {
      completed++;
      const status = result.outcome.success ? 'ok' : result.outcome.kind;
      logProgress(completed, inputs.length, `${result.input.url} (${status})`);
      if (!result.outcome.success) {
        logWarning(`${result.input.url}: ${result.outcome.message}`);
      }
    },
  });
}

/**
 * Write results in the configured format, to outputFile when given or
 * to a generated path under the output directory
 *
 * @returns Path written
 */
async function writeResults(
  results: readonly FetchResult[],
  config: FetchConfig,
  now: Date,
  outputFile?: string
): Promise<string> {
  const urls = results.map((result) => result.input.url);
  const extension = config.format === 'markdown' ? 'md' : 'json';
  const outputPath = outputFile ?? generateBatchOutputPath(urls, extension, config.outputDir, now);

  if (config.format === 'markdown') {
    await writeMarkdown(outputPath, formatBatchMarkdown(results.map(toSerializableResult)));
  } else {
    await writeJSON(outputPath, buildBatchFile(results, now), BatchFileSchema);
  }

  return outputPath;
}

// ============================================
// Scrape
// ============================================

/**
 * Run the scrape command end to end.
 *
 * @param urls - Raw URL arguments
 * @param options - Parsed CLI options
 * @param deps - Replaceable collaborators
 */
export async function runBatch(
  urls: readonly string[],
  options: ScrapeOptions,
  deps: BatchDependencies = {}
): Promise<BatchRunResult> {
  const baseConfig = buildConfig(options);
  const config: FetchConfig = { ...baseConfig, format: resolveOutputFormat(options, baseConfig) };
  setVerbose(config.verbose);
  validateOutputDir(config.outputDir);

  const outputFile = options.output?.trim() || undefined;

  if (urls.length === 0) {
    logError('No URLs provided');
    return { exitCode: EXIT_CODES.CONFIG_ERROR, results: [] };
  }

  const slots = toFetchInputs(urls);
  const inputs = slots.filter(isFetchInput);

  const preflight = await (deps.preflight ?? runPreflightChecks)();
  if (!preflight.shouldContinue) {
    return { exitCode: preflight.exitCode, results: [] };
  }

  const createClient = deps.createClient ?? ((clientOptions) => new BirdClient(clientOptions));
  const client = createClient({
    credentials: preflight.credentials,
    proxyUrl: config.proxyUrl,
    timeoutMs: config.timeoutMs,
    refreshTimeoutMs: config.refreshTimeoutMs,
  });

  logConfig({
    urls: inputs.length,
    concurrency: config.concurrency,
    maxAttempts: config.maxAttempts,
    retryDelayMs: config.retryDelayMs,
    backoff: config.backoff,
    timeoutMs: config.timeoutMs,
    proxyUrl: config.proxyUrl,
  });

  logStage('Fetching');
  const startTime = Date.now();
  const fetched = await fetchAll(inputs, client, config, deps.sleep);
  const results = mergeWithBlanks(slots, fetched);
  for (let i = 0; i < slots.length; i++) {
    if (slots[i] === null) {
      logWarning(`Argument ${i + 1}: No URL provided`);
    }
  }

  const summary = summarizeBatch(results);
  for (const [kind, count] of Object.entries(summary.failuresByKind)) {
    logVerbose(`${kind}: ${count}`);
  }

  const now = (deps.now ?? (() => new Date()))();
  const outputPath = await writeResults(results, config, now, outputFile);
  logBatchResult(summary.succeeded, summary.total, Date.now() - startTime, outputPath);

  const [first] = results;
  if (first?.outcome.success) {
    logPanel('Sample Post', formatSamplePost(first.outcome.record));
  }

  return { exitCode: getBatchExitCode(summary.succeeded), results, outputPath };
}
