/**
 * Bird Client
 *
 * Thin wrapper over the bird executable. Each method maps to one bird
 * command; credentials and proxy travel through the child environment.
 *
 * Command pattern: bird read <url> --json
 */

import type { BirdCredentials } from '../config.js';
import type { CanonicalRecord, FetchInput } from '../schemas/index.js';
import { FETCH_TIMEOUT_MS, REFRESH_TIMEOUT_MS, VERSION_TIMEOUT_MS, WHOAMI_TIMEOUT_MS } from '../types/index.js';
import { consoleLogSink, type LogSink } from '../utils/logger.js';
import { parsePostOutput } from '../processing/normalize.js';
import { detectBird } from './cli-detector.js';
import { classifyProcessResult, describeFailure } from './classifier.js';
import { buildBirdEnvironment, invokeProcess } from './process-invoker.js';
import {
  BirdAuthError,
  BirdError,
  BirdNotFoundError,
  BirdRateLimitError,
  type ProcessResult,
} from './types.js';

// ============================================
// Types
// ============================================

/**
 * Options for constructing a BirdClient
 */
export interface BirdClientOptions {
  credentials?: BirdCredentials;
  /** Client-wide proxy; a FetchInput's proxyUrl replaces it for that input */
  proxyUrl?: string;
  timeoutMs?: number;
  refreshTimeoutMs?: number;
  logger?: LogSink;
}

/**
 * The two operations the job orchestrator needs from a client
 */
export interface PostFetcher {
  readPost(input: FetchInput): Promise<ProcessResult>;
  refreshQueryIds(): Promise<void>;
}

// ============================================
// Client
// ============================================

/**
 * bird wrapper. Construction fails fast with BirdNotFoundError when the
 * executable cannot be located.
 */
export class BirdClient implements PostFetcher {
  readonly birdPath: string;
  private readonly credentials: BirdCredentials;
  private readonly proxyUrl?: string;
  private readonly timeoutMs: number;
  private readonly refreshTimeoutMs: number;
  private readonly logger: LogSink;

  constructor(options: BirdClientOptions = {}) {
    const detection = detectBird();
    if (!detection.available || !detection.path) {
      throw new BirdNotFoundError();
    }

    this.birdPath = detection.path;
    this.credentials = options.credentials ?? {};
    this.proxyUrl = options.proxyUrl;
    this.timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
    this.refreshTimeoutMs = options.refreshTimeoutMs ?? REFRESH_TIMEOUT_MS;
    this.logger = options.logger ?? consoleLogSink;
  }

  private env(proxyUrl?: string): Record<string, string | undefined> {
    return buildBirdEnvironment(this.credentials, proxyUrl ?? this.proxyUrl);
  }

  /**
   * Run `bird read <url> --json` once. Never rejects; the caller
   * classifies the result.
   */
  async readPost(input: FetchInput): Promise<ProcessResult> {
    this.logger.verbose(`bird read ${input.url} --json`);

    const result = await invokeProcess(this.birdPath, ['read', input.url, '--json'], {
      env: this.env(input.proxyUrl),
      timeoutMs: this.timeoutMs,
    });

    if (result.status !== 'exited' || result.exitCode !== 0) {
      this.logger.verbose(
        `bird read failed (${result.status}, exit ${result.exitCode}): ${result.stderr.trim()}`
      );
    }

    return result;
  }

  /**
   * Force refresh of X's rotating GraphQL query IDs.
   * Best-effort: failures are logged, never thrown.
   */
  async refreshQueryIds(): Promise<void> {
    this.logger.info('Refreshing bird query IDs...');

    const result = await invokeProcess(this.birdPath, ['query-ids', '--fresh'], {
      env: this.env(),
      timeoutMs: this.refreshTimeoutMs,
    });

    if (result.status === 'timeout') {
      this.logger.warn('Query ID refresh timed out');
    } else if (result.status === 'spawn-error' || result.exitCode !== 0) {
      this.logger.warn(`Query ID refresh failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
    }
  }

  /**
   * bird version string, or 'unknown' when bird cannot report one
   */
  async getVersion(): Promise<string> {
    const result = await invokeProcess(this.birdPath, ['--version'], {
      timeoutMs: VERSION_TIMEOUT_MS,
    });

    if (result.status !== 'exited' || result.exitCode !== 0) {
      return 'unknown';
    }
    return result.stdout.trim() || 'unknown';
  }

  /**
   * Run `bird whoami` and return the raw result
   */
  async whoami(): Promise<ProcessResult> {
    return invokeProcess(this.birdPath, ['whoami'], {
      env: this.env(),
      timeoutMs: WHOAMI_TIMEOUT_MS,
    });
  }

  /**
   * Fetch and normalize one post with no retry.
   *
   * @throws BirdAuthError, BirdRateLimitError, MalformedOutputError or BirdError
   */
  async readPostRecord(url: string): Promise<CanonicalRecord> {
    const result = await this.readPost({ url });

    if (result.status === 'exited' && result.exitCode === 0) {
      return parsePostOutput(result.stdout, url);
    }

    const stderr = result.stderr.trim();
    const kind = classifyProcessResult(result);
    const message = describeFailure(kind, stderr, this.timeoutMs);

    switch (kind) {
      case 'ToolMissing':
        throw new BirdNotFoundError();
      case 'AuthExpired':
        throw new BirdAuthError(message, stderr, result.exitCode);
      case 'RateLimited':
        throw new BirdRateLimitError(message, stderr, result.exitCode);
      default:
        throw new BirdError(message, kind, stderr, result.exitCode);
    }
  }

  /**
   * Fetch the raw JSON bird returns, without normalization
   */
  async readPostRaw(url: string): Promise<unknown> {
    const result = await this.readPost({ url });

    if (result.status !== 'exited' || result.exitCode !== 0) {
      const kind = classifyProcessResult(result);
      const stderr = result.stderr.trim();
      throw new BirdError(describeFailure(kind, stderr, this.timeoutMs), kind, stderr, result.exitCode);
    }

    try {
      const parsed: unknown = JSON.parse(result.stdout);
      return parsed;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new BirdError(describeFailure('MalformedOutput', detail), 'MalformedOutput');
    }
  }
}
