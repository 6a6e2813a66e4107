/**
 * Configuration & Environment Variables
 *
 * Handles environment loading, credential lookup, and merging CLI options
 * over environment values and defaults.
 */

import 'dotenv/config';
import type { BackoffStrategy, FetchConfig, OutputFormat } from './types/index.js';
import { DEFAULT_CONFIG } from './types/index.js';
import { FetchConfigSchema, formatZodError } from './schemas/index.js';
import { logWarning } from './utils/logger.js';

// ============================================
// Environment Variable Names
// ============================================

/**
 * Environment variable names read by the fetcher
 */
export const ENV_KEYS = {
  AUTH_TOKEN: 'AUTH_TOKEN',
  CT0: 'CT0',
  PROXY_URL: 'PROXY_URL',
  PARALLEL_WORKERS: 'PARALLEL_WORKERS',
  MAX_RETRY: 'MAX_RETRY',
  RETRY_WAIT: 'RETRY_WAIT',
  FETCH_TIMEOUT: 'FETCH_TIMEOUT',
  OUTPUT_DIR: 'OUTPUT_DIR',
  BIRD_CLI_PATH: 'BIRD_CLI_PATH',
} as const;

export type EnvKey = keyof typeof ENV_KEYS;

// ============================================
// Environment Access (Sanitized)
// ============================================

/**
 * Get a trimmed, non-empty value from the environment.
 * SECURITY: Cookie values are retrieved but never logged.
 *
 * @param key - The environment variable name
 * @returns The value or undefined when unset or blank
 */
export function getEnvValue(key: EnvKey): string | undefined {
  const value = process.env[ENV_KEYS[key]];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Session cookies passed to bird
 */
export interface BirdCredentials {
  authToken?: string;
  ct0?: string;
}

/**
 * Read session cookies from the environment (.env included).
 */
export function getEnvCredentials(): BirdCredentials {
  return {
    authToken: getEnvValue('AUTH_TOKEN'),
    ct0: getEnvValue('CT0'),
  };
}

// ============================================
// Value Parsing
// ============================================

/**
 * Parse a positive integer, warning and falling back on bad input.
 *
 * Floating point input is truncated ("2.9" -> 2), matching parseInt.
 *
 * @param value - Raw string from CLI or environment
 * @param label - Option name used in the warning
 * @param fallback - Value to use when input is invalid
 */
export function parsePositiveInt(value: string, label: string, fallback: number): number {
  const parsed = parseInt(value.trim(), 10);
  if (isNaN(parsed) || parsed < 1) {
    logWarning(`Invalid ${label} value '${value}'. Using default: ${fallback}`);
    return fallback;
  }
  return parsed;
}

/**
 * Parse a non-negative number of seconds into milliseconds.
 *
 * @param value - Seconds as string (decimals allowed)
 * @param label - Option name used in the warning
 * @param fallbackMs - Value to use when input is invalid
 */
export function parseSecondsToMs(value: string, label: string, fallbackMs: number): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(parsed) || parsed < 0) {
    logWarning(`Invalid ${label} value '${value}'. Using default: ${fallbackMs / 1000}s`);
    return fallbackMs;
  }
  return Math.round(parsed * 1000);
}

/**
 * Parse output format. 'md' is an alias for 'markdown'.
 */
export function parseOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined) return DEFAULT_CONFIG.format;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'json') return 'json';
  if (normalized === 'markdown' || normalized === 'md') return 'markdown';
  logWarning(
    `Invalid format '${value}' ignored. Using '${DEFAULT_CONFIG.format}'. Valid options: json, markdown, md`
  );
  return DEFAULT_CONFIG.format;
}

/**
 * Parse retry backoff strategy.
 */
export function parseBackoff(value: string | undefined): BackoffStrategy {
  if (value === undefined) return DEFAULT_CONFIG.backoff;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'fixed' || normalized === 'exponential') {
    return normalized;
  }
  logWarning(
    `Invalid backoff '${value}' ignored. Using '${DEFAULT_CONFIG.backoff}'. Valid options: fixed, exponential`
  );
  return DEFAULT_CONFIG.backoff;
}

// ============================================
// Configuration Building
// ============================================

/**
 * CLI options that can be parsed from command line
 */
export interface CliOptions {
  parallel?: string;
  maxAttempts?: string;
  retryWait?: string;
  timeout?: string;
  backoff?: string;
  proxy?: string;
  outputDir?: string;
  format?: string;
  verbose?: boolean;
}

/**
 * Build a complete FetchConfig from CLI options.
 *
 * Merging order (later overrides earlier):
 * 1. DEFAULT_CONFIG
 * 2. Environment variables (.env included)
 * 3. Explicit CLI options
 *
 * @param options - Parsed CLI options
 * @returns Complete, validated FetchConfig
 * @throws Error if the merged configuration is invalid
 */
export function buildConfig(options: CliOptions = {}): FetchConfig {
  const config: FetchConfig = { ...DEFAULT_CONFIG };

  // Environment layer
  const envParallel = getEnvValue('PARALLEL_WORKERS');
  if (envParallel !== undefined) {
    config.concurrency = parsePositiveInt(envParallel, ENV_KEYS.PARALLEL_WORKERS, config.concurrency);
  }

  const envMaxRetry = getEnvValue('MAX_RETRY');
  if (envMaxRetry !== undefined) {
    config.maxAttempts = parsePositiveInt(envMaxRetry, ENV_KEYS.MAX_RETRY, config.maxAttempts);
  }

  const envRetryWait = getEnvValue('RETRY_WAIT');
  if (envRetryWait !== undefined) {
    config.retryDelayMs = parseSecondsToMs(envRetryWait, ENV_KEYS.RETRY_WAIT, config.retryDelayMs);
  }

  const envTimeout = getEnvValue('FETCH_TIMEOUT');
  if (envTimeout !== undefined) {
    config.timeoutMs = parsePositiveInt(envTimeout, ENV_KEYS.FETCH_TIMEOUT, config.timeoutMs / 1000) * 1000;
  }

  config.proxyUrl = getEnvValue('PROXY_URL');
  config.outputDir = getEnvValue('OUTPUT_DIR') ?? config.outputDir;

  // CLI layer
  if (options.parallel !== undefined) {
    config.concurrency = parsePositiveInt(options.parallel, '--parallel', config.concurrency);
  }

  if (options.maxAttempts !== undefined) {
    config.maxAttempts = parsePositiveInt(options.maxAttempts, '--max-attempts', config.maxAttempts);
  }

  if (options.retryWait !== undefined) {
    config.retryDelayMs = parseSecondsToMs(options.retryWait, '--retry-wait', config.retryDelayMs);
  }

  if (options.timeout !== undefined) {
    config.timeoutMs = parsePositiveInt(options.timeout, '--timeout', config.timeoutMs / 1000) * 1000;
  }

  if (options.backoff !== undefined) {
    config.backoff = parseBackoff(options.backoff);
  }

  if (options.proxy !== undefined && options.proxy.trim().length > 0) {
    config.proxyUrl = options.proxy.trim();
  }

  if (options.outputDir !== undefined) {
    config.outputDir = options.outputDir;
  }

  if (options.format !== undefined) {
    config.format = parseOutputFormat(options.format);
  }

  if (options.verbose !== undefined) {
    config.verbose = options.verbose;
  }

  const result = FetchConfigSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatZodError(result.error)}`);
  }

  return result.data;
}

// ============================================
// Re-exports for convenience
// ============================================

export { DEFAULT_CONFIG } from './types/index.js';
export type { FetchConfig } from './types/index.js';
