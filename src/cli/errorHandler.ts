/**
 * CLI Error Handler
 *
 * Maps errors and batch outcomes to exit codes and wraps command
 * execution so failures are logged once, sanitized.
 */

import { BirdError } from '../bird/types.js';
import { sanitize, logError } from '../utils/logger.js';

// ============================================
// Exit Codes
// ============================================

/**
 * Exit codes for CLI.
 *
 * 0: Success - at least one input fetched
 * 1: Batch error - no input fetched, or a runtime failure
 * 2: Configuration error - invalid options or environment
 * 3: Tool missing - bird is not installed
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  BATCH_ERROR: 1,
  CONFIG_ERROR: 2,
  TOOL_MISSING: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================
// Error Classification
// ============================================

/**
 * Patterns that indicate a configuration error.
 */
const CONFIG_ERROR_PATTERNS = [
  /invalid configuration/i,
  /invalid.*option/i,
  /invalid output directory/i,
  /environment.*variable/i,
];

/**
 * Determine if an error is a configuration error.
 */
export function isConfigError(error: Error): boolean {
  return CONFIG_ERROR_PATTERNS.some((pattern) => pattern.test(error.message));
}

/**
 * Get the appropriate exit code for an error.
 *
 * @param error - The error that occurred
 * @returns TOOL_MISSING for a missing bird, CONFIG_ERROR for setup
 *   problems, BATCH_ERROR otherwise
 */
export function getExitCode(error: Error): ExitCode {
  if (error instanceof BirdError && error.kind === 'ToolMissing') {
    return EXIT_CODES.TOOL_MISSING;
  }
  return isConfigError(error) ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.BATCH_ERROR;
}

/**
 * Exit code for a finished batch: success when anything was fetched
 */
export function getBatchExitCode(succeeded: number): ExitCode {
  return succeeded > 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.BATCH_ERROR;
}

// ============================================
// Execution Wrapper
// ============================================

/**
 * Result type for withErrorHandling.
 */
export type ErrorHandlingResult<T> =
  | { success: true; result: T }
  | { success: false; exitCode: ExitCode };

/**
 * Run a command body, logging any thrown error (sanitized) and mapping
 * it to an exit code.
 *
 * @example
 * ```typescript
 * const result = await withErrorHandling(() => runBatch(urls, config));
 * if (!result.success) {
 *   process.exit(result.exitCode);
 * }
 * ```
 */
export async function withErrorHandling<T>(fn: () => Promise<T>): Promise<ErrorHandlingResult<T>> {
  try {
    const result = await fn();
    return { success: true, result };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logError(sanitize(err.message));
    return { success: false, exitCode: getExitCode(err) };
  }
}
