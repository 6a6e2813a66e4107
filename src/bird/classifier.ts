/**
 * Failure Classification
 *
 * Maps bird's exit status and stderr text to a FailureKind.
 * stderr is the only diagnostic surface bird exposes, so matching is
 * heuristic; rules are an ordered table and the first match wins.
 */

import type { FailureKind } from '../schemas/index.js';
import type { ProcessResult } from './types.js';
import { BIRD_INSTALL_HINT } from './types.js';

// ============================================
// Rule Table
// ============================================

/**
 * One classification rule over a failed invocation's stderr
 */
export interface ClassificationRule {
  kind: FailureKind;
  matches: (stderr: string) => boolean;
}

/**
 * Ordered stderr rules. Order matters: "401 ... 404" is an auth failure.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    kind: 'AuthExpired',
    matches: (stderr) =>
      stderr.includes('401') ||
      stderr.includes('Unauthorized') ||
      stderr.toLowerCase().includes('auth'),
  },
  {
    kind: 'RateLimited',
    matches: (stderr) => stderr.includes('429') || stderr.toLowerCase().includes('rate'),
  },
  {
    kind: 'NotFoundOrStale',
    matches: (stderr) => stderr.includes('404'),
  },
];

// ============================================
// Classification
// ============================================

/**
 * Classify a failed invocation.
 *
 * A zero exit only reaches classification when its stdout could not be
 * normalized, so it is MalformedOutput whatever stderr says.
 *
 * @param exitCode - Process exit code
 * @param stderr - Captured stderr text
 * @param rules - Rule table (defaults to CLASSIFICATION_RULES)
 */
export function classifyFailure(
  exitCode: number,
  stderr: string,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): FailureKind {
  if (exitCode === 0) {
    return 'MalformedOutput';
  }

  for (const rule of rules) {
    if (rule.matches(stderr)) {
      return rule.kind;
    }
  }

  return 'Unclassified';
}

/**
 * Classify a ProcessResult, including the synthetic timeout and
 * spawn-error results that carry no meaningful exit code.
 */
export function classifyProcessResult(result: ProcessResult): FailureKind {
  if (result.status === 'timeout') {
    return 'Timeout';
  }

  if (result.status === 'spawn-error') {
    return result.errorCode === 'ENOENT' ? 'ToolMissing' : 'Unclassified';
  }

  return classifyFailure(result.exitCode, result.stderr.trim());
}

/**
 * Check whether waiting and retrying can change the outcome.
 * Missing credentials or a missing binary never fix themselves.
 */
export function isRetryableKind(kind: FailureKind): boolean {
  return kind !== 'AuthExpired' && kind !== 'ToolMissing';
}

// ============================================
// Messages
// ============================================

/**
 * Human-readable message for a failure.
 *
 * @param kind - Classified failure kind
 * @param detail - stderr text or parse error message
 * @param timeoutMs - Invocation timeout, used in the Timeout message
 */
export function describeFailure(kind: FailureKind, detail: string, timeoutMs?: number): string {
  switch (kind) {
    case 'ToolMissing':
      return `Bird CLI not found. ${BIRD_INSTALL_HINT}`;
    case 'AuthExpired':
      return 'Authentication failed. Re-extract cookies from your browser.';
    case 'RateLimited':
      return 'Rate limit exceeded. Wait before retrying.';
    case 'NotFoundOrStale':
      return 'Post not found or query IDs outdated. Try: bird query-ids --fresh';
    case 'Timeout':
      return timeoutMs !== undefined
        ? `Bird command timed out after ${Math.round(timeoutMs / 1000)}s`
        : 'Bird command timed out';
    case 'MalformedOutput':
      return `Failed to parse Bird output as JSON: ${detail}`;
    case 'Unclassified':
      return detail ? `Bird CLI failed: ${detail}` : 'Bird CLI failed with no diagnostics';
  }
}
