/**
 * Bird CLI Integration Types
 *
 * Shared types, constants and error classes for the bird subprocess layer.
 * bird owns X's GraphQL protocol (cookie auth, rotating query IDs, wire-level
 * backoff); this module only describes how we talk to the executable.
 */

import type { FailureKind } from '../schemas/index.js';

// ============================================
// Executable
// ============================================

/**
 * Executable name looked up on PATH
 */
export const BIRD_COMMAND = 'bird';

/**
 * Environment variable for a custom bird path (overrides PATH lookup)
 */
export const BIRD_PATH_ENV_VAR = 'BIRD_CLI_PATH';

/**
 * Install hint shown whenever bird cannot be located
 */
export const BIRD_INSTALL_HINT =
  'Install it with: bun install -g @nicepkg/bird\nOr see: https://github.com/steipete/bird';

/**
 * Environment variables bird reads for cookies and proxying.
 * bird does not distinguish transport scheme, so both proxy variables
 * always receive the same value.
 */
export const BIRD_ENV_VARS = {
  AUTH_TOKEN: 'AUTH_TOKEN',
  CT0: 'CT0',
  HTTPS_PROXY: 'HTTPS_PROXY',
  HTTP_PROXY: 'HTTP_PROXY',
} as const;

// ============================================
// Detection Types
// ============================================

/**
 * Result of bird detection.
 */
export interface BirdDetectionResult {
  /** Whether bird is available on the system */
  available: boolean;
  /** Absolute path to the executable, or null if not found */
  path: string | null;
  /** Error message if detection failed */
  error?: string;
}

// ============================================
// Process Types
// ============================================

/**
 * How a subprocess invocation ended.
 * - exited: the process ran and exited (any code)
 * - timeout: killed after the wall-clock limit
 * - spawn-error: the process never started
 */
export type ProcessStatus = 'exited' | 'timeout' | 'spawn-error';

/**
 * Captured result of one subprocess invocation.
 * Never thrown: timeouts and spawn failures are reported here.
 */
export interface ProcessResult {
  status: ProcessStatus;
  /** Exit code; -1 when the process was killed or never started */
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** Node error code for spawn failures (e.g. ENOENT) */
  errorCode?: string;
}

/**
 * Options for a single invocation
 */
export interface InvokeOptions {
  /** Overrides merged over a copy of process.env; undefined values are skipped */
  env?: Record<string, string | undefined>;
  /** Wall-clock limit in milliseconds */
  timeoutMs: number;
}

// ============================================
// Error Classes
// ============================================

/**
 * Base error class for bird failures.
 * Carries the classified failure kind plus bird's diagnostics.
 */
export class BirdError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly stderr: string = '',
    public readonly exitCode?: number
  ) {
    super(message);
    this.name = 'BirdError';
  }
}

/**
 * Error thrown when bird is not installed or not in PATH.
 */
export class BirdNotFoundError extends BirdError {
  constructor() {
    super(`Bird CLI not found. ${BIRD_INSTALL_HINT}`, 'ToolMissing');
    this.name = 'BirdNotFoundError';
  }
}

/**
 * Error thrown when authentication fails - cookies may be expired.
 */
export class BirdAuthError extends BirdError {
  constructor(message: string, stderr: string, exitCode?: number) {
    super(message, 'AuthExpired', stderr, exitCode);
    this.name = 'BirdAuthError';
  }
}

/**
 * Error thrown when X rate limits the session.
 */
export class BirdRateLimitError extends BirdError {
  constructor(message: string, stderr: string, exitCode?: number) {
    super(message, 'RateLimited', stderr, exitCode);
    this.name = 'BirdRateLimitError';
  }
}

/**
 * Error thrown when bird's stdout is not a usable post object.
 */
export class MalformedOutputError extends BirdError {
  constructor(message: string) {
    super(message, 'MalformedOutput');
    this.name = 'MalformedOutputError';
  }
}
