/**
 * Process Invoker
 *
 * Runs an external executable with a wall-clock timeout and environment
 * overrides, capturing exit code, stdout and stderr.
 *
 * Every invocation resolves: timeouts and spawn failures come back as
 * synthetic ProcessResults so callers classify them instead of catching.
 */

import { spawn } from 'child_process';
import type { BirdCredentials } from '../config.js';
import { BIRD_ENV_VARS, type InvokeOptions, type ProcessResult } from './types.js';

/**
 * Wait between SIGTERM and SIGKILL on timeout
 */
export const KILL_GRACE_MS = 2_000;

// ============================================
// Environment Handling
// ============================================

/**
 * Build an isolated environment for one invocation.
 *
 * Copies process.env and applies overrides on the copy; the ambient
 * environment is never mutated. Undefined override values are skipped.
 *
 * @param overrides - Variables to set for this invocation only
 * @returns Fresh environment object
 */
export function buildProcessEnvironment(
  overrides: Record<string, string | undefined> = {}
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  // Ensure HOME is set so bird can find its query-ID cache
  if (!env.HOME) {
    env.HOME = process.env.HOME || '~';
  }

  return env;
}

/**
 * Map cookies and proxy to the variables bird reads.
 *
 * A proxy sets HTTPS_PROXY and HTTP_PROXY identically: bird uses one
 * proxy for every request regardless of scheme.
 */
export function buildBirdEnvironment(
  credentials: BirdCredentials,
  proxyUrl?: string
): Record<string, string | undefined> {
  const overrides: Record<string, string | undefined> = {};

  if (credentials.authToken) {
    overrides[BIRD_ENV_VARS.AUTH_TOKEN] = credentials.authToken;
  }
  if (credentials.ct0) {
    overrides[BIRD_ENV_VARS.CT0] = credentials.ct0;
  }
  if (proxyUrl) {
    overrides[BIRD_ENV_VARS.HTTPS_PROXY] = proxyUrl;
    overrides[BIRD_ENV_VARS.HTTP_PROXY] = proxyUrl;
  }

  return overrides;
}

// ============================================
// Execution
// ============================================

/**
 * Run a command to completion or timeout.
 *
 * @param command - Executable path
 * @param args - Arguments
 * @param options - Environment overrides and timeout
 * Output chunks are kept as bytes and decoded once at the end, so a
 * multibyte character split across chunks survives intact.
 *
 * @returns Captured result; never rejects
 */
export function invokeProcess(
  command: string,
  args: string[],
  options: InvokeOptions
): Promise<ProcessResult> {
  const startTime = Date.now();

  return new Promise((resolve) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;
    let closed = false;
    let killTimer: NodeJS.Timeout | undefined;

    const finish = (
      result: Omit<ProcessResult, 'stdout' | 'stderr' | 'durationMs'>,
      stderrFallback = ''
    ) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      const stderr = Buffer.concat(stderrChunks).toString('utf-8');
      resolve({
        ...result,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: stderr || stderrFallback,
        durationMs: Date.now() - startTime,
      });
    };

    const proc = spawn(command, args, {
      env: buildProcessEnvironment(options.env),
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const timeout = setTimeout(() => {
      proc.kill('SIGTERM');
      // Escalate if the child ignores SIGTERM
      killTimer = setTimeout(() => {
        if (!closed) {
          proc.kill('SIGKILL');
        }
      }, KILL_GRACE_MS);
      finish({ status: 'timeout', exitCode: -1 });
    }, options.timeoutMs);

    proc.stdout.on('data', (data: Buffer) => {
      stdoutChunks.push(data);
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderrChunks.push(data);
    });

    proc.on('close', (code: number | null) => {
      closed = true;
      clearTimeout(killTimer);
      finish({ status: 'exited', exitCode: code ?? -1 });
    });

    proc.on('error', (err: NodeJS.ErrnoException) => {
      finish({ status: 'spawn-error', exitCode: -1, errorCode: err.code }, err.message);
    });
  });
}
