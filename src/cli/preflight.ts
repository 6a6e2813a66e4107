/**
 * Pre-flight Checks
 *
 * Runs before any job is scheduled: bird must be installed, and cookies
 * are resolved from the best available source.
 */

import type { BirdCredentials } from '../config.js';
import { detectBird } from '../bird/cli-detector.js';
import { BirdClient } from '../bird/client.js';
import { BIRD_INSTALL_HINT } from '../bird/types.js';
import { getBestCookies, toCredentials, type CookieSource } from '../auth/cookies.js';
import { logError, logInfo, logVerbose, logWarning } from '../utils/logger.js';
import { EXIT_CODES, type ExitCode } from './errorHandler.js';

// ============================================
// Types
// ============================================

/**
 * Result of pre-flight checks.
 */
export type PreflightResult =
  | { shouldContinue: true; birdPath: string; credentials: BirdCredentials; cookieSource: CookieSource | null }
  | { shouldContinue: false; exitCode: ExitCode };

// ============================================
// Pre-flight Functions
// ============================================

/**
 * Locate bird and resolve cookies.
 *
 * A missing bird stops the run with TOOL_MISSING. Missing cookies only
 * warn: bird may still authenticate from a browser profile.
 */
export async function runPreflightChecks(): Promise<PreflightResult> {
  const detection = detectBird();

  if (!detection.available || !detection.path) {
    logError('Bird CLI not found.');
    logInfo(BIRD_INSTALL_HINT);
    return { shouldContinue: false, exitCode: EXIT_CODES.TOOL_MISSING };
  }

  const birdPath = detection.path;
  logVerbose(`Using bird at ${birdPath}`);

  // No credentials: whoami exercises bird's own browser cookie lookup
  const bird = new BirdClient();
  const cookies = await getBestCookies({ whoami: () => bird.whoami() });

  if (!cookies) {
    logWarning('No X cookies found. Requests will likely fail with AuthExpired.');
    logInfo('Run `x-post-fetcher cookie-help` for setup instructions.');
  }

  return {
    shouldContinue: true,
    birdPath,
    credentials: toCredentials(cookies),
    cookieSource: cookies?.source ?? null,
  };
}
