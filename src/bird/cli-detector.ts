/**
 * Bird Executable Detection
 *
 * Locates the bird executable. Uses BIRD_CLI_PATH for a custom path,
 * falls back to PATH lookup.
 *
 * Results are cached for the session duration.
 */

import { execSync } from 'child_process';
import { existsSync } from 'fs';
import type { BirdDetectionResult } from './types.js';
import { BIRD_COMMAND, BIRD_PATH_ENV_VAR } from './types.js';
import { logVerbose, logWarning } from '../utils/logger.js';

// ============================================
// Detection Cache
// ============================================

let detectionCache: BirdDetectionResult | null = null;

// ============================================
// Internal Helper Functions
// ============================================

/**
 * Find bird executable path.
 * 1. Check BIRD_CLI_PATH for a custom path
 * 2. Fall back to `which` for PATH lookup
 *
 * @returns Absolute path to bird or null if not found
 */
function findBirdPath(): string | null {
  const envPath = process.env[BIRD_PATH_ENV_VAR];

  if (envPath && existsSync(envPath)) {
    logVerbose(`Found bird at custom path: ${envPath}`);
    return envPath;
  }

  if (envPath && !existsSync(envPath)) {
    logWarning(`${BIRD_PATH_ENV_VAR} set to '${envPath}' but file does not exist`);
  }

  try {
    const result = execSync(`which ${BIRD_COMMAND}`, {
      encoding: 'utf-8',
      timeout: 5000,
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();

    if (result && existsSync(result)) {
      logVerbose(`Found bird in PATH: ${result}`);
      return result;
    }
  } catch {
    // which exits nonzero when bird is not on PATH
  }

  return null;
}

// ============================================
// Public Detection Functions
// ============================================

/**
 * Detect whether bird is available.
 * Results are cached for session duration.
 */
export function detectBird(): BirdDetectionResult {
  if (detectionCache) {
    return detectionCache;
  }

  const path = findBirdPath();

  const result: BirdDetectionResult = path
    ? { available: true, path }
    : { available: false, path: null, error: `CLI '${BIRD_COMMAND}' not found` };

  detectionCache = result;
  return result;
}

/**
 * Clear the detection cache.
 * Useful for testing or when environment changes.
 */
export function clearDetectionCache(): void {
  detectionCache = null;
}
