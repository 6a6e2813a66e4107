/**
 * Cookie Management
 *
 * Locates X session cookies for bird. Sources, in priority order:
 * 1. AUTH_TOKEN / CT0 environment variables (or .env)
 * 2. Saved cookies file (~/.config/x-post-fetcher/cookies.json)
 * 3. bird's own browser auto-detection, checked with `bird whoami`
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { getEnvCredentials, type BirdCredentials } from '../config.js';
import { tryValidate } from '../schemas/index.js';
import type { ProcessResult } from '../bird/types.js';
import { logVerbose, logWarning } from '../utils/logger.js';

// ============================================
// Types
// ============================================

/**
 * Marker for cookies bird manages itself; never passed to the child env
 */
export const BIRD_MANAGED = '[bird-managed]';

export const SavedCookiesSchema = z.object({
  auth_token: z.string(),
  ct0: z.string(),
});

export type CookieSource = 'env' | 'file' | 'bird';

export interface XCookies {
  authToken: string;
  ct0: string;
  source: CookieSource;
}

export interface CookieLookupOptions {
  /** Cookies file path (default: ~/.config/x-post-fetcher/cookies.json) */
  cookiesFile?: string;
  /** Runs `bird whoami`; omitted when bird is unavailable */
  whoami?: () => Promise<ProcessResult>;
}

/**
 * Default cookies file location
 */
export function defaultCookiesFile(): string {
  return join(homedir(), '.config', 'x-post-fetcher', 'cookies.json');
}

// ============================================
// Saved Cookies
// ============================================

/**
 * Save cookies to the config file
 *
 * @returns Path written
 */
export async function saveCookies(
  authToken: string,
  ct0: string,
  cookiesFile: string = defaultCookiesFile()
): Promise<string> {
  await mkdir(dirname(cookiesFile), { recursive: true });
  const content = JSON.stringify(SavedCookiesSchema.parse({ auth_token: authToken, ct0 }), null, 2);
  await writeFile(cookiesFile, content, { encoding: 'utf-8', mode: 0o600 });

  logVerbose(`Saved cookies to ${cookiesFile}`);
  return cookiesFile;
}

/**
 * Load cookies from the config file.
 * Returns null when the file is missing or unreadable.
 */
export async function loadCookies(cookiesFile: string = defaultCookiesFile()): Promise<XCookies | null> {
  let content: string;
  try {
    content = await readFile(cookiesFile, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    logWarning(`Could not parse cookies file ${cookiesFile}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  const parsed = tryValidate(SavedCookiesSchema, data);
  if (!parsed.success) {
    logWarning(`Cookies file ${cookiesFile} is missing auth_token or ct0`);
    return null;
  }

  return { authToken: parsed.data.auth_token, ct0: parsed.data.ct0, source: 'file' };
}

// ============================================
// Lookup
// ============================================

/**
 * Cookies from AUTH_TOKEN and CT0, when both are set
 */
export function extractCookiesFromEnv(): XCookies | null {
  const { authToken, ct0 } = getEnvCredentials();
  if (authToken && ct0) {
    return { authToken, ct0, source: 'env' };
  }
  return null;
}

/**
 * Check bird's browser cookie auto-detection.
 * bird keeps the raw cookies; a successful whoami yields placeholders.
 */
export async function extractCookiesViaBird(
  whoami: () => Promise<ProcessResult>
): Promise<XCookies | null> {
  const result = await whoami();

  if (result.status === 'exited' && result.exitCode === 0 && result.stdout.trim()) {
    const words = result.stdout.trim().split(/\s+/);
    logVerbose(`bird authenticated as ${words[words.length - 1]}`);
    return { authToken: BIRD_MANAGED, ct0: BIRD_MANAGED, source: 'bird' };
  }

  logWarning(`bird auto-authentication failed: ${result.stderr.trim().slice(0, 200) || result.status}`);
  return null;
}

/**
 * Cookies from the best available source, or null
 */
export async function getBestCookies(options: CookieLookupOptions = {}): Promise<XCookies | null> {
  const fromEnv = extractCookiesFromEnv();
  if (fromEnv) {
    logVerbose('Using cookies from environment');
    return fromEnv;
  }

  const saved = await loadCookies(options.cookiesFile);
  if (saved && saved.authToken && saved.authToken !== BIRD_MANAGED) {
    logVerbose('Using saved cookies');
    return saved;
  }

  if (options.whoami) {
    const fromBird = await extractCookiesViaBird(options.whoami);
    if (fromBird) {
      logVerbose('Using bird-managed cookies');
      return fromBird;
    }
  }

  return null;
}

/**
 * Credentials to hand to bird. bird-managed cookies pass nothing, so bird
 * falls back to its own browser lookup.
 */
export function toCredentials(cookies: XCookies | null): BirdCredentials {
  if (!cookies || cookies.source === 'bird') {
    return {};
  }
  return { authToken: cookies.authToken, ct0: cookies.ct0 };
}

/**
 * Instructions for extracting cookies by hand
 */
export function manualCookieInstructions(): string {
  return `
To extract X cookies manually:

1. Open x.com in your browser and make sure you are logged in
2. Open Developer Tools (F12 or Cmd+Option+I)
3. Go to the "Application" tab (Chrome) or "Storage" tab (Firefox)
4. Under "Cookies", select "x.com"
5. Copy the values of these two cookies:
   - auth_token
   - ct0

6. Set them as environment variables:
   export AUTH_TOKEN=your_auth_token_value
   export CT0=your_ct0_value

   or add them to .env, or save them with:
   x-post-fetcher set-cookies <auth_token> <ct0>

bird can also read cookies from Safari, Chrome or Firefox on its own:
   bird whoami
`;
}
