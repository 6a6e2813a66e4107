/**
 * Single-shot Commands
 *
 * read, check-auth, cookie-help, set-cookies and version.
 */

import { buildConfig } from '../config.js';
import { BirdClient, type BirdClientOptions } from '../bird/client.js';
import { BirdNotFoundError } from '../bird/types.js';
import { getBestCookies, manualCookieInstructions, saveCookies } from '../auth/cookies.js';
import { formatResultMarkdown } from '../output/markdown.js';
import { logError, logInfo, logSuccess, logWarning, setVerbose } from '../utils/logger.js';
import { EXIT_CODES, type ExitCode } from './errorHandler.js';
import { toFetchInputs } from './runBatch.js';
import { getPackageVersion, type ReadOptions } from './program.js';
import { runPreflightChecks } from './preflight.js';

/**
 * Where command output goes (stdout by default)
 */
export type Printer = (text: string) => void;

const stdoutPrinter: Printer = (text) => console.log(text);

/**
 * What the read command needs from a client
 */
export type ReadClient = Pick<BirdClient, 'readPostRecord' | 'readPostRaw'>;

// ============================================
// read
// ============================================

/**
 * Fetch one post and print it, markdown unless --format says otherwise.
 * A single invocation with no retry; bird errors propagate to the
 * command's error handler. --raw prints bird's JSON untouched.
 */
export async function readCommand(
  url: string,
  options: ReadOptions,
  print: Printer = stdoutPrinter,
  createClient: (options: BirdClientOptions) => ReadClient = (clientOptions) => new BirdClient(clientOptions)
): Promise<ExitCode> {
  const config = buildConfig({ ...options, format: options.format ?? 'markdown' });
  setVerbose(config.verbose);

  const [input] = toFetchInputs([url]);
  if (!input) {
    logError('No URL provided');
    return EXIT_CODES.CONFIG_ERROR;
  }

  const preflight = await runPreflightChecks();
  if (!preflight.shouldContinue) {
    return preflight.exitCode;
  }

  const client = createClient({
    credentials: preflight.credentials,
    proxyUrl: config.proxyUrl,
    timeoutMs: config.timeoutMs,
    refreshTimeoutMs: config.refreshTimeoutMs,
  });

  if (options.raw) {
    print(JSON.stringify(await client.readPostRaw(input.url), null, 2));
    return EXIT_CODES.SUCCESS;
  }

  const record = await client.readPostRecord(input.url);

  print(
    config.format === 'markdown'
      ? formatResultMarkdown({ success: true, url: input.url, attempts: 1, data: record })
      : JSON.stringify(record, null, 2)
  );
  return EXIT_CODES.SUCCESS;
}

// ============================================
// check-auth
// ============================================

/**
 * Report whether bird is installed and which cookie source is in use
 */
export async function checkAuthCommand(): Promise<ExitCode> {
  const preflight = await runPreflightChecks();
  if (!preflight.shouldContinue) {
    return preflight.exitCode;
  }

  logSuccess(`bird found at ${preflight.birdPath}`);

  if (!preflight.cookieSource) {
    logError('No working cookies found');
    logInfo(manualCookieInstructions());
    return EXIT_CODES.CONFIG_ERROR;
  }

  const labels = {
    env: 'environment (AUTH_TOKEN / CT0)',
    file: 'saved cookies file',
    bird: "bird's browser auto-detection",
  } as const;
  logSuccess(`Cookies from ${labels[preflight.cookieSource]}`);
  return EXIT_CODES.SUCCESS;
}

// ============================================
// cookie-help / set-cookies
// ============================================

export async function cookieHelpCommand(print: Printer = stdoutPrinter): Promise<ExitCode> {
  print(manualCookieInstructions());
  return EXIT_CODES.SUCCESS;
}

/**
 * Save cookies. Warns when AUTH_TOKEN/CT0 would shadow them.
 */
export async function setCookiesCommand(authToken: string, ct0: string): Promise<ExitCode> {
  if (!authToken.trim() || !ct0.trim()) {
    logError('Both auth_token and ct0 are required');
    return EXIT_CODES.CONFIG_ERROR;
  }

  const path = await saveCookies(authToken.trim(), ct0.trim());
  logSuccess(`Cookies saved to ${path}`);

  const cookies = await getBestCookies();
  if (cookies?.source === 'env') {
    logWarning('AUTH_TOKEN/CT0 are set in the environment and take priority over the saved file');
  }

  return EXIT_CODES.SUCCESS;
}

// ============================================
// version
// ============================================

/**
 * Print the fetcher version and, when installed, bird's
 */
export async function versionCommand(print: Printer = stdoutPrinter): Promise<ExitCode> {
  print(`x-post-fetcher ${getPackageVersion()}`);

  try {
    print(`bird ${await new BirdClient().getVersion()}`);
  } catch (error) {
    if (error instanceof BirdNotFoundError) {
      print('bird not installed');
      return EXIT_CODES.TOOL_MISSING;
    }
    throw error;
  }

  return EXIT_CODES.SUCCESS;
}
