#!/usr/bin/env node
/**
 * x-post-fetcher CLI
 *
 * Main entry point for the CLI application.
 *
 * Usage:
 *   npx tsx src/index.ts scrape <urls...> [options]
 */

import { CommanderError } from 'commander';
import {
  createProgram,
  runBatch,
  readCommand,
  checkAuthCommand,
  cookieHelpCommand,
  setCookiesCommand,
  versionCommand,
  withErrorHandling,
  EXIT_CODES,
  type CommandHandlers,
  type ExitCode,
} from './cli/index.js';
import { sanitize } from './utils/logger.js';

// ============================================
// Handlers
// ============================================

/**
 * Run a command body; thrown errors are logged and mapped to exit codes
 */
async function handled(fn: () => Promise<ExitCode>): Promise<ExitCode> {
  const result = await withErrorHandling(fn);
  return result.success ? result.result : result.exitCode;
}

const handlers: CommandHandlers = {
  scrape: (urls, options) => handled(async () => (await runBatch(urls, options)).exitCode),
  read: (url, options) => handled(() => readCommand(url, options)),
  checkAuth: () => handled(() => checkAuthCommand()),
  cookieHelp: () => handled(() => cookieHelpCommand()),
  setCookies: (authToken, ct0) => handled(() => setCookiesCommand(authToken, ct0)),
  version: () => handled(() => versionCommand()),
};

// ============================================
// Main Entry Point
// ============================================

/**
 * Parse argv, run the selected command and exit with its code.
 */
async function main(): Promise<void> {
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;

  const program = createProgram(handlers, (code) => {
    exitCode = code;
  });

  // Throw instead of calling process.exit so parse errors map to CONFIG_ERROR
  program.exitOverride();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander already printed help, the version or the parse error
      process.exit(error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CONFIG_ERROR);
    }
    throw error;
  }

  process.exit(exitCode);
}

// ============================================
// Execution
// ============================================

main().catch((error: unknown) => {
  // Only the sanitized message: stack traces may carry cookie values
  const errorMessage = error instanceof Error ? error.message : 'An unexpected error occurred';
  console.error('Unexpected error:', sanitize(errorMessage));
  process.exit(EXIT_CODES.BATCH_ERROR);
});
