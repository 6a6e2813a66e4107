/**
 * Commander Program Definition
 *
 * Declares the commands and options. Execution lives in the handlers
 * passed in, so this file only maps argv to typed options.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';
import type { CliOptions } from '../config.js';
import { logWarning } from '../utils/logger.js';
import type { ExitCode } from './errorHandler.js';

// Get package.json version (src/cli in development, dist/src/cli when built)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPaths = [
  join(__dirname, '..', '..', 'package.json'),
  join(__dirname, '..', '..', '..', 'package.json'),
];

const PackageJsonSchema = z.object({ version: z.string() });

export function getPackageVersion(): string {
  for (const path of packageJsonPaths) {
    try {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
      if (parsed.success) {
        return parsed.data.version;
      }
    } catch {
      // not at this location; try the next
    }
  }
  return '0.0.0';
}

// ============================================
// Option Parsing
// ============================================

/**
 * Options accepted by the read command
 */
export interface ReadOptions extends CliOptions {
  raw?: boolean;
}

/**
 * Options accepted by the scrape command
 */
export interface ScrapeOptions extends CliOptions {
  /** Explicit output file; replaces the generated path under outputDir */
  output?: string;
}

const optionalString = z.string().optional();
const optionalBoolean = z.boolean().optional();

/**
 * Shape of program.opts() for scrape and read. Commander hands back
 * strings and booleans; numeric parsing happens in buildConfig.
 */
const CommanderOptionsSchema = z.object({
  output: optionalString,
  outputDir: optionalString,
  format: optionalString,
  parallel: optionalString,
  maxAttempts: optionalString,
  retryWait: optionalString,
  timeout: optionalString,
  backoff: optionalString,
  proxy: optionalString,
  verbose: optionalBoolean,
  raw: optionalBoolean,
});

function stringOrUndef(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function boolOrUndef(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse Commander options for scrape or read.
 * Values of unexpected types are dropped with a warning.
 *
 * @param opts - Raw options from Commander
 */
export function parseCliOptions(opts: Record<string, unknown>): ReadOptions & ScrapeOptions {
  const parsed = CommanderOptionsSchema.safeParse(opts);
  if (parsed.success) {
    return parsed.data;
  }

  logWarning('Unexpected option types detected. Some options may be ignored.');
  return {
    output: stringOrUndef(opts.output),
    outputDir: stringOrUndef(opts.outputDir),
    format: stringOrUndef(opts.format),
    parallel: stringOrUndef(opts.parallel),
    maxAttempts: stringOrUndef(opts.maxAttempts),
    retryWait: stringOrUndef(opts.retryWait),
    timeout: stringOrUndef(opts.timeout),
    backoff: stringOrUndef(opts.backoff),
    proxy: stringOrUndef(opts.proxy),
    verbose: boolOrUndef(opts.verbose),
    raw: boolOrUndef(opts.raw),
  };
}

// ============================================
// Program
// ============================================

/**
 * Command implementations wired into the program
 */
export interface CommandHandlers {
  scrape(urls: string[], options: ScrapeOptions): Promise<ExitCode>;
  read(url: string, options: ReadOptions): Promise<ExitCode>;
  checkAuth(): Promise<ExitCode>;
  cookieHelp(): Promise<ExitCode>;
  setCookies(authToken: string, ct0: string): Promise<ExitCode>;
  version(): Promise<ExitCode>;
}

/**
 * Create and configure the Commander program.
 *
 * @param handlers - Command implementations
 * @param onExitCode - Receives each command's exit code
 * @returns Configured Commander program instance
 */
export function createProgram(handlers: CommandHandlers, onExitCode: (code: ExitCode) => void): Command {
  const program = new Command();

  program
    .name('x-post-fetcher')
    .description('Fetch X posts through the bird CLI with retry and failure classification')
    .version(getPackageVersion(), '-V, --version', 'Show version number');

  program
    .command('scrape')
    .description('Fetch one or more posts and write them to the output directory')
    .argument('<urls...>', 'Post URLs (x.com or twitter.com)')
    .option('-o, --output <file>', 'Output file (a .md extension implies markdown)')
    .option('-d, --output-dir <path>', 'Output directory for generated file names')
    .option('-f, --format <format>', 'Output format: json|markdown|md')
    .option('-p, --parallel <n>', 'Posts fetched concurrently')
    .option('--max-attempts <n>', 'Attempts per post, including the first')
    .option('--retry-wait <seconds>', 'Wait between attempts')
    .option('--timeout <seconds>', 'Per-invocation timeout')
    .option('--backoff <strategy>', 'Retry backoff: fixed|exponential')
    .option('--proxy <url>', 'Proxy URL passed to bird')
    .option('-v, --verbose', 'Show detailed progress')
    .action(async (urls: string[], opts: Record<string, unknown>) => {
      onExitCode(await handlers.scrape(urls, parseCliOptions(opts)));
    });

  program
    .command('read')
    .description('Fetch a single post and print it')
    .argument('<url>', 'Post URL')
    .option('-f, --format <format>', 'Output format: json|markdown|md (default: markdown)')
    .option('-r, --raw', 'Print bird output without normalization')
    .option('--timeout <seconds>', 'Per-invocation timeout')
    .option('--proxy <url>', 'Proxy URL passed to bird')
    .option('-v, --verbose', 'Show detailed progress')
    .action(async (url: string, opts: Record<string, unknown>) => {
      onExitCode(await handlers.read(url, parseCliOptions(opts)));
    });

  program
    .command('check-auth')
    .description('Check bird installation and cookie availability')
    .action(async () => {
      onExitCode(await handlers.checkAuth());
    });

  program
    .command('cookie-help')
    .description('Show how to extract cookies manually')
    .action(async () => {
      onExitCode(await handlers.cookieHelp());
    });

  program
    .command('set-cookies')
    .description('Save auth_token and ct0 cookies to the config file')
    .argument('<authToken>', 'auth_token cookie value')
    .argument('<ct0>', 'ct0 cookie value')
    .action(async (authToken: string, ct0: string) => {
      onExitCode(await handlers.setCookies(authToken, ct0));
    });

  program
    .command('version')
    .description('Show fetcher and bird versions')
    .action(async () => {
      onExitCode(await handlers.version());
    });

  program.addHelpText(
    'after',
    `
Examples:
  $ x-post-fetcher scrape https://x.com/user/status/1234567890
  $ x-post-fetcher scrape <url1> <url2> -f markdown -p 3
  $ x-post-fetcher scrape <url1> -o posts.md
  $ x-post-fetcher read https://x.com/user/status/1234567890 --raw
  $ x-post-fetcher check-auth

Notes:
  - Cookies come from AUTH_TOKEN/CT0, then ~/.config/x-post-fetcher/cookies.json,
    then bird's own browser lookup
  - Exit code is 0 when at least one post was fetched
`
  );

  return program;
}
