/**
 * File Writer
 *
 * Handles output files with optional schema validation and the dated
 * directory layout for fetched posts.
 *
 * SECURITY: Includes path traversal protection to prevent writing outside cwd.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, dirname, resolve, relative, isAbsolute } from 'node:path';
import type { z } from 'zod';
import { parseXUrl } from '../processing/urls.js';
import { logVerbose } from './logger.js';

// ============================================
// Path Security
// ============================================

/**
 * Validate that an output directory path does not escape the working directory.
 *
 * Allowed: relative paths within cwd ('./output', 'output/subdir') and
 * absolute paths that resolve inside cwd.
 * Rejected: '../outside', '/tmp/elsewhere' and the like.
 *
 * @param userPath - The path provided by the user
 * @returns The validated path (unchanged if valid)
 * @throws Error if path traversal is detected
 */
export function validateOutputDir(userPath: string): string {
  const cwd = process.cwd();
  const absolutePath = resolve(cwd, userPath);
  const relativeToCwd = relative(cwd, absolutePath);

  if (relativeToCwd.startsWith('..') || isAbsolute(relativeToCwd)) {
    throw new Error(
      `Invalid output directory: path traversal detected. ` +
        `Path must be within the current working directory. ` +
        `Received: "${userPath}"`
    );
  }

  return userPath;
}

// ============================================
// Output Paths
// ============================================

export type OutputExtension = 'json' | 'md';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYY/MM/DD for a date, in local time
 */
function datePath(date: Date): string {
  return join(String(date.getFullYear()), pad(date.getMonth() + 1), pad(date.getDate()));
}

/**
 * Path for a single post: <base>/YYYY/MM/DD/<author>/<id>.<ext>
 *
 * Author and ID come from the URL; unparseable URLs fall back to
 * 'unknown' and 'tweet'.
 *
 * @param url - Post URL
 * @param extension - File extension
 * @param baseDir - Base output directory
 * @param date - Date for the directory (default: now)
 */
export function generateOutputPath(
  url: string,
  extension: OutputExtension,
  baseDir: string,
  date: Date = new Date()
): string {
  const parsed = parseXUrl(url);
  const author = parsed.username ?? 'unknown';
  const postId = parsed.tweetId ?? 'tweet';

  return join(baseDir, datePath(date), author, `${postId}.${extension}`);
}

/**
 * Path for a batch.
 *
 * One URL: same as generateOutputPath.
 * Several: <base>/YYYY/MM/DD/batch_HHMMSS.<ext>
 */
export function generateBatchOutputPath(
  urls: readonly string[],
  extension: OutputExtension,
  baseDir: string,
  now: Date = new Date()
): string {
  if (urls.length === 1) {
    return generateOutputPath(urls[0], extension, baseDir, now);
  }

  const timestamp = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return join(baseDir, datePath(now), `batch_${timestamp}.${extension}`);
}

/**
 * Ensure parent directory exists for a file path
 */
async function ensureParentDir(filePath: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
}

// ============================================
// Writing
// ============================================

/**
 * Write JSON data to file with optional schema validation.
 *
 * @param filePath - Full path to output file
 * @param data - Data to write
 * @param schema - Optional Zod schema to validate before writing
 * @throws Error if validation fails or write fails
 */
export async function writeJSON<T>(
  filePath: string,
  data: T,
  schema?: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<void> {
  if (schema) {
    const result = schema.safeParse(data);
    if (!result.success) {
      const errors = result.error.issues
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join('; ');
      throw new Error(`Validation failed before writing ${filePath}: ${errors}`);
    }
  }

  await ensureParentDir(filePath);

  const content = JSON.stringify(data, null, 2);
  await writeFile(filePath, content, 'utf-8');

  logVerbose(`Wrote JSON: ${filePath} (${content.length} bytes)`);
}

/**
 * Write markdown content to file.
 */
export async function writeMarkdown(filePath: string, content: string): Promise<void> {
  await ensureParentDir(filePath);
  await writeFile(filePath, content, 'utf-8');

  logVerbose(`Wrote Markdown: ${filePath} (${content.length} bytes)`);
}
