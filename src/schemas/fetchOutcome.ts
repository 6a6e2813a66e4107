import { z } from 'zod';
import { CanonicalRecordSchema, SCHEMA_VERSION, type CanonicalRecord } from './canonicalRecord.js';

/**
 * Failure kinds derived from bird's exit status and stderr.
 * Closed set: every Failure outcome carries exactly one of these.
 */
export const FailureKindSchema = z.enum([
  'ToolMissing',
  'AuthExpired',
  'RateLimited',
  'NotFoundOrStale',
  'Timeout',
  'MalformedOutput',
  'Unclassified',
]);
export type FailureKind = z.infer<typeof FailureKindSchema>;

/**
 * One fetch request as submitted by the caller
 */
export const FetchInputSchema = z.object({
  /** Target post URL */
  url: z.string().min(1, 'URL cannot be empty'),

  /** Per-input proxy override (replaces the client-wide proxy) */
  proxyUrl: z.string().optional(),
});
export type FetchInput = z.infer<typeof FetchInputSchema>;

/**
 * Outcome of one FetchInput after its retry loop ends.
 * attempts counts process invocations consumed.
 */
export type FetchOutcome =
  | { success: true; record: CanonicalRecord; attempts: number }
  | { success: false; kind: FailureKind; message: string; attempts: number };

/**
 * Serialized form of one result, as written to JSON output files
 */
export const SerializedResultSchema = z.object({
  success: z.boolean(),
  url: z.string(),
  attempts: z.number().int().min(0),
  data: CanonicalRecordSchema.optional(),
  error: z.string().optional(),
  failureKind: FailureKindSchema.optional(),
});
export type SerializedResult = z.infer<typeof SerializedResultSchema>;

/**
 * Batch file written by `scrape --format json`
 */
export const BatchFileSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  runId: z.string().uuid(),
  generatedAt: z.string().datetime(),
  total: z.number().int().min(0),
  succeeded: z.number().int().min(0),
  failed: z.number().int().min(0),
  results: z.array(SerializedResultSchema),
});
export type BatchFile = z.infer<typeof BatchFileSchema>;
