import { z } from 'zod';

/**
 * Fetch Config Schema
 *
 * Validates the resolved configuration handed to the client and orchestrator.
 */

export const BackoffStrategySchema = z.enum(['fixed', 'exponential']);
export type BackoffStrategy = z.infer<typeof BackoffStrategySchema>;

export const OutputFormatSchema = z.enum(['json', 'markdown']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const FetchConfigSchema = z.object({
  /** Parallel bird invocations */
  concurrency: z.number().int().positive(),

  /** Process invocations allowed per input (first try included) */
  maxAttempts: z.number().int().positive(),

  /** Wait between attempts in milliseconds */
  retryDelayMs: z.number().int().min(0),

  backoff: BackoffStrategySchema,

  /** Per-invocation timeout in milliseconds */
  timeoutMs: z.number().int().positive(),

  /** Timeout for the query-ID refresh in milliseconds */
  refreshTimeoutMs: z.number().int().positive(),

  proxyUrl: z.string().optional(),

  outputDir: z.string().min(1),

  format: OutputFormatSchema,

  verbose: z.boolean(),
});

export type FetchConfig = z.infer<typeof FetchConfigSchema>;
