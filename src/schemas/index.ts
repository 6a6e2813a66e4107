import { z } from 'zod';

// ============================================
// Re-export all schemas and types
// ============================================

// CanonicalRecord - normalized post
export {
  SCHEMA_VERSION,
  MediaTypeSchema,
  MediaItemSchema,
  CanonicalRecordSchema,
  type MediaType,
  type MediaItem,
  type CanonicalRecord,
} from './canonicalRecord.js';

// FetchOutcome - per-input results and the batch file
export {
  FailureKindSchema,
  FetchInputSchema,
  SerializedResultSchema,
  BatchFileSchema,
  type FailureKind,
  type FetchInput,
  type FetchOutcome,
  type SerializedResult,
  type BatchFile,
} from './fetchOutcome.js';

// FetchConfig - resolved run configuration
export {
  BackoffStrategySchema,
  OutputFormatSchema,
  FetchConfigSchema,
  type BackoffStrategy,
  type OutputFormat,
  type FetchConfig,
} from './fetchConfig.js';

// ============================================
// Validation Result Types
// ============================================

/**
 * Result type for validation operations
 * Discriminated union for type-safe error handling
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

// ============================================
// Validation Helpers
// ============================================

/**
 * Validate data against a schema, returning a Result type
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @returns ValidationResult with either data or error
 */
export function tryValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, error: result.error };
}

/**
 * Format Zod error for display
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e: z.ZodIssue) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('\n');
}
