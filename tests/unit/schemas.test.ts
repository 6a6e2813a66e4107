/**
 * Schema Validation Tests
 *
 * Tests for the record, outcome and config schemas plus the
 * validation helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  SCHEMA_VERSION,
  CanonicalRecordSchema,
  FailureKindSchema,
  FetchInputSchema,
  SerializedResultSchema,
  BatchFileSchema,
  FetchConfigSchema,
  tryValidate,
  formatZodError,
  type CanonicalRecord,
} from '../../src/schemas/index.js';
import { DEFAULT_CONFIG } from '../../src/types/index.js';

// ============================================
// Fixtures
// ============================================

function createRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    id: '100',
    url: 'https://x.com/tester/status/100',
    text: 'hello',
    createdAt: '2026-03-15T10:15:30+00:00',
    authorHandle: 'tester',
    images: [],
    videos: [],
    isThread: false,
    ...overrides,
  };
}

// ============================================
// CanonicalRecord
// ============================================

describe('CanonicalRecordSchema', () => {
  it('should accept a minimal record', () => {
    expect(CanonicalRecordSchema.safeParse(createRecord()).success).toBe(true);
  });

  it('should accept an empty createdAt', () => {
    expect(CanonicalRecordSchema.safeParse(createRecord({ createdAt: '' })).success).toBe(true);
  });

  it('should reject a createdAt that is not ISO 8601', () => {
    expect(CanonicalRecordSchema.safeParse(createRecord({ createdAt: 'yesterday' })).success).toBe(
      false
    );
  });

  it('should accept a thread reply whose root differs', () => {
    const record = createRecord({ isThread: true, threadRootId: '99' });
    expect(CanonicalRecordSchema.safeParse(record).success).toBe(true);
  });

  it('should accept a root ID equal to the post ID when not a thread', () => {
    const record = createRecord({ isThread: false, threadRootId: '100' });
    expect(CanonicalRecordSchema.safeParse(record).success).toBe(true);
  });

  it('should reject isThread inconsistent with threadRootId', () => {
    const noRoot = CanonicalRecordSchema.safeParse(createRecord({ isThread: true }));
    const sameRoot = CanonicalRecordSchema.safeParse(
      createRecord({ isThread: true, threadRootId: '100' })
    );
    const otherRoot = CanonicalRecordSchema.safeParse(
      createRecord({ isThread: false, threadRootId: '99' })
    );

    expect(noRoot.success).toBe(false);
    expect(sameRoot.success).toBe(false);
    expect(otherRoot.success).toBe(false);
  });
});

// ============================================
// Outcomes
// ============================================

describe('FailureKindSchema', () => {
  it('should contain exactly the seven failure kinds', () => {
    expect(FailureKindSchema.options).toEqual([
      'ToolMissing',
      'AuthExpired',
      'RateLimited',
      'NotFoundOrStale',
      'Timeout',
      'MalformedOutput',
      'Unclassified',
    ]);
  });
});

describe('FetchInputSchema', () => {
  it('should reject an empty URL', () => {
    const result = FetchInputSchema.safeParse({ url: '' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('URL cannot be empty');
    }
  });

  it('should accept an optional proxy', () => {
    expect(
      FetchInputSchema.parse({ url: 'https://x.com/a/status/1', proxyUrl: 'http://proxy.test' })
    ).toEqual({ url: 'https://x.com/a/status/1', proxyUrl: 'http://proxy.test' });
  });
});

describe('BatchFileSchema', () => {
  const batch = {
    schemaVersion: SCHEMA_VERSION,
    runId: '3f2b8a4e-6c1d-4e5f-9a7b-1c2d3e4f5a6b',
    generatedAt: '2026-03-15T10:15:30.000Z',
    total: 2,
    succeeded: 1,
    failed: 1,
    results: [
      { success: true, url: 'https://x.com/tester/status/100', attempts: 1, data: createRecord() },
      {
        success: false,
        url: 'https://x.com/tester/status/101',
        attempts: 3,
        error: 'Rate limit exceeded. Wait before retrying.',
        failureKind: 'RateLimited',
      },
    ],
  };

  it('should accept a well-formed batch', () => {
    expect(BatchFileSchema.safeParse(batch).success).toBe(true);
  });

  it('should reject another schema version', () => {
    expect(BatchFileSchema.safeParse({ ...batch, schemaVersion: '0.9.0' }).success).toBe(false);
  });

  it('should reject a non-UUID run ID', () => {
    expect(BatchFileSchema.safeParse({ ...batch, runId: 'run-1' }).success).toBe(false);
  });

  it('should reject an unknown failure kind', () => {
    const result = SerializedResultSchema.safeParse({
      success: false,
      url: 'https://x.com/tester/status/101',
      attempts: 1,
      failureKind: 'Exploded',
    });
    expect(result.success).toBe(false);
  });
});

// ============================================
// Config
// ============================================

describe('FetchConfigSchema', () => {
  it('should accept the defaults', () => {
    expect(FetchConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('should reject zero concurrency and a negative delay', () => {
    expect(FetchConfigSchema.safeParse({ ...DEFAULT_CONFIG, concurrency: 0 }).success).toBe(false);
    expect(FetchConfigSchema.safeParse({ ...DEFAULT_CONFIG, retryDelayMs: -1 }).success).toBe(
      false
    );
  });

  it('should allow a zero retry delay', () => {
    expect(FetchConfigSchema.safeParse({ ...DEFAULT_CONFIG, retryDelayMs: 0 }).success).toBe(true);
  });
});

// ============================================
// Helpers
// ============================================

describe('tryValidate', () => {
  it('should return data on success', () => {
    expect(tryValidate(FetchInputSchema, { url: 'https://x.com/a/status/1' })).toEqual({
      success: true,
      data: { url: 'https://x.com/a/status/1' },
    });
  });

  it('should return the error on failure', () => {
    const result = tryValidate(FetchInputSchema, {});
    expect(result.success).toBe(false);
  });
});

describe('formatZodError', () => {
  it('should prefix issues with their path', () => {
    const result = FetchInputSchema.safeParse({ url: '' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe('url: URL cannot be empty');
    }
  });
});
