/**
 * Unit Tests for Failure Classification
 *
 * @see src/bird/classifier.ts
 */

import { describe, it, expect } from 'vitest';
import {
  CLASSIFICATION_RULES,
  classifyFailure,
  classifyProcessResult,
  describeFailure,
  isRetryableKind,
  type ProcessResult,
} from '../../src/bird/index.js';

function processResult(overrides: Partial<ProcessResult>): ProcessResult {
  return {
    status: 'exited',
    exitCode: 1,
    stdout: '',
    stderr: '',
    durationMs: 5,
    ...overrides,
  };
}

// ============================================
// classifyFailure Tests
// ============================================

describe('classifyFailure', () => {
  it('should classify 401 as AuthExpired', () => {
    expect(classifyFailure(1, 'HTTP 401')).toBe('AuthExpired');
  });

  it('should classify Unauthorized as AuthExpired', () => {
    expect(classifyFailure(1, 'Request Unauthorized')).toBe('AuthExpired');
  });

  it('should match auth case-insensitively', () => {
    expect(classifyFailure(1, 'AUTHENTICATION required')).toBe('AuthExpired');
  });

  it('should prefer AuthExpired when 401 and 404 both appear', () => {
    expect(classifyFailure(1, '401 Unauthorized (then 404)')).toBe('AuthExpired');
  });

  it('should classify 429 as RateLimited', () => {
    expect(classifyFailure(1, 'HTTP 429 Too Many Requests')).toBe('RateLimited');
  });

  it('should match rate case-insensitively', () => {
    expect(classifyFailure(2, 'RATE LIMITED')).toBe('RateLimited');
  });

  it('should classify 404 as NotFoundOrStale', () => {
    expect(classifyFailure(1, 'GraphQL 404')).toBe('NotFoundOrStale');
  });

  it('should fall back to Unclassified', () => {
    expect(classifyFailure(1, 'something broke')).toBe('Unclassified');
    expect(classifyFailure(1, '')).toBe('Unclassified');
  });

  it('should classify a zero exit as MalformedOutput whatever stderr says', () => {
    expect(classifyFailure(0, '')).toBe('MalformedOutput');
    expect(classifyFailure(0, '401 Unauthorized')).toBe('MalformedOutput');
  });

  it('should accept a custom rule table', () => {
    const rules = [{ kind: 'Timeout' as const, matches: (stderr: string) => stderr.includes('ETIMEDOUT') }];
    expect(classifyFailure(1, 'connect ETIMEDOUT', rules)).toBe('Timeout');
    expect(classifyFailure(1, '401', rules)).toBe('Unclassified');
  });

  it('should keep auth before rate before not-found', () => {
    expect(CLASSIFICATION_RULES.map((rule) => rule.kind)).toEqual([
      'AuthExpired',
      'RateLimited',
      'NotFoundOrStale',
    ]);
  });
});

// ============================================
// classifyProcessResult Tests
// ============================================

describe('classifyProcessResult', () => {
  it('should classify timeouts as Timeout', () => {
    expect(classifyProcessResult(processResult({ status: 'timeout', exitCode: -1 }))).toBe('Timeout');
  });

  it('should classify ENOENT spawn errors as ToolMissing', () => {
    const result = processResult({ status: 'spawn-error', exitCode: -1, errorCode: 'ENOENT' });
    expect(classifyProcessResult(result)).toBe('ToolMissing');
  });

  it('should classify other spawn errors as Unclassified', () => {
    const result = processResult({ status: 'spawn-error', exitCode: -1, errorCode: 'EACCES' });
    expect(classifyProcessResult(result)).toBe('Unclassified');
  });

  it('should delegate exited results to the stderr rules', () => {
    expect(classifyProcessResult(processResult({ stderr: '  429\n' }))).toBe('RateLimited');
  });
});

// ============================================
// Messages and Retryability
// ============================================

describe('describeFailure', () => {
  it('should suggest refreshing query IDs for NotFoundOrStale', () => {
    expect(describeFailure('NotFoundOrStale', '404')).toBe(
      'Post not found or query IDs outdated. Try: bird query-ids --fresh'
    );
  });

  it('should include the timeout in seconds', () => {
    expect(describeFailure('Timeout', '', 60000)).toBe('Bird command timed out after 60s');
    expect(describeFailure('Timeout', '')).toBe('Bird command timed out');
  });

  it('should include stderr for Unclassified', () => {
    expect(describeFailure('Unclassified', 'boom')).toBe('Bird CLI failed: boom');
    expect(describeFailure('Unclassified', '')).toBe('Bird CLI failed with no diagnostics');
  });

  it('should include the parse error for MalformedOutput', () => {
    expect(describeFailure('MalformedOutput', 'Unexpected token')).toBe(
      'Failed to parse Bird output as JSON: Unexpected token'
    );
  });
});

describe('isRetryableKind', () => {
  it('should not retry AuthExpired or ToolMissing', () => {
    expect(isRetryableKind('AuthExpired')).toBe(false);
    expect(isRetryableKind('ToolMissing')).toBe(false);
  });

  it('should retry transient kinds', () => {
    expect(isRetryableKind('RateLimited')).toBe(true);
    expect(isRetryableKind('Timeout')).toBe(true);
    expect(isRetryableKind('MalformedOutput')).toBe(true);
    expect(isRetryableKind('Unclassified')).toBe(true);
    expect(isRetryableKind('NotFoundOrStale')).toBe(true);
  });
});
