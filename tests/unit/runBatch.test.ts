/**
 * Batch Execution Unit Tests
 *
 * Runs the scrape command against a fake client and preflight.
 * File writes are mocked; nothing touches disk or spawns bird.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  resolveOutputFormat,
  runBatch,
  toFetchInputs,
  type BatchDependencies,
} from '../../src/cli/runBatch.js';
import type { PreflightResult } from '../../src/cli/preflight.js';
import { EXIT_CODES } from '../../src/cli/errorHandler.js';
import type { BirdClientOptions, PostFetcher } from '../../src/bird/client.js';
import type { ProcessResult } from '../../src/bird/types.js';
import { DEFAULT_CONFIG, ENV_KEYS } from '../../src/config.js';
import { BatchFileSchema, type FetchInput } from '../../src/schemas/index.js';

vi.mock('../../src/utils/fileWriter.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/utils/fileWriter.js')>();
  return {
    ...actual,
    writeJSON: vi.fn(async () => {}),
    writeMarkdown: vi.fn(async () => {}),
  };
});

import { writeJSON, writeMarkdown } from '../../src/utils/fileWriter.js';

// ============================================
// Test Helpers
// ============================================

const NOW = new Date(2026, 2, 15, 10, 15, 30);

function exited(exitCode: number, stdout = '', stderr = ''): ProcessResult {
  return { status: 'exited', exitCode, stdout, stderr, durationMs: 1 };
}

/**
 * Fake client: succeeds for status IDs in `ok`, auth failure otherwise
 */
function createClient(ok: readonly string[]) {
  return {
    readPost: vi.fn(async (input: FetchInput) => {
      const id = input.url.split('/').pop() ?? '';
      return ok.includes(id)
        ? exited(0, JSON.stringify({ id, text: `post ${id}`, author: { username: 'tester' } }))
        : exited(1, '', '401 Unauthorized');
    }),
    refreshQueryIds: vi.fn(async () => {}),
  } satisfies PostFetcher;
}

const READY: PreflightResult = {
  shouldContinue: true,
  birdPath: '/usr/local/bin/bird',
  credentials: { authToken: 'test-token', ct0: 'test-ct0' },
  cookieSource: 'env',
};

function deps(client: PostFetcher, overrides: Partial<BatchDependencies> = {}) {
  const createClientFn = vi.fn((_options: BirdClientOptions) => client);
  return {
    createClientFn,
    deps: {
      preflight: async () => READY,
      createClient: createClientFn,
      sleep: async () => {},
      now: () => NOW,
      ...overrides,
    } satisfies BatchDependencies,
  };
}

let originalEnv: NodeJS.ProcessEnv;

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  originalEnv = { ...process.env };
  for (const key of Object.values(ENV_KEYS)) {
    delete process.env[key];
  }
});

afterEach(() => {
  process.env = originalEnv;
  vi.restoreAllMocks();
});

// ============================================
// toFetchInputs
// ============================================

describe('toFetchInputs', () => {
  it('should trim, keep blank slots and rewrite twitter.com', () => {
    expect(
      toFetchInputs(['  https://twitter.com/a/status/1 ', '', '   ', 'https://x.com/b/status/2'])
    ).toEqual([{ url: 'https://x.com/a/status/1' }, null, null, { url: 'https://x.com/b/status/2' }]);
  });
});

describe('resolveOutputFormat', () => {
  it('should infer markdown from a .md output file', () => {
    expect(resolveOutputFormat({ output: 'posts.MD' }, DEFAULT_CONFIG)).toBe('markdown');
  });

  it('should let an explicit format win over the extension', () => {
    expect(resolveOutputFormat({ output: 'posts.md', format: 'json' }, DEFAULT_CONFIG)).toBe('json');
  });

  it('should keep the configured format for other files', () => {
    expect(resolveOutputFormat({ output: 'posts.txt' }, DEFAULT_CONFIG)).toBe('json');
  });
});

// ============================================
// runBatch
// ============================================

describe('runBatch', () => {
  it('should write a batch JSON file and succeed when any input succeeds', async () => {
    const client = createClient(['1']);
    const { deps: batchDeps } = deps(client);

    const result = await runBatch(
      ['https://x.com/tester/status/1', 'https://x.com/tester/status/2'],
      { maxAttempts: '2' },
      batchDeps
    );

    expect(result.exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(result.outputPath).toBe(join('output', '2026', '03', '15', 'batch_101530.json'));
    expect(result.results.map((r) => r.outcome.success)).toEqual([true, false]);

    expect(writeJSON).toHaveBeenCalledTimes(1);
    const [path, data, schema] = vi.mocked(writeJSON).mock.calls[0];
    expect(path).toBe(result.outputPath);
    expect(schema).toBe(BatchFileSchema);
    const batch = BatchFileSchema.parse(data);
    expect(batch.total).toBe(2);
    expect(batch.succeeded).toBe(1);
    expect(batch.failed).toBe(1);
    expect(batch.generatedAt).toBe(NOW.toISOString());
  });

  it('should not retry auth failures', async () => {
    const client = createClient([]);
    const { deps: batchDeps } = deps(client);

    const result = await runBatch(['https://x.com/tester/status/9'], {}, batchDeps);

    expect(result.exitCode).toBe(EXIT_CODES.BATCH_ERROR);
    expect(client.readPost).toHaveBeenCalledTimes(1);
    expect(result.results[0].outcome).toEqual({
      success: false,
      kind: 'AuthExpired',
      message: 'Authentication failed. Re-extract cookies from your browser.',
      attempts: 1,
    });
  });

  it('should name a single-post file after author and ID', async () => {
    const { deps: batchDeps } = deps(createClient(['42']));

    const result = await runBatch(['https://twitter.com/tester/status/42'], {}, batchDeps);

    expect(result.outputPath).toBe(join('output', '2026', '03', '15', 'tester', '42.json'));
  });

  it('should write markdown when requested', async () => {
    const { deps: batchDeps } = deps(createClient(['1']));

    const result = await runBatch(['https://x.com/tester/status/1'], { format: 'md' }, batchDeps);

    expect(result.outputPath).toBe(join('output', '2026', '03', '15', 'tester', '1.md'));
    expect(writeJSON).not.toHaveBeenCalled();
    expect(writeMarkdown).toHaveBeenCalledTimes(1);
    const [, content] = vi.mocked(writeMarkdown).mock.calls[0];
    expect(content.startsWith('# Fetched Posts')).toBe(true);
  });

  it('should pass credentials and config to the client', async () => {
    const { deps: batchDeps, createClientFn } = deps(createClient(['1']));

    await runBatch(
      ['https://x.com/tester/status/1'],
      { proxy: 'http://proxy.test:8080', timeout: '20' },
      batchDeps
    );

    expect(createClientFn).toHaveBeenCalledWith({
      credentials: { authToken: 'test-token', ct0: 'test-ct0' },
      proxyUrl: 'http://proxy.test:8080',
      timeoutMs: 20000,
      refreshTimeoutMs: 120000,
    });
  });

  it('should stop with the preflight exit code', async () => {
    const client = createClient(['1']);
    const { deps: batchDeps, createClientFn } = deps(client, {
      preflight: async () => ({ shouldContinue: false, exitCode: EXIT_CODES.TOOL_MISSING }),
    });

    const result = await runBatch(['https://x.com/tester/status/1'], {}, batchDeps);

    expect(result).toEqual({ exitCode: EXIT_CODES.TOOL_MISSING, results: [] });
    expect(createClientFn).not.toHaveBeenCalled();
    expect(writeJSON).not.toHaveBeenCalled();
  });

  it('should return CONFIG_ERROR without URL arguments', async () => {
    const { deps: batchDeps } = deps(createClient([]));

    const result = await runBatch([], {}, batchDeps);

    expect(result).toEqual({ exitCode: EXIT_CODES.CONFIG_ERROR, results: [] });
  });

  it('should record a failure for each blank argument in place', async () => {
    const client = createClient(['1']);
    const { deps: batchDeps } = deps(client);

    const result = await runBatch(['https://x.com/tester/status/1', '  ', ''], {}, batchDeps);

    expect(result.exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(client.readPost).toHaveBeenCalledTimes(1);
    expect(result.results).toHaveLength(3);
    expect(result.results[0].outcome.success).toBe(true);
    for (const blank of result.results.slice(1)) {
      expect(blank.input).toEqual({ url: '' });
      expect(blank.outcome).toEqual({
        success: false,
        kind: 'Unclassified',
        message: 'No URL provided',
        attempts: 0,
      });
    }

    const batch = BatchFileSchema.parse(vi.mocked(writeJSON).mock.calls[0][1]);
    expect(batch.total).toBe(3);
    expect(batch.failed).toBe(2);
    expect(batch.results[2]).toEqual({
      success: false,
      url: '',
      attempts: 0,
      error: 'No URL provided',
      failureKind: 'Unclassified',
    });
  });

  it('should write failures without invoking bird when every argument is blank', async () => {
    const client = createClient([]);
    const { deps: batchDeps } = deps(client);

    const result = await runBatch(['  '], {}, batchDeps);

    expect(result.exitCode).toBe(EXIT_CODES.BATCH_ERROR);
    expect(client.readPost).not.toHaveBeenCalled();
    expect(result.results.map((r) => r.outcome.success)).toEqual([false]);
    expect(writeJSON).toHaveBeenCalledTimes(1);
  });

  it('should write to an explicit output file', async () => {
    const { deps: batchDeps } = deps(createClient(['1']));

    const result = await runBatch(
      ['https://x.com/tester/status/1', 'https://x.com/tester/status/2'],
      { output: 'posts/run.json' },
      batchDeps
    );

    expect(result.outputPath).toBe('posts/run.json');
    expect(vi.mocked(writeJSON).mock.calls[0][0]).toBe('posts/run.json');
  });

  it('should write markdown to a .md output file without --format', async () => {
    const { deps: batchDeps } = deps(createClient(['1']));

    const result = await runBatch(['https://x.com/tester/status/1'], { output: 'posts.md' }, batchDeps);

    expect(result.outputPath).toBe('posts.md');
    expect(writeJSON).not.toHaveBeenCalled();
    expect(vi.mocked(writeMarkdown).mock.calls[0][0]).toBe('posts.md');
  });

  it('should print a sample of the first post when it succeeded', async () => {
    const { deps: batchDeps } = deps(createClient(['1']));

    await runBatch(['https://x.com/tester/status/1'], {}, batchDeps);

    const printed = vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
    expect(printed.some((line) => line.includes('Sample Post'))).toBe(true);
    expect(printed.some((line) => line.endsWith(' post 1'))).toBe(true);
    expect(printed.some((line) => line.endsWith(' Images: 0 | Videos: 0'))).toBe(true);
  });

  it('should skip the sample when the first post failed', async () => {
    const { deps: batchDeps } = deps(createClient(['2']));

    await runBatch(['https://x.com/tester/status/1', 'https://x.com/tester/status/2'], {}, batchDeps);

    const printed = vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
    expect(printed.some((line) => line.includes('Sample Post'))).toBe(false);
  });

  it('should reject an output directory outside the working directory', async () => {
    const { deps: batchDeps } = deps(createClient([]));

    await expect(
      runBatch(['https://x.com/tester/status/1'], { outputDir: '../elsewhere' }, batchDeps)
    ).rejects.toThrow(/Invalid output directory/);
  });
});
