/**
 * @fileOverview: Tests for batched embedding generation with caching, retries and validation
 * @module: EmbeddingGenerator Tests
 */

import { EmbeddingGenerator, EmbeddingGeneratorConfig } from '../embeddingGenerator';
import { MemoryEmbeddingCache, SqliteEmbeddingCache, contentHash } from '../embeddingCache';
import { EmbeddingRequestOptions, EmbeddingResponse, EmbeddingService } from '../embeddingService';
import { RegDocDatabase } from '../database';
import { EmbeddingError, ErrorCode } from '../../utils/errorHandler';

jest.mock('../../utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

type Behaviour = (texts: string[], options: EmbeddingRequestOptions) => Promise<EmbeddingResponse> | null;

class FakeEmbeddingService implements EmbeddingService {
  readonly modelVersion = 'test-embed';
  readonly dimensions = 3;
  calls: string[][] = [];
  behaviour: Behaviour = () => null;

  async embed(texts: string[], options: EmbeddingRequestOptions = {}): Promise<EmbeddingResponse> {
    this.calls.push(texts);
    const custom = this.behaviour(texts, options);
    if (custom) return custom;
    return {
      vectors: texts.map(text => [text.length, 1, 0]),
      modelVersion: this.modelVersion,
      dimensions: this.dimensions,
    };
  }
}

const baseConfig: EmbeddingGeneratorConfig = {
  batchSize: 8,
  maxConcurrency: 2,
  maxAttempts: 3,
  baseDelayMs: 0,
  timeoutMs: 1000,
};

function statusError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe('EmbeddingGenerator', () => {
  let service: FakeEmbeddingService;
  let cache: MemoryEmbeddingCache;

  beforeEach(() => {
    service = new FakeEmbeddingService();
    cache = new MemoryEmbeddingCache();
  });

  test('returns one vector per input in input order and sends duplicates once', async () => {
    const generator = new EmbeddingGenerator(service, cache, baseConfig);
    const result = await generator.embedAll(['a', 'bb', 'a']);

    expect(service.calls).toEqual([['a', 'bb']]);
    expect(result.vectors).toEqual([
      [1, 1, 0],
      [2, 1, 0],
      [1, 1, 0],
    ]);
    expect(result.requested).toBe(2);
    expect(result.cacheHits).toBe(0);
    expect(result.failures).toEqual([]);
  });

  test('never re-sends cached text for the same model', async () => {
    const generator = new EmbeddingGenerator(service, cache, baseConfig);
    await generator.embedAll(['a', 'bb']);
    service.calls = [];

    const result = await generator.embedAll(['a', 'ccc']);

    expect(service.calls).toEqual([['ccc']]);
    expect(result.cacheHits).toBe(1);
    expect(result.vectors).toEqual([
      [1, 1, 0],
      [3, 1, 0],
    ]);
  });

  test('splits misses into batches of at most batchSize', async () => {
    const generator = new EmbeddingGenerator(service, cache, { ...baseConfig, batchSize: 2 });
    await generator.embedAll(['t1', 't2', 't3', 't4', 't5']);

    expect(service.calls.map(call => call.length).sort()).toEqual([1, 2, 2]);
    expect(service.calls.flat().sort()).toEqual(['t1', 't2', 't3', 't4', 't5']);
  });

  test('a batch that keeps timing out fails alone while its siblings complete', async () => {
    service.behaviour = texts =>
      texts.includes('t2') ? Promise.reject(new Error('Request timed out.')) : null;
    const generator = new EmbeddingGenerator(service, cache, { ...baseConfig, batchSize: 1 });

    const result = await generator.embedAll(['t1', 't2', 't3', 't4', 't5']);

    expect(result.vectors.map(vector => vector !== null)).toEqual([true, false, true, true, true]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].batchIndex).toBe(1);
    expect(result.failures[0].inputIndices).toEqual([1]);
    expect(result.failures[0].error).toBeInstanceOf(EmbeddingError);
    expect(result.failures[0].error.code).toBe(ErrorCode.EMBEDDING_TIMEOUT);
    expect(service.calls.filter(call => call.includes('t2'))).toHaveLength(3);
    expect(cache.size()).toBe(4);
  });

  test('retries rate limits and succeeds', async () => {
    let failuresLeft = 1;
    service.behaviour = () => {
      if (failuresLeft > 0) {
        failuresLeft--;
        return Promise.reject(statusError('Rate limit reached', 429));
      }
      return null;
    };
    const generator = new EmbeddingGenerator(service, cache, baseConfig);

    const vectors = await generator.embed(['alpha']);

    expect(vectors).toEqual([[5, 1, 0]]);
    expect(service.calls).toHaveLength(2);
  });

  test('reports exhausted rate limits with the rate-limit code', async () => {
    service.behaviour = () => Promise.reject(statusError('Rate limit reached', 429));
    const generator = new EmbeddingGenerator(service, cache, { ...baseConfig, maxAttempts: 2 });

    const result = await generator.embedAll(['alpha']);

    expect(service.calls).toHaveLength(2);
    expect(result.failures[0].error.code).toBe(ErrorCode.EMBEDDING_RATE_LIMIT);
  });

  test('does not retry non-transient client errors', async () => {
    service.behaviour = () => Promise.reject(statusError('Bad request', 400));
    const generator = new EmbeddingGenerator(service, cache, baseConfig);

    const result = await generator.embedAll(['alpha']);

    expect(service.calls).toHaveLength(1);
    expect(result.failures[0].error.code).toBe(ErrorCode.EMBEDDING_FAILED);
  });

  test('treats a dimensionality mismatch as fatal without retrying', async () => {
    service.behaviour = texts =>
      Promise.resolve({ vectors: texts.map(() => [1, 2]), modelVersion: 'test-embed', dimensions: 2 });
    const generator = new EmbeddingGenerator(service, cache, baseConfig);

    const result = await generator.embedAll(['alpha', 'beta']);

    expect(service.calls).toHaveLength(1);
    expect(result.vectors).toEqual([null, null]);
    expect(result.failures[0].error.code).toBe(ErrorCode.EMBEDDING_DIMENSION_MISMATCH);
    expect(cache.size()).toBe(0);
  });

  test('rejects a response with the wrong number of vectors', async () => {
    service.behaviour = () =>
      Promise.resolve({ vectors: [[1, 1, 1]], modelVersion: 'test-embed', dimensions: 3 });
    const generator = new EmbeddingGenerator(service, cache, baseConfig);

    await expect(generator.embed(['alpha', 'beta'])).rejects.toMatchObject({
      code: ErrorCode.EMBEDDING_FAILED,
    });
  });

  test('rejects vectors from a different model but accepts the :latest tag', async () => {
    service.behaviour = texts =>
      Promise.resolve({ vectors: texts.map(() => [1, 1, 1]), modelVersion: 'other-model', dimensions: 3 });
    const generator = new EmbeddingGenerator(service, cache, baseConfig);
    await expect(generator.embed(['alpha'])).rejects.toMatchObject({ code: ErrorCode.EMBEDDING_FAILED });

    service.behaviour = texts =>
      Promise.resolve({ vectors: texts.map(() => [1, 1, 1]), modelVersion: 'test-embed:latest', dimensions: 3 });
    await expect(generator.embed(['alpha'])).resolves.toEqual([[1, 1, 1]]);
  });

  test('aborts an attempt that exceeds the per-attempt deadline', async () => {
    service.behaviour = (_texts, options) =>
      new Promise<EmbeddingResponse>((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const generator = new EmbeddingGenerator(service, cache, { ...baseConfig, maxAttempts: 1, timeoutMs: 20 });

    const result = await generator.embedAll(['slow']);

    expect(result.vectors).toEqual([null]);
    expect(result.failures[0].error.code).toBe(ErrorCode.EMBEDDING_TIMEOUT);
  });

  test('embedQuery returns a single vector without caching the question', async () => {
    const generator = new EmbeddingGenerator(service, cache, baseConfig);
    await expect(generator.embedQuery('four')).resolves.toEqual([4, 1, 0]);
    expect(cache.size()).toBe(0);
  });

  test('re-embeds text whose cached vector has another length', async () => {
    cache.setMany([{ hash: contentHash('alpha'), vector: [9, 9] }], 'test-embed');
    const generator = new EmbeddingGenerator(service, cache, baseConfig);

    const result = await generator.embedAll(['alpha']);

    expect(service.calls).toEqual([['alpha']]);
    expect(result.cacheHits).toBe(0);
    expect(result.vectors).toEqual([[5, 1, 0]]);
  });
});

describe('SqliteEmbeddingCache', () => {
  let database: RegDocDatabase;

  beforeEach(() => {
    database = RegDocDatabase.open(':memory:');
  });

  afterEach(() => {
    database.close();
  });

  test('stores and loads vectors per model version', () => {
    const cache = new SqliteEmbeddingCache(database);
    const hash = contentHash('water quality');

    cache.setMany([{ hash, vector: [0.25, -0.5, 1] }], 'model-a');

    expect(cache.getMany([hash], 'model-a', 3).get(hash)).toEqual([0.25, -0.5, 1]);
    expect(cache.getMany([hash], 'model-b', 3).size).toBe(0);
    expect(cache.getMany([hash], 'model-a', 4).size).toBe(0);
    expect(cache.size()).toBe(1);
  });

  test('serves as the generator cache across instances', async () => {
    const service = new FakeEmbeddingService();
    await new EmbeddingGenerator(service, new SqliteEmbeddingCache(database), baseConfig).embedAll(['abc']);
    service.calls = [];

    const result = await new EmbeddingGenerator(service, new SqliteEmbeddingCache(database), baseConfig).embedAll([
      'abc',
    ]);

    expect(service.calls).toEqual([]);
    expect(result.cacheHits).toBe(1);
    expect(result.vectors).toEqual([[3, 1, 0]]);
  });
});
