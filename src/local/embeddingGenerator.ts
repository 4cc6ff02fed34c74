/**
 * @fileOverview: Batched, cached and concurrency-limited embedding generation
 * @module: EmbeddingGenerator
 * @keyFunctions:
 *   - embedAll(): Vectors for every text in input order, null where a batch failed
 *   - embed(): Like embedAll but throws EmbeddingError on any failed batch
 *   - embedQuery(): Single query vector, never written to the cache
 * @dependencies:
 *   - embeddingService: OpenAI-compatible embeddings endpoint
 *   - embeddingCache: (content hash, model version) keyed vector cache
 *   - semaphore/retry/timeout: Bounded parallelism, exponential backoff and per-attempt deadlines
 * @context: A failed batch never cancels its siblings; the scheduler decides what to do with the texts left without a vector
 */

import { EmbeddingCache, contentHash } from './embeddingCache';
import { EmbeddingResponse, EmbeddingService } from './embeddingService';
import { logger } from '../utils/logger';
import {
  EmbeddingError,
  ErrorCode,
  TimeoutError,
  getErrorMessage,
  getStatusCode,
  isTransientError,
} from '../utils/errorHandler';
import { withRetry } from '../utils/retry';
import { mapWithConcurrency } from '../utils/semaphore';
import { withTimeout } from '../utils/timeout';

export interface EmbeddingGeneratorConfig {
  batchSize: number;
  maxConcurrency: number;
  /** Attempts per batch, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Deadline for a single attempt */
  timeoutMs: number;
}

export interface EmbeddingBatchFailure {
  batchIndex: number;
  /** Positions in the embedAll input that were left without a vector */
  inputIndices: number[];
  error: EmbeddingError;
}

export interface EmbedOptions {
  signal?: AbortSignal;
  /** Store new vectors in the cache (default true) */
  cacheResults?: boolean;
}

export interface EmbedAllResult {
  vectors: Array<number[] | null>;
  failures: EmbeddingBatchFailure[];
  cacheHits: number;
  /** Distinct texts sent to the service */
  requested: number;
}

interface PendingText {
  hash: string;
  text: string;
}

function normalizeModel(model: string): string {
  return model.trim().toLowerCase().replace(/:latest$/, '');
}

export class EmbeddingGenerator {
  constructor(
    private readonly service: EmbeddingService,
    private readonly cache: EmbeddingCache,
    private readonly config: EmbeddingGeneratorConfig
  ) {
    if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${config.batchSize}`);
    }
  }

  get modelVersion(): string {
    return this.service.modelVersion;
  }

  get dimensions(): number {
    return this.service.dimensions;
  }

  async embedAll(texts: readonly string[], options: EmbedOptions = {}): Promise<EmbedAllResult> {
    const hashes = texts.map(contentHash);
    const cached = this.cache.getMany(hashes, this.modelVersion, this.dimensions);

    // Distinct uncached texts, in first-occurrence order
    const pending: PendingText[] = [];
    const seen = new Set<string>();
    texts.forEach((text, index) => {
      const hash = hashes[index];
      if (cached.has(hash) || seen.has(hash)) return;
      seen.add(hash);
      pending.push({ hash, text });
    });

    const batches: PendingText[][] = [];
    for (let i = 0; i < pending.length; i += this.config.batchSize) {
      batches.push(pending.slice(i, i + this.config.batchSize));
    }

    const cacheHits = texts.length - hashes.filter(hash => !cached.has(hash)).length;
    if (batches.length > 0) {
      logger.info('🔄 Generating embeddings', {
        texts: texts.length,
        cacheHits,
        requested: pending.length,
        batches: batches.length,
        model: this.modelVersion,
      });
    }

    const settled = await mapWithConcurrency(batches, this.config.maxConcurrency, (batch, batchIndex) =>
      this.embedBatch(batch, batchIndex, batches.length, options.signal)
    );

    const resolved = new Map<string, number[]>(cached);
    const failedHashes = new Map<string, number>();
    const failuresByBatch: Array<{ batchIndex: number; error: EmbeddingError }> = [];

    settled.forEach((outcome, batchIndex) => {
      const batch = batches[batchIndex];
      if (outcome.status === 'fulfilled') {
        const entries = batch.map((item, i) => ({ hash: item.hash, vector: outcome.value[i] }));
        for (const entry of entries) resolved.set(entry.hash, entry.vector);
        if (options.cacheResults !== false) {
          this.cache.setMany(entries, this.modelVersion);
        }
      } else {
        const error = this.toEmbeddingError(outcome.reason);
        failuresByBatch.push({ batchIndex, error });
        for (const item of batch) failedHashes.set(item.hash, batchIndex);
      }
    });

    const failures: EmbeddingBatchFailure[] = failuresByBatch.map(({ batchIndex, error }) => ({
      batchIndex,
      error,
      inputIndices: hashes.flatMap((hash, index) => (failedHashes.get(hash) === batchIndex ? [index] : [])),
    }));

    if (failures.length > 0) {
      logger.warn('⚠️ Some embedding batches failed', {
        failedBatches: failures.map(f => f.batchIndex),
        totalBatches: batches.length,
        codes: failures.map(f => f.error.code),
      });
    }

    return {
      vectors: hashes.map(hash => resolved.get(hash) ?? null),
      failures,
      cacheHits,
      requested: pending.length,
    };
  }

  async embed(texts: readonly string[], options: EmbedOptions = {}): Promise<number[][]> {
    const result = await this.embedAll(texts, options);
    if (result.failures.length > 0) {
      throw result.failures[0].error;
    }

    const vectors: number[][] = [];
    for (const vector of result.vectors) {
      if (!vector) {
        throw new EmbeddingError(ErrorCode.EMBEDDING_FAILED, 'Embedding missing for an input text');
      }
      vectors.push(vector);
    }
    return vectors;
  }

  async embedQuery(text: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    const [vector] = await this.embed([text], { signal: options.signal, cacheResults: false });
    return vector;
  }

  private async embedBatch(
    batch: PendingText[],
    batchIndex: number,
    totalBatches: number,
    signal?: AbortSignal
  ): Promise<number[][]> {
    const texts = batch.map(item => item.text);

    const response = await withRetry(
      () =>
        withTimeout(
          `embedding batch ${batchIndex + 1}/${totalBatches}`,
          this.config.timeoutMs,
          attemptSignal => this.service.embed(texts, { signal: attemptSignal }),
          signal
        ),
      {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.baseDelayMs,
        maxDelayMs: this.config.maxDelayMs,
        signal,
        operation: `embedding batch ${batchIndex + 1}/${totalBatches}`,
      }
    );

    // Contract violations are fatal for the batch and never retried
    return this.validateResponse(response, texts.length, batchIndex);
  }

  private validateResponse(response: EmbeddingResponse, expected: number, batchIndex: number): number[][] {
    if (response.vectors.length !== expected) {
      throw new EmbeddingError(
        ErrorCode.EMBEDDING_FAILED,
        `Embedding service returned ${response.vectors.length} vectors for ${expected} texts`,
        { batchIndex, expected, received: response.vectors.length }
      );
    }

    if (normalizeModel(response.modelVersion) !== normalizeModel(this.modelVersion)) {
      throw new EmbeddingError(
        ErrorCode.EMBEDDING_FAILED,
        `Embedding service answered with model ${response.modelVersion}, expected ${this.modelVersion}`,
        { batchIndex, reported: response.modelVersion, declared: this.modelVersion }
      );
    }

    const mismatch = response.vectors.findIndex(vector => vector.length !== this.dimensions);
    if (mismatch !== -1) {
      throw new EmbeddingError(
        ErrorCode.EMBEDDING_DIMENSION_MISMATCH,
        `Embedding dimension mismatch: expected ${this.dimensions}, got ${response.vectors[mismatch].length}`,
        { batchIndex, expected: this.dimensions, received: response.vectors[mismatch].length }
      );
    }

    return response.vectors;
  }

  private toEmbeddingError(error: unknown): EmbeddingError {
    if (error instanceof EmbeddingError) return error;

    if (error instanceof TimeoutError) {
      return new EmbeddingError(ErrorCode.EMBEDDING_TIMEOUT, error.message, { timeoutMs: error.timeoutMs });
    }

    const status = getStatusCode(error);
    if (status === 429) {
      return new EmbeddingError(ErrorCode.EMBEDDING_RATE_LIMIT, 'Embedding rate limit retries exhausted', {
        status,
        originalError: getErrorMessage(error),
      });
    }

    return new EmbeddingError(
      isTransientError(error) ? ErrorCode.EMBEDDING_TIMEOUT : ErrorCode.EMBEDDING_FAILED,
      `Embedding request failed: ${getErrorMessage(error)}`,
      { status, originalError: getErrorMessage(error) }
    );
  }
}
