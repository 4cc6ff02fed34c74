/**
 * @fileOverview: Client for an OpenAI-compatible embeddings endpoint
 * @module: EmbeddingService
 * @keyFunctions:
 *   - EmbeddingService: Contract for batched text embedding
 *   - OpenAIEmbeddingService.embed(): Ordered vectors for an ordered batch of texts
 * @dependencies:
 *   - openai: Official OpenAI SDK, pointed at Ollama or any compatible server
 *   - logger: Logging utilities
 * @context: The generator treats the service as a black box; this layer only translates the SDK response into ordered vectors plus the reported model
 */

import OpenAI from 'openai';
import { logger } from '../utils/logger';

export interface EmbeddingRequestOptions {
  signal?: AbortSignal;
}

export interface EmbeddingResponse {
  vectors: number[][];
  /** Model version reported by the service */
  modelVersion: string;
  /** Dimensionality of the first vector, 0 when the response is empty */
  dimensions: number;
}

export interface EmbeddingService {
  /** Declared model version tag stored beside every vector */
  readonly modelVersion: string;
  /** Declared vector dimensionality */
  readonly dimensions: number;
  embed(texts: string[], options?: EmbeddingRequestOptions): Promise<EmbeddingResponse>;
}

export interface OpenAIEmbeddingServiceConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  dimensions: number;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  private client: OpenAI;
  readonly modelVersion: string;
  readonly dimensions: number;

  constructor(config: OpenAIEmbeddingServiceConfig, client?: OpenAI) {
    this.modelVersion = config.model;
    this.dimensions = config.dimensions;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        // Retries and timeouts are owned by the embedding generator
        maxRetries: 0,
      });

    logger.info('🧮 Embedding service initialized', {
      model: config.model,
      dimensions: config.dimensions,
      baseUrl: config.baseUrl,
    });
  }

  async embed(texts: string[], options: EmbeddingRequestOptions = {}): Promise<EmbeddingResponse> {
    if (texts.length === 0) {
      return { vectors: [], modelVersion: this.modelVersion, dimensions: 0 };
    }

    const response = await this.client.embeddings.create(
      { model: this.modelVersion, input: texts },
      { signal: options.signal }
    );

    if (!response || !Array.isArray(response.data)) {
      throw new Error('Invalid embedding response: missing or invalid data array');
    }

    // Servers may return items out of order; index is authoritative
    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    const vectors = ordered.map(item => {
      if (!Array.isArray(item.embedding)) {
        throw new Error('Invalid embedding response: item missing embedding array');
      }
      return item.embedding;
    });

    return {
      vectors,
      modelVersion: response.model || this.modelVersion,
      dimensions: vectors.length > 0 ? vectors[0].length : 0,
    };
  }
}
