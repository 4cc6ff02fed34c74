/**
 * @fileOverview: Retrieval-augmented question answering over the indexed regulatory corpus
 * @module: QueryEngine
 * @keyFunctions:
 *   - answer(): Filters → query embedding → vector search → budgeted context → language model → answer + citations
 *   - answerStream(): Same pipeline, yielding citations first and then text deltas
 * @dependencies:
 *   - EmbeddingGenerator: Query embedding (through the same cache and model as ingestion)
 *   - VectorStore: Filtered similarity search
 *   - LanguageModelService: Generation
 * @context: Per-request and stateless. A caller deadline aborts the language-model call and surfaces as LLMError;
 * retrieval failures surface as RetrievalError so no ungrounded answer is ever produced.
 */

import { logger } from '../utils/logger';
import { ErrorCode, LLMError, RegDocError, RetrievalError, TimeoutError, getErrorMessage } from '../utils/errorHandler';
import { createDeadline } from '../utils/timeout';
import { ChatMessage, Citation, RetrievalResult, SearchFilters } from '../shared/types';
import { extractFilters } from './filterExtractor';
import { AssembledContext, assembleContext } from './contextAssembler';
import { buildMessages } from './prompts';
import { LanguageModelService, toLLMError } from './llmService';

export interface QueryEmbedder {
  /** Model the query vectors come from; search is limited to chunks of the same model */
  readonly modelVersion: string;
  embedQuery(text: string, options?: { signal?: AbortSignal }): Promise<number[]>;
}

export interface ChunkSearcher {
  search(
    queryVector: readonly number[],
    filters: SearchFilters | null,
    k: number,
    options?: { embeddingModel?: string }
  ): RetrievalResult[];
}

export interface QueryEngineConfig {
  topK: number;
  contextTokenBudget: number;
  /** Prior messages passed to the model */
  historyTurns: number;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export interface SessionContext {
  sessionId?: string;
  /** Oldest first */
  history: readonly ChatMessage[];
}

export interface AnswerOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  k?: number;
}

export interface QueryAnswer {
  answer: string;
  citations: Citation[];
  filters: SearchFilters | null;
  context: AssembledContext;
  noResults: boolean;
  model: string;
}

export type AnswerStreamEvent =
  | { type: 'citations'; citations: Citation[]; filters: SearchFilters | null; noResults: boolean }
  | { type: 'token'; text: string }
  | { type: 'done'; answer: string; model: string };

interface PreparedQuery {
  filters: SearchFilters | null;
  context: AssembledContext;
  messages: ChatMessage[];
}

export class QueryEngine {
  private readonly now: () => Date;

  constructor(
    private readonly embedder: QueryEmbedder,
    private readonly searcher: ChunkSearcher,
    private readonly llm: LanguageModelService,
    private readonly config: QueryEngineConfig,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async answer(question: string, session: SessionContext, options: AnswerOptions = {}): Promise<QueryAnswer> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const deadline = createDeadline('query', timeoutMs, options.signal);
    const started = Date.now();

    try {
      const prepared = await this.prepare(question, session, deadline.signal, options.k);
      const generated = await this.llm.generate({
        messages: prepared.messages,
        temperature: this.config.temperature,
        maxTokens: this.config.maxOutputTokens,
        signal: deadline.signal,
      });

      logger.info('💬 Question answered', {
        sessionId: session.sessionId,
        citations: prepared.context.citations.length,
        contextTokens: prepared.context.tokensUsed,
        noResults: prepared.context.noResults,
        durationMs: Date.now() - started,
      });

      return {
        answer: generated.text,
        citations: prepared.context.citations,
        filters: prepared.filters,
        context: prepared.context,
        noResults: prepared.context.noResults,
        model: generated.model,
      };
    } catch (error) {
      throw this.toQueryError(error, deadline.signal);
    } finally {
      deadline.clear();
    }
  }

  async *answerStream(
    question: string,
    session: SessionContext,
    options: AnswerOptions = {}
  ): AsyncGenerator<AnswerStreamEvent> {
    const deadline = createDeadline('query', options.timeoutMs ?? this.config.timeoutMs, options.signal);

    try {
      const prepared = await this.prepare(question, session, deadline.signal, options.k);
      yield {
        type: 'citations',
        citations: prepared.context.citations,
        filters: prepared.filters,
        noResults: prepared.context.noResults,
      };

      let answer = '';
      for await (const text of this.llm.stream({
        messages: prepared.messages,
        temperature: this.config.temperature,
        maxTokens: this.config.maxOutputTokens,
        signal: deadline.signal,
      })) {
        answer += text;
        yield { type: 'token', text };
      }

      yield { type: 'done', answer, model: this.llm.model };
    } catch (error) {
      throw this.toQueryError(error, deadline.signal);
    } finally {
      deadline.clear();
    }
  }

  private async prepare(
    question: string,
    session: SessionContext,
    signal: AbortSignal,
    k: number = this.config.topK
  ): Promise<PreparedQuery> {
    const trimmed = question.trim();
    if (trimmed.length === 0) {
      throw new RetrievalError('Question must not be empty');
    }

    const filters = extractFilters(trimmed, { now: this.now() });

    let vector: number[];
    try {
      vector = await this.embedder.embedQuery(trimmed, { signal });
    } catch (error) {
      throw this.retrievalFailure('Could not embed the question', error, signal);
    }

    let results: RetrievalResult[];
    try {
      results = this.searcher.search(vector, filters, k, { embeddingModel: this.embedder.modelVersion });
    } catch (error) {
      throw this.retrievalFailure('Vector search failed', error, signal);
    }

    const context = assembleContext(results, this.config.contextTokenBudget);
    logger.debug('🔍 Context assembled', {
      retrieved: results.length,
      included: context.blocks.length,
      tokensUsed: context.tokensUsed,
      truncated: context.truncated,
      filters,
    });

    const history = this.config.historyTurns > 0 ? session.history.slice(-this.config.historyTurns) : [];
    return { filters, context, messages: buildMessages({ question: trimmed, contextText: context.text, filters, history }) };
  }

  private retrievalFailure(message: string, error: unknown, signal: AbortSignal): RegDocError {
    if (signal.aborted) return this.toQueryError(error, signal);
    const code = error instanceof RegDocError ? error.code : undefined;
    logger.error(`❌ ${message}`, { error: getErrorMessage(error), code });
    return new RetrievalError(message, { originalError: getErrorMessage(error), cause: code });
  }

  private toQueryError(error: unknown, signal: AbortSignal): RegDocError {
    const reason: unknown = signal.reason;
    if (reason instanceof TimeoutError) {
      return new LLMError(ErrorCode.LLM_TIMEOUT, `Query timed out after ${reason.timeoutMs}ms`, {
        timeoutMs: reason.timeoutMs,
      });
    }
    if (error instanceof RegDocError) return error;
    return toLLMError(error, signal);
  }
}
