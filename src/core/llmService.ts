/**
 * @fileOverview: Chat completions against an OpenAI-compatible language-model server
 * @module: LLMService
 * @keyFunctions:
 *   - generate(): One completion for a message list
 *   - stream(): Incremental text deltas for a message list
 *   - ping(): Connectivity check used by the status command
 * @dependencies:
 *   - openai: Official OpenAI SDK, pointed at Ollama or any compatible server
 *   - logger: Logging utilities
 * @context: Cancellation and deadlines arrive as an AbortSignal from the query engine; SDK errors leave this module as LLMError
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { logger } from '../utils/logger';
import { ErrorCode, LLMError, TimeoutError, getErrorMessage, getStatusCode } from '../utils/errorHandler';
import { withTimeout } from '../utils/timeout';
import { ChatMessage } from '../shared/types';

export interface GenerateRequest {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface GenerateResult {
  text: string;
  model: string;
  finishReason: string | null;
}

export interface LanguageModelService {
  readonly model: string;
  generate(request: GenerateRequest): Promise<GenerateResult>;
  /** Text deltas in order; throws LLMError like generate() */
  stream(request: GenerateRequest): AsyncGenerator<string>;
  ping(timeoutMs?: number): Promise<boolean>;
}

export interface LLMServiceConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * Map SDK and abort errors onto LLMError
 */
export function toLLMError(error: unknown, signal?: AbortSignal): LLMError {
  if (error instanceof LLMError) return error;

  const reason: unknown = signal?.reason;
  if (error instanceof TimeoutError || reason instanceof TimeoutError) {
    return new LLMError(ErrorCode.LLM_TIMEOUT, 'Language model request timed out', {
      originalError: getErrorMessage(reason instanceof TimeoutError ? reason : error),
    });
  }
  if (signal?.aborted || error instanceof OpenAI.APIUserAbortError) {
    return new LLMError(ErrorCode.LLM_TIMEOUT, 'Language model request was cancelled', {
      originalError: getErrorMessage(error),
    });
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new LLMError(ErrorCode.LLM_TIMEOUT, 'Language model request timed out', {
      originalError: error.message,
    });
  }

  return new LLMError(ErrorCode.LLM_FAILED, `Language model request failed: ${getErrorMessage(error)}`, {
    status: getStatusCode(error),
  });
}

export class OpenAICompatibleLLMService implements LanguageModelService {
  private client: OpenAI;
  readonly model: string;

  constructor(config: LLMServiceConfig, client?: OpenAI) {
    this.model = config.model;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        maxRetries: 1,
      });

    logger.info('🤖 Language model service initialized', { model: config.model, baseUrl: config.baseUrl });
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    logger.debug('Creating chat completion', {
      model: this.model,
      messagesCount: request.messages.length,
      maxTokens: request.maxTokens,
    });

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: request.messages.map(toMessageParam),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal: request.signal }
      );
    } catch (error) {
      const mapped = toLLMError(error, request.signal);
      logger.error('Chat completion failed', { model: this.model, code: mapped.code, error: mapped.message });
      throw mapped;
    }

    const choice = completion.choices?.[0];
    const text = choice?.message?.content ?? '';
    if (text.trim().length === 0) {
      throw new LLMError(ErrorCode.LLM_EMPTY_RESPONSE, 'Language model returned an empty response', {
        model: completion.model,
        finishReason: choice?.finish_reason ?? null,
      });
    }

    return { text, model: completion.model || this.model, finishReason: choice?.finish_reason ?? null };
  }

  async *stream(request: GenerateRequest): AsyncGenerator<string> {
    logger.debug('Creating streaming chat completion', {
      model: this.model,
      messagesCount: request.messages.length,
    });

    let produced = false;
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: request.messages.map(toMessageParam),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          stream: true,
        },
        { signal: request.signal }
      );

      for await (const chunk of stream) {
        const delta = chunk.choices?.[0]?.delta?.content;
        if (delta) {
          produced = produced || delta.trim().length > 0;
          yield delta;
        }
      }
    } catch (error) {
      const mapped = toLLMError(error, request.signal);
      logger.error('Streaming chat completion failed', { model: this.model, code: mapped.code, error: mapped.message });
      throw mapped;
    }

    if (!produced) {
      throw new LLMError(ErrorCode.LLM_EMPTY_RESPONSE, 'Language model returned an empty response', {
        model: this.model,
      });
    }
  }

  /**
   * List models within the deadline; false on any failure
   */
  async ping(timeoutMs: number = 3000): Promise<boolean> {
    try {
      await withTimeout('language model ping', timeoutMs, signal => this.client.models.list({ signal }));
      return true;
    } catch (error) {
      logger.debug('Language model ping failed', { error: getErrorMessage(error) });
      return false;
    }
  }
}
