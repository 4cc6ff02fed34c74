/**
 * @fileOverview: Centralized error taxonomy and handling for the regulatory document assistant
 * @module: ErrorHandler
 * @keyFunctions:
 *   - createError(): Standardized error record creation with context
 *   - isRetryableError(): Decide whether an error record should trigger a retry
 *   - isTransientError(): Detect timeouts, rate limits and connection failures on raw errors
 *   - toErrorResponse(): Structured error payload for query callers
 * @context: Every component raises a subclass of RegDocError so the scheduler can degrade to partial runs and the query path can answer with a structured error instead of an ungrounded reply
 */

export enum ErrorCode {
  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Chunking
  CHUNKING_CONFIG = 'CHUNKING_CONFIG',

  // Embedding service
  EMBEDDING_TIMEOUT = 'EMBEDDING_TIMEOUT',
  EMBEDDING_RATE_LIMIT = 'EMBEDDING_RATE_LIMIT',
  EMBEDDING_DIMENSION_MISMATCH = 'EMBEDDING_DIMENSION_MISMATCH',
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',

  // Storage
  STORAGE_CONSTRAINT = 'STORAGE_CONSTRAINT',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  STORAGE_FAILED = 'STORAGE_FAILED',

  // Document source
  INGESTION_FAILED = 'INGESTION_FAILED',
  INVALID_SOURCE_RESPONSE = 'INVALID_SOURCE_RESPONSE',

  // Query path
  RETRIEVAL_FAILED = 'RETRIEVAL_FAILED',
  LLM_TIMEOUT = 'LLM_TIMEOUT',
  LLM_EMPTY_RESPONSE = 'LLM_EMPTY_RESPONSE',
  LLM_FAILED = 'LLM_FAILED',

  // Generic errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ErrorRecord {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  originalError?: Error;
  timestamp?: string;
  context?: Record<string, unknown>;
}

/**
 * Structured error payload returned to callers of the query surface
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    type: string;
    message: string;
    userMessage: string;
    retryable: boolean;
  };
}

export class RegDocError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RegDocError';
    this.code = code;
    this.details = details;
    this.context = context;
  }
}

export class ConfigurationError extends RegDocError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.INVALID_CONFIG, message, details);
    this.name = 'ConfigurationError';
  }
}

/** Malformed segmentation configuration */
export class ChunkingError extends RegDocError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CHUNKING_CONFIG, message, details);
    this.name = 'ChunkingError';
  }
}

export class EmbeddingError extends RegDocError {
  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    context?: Record<string, unknown>
  ) {
    super(code, message, details, context);
    this.name = 'EmbeddingError';
  }
}

export class StorageError extends RegDocError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'StorageError';
  }
}

export class IngestionError extends RegDocError {
  public readonly page?: number;
  public readonly statusCode?: number;

  constructor(
    message: string,
    options: { page?: number; statusCode?: number; code?: ErrorCode; details?: Record<string, unknown> } = {}
  ) {
    super(options.code ?? ErrorCode.INGESTION_FAILED, message, {
      ...options.details,
      page: options.page,
      statusCode: options.statusCode,
    });
    this.name = 'IngestionError';
    this.page = options.page;
    this.statusCode = options.statusCode;
  }
}

/** Query embedding or vector search failure */
export class RetrievalError extends RegDocError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.RETRIEVAL_FAILED, message, details);
    this.name = 'RetrievalError';
  }
}

export class LLMError extends RegDocError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'LLMError';
  }
}

/**
 * Raised by withTimeout when a deadline passes
 */
export class TimeoutError extends RegDocError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(ErrorCode.TIMEOUT, `${operation} timed out after ${timeoutMs}ms`, { timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'ERR_NETWORK',
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null) {
    const property: unknown = Reflect.get(value, key);
    return property;
  }
  return undefined;
}

/**
 * Pull an HTTP status out of SDK errors (openai: `status`, axios: `response.status`)
 */
export function getStatusCode(error: unknown): number | undefined {
  const direct = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
  if (typeof direct === 'number') return direct;
  const nested = readProperty(readProperty(error, 'response'), 'status');
  return typeof nested === 'number' ? nested : undefined;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ErrorHandler {
  /**
   * Create a standardized error record from any error type
   */
  static createError(error: unknown, context?: Record<string, unknown>): ErrorRecord {
    const timestamp = new Date().toISOString();

    if (error instanceof RegDocError) {
      return {
        code: error.code,
        message: error.message,
        details: error.details,
        originalError: error,
        timestamp,
        context: { ...error.context, ...context },
      };
    }

    if (error instanceof Error) {
      const status = getStatusCode(error);
      const message = error.message.toLowerCase();

      if (status === 429 || message.includes('rate limit')) {
        return {
          code: ErrorCode.EMBEDDING_RATE_LIMIT,
          message: 'Rate limit exceeded, please try again later',
          details: { originalError: error.message, status },
          originalError: error,
          timestamp,
          context,
        };
      }

      if (ErrorHandler.isTransientError(error)) {
        const timedOut = message.includes('timeout') || message.includes('timed out');
        return {
          code: timedOut ? ErrorCode.TIMEOUT : ErrorCode.NETWORK_ERROR,
          message: timedOut ? 'Operation timed out' : 'Network connection failed',
          details: { originalError: error.message, status },
          originalError: error,
          timestamp,
          context,
        };
      }

      if (error.name === 'SqliteError') {
        return {
          code: ErrorCode.STORAGE_FAILED,
          message: 'Database operation failed',
          details: { originalError: error.message, sqliteCode: readProperty(error, 'code') },
          originalError: error,
          timestamp,
          context,
        };
      }

      return {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An internal error occurred',
        details: { originalError: error.message },
        originalError: error,
        timestamp,
        context,
      };
    }

    return {
      code: ErrorCode.UNKNOWN_ERROR,
      message: 'An unknown error occurred',
      details: { error: String(error) },
      timestamp,
      context,
    };
  }

  /**
   * Determine if an error record is retryable
   */
  static isRetryableError(error: ErrorRecord): boolean {
    if (error.details?.retryable !== undefined) {
      return Boolean(error.details.retryable);
    }

    const retryableCodes = [
      ErrorCode.NETWORK_ERROR,
      ErrorCode.TIMEOUT,
      ErrorCode.EMBEDDING_TIMEOUT,
      ErrorCode.EMBEDDING_RATE_LIMIT,
      ErrorCode.LLM_TIMEOUT,
    ];

    return retryableCodes.includes(error.code);
  }

  /**
   * Timeouts, rate limits, 5xx answers and dropped connections
   */
  static isTransientError(error: unknown): boolean {
    if (error instanceof TimeoutError) return true;
    if (error instanceof RegDocError) return ErrorHandler.isRetryableError(ErrorHandler.createError(error));

    const status = getStatusCode(error);
    if (status !== undefined) {
      return status === 408 || status === 409 || status === 429 || status >= 500;
    }

    const code = readProperty(error, 'code');
    if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) return true;

    if (error instanceof Error) {
      const name = error.name.toLowerCase();
      const message = error.message.toLowerCase();
      return (
        name.includes('timeout') ||
        name === 'apiconnectionerror' ||
        message.includes('timed out') ||
        message.includes('timeout') ||
        message.includes('socket hang up') ||
        message.includes('network error')
      );
    }

    return false;
  }

  /**
   * Create a user-friendly error message
   */
  static getUserFriendlyMessage(error: ErrorRecord): string {
    switch (error.code) {
      case ErrorCode.INVALID_CONFIG:
        return 'Please check your configuration and environment variables.';
      case ErrorCode.RETRIEVAL_FAILED:
        return 'The document index could not be searched right now. Please try again shortly.';
      case ErrorCode.LLM_TIMEOUT:
        return 'The language model took too long to answer. Please try again or ask a narrower question.';
      case ErrorCode.LLM_EMPTY_RESPONSE:
      case ErrorCode.LLM_FAILED:
        return 'The language model could not produce an answer. Please try again.';
      case ErrorCode.NETWORK_ERROR:
        return 'A required service could not be reached. Please check that it is running.';
      case ErrorCode.STORAGE_UNAVAILABLE:
      case ErrorCode.STORAGE_FAILED:
        return 'The document database is unavailable.';
      default:
        return 'An unexpected error occurred. Please try again or rephrase your question.';
    }
  }

  /**
   * Structured response for a failed query; never carries a partial answer
   */
  static toErrorResponse(error: unknown): ErrorResponse {
    const record = ErrorHandler.createError(error);
    return {
      error: {
        code: record.code,
        type: record.originalError?.name ?? 'Error',
        message: record.message,
        userMessage: ErrorHandler.getUserFriendlyMessage(record),
        retryable: ErrorHandler.isRetryableError(record),
      },
    };
  }
}

// Export convenience functions
export const createError = ErrorHandler.createError;
export const isRetryableError = ErrorHandler.isRetryableError;
export const isTransientError = ErrorHandler.isTransientError;
export const getUserFriendlyMessage = ErrorHandler.getUserFriendlyMessage;
export const toErrorResponse = ErrorHandler.toErrorResponse;
