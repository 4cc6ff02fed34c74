/**
 * @fileOverview: Library entry point
 * @module: regdoc-assistant
 * @context: The CLI lives in cli.ts; everything a host process needs to embed the assistant is exported here.
 */

export { RegDocAssistant } from './assistant';
export type { AssistantOverrides, AssistantStatus } from './assistant';
export { loadSettings, getSettings } from './config/settings';
export type { Settings } from './config/settings';

export { Chunker, reconstructText } from './core/chunker';
export type { ChunkerConfig } from './core/chunker';
export { EmbeddingGenerator } from './local/embeddingGenerator';
export type { EmbedAllResult, EmbedOptions, EmbeddingGeneratorConfig } from './local/embeddingGenerator';
export { OpenAIEmbeddingService } from './local/embeddingService';
export type { EmbeddingService } from './local/embeddingService';
export { MemoryEmbeddingCache, SqliteEmbeddingCache } from './local/embeddingCache';
export { RegDocDatabase } from './local/database';
export { VectorStore } from './local/vectorStore';
export { CheckpointStore } from './local/checkpointStore';
export { DocumentApiClient } from './client/documentApiClient';
export type { DocumentSource } from './client/documentApiClient';
export { IngestionClient } from './connector/ingestionClient';
export { UpdateScheduler } from './startup/updateScheduler';
export type { SchedulerStatus, TriggerResult } from './startup/updateScheduler';

export { QueryEngine } from './core/queryEngine';
export type { AnswerStreamEvent, QueryAnswer } from './core/queryEngine';
export { SessionManager } from './core/sessionManager';
export type { SessionReply } from './core/sessionManager';
export { OpenAICompatibleLLMService } from './core/llmService';
export type { LanguageModelService } from './core/llmService';
export { extractFilters } from './core/filterExtractor';

export * from './shared/types';
export * from './utils/errorHandler';
export { logger, Logger } from './utils/logger';
