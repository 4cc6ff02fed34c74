/**
 * @fileOverview: Composition root wiring settings into the ingestion and query components
 * @module: RegDocAssistant
 * @keyFunctions:
 *   - create(): Open the database and build every component from Settings
 *   - update()/backfill(): Trigger the update pipeline
 *   - ask(): Answer a question within a conversation session
 *   - getStatus(): Checkpoint, scheduler state, recent runs and model reachability
 * @context: One instance per process. Network-facing services can be replaced so tests run in process.
 */

import { logger } from './utils/logger';
import { Settings, getSettings } from './config/settings';
import { RegDocDatabase } from './local/database';
import { VectorStore } from './local/vectorStore';
import { CheckpointStore } from './local/checkpointStore';
import { SqliteEmbeddingCache } from './local/embeddingCache';
import { EmbeddingService, OpenAIEmbeddingService } from './local/embeddingService';
import { EmbeddingGenerator } from './local/embeddingGenerator';
import { Chunker } from './core/chunker';
import { DocumentApiClient, DocumentSource } from './client/documentApiClient';
import { IngestionClient } from './connector/ingestionClient';
import { SchedulerStatus, TriggerResult, UpdateScheduler } from './startup/updateScheduler';
import { LanguageModelService, OpenAICompatibleLLMService } from './core/llmService';
import { AnswerOptions, QueryEngine } from './core/queryEngine';
import { SessionManager, SessionReply } from './core/sessionManager';
import { PipelineRun, StoreStats } from './shared/types';

export interface AssistantOverrides {
  documentSource?: DocumentSource;
  embeddingService?: EmbeddingService;
  llm?: LanguageModelService;
  now?: () => Date;
}

export interface AssistantStatus {
  databasePath: string;
  scheduler: SchedulerStatus;
  recentRuns: PipelineRun[];
  documents: number;
  chunks: number;
  latestPublicationDate: string | null;
  /** Documents embedded by another model; invisible to search until re-indexed */
  staleDocuments: number;
  llm: { model: string; reachable: boolean };
  embeddingModel: string;
  activeSessions: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class RegDocAssistant {
  private constructor(
    readonly settings: Settings,
    readonly database: RegDocDatabase,
    readonly store: VectorStore,
    readonly checkpoints: CheckpointStore,
    readonly embeddings: EmbeddingGenerator,
    readonly scheduler: UpdateScheduler,
    readonly llm: LanguageModelService,
    readonly engine: QueryEngine,
    readonly sessions: SessionManager,
    private readonly now: () => Date
  ) {}

  static create(settings: Settings = getSettings(), overrides: AssistantOverrides = {}): RegDocAssistant {
    const now = overrides.now ?? (() => new Date());
    const database = RegDocDatabase.open(settings.dbPath);

    const store = new VectorStore(database, {
      recencyWeight: settings.retrieval.recencyWeight,
      recencyHalfLifeDays: settings.retrieval.recencyHalfLifeDays,
      now,
    });
    const checkpoints = new CheckpointStore(database);

    const embeddingService =
      overrides.embeddingService ??
      new OpenAIEmbeddingService({
        baseUrl: settings.embedding.baseUrl,
        apiKey: settings.llm.apiKey,
        model: settings.embedding.model,
        dimensions: settings.embedding.dimensions,
      });
    const embeddings = new EmbeddingGenerator(embeddingService, new SqliteEmbeddingCache(database), {
      batchSize: settings.embedding.batchSize,
      maxConcurrency: settings.embedding.maxConcurrency,
      maxAttempts: settings.embedding.maxAttempts,
      baseDelayMs: settings.embedding.baseDelayMs,
      timeoutMs: settings.embedding.timeoutMs,
    });

    const source =
      overrides.documentSource ??
      new DocumentApiClient({
        baseUrl: settings.documentApi.baseUrl,
        pageSize: settings.documentApi.pageSize,
        timeoutMs: settings.documentApi.timeoutMs,
      });
    const ingestion = new IngestionClient(source, store, {
      concurrency: settings.documentApi.concurrency,
      maxAttempts: settings.documentApi.maxAttempts,
      baseDelayMs: settings.documentApi.baseDelayMs,
      initialLookbackDays: settings.scheduler.initialLookbackDays,
    });

    const scheduler = new UpdateScheduler(
      {
        ingestion,
        chunker: new Chunker(settings.chunking),
        embeddings,
        store,
        checkpoints,
      },
      { intervalMs: settings.scheduler.intervalMs, maxRetryAttempts: settings.scheduler.maxRetryAttempts, now }
    );

    const llm =
      overrides.llm ??
      new OpenAICompatibleLLMService({
        baseUrl: settings.llm.baseUrl,
        apiKey: settings.llm.apiKey,
        model: settings.llm.model,
      });
    const engine = new QueryEngine(
      embeddings,
      store,
      llm,
      {
        topK: settings.retrieval.topK,
        contextTokenBudget: settings.retrieval.contextTokenBudget,
        historyTurns: settings.retrieval.historyTurns,
        temperature: settings.llm.temperature,
        maxOutputTokens: settings.llm.maxOutputTokens,
        timeoutMs: settings.retrieval.queryTimeoutMs,
      },
      { now }
    );
    const sessions = new SessionManager(engine, settings.sessions, { now: () => now().getTime() });

    logger.info('🚀 Regulatory document assistant ready', {
      dbPath: settings.dbPath,
      llmModel: llm.model,
      embeddingModel: embeddings.modelVersion,
    });

    return new RegDocAssistant(
      settings,
      database,
      store,
      checkpoints,
      embeddings,
      scheduler,
      llm,
      engine,
      sessions,
      now
    );
  }

  /**
   * Incremental update from the checkpoint. With `days`, re-index the publication window of the last
   * `days` days instead; that window leaves the cursor where it is.
   */
  update(options: { days?: number } = {}): Promise<TriggerResult> {
    if (options.days === undefined) {
      return this.scheduler.runNow();
    }
    if (!Number.isInteger(options.days) || options.days < 1) {
      throw new RangeError(`days must be a positive integer, got ${options.days}`);
    }
    const end = this.now();
    const start = new Date(end.getTime() - options.days * DAY_MS);
    return this.scheduler.runBackfill(isoDate(start), isoDate(end));
  }

  backfill(startDate: string, endDate: string): Promise<TriggerResult> {
    return this.scheduler.runBackfill(startDate, endDate);
  }

  ask(question: string, sessionId: string = 'default', options: AnswerOptions = {}): Promise<SessionReply> {
    return this.sessions.handleMessage(sessionId, question, options);
  }

  getStats(days: number = 30): StoreStats {
    return this.store.getStats(days);
  }

  async getStatus(): Promise<AssistantStatus> {
    const stats = this.store.getStats();
    return {
      databasePath: this.database.path,
      scheduler: this.scheduler.getStatus(),
      recentRuns: this.checkpoints.listRuns(5),
      documents: stats.totalDocuments,
      chunks: stats.totalChunks,
      latestPublicationDate: stats.latestPublicationDate,
      staleDocuments: this.store.countStaleDocuments(this.embeddings.modelVersion),
      llm: { model: this.llm.model, reachable: await this.llm.ping() },
      embeddingModel: this.embeddings.modelVersion,
      activeSessions: this.sessions.activeSessionCount,
    };
  }

  async close(): Promise<void> {
    await this.scheduler.stop();
    this.database.close();
  }
}
