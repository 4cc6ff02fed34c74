/**
 * @fileOverview: Incremental update pipeline with durable stage checkpoints
 * @module: UpdateScheduler
 * @keyFunctions:
 *   - start()/stop(): Periodic trigger on an unref'd timer
 *   - runNow(): Run (or resume) one incremental update; coalesced while another run is active
 *   - runBackfill(): Same pipeline over a publication-date range, cursor untouched
 *   - getStatus(): Read-only view of state, checkpoint and last run
 * @dependencies:
 *   - IngestionClient: Candidate documents and change detection
 *   - Chunker, EmbeddingGenerator: Processing and Embedding stages
 *   - VectorStore: Per-document transactional commits
 *   - CheckpointStore: Cursor, run state, retry queue and run log
 * @context: Idle → Fetching → Processing → Embedding → Committing → Idle, or → Failed → Idle on an unrecoverable
 * error. Run state is saved after every completed stage so a crash resumes at the next stage. Per-document
 * embedding and write failures go to the retry queue and make the run partial instead of failing it.
 */

import * as crypto from 'crypto';
import { logger } from '../utils/logger';
import { ChunkingError, ErrorCode, IngestionError, StorageError, getErrorMessage } from '../utils/errorHandler';
import { Chunker } from '../core/chunker';
import { EmbeddingGenerator } from '../local/embeddingGenerator';
import { VectorStore } from '../local/vectorStore';
import { CheckpointStore } from '../local/checkpointStore';
import { IngestionClient, IngestionEvent } from '../connector/ingestionClient';
import {
  Document,
  EmbeddedDocument,
  FailedDocument,
  IngestionCheckpoint,
  PipelineRun,
  PipelineStage,
  ProcessedDocument,
  RunKind,
  RunState,
  SchedulerState,
} from '../shared/types';

export interface UpdateSchedulerDeps {
  ingestion: IngestionClient;
  chunker: Chunker;
  embeddings: EmbeddingGenerator;
  store: VectorStore;
  checkpoints: CheckpointStore;
}

export interface UpdateSchedulerOptions {
  intervalMs: number;
  /** Failed runs before a queued document is dropped (default 3) */
  maxRetryAttempts?: number;
  now?: () => Date;
}

// Timers hold their delay in a signed 32-bit integer
export const MAX_INTERVAL_MS = 2147483647;

export type TriggerResult = { status: 'finished'; run: PipelineRun } | { status: 'coalesced'; activeRunId: string | null };

export interface SchedulerStatus {
  state: SchedulerState;
  activeRunId: string | null;
  checkpoint: IngestionCheckpoint | null;
  lastRun: PipelineRun | null;
  /** Unfinished run left by a previous process */
  resumable: { runId: string; lastCompletedStage: PipelineStage | null } | null;
  pendingRetries: number;
  nextRunAt: string | null;
}

/** Errors that end the run as Failed rather than degrading it */
function isUnrecoverable(error: unknown): boolean {
  if (error instanceof ChunkingError) return true;
  if (error instanceof StorageError) return error.code === ErrorCode.STORAGE_UNAVAILABLE;
  return false;
}

export class UpdateScheduler {
  private state: SchedulerState = 'Idle';
  private activeRunId: string | null = null;
  private active: Promise<TriggerResult> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private nextRunAt: Date | null = null;
  private readonly now: () => Date;
  private readonly maxRetryAttempts: number;

  constructor(
    private readonly deps: UpdateSchedulerDeps,
    private readonly options: UpdateSchedulerOptions
  ) {
    if (!(options.intervalMs > 0 && options.intervalMs <= MAX_INTERVAL_MS)) {
      throw new RangeError(`intervalMs must be between 1 and ${MAX_INTERVAL_MS}, got ${options.intervalMs}`);
    }
    this.maxRetryAttempts = options.maxRetryAttempts ?? 3;
    if (!Number.isInteger(this.maxRetryAttempts) || this.maxRetryAttempts < 1) {
      throw new RangeError(`maxRetryAttempts must be a positive integer, got ${this.maxRetryAttempts}`);
    }
    this.now = options.now ?? (() => new Date());
  }

  start(options: { runImmediately?: boolean } = {}): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.triggerScheduled(), this.options.intervalMs);
    this.timer.unref();
    this.nextRunAt = new Date(this.now().getTime() + this.options.intervalMs);
    logger.info('⏰ Update scheduler started', {
      intervalMs: this.options.intervalMs,
      nextRunAt: this.nextRunAt.toISOString(),
    });

    if (options.runImmediately || this.deps.checkpoints.loadRunState()) {
      this.triggerScheduled();
    }
  }

  /**
   * Clear the timer and wait for an active run to settle
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.nextRunAt = null;
      logger.info('⏹️ Update scheduler stopped');
    }
    if (this.active) {
      await this.active;
    }
  }

  /**
   * Resume an unfinished run if one is stored, otherwise run the incremental window since the checkpoint
   */
  runNow(): Promise<TriggerResult> {
    return this.exclusive(async () => {
      const pending = this.deps.checkpoints.loadRunState();
      return this.execute(pending ?? this.newIncrementalRun());
    });
  }

  /**
   * Index documents published between two dates (inclusive, YYYY-MM-DD). An unfinished earlier run is
   * completed first.
   */
  runBackfill(startDate: string, endDate: string): Promise<TriggerResult> {
    return this.exclusive(async () => {
      const pending = this.deps.checkpoints.loadRunState();
      if (pending) {
        await this.execute(pending);
      }
      return this.execute(this.newRun('backfill', startDate, endDate));
    });
  }

  getStatus(): SchedulerStatus {
    const pending = this.deps.checkpoints.loadRunState();
    return {
      state: this.state,
      activeRunId: this.activeRunId,
      checkpoint: this.deps.checkpoints.loadCheckpoint(),
      lastRun: this.deps.checkpoints.listRuns(1)[0] ?? null,
      resumable:
        pending && pending.runId !== this.activeRunId
          ? { runId: pending.runId, lastCompletedStage: pending.lastCompletedStage }
          : null,
      pendingRetries: this.deps.checkpoints.listRetries().length,
      nextRunAt: this.nextRunAt ? this.nextRunAt.toISOString() : null,
    };
  }

  get currentState(): SchedulerState {
    return this.state;
  }

  private triggerScheduled(): void {
    if (this.timer) {
      this.nextRunAt = new Date(this.now().getTime() + this.options.intervalMs);
    }
    this.runNow()
      .then(result => {
        if (result.status === 'coalesced') {
          logger.debug('🔁 Scheduled update coalesced with the active run', { activeRunId: result.activeRunId });
        }
      })
      .catch(error => {
        logger.error('❌ Scheduled update crashed', { error: getErrorMessage(error) });
      });
  }

  private async exclusive(fn: () => Promise<TriggerResult>): Promise<TriggerResult> {
    if (this.active) {
      return { status: 'coalesced', activeRunId: this.activeRunId };
    }

    const run = fn();
    this.active = run;
    try {
      return await run;
    } finally {
      this.active = null;
      this.activeRunId = null;
      this.state = 'Idle';
    }
  }

  private newIncrementalRun(): RunState {
    const window = this.deps.ingestion.incrementalWindow(this.deps.checkpoints.loadCheckpoint(), this.now());
    return this.newRun('incremental', window.since, window.before);
  }

  private newRun(kind: RunKind, windowStart: string | null, windowEnd: string): RunState {
    return {
      runId: crypto.randomUUID(),
      kind,
      startedAt: this.now().toISOString(),
      windowStart,
      windowEnd,
      lastCompletedStage: null,
      candidates: [],
      processed: [],
      embedded: [],
      failures: [],
      skipped: 0,
      pageErrors: 0,
    };
  }

  private async execute(run: RunState): Promise<TriggerResult> {
    this.activeRunId = run.runId;
    if (run.lastCompletedStage) {
      logger.info('♻️ Resuming unfinished update run', {
        runId: run.runId,
        lastCompletedStage: run.lastCompletedStage,
      });
    } else {
      logger.info('🚀 Update run started', {
        runId: run.runId,
        kind: run.kind,
        windowStart: run.windowStart,
        windowEnd: run.windowEnd,
      });
    }

    let state = run;
    try {
      if (!state.lastCompletedStage) {
        state = this.completeStage(await this.fetchStage(state), 'Fetching');
      }
      if (state.lastCompletedStage === 'Fetching') {
        state = this.completeStage(this.processStage(state), 'Processing');
      }
      if (state.lastCompletedStage === 'Processing') {
        state = this.completeStage(await this.embedStage(state), 'Embedding');
      }
      this.setState('Committing', state.runId);
      return { status: 'finished', run: this.commitStage(state) };
    } catch (error) {
      return { status: 'finished', run: this.fail(state, error) };
    }
  }

  private completeStage(state: RunState, stage: PipelineStage): RunState {
    const next = { ...state, lastCompletedStage: stage };
    this.deps.checkpoints.saveRunState(next);
    logger.debug('💾 Stage completed', { runId: state.runId, stage });
    return next;
  }

  private async fetchStage(state: RunState): Promise<RunState> {
    this.setState('Fetching', state.runId);

    const retries = this.deps.checkpoints.listRetries();
    const fetched: Document[] = [];
    let pageErrors = 0;
    let invalid = 0;
    let firstPageError: IngestionError | null = null;

    const events: AsyncGenerator<IngestionEvent> =
      state.kind === 'incremental'
        ? this.deps.ingestion.fetchWindow(
            { kind: 'updated', since: state.windowStart, before: state.windowEnd },
            { now: this.now() }
          )
        : this.deps.ingestion.fetchRange(state.windowStart ?? state.windowEnd, state.windowEnd, { now: this.now() });

    for await (const event of events) {
      switch (event.type) {
        case 'document':
          fetched.push(event.document);
          break;
        case 'page-error':
          pageErrors++;
          if (event.page === 1) firstPageError = event.error;
          break;
        case 'invalid':
          invalid++;
          logger.warn('⚠️ Skipping invalid document record', {
            page: event.page,
            sourceId: event.sourceId,
            reason: event.reason,
          });
          break;
      }
    }

    if (firstPageError && fetched.length === 0) {
      throw firstPageError;
    }

    // Queued retries first so a freshly fetched version of the same document wins
    const candidates = [...retries.map(entry => entry.document), ...fetched];
    const { changed, unchanged } = this.deps.ingestion.selectChanged(candidates, this.deps.embeddings.modelVersion);

    const queued = new Set(retries.map(entry => entry.document.sourceId));
    this.deps.checkpoints.removeRetries(unchanged.map(doc => doc.sourceId).filter(id => queued.has(id)));

    logger.info('📥 Fetch stage complete', {
      runId: state.runId,
      fetched: fetched.length,
      retried: retries.length,
      changed: changed.length,
      unchanged: unchanged.length,
      invalid,
      pageErrors,
    });

    return { ...state, candidates: changed, skipped: unchanged.length, pageErrors };
  }

  private processStage(state: RunState): RunState {
    this.setState('Processing', state.runId);

    const processed: ProcessedDocument[] = [];
    const failures: FailedDocument[] = [...state.failures];

    for (const document of state.candidates) {
      try {
        processed.push({ document, chunks: this.deps.chunker.chunk(document.text) });
      } catch (error) {
        if (isUnrecoverable(error)) throw error;
        failures.push({ sourceId: document.sourceId, stage: 'Processing', error: getErrorMessage(error) });
      }
    }

    logger.info('✂️ Processing stage complete', {
      runId: state.runId,
      documents: processed.length,
      chunks: processed.reduce((sum, item) => sum + item.chunks.length, 0),
    });

    return { ...state, processed, failures };
  }

  private async embedStage(state: RunState): Promise<RunState> {
    this.setState('Embedding', state.runId);

    const model = this.deps.embeddings.modelVersion;
    const texts = state.processed.flatMap(item => item.chunks.map(chunk => chunk.text));
    const result = await this.deps.embeddings.embedAll(texts);

    const failureAt = new Map<number, string>();
    for (const failure of result.failures) {
      for (const index of failure.inputIndices) failureAt.set(index, failure.error.message);
    }

    const embedded: EmbeddedDocument[] = [];
    const failures: FailedDocument[] = [...state.failures];
    let offset = 0;

    for (const { document, chunks } of state.processed) {
      const start = offset;
      offset += chunks.length;

      const vectors: number[][] = [];
      for (const vector of result.vectors.slice(start, offset)) {
        if (vector) vectors.push(vector);
      }
      if (vectors.length !== chunks.length) {
        const missing = result.vectors.slice(start, offset).findIndex(vector => vector === null);
        failures.push({
          sourceId: document.sourceId,
          stage: 'Embedding',
          error: failureAt.get(start + missing) ?? 'Embedding missing',
        });
        continue;
      }

      embedded.push({
        document,
        chunks: chunks.map((chunk, i) => ({
          ...chunk,
          documentId: document.sourceId,
          embedding: vectors[i],
          embeddingModel: model,
        })),
      });
    }

    logger.info('🧮 Embedding stage complete', {
      runId: state.runId,
      embedded: embedded.length,
      failed: failures.length - state.failures.length,
      cacheHits: result.cacheHits,
    });

    return { ...state, embedded, failures };
  }

  private commitStage(state: RunState): PipelineRun {
    const committed: string[] = [];
    const failures: FailedDocument[] = [...state.failures];

    for (const { document, chunks } of state.embedded) {
      try {
        this.deps.store.upsertDocument(document, chunks);
        committed.push(document.sourceId);
      } catch (error) {
        if (isUnrecoverable(error)) throw error;
        failures.push({ sourceId: document.sourceId, stage: 'Committing', error: getErrorMessage(error) });
      }
    }

    const byId = new Map(state.candidates.map(doc => [doc.sourceId, doc]));
    const retryable = failures.flatMap(failure => {
      const document = byId.get(failure.sourceId);
      return document && failure.stage !== 'Processing' ? [{ document, error: failure.error }] : [];
    });
    this.deps.checkpoints.enqueueRetries(retryable, this.now());
    this.deps.checkpoints.removeRetries(committed);

    const abandoned = this.deps.checkpoints.dropExhaustedRetries(this.maxRetryAttempts);
    if (abandoned.length > 0) {
      logger.warn('🗑️ Dropped documents from the retry queue after repeated failures', {
        runId: state.runId,
        maxAttempts: this.maxRetryAttempts,
        documents: abandoned.map(entry => ({ sourceId: entry.document.sourceId, lastError: entry.lastError })),
      });
    }

    const status = failures.length > 0 || state.pageErrors > 0 ? 'partial' : 'success';
    const finishedAt = this.now().toISOString();
    let errorMessage: string | null = null;
    if (failures.length > 0) {
      errorMessage = `${failures.length} document(s) failed`;
      if (abandoned.length > 0) {
        errorMessage += `; ${abandoned.length} dropped from the retry queue after ${this.maxRetryAttempts} attempts`;
      }
    }
    const run = this.toPipelineRun(state, {
      status,
      finishedAt,
      committed: committed.length,
      failed: failures.length,
      abandoned: abandoned.length,
      errorMessage,
    });

    this.deps.checkpoints.finishRun(run, this.nextCheckpoint(state, status, finishedAt, committed.length));

    logger.info(status === 'success' ? '✅ Update run complete' : '⚠️ Update run partially complete', {
      runId: run.runId,
      committed: committed.length,
      skipped: state.skipped,
      failed: failures.length,
      queuedForRetry: retryable.length - abandoned.length,
      abandoned: abandoned.length,
      pageErrors: state.pageErrors,
    });
    return run;
  }

  /**
   * Backfills never move the cursor. A run with failed pages keeps the old cursor so the next run covers
   * the same window again; unchanged documents are then skipped by checksum.
   */
  private nextCheckpoint(
    state: RunState,
    status: 'success' | 'partial',
    completedAt: string,
    committed: number
  ): IngestionCheckpoint | null {
    if (state.kind !== 'incremental') return null;
    const previous = this.deps.checkpoints.loadCheckpoint();
    return {
      cursor: state.pageErrors > 0 ? (previous?.cursor ?? null) : state.windowEnd,
      status,
      completedAt,
      documentsCommitted: committed,
    };
  }

  private fail(state: RunState, error: unknown): PipelineRun {
    this.setState('Failed', state.runId);
    const message = getErrorMessage(error);
    logger.error('❌ Update run failed', {
      runId: state.runId,
      stage: state.lastCompletedStage,
      error: message,
    });

    const run = this.toPipelineRun(state, {
      status: 'failed',
      finishedAt: this.now().toISOString(),
      committed: 0,
      failed: state.failures.length,
      abandoned: 0,
      errorMessage: message,
    });

    try {
      this.deps.checkpoints.finishRun(run, null);
    } catch (recordError) {
      logger.error('❌ Could not record failed run', { runId: state.runId, error: getErrorMessage(recordError) });
    }
    return run;
  }

  private toPipelineRun(
    state: RunState,
    outcome: {
      status: PipelineRun['status'];
      finishedAt: string;
      committed: number;
      failed: number;
      abandoned: number;
      errorMessage: string | null;
    }
  ): PipelineRun {
    return {
      runId: state.runId,
      kind: state.kind,
      startedAt: state.startedAt,
      finishedAt: outcome.finishedAt,
      status: outcome.status,
      windowStart: state.windowStart,
      windowEnd: state.windowEnd,
      documentsFetched: state.candidates.length + state.skipped,
      documentsSkipped: state.skipped,
      documentsCommitted: outcome.committed,
      documentsFailed: outcome.failed,
      documentsAbandoned: outcome.abandoned,
      pageErrors: state.pageErrors,
      errorMessage: outcome.errorMessage,
    };
  }

  private setState(next: SchedulerState, runId: string): void {
    logger.debug('🔀 Scheduler state', { from: this.state, to: next, runId });
    this.state = next;
  }
}
