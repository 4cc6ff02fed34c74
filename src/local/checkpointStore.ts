/**
 * @fileOverview: Durable scheduler state: ingestion checkpoint, in-flight run state, retry queue and run log
 * @module: CheckpointStore
 * @keyFunctions:
 *   - loadCheckpoint()/saveCheckpoint(): Single-row cursor of the last completed incremental window
 *   - saveRunState()/loadRunState(): Stage outputs persisted after each completed stage
 *   - enqueueRetries()/listRetries()/removeRetries(): Documents to merge into the next run
 *   - dropExhaustedRetries(): Remove entries that reached the attempt cap
 *   - finishRun(): Atomically record the run, advance the checkpoint and clear the run state
 * @dependencies:
 *   - better-sqlite3: Persistence
 *   - zod: Validation of JSON state read back from disk
 * @context: Only the update scheduler writes here; the checkpoint is passed around explicitly rather than held in a global
 */

import { z } from 'zod';
import { RegDocDatabase, toStorageError } from './database';
import { ErrorCode, StorageError } from '../utils/errorHandler';
import {
  Document,
  IngestionCheckpoint,
  PipelineRun,
  RetryQueueEntry,
  RunState,
} from '../shared/types';

const AgencySchema = z.object({
  id: z.string(),
  name: z.string(),
  shortName: z.string().optional(),
});

export const DocumentSchema = z.object({
  sourceId: z.string().min(1),
  title: z.string().min(1),
  agency: AgencySchema,
  publicationDate: z.string(),
  documentType: z.string(),
  abstract: z.string(),
  text: z.string(),
  checksum: z.string(),
  revision: z.string().nullable(),
  lastFetchedAt: z.string(),
  lastModifiedAt: z.string(),
  url: z.string().optional(),
});

const ChunkDraftSchema = z.object({
  sequence: z.number().int().min(0),
  text: z.string(),
  tokenCount: z.number().int(),
  startOffset: z.number().int(),
  endOffset: z.number().int(),
  overlapTokens: z.number().int(),
});

const ChunkSchema = ChunkDraftSchema.extend({
  documentId: z.string(),
  embedding: z.array(z.number()),
  embeddingModel: z.string(),
});

const StageSchema = z.enum(['Fetching', 'Processing', 'Embedding', 'Committing']);

const RunStateSchema = z.object({
  runId: z.string(),
  kind: z.enum(['incremental', 'backfill']),
  startedAt: z.string(),
  windowStart: z.string().nullable(),
  windowEnd: z.string(),
  lastCompletedStage: StageSchema.nullable(),
  candidates: z.array(DocumentSchema),
  processed: z.array(z.object({ document: DocumentSchema, chunks: z.array(ChunkDraftSchema) })),
  embedded: z.array(z.object({ document: DocumentSchema, chunks: z.array(ChunkSchema) })),
  failures: z.array(z.object({ sourceId: z.string(), stage: StageSchema, error: z.string() })),
  skipped: z.number().int(),
  pageErrors: z.number().int(),
});

const CheckpointStatusSchema = z.enum(['success', 'partial']);
const RunStatusSchema = z.enum(['success', 'partial', 'failed']);
const RunKindSchema = z.enum(['incremental', 'backfill']);

interface CheckpointRow {
  cursor: string | null;
  status: string;
  completed_at: string;
  documents_committed: number;
}

interface RetryRow {
  source_id: string;
  document_json: string;
  attempts: number;
  last_error: string;
  enqueued_at: string;
}

interface PipelineRunRow {
  run_id: string;
  kind: string;
  started_at: string;
  finished_at: string;
  status: string;
  window_start: string | null;
  window_end: string;
  documents_fetched: number;
  documents_skipped: number;
  documents_committed: number;
  documents_failed: number;
  page_errors: number;
  error_message: string | null;
  documents_abandoned: number;
}

function parseJson<T>(schema: z.ZodType<T>, json: string, what: string): T {
  const parsed = schema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    throw new StorageError(ErrorCode.STORAGE_FAILED, `Stored ${what} is malformed`, {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export class CheckpointStore {
  constructor(private readonly database: RegDocDatabase) {}

  loadCheckpoint(): IngestionCheckpoint | null {
    const row = this.read('load checkpoint', () =>
      this.database.db
        .prepare<[], CheckpointRow>(
          'SELECT cursor, status, completed_at, documents_committed FROM ingestion_checkpoint WHERE id = 1'
        )
        .get()
    );
    if (!row) return null;

    return {
      cursor: row.cursor,
      status: CheckpointStatusSchema.parse(row.status),
      completedAt: row.completed_at,
      documentsCommitted: row.documents_committed,
    };
  }

  saveCheckpoint(checkpoint: IngestionCheckpoint): void {
    this.write('save checkpoint', () => {
      this.database.db
        .prepare<[string | null, string, string, number]>(
          `INSERT INTO ingestion_checkpoint (id, cursor, status, completed_at, documents_committed)
           VALUES (1, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             cursor = excluded.cursor,
             status = excluded.status,
             completed_at = excluded.completed_at,
             documents_committed = excluded.documents_committed`
        )
        .run(checkpoint.cursor, checkpoint.status, checkpoint.completedAt, checkpoint.documentsCommitted);
    });
  }

  loadRunState(): RunState | null {
    const row = this.read('load run state', () =>
      this.database.db.prepare<[], { state_json: string }>('SELECT state_json FROM run_state WHERE id = 1').get()
    );
    return row ? parseJson(RunStateSchema, row.state_json, 'run state') : null;
  }

  saveRunState(state: RunState): void {
    this.write('save run state', () => {
      this.database.db
        .prepare<[string, string]>(
          `INSERT INTO run_state (id, run_id, state_json) VALUES (1, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             run_id = excluded.run_id,
             state_json = excluded.state_json,
             updated_at = CURRENT_TIMESTAMP`
        )
        .run(state.runId, JSON.stringify(state));
    });
  }

  clearRunState(): void {
    this.write('clear run state', () => {
      this.database.db.prepare('DELETE FROM run_state WHERE id = 1').run();
    });
  }

  /**
   * Add documents to the retry queue; an id already queued keeps one entry with its attempts incremented
   */
  enqueueRetries(entries: ReadonlyArray<{ document: Document; error: string }>, now: Date = new Date()): void {
    if (entries.length === 0) return;
    this.write('enqueue retries', () => {
      const stmt = this.database.db.prepare<[string, string, string, string]>(
        `INSERT INTO retry_queue (source_id, document_json, attempts, last_error, enqueued_at)
         VALUES (?, ?, 1, ?, ?)
         ON CONFLICT(source_id) DO UPDATE SET
           document_json = excluded.document_json,
           attempts = retry_queue.attempts + 1,
           last_error = excluded.last_error`
      );
      this.database.transaction(() => {
        for (const { document, error } of entries) {
          stmt.run(document.sourceId, JSON.stringify(document), error, now.toISOString());
        }
      });
    });
  }

  listRetries(): RetryQueueEntry[] {
    const rows = this.read('list retries', () =>
      this.database.db
        .prepare<[], RetryRow>(
          'SELECT source_id, document_json, attempts, last_error, enqueued_at FROM retry_queue ORDER BY enqueued_at, source_id'
        )
        .all()
    );
    return rows.map(row => ({
      document: parseJson(DocumentSchema, row.document_json, `retry entry ${row.source_id}`),
      attempts: row.attempts,
      lastError: row.last_error,
      enqueuedAt: row.enqueued_at,
    }));
  }

  removeRetries(sourceIds: readonly string[]): void {
    if (sourceIds.length === 0) return;
    this.write('remove retries', () => {
      const stmt = this.database.db.prepare<[string]>('DELETE FROM retry_queue WHERE source_id = ?');
      this.database.transaction(() => {
        for (const sourceId of sourceIds) stmt.run(sourceId);
      });
    });
  }

  /**
   * Remove and return queued documents that have failed `maxAttempts` runs or more
   */
  dropExhaustedRetries(maxAttempts: number): RetryQueueEntry[] {
    const exhausted = this.listRetries().filter(entry => entry.attempts >= maxAttempts);
    this.removeRetries(exhausted.map(entry => entry.document.sourceId));
    return exhausted;
  }

  /**
   * Record a finished run; when `checkpoint` is given it is saved in the same transaction.
   * The run state is cleared either way.
   */
  finishRun(run: PipelineRun, checkpoint: IngestionCheckpoint | null): void {
    this.write('finish run', () => {
      this.database.transaction(() => {
        this.insertRun(run);
        if (checkpoint) this.saveCheckpoint(checkpoint);
        this.clearRunState();
      });
    });
  }

  listRuns(limit: number = 10): PipelineRun[] {
    const rows = this.read('list runs', () =>
      this.database.db
        .prepare<[number], PipelineRunRow>('SELECT * FROM pipeline_runs ORDER BY started_at DESC, run_id DESC LIMIT ?')
        .all(limit)
    );
    return rows.map(row => ({
      runId: row.run_id,
      kind: RunKindSchema.parse(row.kind),
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      status: RunStatusSchema.parse(row.status),
      windowStart: row.window_start,
      windowEnd: row.window_end,
      documentsFetched: row.documents_fetched,
      documentsSkipped: row.documents_skipped,
      documentsCommitted: row.documents_committed,
      documentsFailed: row.documents_failed,
      documentsAbandoned: row.documents_abandoned,
      pageErrors: row.page_errors,
      errorMessage: row.error_message,
    }));
  }

  private insertRun(run: PipelineRun): void {
    this.database.db
      .prepare<
        [
          string,
          string,
          string,
          string,
          string,
          string | null,
          string,
          number,
          number,
          number,
          number,
          number,
          number,
          string | null,
        ]
      >(
        `INSERT OR REPLACE INTO pipeline_runs (
           run_id, kind, started_at, finished_at, status, window_start, window_end, documents_fetched,
           documents_skipped, documents_committed, documents_failed, documents_abandoned, page_errors, error_message
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        run.runId,
        run.kind,
        run.startedAt,
        run.finishedAt,
        run.status,
        run.windowStart,
        run.windowEnd,
        run.documentsFetched,
        run.documentsSkipped,
        run.documentsCommitted,
        run.documentsFailed,
        run.documentsAbandoned,
        run.pageErrors,
        run.errorMessage
      );
  }

  private read<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw toStorageError(error, operation);
    }
  }

  private write(operation: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      throw toStorageError(error, operation);
    }
  }
}
