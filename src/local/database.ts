/**
 * @fileOverview: SQLite connection, schema management and shared storage helpers
 * @module: Database
 * @keyFunctions:
 *   - RegDocDatabase.open(): Open (or create) the database and apply the schema
 *   - transaction(): Run a function inside a single SQLite transaction
 *   - toStorageError(): Map driver failures onto StorageError codes
 *   - encodeVector()/decodeVector(): BLOB serialization for embeddings
 * @dependencies:
 *   - better-sqlite3: Synchronous SQLite driver
 * @context: One database file holds documents, chunks, the embedding cache and all scheduler state; WAL mode lets queries read while a run commits
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { ErrorCode, StorageError, getErrorMessage } from '../utils/errorHandler';

export const CURRENT_SCHEMA_VERSION = 2;

const SCHEMA_SQL = `
  -- Schema version tracking table
  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    description TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS agencies (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    short_name TEXT,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS documents (
    source_id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    agency_id TEXT NOT NULL,
    publication_date TEXT NOT NULL,
    document_type TEXT NOT NULL,
    abstract TEXT NOT NULL DEFAULT '',
    text TEXT NOT NULL,
    checksum TEXT NOT NULL,
    revision TEXT,
    url TEXT,
    last_fetched_at TEXT NOT NULL,
    last_modified_at TEXT NOT NULL,
    embedding_model TEXT,
    chunk_count INTEGER NOT NULL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (agency_id) REFERENCES agencies(id)
  );

  CREATE INDEX IF NOT EXISTS idx_documents_agency ON documents(agency_id);
  CREATE INDEX IF NOT EXISTS idx_documents_publication_date ON documents(publication_date);
  CREATE INDEX IF NOT EXISTS idx_documents_type ON documents(document_type);

  CREATE TABLE IF NOT EXISTS chunks (
    document_id TEXT NOT NULL,
    sequence INTEGER NOT NULL CHECK (sequence >= 0),
    text TEXT NOT NULL,
    token_count INTEGER NOT NULL,
    start_offset INTEGER NOT NULL,
    end_offset INTEGER NOT NULL,
    overlap_tokens INTEGER NOT NULL DEFAULT 0,
    embedding BLOB NOT NULL,
    embedding_model TEXT NOT NULL,
    dimensions INTEGER NOT NULL,
    PRIMARY KEY (document_id, sequence),
    FOREIGN KEY (document_id) REFERENCES documents(source_id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS embedding_cache (
    content_hash TEXT NOT NULL,
    model_version TEXT NOT NULL,
    dimensions INTEGER NOT NULL,
    embedding BLOB NOT NULL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (content_hash, model_version)
  );

  -- Single-row stores owned by the update scheduler
  CREATE TABLE IF NOT EXISTS ingestion_checkpoint (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    cursor TEXT,
    status TEXT NOT NULL,
    completed_at TEXT NOT NULL,
    documents_committed INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS run_state (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    run_id TEXT NOT NULL,
    state_json TEXT NOT NULL,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS retry_queue (
    source_id TEXT PRIMARY KEY,
    document_json TEXT NOT NULL,
    attempts INTEGER NOT NULL,
    last_error TEXT NOT NULL,
    enqueued_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS pipeline_runs (
    run_id TEXT PRIMARY KEY,
    kind TEXT NOT NULL,
    started_at TEXT NOT NULL,
    finished_at TEXT NOT NULL,
    status TEXT NOT NULL,
    window_start TEXT,
    window_end TEXT NOT NULL,
    documents_fetched INTEGER NOT NULL,
    documents_skipped INTEGER NOT NULL,
    documents_committed INTEGER NOT NULL,
    documents_failed INTEGER NOT NULL,
    page_errors INTEGER NOT NULL,
    error_message TEXT,
    documents_abandoned INTEGER NOT NULL DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS idx_pipeline_runs_started ON pipeline_runs(started_at);
`;

export class RegDocDatabase {
  readonly db: Database.Database;
  readonly path: string;

  private constructor(db: Database.Database, dbPath: string) {
    this.db = db;
    this.path = dbPath;
  }

  /**
   * Open the database at `dbPath` (":memory:" for an in-process database) and apply the schema
   */
  static open(dbPath: string): RegDocDatabase {
    let db: Database.Database;
    try {
      if (dbPath !== ':memory:') {
        const dbDir = path.dirname(dbPath);
        if (!fs.existsSync(dbDir)) {
          fs.mkdirSync(dbDir, { recursive: true });
        }
      }
      db = new Database(dbPath);
    } catch (error) {
      logger.error('❌ Failed to open SQLite database', { error: getErrorMessage(error), path: dbPath });
      throw new StorageError(ErrorCode.STORAGE_UNAVAILABLE, `Cannot open database at ${dbPath}`, {
        originalError: getErrorMessage(error),
      });
    }

    const database = new RegDocDatabase(db, dbPath);
    try {
      database.configure();
      database.migrate();
    } catch (error) {
      db.close();
      throw toStorageError(error, 'initialize schema');
    }

    logger.info('✅ SQLite database opened', { path: dbPath, schemaVersion: CURRENT_SCHEMA_VERSION });
    return database;
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Run `fn` in one transaction; any throw rolls everything back
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (!this.db.open) return;
    this.db.close();
    logger.info('✅ Database connection closed', { path: this.path });
  }

  private configure(): void {
    this.db.pragma('foreign_keys = ON');
    if (this.path !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 5000');
    }
  }

  private migrate(): void {
    const versionRow = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'"
      )
      .get();

    let currentVersion = 0;
    if (versionRow) {
      const row = this.db
        .prepare<[], { version: number }>('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1')
        .get();
      currentVersion = row?.version ?? 0;
    }

    if (currentVersion > CURRENT_SCHEMA_VERSION) {
      throw new StorageError(
        ErrorCode.STORAGE_UNAVAILABLE,
        `Database schema version ${currentVersion} is newer than supported version ${CURRENT_SCHEMA_VERSION}`
      );
    }

    if (currentVersion === CURRENT_SCHEMA_VERSION) return;

    this.transaction(() => {
      if (currentVersion === 1) {
        this.db.exec('ALTER TABLE pipeline_runs ADD COLUMN documents_abandoned INTEGER NOT NULL DEFAULT 0');
      }
      this.db.exec(SCHEMA_SQL);
      this.db
        .prepare('INSERT OR REPLACE INTO schema_version (version, description) VALUES (?, ?)')
        .run(CURRENT_SCHEMA_VERSION, 'documents, chunks, embedding cache, scheduler state and retry cap');
    });
    logger.info('✅ Database schema is up to date', { from: currentVersion, to: CURRENT_SCHEMA_VERSION });
  }
}

/**
 * Map a driver error onto the storage taxonomy
 */
export function toStorageError(error: unknown, operation: string): StorageError {
  if (error instanceof StorageError) return error;

  const message = getErrorMessage(error);
  const sqliteCode: unknown = typeof error === 'object' && error !== null ? Reflect.get(error, 'code') : undefined;

  let code = ErrorCode.STORAGE_FAILED;
  if (typeof sqliteCode === 'string' && sqliteCode.startsWith('SQLITE_CONSTRAINT')) {
    code = ErrorCode.STORAGE_CONSTRAINT;
  } else if (
    message.includes('database connection is not open') ||
    (typeof sqliteCode === 'string' && /SQLITE_(CANTOPEN|BUSY|LOCKED|IOERR)/.test(sqliteCode))
  ) {
    code = ErrorCode.STORAGE_UNAVAILABLE;
  }

  return new StorageError(code, `Storage operation failed (${operation}): ${message}`, {
    operation,
    sqliteCode: typeof sqliteCode === 'string' ? sqliteCode : undefined,
  });
}

export function encodeVector(vector: readonly number[]): Buffer {
  return Buffer.from(JSON.stringify(vector));
}

export function decodeVector(blob: Buffer): number[] {
  const parsed: unknown = JSON.parse(blob.toString('utf8'));
  if (!Array.isArray(parsed)) {
    throw new StorageError(ErrorCode.STORAGE_FAILED, 'Stored embedding is not an array');
  }
  const vector: number[] = [];
  for (const value of parsed) {
    if (typeof value !== 'number') {
      throw new StorageError(ErrorCode.STORAGE_FAILED, 'Stored embedding contains a non-numeric value');
    }
    vector.push(value);
  }
  return vector;
}
