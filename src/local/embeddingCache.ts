/**
 * @fileOverview: Embedding cache keyed by content hash and model version
 * @module: EmbeddingCache
 * @keyFunctions:
 *   - contentHash(): sha256 of the exact text
 *   - MemoryEmbeddingCache: Process-local cache for tests and one-off runs
 *   - SqliteEmbeddingCache: Persistent cache stored beside the documents
 */

import * as crypto from 'crypto';
import Database from 'better-sqlite3';
import { RegDocDatabase, decodeVector, encodeVector, toStorageError } from './database';

export interface EmbeddingCache {
  /** Cached vectors of the given length for the given hashes; hashes without one are absent from the map */
  getMany(hashes: readonly string[], modelVersion: string, dimensions: number): Map<string, number[]>;
  setMany(entries: ReadonlyArray<{ hash: string; vector: number[] }>, modelVersion: string): void;
  size(): number;
}

export function contentHash(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

export class MemoryEmbeddingCache implements EmbeddingCache {
  private entries = new Map<string, number[]>();

  getMany(hashes: readonly string[], modelVersion: string, dimensions: number): Map<string, number[]> {
    const found = new Map<string, number[]>();
    for (const hash of hashes) {
      const vector = this.entries.get(`${modelVersion}:${hash}`);
      if (vector && vector.length === dimensions) found.set(hash, vector);
    }
    return found;
  }

  setMany(entries: ReadonlyArray<{ hash: string; vector: number[] }>, modelVersion: string): void {
    for (const { hash, vector } of entries) {
      this.entries.set(`${modelVersion}:${hash}`, vector);
    }
  }

  size(): number {
    return this.entries.size;
  }
}

interface CacheRow {
  content_hash: string;
  embedding: Buffer;
}

// SQLite caps host parameters per statement
const LOOKUP_BATCH = 500;

export class SqliteEmbeddingCache implements EmbeddingCache {
  private insertStmt: Database.Statement<[string, string, number, Buffer]>;
  private countStmt: Database.Statement<[], { count: number }>;

  constructor(private readonly database: RegDocDatabase) {
    this.insertStmt = database.db.prepare<[string, string, number, Buffer]>(
      `INSERT OR REPLACE INTO embedding_cache (content_hash, model_version, dimensions, embedding)
       VALUES (?, ?, ?, ?)`
    );
    this.countStmt = database.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM embedding_cache');
  }

  getMany(hashes: readonly string[], modelVersion: string, dimensions: number): Map<string, number[]> {
    const found = new Map<string, number[]>();
    const unique = [...new Set(hashes)];

    try {
      for (let i = 0; i < unique.length; i += LOOKUP_BATCH) {
        const slice = unique.slice(i, i + LOOKUP_BATCH);
        const placeholders = slice.map(() => '?').join(', ');
        const rows = this.database.db
          .prepare<Array<string | number>, CacheRow>(
            `SELECT content_hash, embedding FROM embedding_cache
             WHERE model_version = ? AND dimensions = ? AND content_hash IN (${placeholders})`
          )
          .all(modelVersion, dimensions, ...slice);
        for (const row of rows) {
          found.set(row.content_hash, decodeVector(row.embedding));
        }
      }
    } catch (error) {
      throw toStorageError(error, 'read embedding cache');
    }

    return found;
  }

  setMany(entries: ReadonlyArray<{ hash: string; vector: number[] }>, modelVersion: string): void {
    if (entries.length === 0) return;
    try {
      this.database.transaction(() => {
        for (const { hash, vector } of entries) {
          this.insertStmt.run(hash, modelVersion, vector.length, encodeVector(vector));
        }
      });
    } catch (error) {
      throw toStorageError(error, 'write embedding cache');
    }
  }

  size(): number {
    return this.countStmt.get()?.count ?? 0;
  }
}
