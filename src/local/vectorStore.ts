/**
 * @fileOverview: Document and chunk persistence with filtered, recency-aware similarity search
 * @module: VectorStore
 * @keyFunctions:
 *   - upsertDocument(): Atomically replace a document and all of its chunks
 *   - search(): Top-k chunks by cosine similarity plus recency boost, with metadata filters
 *   - getIndexState(): Stored checksum and embedding model per document, for change detection
 *   - getStats(): Totals, top document types and recent publication activity
 * @dependencies:
 *   - better-sqlite3: Transactions and prepared statements
 *   - logger: Logging utilities
 * @context: Filters are applied in SQL before any vector is decoded; scoring runs in process because the corpus fits a single SQLite file
 */

import Database from 'better-sqlite3';
import { RegDocDatabase, decodeVector, encodeVector, toStorageError } from './database';
import { logger } from '../utils/logger';
import { ErrorCode, StorageError } from '../utils/errorHandler';
import {
  Agency,
  Chunk,
  Document,
  RetrievalResult,
  SearchFilters,
  StoreStats,
} from '../shared/types';

export interface VectorStoreOptions {
  /** Weight of the recency boost added to cosine similarity */
  recencyWeight: number;
  /** Age at which the boost has decayed to half */
  recencyHalfLifeDays: number;
  now?: () => Date;
}

export interface SearchOptions {
  /** Restrict candidates to chunks embedded by this model */
  embeddingModel?: string;
}

export interface IndexState {
  checksum: string;
  embeddingModel: string | null;
}

interface DocumentRow {
  source_id: string;
  title: string;
  agency_id: string;
  agency_name: string;
  agency_short_name: string | null;
  publication_date: string;
  document_type: string;
  abstract: string;
  text: string;
  checksum: string;
  revision: string | null;
  url: string | null;
  last_fetched_at: string;
  last_modified_at: string;
}

interface ChunkRow {
  document_id: string;
  sequence: number;
  text: string;
  token_count: number;
  start_offset: number;
  end_offset: number;
  overlap_tokens: number;
  embedding: Buffer;
  embedding_model: string;
}

interface CandidateRow {
  document_id: string;
  sequence: number;
  text: string;
  token_count: number;
  embedding: Buffer;
  title: string;
  publication_date: string;
  document_type: string;
  url: string | null;
  agency_id: string;
  agency_name: string;
  agency_short_name: string | null;
}

type DocumentParams = [
  string, string, string, string, string, string, string, string,
  string | null, string | null, string, string, string | null, number,
];
type ChunkParams = [string, number, string, number, number, number, number, Buffer, string, number];

const DAY_MS = 24 * 60 * 60 * 1000;
const IN_CLAUSE_BATCH = 500;

const DOCUMENT_SELECT = `
  SELECT d.source_id, d.title, d.agency_id, a.name AS agency_name, a.short_name AS agency_short_name,
         d.publication_date, d.document_type, d.abstract, d.text, d.checksum, d.revision, d.url,
         d.last_fetched_at, d.last_modified_at
  FROM documents d
  JOIN agencies a ON a.id = d.agency_id
`;

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Boost in (0, weight], halving every `halfLifeDays`; future dates get the full weight
 */
export function recencyBoost(publicationDate: string, now: Date, weight: number, halfLifeDays: number): number {
  const published = Date.parse(`${publicationDate}T00:00:00Z`);
  if (Number.isNaN(published)) return 0;
  const ageDays = Math.max(0, (now.getTime() - published) / DAY_MS);
  return weight * Math.pow(2, -ageDays / halfLifeDays);
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

function rowToAgency(row: { agency_id: string; agency_name: string; agency_short_name: string | null }): Agency {
  return {
    id: row.agency_id,
    name: row.agency_name,
    ...(row.agency_short_name ? { shortName: row.agency_short_name } : {}),
  };
}

function rowToDocument(row: DocumentRow): Document {
  return {
    sourceId: row.source_id,
    title: row.title,
    agency: rowToAgency(row),
    publicationDate: row.publication_date,
    documentType: row.document_type,
    abstract: row.abstract,
    text: row.text,
    checksum: row.checksum,
    revision: row.revision,
    lastFetchedAt: row.last_fetched_at,
    lastModifiedAt: row.last_modified_at,
    ...(row.url ? { url: row.url } : {}),
  };
}

function rowToChunk(row: ChunkRow): Chunk {
  return {
    documentId: row.document_id,
    sequence: row.sequence,
    text: row.text,
    tokenCount: row.token_count,
    startOffset: row.start_offset,
    endOffset: row.end_offset,
    overlapTokens: row.overlap_tokens,
    embedding: decodeVector(row.embedding),
    embeddingModel: row.embedding_model,
  };
}

export class VectorStore {
  private readonly options: Required<VectorStoreOptions>;
  private upsertAgencyStmt: Database.Statement<[string, string, string | null]>;
  private upsertDocumentStmt: Database.Statement<DocumentParams>;
  private deleteChunksStmt: Database.Statement<[string]>;
  private insertChunkStmt: Database.Statement<ChunkParams>;

  constructor(
    private readonly database: RegDocDatabase,
    options: VectorStoreOptions
  ) {
    this.options = { now: () => new Date(), ...options };

    const db = database.db;
    this.upsertAgencyStmt = db.prepare<[string, string, string | null]>(`
      INSERT INTO agencies (id, name, short_name) VALUES (?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        short_name = COALESCE(excluded.short_name, agencies.short_name),
        updated_at = CURRENT_TIMESTAMP
    `);
    this.upsertDocumentStmt = db.prepare<DocumentParams>(`
      INSERT INTO documents (
        source_id, title, agency_id, publication_date, document_type, abstract, text, checksum,
        revision, url, last_fetched_at, last_modified_at, embedding_model, chunk_count
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(source_id) DO UPDATE SET
        title = excluded.title,
        agency_id = excluded.agency_id,
        publication_date = excluded.publication_date,
        document_type = excluded.document_type,
        abstract = excluded.abstract,
        text = excluded.text,
        checksum = excluded.checksum,
        revision = excluded.revision,
        url = excluded.url,
        last_fetched_at = excluded.last_fetched_at,
        last_modified_at = excluded.last_modified_at,
        embedding_model = excluded.embedding_model,
        chunk_count = excluded.chunk_count,
        updated_at = CURRENT_TIMESTAMP
    `);
    this.deleteChunksStmt = db.prepare<[string]>('DELETE FROM chunks WHERE document_id = ?');
    this.insertChunkStmt = db.prepare<ChunkParams>(`
      INSERT INTO chunks (
        document_id, sequence, text, token_count, start_offset, end_offset, overlap_tokens,
        embedding, embedding_model, dimensions
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  /**
   * Replace the document and all of its chunks in one transaction.
   * Readers see either the previous version or the new one, never a mix.
   */
  upsertDocument(document: Document, chunks: readonly Chunk[]): void {
    this.validateChunks(document, chunks);
    const ordered = [...chunks].sort((a, b) => a.sequence - b.sequence);
    const embeddingModel = ordered.length > 0 ? ordered[0].embeddingModel : null;

    try {
      this.database.transaction(() => {
        this.upsertAgencyStmt.run(document.agency.id, document.agency.name, document.agency.shortName ?? null);
        this.upsertDocumentStmt.run(
          document.sourceId,
          document.title,
          document.agency.id,
          document.publicationDate,
          document.documentType,
          document.abstract,
          document.text,
          document.checksum,
          document.revision,
          document.url ?? null,
          document.lastFetchedAt,
          document.lastModifiedAt,
          embeddingModel,
          ordered.length
        );
        this.deleteChunksStmt.run(document.sourceId);
        for (const chunk of ordered) {
          this.insertChunkStmt.run(
            document.sourceId,
            chunk.sequence,
            chunk.text,
            chunk.tokenCount,
            chunk.startOffset,
            chunk.endOffset,
            chunk.overlapTokens,
            encodeVector(chunk.embedding),
            chunk.embeddingModel,
            chunk.embedding.length
          );
        }
      });
    } catch (error) {
      throw toStorageError(error, `upsert document ${document.sourceId}`);
    }

    logger.debug('💾 Document stored', {
      sourceId: document.sourceId,
      chunks: ordered.length,
      embeddingModel,
    });
  }

  /**
   * Up to `k` chunks ordered by score (similarity + recency boost), then newer publication date.
   * With `embeddingModel`, only chunks embedded by that model are candidates. Chunks whose vector length
   * differs from the query's cannot be compared and are left out.
   */
  search(
    queryVector: readonly number[],
    filters: SearchFilters | null | undefined,
    k: number,
    options: SearchOptions = {}
  ): RetrievalResult[] {
    if (k <= 0) return [];
    if (queryVector.length === 0) {
      throw new StorageError(ErrorCode.STORAGE_CONSTRAINT, 'Query vector must not be empty');
    }

    const { where, params } = this.buildFilterClause(filters ?? {}, options.embeddingModel);
    const sql = `
      SELECT c.document_id, c.sequence, c.text, c.token_count, c.embedding,
             d.title, d.publication_date, d.document_type, d.url,
             a.id AS agency_id, a.name AS agency_name, a.short_name AS agency_short_name
      FROM chunks c
      JOIN documents d ON d.source_id = c.document_id
      JOIN agencies a ON a.id = d.agency_id
      ${where}
    `;

    let rows: CandidateRow[];
    try {
      rows = this.database.db.prepare<string[], CandidateRow>(sql).all(...params);
    } catch (error) {
      throw toStorageError(error, 'search');
    }

    const now = this.options.now();
    let mismatched = 0;
    const scored: RetrievalResult[] = [];
    for (const row of rows) {
      const vector = decodeVector(row.embedding);
      if (vector.length !== queryVector.length) {
        mismatched++;
        continue;
      }
      const similarity = cosineSimilarity(queryVector, vector);
      const boost = recencyBoost(
        row.publication_date,
        now,
        this.options.recencyWeight,
        this.options.recencyHalfLifeDays
      );
      scored.push({
        chunk: {
          documentId: row.document_id,
          sequence: row.sequence,
          text: row.text,
          tokenCount: row.token_count,
        },
        similarity,
        score: similarity + boost,
        document: {
          sourceId: row.document_id,
          title: row.title,
          agency: rowToAgency(row),
          publicationDate: row.publication_date,
          documentType: row.document_type,
          ...(row.url ? { url: row.url } : {}),
        },
      });
    }

    if (mismatched > 0) {
      logger.warn('⚠️ Skipped chunks whose vector length differs from the query', {
        skipped: mismatched,
        queryDimensions: queryVector.length,
        embeddingModel: options.embeddingModel ?? null,
      });
    }

    scored.sort(
      (a, b) =>
        b.score - a.score ||
        b.document.publicationDate.localeCompare(a.document.publicationDate) ||
        a.chunk.documentId.localeCompare(b.chunk.documentId) ||
        a.chunk.sequence - b.chunk.sequence
    );

    logger.debug('🔍 Vector search completed', {
      candidates: rows.length,
      returned: Math.min(k, scored.length),
      filters,
    });

    return scored.slice(0, k);
  }

  getDocument(sourceId: string): Document | null {
    try {
      const row = this.database.db
        .prepare<[string], DocumentRow>(`${DOCUMENT_SELECT} WHERE d.source_id = ?`)
        .get(sourceId);
      return row ? rowToDocument(row) : null;
    } catch (error) {
      throw toStorageError(error, 'get document');
    }
  }

  getChunks(sourceId: string): Chunk[] {
    try {
      return this.database.db
        .prepare<[string], ChunkRow>(
          `SELECT document_id, sequence, text, token_count, start_offset, end_offset, overlap_tokens,
                  embedding, embedding_model
           FROM chunks WHERE document_id = ? ORDER BY sequence`
        )
        .all(sourceId)
        .map(rowToChunk);
    } catch (error) {
      throw toStorageError(error, 'get chunks');
    }
  }

  /**
   * Stored checksum and embedding model for each known id; unknown ids are absent
   */
  getIndexState(sourceIds: readonly string[]): Map<string, IndexState> {
    const states = new Map<string, IndexState>();
    const unique = [...new Set(sourceIds)];

    try {
      for (let i = 0; i < unique.length; i += IN_CLAUSE_BATCH) {
        const slice = unique.slice(i, i + IN_CLAUSE_BATCH);
        const rows = this.database.db
          .prepare<string[], { source_id: string; checksum: string; embedding_model: string | null }>(
            `SELECT source_id, checksum, embedding_model FROM documents
             WHERE source_id IN (${slice.map(() => '?').join(', ')})`
          )
          .all(...slice);
        for (const row of rows) {
          states.set(row.source_id, { checksum: row.checksum, embeddingModel: row.embedding_model });
        }
      }
    } catch (error) {
      throw toStorageError(error, 'read checksums');
    }

    return states;
  }

  getChecksums(sourceIds: readonly string[]): Map<string, string> {
    const checksums = new Map<string, string>();
    for (const [sourceId, state] of this.getIndexState(sourceIds)) {
      checksums.set(sourceId, state.checksum);
    }
    return checksums;
  }

  deleteDocument(sourceId: string): boolean {
    try {
      const result = this.database.db.prepare<[string]>('DELETE FROM documents WHERE source_id = ?').run(sourceId);
      return result.changes > 0;
    } catch (error) {
      throw toStorageError(error, 'delete document');
    }
  }

  listAgencies(): Agency[] {
    try {
      return this.database.db
        .prepare<[], { agency_id: string; agency_name: string; agency_short_name: string | null }>(
          'SELECT id AS agency_id, name AS agency_name, short_name AS agency_short_name FROM agencies ORDER BY name'
        )
        .all()
        .map(rowToAgency);
    } catch (error) {
      throw toStorageError(error, 'list agencies');
    }
  }

  /**
   * Documents whose chunks were embedded by a model other than `embeddingModel`; search skips them until
   * they are re-indexed
   */
  countStaleDocuments(embeddingModel: string): number {
    try {
      const row = this.database.db
        .prepare<[string], { count: number }>(
          'SELECT COUNT(*) AS count FROM documents WHERE embedding_model IS NOT NULL AND embedding_model != ?'
        )
        .get(embeddingModel);
      return row?.count ?? 0;
    } catch (error) {
      throw toStorageError(error, 'count stale documents');
    }
  }

  getStats(days: number = 30): StoreStats {
    const since = new Date(this.options.now().getTime() - days * DAY_MS).toISOString().slice(0, 10);
    const db = this.database.db;

    try {
      const totals = db
        .prepare<[], { documents: number; chunks: number; latest: string | null }>(
          `SELECT (SELECT COUNT(*) FROM documents) AS documents,
                  (SELECT COUNT(*) FROM chunks) AS chunks,
                  (SELECT MAX(publication_date) FROM documents) AS latest`
        )
        .get();

      const topDocumentTypes = db
        .prepare<[], { documentType: string; count: number }>(
          `SELECT document_type AS documentType, COUNT(*) AS count FROM documents
           GROUP BY document_type ORDER BY count DESC, document_type LIMIT 5`
        )
        .all();

      const recentActivity = db
        .prepare<[string], { date: string; count: number }>(
          `SELECT publication_date AS date, COUNT(*) AS count FROM documents
           WHERE publication_date >= ? GROUP BY publication_date ORDER BY publication_date DESC`
        )
        .all(since);

      const documentsByAgency = db
        .prepare<[], { agency: string; count: number }>(
          `SELECT a.name AS agency, COUNT(*) AS count FROM documents d
           JOIN agencies a ON a.id = d.agency_id
           GROUP BY a.id ORDER BY count DESC, a.name`
        )
        .all();

      return {
        totalDocuments: totals?.documents ?? 0,
        totalChunks: totals?.chunks ?? 0,
        topDocumentTypes,
        recentActivity,
        documentsByAgency,
        latestPublicationDate: totals?.latest ?? null,
      };
    } catch (error) {
      throw toStorageError(error, 'stats');
    }
  }

  private validateChunks(document: Document, chunks: readonly Chunk[]): void {
    const fail = (message: string, details: Record<string, unknown> = {}): never => {
      throw new StorageError(ErrorCode.STORAGE_CONSTRAINT, message, { sourceId: document.sourceId, ...details });
    };

    if (!document.sourceId || !document.title) {
      fail('Document requires a source id and a title');
    }

    const sequences = chunks.map(chunk => chunk.sequence).sort((a, b) => a - b);
    sequences.forEach((sequence, index) => {
      if (sequence !== index) fail('Chunk sequences must be gapless from 0', { sequences });
    });

    for (const chunk of chunks) {
      if (chunk.documentId !== document.sourceId) {
        fail('Chunk belongs to a different document', { chunkDocumentId: chunk.documentId });
      }
    }

    const models = new Set(chunks.map(chunk => chunk.embeddingModel));
    if (models.size > 1) {
      fail('All chunks of a document must share one embedding model', { models: [...models] });
    }

    const dimensions = new Set(chunks.map(chunk => chunk.embedding.length));
    if (dimensions.size > 1 || dimensions.has(0)) {
      fail('All chunk embeddings must be non-empty with equal dimensionality', { dimensions: [...dimensions] });
    }
  }

  private buildFilterClause(filters: SearchFilters, embeddingModel?: string): { where: string; params: string[] } {
    const clauses: string[] = [];
    const params: string[] = [];

    if (embeddingModel) {
      clauses.push('c.embedding_model = ?');
      params.push(embeddingModel);
    }

    const agencies = (filters.agencies ?? []).map(value => value.trim().toLowerCase()).filter(Boolean);
    if (agencies.length > 0) {
      // Agency names may be a comma-joined list when a document has several issuers
      const perAgency = agencies.map(value => {
        const pattern = `%, ${escapeLike(value)},%`;
        params.push(value, pattern, pattern);
        return `(LOWER(a.id) = ? OR (', ' || LOWER(a.name) || ',') LIKE ? ESCAPE '\\' OR (', ' || LOWER(COALESCE(a.short_name, '')) || ',') LIKE ? ESCAPE '\\')`;
      });
      clauses.push(`(${perAgency.join(' OR ')})`);
    }

    if (filters.startDate) {
      clauses.push('d.publication_date >= ?');
      params.push(filters.startDate);
    }
    if (filters.endDate) {
      clauses.push('d.publication_date <= ?');
      params.push(filters.endDate);
    }

    const documentTypes = (filters.documentTypes ?? []).map(value => value.trim().toLowerCase()).filter(Boolean);
    if (documentTypes.length > 0) {
      clauses.push(`LOWER(d.document_type) IN (${documentTypes.map(() => '?').join(', ')})`);
      params.push(...documentTypes);
    }

    return { where: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', params };
  }
}
