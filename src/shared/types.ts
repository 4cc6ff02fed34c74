/**
 * @fileOverview: Shared domain types for ingestion, indexing and retrieval
 * @module: SharedTypes
 * @context: Documents and chunks are owned by the vector store; checkpoint, run state and the retry queue by the update scheduler; retrieval results live only for one request
 */

export interface Agency {
  /** Slug, e.g. "environmental-protection-agency" */
  id: string;
  name: string;
  /** Acronym such as "EPA" */
  shortName?: string;
}

export interface Document {
  sourceId: string;
  title: string;
  agency: Agency;
  /** YYYY-MM-DD */
  publicationDate: string;
  documentType: string;
  abstract: string;
  text: string;
  /** sha256 hex over the content fields */
  checksum: string;
  /** Server-side revision marker, when the source reports one */
  revision: string | null;
  lastFetchedAt: string;
  lastModifiedAt: string;
  url?: string;
}

/** Chunker output before embedding */
export interface ChunkDraft {
  sequence: number;
  text: string;
  tokenCount: number;
  startOffset: number;
  endOffset: number;
  /** Leading tokens shared with the previous chunk */
  overlapTokens: number;
}

export interface Chunk extends ChunkDraft {
  documentId: string;
  embedding: number[];
  embeddingModel: string;
}

export type RunStatus = 'success' | 'partial' | 'failed';

export interface IngestionCheckpoint {
  /** Upper bound of the last completed incremental window; null before the first run */
  cursor: string | null;
  status: Exclude<RunStatus, 'failed'>;
  completedAt: string;
  documentsCommitted: number;
}

export type SchedulerState = 'Idle' | 'Fetching' | 'Processing' | 'Embedding' | 'Committing' | 'Failed';

export type PipelineStage = 'Fetching' | 'Processing' | 'Embedding' | 'Committing';

export const PIPELINE_STAGES: readonly PipelineStage[] = ['Fetching', 'Processing', 'Embedding', 'Committing'];

export type RunKind = 'incremental' | 'backfill';

export interface ProcessedDocument {
  document: Document;
  chunks: ChunkDraft[];
}

export interface EmbeddedDocument {
  document: Document;
  chunks: Chunk[];
}

export interface FailedDocument {
  sourceId: string;
  stage: PipelineStage;
  error: string;
}

/**
 * In-flight run persisted after every completed stage
 */
export interface RunState {
  runId: string;
  kind: RunKind;
  startedAt: string;
  /** Incremental window (updated_since / updated_before) or backfill publication range */
  windowStart: string | null;
  windowEnd: string;
  lastCompletedStage: PipelineStage | null;
  candidates: Document[];
  processed: ProcessedDocument[];
  embedded: EmbeddedDocument[];
  failures: FailedDocument[];
  skipped: number;
  pageErrors: number;
}

export interface PipelineRun {
  runId: string;
  kind: RunKind;
  startedAt: string;
  finishedAt: string;
  status: RunStatus;
  windowStart: string | null;
  windowEnd: string;
  documentsFetched: number;
  documentsSkipped: number;
  documentsCommitted: number;
  documentsFailed: number;
  /** Dropped from the retry queue after too many failed runs */
  documentsAbandoned: number;
  pageErrors: number;
  errorMessage: string | null;
}

export interface RetryQueueEntry {
  document: Document;
  attempts: number;
  lastError: string;
  enqueuedAt: string;
}

export interface SearchFilters {
  /** Matched against agency id, name or short name, case-insensitively */
  agencies?: string[];
  /** Inclusive, YYYY-MM-DD */
  startDate?: string;
  endDate?: string;
  documentTypes?: string[];
}

export interface DocumentMetadata {
  sourceId: string;
  title: string;
  agency: Agency;
  publicationDate: string;
  documentType: string;
  url?: string;
}

export interface RetrievalResult {
  chunk: {
    documentId: string;
    sequence: number;
    text: string;
    tokenCount: number;
  };
  similarity: number;
  /** similarity plus the recency boost */
  score: number;
  document: DocumentMetadata;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface Citation {
  sourceId: string;
  title: string;
  agency: string;
  publicationDate: string;
  documentType: string;
  url?: string;
}

export interface StoreStats {
  totalDocuments: number;
  totalChunks: number;
  topDocumentTypes: Array<{ documentType: string; count: number }>;
  recentActivity: Array<{ date: string; count: number }>;
  documentsByAgency: Array<{ agency: string; count: number }>;
  latestPublicationDate: string | null;
}
