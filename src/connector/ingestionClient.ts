/**
 * @fileOverview: Pulls new and revised documents from the document API and decides which need re-indexing
 * @module: IngestionClient
 * @keyFunctions:
 *   - fetchSince(): Lazy event stream for the incremental window after a checkpoint
 *   - fetchRange(): Lazy event stream for a publication-date range (backfill)
 *   - selectChanged(): Split candidates into changed and unchanged by checksum and embedding model
 *   - toDocument()/computeChecksum(): Normalize raw API records
 * @dependencies:
 *   - DocumentSource: Paginated API access (axios in production)
 *   - VectorStore: Stored checksums for change detection
 * @context: Page 1 is fetched alone to learn the page count; the remaining pages are prefetched through a bounded
 * window and yielded strictly in page order. A failed page becomes a page-error event and the stream continues.
 */

import * as crypto from 'crypto';
import { logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { IngestionError, getErrorMessage } from '../utils/errorHandler';
import { Agency, Document, IngestionCheckpoint } from '../shared/types';
import { findAgency, slugify } from '../shared/agencies';
import {
  DocumentPage,
  DocumentSource,
  DocumentWindow,
  SourceAgency,
  SourceDocument,
  SourceDocumentSchema,
  UpdateWindow,
  toIngestionError,
} from '../client/documentApiClient';
import { IndexState } from '../local/vectorStore';

export const MAX_TITLE_LENGTH = 1000;
const UNKNOWN_AGENCY: Agency = { id: 'unknown', name: 'Unknown Agency' };

export type IngestionEvent =
  | { type: 'document'; page: number; document: Document }
  | { type: 'page-error'; page: number; error: IngestionError }
  | { type: 'invalid'; page: number; sourceId: string | null; reason: string };

export interface IngestionClientConfig {
  /** Pages in flight at once */
  concurrency: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Window start used when there is no checkpoint yet */
  initialLookbackDays: number;
}

export interface FetchOptions {
  /** Resume from this page; earlier pages are not requested */
  startPage?: number;
  signal?: AbortSignal;
  /** Clock used to stamp lastFetchedAt */
  now?: Date;
}

export interface IndexStateReader {
  getIndexState(sourceIds: readonly string[]): Map<string, IndexState>;
}

export interface ChangeSelection {
  changed: Document[];
  unchanged: Document[];
}

type PageOutcome = { page: number; ok: true; data: DocumentPage } | { page: number; ok: false; error: IngestionError };

/**
 * sha256 over the content fields; the server revision marker is not part of it
 */
export function computeChecksum(
  document: Pick<Document, 'title' | 'agency' | 'publicationDate' | 'documentType' | 'abstract' | 'text'>
): string {
  return crypto
    .createHash('sha256')
    .update(
      JSON.stringify([
        document.title,
        document.agency.name,
        document.publicationDate,
        document.documentType,
        document.abstract,
        document.text,
      ]),
      'utf8'
    )
    .digest('hex');
}

function resolveAgency(agencies: readonly SourceAgency[]): Agency {
  const named = agencies
    .map(agency => ({ name: (agency.name ?? agency.raw_name ?? '').trim(), agency }))
    .filter(entry => entry.name.length > 0);
  if (named.length === 0) return UNKNOWN_AGENCY;

  const id = named.map(({ name, agency }) => agency.slug?.trim() || slugify(name)).join('-');
  const first = named[0];
  const known = findAgency(first.agency.slug ?? first.name) ?? findAgency(first.name);
  const shortName = first.agency.short_name?.trim() || known?.acronym;

  return {
    id,
    name: named.map(entry => entry.name).join(', '),
    ...(shortName ? { shortName } : {}),
  };
}

export function toDocument(raw: SourceDocument, fetchedAt: string): Document {
  const base = {
    title: raw.title.slice(0, MAX_TITLE_LENGTH),
    agency: resolveAgency(raw.agencies ?? []),
    publicationDate: raw.publication_date,
    documentType: raw.type?.trim() || 'Unknown',
    abstract: raw.abstract ?? '',
    text: raw.full_text ?? raw.body_text ?? raw.abstract ?? '',
  };

  return {
    sourceId: raw.document_number,
    ...base,
    checksum: computeChecksum(base),
    revision: raw.revision === null || raw.revision === undefined ? null : String(raw.revision),
    lastFetchedAt: fetchedAt,
    lastModifiedAt: raw.updated_at ?? fetchedAt,
    ...(raw.html_url ? { url: raw.html_url } : {}),
  };
}

function rawSourceId(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null) return null;
  const value: unknown = Reflect.get(raw, 'document_number');
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}

export class IngestionClient {
  constructor(
    private readonly source: DocumentSource,
    private readonly index: IndexStateReader,
    private readonly config: IngestionClientConfig
  ) {}

  /**
   * Incremental window: from the checkpoint cursor (or the initial lookback) up to `now`
   */
  incrementalWindow(checkpoint: IngestionCheckpoint | null, now: Date): UpdateWindow {
    const since =
      checkpoint?.cursor ??
      new Date(now.getTime() - this.config.initialLookbackDays * 24 * 60 * 60 * 1000).toISOString();
    return { kind: 'updated', since, before: now.toISOString() };
  }

  fetchSince(checkpoint: IngestionCheckpoint | null, options: FetchOptions = {}): AsyncGenerator<IngestionEvent> {
    return this.fetchWindow(this.incrementalWindow(checkpoint, options.now ?? new Date()), options);
  }

  fetchRange(startDate: string, endDate: string, options: FetchOptions = {}): AsyncGenerator<IngestionEvent> {
    return this.fetchWindow({ kind: 'published', start: startDate, end: endDate }, options);
  }

  async *fetchWindow(window: DocumentWindow, options: FetchOptions = {}): AsyncGenerator<IngestionEvent> {
    const firstPage = Math.max(1, options.startPage ?? 1);
    const fetchedAt = (options.now ?? new Date()).toISOString();

    const first = await this.loadPage(window, firstPage, options.signal);
    if (!first.ok) {
      yield { type: 'page-error', page: first.page, error: first.error };
      return;
    }

    const totalPages = first.data.totalPages;
    logger.info('📥 Document window opened', {
      window: window.kind,
      totalPages,
      count: first.data.count,
      startPage: firstPage,
    });
    yield* this.eventsFor(first, fetchedAt);

    const inFlight: Array<Promise<PageOutcome>> = [];
    let next = firstPage + 1;
    const fill = () => {
      while (next <= totalPages && inFlight.length < this.config.concurrency) {
        inFlight.push(this.loadPage(window, next, options.signal));
        next++;
      }
    };

    fill();
    for (let pending = inFlight.shift(); pending; pending = inFlight.shift()) {
      const outcome = await pending;
      fill();
      yield* this.eventsFor(outcome, fetchedAt);
    }
  }

  /**
   * Latest candidate per source id wins. A candidate is unchanged when its checksum matches the stored one
   * and the stored chunks were embedded by `embeddingModel` (or the document has no chunks).
   */
  selectChanged(candidates: readonly Document[], embeddingModel: string): ChangeSelection {
    const latest = new Map<string, Document>();
    for (const candidate of candidates) {
      latest.delete(candidate.sourceId);
      latest.set(candidate.sourceId, candidate);
    }

    const stored = this.index.getIndexState([...latest.keys()]);
    const changed: Document[] = [];
    const unchanged: Document[] = [];

    for (const document of latest.values()) {
      const state = stored.get(document.sourceId);
      const current =
        state !== undefined &&
        state.checksum === document.checksum &&
        (state.embeddingModel === null || state.embeddingModel === embeddingModel);
      (current ? unchanged : changed).push(document);
    }

    return { changed, unchanged };
  }

  private async loadPage(window: DocumentWindow, page: number, signal?: AbortSignal): Promise<PageOutcome> {
    try {
      const data = await withRetry(() => this.source.fetchPage(window, page, { signal }), {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.baseDelayMs,
        maxDelayMs: this.config.maxDelayMs,
        signal,
        operation: `document page ${page}`,
      });
      return { page, ok: true, data };
    } catch (error) {
      const mapped = toIngestionError(error, page);
      logger.warn('⚠️ Document page failed', { page, error: getErrorMessage(mapped) });
      return { page, ok: false, error: mapped };
    }
  }

  private *eventsFor(outcome: PageOutcome, fetchedAt: string): Generator<IngestionEvent> {
    if (!outcome.ok) {
      yield { type: 'page-error', page: outcome.page, error: outcome.error };
      return;
    }

    for (const raw of outcome.data.results) {
      const parsed = SourceDocumentSchema.safeParse(raw);
      if (!parsed.success) {
        const reason = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        yield { type: 'invalid', page: outcome.page, sourceId: rawSourceId(raw), reason };
        continue;
      }
      yield { type: 'document', page: outcome.page, document: toDocument(parsed.data, fetchedAt) };
    }
  }
}
