/**
 * @fileOverview: HTTP client for the paginated regulatory document API (Federal Register shaped)
 * @module: DocumentApiClient
 * @keyFunctions:
 *   - fetchPage(): One page of raw document records for an update window or publication range
 *   - toIngestionError(): Map axios failures onto IngestionError with a retryable flag
 * @dependencies:
 *   - axios: HTTP client with interceptors for error normalization
 *   - zod: Page envelope and per-record validation
 * @context: Returns raw records; normalization, checksums and change detection happen in the ingestion client
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { ErrorCode, IngestionError, getErrorMessage } from '../utils/errorHandler';

/** Incremental window on `updated_at`, or a backfill range on `publication_date` (both inclusive) */
export type DocumentWindow =
  | { kind: 'updated'; since: string | null; before: string }
  | { kind: 'published'; start: string; end: string };

export type UpdateWindow = Extract<DocumentWindow, { kind: 'updated' }>;

export interface DocumentPage {
  page: number;
  totalPages: number;
  count: number;
  /** Unvalidated records; see SourceDocumentSchema */
  results: unknown[];
}

export interface FetchPageOptions {
  signal?: AbortSignal;
}

export interface DocumentSource {
  fetchPage(window: DocumentWindow, page: number, options?: FetchPageOptions): Promise<DocumentPage>;
}

export interface DocumentApiClientOptions {
  baseUrl: string;
  pageSize: number;
  timeoutMs: number;
  /** Replaces the HTTP transport; used by tests */
  adapter?: AxiosAdapter;
}

const SourceAgencySchema = z.object({
  name: z.string().nullish(),
  raw_name: z.string().nullish(),
  slug: z.string().nullish(),
  short_name: z.string().nullish(),
});

export const SourceDocumentSchema = z.object({
  document_number: z.string().trim().min(1),
  title: z.string().trim().min(1),
  agencies: z.array(SourceAgencySchema).nullish(),
  publication_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  type: z.string().nullish(),
  abstract: z.string().nullish(),
  full_text: z.string().nullish(),
  body_text: z.string().nullish(),
  html_url: z.string().nullish(),
  updated_at: z.string().nullish(),
  revision: z.union([z.string(), z.number()]).nullish(),
});

export type SourceDocument = z.infer<typeof SourceDocumentSchema>;
export type SourceAgency = z.infer<typeof SourceAgencySchema>;

const PageSchema = z.object({
  count: z.number().int().min(0).optional(),
  total_pages: z.number().int().min(0).optional(),
  results: z.array(z.unknown()).nullish(),
});

const REQUESTED_FIELDS = [
  'document_number',
  'title',
  'agencies',
  'publication_date',
  'type',
  'abstract',
  'full_text',
  'body_text',
  'html_url',
  'updated_at',
  'revision',
];

/**
 * Query parameters for one page of a window
 */
export function buildPageParams(window: DocumentWindow, page: number, pageSize: number): Record<string, unknown> {
  const params: Record<string, unknown> = {
    per_page: pageSize,
    page,
    order: 'oldest',
    fields: REQUESTED_FIELDS,
  };

  if (window.kind === 'updated') {
    if (window.since) params['conditions[updated_since]'] = window.since;
    params['conditions[updated_before]'] = window.before;
  } else {
    params['conditions[publication_date][gte]'] = window.start;
    params['conditions[publication_date][lte]'] = window.end;
  }

  return params;
}

/**
 * Normalize any failure of a page request. Timeouts, dropped connections, 408, 429 and 5xx stay retryable;
 * other 4xx answers are final.
 */
export function toIngestionError(error: unknown, page?: number): IngestionError {
  if (error instanceof IngestionError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      const retryable = status === 408 || status === 429 || status >= 500;
      return new IngestionError(`Document API error ${status}: ${error.message}`, {
        page,
        statusCode: status,
        details: { retryable },
      });
    }

    if (error.code === 'ERR_CANCELED') {
      return new IngestionError('Document API request cancelled', { page, details: { retryable: false } });
    }

    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new IngestionError(`Document API unreachable: ${error.message}`, {
      page,
      code: timedOut ? ErrorCode.TIMEOUT : ErrorCode.NETWORK_ERROR,
      details: { retryable: true, networkCode: error.code },
    });
  }

  return new IngestionError(getErrorMessage(error), { page, details: { retryable: false } });
}

export class DocumentApiClient implements DocumentSource {
  private readonly client: AxiosInstance;
  private readonly pageSize: number;

  constructor(options: DocumentApiClientOptions) {
    this.pageSize = options.pageSize;
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        Accept: 'application/json',
        'User-Agent': 'regdoc-assistant',
      },
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
      ...(options.adapter && { adapter: options.adapter }),
    });

    this.client.interceptors.response.use(
      response => response,
      (error: unknown) => {
        throw toIngestionError(error);
      }
    );
  }

  async fetchPage(window: DocumentWindow, page: number, options: FetchPageOptions = {}): Promise<DocumentPage> {
    logger.debug('📄 Fetching document page', { page, window: window.kind });

    let data: unknown;
    try {
      const response = await this.client.get<unknown>('/documents.json', {
        params: buildPageParams(window, page, this.pageSize),
        signal: options.signal,
      });
      data = response.data;
    } catch (error) {
      const mapped = toIngestionError(error, page);
      // Interceptor errors carry no page number yet
      throw mapped.page === page
        ? mapped
        : new IngestionError(mapped.message, {
            page,
            statusCode: mapped.statusCode,
            code: mapped.code,
            details: mapped.details,
          });
    }

    const parsed = PageSchema.safeParse(data);
    if (!parsed.success) {
      throw new IngestionError(`Malformed document page ${page}`, {
        page,
        code: ErrorCode.INVALID_SOURCE_RESPONSE,
        details: {
          retryable: false,
          issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        },
      });
    }

    const results = parsed.data.results ?? [];
    return {
      page,
      totalPages: parsed.data.total_pages ?? (results.length > 0 ? page : 0),
      count: parsed.data.count ?? results.length,
      results,
    };
  }
}
