/**
 * @fileOverview: Tests for the document API client using an in-process axios adapter
 * @module: DocumentApiClient Tests
 */

import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { DocumentApiClient, buildPageParams, toIngestionError } from '../documentApiClient';
import { ErrorCode, IngestionError, isTransientError } from '../../utils/errorHandler';

jest.mock('../../utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function respond(config: InternalAxiosRequestConfig, data: unknown, status = 200): AxiosResponse {
  return { data, status, statusText: status === 200 ? 'OK' : 'Error', headers: {}, config };
}

function httpError(config: InternalAxiosRequestConfig, status: number): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_RESPONSE',
    config,
    null,
    respond(config, { errors: ['failed'] }, status)
  );
}

const WINDOW = { kind: 'updated', since: '2024-05-01T00:00:00.000Z', before: '2024-05-02T00:00:00.000Z' } as const;

describe('buildPageParams', () => {
  test('incremental windows filter on update time', () => {
    expect(buildPageParams(WINDOW, 3, 50)).toEqual({
      per_page: 50,
      page: 3,
      order: 'oldest',
      fields: expect.arrayContaining(['document_number', 'title', 'agencies', 'full_text']),
      'conditions[updated_since]': '2024-05-01T00:00:00.000Z',
      'conditions[updated_before]': '2024-05-02T00:00:00.000Z',
    });
  });

  test('omits updated_since when the window has no start', () => {
    const params = buildPageParams({ kind: 'updated', since: null, before: '2024-05-02' }, 1, 10);
    expect(params).not.toHaveProperty(['conditions[updated_since]']);
  });

  test('backfill ranges filter on publication date', () => {
    const params = buildPageParams({ kind: 'published', start: '2023-01-01', end: '2023-01-31' }, 1, 10);
    expect(params['conditions[publication_date][gte]']).toBe('2023-01-01');
    expect(params['conditions[publication_date][lte]']).toBe('2023-01-31');
    expect(params).not.toHaveProperty(['conditions[updated_before]']);
  });
});

describe('DocumentApiClient', () => {
  test('requests one page and returns its raw records', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = new DocumentApiClient({
      baseUrl: 'https://documents.example.test/api/v1',
      pageSize: 20,
      timeoutMs: 1000,
      adapter: async config => {
        seen.push(config);
        return respond(config, { count: 41, total_pages: 3, results: [{ document_number: 'a' }] });
      },
    });

    const page = await client.fetchPage(WINDOW, 2);

    expect(page).toEqual({ page: 2, totalPages: 3, count: 41, results: [{ document_number: 'a' }] });
    expect(seen).toHaveLength(1);
    expect(seen[0].baseURL).toBe('https://documents.example.test/api/v1');
    expect(seen[0].url).toBe('/documents.json');
    expect(seen[0].params).toEqual(buildPageParams(WINDOW, 2, 20));
  });

  test('treats a page without results as empty', async () => {
    const client = new DocumentApiClient({
      baseUrl: 'https://documents.example.test',
      pageSize: 20,
      timeoutMs: 1000,
      adapter: async config => respond(config, { count: 0 }),
    });

    await expect(client.fetchPage(WINDOW, 1)).resolves.toEqual({ page: 1, totalPages: 0, count: 0, results: [] });
  });

  test('server errors become retryable IngestionErrors for the page', async () => {
    const client = new DocumentApiClient({
      baseUrl: 'https://documents.example.test',
      pageSize: 20,
      timeoutMs: 1000,
      adapter: async config => {
        throw httpError(config, 503);
      },
    });

    const error = await client.fetchPage(WINDOW, 2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IngestionError);
    expect(error).toMatchObject({ page: 2, statusCode: 503, code: ErrorCode.INGESTION_FAILED });
    expect(isTransientError(error)).toBe(true);
  });

  test('client errors are final', async () => {
    const client = new DocumentApiClient({
      baseUrl: 'https://documents.example.test',
      pageSize: 20,
      timeoutMs: 1000,
      adapter: async config => {
        throw httpError(config, 404);
      },
    });

    const error = await client.fetchPage(WINDOW, 1).catch((e: unknown) => e);

    expect(error).toMatchObject({ page: 1, statusCode: 404 });
    expect(isTransientError(error)).toBe(false);
  });

  test('rejects a malformed page envelope', async () => {
    const client = new DocumentApiClient({
      baseUrl: 'https://documents.example.test',
      pageSize: 20,
      timeoutMs: 1000,
      adapter: async config => respond(config, { count: 'many', results: 'none' }),
    });

    await expect(client.fetchPage(WINDOW, 1)).rejects.toMatchObject({
      code: ErrorCode.INVALID_SOURCE_RESPONSE,
      page: 1,
    });
  });
});

describe('toIngestionError', () => {
  test('connection failures are retryable network errors', () => {
    const error = toIngestionError(new AxiosError('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED'), 4);

    expect(error).toMatchObject({ page: 4, code: ErrorCode.NETWORK_ERROR });
    expect(isTransientError(error)).toBe(true);
  });

  test('axios timeouts map to TIMEOUT', () => {
    const error = toIngestionError(new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED'));
    expect(error.code).toBe(ErrorCode.TIMEOUT);
    expect(isTransientError(error)).toBe(true);
  });

  test('cancellation is not retried', () => {
    const error = toIngestionError(new AxiosError('canceled', 'ERR_CANCELED'));
    expect(isTransientError(error)).toBe(false);
  });

  test('passes IngestionErrors through unchanged', () => {
    const original = new IngestionError('boom', { page: 7 });
    expect(toIngestionError(original, 1)).toBe(original);
  });
});
