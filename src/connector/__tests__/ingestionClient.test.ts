/**
 * @fileOverview: Tests for paginated ingestion, record normalization and change detection
 * @module: IngestionClient Tests
 */

import {
  IngestionClient,
  IngestionClientConfig,
  IngestionEvent,
  IndexStateReader,
  MAX_TITLE_LENGTH,
  computeChecksum,
  toDocument,
} from '../ingestionClient';
import { SourceDocumentSchema } from '../../client/documentApiClient';
import { IndexState } from '../../local/vectorStore';
import { FakeDocumentSource, makeDocument, sourceRecord } from '../../__tests__/utils/testHelpers';

jest.mock('../../utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const CONFIG: IngestionClientConfig = {
  concurrency: 2,
  maxAttempts: 2,
  baseDelayMs: 0,
  initialLookbackDays: 7,
};

const NOW = new Date('2024-11-01T06:00:00.000Z');
const emptyIndex: IndexStateReader = { getIndexState: () => new Map() };

function records(count: number): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, i) => sourceRecord({ document_number: `doc-${i + 1}` }));
}

async function collect(events: AsyncGenerator<IngestionEvent>): Promise<IngestionEvent[]> {
  const all: IngestionEvent[] = [];
  for await (const event of events) all.push(event);
  return all;
}

function describeEvent(event: IngestionEvent): string {
  switch (event.type) {
    case 'document':
      return `doc:${event.document.sourceId}`;
    case 'page-error':
      return `error:${event.page}`;
    case 'invalid':
      return `invalid:${event.sourceId ?? '?'}`;
  }
}

function parse(record: Record<string, unknown>) {
  return SourceDocumentSchema.parse(record);
}

describe('toDocument', () => {
  test('normalizes a raw record', () => {
    const document = toDocument(parse(sourceRecord({ revision: 3 })), '2024-11-01T06:00:00.000Z');

    expect(document).toEqual({
      sourceId: '2024-10001',
      title: 'Lead and Copper Rule Improvements',
      agency: { id: 'environmental-protection-agency', name: 'Environmental Protection Agency', shortName: 'EPA' },
      publicationDate: '2024-10-30',
      documentType: 'Rule',
      abstract: 'The agency finalizes requirements for lead service line replacement.',
      text: 'Water systems must replace lead service lines within ten years. Systems must notify customers.',
      checksum: expect.stringMatching(/^[0-9a-f]{64}$/),
      revision: '3',
      lastFetchedAt: '2024-11-01T06:00:00.000Z',
      lastModifiedAt: '2024-10-30T08:00:00-04:00',
      url: 'https://example.test/documents/2024-10001',
    });
  });

  test('joins the names of co-issuing agencies', () => {
    const document = toDocument(
      parse(
        sourceRecord({
          agencies: [
            { name: 'Environmental Protection Agency', slug: 'environmental-protection-agency' },
            { name: 'Transportation Department' },
          ],
        })
      ),
      'now'
    );

    expect(document.agency).toEqual({
      id: 'environmental-protection-agency-transportation-department',
      name: 'Environmental Protection Agency, Transportation Department',
      shortName: 'EPA',
    });
  });

  test('falls back for missing text, type and agencies', () => {
    const document = toDocument(
      parse(sourceRecord({ full_text: null, body_text: undefined, type: null, agencies: [], html_url: null })),
      'now'
    );

    expect(document.text).toBe('The agency finalizes requirements for lead service line replacement.');
    expect(document.documentType).toBe('Unknown');
    expect(document.agency).toEqual({ id: 'unknown', name: 'Unknown Agency' });
    expect(document).not.toHaveProperty('url');
  });

  test('caps long titles', () => {
    const document = toDocument(parse(sourceRecord({ title: 'x'.repeat(MAX_TITLE_LENGTH + 50) })), 'now');
    expect(document.title).toHaveLength(MAX_TITLE_LENGTH);
  });

  test('checksum follows content but not the revision marker', () => {
    const base = toDocument(parse(sourceRecord({ revision: 1 })), 'a');
    const newRevision = toDocument(parse(sourceRecord({ revision: 2 })), 'b');
    const newText = toDocument(parse(sourceRecord({ full_text: 'Amended text.' })), 'a');

    expect(newRevision.checksum).toBe(base.checksum);
    expect(newText.checksum).not.toBe(base.checksum);
    expect(computeChecksum(base)).toBe(base.checksum);
  });
});

describe('IngestionClient', () => {
  describe('fetching', () => {
    test('yields every page in order despite out-of-order completion', async () => {
      const source = new FakeDocumentSource(records(5), 2);
      source.delayPage(2, 30);
      const client = new IngestionClient(source, emptyIndex, CONFIG);

      const events = await collect(client.fetchRange('2024-01-01', '2024-01-31', { now: NOW }));

      expect(events.map(describeEvent)).toEqual(['doc:doc-1', 'doc:doc-2', 'doc:doc-3', 'doc:doc-4', 'doc:doc-5']);
      expect(source.calls.map(call => call.page)).toEqual([1, 2, 3]);
      expect(source.calls[0].window).toEqual({ kind: 'published', start: '2024-01-01', end: '2024-01-31' });
    });

    test('a failing page is retried, reported and skipped', async () => {
      const source = new FakeDocumentSource(records(6), 2);
      source.failPage(2, Object.assign(new Error('upstream unavailable'), { status: 503 }));
      const client = new IngestionClient(source, emptyIndex, CONFIG);

      const events = await collect(client.fetchRange('2024-01-01', '2024-01-31'));

      expect(events.map(describeEvent)).toEqual(['doc:doc-1', 'doc:doc-2', 'error:2', 'doc:doc-5', 'doc:doc-6']);
      expect(source.calls.filter(call => call.page === 2)).toHaveLength(CONFIG.maxAttempts);
    });

    test('a page that recovers within the attempts is not reported', async () => {
      const source = new FakeDocumentSource(records(3), 2);
      source.failPage(2, Object.assign(new Error('rate limited'), { status: 429 }), 1);
      const client = new IngestionClient(source, emptyIndex, CONFIG);

      const events = await collect(client.fetchRange('2024-01-01', '2024-01-31'));

      expect(events.map(describeEvent)).toEqual(['doc:doc-1', 'doc:doc-2', 'doc:doc-3']);
    });

    test('non-transient page errors are not retried', async () => {
      const source = new FakeDocumentSource(records(4), 2);
      source.failPage(2, Object.assign(new Error('bad request'), { status: 400 }));
      const client = new IngestionClient(source, emptyIndex, CONFIG);

      await collect(client.fetchRange('2024-01-01', '2024-01-31'));

      expect(source.calls.filter(call => call.page === 2)).toHaveLength(1);
    });

    test('stops after a failed first page', async () => {
      const source = new FakeDocumentSource(records(6), 2);
      source.failPage(1, Object.assign(new Error('down'), { status: 500 }));
      const client = new IngestionClient(source, emptyIndex, CONFIG);

      const events = await collect(client.fetchRange('2024-01-01', '2024-01-31'));

      expect(events.map(describeEvent)).toEqual(['error:1']);
      expect(source.calls.every(call => call.page === 1)).toBe(true);
    });

    test('reports records without id or title as invalid', async () => {
      const source = new FakeDocumentSource(
        [sourceRecord({ document_number: 'ok-1' }), sourceRecord({ document_number: 'no-title', title: '  ' }), { title: 'no id' }],
        10
      );
      const client = new IngestionClient(source, emptyIndex, CONFIG);

      const events = await collect(client.fetchRange('2024-01-01', '2024-01-31'));

      expect(events.map(describeEvent)).toEqual(['doc:ok-1', 'invalid:no-title', 'invalid:?']);
    });

    test('restarts from a given page', async () => {
      const source = new FakeDocumentSource(records(6), 2);
      const client = new IngestionClient(source, emptyIndex, CONFIG);

      const events = await collect(client.fetchRange('2024-01-01', '2024-01-31', { startPage: 2 }));

      expect(events.map(describeEvent)).toEqual(['doc:doc-3', 'doc:doc-4', 'doc:doc-5', 'doc:doc-6']);
      expect(source.calls.map(call => call.page)).toEqual([2, 3]);
    });

    test('the first incremental window looks back from now', async () => {
      const source = new FakeDocumentSource([], 2);
      const client = new IngestionClient(source, emptyIndex, CONFIG);

      expect(await collect(client.fetchSince(null, { now: NOW }))).toEqual([]);
      expect(source.calls[0].window).toEqual({
        kind: 'updated',
        since: '2024-10-25T06:00:00.000Z',
        before: '2024-11-01T06:00:00.000Z',
      });
    });

    test('later windows start at the checkpoint cursor', () => {
      const client = new IngestionClient(new FakeDocumentSource(), emptyIndex, CONFIG);
      const window = client.incrementalWindow(
        { cursor: '2024-10-31T06:00:00.000Z', status: 'success', completedAt: 'x', documentsCommitted: 1 },
        NOW
      );

      expect(window).toEqual({ kind: 'updated', since: '2024-10-31T06:00:00.000Z', before: '2024-11-01T06:00:00.000Z' });
    });
  });

  describe('selectChanged', () => {
    const stored = new Map<string, IndexState>([
      ['same', { checksum: 'checksum-same', embeddingModel: 'test-embed' }],
      ['edited', { checksum: 'old-checksum', embeddingModel: 'test-embed' }],
      ['old-model', { checksum: 'checksum-old-model', embeddingModel: 'retired-embed' }],
      ['empty', { checksum: 'checksum-empty', embeddingModel: null }],
    ]);
    const index: IndexStateReader = {
      getIndexState: ids => new Map([...stored].filter(([id]) => ids.includes(id))),
    };

    test('splits candidates by checksum and embedding model', () => {
      const client = new IngestionClient(new FakeDocumentSource(), index, CONFIG);
      const ids = ['same', 'edited', 'old-model', 'empty', 'new'];

      const { changed, unchanged } = client.selectChanged(
        ids.map(sourceId => makeDocument({ sourceId })),
        'test-embed'
      );

      expect(changed.map(doc => doc.sourceId)).toEqual(['edited', 'old-model', 'new']);
      expect(unchanged.map(doc => doc.sourceId)).toEqual(['same', 'empty']);
    });

    test('keeps the latest candidate for a repeated id', () => {
      const client = new IngestionClient(new FakeDocumentSource(), index, CONFIG);

      const { changed, unchanged } = client.selectChanged(
        [makeDocument({ sourceId: 'same', checksum: 'newer' }), makeDocument({ sourceId: 'same' })],
        'test-embed'
      );

      expect(changed).toEqual([]);
      expect(unchanged).toEqual([makeDocument({ sourceId: 'same' })]);
    });
  });
});
