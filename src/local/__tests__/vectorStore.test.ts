/**
 * @fileOverview: Tests for document persistence and filtered similarity search
 * @module: VectorStore Tests
 */

import { RegDocDatabase } from '../database';
import { VectorStore, cosineSimilarity, recencyBoost } from '../vectorStore';
import { ErrorCode, StorageError } from '../../utils/errorHandler';
import { SearchFilters } from '../../shared/types';
import { makeChunks, makeDocument } from '../../__tests__/utils/testHelpers';
import { logger } from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const NOW = new Date('2025-01-01T00:00:00Z');

const EPA = { id: 'environmental-protection-agency', name: 'Environmental Protection Agency', shortName: 'EPA' };
const FDA = { id: 'food-and-drug-administration', name: 'Food and Drug Administration', shortName: 'FDA' };
const JOINT = {
  id: 'environmental-protection-agency-transportation-department',
  name: 'Environmental Protection Agency, Transportation Department',
  shortName: 'EPA',
};

describe('VectorStore', () => {
  let database: RegDocDatabase;
  let store: VectorStore;

  beforeEach(() => {
    database = RegDocDatabase.open(':memory:');
    store = new VectorStore(database, { recencyWeight: 0.05, recencyHalfLifeDays: 365, now: () => NOW });
  });

  afterEach(() => {
    database.close();
  });

  function seedCorpus(): void {
    const docs = [
      { doc: makeDocument({ sourceId: 'epa-1', agency: EPA, publicationDate: '2024-06-01' }), vectors: [[1, 0, 0], [0.9, 0.1, 0]] },
      { doc: makeDocument({ sourceId: 'epa-2', agency: EPA, publicationDate: '2021-02-10', documentType: 'Notice' }), vectors: [[0.8, 0.2, 0]] },
      { doc: makeDocument({ sourceId: 'fda-1', agency: FDA, publicationDate: '2024-11-20' }), vectors: [[0.7, 0.7, 0], [0, 1, 0]] },
      { doc: makeDocument({ sourceId: 'joint-1', agency: JOINT, publicationDate: '2023-09-30', documentType: 'Proposed Rule' }), vectors: [[0.5, 0, 0.5]] },
    ];
    for (const { doc, vectors } of docs) {
      store.upsertDocument(doc, makeChunks(doc, vectors));
    }
  }

  describe('upsertDocument', () => {
    test('stores a document with its chunks', () => {
      const doc = makeDocument();
      store.upsertDocument(doc, makeChunks(doc, [[1, 0, 0], [0, 1, 0]]));

      expect(store.getDocument(doc.sourceId)).toEqual(doc);
      const chunks = store.getChunks(doc.sourceId);
      expect(chunks.map(c => c.sequence)).toEqual([0, 1]);
      expect(chunks[1].embedding).toEqual([0, 1, 0]);
      expect(chunks[1].embeddingModel).toBe('test-embed');
    });

    test('replaces every chunk of a re-ingested document', () => {
      const doc = makeDocument();
      store.upsertDocument(doc, makeChunks(doc, [[1, 0, 0], [0, 1, 0], [0, 0, 1]]));

      const revised = makeDocument({ checksum: 'checksum-revised', title: 'Revised title' });
      store.upsertDocument(revised, makeChunks(revised, [[1, 1, 0], [0, 1, 1]], 'test-embed-v2'));

      const chunks = store.getChunks(doc.sourceId);
      expect(chunks).toHaveLength(2);
      expect(new Set(chunks.map(c => c.embeddingModel))).toEqual(new Set(['test-embed-v2']));
      expect(store.getDocument(doc.sourceId)?.title).toBe('Revised title');
    });

    test('rejects gapped sequences and leaves the stored version intact', () => {
      const doc = makeDocument();
      store.upsertDocument(doc, makeChunks(doc, [[1, 0, 0]]));

      const gapped = makeChunks(doc, [[1, 0, 0], [0, 1, 0]]).map(chunk => ({ ...chunk, sequence: chunk.sequence * 2 }));
      expect(() => store.upsertDocument(doc, gapped)).toThrow(StorageError);
      expect(store.getChunks(doc.sourceId)).toHaveLength(1);
    });

    test('rejects chunks embedded under different models', () => {
      const doc = makeDocument();
      const chunks = makeChunks(doc, [[1, 0, 0], [0, 1, 0]]);
      chunks[1] = { ...chunks[1], embeddingModel: 'other-model' };

      expect(() => store.upsertDocument(doc, chunks)).toThrow(
        expect.objectContaining({ code: ErrorCode.STORAGE_CONSTRAINT })
      );
    });

    test('rejects chunks with unequal dimensionality', () => {
      const doc = makeDocument();
      expect(() => store.upsertDocument(doc, makeChunks(doc, [[1, 0, 0], [0, 1]]))).toThrow(StorageError);
    });

    test('fails with StorageError once the database is closed', () => {
      const doc = makeDocument();
      database.close();

      expect(() => store.upsertDocument(doc, makeChunks(doc, [[1, 0, 0]]))).toThrow(
        expect.objectContaining({ code: ErrorCode.STORAGE_UNAVAILABLE })
      );
    });
  });

  describe('search', () => {
    beforeEach(seedCorpus);

    test('returns at most k results in non-increasing score order', () => {
      const results = store.search([1, 0, 0], null, 4);

      expect(results).toHaveLength(4);
      for (let i = 1; i < results.length; i++) {
        expect(results[i - 1].score).toBeGreaterThanOrEqual(results[i].score);
      }
      expect(results[0].chunk).toMatchObject({ documentId: 'epa-1', sequence: 0 });
    });

    test('returns nothing for k <= 0', () => {
      expect(store.search([1, 0, 0], null, 0)).toEqual([]);
      expect(store.search([1, 0, 0], null, -3)).toEqual([]);
    });

    test('every result satisfies the filters', () => {
      const cases: Array<{ filters: SearchFilters; expected: string[] }> = [
        { filters: { agencies: ['EPA'] }, expected: ['epa-1', 'epa-2', 'joint-1'] },
        { filters: { agencies: ['food and drug administration'] }, expected: ['fda-1'] },
        { filters: { agencies: ['environmental-protection-agency'] }, expected: ['epa-1', 'epa-2'] },
        { filters: { agencies: ['Transportation Department'] }, expected: ['joint-1'] },
        { filters: { startDate: '2024-06-01', endDate: '2024-11-20' }, expected: ['epa-1', 'fda-1'] },
        { filters: { agencies: ['EPA'], endDate: '2023-12-31' }, expected: ['epa-2', 'joint-1'] },
        { filters: { documentTypes: ['notice', 'Proposed Rule'] }, expected: ['epa-2', 'joint-1'] },
        { filters: { agencies: ['NOAA'] }, expected: [] },
      ];

      for (const { filters, expected } of cases) {
        const results = store.search([1, 1, 0], filters, 10);
        const ids = [...new Set(results.map(r => r.document.sourceId))].sort();
        expect(ids).toEqual(expected);
        for (let i = 1; i < results.length; i++) {
          expect(results[i - 1].score).toBeGreaterThanOrEqual(results[i].score);
        }
      }
    });

    test('searches only chunks of the requested embedding model', () => {
      const switched = makeDocument({ sourceId: 'new-model', publicationDate: '2024-06-01' });
      store.upsertDocument(switched, makeChunks(switched, [[0.1, 0.2, 0.3, 0.9]], 'model-b'));

      const results = store.search([0.1, 0.2, 0.3, 0.9], null, 10, { embeddingModel: 'model-b' });

      expect(results.map(r => r.document.sourceId)).toEqual(['new-model']);
      expect(results[0].similarity).toBeCloseTo(1, 10);
      expect(store.search([1, 0, 0], null, 10, { embeddingModel: 'test-embed' })).toHaveLength(6);
    });

    test('skips and reports chunks whose vector length differs from the query', () => {
      const switched = makeDocument({ sourceId: 'new-model', publicationDate: '2024-06-01' });
      store.upsertDocument(switched, makeChunks(switched, [[0.1, 0.2, 0.3, 0.9]], 'model-b'));

      const results = store.search([0.1, 0.2, 0.3, 0.9], null, 10);

      expect(results.map(r => r.document.sourceId)).toEqual(['new-model']);
      expect(logger.warn).toHaveBeenCalledWith('⚠️ Skipped chunks whose vector length differs from the query', {
        skipped: 6,
        queryDimensions: 4,
        embeddingModel: null,
      });
    });

    test('favours the newer document among equal similarities', () => {
      const older = makeDocument({ sourceId: 'older', publicationDate: '2020-01-01' });
      const newer = makeDocument({ sourceId: 'newer', publicationDate: '2024-12-01' });
      store.upsertDocument(older, makeChunks(older, [[0, 0, 1]]));
      store.upsertDocument(newer, makeChunks(newer, [[0, 0, 1]]));

      const results = store.search([0, 0, 1], null, 2);

      expect(results.map(r => r.document.sourceId)).toEqual(['newer', 'older']);
      expect(results[0].similarity).toBeCloseTo(results[1].similarity, 10);
      expect(results[0].score).toBeGreaterThan(results[1].score);
    });

    test('breaks exact score ties by newer publication date', () => {
      const flat = new VectorStore(database, { recencyWeight: 0, recencyHalfLifeDays: 365, now: () => NOW });
      const older = makeDocument({ sourceId: 'a-older', publicationDate: '2020-01-01' });
      const newer = makeDocument({ sourceId: 'b-newer', publicationDate: '2022-01-01' });
      flat.upsertDocument(older, makeChunks(older, [[0, 0, 2]]));
      flat.upsertDocument(newer, makeChunks(newer, [[0, 0, 2]]));

      const results = flat.search([0, 0, 1], null, 2);

      expect(results.map(r => r.document.sourceId)).toEqual(['b-newer', 'a-older']);
    });
  });

  describe('metadata', () => {
    beforeEach(seedCorpus);

    test('reports checksums and embedding models for known ids only', () => {
      const state = store.getIndexState(['epa-1', 'missing']);

      expect(state.get('epa-1')).toEqual({ checksum: 'checksum-epa-1', embeddingModel: 'test-embed' });
      expect(state.has('missing')).toBe(false);
      expect(store.getChecksums(['fda-1'])).toEqual(new Map([['fda-1', 'checksum-fda-1']]));
    });

    test('computes corpus statistics', () => {
      const stats = store.getStats(60);

      expect(stats.totalDocuments).toBe(4);
      expect(stats.totalChunks).toBe(6);
      expect(stats.topDocumentTypes).toEqual([
        { documentType: 'Rule', count: 2 },
        { documentType: 'Notice', count: 1 },
        { documentType: 'Proposed Rule', count: 1 },
      ]);
      expect(stats.recentActivity).toEqual([{ date: '2024-11-20', count: 1 }]);
      expect(stats.latestPublicationDate).toBe('2024-11-20');
      expect(stats.documentsByAgency[0]).toEqual({ agency: 'Environmental Protection Agency', count: 2 });
    });

    test('counts documents embedded by another model', () => {
      const switched = makeDocument({ sourceId: 'new-model' });
      store.upsertDocument(switched, makeChunks(switched, [[0, 0, 1]], 'model-b'));

      expect(store.countStaleDocuments('model-b')).toBe(4);
      expect(store.countStaleDocuments('test-embed')).toBe(1);
    });

    test('deletes a document together with its chunks', () => {
      expect(store.deleteDocument('fda-1')).toBe(true);
      expect(store.getDocument('fda-1')).toBeNull();
      expect(store.getChunks('fda-1')).toEqual([]);
      expect(store.deleteDocument('fda-1')).toBe(false);
    });

    test('lists agencies by name', () => {
      expect(store.listAgencies().map(a => a.id)).toEqual([EPA.id, JOINT.id, FDA.id]);
    });
  });
});

describe('scoring helpers', () => {
  test('cosineSimilarity handles parallel, orthogonal and degenerate vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });

  test('recencyBoost halves every half-life and decreases with age', () => {
    expect(recencyBoost('2025-01-01', NOW, 0.1, 365)).toBeCloseTo(0.1, 10);
    expect(recencyBoost('2024-01-02', NOW, 0.1, 365)).toBeCloseTo(0.05, 10);
    expect(recencyBoost('2020-01-01', NOW, 0.1, 365)).toBeLessThan(recencyBoost('2023-01-01', NOW, 0.1, 365));
    expect(recencyBoost('not-a-date', NOW, 0.1, 365)).toBe(0);
  });
});
