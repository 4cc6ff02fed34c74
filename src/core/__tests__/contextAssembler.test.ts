/**
 * @fileOverview: Tests for budgeted context assembly and prompt construction
 * @module: ContextAssembler Tests
 */

import { assembleContext, toCitation } from '../contextAssembler';
import { NO_MATCHING_DOCUMENTS, SYSTEM_PROMPT, buildMessages, describeFilters, formatSourceHeader } from '../prompts';
import { DocumentMetadata, RetrievalResult } from '../../shared/types';

const BODY = 'one two three four five';

function doc(sourceId: string, title: string): DocumentMetadata {
  return {
    sourceId,
    title,
    agency: { id: 'agency', name: 'Agency' },
    publicationDate: '2024-01-01',
    documentType: 'Rule',
  };
}

function result(document: DocumentMetadata, sequence: number, text: string = BODY): RetrievalResult {
  return {
    chunk: { documentId: document.sourceId, sequence, text, tokenCount: 5 },
    similarity: 0.9,
    score: 0.9,
    document,
  };
}

const ALPHA = doc('a', 'Alpha');
const BETA = doc('b', 'Beta');
// "[1] Alpha | Agency | Rule | published 2024-01-01 | document a" is 12 tokens
const HEADER_TOKENS = 12;

describe('assembleContext', () => {
  test('includes every block that fits and numbers sources per document', () => {
    const context = assembleContext([result(ALPHA, 0), result(BETA, 0), result(ALPHA, 1)], 1000);

    expect(context.blocks.map(block => block.sourceNumber)).toEqual([1, 2, 1]);
    expect(context.blocks[2].header).toBe('[1] Alpha | Agency | Rule | published 2024-01-01 | document a');
    expect(context.tokensUsed).toBe(3 * (HEADER_TOKENS + 5));
    expect(context.truncated).toBe(false);
    expect(context.noResults).toBe(false);
    expect(context.citations.map(citation => citation.sourceId)).toEqual(['a', 'b']);
  });

  test('truncates the first overflowing chunk to the remaining budget and stops', () => {
    const budget = HEADER_TOKENS + 5 + HEADER_TOKENS + 2;
    const context = assembleContext([result(ALPHA, 0), result(BETA, 0), result(doc('c', 'Gamma'), 0)], budget);

    expect(context.blocks).toHaveLength(2);
    expect(context.blocks[1].body).toBe('one two');
    expect(context.blocks[1].truncated).toBe(true);
    expect(context.truncated).toBe(true);
    expect(context.tokensUsed).toBe(budget);
    expect(context.citations.map(citation => citation.sourceId)).toEqual(['a', 'b']);
    expect(context.text).toBe(
      [
        '[1] Alpha | Agency | Rule | published 2024-01-01 | document a',
        BODY,
        '',
        '[2] Beta | Agency | Rule | published 2024-01-01 | document b',
        'one two',
      ].join('\n')
    );
  });

  test('drops the overflowing chunk when not even its header fits', () => {
    const context = assembleContext([result(ALPHA, 0), result(BETA, 0)], HEADER_TOKENS + 5 + 3);

    expect(context.blocks).toHaveLength(1);
    expect(context.truncated).toBe(true);
    expect(context.citations.map(citation => citation.sourceId)).toEqual(['a']);
  });

  test('truncates a single chunk larger than the budget', () => {
    const context = assembleContext([result(ALPHA, 0)], HEADER_TOKENS + 3);

    expect(context.blocks[0].body).toBe('one two three');
    expect(context.tokensUsed).toBe(HEADER_TOKENS + 3);
  });

  test('uses the no-documents marker when nothing was retrieved', () => {
    const context = assembleContext([], 1000);

    expect(context.text).toBe(NO_MATCHING_DOCUMENTS);
    expect(context.noResults).toBe(true);
    expect(context.citations).toEqual([]);
    expect(context.tokensUsed).toBe(0);
  });

  test('never cites a document without an included block', () => {
    const results = [result(ALPHA, 0), result(BETA, 0, 'a much longer passage that cannot fit')];
    const context = assembleContext(results, HEADER_TOKENS + 5);

    const included = context.blocks.map(block => block.result.document.sourceId);
    expect(context.citations.every(citation => included.includes(citation.sourceId))).toBe(true);
    expect(included).toEqual(['a']);
  });
});

describe('toCitation', () => {
  test('carries the url when the document has one', () => {
    expect(toCitation({ ...ALPHA, url: 'https://example.test/a' })).toEqual({
      sourceId: 'a',
      title: 'Alpha',
      agency: 'Agency',
      publicationDate: '2024-01-01',
      documentType: 'Rule',
      url: 'https://example.test/a',
    });
  });
});

describe('prompts', () => {
  test('formats source headers', () => {
    expect(formatSourceHeader(3, BETA)).toBe('[3] Beta | Agency | Rule | published 2024-01-01 | document b');
  });

  test('describes filters', () => {
    expect(describeFilters(null)).toBe('none');
    expect(describeFilters({})).toBe('none');
    expect(
      describeFilters({
        agencies: ['Environmental Protection Agency', 'Transportation Department'],
        startDate: '2024-01-01',
        endDate: '2024-06-30',
        documentTypes: ['Rule'],
      })
    ).toBe(
      'agency: Environmental Protection Agency or Transportation Department; published 2024-01-01 to 2024-06-30; type: Rule'
    );
    expect(describeFilters({ startDate: '2024-01-01' })).toBe('published on or after 2024-01-01');
    expect(describeFilters({ endDate: '2020-12-31' })).toBe('published on or before 2020-12-31');
  });

  test('builds system, history and question messages', () => {
    const messages = buildMessages({
      question: 'What is new?',
      contextText: 'CONTEXT',
      filters: null,
      history: [
        { role: 'system', content: 'old instructions' },
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'hi' },
      ],
    });

    expect(messages).toEqual([
      { role: 'system', content: `${SYSTEM_PROMPT}\n\nFilters applied to the search: none\n\nContext:\nCONTEXT` },
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'hi' },
      { role: 'user', content: 'What is new?' },
    ]);
  });
});
