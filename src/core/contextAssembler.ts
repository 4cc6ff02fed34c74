/**
 * @fileOverview: Greedy prompt-context assembly under a token budget, with citation tracking
 * @module: ContextAssembler
 * @keyFunctions:
 *   - assembleContext(): Ranked retrieval results → context text, included blocks and citations
 * @context: Blocks are taken in rank order while they fit. The first block that would overflow is truncated to the
 * remaining budget and closes the context. Citations are derived from included blocks only.
 */

import { estimateTokens, truncateToTokens } from '../utils/tokens';
import { Citation, DocumentMetadata, RetrievalResult } from '../shared/types';
import { NO_MATCHING_DOCUMENTS, formatSourceHeader } from './prompts';

export interface ContextBlock {
  /** 1-based citation number of the block's document */
  sourceNumber: number;
  result: RetrievalResult;
  header: string;
  body: string;
  tokens: number;
  truncated: boolean;
}

export interface AssembledContext {
  text: string;
  blocks: ContextBlock[];
  citations: Citation[];
  tokensUsed: number;
  tokenBudget: number;
  truncated: boolean;
  /** No block made it into the context */
  noResults: boolean;
}

export function toCitation(document: DocumentMetadata): Citation {
  return {
    sourceId: document.sourceId,
    title: document.title,
    agency: document.agency.name,
    publicationDate: document.publicationDate,
    documentType: document.documentType,
    ...(document.url ? { url: document.url } : {}),
  };
}

export function assembleContext(results: readonly RetrievalResult[], tokenBudget: number): AssembledContext {
  const blocks: ContextBlock[] = [];
  const sourceNumbers = new Map<string, number>();
  let used = 0;
  let truncated = false;

  for (const result of results) {
    const sourceId = result.document.sourceId;
    const sourceNumber = sourceNumbers.get(sourceId) ?? sourceNumbers.size + 1;
    const header = formatSourceHeader(sourceNumber, result.document);
    const headerTokens = estimateTokens(header);
    const bodyTokens = estimateTokens(result.chunk.text);

    if (used + headerTokens + bodyTokens <= tokenBudget) {
      sourceNumbers.set(sourceId, sourceNumber);
      blocks.push({ sourceNumber, result, header, body: result.chunk.text.trim(), tokens: headerTokens + bodyTokens, truncated: false });
      used += headerTokens + bodyTokens;
      continue;
    }

    const remaining = tokenBudget - used - headerTokens;
    if (remaining > 0) {
      const body = truncateToTokens(result.chunk.text.trim(), remaining);
      const tokens = headerTokens + estimateTokens(body);
      sourceNumbers.set(sourceId, sourceNumber);
      blocks.push({ sourceNumber, result, header, body, tokens, truncated: true });
      used += tokens;
    }
    truncated = true;
    break;
  }

  const citations: Citation[] = [];
  const cited = new Set<string>();
  for (const block of blocks) {
    if (cited.has(block.result.document.sourceId)) continue;
    cited.add(block.result.document.sourceId);
    citations.push(toCitation(block.result.document));
  }

  return {
    text: blocks.length > 0 ? blocks.map(block => `${block.header}\n${block.body}`).join('\n\n') : NO_MATCHING_DOCUMENTS,
    blocks,
    citations,
    tokensUsed: used,
    tokenBudget,
    truncated,
    noResults: blocks.length === 0,
  };
}
