/**
 * @fileOverview: Prompt text for grounded answers over retrieved regulatory passages
 * @module: Prompts
 */

import { ChatMessage, DocumentMetadata, SearchFilters } from '../shared/types';

export const SYSTEM_PROMPT = `You are a regulatory document assistant. You answer questions about government regulations, rules, notices and other Federal Register publications.

Answer only from the numbered sources in the context below. Cite sources inline by their number, for example [1] or [2][3]. Do not cite a number that is not in the context.
If the sources do not contain the answer, say so plainly and suggest how the question could be narrowed or rephrased. Never invent document numbers, dates or agencies.
Prefer the most recent source when sources disagree, and mention the publication date when it matters.`;

export const NO_MATCHING_DOCUMENTS =
  'NO MATCHING DOCUMENTS: the document database returned no passages for this question. Tell the user that no sources were found and do not cite any.';

export function formatSourceHeader(sourceNumber: number, document: DocumentMetadata): string {
  return `[${sourceNumber}] ${document.title} | ${document.agency.name} | ${document.documentType} | published ${document.publicationDate} | document ${document.sourceId}`;
}

export function describeFilters(filters: SearchFilters | null): string {
  if (!filters) return 'none';

  const parts: string[] = [];
  if (filters.agencies?.length) parts.push(`agency: ${filters.agencies.join(' or ')}`);
  if (filters.startDate && filters.endDate) parts.push(`published ${filters.startDate} to ${filters.endDate}`);
  else if (filters.startDate) parts.push(`published on or after ${filters.startDate}`);
  else if (filters.endDate) parts.push(`published on or before ${filters.endDate}`);
  if (filters.documentTypes?.length) parts.push(`type: ${filters.documentTypes.join(' or ')}`);
  return parts.length > 0 ? parts.join('; ') : 'none';
}

export interface PromptInput {
  question: string;
  contextText: string;
  filters: SearchFilters | null;
  /** Prior turns, oldest first, already limited to the configured window */
  history: readonly ChatMessage[];
}

/**
 * System instructions with the context, then the prior turns, then the question
 */
export function buildMessages(input: PromptInput): ChatMessage[] {
  const system = [
    SYSTEM_PROMPT,
    `Filters applied to the search: ${describeFilters(input.filters)}`,
    `Context:\n${input.contextText}`,
  ].join('\n\n');

  return [
    { role: 'system', content: system },
    ...input.history.filter(message => message.role !== 'system'),
    { role: 'user', content: input.question },
  ];
}
