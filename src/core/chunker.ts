/**
 * @fileOverview: Sentence-aware text segmentation into bounded, overlapping chunks
 * @module: Chunker
 * @keyFunctions:
 *   - Chunker.chunk(): Split document text into ordered chunk drafts
 *   - reconstructText(): Rebuild the source text from chunks by removing overlaps
 *   - validateChunkerConfig(): Reject malformed segmentation settings
 * @dependencies:
 *   - tokens: Whitespace tokenizer that preserves exact offsets
 * @context: Output must be deterministic for a given text and config, since re-ingestion relies on identical chunk sequences
 */

import { ChunkDraft } from '../shared/types';
import { ChunkingError } from '../utils/errorHandler';
import { Token, tokenize } from '../utils/tokens';

export interface ChunkerConfig {
  maxTokens: number;
  overlapTokens: number;
}

// Lowercased, without the trailing period
const ABBREVIATIONS = new Set([
  'mr',
  'mrs',
  'ms',
  'dr',
  'st',
  'jr',
  'sr',
  'no',
  'nos',
  'vol',
  'sec',
  'secs',
  'art',
  'fed',
  'reg',
  'regs',
  'inc',
  'corp',
  'co',
  'ltd',
  'dept',
  'approx',
  'pp',
  'v',
  'vs',
  'e.g',
  'i.e',
  'cf',
  'jan',
  'feb',
  'mar',
  'apr',
  'jun',
  'jul',
  'aug',
  'sept',
  'oct',
  'nov',
  'dec',
]);

const CLOSING_PUNCTUATION = /["'”’)\]]+$/;
const INITIALISM = /^(?:[a-z]\.){2,}$/i;
const PARAGRAPH_BREAK = /\n[^\S\n]*\n/;

export function validateChunkerConfig(config: ChunkerConfig): void {
  const { maxTokens, overlapTokens } = config;
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new ChunkingError(`maxTokens must be a positive integer, got ${maxTokens}`, { maxTokens });
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    throw new ChunkingError(`overlapTokens must be a non-negative integer, got ${overlapTokens}`, {
      overlapTokens,
    });
  }
  if (overlapTokens >= maxTokens) {
    throw new ChunkingError(
      `overlapTokens (${overlapTokens}) must be smaller than maxTokens (${maxTokens})`,
      { maxTokens, overlapTokens }
    );
  }
}

function endsSentence(token: Token): boolean {
  const word = token.text.trim().replace(CLOSING_PUNCTUATION, '');
  if (word.endsWith('?') || word.endsWith('!')) return true;
  if (!word.endsWith('.')) return false;

  const stem = word.slice(0, -1).replace(/^["'“‘(\[]+/, '').toLowerCase();
  return !ABBREVIATIONS.has(stem) && !INITIALISM.test(word);
}

/**
 * boundaries[i] is true when a chunk may end right before token i
 */
function findBoundaries(tokens: Token[]): boolean[] {
  const boundaries = new Array<boolean>(tokens.length + 1).fill(false);
  tokens.forEach((token, index) => {
    const trailing = token.text.slice(token.text.trimEnd().length);
    if (endsSentence(token) || PARAGRAPH_BREAK.test(trailing)) {
      boundaries[index + 1] = true;
    }
  });
  boundaries[tokens.length] = true;
  return boundaries;
}

export class Chunker {
  private readonly config: ChunkerConfig;

  constructor(config: ChunkerConfig) {
    validateChunkerConfig(config);
    this.config = { ...config };
  }

  get maxTokens(): number {
    return this.config.maxTokens;
  }

  get overlapTokens(): number {
    return this.config.overlapTokens;
  }

  chunk(text: string): ChunkDraft[] {
    const tokens = tokenize(text);
    if (tokens.length === 0) return [];

    const { maxTokens, overlapTokens } = this.config;
    const boundaries = findBoundaries(tokens);
    const total = tokens.length;
    const chunks: ChunkDraft[] = [];

    let start = 0;
    let previousEnd = 0;

    while (start < total) {
      const limit = Math.min(start + maxTokens, total);

      // Furthest sentence boundary that fits and moves past the previous chunk
      let end = -1;
      for (let candidate = limit; candidate > previousEnd; candidate--) {
        if (boundaries[candidate]) {
          end = candidate;
          break;
        }
      }
      if (end === -1) {
        // Single sentence longer than maxTokens
        end = limit;
      }

      const startOffset = tokens[start].start;
      const endOffset = tokens[end - 1].end;
      chunks.push({
        sequence: chunks.length,
        text: text.slice(startOffset, endOffset),
        tokenCount: end - start,
        startOffset,
        endOffset,
        overlapTokens: chunks.length === 0 ? 0 : previousEnd - start,
      });

      if (end >= total) break;

      previousEnd = end;
      start = Math.max(end - overlapTokens, start + 1);
    }

    return chunks;
  }
}

/**
 * Concatenate chunk texts in sequence order with the overlapping prefixes removed
 */
export function reconstructText(chunks: readonly ChunkDraft[]): string {
  const ordered = [...chunks].sort((a, b) => a.sequence - b.sequence);
  if (ordered.length === 0) return '';

  let text = ordered[0].text;
  for (let i = 1; i < ordered.length; i++) {
    const previous = ordered[i - 1];
    const current = ordered[i];
    text += current.text.slice(Math.max(0, previous.endOffset - current.startOffset));
  }
  return text;
}
