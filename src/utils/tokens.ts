/**
 * @fileOverview: Whitespace tokenization shared by the chunker and the context assembler
 * @module: Tokens
 * @keyFunctions:
 *   - tokenize(): Split text into tokens that concatenate back to the exact input
 *   - estimateTokens(): Count whitespace-delimited words
 *   - truncateToTokens(): Keep the first N tokens of a text
 * @context: A token is a run of non-whitespace characters plus the whitespace that follows it
 */

export interface Token {
  text: string;
  /** Character offset of token.text in the source string */
  start: number;
  end: number;
}

const TOKEN_PATTERN = /\S+\s*/g;

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  const leading = text.length - text.trimStart().length;

  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const index = match.index ?? 0;
    tokens.push({ text: match[0], start: index, end: index + match[0].length });
  }

  // Leading whitespace belongs to the first token
  if (leading > 0 && tokens.length > 0) {
    const first = tokens[0];
    tokens[0] = { text: text.slice(0, first.end), start: 0, end: first.end };
  }

  return tokens;
}

export function estimateTokens(text: string): number {
  const words = text.match(/\S+/g);
  return words ? words.length : 0;
}

/**
 * First `maxTokens` tokens of `text`, trailing whitespace trimmed
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (maxTokens <= 0) return '';
  const tokens = tokenize(text);
  if (tokens.length <= maxTokens) return text;
  return text.slice(0, tokens[maxTokens - 1].end).trimEnd();
}
