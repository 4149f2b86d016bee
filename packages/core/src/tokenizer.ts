// ============================================================================
// @textprobe/core — Text Tokenizer
// ============================================================================
//
// `tokenize` feeds the TF-IDF encoder: lowercase, then runs of two or more
// Unicode letters, digits or underscores (the `\b\w\w+\b` word pattern).
// `splitWords` feeds the sequence encoder: lowercase, split on whitespace.
// ============================================================================

const WORD_PATTERN = '[\\p{L}\\p{N}_]{2,}';

/**
 * Lowercase `text` and split it into word tokens.
 *
 * @example
 * ```ts
 * tokenize('This product is amazing!'); // ['this', 'product', 'is', 'amazing']
 * ```
 */
export function tokenize(text: string): string[] {
  // Fresh regex per call: a shared global regex carries lastIndex between calls.
  const regex = new RegExp(WORD_PATTERN, 'gu');
  const tokens: string[] = [];
  const processed = text.toLowerCase();
  let match: RegExpExecArray | null;
  while ((match = regex.exec(processed)) !== null) {
    tokens.push(match[0]);
  }
  return tokens;
}

/**
 * Lowercase `text` and split it on whitespace. Punctuation stays attached and
 * one-character words are kept, so every word keeps its position.
 *
 * @example
 * ```ts
 * splitWords('I love a cat!'); // ['i', 'love', 'a', 'cat!']
 * ```
 */
export function splitWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/**
 * Count raw occurrences of each distinct token, in first-seen order.
 */
export function countTokens(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}
