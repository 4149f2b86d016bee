// ============================================================================
// @textprobe/core — Sequence Encoder
// ============================================================================

import { ConfigError } from './errors.js';
import { splitWords } from './tokenizer.js';
import type { FeatureEncoder, TokenMap } from './types.js';

export const DEFAULT_SEQUENCE_LENGTH = 30;

/** Id written to positions past the end of the input. */
export const PADDING_ID = 0;

export interface SequenceEncoderOptions {
  /** Default: 30 */
  sequenceLength?: number;
}

/**
 * Encodes text as a fixed-length sequence of token ids.
 *
 * Words are the lowercased whitespace-separated pieces of the text. Unknown
 * words map to the token map's OOV id, short inputs are zero-padded and words
 * past `sequenceLength` are dropped. Every value lies in
 * `[0, tokenMap.vocabSize)`.
 */
export class SequenceEncoder implements FeatureEncoder<Int32Array> {
  readonly kind = 'sequence';
  readonly dtype = 'int32';
  readonly dimension: number;

  private readonly tokenMap: TokenMap;

  constructor(tokenMap: TokenMap, options: SequenceEncoderOptions = {}) {
    const sequenceLength = options.sequenceLength ?? DEFAULT_SEQUENCE_LENGTH;
    if (!Number.isInteger(sequenceLength) || sequenceLength <= 0) {
      throw new ConfigError(
        `sequenceLength must be a positive integer, got ${sequenceLength}`,
        'sequenceLength',
      );
    }
    this.tokenMap = tokenMap;
    this.dimension = sequenceLength;
  }

  get vocabSize(): number {
    return this.tokenMap.vocabSize;
  }

  encode(text: string): Int32Array {
    const sequence = new Int32Array(this.dimension).fill(PADDING_ID);
    const words = splitWords(text);
    const limit = Math.min(words.length, this.dimension);
    for (let p = 0; p < limit; p++) {
      sequence[p] = this.tokenMap.tokens.get(words[p]) ?? this.tokenMap.oovId;
    }
    return sequence;
  }
}
