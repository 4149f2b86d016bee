// ============================================================================
// @textprobe/core — TF-IDF Encoder
// ============================================================================

import { countTokens, tokenize } from './tokenizer.js';
import type { FeatureEncoder, TfidfVocabulary } from './types.js';

export interface TfidfEncoderOptions {
  /**
   * Divide the vector by its Euclidean norm. Must match how the deployed
   * model was trained. Default: false
   */
  l2Normalize?: boolean;
}

/**
 * Encodes text as a dense TF-IDF vector of `vocabulary.featureDim` floats.
 *
 * `feature[i] = (count(w) / totalTokens) * idf[i]` for every distinct token
 * `w` at vocabulary index `i`. Tokens outside the vocabulary still count
 * toward `totalTokens` but contribute no weight.
 *
 * @example
 * ```ts
 * const encoder = new TfidfEncoder(loadVocabulary('vocab.json'));
 * const features = encoder.encode('This product is amazing!');
 * ```
 */
export class TfidfEncoder implements FeatureEncoder<Float32Array> {
  readonly kind = 'tfidf';
  readonly dtype = 'float32';
  readonly dimension: number;
  readonly l2Normalize: boolean;

  private readonly vocabulary: TfidfVocabulary;

  constructor(vocabulary: TfidfVocabulary, options: TfidfEncoderOptions = {}) {
    this.vocabulary = vocabulary;
    this.dimension = vocabulary.featureDim;
    this.l2Normalize = options.l2Normalize ?? false;
  }

  encode(text: string): Float32Array {
    const vector = new Float32Array(this.dimension);
    const tokens = tokenize(text);
    const totalTokens = tokens.length;
    if (totalTokens === 0) {
      return vector;
    }

    const { vocab, idf } = this.vocabulary;
    for (const [token, count] of countTokens(tokens)) {
      const index = vocab.get(token);
      if (index === undefined) continue;
      vector[index] = (count / totalTokens) * idf[index];
    }

    if (this.l2Normalize) {
      l2NormalizeInPlace(vector);
    }
    return vector;
  }
}

/**
 * Scale `vector` to unit Euclidean length. A zero vector is left as is.
 */
export function l2NormalizeInPlace(vector: Float32Array): Float32Array {
  let sumSquares = 0;
  for (let i = 0; i < vector.length; i++) {
    sumSquares += vector[i] * vector[i];
  }
  if (sumSquares > 0) {
    const inv = 1 / Math.sqrt(sumSquares);
    for (let i = 0; i < vector.length; i++) {
      vector[i] *= inv;
    }
  }
  return vector;
}
