// ============================================================================
// @textprobe/core — Feature Scaler
// ============================================================================

import { ShapeMismatchError } from './errors.js';
import type { ScalerParams } from './types.js';

/**
 * Per-feature standardization: `out[i] = (x[i] - mean[i]) / scale[i]`.
 *
 * The params come from `loadScaler`, which rejects zero scales, so `apply`
 * never divides by zero.
 */
export class Scaler {
  readonly params: ScalerParams;

  constructor(params: ScalerParams) {
    this.params = params;
  }

  get dimension(): number {
    return this.params.featureDim;
  }

  apply(vector: Float32Array): Float32Array {
    this.checkLength(vector);
    const { mean, scale } = this.params;
    const out = new Float32Array(vector.length);
    for (let i = 0; i < vector.length; i++) {
      out[i] = (vector[i] - mean[i]) / scale[i];
    }
    return out;
  }

  /** Undo {@link apply}: `x[i] = out[i] * scale[i] + mean[i]`. */
  invert(vector: Float32Array): Float32Array {
    this.checkLength(vector);
    const { mean, scale } = this.params;
    const out = new Float32Array(vector.length);
    for (let i = 0; i < vector.length; i++) {
      out[i] = vector[i] * scale[i] + mean[i];
    }
    return out;
  }

  private checkLength(vector: Float32Array): void {
    if (vector.length !== this.params.featureDim) {
      throw new ShapeMismatchError(
        'scaler input',
        `${this.params.featureDim} features`,
        `${vector.length}`,
      );
    }
  }
}
