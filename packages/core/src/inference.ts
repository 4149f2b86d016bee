// ============================================================================
// @textprobe/core — Inference Contract
// ============================================================================
//
// The core never talks to an inference engine directly. It hands a tensor to
// an InferenceInvoker and gets a tensor back. The invoker owns its engine
// session: it is created once, injected where needed and disposed by its owner.
// ============================================================================

import { ShapeMismatchError } from './errors.js';
import type {
  FeatureVector,
  InputTensor,
  OutputTensor,
  TensorDType,
  TensorSignature,
} from './types.js';

/** Name and version of the engine behind an invoker, for reports. */
export interface EngineInfo {
  name: string;
  version: string;
}

/**
 * Minimal contract around an inference engine session.
 *
 * `run` surfaces ModelLoadError, ShapeMismatchError or InferenceRuntimeError
 * and never retries. It is deterministic for a fixed model and input.
 */
export interface InferenceInvoker {
  /** Declared model input, read from the loaded model. */
  readonly input: TensorSignature;
  readonly engine: EngineInfo;
  run(input: InputTensor): Promise<OutputTensor>;
  /** Release the engine session. */
  dispose(): Promise<void>;
}

/**
 * Wrap a feature vector as a batch-of-one tensor (`[1, length]`).
 */
export function toInputTensor(vector: FeatureVector): InputTensor {
  if (vector instanceof Float32Array) {
    return { dtype: 'float32', data: vector, shape: [1, vector.length] };
  }
  return { dtype: 'int32', data: vector, shape: [1, vector.length] };
}

function formatShape(shape: readonly (number | null)[]): string {
  return `[${shape.map((dim) => (dim === null ? '?' : String(dim))).join(', ')}]`;
}

/**
 * Whether a vector of `actual` can be fed to an input declared as `declared`.
 * int32 features may feed int64 inputs; invokers widen them.
 */
export function dtypeCompatible(declared: TensorDType, actual: 'float32' | 'int32'): boolean {
  if (declared === 'float32') return actual === 'float32';
  return actual === 'int32';
}

/**
 * Check an input tensor (or, with only `dtype` and `shape`, a planned one)
 * against a model input signature.
 *
 * @throws ShapeMismatchError on a dtype, rank or fixed-dimension mismatch
 */
export function assertInputCompatible(
  signature: TensorSignature,
  tensor: Pick<InputTensor, 'dtype' | 'shape'>,
): void {
  const context = `model input "${signature.name}"`;

  if (!dtypeCompatible(signature.dtype, tensor.dtype)) {
    throw new ShapeMismatchError(context, `dtype ${signature.dtype}`, `dtype ${tensor.dtype}`);
  }

  if (signature.shape.length !== tensor.shape.length) {
    throw new ShapeMismatchError(context, formatShape(signature.shape), formatShape(tensor.shape));
  }

  for (let i = 0; i < signature.shape.length; i++) {
    const declared = signature.shape[i];
    if (declared !== null && declared !== tensor.shape[i]) {
      throw new ShapeMismatchError(context, formatShape(signature.shape), formatShape(tensor.shape));
    }
  }
}
