// ============================================================================
// @textprobe/core — Output Interpretation
// ============================================================================
//
// Turns a raw output tensor into a labelled prediction:
//   binary      one sigmoid probability (or a two-class pair) vs. a threshold
//   multiclass  softmax scores, argmax wins
//   multilabel  independent sigmoids, every class over the threshold is active
// ============================================================================

import { ShapeMismatchError } from './errors.js';
import type { ClassScore, LabelMap, OutputMode, Prediction } from './types.js';

export const DEFAULT_THRESHOLD = 0.5;

const BINARY_DEFAULT_LABELS = ['Negative', 'Positive'] as const;

export interface InterpretOptions {
  mode: OutputMode;
  labels?: LabelMap;
  /** Decision threshold for binary and multilabel modes. Default: 0.5 */
  threshold?: number;
}

function labelFor(index: number, labels: LabelMap | undefined): string {
  return labels?.labels.get(index) ?? `Class ${index}`;
}

function argmax(values: Float32Array): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

function interpretBinary(output: Float32Array, labels: LabelMap | undefined, threshold: number): Prediction {
  const probability = output.length === 2 ? output[1] : output[0];
  const positive = probability > threshold;
  const index = positive ? 1 : 0;
  const label = labels?.labels.get(index) ?? BINARY_DEFAULT_LABELS[index];

  const negativeLabel = labels?.labels.get(0) ?? BINARY_DEFAULT_LABELS[0];
  const positiveLabel = labels?.labels.get(1) ?? BINARY_DEFAULT_LABELS[1];

  return {
    label,
    confidence: positive ? probability : 1 - probability,
    scores: [
      { index: 0, label: negativeLabel, score: 1 - probability },
      { index: 1, label: positiveLabel, score: probability },
    ],
    activeLabels: [],
  };
}

/**
 * Interpret a model output vector.
 *
 * @throws ShapeMismatchError when the output is empty
 */
export function interpretOutput(output: Float32Array, options: InterpretOptions): Prediction {
  if (output.length === 0) {
    throw new ShapeMismatchError('model output', 'at least 1 value', '0');
  }
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;

  if (options.mode === 'binary') {
    return interpretBinary(output, options.labels, threshold);
  }

  const scores: ClassScore[] = Array.from(output, (score, index) => ({
    index,
    label: labelFor(index, options.labels),
    score,
  }));
  const top = argmax(output);

  return {
    label: scores[top].label,
    confidence: scores[top].score,
    scores,
    activeLabels:
      options.mode === 'multilabel'
        ? scores.filter((s) => s.score >= threshold).map((s) => s.label)
        : [],
  };
}
