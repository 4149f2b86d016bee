// ============================================================================
// @textprobe/core — Shared Types
// ============================================================================

// ---- Artifacts ----

/** TF-IDF vocabulary with its index-aligned IDF table. */
export interface TfidfVocabulary {
  readonly vocab: ReadonlyMap<string, number>;
  readonly idf: readonly number[];
  /** Always equal to `idf.length`. */
  readonly featureDim: number;
}

/** Per-feature standardization parameters. No `scale` entry is zero. */
export interface ScalerParams {
  readonly mean: readonly number[];
  readonly scale: readonly number[];
  readonly featureDim: number;
}

/** Word → id map for sequence models. */
export interface TokenMap {
  readonly tokens: ReadonlyMap<string, number>;
  readonly oovId: number;
  /** One past the largest id the map can produce (OOV included). */
  readonly vocabSize: number;
}

/** Class index → display label. */
export interface LabelMap {
  readonly labels: ReadonlyMap<number, string>;
}

// ---- Features ----

export type FeatureVector = Float32Array | Int32Array;

export type EncoderKind = 'tfidf' | 'sequence';

/**
 * Text → fixed-length numeric vector.
 */
export interface FeatureEncoder<V extends FeatureVector = FeatureVector> {
  readonly kind: EncoderKind;
  /** Length of every vector this encoder produces. */
  readonly dimension: number;
  /** Element type of the produced vector, matching the model input dtype. */
  readonly dtype: 'float32' | 'int32';
  encode(text: string): V;
}

// ---- Tensors ----

export type TensorDType = 'float32' | 'int32' | 'int64';

/** Declared model input, read from the loaded model. `null` marks a dynamic dimension. */
export interface TensorSignature {
  readonly name: string;
  readonly dtype: TensorDType;
  readonly shape: readonly (number | null)[];
}

export interface InputTensor {
  readonly dtype: 'float32' | 'int32';
  readonly data: FeatureVector;
  readonly shape: readonly number[];
}

export interface OutputTensor {
  readonly data: Float32Array;
  readonly shape: readonly number[];
}

// ---- Predictions ----

export type OutputMode = 'binary' | 'multiclass' | 'multilabel';

export interface ClassScore {
  index: number;
  label: string;
  score: number;
}

export interface Prediction {
  /** Top label (binary decision, argmax, or dominant label). */
  label: string;
  confidence: number;
  scores: ClassScore[];
  /** Labels at or above the threshold. Only populated in multilabel mode. */
  activeLabels: string[];
}

// ---- Metrics ----

export type Phase = 'preprocessing' | 'inference' | 'postprocessing';

export interface TimingMetrics {
  preprocessingMs: number;
  inferenceMs: number;
  postprocessingMs: number;
  totalMs: number;
  /** `1000 / totalMs`; 0 when nothing was timed. */
  throughputPerSec: number;
}

export interface ResourceMetrics {
  memoryStartMb: number;
  memoryEndMb: number;
  memoryDeltaMb: number;
  cpuAvgPercent: number;
  cpuMaxPercent: number;
  cpuReadingsCount: number;
  cpuReadings: readonly number[];
  /** Readings evicted because the sample buffer was full. */
  droppedReadings: number;
}

export type PerformanceTier = 'Excellent' | 'Good' | 'Acceptable' | 'Poor';

/** Monotonic millisecond clock. */
export type Clock = () => number;
