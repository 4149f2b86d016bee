// ============================================================================
// @textprobe/core — Classification Pipeline
// ============================================================================
//
// preprocess (encode → scale) → inference → postprocess (interpret), each
// phase timed by a PhaseTimer. `classify` additionally runs a
// PerformanceMonitor for the whole operation.
// ============================================================================

import { ConfigError } from './errors.js';
import { assertInputCompatible, type InferenceInvoker, toInputTensor } from './inference.js';
import { monitorAsync, type PerformanceMonitorOptions } from './performance_monitor.js';
import { PhaseTimer, monotonicClock } from './phase_timer.js';
import { interpretOutput } from './postprocess.js';
import type { Scaler } from './scaler.js';
import { classifyLatency } from './tiers.js';
import type {
  Clock,
  FeatureEncoder,
  FeatureVector,
  LabelMap,
  OutputMode,
  PerformanceTier,
  Prediction,
  ResourceMetrics,
  TimingMetrics,
} from './types.js';

export interface PipelineOptions {
  encoder: FeatureEncoder;
  /** Only valid with a TF-IDF encoder of the same dimension. */
  scaler?: Scaler;
  invoker: InferenceInvoker;
  mode: OutputMode;
  labels?: LabelMap;
  threshold?: number;
  clock?: Clock;
  monitor?: PerformanceMonitorOptions;
}

/** One timed pass through the pipeline. */
export interface PipelineRun {
  prediction: Prediction;
  timing: TimingMetrics;
}

/** A single monitored prediction. */
export interface ClassificationReport extends PipelineRun {
  text: string;
  resources: ResourceMetrics;
  tier: PerformanceTier;
}

export class ClassificationPipeline {
  readonly encoder: FeatureEncoder;
  readonly scaler?: Scaler;
  readonly invoker: InferenceInvoker;

  private readonly mode: OutputMode;
  private readonly labels?: LabelMap;
  private readonly threshold?: number;
  private readonly clock: Clock;
  private readonly monitorOptions: PerformanceMonitorOptions;

  /**
   * @throws ConfigError when the scaler does not fit the encoder
   * @throws ShapeMismatchError when the encoder output does not fit the model input
   */
  constructor(options: PipelineOptions) {
    const { encoder, scaler, invoker } = options;

    if (scaler) {
      if (encoder.kind !== 'tfidf') {
        throw new ConfigError('A scaler can only be used with the TF-IDF encoder', 'scaler');
      }
      if (scaler.dimension !== encoder.dimension) {
        throw new ConfigError(
          `Scaler has ${scaler.dimension} features but the encoder produces ${encoder.dimension}`,
          'scaler',
        );
      }
    }
    assertInputCompatible(invoker.input, { dtype: encoder.dtype, shape: [1, encoder.dimension] });

    this.encoder = encoder;
    this.scaler = scaler;
    this.invoker = invoker;
    this.mode = options.mode;
    this.labels = options.labels;
    this.threshold = options.threshold;
    this.clock = options.clock ?? monotonicClock;
    this.monitorOptions = options.monitor ?? {};
  }

  /** Encode `text` and, on the TF-IDF path, standardize it. */
  preprocess(text: string): FeatureVector {
    const features = this.encoder.encode(text);
    if (this.scaler && features instanceof Float32Array) {
      return this.scaler.apply(features);
    }
    return features;
  }

  async run(text: string): Promise<PipelineRun> {
    const phases = new PhaseTimer(this.clock);

    const features = phases.measure('preprocessing', () => this.preprocess(text));
    const output = await phases.measureAsync('inference', () =>
      this.invoker.run(toInputTensor(features)),
    );
    const prediction = phases.measure('postprocessing', () =>
      interpretOutput(output.data, {
        mode: this.mode,
        labels: this.labels,
        threshold: this.threshold,
      }),
    );

    return { prediction, timing: phases.metrics() };
  }

  /** Run once under a PerformanceMonitor and rate the latency. */
  async classify(text: string): Promise<ClassificationReport> {
    const { result, resources } = await monitorAsync(() => this.run(text), this.monitorOptions);
    return {
      text,
      ...result,
      resources,
      tier: classifyLatency(result.timing.totalMs),
    };
  }
}
