// ============================================================================
// @textprobe/core — Benchmark Harness
// ============================================================================
//
// Runs the full pipeline `warmup` times untimed, then `iterations` times
// timed, strictly one after another so every run is measured in isolation.
// Inference failures in a run are skipped, counted and logged; anything else
// aborts the benchmark.
// ============================================================================

import { ConfigError, InferenceRuntimeError, errorMessage, isInferenceFailure } from './errors.js';
import { logBenchmarkProgress, logIterationFailure } from './logger.js';
import { monitorAsync, type PerformanceMonitorOptions } from './performance_monitor.js';
import { monotonicClock } from './phase_timer.js';
import type { ClassificationPipeline } from './pipeline.js';
import { classifyLatency } from './tiers.js';
import type { Clock, PerformanceTier, ResourceMetrics } from './types.js';

export const DEFAULT_WARMUP_RUNS = 5;
export const DEFAULT_PROGRESS_EVERY = 20;

// ---- Types ----

export interface BenchmarkOptions {
  /** Text classified on every run. */
  text: string;
  clock?: Clock;
  monitor?: PerformanceMonitorOptions;
  /** Report progress every N timed runs. Default: 20 */
  progressEvery?: number;
  onProgress?: (completed: number, total: number) => void;
}

export interface IterationFailure {
  /** 0-based index within its stage. */
  iteration: number;
  stage: 'warmup' | 'timed';
  errorName: string;
  message: string;
}

export interface LatencyStats {
  meanMs: number;
  minMs: number;
  maxMs: number;
  p50Ms: number;
  p95Ms: number;
}

export interface BenchmarkResult {
  text: string;
  iterations: number;
  completed: number;
  failed: number;
  warmup: number;
  warmupFailures: number;
  /** Total (end-to-end) latency over the completed timed runs. */
  latency: LatencyStats;
  meanInferenceMs: number;
  /** `1000 / latency.meanMs`. */
  textsPerSecond: number;
  /** Requested iterations per second of wall-clock time across the timed stage. */
  overallThroughputPerSec: number;
  totalElapsedMs: number;
  tier: PerformanceTier;
  failures: IterationFailure[];
  resources: ResourceMetrics;
}

// ---- Statistics ----

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Nearest-rank percentile, `p` in [0, 1]. */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.ceil(sorted.length * p);
  const index = Math.min(sorted.length - 1, Math.max(0, rank - 1));
  return sorted[index];
}

export function computeLatencyStats(latencies: readonly number[]): LatencyStats {
  if (latencies.length === 0) {
    return { meanMs: 0, minMs: 0, maxMs: 0, p50Ms: 0, p95Ms: 0 };
  }
  let min = Infinity;
  let max = -Infinity;
  for (const v of latencies) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return {
    meanMs: mean(latencies),
    minMs: min,
    maxMs: max,
    p50Ms: percentile(latencies, 0.5),
    p95Ms: percentile(latencies, 0.95),
  };
}

// ---- Harness ----

/**
 * Repeats a ClassificationPipeline and aggregates latency statistics.
 *
 * @example
 * ```ts
 * const harness = new BenchmarkHarness(pipeline, { text: 'Stock Market Reaches Record High' });
 * const result = await harness.run(100);
 * console.log(result.latency.meanMs, result.tier);
 * ```
 */
export class BenchmarkHarness {
  private readonly pipeline: ClassificationPipeline;
  private readonly options: BenchmarkOptions;
  private readonly clock: Clock;

  constructor(pipeline: ClassificationPipeline, options: BenchmarkOptions) {
    this.pipeline = pipeline;
    this.options = options;
    this.clock = options.clock ?? monotonicClock;
  }

  /**
   * @throws ConfigError for a non-positive `iterations` or negative `warmup`
   * @throws InferenceRuntimeError when every timed run fails
   */
  async run(iterations: number, warmup = DEFAULT_WARMUP_RUNS): Promise<BenchmarkResult> {
    if (!Number.isInteger(iterations) || iterations <= 0) {
      throw new ConfigError(`iterations must be a positive integer, got ${iterations}`, 'iterations');
    }
    if (!Number.isInteger(warmup) || warmup < 0) {
      throw new ConfigError(`warmup must be a non-negative integer, got ${warmup}`, 'warmup');
    }

    const { text } = this.options;
    const failures: IterationFailure[] = [];

    for (let i = 0; i < warmup; i++) {
      await this.attempt(i, 'warmup', failures);
    }
    const warmupFailures = failures.length;

    const totals: number[] = [];
    const inferences: number[] = [];
    const progressEvery = this.options.progressEvery ?? DEFAULT_PROGRESS_EVERY;

    const { result: totalElapsedMs, resources } = await monitorAsync(async () => {
      const started = this.clock();
      for (let i = 0; i < iterations; i++) {
        if (i > 0 && i % progressEvery === 0) {
          logBenchmarkProgress(i, iterations);
          this.options.onProgress?.(i, iterations);
        }
        const run = await this.attempt(i, 'timed', failures);
        if (run) {
          totals.push(run.totalMs);
          inferences.push(run.inferenceMs);
        }
      }
      return this.clock() - started;
    }, this.options.monitor);

    const failed = failures.length - warmupFailures;
    if (totals.length === 0) {
      const last = failures[failures.length - 1];
      throw new InferenceRuntimeError(
        `All ${iterations} benchmark iterations failed${last ? `: ${last.message}` : ''}`,
      );
    }

    const latency = computeLatencyStats(totals);
    return {
      text,
      iterations,
      completed: totals.length,
      failed,
      warmup,
      warmupFailures,
      latency,
      meanInferenceMs: mean(inferences),
      textsPerSecond: latency.meanMs > 0 ? 1000 / latency.meanMs : 0,
      overallThroughputPerSec: totalElapsedMs > 0 ? iterations / (totalElapsedMs / 1000) : 0,
      totalElapsedMs,
      tier: classifyLatency(latency.meanMs),
      failures,
      resources,
    };
  }

  /** One pipeline run; inference failures are recorded and yield null. */
  private async attempt(
    iteration: number,
    stage: IterationFailure['stage'],
    failures: IterationFailure[],
  ): Promise<{ totalMs: number; inferenceMs: number } | null> {
    try {
      const { timing } = await this.pipeline.run(this.options.text);
      return { totalMs: timing.totalMs, inferenceMs: timing.inferenceMs };
    } catch (err) {
      if (!isInferenceFailure(err)) throw err;
      const message = errorMessage(err);
      failures.push({ iteration, stage, errorName: err.name, message });
      logIterationFailure(iteration, stage, message);
      return null;
    }
  }
}
