// ============================================================================
// @textprobe/core — Phase Timer
// ============================================================================

import type { Clock, Phase, TimingMetrics } from './types.js';

/** `performance.now`, the monotonic clock used by default. */
export const monotonicClock: Clock = () => performance.now();

/**
 * Records wall-clock durations of the preprocessing, inference and
 * postprocessing phases of one prediction.
 *
 * A phase measured twice accumulates. A phase whose callback throws still
 * records the time spent before the throw.
 *
 * @example
 * ```ts
 * const phases = new PhaseTimer();
 * const features = phases.measure('preprocessing', () => encoder.encode(text));
 * const output = await phases.measureAsync('inference', () => invoker.run(tensor));
 * console.log(phases.metrics().totalMs);
 * ```
 */
export class PhaseTimer {
  private readonly clock: Clock;
  private readonly durations: Record<Phase, number> = {
    preprocessing: 0,
    inference: 0,
    postprocessing: 0,
  };

  constructor(clock: Clock = monotonicClock) {
    this.clock = clock;
  }

  measure<T>(phase: Phase, fn: () => T): T {
    const start = this.clock();
    try {
      return fn();
    } finally {
      this.durations[phase] += this.clock() - start;
    }
  }

  async measureAsync<T>(phase: Phase, fn: () => Promise<T>): Promise<T> {
    const start = this.clock();
    try {
      return await fn();
    } finally {
      this.durations[phase] += this.clock() - start;
    }
  }

  metrics(): TimingMetrics {
    return computeTimingMetrics(
      this.durations.preprocessing,
      this.durations.inference,
      this.durations.postprocessing,
    );
  }
}

/**
 * Build TimingMetrics from three phase durations. `totalMs` is their sum.
 */
export function computeTimingMetrics(
  preprocessingMs: number,
  inferenceMs: number,
  postprocessingMs: number,
): TimingMetrics {
  const totalMs = preprocessingMs + inferenceMs + postprocessingMs;
  return {
    preprocessingMs,
    inferenceMs,
    postprocessingMs,
    totalMs,
    throughputPerSec: totalMs > 0 ? 1000 / totalMs : 0,
  };
}

/** Share of `totalMs` spent in `phaseMs`, in percent. */
export function phaseShare(phaseMs: number, totalMs: number): number {
  return totalMs > 0 ? (phaseMs / totalMs) * 100 : 0;
}
