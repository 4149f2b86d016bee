// ============================================================================
// @textprobe/core — Performance Tiers
// ============================================================================

import type { PerformanceTier } from './types.js';

/**
 * The one latency → tier table, used for single predictions and benchmarks.
 * A latency below `belowMs` earns `tier`; anything slower is Poor.
 */
export const PERFORMANCE_TIERS: ReadonlyArray<{ belowMs: number; tier: PerformanceTier }> = [
  { belowMs: 10, tier: 'Excellent' },
  { belowMs: 50, tier: 'Good' },
  { belowMs: 100, tier: 'Acceptable' },
];

/** Target latency printed next to ratings. */
export const TARGET_LATENCY_MS = 100;

export function classifyLatency(latencyMs: number): PerformanceTier {
  for (const { belowMs, tier } of PERFORMANCE_TIERS) {
    if (latencyMs < belowMs) return tier;
  }
  return 'Poor';
}
