// ============================================================================
// @textprobe/core — Report Formatting (for CLI display)
// ============================================================================

import type { BenchmarkResult } from './benchmark.js';
import { phaseShare } from './phase_timer.js';
import type { ClassificationReport } from './pipeline.js';
import type { SystemInfo } from './system_info.js';
import { TARGET_LATENCY_MS } from './tiers.js';
import type { PerformanceTier, ResourceMetrics, TimingMetrics } from './types.js';

/** Options for format functions to control Unicode/ASCII output. */
export interface FormatOptions {
  /** If true, use pure ASCII characters instead of Unicode box-drawing. */
  ascii?: boolean;
}

const TIER_MARKS: Record<PerformanceTier, { unicode: string; ascii: string }> = {
  Excellent: { unicode: '🚀', ascii: '[A+]' },
  Good: { unicode: '✅', ascii: '[A]' },
  Acceptable: { unicode: '⚠️', ascii: '[B]' },
  Poor: { unicode: '❌', ascii: '[C]' },
};

export function tierLabel(tier: PerformanceTier, opts: FormatOptions = {}): string {
  const mark = opts.ascii ? TIER_MARKS[tier].ascii : TIER_MARKS[tier].unicode;
  return `${mark} ${tier.toUpperCase()}`;
}

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Wrap lines in a box. Pass `{ ascii: true }` for non-Unicode terminals.
 */
export function frame(title: string, body: string[], opts: FormatOptions = {}): string {
  const a = !!opts.ascii;
  const H = a ? '-' : '─';
  const V = a ? '|' : '│';
  const TL = a ? '+' : '┌';
  const TR = a ? '+' : '┐';
  const ML = a ? '+' : '├';
  const MR = a ? '+' : '┤';
  const BL = a ? '+' : '└';
  const BR = a ? '+' : '┘';

  const w = Math.max(64, title.length + 4, ...body.map((l) => l.length + 2));
  const border = H.repeat(w);
  const lines: string[] = [];
  lines.push(`${TL}${border}${TR}`);
  lines.push(`${V}${`  ${title}`.padEnd(w)}${V}`);
  lines.push(`${ML}${border}${MR}`);
  for (const l of body) {
    lines.push(`${V}${l.padEnd(w)}${V}`);
  }
  lines.push(`${BL}${border}${BR}`);
  return lines.join('\n');
}

export function formatSystemInfo(info: SystemInfo): string[] {
  return [
    `  Platform:        ${info.platform}`,
    `  Processor:       ${info.arch}`,
    `  CPU Cores:       ${info.cpuCores}`,
    `  Total Memory:    ${info.totalMemoryGb.toFixed(1)} GB`,
    `  Runtime:         ${info.runtime} ${info.runtimeVersion}`,
    `  Engine:          ${info.engine.name} ${info.engine.version}`,
  ];
}

/**
 * Prediction block: top label, confidence, every class score and the input.
 */
export function formatPrediction(report: ClassificationReport): string[] {
  const { prediction } = report;
  const lines = [
    `  Prediction:      ${prediction.label}`,
    `  Confidence:      ${percent(prediction.confidence)} (${prediction.confidence.toFixed(4)})`,
  ];
  if (prediction.activeLabels.length > 0) {
    lines.push(`  Active labels:   ${prediction.activeLabels.join(', ')}`);
  }
  lines.push(`  Input text:      "${report.text}"`);
  lines.push('  Class scores:');
  for (const s of prediction.scores) {
    lines.push(`    ${s.label}: ${s.score.toFixed(4)} (${percent(s.score)})`);
  }
  return lines;
}

/**
 * Phase split, throughput, memory/CPU usage and the rating of one prediction.
 */
export function formatPerformanceSummary(
  timing: TimingMetrics,
  resources: ResourceMetrics,
  tier: PerformanceTier,
  opts: FormatOptions = {},
): string[] {
  const branch = opts.ascii ? '|-' : '┣━';
  const last = opts.ascii ? '`-' : '┗━';
  const share = (ms: number) => phaseShare(ms, timing.totalMs).toFixed(1);

  const lines = [
    `  Total Processing Time: ${timing.totalMs.toFixed(2)} ms`,
    `  ${branch} Preprocessing:   ${timing.preprocessingMs.toFixed(2)} ms (${share(timing.preprocessingMs)}%)`,
    `  ${branch} Model Inference: ${timing.inferenceMs.toFixed(2)} ms (${share(timing.inferenceMs)}%)`,
    `  ${last} Postprocessing:  ${timing.postprocessingMs.toFixed(2)} ms (${share(timing.postprocessingMs)}%)`,
    `  Texts per second:      ${timing.throughputPerSec.toFixed(1)}`,
    ...formatResources(resources),
    `  Rating:                ${tierLabel(tier, opts)}`,
    `  (${timing.totalMs.toFixed(1)} ms total - Target: <${TARGET_LATENCY_MS} ms)`,
  ];
  return lines;
}

export function formatResources(resources: ResourceMetrics): string[] {
  const lines = [
    `  Memory Start:          ${resources.memoryStartMb.toFixed(2)} MB`,
    `  Memory End:            ${resources.memoryEndMb.toFixed(2)} MB`,
    `  Memory Delta:          ${signed(resources.memoryDeltaMb)} MB`,
  ];
  if (resources.cpuReadingsCount > 0) {
    lines.push(
      `  CPU Usage:             ${resources.cpuAvgPercent.toFixed(1)}% avg, ${resources.cpuMaxPercent.toFixed(1)}% peak (${resources.cpuReadingsCount} samples)`,
    );
  }
  return lines;
}

export function formatBenchmarkResult(result: BenchmarkResult, opts: FormatOptions = {}): string[] {
  const { latency } = result;
  const lines = [
    `  Text:                  "${result.text}"`,
    `  Runs:                  ${result.completed}/${result.iterations} completed (${result.warmup} warmup)`,
    `  Mean:                  ${latency.meanMs.toFixed(2)} ms`,
    `  Min:                   ${latency.minMs.toFixed(2)} ms`,
    `  Max:                   ${latency.maxMs.toFixed(2)} ms`,
    `  p50 / p95:             ${latency.p50Ms.toFixed(2)} / ${latency.p95Ms.toFixed(2)} ms`,
    `  Model Inference:       ${result.meanInferenceMs.toFixed(2)} ms`,
    `  Texts per second:      ${result.textsPerSecond.toFixed(1)}`,
    `  Total benchmark time:  ${(result.totalElapsedMs / 1000).toFixed(2)} s`,
    `  Overall throughput:    ${result.overallThroughputPerSec.toFixed(1)} texts/sec`,
    ...formatResources(result.resources),
  ];
  if (result.failed > 0 || result.warmupFailures > 0) {
    lines.push(`  Failed runs:           ${result.failed} timed, ${result.warmupFailures} warmup`);
  }
  lines.push(`  Classification:        ${tierLabel(result.tier, opts)}`);
  lines.push(`  (${latency.meanMs.toFixed(1)} ms average - Target: <${TARGET_LATENCY_MS} ms)`);
  return lines;
}
