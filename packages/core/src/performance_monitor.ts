// ============================================================================
// @textprobe/core — Performance Monitor
// ============================================================================
//
// Samples process CPU utilization on a fixed period while a measurement is in
// progress, and records heap usage before and after it.
//
//   idle ──start()──▶ monitoring ──stop()──▶ stopped ──start()──▶ monitoring
//
// The sample buffer is private to the monitor. The sampler tick and stop()
// both run on the event loop, so stop() always sees every completed tick and
// no tick runs after the timer is cleared.
// ============================================================================

import { MonitorStateError } from './errors.js';
import type { ResourceMetrics } from './types.js';

export type MonitorState = 'idle' | 'monitoring' | 'stopped';

/** Returns one CPU-utilization reading in percent. */
export type CpuSampler = () => number;

export interface PerformanceMonitorOptions {
  /** Sampling period in milliseconds. Default: 100 */
  intervalMs?: number;
  /** Maximum readings kept; the oldest is dropped on overflow. Default: 10 000 */
  capacity?: number;
  /** Builds a fresh sampler for each measurement. Default: {@link createProcessCpuSampler} */
  createSampler?: () => CpuSampler;
  /** Current memory usage in MB. Default: heap used by this process. */
  readMemoryMb?: () => number;
}

export const DEFAULT_SAMPLE_INTERVAL_MS = 100;
export const DEFAULT_SAMPLE_CAPACITY = 10_000;

const BYTES_PER_MB = 1024 * 1024;

// ── Helpers ──────────────────────────────────────────────────────────────────

/** Heap used by this process, in MB. */
export function heapUsedMb(): number {
  return process.memoryUsage().heapUsed / BYTES_PER_MB;
}

/**
 * CPU sampler based on `process.cpuUsage`: user + system CPU time spent since
 * the previous reading, as a percentage of the wall-clock time that elapsed.
 * 100% is one fully busy core.
 */
export function createProcessCpuSampler(): CpuSampler {
  let lastCpu = process.cpuUsage();
  let lastWall = performance.now();

  return () => {
    const cpu = process.cpuUsage(lastCpu);
    const wall = performance.now();
    const wallUs = (wall - lastWall) * 1000;
    lastCpu = process.cpuUsage();
    lastWall = wall;
    if (wallUs <= 0) return 0;
    return ((cpu.user + cpu.system) / wallUs) * 100;
  };
}

/**
 * Background CPU sampler for a single measured interval.
 *
 * @example
 * ```ts
 * const monitor = new PerformanceMonitor();
 * monitor.start();
 * await classify(text);
 * const resources = monitor.stop();
 * console.log(resources.cpuAvgPercent, resources.cpuReadingsCount);
 * ```
 */
export class PerformanceMonitor {
  private readonly intervalMs: number;
  private readonly capacity: number;
  private readonly createSampler: () => CpuSampler;
  private readonly readMemoryMb: () => number;

  private _state: MonitorState = 'idle';
  private handle: ReturnType<typeof setInterval> | null = null;
  private readings: number[] = [];
  private dropped = 0;
  private memoryStartMb = 0;

  constructor(options: PerformanceMonitorOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    this.capacity = options.capacity ?? DEFAULT_SAMPLE_CAPACITY;
    this.createSampler = options.createSampler ?? createProcessCpuSampler;
    this.readMemoryMb = options.readMemoryMb ?? heapUsedMb;
  }

  get state(): MonitorState {
    return this._state;
  }

  /**
   * Begin a measurement. Throws MonitorStateError while already monitoring.
   */
  start(): void {
    if (this._state === 'monitoring') {
      throw new MonitorStateError('start', this._state);
    }

    this.readings = [];
    this.dropped = 0;
    this.memoryStartMb = this.readMemoryMb();

    const sample = this.createSampler();
    this.handle = setInterval(() => {
      this.record(sample());
    }, this.intervalMs);
    // Sampling alone must not keep the process alive.
    this.handle.unref();

    this._state = 'monitoring';
  }

  /**
   * End the measurement and aggregate the collected readings.
   * Throws MonitorStateError unless monitoring.
   */
  stop(): ResourceMetrics {
    if (this._state !== 'monitoring') {
      throw new MonitorStateError('stop', this._state);
    }

    if (this.handle !== null) {
      clearInterval(this.handle);
      this.handle = null;
    }
    this._state = 'stopped';

    const readings = this.readings;
    this.readings = [];
    const memoryEndMb = this.readMemoryMb();

    let sum = 0;
    let max = 0;
    for (const reading of readings) {
      sum += reading;
      if (reading > max) max = reading;
    }

    return {
      memoryStartMb: this.memoryStartMb,
      memoryEndMb,
      memoryDeltaMb: memoryEndMb - this.memoryStartMb,
      cpuAvgPercent: readings.length > 0 ? sum / readings.length : 0,
      cpuMaxPercent: max,
      cpuReadingsCount: readings.length,
      cpuReadings: Object.freeze(readings),
      droppedReadings: this.dropped,
    };
  }

  private record(reading: number): void {
    if (this._state !== 'monitoring') return;
    if (this.readings.length >= this.capacity) {
      this.readings.shift();
      this.dropped++;
    }
    this.readings.push(reading);
  }
}

/**
 * Run `fn` under a fresh monitor and return its result with the metrics.
 * The monitor is stopped even when `fn` rejects.
 */
export async function monitorAsync<T>(
  fn: () => Promise<T>,
  options: PerformanceMonitorOptions = {},
): Promise<{ result: T; resources: ResourceMetrics }> {
  const monitor = new PerformanceMonitor(options);
  monitor.start();
  let result: T;
  try {
    result = await fn();
  } catch (err) {
    monitor.stop();
    throw err;
  }
  return { result, resources: monitor.stop() };
}
