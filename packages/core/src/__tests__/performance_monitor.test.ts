import { afterEach, describe, expect, it, vi } from 'vitest';
import { MonitorStateError } from '../errors.js';
import { PerformanceMonitor, createProcessCpuSampler, monitorAsync } from '../performance_monitor.js';

// ============================================================================
// Performance Monitor Tests
// ============================================================================

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function counterSampler() {
  let n = 0;
  return () => ++n;
}

describe('PerformanceMonitor', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('collects at least two readings over 250ms at a 100ms period', async () => {
    const monitor = new PerformanceMonitor({ intervalMs: 100 });
    monitor.start();
    await sleep(250);
    const resources = monitor.stop();

    expect(resources.cpuReadingsCount).toBeGreaterThanOrEqual(2);
    expect(resources.cpuReadings.length).toBe(resources.cpuReadingsCount);
    expect(resources.cpuMaxPercent).toBeGreaterThanOrEqual(resources.cpuAvgPercent);
  });

  it('aggregates sampler readings and memory', () => {
    vi.useFakeTimers();
    const memory = [10, 12.5];
    const monitor = new PerformanceMonitor({
      intervalMs: 100,
      createSampler: counterSampler,
      readMemoryMb: () => memory.shift() ?? 0,
    });

    monitor.start();
    vi.advanceTimersByTime(400);
    const resources = monitor.stop();

    expect(resources.cpuReadings).toEqual([1, 2, 3, 4]);
    expect(resources.cpuAvgPercent).toBe(2.5);
    expect(resources.cpuMaxPercent).toBe(4);
    expect(resources.memoryStartMb).toBe(10);
    expect(resources.memoryEndMb).toBe(12.5);
    expect(resources.memoryDeltaMb).toBe(2.5);
    expect(resources.droppedReadings).toBe(0);
  });

  it('drops the oldest readings past capacity', () => {
    vi.useFakeTimers();
    const monitor = new PerformanceMonitor({
      intervalMs: 100,
      capacity: 3,
      createSampler: counterSampler,
      readMemoryMb: () => 0,
    });

    monitor.start();
    vi.advanceTimersByTime(500);
    const resources = monitor.stop();

    expect(resources.cpuReadings).toEqual([3, 4, 5]);
    expect(resources.droppedReadings).toBe(2);
  });

  it('stops sampling once stopped', () => {
    vi.useFakeTimers();
    const sampler = vi.fn(() => 1);
    const monitor = new PerformanceMonitor({ intervalMs: 100, createSampler: () => sampler });

    monitor.start();
    vi.advanceTimersByTime(200);
    monitor.stop();
    vi.advanceTimersByTime(1000);

    expect(sampler).toHaveBeenCalledTimes(2);
  });

  it('reports zero CPU with no readings', () => {
    const monitor = new PerformanceMonitor({ intervalMs: 1000 });
    monitor.start();
    const resources = monitor.stop();
    expect(resources.cpuReadingsCount).toBe(0);
    expect(resources.cpuAvgPercent).toBe(0);
    expect(resources.cpuMaxPercent).toBe(0);
  });

  // ---- State machine ----

  describe('state transitions', () => {
    it('moves idle → monitoring → stopped', () => {
      const monitor = new PerformanceMonitor();
      expect(monitor.state).toBe('idle');
      monitor.start();
      expect(monitor.state).toBe('monitoring');
      monitor.stop();
      expect(monitor.state).toBe('stopped');
    });

    it('rejects start() while monitoring', () => {
      const monitor = new PerformanceMonitor();
      monitor.start();
      expect(() => monitor.start()).toThrow(MonitorStateError);
      monitor.stop();
    });

    it('rejects stop() before start()', () => {
      const monitor = new PerformanceMonitor();
      expect(() => monitor.stop()).toThrow('Cannot stop() a performance monitor in state "idle"');
    });

    it('rejects a second stop()', () => {
      const monitor = new PerformanceMonitor();
      monitor.start();
      monitor.stop();
      expect(() => monitor.stop()).toThrow(MonitorStateError);
    });

    it('can be restarted after stopping', () => {
      vi.useFakeTimers();
      const monitor = new PerformanceMonitor({ intervalMs: 100, createSampler: counterSampler });
      monitor.start();
      vi.advanceTimersByTime(300);
      monitor.stop();

      monitor.start();
      vi.advanceTimersByTime(100);
      expect(monitor.stop().cpuReadings).toEqual([1]);
    });
  });
});

describe('monitorAsync', () => {
  it('returns the result with resource metrics', async () => {
    const { result, resources } = await monitorAsync(async () => 42, { readMemoryMb: () => 1 });
    expect(result).toBe(42);
    expect(resources.memoryDeltaMb).toBe(0);
  });

  it('stops the monitor and rethrows when the callback rejects', async () => {
    vi.useFakeTimers();
    const sampler = vi.fn(() => 1);
    await expect(
      monitorAsync(
        async () => {
          throw new Error('boom');
        },
        { intervalMs: 100, createSampler: () => sampler },
      ),
    ).rejects.toThrow('boom');
    vi.advanceTimersByTime(1000);
    expect(sampler).not.toHaveBeenCalled();
    vi.useRealTimers();
  });
});

describe('createProcessCpuSampler', () => {
  it('returns a finite, non-negative percentage', async () => {
    const sample = createProcessCpuSampler();
    await sleep(20);
    const value = sample();
    expect(Number.isFinite(value)).toBe(true);
    expect(value).toBeGreaterThanOrEqual(0);
  });
});
