// ============================================================================
// @textprobe/core — Logging & Observability
// ============================================================================

import process from 'node:process';

/**
 * Log levels for textprobe.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Current log level (controlled by the TEXTPROBE_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

function initLevel(): void {
  const debugEnv = process.env.TEXTPROBE_DEBUG;
  if (debugEnv === '1' || debugEnv === 'true') {
    currentLevel = 'debug';
  } else if (debugEnv === 'warn') {
    currentLevel = 'warn';
  } else if (debugEnv === 'error') {
    currentLevel = 'error';
  } else {
    currentLevel = 'info';
  }
}

initLevel();

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[textprobe] ${message}${dataStr}`;

  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
      console.info(msg);
      break;
    case 'warn':
      console.warn(msg);
      break;
    case 'error':
      console.error(msg);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[textprobe] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only emitted when TEXTPROBE_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

/**
 * Warning-level logging (something unexpected but handled).
 */
export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Debug timer for one-off operations such as artifact loading.
 * Pipeline phases are measured by PhaseTimer instead.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  end(): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { durationMs: duration });
    return duration;
  }

  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Event Callbacks
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => callbacks.delete(callback);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log a successfully loaded artifact.
 */
export function logArtifactLoaded(artifact: string, path: string, entries: number): void {
  debug(`loaded ${artifact} from ${path} (${entries} entries)`, { artifact, path, entries });
}

/**
 * Log benchmark progress.
 */
export function logBenchmarkProgress(completed: number, total: number): void {
  debug(`benchmark progress: ${completed}/${total} (${((completed / total) * 100).toFixed(1)}%)`, {
    completed,
    total,
  });
}

/**
 * Log a skipped benchmark iteration.
 */
export function logIterationFailure(iteration: number, phase: string, message: string): void {
  warn(`benchmark iteration ${iteration} failed during ${phase}: ${message}`, {
    iteration,
    phase,
  });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}
