import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { InferenceInvoker } from '../inference.js';
import type { Clock, InputTensor, OutputTensor, TensorSignature } from '../types.js';

// ============================================================================
// Shared fixtures for core tests
// ============================================================================

export interface ArtifactDir {
  dir: string;
  /** Write `value` as JSON (or a raw string as-is) and return its path. */
  write(name: string, value: unknown): string;
  cleanup(): void;
}

export function createArtifactDir(): ArtifactDir {
  const dir = mkdtempSync(join(tmpdir(), 'textprobe-test-'));
  return {
    dir,
    write(name, value) {
      const path = join(dir, name);
      writeFileSync(path, typeof value === 'string' ? value : JSON.stringify(value), 'utf-8');
      return path;
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Clock that only moves when told to. */
export function createManualClock(start = 0): { clock: Clock; advance(ms: number): void } {
  let now = start;
  return {
    clock: () => now,
    advance(ms) {
      now += ms;
    },
  };
}

export interface FakeInvoker extends InferenceInvoker {
  calls: InputTensor[];
  disposed: boolean;
}

/**
 * In-process InferenceInvoker. `respond` builds the output for each call and
 * may throw to simulate engine failures.
 */
export function createFakeInvoker(options: {
  input: TensorSignature;
  respond: (input: InputTensor, call: number) => number[] | Promise<number[]>;
}): FakeInvoker {
  const invoker: FakeInvoker = {
    input: options.input,
    engine: { name: 'fake-engine', version: '0.0.0' },
    calls: [],
    disposed: false,
    async run(input: InputTensor): Promise<OutputTensor> {
      invoker.calls.push(input);
      const values = await options.respond(input, invoker.calls.length);
      return { data: Float32Array.from(values), shape: [1, values.length] };
    },
    async dispose() {
      invoker.disposed = true;
    },
  };
  return invoker;
}
