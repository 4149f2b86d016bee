// ============================================================================
// @textprobe/core — Error Types
// ============================================================================

/** Pipeline phase an error originated from. */
export type ErrorPhase =
  | 'artifact'
  | 'preprocessing'
  | 'inference'
  | 'postprocessing'
  | 'monitor'
  | 'config';

/** Artifact kinds loaded by the artifact store (plus the opaque model file). */
export type ArtifactKind = 'vocabulary' | 'scaler' | 'token-map' | 'label-map' | 'model';

/**
 * Base error class for all textprobe errors.
 */
export class TextprobeError extends Error {
  public readonly phase: ErrorPhase;

  constructor(message: string, phase: ErrorPhase, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TextprobeError';
    this.phase = phase;
  }
}

// ---------------------------------------------------------------------------
// Artifact Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when an artifact file does not exist.
 */
export class ArtifactNotFoundError extends TextprobeError {
  public readonly artifact: ArtifactKind;
  public readonly path: string;

  constructor(artifact: ArtifactKind, path: string) {
    super(`${artifact} artifact not found: ${path}`, 'artifact');
    this.name = 'ArtifactNotFoundError';
    this.artifact = artifact;
    this.path = path;
  }
}

/**
 * Thrown when an artifact is not valid JSON or lacks its required keys.
 */
export class ArtifactParseError extends TextprobeError {
  public readonly artifact: ArtifactKind;
  public readonly path: string;

  constructor(artifact: ArtifactKind, path: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to parse ${artifact} artifact ${path}: ${reason}`, 'artifact', options);
    this.name = 'ArtifactParseError';
    this.artifact = artifact;
    this.path = path;
  }
}

/**
 * Thrown when a parsed artifact violates one of its invariants
 * (length mismatch, out-of-range index, zero scale, ...).
 */
export class ArtifactValidationError extends TextprobeError {
  public readonly artifact: ArtifactKind;
  public readonly path: string;
  public readonly field?: string;

  constructor(artifact: ArtifactKind, path: string, reason: string, field?: string) {
    super(`Invalid ${artifact} artifact ${path}: ${reason}`, 'artifact');
    this.name = 'ArtifactValidationError';
    this.artifact = artifact;
    this.path = path;
    this.field = field;
  }
}

// ---------------------------------------------------------------------------
// Inference Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the inference engine cannot load a model.
 */
export class ModelLoadError extends TextprobeError {
  public readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to load model ${path}: ${reason}`, 'artifact', options);
    this.name = 'ModelLoadError';
    this.path = path;
  }
}

/**
 * Thrown when a tensor does not match the shape or dtype it is fed into.
 */
export class ShapeMismatchError extends TextprobeError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(context: string, expected: string, actual: string) {
    super(`Shape mismatch for ${context}: expected ${expected}, got ${actual}`, 'inference');
    this.name = 'ShapeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown when the inference engine fails while running a loaded model.
 */
export class InferenceRuntimeError extends TextprobeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'inference', options);
    this.name = 'InferenceRuntimeError';
  }
}

/**
 * True for the errors the benchmark harness may skip over.
 */
export function isInferenceFailure(err: unknown): err is ShapeMismatchError | InferenceRuntimeError {
  return err instanceof ShapeMismatchError || err instanceof InferenceRuntimeError;
}

// ---------------------------------------------------------------------------
// Monitor & Config Errors
// ---------------------------------------------------------------------------

/**
 * Thrown on an illegal PerformanceMonitor transition.
 */
export class MonitorStateError extends TextprobeError {
  public readonly state: string;

  constructor(operation: 'start' | 'stop', state: string) {
    super(`Cannot ${operation}() a performance monitor in state "${state}"`, 'monitor');
    this.name = 'MonitorStateError';
    this.state = state;
  }
}

/**
 * Thrown when an option or a component composition is invalid.
 */
export class ConfigError extends TextprobeError {
  public readonly option?: string;

  constructor(message: string, option?: string) {
    super(message, 'config');
    this.name = 'ConfigError';
    this.option = option;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}
