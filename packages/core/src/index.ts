// ============================================================================
// @textprobe/core — Public API
// ============================================================================

// Artifacts
export {
  loadVocabulary,
  loadScaler,
  loadTokenMap,
  loadLabelMap,
  loadTfidfArtifacts,
  OOV_TOKEN,
  DEFAULT_OOV_ID,
} from './artifacts.js';
export type { TfidfArtifacts } from './artifacts.js';

// Encoders
export { tokenize, splitWords, countTokens } from './tokenizer.js';
export { TfidfEncoder, l2NormalizeInPlace } from './tfidf_encoder.js';
export type { TfidfEncoderOptions } from './tfidf_encoder.js';
export { SequenceEncoder, DEFAULT_SEQUENCE_LENGTH, PADDING_ID } from './sequence_encoder.js';
export type { SequenceEncoderOptions } from './sequence_encoder.js';
export { Scaler } from './scaler.js';

// Inference
export { assertInputCompatible, dtypeCompatible, toInputTensor } from './inference.js';
export type { EngineInfo, InferenceInvoker } from './inference.js';
export { interpretOutput, DEFAULT_THRESHOLD } from './postprocess.js';
export type { InterpretOptions } from './postprocess.js';

// Instrumentation
export {
  PerformanceMonitor,
  monitorAsync,
  createProcessCpuSampler,
  heapUsedMb,
  DEFAULT_SAMPLE_INTERVAL_MS,
  DEFAULT_SAMPLE_CAPACITY,
} from './performance_monitor.js';
export type { CpuSampler, MonitorState, PerformanceMonitorOptions } from './performance_monitor.js';
export { PhaseTimer, computeTimingMetrics, monotonicClock, phaseShare } from './phase_timer.js';
export { PERFORMANCE_TIERS, TARGET_LATENCY_MS, classifyLatency } from './tiers.js';

// Pipeline & Benchmark
export { ClassificationPipeline } from './pipeline.js';
export type { ClassificationReport, PipelineOptions, PipelineRun } from './pipeline.js';
export {
  BenchmarkHarness,
  computeLatencyStats,
  percentile,
  DEFAULT_WARMUP_RUNS,
  DEFAULT_PROGRESS_EVERY,
} from './benchmark.js';
export type {
  BenchmarkOptions,
  BenchmarkResult,
  IterationFailure,
  LatencyStats,
} from './benchmark.js';

// Reports
export { collectSystemInfo } from './system_info.js';
export type { SystemInfo } from './system_info.js';
export {
  frame,
  formatSystemInfo,
  formatPrediction,
  formatPerformanceSummary,
  formatResources,
  formatBenchmarkResult,
  tierLabel,
} from './report.js';
export type { FormatOptions } from './report.js';

// Errors
export {
  TextprobeError,
  ArtifactNotFoundError,
  ArtifactParseError,
  ArtifactValidationError,
  ModelLoadError,
  ShapeMismatchError,
  InferenceRuntimeError,
  MonitorStateError,
  ConfigError,
  isInferenceFailure,
  errorMessage,
} from './errors.js';
export type { ArtifactKind, ErrorPhase } from './errors.js';

// Logging
export * as logger from './logger.js';
export type { LogEntry, LogLevel, LogCallback } from './logger.js';

// Types
export type * from './types.js';
