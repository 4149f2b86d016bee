// ============================================================================
// @textprobe/cli — Instrumented text classification
// ============================================================================
// Commands:
//   textprobe "<text>" ["<text>" ...]        → classify, with timing + resources
//   textprobe                                → classify the built-in sample texts
//   textprobe --benchmark <N> ["<text>"]     → repeated-run latency statistics
//
// Exit codes: 0 ok, 1 usage/config, 2 missing or invalid artifact, 3 inference.
// ============================================================================

import { existsSync } from 'node:fs';
import {
  ArtifactNotFoundError,
  ArtifactParseError,
  ArtifactValidationError,
  BenchmarkHarness,
  ClassificationPipeline,
  type ClassificationReport,
  type FeatureEncoder,
  type InferenceInvoker,
  type LabelMap,
  ModelLoadError,
  Scaler,
  SequenceEncoder,
  TfidfEncoder,
  collectSystemInfo,
  errorMessage,
  formatBenchmarkResult,
  formatPerformanceSummary,
  formatPrediction,
  formatSystemInfo,
  frame,
  isInferenceFailure,
  loadLabelMap,
  loadTfidfArtifacts,
  loadTokenMap,
  logger,
} from '@textprobe/core';
import { type CliConfig, resolveConfig } from './config.js';
import { DEFAULT_TEXTS } from './default_texts.js';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_ARTIFACT = 2;
export const EXIT_INFERENCE = 3;

export type InvokerFactory = (modelPath: string) => Promise<InferenceInvoker>;

export interface CliDeps {
  /** Opens the model. Default: an ONNX Runtime session. */
  createInvoker?: InvokerFactory;
  env?: NodeJS.ProcessEnv;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Whether stdout is a terminal, for `auto` coloring. */
  isTTY?: boolean;
}

const openOnnxModel: InvokerFactory = async (modelPath) => {
  const { OnnxInvoker } = await import('./onnx_invoker.js');
  return OnnxInvoker.create(modelPath);
};

// ── ANSI Color Helpers ──────────────────────────────────────────────────────

interface Palette {
  fail(text: string): string;
  warn(text: string): string;
  heading(text: string): string;
  dimText(text: string): string;
}

function createPalette(useColor: boolean): Palette {
  const clr = (color: string, text: string) => (useColor ? `${color}${text}\x1b[0m` : text);
  return {
    fail: (text) => clr('\x1b[31m', text),
    warn: (text) => clr('\x1b[33m', text),
    heading: (text) => clr('\x1b[1m\x1b[97m', text),
    dimText: (text) => clr('\x1b[2m', text),
  };
}

// ── Exit Policy ─────────────────────────────────────────────────────────────

export function exitCodeFor(error: unknown): number {
  if (
    error instanceof ArtifactNotFoundError ||
    error instanceof ArtifactParseError ||
    error instanceof ArtifactValidationError ||
    error instanceof ModelLoadError
  ) {
    return EXIT_ARTIFACT;
  }
  if (isInferenceFailure(error)) return EXIT_INFERENCE;
  return EXIT_USAGE;
}

// ── Usage ───────────────────────────────────────────────────────────────────

function usage(paint: Palette): string {
  return `
  ${paint.heading('textprobe')} - instrumented text classification and benchmarking

  Usage:
    textprobe "<text>" ["<text>" ...]          Classify text (sample texts if none given)
    textprobe --benchmark <N> ["<text>"]       Run N timed iterations

  Artifacts:
    --dir <path>             Directory holding the artifacts (default: .)
    --model <file>           ONNX model (default: model.onnx)
    --vocab <file>           TF-IDF vocabulary or token map (default: vocab.json)
    --scaler <file>          Scaler parameters (default: scaler.json)
    --labels <file>          Class labels, optional (default: labels.json)
    --no-scaler              Feed unscaled TF-IDF features

  Model:
    --encoder tfidf|sequence                   Feature encoder (default: tfidf)
    --mode binary|multiclass|multilabel        Output interpretation (default: binary)
    --sequence-length <n>    Sequence encoder length (default: 30)
    --threshold <p>          Decision threshold (default: 0.5)
    --normalize              L2-normalize TF-IDF vectors

  Measurement:
    --warmup <n>             Untimed warmup runs before a benchmark (default: 5)
    --interval-ms <ms>       CPU sampling period (default: 100)

  Output:
    --json                   Print results as JSON
    --ascii                  ASCII-only output (no Unicode box-drawing)
    --color / --no-color     Force or disable colored output

  Environment Variables:
    TEXTPROBE_DIR, TEXTPROBE_MODEL, TEXTPROBE_VOCAB, TEXTPROBE_SCALER,
    TEXTPROBE_LABELS, TEXTPROBE_ENCODER, TEXTPROBE_MODE,
    TEXTPROBE_SEQUENCE_LENGTH, TEXTPROBE_THRESHOLD, TEXTPROBE_INTERVAL_MS
                             Defaults for the options above
    TEXTPROBE_ASCII=1        Same as --ascii
    TEXTPROBE_DEBUG=1        Debug logging
    NO_COLOR=1 / FORCE_COLOR=1

  Exit codes: 0 ok, 1 usage error, 2 artifact error, 3 inference error
  `;
}

// ── Pipeline Assembly ───────────────────────────────────────────────────────

function loadEncoder(config: CliConfig): { encoder: FeatureEncoder; scaler?: Scaler } {
  if (config.encoder === 'sequence') {
    const tokenMap = loadTokenMap(config.vocabPath);
    return { encoder: new SequenceEncoder(tokenMap, { sequenceLength: config.sequenceLength }) };
  }

  const artifacts = loadTfidfArtifacts({
    vocabularyPath: config.vocabPath,
    scalerPath: config.scalerPath ?? undefined,
  });
  return {
    encoder: new TfidfEncoder(artifacts.vocabulary, { l2Normalize: config.l2Normalize }),
    scaler: artifacts.scaler ? new Scaler(artifacts.scaler) : undefined,
  };
}

function loadLabels(config: CliConfig): LabelMap | undefined {
  if (!existsSync(config.labelsPath)) {
    logger.debug(`no label map at ${config.labelsPath}, using default labels`);
    return undefined;
  }
  return loadLabelMap(config.labelsPath);
}

// ── Commands ────────────────────────────────────────────────────────────────

interface CommandContext {
  config: CliConfig;
  pipeline: ClassificationPipeline;
  out: (text: string) => void;
  paint: Palette;
}

async function classifyTexts(ctx: CommandContext): Promise<void> {
  const { config, pipeline, out } = ctx;
  const texts = config.texts.length > 0 ? config.texts : DEFAULT_TEXTS;
  const system = collectSystemInfo(pipeline.invoker.engine);
  const opts = { ascii: config.ascii };

  const reports: ClassificationReport[] = [];
  if (!config.json) {
    out(frame('System Information', formatSystemInfo(system), opts));
  }

  for (const text of texts) {
    const report = await pipeline.classify(text);
    reports.push(report);
    if (!config.json) {
      out(frame('Prediction', formatPrediction(report), opts));
      out(
        frame(
          'Performance Summary',
          formatPerformanceSummary(report.timing, report.resources, report.tier, opts),
          opts,
        ),
      );
    }
  }

  if (config.json) {
    out(JSON.stringify({ system, results: reports }, null, 2));
  }
}

async function runBenchmark(ctx: CommandContext, iterations: number): Promise<void> {
  const { config, pipeline, out, paint } = ctx;
  const text = config.texts[0] ?? DEFAULT_TEXTS[0];
  const system = collectSystemInfo(pipeline.invoker.engine);
  const opts = { ascii: config.ascii };

  if (!config.json) {
    out(frame('System Information', formatSystemInfo(system), opts));
    out(`  Benchmarking ${iterations} runs (${config.warmup} warmup)...`);
  }

  const harness = new BenchmarkHarness(pipeline, {
    text,
    monitor: { intervalMs: config.intervalMs },
    onProgress: config.json
      ? undefined
      : (completed, total) => {
          out(paint.dimText(`  Progress: ${completed}/${total} (${((completed / total) * 100).toFixed(1)}%)`));
        },
  });
  const result = await harness.run(iterations, config.warmup);

  if (config.json) {
    out(JSON.stringify({ system, benchmark: result }, null, 2));
    return;
  }
  if (result.failed > 0) {
    out(paint.warn(`  ${result.failed} of ${iterations} runs failed and were skipped`));
  }
  out(frame('Benchmark Results', formatBenchmarkResult(result, opts), opts));
}

// ── Entry ───────────────────────────────────────────────────────────────────

/**
 * Run the textprobe command and resolve with its exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const out = deps.stdout ?? ((text: string) => console.log(text));
  const err = deps.stderr ?? ((text: string) => console.error(text));

  let config: CliConfig;
  try {
    config = resolveConfig(argv, env);
  } catch (error) {
    err(`Error: ${errorMessage(error)}`);
    err('Run with --help for usage.');
    return exitCodeFor(error);
  }

  const isTTY = deps.isTTY ?? process.stdout.isTTY === true;
  const paint = createPalette(config.color === 'always' || (config.color === 'auto' && isTTY));

  if (config.help) {
    out(usage(paint));
    return EXIT_OK;
  }

  let invoker: InferenceInvoker | undefined;
  try {
    const { encoder, scaler } = loadEncoder(config);
    const labels = loadLabels(config);

    invoker = await (deps.createInvoker ?? openOnnxModel)(config.modelPath);
    const pipeline = new ClassificationPipeline({
      encoder,
      scaler,
      invoker,
      mode: config.mode,
      labels,
      threshold: config.threshold,
      monitor: { intervalMs: config.intervalMs },
    });

    const ctx: CommandContext = { config, pipeline, out, paint };
    if (config.benchmark !== null) {
      await runBenchmark(ctx, config.benchmark);
    } else {
      await classifyTexts(ctx);
    }
    return EXIT_OK;
  } catch (error) {
    err(paint.fail(`Error: ${errorMessage(error)}`));
    return exitCodeFor(error);
  } finally {
    await invoker?.dispose();
  }
}
