// ============================================================================
// @textprobe/cli — Configuration
// ============================================================================
//
// Precedence: command-line flag > TEXTPROBE_* environment variable > default.
// File names resolve against --dir / TEXTPROBE_DIR.
// ============================================================================

import path from 'node:path';
import { ConfigError, DEFAULT_SEQUENCE_LENGTH, DEFAULT_THRESHOLD, DEFAULT_WARMUP_RUNS } from '@textprobe/core';
import type { EncoderKind, OutputMode } from '@textprobe/core';
import { z } from 'zod';

export interface CliConfig {
  modelPath: string;
  vocabPath: string;
  /** null when scaling is disabled with --no-scaler. */
  scalerPath: string | null;
  labelsPath: string;
  encoder: EncoderKind;
  mode: OutputMode;
  sequenceLength: number;
  threshold: number;
  l2Normalize: boolean;
  intervalMs: number;
  warmup: number;
  /** Timed iterations for --benchmark, null for classification. */
  benchmark: number | null;
  texts: string[];
  json: boolean;
  ascii: boolean;
  /** `auto` colors only when stdout is a terminal. */
  color: 'always' | 'never' | 'auto';
  help: boolean;
}

/** Flags that consume the following argument as their value. */
const VALUE_FLAGS = new Set([
  'dir',
  'model',
  'vocab',
  'scaler',
  'labels',
  'encoder',
  'mode',
  'sequence-length',
  'threshold',
  'interval-ms',
  'warmup',
  'benchmark',
]);

/** Flags that take no value. */
const BOOLEAN_FLAGS = new Set(['json', 'ascii', 'normalize', 'no-scaler', 'color', 'no-color', 'help']);

const DEFAULTS = {
  dir: '.',
  model: 'model.onnx',
  vocab: 'vocab.json',
  scaler: 'scaler.json',
  labels: 'labels.json',
  encoder: 'tfidf',
  mode: 'binary',
  sequenceLength: String(DEFAULT_SEQUENCE_LENGTH),
  threshold: String(DEFAULT_THRESHOLD),
  intervalMs: '100',
  warmup: String(DEFAULT_WARMUP_RUNS),
} as const;

/** A numeric option given as text; blank text is rejected rather than read as 0. */
function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.string().trim().min(1, 'Expected a number, received an empty value').pipe(schema);
}

const configSchema = z.object({
  dir: z.string().min(1),
  model: z.string().min(1),
  vocab: z.string().min(1),
  scaler: z.string().min(1),
  labels: z.string().min(1),
  encoder: z.enum(['tfidf', 'sequence']),
  mode: z.enum(['binary', 'multiclass', 'multilabel']),
  sequenceLength: numeric(z.coerce.number().int().positive()),
  threshold: numeric(z.coerce.number().min(0).max(1)),
  intervalMs: numeric(z.coerce.number().int().positive()),
  warmup: numeric(z.coerce.number().int().min(0)),
  benchmark: numeric(z.coerce.number().int().positive()).optional(),
});

const OPTION_NAMES: Record<string, string> = {
  sequenceLength: '--sequence-length',
  intervalMs: '--interval-ms',
};

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

/**
 * Split argv into `--flag [value]` pairs and positional arguments.
 * `--flag=value` is accepted as well; everything after `--` is positional.
 *
 * @throws ConfigError on an unknown flag or a value flag with no value
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h') {
      flags.set('help', true);
      continue;
    }
    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!VALUE_FLAGS.has(name) && !BOOLEAN_FLAGS.has(name)) {
      throw new ConfigError(`Unknown option --${name}`, `--${name}`);
    }
    if (eq !== -1) {
      flags.set(name, arg.slice(eq + 1));
    } else if (VALUE_FLAGS.has(name)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`Missing value for --${name}`, `--${name}`);
      }
      flags.set(name, value);
      i++;
    } else {
      flags.set(name, true);
    }
  }

  return { positionals, flags };
}

/**
 * Resolve the CLI configuration from argv and the environment.
 *
 * @throws ConfigError on an unknown flag or choice, or a blank or malformed number
 */
export function resolveConfig(args: readonly string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
  const { positionals, flags } = parseArgs(args);

  function getFlag(name: string): string | undefined {
    const value = flags.get(name);
    return typeof value === 'string' ? value : undefined;
  }
  function hasFlag(name: string): boolean {
    return flags.has(name);
  }

  const raw = {
    dir: getFlag('dir') ?? env.TEXTPROBE_DIR ?? DEFAULTS.dir,
    model: getFlag('model') ?? env.TEXTPROBE_MODEL ?? DEFAULTS.model,
    vocab: getFlag('vocab') ?? env.TEXTPROBE_VOCAB ?? DEFAULTS.vocab,
    scaler: getFlag('scaler') ?? env.TEXTPROBE_SCALER ?? DEFAULTS.scaler,
    labels: getFlag('labels') ?? env.TEXTPROBE_LABELS ?? DEFAULTS.labels,
    encoder: getFlag('encoder') ?? env.TEXTPROBE_ENCODER ?? DEFAULTS.encoder,
    mode: getFlag('mode') ?? env.TEXTPROBE_MODE ?? DEFAULTS.mode,
    sequenceLength:
      getFlag('sequence-length') ?? env.TEXTPROBE_SEQUENCE_LENGTH ?? DEFAULTS.sequenceLength,
    threshold: getFlag('threshold') ?? env.TEXTPROBE_THRESHOLD ?? DEFAULTS.threshold,
    intervalMs: getFlag('interval-ms') ?? env.TEXTPROBE_INTERVAL_MS ?? DEFAULTS.intervalMs,
    warmup: getFlag('warmup') ?? DEFAULTS.warmup,
    benchmark: getFlag('benchmark'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = String(issue.path[0] ?? '');
    const option = OPTION_NAMES[key] ?? `--${key}`;
    throw new ConfigError(`Invalid ${option}: ${issue.message}`, option);
  }
  const cfg = result.data;

  // Without an explicit choice, a scaler belongs to the TF-IDF path only.
  const scalerEnabled = !hasFlag('no-scaler') && cfg.encoder === 'tfidf';
  const resolve = (file: string) => path.resolve(cfg.dir, file);

  return {
    modelPath: resolve(cfg.model),
    vocabPath: resolve(cfg.vocab),
    scalerPath: scalerEnabled ? resolve(cfg.scaler) : null,
    labelsPath: resolve(cfg.labels),
    encoder: cfg.encoder,
    mode: cfg.mode,
    sequenceLength: cfg.sequenceLength,
    threshold: cfg.threshold,
    l2Normalize: hasFlag('normalize'),
    intervalMs: cfg.intervalMs,
    warmup: cfg.warmup,
    benchmark: cfg.benchmark ?? null,
    texts: positionals,
    json: hasFlag('json'),
    ascii: hasFlag('ascii') || env.TEXTPROBE_ASCII === '1',
    color:
      hasFlag('no-color') || env.NO_COLOR === '1'
        ? 'never'
        : hasFlag('color') || env.FORCE_COLOR === '1'
          ? 'always'
          : 'auto',
    help: hasFlag('help'),
  };
}
