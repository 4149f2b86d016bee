// ============================================================================
// @textprobe/core — Artifact Store
// ============================================================================
//
// Loads the JSON artifacts a text classifier ships with and validates every
// invariant before the artifact is handed out:
//
//   vocabulary  {"vocab": {token: index}, "idf": [float]}
//   scaler      {"mean": [float], "scale": [float]}
//   token map   {token: id, "<OOV>": id}
//   label map   {"<class index>": label}
//
// Missing files raise ArtifactNotFoundError, malformed JSON or missing keys
// raise ArtifactParseError, broken invariants raise ArtifactValidationError.
// ============================================================================

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  ArtifactNotFoundError,
  ArtifactParseError,
  ArtifactValidationError,
  type ArtifactKind,
  errorMessage,
} from './errors.js';
import { logArtifactLoaded, timer } from './logger.js';
import type { LabelMap, ScalerParams, TfidfVocabulary, TokenMap } from './types.js';

/** Reserved token-map key for out-of-vocabulary words. */
export const OOV_TOKEN = '<OOV>';

/** OOV id used when a token map has no `<OOV>` entry. */
export const DEFAULT_OOV_ID = 1;

// --- Schemas ---

const vocabularySchema = z.object({
  vocab: z.record(z.number()).optional(),
  vocabulary: z.record(z.number()).optional(),
  idf: z.array(z.number()),
  max_features: z.number().optional(),
});

const scalerSchema = z.object({
  mean: z.array(z.number()),
  scale: z.array(z.number()),
});

const tokenMapSchema = z.record(z.number());

const labelMapSchema = z.record(z.string());

// --- Helpers ---

function readJson(artifact: ArtifactKind, path: string): unknown {
  if (!existsSync(path)) {
    throw new ArtifactNotFoundError(artifact, path);
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ArtifactParseError(artifact, path, errorMessage(err), { cause: err });
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ArtifactParseError(artifact, path, `malformed JSON (${errorMessage(err)})`, {
      cause: err,
    });
  }
}

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  artifact: ArtifactKind,
  path: string,
  value: unknown,
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ArtifactParseError(artifact, path, reason);
  }
  return result.data;
}

function assertFiniteArray(
  values: readonly number[],
  artifact: ArtifactKind,
  path: string,
  field: string,
): void {
  for (let i = 0; i < values.length; i++) {
    if (!Number.isFinite(values[i])) {
      throw new ArtifactValidationError(artifact, path, `${field}[${i}] is not a finite number`, field);
    }
  }
}

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// --- Loaders ---

/**
 * Load a TF-IDF vocabulary. `vocabulary` is accepted as an alias of `vocab`.
 */
export function loadVocabulary(path: string): TfidfVocabulary {
  const t = timer(`load vocabulary ${path}`);
  const parsed = parseWith(vocabularySchema, 'vocabulary', path, readJson('vocabulary', path));

  const rawVocab = parsed.vocab ?? parsed.vocabulary;
  if (!rawVocab) {
    throw new ArtifactParseError('vocabulary', path, 'missing required key "vocab"');
  }

  const featureDim = parsed.idf.length;
  if (featureDim === 0) {
    throw new ArtifactValidationError('vocabulary', path, 'idf table is empty', 'idf');
  }
  if (parsed.max_features !== undefined && parsed.max_features !== featureDim) {
    throw new ArtifactValidationError(
      'vocabulary',
      path,
      `max_features (${parsed.max_features}) does not match idf length (${featureDim})`,
      'max_features',
    );
  }
  assertFiniteArray(parsed.idf, 'vocabulary', path, 'idf');

  const vocab = new Map<string, number>();
  const owners = new Map<number, string>();
  for (const [token, index] of Object.entries(rawVocab)) {
    if (!isIndex(index) || index >= featureDim) {
      throw new ArtifactValidationError(
        'vocabulary',
        path,
        `index ${index} of token "${token}" is outside [0, ${featureDim})`,
        'vocab',
      );
    }
    const owner = owners.get(index);
    if (owner !== undefined) {
      throw new ArtifactValidationError(
        'vocabulary',
        path,
        `tokens "${owner}" and "${token}" share index ${index}`,
        'vocab',
      );
    }
    owners.set(index, token);
    vocab.set(token, index);
  }

  const result: TfidfVocabulary = Object.freeze({
    vocab,
    idf: Object.freeze([...parsed.idf]),
    featureDim,
  });
  logArtifactLoaded('vocabulary', path, vocab.size);
  t.end();
  return result;
}

/**
 * Load scaler parameters. A zero `scale` entry is rejected here so that
 * `Scaler.apply` can never divide by zero.
 */
export function loadScaler(path: string): ScalerParams {
  const t = timer(`load scaler ${path}`);
  const parsed = parseWith(scalerSchema, 'scaler', path, readJson('scaler', path));

  if (parsed.mean.length !== parsed.scale.length) {
    throw new ArtifactValidationError(
      'scaler',
      path,
      `mean has ${parsed.mean.length} entries but scale has ${parsed.scale.length}`,
      'scale',
    );
  }
  if (parsed.mean.length === 0) {
    throw new ArtifactValidationError('scaler', path, 'mean and scale are empty', 'mean');
  }
  assertFiniteArray(parsed.mean, 'scaler', path, 'mean');
  assertFiniteArray(parsed.scale, 'scaler', path, 'scale');

  const zeroAt = parsed.scale.findIndex((value) => value === 0);
  if (zeroAt !== -1) {
    throw new ArtifactValidationError('scaler', path, `scale[${zeroAt}] is zero`, 'scale');
  }

  const result: ScalerParams = Object.freeze({
    mean: Object.freeze([...parsed.mean]),
    scale: Object.freeze([...parsed.scale]),
    featureDim: parsed.mean.length,
  });
  logArtifactLoaded('scaler', path, result.featureDim);
  t.end();
  return result;
}

/**
 * Load a sequence-model token map. Without an `<OOV>` entry the OOV id is
 * {@link DEFAULT_OOV_ID}.
 */
export function loadTokenMap(path: string): TokenMap {
  const t = timer(`load token map ${path}`);
  const parsed = parseWith(tokenMapSchema, 'token-map', path, readJson('token-map', path));

  const tokens = new Map<string, number>();
  let maxId = 0;
  for (const [token, id] of Object.entries(parsed)) {
    if (!isIndex(id)) {
      throw new ArtifactValidationError(
        'token-map',
        path,
        `id ${id} of token "${token}" is not a non-negative integer`,
        token,
      );
    }
    if (token === OOV_TOKEN) continue;
    tokens.set(token, id);
    maxId = Math.max(maxId, id);
  }

  const oovId = parsed[OOV_TOKEN] ?? DEFAULT_OOV_ID;
  const result: TokenMap = Object.freeze({
    tokens,
    oovId,
    vocabSize: Math.max(maxId, oovId) + 1,
  });
  logArtifactLoaded('token-map', path, tokens.size);
  t.end();
  return result;
}

/**
 * Load a class index → label map. Keys must be non-negative integers.
 */
export function loadLabelMap(path: string): LabelMap {
  const parsed = parseWith(labelMapSchema, 'label-map', path, readJson('label-map', path));

  const labels = new Map<number, string>();
  for (const [key, label] of Object.entries(parsed)) {
    if (!/^\d+$/.test(key)) {
      throw new ArtifactValidationError(
        'label-map',
        path,
        `key "${key}" is not a class index`,
        key,
      );
    }
    labels.set(Number(key), label);
  }

  logArtifactLoaded('label-map', path, labels.size);
  return Object.freeze({ labels });
}

/** Artifacts for the TF-IDF path. */
export interface TfidfArtifacts {
  vocabulary: TfidfVocabulary;
  scaler?: ScalerParams;
}

/**
 * Load a vocabulary and, optionally, its scaler, and check that both describe
 * the same feature dimension.
 */
export function loadTfidfArtifacts(paths: {
  vocabularyPath: string;
  scalerPath?: string;
}): TfidfArtifacts {
  const vocabulary = loadVocabulary(paths.vocabularyPath);
  if (paths.scalerPath === undefined) {
    return { vocabulary };
  }

  const scaler = loadScaler(paths.scalerPath);
  if (scaler.featureDim !== vocabulary.featureDim) {
    throw new ArtifactValidationError(
      'scaler',
      paths.scalerPath,
      `scaler has ${scaler.featureDim} features but the vocabulary has ${vocabulary.featureDim}`,
      'mean',
    );
  }
  return { vocabulary, scaler };
}
