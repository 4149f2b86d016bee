import path from 'node:path';
import { ConfigError } from '@textprobe/core';
import { describe, expect, it } from 'vitest';
import { parseArgs, resolveConfig } from '../src/config.js';

describe('parseArgs', () => {
  it('separates flags, values and positionals', () => {
    const { positionals, flags } = parseArgs(['hello world', '--benchmark', '50', '--json', '--mode=multiclass']);
    expect(positionals).toEqual(['hello world']);
    expect(flags.get('benchmark')).toBe('50');
    expect(flags.get('json')).toBe(true);
    expect(flags.get('mode')).toBe('multiclass');
  });

  it('treats everything after -- as text', () => {
    expect(parseArgs(['--json', '--', '--not-a-flag']).positionals).toEqual(['--not-a-flag']);
  });

  it('rejects an unknown flag', () => {
    expect(() => parseArgs(['--benchmrk', '10', 'text'])).toThrow('Unknown option --benchmrk');
    expect(() => parseArgs(['--mdoe=binary'])).toThrow(ConfigError);
  });

  it('rejects a value flag without a value', () => {
    expect(() => parseArgs(['--model'])).toThrow('Missing value for --model');
    expect(() => parseArgs(['--model', '--json'])).toThrow(ConfigError);
  });
});

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolveConfig([], {});
    expect(config).toMatchObject({
      modelPath: path.resolve('.', 'model.onnx'),
      vocabPath: path.resolve('.', 'vocab.json'),
      scalerPath: path.resolve('.', 'scaler.json'),
      labelsPath: path.resolve('.', 'labels.json'),
      encoder: 'tfidf',
      mode: 'binary',
      sequenceLength: 30,
      threshold: 0.5,
      l2Normalize: false,
      intervalMs: 100,
      warmup: 5,
      benchmark: null,
      texts: [],
      json: false,
      ascii: false,
      color: 'auto',
      help: false,
    });
  });

  it('prefers flags over environment over defaults', () => {
    const env = { TEXTPROBE_DIR: '/models', TEXTPROBE_MODE: 'multiclass', TEXTPROBE_THRESHOLD: '0.7' };
    const config = resolveConfig(['--mode', 'multilabel'], env);
    expect(config.mode).toBe('multilabel');
    expect(config.threshold).toBe(0.7);
    expect(config.modelPath).toBe(path.resolve('/models', 'model.onnx'));
  });

  it('resolves file names against --dir', () => {
    const config = resolveConfig(['--dir', '/srv/news', '--vocab', 'tfidf_vocab.json'], {});
    expect(config.vocabPath).toBe(path.resolve('/srv/news', 'tfidf_vocab.json'));
  });

  it('disables the scaler with --no-scaler or the sequence encoder', () => {
    expect(resolveConfig(['--no-scaler'], {}).scalerPath).toBeNull();
    expect(resolveConfig(['--encoder', 'sequence'], {}).scalerPath).toBeNull();
  });

  it('parses benchmark options', () => {
    const config = resolveConfig(['--benchmark', '100', '--warmup', '0', 'some text'], {});
    expect(config.benchmark).toBe(100);
    expect(config.warmup).toBe(0);
    expect(config.texts).toEqual(['some text']);
  });

  it('reads display switches', () => {
    expect(resolveConfig([], { TEXTPROBE_ASCII: '1' }).ascii).toBe(true);
    expect(resolveConfig([], { NO_COLOR: '1' }).color).toBe('never');
    expect(resolveConfig(['--color'], {}).color).toBe('always');
    expect(resolveConfig(['-h'], {}).help).toBe(true);
  });

  it.each([
    [['--mode', 'ternary'], '--mode'],
    [['--encoder', 'bert'], '--encoder'],
    [['--threshold', '1.5'], '--threshold'],
    [['--sequence-length', '0'], '--sequence-length'],
    [['--benchmark', 'many'], '--benchmark'],
    [['--interval-ms', '-5'], '--interval-ms'],
    [['--warmup='], '--warmup'],
    [['--benchmark', ' '], '--benchmark'],
  ])('rejects %j', (args, option) => {
    let caught: unknown;
    try {
      resolveConfig(args, {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ option });
  });

  it('rejects a blank numeric value from the environment', () => {
    expect(() => resolveConfig([], { TEXTPROBE_THRESHOLD: '' })).toThrow(ConfigError);
    expect(() => resolveConfig([], { TEXTPROBE_INTERVAL_MS: '' })).toThrow(
      'Invalid --interval-ms: Expected a number, received an empty value',
    );
  });
});
