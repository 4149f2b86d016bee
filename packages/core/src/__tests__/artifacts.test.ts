import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  loadLabelMap,
  loadScaler,
  loadTfidfArtifacts,
  loadTokenMap,
  loadVocabulary,
} from '../artifacts.js';
import {
  ArtifactNotFoundError,
  ArtifactParseError,
  ArtifactValidationError,
} from '../errors.js';
import { type ArtifactDir, createArtifactDir } from './helpers.js';

// ============================================================================
// Artifact Store Tests
// ============================================================================

describe('artifact store', () => {
  let store: ArtifactDir;

  beforeEach(() => {
    store = createArtifactDir();
  });

  afterEach(() => {
    store.cleanup();
  });

  // ---- Vocabulary ----

  describe('loadVocabulary', () => {
    it('loads vocab and idf', () => {
      const path = store.write('vocab.json', { vocab: { good: 0, bad: 2 }, idf: [1.5, 1, 2.5] });
      const vocabulary = loadVocabulary(path);

      expect(vocabulary.featureDim).toBe(3);
      expect(vocabulary.vocab.get('good')).toBe(0);
      expect(vocabulary.vocab.get('bad')).toBe(2);
      expect(vocabulary.idf).toEqual([1.5, 1, 2.5]);
      expect(Object.isFrozen(vocabulary)).toBe(true);
    });

    it('accepts "vocabulary" as the key name', () => {
      const path = store.write('vocab.json', { vocabulary: { good: 1 }, idf: [1, 2] });
      expect(loadVocabulary(path).vocab.get('good')).toBe(1);
    });

    it('raises NotFound for a missing file', () => {
      const path = join(store.dir, 'missing.json');
      expect(() => loadVocabulary(path)).toThrow(ArtifactNotFoundError);
      expect(() => loadVocabulary(path)).toThrow(`vocabulary artifact not found: ${path}`);
    });

    it('raises ParseError for malformed JSON', () => {
      const path = store.write('vocab.json', '{"vocab": {');
      expect(() => loadVocabulary(path)).toThrow(ArtifactParseError);
    });

    it('raises ParseError when the vocab key is missing', () => {
      const path = store.write('vocab.json', { idf: [1, 2] });
      expect(() => loadVocabulary(path)).toThrow(
        `Failed to parse vocabulary artifact ${path}: missing required key "vocab"`,
      );
    });

    it('raises ParseError when idf is not a number array', () => {
      const path = store.write('vocab.json', { vocab: {}, idf: ['x'] });
      expect(() => loadVocabulary(path)).toThrow(ArtifactParseError);
    });

    it('rejects an index outside the idf table', () => {
      const path = store.write('vocab.json', { vocab: { good: 3 }, idf: [1, 1, 1] });
      expect(() => loadVocabulary(path)).toThrow(ArtifactValidationError);
      expect(() => loadVocabulary(path)).toThrow('index 3 of token "good" is outside [0, 3)');
    });

    it('rejects two tokens sharing an index', () => {
      const path = store.write('vocab.json', { vocab: { good: 1, fine: 1 }, idf: [1, 1] });
      expect(() => loadVocabulary(path)).toThrow('tokens "good" and "fine" share index 1');
    });

    it('rejects max_features that disagrees with idf', () => {
      const path = store.write('vocab.json', { vocab: {}, idf: [1, 1], max_features: 5 });
      expect(() => loadVocabulary(path)).toThrow(ArtifactValidationError);
    });

    it('rejects an empty idf table', () => {
      const path = store.write('vocab.json', { vocab: {}, idf: [] });
      expect(() => loadVocabulary(path)).toThrow('idf table is empty');
    });
  });

  // ---- Scaler ----

  describe('loadScaler', () => {
    it('loads mean and scale', () => {
      const path = store.write('scaler.json', { mean: [0, 1], scale: [2, 4] });
      const params = loadScaler(path);
      expect(params).toEqual({ mean: [0, 1], scale: [2, 4], featureDim: 2 });
      expect(Object.isFrozen(params.mean)).toBe(true);
    });

    it('rejects a zero scale at load time', () => {
      const path = store.write('scaler.json', { mean: [0, 0, 0], scale: [1, 0, 1] });
      let caught: unknown;
      try {
        loadScaler(path);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ArtifactValidationError);
      expect(caught).toMatchObject({ artifact: 'scaler', field: 'scale' });
      expect(String(caught)).toContain('scale[1] is zero');
    });

    it('rejects mismatched lengths', () => {
      const path = store.write('scaler.json', { mean: [0, 0], scale: [1] });
      expect(() => loadScaler(path)).toThrow('mean has 2 entries but scale has 1');
    });

    it('raises ParseError when scale is missing', () => {
      const path = store.write('scaler.json', { mean: [0] });
      expect(() => loadScaler(path)).toThrow(ArtifactParseError);
    });
  });

  describe('loadTfidfArtifacts', () => {
    it('rejects a scaler whose dimension differs from the vocabulary', () => {
      const vocabularyPath = store.write('vocab.json', { vocab: { good: 0 }, idf: [1, 1, 1] });
      const scalerPath = store.write('scaler.json', { mean: [0, 0], scale: [1, 1] });
      expect(() => loadTfidfArtifacts({ vocabularyPath, scalerPath })).toThrow(
        'scaler has 2 features but the vocabulary has 3',
      );
    });

    it('loads without a scaler', () => {
      const vocabularyPath = store.write('vocab.json', { vocab: { good: 0 }, idf: [1] });
      const artifacts = loadTfidfArtifacts({ vocabularyPath });
      expect(artifacts.scaler).toBeUndefined();
      expect(artifacts.vocabulary.featureDim).toBe(1);
    });
  });

  // ---- Token map ----

  describe('loadTokenMap', () => {
    it('reads the OOV id from the <OOV> entry', () => {
      const path = store.write('tokens.json', { '<OOV>': 1, good: 2, bad: 7 });
      const map = loadTokenMap(path);
      expect(map.oovId).toBe(1);
      expect(map.vocabSize).toBe(8);
      expect(map.tokens.has('<OOV>')).toBe(false);
      expect(map.tokens.get('bad')).toBe(7);
    });

    it('falls back to OOV id 1', () => {
      const map = loadTokenMap(store.write('tokens.json', { good: 2 }));
      expect(map.oovId).toBe(1);
      expect(map.vocabSize).toBe(3);
    });

    it('counts a large OOV id in the vocabulary size', () => {
      const map = loadTokenMap(store.write('tokens.json', { '<OOV>': 9, good: 2 }));
      expect(map.vocabSize).toBe(10);
    });

    it('rejects negative or fractional ids', () => {
      expect(() => loadTokenMap(store.write('a.json', { good: -1 }))).toThrow(ArtifactValidationError);
      expect(() => loadTokenMap(store.write('b.json', { good: 1.5 }))).toThrow(ArtifactValidationError);
    });
  });

  // ---- Label map ----

  describe('loadLabelMap', () => {
    it('maps class indices to labels', () => {
      const map = loadLabelMap(store.write('labels.json', { '0': 'World', '1': 'Sports' }));
      expect(map.labels.get(0)).toBe('World');
      expect(map.labels.get(1)).toBe('Sports');
    });

    it('rejects non-numeric keys', () => {
      const path = store.write('labels.json', { first: 'World' });
      expect(() => loadLabelMap(path)).toThrow('key "first" is not a class index');
    });
  });
});
