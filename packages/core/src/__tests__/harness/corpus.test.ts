/**
 * Tests for corpus parsing and phase checks
 */

import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';

import { loadCorpus, parseCorpus } from '../../harness/corpus.js';
import { BUNDLED_CORPUS_PATH } from '../fixtures.js';

describe('parseCorpus', () => {
  it('should canonicalize expected targets', () => {
    const corpus = parseCorpus({
      name: 'tiny',
      cases: [{ id: 'a', category: 'multi', request: 'x', expected_storage_targets: ['file_store', 'analytical_store'] }],
    });

    expect(corpus.description).toBe('');
    expect(corpus.cases[0].expectedStorageTargets).toEqual(['analytical_store', 'file_store']);
  });

  it('should reject duplicate case ids', () => {
    const raw = {
      name: 'dupes',
      cases: [
        { id: 'a', category: 'c', request: 'x', expected_storage_targets: ['memory'] },
        { id: 'a', category: 'c', request: 'y', expected_storage_targets: ['memory'] },
      ],
    };

    expect(() => parseCorpus(raw, 'dupes.json')).toThrow('Invalid corpus dupes.json: duplicate case id "a"');
  });

  it('should reject unknown backends', () => {
    const raw = { name: 'bad', cases: [{ id: 'a', category: 'c', request: 'x', expected_storage_targets: ['s3'] }] };

    expect(() => parseCorpus(raw)).toThrow('Invalid corpus corpus: case a expects unknown backend "s3"');
  });

  it('should reject a case without expected targets', () => {
    const raw = { name: 'bad', cases: [{ id: 'a', category: 'c', request: 'x', expected_storage_targets: [] }] };

    expect(() => parseCorpus(raw)).toThrow(/^Invalid corpus corpus: cases\.0\.expected_storage_targets: /);
  });
});

describe('loadCorpus', () => {
  it('should load the pinned corpus', () => {
    const corpus = loadCorpus(BUNDLED_CORPUS_PATH);

    expect(corpus.name).toBe('reference-50');
    expect(corpus.cases).toHaveLength(50);
    expect(corpus.cases.find((entry) => entry.id === 'rel-08')?.expectedStorageTargets).toEqual(['memory']);
  });

  it('should wrap read errors', () => {
    const missing = path.join(os.tmpdir(), 'store-router-no-such-corpus.json');

    expect(() => loadCorpus(missing)).toThrow(`Could not read corpus ${missing}: `);
  });
});
