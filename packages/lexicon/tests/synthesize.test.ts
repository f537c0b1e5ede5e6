import { describe, test, expect } from 'vitest';
import { recordKey } from '@abc-lexicon/core';
import {
  COST_BIAS,
  clearSynthesisCache,
  collectUnique,
  getSynthesisCacheStats,
  setSynthesisCacheCapacity,
  synthesize,
} from '@abc-lexicon/lexicon';
import { loadSampleLexicon, morpheme, setupTests } from '../../../test-utils/test-setup.js';

setupTests();

describe('synthesize', () => {
  test('筈 + ない yields one entry per case particle', () => {
    const hazu = morpheme({ surface: '筈', leftId: 1, rightId: 1, cost: 5000, partOfSpeech: '名詞,非自立,一般,*', baseForm: '筈', reading: 'ハズ', phonetic: 'ハズ' });
    const nai = morpheme({
      surface: 'ない',
      leftId: 10,
      rightId: 11,
      cost: 3000,
      partOfSpeech: '形容詞,自立,*,*',
      inflectionType: '形容詞・アウオ段',
      inflectionForm: '基本形',
      baseForm: 'ない',
      reading: 'ナイ',
      phonetic: 'ナイ',
    });

    const entries = synthesize([hazu, nai]);
    expect(entries.map((entry) => entry.surface)).toEqual([
      '筈がない', '筈ガない', '筈はない', '筈ハない', '筈もない', '筈モない', '筈のない', '筈ノない',
    ]);
    expect(entries[4].reading).toBe('ハズモナイ');
    expect(entries[4].cost).toBe(3000 - COST_BIAS);
    expect(entries.every((entry) => entry.leftId === 1 && entry.rightId === 11)).toBe(true);
  });

  test('the sample dictionary gives 412 distinct entries, all biased', () => {
    const entries = synthesize(loadSampleLexicon());
    expect(entries).toHaveLength(412);
    expect(new Set(entries.map(recordKey)).size).toBe(412);
    expect(entries.every((entry) => entry.cost <= 3000 - COST_BIAS)).toBe(true);
    expect(entries[0].surface).toBe('だろう');
  });

  test('duplicated base entries do not duplicate output', () => {
    const lexicon = loadSampleLexicon();
    expect(synthesize([...lexicon, ...lexicon])).toEqual(synthesize(lexicon));
  });

  test('an empty lexicon gives an empty dictionary', () => {
    expect(synthesize([])).toEqual([]);
  });

  test('the result is frozen', () => {
    expect(Object.isFrozen(synthesize(loadSampleLexicon()))).toBe(true);
  });
});

describe('synthesis cache', () => {
  test('the same snapshot is synthesized once', () => {
    const lexicon = loadSampleLexicon();
    const first = synthesize(lexicon);
    const second = synthesize(lexicon);
    expect(second).toBe(first);
    expect(getSynthesisCacheStats()).toEqual({ hits: 1, misses: 1 });
  });

  test('an equal but distinct snapshot is a miss with equal output', () => {
    const first = synthesize(loadSampleLexicon());
    const second = synthesize(loadSampleLexicon());
    expect(second).not.toBe(first);
    expect(second).toEqual(first);
    expect(getSynthesisCacheStats()).toEqual({ hits: 0, misses: 2 });
  });

  test('capacity bounds the number of snapshots kept', () => {
    setSynthesisCacheCapacity(1);
    try {
      const a = loadSampleLexicon();
      const b = loadSampleLexicon();
      synthesize(a);
      synthesize(b);
      synthesize(a);
      expect(getSynthesisCacheStats()).toEqual({ hits: 0, misses: 3 });
    } finally {
      setSynthesisCacheCapacity(16);
      clearSynthesisCache();
    }
  });
});

describe('collectUnique', () => {
  test('keeps the first of equal records', () => {
    const first = morpheme();
    const second = morpheme();
    const other = morpheme({ cost: 1 });
    const unique = collectUnique([first, other, second]);
    expect(unique).toHaveLength(2);
    expect(unique[0]).toBe(first);
    expect(unique[1]).toBe(other);
  });
});
