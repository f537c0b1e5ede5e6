import { describe, test, expect } from 'vitest';
import { toTuple } from '@abc-lexicon/core';
import { MORPHEME_CLASSES, classifyLexicon, matchesPredicate, selectClass } from '@abc-lexicon/lexicon';
import { loadSampleLexicon, morpheme, setupTests } from '../../../test-utils/test-setup.js';

setupTests();

describe('classifyLexicon', () => {
  test('sorts the sample dictionary into every class, keeping input order', () => {
    const classes = classifyLexicon(loadSampleLexicon());
    const surfaces = Object.fromEntries(
      Object.entries(classes).map(([name, records]) => [name, records.map((record) => record.surface)]),
    );

    expect(surfaces).toEqual({
      hazu: ['筈', 'はず'],
      ka: ['か'],
      negativeAdjective: ['ない'],
      negationAuxiliary: ['ない', 'なけれ', 'なきゃ', 'なく', 'ん', 'ぬ'],
      politeAuxiliary: ['ませ', 'ましょ'],
      existentialVerb: ['あり', 'ある'],
      lightVerbNaru: ['なら', 'なり'],
      lightVerbIku: ['いか'],
      lightVerbIkeru: ['いけ', 'いけ'],
      conjunctiveTe: ['て', 'で'],
      volitionalAuxiliary: ['う'],
      irrealisCopula: ['だろ', 'でしょ'],
    });
  });

  test('adjective ない and auxiliary ない land in different classes', () => {
    const classes = classifyLexicon(loadSampleLexicon());
    expect(classes.negativeAdjective.map((record) => record.partOfSpeech)).toEqual(['形容詞,自立,*,*']);
    expect(classes.negationAuxiliary[0].partOfSpeech).toBe('助動詞,*,*,*');
  });

  test('matches on base form, not surface', () => {
    const katakana = morpheme({ surface: 'ハズ', baseForm: '筈', partOfSpeech: '名詞,非自立,一般,*' });
    const surfaceOnly = morpheme({ surface: '筈', baseForm: '犬', partOfSpeech: '名詞,非自立,一般,*' });
    expect(classifyLexicon([katakana, surfaceOnly]).hazu).toEqual([katakana]);
  });

  test('か must be a particle', () => {
    const noun = morpheme({ surface: 'か', baseForm: 'か', partOfSpeech: '名詞,一般,*,*' });
    expect(classifyLexicon([noun]).ka).toEqual([]);
  });

  test('ぬ needs the 特殊・ヌ inflection', () => {
    const nu = morpheme({ surface: 'ぬ', baseForm: 'ぬ', partOfSpeech: '助動詞,*,*,*', inflectionType: '特殊・ヌ' });
    const other = morpheme({ surface: 'ぬ', baseForm: 'ぬ', partOfSpeech: '助動詞,*,*,*', inflectionType: '不変化型' });
    expect(classifyLexicon([nu, other]).negationAuxiliary).toEqual([nu]);
  });

  test('accepts raw tuples', () => {
    const classes = classifyLexicon(loadSampleLexicon().map(toTuple));
    expect(classes.hazu.map((record) => record.reading)).toEqual(['ハズ', 'ハズ']);
  });

  test('an empty lexicon gives empty classes', () => {
    const classes = classifyLexicon([]);
    expect(Object.keys(classes)).toEqual(MORPHEME_CLASSES.map((definition) => definition.name));
    for (const records of Object.values(classes)) {
      expect(records).toEqual([]);
    }
  });

  test('custom definitions leave the other classes empty', () => {
    const classes = classifyLexicon(loadSampleLexicon(), [
      { name: 'ka', description: 'any particle', predicate: { partOfSpeech: /^助詞/ } },
    ]);
    expect(classes.ka.map((record) => record.surface)).toEqual(['か', 'て', 'で']);
    expect(classes.hazu).toEqual([]);
  });
});

describe('predicates', () => {
  test('anyOf matches when one alternative does', () => {
    const predicate = { anyOf: [{ baseForm: /^ん$/ }, { surface: /^ぬ$/ }] };
    expect(matchesPredicate(morpheme({ baseForm: 'ん' }), predicate)).toBe(true);
    expect(matchesPredicate(morpheme({ surface: 'ぬ' }), predicate)).toBe(true);
    expect(matchesPredicate(morpheme(), predicate)).toBe(false);
  });

  test('selectClass keeps order and freezes the result', () => {
    const records = [morpheme({ surface: 'a' }), morpheme({ surface: 'b', cost: 1 }), morpheme({ surface: 'c' })];
    const selected = selectClass(records, { surface: /^[ac]$/ });
    expect(selected.map((record) => record.surface)).toEqual(['a', 'c']);
    expect(Object.isFrozen(selected)).toBe(true);
  });
});
