import { describe, test, expect } from 'vitest';
import {
  LexiconFormatError,
  MORPHEME_FIELDS,
  createRecord,
  fragment,
  fromTuple,
  recordKey,
  toMorphemeRecord,
  toTuple,
  withFields,
} from '@abc-lexicon/core';
import { morpheme, setupTests } from '../../../test-utils/test-setup.js';

setupTests();

const NAI_TUPLE = ['ない', 20, 21, 1000, '助動詞,*,*,*', '特殊・ナイ', '基本形', 'ない', 'ナイ', 'ナイ'] as const;

describe('fromTuple', () => {
  test('maps positions to named fields', () => {
    expect(fromTuple(NAI_TUPLE)).toEqual({
      surface: 'ない',
      leftId: 20,
      rightId: 21,
      cost: 1000,
      partOfSpeech: '助動詞,*,*,*',
      inflectionType: '特殊・ナイ',
      inflectionForm: '基本形',
      baseForm: 'ない',
      reading: 'ナイ',
      phonetic: 'ナイ',
    });
  });

  test('accepts unspecified connection ids', () => {
    const record = fromTuple(['ほげ', null, null, 10, '名詞,一般,*,*', '*', '*', 'ほげ', 'ホゲ', 'ホゲ']);
    expect(record.leftId).toBeNull();
    expect(record.rightId).toBeNull();
  });

  test('rejects a tuple with too few fields', () => {
    expect(() => fromTuple(NAI_TUPLE.slice(0, 9))).toThrow(LexiconFormatError);
  });

  test('names the offending field and row', () => {
    const tuple = ['ない', '20', 21, 1000, '助動詞,*,*,*', '特殊・ナイ', '基本形', 'ない', 'ナイ', 'ナイ'];
    try {
      fromTuple(tuple, 7);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LexiconFormatError);
      if (!(error instanceof LexiconFormatError)) return;
      expect(error.line).toBe(7);
      expect(error.message).toMatch(/^Invalid morpheme tuple at field 1: /);
      expect(error.message).toMatch(/\(row 7\)$/);
    }
  });

  test('rejects a fractional cost', () => {
    const tuple = ['ない', 20, 21, 1.5, '助動詞,*,*,*', '特殊・ナイ', '基本形', 'ない', 'ナイ', 'ナイ'];
    expect(() => fromTuple(tuple)).toThrow(/^Invalid morpheme tuple at field 3: /);
  });
});

describe('records', () => {
  test('toTuple restores the original positions', () => {
    expect(toTuple(fromTuple(NAI_TUPLE))).toEqual([...NAI_TUPLE]);
  });

  test('createRecord keeps exactly the morpheme fields, frozen', () => {
    const withExtra = { ...morpheme(), note: 'dropped' };
    const record = createRecord(withExtra);
    expect(Object.keys(record)).toEqual([...MORPHEME_FIELDS]);
    expect(Object.isFrozen(record)).toBe(true);
  });

  test('withFields copies without touching the original', () => {
    const original = morpheme();
    const changed = withFields(original, { cost: -6000, surface: '猫' });
    expect(changed.cost).toBe(-6000);
    expect(changed.surface).toBe('猫');
    expect(changed.reading).toBe('イヌ');
    expect(original.cost).toBe(4000);
    expect(original.surface).toBe('犬');
  });

  test('toMorphemeRecord accepts both row shapes', () => {
    const fromRecord = toMorphemeRecord(morpheme({ surface: '猫' }));
    const fromRaw = toMorphemeRecord(NAI_TUPLE);
    expect(fromRecord.surface).toBe('猫');
    expect(fromRaw.baseForm).toBe('ない');
  });

  test('recordKey is equal exactly when every field is', () => {
    expect(recordKey(morpheme())).toBe(recordKey(morpheme()));
    expect(recordKey(morpheme())).not.toBe(recordKey(morpheme({ cost: 4001 })));
    expect(recordKey(morpheme())).not.toBe(recordKey(morpheme({ leftId: null })));
  });
});

describe('fragment', () => {
  test('phonetic defaults to the reading', () => {
    expect(fragment('が', 'ガ')).toEqual({ surface: 'が', baseForm: 'が', reading: 'ガ', phonetic: 'ガ' });
  });

  test('topic は is pronounced ワ', () => {
    expect(fragment('は', 'ハ', 'ワ').phonetic).toBe('ワ');
  });
});
