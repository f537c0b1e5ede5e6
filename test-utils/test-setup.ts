// Shared test setup utilities
import { fileURLToPath } from 'node:url';
import { beforeEach } from 'vitest';
import { createRecord, readLexiconFile, setDebug, setProfile, type MorphemeRecord } from '@abc-lexicon/core';
import { clearSynthesisCache } from '@abc-lexicon/lexicon';
import { clearCategoryCache } from '@abc-lexicon/category';

/** IPADIC-style sample covering every morpheme class, plus one unrelated noun */
export const SAMPLE_SYSDIC_PATH = fileURLToPath(new URL('./fixtures/sysdic.csv', import.meta.url));

export function loadSampleLexicon(): MorphemeRecord[] {
  return readLexiconFile(SAMPLE_SYSDIC_PATH);
}

/** A plain noun record with the given fields replaced */
export function morpheme(overrides: Partial<MorphemeRecord> = {}): MorphemeRecord {
  return createRecord({
    surface: '犬',
    leftId: 100,
    rightId: 100,
    cost: 4000,
    partOfSpeech: '名詞,一般,*,*',
    inflectionType: '*',
    inflectionForm: '*',
    baseForm: '犬',
    reading: 'イヌ',
    phonetic: 'イヌ',
    ...overrides,
  });
}

export function setupTests() {
  beforeEach(() => {
    setDebug(false);
    setProfile(false);
    clearSynthesisCache();
    clearCategoryCache();
  });
}
