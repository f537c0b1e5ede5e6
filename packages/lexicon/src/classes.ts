/**
 * Morpheme classes
 *
 * A declarative table of named predicates over the base lexicon. Every record
 * is tested against every class in a single pass; a class that matches nothing
 * is simply empty.
 */

import { toMorphemeRecord, type Lexicon, type MorphemeRecord } from '@abc-lexicon/core';

/** Per-field patterns; every pattern given must match. */
export interface FieldPattern {
  surface?: RegExp;
  baseForm?: RegExp;
  partOfSpeech?: RegExp;
  inflectionType?: RegExp;
  inflectionForm?: RegExp;
}

export type ClassPredicate = FieldPattern | { anyOf: readonly FieldPattern[] };

export type MorphemeClassName =
  | 'hazu'
  | 'ka'
  | 'negativeAdjective'
  | 'negationAuxiliary'
  | 'politeAuxiliary'
  | 'existentialVerb'
  | 'lightVerbNaru'
  | 'lightVerbIku'
  | 'lightVerbIkeru'
  | 'conjunctiveTe'
  | 'volitionalAuxiliary'
  | 'irrealisCopula';

export interface MorphemeClassDefinition {
  name: MorphemeClassName;
  description: string;
  predicate: ClassPredicate;
}

export type MorphemeClasses = Readonly<Record<MorphemeClassName, readonly MorphemeRecord[]>>;

export const MORPHEME_CLASSES: readonly MorphemeClassDefinition[] = [
  {
    name: 'hazu',
    description: 'はず (dependent noun)',
    predicate: { baseForm: /^(はず|ハズ|筈)$/, partOfSpeech: /^名詞,非自立/ },
  },
  {
    name: 'ka',
    description: 'か (particle)',
    predicate: { baseForm: /^か$/, partOfSpeech: /^助詞/ },
  },
  {
    name: 'negativeAdjective',
    description: 'ない (adjective)',
    predicate: { baseForm: /^(ない|無い)$/, partOfSpeech: /^形容詞/ },
  },
  {
    name: 'negationAuxiliary',
    description: 'ない・ん・ぬ (negation auxiliaries)',
    predicate: {
      anyOf: [
        { baseForm: /^ん$/ },
        { baseForm: /^ない$/, partOfSpeech: /^助動詞/ },
        { baseForm: /^ぬ$/, inflectionType: /^特殊・ヌ/ },
      ],
    },
  },
  {
    name: 'politeAuxiliary',
    description: 'ます (auxiliary)',
    predicate: { baseForm: /^ます/, partOfSpeech: /^助動詞/ },
  },
  {
    name: 'existentialVerb',
    description: 'ある (independent verb)',
    predicate: { baseForm: /^(ある|有る)$/, partOfSpeech: /^動詞,自立/ },
  },
  {
    name: 'lightVerbNaru',
    description: 'なる (dependent verb)',
    predicate: { baseForm: /^(なる|成る)$/, partOfSpeech: /^動詞,非自立/ },
  },
  {
    name: 'lightVerbIku',
    description: 'いく (dependent verb)',
    predicate: { baseForm: /^(いく|行く)$/, partOfSpeech: /^動詞,非自立/ },
  },
  {
    name: 'lightVerbIkeru',
    description: 'いける (dependent verb)',
    predicate: { baseForm: /^(いける|行ける)$/, partOfSpeech: /^動詞,非自立/ },
  },
  {
    name: 'conjunctiveTe',
    description: 'て・で (conjunctive particle)',
    predicate: { baseForm: /^(て|で)$/, partOfSpeech: /^助詞,接続助詞/ },
  },
  {
    name: 'volitionalAuxiliary',
    description: 'う (auxiliary)',
    predicate: { baseForm: /^う$/, partOfSpeech: /^助動詞/ },
  },
  {
    name: 'irrealisCopula',
    description: 'だろ・でしょ (copula, irrealis)',
    predicate: { baseForm: /^(だ|です)$/, inflectionForm: /^未然形/ },
  },
];

function matchesPattern(record: MorphemeRecord, pattern: FieldPattern): boolean {
  return (
    (pattern.surface === undefined || pattern.surface.test(record.surface)) &&
    (pattern.baseForm === undefined || pattern.baseForm.test(record.baseForm)) &&
    (pattern.partOfSpeech === undefined || pattern.partOfSpeech.test(record.partOfSpeech)) &&
    (pattern.inflectionType === undefined || pattern.inflectionType.test(record.inflectionType)) &&
    (pattern.inflectionForm === undefined || pattern.inflectionForm.test(record.inflectionForm))
  );
}

export function matchesPredicate(record: MorphemeRecord, predicate: ClassPredicate): boolean {
  if ('anyOf' in predicate) {
    return predicate.anyOf.some((pattern) => matchesPattern(record, pattern));
  }
  return matchesPattern(record, predicate);
}

/** Ordered sub-sequence of `records` satisfying `predicate`. */
export function selectClass(records: Iterable<MorphemeRecord>, predicate: ClassPredicate): readonly MorphemeRecord[] {
  const selected: MorphemeRecord[] = [];
  for (const record of records) {
    if (matchesPredicate(record, predicate)) {
      selected.push(record);
    }
  }
  return Object.freeze(selected);
}

function buildClasses(lookup: (name: MorphemeClassName) => readonly MorphemeRecord[]): MorphemeClasses {
  return Object.freeze({
    hazu: lookup('hazu'),
    ka: lookup('ka'),
    negativeAdjective: lookup('negativeAdjective'),
    negationAuxiliary: lookup('negationAuxiliary'),
    politeAuxiliary: lookup('politeAuxiliary'),
    existentialVerb: lookup('existentialVerb'),
    lightVerbNaru: lookup('lightVerbNaru'),
    lightVerbIku: lookup('lightVerbIku'),
    lightVerbIkeru: lookup('lightVerbIkeru'),
    conjunctiveTe: lookup('conjunctiveTe'),
    volitionalAuxiliary: lookup('volitionalAuxiliary'),
    irrealisCopula: lookup('irrealisCopula'),
  });
}

export function emptyClasses(): MorphemeClasses {
  return buildClasses(() => Object.freeze([]));
}

/**
 * Classify a lexicon in one pass.
 * A record may land in several classes; input order is kept within each class.
 */
export function classifyLexicon(
  lexicon: Lexicon,
  definitions: readonly MorphemeClassDefinition[] = MORPHEME_CLASSES,
): MorphemeClasses {
  const buckets = new Map<MorphemeClassName, MorphemeRecord[]>();

  for (const row of lexicon) {
    const record = toMorphemeRecord(row);
    for (const definition of definitions) {
      if (matchesPredicate(record, definition.predicate)) {
        const bucket = buckets.get(definition.name);
        if (bucket) {
          bucket.push(record);
        } else {
          buckets.set(definition.name, [record]);
        }
      }
    }
  }

  return buildClasses((name) => Object.freeze(buckets.get(name) ?? []));
}
