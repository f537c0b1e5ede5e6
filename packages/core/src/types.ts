// Shared type definitions for abc-lexicon
// Morpheme records as they come out of (and go back into) a system dictionary

// ============================================================================
// MORPHEME RECORDS
// ============================================================================

/**
 * Connection identifier into the host tokenizer's cost matrix.
 * `null` marks an unspecified id; the value is only ever copied.
 */
export type ConnectionId = number | null;

/**
 * One lexical entry of a system or user dictionary.
 * Records are frozen values: two records with the same fields are the same entry.
 */
export interface MorphemeRecord {
  readonly surface: string;
  readonly leftId: ConnectionId;
  readonly rightId: ConnectionId;
  readonly cost: number;
  /** Comma-delimited hierarchy, e.g. `動詞,非自立,*,*` */
  readonly partOfSpeech: string;
  readonly inflectionType: string;
  readonly inflectionForm: string;
  readonly baseForm: string;
  readonly reading: string;
  readonly phonetic: string;
}

/** Field order shared by raw tuples and the CSV dump. */
export const MORPHEME_FIELDS = [
  'surface',
  'leftId',
  'rightId',
  'cost',
  'partOfSpeech',
  'inflectionType',
  'inflectionForm',
  'baseForm',
  'reading',
  'phonetic',
] as const satisfies readonly (keyof MorphemeRecord)[];

export type MorphemeField = (typeof MORPHEME_FIELDS)[number];

/** Position-indexed entry as stored by an external analyzer's system dictionary. */
export type RawMorphemeTuple = readonly [
  surface: string,
  leftId: ConnectionId,
  rightId: ConnectionId,
  cost: number,
  partOfSpeech: string,
  inflectionType: string,
  inflectionForm: string,
  baseForm: string,
  reading: string,
  phonetic: string,
];

export type LexiconRow = MorphemeRecord | RawMorphemeTuple;

/** A base lexicon snapshot. Its identity is the synthesis cache key. */
export type Lexicon = Iterable<LexiconRow>;

// ============================================================================
// TEXT FIELDS
// ============================================================================

/** The four string fields concatenated when morphemes are composed. */
export type TextField = 'surface' | 'baseForm' | 'reading' | 'phonetic';

/** A literal morph (particle, suffix) that is not looked up in the lexicon. */
export type Fragment = Readonly<Record<TextField, string>>;
