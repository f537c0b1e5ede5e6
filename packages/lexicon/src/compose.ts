import { fragment, withFields, type Fragment, type MorphemeRecord, type TextField } from '@abc-lexicon/core';

/**
 * Subtracted from the head's cost on every final entry so that the lattice
 * prefers the whole construction over any piecewise segmentation.
 */
export const COST_BIAS = 10000;

export interface ComposeOptions {
  /** Apply the cost bias (terminal constructions only) */
  final?: boolean;
}

type Constituent = MorphemeRecord | Fragment;

function concat(parts: readonly Constituent[], field: TextField): string {
  return parts.map((part) => part[field]).join('');
}

/**
 * Compose `lead`, any literal fragments and `head` into one entry.
 *
 * The entry is a copy of `head` whose text fields are the concatenation of all
 * constituents, whose left id is the lead's, and whose right id, part of speech
 * and inflection stay those of the head.
 */
export function composeEntry(
  lead: MorphemeRecord,
  fragments: readonly Fragment[],
  head: MorphemeRecord,
  options: ComposeOptions = {},
): MorphemeRecord {
  const parts: readonly Constituent[] = [lead, ...fragments, head];
  return withFields(head, {
    surface: concat(parts, 'surface'),
    leftId: lead.leftId,
    cost: options.final ? head.cost - COST_BIAS : head.cost,
    baseForm: concat(parts, 'baseForm'),
    reading: concat(parts, 'reading'),
    phonetic: concat(parts, 'phonetic'),
  });
}

/** Append literal fragments to a record, keeping everything else. */
export function appendFragments(record: MorphemeRecord, fragments: readonly Fragment[]): MorphemeRecord {
  const parts: readonly Constituent[] = [record, ...fragments];
  return withFields(record, {
    surface: concat(parts, 'surface'),
    baseForm: concat(parts, 'baseForm'),
    reading: concat(parts, 'reading'),
    phonetic: concat(parts, 'phonetic'),
  });
}

// ============================================================================
// LITERAL FRAGMENTS
// ============================================================================

/** Case particles between はず and the predicate */
export const CASE_PARTICLES: readonly Fragment[] = [
  fragment('が', 'ガ'),
  fragment('ガ', 'ガ'),
  fragment('は', 'ハ', 'ワ'),
  fragment('ハ', 'ハ', 'ワ'),
  fragment('も', 'モ'),
  fragment('モ', 'モ'),
  fragment('の', 'ノ'),
  fragment('ノ', 'ノ'),
];

/** Particles after the conjunctive て of てはならない */
export const TOPIC_PARTICLES: readonly Fragment[] = [
  fragment('は', 'ハ', 'ワ'),
  fragment('ハ', 'ハ', 'ワ'),
  fragment('も', 'モ'),
  fragment('モ', 'モ'),
];

/** Spellings of もしれ in かもしれない */
export const MOSHIRE_FORMS: readonly Fragment[] = [
  fragment('もしれ', 'モシレ'),
  fragment('モシレ', 'モシレ'),
  fragment('も知れ', 'モシレ'),
  fragment('モ知レ', 'モシレ'),
];

export const BA_SUFFIXES: readonly Fragment[] = [fragment('ば', 'バ'), fragment('バ', 'バ')];

export const TO_SUFFIXES: readonly Fragment[] = [fragment('と', 'ト'), fragment('ト', 'ト')];

export const TE_SUFFIXES: readonly Fragment[] = [fragment('て', 'テ'), fragment('テ', 'テ')];

export const WA_SUFFIXES: readonly Fragment[] = [fragment('は', 'ハ', 'ワ'), fragment('ハ', 'ハ', 'ワ')];
