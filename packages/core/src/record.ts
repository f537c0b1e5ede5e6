import { z } from 'zod';
import { LexiconFormatError } from './errors.js';
import type { Fragment, LexiconRow, MorphemeRecord, RawMorphemeTuple } from './types.js';

const ConnectionIdSchema = z.number().int().nullable();

export const RawMorphemeTupleSchema = z.tuple([
  z.string(),
  ConnectionIdSchema,
  ConnectionIdSchema,
  z.number().int(),
  z.string(),
  z.string(),
  z.string(),
  z.string(),
  z.string(),
  z.string(),
]);

/**
 * Build a frozen record holding exactly the morpheme fields.
 * Extra properties on the input are dropped.
 */
export function createRecord(fields: MorphemeRecord): MorphemeRecord {
  return Object.freeze({
    surface: fields.surface,
    leftId: fields.leftId,
    rightId: fields.rightId,
    cost: fields.cost,
    partOfSpeech: fields.partOfSpeech,
    inflectionType: fields.inflectionType,
    inflectionForm: fields.inflectionForm,
    baseForm: fields.baseForm,
    reading: fields.reading,
    phonetic: fields.phonetic,
  });
}

/** Copy a record, overriding some of its fields. The original is left untouched. */
export function withFields(record: MorphemeRecord, overrides: Partial<MorphemeRecord>): MorphemeRecord {
  return createRecord({ ...record, ...overrides });
}

/**
 * Validate a position-indexed tuple and turn it into a record.
 * @throws LexiconFormatError when the tuple does not have the ten expected fields
 */
export function fromTuple(tuple: unknown, line?: number): MorphemeRecord {
  const parsed = RawMorphemeTupleSchema.safeParse(tuple);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at field ${issue.path.join('.')}` : '';
    throw new LexiconFormatError(`Invalid morpheme tuple${where}: ${issue?.message ?? 'unknown error'}`, line);
  }

  const [surface, leftId, rightId, cost, partOfSpeech, inflectionType, inflectionForm, baseForm, reading, phonetic] =
    parsed.data;
  return createRecord({
    surface,
    leftId,
    rightId,
    cost,
    partOfSpeech,
    inflectionType,
    inflectionForm,
    baseForm,
    reading,
    phonetic,
  });
}

export function toTuple(record: MorphemeRecord): RawMorphemeTuple {
  return [
    record.surface,
    record.leftId,
    record.rightId,
    record.cost,
    record.partOfSpeech,
    record.inflectionType,
    record.inflectionForm,
    record.baseForm,
    record.reading,
    record.phonetic,
  ];
}

export function toMorphemeRecord(row: LexiconRow): MorphemeRecord {
  return 'surface' in row ? createRecord(row) : fromTuple(row);
}

/** Value key of a record; equal keys mean equal entries. */
export function recordKey(record: MorphemeRecord): string {
  return JSON.stringify(toTuple(record));
}

export function fragment(surface: string, reading: string, phonetic: string = reading): Fragment {
  return Object.freeze({ surface, baseForm: surface, reading, phonetic });
}
