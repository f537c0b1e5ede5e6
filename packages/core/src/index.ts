// @abc-lexicon/core - Morpheme records, lexicon CSV codec and shared diagnostics

export type * from './types.js';
export { MORPHEME_FIELDS } from './types.js';

export {
  RawMorphemeTupleSchema,
  createRecord,
  withFields,
  fromTuple,
  toTuple,
  toMorphemeRecord,
  recordKey,
  fragment,
} from './record.js';

export { parseLexiconCsv, readLexiconFile, formatRecordCsv } from './csv.js';
export { LexiconFormatError } from './errors.js';

export { DEBUG, setDebug, dp, PROFILE, setProfile, time } from './debug.js';
export {
  type Settings,
  DEFAULT_BATCH_SIZE,
  getSettingsFromEnv,
  isTruthyFlag,
  parseBatchSize,
} from './settings.js';
