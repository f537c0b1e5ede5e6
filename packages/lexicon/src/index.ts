// @abc-lexicon/lexicon - Compound entries for Japanese grammatical constructions

export {
  type FieldPattern,
  type ClassPredicate,
  type MorphemeClassName,
  type MorphemeClassDefinition,
  type MorphemeClasses,
  MORPHEME_CLASSES,
  matchesPredicate,
  selectClass,
  emptyClasses,
  classifyLexicon,
} from './classes.js';

export {
  COST_BIAS,
  type ComposeOptions,
  composeEntry,
  appendFragments,
  CASE_PARTICLES,
  TOPIC_PARTICLES,
  MOSHIRE_FORMS,
} from './compose.js';

export {
  type LightVerbNegativeInput,
  type LightVerbNegatives,
  type ConstructionOutputs,
  politeNegatives,
  negativePredicates,
  lightVerbNegatives,
  conditionalNegations,
  obligationPrefixes,
  volitionalCopulas,
  obligatoryNegatives,
  epistemics,
  obligations,
  runConstructions,
} from './constructions.js';

export {
  type SynthesizedDictionary,
  synthesize,
  collectUnique,
  finalEntries,
  clearSynthesisCache,
  setSynthesisCacheCapacity,
  getSynthesisCacheStats,
} from './synthesize.js';

export { type Writer, dumpDictionary, printDictionary, toUserDictionaryCsv, dumpStages } from './dump.js';
