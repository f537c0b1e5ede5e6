/**
 * Construction catalogue
 *
 * Each stage is a pure function from classified morphemes (and the output of
 * earlier stages) to new entries. Stages run in this order:
 *
 *   politeNegatives ─┬─ negativePredicates ── obligatoryNegatives
 *                    └─ lightVerbNegatives ─┐
 *   conditionalNegations / obligationPrefixes ┴─ obligations
 *   volitionalCopulas, epistemics (independent)
 *
 * Intermediate stages keep their head's cost; final stages apply COST_BIAS.
 */

import type { MorphemeRecord } from '@abc-lexicon/core';
import type { MorphemeClasses } from './classes.js';
import {
  BA_SUFFIXES,
  CASE_PARTICLES,
  MOSHIRE_FORMS,
  TE_SUFFIXES,
  TO_SUFFIXES,
  TOPIC_PARTICLES,
  WA_SUFFIXES,
  appendFragments,
  composeEntry,
} from './compose.js';

type Records = readonly MorphemeRecord[];

const IRREALIS = /^未然形/; // excludes 未然ウ接続 (なろう, ましょう)
const CONTINUATIVE = /^連用形/; // excludes 連用テ接続 (なって, あって)

const isIrrealis = (record: MorphemeRecord) => IRREALIS.test(record.inflectionForm);
const isContinuative = (record: MorphemeRecord) => CONTINUATIVE.test(record.inflectionForm);

// ============================================================================
// INTERMEDIATE STAGES
// ============================================================================

/** ません: irrealis ます + ん */
export function politeNegatives(politeAuxiliary: Records, negationAuxiliary: Records): MorphemeRecord[] {
  const negations = negationAuxiliary.filter((head) => head.surface.startsWith('ん'));
  return politeAuxiliary
    .filter(isIrrealis)
    .flatMap((masu) => negations.map((head) => composeEntry(masu, [], head)));
}

/** ない (adjective) and ありません */
export function negativePredicates(
  negativeAdjective: Records,
  existentialVerb: Records,
  politeNegativeEntries: Records,
): MorphemeRecord[] {
  const arimasen = existentialVerb
    .filter(isContinuative)
    .flatMap((aru) => politeNegativeEntries.map((head) => composeEntry(aru, [], head)));
  return [...negativeAdjective, ...arimasen];
}

export interface LightVerbNegativeInput {
  naru: Records;
  iku: Records;
  ikeru: Records;
  negationAuxiliary: Records;
  politeNegatives: Records;
}

export interface LightVerbNegatives {
  /** ならない・ならぬ・ならん・なりません */
  naranai: readonly MorphemeRecord[];
  /** いけない・いかぬ・いかん・いけません */
  ikenai: readonly MorphemeRecord[];
}

const NAI_FAMILY = /^(ない|無い)$/;
const NU_FAMILY = /^(ぬ|ん)$/;

function attach(leads: Records, heads: Records): MorphemeRecord[] {
  return leads.flatMap((lead) => heads.map((head) => composeEntry(lead, [], head)));
}

export function lightVerbNegatives(input: LightVerbNegativeInput): LightVerbNegatives {
  const { naru, iku, ikeru, negationAuxiliary } = input;

  const naranai = [
    ...attach(naru.filter(isIrrealis), negationAuxiliary),
    ...attach(naru.filter(isContinuative), input.politeNegatives),
  ];

  const ikenai = [
    // いけない
    ...attach(
      ikeru.filter(isIrrealis),
      negationAuxiliary.filter((head) => NAI_FAMILY.test(head.baseForm)),
    ),
    // いかぬ・いかん
    ...attach(
      iku.filter(isIrrealis),
      negationAuxiliary.filter((head) => NU_FAMILY.test(head.baseForm)),
    ),
    // いけません
    ...attach(ikeru.filter(isContinuative), input.politeNegatives),
  ];

  return { naranai, ikenai };
}

/**
 * Conditional forms of a negation auxiliary.
 *
 * - hypothetical, contracted (なきゃ, なけりゃ): the entry itself
 * - hypothetical (なけれ, ね): + ば
 * - basic (ない, ん): + と
 * - te-continuative (なく, なくっ): + て, + ては
 *
 * Any other inflection form has no conditional variant.
 */
export function conditionalNegations(entry: MorphemeRecord): MorphemeRecord[] {
  const form = entry.inflectionForm;

  if (form.startsWith('仮定')) {
    if (form.includes('縮約')) {
      return [entry];
    }
    return BA_SUFFIXES.map((ba) => appendFragments(entry, [ba]));
  }

  if (form.startsWith('基本')) {
    return TO_SUFFIXES.map((to) => appendFragments(entry, [to]));
  }

  if (form.startsWith('連用テ接続')) {
    return TE_SUFFIXES.flatMap((te) => [
      appendFragments(entry, [te]),
      ...WA_SUFFIXES.map((wa) => appendFragments(entry, [te, wa])),
    ]);
  }

  return [];
}

/** なければ・なきゃ・ないと・なくては… and ては・ても… */
export function obligationPrefixes(negationAuxiliary: Records, conjunctiveTe: Records): MorphemeRecord[] {
  return [
    ...negationAuxiliary.flatMap(conditionalNegations),
    ...conjunctiveTe.flatMap((te) => TOPIC_PARTICLES.map((particle) => appendFragments(te, [particle]))),
  ];
}

// ============================================================================
// FINAL STAGES
// ============================================================================

/** だろう・でしょう */
export function volitionalCopulas(irrealisCopula: Records, volitionalAuxiliary: Records): MorphemeRecord[] {
  return irrealisCopula.flatMap((copula) =>
    volitionalAuxiliary.map((head) => composeEntry(copula, [], head, { final: true })),
  );
}

/** はず{が,は,も,の}{ない,ありません,ある} */
export function obligatoryNegatives(hazu: Records, predicates: Records): MorphemeRecord[] {
  return hazu.flatMap((noun) =>
    CASE_PARTICLES.flatMap((particle) =>
      predicates.map((head) => composeEntry(noun, [particle], head, { final: true })),
    ),
  );
}

/** かもしれない・かもしれん・かもしれぬ */
export function epistemics(ka: Records, negationAuxiliary: Records): MorphemeRecord[] {
  return ka.flatMap((particle) =>
    MOSHIRE_FORMS.flatMap((moshire) =>
      negationAuxiliary.map((head) => composeEntry(particle, [moshire], head, { final: true })),
    ),
  );
}

/** なければならない・ないといけない・てはならない… */
export function obligations(prefixes: Records, lightVerbs: LightVerbNegatives): MorphemeRecord[] {
  const heads = [...lightVerbs.naranai, ...lightVerbs.ikenai];
  return prefixes.flatMap((prefix) => heads.map((head) => composeEntry(prefix, [], head, { final: true })));
}

// ============================================================================
// PIPELINE
// ============================================================================

export interface ConstructionOutputs {
  intermediate: {
    politeNegatives: Records;
    negativePredicates: Records;
    naranai: Records;
    ikenai: Records;
    obligationPrefixes: Records;
  };
  final: {
    volitionalCopulas: Records;
    obligatoryNegatives: Records;
    epistemics: Records;
    obligations: Records;
  };
}

export function runConstructions(classes: MorphemeClasses): ConstructionOutputs {
  const masen = politeNegatives(classes.politeAuxiliary, classes.negationAuxiliary);
  const predicates = negativePredicates(classes.negativeAdjective, classes.existentialVerb, masen);
  const lightVerbs = lightVerbNegatives({
    naru: classes.lightVerbNaru,
    iku: classes.lightVerbIku,
    ikeru: classes.lightVerbIkeru,
    negationAuxiliary: classes.negationAuxiliary,
    politeNegatives: masen,
  });
  const prefixes = obligationPrefixes(classes.negationAuxiliary, classes.conjunctiveTe);

  return {
    intermediate: {
      politeNegatives: masen,
      negativePredicates: predicates,
      naranai: lightVerbs.naranai,
      ikenai: lightVerbs.ikenai,
      obligationPrefixes: prefixes,
    },
    final: {
      volitionalCopulas: volitionalCopulas(classes.irrealisCopula, classes.volitionalAuxiliary),
      obligatoryNegatives: obligatoryNegatives(classes.hazu, [...predicates, ...classes.existentialVerb]),
      epistemics: epistemics(classes.ka, classes.negationAuxiliary),
      obligations: obligations(prefixes, lightVerbs),
    },
  };
}
