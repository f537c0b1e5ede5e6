// @abc-lexicon/category - CCG categories in ABC Treebank notation

export type { CategoryNode, BaseCategory, LeftFunctor, RightFunctor } from './types.js';
export { baseCategory, leftFunctor, rightFunctor } from './types.js';
export { CategorySyntaxError } from './errors.js';
export { parseCategory, stripFeatureBrackets } from './parser.js';
export { renderCategory, translateCategory, clearCategoryCache, setCategoryCacheCapacity } from './translate.js';
export {
  type DerivationNode,
  type DerivationBranch,
  type DerivationLeaf,
  type ScoredDerivation,
  DerivationNodeSchema,
  ScoredDerivationSchema,
  renderDerivation,
  wrapDerivation,
  renderParsedSentence,
} from './tree.js';
