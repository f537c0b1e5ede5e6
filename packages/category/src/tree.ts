import { z } from 'zod';
import { translateCategory } from './translate.js';

export interface DerivationBranch {
  cat: string;
  children: DerivationNode[];
}

export interface DerivationLeaf {
  cat: string;
  surf?: string;
  word?: string;
}

/** A node of a derivation tree as produced by the CCG parser */
export type DerivationNode = DerivationBranch | DerivationLeaf;

export interface ScoredDerivation {
  tree: DerivationNode;
  probability: number;
}

export const DerivationNodeSchema: z.ZodType<DerivationNode> = z.lazy(() =>
  z.union([
    z.object({ cat: z.string(), children: z.array(DerivationNodeSchema) }),
    z.object({ cat: z.string(), surf: z.string().optional(), word: z.string().optional() }),
  ]),
);

export const ScoredDerivationSchema = z.object({
  tree: DerivationNodeSchema,
  probability: z.number(),
});

/**
 * Render a derivation as a bracketed tree with every category translated:
 * `(<cat> child child…)` for branches, `(<cat> surface)` for leaves.
 */
export function renderDerivation(node: DerivationNode): string {
  const cat = translateCategory(node.cat);

  if ('children' in node) {
    const children = node.children.map((child) => ` ${renderDerivation(child)}`).join('');
    return `(${cat}${children})`;
  }

  const text = node.surf ?? node.word ?? 'ERROR';
  return `(${cat} ${text})`;
}

/** Wrap a parse result with its probability comment and sentence id under TOP. */
export function wrapDerivation(result: ScoredDerivation, id: string | number): DerivationBranch {
  return {
    cat: 'TOP',
    children: [
      { cat: 'COMMENT', surf: `{probability=${result.probability}}` },
      result.tree,
      { cat: 'ID', surf: String(id) },
    ],
  };
}

/** One line per ranked result of a sentence. */
export function renderParsedSentence(results: readonly ScoredDerivation[], id: string | number = 'NONE'): string {
  return results.map((result) => `${renderDerivation(wrapDerivation(result, id))}\n`).join('');
}
