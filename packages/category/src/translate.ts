import { LRUCache } from 'lru-cache';
import { parseCategory } from './parser.js';
import type { CategoryNode } from './types.js';

/**
 * Print a category in ABC Treebank notation. Every functor is bracketed:
 * `right` as `<consequence/antecedent>`, `left` as `<antecedent\consequence>`.
 */
export function renderCategory(node: CategoryNode): string {
  switch (node.type) {
    case 'base':
      return node.label;
    case 'left':
      return `<${renderCategory(node.antecedent)}\\${renderCategory(node.consequence)}>`;
    case 'right':
      return `<${renderCategory(node.consequence)}/${renderCategory(node.antecedent)}>`;
  }
}

// Derivation trees repeat the same few hundred labels over and over.
let translationCache: LRUCache<string, string> = new LRUCache({ max: 2000 });

export function clearCategoryCache(): void {
  translationCache.clear();
}

export function setCategoryCacheCapacity(capacity: number): void {
  if (Number.isFinite(capacity) && capacity > 0) {
    translationCache = new LRUCache({ max: Math.floor(capacity) });
  }
}

/**
 * `renderCategory(parseCategory(text))`, memoized per label.
 * @throws CategorySyntaxError when the label does not parse
 */
export function translateCategory(text: string): string {
  let translated = translationCache.get(text);
  if (translated === undefined) {
    translated = renderCategory(parseCategory(text));
    translationCache.set(text, translated);
  }
  return translated;
}
