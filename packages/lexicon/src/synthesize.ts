import { LRUCache } from 'lru-cache';
import { dp, recordKey, time, type Lexicon, type MorphemeRecord } from '@abc-lexicon/core';
import { classifyLexicon, type MorphemeClasses } from './classes.js';
import { runConstructions, type ConstructionOutputs } from './constructions.js';

export type SynthesizedDictionary = readonly MorphemeRecord[];

const DEFAULT_CACHE_CAPACITY = 16;

let synthesisCache: LRUCache<Lexicon, SynthesizedDictionary> = new LRUCache({ max: DEFAULT_CACHE_CAPACITY });
let synthesisCacheMisses = 0;
let synthesisCacheHits = 0;

/**
 * Clear the synthesized dictionary cache. Useful for tests or after a lexicon was mutated in place.
 */
export function clearSynthesisCache(): void {
  synthesisCache.clear();
  synthesisCacheHits = 0;
  synthesisCacheMisses = 0;
}

/**
 * Set the number of lexicon snapshots whose dictionaries are kept.
 */
export function setSynthesisCacheCapacity(capacity: number): void {
  if (Number.isFinite(capacity) && capacity > 0) {
    synthesisCache = new LRUCache({ max: Math.floor(capacity) });
  }
}

export function getSynthesisCacheStats(): { hits: number; misses: number } {
  return { hits: synthesisCacheHits, misses: synthesisCacheMisses };
}

/** Keep the first of every group of field-identical records. */
export function collectUnique(records: Iterable<MorphemeRecord>): MorphemeRecord[] {
  const unique = new Map<string, MorphemeRecord>();
  for (const record of records) {
    const key = recordKey(record);
    if (!unique.has(key)) {
      unique.set(key, record);
    }
  }
  return [...unique.values()];
}

export function finalEntries(outputs: ConstructionOutputs): MorphemeRecord[] {
  const { volitionalCopulas, obligatoryNegatives, epistemics, obligations } = outputs.final;
  return collectUnique([...volitionalCopulas, ...obligatoryNegatives, ...epistemics, ...obligations]);
}

function logClassSizes(classes: MorphemeClasses): void {
  for (const [name, records] of Object.entries(classes)) {
    dp(`class ${name}: ${records.length} entries`);
  }
}

/**
 * Derive the supplementary dictionary from a base lexicon snapshot.
 *
 * Results are cached by the identity of `lexicon`; calling again with the same
 * snapshot returns the same array without reclassifying.
 */
export function synthesize(lexicon: Lexicon): SynthesizedDictionary {
  const cached = synthesisCache.get(lexicon);
  if (cached) {
    synthesisCacheHits++;
    dp('synthesize: cache hit');
    return cached;
  }
  synthesisCacheMisses++;

  const classes = time('classifyLexicon', () => classifyLexicon(lexicon));
  logClassSizes(classes);

  const outputs = time('runConstructions', () => runConstructions(classes));
  const entries: SynthesizedDictionary = Object.freeze(finalEntries(outputs));
  dp(`synthesize: ${entries.length} entries`);

  synthesisCache.set(lexicon, entries);
  return entries;
}
