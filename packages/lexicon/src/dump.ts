import { formatRecordCsv, type MorphemeRecord } from '@abc-lexicon/core';
import type { ConstructionOutputs } from './constructions.js';

export type Writer = (chunk: string) => void;

export function dumpDictionary(entries: Iterable<MorphemeRecord>, write: Writer, separator = ', '): void {
  for (const entry of entries) {
    write(formatRecordCsv(entry, separator));
    write('\n');
  }
}

export function printDictionary(entries: Iterable<MorphemeRecord>, separator = ', '): string {
  let output = '';
  dumpDictionary(entries, (chunk) => {
    output += chunk;
  }, separator);
  return output;
}

/**
 * Plain comma-separated text, the layout a lattice tokenizer reads as a user
 * dictionary (the part of speech expands to its own columns).
 */
export function toUserDictionaryCsv(entries: Iterable<MorphemeRecord>): string {
  return printDictionary(entries, ',');
}

/** Every stage's output under a `# stage` header, intermediates first. */
export function dumpStages(outputs: ConstructionOutputs, write: Writer, separator = ', '): void {
  const stages: Array<[string, readonly MorphemeRecord[]]> = [
    ...Object.entries(outputs.intermediate),
    ...Object.entries(outputs.final),
  ];
  for (const [name, records] of stages) {
    write(`# ${name} (${records.length})\n`);
    dumpDictionary(records, write, separator);
  }
}
