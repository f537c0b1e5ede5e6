/**
 * Lexicon CSV codec
 *
 * Reads system dictionary sources in either of two layouts:
 * - 13 columns, MeCab/IPADIC style: surface, left id, right id, cost,
 *   four part-of-speech levels, inflection type, inflection form,
 *   base form, reading, phonetic
 * - 10 columns, the part of speech already joined (and quoted)
 *
 * Writes one record per line with the fields in declared order.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { LexiconFormatError } from './errors.js';
import { fromTuple, toTuple } from './record.js';
import type { ConnectionId, MorphemeRecord } from './types.js';

const CsvRowsSchema = z.array(z.array(z.string()));

const POS_LEVELS = 4;

function parseConnectionId(value: string, line: number): ConnectionId {
  if (value === '') return null;
  const id = Number(value);
  if (!Number.isInteger(id)) {
    throw new LexiconFormatError(`Invalid connection id: ${value}`, line);
  }
  return id;
}

function parseCost(value: string, line: number): number {
  const cost = Number(value);
  if (value === '' || !Number.isInteger(cost)) {
    throw new LexiconFormatError(`Invalid cost: ${value}`, line);
  }
  return cost;
}

function rowToRecord(row: string[], line: number): MorphemeRecord {
  let fields: string[];
  if (row.length === 10) {
    fields = row;
  } else if (row.length === 13) {
    const pos = row.slice(4, 4 + POS_LEVELS).join(',');
    fields = [...row.slice(0, 4), pos, ...row.slice(4 + POS_LEVELS)];
  } else {
    throw new LexiconFormatError(`Expected 10 or 13 columns, got ${row.length}`, line);
  }

  const [surface, leftId, rightId, cost, ...rest] = fields;
  return fromTuple(
    [surface, parseConnectionId(leftId, line), parseConnectionId(rightId, line), parseCost(cost, line), ...rest],
    line,
  );
}

export function parseLexiconCsv(content: string): MorphemeRecord[] {
  const rows = CsvRowsSchema.parse(
    parse(content, {
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    }),
  );

  return rows.map((row, index) => rowToRecord(row, index + 1));
}

export function readLexiconFile(filePath: string): MorphemeRecord[] {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseLexiconCsv(content);
}

/**
 * Format a record as one CSV line.
 * Unspecified connection ids print as empty fields.
 */
export function formatRecordCsv(record: MorphemeRecord, separator = ', '): string {
  return toTuple(record)
    .map((value) => (value === null ? '' : String(value)))
    .join(separator);
}
