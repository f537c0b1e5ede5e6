/**
 * Parse-and-render workflow
 *
 * The tokenizer and the CCG parser are external engines. Callers construct
 * them and hand them in; nothing here keeps a process-wide handle.
 */

import { DEFAULT_BATCH_SIZE, dp, type Lexicon, type MorphemeRecord, type Settings } from '@abc-lexicon/core';
import { synthesize } from '@abc-lexicon/lexicon';
import { renderParsedSentence, type ScoredDerivation } from '@abc-lexicon/category';

/** One token out of the lattice tokenizer */
export interface LatticeToken {
  surface: string;
  partOfSpeech: string;
  inflectionType: string;
  inflectionForm: string;
  baseForm: string;
  reading: string;
}

export interface LatticeTokenizer {
  installUserDictionary(entries: readonly MorphemeRecord[]): void;
  tokenize(sentence: string): LatticeToken[];
}

/** Token as the CCG parser expects it */
export interface ParserToken {
  word: string;
  surf: string;
  pos: string;
  pos1: string;
  pos2: string;
  pos3: string;
  inflectionForm: string;
  inflectionType: string;
  reading: string;
  base: string;
}

export interface CcgParser {
  /** Ranked derivations for every sentence, in input order */
  parseBatch(sentences: readonly ParserToken[][], batchSize: number): Promise<ScoredDerivation[][]>;
}

export interface ParsedSentence {
  tokens: ParserToken[];
  results: ScoredDerivation[];
}

export interface ParseOptions {
  /** Run the lattice tokenizer instead of splitting on spaces */
  tokenize?: boolean;
}

export interface ParseWorkflowOptions {
  parser: CcgParser;
  tokenizer?: LatticeTokenizer;
  batchSize?: number;
}

const PLACEHOLDER = 'XX';

/**
 * Build a tokenizer and install the dictionary synthesized from `lexicon`
 * before anything is tokenized with it.
 */
export function createTokenizerHandle(factory: () => LatticeTokenizer, lexicon: Lexicon): LatticeTokenizer {
  const tokenizer = factory();
  const entries = synthesize(lexicon);
  dp(`installing ${entries.length} synthesized entries`);
  tokenizer.installUserDictionary(entries);
  return tokenizer;
}

export function toParserToken(token: LatticeToken): ParserToken {
  const [pos = '*', pos1 = '*', pos2 = '*', pos3 = '*'] = token.partOfSpeech.split(',');
  return {
    word: token.surface,
    surf: token.surface,
    pos,
    pos1,
    pos2,
    pos3,
    inflectionForm: token.inflectionForm,
    inflectionType: token.inflectionType,
    reading: token.reading,
    base: token.baseForm,
  };
}

/** A pre-segmented word with every analysis field left as a placeholder. */
export function placeholderToken(word: string): ParserToken {
  return {
    word,
    surf: word,
    pos: PLACEHOLDER,
    pos1: PLACEHOLDER,
    pos2: PLACEHOLDER,
    pos3: PLACEHOLDER,
    inflectionForm: PLACEHOLDER,
    inflectionType: PLACEHOLDER,
    reading: PLACEHOLDER,
    base: PLACEHOLDER,
  };
}

export class ParseWorkflow {
  private readonly parser: CcgParser;
  private readonly tokenizer?: LatticeTokenizer;
  readonly batchSize: number;

  constructor(options: ParseWorkflowOptions) {
    this.parser = options.parser;
    this.tokenizer = options.tokenizer;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  static fromSettings(handles: Omit<ParseWorkflowOptions, 'batchSize'>, settings: Settings): ParseWorkflow {
    return new ParseWorkflow({ ...handles, batchSize: settings.batchSize });
  }

  /** Trim lines, drop blank ones and turn each remaining sentence into parser tokens. */
  prepareDocument(lines: Iterable<string>, options: ParseOptions = {}): ParserToken[][] {
    const sentences: ParserToken[][] = [];

    for (const line of lines) {
      const sentence = line.trim();
      if (!sentence) continue;

      const words = sentence.split(' ');
      if (options.tokenize) {
        if (!this.tokenizer) {
          throw new Error('Tokenization requested but no tokenizer was provided');
        }
        sentences.push(this.tokenizer.tokenize(words.join('')).map(toParserToken));
      } else {
        sentences.push(words.map(placeholderToken));
      }
    }

    return sentences;
  }

  async parseDocument(lines: Iterable<string>, options: ParseOptions = {}): Promise<ParsedSentence[]> {
    const sentences = this.prepareDocument(lines, options);
    if (sentences.length === 0) return [];

    const parsed = await this.parser.parseBatch(sentences, this.batchSize);
    if (parsed.length !== sentences.length) {
      throw new Error(`Parser returned ${parsed.length} results for ${sentences.length} sentences`);
    }

    return sentences.map((tokens, index) => ({ tokens, results: parsed[index] }));
  }

  /** ABC Treebank text for a whole document, sentence ids starting at 1. */
  async renderDocument(lines: Iterable<string>, options: ParseOptions = {}): Promise<string> {
    const parsed = await this.parseDocument(lines, options);
    return parsed.map((sentence, index) => renderParsedSentence(sentence.results, index + 1)).join('');
  }
}
