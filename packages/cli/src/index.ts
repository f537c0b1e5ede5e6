#!/usr/bin/env -S npx tsx

/**
 * CLI interface for abc-lexicon
 *
 *   abc-lexicon dic [--sysdic <csv>] [--separator <sep>] [--stages]
 *   abc-lexicon category [labels...]
 *   abc-lexicon render
 */

import fs from 'fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { config } from 'dotenv';
import { z } from 'zod';
import { getSettingsFromEnv, readLexiconFile, setDebug, setProfile } from '@abc-lexicon/core';
import {
  classifyLexicon,
  dumpStages,
  finalEntries,
  printDictionary,
  runConstructions,
  synthesize,
} from '@abc-lexicon/lexicon';
import { ScoredDerivationSchema, renderParsedSentence, translateCategory } from '@abc-lexicon/category';

// Parse environment variables
config();

const RenderRequestSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  results: z.array(ScoredDerivationSchema),
});

export interface DicOptions {
  sysdicPath: string;
  separator?: string;
  /** Print every intermediate stage before the final dictionary */
  stages?: boolean;
}

/**
 * Programmatic interface for `dic`
 * Returns the output string that would be printed to stdout
 */
export function runDic(options: DicOptions): string {
  const separator = options.separator ?? ', ';
  const lexicon = readLexiconFile(options.sysdicPath);

  if (!options.stages) {
    return printDictionary(synthesize(lexicon), separator);
  }

  // Classify once for both the stage dump and the dictionary
  const outputs = runConstructions(classifyLexicon(lexicon));
  let output = '';
  dumpStages(outputs, (chunk) => {
    output += chunk;
  }, separator);
  output += '# dictionary\n';
  output += printDictionary(finalEntries(outputs), separator);
  return output;
}

/** One translated label per line. */
export function runCategory(labels: readonly string[]): string {
  return labels.map((label) => `${translateCategory(label.trim())}\n`).join('');
}

/**
 * Render JSON lines of `{ id?, results: [{ tree, probability }] }`.
 * Sentences without an id are numbered from 1 by line.
 */
export function runRender(input: string): string {
  let output = '';
  let sentence = 0;

  for (const line of input.split('\n')) {
    if (!line.trim()) continue;
    sentence++;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid JSON on input line ${sentence}: ${message}`);
    }

    const request = RenderRequestSchema.parse(json);
    output += renderParsedSentence(request.results, request.id ?? sentence);
  }

  return output;
}

export const ENVIRONMENT_HELP = `
Environment:
  ABC_SYSDIC_PATH  system dictionary CSV used by dic when --sysdic is omitted
  ABC_DEBUG        1 or true to print debug messages
  ABC_PROFILE      1 or true to print stage timings
  ABC_BATCH_SIZE   sentences per parser batch; read only by ParseWorkflow.fromSettings
`;

/**
 * True when `argv1` names this module, directly or through a symlink
 * such as the bin link npm installs.
 */
export function isEntryPoint(moduleUrl: string, argv1: string | undefined): boolean {
  if (!argv1 || !fs.existsSync(argv1)) return false;
  return fs.realpathSync(fileURLToPath(moduleUrl)) === fs.realpathSync(argv1);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function main(): Promise<void> {
  const settings = getSettingsFromEnv();
  const program = new Command();

  program
    .name('abc-lexicon')
    .description('Compound lexical entries for Japanese constructions and ABC Treebank categories')
    .version('0.1.0')
    .option('-d, --debug', 'print debug messages to stderr')
    .option('-p, --profile', 'print stage timings to stderr')
    .addHelpText('after', ENVIRONMENT_HELP)
    .hook('preAction', () => {
      const options = program.opts<{ debug?: boolean; profile?: boolean }>();
      setDebug(settings.debug || Boolean(options.debug));
      setProfile(settings.profile || Boolean(options.profile));
    });

  program
    .command('dic')
    .description('list the synthesized lexical entries')
    .option('-s, --sysdic <path>', 'system dictionary CSV (defaults to ABC_SYSDIC_PATH)')
    .option('--separator <sep>', 'field separator', ', ')
    .option('--stages', 'also print every intermediate stage')
    .action((options: { sysdic?: string; separator: string; stages?: boolean }) => {
      const sysdicPath = options.sysdic ?? settings.sysdicPath;
      if (!sysdicPath) {
        console.error('ERROR: no system dictionary given (use --sysdic or set ABC_SYSDIC_PATH)');
        process.exit(2);
      }
      process.stdout.write(runDic({ sysdicPath, separator: options.separator, stages: options.stages }));
    });

  program
    .command('category')
    .description('translate categories into ABC Treebank notation')
    .argument('[labels...]', 'categories to translate (read from stdin when omitted)')
    .action(async (labels: string[]) => {
      const input = labels.length > 0 ? labels : (await readStdin()).split('\n').filter((line) => line.trim());
      process.stdout.write(runCategory(input));
    });

  program
    .command('render')
    .description('render parser output (JSON lines on stdin) as ABC Treebank trees')
    .action(async () => {
      process.stdout.write(runRender(await readStdin()));
    });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

// Run main if this is the entry point
if (isEntryPoint(import.meta.url, process.argv[1])) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
