#!/usr/bin/env tsx

import minimist from 'minimist';
import { packPattern } from '../archive/pack.ts';
import { ConsoleProgressListener, EventEmitter } from '../events/mod.ts';
import { DEFAULT_CONFIG } from '../config/mod.ts';
import { errorMessage } from '../errors.ts';
import { Logger } from '../logger/mod.ts';
import { fail, isMain, showError } from './common.ts';

export interface PackArgs {
  output: string;
  help: boolean;
  _: string[];
}

const HELP_TEXT = `
comicbox-pack - Pack chapter directories into CBZ archives

USAGE:
    comicbox-pack [-o <output dir>] <chapter dir | pattern>...

OPTIONS:
    -o, --output <dir>            Directory the .cbz files are written to (default: .)
    -h, --help                    Show this help

Images (.jpg, .jpeg, .png, .gif) are stored in file name order, so pages should be
numbered with a fixed width (0001.jpg, 0002.jpg, ...).

EXAMPLES:
    comicbox-pack chapter_16124
    comicbox-pack 'chapter_*'
    comicbox-pack -o ./cbz 'My Comic/*'
`;

export function parsePackArgs(argv: string[]): PackArgs {
  return minimist(argv, {
    alias: { o: 'output', h: 'help' },
    boolean: ['help'],
    string: ['_', 'output'],
    default: { output: '.', help: false },
  }) as PackArgs;
}

async function main(): Promise<void> {
  const args = parsePackArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const inputs = args._;
  if (inputs.length === 0) {
    showError('A chapter directory or pattern is required');
  }

  const logger = new Logger({ verbosity: 'normal', logDir: DEFAULT_CONFIG.logDir });
  const events = new EventEmitter();
  const consoleListener = new ConsoleProgressListener();
  const unsubscribe = events.subscribe((event) => consoleListener.listen(event));
  const context = { logger, events };

  try {
    const [single] = inputs;
    if (inputs.length === 1 && single !== undefined) {
      const result = await packPattern(single, args.output, context);
      console.log(`Packed ${result.packed.length} chapters${result.failed.length > 0 ? `, ${result.failed.length} failed` : ''}`);
    } else {
      // The shell already expanded the pattern: pack each directory and keep going on failures.
      for (const input of inputs) {
        try {
          await packPattern(input, args.output, context);
        } catch (error) {
          logger.error(`Failed to pack ${input}`, error);
          events.emit({ type: 'archive:failed', source: input, error: errorMessage(error) });
        }
      }
    }
  } catch (error) {
    await fail(error, logger);
  } finally {
    unsubscribe();
  }
  await logger.flush();
}

if (isMain(import.meta.url)) {
  await main();
}
