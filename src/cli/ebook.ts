#!/usr/bin/env tsx

import minimist from 'minimist';
import { DEFAULT_CONFIG } from '../config/mod.ts';
import { buildEbook } from '../ebook/mod.ts';
import { ConsoleProgressListener, EventEmitter } from '../events/mod.ts';
import { Logger } from '../logger/mod.ts';
import { fail, isMain, showError } from './common.ts';

interface EbookArgs {
  help: boolean;
  _: string[];
}

const HELP_TEXT = `
comicbox-ebook - Pack a downloaded comic into one CBZ ebook

USAGE:
    comicbox-ebook <comic dir>

OPTIONS:
    -h, --help                    Show this help

The comic directory holds one directory per chapter (as written by comicbox --series).
The ebook is written next to it as <comic dir>.cbz and contains comic.json, toc.html
and every chapter's images.

EXAMPLES:
    comicbox-ebook 'My Comic'
`;

async function main(): Promise<void> {
  const args = minimist(process.argv.slice(2), {
    alias: { h: 'help' },
    boolean: ['help'],
    string: ['_'],
    default: { help: false },
  }) as EbookArgs;

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const comicDir = args._[0];
  if (comicDir === undefined) {
    showError('A comic directory is required');
  }

  const logger = new Logger({ verbosity: 'normal', logDir: DEFAULT_CONFIG.logDir });
  const events = new EventEmitter();
  const consoleListener = new ConsoleProgressListener();
  const unsubscribe = events.subscribe((event) => consoleListener.listen(event));

  try {
    const { outputPath, info } = await buildEbook(comicDir, { logger, events });
    console.log(`✨ Ebook created: ${outputPath}`);
    console.log(`  📚 ${info.chapters.length} chapters`);
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
