#!/usr/bin/env tsx

import minimist from 'minimist';
import { buildConfig, loadConfigFile } from '../config/mod.ts';
import type { ComicboxConfig } from '../config/mod.ts';
import { createContext } from '../context.ts';
import { downloadChapter, downloadLocalChapter, downloadLocalSeries, downloadSeries } from '../downloader/mod.ts';
import { ConsoleProgressListener } from '../events/mod.ts';
import { errorMessage } from '../errors.ts';
import { fail, isMain, showError } from './common.ts';

export interface Args {
  local?: string;
  series?: string;
  'local-series'?: string;
  start?: string;
  config?: string;
  debug: boolean;
  help: boolean;
  _: string[];
}

export type FetchCommand =
  | { kind: 'help' }
  | { kind: 'chapter'; input: string }
  | { kind: 'local-chapter'; path: string }
  | { kind: 'series'; seriesId: string; startChapterId?: string }
  | { kind: 'local-series'; path: string };

const HELP_TEXT = `
comicbox - Download web comic chapters

USAGE:
    comicbox <chapter id | chapter URL> [options]
    comicbox --series <comic id> [--start <chapter id>] [options]
    comicbox --local <page.html> [options]
    comicbox --local-series <contents.html> [options]

OPTIONS:
    --series <id>                 Download every chapter of a comic
    --start <chapter id>          With --series: start at this chapter
    --local <path>                Read the chapter page from a saved HTML file
    --local-series <path>         Read the table of contents from a saved HTML file
    --config <file>               JSON file overriding the default settings
    --debug                       Print requests, responses and parsing details
    -h, --help                    Show this help

OUTPUT:
    Single chapters go to <chapter title>/0001.jpg, 0002.jpg, ...
    Series go to <comic title>/<NNN>_<chapter title>/0001.jpg, ...

    Chapter ids are the number in https://www.92hm.life/chapter/16124,
    comic ids the number in https://www.92hm.life/book/418.

EXAMPLES:
    comicbox 16124
    comicbox --series 418 --start 16124
    comicbox --local saved_page.html
    comicbox-pack 'My Comic/*'
    comicbox-ebook 'My Comic'
`;

function showHelp(): void {
  console.log(HELP_TEXT);
}

function parseArgs(argv: string[]): Args {
  return minimist(argv, {
    alias: { h: 'help' },
    boolean: ['help', 'debug'],
    string: ['_', 'local', 'series', 'local-series', 'start', 'config'],
    default: { help: false, debug: false },
  }) as Args;
}

export function resolveCommand(args: Args): FetchCommand {
  if (args.help) {
    return { kind: 'help' };
  }
  if (args['local-series']) {
    return { kind: 'local-series', path: args['local-series'] };
  }
  if (args.series) {
    return { kind: 'series', seriesId: args.series, ...(args.start ? { startChapterId: args.start } : {}) };
  }
  if (args.local) {
    return { kind: 'local-chapter', path: args.local };
  }
  const input = args._[0];
  if (input === undefined || input === '') {
    return { kind: 'help' };
  }
  return { kind: 'chapter', input };
}

export function parseCommand(argv: string[]): { command: FetchCommand; debug: boolean; configFile?: string } {
  const args = parseArgs(argv);
  return { command: resolveCommand(args), debug: args.debug, ...(args.config ? { configFile: args.config } : {}) };
}

async function loadConfig(configFile: string | undefined, debug: boolean): Promise<ComicboxConfig> {
  const overrides = configFile ? await loadConfigFile(configFile) : {};
  return buildConfig({ ...overrides, ...(debug ? { verbosity: 'debug' as const } : {}) });
}

async function main(): Promise<void> {
  const { command, debug, configFile } = parseCommand(process.argv.slice(2));

  if (command.kind === 'help') {
    showHelp();
    return;
  }

  let config: ComicboxConfig;
  try {
    config = await loadConfig(configFile, debug);
  } catch (error) {
    showError(errorMessage(error));
  }

  const context = createContext(config);
  const consoleListener = new ConsoleProgressListener();
  const unsubscribe = context.events.subscribe((event) => consoleListener.listen(event));

  try {
    switch (command.kind) {
      case 'chapter':
        await downloadChapter(command.input, context);
        break;
      case 'local-chapter':
        await downloadLocalChapter(command.path, context);
        break;
      case 'series':
        await downloadSeries(command.seriesId, command.startChapterId, context);
        break;
      case 'local-series':
        await downloadLocalSeries(command.path, context);
        break;
    }
  } catch (error) {
    await fail(error, context.logger);
  } finally {
    unsubscribe();
  }
  await context.logger.flush();
}

if (isMain(import.meta.url)) {
  await main();
}
