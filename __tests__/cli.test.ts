import { describe, expect, it } from 'vitest';
import { failureDetails } from '../src/cli/common.ts';
import { parseCommand } from '../src/cli/fetch.ts';
import { parsePackArgs } from '../src/cli/pack.ts';
import { ComicboxError } from '../src/errors.ts';

describe('parseCommand', () => {
  it('downloads a chapter given by id', () => {
    expect(parseCommand(['16124'])).toEqual({ command: { kind: 'chapter', input: '16124' }, debug: false });
  });

  it('keeps chapter ids exactly as typed', () => {
    expect(parseCommand(['0042']).command).toEqual({ kind: 'chapter', input: '0042' });
    expect(parseCommand(['12345678901234567890']).command).toEqual({ kind: 'chapter', input: '12345678901234567890' });
  });

  it('downloads a chapter given by URL', () => {
    expect(parseCommand(['https://comics.test/chapter/5']).command).toEqual({ kind: 'chapter', input: 'https://comics.test/chapter/5' });
  });

  it('downloads a series from a start chapter', () => {
    expect(parseCommand(['--series', '418', '--start', '16124']).command).toEqual({ kind: 'series', seriesId: '418', startChapterId: '16124' });
  });

  it('downloads a series from its first chapter without --start', () => {
    expect(parseCommand(['--series', '418']).command).toEqual({ kind: 'series', seriesId: '418' });
  });

  it('reads saved pages', () => {
    expect(parseCommand(['--local', 'page.html']).command).toEqual({ kind: 'local-chapter', path: 'page.html' });
    expect(parseCommand(['--local-series', 'contents.html']).command).toEqual({ kind: 'local-series', path: 'contents.html' });
  });

  it('prefers a saved table of contents over the other modes', () => {
    expect(parseCommand(['--local-series', 'contents.html', '--series', '418', '--local', 'page.html', '1']).command)
      .toEqual({ kind: 'local-series', path: 'contents.html' });
    expect(parseCommand(['--series', '418', '--local', 'page.html']).command).toEqual({ kind: 'series', seriesId: '418' });
    expect(parseCommand(['--local', 'page.html', '16124']).command).toEqual({ kind: 'local-chapter', path: 'page.html' });
  });

  it('shows the help without input or when asked', () => {
    expect(parseCommand([]).command).toEqual({ kind: 'help' });
    expect(parseCommand(['-h', '16124']).command).toEqual({ kind: 'help' });
  });

  it('passes on the debug flag and the config file', () => {
    expect(parseCommand(['--debug', '--config', 'comicbox.json', '7'])).toEqual({
      command: { kind: 'chapter', input: '7' },
      debug: true,
      configFile: 'comicbox.json',
    });
  });
});

describe('parsePackArgs', () => {
  it('writes next to the current directory by default', () => {
    expect(parsePackArgs(['chapter_1'])).toMatchObject({ output: '.', help: false, _: ['chapter_1'] });
  });

  it('keeps numeric directory names as typed', () => {
    expect(parsePackArgs(['0010', '7'])._).toEqual(['0010', '7']);
  });

  it('takes an output directory and several inputs', () => {
    expect(parsePackArgs(['-o', 'cbz', 'a', 'b'])).toMatchObject({ output: 'cbz', _: ['a', 'b'] });
  });
});

describe('failureDetails', () => {
  it('logs the code and input of a known failure', () => {
    const error = new ComicboxError('Chapter directory does not exist: ch_1', { code: 'NOT_FOUND', source: 'ch_1' });

    expect(failureDetails(error)).toEqual({ code: 'NOT_FOUND', source: 'ch_1' });
  });

  it('adds nothing for other errors', () => {
    expect(failureDetails(new Error('boom'))).toBeUndefined();
  });
});
