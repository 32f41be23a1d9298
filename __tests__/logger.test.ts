import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventEmitter } from '../src/events/mod.ts';
import type { ProgressEvent } from '../src/events/mod.ts';
import { Logger } from '../src/logger/mod.ts';
import { tempDir } from './helpers.ts';

const TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \| /;

describe('Logger', () => {
  let work: Awaited<ReturnType<typeof tempDir>>;

  beforeEach(async () => {
    work = await tempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await work.cleanup();
  });

  it('appends timestamped lines to the run log', async () => {
    const logDir = join(work.path, 'logs');
    const logger = new Logger({ verbosity: 'normal', logDir });

    logger.info('Packed chapter_1', { entries: 3 });
    logger.error('Chapter 102 failed', new Error('boom'));
    logger.debug('hidden');
    await logger.flush();

    const lines = (await readFile(join(logDir, 'comicbox.log'), 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(TIMESTAMP);
    expect(lines[0]?.replace(TIMESTAMP, '')).toBe('INFO: Packed chapter_1 {"entries":3}');
    expect(lines[1]?.replace(TIMESTAMP, '')).toMatch(/^ERROR: Chapter 102 failed \{"error":"boom","stack":/);
  });

  it('prints debug lines only in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Logger({ verbosity: 'normal' }).debug('quiet');
    new Logger({ verbosity: 'debug' }).debug('loud');

    expect(log.mock.calls).toEqual([['DEBUG: loud']]);
  });

  it('records requests in their own log', async () => {
    const logger = new Logger({ verbosity: 'normal', logDir: work.path });

    const entry = logger.logRequestStart('GET', 'https://comics.test/chapter/1');
    logger.logRequestEnd(entry, 404);
    await logger.flush();

    const lines = (await readFile(join(work.path, 'requests.log'), 'utf8')).trimEnd().split('\n').map((line) => line.replace(TIMESTAMP, ''));
    expect(lines[0]).toBe('REQUEST_START: GET https://comics.test/chapter/1');
    expect(lines[1]).toMatch(/^REQUEST_END: GET https:\/\/comics\.test\/chapter\/1 - 404 \(\d+ms\)$/);
    expect(entry.success).toBe(false);
  });
});

describe('EventEmitter', () => {
  it('delivers events until a listener unsubscribes', () => {
    const events = new EventEmitter();
    const received: ProgressEvent[] = [];
    const unsubscribe = events.subscribe((event) => received.push(event));

    events.emit({ type: 'series:start', source: '418' });
    unsubscribe();
    events.emit({ type: 'series:start', source: '419' });

    expect(received).toEqual([{ type: 'series:start', source: '418' }]);
  });

  it('keeps notifying when a listener throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const events = new EventEmitter();
    const received: ProgressEvent[] = [];
    events.subscribe(() => {
      throw new Error('listener broke');
    });
    events.subscribe((event) => received.push(event));

    events.emit({ type: 'series:start', source: '418' });

    expect(received).toHaveLength(1);
    vi.restoreAllMocks();
  });
});
