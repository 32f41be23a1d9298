import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isPattern, packChapter, packPattern } from '../src/archive/pack.ts';
import type { ArchiveContext } from '../src/context.ts';
import { EventEmitter } from '../src/events/mod.ts';
import type { ProgressEvent } from '../src/events/mod.ts';
import { Logger } from '../src/logger/mod.ts';
import { readArchive, readEntryText, tempDir } from './helpers.ts';

async function chapter(root: string, name: string, files: Record<string, string>): Promise<string> {
  const dir = join(root, name);
  await mkdir(dir, { recursive: true });
  for (const [file, content] of Object.entries(files)) {
    await writeFile(join(dir, file), content);
  }
  return dir;
}

describe('isPattern', () => {
  it('recognizes glob wildcards', () => {
    expect(isPattern('chapter_*')).toBe(true);
    expect(isPattern('chapter_?')).toBe(true);
    expect(isPattern('chapter_16124')).toBe(false);
  });
});

describe('packing chapters', () => {
  let work: Awaited<ReturnType<typeof tempDir>>;
  let context: ArchiveContext;
  let received: ProgressEvent[];

  beforeEach(async () => {
    work = await tempDir();
    received = [];
    const events = new EventEmitter();
    events.subscribe((event) => received.push(event));
    context = { logger: new Logger({ verbosity: 'normal' }), events };
  });

  afterEach(async () => {
    await work.cleanup();
  });

  it('stores the images of a chapter in file name order', async () => {
    const dir = await chapter(work.path, 'chapter_7', {
      '0010.jpg': 'ten',
      '0002.png': 'two',
      '0001.jpg': 'one',
      'notes.txt': 'skip me',
    });
    await mkdir(join(dir, 'extras'));
    const out = join(work.path, 'out');

    const outputPath = await packChapter(dir, out, context);

    expect(outputPath).toBe(join(out, 'chapter_7.cbz'));
    expect((await readArchive(outputPath)).map((entry) => entry.filename)).toEqual(['0001.jpg', '0002.png', '0010.jpg']);
    expect(await readEntryText(outputPath, '0010.jpg')).toBe('ten');
    expect(received).toEqual([{ type: 'archive:written', source: dir, outputPath, entries: 3 }]);
  });

  it('streams files larger than one read chunk', async () => {
    const page = `${'x'.repeat(200_000)}end`;
    const dir = await chapter(work.path, 'chapter_big', { '0001.jpg': page });

    const outputPath = await packChapter(dir, work.path, context);

    expect(await readEntryText(outputPath, '0001.jpg')).toBe(page);
  });

  it('writes an empty archive for a chapter without images', async () => {
    const dir = await chapter(work.path, 'empty', { 'readme.txt': 'nothing here' });

    const outputPath = await packChapter(dir, work.path, context);

    expect(await readArchive(outputPath)).toEqual([]);
  });

  it('rejects a missing chapter directory', async () => {
    await expect(packChapter(join(work.path, 'missing'), work.path, context)).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('packs every directory matching a pattern', async () => {
    await chapter(work.path, 'chapter_1', { '0001.jpg': 'a' });
    await chapter(work.path, 'chapter_2', { '0001.jpg': 'b', '0002.jpg': 'c' });
    await writeFile(join(work.path, 'chapter_3.jpg'), 'not a directory');
    const out = join(work.path, 'out');

    const result = await packPattern(join(work.path, 'chapter_*'), out, context);

    expect(result).toEqual({ packed: [join(out, 'chapter_1.cbz'), join(out, 'chapter_2.cbz')], failed: [] });
    expect((await readArchive(join(out, 'chapter_2.cbz'))).map((entry) => entry.filename)).toEqual(['0001.jpg', '0002.jpg']);
  });

  it('packs a single directory given without wildcards', async () => {
    const dir = await chapter(work.path, 'chapter_9', { '0001.jpg': 'a' });

    const result = await packPattern(dir, work.path, context);

    expect(result).toEqual({ packed: [join(work.path, 'chapter_9.cbz')], failed: [] });
  });

  it('packs nothing when the pattern matches nothing', async () => {
    const result = await packPattern(join(work.path, 'nothing_*'), work.path, context);

    expect(result).toEqual({ packed: [], failed: [] });
  });
});
