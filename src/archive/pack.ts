import { basename, join } from 'node:path';
import { stat } from 'node:fs/promises';
import { ensureDir } from 'fs-extra/esm';
import { glob } from 'glob';
import type { ArchiveContext } from '../context.ts';
import { ComicboxError, errorMessage } from '../errors.ts';
import { compareNames, listImageFiles } from '../utils/images.ts';
import { ZipArchiveWriter } from './zip.ts';

export interface PackResult {
  packed: string[];
  failed: string[];
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export function isPattern(input: string): boolean {
  return input.includes('*') || input.includes('?');
}

/** Packs the images of `chapterDir` into `<outputDir>/<chapter name>.cbz` and returns its path. */
export async function packChapter(chapterDir: string, outputDir: string, context: ArchiveContext): Promise<string> {
  if (!(await isDirectory(chapterDir))) {
    throw new ComicboxError(`Chapter directory does not exist: ${chapterDir}`, { code: 'NOT_FOUND', source: chapterDir });
  }

  try {
    await ensureDir(outputDir);
  } catch (error) {
    throw new ComicboxError(`Cannot create output directory ${outputDir}: ${errorMessage(error)}`, { code: 'FILESYSTEM', source: outputDir, cause: error });
  }

  const images = await listImageFiles(chapterDir);
  const outputPath = join(outputDir, `${basename(chapterDir)}.cbz`);
  const archive = await ZipArchiveWriter.create(outputPath);
  try {
    for (const image of images) {
      await archive.addFile(image, join(chapterDir, image));
    }
    await archive.close();
  } catch (error) {
    await archive.abort();
    throw new ComicboxError(`Failed to add files to ${outputPath}: ${errorMessage(error)}`, { code: 'FILESYSTEM', source: chapterDir, cause: error });
  }

  context.logger.info(`Packed ${chapterDir}`, { outputPath, entries: archive.entries });
  context.events.emit({ type: 'archive:written', source: chapterDir, outputPath, entries: archive.entries });
  return outputPath;
}

/**
 * Packs a single chapter directory, or every directory matched by a glob pattern. In pattern mode a
 * failing directory is reported and the others are still packed; a single directory that fails
 * aborts.
 */
export async function packPattern(input: string, outputDir: string, context: ArchiveContext): Promise<PackResult> {
  if (!isPattern(input)) {
    return { packed: [await packChapter(input, outputDir, context)], failed: [] };
  }

  const matches = (await glob(input)).sort(compareNames);
  const result: PackResult = { packed: [], failed: [] };
  for (const match of matches) {
    if (!(await isDirectory(match))) continue;

    try {
      result.packed.push(await packChapter(match, outputDir, context));
    } catch (error) {
      result.failed.push(match);
      context.logger.error(`Failed to pack ${match}`, error);
      context.events.emit({ type: 'archive:failed', source: match, error: errorMessage(error) });
    }
  }
  return result;
}
