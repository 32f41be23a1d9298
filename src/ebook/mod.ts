import { basename, join, posix, resolve } from 'node:path';
import { readdir } from 'node:fs/promises';
import { isDirectory } from '../archive/pack.ts';
import { ZipArchiveWriter } from '../archive/zip.ts';
import type { ArchiveContext } from '../context.ts';
import { ComicboxError, errorMessage } from '../errors.ts';
import { compareNames, listImageFiles } from '../utils/images.ts';
import { renderToc } from './toc.ts';
import type { Chapter, ComicInfo, ComicJson } from './types.ts';

export interface EbookResult {
  outputPath: string;
  info: ComicInfo;
}

/** `012_Title` → id `12`, title `Title`; names without `_` serve as both. */
export function parseChapterDirName(dirName: string): { id: string; title: string } {
  const separator = dirName.indexOf('_');
  if (separator === -1) {
    return { id: dirName, title: dirName };
  }
  const id = dirName.slice(0, separator).replace(/^0+/, '') || '0';
  return { id, title: dirName.slice(separator + 1) };
}

/**
 * Chapters are the sub-directories of `comicDir` in name order, which is also the reading order
 * used for the running page numbers. Directories that cannot be read are skipped.
 */
export async function readComicInfo(comicDir: string): Promise<ComicInfo> {
  const entries = await readdir(comicDir, { withFileTypes: true });
  const dirNames = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort(compareNames);

  const chapters: Chapter[] = [];
  let nextPage = 1;
  for (const dirName of dirNames) {
    let imageCount: number;
    try {
      imageCount = (await listImageFiles(join(comicDir, dirName))).length;
    } catch {
      continue;
    }

    chapters.push({ ...parseChapterDirName(dirName), dirName, imageCount, startPage: nextPage });
    nextPage += imageCount;
  }

  return { title: basename(resolve(comicDir)), chapters };
}

export function toComicJson(info: ComicInfo): ComicJson {
  return {
    title: info.title,
    chapters: info.chapters.map((chapter) => ({
      id: chapter.id,
      title: chapter.title,
      dir_name: chapter.dirName,
      image_count: chapter.imageCount,
      start_page: chapter.startPage,
    })),
  };
}

export function ebookPath(comicDir: string): string {
  return `${resolve(comicDir)}.cbz`;
}

/**
 * Packs a comic directory into `<comicDir>.cbz`: `comic.json`, `toc.html`, then every chapter's
 * images under `<chapter dir>/<file>`.
 */
export async function buildEbook(comicDir: string, context: ArchiveContext): Promise<EbookResult> {
  if (!(await isDirectory(comicDir))) {
    throw new ComicboxError(`Comic directory does not exist: ${comicDir}`, { code: 'NOT_FOUND', source: comicDir });
  }

  const info = await readComicInfo(comicDir);
  const outputPath = ebookPath(comicDir);
  const archive = await ZipArchiveWriter.create(outputPath);
  try {
    await archive.addText('comic.json', JSON.stringify(toComicJson(info), null, 2));
    await archive.addText('toc.html', renderToc(info));

    for (const chapter of info.chapters) {
      const chapterDir = join(comicDir, chapter.dirName);
      for (const image of await listImageFiles(chapterDir)) {
        await archive.addFile(posix.join(chapter.dirName, image), join(chapterDir, image));
      }
    }
    await archive.close();
  } catch (error) {
    await archive.abort();
    throw new ComicboxError(`Failed to build ${outputPath}: ${errorMessage(error)}`, { code: 'FILESYSTEM', source: comicDir, cause: error });
  }

  context.logger.info(`Built ebook for ${comicDir}`, { outputPath, chapters: info.chapters.length });
  context.events.emit({ type: 'archive:written', source: comicDir, outputPath, entries: archive.entries });
  return { outputPath, info };
}
