import { join } from 'node:path';
import { ensureDir } from 'fs-extra/esm';
import type { Context } from '../context.ts';
import { ComicboxError, errorMessage } from '../errors.ts';
import { extractChapterLinks } from '../scraper/chapters.ts';
import type { ChapterInfo } from '../scraper/chapters.ts';
import { loadLocalDocument } from '../scraper/document.ts';
import { extractImageUrls } from '../scraper/images.ts';
import { fetchPageWithRetry } from '../scraper/page.ts';
import { extractChapterTitle, extractComicTitle } from '../scraper/titles.ts';
import { chapterDirName, pageFileName, sanitizeFileName } from '../utils/filename.ts';
import { parseHttpUrl } from '../utils/url.ts';
import { downloadImageWithRetry } from './image.ts';

export interface DownloadResult {
  directory: string;
  downloaded: number;
  failed: number;
}

export interface ChapterResult extends DownloadResult {
  title: string;
}

export interface SeriesResult {
  title: string;
  directory: string;
  totalChapters: number;
  chaptersCompleted: number;
  chaptersFailed: number;
}

export function chapterUrl(idOrUrl: string, baseUrl: string): string {
  return parseHttpUrl(idOrUrl) ? idOrUrl : `${baseUrl}/chapter/${idOrUrl}`;
}

export function seriesUrl(seriesId: string, baseUrl: string): string {
  return `${baseUrl}/book/${seriesId}`;
}

/** Downloads `urls` in order as 0001.jpg, 0002.jpg, ... A failed image is reported and skipped. */
export async function downloadImages(urls: string[], directory: string, context: Context): Promise<DownloadResult> {
  await createDirectory(directory);

  let downloaded = 0;
  let failed = 0;
  for (const [index, url] of urls.entries()) {
    const file = join(directory, pageFileName(index + 1));
    try {
      await downloadImageWithRetry(url, file, context);
      downloaded++;
      context.events.emit({ type: 'image:download:complete', index: index + 1, total: urls.length, file });
    } catch (error) {
      failed++;
      context.events.emit({ type: 'image:download:failed', index: index + 1, total: urls.length, url, error: errorMessage(error) });
    }
  }

  return { directory, downloaded, failed };
}

/** Downloads one chapter, given its id or its full URL, into a directory named after its title. */
export async function downloadChapter(idOrUrl: string, context: Context): Promise<ChapterResult> {
  context.events.emit({ type: 'chapter:download:start', chapterId: idOrUrl });
  const doc = await fetchPageWithRetry(chapterUrl(idOrUrl, context.config.baseUrl), context);
  return await downloadChapterDocument(doc, `chapter_${idOrUrl}`, context);
}

export async function downloadLocalChapter(path: string, context: Context): Promise<ChapterResult> {
  context.events.emit({ type: 'chapter:download:start', chapterId: `local_${path}` });
  const doc = await loadLocalDocument(path);
  return await downloadChapterDocument(doc, `chapter_local_${path}`, context);
}

async function downloadChapterDocument(doc: Document, defaultTitle: string, context: Context): Promise<ChapterResult> {
  const urls = extractImageUrls(doc, context.config.baseUrl, context.events);
  if (urls.length === 0) {
    throw new ComicboxError('No image links found, check the page selectors', { code: 'NOT_FOUND' });
  }

  const title = extractChapterTitle(doc) || sanitizeFileName(defaultTitle);
  const result = await downloadImages(urls, join(context.config.outputDir, title), context);
  context.events.emit({ type: 'chapter:download:complete', title, ...result });
  return { title, ...result };
}

/**
 * Downloads a whole series into `<outputDir>/<comic title>/<NNN>_<chapter title>/`, optionally starting at a
 * given chapter. Failing chapters are reported and skipped; failing to read the table of contents
 * or to create the comic directory aborts the run.
 */
export async function downloadSeries(seriesId: string, startChapterId: string | undefined, context: Context): Promise<SeriesResult> {
  context.events.emit({ type: 'series:start', source: seriesId, startChapterId });
  const doc = await fetchPageWithRetry(seriesUrl(seriesId, context.config.baseUrl), context);
  return await downloadSeriesDocument(doc, `comic_${seriesId}`, startChapterId, context);
}

/** Like `downloadSeries`, with the table of contents read from a saved HTML file. */
export async function downloadLocalSeries(path: string, context: Context): Promise<SeriesResult> {
  context.events.emit({ type: 'series:start', source: path });
  const doc = await loadLocalDocument(path);
  return await downloadSeriesDocument(doc, 'local_comic', undefined, context);
}

async function downloadSeriesDocument(
  doc: Document,
  defaultTitle: string,
  startChapterId: string | undefined,
  context: Context,
): Promise<SeriesResult> {
  const { events, logger } = context;

  const chapters = extractChapterLinks(doc);
  if (chapters.length === 0) {
    throw new ComicboxError('No chapter links found', { code: 'NOT_FOUND' });
  }

  const title = extractComicTitle(doc) || sanitizeFileName(defaultTitle);
  const directory = join(context.config.outputDir, title);
  await createDirectory(directory);

  const startIndex = startChapterId === undefined ? 0 : Math.max(0, chapters.findIndex((chapter) => chapter.id === startChapterId));
  const startChapterMissing = startChapterId !== undefined && chapters[startIndex]?.id !== startChapterId ? startChapterId : undefined;
  events.emit({ type: 'series:chapters', title, directory, totalChapters: chapters.length, startIndex, startChapterMissing });

  let chaptersCompleted = 0;
  let chaptersFailed = 0;
  for (let index = startIndex; index < chapters.length; index++) {
    const chapter = chapters[index];
    if (!chapter) continue;

    try {
      await downloadSeriesChapter(chapter, join(directory, chapterDirName(index + 1, chapter.title)), index, chapters.length, context);
      chaptersCompleted++;
    } catch (error) {
      chaptersFailed++;
      logger.error(`Chapter ${chapter.id} failed`, error);
      events.emit({ type: 'chapter:download:failed', chapterId: chapter.id, title: chapter.title, error: errorMessage(error) });
    }
  }

  const result = { title, directory, totalChapters: chapters.length, chaptersCompleted, chaptersFailed };
  events.emit({ type: 'series:complete', ...result });
  return result;
}

async function downloadSeriesChapter(chapter: ChapterInfo, directory: string, index: number, total: number, context: Context): Promise<void> {
  context.events.emit({ type: 'chapter:download:start', chapterId: chapter.id, title: chapter.title, position: index + 1, total });

  const doc = await fetchPageWithRetry(chapterUrl(chapter.id, context.config.baseUrl), context);
  const urls = extractImageUrls(doc, context.config.baseUrl, context.events);
  if (urls.length === 0) {
    throw new ComicboxError('No image links found', { code: 'NOT_FOUND', source: chapter.id });
  }

  const result = await downloadImages(urls, directory, context);
  context.events.emit({ type: 'chapter:download:complete', title: chapter.title, ...result });
}

async function createDirectory(directory: string): Promise<void> {
  try {
    await ensureDir(directory);
  } catch (error) {
    throw new ComicboxError(`Cannot create directory ${directory}: ${errorMessage(error)}`, { code: 'FILESYSTEM', source: directory, cause: error });
  }
}
