import { sanitizeFileName } from '../utils/filename.ts';

type TitleSource = (doc: Document) => string | null | undefined;

const text = (selector: string, index = 0): TitleSource => (doc) => doc.querySelectorAll(selector).item(index)?.textContent;

/** The page `<title>` up to its first `-`, dropping the site name suffix. */
const pageTitleWithoutSuffix: TitleSource = (doc) => {
  const title = doc.querySelector('title')?.textContent ?? '';
  const dash = title.indexOf('-');
  return dash > 0 ? title.slice(0, dash).trim() : title;
};

const COMIC_TITLE_SOURCES: TitleSource[] = [
  text('.comic-name'),
  text('.crumbs a', 1),
  text('h1'),
  text('.comic-title'),
  pageTitleWithoutSuffix,
];

const CHAPTER_TITLE_SOURCES: TitleSource[] = [
  text('h1'),
  text('.chapter-title'),
  pageTitleWithoutSuffix,
];

/** Empty string when nothing usable was found; callers substitute their own default name. */
export function extractComicTitle(doc: Document): string {
  return firstTitle(doc, COMIC_TITLE_SOURCES);
}

export function extractChapterTitle(doc: Document): string {
  return firstTitle(doc, CHAPTER_TITLE_SOURCES);
}

export function cleanTitle(title: string): string {
  return sanitizeFileName(title.trim().replace(/[\n\t]/g, ''));
}

function firstTitle(doc: Document, sources: TitleSource[]): string {
  for (const source of sources) {
    const title = source(doc)?.trim();
    if (title) {
      return cleanTitle(title);
    }
  }
  return '';
}
