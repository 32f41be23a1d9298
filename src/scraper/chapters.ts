export interface ChapterInfo {
  id: string;
  title: string;
}

const CHAPTER_SELECTORS = ["a[href*='/chapter/']", '.chapter-item a'];
const CHAPTER_ID = /^[+-]?\d+$/;

/**
 * Chapter links of a table-of-contents page, in document order. The fallback selector is only
 * consulted when the primary one finds nothing.
 */
export function extractChapterLinks(doc: Document): ChapterInfo[] {
  for (const selector of CHAPTER_SELECTORS) {
    const chapters = collectChapters(doc, selector);
    if (chapters.length > 0) {
      return chapters;
    }
  }
  return [];
}

export function chapterIdFromHref(href: string): string | undefined {
  if (!href.includes('/chapter/')) {
    return undefined;
  }
  const parts = href.split('/');
  const last = parts[parts.length - 1];
  if (parts.length < 3 || last === undefined || !CHAPTER_ID.test(last)) {
    return undefined;
  }
  return last;
}

function collectChapters(doc: Document, selector: string): ChapterInfo[] {
  const chapters: ChapterInfo[] = [];
  for (const anchor of doc.querySelectorAll(selector)) {
    const id = chapterIdFromHref(anchor.getAttribute('href') ?? '');
    if (id === undefined) continue;

    // Chapter lists are short, a linear scan is enough.
    if (chapters.some((chapter) => chapter.id === id)) continue;

    const title = anchor.textContent?.trim() || `Chapter ${id}`;
    chapters.push({ id, title });
  }
  return chapters;
}
