import { readFile } from 'node:fs/promises';
import { JSDOM } from 'jsdom';

export function parseHtml(html: string): Document {
  return new JSDOM(html).window.document;
}

export async function loadLocalDocument(path: string): Promise<Document> {
  return parseHtml(await readFile(path, 'utf8'));
}

export function pageTitle(doc: Document): string {
  return doc.querySelector('title')?.textContent ?? '';
}

/** First present attribute among `names`; an attribute that is present but empty still wins. */
export function firstAttribute(element: Element, names: string[]): string | undefined {
  for (const name of names) {
    const value = element.getAttribute(name);
    if (value !== null) {
      return value;
    }
  }
  return undefined;
}
