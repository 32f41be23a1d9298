import type { EventEmitter } from '../events/mod.ts';
import { normalizeUrl } from '../utils/url.ts';
import { firstAttribute, pageTitle } from './document.ts';

export interface ImageExtractor {
  name: string;
  /** Raw candidate URLs in document order, before normalization. */
  extract(doc: Document): string[];
}

const COMIC_PATH_MARKERS = ['upload', 'book', 'imgBridge', 'imgs', 'comic'];
const COMIC_IMAGE_SUFFIXES = ['.jpg', '.png', '.jpeg'];

function collect(doc: Document, selector: string, attributes: string[], accept: (url: string) => boolean = () => true): string[] {
  const urls: string[] = [];
  for (const element of doc.querySelectorAll(selector)) {
    const value = firstAttribute(element, attributes)?.trim();
    if (value && accept(value)) {
      urls.push(value);
    }
  }
  return urls;
}

export function looksLikeComicImage(url: string): boolean {
  return COMIC_PATH_MARKERS.some((marker) => url.includes(marker)) ||
    COMIC_IMAGE_SUFFIXES.some((suffix) => url.endsWith(suffix));
}

export const lazyImageExtractor: ImageExtractor = {
  name: 'lazy',
  extract: (doc) => collect(doc, 'img.lazy', ['data-original']),
};

export const genericImageExtractor: ImageExtractor = {
  name: 'generic',
  extract: (doc) => collect(doc, 'img', ['data-original', 'data-src', 'src'], looksLikeComicImage),
};

export const croppedImageExtractor: ImageExtractor = {
  name: 'cropped',
  extract: (doc) => collect(doc, 'div.cropped', ['data-src', 'src']),
};

export const IMAGE_EXTRACTORS: readonly ImageExtractor[] = [
  lazyImageExtractor,
  genericImageExtractor,
  croppedImageExtractor,
];

/**
 * Runs the extractors in order and keeps the first non-empty result. Nothing matching is not an
 * error: the result is then empty.
 */
export function extractImageUrls(
  doc: Document,
  baseUrl: string,
  events?: EventEmitter,
  extractors: readonly ImageExtractor[] = IMAGE_EXTRACTORS,
): string[] {
  let urls: string[] = [];
  let strategy: string | undefined;
  for (const extractor of extractors) {
    const candidates = extractor.extract(doc);
    if (candidates.length > 0) {
      urls = candidates.map((candidate) => normalizeUrl(candidate, baseUrl));
      strategy = extractor.name;
      break;
    }
  }

  events?.emit({
    type: 'images:extracted',
    pageTitle: pageTitle(doc),
    htmlLength: doc.documentElement.outerHTML.length,
    strategy,
    urls,
  });

  return urls;
}
