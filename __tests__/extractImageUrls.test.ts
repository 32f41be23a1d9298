import { describe, expect, it } from 'vitest';
import { parseHtml } from '../src/scraper/document.ts';
import { extractImageUrls, IMAGE_EXTRACTORS } from '../src/scraper/images.ts';
import { normalizeUrl } from '../src/utils/url.ts';
import { EventEmitter } from '../src/events/mod.ts';
import type { ProgressEvent } from '../src/events/mod.ts';
import { BASE_URL, html } from './helpers.ts';

describe('normalizeUrl', () => {
  it('adds https to protocol-relative URLs', () => {
    expect(normalizeUrl('//img.comics.test/a.jpg', BASE_URL)).toBe('https://img.comics.test/a.jpg');
  });

  it('prefixes root-relative URLs with the site origin', () => {
    expect(normalizeUrl('/upload/a.jpg', BASE_URL)).toBe('https://comics.test/upload/a.jpg');
  });

  it('leaves absolute URLs untouched', () => {
    expect(normalizeUrl('http://other.test/a.jpg', BASE_URL)).toBe('http://other.test/a.jpg');
    expect(normalizeUrl('https://other.test/a.jpg', BASE_URL)).toBe('https://other.test/a.jpg');
  });
});

describe('extractImageUrls', () => {
  it('reads lazy-loaded images from data-original', () => {
    const doc = parseHtml(html('Chapter', `
      <img class="lazy" data-original="//img.comics.test/1.jpg" src="/loading.gif">
      <img class="lazy" data-original="/upload/2.jpg">
      <img class="lazy" data-original="">
      <img class="lazy" src="/upload/ignored.jpg">
      <img src="/upload/not-lazy.jpg">
    `));

    expect(extractImageUrls(doc, BASE_URL)).toEqual([
      'https://img.comics.test/1.jpg',
      'https://comics.test/upload/2.jpg',
    ]);
  });

  it('falls back to generic images that look like comic pages', () => {
    const doc = parseHtml(html('Chapter', `
      <img src="/static/logo.svg">
      <img data-src="/imgs/p1.webp">
      <img src="https://cdn.comics.test/page.png">
      <img data-original="//img.comics.test/comic/p3" src="/static/spinner.gif">
      <img data-original="" src="/upload/skipped.jpg">
      <img src="https://cdn.example.test/banner.gif">
    `));

    expect(extractImageUrls(doc, BASE_URL)).toEqual([
      'https://comics.test/imgs/p1.webp',
      'https://cdn.comics.test/page.png',
      'https://img.comics.test/comic/p3',
    ]);
  });

  it('uses the cropped containers as the last resort', () => {
    const doc = parseHtml(html('Chapter', `
      <img src="/static/logo.svg">
      <div class="cropped" data-src="//img.comics.test/a"></div>
      <div class="cropped" src="/b"></div>
      <div class="cropped"></div>
    `));

    expect(extractImageUrls(doc, BASE_URL)).toEqual([
      'https://img.comics.test/a',
      'https://comics.test/b',
    ]);
  });

  it('stops at the first strategy that finds something', () => {
    const doc = parseHtml(html('Chapter', `
      <img class="lazy" data-original="/upload/lazy.jpg">
      <img src="/upload/generic.jpg">
      <div class="cropped" data-src="/cropped.jpg"></div>
    `));

    expect(extractImageUrls(doc, BASE_URL)).toEqual(['https://comics.test/upload/lazy.jpg']);
  });

  it('keeps duplicates', () => {
    const doc = parseHtml(html('Chapter', `
      <img class="lazy" data-original="/upload/same.jpg">
      <img class="lazy" data-original="/upload/same.jpg">
    `));

    expect(extractImageUrls(doc, BASE_URL)).toHaveLength(2);
  });

  it('returns an empty list when no strategy matches', () => {
    const doc = parseHtml(html('Nothing here', '<p>No pictures</p><img src="/static/logo.svg">'));

    expect(extractImageUrls(doc, BASE_URL)).toEqual([]);
    for (const extractor of IMAGE_EXTRACTORS) {
      expect(extractor.extract(doc)).toEqual([]);
    }
  });

  it('reports what it found', () => {
    const events = new EventEmitter();
    const received: ProgressEvent[] = [];
    events.subscribe((event) => received.push(event));
    const doc = parseHtml(html('Chapter 9 - Site', '<div class="cropped" data-src="/x.jpg"></div>'));

    extractImageUrls(doc, BASE_URL, events);

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({
      type: 'images:extracted',
      pageTitle: 'Chapter 9 - Site',
      strategy: 'cropped',
      urls: ['https://comics.test/x.jpg'],
    });
  });
});
