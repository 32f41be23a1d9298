import type { ProgressEvent } from '../types.ts';

const PREVIEW_URLS = 5;

export class ConsoleProgressListener {
  listen(event: ProgressEvent): void {
    switch (event.type) {
      case 'page:fetch:attempt':
        console.log(`Fetching page... (attempt ${event.attempt}/${event.attempts})`);
        break;

      case 'page:fetch:failed':
        console.log(`Failed to fetch page: ${event.error}`);
        if (event.retryInMs !== undefined) {
          console.log(`Retrying in ${formatSeconds(event.retryInMs)}...`);
        }
        break;

      case 'images:extracted':
        console.log(`Page title: ${event.pageTitle}`);
        console.log(`Page HTML length: ${event.htmlLength} characters`);
        event.urls.slice(0, PREVIEW_URLS).forEach((url, index) => {
          console.log(`  Found image [${index + 1}]: ${url}`);
        });
        if (event.urls.length > PREVIEW_URLS) {
          console.log(`  ...and ${event.urls.length - PREVIEW_URLS} more images`);
        }
        break;

      case 'image:download:retry':
        console.log(`  Image download failed, retrying in ${formatSeconds(event.retryInMs)}... (${event.attempt}/${event.attempts})`);
        break;

      case 'image:download:complete':
        console.log(`  ✓ Downloaded image ${event.index}/${event.total}: ${event.file}`);
        break;

      case 'image:download:failed':
        console.log(`  ✗ Failed to download image ${event.index}: ${event.error}`);
        break;

      case 'chapter:download:start':
        if (event.position !== undefined && event.total !== undefined) {
          console.log(`\n📥 Downloading chapter [${event.position}/${event.total}]: ${event.title ?? event.chapterId} (${event.chapterId})`);
        } else {
          console.log(`📥 Downloading chapter ${event.chapterId}...`);
        }
        break;

      case 'chapter:download:complete':
        console.log(`✨ Chapter "${event.title}" done: ${event.downloaded} images in ${event.directory}`);
        if (event.failed > 0) {
          console.log(`  ${event.failed} images could not be downloaded`);
        }
        break;

      case 'chapter:download:failed':
        console.log(`✗ Chapter ${event.title ?? event.chapterId} failed: ${event.error}`);
        break;

      case 'series:start':
        console.log(`📚 Downloading series ${event.source}...`);
        if (event.startChapterId) {
          console.log(`Starting from chapter ${event.startChapterId}`);
        }
        break;

      case 'series:chapters':
        console.log(`Comic title: ${event.title}`);
        console.log(`Found ${event.totalChapters} chapters`);
        if (event.startChapterMissing) {
          console.log(`Warning: start chapter ${event.startChapterMissing} not found, starting from the first chapter`);
        } else if (event.startIndex > 0) {
          console.log(`Starting at chapter [${event.startIndex + 1}/${event.totalChapters}]`);
        }
        break;

      case 'series:complete':
        console.log(`\n✨ Comic "${event.title}" done! Chapters are in ${event.directory}`);
        console.log(`  📚 ${event.chaptersCompleted} chapters downloaded`);
        if (event.chaptersFailed > 0) {
          console.log(`  ✗ ${event.chaptersFailed} chapters failed`);
        }
        break;

      case 'archive:written':
        console.log(`📦 Packed ${event.source} → ${event.outputPath} (${event.entries} entries)`);
        break;

      case 'archive:failed':
        console.log(`✗ Failed to pack ${event.source}: ${event.error}`);
        break;
    }
  }
}

function formatSeconds(ms: number): string {
  return `${ms / 1000}s`;
}
