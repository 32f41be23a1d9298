export interface PageFetchAttemptEvent {
  type: 'page:fetch:attempt';
  url: string;
  attempt: number;
  attempts: number;
}

export interface PageFetchFailedEvent {
  type: 'page:fetch:failed';
  url: string;
  attempt: number;
  attempts: number;
  error: string;
  retryInMs?: number;
}

export interface ImagesExtractedEvent {
  type: 'images:extracted';
  pageTitle: string;
  htmlLength: number;
  strategy?: string;
  urls: string[];
}

export interface ImageDownloadRetryEvent {
  type: 'image:download:retry';
  url: string;
  attempt: number;
  attempts: number;
  error: string;
  retryInMs: number;
}

export interface ImageDownloadCompleteEvent {
  type: 'image:download:complete';
  index: number;
  total: number;
  file: string;
}

export interface ImageDownloadFailedEvent {
  type: 'image:download:failed';
  index: number;
  total: number;
  url: string;
  error: string;
}

export interface ChapterDownloadStartEvent {
  type: 'chapter:download:start';
  chapterId: string;
  title?: string;
  position?: number;
  total?: number;
}

export interface ChapterDownloadCompleteEvent {
  type: 'chapter:download:complete';
  title: string;
  directory: string;
  downloaded: number;
  failed: number;
}

export interface ChapterDownloadFailedEvent {
  type: 'chapter:download:failed';
  chapterId: string;
  title?: string;
  error: string;
}

export interface SeriesStartEvent {
  type: 'series:start';
  source: string;
  startChapterId?: string;
}

export interface SeriesChaptersEvent {
  type: 'series:chapters';
  title: string;
  directory: string;
  totalChapters: number;
  startIndex: number;
  startChapterMissing?: string;
}

export interface SeriesCompleteEvent {
  type: 'series:complete';
  title: string;
  directory: string;
  chaptersCompleted: number;
  chaptersFailed: number;
}

export interface ArchiveWrittenEvent {
  type: 'archive:written';
  source: string;
  outputPath: string;
  entries: number;
}

export interface ArchiveFailedEvent {
  type: 'archive:failed';
  source: string;
  error: string;
}

export type ProgressEvent =
  | PageFetchAttemptEvent
  | PageFetchFailedEvent
  | ImagesExtractedEvent
  | ImageDownloadRetryEvent
  | ImageDownloadCompleteEvent
  | ImageDownloadFailedEvent
  | ChapterDownloadStartEvent
  | ChapterDownloadCompleteEvent
  | ChapterDownloadFailedEvent
  | SeriesStartEvent
  | SeriesChaptersEvent
  | SeriesCompleteEvent
  | ArchiveWrittenEvent
  | ArchiveFailedEvent;

export type EventListener = (event: ProgressEvent) => void;
