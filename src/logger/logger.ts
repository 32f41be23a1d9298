import { join } from 'node:path';
import { appendFile } from 'node:fs/promises';
import { ensureDir } from 'fs-extra/esm';
import type { Verbosity } from '../config/mod.ts';

export interface LoggerOptions {
  verbosity: Verbosity;
  logDir?: string | undefined;
}

export interface RequestLogEntry {
  method: string;
  url: string;
  startTime: Date;
  endTime?: Date;
  duration?: number;
  success: boolean;
  statusCode?: number | undefined;
}

export class Logger {
  private readonly verbosity: Verbosity;
  private readonly logDir?: string | undefined;
  private ready?: Promise<void>;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: LoggerOptions) {
    this.verbosity = options.verbosity;
    this.logDir = options.logDir;
  }

  get debugEnabled(): boolean {
    return this.verbosity === 'debug';
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('comicbox.log', `INFO: ${message}${formatMeta(meta)}`);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.debugEnabled) {
      return;
    }
    console.log(`DEBUG: ${message}`);
    this.write('comicbox.log', `DEBUG: ${message}${formatMeta(meta)}`);
  }

  error(
    message: string,
    error?: Error | unknown,
    meta?: Record<string, unknown>,
  ): void {
    const errorInfo = error instanceof Error ? { error: error.message, stack: error.stack } : { error: String(error) };

    this.write('comicbox.log', `ERROR: ${message} ${JSON.stringify({ ...errorInfo, ...meta })}`);
  }

  logRequestStart(method: string, url: string): RequestLogEntry {
    const entry: RequestLogEntry = {
      method,
      url,
      startTime: new Date(),
      success: false,
    };

    this.write('requests.log', `REQUEST_START: ${method} ${url}`);

    return entry;
  }

  logRequestEnd(
    entry: RequestLogEntry,
    statusCode?: number | undefined,
    error?: unknown,
  ): void {
    entry.endTime = new Date();
    entry.duration = entry.endTime.getTime() - entry.startTime.getTime();
    entry.statusCode = statusCode;
    entry.success = error === undefined && statusCode === 200;

    const status = statusCode === undefined ? 'NO_RESPONSE' : String(statusCode);
    this.write('requests.log', `REQUEST_END: ${entry.method} ${entry.url} - ${status} (${entry.duration}ms)`);

    if (error !== undefined) {
      this.write('requests.log', `REQUEST_ERROR: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /** Resolves once every queued log line has been written. */
  flush(): Promise<void> {
    return this.pending;
  }

  private write(fileName: string, message: string): void {
    const logDir = this.logDir;
    if (!logDir) {
      return;
    }

    const line = `${new Date().toISOString()} | ${message}\n`;
    this.ready ??= ensureDir(logDir);
    const ready = this.ready;
    this.pending = this.pending
      .then(() => ready)
      .then(() => appendFile(join(logDir, fileName), line))
      .catch((error: unknown) => console.error('Failed to write log:', error));
  }
}

function formatMeta(meta?: Record<string, unknown>): string {
  return meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
}
