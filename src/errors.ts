export type ComicboxErrorCode =
  | 'NETWORK'
  | 'HTTP_STATUS'
  | 'DECODE'
  | 'CONTENT'
  | 'FILESYSTEM'
  | 'NOT_FOUND'
  | 'INVALID_URL'
  | 'CONFIG';

export interface ComicboxErrorMetadata {
  code: ComicboxErrorCode;
  source?: string;
  cause?: unknown;
}

export class ComicboxError extends Error {
  readonly code: ComicboxErrorCode;
  readonly source?: string;
  override readonly cause?: unknown;

  constructor(message: string, metadata: ComicboxErrorMetadata) {
    super(message);
    this.name = 'ComicboxError';
    this.code = metadata.code;
    this.source = metadata.source;
    this.cause = metadata.cause;
  }
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Still failing after ${attempts} attempts: ${errorMessage(lastError)}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function isComicboxError(input: unknown): input is ComicboxError {
  return input instanceof ComicboxError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
