import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { errorMessage, isComicboxError } from '../errors.ts';
import type { Logger } from '../logger/mod.ts';

export function showError(message: string): never {
  console.error(`Error: ${message}`);
  console.error('Use --help for usage information');
  process.exit(1);
}

/** Prints a failed run's message, waits for the log to be written and exits with status 1. */
export async function fail(error: unknown, logger: Logger): Promise<never> {
  logger.error('Run failed', error, failureDetails(error));
  console.error(`Error: ${errorMessage(error)}`);
  await logger.flush();
  process.exit(1);
}

/** Log metadata for a failed run: the error code and the input it concerns, when known. */
export function failureDetails(error: unknown): Record<string, unknown> | undefined {
  return isComicboxError(error) ? { code: error.code, source: error.source } : undefined;
}

/** True when the module at `moduleUrl` is the script node was started with. */
export function isMain(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}
