import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import type { Context } from '../context.ts';
import { ComicboxError, errorMessage } from '../errors.ts';
import { headerValue } from '../http/client.ts';
import { decodingTransforms } from '../http/decode.ts';
import { imageHeaders } from '../http/headers.ts';
import { constantDelay, retry } from '../utils/retry.ts';
import { parseHttpUrl } from '../utils/url.ts';

/**
 * Streams one image into `destination`. The file is created (or truncated) before the request
 * goes out and is left behind as is when the download fails.
 */
export async function downloadImage(url: string, destination: string, context: Context): Promise<void> {
  const parsed = parseHttpUrl(url);
  if (!parsed) {
    throw new ComicboxError(`Invalid image URL: ${url}`, { code: 'INVALID_URL', source: url });
  }

  let file: FileHandle;
  try {
    file = await open(destination, 'w');
  } catch (error) {
    throw new ComicboxError(`Cannot create ${destination}: ${errorMessage(error)}`, { code: 'FILESYSTEM', source: destination, cause: error });
  }

  try {
    const response = await context.http.get(parsed.toString(), imageHeaders(context.config.baseUrl));
    if (response.statusCode !== 200) {
      await response.body.dump();
      throw new ComicboxError(`Image download failed with status code: ${response.statusCode}`, { code: 'HTTP_STATUS', source: url });
    }

    const transforms = decodingTransforms(headerValue(response.headers, 'content-encoding'));
    await pipeline([response.body, ...transforms, file.createWriteStream({ autoClose: false })]);
  } finally {
    await file.close();
  }
}

/** Any 200 response counts as success; images get no content check. */
export async function downloadImageWithRetry(url: string, destination: string, context: Context): Promise<void> {
  const { config, events, logger } = context;
  const attempts = config.imageAttempts;

  await retry(() => downloadImage(url, destination, context), {
    attempts,
    delay: constantDelay(config.imageRetryDelayMs),
    onFailure: (error, attempt, retryInMs) => {
      logger.error(`Image download attempt ${attempt}/${attempts} failed: ${url}`, error);
      if (retryInMs !== undefined) {
        events.emit({ type: 'image:download:retry', url, attempt, attempts, error: errorMessage(error), retryInMs });
      }
    },
  });
}
