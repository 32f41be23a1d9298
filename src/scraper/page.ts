import type { Context } from '../context.ts';
import { ComicboxError, errorMessage } from '../errors.ts';
import { decodeBuffer } from '../http/decode.ts';
import { headerValue, readBodyPrefix } from '../http/client.ts';
import { pageHeaders } from '../http/headers.ts';
import { constantDelay, retry } from '../utils/retry.ts';
import { pageTitle, parseHtml } from './document.ts';

/** Marker the site puts in the title of its error pages. */
export const ERROR_TITLE_MARKER = '错误';

const ERROR_BODY_PREVIEW = 1024;

/** A single attempt: GET, decode, parse. Rejects pages without a title. */
export async function fetchPage(url: string, context: Context): Promise<Document> {
  const { http, logger, config } = context;
  const response = await http.get(url, pageHeaders(config.baseUrl));

  if (response.statusCode !== 200) {
    const preview = (await readBodyPrefix(response.body, ERROR_BODY_PREVIEW)).toString('utf8');
    logger.debug(`Error response body: ${preview}`);
    throw new ComicboxError(`Unexpected status code: ${response.statusCode}, response: ${preview}`, { code: 'HTTP_STATUS', source: url });
  }

  const contentEncoding = headerValue(response.headers, 'content-encoding');
  if (contentEncoding) {
    logger.debug(`Content is ${contentEncoding} encoded`);
  }
  const raw = Buffer.from(await response.body.arrayBuffer());
  const html = (await decodeBuffer(raw, contentEncoding, ['gzip', 'br'])).toString('utf8');
  logger.debug(`Response body size: ${html.length} characters`);

  const doc = parseHtml(html);
  const title = pageTitle(doc);
  logger.debug(`Page title: ${title}`);
  if (title.trim() === '') {
    throw new ComicboxError('Page content may be incomplete: empty title', { code: 'CONTENT', source: url });
  }

  return doc;
}

export function isUsablePage(doc: Document): boolean {
  const title = pageTitle(doc);
  return title.trim() !== '' && !title.includes(ERROR_TITLE_MARKER);
}

/**
 * Fetches a page until it comes back with a usable title. Pages with an empty title or the
 * site's error marker count as failed attempts and are never returned.
 */
export async function fetchPageWithRetry(url: string, context: Context): Promise<Document> {
  const { config, events, logger } = context;
  const attempts = config.pageAttempts;

  return await retry(async (attempt) => {
    events.emit({ type: 'page:fetch:attempt', url, attempt, attempts });
    const doc = await fetchPage(url, context);
    if (!isUsablePage(doc)) {
      throw new ComicboxError(`Page content may be incomplete: ${pageTitle(doc).trim()}`, { code: 'CONTENT', source: url });
    }
    return doc;
  }, {
    attempts,
    delay: constantDelay(config.pageRetryDelayMs),
    onFailure: (error, attempt, retryInMs) => {
      logger.error(`Page fetch attempt ${attempt}/${attempts} failed: ${url}`, error);
      events.emit({ type: 'page:fetch:failed', url, attempt, attempts, error: errorMessage(error), retryInMs });
    },
  });
}
