import { EnvHttpProxyAgent, request } from 'undici';
import type { Dispatcher } from 'undici';
import { ComicboxError, errorMessage } from '../errors.ts';
import type { Logger } from '../logger/mod.ts';

export type ResponseHeaders = Dispatcher.ResponseData['headers'];

export interface HttpClientOptions {
  requestTimeoutMs: number;
  maxRedirects: number;
}

export interface HttpResponse {
  /** Final URL after redirects. */
  url: string;
  statusCode: number;
  headers: ResponseHeaders;
  body: Dispatcher.ResponseData['body'];
}

const REDIRECT_STATUS = new Set([301, 302, 303, 307, 308]);

export class HttpClient {
  private readonly options: HttpClientOptions;
  private readonly logger: Logger;
  private readonly dispatcher: Dispatcher;

  /** Without a dispatcher, requests go through HTTP_PROXY / HTTPS_PROXY / NO_PROXY from the environment. */
  constructor(options: HttpClientOptions, logger: Logger, dispatcher: Dispatcher = new EnvHttpProxyAgent()) {
    this.options = options;
    this.logger = logger;
    this.dispatcher = dispatcher;
  }

  async get(url: string, headers: Record<string, string>): Promise<HttpResponse> {
    const logEntry = this.logger.logRequestStart('GET', url);
    const signal = AbortSignal.timeout(this.options.requestTimeoutMs);

    if (this.logger.debugEnabled) {
      this.logger.debug(`Requesting URL: ${url}`);
      for (const [key, value] of Object.entries(headers)) {
        this.logger.debug(`  ${key}: ${value}`);
      }
    }

    let currentUrl = url;
    for (let redirects = 0;; redirects++) {
      let response: Dispatcher.ResponseData;
      try {
        response = await request(currentUrl, { method: 'GET', headers, dispatcher: this.dispatcher, signal });
      } catch (error) {
        this.logger.logRequestEnd(logEntry, undefined, error);
        this.logger.debug(`Request failed: ${errorMessage(error)}`);
        throw new ComicboxError(`Request to ${currentUrl} failed: ${errorMessage(error)}`, { code: 'NETWORK', source: currentUrl, cause: error });
      }

      const location = headerValue(response.headers, 'location');
      if (REDIRECT_STATUS.has(response.statusCode) && location) {
        await response.body.dump();
        if (redirects >= this.options.maxRedirects) {
          const error = new ComicboxError(`Too many redirects (more than ${this.options.maxRedirects})`, { code: 'NETWORK', source: url });
          this.logger.logRequestEnd(logEntry, response.statusCode, error);
          throw error;
        }
        currentUrl = new URL(location, currentUrl).toString();
        this.logger.debug(`Redirected to: ${currentUrl}`);
        continue;
      }

      this.logger.logRequestEnd(logEntry, response.statusCode);
      if (this.logger.debugEnabled) {
        this.logger.debug(`Response status: ${response.statusCode}`);
        for (const [key, value] of Object.entries(response.headers)) {
          this.logger.debug(`  ${key}: ${Array.isArray(value) ? value.join(', ') : value}`);
        }
      }

      return { url: currentUrl, statusCode: response.statusCode, headers: response.headers, body: response.body };
    }
  }
}

export function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/** Reads at most `limit` bytes of `body` and discards the rest. */
export async function readBodyPrefix(body: HttpResponse['body'], limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of body) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    chunks.push(bytes);
    size += bytes.length;
    if (size >= limit) {
      break;
    }
  }
  return Buffer.concat(chunks).subarray(0, limit);
}
