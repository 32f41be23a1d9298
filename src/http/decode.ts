import { promisify } from 'node:util';
import { brotliDecompress, createGunzip, gunzip } from 'node:zlib';
import type { Transform } from 'node:stream';
import { ComicboxError, errorMessage } from '../errors.ts';

export type ContentEncoding = 'gzip' | 'br';

const gunzipAsync = promisify(gunzip);
const brotliDecompressAsync = promisify(brotliDecompress);

/** Decompresses a whole body for the encodings in `supported`; anything else is returned unprocessed. */
export async function decodeBuffer(body: Buffer, contentEncoding: string | undefined, supported: ContentEncoding[]): Promise<Buffer> {
  const encoding = supportedEncoding(contentEncoding, supported);
  try {
    switch (encoding) {
      case 'gzip':
        return await gunzipAsync(body);
      case 'br':
        return await brotliDecompressAsync(body);
      default:
        return body;
    }
  } catch (error) {
    throw new ComicboxError(`Failed to decode ${encoding} content: ${errorMessage(error)}`, { code: 'DECODE', cause: error });
  }
}

/** Streaming counterpart of `decodeBuffer`, used for images. Only gzip is streamed through a decoder. */
export function decodingTransforms(contentEncoding: string | undefined): Transform[] {
  return supportedEncoding(contentEncoding, ['gzip']) === 'gzip' ? [createGunzip()] : [];
}

function supportedEncoding(contentEncoding: string | undefined, supported: ContentEncoding[]): ContentEncoding | undefined {
  const normalized = contentEncoding?.trim().toLowerCase();
  return supported.find((encoding) => encoding === normalized);
}
