export function parseHttpUrl(input: string): URL | undefined {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return undefined;
  }
  return url.protocol === 'http:' || url.protocol === 'https:' ? url : undefined;
}

/**
 * Resolves an image reference found in a page: protocol-relative references get `https:`,
 * root-relative ones are prefixed with the site origin, everything else is left as is.
 */
export function normalizeUrl(raw: string, baseUrl: string): string {
  if (raw.startsWith('//')) {
    return `https:${raw}`;
  }
  if (raw.startsWith('/')) {
    return `${baseUrl}${raw}`;
  }
  return raw;
}
