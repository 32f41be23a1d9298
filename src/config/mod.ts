import { readFile } from 'node:fs/promises';
import { pathExists } from 'fs-extra/esm';
import { ComicboxError, errorMessage } from '../errors.ts';
import { parseHttpUrl } from '../utils/url.ts';

export type Verbosity = 'normal' | 'debug';

export interface ComicboxConfig {
  baseUrl: string;
  pageAttempts: number;
  pageRetryDelayMs: number;
  imageAttempts: number;
  imageRetryDelayMs: number;
  requestTimeoutMs: number;
  maxRedirects: number;
  verbosity: Verbosity;
  /** Directory the comic and chapter directories are created in. */
  outputDir: string;
  logDir?: string | undefined;
}

export const DEFAULT_CONFIG: ComicboxConfig = {
  baseUrl: 'https://www.92hm.life',
  pageAttempts: 3,
  pageRetryDelayMs: 5000,
  imageAttempts: 3,
  imageRetryDelayMs: 2000,
  requestTimeoutMs: 60_000,
  maxRedirects: 10,
  verbosity: 'normal',
  outputDir: '.',
  logDir: './logs',
};

const ATTEMPT_KEYS = ['pageAttempts', 'imageAttempts'] as const;

const NUMERIC_KEYS = [
  'pageRetryDelayMs',
  'imageRetryDelayMs',
  'requestTimeoutMs',
  'maxRedirects',
] as const;

export function buildConfig(overrides: Partial<ComicboxConfig> = {}): ComicboxConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };
  return { ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
}

export function parseConfig(input: unknown, source = 'config'): Partial<ComicboxConfig> {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new ComicboxError(`${source} must contain a JSON object`, { code: 'CONFIG', source });
  }

  const overrides: Partial<ComicboxConfig> = {};
  const values = new Map(Object.entries(input));

  const baseUrl = values.get('baseUrl');
  if (baseUrl !== undefined) {
    if (typeof baseUrl !== 'string' || !parseHttpUrl(baseUrl)) {
      throw invalidKey('baseUrl', 'an absolute http(s) URL', source);
    }
    overrides.baseUrl = baseUrl;
  }

  for (const key of ATTEMPT_KEYS) {
    const value = values.get(key);
    if (value === undefined) continue;
    if (!isIntegerAtLeast(value, 1)) {
      throw invalidKey(key, 'an integer of at least 1', source);
    }
    overrides[key] = value;
  }

  for (const key of NUMERIC_KEYS) {
    const value = values.get(key);
    if (value === undefined) continue;
    if (!isIntegerAtLeast(value, 0)) {
      throw invalidKey(key, 'a non-negative integer', source);
    }
    overrides[key] = value;
  }

  const verbosity = values.get('verbosity');
  if (verbosity !== undefined) {
    if (verbosity !== 'normal' && verbosity !== 'debug') {
      throw invalidKey('verbosity', '"normal" or "debug"', source);
    }
    overrides.verbosity = verbosity;
  }

  for (const key of ['outputDir', 'logDir'] as const) {
    const value = values.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'string' || value === '') {
      throw invalidKey(key, 'a non-empty string', source);
    }
    overrides[key] = value;
  }

  return overrides;
}

export async function loadConfigFile(path: string): Promise<Partial<ComicboxConfig>> {
  if (!(await pathExists(path))) {
    throw new ComicboxError(`Config file does not exist: ${path}`, { code: 'CONFIG', source: path });
  }

  let content: unknown;
  try {
    content = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ComicboxError(`Failed to parse config file: ${errorMessage(error)}`, { code: 'CONFIG', source: path, cause: error });
  }

  return parseConfig(content, path);
}

function isIntegerAtLeast(value: unknown, min: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min;
}

function invalidKey(key: string, expected: string, source: string): ComicboxError {
  return new ComicboxError(`Invalid value for "${key}": must be ${expected}`, { code: 'CONFIG', source });
}
