import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MockAgent } from 'undici';
import { TextWriter, Uint8ArrayReader, ZipReader } from '@zip.js/zip.js';
import type { Entry } from '@zip.js/zip.js';
import { buildConfig } from '../src/config/mod.ts';
import type { ComicboxConfig } from '../src/config/mod.ts';
import { createContext } from '../src/context.ts';
import type { Context } from '../src/context.ts';
import type { ProgressEvent } from '../src/events/mod.ts';

export const BASE_URL = 'https://comics.test';

export function mockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

export interface TestContext extends Context {
  received: ProgressEvent[];
}

export function testContext(agent: MockAgent, overrides: Partial<ComicboxConfig> = {}): TestContext {
  const config = buildConfig({
    baseUrl: BASE_URL,
    pageRetryDelayMs: 0,
    imageRetryDelayMs: 0,
    logDir: undefined,
    ...overrides,
  });
  const context = createContext(config, { dispatcher: agent });
  const received: ProgressEvent[] = [];
  context.events.subscribe((event) => received.push(event));
  return { ...context, received };
}

export async function tempDir(): Promise<{ path: string; cleanup: () => Promise<void> }> {
  const path = await mkdtemp(join(tmpdir(), 'comicbox-'));
  return { path, cleanup: () => rm(path, { recursive: true, force: true }) };
}

export function html(title: string, body: string): string {
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body>${body}</body></html>`;
}

export async function readArchive(path: string): Promise<Entry[]> {
  const reader = new ZipReader(new Uint8ArrayReader(await readFile(path)));
  const entries = await reader.getEntries();
  await reader.close();
  return entries;
}

export async function readEntryText(archivePath: string, name: string): Promise<string> {
  const reader = new ZipReader(new Uint8ArrayReader(await readFile(archivePath)));
  try {
    const entry = (await reader.getEntries()).find((candidate) => candidate.filename === name);
    if (!entry || !('getData' in entry) || !entry.getData) {
      throw new Error(`No file entry ${name} in ${archivePath}`);
    }
    return await entry.getData(new TextWriter());
  } finally {
    await reader.close();
  }
}
