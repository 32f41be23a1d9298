import { readdir } from 'node:fs/promises';

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif'];

export function isImageFile(name: string): boolean {
  const lower = name.toLowerCase();
  return IMAGE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

/**
 * Image files directly inside `dir`, sorted by name. The order is the reading order, so pages
 * are expected to carry fixed-width numbers (0001.jpg, 0002.jpg, ...).
 */
export async function listImageFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isImageFile(entry.name))
    .map((entry) => entry.name)
    .sort(compareNames);
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
