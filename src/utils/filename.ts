const ILLEGAL_CHARACTERS = /[<>:"/\\|?*]/g;
const MAX_FILE_NAME_LENGTH = 100;

export function sanitizeFileName(name: string): string {
  const replaced = name.replace(ILLEGAL_CHARACTERS, '_');
  // Count code points so a multi-byte title is never cut inside a character.
  const characters = Array.from(replaced);
  const truncated = characters.length > MAX_FILE_NAME_LENGTH ? characters.slice(0, MAX_FILE_NAME_LENGTH).join('') : replaced;
  return truncated.trim();
}

export function pageFileName(index: number): string {
  return `${String(index).padStart(4, '0')}.jpg`;
}

export function chapterDirName(index: number, title: string): string {
  return `${String(index).padStart(3, '0')}_${sanitizeFileName(title)}`;
}
