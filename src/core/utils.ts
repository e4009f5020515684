const MAX_NAME_LENGTH = 200;

// Characters no common filesystem accepts in a name
const RESERVED_CHARS = /[\\/:*?"<>|]/g;

function trimSeparators(s: string) {
  return s.replace(/^[ _]+|[ _]+$/g, "");
}

/**
 * Make a string usable as a filename: reserved characters become `_`, runs of
 * underscores collapse, leading/trailing spaces and underscores go, and the
 * result is capped at 200 characters.
 */
export function sanitizeFilename(name: string): string {
  let s = name.replace(RESERVED_CHARS, "_").replace(/_{2,}/g, "_");
  s = trimSeparators(s);
  const chars = Array.from(s);
  if (chars.length > MAX_NAME_LENGTH) {
    s = trimSeparators(chars.slice(0, MAX_NAME_LENGTH).join(""));
  }
  return s;
}

/** Letters, digits, spaces and underscores only. */
export function isValidFilename(name: string): boolean {
  return /^[A-Za-z0-9 _]+$/.test(name);
}

export function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

export function isPdfName(fileName: string): boolean {
  return fileName.toLowerCase().endsWith(".pdf");
}
