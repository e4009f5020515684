import { nonEmptyLines, sanitizeFilename } from "./utils.js";

const FALLBACK_TITLE_LENGTH = 50;

// Tried in order; only the first match of each pattern is considered
const REFERENCE_PATTERNS: Array<{ re: RegExp; prefix: string }> = [
  { re: /\b(?:invoice|inv)\b\s*[#:-]?\s*([A-Za-z0-9-]+)/i, prefix: "Invoice" },
  { re: /\b(?:order|po)\b\s*[#:-]?\s*([A-Za-z0-9-]+)/i, prefix: "Order" },
  { re: /\bref\b\s*[#:-]?\s*([A-Za-z0-9-]+)/i, prefix: "Ref" },
];

const MONTHS = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
];

const YEAR_FIRST = /\b(\d{4})[-./](\d{1,2})[-./](\d{1,2})\b/;
const NUMERIC = /\b(\d{1,2})[-./](\d{1,2})[-./](\d{2,4})\b/;
const MONTH_NAME =
  /\b(Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|Jun(?:e)?|Jul(?:y)?|Aug(?:ust)?|Sep(?:tember)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)\s+(\d{1,2}),\s+(\d{4})\b/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

function formatDate(year: number, month: number, day: number): string {
  return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function separatorsToDashes(raw: string): string {
  return raw.replace(/[/.]/g, "-");
}

/**
 * Find an invoice, order or reference number, e.g. "Invoice #A1234" → "Invoice-A1234".
 * Identifiers of 3 characters or fewer, and bare years, are ignored.
 */
export function detectReference(text: string): string | null {
  for (const { re, prefix } of REFERENCE_PATTERNS) {
    const m = text.match(re);
    if (!m) continue;
    const id = m[1].trim();
    if (id.length > 3 && !/^\d{4}$/.test(id)) {
      return `${prefix}-${id}`;
    }
  }
  return null;
}

/**
 * Find the first date in the text and normalize it to YYYY-MM-DD.
 *
 * Numeric dates are read month-first, falling back to day-first when the first
 * field cannot be a month. Anything that does not parse to a real date (two-digit
 * years, 2023-13-45) is returned as matched, with `/` and `.` turned into `-`.
 */
export function detectDate(text: string): string | null {
  // 2023-11-05, 2023.11.05, 2023/11/05
  const iso = text.match(YEAR_FIRST);
  if (iso) {
    const [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    return isCalendarDate(year, month, day)
      ? formatDate(year, month, day)
      : separatorsToDashes(iso[0]);
  }

  // 11/05/2023, 5.11.2023, 11-05-23
  const numeric = text.match(NUMERIC);
  if (numeric) {
    const [a, b] = [Number(numeric[1]), Number(numeric[2])];
    if (numeric[3].length === 4) {
      const year = Number(numeric[3]);
      if (isCalendarDate(year, a, b)) return formatDate(year, a, b);
      if (isCalendarDate(year, b, a)) return formatDate(year, b, a);
    }
    return separatorsToDashes(numeric[0]);
  }

  // March 3, 2024
  const named = text.match(MONTH_NAME);
  if (named) {
    const month = MONTHS.indexOf(named[1].slice(0, 3).toLowerCase()) + 1;
    const [day, year] = [Number(named[2]), Number(named[3])];
    return isCalendarDate(year, month, day)
      ? formatDate(year, month, day)
      : named[0];
  }

  return null;
}

/**
 * Build a name from the reference number and date found in the text, falling
 * back to the start of the first line.
 */
export function patternName(text: string): string | null {
  const parts: string[] = [];

  const reference = detectReference(text);
  if (reference) parts.push(reference);

  const date = detectDate(text);
  if (date) parts.push(date);

  if (!parts.length) {
    const [firstLine] = nonEmptyLines(text);
    if (!firstLine) return null;
    const title = Array.from(firstLine)
      .slice(0, FALLBACK_TITLE_LENGTH)
      .join("")
      .trim();
    if (!title) return null;
    parts.push(title);
  }

  const name = sanitizeFilename(parts.join("_").replace(/ /g, "_"));
  return name || null;
}
