/**
 * Text processing utilities
 */

const MONTHS: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
};

/**
 * Key used to compare titles: trimmed, whitespace-collapsed, case-folded
 */
export function titleKey(title: string): string {
  return title.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Strip spreadsheet-protection quoting such as ="0441172717" and surrounding whitespace
 */
export function cleanCell(value: string | null | undefined): string {
  if (value == null) return "";
  let cleaned = value.trim();
  const wrapped = cleaned.match(/^="(.*)"$/s);
  if (wrapped) {
    cleaned = wrapped[1].trim();
  } else if (cleaned.startsWith("=")) {
    cleaned = cleaned.slice(1).replace(/^"|"$/g, "").trim();
  }
  return cleaned;
}

/**
 * Extract year from various date formats
 */
export function extractYear(dateStr: string | null | undefined): number | null {
  if (!dateStr) return null;

  const match = dateStr.match(/\b(1[5-9]|20)\d{2}\b/);
  return match ? parseInt(match[0], 10) : null;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function isoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Normalize a date string to ISO YYYY-MM-DD.
 * Handles YYYY, YYYY-MM, YYYY-MM-DD, YYYY/MM/DD, MM/DD/YYYY and "Month D, YYYY".
 */
export function normalizeDate(input: string | null | undefined): string | null {
  if (!input) return null;
  const s = input.trim();
  if (!s) return null;

  let m = s.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T\s].*)?$/);
  if (m) return isoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = s.match(/^(\d{4})(?:-(\d{1,2}))?$/);
  if (m) return isoDate(Number(m[1]), m[2] ? Number(m[2]) : 1, 1);

  m = s.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (m) return isoDate(Number(m[3]), Number(m[1]), Number(m[2]));

  m = s.match(/^([A-Za-z]+)\.?\s+(\d{1,2}),?\s*(\d{4})$/);
  if (m) {
    const month = MONTHS[m[1].toLowerCase()];
    return month ? isoDate(Number(m[3]), month, Number(m[2])) : null;
  }

  return null;
}

/**
 * Pick the more specific of two ISO-ish dates (longer string wins)
 */
export function moreSpecificDate(a: string | null, b: string | null): string | null {
  if (!a) return b;
  if (!b) return a;
  return b.length > a.length ? b : a;
}

/**
 * Parse author string handling various formats
 * e.g., "Last, First" -> "First Last"
 */
export function normalizeAuthorName(name: string): string {
  const trimmed = name.trim().replace(/\s+/g, " ");

  // Handle "Last, First" format
  if (trimmed.includes(",")) {
    const [last, first, ...rest] = trimmed.split(",").map((s) => s.trim());
    if (first && last && rest.length === 0) {
      return `${first} ${last}`;
    }
  }

  return trimmed;
}

/**
 * Split a multi-author cell. A single "Last, First" pair is kept as one author.
 */
export function splitAuthors(value: string): string[] {
  const cleaned = value.trim();
  if (!cleaned) return [];

  const parts = cleaned
    .split(/\s*(?:;|&|\band\b)\s*/i)
    .flatMap((part) => {
      const commaParts = part.split(",").map((s) => s.trim()).filter(Boolean);
      // "Herbert, Frank" is one inverted name, "Pratchett, Gaiman, Kidd" is a list
      if (commaParts.length === 2 && !commaParts[1].includes(" ")) {
        return [normalizeAuthorName(part)];
      }
      return commaParts;
    })
    .filter(Boolean);

  return unique(parts);
}

/**
 * Split a tag/category cell on commas or semicolons
 */
export function splitList(value: string): string[] {
  return unique(
    value
      .split(/[,;|]/)
      .map((s) => s.trim())
      .filter(Boolean)
  );
}

/**
 * Case-insensitive de-duplication that keeps the first spelling seen
 */
export function unique(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(value);
  }
  return result;
}

/**
 * "goodreads_shelves" -> "Goodreads Shelves"
 */
export function humanize(name: string): string {
  return name
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(" ");
}
