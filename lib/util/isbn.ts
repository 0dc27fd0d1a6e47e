/**
 * ISBN normalization, validation and 10/13 conversion
 */

import { cleanCell } from "@/lib/util/text";

/**
 * Strip spreadsheet quoting, quotes, hyphens and spaces; upper-case a trailing x
 */
export function stripIsbn(raw: string): string {
  return cleanCell(raw)
    .replace(/["'\s-]/g, "")
    .toUpperCase();
}

export function isValidIsbn10(isbn: string): boolean {
  if (!/^\d{9}[\dX]$/.test(isbn)) return false;
  let sum = 0;
  for (let i = 0; i < 10; i++) {
    const digit = isbn[i] === "X" ? 10 : Number(isbn[i]);
    sum += digit * (10 - i);
  }
  return sum % 11 === 0;
}

export function isValidIsbn13(isbn: string): boolean {
  if (!/^\d{13}$/.test(isbn)) return false;
  let sum = 0;
  for (let i = 0; i < 13; i++) {
    sum += Number(isbn[i]) * (i % 2 === 0 ? 1 : 3);
  }
  return sum % 10 === 0;
}

/**
 * Convert ISBN-10 to ISBN-13
 */
export function isbn10ToIsbn13(isbn10: string): string {
  const base = "978" + isbn10.slice(0, 9);
  let sum = 0;

  for (let i = 0; i < 12; i++) {
    sum += Number(base[i]) * (i % 2 === 0 ? 1 : 3);
  }

  const checkDigit = (10 - (sum % 10)) % 10;
  return base + checkDigit;
}

/**
 * Convert a 978-prefixed ISBN-13 to ISBN-10; 979 numbers have no ISBN-10 form
 */
export function isbn13ToIsbn10(isbn13: string): string | null {
  if (!isbn13.startsWith("978")) return null;
  const core = isbn13.slice(3, 12);
  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += Number(core[i]) * (10 - i);
  }
  const check = (11 - (sum % 11)) % 11;
  return core + (check === 10 ? "X" : String(check));
}

export interface NormalizedIsbn {
  /** The cleaned form as supplied */
  value: string;
  isbn10: string | null;
  isbn13: string;
}

/**
 * Normalize and validate a raw identifier. Returns null for anything that
 * is not a check-digit-valid ISBN-10 or ISBN-13.
 */
export function normalizeIsbn(raw: string | null | undefined): NormalizedIsbn | null {
  if (!raw) return null;
  const value = stripIsbn(raw);

  if (value.length === 10 && isValidIsbn10(value)) {
    return { value, isbn10: value, isbn13: isbn10ToIsbn13(value) };
  }
  if (value.length === 13 && isValidIsbn13(value)) {
    return { value, isbn10: isbn13ToIsbn10(value), isbn13: value };
  }
  return null;
}

/**
 * True when the token has the shape of an ISBN (10 or 13 characters), whether or
 * not the check digit holds
 */
export function looksLikeIsbn(raw: string): boolean {
  const value = stripIsbn(raw);
  return /^\d{9}[\dX]$/.test(value) || /^\d{13}$/.test(value);
}
