/**
 * Build per-row candidate books and fold enrichment into them
 */

import { isUsable } from "@/lib/ingest/metadata";
import { isCanonicalField, parseCustomToken } from "@/lib/ingest/formats";
import type {
  CandidateBook,
  CanonicalField,
  FieldMapping,
  FieldScope,
  MetadataRecord,
  ReadingStatus,
  SourceRow,
} from "@/lib/ingest/types";
import { normalizeIsbn } from "@/lib/util/isbn";
import { cleanCell, extractYear, normalizeDate, splitAuthors, splitList, unique } from "@/lib/util/text";

const STATUS_ALIASES: Record<string, ReadingStatus> = {
  read: "read",
  finished: "read",
  completed: "read",
  "currently-reading": "currently_reading",
  currently_reading: "currently_reading",
  "currently reading": "currently_reading",
  reading: "currently_reading",
  "in progress": "currently_reading",
  "to-read": "plan_to_read",
  "to read": "plan_to_read",
  "want to read": "plan_to_read",
  tbr: "plan_to_read",
  plan_to_read: "plan_to_read",
  "did-not-finish": "did_not_finish",
  did_not_finish: "did_not_finish",
  "did not finish": "did_not_finish",
  dnf: "did_not_finish",
  abandoned: "did_not_finish",
  library: "library_only",
  library_only: "library_only",
  owned: "library_only",
};

export function mapReadingStatus(value: string): ReadingStatus | null {
  return STATUS_ALIASES[value.trim().toLowerCase()] ?? null;
}

export function emptyCandidate(): CandidateBook {
  return {
    title: null,
    subtitle: null,
    authors: [],
    rawIdentifier: null,
    isbn10: null,
    isbn13: null,
    publisher: null,
    publishedDate: null,
    pageCount: null,
    language: null,
    description: null,
    categories: [],
    coverUrl: null,
    series: null,
    mediaType: null,
    averageRating: null,
    ratingCount: null,
    readingStatus: null,
    userRating: null,
    dateRead: null,
    dateStarted: null,
    dateAdded: null,
    personalNotes: null,
    globalCustom: {},
    personalCustom: {},
  };
}

function positiveInt(value: string): number | null {
  const n = Math.trunc(Number.parseFloat(value.replace(/,/g, "")));
  return Number.isFinite(n) && n > 0 ? n : null;
}

function rating(value: string): number | null {
  const n = Number.parseFloat(value);
  // Goodreads writes 0 for "not rated"
  if (!Number.isFinite(n) || n <= 0) return null;
  return Math.min(n, 5);
}

function textOrNull(value: string): string | null {
  return value.length > 0 ? value : null;
}

/**
 * Raw mapped values per canonical field, in column order
 */
function collect(row: SourceRow, mapping: FieldMapping) {
  const canonical = new Map<CanonicalField, string[]>();
  const custom: Array<{ scope: FieldScope; name: string; value: string }> = [];

  for (const { column, token } of mapping) {
    const value = cleanCell(row.values[column]);
    if (!value) continue;
    const parsed = parseCustomToken(token);
    if (parsed) {
      custom.push({ ...parsed, value });
    } else if (isCanonicalField(token)) {
      canonical.set(token, [...(canonical.get(token) ?? []), value]);
    }
  }
  return { canonical, custom };
}

/**
 * Build the candidate for one source row
 */
export function buildCandidate(
  row: SourceRow,
  mapping: FieldMapping,
  defaultReadingStatus: ReadingStatus | null = null
): CandidateBook {
  const { canonical, custom } = collect(row, mapping);
  const first = (field: CanonicalField): string => canonical.get(field)?.[0] ?? "";
  const all = (field: CanonicalField): string[] => canonical.get(field) ?? [];

  const candidate = emptyCandidate();
  candidate.title = textOrNull(first("title"));
  candidate.subtitle = textOrNull(first("subtitle"));
  candidate.authors = unique([
    ...splitAuthors(first("author")),
    ...all("additional_authors").flatMap(splitAuthors),
  ]);

  const identifiers = [first("isbn13"), first("isbn10"), first("isbn")].filter(Boolean);
  candidate.rawIdentifier = identifiers[0] ?? null;
  for (const raw of identifiers) {
    const isbn = normalizeIsbn(raw);
    if (!isbn) continue;
    candidate.isbn13 ??= isbn.isbn13;
    candidate.isbn10 ??= isbn.isbn10;
  }

  candidate.publisher = textOrNull(first("publisher"));
  candidate.pageCount = positiveInt(first("page_count"));
  const year = extractYear(first("publication_year"));
  candidate.publishedDate =
    normalizeDate(first("published_date")) ?? (year ? normalizeDate(String(year)) : null);
  candidate.language = textOrNull(first("language"));
  candidate.description = textOrNull(first("description"));
  candidate.categories = unique(all("categories").flatMap(splitList));
  candidate.coverUrl = textOrNull(first("cover_url"));
  candidate.series = textOrNull(first("series"));
  candidate.mediaType = textOrNull(first("media_type"));
  candidate.averageRating = rating(first("average_rating"));

  candidate.readingStatus = mapReadingStatus(first("reading_status")) ?? defaultReadingStatus;
  candidate.userRating = rating(first("user_rating"));
  candidate.dateRead = normalizeDate(first("date_read"));
  candidate.dateStarted = normalizeDate(first("date_started"));
  candidate.dateAdded = normalizeDate(first("date_added"));
  candidate.personalNotes = textOrNull(first("personal_notes"));

  for (const { scope, name, value } of custom) {
    const target = scope === "global" ? candidate.globalCustom : candidate.personalCustom;
    target[name] ??= value;
  }

  return candidate;
}

/**
 * Fold an enrichment record into a candidate. Row-sourced values win, except
 * categories, which a non-empty enrichment list replaces.
 */
export function applyEnrichment(candidate: CandidateBook, record: MetadataRecord | null): CandidateBook {
  if (!isUsable(record)) return candidate;

  const globalCustom = { ...candidate.globalCustom };
  if (record.googleBooksId) globalCustom.google_books_id ??= record.googleBooksId;
  if (record.openLibraryId) globalCustom.openlibrary_id ??= record.openLibraryId;

  return {
    ...candidate,
    title: candidate.title ?? record.title,
    subtitle: candidate.subtitle ?? record.subtitle,
    authors: candidate.authors.length > 0 ? candidate.authors : [...record.authors],
    isbn10: candidate.isbn10 ?? record.isbn10,
    isbn13: candidate.isbn13 ?? record.isbn13,
    publisher: candidate.publisher ?? record.publisher,
    publishedDate: candidate.publishedDate ?? record.publishedDate,
    pageCount: candidate.pageCount ?? record.pageCount,
    language: candidate.language ?? record.language,
    description: candidate.description ?? record.description,
    categories: record.categories.length > 0 ? [...record.categories] : candidate.categories,
    coverUrl: candidate.coverUrl ?? record.coverUrl,
    averageRating: candidate.averageRating ?? record.averageRating,
    ratingCount: candidate.ratingCount ?? record.ratingCount,
    globalCustom,
  };
}
