/**
 * Reading-history reconciliation: analysis, book matching and finalization
 * of dated reading sessions.
 */

import { fuzzy } from "fast-fuzzy";
import type { Catalog, CatalogBook, ReadingDefaults } from "@/lib/catalog/types";
import { applyEnrichment, emptyCandidate } from "@/lib/ingest/candidate";
import { CatalogRejectedError, InvalidResolutionError } from "@/lib/ingest/errors";
import type {
  BookResolution,
  CandidateBook,
  FieldMapping,
  MetadataProvider,
  SourceRow,
} from "@/lib/ingest/types";
import type { ProgressEmitter } from "@/lib/jobs/telemetry";
import type {
  JobCounters,
  MatchCandidate,
  PendingMatch,
  ReadingEntryDraft,
  ReadingHistoryGroup,
} from "@/lib/jobs/types";
import { normalizeIsbn } from "@/lib/util/isbn";
import { errorMessage, logger as rootLogger, type Logger } from "@/lib/util/logger";
import { cleanCell, normalizeDate, splitAuthors, titleKey } from "@/lib/util/text";

export const BOOKLESS_GROUP = "__bookless__";
const FALLBACK_MINUTES = 1;
const CANDIDATE_LIMIT = 5;

export interface RowValidationError {
  rowNumber: number;
  message: string;
  bookName: string | null;
  rawRow: Record<string, string>;
}

export interface ReadingHistoryAnalysis {
  groups: ReadingHistoryGroup[];
  invalid: RowValidationError[];
}

export interface DurationDefaults {
  owner: ReadingDefaults;
  system: ReadingDefaults;
}

function columnFor(mapping: FieldMapping, token: string): string | null {
  return mapping.find((entry) => entry.token === token)?.column ?? null;
}

/**
 * Parse a pages/minutes cell. Blank is zero; anything else must be a
 * non-negative number.
 */
export function parseAmount(raw: string): number | null {
  const value = cleanCell(raw).replace(/,/g, "");
  if (!value) return 0;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) return null;
  return Math.round(n);
}

/**
 * Fill a session with no pages and no minutes from owner defaults, then
 * system defaults, then one minute
 */
export function applyDurationDefaults(
  pages: number,
  minutes: number,
  defaults: DurationDefaults
): { pages: number; minutes: number } {
  if (pages > 0 || minutes > 0) return { pages, minutes };

  for (const source of [defaults.owner, defaults.system]) {
    const p = source.pages ?? 0;
    const m = source.minutes ?? 0;
    if (p > 0 || m > 0) return { pages: p, minutes: m };
  }
  return { pages: 0, minutes: FALLBACK_MINUTES };
}

/**
 * Validate rows and group them by book name. Rows without a name share the
 * bookless group.
 */
export function analyzeReadingHistory(
  rows: SourceRow[],
  mapping: FieldMapping,
  defaults: DurationDefaults
): ReadingHistoryAnalysis {
  const dateColumn = columnFor(mapping, "log_date");
  const nameColumn = columnFor(mapping, "book_name");
  const pagesColumn = columnFor(mapping, "pages_read");
  const minutesColumn = columnFor(mapping, "minutes_read");

  const groups = new Map<string, ReadingHistoryGroup>();
  const invalid: RowValidationError[] = [];

  for (const row of rows) {
    const cell = (column: string | null) => (column ? cleanCell(row.values[column]) : "");
    const bookName = cell(nameColumn).replace(/\s+/g, " ") || null;
    const reject = (message: string) =>
      invalid.push({ rowNumber: row.rowNumber, message, bookName, rawRow: row.values });

    const rawDate = cell(dateColumn);
    if (!rawDate) {
      reject("Missing date");
      continue;
    }
    const date = normalizeDate(rawDate);
    if (!date) {
      reject(`Invalid date "${rawDate}"`);
      continue;
    }

    const pages = parseAmount(cell(pagesColumn));
    if (pages === null) {
      reject(`Invalid pages value "${cell(pagesColumn)}"`);
      continue;
    }
    const minutes = parseAmount(cell(minutesColumn));
    if (minutes === null) {
      reject(`Invalid minutes value "${cell(minutesColumn)}"`);
      continue;
    }

    const entry: ReadingEntryDraft = {
      rowNumber: row.rowNumber,
      date,
      ...applyDurationDefaults(pages, minutes, defaults),
      rawRow: row.values,
    };
    const key = bookName ? titleKey(bookName) : BOOKLESS_GROUP;
    const group = groups.get(key);
    if (group) {
      group.entries.push(entry);
    } else {
      groups.set(key, {
        key,
        bookName,
        entries: [entry],
        resolution: bookName ? null : { action: "bookless" },
      });
    }
  }

  return { groups: [...groups.values()], invalid };
}

function toCandidate(book: CatalogBook): MatchCandidate {
  return { source: "catalog", bookId: book.id, title: book.title, authors: book.authors, isbn13: book.isbn13 };
}

/**
 * Match named groups by exact case-insensitive title against the owner's
 * catalog. Returns the groups still needing a human decision.
 */
export async function matchGroups(
  groups: ReadingHistoryGroup[],
  catalog: Catalog,
  owner: string,
  provider: MetadataProvider | null,
  log: Logger = rootLogger
): Promise<PendingMatch[]> {
  const pending: PendingMatch[] = [];

  for (const group of groups) {
    if (group.resolution || !group.bookName) continue;

    const found = await catalog.search(group.bookName, owner, 10);
    const exact = found.find((book) => titleKey(book.title) === group.key);
    if (exact) {
      group.resolution = { action: "match", bookId: exact.id };
      continue;
    }

    const candidates: MatchCandidate[] = found.slice(0, CANDIDATE_LIMIT).map(toCandidate);
    if (provider) {
      try {
        for (const record of await provider.searchByTitle(group.bookName, CANDIDATE_LIMIT)) {
          if (!record.title) continue;
          candidates.push({
            source: "external",
            bookId: null,
            title: record.title,
            authors: record.authors,
            isbn13: record.isbn13,
          });
        }
      } catch (error) {
        log.warn("Candidate search failed", { bookName: group.bookName, error: String(error) });
      }
    }

    const name = group.bookName;
    const dates = group.entries.map((e) => e.date).sort();
    pending.push({
      groupKey: group.key,
      bookName: name,
      entryCount: group.entries.length,
      firstDate: dates[0],
      lastDate: dates[dates.length - 1],
      candidates: candidates
        .map((candidate) => ({ candidate, score: fuzzy(name, candidate.title) }))
        .sort((a, b) => b.score - a.score)
        .map(({ candidate }) => candidate),
    });
  }

  return pending;
}

/**
 * Apply submitted resolutions to the pending groups. Every pending group
 * needs one; match targets must be in the owner's library.
 */
export async function applyResolutions(
  groups: ReadingHistoryGroup[],
  pending: PendingMatch[],
  resolutions: Record<string, BookResolution>,
  catalog: Catalog,
  owner: string
): Promise<ReadingHistoryGroup[]> {
  const byKey = new Map(groups.map((group) => [group.key, { ...group }]));

  for (const match of pending) {
    const resolution = resolutions[match.groupKey];
    if (!resolution) {
      throw new InvalidResolutionError(`No resolution for "${match.bookName}"`);
    }
    if (resolution.action === "match" && !(await catalog.ownsBook(resolution.bookId, owner))) {
      throw new InvalidResolutionError(`Book ${resolution.bookId} is not in the owner's library`);
    }
    if (resolution.action === "create" && !resolution.title.trim()) {
      throw new InvalidResolutionError(`A title is required to create "${match.bookName}"`);
    }
    const group = byKey.get(match.groupKey);
    if (group) group.resolution = resolution;
  }

  return [...byKey.values()];
}

export interface FinalizeContext {
  catalog: Catalog;
  owner: string;
  provider: MetadataProvider | null;
  progress: ProgressEmitter;
  counters: JobCounters;
  signal: AbortSignal;
  log?: Logger;
}

async function createBook(
  resolution: Extract<BookResolution, { action: "create" }>,
  ctx: FinalizeContext
): Promise<string> {
  let candidate: CandidateBook = {
    ...emptyCandidate(),
    title: resolution.title.trim(),
    authors: resolution.author ? splitAuthors(resolution.author) : [],
    rawIdentifier: resolution.isbn ?? null,
  };
  const isbn = normalizeIsbn(resolution.isbn);
  if (isbn) {
    candidate.isbn13 = isbn.isbn13;
    candidate.isbn10 = isbn.isbn10;
  }

  const external = normalizeIsbn(resolution.externalIsbn);
  if (external && ctx.provider) {
    const record = await ctx.provider.lookupByIsbn(external.value);
    candidate = applyEnrichment(candidate, record);
    candidate.isbn13 ??= external.isbn13;
    candidate.isbn10 ??= external.isbn10;
  }

  const result = await ctx.catalog.create(candidate, ctx.owner);
  return result.id;
}

async function bookIdFor(group: ReadingHistoryGroup, ctx: FinalizeContext): Promise<string | null> {
  const resolution: BookResolution = group.resolution ?? { action: "bookless" };
  switch (resolution.action) {
    case "match":
      return resolution.bookId;
    case "create":
      return createBook(resolution, ctx);
    case "bookless":
      return ctx.catalog.placeholderBookId();
    case "skip":
      return null;
  }
}

/**
 * Create one reading log entry per session. Returns false when cancelled.
 */
export async function finalizeReadingHistory(
  groups: ReadingHistoryGroup[],
  ctx: FinalizeContext
): Promise<boolean> {
  const log = ctx.log ?? rootLogger;
  const counters = ctx.counters;

  for (const group of groups) {
    if (ctx.signal.aborted) return false;
    const label = group.bookName ?? "sessions without a book";

    let bookId: string | null;
    try {
      bookId = await bookIdFor(group, ctx);
    } catch (error) {
      const message =
        error instanceof CatalogRejectedError
          ? `Catalog rejected "${label}": ${error.message}`
          : `Could not resolve "${label}": ${errorMessage(error)}`;
      log.warn("Reading history book resolution failed", { group: group.key, error: String(error) });
      for (const entry of group.entries) {
        counters.processed++;
        counters.errors++;
        await ctx.progress.update({
          counters,
          currentBook: group.bookName,
          error: {
            row: entry.rowNumber,
            type: "add_failed",
            message,
            isbn: null,
            title: group.bookName,
            author: null,
            rawRow: entry.rawRow,
          },
        });
      }
      continue;
    }

    if (bookId === null) {
      counters.processed += group.entries.length;
      counters.skipped += group.entries.length;
      await ctx.progress.update({
        counters,
        currentBook: group.bookName,
        activity: `Skipped ${group.entries.length} session(s) for ${label}`,
        urgent: true,
      });
      continue;
    }

    for (const entry of group.entries) {
      if (ctx.signal.aborted) return false;
      counters.processed++;
      try {
        await ctx.catalog.createReadingLog(ctx.owner, {
          bookId,
          date: entry.date,
          pages: entry.pages,
          minutes: entry.minutes,
        });
        counters.success++;
        await ctx.progress.update({
          counters,
          currentBook: group.bookName,
          activity: `Logged ${label} on ${entry.date}`,
        });
      } catch (error) {
        counters.errors++;
        await ctx.progress.update({
          counters,
          currentBook: group.bookName,
          error: {
            row: entry.rowNumber,
            type: "add_failed",
            message: errorMessage(error),
            isbn: null,
            title: group.bookName,
            author: null,
            rawRow: entry.rawRow,
          },
        });
      }
    }
  }

  return true;
}
