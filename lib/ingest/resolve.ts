/**
 * Book resolution and merge: decides the fate of each imported row
 *
 * Order per row: skip rows with nothing to go on, fail rows whose identifier
 * found nothing, otherwise create-or-detect in the catalog and merge into
 * the existing book on a duplicate.
 */

import type { BookPatch, Catalog, CatalogBook, CreateResult } from "@/lib/catalog/types";
import { applyEnrichment, buildCandidate } from "@/lib/ingest/candidate";
import { lookupMetadata } from "@/lib/ingest/enrich";
import { CatalogRejectedError } from "@/lib/ingest/errors";
import type {
  CandidateBook,
  CustomValues,
  FieldMapping,
  FieldScope,
  ImportErrorType,
  MetadataIndex,
  ReadingStatus,
  RowOutcome,
  SourceRow,
} from "@/lib/ingest/types";
import { errorMessage } from "@/lib/util/logger";

export interface ResolveContext {
  catalog: Catalog;
  owner: string;
  mapping: FieldMapping;
  metadata: MetadataIndex;
  defaultReadingStatus: ReadingStatus | null;
}

export interface ResolvedRow {
  outcome: RowOutcome;
  candidate: CandidateBook;
}

function isBlank(value: string | number | string[] | null): boolean {
  return value == null || value === "" || (Array.isArray(value) && value.length === 0);
}

/**
 * Fields of the existing book that are empty and that the candidate can fill
 */
export function computeMergePatch(existing: CatalogBook, candidate: CandidateBook): BookPatch {
  const patch: BookPatch = {};

  if (isBlank(existing.subtitle) && candidate.subtitle) patch.subtitle = candidate.subtitle;
  if (isBlank(existing.authors) && candidate.authors.length > 0) patch.authors = [...candidate.authors];
  if (isBlank(existing.isbn10) && candidate.isbn10) patch.isbn10 = candidate.isbn10;
  if (isBlank(existing.isbn13) && candidate.isbn13) patch.isbn13 = candidate.isbn13;
  if (isBlank(existing.publisher) && candidate.publisher) patch.publisher = candidate.publisher;
  if (isBlank(existing.publishedDate) && candidate.publishedDate) patch.publishedDate = candidate.publishedDate;
  if (isBlank(existing.pageCount) && candidate.pageCount) patch.pageCount = candidate.pageCount;
  if (isBlank(existing.language) && candidate.language) patch.language = candidate.language;
  if (isBlank(existing.description) && candidate.description) patch.description = candidate.description;
  if (isBlank(existing.categories) && candidate.categories.length > 0) patch.categories = [...candidate.categories];
  if (isBlank(existing.coverUrl) && candidate.coverUrl) patch.coverUrl = candidate.coverUrl;
  if (isBlank(existing.series) && candidate.series) patch.series = candidate.series;
  if (isBlank(existing.mediaType) && candidate.mediaType) patch.mediaType = candidate.mediaType;
  if (isBlank(existing.averageRating) && candidate.averageRating) patch.averageRating = candidate.averageRating;
  if (isBlank(existing.ratingCount) && candidate.ratingCount) patch.ratingCount = candidate.ratingCount;
  if (isBlank(existing.readingStatus) && candidate.readingStatus) patch.readingStatus = candidate.readingStatus;
  if (isBlank(existing.userRating) && candidate.userRating) patch.userRating = candidate.userRating;
  if (isBlank(existing.dateRead) && candidate.dateRead) patch.dateRead = candidate.dateRead;
  if (isBlank(existing.dateStarted) && candidate.dateStarted) patch.dateStarted = candidate.dateStarted;
  if (isBlank(existing.dateAdded) && candidate.dateAdded) patch.dateAdded = candidate.dateAdded;
  if (isBlank(existing.personalNotes) && candidate.personalNotes) patch.personalNotes = candidate.personalNotes;

  return patch;
}

/**
 * Keys the book does not have yet; existing values win
 */
export function missingCustomValues(current: CustomValues, incoming: CustomValues): CustomValues {
  const additions: CustomValues = {};
  for (const [key, value] of Object.entries(incoming)) {
    if (!current[key]) additions[key] = value;
  }
  return additions;
}

function scopedValues(candidate: CandidateBook): Array<[FieldScope, CustomValues]> {
  return [
    ["global", candidate.globalCustom],
    ["personal", candidate.personalCustom],
  ];
}

async function writeCustomValues(catalog: Catalog, bookId: string, owner: string, candidate: CandidateBook) {
  for (const [scope, values] of scopedValues(candidate)) {
    if (Object.keys(values).length > 0) {
      await catalog.setCustomValues(bookId, owner, scope, values);
    }
  }
}

function failure(candidate: CandidateBook, errorType: ImportErrorType, message: string): RowOutcome {
  return {
    kind: "error",
    errorType,
    message,
    isbn: candidate.rawIdentifier,
    title: candidate.title,
    author: candidate.authors[0] ?? null,
  };
}

/**
 * Merge a candidate into the book the catalog says it duplicates
 */
async function mergeDuplicate(
  ctx: ResolveContext,
  bookId: string,
  candidate: CandidateBook,
  title: string
): Promise<RowOutcome> {
  try {
    const existing = await ctx.catalog.getById(bookId, ctx.owner);
    if (!existing) {
      return failure(candidate, "duplicate_merge_failed", `Existing book ${bookId} could not be loaded`);
    }

    let changed = false;
    const patch = computeMergePatch(existing, candidate);
    if (Object.keys(patch).length > 0) {
      const updated = await ctx.catalog.update(bookId, ctx.owner, patch);
      if (!updated) {
        return failure(candidate, "duplicate_merge_failed", `Catalog refused update of book ${bookId}`);
      }
      changed = true;
    }

    for (const [scope, values] of scopedValues(candidate)) {
      if (Object.keys(values).length === 0) continue;
      const current = await ctx.catalog.getCustomValues(bookId, ctx.owner, scope);
      const additions = missingCustomValues(current, values);
      if (Object.keys(additions).length > 0) {
        await ctx.catalog.setCustomValues(bookId, ctx.owner, scope, additions);
        changed = true;
      }
    }

    return { kind: "merged", bookId, title: existing.title || title, changed };
  } catch (error) {
    return failure(candidate, "duplicate_merge_failed", errorMessage(error));
  }
}

/**
 * Resolve one row into a catalog outcome. Never throws: unexpected faults
 * come back as an "exception" error outcome.
 */
export async function resolveRow(row: SourceRow, ctx: ResolveContext): Promise<ResolvedRow> {
  let candidate = buildCandidate(row, ctx.mapping, ctx.defaultReadingStatus);

  try {
    candidate = applyEnrichment(candidate, lookupMetadata(ctx.metadata, candidate.rawIdentifier));

    if (!candidate.title && !candidate.rawIdentifier) {
      return { candidate, outcome: { kind: "skipped", reason: `Row ${row.rowNumber} has no title or identifier` } };
    }
    if (!candidate.title) {
      return {
        candidate,
        outcome: failure(candidate, "lookup_failed", `No book found for identifier ${candidate.rawIdentifier}`),
      };
    }
    const title = candidate.title;

    let created: CreateResult;
    try {
      created = await ctx.catalog.create(candidate, ctx.owner);
    } catch (error) {
      if (error instanceof CatalogRejectedError) {
        return { candidate, outcome: failure(candidate, "add_failed", error.message) };
      }
      throw error;
    }

    if (created.kind === "already_exists") {
      return { candidate, outcome: await mergeDuplicate(ctx, created.id, candidate, title) };
    }

    await writeCustomValues(ctx.catalog, created.id, ctx.owner, candidate);
    return { candidate, outcome: { kind: "success", bookId: created.id, title } };
  } catch (error) {
    return { candidate, outcome: failure(candidate, "exception", errorMessage(error)) };
  }
}
