/**
 * Unified metadata provider: combines Google Books and Open Library results
 */

import type { MetadataProvider, MetadataRecord } from "@/lib/ingest/types";
import { normalizeIsbn } from "@/lib/util/isbn";
import { logger } from "@/lib/util/logger";
import { moreSpecificDate, titleKey, unique } from "@/lib/util/text";

export function emptyRecord(source: string): MetadataRecord {
  return {
    title: null,
    subtitle: null,
    authors: [],
    publisher: null,
    publishedDate: null,
    pageCount: null,
    language: null,
    description: null,
    categories: [],
    coverUrl: null,
    averageRating: null,
    ratingCount: null,
    isbn10: null,
    isbn13: null,
    googleBooksId: null,
    openLibraryId: null,
    sources: [source],
  };
}

/**
 * Force https on cover links
 */
export function secureUrl(url: string | null | undefined): string | null {
  if (!url) return null;
  return url.replace(/^http:\/\//i, "https://");
}

function longer(a: string | null, b: string | null): string | null {
  if (!a) return b;
  if (!b) return a;
  return b.length > a.length ? b : a;
}

function maxOf(a: number | null, b: number | null): number | null {
  if (a == null) return b;
  if (b == null) return a;
  return Math.max(a, b);
}

/**
 * Merge two records for the same edition. Simple fields prefer the primary;
 * the longer description and more specific date win; page count takes the
 * maximum; authors and categories are unioned.
 */
export function mergeRecords(primary: MetadataRecord, secondary: MetadataRecord): MetadataRecord {
  return {
    title: primary.title ?? secondary.title,
    subtitle: primary.subtitle ?? secondary.subtitle,
    authors: unique([...primary.authors, ...secondary.authors]),
    publisher: primary.publisher ?? secondary.publisher,
    publishedDate: moreSpecificDate(primary.publishedDate, secondary.publishedDate),
    pageCount: maxOf(primary.pageCount, secondary.pageCount),
    language: primary.language ?? secondary.language,
    description: longer(primary.description, secondary.description),
    categories: unique([...primary.categories, ...secondary.categories]),
    coverUrl: primary.coverUrl ?? secondary.coverUrl,
    averageRating: primary.averageRating ?? secondary.averageRating,
    ratingCount: primary.ratingCount ?? secondary.ratingCount,
    isbn10: primary.isbn10 ?? secondary.isbn10,
    isbn13: primary.isbn13 ?? secondary.isbn13,
    googleBooksId: primary.googleBooksId ?? secondary.googleBooksId,
    openLibraryId: primary.openLibraryId ?? secondary.openLibraryId,
    sources: unique([...primary.sources, ...secondary.sources]),
  };
}

/**
 * True when a record carries enough to build a book from
 */
export function isUsable(record: MetadataRecord | null | undefined): record is MetadataRecord {
  return !!record && !!record.title?.trim();
}

function recordKey(record: MetadataRecord): string {
  const isbn = normalizeIsbn(record.isbn13 ?? record.isbn10);
  if (isbn) return isbn.isbn13;
  return `${titleKey(record.title ?? "")}|${titleKey(record.authors[0] ?? "")}`;
}

export class UnifiedMetadataProvider implements MetadataProvider {
  readonly name = "unified";

  constructor(
    private readonly primary: MetadataProvider,
    private readonly secondary?: MetadataProvider
  ) {}

  async lookupByIsbn(isbn: string): Promise<MetadataRecord | null> {
    const lookups = [this.primary, this.secondary]
      .filter((provider): provider is MetadataProvider => !!provider)
      .map((provider) => provider.lookupByIsbn(isbn));
    const settled = await Promise.allSettled(lookups);

    const records: MetadataRecord[] = [];
    for (const result of settled) {
      if (result.status === "fulfilled" && result.value) {
        records.push(result.value);
      } else if (result.status === "rejected") {
        logger.warn("Metadata provider failed", { isbn, error: String(result.reason) });
      }
    }

    const [first, ...rest] = records;
    if (!first) return null;
    return rest.reduce(mergeRecords, first);
  }

  async searchByTitle(title: string, maxResults = 5): Promise<MetadataRecord[]> {
    const results: MetadataRecord[] = [];
    const seen = new Set<string>();
    for (const provider of [this.primary, this.secondary]) {
      if (!provider || results.length >= maxResults) continue;
      try {
        for (const record of await provider.searchByTitle(title, maxResults)) {
          const key = recordKey(record);
          if (seen.has(key)) continue;
          seen.add(key);
          results.push(record);
        }
      } catch (error) {
        logger.warn("Metadata search failed", { provider: provider.name, title, error: String(error) });
      }
    }
    return results.slice(0, maxResults);
  }
}
