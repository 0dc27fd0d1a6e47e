/**
 * Open Library metadata provider (books API and search)
 */

import { z } from "zod";
import { emptyRecord, secureUrl } from "@/lib/ingest/metadata";
import type { MetadataProvider, MetadataRecord } from "@/lib/ingest/types";
import { normalizeIsbn } from "@/lib/util/isbn";
import { logger as rootLogger, type Logger } from "@/lib/util/logger";
import { normalizeDate } from "@/lib/util/text";

const BASE_URL = "https://openlibrary.org";

const named = z.array(z.object({ name: z.string() })).optional();

const bookSchema = z.object({
  key: z.string().optional(),
  title: z.string().optional(),
  subtitle: z.string().optional(),
  authors: named,
  publishers: named,
  publish_date: z.string().optional(),
  number_of_pages: z.number().optional(),
  subjects: named,
  notes: z.union([z.string(), z.object({ value: z.string() })]).optional(),
  cover: z
    .object({
      small: z.string().optional(),
      medium: z.string().optional(),
      large: z.string().optional(),
    })
    .optional(),
  identifiers: z
    .object({
      isbn_10: z.array(z.string()).optional(),
      isbn_13: z.array(z.string()).optional(),
      openlibrary: z.array(z.string()).optional(),
    })
    .optional(),
});

const booksResponseSchema = z.record(z.string(), bookSchema);

const searchDocSchema = z.object({
  key: z.string().optional(),
  title: z.string().optional(),
  author_name: z.array(z.string()).optional(),
  isbn: z.array(z.string()).optional(),
  publisher: z.array(z.string()).optional(),
  first_publish_year: z.number().optional(),
  number_of_pages_median: z.number().optional(),
  language: z.array(z.string()).optional(),
  subject: z.array(z.string()).optional(),
  cover_i: z.number().optional(),
});

const searchResponseSchema = z.object({
  docs: z.array(searchDocSchema).default([]),
});

export type OLBook = z.infer<typeof bookSchema>;
export type OLSearchDoc = z.infer<typeof searchDocSchema>;

export interface OpenLibraryOptions {
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

function editionId(key: string | undefined): string | null {
  if (!key) return null;
  return key.replace(/^\/(books|works)\//, "") || null;
}

/**
 * Convert an api/books jscmd=data entry into a normalized record
 */
export function bookToRecord(book: OLBook, queriedIsbn: string): MetadataRecord {
  const ids = book.identifiers;
  const isbn13 = normalizeIsbn(ids?.isbn_13?.[0]);
  const isbn10 = normalizeIsbn(ids?.isbn_10?.[0]);
  const queried = normalizeIsbn(queriedIsbn);
  const notes = typeof book.notes === "string" ? book.notes : book.notes?.value;

  return {
    ...emptyRecord("openlibrary"),
    title: book.title?.trim() || null,
    subtitle: book.subtitle ?? null,
    authors: (book.authors ?? []).map((a) => a.name),
    publisher: book.publishers?.[0]?.name ?? null,
    publishedDate: normalizeDate(book.publish_date),
    pageCount: book.number_of_pages && book.number_of_pages > 0 ? book.number_of_pages : null,
    description: notes ?? null,
    categories: (book.subjects ?? []).map((s) => s.name).slice(0, 10),
    coverUrl: secureUrl(book.cover?.large ?? book.cover?.medium ?? book.cover?.small),
    isbn10: isbn10?.isbn10 ?? isbn13?.isbn10 ?? queried?.isbn10 ?? null,
    isbn13: isbn13?.isbn13 ?? isbn10?.isbn13 ?? queried?.isbn13 ?? null,
    openLibraryId: ids?.openlibrary?.[0] ?? editionId(book.key),
  };
}

/**
 * Convert a search.json doc into a normalized record
 */
export function searchDocToRecord(doc: OLSearchDoc): MetadataRecord {
  const isbn = (doc.isbn ?? []).map((raw) => normalizeIsbn(raw)).find((value) => value !== null);
  return {
    ...emptyRecord("openlibrary"),
    title: doc.title?.trim() || null,
    authors: doc.author_name ?? [],
    publisher: doc.publisher?.[0] ?? null,
    publishedDate: doc.first_publish_year ? normalizeDate(String(doc.first_publish_year)) : null,
    pageCount: doc.number_of_pages_median ?? null,
    language: doc.language?.[0] ?? null,
    categories: (doc.subject ?? []).slice(0, 10),
    coverUrl: doc.cover_i ? `https://covers.openlibrary.org/b/id/${doc.cover_i}-L.jpg` : null,
    isbn10: isbn?.isbn10 ?? null,
    isbn13: isbn?.isbn13 ?? null,
    openLibraryId: editionId(doc.key),
  };
}

export class OpenLibraryProvider implements MetadataProvider {
  readonly name = "openlibrary";

  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(options: OpenLibraryOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.log = options.logger ?? rootLogger.child({ provider: this.name });
  }

  async lookupByIsbn(isbn: string): Promise<MetadataRecord | null> {
    const bibkey = `ISBN:${isbn}`;
    const url = new URL("/api/books", BASE_URL);
    url.searchParams.set("bibkeys", bibkey);
    url.searchParams.set("format", "json");
    url.searchParams.set("jscmd", "data");

    try {
      const response = await this.fetchImpl(url.toString());
      if (!response.ok) {
        this.log.warn("Open Library API error", { status: response.status, isbn });
        return null;
      }
      const parsed = booksResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.log.warn("Unexpected Open Library response", { isbn });
        return null;
      }
      const book = parsed.data[bibkey];
      return book ? bookToRecord(book, isbn) : null;
    } catch (error) {
      this.log.warn("Open Library lookup failed", { isbn, error: String(error) });
      return null;
    }
  }

  async searchByTitle(title: string, maxResults = 5): Promise<MetadataRecord[]> {
    const trimmed = title.trim();
    if (!trimmed) return [];

    const url = new URL("/search.json", BASE_URL);
    url.searchParams.set("title", trimmed);
    url.searchParams.set("limit", String(maxResults));

    try {
      const response = await this.fetchImpl(url.toString());
      if (!response.ok) {
        this.log.warn("Open Library search error", { status: response.status, title });
        return [];
      }
      const parsed = searchResponseSchema.safeParse(await response.json());
      if (!parsed.success) return [];
      return parsed.data.docs.map(searchDocToRecord).filter((record) => record.title !== null);
    } catch (error) {
      this.log.warn("Open Library search failed", { title, error: String(error) });
      return [];
    }
  }
}
