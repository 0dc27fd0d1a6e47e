/**
 * Shared types for the import pipeline
 */

export const CANONICAL_FIELDS = [
  "title",
  "subtitle",
  "author",
  "additional_authors",
  "isbn",
  "isbn10",
  "isbn13",
  "publisher",
  "page_count",
  "publication_year",
  "published_date",
  "language",
  "description",
  "categories",
  "cover_url",
  "series",
  "reading_status",
  "user_rating",
  "average_rating",
  "date_read",
  "date_started",
  "date_added",
  "personal_notes",
  "media_type",
  "log_date",
  "book_name",
  "pages_read",
  "minutes_read",
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export type FieldScope = "global" | "personal";

export type CustomFieldToken = `custom_${FieldScope}_${string}`;

export type FieldToken = CanonicalField | CustomFieldToken;

export interface FieldMappingEntry {
  column: string;
  token: FieldToken;
}

/** Ordered column -> token assignments, validated once when built */
export type FieldMapping = FieldMappingEntry[];

export type ImportFormat = "goodreads" | "storygraph" | "reading_history" | "isbn_list" | "unknown";

export type Delimiter = "," | ";" | "\t" | "|";

export interface DetectionResult {
  format: ImportFormat;
  confidence: number;
  delimiter: Delimiter;
  headers: string[];
  hasHeaderRow: boolean;
  mapping: FieldMapping;
}

export const READING_STATUSES = [
  "read",
  "currently_reading",
  "plan_to_read",
  "did_not_finish",
  "library_only",
] as const;

export type ReadingStatus = (typeof READING_STATUSES)[number];

export type CustomValues = Record<string, string>;

/**
 * Normalized bibliographic record returned by a metadata provider
 */
export interface MetadataRecord {
  title: string | null;
  subtitle: string | null;
  authors: string[];
  publisher: string | null;
  publishedDate: string | null;
  pageCount: number | null;
  language: string | null;
  description: string | null;
  categories: string[];
  coverUrl: string | null;
  averageRating: number | null;
  ratingCount: number | null;
  isbn10: string | null;
  isbn13: string | null;
  googleBooksId: string | null;
  openLibraryId: string | null;
  sources: string[];
}

export interface MetadataProvider {
  readonly name: string;
  lookupByIsbn(isbn: string): Promise<MetadataRecord | null>;
  searchByTitle(title: string, maxResults?: number): Promise<MetadataRecord[]>;
}

/** Identifier -> record, indexed under every ISBN form of the edition */
export type MetadataIndex = Map<string, MetadataRecord>;

/**
 * Per-row book assembled from a source row plus enrichment
 */
export interface CandidateBook {
  title: string | null;
  subtitle: string | null;
  authors: string[];
  rawIdentifier: string | null;
  isbn10: string | null;
  isbn13: string | null;
  publisher: string | null;
  publishedDate: string | null;
  pageCount: number | null;
  language: string | null;
  description: string | null;
  categories: string[];
  coverUrl: string | null;
  series: string | null;
  mediaType: string | null;
  averageRating: number | null;
  ratingCount: number | null;
  readingStatus: ReadingStatus | null;
  userRating: number | null;
  dateRead: string | null;
  dateStarted: string | null;
  dateAdded: string | null;
  personalNotes: string | null;
  globalCustom: CustomValues;
  personalCustom: CustomValues;
}

export type ImportErrorType =
  | "validation_error"
  | "lookup_failed"
  | "add_failed"
  | "duplicate_merge_failed"
  | "exception";

export type RowOutcome =
  | { kind: "success"; bookId: string; title: string }
  | { kind: "merged"; bookId: string; title: string; changed: boolean }
  | { kind: "skipped"; reason: string }
  | {
      kind: "error";
      errorType: ImportErrorType;
      message: string;
      isbn: string | null;
      title: string | null;
      author: string | null;
    };

export interface SourceRow {
  /** 1-based line position in the file, header excluded */
  rowNumber: number;
  values: Record<string, string>;
}

export type BookResolution =
  | { action: "match"; bookId: string }
  | { action: "create"; title: string; author?: string; isbn?: string; externalIsbn?: string }
  | { action: "skip" }
  | { action: "bookless" };
