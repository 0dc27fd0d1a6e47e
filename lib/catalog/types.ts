/**
 * Contract between the import pipeline and the book catalog
 */

import type { CandidateBook, CustomValues, FieldScope, ReadingStatus } from "@/lib/ingest/types";

export type CustomFieldType = "text" | "textarea" | "number" | "date" | "boolean" | "tags" | "url";

export interface CustomFieldDefinition {
  name: string;
  displayName: string;
  type: CustomFieldType;
  scope: FieldScope;
  /** Owner that created it; global definitions are visible to everyone */
  createdBy: string;
  description: string | null;
}

/**
 * A book as stored for one owner: shared bibliographic fields plus the owner's
 * personal relationship to it
 */
export interface CatalogBook {
  id: string;
  title: string;
  subtitle: string | null;
  authors: string[];
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
}

export type BookPatch = Partial<Omit<CatalogBook, "id">>;

export type CreateResult = { kind: "created"; id: string } | { kind: "already_exists"; id: string };

export interface ReadingLogInput {
  bookId: string;
  date: string;
  pages: number;
  minutes: number;
}

export interface Catalog {
  findByIdentifier(isbn: string): Promise<CatalogBook | null>;
  findByTitleAuthor(title: string, author: string | null): Promise<CatalogBook | null>;
  getById(id: string, owner: string): Promise<CatalogBook | null>;
  /** Whether the book is in the owner's library; never true for the placeholder book */
  ownsBook(id: string, owner: string): Promise<boolean>;
  /** Create-or-detect; throws CatalogRejectedError when the catalog refuses a new book */
  create(candidate: CandidateBook, owner: string): Promise<CreateResult>;
  update(id: string, owner: string, patch: BookPatch): Promise<boolean>;
  search(query: string, owner: string, limit: number): Promise<CatalogBook[]>;

  listFieldDefinitions(owner: string): Promise<CustomFieldDefinition[]>;
  createFieldDefinition(owner: string, definition: CustomFieldDefinition): Promise<CustomFieldDefinition>;
  getCustomValues(bookId: string, owner: string, scope: FieldScope): Promise<CustomValues>;
  setCustomValues(bookId: string, owner: string, scope: FieldScope, values: CustomValues): Promise<void>;

  createReadingLog(owner: string, entry: ReadingLogInput): Promise<string>;
  /** Id of the well-known book that holds reading sessions with no book */
  placeholderBookId(): Promise<string>;
}

export interface ReadingDefaults {
  pages?: number;
  minutes?: number;
}

export interface OwnerSettings {
  getReadingDefaults(owner: string): Promise<ReadingDefaults>;
}
