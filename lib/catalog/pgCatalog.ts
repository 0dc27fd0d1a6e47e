/**
 * Postgres-backed catalog. Books are communal; each owner's relationship to a
 * book (status, rating, dates, notes) lives in "OwnerBook".
 */

import { z } from "zod";
import type {
  BookPatch,
  Catalog,
  CatalogBook,
  CreateResult,
  CustomFieldDefinition,
  OwnerSettings,
  ReadingDefaults,
  ReadingLogInput,
} from "@/lib/catalog/types";
import { database, type Database, type QueryFn } from "@/lib/db/pool";
import { emptyCandidate } from "@/lib/ingest/candidate";
import { CatalogRejectedError } from "@/lib/ingest/errors";
import { READING_STATUSES, type CandidateBook, type CustomValues, type FieldScope } from "@/lib/ingest/types";
import { normalizeIsbn } from "@/lib/util/isbn";

const bookRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  subtitle: z.string().nullable(),
  authors: z.array(z.string()).nullable(),
  isbn10: z.string().nullable(),
  isbn13: z.string().nullable(),
  publisher: z.string().nullable(),
  published_date: z.string().nullable(),
  page_count: z.number().nullable(),
  language: z.string().nullable(),
  description: z.string().nullable(),
  categories: z.array(z.string()).nullable(),
  cover_url: z.string().nullable(),
  series: z.string().nullable(),
  media_type: z.string().nullable(),
  average_rating: z.number().nullable(),
  rating_count: z.number().nullable(),
  reading_status: z.enum(READING_STATUSES).nullable().catch(null),
  user_rating: z.number().nullable(),
  date_read: z.string().nullable(),
  date_started: z.string().nullable(),
  date_added: z.string().nullable(),
  personal_notes: z.string().nullable(),
});

const definitionRowSchema = z.object({
  name: z.string(),
  scope: z.enum(["global", "personal"]),
  created_by: z.string(),
  display_name: z.string(),
  field_type: z.enum(["text", "textarea", "number", "date", "boolean", "tags", "url"]).catch("text"),
  description: z.string().nullable(),
});

const idRowSchema = z.object({ id: z.string() });
const valueRowSchema = z.object({ field_name: z.string(), value: z.string() });
const defaultsRowSchema = z.object({
  default_pages_read: z.number().nullable(),
  default_minutes_read: z.number().nullable(),
});

const BOOK_COLUMNS = `
  b.id::text AS id, b.title, b.subtitle, b.authors, b.isbn10, b.isbn13, b.publisher,
  b.published_date, b.page_count, b.language, b.description, b.categories, b.cover_url,
  b.series, b.media_type, b.average_rating, b.rating_count,
  ob.reading_status, ob.user_rating, ob.date_read, ob.date_started, ob.date_added, ob.personal_notes
`;

const SHARED_FIELDS: ReadonlyArray<[keyof BookPatch, string]> = [
  ["title", "title"],
  ["subtitle", "subtitle"],
  ["authors", "authors"],
  ["isbn10", "isbn10"],
  ["isbn13", "isbn13"],
  ["publisher", "publisher"],
  ["publishedDate", "published_date"],
  ["pageCount", "page_count"],
  ["language", "language"],
  ["description", "description"],
  ["categories", "categories"],
  ["coverUrl", "cover_url"],
  ["series", "series"],
  ["mediaType", "media_type"],
  ["averageRating", "average_rating"],
  ["ratingCount", "rating_count"],
];

const OWNER_FIELDS: ReadonlyArray<[keyof BookPatch, string]> = [
  ["readingStatus", "reading_status"],
  ["userRating", "user_rating"],
  ["dateRead", "date_read"],
  ["dateStarted", "date_started"],
  ["dateAdded", "date_added"],
  ["personalNotes", "personal_notes"],
];

function toBook(row: unknown): CatalogBook {
  const r = bookRowSchema.parse(row);
  return {
    id: r.id,
    title: r.title,
    subtitle: r.subtitle,
    authors: r.authors ?? [],
    isbn10: r.isbn10,
    isbn13: r.isbn13,
    publisher: r.publisher,
    publishedDate: r.published_date,
    pageCount: r.page_count,
    language: r.language,
    description: r.description,
    categories: r.categories ?? [],
    coverUrl: r.cover_url,
    series: r.series,
    mediaType: r.media_type,
    averageRating: r.average_rating,
    ratingCount: r.rating_count,
    readingStatus: r.reading_status,
    userRating: r.user_rating,
    dateRead: r.date_read,
    dateStarted: r.date_started,
    dateAdded: r.date_added,
    personalNotes: r.personal_notes,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** Custom values of global scope are stored under the empty owner */
function valueOwner(scope: FieldScope, owner: string): string {
  return scope === "global" ? "" : owner;
}

/**
 * Existing communal book for a candidate: ISBN-13, then ISBN-10, then
 * title plus first author
 */
async function findExisting(run: QueryFn, candidate: CandidateBook): Promise<string | null> {
  const isbn = normalizeIsbn(candidate.isbn13 ?? candidate.isbn10 ?? candidate.rawIdentifier);
  if (isbn) {
    const { rows } = await run(
      `SELECT id::text AS id FROM "Book" WHERE isbn13 = $1 OR ($2::text IS NOT NULL AND isbn10 = $2) LIMIT 1`,
      [isbn.isbn13, isbn.isbn10]
    );
    if (rows.length > 0) return idRowSchema.parse(rows[0]).id;
  }

  if (!candidate.title) return null;
  const { rows } = await run(
    `
    SELECT id::text AS id FROM "Book"
    WHERE NOT is_placeholder
      AND lower(title) = lower($1)
      AND ($2::text IS NULL OR EXISTS (SELECT 1 FROM unnest(authors) a WHERE lower(a) = lower($2)))
    ORDER BY created_at
    LIMIT 1
    `,
    [candidate.title, candidate.authors[0] ?? null]
  );
  return rows.length > 0 ? idRowSchema.parse(rows[0]).id : null;
}

async function linkOwner(run: QueryFn, owner: string, bookId: string, candidate?: CandidateBook) {
  await run(
    `
    INSERT INTO "OwnerBook" (owner, book_id, reading_status, user_rating, date_read, date_started, date_added, personal_notes)
    VALUES ($1, $2::uuid, $3, $4, $5, $6, $7, $8)
    ON CONFLICT (owner, book_id) DO NOTHING
    `,
    [
      owner,
      bookId,
      candidate?.readingStatus ?? null,
      candidate?.userRating ?? null,
      candidate?.dateRead ?? null,
      candidate?.dateStarted ?? null,
      candidate?.dateAdded ?? null,
      candidate?.personalNotes ?? null,
    ]
  );
}

export class PgCatalog implements Catalog {
  private placeholderId: string | null = null;

  constructor(private readonly db: Database = database) {}

  async findByIdentifier(isbn: string): Promise<CatalogBook | null> {
    const normalized = normalizeIsbn(isbn);
    if (!normalized) return null;
    const { rows } = await this.db.query(
      `SELECT ${BOOK_COLUMNS} FROM "Book" b LEFT JOIN "OwnerBook" ob ON ob.book_id = b.id AND ob.owner = ''
       WHERE b.isbn13 = $1 OR ($2::text IS NOT NULL AND b.isbn10 = $2) LIMIT 1`,
      [normalized.isbn13, normalized.isbn10]
    );
    return rows.length > 0 ? toBook(rows[0]) : null;
  }

  async findByTitleAuthor(title: string, author: string | null): Promise<CatalogBook | null> {
    const id = await findExisting((text, params) => this.db.query(text, params), {
      ...emptyCandidate(),
      title,
      authors: author ? [author] : [],
    });
    return id ? this.getById(id, "") : null;
  }

  async getById(id: string, owner: string): Promise<CatalogBook | null> {
    const { rows } = await this.db.query(
      `SELECT ${BOOK_COLUMNS} FROM "Book" b LEFT JOIN "OwnerBook" ob ON ob.book_id = b.id AND ob.owner = $1
       WHERE b.id::text = $2`,
      [owner, id]
    );
    return rows.length > 0 ? toBook(rows[0]) : null;
  }

  async ownsBook(id: string, owner: string): Promise<boolean> {
    const { rows } = await this.db.query(
      `SELECT 1 FROM "OwnerBook" ob JOIN "Book" b ON b.id = ob.book_id
       WHERE ob.owner = $1 AND b.id::text = $2 AND NOT b.is_placeholder`,
      [owner, id]
    );
    return rows.length > 0;
  }

  async create(candidate: CandidateBook, owner: string): Promise<CreateResult> {
    return this.db.transaction(async (run): Promise<CreateResult> => {
      const existing = await findExisting(run, candidate);
      if (existing) {
        await linkOwner(run, owner, existing);
        return { kind: "already_exists", id: existing };
      }

      if (!candidate.title) {
        throw new CatalogRejectedError("A book needs a title");
      }

      const { rows } = await run(
        `
        INSERT INTO "Book" (title, subtitle, authors, isbn10, isbn13, publisher, published_date, page_count,
                            language, description, categories, cover_url, series, media_type, average_rating, rating_count)
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)
        ON CONFLICT DO NOTHING
        RETURNING id::text AS id
        `,
        [
          candidate.title,
          candidate.subtitle,
          candidate.authors,
          candidate.isbn10,
          candidate.isbn13,
          candidate.publisher,
          candidate.publishedDate,
          candidate.pageCount,
          candidate.language,
          candidate.description,
          candidate.categories,
          candidate.coverUrl,
          candidate.series,
          candidate.mediaType,
          candidate.averageRating,
          candidate.ratingCount,
        ]
      );

      if (rows.length === 0) {
        // Lost an ISBN race to a concurrent insert
        const winner = await findExisting(run, candidate);
        if (!winner) throw new CatalogRejectedError(`Could not store "${candidate.title}"`);
        await linkOwner(run, owner, winner);
        return { kind: "already_exists", id: winner };
      }

      const id = idRowSchema.parse(rows[0]).id;
      await linkOwner(run, owner, id, candidate);
      return { kind: "created", id };
    });
  }

  async update(id: string, owner: string, patch: BookPatch): Promise<boolean> {
    return this.db.transaction(async (run) => {
      const shared = SHARED_FIELDS.filter(([field]) => patch[field] !== undefined);
      const personal = OWNER_FIELDS.filter(([field]) => patch[field] !== undefined);

      const found = await run(`SELECT 1 FROM "Book" WHERE id::text = $1`, [id]);
      if (found.rows.length === 0) return false;

      if (shared.length > 0) {
        const sets = shared.map(([, column], i) => `${column} = $${i + 2}`);
        await run(`UPDATE "Book" SET ${sets.join(", ")}, updated_at = NOW() WHERE id::text = $1`, [
          id,
          ...shared.map(([field]) => patch[field]),
        ]);
      }

      await linkOwner(run, owner, id);
      if (personal.length > 0) {
        const sets = personal.map(([, column], i) => `${column} = $${i + 3}`);
        await run(`UPDATE "OwnerBook" SET ${sets.join(", ")} WHERE owner = $1 AND book_id::text = $2`, [
          owner,
          id,
          ...personal.map(([field]) => patch[field]),
        ]);
      }
      return true;
    });
  }

  async search(query: string, owner: string, limit: number): Promise<CatalogBook[]> {
    const { rows } = await this.db.query(
      `
      SELECT ${BOOK_COLUMNS}
      FROM "Book" b
      JOIN "OwnerBook" ob ON ob.book_id = b.id AND ob.owner = $1
      WHERE NOT b.is_placeholder AND b.title ILIKE $2
      ORDER BY (lower(b.title) = lower($3)) DESC, b.title
      LIMIT $4
      `,
      [owner, `%${escapeLike(query.trim())}%`, query.trim(), limit]
    );
    return rows.map(toBook);
  }

  async listFieldDefinitions(owner: string): Promise<CustomFieldDefinition[]> {
    const { rows } = await this.db.query(
      `SELECT name, scope, created_by, display_name, field_type, description
       FROM "CustomFieldDefinition"
       WHERE scope = 'global' OR created_by = $1
       ORDER BY name`,
      [owner]
    );
    return rows.map((row) => {
      const r = definitionRowSchema.parse(row);
      return {
        name: r.name,
        scope: r.scope,
        createdBy: r.created_by,
        displayName: r.display_name,
        type: r.field_type,
        description: r.description,
      };
    });
  }

  async createFieldDefinition(owner: string, definition: CustomFieldDefinition): Promise<CustomFieldDefinition> {
    await this.db.query(
      `INSERT INTO "CustomFieldDefinition" (name, scope, created_by, display_name, field_type, description)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (name, scope, created_by) DO NOTHING`,
      [definition.name, definition.scope, owner, definition.displayName, definition.type, definition.description]
    );
    return { ...definition, createdBy: owner };
  }

  async getCustomValues(bookId: string, owner: string, scope: FieldScope): Promise<CustomValues> {
    const { rows } = await this.db.query(
      `SELECT field_name, value FROM "CustomFieldValue" WHERE book_id::text = $1 AND scope = $2 AND owner = $3`,
      [bookId, scope, valueOwner(scope, owner)]
    );
    const values: CustomValues = {};
    for (const row of rows) {
      const r = valueRowSchema.parse(row);
      values[r.field_name] = r.value;
    }
    return values;
  }

  async setCustomValues(bookId: string, owner: string, scope: FieldScope, values: CustomValues): Promise<void> {
    const entries = Object.entries(values);
    if (entries.length === 0) return;
    await this.db.transaction(async (run) => {
      for (const [name, value] of entries) {
        await run(
          `INSERT INTO "CustomFieldValue" (book_id, scope, owner, field_name, value)
           VALUES ($1::uuid, $2, $3, $4, $5)
           ON CONFLICT (book_id, scope, owner, field_name) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
          [bookId, scope, valueOwner(scope, owner), name, value]
        );
      }
    });
  }

  async createReadingLog(owner: string, entry: ReadingLogInput): Promise<string> {
    const { rows } = await this.db.query(
      `INSERT INTO "ReadingLog" (owner, book_id, log_date, pages_read, minutes_read)
       VALUES ($1, $2::uuid, $3::date, $4, $5)
       RETURNING id::text AS id`,
      [owner, entry.bookId, entry.date, entry.pages, entry.minutes]
    );
    return idRowSchema.parse(rows[0]).id;
  }

  async placeholderBookId(): Promise<string> {
    if (this.placeholderId) return this.placeholderId;
    const { rows } = await this.db.query(
      `SELECT id::text AS id FROM "Book" WHERE is_placeholder ORDER BY created_at LIMIT 1`
    );
    if (rows.length === 0) {
      throw new Error("Placeholder book is missing; run the database migrations");
    }
    this.placeholderId = idRowSchema.parse(rows[0]).id;
    return this.placeholderId;
  }
}

/**
 * Per-owner reading defaults from "OwnerSettings"
 */
export class PgOwnerSettings implements OwnerSettings {
  constructor(private readonly db: Database = database) {}

  async getReadingDefaults(owner: string): Promise<ReadingDefaults> {
    const { rows } = await this.db.query(
      `SELECT default_pages_read, default_minutes_read FROM "OwnerSettings" WHERE owner = $1`,
      [owner]
    );
    if (rows.length === 0) return {};
    const r = defaultsRowSchema.parse(rows[0]);
    return {
      pages: r.default_pages_read ?? undefined,
      minutes: r.default_minutes_read ?? undefined,
    };
  }
}
