import type { QueryResultRow } from "pg";
import { describe, expect, it } from "vitest";
import { PgCatalog, PgOwnerSettings } from "@/lib/catalog/pgCatalog";
import type { Database, QueryFn } from "@/lib/db/pool";
import { emptyCandidate } from "@/lib/ingest/candidate";
import { CatalogRejectedError } from "@/lib/ingest/errors";
import type { CandidateBook } from "@/lib/ingest/types";

type Responder = (text: string, params: unknown[]) => QueryResultRow[];

/**
 * Records every statement and answers from a responder function
 */
class ScriptedDatabase implements Database {
  readonly statements: Array<{ text: string; params: unknown[] }> = [];
  transactions = 0;

  constructor(private readonly respond: Responder = () => []) {}

  query: QueryFn = async (text, params = []) => {
    this.statements.push({ text, params });
    const rows = this.respond(text, params);
    return { rows, rowCount: rows.length };
  };

  async transaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T> {
    this.transactions++;
    return fn(this.query);
  }

  find(fragment: string) {
    return this.statements.filter((s) => s.text.includes(fragment));
  }
}

function candidate(overrides: Partial<CandidateBook> = {}): CandidateBook {
  return { ...emptyCandidate(), ...overrides };
}

const BOOK_ROW = {
  id: "b-1",
  title: "Dune",
  subtitle: null,
  authors: ["Frank Herbert"],
  isbn10: "1111111111",
  isbn13: "9781111111113",
  publisher: null,
  published_date: "1965",
  page_count: 412,
  language: null,
  description: null,
  categories: null,
  cover_url: null,
  series: null,
  media_type: null,
  average_rating: 4.2,
  rating_count: null,
  reading_status: "shelved",
  user_rating: 5,
  date_read: null,
  date_started: null,
  date_added: null,
  personal_notes: null,
};

describe("PgCatalog.create", () => {
  it("inserts a new book and links the owner", async () => {
    const db = new ScriptedDatabase((text) => (text.includes('INSERT INTO "Book"') ? [{ id: "b-1" }] : []));
    const catalog = new PgCatalog(db);

    const result = await catalog.create(
      candidate({ title: "Dune", authors: ["Frank Herbert"], isbn13: "9781111111113", readingStatus: "read" }),
      "reader-a"
    );

    expect(result).toEqual({ kind: "created", id: "b-1" });
    expect(db.transactions).toBe(1);
    const [link] = db.find('INSERT INTO "OwnerBook"');
    expect(link.params.slice(0, 3)).toEqual(["reader-a", "b-1", "read"]);
  });

  it("reports an existing ISBN as a duplicate", async () => {
    const db = new ScriptedDatabase((text) => (text.includes("isbn13 = $1") ? [{ id: "b-9" }] : []));
    const catalog = new PgCatalog(db);

    const result = await catalog.create(candidate({ title: "Dune", rawIdentifier: "1111111111" }), "reader-a");

    expect(result).toEqual({ kind: "already_exists", id: "b-9" });
    expect(db.find("isbn13 = $1")[0].params).toEqual(["9781111111113", "1111111111"]);
    expect(db.find('INSERT INTO "Book"')).toHaveLength(0);
    expect(db.find('INSERT INTO "OwnerBook"')[0].params.slice(0, 2)).toEqual(["reader-a", "b-9"]);
  });

  it("falls back to title and first author", async () => {
    const db = new ScriptedDatabase((text) => (text.includes("lower(title) = lower($1)") ? [{ id: "b-3" }] : []));
    const result = await new PgCatalog(db).create(candidate({ title: "Emma", authors: ["Jane Austen"] }), "reader-a");

    expect(result).toEqual({ kind: "already_exists", id: "b-3" });
    expect(db.find("lower(title) = lower($1)")[0].params).toEqual(["Emma", "Jane Austen"]);
  });

  it("re-reads the winner after losing an insert race", async () => {
    let isbnLookups = 0;
    const db = new ScriptedDatabase((text) => {
      if (text.includes("isbn13 = $1")) {
        isbnLookups++;
        return isbnLookups === 1 ? [] : [{ id: "b-7" }];
      }
      return [];
    });

    const result = await new PgCatalog(db).create(candidate({ title: "Dune", isbn13: "9781111111113" }), "reader-a");

    expect(result).toEqual({ kind: "already_exists", id: "b-7" });
  });

  it("refuses a new book without a title", async () => {
    const db = new ScriptedDatabase();
    await expect(new PgCatalog(db).create(candidate({ rawIdentifier: "12345" }), "reader-a")).rejects.toBeInstanceOf(
      CatalogRejectedError
    );
  });
});

describe("PgCatalog", () => {
  it("splits a patch between the book and the owner's row", async () => {
    const db = new ScriptedDatabase((text) => (text.startsWith("SELECT 1") ? [{ exists: 1 }] : []));

    expect(await new PgCatalog(db).update("b-1", "reader-a", { publisher: "Example Press", readingStatus: "read" })).toBe(
      true
    );

    const [book] = db.find('UPDATE "Book"');
    expect(book.text).toBe('UPDATE "Book" SET publisher = $2, updated_at = NOW() WHERE id::text = $1');
    expect(book.params).toEqual(["b-1", "Example Press"]);
    const [owner] = db.find('UPDATE "OwnerBook"');
    expect(owner.text).toBe('UPDATE "OwnerBook" SET reading_status = $3 WHERE owner = $1 AND book_id::text = $2');
    expect(owner.params).toEqual(["reader-a", "b-1", "read"]);
  });

  it("reports updates of unknown books", async () => {
    const db = new ScriptedDatabase();
    expect(await new PgCatalog(db).update("b-404", "reader-a", { publisher: "X" })).toBe(false);
    expect(db.find("UPDATE")).toHaveLength(0);
  });

  it("reads rows and drops unknown reading statuses", async () => {
    const db = new ScriptedDatabase(() => [BOOK_ROW]);
    const book = await new PgCatalog(db).getById("b-1", "reader-a");

    expect(book).toMatchObject({
      id: "b-1",
      title: "Dune",
      publishedDate: "1965",
      pageCount: 412,
      categories: [],
      readingStatus: null,
      userRating: 5,
    });
  });

  it("checks ownership through the owner's library rows", async () => {
    const db = new ScriptedDatabase((_text, params) => (params[0] === "reader-a" ? [{ "?column?": 1 }] : []));
    const catalog = new PgCatalog(db);

    expect(await catalog.ownsBook("b-1", "reader-a")).toBe(true);
    expect(await catalog.ownsBook("b-1", "reader-b")).toBe(false);
    expect(db.statements[0].text).toContain("NOT b.is_placeholder");
    expect(db.statements[1].params).toEqual(["reader-b", "b-1"]);
  });

  it("escapes wildcards in title searches", async () => {
    const db = new ScriptedDatabase();
    await new PgCatalog(db).search(" 100%_done ", "reader-a", 5);
    expect(db.statements[0].params).toEqual(["reader-a", "%100\\%\\_done%", "100%_done", 5]);
  });

  it("stores global custom values under the empty owner", async () => {
    const db = new ScriptedDatabase();
    const catalog = new PgCatalog(db);
    await catalog.setCustomValues("b-1", "reader-a", "global", { binding_type: "Paperback" });
    await catalog.setCustomValues("b-1", "reader-a", "personal", { shelf: "favourites" });
    await catalog.setCustomValues("b-1", "reader-a", "personal", {});

    expect(db.statements.map((s) => s.params)).toEqual([
      ["b-1", "global", "", "binding_type", "Paperback"],
      ["b-1", "personal", "reader-a", "shelf", "favourites"],
    ]);
  });

  it("caches the placeholder book id", async () => {
    const db = new ScriptedDatabase(() => [{ id: "00000000-0000-0000-0000-000000000001" }]);
    const catalog = new PgCatalog(db);

    expect(await catalog.placeholderBookId()).toBe("00000000-0000-0000-0000-000000000001");
    expect(await catalog.placeholderBookId()).toBe("00000000-0000-0000-0000-000000000001");
    expect(db.statements).toHaveLength(1);
  });

  it("fails loudly when the placeholder book is missing", async () => {
    await expect(new PgCatalog(new ScriptedDatabase()).placeholderBookId()).rejects.toThrow(
      "Placeholder book is missing; run the database migrations"
    );
  });
});

describe("PgOwnerSettings", () => {
  it("maps missing defaults to undefined", async () => {
    const db = new ScriptedDatabase(() => [{ default_pages_read: null, default_minutes_read: 20 }]);
    expect(await new PgOwnerSettings(db).getReadingDefaults("reader-a")).toEqual({ minutes: 20 });
  });

  it("returns no defaults for owners without settings", async () => {
    expect(await new PgOwnerSettings(new ScriptedDatabase()).getReadingDefaults("reader-a")).toEqual({});
  });
});
