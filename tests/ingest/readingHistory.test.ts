import { afterEach, describe, expect, it } from "vitest";
import { ImportStateError, InvalidResolutionError } from "@/lib/ingest/errors";
import {
  BOOKLESS_GROUP,
  analyzeReadingHistory,
  applyDurationDefaults,
  applyResolutions,
  parseAmount,
} from "@/lib/ingest/readingHistory";
import type { BookResolution, FieldMapping } from "@/lib/ingest/types";
import type { PendingMatch } from "@/lib/jobs/types";
import { FakeProvider, RecordingJobStore, createTestRunner, metadataRecord, removeTempFiles, writeTempFile } from "../helpers/fakes";
import { MemoryCatalog, PLACEHOLDER_BOOK_ID } from "../helpers/memoryCatalog";

const OWNER = "reader-a";
const HEADER = "Date,Book Name,Pages Read,Minutes Read\n";
const SCENARIO_FILE = `${HEADER}2024-01-05,Dune,30,45\n2024-01-06,Dune,25,40\n2024-01-07,,10,15\n`;

const MAPPING: FieldMapping = [
  { column: "Date", token: "log_date" },
  { column: "Book Name", token: "book_name" },
  { column: "Pages Read", token: "pages_read" },
  { column: "Minutes Read", token: "minutes_read" },
];

const NO_DEFAULTS = { owner: {}, system: {} };

afterEach(async () => {
  await removeTempFiles();
});

describe("parseAmount", () => {
  it("reads blanks as zero and rejects negatives", () => {
    expect(parseAmount("")).toBe(0);
    expect(parseAmount("1,200")).toBe(1200);
    expect(parseAmount("12.6")).toBe(13);
    expect(parseAmount("-3")).toBeNull();
    expect(parseAmount("lots")).toBeNull();
  });
});

describe("applyDurationDefaults", () => {
  it("keeps sessions that recorded anything", () => {
    expect(applyDurationDefaults(0, 20, { owner: { pages: 5 }, system: {} })).toEqual({ pages: 0, minutes: 20 });
  });

  it("prefers owner defaults over system defaults", () => {
    expect(applyDurationDefaults(0, 0, { owner: { minutes: 30 }, system: { pages: 10 } })).toEqual({
      pages: 0,
      minutes: 30,
    });
    expect(applyDurationDefaults(0, 0, { owner: {}, system: { pages: 10 } })).toEqual({ pages: 10, minutes: 0 });
  });

  it("falls back to one minute", () => {
    expect(applyDurationDefaults(0, 0, NO_DEFAULTS)).toEqual({ pages: 0, minutes: 1 });
  });
});

describe("analyzeReadingHistory", () => {
  it("groups by case-folded title and rejects bad rows", () => {
    const rows = [
      { rowNumber: 1, values: { Date: "2024-01-05", "Book Name": "Dune", "Pages Read": "30", "Minutes Read": "" } },
      { rowNumber: 2, values: { Date: "01/06/2024", "Book Name": " DUNE ", "Pages Read": "", "Minutes Read": "" } },
      { rowNumber: 3, values: { Date: "someday", "Book Name": "Emma", "Pages Read": "5", "Minutes Read": "5" } },
      { rowNumber: 4, values: { Date: "2024-01-07", "Book Name": "", "Pages Read": "x", "Minutes Read": "5" } },
      { rowNumber: 5, values: { Date: "", "Book Name": "Emma", "Pages Read": "5", "Minutes Read": "5" } },
    ];

    const { groups, invalid } = analyzeReadingHistory(rows, MAPPING, NO_DEFAULTS);

    expect(groups).toHaveLength(1);
    expect(groups[0].key).toBe("dune");
    expect(groups[0].bookName).toBe("Dune");
    expect(groups[0].entries).toEqual([
      { rowNumber: 1, date: "2024-01-05", pages: 30, minutes: 0, rawRow: rows[0].values },
      { rowNumber: 2, date: "2024-01-06", pages: 0, minutes: 1, rawRow: rows[1].values },
    ]);
    expect(invalid.map((row) => [row.rowNumber, row.message])).toEqual([
      [3, 'Invalid date "someday"'],
      [4, 'Invalid pages value "x"'],
      [5, "Missing date"],
    ]);
  });

  it("puts nameless rows in the bookless group", () => {
    const rows = [{ rowNumber: 1, values: { Date: "2024-01-05", "Book Name": "", "Pages Read": "3", "Minutes Read": "" } }];
    const { groups } = analyzeReadingHistory(rows, MAPPING, NO_DEFAULTS);
    expect(groups[0]).toMatchObject({ key: BOOKLESS_GROUP, bookName: null, resolution: { action: "bookless" } });
  });
});

describe("applyResolutions", () => {
  const pending: PendingMatch[] = [
    { groupKey: "dune", bookName: "Dune", entryCount: 1, firstDate: "2024-01-05", lastDate: "2024-01-05", candidates: [] },
  ];
  const groups = [
    { key: "dune", bookName: "Dune", entries: [{ rowNumber: 1, date: "2024-01-05", pages: 1, minutes: 0, rawRow: null }], resolution: null },
  ];

  it("requires a resolution for every pending group", async () => {
    await expect(applyResolutions(groups, pending, {}, new MemoryCatalog(), OWNER)).rejects.toBeInstanceOf(
      InvalidResolutionError
    );
  });

  it("rejects match targets outside the catalog and blank titles", async () => {
    const catalog = new MemoryCatalog();
    await expect(
      applyResolutions(groups, pending, { dune: { action: "match", bookId: "book-404" } }, catalog, OWNER)
    ).rejects.toThrow("Book book-404 is not in the owner's library");
    await expect(
      applyResolutions(groups, pending, { dune: { action: "create", title: "  " } }, catalog, OWNER)
    ).rejects.toThrow('A title is required to create "Dune"');
  });

  it("rejects match targets from another owner's library or the placeholder book", async () => {
    const catalog = new MemoryCatalog();
    const othersBook = catalog.seed("reader-b", { title: "Private Journal" });

    await expect(
      applyResolutions(groups, pending, { dune: { action: "match", bookId: othersBook } }, catalog, OWNER)
    ).rejects.toThrow(`Book ${othersBook} is not in the owner's library`);
    await expect(
      applyResolutions(groups, pending, { dune: { action: "match", bookId: PLACEHOLDER_BOOK_ID } }, catalog, OWNER)
    ).rejects.toThrow(`Book ${PLACEHOLDER_BOOK_ID} is not in the owner's library`);
  });

  it("returns resolved copies of the groups", async () => {
    const catalog = new MemoryCatalog();
    const bookId = catalog.seed(OWNER, { title: "Dune" });
    const resolved = await applyResolutions(groups, pending, { dune: { action: "match", bookId } }, catalog, OWNER);
    expect(resolved[0].resolution).toEqual({ action: "match", bookId });
    expect(groups[0].resolution).toBeNull();
  });
});

describe("reading history import", () => {
  it("waits for book matches, then logs every session", async () => {
    const { runner, catalog } = createTestRunner();
    const filePath = await writeTempFile("history.csv", SCENARIO_FILE);

    const { jobId, detection } = await runner.startReadingHistoryImport({ owner: OWNER, filePath });
    expect(detection.format).toBe("reading_history");
    await runner.settled(OWNER, jobId);

    const waiting = await runner.getJob(OWNER, jobId);
    expect(waiting?.status).toBe("needs_book_matching");
    expect(waiting?.reconciliation?.groups).toHaveLength(2);
    expect(waiting?.reconciliation?.pending).toHaveLength(1);
    expect(waiting?.reconciliation?.pending[0]).toMatchObject({
      groupKey: "dune",
      bookName: "Dune",
      entryCount: 2,
      firstDate: "2024-01-05",
      lastDate: "2024-01-06",
    });
    expect(catalog.readingLogs).toEqual([]);

    await runner.submitBookMatches(OWNER, jobId, { dune: { action: "create", title: "Dune" } });
    await runner.settled(OWNER, jobId);

    const done = await runner.getJob(OWNER, jobId);
    expect(done?.status).toBe("completed");
    expect(done?.processed).toBe(3);
    expect(done?.success).toBe(3);
    expect(done?.reconciliation?.groups).toEqual([]);

    const books = catalog.realBooks();
    expect(books.map((book) => book.title)).toEqual(["Dune"]);
    expect(catalog.readingLogs.map((log) => [log.bookId, log.date, log.pages, log.minutes])).toEqual([
      [books[0].id, "2024-01-05", 30, 45],
      [books[0].id, "2024-01-06", 25, 40],
      [PLACEHOLDER_BOOK_ID, "2024-01-07", 10, 15],
    ]);
  });

  it("accepts book matches only once", async () => {
    const { runner } = createTestRunner();
    const { jobId } = await runner.startReadingHistoryImport({
      owner: OWNER,
      filePath: await writeTempFile("history.csv", SCENARIO_FILE),
    });
    await runner.settled(OWNER, jobId);

    const resolutions: Record<string, BookResolution> = { dune: { action: "create", title: "Dune" } };
    const first = runner.submitBookMatches(OWNER, jobId, resolutions);
    await expect(runner.submitBookMatches(OWNER, jobId, resolutions)).rejects.toBeInstanceOf(ImportStateError);
    await first;
    await runner.settled(OWNER, jobId);

    await expect(runner.submitBookMatches(OWNER, jobId, resolutions)).rejects.toBeInstanceOf(ImportStateError);
    expect((await runner.getJob(OWNER, jobId))?.status).toBe("completed");
  });

  it("lets a rejected submission be corrected", async () => {
    const { runner, catalog } = createTestRunner();
    const { jobId } = await runner.startReadingHistoryImport({
      owner: OWNER,
      filePath: await writeTempFile("history.csv", SCENARIO_FILE),
    });
    await runner.settled(OWNER, jobId);

    await expect(runner.submitBookMatches(OWNER, jobId, {})).rejects.toBeInstanceOf(InvalidResolutionError);
    expect((await runner.getJob(OWNER, jobId))?.status).toBe("needs_book_matching");

    await runner.submitBookMatches(OWNER, jobId, { dune: { action: "skip" } });
    await runner.settled(OWNER, jobId);

    const job = await runner.getJob(OWNER, jobId);
    expect(job?.status).toBe("completed");
    expect(job?.skipped).toBe(2);
    expect(job?.success).toBe(1);
    expect(catalog.realBooks()).toEqual([]);
  });

  it("matches exact titles already in the library without asking", async () => {
    const catalog = new MemoryCatalog();
    const bookId = catalog.seed(OWNER, { title: "Dune" });
    const { runner } = createTestRunner({ catalog });
    const filePath = await writeTempFile("history.csv", `${HEADER}2024-01-05,dune,30,45\n2024-01-08,Dune,,\n`);

    const { jobId } = await runner.startReadingHistoryImport({ owner: OWNER, filePath });
    await runner.settled(OWNER, jobId);

    const job = await runner.getJob(OWNER, jobId);
    expect(job?.status).toBe("completed");
    expect(catalog.readingLogs.map((log) => [log.bookId, log.pages, log.minutes])).toEqual([
      [bookId, 30, 45],
      [bookId, 0, 1],
    ]);
  });

  it("records invalid rows as skipped validation errors", async () => {
    const catalog = new MemoryCatalog();
    catalog.seed(OWNER, { title: "Dune" });
    const { runner } = createTestRunner({ catalog });
    const filePath = await writeTempFile("history.csv", `${HEADER}not-a-date,Dune,30,45\n2024-01-06,Dune,25,40\n`);

    const { jobId } = await runner.startReadingHistoryImport({ owner: OWNER, filePath });
    await runner.settled(OWNER, jobId);

    const job = await runner.getJob(OWNER, jobId);
    expect(job?.status).toBe("completed");
    expect(job?.skipped).toBe(1);
    expect(job?.success).toBe(1);
    expect(job?.errorLog).toHaveLength(1);
    expect(job?.errorLog[0]).toMatchObject({ row: 1, type: "validation_error", message: 'Invalid date "not-a-date"' });
  });

  it("finishes with errors when a session fails to save", async () => {
    const catalog = new MemoryCatalog();
    catalog.seed(OWNER, { title: "Dune" });
    catalog.failLogDates.add("2024-01-06");
    const { runner } = createTestRunner({ catalog });
    const filePath = await writeTempFile("history.csv", `${HEADER}2024-01-05,Dune,30,45\n2024-01-06,Dune,25,40\n`);

    const { jobId } = await runner.startReadingHistoryImport({ owner: OWNER, filePath });
    await runner.settled(OWNER, jobId);

    const job = await runner.getJob(OWNER, jobId);
    expect(job?.status).toBe("completed_with_errors");
    expect(job?.success).toBe(1);
    expect(job?.errors).toBe(1);
    expect(job?.errorLog[0]).toMatchObject({
      row: 2,
      type: "add_failed",
      message: "could not save session on 2024-01-06",
      rawRow: { Date: "2024-01-06", "Book Name": "Dune", "Pages Read": "25", "Minutes Read": "40" },
    });
  });

  it("offers external candidates for unmatched books", async () => {
    const provider = new FakeProvider();
    provider.searchResults = [metadataRecord({ title: "Dune Messiah", isbn13: "9781111111113" })];
    const { runner } = createTestRunner({ metadata: provider });
    const { jobId } = await runner.startReadingHistoryImport({
      owner: OWNER,
      filePath: await writeTempFile("history.csv", SCENARIO_FILE),
    });
    await runner.settled(OWNER, jobId);

    const job = await runner.getJob(OWNER, jobId);
    expect(provider.searches).toEqual(["Dune"]);
    expect(job?.reconciliation?.pending[0].candidates).toEqual([
      { source: "external", bookId: null, title: "Dune Messiah", authors: [], isbn13: "9781111111113" },
    ]);
  });

  it("cancels a job waiting for matches", async () => {
    const { runner } = createTestRunner();
    const { jobId } = await runner.startReadingHistoryImport({
      owner: OWNER,
      filePath: await writeTempFile("history.csv", SCENARIO_FILE),
    });
    await runner.settled(OWNER, jobId);

    expect(await runner.cancel(OWNER, jobId)).toBe(true);
    const job = await runner.getJob(OWNER, jobId);
    expect(job?.status).toBe("cancelled");
    expect(job?.reconciliation).toBeNull();
    await expect(runner.submitBookMatches(OWNER, jobId, { dune: { action: "skip" } })).rejects.toBeInstanceOf(
      ImportStateError
    );
  });

  it("accepts matches submitted while the waiting status is being stored", async () => {
    const jobStore = new RecordingJobStore();
    const { runner } = createTestRunner({ jobStore });
    const submissions: Promise<void>[] = [];
    let jobId = "";
    jobStore.afterUpdate = (partial) => {
      if (partial.status === "needs_book_matching") {
        submissions.push(runner.submitBookMatches(OWNER, jobId, { dune: { action: "skip" } }));
      }
    };

    ({ jobId } = await runner.startReadingHistoryImport({
      owner: OWNER,
      filePath: await writeTempFile("history.csv", SCENARIO_FILE),
    }));
    await runner.settled(OWNER, jobId);
    await Promise.all(submissions);
    await runner.settled(OWNER, jobId);

    expect(submissions).toHaveLength(1);
    const job = await runner.getJob(OWNER, jobId);
    expect(job?.status).toBe("completed");
    expect(job?.skipped).toBe(2);
    expect(job?.success).toBe(1);
  });

  it("cancels a job whose waiting status is still being stored", async () => {
    const jobStore = new RecordingJobStore();
    const { runner } = createTestRunner({ jobStore });
    const cancels: Promise<boolean>[] = [];
    let jobId = "";
    jobStore.afterUpdate = (partial) => {
      if (partial.status === "needs_book_matching") cancels.push(runner.cancel(OWNER, jobId));
    };

    ({ jobId } = await runner.startReadingHistoryImport({
      owner: OWNER,
      filePath: await writeTempFile("history.csv", SCENARIO_FILE),
    }));
    await runner.settled(OWNER, jobId);

    expect(await Promise.all(cancels)).toEqual([true]);
    const job = await runner.getJob(OWNER, jobId);
    expect(job?.status).toBe("cancelled");
    expect(job?.reconciliation).toBeNull();
  });

  it("cancels instead of processing when a cancel lands during a submission", async () => {
    const jobStore = new RecordingJobStore();
    const { runner, catalog } = createTestRunner({ jobStore });
    const { jobId } = await runner.startReadingHistoryImport({
      owner: OWNER,
      filePath: await writeTempFile("history.csv", SCENARIO_FILE),
    });
    await runner.settled(OWNER, jobId);

    const cancels: Promise<boolean>[] = [];
    jobStore.afterUpdate = (partial) => {
      if (partial.status === "processing" && cancels.length === 0) cancels.push(runner.cancel(OWNER, jobId));
    };
    await runner.submitBookMatches(OWNER, jobId, { dune: { action: "create", title: "Dune" } });
    await runner.settled(OWNER, jobId);

    expect(await Promise.all(cancels)).toEqual([true]);
    expect((await runner.getJob(OWNER, jobId))?.status).toBe("cancelled");
    expect(catalog.readingLogs).toEqual([]);
  });

  it("needs a date column", async () => {
    const { runner } = createTestRunner();
    const filePath = await writeTempFile("nodate.csv", "Title,Pages\nDune,30\n");
    await expect(runner.startReadingHistoryImport({ owner: OWNER, filePath })).rejects.toThrow(
      "Reading history files need a date column"
    );
  });
});
