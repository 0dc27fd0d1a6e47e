import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { ImportConfig } from "@/lib/config/env";
import { emptyRecord } from "@/lib/ingest/metadata";
import { ImportRunner, type ImportRunnerDeps } from "@/lib/ingest/pipeline";
import type { MetadataProvider, MetadataRecord } from "@/lib/ingest/types";
import { InMemoryJobStore } from "@/lib/jobs/store";
import type { ImportJob, JobUpdate } from "@/lib/jobs/types";
import type { MappingTemplate } from "@/lib/templates/types";
import { MemoryCatalog } from "./memoryCatalog";

export function metadataRecord(overrides: Partial<MetadataRecord> = {}): MetadataRecord {
  return { ...emptyRecord("fake"), ...overrides };
}

/**
 * Provider answering from a fixed table, keyed by the queried ISBN
 */
export class FakeProvider implements MetadataProvider {
  readonly name = "fake";
  readonly lookups: string[] = [];
  readonly searches: string[] = [];
  readonly failing = new Set<string>();
  searchResults: MetadataRecord[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly records: Record<string, MetadataRecord> = {}) {}

  async lookupByIsbn(isbn: string): Promise<MetadataRecord | null> {
    this.lookups.push(isbn);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await new Promise((resolve) => setTimeout(resolve, 1));
      if (this.failing.has(isbn)) throw new Error(`provider down for ${isbn}`);
      return this.records[isbn] ?? null;
    } finally {
      this.active--;
    }
  }

  async searchByTitle(title: string): Promise<MetadataRecord[]> {
    this.searches.push(title);
    return this.searchResults;
  }
}

/**
 * Job store that keeps every partial update it was given. afterUpdate runs
 * once an update is stored, before the writer sees the result.
 */
export class RecordingJobStore extends InMemoryJobStore {
  readonly updates: JobUpdate[] = [];
  afterUpdate: ((partial: JobUpdate) => Promise<void> | void) | null = null;

  async update(owner: string, id: string, partial: JobUpdate): Promise<boolean> {
    this.updates.push(structuredClone(partial));
    const written = await super.update(owner, id, partial);
    if (this.afterUpdate) await this.afterUpdate(partial);
    return written;
  }
}

export const TEST_CONFIG: ImportConfig = {
  activityLogCap: 25,
  errorLogCap: 200,
  progressIntervalMs: 350,
  enrichConcurrency: 4,
  enrichJitterMinMs: 0,
  enrichJitterMaxMs: 0,
};

export function createTestRunner(
  overrides: Partial<Omit<ImportRunnerDeps, "catalog">> & { catalog?: MemoryCatalog } = {}
) {
  const catalog = overrides.catalog ?? new MemoryCatalog();
  const jobStore = overrides.jobStore ?? new InMemoryJobStore();
  const runner = new ImportRunner({
    metadata: null,
    config: TEST_CONFIG,
    sleep: async () => {},
    ...overrides,
    catalog,
    jobStore,
  });
  return { runner, catalog, jobStore };
}

const tempDirs: string[] = [];

export async function writeTempFile(name: string, content: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "shelf-import-"));
  tempDirs.push(dir);
  const path = join(dir, name);
  await writeFile(path, content, "utf-8");
  return path;
}

export async function removeTempFiles(): Promise<void> {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
}

export function makeJob(overrides: Partial<ImportJob> = {}): ImportJob {
  return {
    id: "job-1",
    owner: "reader-a",
    kind: "book_import",
    status: "running",
    total: 0,
    processed: 0,
    success: 0,
    merged: 0,
    errors: 0,
    skipped: 0,
    currentBook: null,
    activity: [],
    errorLog: [],
    sourcePath: "/tmp/upload.csv",
    sourceFilename: "upload.csv",
    format: "unknown",
    confidence: 0,
    fieldMapping: [],
    defaultReadingStatus: "library_only",
    createdAt: "2024-01-01T00:00:00.000Z",
    updatedAt: "2024-01-01T00:00:00.000Z",
    startedAt: null,
    finishedAt: null,
    failureReason: null,
    reconciliation: null,
    ...overrides,
  };
}

export function makeTemplate(overrides: Partial<MappingTemplate> = {}): MappingTemplate {
  return {
    id: "tpl-1",
    owner: "reader-a",
    name: "Shelf spreadsheet",
    description: null,
    sourceFormat: "unknown",
    headers: ["Book", "Writer", "Code"],
    mapping: [
      { column: "Book", token: "title" },
      { column: "Writer", token: "author" },
      { column: "Code", token: "isbn" },
    ],
    timesUsed: 0,
    lastUsedAt: null,
    createdAt: "2024-01-01T00:00:00.000Z",
    updatedAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}
