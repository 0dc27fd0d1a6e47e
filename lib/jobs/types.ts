import type {
  BookResolution,
  FieldMapping,
  ImportErrorType,
  ImportFormat,
  ReadingStatus,
} from "@/lib/ingest/types";

export type JobKind = "book_import" | "reading_history_import";

export type JobStatus =
  | "pending"
  | "running"
  | "analyzing"
  | "needs_book_matching"
  | "processing"
  | "completed"
  | "completed_with_errors"
  | "failed"
  | "cancelled";

export interface JobCounters {
  processed: number;
  success: number;
  merged: number;
  errors: number;
  skipped: number;
}

export interface ActivityEntry {
  at: string;
  message: string;
}

export interface ErrorLogEntry {
  at: string;
  row: number | null;
  type: ImportErrorType;
  message: string;
  isbn: string | null;
  title: string | null;
  author: string | null;
  rawRow: Record<string, string> | null;
}

export interface ReadingEntryDraft {
  rowNumber: number;
  date: string;
  pages: number;
  minutes: number;
  /** Source cells, kept for the error report */
  rawRow: Record<string, string> | null;
}

export interface ReadingHistoryGroup {
  key: string;
  /** null for the bookless group */
  bookName: string | null;
  entries: ReadingEntryDraft[];
  resolution: BookResolution | null;
}

export interface MatchCandidate {
  source: "catalog" | "external";
  bookId: string | null;
  title: string;
  authors: string[];
  isbn13: string | null;
}

export interface PendingMatch {
  groupKey: string;
  bookName: string;
  entryCount: number;
  firstDate: string;
  lastDate: string;
  candidates: MatchCandidate[];
}

export interface ReconciliationState {
  groups: ReadingHistoryGroup[];
  pending: PendingMatch[];
  validationErrors: number;
}

export interface ImportJob extends JobCounters {
  id: string;
  owner: string;
  kind: JobKind;
  status: JobStatus;
  total: number;
  currentBook: string | null;
  activity: ActivityEntry[];
  errorLog: ErrorLogEntry[];
  sourcePath: string;
  sourceFilename: string;
  format: ImportFormat;
  confidence: number;
  fieldMapping: FieldMapping;
  defaultReadingStatus: ReadingStatus;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  failureReason: string | null;
  reconciliation: ReconciliationState | null;
}

export type JobUpdate = Partial<Omit<ImportJob, "id" | "owner" | "kind" | "createdAt">>;

/**
 * Owner-isolated persistence for import job state documents
 */
export interface JobStore {
  create(owner: string, id: string, job: ImportJob): Promise<void>;
  get(owner: string, id: string): Promise<ImportJob | null>;
  update(owner: string, id: string, partial: JobUpdate): Promise<boolean>;
  listForOwner(owner: string): Promise<ImportJob[]>;
}

export interface JobRef {
  owner: string;
  id: string;
}
