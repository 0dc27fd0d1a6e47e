/**
 * Runtime schema for persisted job documents
 */

import { z } from "zod";
import { fieldTokenSchema } from "@/lib/ingest/formats";
import { READING_STATUSES } from "@/lib/ingest/types";

const errorTypeSchema = z.enum(["validation_error", "lookup_failed", "add_failed", "duplicate_merge_failed", "exception"]);

export const bookResolutionSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("match"), bookId: z.string() }),
  z.object({
    action: z.literal("create"),
    title: z.string(),
    author: z.string().optional(),
    isbn: z.string().optional(),
    externalIsbn: z.string().optional(),
  }),
  z.object({ action: z.literal("skip") }),
  z.object({ action: z.literal("bookless") }),
]);

const groupSchema = z.object({
  key: z.string(),
  bookName: z.string().nullable(),
  entries: z.array(
    z.object({
      rowNumber: z.number(),
      date: z.string(),
      pages: z.number(),
      minutes: z.number(),
      rawRow: z.record(z.string(), z.string()).nullable().default(null),
    })
  ),
  resolution: bookResolutionSchema.nullable(),
});

const pendingSchema = z.object({
  groupKey: z.string(),
  bookName: z.string(),
  entryCount: z.number(),
  firstDate: z.string(),
  lastDate: z.string(),
  candidates: z.array(
    z.object({
      source: z.enum(["catalog", "external"]),
      bookId: z.string().nullable(),
      title: z.string(),
      authors: z.array(z.string()),
      isbn13: z.string().nullable(),
    })
  ),
});

export const importJobSchema = z.object({
  id: z.string(),
  owner: z.string(),
  kind: z.enum(["book_import", "reading_history_import"]),
  status: z.enum([
    "pending",
    "running",
    "analyzing",
    "needs_book_matching",
    "processing",
    "completed",
    "completed_with_errors",
    "failed",
    "cancelled",
  ]),
  total: z.number(),
  processed: z.number(),
  success: z.number(),
  merged: z.number(),
  errors: z.number(),
  skipped: z.number(),
  currentBook: z.string().nullable(),
  activity: z.array(z.object({ at: z.string(), message: z.string() })),
  errorLog: z.array(
    z.object({
      at: z.string(),
      row: z.number().nullable(),
      type: errorTypeSchema,
      message: z.string(),
      isbn: z.string().nullable(),
      title: z.string().nullable(),
      author: z.string().nullable(),
      rawRow: z.record(z.string(), z.string()).nullable(),
    })
  ),
  sourcePath: z.string(),
  sourceFilename: z.string(),
  format: z.enum(["goodreads", "storygraph", "reading_history", "isbn_list", "unknown"]),
  confidence: z.number(),
  fieldMapping: z.array(z.object({ column: z.string(), token: fieldTokenSchema })),
  defaultReadingStatus: z.enum(READING_STATUSES),
  createdAt: z.string(),
  updatedAt: z.string(),
  startedAt: z.string().nullable(),
  finishedAt: z.string().nullable(),
  failureReason: z.string().nullable(),
  reconciliation: z
    .object({
      groups: z.array(groupSchema),
      pending: z.array(pendingSchema),
      validationErrors: z.number(),
    })
    .nullable(),
});
