import { stringify } from "csv-stringify/sync";
import type { ImportJob } from "@/lib/jobs/types";
import { normalizeIsbn } from "@/lib/util/isbn";

export const ERROR_REPORT_COLUMNS = [
  "Row",
  "Error Type",
  "Message",
  "ISBN",
  "Normalized ISBN",
  "Title",
  "Author",
  "Source File",
  "Raw Row",
] as const;

/**
 * Render a job's retained error log as a downloadable CSV
 */
export function renderErrorReport(job: ImportJob): string {
  const records = job.errorLog.map((entry) => [
    entry.row === null ? "" : String(entry.row),
    entry.type,
    entry.message,
    entry.isbn ?? "",
    normalizeIsbn(entry.isbn)?.isbn13 ?? "",
    entry.title ?? "",
    entry.author ?? "",
    job.sourceFilename,
    entry.rawRow ? JSON.stringify(entry.rawRow) : "",
  ]);

  return stringify([[...ERROR_REPORT_COLUMNS], ...records]);
}
