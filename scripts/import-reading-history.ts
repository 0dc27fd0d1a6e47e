#!/usr/bin/env tsx
/**
 * Import dated reading sessions (date, book name, pages, minutes)
 *
 * Usage:
 *   npm run import:reading-history -- --user me --csv ./data/reading.csv
 *   npm run import:reading-history -- --user me --csv ./data/reading.csv --matches ./matches.json
 *   npm run import:reading-history -- --user me --csv ./data/reading.csv --create-missing
 *
 * Without --matches or --create-missing, unmatched book names are listed and
 * the job is cancelled.
 */

// Load .env BEFORE other imports that may use process.env
import "dotenv/config";

import { parseArgs } from "util";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { z } from "zod";
import { closePool } from "@/lib/db/pool";
import { createImportRunner } from "@/lib/ingest/runtime";
import type { BookResolution } from "@/lib/ingest/types";
import { bookResolutionSchema } from "@/lib/jobs/schema";
import type { PendingMatch } from "@/lib/jobs/types";
import { logger } from "@/lib/util/logger";

const { values } = parseArgs({
  options: {
    user: { type: "string", default: "me" },
    csv: { type: "string" },
    matches: { type: "string" },
    "create-missing": { type: "boolean", default: false },
    "no-enrich": { type: "boolean", default: false },
  },
});

const matchesFileSchema = z.record(z.string(), bookResolutionSchema);

async function loadResolutions(pending: PendingMatch[]): Promise<Record<string, BookResolution> | null> {
  if (values.matches) {
    return matchesFileSchema.parse(JSON.parse(await readFile(values.matches, "utf-8")));
  }
  if (values["create-missing"]) {
    return Object.fromEntries(
      pending.map((match): [string, BookResolution] => [match.groupKey, { action: "create", title: match.bookName }])
    );
  }
  return null;
}

async function main() {
  const owner = values.user ?? "me";
  const csvPath = values.csv;

  if (!csvPath || !existsSync(csvPath)) {
    logger.error(`CSV file not found: ${csvPath ?? "(none given)"}`);
    process.exit(1);
  }

  const runner = createImportRunner({ enrich: !values["no-enrich"], deleteSourceFiles: false });
  const { jobId } = await runner.startReadingHistoryImport({ owner, filePath: csvPath });
  await runner.settled(owner, jobId);

  let job = await runner.getJob(owner, jobId);
  if (job?.status === "needs_book_matching" && job.reconciliation) {
    const pending = job.reconciliation.pending;
    const resolutions = await loadResolutions(pending);

    if (!resolutions) {
      for (const match of pending) {
        logger.info("Unmatched book", {
          groupKey: match.groupKey,
          bookName: match.bookName,
          sessions: match.entryCount,
          candidates: match.candidates.map((c) => `${c.title} (${c.bookId ?? c.isbn13 ?? "external"})`),
        });
      }
      await runner.cancel(owner, jobId);
      logger.warn("Book matches needed; rerun with --matches or --create-missing", { pending: pending.length });
      return;
    }

    await runner.submitBookMatches(owner, jobId, resolutions);
    await runner.settled(owner, jobId);
    job = await runner.getJob(owner, jobId);
  }

  if (!job) throw new Error(`Job ${jobId} disappeared`);
  logger.info("Reading history import complete", {
    status: job.status,
    total: job.total,
    logged: job.success,
    errors: job.errors,
    skipped: job.skipped,
  });
  if (job.errors > 0 || job.skipped > 0) {
    process.stdout.write(await runner.renderErrorReport(owner, jobId));
  }
}

main()
  .then(() => closePool())
  .catch((error) => {
    logger.error("Import failed", { error: String(error) });
    process.exit(1);
  });
