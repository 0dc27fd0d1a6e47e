#!/usr/bin/env tsx
/**
 * Import a book list export (Goodreads, StoryGraph, ISBN list or any CSV)
 *
 * Usage:
 *   npm run import:books -- --user me --csv ./data/export.csv [--status plan_to_read] [--no-enrich]
 *     [--template <id>] [--save-template "My export"]
 */

// Load .env BEFORE other imports that may use process.env
import "dotenv/config";

import { parseArgs } from "util";
import { existsSync } from "fs";
import { closePool } from "@/lib/db/pool";
import { mapReadingStatus } from "@/lib/ingest/candidate";
import { createImportRunner } from "@/lib/ingest/runtime";
import { logger } from "@/lib/util/logger";

const { values } = parseArgs({
  options: {
    user: { type: "string", default: "me" },
    csv: { type: "string" },
    status: { type: "string" },
    "no-enrich": { type: "boolean", default: false },
    "dry-run": { type: "boolean", default: false },
    template: { type: "string" },
    "save-template": { type: "string" },
  },
});

async function main() {
  const owner = values.user ?? "me";
  const csvPath = values.csv;

  if (!csvPath || !existsSync(csvPath)) {
    logger.error(`CSV file not found: ${csvPath ?? "(none given)"}`);
    process.exit(1);
  }

  const defaultReadingStatus = values.status ? mapReadingStatus(values.status) : null;
  if (values.status && !defaultReadingStatus) {
    logger.error(`Unknown reading status: ${values.status}`);
    process.exit(1);
  }

  const enrich = !values["no-enrich"];
  const runner = createImportRunner({ enrich, deleteSourceFiles: false });

  if (values["dry-run"]) {
    const detection = await runner.previewImport(csvPath, owner);
    logger.info("Detected format", {
      format: detection.format,
      confidence: detection.confidence,
      template: detection.template,
      mapping: detection.mapping,
    });
    return;
  }

  logger.info("Starting book import", { owner, csvPath, enrich });
  const { jobId, detection, mapping } = await runner.startBookImport({
    owner,
    filePath: csvPath,
    defaultReadingStatus: defaultReadingStatus ?? undefined,
    enrich,
    templateId: values.template,
  });
  logger.info("Detected format", {
    jobId,
    format: detection.format,
    confidence: detection.confidence,
    template: detection.template?.name ?? null,
  });

  const templateName = values["save-template"];
  if (templateName) {
    const template = await runner.saveMappingTemplate(owner, {
      name: templateName,
      headers: detection.headers,
      mapping,
      sourceFormat: detection.format,
    });
    logger.info("Saved mapping template", { templateId: template.id, name: template.name });
  }

  await runner.settled(owner, jobId);
  const job = await runner.getJob(owner, jobId);
  if (!job) throw new Error(`Job ${jobId} disappeared`);

  logger.info("Import complete", {
    status: job.status,
    total: job.total,
    processed: job.processed,
    success: job.success,
    merged: job.merged,
    errors: job.errors,
    skipped: job.skipped,
  });
  if (job.errors > 0) {
    process.stdout.write(await runner.renderErrorReport(owner, jobId));
  }
}

main()
  .then(() => closePool())
  .catch((error) => {
    logger.error("Import failed", { error: String(error) });
    process.exit(1);
  });
