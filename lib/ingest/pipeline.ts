/**
 * Import runner
 *
 * Entry point for book and reading-history imports. Each start call creates
 * a job and returns at once; a detached task does the work while callers
 * poll the job store. Jobs are sequential inside (except enrichment) and
 * independent of each other.
 */

import { randomUUID } from "crypto";
import { rm } from "fs/promises";
import type { ImportConfig } from "@/lib/config/env";
import type { Catalog, OwnerSettings } from "@/lib/catalog/types";
import { buildCandidate } from "@/lib/ingest/candidate";
import { readAllRows, type RowLayout } from "@/lib/ingest/csv";
import { ENRICHMENT_FIELD_TOKENS, ensureCustomFields } from "@/lib/ingest/customFields";
import {
  buildMapping,
  detectFile,
  mappedTokens,
  validateMapping,
  type TemplateDetectionOptions,
  type TemplatedDetection,
} from "@/lib/ingest/detect";
import { enrichIdentifiers } from "@/lib/ingest/enrich";
import { renderErrorReport } from "@/lib/ingest/errorReport";
import { ImportFormatError, ImportStateError, JobNotFoundError, MappingError } from "@/lib/ingest/errors";
import {
  analyzeReadingHistory,
  applyResolutions,
  finalizeReadingHistory,
  matchGroups,
} from "@/lib/ingest/readingHistory";
import { resolveRow } from "@/lib/ingest/resolve";
import type {
  BookResolution,
  DetectionResult,
  FieldMapping,
  ImportFormat,
  FieldToken,
  MetadataIndex,
  MetadataProvider,
  ReadingStatus,
} from "@/lib/ingest/types";
import { ProgressEmitter } from "@/lib/jobs/telemetry";
import type {
  ImportJob,
  JobCounters,
  JobKind,
  JobRef,
  JobStatus,
  JobStore,
  ReadingHistoryGroup,
} from "@/lib/jobs/types";
import type { MappingTemplate, MappingTemplateStore } from "@/lib/templates/types";
import { createTimer, errorMessage, logger as rootLogger, type Logger } from "@/lib/util/logger";

export interface ImportRunnerDeps {
  jobStore: JobStore;
  catalog: Catalog;
  /** null disables enrichment and external match candidates */
  metadata: MetadataProvider | null;
  config: ImportConfig;
  settings?: OwnerSettings;
  logger?: Logger;
  /** Clock in ms for progress throttling */
  now?: () => number;
  /** Delay used between enrichment requests */
  sleep?: (ms: number) => Promise<void>;
  /** Remove the uploaded file once a job finishes (default true) */
  deleteSourceFiles?: boolean;
  /** Saved mappings; without a store only detection and explicit mappings apply */
  templates?: MappingTemplateStore;
}

export interface StartImportOptions {
  owner: string;
  filePath: string;
  filename?: string;
  mapping?: ReadonlyArray<{ column: string; token: string }>;
  /** Saved template to map with; ignored when a mapping is given */
  templateId?: string;
}

export interface StartBookImportOptions extends StartImportOptions {
  defaultReadingStatus?: ReadingStatus;
  enrich?: boolean;
}

export interface StartedImport {
  jobId: string;
  detection: TemplatedDetection;
  mapping: FieldMapping;
}

export interface SaveTemplateInput {
  name: string;
  description?: string;
  /** Header row the mapping was built for */
  headers: string[];
  mapping: ReadonlyArray<{ column: string; token: string }>;
  sourceFormat?: ImportFormat;
}

const MAX_TEMPLATE_NAME = 100;

const DEFAULT_READING_STATUS: ReadingStatus = "library_only";

const BOOK_KEY_FIELDS: readonly FieldToken[] = ["title", "isbn", "isbn10", "isbn13"];

function hasBookKey(mapping: FieldMapping): boolean {
  const tokens = mappedTokens(mapping);
  return BOOK_KEY_FIELDS.some((field) => tokens.has(field));
}

function hasLogDate(mapping: FieldMapping): boolean {
  return mappedTokens(mapping).has("log_date");
}

function zeroCounters(): JobCounters {
  return { processed: 0, success: 0, merged: 0, errors: 0, skipped: 0 };
}

function finalStatus(counters: JobCounters): JobStatus {
  return counters.errors > 0 ? "completed_with_errors" : "completed";
}

function taskKey(ref: JobRef): string {
  return `${ref.owner}:${ref.id}`;
}

export class ImportRunner {
  private readonly tasks = new Map<string, Promise<void>>();
  private readonly controllers = new Map<string, AbortController>();
  /** Jobs with a match submission or cancellation in flight, or finalizing */
  private readonly claimed = new Set<string>();
  /** Cancellations that arrived while a match submission held the claim */
  private readonly cancelRequests = new Set<string>();
  /** Jobs whose needs_book_matching status is being stored */
  private readonly parking = new Map<string, Promise<void>>();
  private readonly log: Logger;

  constructor(private readonly deps: ImportRunnerDeps) {
    this.log = deps.logger ?? rootLogger.child({ component: "import" });
  }

  /**
   * Detect format and propose a mapping without creating a job. With an
   * owner, their saved templates are tried before the keyword tables.
   */
  async previewImport(filePath: string, owner?: string): Promise<TemplatedDetection> {
    const templates = owner && this.deps.templates ? await this.deps.templates.listForOwner(owner) : [];
    return detectFile(filePath, { templates });
  }

  async startBookImport(options: StartBookImportOptions): Promise<StartedImport> {
    const detection = await this.detect(options, hasBookKey);
    const mapping = options.mapping ? validateMapping(options.mapping, detection.headers) : detection.mapping;
    if (!hasBookKey(mapping)) {
      throw new ImportFormatError("The mapping needs a title or ISBN column");
    }

    await this.recordTemplateUse(options.owner, detection);
    const job = this.newJob("book_import", options, detection, mapping, "pending");
    job.defaultReadingStatus = options.defaultReadingStatus ?? DEFAULT_READING_STATUS;
    await this.deps.jobStore.create(job.owner, job.id, job);

    const layout: RowLayout = detection;
    const enrich = options.enrich ?? true;
    this.launch(job, (signal) => this.runBookImport(job, layout, enrich, signal));

    this.log.info("Book import started", { jobId: job.id, owner: job.owner, format: detection.format });
    return { jobId: job.id, detection, mapping };
  }

  async startReadingHistoryImport(options: StartImportOptions): Promise<StartedImport> {
    const detection = await this.detect(options, hasLogDate);
    let mapping: FieldMapping;
    if (options.mapping) {
      mapping = validateMapping(options.mapping, detection.headers);
    } else if (detection.template || detection.format === "reading_history") {
      mapping = detection.mapping;
    } else {
      mapping = buildMapping("reading_history", detection.headers);
    }
    if (!hasLogDate(mapping)) {
      throw new ImportFormatError("Reading history files need a date column");
    }

    await this.recordTemplateUse(options.owner, detection);
    const job = this.newJob("reading_history_import", options, detection, mapping, "analyzing");
    await this.deps.jobStore.create(job.owner, job.id, job);

    const layout: RowLayout = detection;
    this.launch(job, (signal) => this.runAnalysis(job, layout, signal));

    this.log.info("Reading history import started", { jobId: job.id, owner: job.owner });
    return { jobId: job.id, detection, mapping };
  }

  /**
   * Supply book resolutions for a job blocked in needs_book_matching.
   * Accepted once; the job then moves on to processing.
   */
  async submitBookMatches(
    owner: string,
    jobId: string,
    resolutions: Record<string, BookResolution>
  ): Promise<void> {
    const key = taskKey({ owner, id: jobId });
    const parked = this.parking.get(key);
    if (parked) await parked;
    if (this.claimed.has(key)) {
      throw new ImportStateError("Book matches were already submitted for this job", "processing");
    }
    this.claimed.add(key);

    try {
      const job = await this.requireJob(owner, jobId);
      if (job.status !== "needs_book_matching" || !job.reconciliation) {
        throw new ImportStateError(`Job is ${job.status}, not waiting for book matches`, job.status);
      }

      const groups = await applyResolutions(
        job.reconciliation.groups,
        job.reconciliation.pending,
        resolutions,
        this.deps.catalog,
        owner
      );
      const reconciliation = { ...job.reconciliation, groups, pending: [] };
      await this.deps.jobStore.update(owner, jobId, { status: "processing", reconciliation });

      const resumed: ImportJob = { ...job, status: "processing", reconciliation };
      this.launch(resumed, (signal) => this.runFinalization(resumed, groups, signal));
    } catch (error) {
      this.claimed.delete(key);
      if (this.cancelRequests.delete(key)) {
        await this.cancel(owner, jobId);
      }
      throw error;
    }
  }

  /**
   * Request cancellation. Running jobs stop at the next row boundary; a job
   * blocked on book matching is cancelled at once.
   */
  async cancel(owner: string, jobId: string): Promise<boolean> {
    const key = taskKey({ owner, id: jobId });
    const parked = this.parking.get(key);
    if (parked) await parked;
    const controller = this.controllers.get(key);
    if (this.claimed.has(key)) {
      // honoured by whoever holds the claim once it lets go
      this.cancelRequests.add(key);
      controller?.abort();
      return true;
    }
    if (controller) {
      controller.abort();
      return true;
    }

    this.claimed.add(key);
    try {
      const job = await this.deps.jobStore.get(owner, jobId);
      if (job?.status !== "needs_book_matching") return false;
      await this.deps.jobStore.update(owner, jobId, {
        status: "cancelled",
        finishedAt: new Date().toISOString(),
        reconciliation: null,
      });
      await this.removeSource(job);
      return true;
    } finally {
      this.claimed.delete(key);
      this.cancelRequests.delete(key);
    }
  }

  async getJob(owner: string, jobId: string): Promise<ImportJob | null> {
    return this.deps.jobStore.get(owner, jobId);
  }

  async listJobs(owner: string): Promise<ImportJob[]> {
    return this.deps.jobStore.listForOwner(owner);
  }

  async renderErrorReport(owner: string, jobId: string): Promise<string> {
    return renderErrorReport(await this.requireJob(owner, jobId));
  }

  /**
   * Resolves when the job's current background task has ended
   */
  async settled(owner: string, jobId: string): Promise<void> {
    await this.tasks.get(taskKey({ owner, id: jobId }));
  }

  /**
   * Save a mapping for reuse on files with similar headers
   */
  async saveMappingTemplate(owner: string, input: SaveTemplateInput): Promise<MappingTemplate> {
    const store = this.requireTemplates();
    const name = input.name.trim();
    if (name.length === 0 || name.length > MAX_TEMPLATE_NAME) {
      throw new MappingError(`Template names need 1 to ${MAX_TEMPLATE_NAME} characters`);
    }
    const mapping = validateMapping(input.mapping, input.headers);
    if (mapping.length === 0) {
      throw new MappingError("A template needs at least one mapped column");
    }

    const now = new Date().toISOString();
    const template: MappingTemplate = {
      id: randomUUID(),
      owner,
      name,
      description: input.description?.trim() || null,
      sourceFormat: input.sourceFormat ?? "unknown",
      headers: [...input.headers],
      mapping,
      timesUsed: 0,
      lastUsedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    await store.create(template);
    this.log.info("Mapping template saved", { owner, templateId: template.id, columns: mapping.length });
    return template;
  }

  async listMappingTemplates(owner: string): Promise<MappingTemplate[]> {
    return this.requireTemplates().listForOwner(owner);
  }

  async deleteMappingTemplate(owner: string, templateId: string): Promise<boolean> {
    return this.requireTemplates().delete(owner, templateId);
  }

  private requireTemplates(): MappingTemplateStore {
    if (!this.deps.templates) throw new Error("No mapping template store is configured");
    return this.deps.templates;
  }

  /**
   * Explicit mappings skip templates; a named template is applied as is;
   * otherwise the best saved template usable for the job kind is tried
   */
  private async detect(
    options: StartImportOptions,
    usable: (mapping: FieldMapping) => boolean
  ): Promise<TemplatedDetection> {
    const store = this.deps.templates;
    let detectOptions: TemplateDetectionOptions = {};
    if (!options.mapping && options.templateId) {
      const template = await this.requireTemplates().get(options.owner, options.templateId);
      if (!template) throw new MappingError(`Unknown mapping template: ${options.templateId}`);
      detectOptions = { template };
    } else if (!options.mapping && store) {
      const templates = await store.listForOwner(options.owner);
      detectOptions = { templates: templates.filter((template) => usable(template.mapping)) };
    }
    return detectFile(options.filePath, detectOptions);
  }

  private async recordTemplateUse(owner: string, detection: TemplatedDetection): Promise<void> {
    if (!detection.template || !this.deps.templates) return;
    await this.deps.templates.recordUse(owner, detection.template.id, new Date().toISOString());
  }

  private async requireJob(owner: string, jobId: string): Promise<ImportJob> {
    const job = await this.deps.jobStore.get(owner, jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  private newJob(
    kind: JobKind,
    options: StartImportOptions,
    detection: DetectionResult,
    mapping: FieldMapping,
    status: JobStatus
  ): ImportJob {
    const now = new Date().toISOString();
    return {
      id: randomUUID(),
      owner: options.owner,
      kind,
      status,
      total: 0,
      ...zeroCounters(),
      currentBook: null,
      activity: [],
      errorLog: [],
      sourcePath: options.filePath,
      sourceFilename: options.filename ?? options.filePath.split(/[\\/]/).pop() ?? options.filePath,
      format: detection.format,
      confidence: detection.confidence,
      fieldMapping: mapping,
      defaultReadingStatus: DEFAULT_READING_STATUS,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      finishedAt: null,
      failureReason: null,
      reconciliation: null,
    };
  }

  private launch(job: ImportJob, work: (signal: AbortSignal) => Promise<void>) {
    const key = taskKey(job);
    const controller = new AbortController();
    this.controllers.set(key, controller);
    if (this.cancelRequests.delete(key)) {
      controller.abort();
    }

    const task = work(controller.signal)
      .catch((error: unknown) => this.fail(job, error))
      .finally(() => this.release(key, controller));
    this.tasks.set(key, task);
  }

  /**
   * Detach a job that will wait for book matches once its waiting status is
   * stored. Submissions and cancellations arriving meanwhile wait for it.
   */
  private park(job: JobRef, stored: Promise<unknown>): Promise<void> {
    const key = taskKey(job);
    const parked = stored
      .then(() => {
        this.tasks.delete(key);
        this.controllers.delete(key);
      })
      .finally(() => this.parking.delete(key));
    this.parking.set(key, parked);
    return parked;
  }

  /** Drop a task's bookkeeping unless a later task for the job has replaced it */
  private release(key: string, controller: AbortController) {
    if (this.controllers.get(key) !== controller) return;
    this.tasks.delete(key);
    this.controllers.delete(key);
    this.claimed.delete(key);
    this.cancelRequests.delete(key);
  }

  private emitterFor(job: ImportJob): ProgressEmitter {
    const { config } = this.deps;
    return new ProgressEmitter(this.deps.jobStore, job, {
      activityLogCap: config.activityLogCap,
      errorLogCap: config.errorLogCap,
      progressIntervalMs: config.progressIntervalMs,
      now: this.deps.now,
    });
  }

  private async runBookImport(job: ImportJob, layout: RowLayout, enrich: boolean, signal: AbortSignal) {
    const { catalog, jobStore, metadata, config } = this.deps;
    const log = this.log.child({ jobId: job.id, owner: job.owner });
    const timer = createTimer("Book import", log);

    await jobStore.update(job.owner, job.id, { status: "running", startedAt: new Date().toISOString() });

    const rows = await readAllRows(job.sourcePath, layout);
    await jobStore.update(job.owner, job.id, { total: rows.length });

    const enriching = enrich && metadata !== null;
    await ensureCustomFields(catalog, job.owner, job.fieldMapping, {
      extraTokens: enriching ? ENRICHMENT_FIELD_TOKENS : [],
      sampleRows: rows,
      log,
    });

    let index: MetadataIndex = new Map();
    if (enriching) {
      const identifiers = rows
        .map((row) => buildCandidate(row, job.fieldMapping).rawIdentifier)
        .filter((value): value is string => value !== null);
      const result = await enrichIdentifiers(identifiers, metadata, {
        maxConcurrency: config.enrichConcurrency,
        jitterMinMs: config.enrichJitterMinMs,
        jitterMaxMs: config.enrichJitterMaxMs,
        sleep: this.deps.sleep,
        logger: log,
      });
      index = result.index;
      log.info("Enrichment finished", { ...result.stats });
    }

    const progress = this.emitterFor(job);
    const counters = zeroCounters();
    const ctx = {
      catalog,
      owner: job.owner,
      mapping: job.fieldMapping,
      metadata: index,
      defaultReadingStatus: job.defaultReadingStatus,
    };

    for (const row of rows) {
      if (signal.aborted) {
        await progress.flush({ status: "cancelled", finishedAt: new Date().toISOString(), currentBook: null });
        log.info("Book import cancelled", { ...counters });
        await this.removeSource(job);
        return;
      }

      const { outcome } = await resolveRow(row, ctx);
      counters.processed++;

      switch (outcome.kind) {
        case "success":
          counters.success++;
          await progress.update({ counters, currentBook: outcome.title, activity: `Added "${outcome.title}"` });
          break;
        case "merged":
          counters.merged++;
          await progress.update({
            counters,
            currentBook: outcome.title,
            activity: outcome.changed
              ? `Merged into existing "${outcome.title}"`
              : `Already in library: "${outcome.title}"`,
            urgent: true,
          });
          break;
        case "skipped":
          counters.skipped++;
          await progress.update({ counters, activity: `Skipped: ${outcome.reason}`, urgent: true });
          break;
        case "error":
          counters.errors++;
          log.debug("Row failed", { row: row.rowNumber, type: outcome.errorType, error: outcome.message });
          await progress.update({
            counters,
            currentBook: outcome.title,
            error: {
              row: row.rowNumber,
              type: outcome.errorType,
              message: outcome.message,
              isbn: outcome.isbn,
              title: outcome.title,
              author: outcome.author,
              rawRow: row.values,
            },
          });
          break;
      }
    }

    const status = finalStatus(counters);
    await progress.flush({ status, finishedAt: new Date().toISOString(), currentBook: null });
    timer.end({ ...counters, status });
    log.info("Book import finished", { ...counters, status });
    await this.removeSource(job);
  }

  private async runAnalysis(job: ImportJob, layout: RowLayout, signal: AbortSignal) {
    const { catalog, jobStore, metadata, settings, config } = this.deps;
    const log = this.log.child({ jobId: job.id, owner: job.owner });

    await jobStore.update(job.owner, job.id, { startedAt: new Date().toISOString() });
    const rows = await readAllRows(job.sourcePath, layout);
    await jobStore.update(job.owner, job.id, { total: rows.length });

    const ownerDefaults = settings ? await settings.getReadingDefaults(job.owner) : {};
    const analysis = analyzeReadingHistory(rows, job.fieldMapping, {
      owner: ownerDefaults,
      system: { pages: config.readingDefaultPages, minutes: config.readingDefaultMinutes },
    });

    const progress = this.emitterFor(job);
    const counters = zeroCounters();
    for (const invalid of analysis.invalid) {
      counters.processed++;
      counters.skipped++;
      await progress.update({
        counters,
        error: {
          row: invalid.rowNumber,
          type: "validation_error",
          message: invalid.message,
          isbn: null,
          title: invalid.bookName,
          author: null,
          rawRow: invalid.rawRow,
        },
      });
    }

    const pending = await matchGroups(analysis.groups, catalog, job.owner, metadata, log);
    const reconciliation = {
      groups: analysis.groups,
      pending,
      validationErrors: analysis.invalid.length,
    };

    if (signal.aborted) {
      await progress.flush({ status: "cancelled", finishedAt: new Date().toISOString() });
      await this.removeSource(job);
      return;
    }

    if (pending.length > 0) {
      await this.park(job, progress.flush({ status: "needs_book_matching", reconciliation, currentBook: null }));
      log.info("Reading history waiting for book matches", { pending: pending.length });
      return;
    }

    await progress.flush({ status: "running", reconciliation });
    await this.finalize({ ...job, ...counters, status: "running", reconciliation }, analysis.groups, progress, counters, signal);
  }

  private async runFinalization(job: ImportJob, groups: ReadingHistoryGroup[], signal: AbortSignal) {
    const counters: JobCounters = {
      processed: job.processed,
      success: job.success,
      merged: job.merged,
      errors: job.errors,
      skipped: job.skipped,
    };
    await this.finalize(job, groups, this.emitterFor(job), counters, signal);
  }

  private async finalize(
    job: ImportJob,
    groups: ReadingHistoryGroup[],
    progress: ProgressEmitter,
    counters: JobCounters,
    signal: AbortSignal
  ) {
    const log = this.log.child({ jobId: job.id, owner: job.owner });
    await progress.flush({ status: "processing" });

    const completed = await finalizeReadingHistory(groups, {
      catalog: this.deps.catalog,
      owner: job.owner,
      provider: this.deps.metadata,
      progress,
      counters,
      signal,
      log,
    });

    // Resolutions are consumed once; only the validation count is kept
    const reconciliation = {
      groups: [],
      pending: [],
      validationErrors: job.reconciliation?.validationErrors ?? 0,
    };
    const status: JobStatus = completed ? finalStatus(counters) : "cancelled";
    await progress.flush({ status, reconciliation, finishedAt: new Date().toISOString(), currentBook: null });
    log.info("Reading history import finished", { ...counters, status });
    await this.removeSource(job);
  }

  private async fail(job: ImportJob, error: unknown) {
    this.log.error("Import job failed", { jobId: job.id, owner: job.owner, error: String(error) });
    try {
      await this.deps.jobStore.update(job.owner, job.id, {
        status: "failed",
        failureReason: errorMessage(error),
        finishedAt: new Date().toISOString(),
        currentBook: null,
      });
    } catch (updateError) {
      this.log.error("Could not record job failure", { jobId: job.id, error: String(updateError) });
    }
    await this.removeSource(job);
  }

  private async removeSource(job: Pick<ImportJob, "id" | "sourcePath">) {
    if (this.deps.deleteSourceFiles === false) return;
    try {
      await rm(job.sourcePath, { force: true });
    } catch (error) {
      this.log.warn("Could not remove import file", { jobId: job.id, path: job.sourcePath, error: String(error) });
    }
  }
}
