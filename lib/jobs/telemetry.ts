/**
 * Progress and error telemetry for a running import job.
 *
 * Activity and error logs are fixed-capacity (oldest entries dropped). Updates
 * that only report success are throttled; anything else is written through at
 * once together with whatever was pending.
 */

import type {
  ActivityEntry,
  ErrorLogEntry,
  ImportJob,
  JobCounters,
  JobStore,
  JobUpdate,
} from "@/lib/jobs/types";
import { logger } from "@/lib/util/logger";

export interface TelemetryOptions {
  activityLogCap: number;
  errorLogCap: number;
  progressIntervalMs: number;
  /** Monotonic-ish clock in ms, injectable for tests */
  now?: () => number;
}

export type ErrorInput = Omit<ErrorLogEntry, "at">;

export interface ProgressUpdate {
  counters: JobCounters;
  currentBook?: string | null;
  activity?: string;
  error?: ErrorInput;
  /** Bypass the throttle (any non-success outcome) */
  urgent?: boolean;
}

/**
 * Append to a bounded log, dropping the oldest entries beyond the cap
 */
export function appendBounded<T>(log: T[], entry: T, cap: number): T[] {
  log.push(entry);
  if (log.length > cap) {
    log.splice(0, log.length - cap);
  }
  return log;
}

export class ProgressEmitter {
  private readonly activity: ActivityEntry[];
  private readonly errorLog: ErrorLogEntry[];
  private counters: JobCounters;
  private currentBook: string | null;
  private lastEmit = Number.NEGATIVE_INFINITY;
  private readonly now: () => number;

  constructor(
    private readonly store: JobStore,
    private readonly job: Pick<ImportJob, "id" | "owner" | "activity" | "errorLog" | "currentBook"> &
      JobCounters,
    private readonly options: TelemetryOptions
  ) {
    this.now = options.now ?? Date.now;
    this.activity = [...job.activity].slice(-options.activityLogCap);
    this.errorLog = [...job.errorLog].slice(-options.errorLogCap);
    this.counters = {
      processed: job.processed,
      success: job.success,
      merged: job.merged,
      errors: job.errors,
      skipped: job.skipped,
    };
    this.currentBook = job.currentBook;
  }

  /**
   * Record one outcome. Returns true when the update was written to the store.
   */
  async update(progress: ProgressUpdate): Promise<boolean> {
    const at = new Date(this.now()).toISOString();
    this.counters = { ...progress.counters };
    if (progress.currentBook !== undefined) {
      this.currentBook = progress.currentBook;
    }
    if (progress.activity) {
      appendBounded(this.activity, { at, message: progress.activity }, this.options.activityLogCap);
    }
    if (progress.error) {
      appendBounded(this.errorLog, { at, ...progress.error }, this.options.errorLogCap);
    }

    const urgent = progress.urgent === true || progress.error !== undefined;
    if (!urgent && this.now() - this.lastEmit < this.options.progressIntervalMs) {
      return false;
    }
    await this.emit();
    return true;
  }

  /**
   * Write everything pending, plus any extra fields (status transitions)
   */
  async flush(extra: JobUpdate = {}): Promise<boolean> {
    return this.emit(extra);
  }

  private async emit(extra: JobUpdate = {}): Promise<boolean> {
    this.lastEmit = this.now();
    const written = await this.store.update(this.job.owner, this.job.id, {
      ...this.counters,
      currentBook: this.currentBook,
      activity: [...this.activity],
      errorLog: [...this.errorLog],
      ...extra,
    });
    if (!written) {
      logger.warn("Progress update for unknown job", { jobId: this.job.id });
    }
    return written;
  }
}
