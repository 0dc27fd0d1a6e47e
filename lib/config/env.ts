import { z } from "zod";
import { config } from "dotenv";

// Load .env file for CLI scripts
config();

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalPositiveInt = z.preprocess(
  blankToUndefined,
  z.coerce.number().int().positive().optional()
);

const envSchema = z.object({
  // Database (only the pg-backed catalog and job store need it)
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  PGPOOL_MIN: z.coerce.number().int().positive().default(2),
  PGPOOL_MAX: z.coerce.number().int().positive().default(20),

  // Metadata providers
  GOOGLE_BOOKS_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),

  // Import job telemetry
  IMPORT_ACTIVITY_LOG_CAP: z.coerce.number().int().positive().default(25),
  IMPORT_ERROR_LOG_CAP: z.coerce.number().int().positive().default(200),
  IMPORT_PROGRESS_INTERVAL_MS: z.coerce.number().int().nonnegative().default(350),

  // Enrichment pool
  ENRICH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  ENRICH_JITTER_MIN_MS: z.coerce.number().int().nonnegative().default(50),
  ENRICH_JITTER_MAX_MS: z.coerce.number().int().nonnegative().default(250),

  // System-level reading history defaults
  READING_DEFAULT_PAGES: optionalPositiveInt,
  READING_DEFAULT_MINUTES: optionalPositiveInt,
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) return cachedEnv;

  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}

/**
 * Tunables for the import pipeline
 */
export interface ImportConfig {
  activityLogCap: number;
  errorLogCap: number;
  progressIntervalMs: number;
  enrichConcurrency: number;
  enrichJitterMinMs: number;
  enrichJitterMaxMs: number;
  readingDefaultPages?: number;
  readingDefaultMinutes?: number;
}

/**
 * Build the import config from the environment, with explicit overrides on top
 */
export function getImportConfig(overrides: Partial<ImportConfig> = {}): ImportConfig {
  const env = getEnv();
  const merged: ImportConfig = {
    activityLogCap: env.IMPORT_ACTIVITY_LOG_CAP,
    errorLogCap: env.IMPORT_ERROR_LOG_CAP,
    progressIntervalMs: env.IMPORT_PROGRESS_INTERVAL_MS,
    enrichConcurrency: env.ENRICH_CONCURRENCY,
    enrichJitterMinMs: env.ENRICH_JITTER_MIN_MS,
    enrichJitterMaxMs: env.ENRICH_JITTER_MAX_MS,
    readingDefaultPages: env.READING_DEFAULT_PAGES,
    readingDefaultMinutes: env.READING_DEFAULT_MINUTES,
    ...overrides,
  };

  if (merged.enrichJitterMaxMs < merged.enrichJitterMinMs) {
    throw new Error("ENRICH_JITTER_MAX_MS must not be below ENRICH_JITTER_MIN_MS");
  }
  return merged;
}

/**
 * Check if Google Books API is configured
 */
export function hasGoogleBooks(): boolean {
  return !!getEnv().GOOGLE_BOOKS_API_KEY;
}
