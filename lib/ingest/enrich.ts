/**
 * Metadata enrichment batcher
 *
 * Normalizes and de-duplicates every identifier in a file, then fetches
 * metadata once per edition through a bounded pool. Failures are per
 * identifier; the batch itself never rejects.
 */

import pLimit from "p-limit";
import type { MetadataIndex, MetadataProvider, MetadataRecord } from "@/lib/ingest/types";
import { normalizeIsbn, type NormalizedIsbn } from "@/lib/util/isbn";
import { createTimer, logger as rootLogger, type Logger } from "@/lib/util/logger";

export interface EnrichOptions {
  maxConcurrency: number;
  jitterMinMs: number;
  jitterMaxMs: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

export interface EnrichStats {
  requested: number;
  distinct: number;
  invalid: number;
  found: number;
  failed: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Normalize raw identifiers, dropping invalid ones and collapsing 10/13 pairs
 */
export function dedupeIdentifiers(raw: Iterable<string>): { distinct: NormalizedIsbn[]; invalid: number; requested: number } {
  const byIsbn13 = new Map<string, NormalizedIsbn>();
  let invalid = 0;
  let requested = 0;

  for (const value of raw) {
    if (!value.trim()) continue;
    requested++;
    const isbn = normalizeIsbn(value);
    if (!isbn) {
      invalid++;
      continue;
    }
    const existing = byIsbn13.get(isbn.isbn13);
    // Prefer querying by the 13-digit form when both were seen
    if (!existing || (existing.value.length === 10 && isbn.value.length === 13)) {
      byIsbn13.set(isbn.isbn13, isbn);
    }
  }

  return { distinct: [...byIsbn13.values()], invalid, requested };
}

function indexRecord(index: MetadataIndex, queried: NormalizedIsbn, record: MetadataRecord) {
  const keys = new Set<string>([queried.value, queried.isbn13]);
  if (queried.isbn10) keys.add(queried.isbn10);

  for (const returned of [record.isbn10, record.isbn13]) {
    const normalized = normalizeIsbn(returned);
    if (!normalized) continue;
    keys.add(normalized.isbn13);
    if (normalized.isbn10) keys.add(normalized.isbn10);
  }

  for (const key of keys) {
    index.set(key, record);
  }
}

/**
 * Fetch metadata for every identifier. The result is keyed by every ISBN form
 * of each edition found.
 */
export async function enrichIdentifiers(
  identifiers: Iterable<string>,
  provider: MetadataProvider,
  options: EnrichOptions
): Promise<{ index: MetadataIndex; stats: EnrichStats }> {
  const log = options.logger ?? rootLogger;
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const timer = createTimer("Metadata enrichment", log);

  const { distinct, invalid, requested } = dedupeIdentifiers(identifiers);
  const index: MetadataIndex = new Map();
  const stats: EnrichStats = { requested, distinct: distinct.length, invalid, found: 0, failed: 0 };
  if (distinct.length === 0) return { index, stats };

  const limit = pLimit(Math.max(1, Math.min(distinct.length, options.maxConcurrency)));
  const jitterSpan = Math.max(0, options.jitterMaxMs - options.jitterMinMs);

  await Promise.all(
    distinct.map((isbn) =>
      limit(async () => {
        try {
          const delay = options.jitterMinMs + Math.floor(random() * (jitterSpan + 1));
          if (delay > 0) await wait(delay);

          const record = await provider.lookupByIsbn(isbn.value);
          if (record) {
            indexRecord(index, isbn, record);
            stats.found++;
          }
        } catch (error) {
          stats.failed++;
          log.warn("Metadata lookup failed", { isbn: isbn.value, error: String(error) });
        }
      })
    )
  );

  timer.end({ ...stats });
  return { index, stats };
}

/**
 * Look up a raw identifier in an enrichment index
 */
export function lookupMetadata(index: MetadataIndex, raw: string | null | undefined): MetadataRecord | null {
  const isbn = normalizeIsbn(raw);
  if (!isbn) return null;
  return index.get(isbn.value) ?? index.get(isbn.isbn13) ?? (isbn.isbn10 ? index.get(isbn.isbn10) : undefined) ?? null;
}
