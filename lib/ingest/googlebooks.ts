/**
 * Google Books metadata provider
 * Looks up volumes by ISBN or title, rate limited and backing off on 429s
 */

import Bottleneck from "bottleneck";
import { z } from "zod";
import { emptyRecord, secureUrl } from "@/lib/ingest/metadata";
import type { MetadataProvider, MetadataRecord } from "@/lib/ingest/types";
import { normalizeIsbn } from "@/lib/util/isbn";
import { logger as rootLogger, type Logger } from "@/lib/util/logger";
import { normalizeDate } from "@/lib/util/text";

const API_URL = "https://www.googleapis.com/books/v1/volumes";

const volumeSchema = z.object({
  id: z.string(),
  volumeInfo: z.object({
    title: z.string().optional(),
    subtitle: z.string().optional(),
    authors: z.array(z.string()).optional(),
    publisher: z.string().optional(),
    description: z.string().optional(),
    publishedDate: z.string().optional(),
    pageCount: z.number().optional(),
    categories: z.array(z.string()).optional(),
    averageRating: z.number().optional(),
    ratingsCount: z.number().optional(),
    language: z.string().optional(),
    imageLinks: z
      .object({
        thumbnail: z.string().optional(),
        smallThumbnail: z.string().optional(),
        medium: z.string().optional(),
        large: z.string().optional(),
      })
      .optional(),
    industryIdentifiers: z
      .array(z.object({ type: z.string(), identifier: z.string() }))
      .optional(),
  }),
});

const responseSchema = z.object({
  totalItems: z.number().optional(),
  items: z.array(volumeSchema).optional(),
});

export type GoogleBooksVolume = z.infer<typeof volumeSchema>;

export interface GoogleBooksOptions {
  apiKey?: string;
  fetchImpl?: typeof fetch;
  limiter?: Bottleneck;
  maxRetries?: number;
  initialBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Shared backoff state so every request pauses once any request is rate limited
 */
export class BackoffManager {
  private backoffUntil = 0;
  private pendingWait: Promise<void> | null = null;

  constructor(private readonly wait: (ms: number) => Promise<void> = sleep) {}

  /**
   * Extend the backoff if the new time is later. Returns true if it moved.
   */
  setBackoff(untilTimestamp: number): boolean {
    if (untilTimestamp > this.backoffUntil) {
      this.backoffUntil = untilTimestamp;
      return true;
    }
    return false;
  }

  /**
   * Wait for any active backoff to expire, joining an in-flight wait
   */
  async waitForBackoff(): Promise<void> {
    const now = Date.now();
    if (this.backoffUntil <= now) return;

    if (this.pendingWait) {
      await this.pendingWait;
      return;
    }

    this.pendingWait = this.wait(this.backoffUntil - now);
    try {
      await this.pendingWait;
    } finally {
      this.pendingWait = null;
    }
  }
}

function identifier(volume: GoogleBooksVolume, type: "ISBN_10" | "ISBN_13"): string | null {
  return volume.volumeInfo.industryIdentifiers?.find((id) => id.type === type)?.identifier ?? null;
}

/**
 * Convert a Google Books volume into a normalized record
 */
export function volumeToRecord(volume: GoogleBooksVolume): MetadataRecord {
  const info = volume.volumeInfo;
  const images = info.imageLinks;
  const isbn13 = normalizeIsbn(identifier(volume, "ISBN_13"));
  const isbn10 = normalizeIsbn(identifier(volume, "ISBN_10"));

  return {
    ...emptyRecord("google_books"),
    title: info.title?.trim() || null,
    subtitle: info.subtitle ?? null,
    authors: info.authors ?? [],
    publisher: info.publisher ?? null,
    publishedDate: normalizeDate(info.publishedDate),
    pageCount: info.pageCount && info.pageCount > 0 ? info.pageCount : null,
    language: info.language ?? null,
    description: info.description ?? null,
    categories: info.categories ?? [],
    coverUrl: secureUrl(images?.large ?? images?.medium ?? images?.thumbnail ?? images?.smallThumbnail),
    averageRating: info.averageRating ?? null,
    ratingCount: info.ratingsCount ?? null,
    isbn10: isbn10?.isbn10 ?? isbn13?.isbn10 ?? null,
    isbn13: isbn13?.isbn13 ?? isbn10?.isbn13 ?? null,
    googleBooksId: volume.id,
  };
}

export class GoogleBooksProvider implements MetadataProvider {
  readonly name = "google_books";

  private readonly fetchImpl: typeof fetch;
  private readonly limiter: Bottleneck;
  private readonly backoff: BackoffManager;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(private readonly options: GoogleBooksOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.limiter = options.limiter ?? new Bottleneck({ minTime: 100, maxConcurrent: 4 });
    this.sleep = options.sleep ?? sleep;
    this.backoff = new BackoffManager(this.sleep);
    this.maxRetries = options.maxRetries ?? 3;
    this.initialBackoffMs = options.initialBackoffMs ?? 30000;
    this.log = options.logger ?? rootLogger.child({ provider: this.name });
  }

  async lookupByIsbn(isbn: string): Promise<MetadataRecord | null> {
    try {
      const volumes = await this.queryVolumes(`isbn:${isbn}`, 1);
      return volumes[0] ? volumeToRecord(volumes[0]) : null;
    } catch (error) {
      this.log.warn("Google Books ISBN lookup failed", { isbn, error: String(error) });
      return null;
    }
  }

  async searchByTitle(title: string, maxResults = 5): Promise<MetadataRecord[]> {
    const escaped = title.replace(/"/g, "").trim();
    if (!escaped) return [];
    try {
      const volumes = await this.queryVolumes(`intitle:"${escaped}"`, maxResults);
      return volumes.map(volumeToRecord);
    } catch (error) {
      this.log.warn("Google Books search failed", { title, error: String(error) });
      return [];
    }
  }

  private async queryVolumes(q: string, maxResults: number): Promise<GoogleBooksVolume[]> {
    const url = new URL(API_URL);
    url.searchParams.set("q", q);
    url.searchParams.set("maxResults", String(maxResults));
    if (this.options.apiKey) {
      url.searchParams.set("key", this.options.apiKey);
    }

    const response = await this.fetchWithRetry(url.toString(), q);
    if (!response.ok) {
      this.log.warn("Google Books API error", { status: response.status, q });
      return [];
    }

    const parsed = responseSchema.safeParse(await response.json());
    if (!parsed.success) {
      this.log.warn("Unexpected Google Books response", { q });
      return [];
    }
    return parsed.data.items ?? [];
  }

  /**
   * Fetch with exponential backoff on 429
   */
  private async fetchWithRetry(url: string, context: string): Promise<Response> {
    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      await this.backoff.waitForBackoff();

      const response = await this.limiter.schedule(() => this.fetchImpl(url));
      if (response.status !== 429) {
        return response;
      }

      const backoffMs = this.initialBackoffMs * Math.pow(2, attempt);
      this.backoff.setBackoff(Date.now() + backoffMs);

      if (attempt < this.maxRetries) {
        this.log.warn(`Rate limited by Google Books API, pausing for ${backoffMs / 1000}s`, {
          context,
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
        });
        await this.sleep(backoffMs);
      }
    }

    throw new Error("Rate limited after max retries");
  }
}
