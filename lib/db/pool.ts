import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";
import { getEnv } from "@/lib/config/env";
import { logger } from "@/lib/util/logger";

// Singleton pool instance
let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    const env = getEnv();
    if (!env.DATABASE_URL) {
      throw new Error("DATABASE_URL is not set");
    }
    pool = new Pool({
      connectionString: env.DATABASE_URL,
      min: env.PGPOOL_MIN,
      max: env.PGPOOL_MAX,
      connectionTimeoutMillis: 30000,
      idleTimeoutMillis: 30000,
    });

    pool.on("error", (err) => {
      logger.error("Unexpected error on idle client", { error: String(err) });
    });
  }
  return pool;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Get a client with retry logic for connection exhaustion
 */
async function getClientWithRetry(maxRetries = 3): Promise<PoolClient> {
  let lastError: unknown = null;
  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await getPool().connect();
    } catch (error) {
      lastError = error;
      const errMsg = String(error);
      if (errMsg.includes("too many clients") || errMsg.includes("timeout")) {
        const delay = Math.min(1000 * Math.pow(2, attempt), 5000);
        logger.warn("Connection pool exhausted, retrying", { delay, attempt: attempt + 1, maxRetries });
        await sleep(delay);
        continue;
      }
      throw error;
    }
  }
  throw lastError ?? new Error("Failed to get database connection after retries");
}

export async function withClient<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getClientWithRetry();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getClientWithRetry();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/** Untyped rows as they come back from pg; callers validate them */
export interface SqlResult {
  rows: QueryResultRow[];
  rowCount: number | null;
}

export type QueryFn = (text: string, params?: unknown[]) => Promise<SqlResult>;

/**
 * The slice of the pool the repositories use, so tests can hand in a fake
 */
export interface Database {
  query: QueryFn;
  transaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T>;
}

export const database: Database = {
  query: (text, params) => query(text, params),
  transaction: (fn) => transaction((client) => fn((text, params) => client.query(text, params))),
};
