import "dotenv/config";
import type { PoolClient } from "pg";
import { readdir, readFile } from "fs/promises";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { closePool, withClient } from "@/lib/db/pool";
import { logger } from "@/lib/util/logger";

const log = logger.child({ component: "migrate" });

async function ensureMigrationsTable(client: PoolClient) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS "_migrations" (
      id          SERIAL PRIMARY KEY,
      filename    TEXT UNIQUE NOT NULL,
      applied_at  TIMESTAMP DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(client: PoolClient): Promise<Set<string>> {
  const result = await client.query<{ filename: string }>(`SELECT filename FROM "_migrations" ORDER BY filename`);
  return new Set(result.rows.map((row) => row.filename));
}

async function applyMigration(client: PoolClient, filename: string, sql: string) {
  await client.query("BEGIN");
  try {
    await client.query(sql);
    await client.query(`INSERT INTO "_migrations" (filename) VALUES ($1)`, [filename]);
    await client.query("COMMIT");
    log.info("Applied migration", { filename });
  } catch (error) {
    await client.query("ROLLBACK");
    log.error("Failed to apply migration", { filename, error: String(error) });
    throw error;
  }
}

async function main() {
  const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), "migrations");
  const files = await readdir(migrationsDir);
  const sqlFiles = files.filter((f) => f.endsWith(".sql")).sort();

  try {
    const appliedCount = await withClient(async (client) => {
      await ensureMigrationsTable(client);
      const applied = await getAppliedMigrations(client);

      let count = 0;
      for (const filename of sqlFiles) {
        if (applied.has(filename)) {
          log.debug("Skipping (already applied)", { filename });
          continue;
        }
        const sql = await readFile(join(migrationsDir, filename), "utf-8");
        await applyMigration(client, filename, sql);
        count++;
      }
      return count;
    });

    log.info("Migration complete", { applied: appliedCount });
  } finally {
    await closePool();
  }
}

main().catch((error) => {
  log.error("Migration failed", { error: String(error) });
  process.exit(1);
});
