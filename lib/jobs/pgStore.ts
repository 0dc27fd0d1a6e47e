import { z } from "zod";
import { database, type Database } from "@/lib/db/pool";
import { importJobSchema } from "@/lib/jobs/schema";
import type { ImportJob, JobStore, JobUpdate } from "@/lib/jobs/types";

const stateRowSchema = z.object({ state: importJobSchema });

function toJob(row: unknown): ImportJob {
  return stateRowSchema.parse(row).state;
}

/**
 * Job documents in the "ImportJob" table. The state column holds the whole
 * document; every statement filters on owner.
 */
export class PgJobStore implements JobStore {
  constructor(
    private readonly db: Database = database,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(owner: string, id: string, job: ImportJob): Promise<void> {
    const state: ImportJob = { ...job, id, owner };
    await this.db.query(
      `INSERT INTO "ImportJob" (owner, id, kind, status, state, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7)`,
      [owner, id, state.kind, state.status, JSON.stringify(state), state.createdAt, state.updatedAt]
    );
  }

  async get(owner: string, id: string): Promise<ImportJob | null> {
    const { rows } = await this.db.query(`SELECT state FROM "ImportJob" WHERE owner = $1 AND id = $2`, [owner, id]);
    return rows.length > 0 ? toJob(rows[0]) : null;
  }

  async update(owner: string, id: string, partial: JobUpdate): Promise<boolean> {
    return this.db.transaction(async (run) => {
      const { rows } = await run(`SELECT state FROM "ImportJob" WHERE owner = $1 AND id = $2 FOR UPDATE`, [owner, id]);
      if (rows.length === 0) return false;

      const next: ImportJob = { ...toJob(rows[0]), ...partial, updatedAt: this.now().toISOString() };
      await run(
        `UPDATE "ImportJob" SET status = $3, state = $4::jsonb, updated_at = $5 WHERE owner = $1 AND id = $2`,
        [owner, id, next.status, JSON.stringify(next), next.updatedAt]
      );
      return true;
    });
  }

  async listForOwner(owner: string): Promise<ImportJob[]> {
    const { rows } = await this.db.query(
      `SELECT state FROM "ImportJob" WHERE owner = $1 ORDER BY created_at DESC`,
      [owner]
    );
    return rows.map(toJob);
  }
}
