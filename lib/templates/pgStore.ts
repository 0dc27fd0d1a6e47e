import { z } from "zod";
import { database, type Database } from "@/lib/db/pool";
import { fieldTokenSchema } from "@/lib/ingest/formats";
import { SYSTEM_TEMPLATE_OWNER, type MappingTemplate, type MappingTemplateStore } from "@/lib/templates/types";

const templateSchema = z.object({
  id: z.string(),
  owner: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  sourceFormat: z.enum(["goodreads", "storygraph", "reading_history", "isbn_list", "unknown"]),
  headers: z.array(z.string()),
  mapping: z.array(z.object({ column: z.string(), token: fieldTokenSchema })),
  timesUsed: z.number().int().nonnegative(),
  lastUsedAt: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const docRowSchema = z.object({ doc: templateSchema });

function toTemplate(row: unknown): MappingTemplate {
  return docRowSchema.parse(row).doc;
}

/**
 * Templates in "ImportMappingTemplate", one jsonb document per (owner, id).
 * System templates are readable by every owner.
 */
export class PgMappingTemplateStore implements MappingTemplateStore {
  constructor(private readonly db: Database = database) {}

  async create(template: MappingTemplate): Promise<void> {
    await this.db.query(
      `INSERT INTO "ImportMappingTemplate" (owner, id, name, doc, created_at)
       VALUES ($1, $2, $3, $4::jsonb, $5)`,
      [template.owner, template.id, template.name, JSON.stringify(template), template.createdAt]
    );
  }

  async listForOwner(owner: string): Promise<MappingTemplate[]> {
    const { rows } = await this.db.query(
      `SELECT doc FROM "ImportMappingTemplate" WHERE owner = $1 OR owner = $2 ORDER BY created_at DESC`,
      [owner, SYSTEM_TEMPLATE_OWNER]
    );
    return rows.map(toTemplate);
  }

  async get(owner: string, id: string): Promise<MappingTemplate | null> {
    const { rows } = await this.db.query(
      `SELECT doc FROM "ImportMappingTemplate" WHERE id = $2 AND (owner = $1 OR owner = $3)
       ORDER BY (owner = $1) DESC LIMIT 1`,
      [owner, id, SYSTEM_TEMPLATE_OWNER]
    );
    return rows.length > 0 ? toTemplate(rows[0]) : null;
  }

  async recordUse(owner: string, id: string, at: string): Promise<void> {
    await this.db.transaction(async (run) => {
      const { rows } = await run(
        `SELECT doc FROM "ImportMappingTemplate" WHERE id = $2 AND (owner = $1 OR owner = $3)
         ORDER BY (owner = $1) DESC LIMIT 1 FOR UPDATE`,
        [owner, id, SYSTEM_TEMPLATE_OWNER]
      );
      if (rows.length === 0) return;

      const current = toTemplate(rows[0]);
      const next: MappingTemplate = { ...current, timesUsed: current.timesUsed + 1, lastUsedAt: at, updatedAt: at };
      await run(`UPDATE "ImportMappingTemplate" SET doc = $3::jsonb WHERE owner = $1 AND id = $2`, [
        next.owner,
        next.id,
        JSON.stringify(next),
      ]);
    });
  }

  async delete(owner: string, id: string): Promise<boolean> {
    const { rowCount } = await this.db.query(`DELETE FROM "ImportMappingTemplate" WHERE owner = $1 AND id = $2`, [
      owner,
      id,
    ]);
    return (rowCount ?? 0) > 0;
  }
}
