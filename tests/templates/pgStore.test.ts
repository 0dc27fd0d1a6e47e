import { describe, expect, it } from "vitest";
import type { Database, QueryFn, SqlResult } from "@/lib/db/pool";
import { PgMappingTemplateStore } from "@/lib/templates/pgStore";
import { SYSTEM_TEMPLATE_OWNER } from "@/lib/templates/types";
import { makeTemplate } from "../helpers/fakes";

interface StoredRow {
  owner: string;
  id: string;
  doc: unknown;
  createdAt: string;
}

/**
 * Interprets the statements the template store issues against an array
 */
class FakeDatabase implements Database {
  readonly rows: StoredRow[] = [];
  readonly statements: Array<{ text: string; params: unknown[] }> = [];
  transactions = 0;

  query: QueryFn = async (text, params = []) => this.run(text, params);

  async transaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T> {
    this.transactions++;
    return fn(this.query);
  }

  private async run(text: string, params: unknown[]): Promise<SqlResult> {
    this.statements.push({ text, params });
    const [owner, id] = params;

    if (text.startsWith("INSERT")) {
      this.rows.push({
        owner: String(owner),
        id: String(id),
        doc: JSON.parse(String(params[3])),
        createdAt: String(params[4]),
      });
      return { rows: [], rowCount: 1 };
    }
    if (text.startsWith("UPDATE")) {
      const row = this.rows.find((r) => r.owner === owner && r.id === id);
      if (row) row.doc = JSON.parse(String(params[2]));
      return { rows: [], rowCount: row ? 1 : 0 };
    }
    if (text.startsWith("DELETE")) {
      const index = this.rows.findIndex((r) => r.owner === owner && r.id === id);
      if (index >= 0) this.rows.splice(index, 1);
      return { rows: [], rowCount: index >= 0 ? 1 : 0 };
    }
    if (text.includes("id = $2")) {
      const rows = this.rows
        .filter((r) => r.id === id && (r.owner === owner || r.owner === params[2]))
        .sort((a, b) => Number(b.owner === owner) - Number(a.owner === owner))
        .slice(0, 1)
        .map((r) => ({ doc: r.doc }));
      return { rows, rowCount: rows.length };
    }
    const rows = this.rows
      .filter((r) => r.owner === owner || r.owner === id)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((r) => ({ doc: r.doc }));
    return { rows, rowCount: rows.length };
  }
}

describe("PgMappingTemplateStore", () => {
  it("round-trips a template document", async () => {
    const store = new PgMappingTemplateStore(new FakeDatabase());
    const template = makeTemplate({ description: "Spreadsheet from the study shelves" });
    await store.create(template);

    expect(await store.get("reader-a", "tpl-1")).toEqual(template);
  });

  it("prefers the owner's template over a system one with the same id", async () => {
    const db = new FakeDatabase();
    const store = new PgMappingTemplateStore(db);
    await store.create(makeTemplate({ owner: SYSTEM_TEMPLATE_OWNER, name: "Shared layout" }));
    await store.create(makeTemplate({ name: "My layout" }));

    expect((await store.get("reader-a", "tpl-1"))?.name).toBe("My layout");
    expect((await store.get("reader-b", "tpl-1"))?.name).toBe("Shared layout");
    expect((await store.listForOwner("reader-b")).map((t) => t.name)).toEqual(["Shared layout"]);
    expect(db.statements.at(-1)?.params).toEqual(["reader-b", SYSTEM_TEMPLATE_OWNER]);
  });

  it("records a use under a row lock", async () => {
    const db = new FakeDatabase();
    const store = new PgMappingTemplateStore(db);
    await store.create(makeTemplate());

    await store.recordUse("reader-a", "tpl-1", "2024-06-01T00:00:00.000Z");

    const template = await store.get("reader-a", "tpl-1");
    expect(template?.timesUsed).toBe(1);
    expect(template?.lastUsedAt).toBe("2024-06-01T00:00:00.000Z");
    expect(template?.updatedAt).toBe("2024-06-01T00:00:00.000Z");
    expect(db.transactions).toBe(1);
    expect(db.statements.some((s) => s.text.endsWith("FOR UPDATE"))).toBe(true);
  });

  it("deletes only the owner's rows", async () => {
    const store = new PgMappingTemplateStore(new FakeDatabase());
    await store.create(makeTemplate());

    expect(await store.delete("reader-b", "tpl-1")).toBe(false);
    expect(await store.delete("reader-a", "tpl-1")).toBe(true);
    expect(await store.get("reader-a", "tpl-1")).toBeNull();
  });

  it("rejects a stored document that fails validation", async () => {
    const db = new FakeDatabase();
    db.rows.push({ owner: "reader-a", id: "tpl-1", doc: { id: "tpl-1" }, createdAt: "2024-01-01T00:00:00.000Z" });
    const store = new PgMappingTemplateStore(db);

    await expect(store.get("reader-a", "tpl-1")).rejects.toThrow();
  });
});
