import { describe, expect, it } from "vitest";
import { InMemoryMappingTemplateStore } from "@/lib/templates/store";
import { SYSTEM_TEMPLATE_OWNER } from "@/lib/templates/types";
import { makeTemplate } from "../helpers/fakes";

const OWNER = "reader-a";

describe("InMemoryMappingTemplateStore", () => {
  it("lists the owner's and system templates, newest first", async () => {
    const store = new InMemoryMappingTemplateStore();
    await store.create(makeTemplate({ id: "old", createdAt: "2024-01-01T00:00:00.000Z" }));
    await store.create(makeTemplate({ id: "system", owner: SYSTEM_TEMPLATE_OWNER, createdAt: "2024-02-01T00:00:00.000Z" }));
    await store.create(makeTemplate({ id: "other", owner: "reader-b", createdAt: "2024-03-01T00:00:00.000Z" }));
    await store.create(makeTemplate({ id: "new", createdAt: "2024-04-01T00:00:00.000Z" }));

    expect((await store.listForOwner(OWNER)).map((t) => t.id)).toEqual(["new", "system", "old"]);
    expect(await store.get(OWNER, "other")).toBeNull();
    expect((await store.get("reader-b", "system"))?.owner).toBe(SYSTEM_TEMPLATE_OWNER);
  });

  it("counts uses and only deletes the owner's own templates", async () => {
    const store = new InMemoryMappingTemplateStore();
    await store.create(makeTemplate());
    await store.create(makeTemplate({ id: "system", owner: SYSTEM_TEMPLATE_OWNER }));

    await store.recordUse(OWNER, "tpl-1", "2024-05-01T00:00:00.000Z");
    await store.recordUse(OWNER, "tpl-1", "2024-05-02T00:00:00.000Z");
    const used = await store.get(OWNER, "tpl-1");
    expect(used?.timesUsed).toBe(2);
    expect(used?.lastUsedAt).toBe("2024-05-02T00:00:00.000Z");

    expect(await store.delete(OWNER, "system")).toBe(false);
    expect(await store.delete("reader-b", "tpl-1")).toBe(false);
    expect(await store.delete(OWNER, "tpl-1")).toBe(true);
    expect(await store.get(OWNER, "tpl-1")).toBeNull();
  });

  it("rejects a second template with the same id", async () => {
    const store = new InMemoryMappingTemplateStore();
    await store.create(makeTemplate());
    await expect(store.create(makeTemplate())).rejects.toThrow("Mapping template already exists: tpl-1");
  });
});
