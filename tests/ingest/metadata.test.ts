import { describe, expect, it } from "vitest";
import { UnifiedMetadataProvider, mergeRecords, secureUrl } from "@/lib/ingest/metadata";
import { FakeProvider, metadataRecord } from "../helpers/fakes";

describe("mergeRecords", () => {
  it("prefers the primary and combines lists", () => {
    const merged = mergeRecords(
      metadataRecord({
        title: "Primary Title",
        description: "Short",
        pageCount: 100,
        categories: ["Fiction"],
        publishedDate: "2001-01-01",
        sources: ["google_books"],
      }),
      metadataRecord({
        title: "Secondary Title",
        publisher: "Secondary House",
        description: "A much longer description",
        pageCount: 120,
        categories: ["fiction", "Space"],
        publishedDate: "2001-05-01",
        sources: ["openlibrary"],
      })
    );

    expect(merged.title).toBe("Primary Title");
    expect(merged.publisher).toBe("Secondary House");
    expect(merged.description).toBe("A much longer description");
    expect(merged.pageCount).toBe(120);
    expect(merged.categories).toEqual(["Fiction", "Space"]);
    expect(merged.sources).toEqual(["google_books", "openlibrary"]);
  });
});

describe("secureUrl", () => {
  it("upgrades http links", () => {
    expect(secureUrl("http://books.example.test/cover.jpg")).toBe("https://books.example.test/cover.jpg");
    expect(secureUrl(undefined)).toBeNull();
  });
});

describe("UnifiedMetadataProvider", () => {
  it("falls back to the secondary when the primary fails", async () => {
    const primary = new FakeProvider();
    primary.failing.add("9781234567897");
    const secondary = new FakeProvider({ "9781234567897": metadataRecord({ title: "From Secondary" }) });

    const record = await new UnifiedMetadataProvider(primary, secondary).lookupByIsbn("9781234567897");
    expect(record?.title).toBe("From Secondary");
  });

  it("returns null when no provider knows the ISBN", async () => {
    const record = await new UnifiedMetadataProvider(new FakeProvider(), new FakeProvider()).lookupByIsbn("9781234567897");
    expect(record).toBeNull();
  });

  it("de-duplicates search results across providers", async () => {
    const primary = new FakeProvider();
    primary.searchResults = [metadataRecord({ title: "Dune", isbn13: "9781234567897" })];
    const secondary = new FakeProvider();
    secondary.searchResults = [
      metadataRecord({ title: "Dune (again)", isbn10: "123456789X" }),
      metadataRecord({ title: "Dune Messiah", authors: ["Frank Herbert"] }),
    ];

    const results = await new UnifiedMetadataProvider(primary, secondary).searchByTitle("Dune", 5);
    expect(results.map((r) => r.title)).toEqual(["Dune", "Dune Messiah"]);
  });
});
