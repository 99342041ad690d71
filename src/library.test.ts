import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { closeDb, openDb, storeContent, type LibraryEntry } from "./db";
import type { CrawlIngestReport } from "./ingest";
import { crawlReportToCsv, exportLibrary, libraryToCsv, libraryToJson, siteInventoryFilename, tagsToCsv } from "./library";
import { makeItem } from "./test-helpers";

const entry: LibraryEntry = {
  id: "abc",
  sourceUrl: null,
  title: 'Hello, "World"',
  contentType: "text_document",
  wordCount: 3,
  summary: "line1\nline2",
  fetchedAt: "2024-01-01T00:00:00.000Z",
  chunkCount: 1,
};

describe("libraryToCsv", () => {
  it("should quote cells that need it", () => {
    expect(libraryToCsv([entry])).toBe(
      "id,title,url,summary,word_count,content_type,chunk_count,fetched_at\n" +
        'abc,"Hello, ""World""",,"line1\nline2",3,text_document,1,2024-01-01T00:00:00.000Z\n'
    );
  });

  it("should write only the header for an empty library", () => {
    expect(libraryToCsv([])).toBe("id,title,url,summary,word_count,content_type,chunk_count,fetched_at\n");
  });
});

describe("crawlReportToCsv", () => {
  it("should write one row per crawled page", () => {
    const report: CrawlIngestReport = {
      startUrl: "https://example.com/",
      pageCount: 2,
      indexedCount: 1,
      totalWords: 4,
      rows: [
        {
          url: "https://example.com/",
          title: "Home, sweet",
          status: "success",
          wordCount: 4,
          itemId: "abc",
          summary: "Short.",
          created: true,
          stored: true,
        },
        {
          url: "https://example.com/gone",
          title: "",
          status: "error",
          wordCount: 0,
          error: "HTTP 404",
          itemId: null,
          summary: null,
          created: false,
          stored: false,
        },
      ],
    };

    expect(crawlReportToCsv(report)).toBe(
      "url,title,summary,word_count,status,stored,item_id,error\n" +
        'https://example.com/,"Home, sweet",Short.,4,success,true,abc,\n' +
        "https://example.com/gone,,,0,error,false,,HTTP 404\n"
    );
  });

  it("should name the inventory after the site", () => {
    expect(siteInventoryFilename("https://docs.example.com:8080/start")).toBe("site_inventory_docs.example.com:8080.csv");
  });
});

describe("tagsToCsv", () => {
  it("should join each item's tags into one cell", () => {
    expect(
      tagsToCsv([
        { id: "a", title: "Cats", url: "https://example.com/cats", tags: ["pets", "care"] },
        { id: "b", title: "Notes", url: null, tags: [] },
      ])
    ).toBe('title,tags,url\nCats,"pets, care",https://example.com/cats\nNotes,,\n');
  });
});

describe("exportLibrary", () => {
  beforeEach(() => {
    openDb(":memory:");
  });

  afterEach(() => {
    closeDb();
  });

  it("should export stored items as JSON", () => {
    storeContent(makeItem({ title: "Cats" }), [{ text: "cat", embedding: [1] }]);
    const out = exportLibrary("json");

    expect(out.filename).toBe("content_inventory_export.json");
    expect(out.contentType).toBe("application/json; charset=utf-8");
    expect(JSON.parse(out.body)).toEqual([
      {
        id: "item-1",
        sourceUrl: null,
        title: "Cats",
        contentType: "text_document",
        wordCount: 1,
        summary: null,
        fetchedAt: "2024-01-01T00:00:00.000Z",
        chunkCount: 1,
      },
    ]);
    expect(libraryToJson([])).toBe("[]");
  });

  it("should name the CSV download", () => {
    const out = exportLibrary("csv");
    expect(out.filename).toBe("content_inventory_export.csv");
    expect(out.contentType).toBe("text/csv; charset=utf-8");
  });
});
