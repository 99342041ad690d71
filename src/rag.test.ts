import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { closeDb, countChunks, countVectors, getContentItem, openDb } from "./db";
import { ConfigError } from "./errors";
import type { Embedder } from "./llm";
import { buildContext, chunkText, indexContentItem, searchContent, type SearchHit } from "./rag";
import { fakeChat, fakeDeps, fakeEmbedder, makeItem, testConfig } from "./test-helpers";

function hit(itemId: string, title: string, index: number, text: string, sourceUrl: string | null = null): SearchHit {
  return {
    chunk: { id: `${itemId}_chunk_${index}`, itemId, index, text },
    item: {
      id: itemId,
      sourceUrl,
      title,
      contentType: "text_document",
      wordCount: 1,
      summary: null,
      fetchedAt: "2024-01-01T00:00:00.000Z",
    },
    score: 1,
    distance: 0,
  };
}

describe("chunkText", () => {
  const opts = { chunkSize: 12, chunkOverlap: 4 };

  it("should split on word boundaries with overlap", () => {
    expect(chunkText("one two three four five six", opts)).toEqual([
      "one two",
      "two three",
      "three four",
      "four five",
      "five six",
    ]);
  });

  it("should return a single chunk for short text", () => {
    expect(chunkText("  short\n\ntext  ", opts)).toEqual(["short text"]);
  });

  it("should return nothing for blank text", () => {
    expect(chunkText(" \n\t ", opts)).toEqual([]);
  });

  it("should keep every chunk within the size limit", () => {
    const text = Array.from({ length: 200 }, (_, i) => `word${i}`).join(" ");
    const chunks = chunkText(text, { chunkSize: 50, chunkOverlap: 10 });
    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) expect(chunk.length).toBeLessThanOrEqual(50);
  });

  it("should be deterministic and idempotent", () => {
    const text = "The quick brown fox jumps over the lazy dog. ".repeat(40);
    const options = { chunkSize: 100, chunkOverlap: 20 };
    const first = chunkText(text, options);
    expect(chunkText(text, options)).toEqual(first);
    for (const chunk of first) expect(chunkText(chunk, options)).toEqual([chunk]);
  });

  it("should reject an overlap that is not smaller than the size", () => {
    expect(() => chunkText("text", { chunkSize: 10, chunkOverlap: 10 })).toThrow(ConfigError);
    expect(() => chunkText("text", { chunkSize: 0, chunkOverlap: 0 })).toThrow(ConfigError);
  });
});

describe("buildContext", () => {
  it("should label each chunk with its item and origin", () => {
    const { context, sources } = buildContext(
      [hit("a", "Cats", 0, "cat facts"), hit("b", "Dogs", 2, "dog facts", "https://example.com/dogs")],
      1000
    );
    expect(context).toBe(
      "--- Cats (pasted text) [chunk 0] ---\ncat facts\n\n--- Dogs (https://example.com/dogs) [chunk 2] ---\ndog facts"
    );
    expect(sources).toEqual([
      { itemId: "a", title: "Cats", url: null },
      { itemId: "b", title: "Dogs", url: "https://example.com/dogs" },
    ]);
  });

  it("should list a source once even when several of its chunks match", () => {
    const { sources } = buildContext([hit("a", "Cats", 0, "one"), hit("a", "Cats", 1, "two")], 1000);
    expect(sources).toEqual([{ itemId: "a", title: "Cats", url: null }]);
  });

  it("should stop before exceeding the character budget", () => {
    const first = "--- Cats (pasted text) [chunk 0] ---\ncat";
    const { context, sources } = buildContext([hit("a", "Cats", 0, "cat"), hit("b", "Dogs", 0, "dog")], first.length);
    expect(context).toBe(first);
    expect(sources.map((s) => s.itemId)).toEqual(["a"]);
  });
});

describe("indexing and search", () => {
  beforeEach(() => {
    openDb(":memory:");
  });

  afterEach(() => {
    closeDb();
    vi.restoreAllMocks();
  });

  it("should index an item with one embedding per chunk", async () => {
    const deps = fakeDeps({ config: testConfig({ chunkSize: 12, chunkOverlap: 4 }) });
    const out = await indexContentItem(makeItem({ rawText: "one two three four five six" }), deps);

    expect(out.created).toBe(true);
    expect(out.chunkCount).toBe(5);
    expect(countChunks("item-1")).toBe(5);
    expect(deps.embed).toHaveBeenCalledTimes(1);
  });

  it("should keep the stored item when re-indexed without force", async () => {
    const deps = fakeDeps();
    await indexContentItem(makeItem({ title: "Original" }), deps);
    const again = await indexContentItem(makeItem({ title: "Changed", rawText: "dog dog" }), deps);

    expect(again.created).toBe(false);
    expect(again.item.title).toBe("Original");
    expect(getContentItem("item-1")?.rawText).toBe("cat");
  });

  it("should replace the stored item when forced", async () => {
    const deps = fakeDeps();
    await indexContentItem(makeItem({ title: "Original" }), deps);
    const again = await indexContentItem(makeItem({ title: "Changed", rawText: "dog dog" }), deps, { force: true });

    expect(again.created).toBe(true);
    expect(getContentItem("item-1")?.title).toBe("Changed");
    expect(countChunks()).toBe(1);
    expect(countVectors()).toBe(1);

    const hits = await searchContent("dog", deps);
    expect(hits.map((h) => [h.item.title, h.chunk.text])).toEqual([["Changed", "dog dog"]]);
  });

  it("should summarize when asked even if summaries are off by default", async () => {
    const deps = fakeDeps({ chat: fakeChat(() => "On request.") });
    const out = await indexContentItem(makeItem(), deps, { summarize: true });

    expect(deps.config.summarizeOnIngest).toBe(false);
    expect(out.item.summary).toBe("On request.");
  });

  it("should attach a generated summary when enabled", async () => {
    const chat = fakeChat(() => "A short summary.");
    const deps = fakeDeps({ chat, config: testConfig({ summarizeOnIngest: true }) });
    const out = await indexContentItem(makeItem(), deps);

    expect(out.item.summary).toBe("A short summary.");
    expect(chat.calls[0].opts).toEqual({ temperature: 0.3 });
  });

  it("should index without a summary when summarizing fails", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const chat = fakeChat(() => {
      throw new Error("model offline");
    });
    const deps = fakeDeps({ chat, config: testConfig({ summarizeOnIngest: true }) });
    const out = await indexContentItem(makeItem(), deps);

    expect(out.created).toBe(true);
    expect(out.item.summary).toBeNull();
  });

  it("should refuse an item with no text", async () => {
    await expect(indexContentItem(makeItem({ title: "Blank", rawText: "   " }), fakeDeps())).rejects.toThrow(
      'No text to index for "Blank".'
    );
  });

  it("should fail when the embedder returns the wrong number of vectors", async () => {
    const embed = vi.fn<Embedder>(async () => []);
    await expect(indexContentItem(makeItem(), fakeDeps({ embed }))).rejects.toThrow(
      "Embedding service returned 0 vectors for 1 chunks."
    );
    expect(getContentItem("item-1")).toBeNull();
  });

  it("should return the best matches first, limited to topK", async () => {
    const deps = fakeDeps();
    await indexContentItem(makeItem({ id: "a", title: "All cats", rawText: "cat cat cat" }), deps);
    await indexContentItem(makeItem({ id: "b", title: "All dogs", rawText: "dog dog" }), deps);
    await indexContentItem(makeItem({ id: "c", title: "Mixed", rawText: "cat dog" }), deps);

    const hits = await searchContent("cat", deps, { topK: 2 });

    expect(hits.map((h) => h.item.id)).toEqual(["a", "c"]);
    expect(hits[0].score).toBeCloseTo(1);
    expect(hits[0].distance).toBeCloseTo(0);
    expect(hits[1].score).toBeCloseTo(Math.SQRT1_2);
    expect(hits[0].chunk).toEqual({ id: "a_chunk_0", itemId: "a", index: 0, text: "cat cat cat" });
  });

  it("should not call the embedder when the library is empty", async () => {
    const embed = fakeEmbedder();
    expect(await searchContent("cat", { embed, config: testConfig() })).toEqual([]);
    expect(embed).not.toHaveBeenCalled();
  });
});
