import { afterEach, describe, expect, it, vi } from "vitest";
import {
  analyzeLibrary,
  computeLibraryStats,
  draftSocialPosts,
  generateTags,
  parsePosts,
  parseTags,
  runCustomAnalysis,
} from "./analysis";
import { fakeChat, makeItem } from "./test-helpers";

describe("computeLibraryStats", () => {
  it("should summarize word counts and content types", () => {
    const items = [
      makeItem({ id: "a", wordCount: 10, summary: "s", contentType: "web_page" }),
      makeItem({ id: "b", wordCount: 5 }),
    ];
    expect(computeLibraryStats(items)).toEqual({
      totalItems: 2,
      totalWords: 15,
      averageWords: 8,
      itemsWithSummary: 1,
      shortestWords: 5,
      longestWords: 10,
      byType: { web_page: 1, text_document: 1 },
    });
  });

  it("should return zeros for an empty library", () => {
    expect(computeLibraryStats([])).toEqual({
      totalItems: 0,
      totalWords: 0,
      averageWords: 0,
      itemsWithSummary: 0,
      shortestWords: 0,
      longestWords: 0,
      byType: {},
    });
  });
});

describe("analyzeLibrary", () => {
  it("should build the strategy on top of the trend analysis", async () => {
    const replies = ["the themes", "the trends", "the strategy"];
    let n = 0;
    const chat = fakeChat(() => replies[n++]);

    const out = await analyzeLibrary([makeItem({ title: "Cat care" })], chat);

    expect(out.themes).toBe("the themes");
    expect(out.trends).toBe("the trends");
    expect(out.strategy).toBe("the strategy");
    expect(out.stats.totalItems).toBe(1);
    expect(chat.calls[0].messages[0].content).toContain("1. Title: Cat care");
    expect(chat.calls[2].messages[0].content).toContain("the trends");
  });

  it("should refuse an empty library", async () => {
    await expect(analyzeLibrary([], fakeChat())).rejects.toThrow("The library is empty.");
  });
});

describe("parseTags", () => {
  it("should strip list markers and keep at most five tags", () => {
    expect(parseTags("1. AI, machine learning\n- 3D printing, , #ux, six, seven")).toEqual([
      "AI",
      "machine learning",
      "3D printing",
      "ux",
      "six",
    ]);
  });
});

describe("generateTags", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should tag each item and mark failures", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const chat = fakeChat((messages) => {
      if (messages[0].content.includes("Title: Broken")) throw new Error("model offline");
      if (messages[0].content.includes("Title: Blank")) return "";
      return "cats, pets";
    });

    const tags = await generateTags(
      [makeItem({ id: "a", title: "Cats" }), makeItem({ id: "b", title: "Broken" }), makeItem({ id: "c", title: "Blank" })],
      chat
    );

    expect(tags).toEqual({ a: ["cats", "pets"], b: ["analysis-error"], c: ["analysis-error"] });
  });
});

describe("runCustomAnalysis", () => {
  it("should describe only the first ten items", async () => {
    const chat = fakeChat(() => "answer");
    const items = Array.from({ length: 12 }, (_, i) => makeItem({ id: `i${i}`, title: `Item ${i}` }));

    expect(await runCustomAnalysis("What is missing?", items, chat)).toBe("answer");
    const prompt = chat.calls[0].messages[0].content;
    expect(prompt).toContain("What is missing?");
    expect(prompt).toContain("Title: Item 9\n");
    expect(prompt).not.toContain("Title: Item 10\n");
  });
});

describe("social posts", () => {
  it("should parse one post per line without numbering", () => {
    expect(parsePosts("1. First post\n\n2) Second post\n- Third", 2)).toEqual(["First post", "Second post"]);
  });

  it("should draft posts that link back to the source", async () => {
    const chat = fakeChat(() => "1. One\n2. Two\n3. Three");
    const item = makeItem({ title: "Cat care", summary: "How to care for cats.", sourceUrl: "https://example.com/cats" });

    const posts = await draftSocialPosts(item, "twitter", 2, chat);

    expect(posts).toEqual(["One", "Two"]);
    expect(chat.calls[0].opts).toEqual({ temperature: 0.8 });
    expect(chat.calls[0].messages[1].content).toContain("Include the link https://example.com/cats in each post.");
    expect(chat.calls[0].messages[1].content).toContain("Content: How to care for cats.");
  });
});
