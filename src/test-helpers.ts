import { vi } from "vitest";
import { loadConfig, type AppConfig } from "./config";
import type { ContentItem } from "./db";
import type { ChatMessage, ChatModel, CompletionOptions, Embedder } from "./llm";
import type { RagDeps } from "./rag";

const VOCABULARY = ["cat", "dog", "fish"];

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({ NODE_ENV: "test", DB_PATH: ":memory:", SCRAPER_DELAY_MS: "0", SUMMARIZE_ON_INGEST: "false" }),
    ...overrides,
  };
}

// Counts vocabulary words plus one slot for every other word, so "cat cat dog" embeds as [2, 1, 0, 0].
// The extra slot keeps vectors non-zero, which cosine distance needs.
export function keywordVector(text: string): number[] {
  const words = text.toLowerCase().split(/[^a-z]+/).filter(Boolean);
  const counts = VOCABULARY.map((term) => words.filter((w) => w === term).length);
  return [...counts, words.filter((w) => !VOCABULARY.includes(w)).length];
}

export function fakeEmbedder() {
  return vi.fn<Embedder>(async (texts) => texts.map(keywordVector));
}

export type FakeChat = ChatModel & {
  calls: Array<{ messages: ChatMessage[]; opts?: CompletionOptions }>;
};

export function fakeChat(reply: (messages: ChatMessage[]) => string = () => "ok"): FakeChat {
  const calls: FakeChat["calls"] = [];
  return {
    calls,
    async complete(messages, opts) {
      calls.push({ messages, opts });
      return reply(messages);
    },
    async *stream(messages, opts) {
      calls.push({ messages, opts });
      for (const part of reply(messages).split(/(?<= )/)) yield part;
    },
  };
}

export function fakeDeps(overrides: Partial<RagDeps> = {}): RagDeps {
  return { embed: fakeEmbedder(), chat: fakeChat(), config: testConfig(), ...overrides };
}

export function makeItem(overrides: Partial<ContentItem> = {}): ContentItem {
  return {
    id: "item-1",
    sourceUrl: null,
    title: "Item",
    rawText: "cat",
    contentType: "text_document",
    wordCount: 1,
    summary: null,
    fetchedAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.toString() : input.url;
}

/** Stubs global fetch with a fixed set of pages keyed by absolute URL; anything else is a 404. */
export function stubSite(pages: Record<string, string>) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const html = pages[requestUrl(input)];
    return html === undefined ? htmlResponse("not found", 404) : htmlResponse(html);
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}
