import type { AppConfig } from "./config";
import {
  countChunks,
  getContentItem,
  searchChunkVectors,
  storeContent,
  type ContentItem,
  type ContentMeta,
  type StoredChunk,
} from "./db";
import { ConfigError, errorMessage } from "./errors";
import type { ChatModel, Embedder } from "./llm";

export type ChunkOptions = { chunkSize: number; chunkOverlap: number };

export type RagDeps = {
  embed: Embedder;
  chat: ChatModel;
  config: AppConfig;
};

export type IndexResult = {
  item: ContentItem;
  chunkCount: number;
  created: boolean;
};

export type IndexOptions = {
  force?: boolean;
  /** Overrides `summarizeOnIngest` for this call. */
  summarize?: boolean;
};

export type SearchHit = {
  chunk: StoredChunk;
  item: ContentMeta;
  score: number;
  distance: number;
};

export type SourceRef = {
  itemId: string;
  title: string;
  url: string | null;
};

const SUMMARY_INPUT_CHARS = 12000;

/**
 * Splits text into overlapping windows of at most `chunkSize` characters.
 * Windows end on a word boundary when one lies past the overlap, and the next
 * window starts at the beginning of the word the overlap lands in.
 */
export function chunkText(text: string, { chunkSize, chunkOverlap }: ChunkOptions): string[] {
  if (chunkSize < 1 || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ConfigError(`Invalid chunking: size=${chunkSize} overlap=${chunkOverlap}`);
  }
  const normalized = text.replace(/\s+/g, " ").trim();
  if (!normalized) return [];
  if (normalized.length <= chunkSize) return [normalized];

  const chunks: string[] = [];
  let start = 0;
  while (start < normalized.length) {
    let end = Math.min(normalized.length, start + chunkSize);
    if (end < normalized.length) {
      const space = normalized.lastIndexOf(" ", end);
      if (space > start + chunkOverlap) end = space;
    }
    chunks.push(normalized.slice(start, end).trim());
    if (end >= normalized.length) break;

    let next = end - chunkOverlap;
    if (normalized[next - 1] !== " ") {
      const wordStart = normalized.lastIndexOf(" ", next - 1) + 1;
      if (wordStart > start) next = wordStart;
    }
    start = next;
  }
  return chunks;
}

export function toMeta(item: ContentItem): ContentMeta {
  return {
    id: item.id,
    sourceUrl: item.sourceUrl,
    title: item.title,
    contentType: item.contentType,
    wordCount: item.wordCount,
    summary: item.summary,
    fetchedAt: item.fetchedAt,
  };
}

export async function summarizeText(text: string, chat: ChatModel): Promise<string | null> {
  try {
    const summary = await chat.complete(
      [
        { role: "system", content: "You write short, factual summaries of web content." },
        {
          role: "user",
          content: `Summarize the following content in 2-4 sentences. Use only what it says.\n\n${text.slice(0, SUMMARY_INPUT_CHARS)}`,
        },
      ],
      { temperature: 0.3 }
    );
    return summary || null;
  } catch (err) {
    console.warn(`[rag] Summary generation failed: ${errorMessage(err)}`);
    return null;
  }
}

export async function indexContentItem(
  item: ContentItem,
  deps: RagDeps,
  opts: IndexOptions = {}
): Promise<IndexResult> {
  const existing = opts.force ? null : getContentItem(item.id);
  if (existing) {
    console.log(`[rag] ${item.id} already in library; keeping stored copy`);
    return { item: existing, chunkCount: countChunks(item.id), created: false };
  }

  const chunks = chunkText(item.rawText, deps.config);
  if (!chunks.length) {
    throw new Error(`No text to index for "${item.title}".`);
  }
  const summarize = opts.summarize ?? deps.config.summarizeOnIngest;
  const summary = item.summary ?? (summarize ? await summarizeText(item.rawText, deps.chat) : null);
  const vectors = await deps.embed(chunks);
  if (vectors.length !== chunks.length) {
    throw new Error(`Embedding service returned ${vectors.length} vectors for ${chunks.length} chunks.`);
  }

  const stored: ContentItem = { ...item, summary };
  const out = storeContent(
    stored,
    chunks.map((text, i) => ({ text, embedding: vectors[i] })),
    { replace: opts.force }
  );
  if (!out.stored) {
    const current = getContentItem(item.id);
    if (current) return { item: current, chunkCount: out.chunkCount, created: false };
  }
  console.log(`[rag] indexed ${item.id} "${item.title}" chunks=${out.chunkCount}`);
  return { item: stored, chunkCount: out.chunkCount, created: true };
}

export async function searchContent(
  query: string,
  deps: Pick<RagDeps, "embed" | "config">,
  opts: { topK?: number } = {}
): Promise<SearchHit[]> {
  const topK = Math.max(1, Math.min(20, Math.floor(opts.topK ?? deps.config.topK)));
  if (countChunks() === 0) return [];

  const [queryVector] = await deps.embed([query]);
  if (!queryVector) throw new Error("Embedding service returned no vector for the query.");

  const metas = new Map<string, ContentMeta>();
  const hits: SearchHit[] = [];
  for (const { chunk, distance } of searchChunkVectors(queryVector, topK)) {
    let meta = metas.get(chunk.itemId);
    if (!meta) {
      const item = getContentItem(chunk.itemId);
      if (!item) continue;
      meta = toMeta(item);
      metas.set(chunk.itemId, meta);
    }
    hits.push({ chunk, item: meta, score: 1 - distance, distance });
  }
  return hits;
}

export function buildContext(hits: SearchHit[], maxChars: number): { context: string; sources: SourceRef[] } {
  const parts: string[] = [];
  const sources = new Map<string, SourceRef>();
  let total = 0;
  for (const hit of hits) {
    const origin = hit.item.sourceUrl ?? "pasted text";
    const entry = `--- ${hit.item.title} (${origin}) [chunk ${hit.chunk.index}] ---\n${hit.chunk.text}`;
    if (total + entry.length > maxChars) break;
    parts.push(entry);
    total += entry.length;
    if (!sources.has(hit.item.id)) {
      sources.set(hit.item.id, { itemId: hit.item.id, title: hit.item.title, url: hit.item.sourceUrl });
    }
  }
  return { context: parts.join("\n\n"), sources: Array.from(sources.values()) };
}

export async function retrieveContext(
  query: string,
  deps: Pick<RagDeps, "embed" | "config">,
  opts: { topK?: number; maxChars?: number } = {}
): Promise<{ context: string; sources: SourceRef[]; hits: SearchHit[] }> {
  const hits = await searchContent(query, deps, { topK: opts.topK });
  const { context, sources } = buildContext(hits, opts.maxChars ?? deps.config.maxContextChars);
  return { context, sources, hits };
}
