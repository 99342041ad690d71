import type { ContentMeta, ContentType } from "./db";
import { errorMessage } from "./errors";
import type { ChatModel } from "./llm";

export type LibraryStats = {
  totalItems: number;
  totalWords: number;
  averageWords: number;
  itemsWithSummary: number;
  shortestWords: number;
  longestWords: number;
  byType: Partial<Record<ContentType, number>>;
};

export type LibraryAnalysis = {
  stats: LibraryStats;
  themes: string;
  trends: string;
  strategy: string;
};

export type SocialPlatform = "twitter" | "linkedin";

const ANALYSIS_ITEMS = 8;
const CUSTOM_ANALYSIS_ITEMS = 10;
const SUMMARY_PREVIEW = 200;
const TAG_ERROR = "analysis-error";

const PLATFORM_RULES: Record<SocialPlatform, string> = {
  twitter: "Each post must be under 280 characters and may end with one or two hashtags.",
  linkedin: "Each post is 2-3 sentences in a professional tone, no hashtags in the middle of sentences.",
};

export function computeLibraryStats(items: ContentMeta[]): LibraryStats {
  const words = items.map((i) => i.wordCount);
  const totalWords = words.reduce((a, b) => a + b, 0);
  const byType: Partial<Record<ContentType, number>> = {};
  for (const item of items) byType[item.contentType] = (byType[item.contentType] ?? 0) + 1;
  return {
    totalItems: items.length,
    totalWords,
    averageWords: items.length ? Math.round(totalWords / items.length) : 0,
    itemsWithSummary: items.filter((i) => !!i.summary).length,
    shortestWords: words.length ? Math.min(...words) : 0,
    longestWords: words.length ? Math.max(...words) : 0,
    byType,
  };
}

function describeItems(items: ContentMeta[], limit: number): string {
  return items
    .slice(0, limit)
    .map((item, i) =>
      [
        `${i + 1}. Title: ${item.title}`,
        `   Summary: ${(item.summary ?? "No summary").slice(0, SUMMARY_PREVIEW)}`,
        `   Word count: ${item.wordCount}`,
        `   Source: ${item.sourceUrl ?? "pasted text"}`,
      ].join("\n")
    )
    .join("\n");
}

function describeStats(stats: LibraryStats): string {
  const types = Object.entries(stats.byType)
    .map(([type, n]) => `${type}=${n}`)
    .join(", ");
  return [
    `- Total items: ${stats.totalItems}`,
    `- Total words: ${stats.totalWords}`,
    `- Average words per item: ${stats.averageWords}`,
    `- Content types: ${types || "none"}`,
  ].join("\n");
}

async function ask(chat: ChatModel, prompt: string): Promise<string> {
  return chat.complete([{ role: "user", content: prompt }], { temperature: 0.3 });
}

export async function analyzeLibrary(items: ContentMeta[], chat: ChatModel): Promise<LibraryAnalysis> {
  if (!items.length) throw new Error("The library is empty.");
  const stats = computeLibraryStats(items);
  const details = describeItems(items, ANALYSIS_ITEMS);

  const themes = await ask(
    chat,
    `You are analyzing a specific content library. Base every point on the actual items below and quote their titles.\n\nCONTENT DETAILS:\n${details}\n\nLIBRARY STATISTICS:\n${describeStats(stats)}\n\nCover: main themes, dominant content types and style, strengths, and notable gaps.`
  );
  const trends = await ask(
    chat,
    `Analyze these content items to identify patterns:\n\n${details}\n\nIdentify common themes across pieces, style patterns, focus areas, and the apparent audience. Use only the items above.`
  );
  const strategy = await ask(
    chat,
    `Based on this analysis of a content library, give specific recommendations: content types to prioritize, topics to expand, gaps to fill, and repurposing opportunities.\n\n${trends}`
  );
  return { stats, themes, trends, strategy };
}

export function parseTags(raw: string): string[] {
  return raw
    .split(/[,\n]/)
    .map((t) => t.replace(/^\s*(?:\d+[.)]|[-*#])\s*/, "").trim())
    .filter(Boolean)
    .slice(0, 5);
}

export async function generateTags(items: ContentMeta[], chat: ChatModel): Promise<Record<string, string[]>> {
  const tags: Record<string, string[]> = {};
  for (const item of items) {
    try {
      const raw = await ask(
        chat,
        `Generate 3-5 tags for this content. Tags are single words or short phrases useful for categorization.\n\nTitle: ${item.title}\nSummary: ${(item.summary ?? "No summary").slice(0, 300)}\n\nReply with the tags only, comma-separated.`
      );
      const parsed = parseTags(raw);
      tags[item.id] = parsed.length ? parsed : [TAG_ERROR];
    } catch (err) {
      console.warn(`[analysis] Tag generation failed for "${item.title}": ${errorMessage(err)}`);
      tags[item.id] = [TAG_ERROR];
    }
  }
  return tags;
}

export async function runCustomAnalysis(question: string, items: ContentMeta[], chat: ChatModel): Promise<string> {
  if (!items.length) throw new Error("The library is empty.");
  const library = items
    .slice(0, CUSTOM_ANALYSIS_ITEMS)
    .map((item) => `Title: ${item.title}\nSummary: ${item.summary ?? "No summary"}`)
    .join("\n\n---\n\n");
  return ask(chat, `Based on this content library, answer the following question:\n${question}\n\nContent Library:\n${library}`);
}

export function parsePosts(raw: string, count: number): string[] {
  return raw
    .split(/\n+/)
    .map((line) => line.replace(/^\s*(?:\d+[.)]|[-*])\s*/, "").trim())
    .filter(Boolean)
    .slice(0, count);
}

export async function draftSocialPosts(
  item: { title: string; summary: string | null; rawText: string; sourceUrl: string | null },
  platform: SocialPlatform,
  count: number,
  chat: ChatModel
): Promise<string[]> {
  const basis = item.summary ?? item.rawText.slice(0, 2000);
  const raw = await chat.complete(
    [
      { role: "system", content: "You write social media posts that promote a piece of content without exaggerating it." },
      {
        role: "user",
        content: `Write ${count} distinct ${platform} posts about this content. ${PLATFORM_RULES[platform]}${item.sourceUrl ? ` Include the link ${item.sourceUrl} in each post.` : ""}\nPut each post on its own line with no numbering.\n\nTitle: ${item.title}\nContent: ${basis}`,
      },
    ],
    { temperature: 0.8 }
  );
  return parsePosts(raw, count);
}
