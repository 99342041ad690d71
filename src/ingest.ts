import { createHash } from "node:crypto";
import type { ContentItem, ContentType } from "./db";
import { indexContentItem, summarizeText, type IndexResult, type RagDeps } from "./rag";
import { countWords, crawlSite, scrapePage, type CrawlPageResult, type PageData } from "./scraper";
import { errorMessage } from "./errors";

export type CrawlIngestRow = CrawlPageResult & {
  itemId: string | null;
  summary: string | null;
  created: boolean;
  stored: boolean;
};

export type SiteIngestOptions = {
  maxPages?: number;
  force?: boolean;
  /** Generate summaries for crawled pages; defaults to `summarizeOnIngest`. */
  summarize?: boolean;
  /** When false the crawl only builds an inventory and nothing is embedded or saved. */
  store?: boolean;
};

export type CrawlIngestReport = {
  startUrl: string;
  rows: CrawlIngestRow[];
  pageCount: number;
  indexedCount: number;
  totalWords: number;
};

export function contentIdFor(text: string, url: string | null): string {
  return createHash("md5").update(url ?? text.slice(0, 100)).digest("hex");
}

export function truncateContent(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function buildContentItem(
  input: { text: string; title: string; url: string | null; contentType: ContentType },
  opts: { maxContentLength: number; now?: Date }
): ContentItem {
  const rawText = truncateContent(input.text.trim(), opts.maxContentLength);
  return {
    id: contentIdFor(rawText, input.url),
    sourceUrl: input.url,
    title: input.title.trim() || "Untitled",
    rawText,
    contentType: input.contentType,
    wordCount: countWords(rawText),
    summary: null,
    fetchedAt: (opts.now ?? new Date()).toISOString(),
  };
}

export function pageToContentItem(page: PageData, maxContentLength: number): ContentItem {
  return buildContentItem(
    { text: page.content, title: page.title, url: page.url, contentType: "web_page" },
    { maxContentLength }
  );
}

// A given title is kept in front of the text so it is searchable too.
export function textToContentItem(text: string, title: string | undefined, maxContentLength: number): ContentItem {
  const heading = (title ?? "").trim();
  return buildContentItem(
    {
      text: heading ? `${heading}\n\n${text}` : text,
      title: heading || "Text Document",
      url: null,
      contentType: "text_document",
    },
    { maxContentLength }
  );
}

export async function ingestUrl(url: string, deps: RagDeps, opts: { force?: boolean } = {}): Promise<IndexResult> {
  const page = await scrapePage(url, { timeoutMs: deps.config.scraperTimeoutMs });
  if (!page.content) throw new Error(`No readable text found at ${url}.`);
  return indexContentItem(pageToContentItem(page, deps.config.maxContentLength), deps, opts);
}

export async function ingestText(
  text: string,
  title: string | undefined,
  deps: RagDeps,
  opts: { force?: boolean } = {}
): Promise<IndexResult> {
  if (!text.trim()) throw new Error("Text content is empty.");
  return indexContentItem(textToContentItem(text, title, deps.config.maxContentLength), deps, opts);
}

export async function ingestSite(
  startUrl: string,
  deps: RagDeps,
  opts: SiteIngestOptions = {}
): Promise<CrawlIngestReport> {
  const report = await crawlSite(startUrl, {
    maxPages: opts.maxPages ?? deps.config.scraperMaxPages,
    delayMs: deps.config.scraperDelayMs,
    concurrency: deps.config.scraperConcurrency,
    timeoutMs: deps.config.scraperTimeoutMs,
  });
  const summarize = opts.summarize ?? deps.config.summarizeOnIngest;
  const store = opts.store ?? true;

  const byUrl = new Map(report.pages.map((p) => [p.url, p]));
  const rows: CrawlIngestRow[] = [];
  for (const result of report.results) {
    const page = byUrl.get(result.url);
    if (result.status !== "success" || !page) {
      rows.push({ ...result, itemId: null, summary: null, created: false, stored: false });
      continue;
    }
    const item = pageToContentItem(page, deps.config.maxContentLength);
    if (!store) {
      const summary = summarize ? await summarizeText(item.rawText, deps.chat) : null;
      rows.push({ ...result, itemId: item.id, summary, created: false, stored: false });
      continue;
    }
    try {
      const out = await indexContentItem(item, deps, { force: opts.force, summarize });
      rows.push({ ...result, itemId: out.item.id, summary: out.item.summary, created: out.created, stored: true });
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`[ingest] Could not index ${result.url}: ${message}`);
      rows.push({ ...result, status: "error", error: message, itemId: null, summary: null, created: false, stored: false });
    }
  }

  return {
    startUrl: report.startUrl,
    rows,
    pageCount: rows.length,
    indexedCount: rows.filter((r) => r.stored).length,
    totalWords: rows.reduce((sum, r) => sum + r.wordCount, 0),
  };
}
