import * as cheerio from "cheerio";
import { setTimeout as sleep } from "node:timers/promises";
import { MAX_CRAWL_PAGES } from "./config";
import { ScrapeError, errorMessage } from "./errors";

export interface PageData {
  url: string;
  title: string;
  content: string;
  links: string[];
}

export type CrawlStatus = "success" | "error" | "skipped";

export interface CrawlPageResult {
  url: string;
  title: string;
  status: CrawlStatus;
  wordCount: number;
  error?: string;
}

export interface CrawlReport {
  startUrl: string;
  pages: PageData[];
  results: CrawlPageResult[];
}

export interface CrawlOptions {
  maxPages?: number;
  delayMs?: number;
  concurrency?: number;
  timeoutMs?: number;
}

type FetchOutcome = { url: string; page?: PageData; error?: string };

const SKIP_EXTENSIONS = new Set([
  "png", "jpg", "jpeg", "gif", "svg", "css", "js", "pdf", "zip", "ico",
  "woff", "woff2", "ttf", "mp4", "mp3", "webp",
]);
const SKIP_PATH_SEGMENTS = ["wp-admin", "admin", "login", "register", "cart", "checkout"];
const MIN_TEXT_LENGTH = 20;
const DEFAULT_TIMEOUT_MS = 10000;

export function normUrl(href: string, base: string): string | null {
  try {
    const u = new URL(href, base);
    u.hash = "";
    u.search = "";
    if (u.protocol !== "http:" && u.protocol !== "https:") return null;
    // Only keep same-origin links
    if (u.origin !== new URL(base).origin) return null;
    const last = u.pathname.split("/").pop() ?? "";
    const ext = last.includes(".") ? (last.split(".").pop() ?? "").toLowerCase() : "";
    if (SKIP_EXTENSIONS.has(ext)) return null;
    const path = u.pathname.toLowerCase();
    if (SKIP_PATH_SEGMENTS.some((seg) => path.includes(seg))) return null;
    return u.toString();
  } catch {
    return null;
  }
}

export function clampPageCount(requested: number): number {
  if (!Number.isFinite(requested)) return 1;
  return Math.max(1, Math.min(MAX_CRAWL_PAGES, Math.floor(requested)));
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

async function fetchPage(url: string, timeoutMs: number): Promise<string> {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: {
        "User-Agent": "ContentLibrarian/1.0 (+crawler)",
        Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
      },
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new ScrapeError(`Error fetching ${url}: ${errorMessage(err)}`, url, { cause: err });
  }
  if (!res.ok) {
    throw new ScrapeError(`Error fetching ${url}: HTTP ${res.status}`, url);
  }
  const contentType = res.headers.get("content-type") || "";
  if (!contentType.toLowerCase().includes("text/html")) {
    throw new ScrapeError(`Unsupported content type for ${url}: ${contentType || "unknown"}`, url);
  }
  return res.text();
}

export function extractText(html: string): { title: string; text: string; links: string[] } {
  const $ = cheerio.load(html);

  const title = $("title").first().text().trim() || $("h1").first().text().trim() || "Untitled";

  // Links first, before navigation is stripped, so every route is discovered
  const links: string[] = [];
  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    if (href) links.push(href);
  });

  $("script, style, nav, footer, header, noscript, iframe, svg, form, [role='navigation'], [role='banner'], [aria-hidden='true']").remove();

  let text = "";
  const mainSelectors = ["main", "article", "[role='main']", "#content", ".content", "#main"];
  for (const sel of mainSelectors) {
    const el = $(sel);
    if (el.length) {
      text = el.text();
      break;
    }
  }
  if (!text) {
    text = $("body").text();
  }

  return { title, text: text.replace(/\s+/g, " ").trim(), links };
}

export async function scrapePage(url: string, opts: { timeoutMs?: number } = {}): Promise<PageData> {
  const html = await fetchPage(url, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const { title, text, links } = extractText(html);
  return { url, title, content: text, links };
}

export async function crawlSite(startUrl: string, opts: CrawlOptions = {}): Promise<CrawlReport> {
  const start = normUrl(startUrl, startUrl);
  if (!start) throw new ScrapeError(`Cannot crawl ${startUrl}: not a crawlable page URL`, startUrl);

  const maxPages = clampPageCount(opts.maxPages ?? 5);
  const delayMs = Math.max(0, opts.delayMs ?? 1000);
  const concurrency = Math.max(1, opts.concurrency ?? 1);
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  console.log(`[scraper] Starting crawl of ${start} (max ${maxPages} pages)`);

  const visited = new Set<string>();
  const queue: string[] = [start];
  const pages: PageData[] = [];
  const results: CrawlPageResult[] = [];

  while (queue.length > 0 && visited.size < maxPages) {
    const batch: string[] = [];
    while (queue.length > 0 && batch.length < concurrency && visited.size < maxPages) {
      const url = queue.shift();
      if (url !== undefined && !visited.has(url)) {
        visited.add(url);
        batch.push(url);
      }
    }
    if (batch.length === 0) break;
    if (results.length > 0 && delayMs > 0) await sleep(delayMs);

    const outcomes = await Promise.all(
      batch.map(async (url): Promise<FetchOutcome> => {
        try {
          return { url, page: await scrapePage(url, { timeoutMs }) };
        } catch (err) {
          return { url, error: errorMessage(err) };
        }
      })
    );

    for (const outcome of outcomes) {
      if (!outcome.page) {
        console.warn(`[scraper] Skipping ${outcome.url}: ${outcome.error}`);
        results.push({ url: outcome.url, title: "Error", status: "error", wordCount: 0, error: outcome.error });
        continue;
      }
      const page = outcome.page;
      for (const href of page.links) {
        const next = normUrl(href, page.url);
        if (next && !visited.has(next) && !queue.includes(next)) queue.push(next);
      }
      if (page.content.length < MIN_TEXT_LENGTH) {
        console.warn(`[scraper] Skipping ${page.url}: no readable text`);
        results.push({ url: page.url, title: page.title, status: "skipped", wordCount: 0, error: "no readable text" });
        continue;
      }
      pages.push(page);
      results.push({ url: page.url, title: page.title, status: "success", wordCount: countWords(page.content) });
      console.log(`[scraper] Scraped: ${page.url} (${page.content.length} chars)`);
    }
  }

  console.log(`[scraper] Done. Scraped ${pages.length} of ${results.length} pages from ${start}`);
  return { startUrl: start, pages, results };
}
