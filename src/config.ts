import { ConfigError } from "./errors";

// Hard ceiling for a single crawl, whatever SCRAPER_MAX_PAGES says.
export const MAX_CRAWL_PAGES = 20;

export type AppConfig = {
  openaiApiKey: string | null;
  openaiBaseUrl: string | null;
  chatModel: string;
  embeddingModel: string;
  dbPath: string;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  maxContextChars: number;
  maxContentLength: number;
  scraperTimeoutMs: number;
  scraperMaxPages: number;
  scraperDelayMs: number;
  scraperConcurrency: number;
  summarizeOnIngest: boolean;
  port: number;
  host: string;
  corsOrigin: string;
  apiKey: string | null;
  serveStatic: boolean;
};

type Env = Record<string, string | undefined>;

function intFrom(env: Env, key: string, fallback: number, min = 0): number {
  const raw = (env[key] ?? "").trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

function boolFrom(env: Env, key: string, fallback: boolean): boolean {
  const raw = (env[key] ?? "").trim().toLowerCase();
  if (!raw) return fallback;
  return raw === "true" || raw === "1" || raw === "yes";
}

/** Reads a page count given on the command line; undefined when none was given. */
export function parsePageCount(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw.trim());
  if (!raw.trim() || !Number.isInteger(n) || n < 1) {
    throw new ConfigError(`maxPages must be an integer >= 1, got "${raw}"`);
  }
  return n;
}

export function normalizeUrl(input: string): string {
  const raw = (input || "").trim();
  if (!raw) throw new ConfigError("A URL is required.");
  const withProtocol = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
  try {
    return new URL(withProtocol).toString();
  } catch {
    throw new ConfigError(`Not a valid URL: ${raw}`);
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const appEnv = (env.APP_ENV || env.NODE_ENV || "development").toLowerCase();
  const chunkSize = intFrom(env, "RAG_CHUNK_SIZE", 1000, 1);
  const chunkOverlap = intFrom(env, "RAG_CHUNK_OVERLAP", 200);
  if (chunkOverlap >= chunkSize) {
    throw new ConfigError(`RAG_CHUNK_OVERLAP (${chunkOverlap}) must be smaller than RAG_CHUNK_SIZE (${chunkSize})`);
  }
  return {
    openaiApiKey: env.OPENAI_API_KEY || null,
    openaiBaseUrl: env.OPENAI_BASE_URL || null,
    chatModel: env.CHAT_MODEL || "gpt-3.5-turbo",
    embeddingModel: env.EMBEDDING_MODEL || "text-embedding-ada-002",
    dbPath: env.DB_PATH || "data/library.db",
    chunkSize,
    chunkOverlap,
    topK: Math.min(intFrom(env, "RAG_TOP_K", 5, 1), 20),
    maxContextChars: intFrom(env, "RAG_MAX_CONTEXT_CHARS", 12000, 1),
    maxContentLength: intFrom(env, "MAX_CONTENT_LENGTH", 50000, 1),
    scraperTimeoutMs: intFrom(env, "SCRAPER_TIMEOUT_MS", 10000, 1),
    scraperMaxPages: Math.min(intFrom(env, "SCRAPER_MAX_PAGES", 5, 1), MAX_CRAWL_PAGES),
    scraperDelayMs: intFrom(env, "SCRAPER_DELAY_MS", 1000),
    scraperConcurrency: intFrom(env, "SCRAPER_CONCURRENCY", 1, 1),
    summarizeOnIngest: boolFrom(env, "SUMMARIZE_ON_INGEST", true),
    port: intFrom(env, "PORT", 5555, 1),
    host: env.HOST || "0.0.0.0",
    corsOrigin: env.CORS_ORIGIN || "*",
    apiKey: env.API_KEY || null,
    serveStatic: boolFrom(env, "SERVE_STATIC", appEnv === "development"),
  };
}
