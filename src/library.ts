import { listLibraryEntries, type LibraryEntry } from "./db";
import type { CrawlIngestReport, CrawlIngestRow } from "./ingest";

export type ExportFormat = "csv" | "json";

export type ItemTags = { id: string; title: string; url: string | null; tags: string[] };

type CsvValue = string | number | boolean | null;
type CsvColumn<T> = [name: string, value: (row: T) => CsvValue];

const LIBRARY_COLUMNS: Array<CsvColumn<LibraryEntry>> = [
  ["id", (e) => e.id],
  ["title", (e) => e.title],
  ["url", (e) => e.sourceUrl],
  ["summary", (e) => e.summary],
  ["word_count", (e) => e.wordCount],
  ["content_type", (e) => e.contentType],
  ["chunk_count", (e) => e.chunkCount],
  ["fetched_at", (e) => e.fetchedAt],
];

const CRAWL_COLUMNS: Array<CsvColumn<CrawlIngestRow>> = [
  ["url", (r) => r.url],
  ["title", (r) => r.title],
  ["summary", (r) => r.summary],
  ["word_count", (r) => r.wordCount],
  ["status", (r) => r.status],
  ["stored", (r) => r.stored],
  ["item_id", (r) => r.itemId],
  ["error", (r) => r.error ?? null],
];

const TAG_COLUMNS: Array<CsvColumn<ItemTags>> = [
  ["title", (t) => t.title],
  ["tags", (t) => t.tags.join(", ")],
  ["url", (t) => t.url],
];

export function csvCell(value: CsvValue): string {
  if (value === null) return "";
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

function toCsv<T>(columns: Array<CsvColumn<T>>, rows: T[]): string {
  const header = columns.map(([name]) => name).join(",");
  const lines = rows.map((row) => columns.map(([, value]) => csvCell(value(row))).join(","));
  return [header, ...lines].join("\n") + "\n";
}

export function libraryToCsv(entries: LibraryEntry[]): string {
  return toCsv(LIBRARY_COLUMNS, entries);
}

export function libraryToJson(entries: LibraryEntry[]): string {
  return JSON.stringify(entries, null, 2);
}

export function crawlReportToCsv(report: CrawlIngestReport): string {
  return toCsv(CRAWL_COLUMNS, report.rows);
}

export function siteInventoryFilename(startUrl: string): string {
  return `site_inventory_${new URL(startUrl).host}.csv`;
}

export function tagsToCsv(tags: ItemTags[]): string {
  return toCsv(TAG_COLUMNS, tags);
}

export function exportLibrary(format: ExportFormat): { body: string; contentType: string; filename: string } {
  const entries = listLibraryEntries();
  return format === "csv"
    ? { body: libraryToCsv(entries), contentType: "text/csv; charset=utf-8", filename: "content_inventory_export.csv" }
    : { body: libraryToJson(entries), contentType: "application/json; charset=utf-8", filename: "content_inventory_export.json" };
}
