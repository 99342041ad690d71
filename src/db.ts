import Database from "better-sqlite3";
import * as sqliteVec from "sqlite-vec";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type ContentType = "web_page" | "text_document";

export type ContentItem = {
  id: string;
  sourceUrl: string | null;
  title: string;
  rawText: string;
  contentType: ContentType;
  wordCount: number;
  summary: string | null;
  fetchedAt: string;
};

export type ContentMeta = Omit<ContentItem, "rawText">;

export type LibraryEntry = ContentMeta & { chunkCount: number };

export type StoredChunk = {
  id: string;
  itemId: string;
  index: number;
  text: string;
};

export type ChunkMatch = { chunk: StoredChunk; distance: number };

export type ChunkInput = { text: string; embedding: number[] };

type ItemRow = {
  id: string;
  url: string | null;
  title: string;
  summary: string | null;
  content_type: string;
  word_count: number;
  raw_text: string;
  fetched_at: string;
};

type EntryRow = Omit<ItemRow, "raw_text"> & { chunk_count: number };

type ChunkRow = {
  item_id: string;
  chunk_index: number;
  content: string;
};

const VECTOR_TABLE = "chunk_vectors";

let db: Database.Database | null = null;

export function openDb(path: string): Database.Database {
  closeDb();
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  const database = new Database(path);
  sqliteVec.load(database);
  database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");
  database.exec(`
    CREATE TABLE IF NOT EXISTS content_items (
      id TEXT PRIMARY KEY,
      url TEXT,
      title TEXT NOT NULL,
      summary TEXT,
      content_type TEXT NOT NULL,
      word_count INTEGER NOT NULL DEFAULT 0,
      raw_text TEXT NOT NULL,
      fetched_at TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS content_chunks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      item_id TEXT NOT NULL REFERENCES content_items(id) ON DELETE CASCADE,
      chunk_index INTEGER NOT NULL,
      content TEXT NOT NULL,
      UNIQUE (item_id, chunk_index)
    );
  `);
  db = database;
  return database;
}

export function getDb(): Database.Database {
  return db ?? openDb(process.env.DB_PATH || "data/library.db");
}

export function closeDb(): void {
  if (!db) return;
  db.close();
  db = null;
}

export function chunkId(itemId: string, index: number): string {
  return `${itemId}_chunk_${index}`;
}

function toContentType(value: string): ContentType {
  return value === "web_page" ? "web_page" : "text_document";
}

function toVectorBlob(vector: number[]): Buffer {
  const floats = new Float32Array(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

// Width of the stored vectors, read back from the vec0 declaration; null until the first insert.
function vectorWidth(database: Database.Database): number | null {
  const row = database
    .prepare<[string], { sql: string }>(`SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?`)
    .get(VECTOR_TABLE);
  if (!row) return null;
  const match = /float\[(\d+)\]/.exec(row.sql);
  return match ? Number(match[1]) : null;
}

function hasVectorTable(database: Database.Database): boolean {
  return vectorWidth(database) !== null;
}

// The vec0 table is created on first insert so its width matches the embedding model.
function ensureVectorTable(database: Database.Database, dimensions: number): void {
  const width = vectorWidth(database);
  if (width !== null) {
    if (width !== dimensions) {
      throw new Error(`Embedding has ${dimensions} dimensions but the library stores ${width}`);
    }
    return;
  }
  if (!Number.isInteger(dimensions) || dimensions < 1) {
    throw new Error(`Cannot index embeddings with ${dimensions} dimensions`);
  }
  database.exec(
    `CREATE VIRTUAL TABLE ${VECTOR_TABLE} USING vec0(embedding float[${dimensions}] distance_metric=cosine)`
  );
}

// vec0 rows do not follow the content_chunks foreign key, so they are removed by hand.
function deleteItemVectors(database: Database.Database, itemId: string): void {
  if (!hasVectorTable(database)) return;
  const rows = database
    .prepare<[string], { id: number }>(`SELECT id FROM content_chunks WHERE item_id = ?`)
    .all(itemId);
  const del = database.prepare(`DELETE FROM ${VECTOR_TABLE} WHERE rowid = ?`);
  for (const row of rows) del.run(BigInt(row.id));
}

function rowToItem(row: ItemRow): ContentItem {
  return {
    id: row.id,
    sourceUrl: row.url,
    title: row.title,
    rawText: row.raw_text,
    contentType: toContentType(row.content_type),
    wordCount: row.word_count,
    summary: row.summary,
    fetchedAt: row.fetched_at,
  };
}

function rowToChunk(row: ChunkRow): StoredChunk {
  return {
    id: chunkId(row.item_id, row.chunk_index),
    itemId: row.item_id,
    index: row.chunk_index,
    text: row.content,
  };
}

export function hasContentItem(id: string): boolean {
  const row = getDb().prepare<[string], { id: string }>(`SELECT id FROM content_items WHERE id = ?`).get(id);
  return row !== undefined;
}

/**
 * Stores an item and its chunks in one transaction. An existing item is left
 * as it is unless `replace` is set, in which case it is deleted (chunks cascade)
 * and written again.
 */
export function storeContent(
  item: ContentItem,
  chunks: ChunkInput[],
  opts: { replace?: boolean } = {}
): { stored: boolean; chunkCount: number } {
  const database = getDb();
  const deleteStmt = database.prepare(`DELETE FROM content_items WHERE id = ?`);
  const insertItemStmt = database.prepare(
    `INSERT INTO content_items (id, url, title, summary, content_type, word_count, raw_text, fetched_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const insertChunkStmt = database.prepare(
    `INSERT INTO content_chunks (item_id, chunk_index, content) VALUES (?, ?, ?)`
  );

  return database.transaction(() => {
    if (hasContentItem(item.id)) {
      if (!opts.replace) return { stored: false, chunkCount: countChunks(item.id) };
      deleteItemVectors(database, item.id);
      deleteStmt.run(item.id);
    }
    for (const chunk of chunks) ensureVectorTable(database, chunk.embedding.length);
    const insertVectorStmt = chunks.length
      ? database.prepare(`INSERT INTO ${VECTOR_TABLE} (rowid, embedding) VALUES (?, ?)`)
      : null;
    insertItemStmt.run(
      item.id,
      item.sourceUrl,
      item.title,
      item.summary,
      item.contentType,
      item.wordCount,
      item.rawText,
      item.fetchedAt
    );
    chunks.forEach((chunk, i) => {
      const { lastInsertRowid } = insertChunkStmt.run(item.id, i, chunk.text);
      insertVectorStmt?.run(BigInt(lastInsertRowid), toVectorBlob(chunk.embedding));
    });
    return { stored: true, chunkCount: chunks.length };
  })();
}

export function getContentItem(id: string): ContentItem | null {
  const row = getDb()
    .prepare<[string], ItemRow>(
      `SELECT id, url, title, summary, content_type, word_count, raw_text, fetched_at
       FROM content_items WHERE id = ?`
    )
    .get(id);
  return row ? rowToItem(row) : null;
}

export function listLibraryEntries(): LibraryEntry[] {
  const rows = getDb()
    .prepare<[], EntryRow>(
      `SELECT i.id, i.url, i.title, i.summary, i.content_type, i.word_count, i.fetched_at,
              (SELECT COUNT(*) FROM content_chunks c WHERE c.item_id = i.id) AS chunk_count
       FROM content_items i
       ORDER BY i.fetched_at DESC, i.rowid DESC`
    )
    .all();
  return rows.map((row) => ({
    id: row.id,
    sourceUrl: row.url,
    title: row.title,
    contentType: toContentType(row.content_type),
    wordCount: row.word_count,
    summary: row.summary,
    fetchedAt: row.fetched_at,
    chunkCount: row.chunk_count,
  }));
}

export function deleteContentItem(id: string): boolean {
  const database = getDb();
  return database.transaction(() => {
    deleteItemVectors(database, id);
    return database.prepare(`DELETE FROM content_items WHERE id = ?`).run(id).changes > 0;
  })();
}

/** K-nearest chunks to `vector` by cosine distance, closest first. */
export function searchChunkVectors(vector: number[], k: number): ChunkMatch[] {
  const database = getDb();
  if (!hasVectorTable(database)) return [];
  const rows = database
    .prepare<[Buffer, bigint], ChunkRow & { distance: number }>(
      `WITH knn AS (
         SELECT rowid, distance FROM ${VECTOR_TABLE} WHERE embedding MATCH ? AND k = ?
       )
       SELECT c.item_id, c.chunk_index, c.content, knn.distance
       FROM knn JOIN content_chunks c ON c.id = knn.rowid
       ORDER BY knn.distance, c.item_id, c.chunk_index`
    )
    .all(toVectorBlob(vector), BigInt(k));
  return rows.map((row) => ({ chunk: rowToChunk(row), distance: row.distance }));
}

export function countVectors(): number {
  const database = getDb();
  if (!hasVectorTable(database)) return 0;
  return database.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${VECTOR_TABLE}`).get()?.n ?? 0;
}

export function getChunksForItem(itemId: string): StoredChunk[] {
  return getDb()
    .prepare<[string], ChunkRow>(
      `SELECT item_id, chunk_index, content FROM content_chunks WHERE item_id = ? ORDER BY chunk_index`
    )
    .all(itemId)
    .map(rowToChunk);
}

export function countChunks(itemId?: string): number {
  const database = getDb();
  const row = itemId
    ? database.prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM content_chunks WHERE item_id = ?`).get(itemId)
    : database.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM content_chunks`).get();
  return row?.n ?? 0;
}

export function getLibraryStats(): { itemCount: number; chunkCount: number } {
  const row = getDb()
    .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM content_items`)
    .get();
  return { itemCount: row?.n ?? 0, chunkCount: countChunks() };
}
