import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { closeDb, getLibraryStats, openDb } from "./db";
import { createOpenAIChatModel, createOpenAIClient, createOpenAIEmbedder } from "./llm";

const config = loadConfig();
openDb(config.dbPath);
const client = createOpenAIClient(config);
const app = createApp({
  config,
  embed: createOpenAIEmbedder(client, config.embeddingModel),
  chat: createOpenAIChatModel(client, config.chatModel),
});

const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host });

const stats = getLibraryStats();
console.log(`[server] Static front page ${config.serveStatic ? "enabled" : "disabled (API only)"}`);
console.log(`
┌─────────────────────────────────────────────┐
│  Content Librarian running on port ${String(config.port).padEnd(9)}│
│  Chat model: ${config.chatModel.slice(0, 30).padEnd(31)}│
│  Library: ${`${stats.itemCount} items / ${stats.chunkCount} chunks`.slice(0, 34).padEnd(34)}│
└─────────────────────────────────────────────┘
`);

function shutdown() {
  server.close(() => {
    closeDb();
    process.exit(0);
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
