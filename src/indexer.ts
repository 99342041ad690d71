import "dotenv/config";
import { loadConfig, normalizeUrl, parsePageCount } from "./config";
import { errorMessage } from "./errors";
import { closeDb, openDb } from "./db";
import { ingestSite } from "./ingest";
import { createOpenAIChatModel, createOpenAIClient, createOpenAIEmbedder } from "./llm";

const USAGE = "Usage: npm run crawl -- <url> [maxPages]";
const [url, maxPagesArg] = process.argv.slice(2);
if (!url) {
  console.error(USAGE);
  process.exit(1);
}

let maxPages: number | undefined;
try {
  maxPages = parsePageCount(maxPagesArg);
} catch (err) {
  console.error(`[indexer] ${errorMessage(err)}`);
  console.error(USAGE);
  process.exit(1);
}

const config = loadConfig();
openDb(config.dbPath);
const client = createOpenAIClient(config);

try {
  const report = await ingestSite(
    normalizeUrl(url),
    {
      config,
      embed: createOpenAIEmbedder(client, config.embeddingModel),
      chat: createOpenAIChatModel(client, config.chatModel),
    },
    { maxPages }
  );
  for (const row of report.rows) {
    console.log(`${row.status.padEnd(8)} ${row.url}${row.error ? ` (${row.error})` : ""}`);
  }
  console.log(
    `[indexer] start=${report.startUrl} pages=${report.pageCount} indexed=${report.indexedCount} words=${report.totalWords}`
  );
} finally {
  closeDb();
}
