import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { serveStatic } from "@hono/node-server/serve-static";
import { analyzeLibrary, draftSocialPosts, generateTags, runCustomAnalysis, type SocialPlatform } from "./analysis";
import { answerQuestion, streamAnswer } from "./chat";
import { normalizeUrl } from "./config";
import { deleteContentItem, getChunksForItem, getContentItem, getLibraryStats, listLibraryEntries } from "./db";
import { ConfigError, ScrapeError, errorMessage } from "./errors";
import { ingestSite, ingestText, ingestUrl } from "./ingest";
import { crawlReportToCsv, exportLibrary, siteInventoryFilename, tagsToCsv } from "./library";
import { readJsonBody, requireApiKey, stringField, validateChatInput, type AppEnv } from "./middleware";
import { getNoContentMessage } from "./policy";
import { searchContent, toMeta, type IndexResult, type RagDeps } from "./rag";

function failure(c: Context, err: unknown) {
  const message = errorMessage(err);
  if (err instanceof ConfigError) return c.json({ error: message }, 400);
  if (err instanceof ScrapeError) return c.json({ error: message }, 502);
  console.error("[server] Request failed:", err);
  return c.json({ error: message }, 500);
}

function numberField(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

function csvDownload(c: Context, body: string, filename: string) {
  return c.body(body, 200, {
    "Content-Type": "text/csv; charset=utf-8",
    "Content-Disposition": `attachment; filename="${filename}"`,
  });
}

function indexed(out: IndexResult) {
  return { ok: true, created: out.created, chunkCount: out.chunkCount, item: toMeta(out.item) };
}

export function createApp(deps: RagDeps) {
  const { config } = deps;
  const app = new Hono<AppEnv>();

  // ── CORS ───────────────────────────────────────────────────
  //   CORS_ORIGIN="*"                            -> allow all origins
  //   CORS_ORIGIN="https://a.com,https://b.com"  -> allow specific origins
  app.use(
    "*",
    cors({
      origin: (origin) => {
        if (!origin) return "*";
        if (config.corsOrigin === "*") return origin;
        const allowed = config.corsOrigin.split(",").map((s) => s.trim());
        return allowed.includes(origin) ? origin : null;
      },
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization", "X-API-Key"],
    })
  );

  if (config.apiKey) app.use("/api/*", requireApiKey(config.apiKey));

  // ── State ──────────────────────────────────────────────────
  let crawling = false;

  app.get("/api/status", (c) =>
    c.json({
      crawling,
      library: getLibraryStats(),
      chatModel: config.chatModel,
      embeddingModel: config.embeddingModel,
    })
  );

  // ── Ingestion ──────────────────────────────────────────────
  app.post("/api/ingest/url", async (c) => {
    const body = await readJsonBody(c);
    if (!body) return c.json({ error: "Invalid JSON body." }, 400);
    try {
      const url = normalizeUrl(stringField(body, "url"));
      return c.json(indexed(await ingestUrl(url, deps, { force: body.force === true })));
    } catch (err) {
      return failure(c, err);
    }
  });

  app.post("/api/ingest/text", async (c) => {
    const body = await readJsonBody(c);
    if (!body) return c.json({ error: "Invalid JSON body." }, 400);
    const text = stringField(body, "text");
    if (!text) return c.json({ error: "A non-empty 'text' is required." }, 400);
    try {
      const out = await ingestText(text, stringField(body, "title") || undefined, deps, { force: body.force === true });
      return c.json(indexed(out));
    } catch (err) {
      return failure(c, err);
    }
  });

  app.post("/api/crawl", async (c) => {
    if (crawling) return c.json({ error: "A crawl is already running." }, 409);
    crawling = true;
    try {
      const body = await readJsonBody(c);
      if (!body) return c.json({ error: "Invalid JSON body." }, 400);
      const url = normalizeUrl(stringField(body, "url"));
      const report = await ingestSite(url, deps, {
        maxPages: numberField(body, "maxPages"),
        force: body.force === true,
        summarize: typeof body.summarize === "boolean" ? body.summarize : undefined,
        store: body.store !== false,
      });
      if (body.format === "csv") return csvDownload(c, crawlReportToCsv(report), siteInventoryFilename(report.startUrl));
      return c.json({ ok: true, ...report });
    } catch (err) {
      return failure(c, err);
    } finally {
      crawling = false;
    }
  });

  // ── Retrieval & chat ───────────────────────────────────────
  app.post("/api/search", async (c) => {
    const body = await readJsonBody(c);
    if (!body) return c.json({ error: "Invalid JSON body." }, 400);
    const query = stringField(body, "query");
    if (!query) return c.json({ error: "A non-empty 'query' is required." }, 400);
    try {
      const results = await searchContent(query, deps, { topK: numberField(body, "topK") });
      return c.json({ query, results });
    } catch (err) {
      return failure(c, err);
    }
  });

  app.post("/api/chat", validateChatInput, async (c) => {
    const out = await answerQuestion(c.get("message"), c.get("history"), deps);
    return c.json(out);
  });

  app.post("/api/chat/stream", validateChatInput, async (c) => {
    if (getLibraryStats().chunkCount === 0) {
      return c.json({ error: getNoContentMessage() }, 412);
    }
    try {
      const { stream } = await streamAnswer(c.get("message"), c.get("history"), deps);
      return c.body(stream, 200, { "Content-Type": "text/plain; charset=utf-8" });
    } catch (err) {
      return failure(c, err);
    }
  });

  // ── Library ────────────────────────────────────────────────
  app.get("/api/library", (c) => c.json({ items: listLibraryEntries() }));

  app.get("/api/library/:id", (c) => {
    const item = getContentItem(c.req.param("id"));
    if (!item) return c.json({ error: "Content item not found." }, 404);
    const chunks = getChunksForItem(item.id).map((chunk) => ({ id: chunk.id, index: chunk.index, text: chunk.text }));
    return c.json({ item, chunks });
  });

  app.delete("/api/library/:id", (c) => {
    if (!deleteContentItem(c.req.param("id"))) return c.json({ error: "Content item not found." }, 404);
    return c.json({ ok: true });
  });

  app.get("/api/export", (c) => {
    const format = (c.req.query("format") || "json").toLowerCase();
    if (format !== "csv" && format !== "json") {
      return c.json({ error: "format must be 'csv' or 'json'." }, 400);
    }
    const out = exportLibrary(format);
    return c.body(out.body, 200, {
      "Content-Type": out.contentType,
      "Content-Disposition": `attachment; filename="${out.filename}"`,
    });
  });

  // ── Analysis ───────────────────────────────────────────────
  app.post("/api/analysis/library", async (c) => {
    const items = listLibraryEntries();
    if (!items.length) return c.json({ error: getNoContentMessage() }, 412);
    try {
      return c.json(await analyzeLibrary(items, deps.chat));
    } catch (err) {
      return failure(c, err);
    }
  });

  app.post("/api/analysis/tags", async (c) => {
    const body = (await readJsonBody(c)) ?? {};
    const ids = Array.isArray(body.ids) ? body.ids.filter((v): v is string => typeof v === "string") : null;
    const items = listLibraryEntries().filter((item) => !ids || ids.includes(item.id));
    if (!items.length) return c.json({ error: getNoContentMessage() }, 412);
    try {
      const generated = await generateTags(items, deps.chat);
      const tags = items.map((item) => ({
        id: item.id,
        title: item.title,
        url: item.sourceUrl,
        tags: generated[item.id] ?? [],
      }));
      if (c.req.query("format") === "csv") return csvDownload(c, tagsToCsv(tags), "content_tags.csv");
      return c.json({ tags });
    } catch (err) {
      return failure(c, err);
    }
  });

  app.post("/api/analysis/custom", async (c) => {
    const body = await readJsonBody(c);
    if (!body) return c.json({ error: "Invalid JSON body." }, 400);
    const question = stringField(body, "question");
    if (!question) return c.json({ error: "A non-empty 'question' is required." }, 400);
    const items = listLibraryEntries();
    if (!items.length) return c.json({ error: getNoContentMessage() }, 412);
    try {
      return c.json({ question, result: await runCustomAnalysis(question, items, deps.chat) });
    } catch (err) {
      return failure(c, err);
    }
  });

  app.post("/api/library/:id/social", async (c) => {
    const item = getContentItem(c.req.param("id"));
    if (!item) return c.json({ error: "Content item not found." }, 404);
    const body = (await readJsonBody(c)) ?? {};
    const platformRaw = stringField(body, "platform") || "twitter";
    if (platformRaw !== "twitter" && platformRaw !== "linkedin") {
      return c.json({ error: "platform must be 'twitter' or 'linkedin'." }, 400);
    }
    const platform: SocialPlatform = platformRaw;
    const count = Math.max(1, Math.min(5, Math.floor(numberField(body, "count") ?? 3)));
    try {
      return c.json({ itemId: item.id, platform, posts: await draftSocialPosts(item, platform, count, deps.chat) });
    } catch (err) {
      return failure(c, err);
    }
  });

  // ── Static front page (optional) ───────────────────────────
  if (config.serveStatic) {
    app.use("/*", serveStatic({ root: "./public" }));
  }

  return app;
}
