import type { Context, Next } from "hono";
import type { ChatTurn } from "./chat";

export type AppVars = {
  message: string;
  history: ChatTurn[];
};

export type AppEnv = { Variables: AppVars };

const MAX_MESSAGE_LENGTH = 4000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export async function readJsonBody(c: Context): Promise<Record<string, unknown> | null> {
  try {
    const body: unknown = await c.req.json();
    return isRecord(body) ? body : null;
  } catch {
    return null;
  }
}

export function stringField(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  return typeof value === "string" ? value.trim() : "";
}

function parseHistory(raw: unknown): ChatTurn[] {
  if (!Array.isArray(raw)) return [];
  const turns: ChatTurn[] = [];
  for (const entry of raw) {
    if (entry === null || typeof entry !== "object") continue;
    const role: unknown = "role" in entry ? entry.role : undefined;
    const content: unknown = "content" in entry ? entry.content : undefined;
    if ((role === "user" || role === "assistant") && typeof content === "string" && content.trim()) {
      turns.push({ role, content });
    }
  }
  return turns;
}

// Input validation for chat requests
export async function validateChatInput(c: Context<AppEnv>, next: Next) {
  const body = await readJsonBody(c);
  if (!body) return c.json({ error: "Invalid JSON body." }, 400);

  const message = stringField(body, "message");
  if (message.length < 2) {
    return c.json({ error: "A non-empty 'message' is required." }, 400);
  }
  if (message.length > MAX_MESSAGE_LENGTH) {
    return c.json({ error: "Message is too long." }, 413);
  }

  c.set("message", message);
  c.set("history", parseHistory(body.history));
  await next();
}

// Guards /api/* with an X-API-Key header; /api/status stays open.
export function requireApiKey(apiKey: string) {
  return async (c: Context, next: Next) => {
    if (c.req.path === "/api/status") return next();
    if (c.req.header("x-api-key") !== apiKey) {
      return c.json({ error: "Unauthorized" }, 401);
    }
    await next();
  };
}
