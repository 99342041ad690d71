import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { AppConfig } from "./config";
import { ConfigError } from "./errors";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** Turns texts into embedding vectors, one per input, in input order. */
export type Embedder = (texts: string[]) => Promise<number[][]>;

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ChatModel {
  complete(messages: ChatMessage[], opts?: CompletionOptions): Promise<string>;
  stream(messages: ChatMessage[], opts?: CompletionOptions): AsyncIterable<string>;
}

const EMBED_BATCH_SIZE = 100;

function toParams(messages: ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content };
      case "assistant":
        return { role: "assistant", content: m.content };
      default:
        return { role: "user", content: m.content };
    }
  });
}

export function createOpenAIClient(config: AppConfig): OpenAI {
  if (!config.openaiApiKey) {
    throw new ConfigError("OPENAI_API_KEY is not set. Add it to your .env file.");
  }
  return new OpenAI({
    apiKey: config.openaiApiKey,
    ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
  });
}

export function createOpenAIEmbedder(client: OpenAI, model: string): Embedder {
  return async (texts) => {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += EMBED_BATCH_SIZE) {
      const input = texts.slice(i, i + EMBED_BATCH_SIZE).map((t) => t.replace(/\n/g, " "));
      const res = await client.embeddings.create({ model, input });
      const ordered = [...res.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((d) => d.embedding));
    }
    return vectors;
  };
}

export function createOpenAIChatModel(client: OpenAI, model: string): ChatModel {
  return {
    async complete(messages, opts = {}) {
      const res = await client.chat.completions.create({
        model,
        messages: toParams(messages),
        temperature: opts.temperature ?? 0.3,
        ...(opts.maxTokens ? { max_tokens: opts.maxTokens } : {}),
      });
      return (res.choices[0]?.message?.content ?? "").trim();
    },
    async *stream(messages, opts = {}) {
      const stream = await client.chat.completions.create({
        model,
        messages: toParams(messages),
        temperature: opts.temperature ?? 0.3,
        stream: true,
        ...(opts.maxTokens ? { max_tokens: opts.maxTokens } : {}),
      });
      for await (const part of stream) {
        const delta = part.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    },
  };
}
