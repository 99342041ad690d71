import { getLibraryStats } from "./db";
import { errorMessage } from "./errors";
import type { ChatMessage } from "./llm";
import { getInsufficientInfoMessage, getModelErrorMessage, getNoContentMessage } from "./policy";
import { retrieveContext, type RagDeps, type SourceRef } from "./rag";

export type ChatTurn = { role: "user" | "assistant"; content: string };

export type ChatAnswer = {
  ok: boolean;
  answer: string;
  question: string;
  sources: SourceRef[];
};

const HISTORY_TURNS = 6;
const ANSWER_TEMPERATURE = 0.7;

export function buildSystemPrompt(context: string): string {
  return `You are a librarian for the user's personal content library.

Goals:
- Answer using only the LIBRARY CONTEXT below. Do not invent details.
- When the context does not cover the question, say: "${getInsufficientInfoMessage()}"
- Mention the titles of the pieces you relied on.

Style:
- Be concise and direct.

LIBRARY CONTEXT:
${context || "(no matching content)"}`;
}

export function buildMessages(context: string, question: string, history: ChatTurn[]): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt(context) },
    ...history.slice(-HISTORY_TURNS),
    { role: "user", content: question },
  ];
}

function formatHistory(history: ChatTurn[]): string {
  return history
    .slice(-HISTORY_TURNS)
    .map((t) => `${t.role === "user" ? "Human" : "Assistant"}: ${t.content}`)
    .join("\n");
}

/** Rewrites a follow-up question so it can be searched without the conversation. */
export async function condenseQuestion(question: string, history: ChatTurn[], deps: Pick<RagDeps, "chat">): Promise<string> {
  if (!history.length) return question;
  const rewritten = await deps.chat.complete(
    [
      {
        role: "user",
        content: `Given the conversation below and a follow-up question, rephrase the follow-up as a standalone question. Reply with the question only.\n\nConversation:\n${formatHistory(history)}\n\nFollow-up question: ${question}\n\nStandalone question:`,
      },
    ],
    { temperature: 0 }
  );
  return rewritten || question;
}

export async function answerQuestion(question: string, history: ChatTurn[], deps: RagDeps): Promise<ChatAnswer> {
  if (getLibraryStats().chunkCount === 0) {
    return { ok: false, answer: getNoContentMessage(), question, sources: [] };
  }
  try {
    const standalone = await condenseQuestion(question, history, deps);
    const { context, sources } = await retrieveContext(standalone, deps);
    const answer = await deps.chat.complete(buildMessages(context, question, history), {
      temperature: ANSWER_TEMPERATURE,
    });
    return { ok: true, answer: answer || getInsufficientInfoMessage(), question: standalone, sources };
  } catch (err) {
    console.error("[chat] Error:", err);
    return { ok: false, answer: getModelErrorMessage(errorMessage(err)), question, sources: [] };
  }
}

export async function streamAnswer(
  question: string,
  history: ChatTurn[],
  deps: RagDeps
): Promise<{ stream: ReadableStream<Uint8Array>; sources: SourceRef[] }> {
  if (getLibraryStats().chunkCount === 0) {
    throw new Error(getNoContentMessage());
  }
  const standalone = await condenseQuestion(question, history, deps);
  const { context, sources } = await retrieveContext(standalone, deps);
  const iterator = deps.chat
    .stream(buildMessages(context, question, history), { temperature: ANSWER_TEMPERATURE })
    [Symbol.asyncIterator]();
  const encoder = new TextEncoder();

  const stream = new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { done, value } = await iterator.next();
        if (done) {
          controller.close();
          return;
        }
        controller.enqueue(encoder.encode(value));
      } catch (err) {
        console.error("[chat] Stream error:", err);
        controller.error(err);
      }
    },
    async cancel() {
      await iterator.return?.();
    },
  });
  return { stream, sources };
}
