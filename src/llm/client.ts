import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions.js";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { ConversationTurn } from "../memory/types.js";
import { withRetry } from "./retry.js";

// ── Completion Client: OpenRouter via the OpenAI SDK ────

export const SYSTEM_PROMPT = `You are Shell Recall, a concise assistant that lives in the user's terminal.
- Help with shell usage, scripting, and the source files the user loads into the conversation.
- When earlier conversation is quoted as relevant context, use it only if it actually helps.
- Prefer short answers with runnable commands or code blocks.
- If you don't know something, say so honestly.`;

/** Streams a reply for the given turns, reporting each text delta as it arrives. */
export interface CompletionService {
  complete(
    turns: ConversationTurn[],
    onDelta?: (text: string) => void,
  ): Promise<string>;
}

function toMessage(turn: ConversationTurn): ChatCompletionMessageParam {
  switch (turn.role) {
    case "system":
      return { role: "system", content: turn.content };
    case "assistant":
      return { role: "assistant", content: turn.content };
    case "user":
      return { role: "user", content: turn.content };
  }
}

export interface OpenRouterOptions {
  apiKey: string;
  model: string;
  temperature: number;
  baseURL?: string;
}

export class OpenRouterCompletion implements CompletionService {
  private readonly llm: OpenAI;

  constructor(private readonly options: OpenRouterOptions) {
    this.llm = new OpenAI({
      baseURL: options.baseURL ?? "https://openrouter.ai/api/v1",
      apiKey: options.apiKey,
      defaultHeaders: {
        "HTTP-Referer": "https://localhost:3000",
        "X-Title": "Shell Recall",
      },
    });
  }

  async complete(
    turns: ConversationTurn[],
    onDelta?: (text: string) => void,
  ): Promise<string> {
    const started = Date.now();
    // Only opening the stream is retried; a half-delivered reply is not replayed.
    const stream = await withRetry(
      () =>
        this.llm.chat.completions.create({
          model: this.options.model,
          temperature: this.options.temperature,
          stream: true,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            ...turns.map(toMessage),
          ],
        }),
      { label: "completion" },
    );

    let full = "";
    try {
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          full += delta;
          onDelta?.(delta);
        }
      }
    } catch (err) {
      log.warn(
        { model: this.options.model, error: errorMessage(err), received: full.length },
        "⚠️ Completion stream interrupted",
      );
      throw err;
    }

    log.debug(
      { model: this.options.model, latencyMs: Date.now() - started, chars: full.length },
      "🤖 Completion finished",
    );
    return full;
  }
}
