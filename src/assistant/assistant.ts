import { existsSync, readFileSync } from "fs";
import { basename } from "path";
import { errorMessage } from "../errors.js";
import { log, type Logger } from "../logger.js";
import type { CompletionService } from "../llm/client.js";
import { buildUserPrompt } from "../memory/context-builder.js";
import {
  saveConversation,
  type ConversationBuffer,
} from "../memory/conversation-buffer.js";
import type { MemoryLedger } from "../memory/ledger.js";
import type {
  ConversationTurn,
  MemoryStats,
  SearchResult,
} from "../memory/types.js";
import { detectLanguage } from "./language.js";

// ── Assistant: one conversation, short- and long-term memory ─

/** Prompts this short are answered without a memory lookup. */
const MIN_QUERY_CHARS_FOR_RECALL = 11;
const PREVIEW_LINES = 10;

export interface AssistantOptions {
  completion: CompletionService;
  buffer: ConversationBuffer;
  /** Null runs without vector memory. */
  ledger: MemoryLedger | null;
  maxRounds: number;
  topK?: number;
  /** Where the buffer is saved after every change; omit to keep it in memory. */
  contextFile?: string;
  logger?: Logger;
}

export interface LoadedFile {
  path: string;
  language: string;
  lineCount: number;
  preview: string;
  /** Id of the code memory, or null when vector memory is off or failed. */
  memoryId: string | null;
}

/**
 * Runs chat turns: recall related memories, ask for a completion over the
 * bounded buffer, then record both sides of the exchange.
 *
 * Memory failures are reported and the turn carries on without vector
 * memory; completion failures go back to the caller.
 */
export class Assistant {
  private readonly completion: CompletionService;
  private readonly buffer: ConversationBuffer;
  private readonly ledger: MemoryLedger | null;
  private readonly maxRounds: number;
  private readonly topK: number;
  private readonly contextFile?: string;
  private readonly logger: Logger;

  constructor(options: AssistantOptions) {
    this.completion = options.completion;
    this.buffer = options.buffer;
    this.ledger = options.ledger;
    this.maxRounds = options.maxRounds;
    this.topK = options.topK ?? 3;
    this.contextFile = options.contextFile;
    this.logger = options.logger ?? log;
  }

  get memoryEnabled(): boolean {
    return this.ledger !== null;
  }

  history(): ConversationTurn[] {
    return this.buffer.turns();
  }

  // ── Chat ───────────────────────────────────────────────

  async chat(
    prompt: string,
    onDelta?: (text: string) => void,
  ): Promise<string> {
    const memories = await this.recall(prompt);
    const userTurn: ConversationTurn = {
      role: "user",
      content: buildUserPrompt(prompt, memories),
    };

    const reply = await this.completion.complete(
      [...this.buffer.turns(), userTurn],
      onDelta,
    );

    this.buffer.append(userTurn);
    if (reply) this.buffer.append({ role: "assistant", content: reply });
    this.buffer.trim(this.maxRounds);
    this.persist();

    await this.remember(async (ledger) => {
      await ledger.recordMemory("user", prompt, { type: "query" });
      if (reply) {
        await ledger.recordMemory("assistant", reply, { type: "response" });
      }
    });

    return reply;
  }

  private async recall(prompt: string): Promise<SearchResult[]> {
    if (!this.ledger || prompt.length < MIN_QUERY_CHARS_FOR_RECALL) return [];
    try {
      return await this.ledger.searchRelevant(prompt, this.topK);
    } catch (err) {
      this.logger.warn(
        { error: errorMessage(err) },
        "⚠️ Memory search failed, answering without recalled context",
      );
      return [];
    }
  }

  /** Run a ledger write; a failure is reported and yields null. */
  private async remember<T>(
    write: (ledger: MemoryLedger) => Promise<T>,
  ): Promise<T | null> {
    if (!this.ledger) return null;
    try {
      return await write(this.ledger);
    } catch (err) {
      this.logger.warn(
        { error: errorMessage(err) },
        "⚠️ Failed to save to vector memory",
      );
      return null;
    }
  }

  // ── Files ──────────────────────────────────────────────

  /** Put a source file into the conversation and into vector memory. */
  async loadCodeFile(path: string): Promise<LoadedFile> {
    if (!existsSync(path)) {
      throw new Error(`File not found: ${path}`);
    }
    const code = readFileSync(path, "utf-8");
    const language = detectLanguage(path);
    const message =
      `The following is a ${language} source code file named \`${basename(path)}\`:\n` +
      "```\n" +
      `${code}\n` +
      "```";

    this.buffer.append({ role: "user", content: message });
    this.buffer.trim(this.maxRounds);
    this.persist();

    const memoryId = await this.remember((ledger) =>
      ledger.recordCodeMemory("user", message, path, language, {
        type: "code_load",
      }),
    );

    const lines = code.split("\n");
    let preview = lines.slice(0, PREVIEW_LINES).join("\n");
    if (lines.length > PREVIEW_LINES) preview += "\n...";

    return { path, language, lineCount: lines.length, preview, memoryId };
  }

  // ── Housekeeping ───────────────────────────────────────

  async memoryStats(): Promise<MemoryStats | null> {
    return this.ledger ? this.ledger.stats() : null;
  }

  /** Forget the short-term conversation only. */
  clearHistory(): void {
    this.buffer.clear();
    this.persist();
  }

  /** Forget everything: vector memory and the conversation. */
  async clearAll(): Promise<void> {
    if (this.ledger) await this.ledger.clear();
    this.clearHistory();
  }

  private persist(): void {
    if (this.contextFile) saveConversation(this.contextFile, this.buffer);
  }
}
