import * as readline from "readline";
import type { Assistant } from "../assistant/assistant.js";
import { errorMessage } from "../errors.js";
import type { MemoryStats } from "../memory/types.js";

// ── Interactive Shell ────────────────────────────────────

export type Write = (text: string) => void;
export type LineOutcome = "continue" | "exit";

const HISTORY_PREVIEW_CHARS = 200;

export function banner(maxRounds: number, memoryEnabled: boolean): string {
  return [
    "Shell Recall",
    "-------------------------------------------------",
    `- Multi-turn chat, keeping the last ${maxRounds} rounds`,
    `- Vector memory: ${memoryEnabled ? "on" : "off"}`,
    "- /load <file_path>  load a source file into the conversation",
    "- /history           show the current conversation",
    "- /clear             clear the conversation",
    "- /stats             show vector memory statistics",
    "- /forget            clear vector memory and the conversation",
    "- /exit              quit",
    "-------------------------------------------------",
    "",
  ].join("\n");
}

export function formatStats(stats: MemoryStats): string {
  const breakdown = (counts: Record<string, number>) =>
    Object.entries(counts)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, n]) => `  ${k}: ${n}`)
      .join("\n") || "  (none)";
  return [
    `Total memories: ${stats.totalCount}`,
    "By role:",
    breakdown(stats.countsByRole),
    "By type:",
    breakdown(stats.countsByType),
  ].join("\n");
}

function formatHistory(assistant: Assistant): string {
  const turns = assistant.history();
  if (turns.length === 0) return "(conversation is empty)";
  return turns
    .map((t, i) => {
      const who = t.role === "user" ? "User" : t.role === "assistant" ? "AI" : "System";
      const text =
        t.content.length > HISTORY_PREVIEW_CHARS
          ? `${t.content.slice(0, HISTORY_PREVIEW_CHARS)}...`
          : t.content;
      return `${i + 1}. ${who}: ${text}`;
    })
    .join("\n");
}

/**
 * Handle one line of input: a slash command or a chat prompt. Errors are
 * printed and the session continues.
 */
export async function handleLine(
  line: string,
  assistant: Assistant,
  write: Write,
): Promise<LineOutcome> {
  const input = line.trim();
  if (!input) return "continue";
  const command = input.toLowerCase();

  try {
    if (command === "/exit") {
      write("Goodbye!\n");
      return "exit";
    }

    if (command === "/clear") {
      assistant.clearHistory();
      write("\nConversation history cleared\n\n");
      return "continue";
    }

    if (command === "/history") {
      write(`\nCurrent conversation:\n${formatHistory(assistant)}\n\n`);
      return "continue";
    }

    if (command === "/stats") {
      const stats = await assistant.memoryStats();
      write(stats ? `${formatStats(stats)}\n` : "Vector memory is not enabled\n");
      return "continue";
    }

    if (command === "/forget") {
      await assistant.clearAll();
      write("All memories and conversation history cleared\n");
      return "continue";
    }

    if (command.startsWith("/load ")) {
      const path = input.slice("/load ".length).trim();
      const loaded = await assistant.loadCodeFile(path);
      write(`Loaded '${loaded.path}' (${loaded.language}) into context.\n`);
      write(`\nPreview of loaded code:\n${loaded.preview}\n\n`);
      return "continue";
    }

    write("Assistant: ");
    await assistant.chat(input, write);
    write("\n");
  } catch (err) {
    write(`\n[Error] ${errorMessage(err)}\n`);
  }
  return "continue";
}

/** Read-eval loop on a terminal until /exit or end of input. */
export async function runShell(
  assistant: Assistant,
  options: {
    maxRounds: number;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
  },
): Promise<void> {
  const output = options.output ?? process.stdout;
  const write: Write = (text) => {
    output.write(text);
  };
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output,
    terminal: output === process.stdout && process.stdout.isTTY,
  });

  rl.on("SIGINT", () => {
    write("\n(type /exit to quit)\n");
    rl.prompt();
  });

  write(banner(options.maxRounds, assistant.memoryEnabled));
  rl.setPrompt("You: ");
  rl.prompt();

  try {
    for await (const line of rl) {
      if ((await handleLine(line, assistant, write)) === "exit") break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
