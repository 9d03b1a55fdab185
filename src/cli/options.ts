import { Command, InvalidArgumentError, Option } from "commander";
import type { AppConfig, StoreKind } from "../config.js";

// ── Command line ─────────────────────────────────────────

export interface CliOptions {
  model?: string;
  maxHistory?: number;
  vectorMemory: boolean;
  memoryStats?: boolean;
  clearMemories?: boolean;
  store?: StoreKind;
  apiKey?: string;
}

function parseRounds(value: string): number {
  const rounds = Number(value);
  if (!Number.isInteger(rounds) || rounds < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return rounds;
}

function parseStore(value: string): StoreKind {
  if (value === "sqlite" || value === "pinecone") return value;
  throw new InvalidArgumentError("Expected sqlite or pinecone.");
}

export function buildProgram(): Command {
  return new Command()
    .name("shell-recall")
    .description("Terminal chat assistant with durable vector memory")
    .option("--model <name>", "chat model to use")
    .option("--max-history <rounds>", "conversation rounds to keep", parseRounds)
    .option("--no-vector-memory", "run without vector memory")
    .option("--memory-stats", "print vector memory statistics and exit")
    .option("--clear-memories", "delete all vector memories and exit")
    .addOption(
      new Option("--store <kind>", "vector store backend (sqlite or pinecone)").argParser(
        parseStore,
      ),
    )
    .option("--api-key <key>", "OpenRouter API key (overrides OPENROUTER_API_KEY)");
}

/**
 * Parse argv in the `node script args...` layout. With `exitOnError` off,
 * bad input throws a CommanderError instead of exiting the process.
 */
export function parseCli(argv: readonly string[], exitOnError = true): CliOptions {
  const program = buildProgram();
  if (!exitOnError) program.exitOverride();
  program.parse([...argv]);
  return program.opts<CliOptions>();
}

/** Fold command line flags over the environment settings. */
export function applyOptions(base: AppConfig, opts: CliOptions): AppConfig {
  return {
    ...base,
    openRouterApiKey: opts.apiKey ?? base.openRouterApiKey,
    llmModel: opts.model ?? base.llmModel,
    maxHistoryRounds: opts.maxHistory ?? base.maxHistoryRounds,
    memory: {
      ...base.memory,
      enabled: base.memory.enabled && opts.vectorMemory,
      store: opts.store ?? base.memory.store,
    },
    embedding: {
      ...base.embedding,
      apiKey: base.embedding.apiKey ?? opts.apiKey,
    },
  };
}
