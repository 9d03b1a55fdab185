#!/usr/bin/env node
import { loadConfig, type AppConfig } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { Assistant } from "./assistant/assistant.js";
import { applyOptions, parseCli, type CliOptions } from "./cli/options.js";
import { formatStats, runShell } from "./cli/shell.js";
import { OpenRouterCompletion } from "./llm/client.js";
import { loadConversation } from "./memory/conversation-buffer.js";
import { openLedger, type MemoryLedger } from "./memory/index.js";

// ── Maintenance modes ────────────────────────────────────

async function runMaintenance(config: AppConfig, opts: CliOptions): Promise<void> {
  const ledger = await openLedger(config);
  try {
    if (opts.clearMemories) {
      await ledger.clear();
      process.stdout.write("All vector memories cleared\n");
    }
    if (opts.memoryStats) {
      process.stdout.write(`${formatStats(await ledger.stats())}\n`);
    }
  } finally {
    await ledger.close();
  }
}

// ── Main ─────────────────────────────────────────────────

async function startLedger(config: AppConfig): Promise<MemoryLedger | null> {
  if (!config.memory.enabled) return null;
  try {
    return await openLedger(config);
  } catch (err) {
    log.error(
      { error: errorMessage(err), store: config.memory.store },
      "❌ Vector memory unavailable, continuing without it",
    );
    return null;
  }
}

async function main() {
  const opts = parseCli(process.argv);
  const config = applyOptions(loadConfig(), opts);

  if (opts.memoryStats || opts.clearMemories) {
    await runMaintenance(config, opts);
    return;
  }

  const apiKey = config.openRouterApiKey;
  if (!apiKey) {
    throw new ConfigError(
      "OPENROUTER_API_KEY is not set. Add it to .env or pass --api-key.",
      { key: "OPENROUTER_API_KEY" },
    );
  }

  log.info(
    {
      model: config.llmModel,
      rounds: config.maxHistoryRounds,
      memory: config.memory.enabled ? config.memory.store : "off",
    },
    "🐚 Shell Recall starting",
  );

  const ledger = await startLedger(config);
  const assistant = new Assistant({
    completion: new OpenRouterCompletion({
      apiKey,
      model: config.llmModel,
      temperature: config.llmTemperature,
    }),
    buffer: loadConversation(config.contextFile, config.maxHistoryRounds),
    ledger,
    maxRounds: config.maxHistoryRounds,
    topK: config.memory.topK,
    contextFile: config.contextFile,
  });

  // Graceful shutdown
  const shutdown = async () => {
    log.info("👋 Shutting down Shell Recall...");
    await ledger?.close();
    process.exit(0);
  };
  process.on("SIGTERM", () => void shutdown());

  await runShell(assistant, { maxRounds: config.maxHistoryRounds });
  await ledger?.close();
}

main().catch((error) => {
  log.fatal(error, "💀 Fatal error");
  process.exit(1);
});
