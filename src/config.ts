import dotenv from "dotenv";
import { homedir } from "os";
import { join } from "path";
import { ConfigError } from "./errors.js";
import { DEFAULT_COLLECTION, type IncompatiblePolicy } from "./memory/ledger.js";

dotenv.config();

type Env = Record<string, string | undefined>;

export type StoreKind = "sqlite" | "pinecone";

// ── Helpers ──────────────────────────────────────────────

/** Expand a leading `~` to the current user's home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function optional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function intSetting(env: Env, key: string, fallback: number, min = 1): number {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`, {
      key,
    });
  }
  return value;
}

function floatSetting(env: Env, key: string, fallback: number): number {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`, { key });
  }
  return value;
}

function boolSetting(env: Env, key: string, fallback: boolean): boolean {
  const raw = optional(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${key} must be true or false, got "${raw}"`, { key });
}

function choiceSetting<T extends string>(
  env: Env,
  key: string,
  choices: readonly T[],
  fallback: T,
): T {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const match = choices.find((c) => c === raw.toLowerCase());
  if (!match) {
    throw new ConfigError(
      `${key} must be one of ${choices.join(", ")}, got "${raw}"`,
      { key },
    );
  }
  return match;
}

// ── Config ───────────────────────────────────────────────

export interface AppConfig {
  openRouterApiKey: string | undefined;
  llmModel: string;
  llmTemperature: number;
  maxHistoryRounds: number;
  contextFile: string;

  memory: {
    enabled: boolean;
    topK: number;
    store: StoreKind;
    dbPath: string;
    collection: string;
    onIncompatible: IncompatiblePolicy;
  };

  embedding: {
    model: string;
    baseUrl: string;
    apiKey: string | undefined;
    dimension: number | undefined;
  };

  pinecone: {
    apiKey: string | undefined;
    index: string | undefined;
  };
}

/**
 * Parse settings from an environment map. Credentials are optional here;
 * the component that needs one reports its absence when first used.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const openRouterApiKey = optional(env, "OPENROUTER_API_KEY");
  const rawDimension = optional(env, "EMBEDDING_DIMENSION");

  return {
    openRouterApiKey,
    llmModel: optional(env, "LLM_MODEL") ?? "arcee-ai/trinity-large-preview:free",
    llmTemperature: floatSetting(env, "LLM_TEMPERATURE", 0.7),
    maxHistoryRounds: intSetting(env, "MAX_HISTORY_ROUNDS", 10),
    contextFile: expandHome(
      optional(env, "CONTEXT_FILE") ?? "~/.shell-recall/context.json",
    ),

    // ── Vector memory ─────────────────────────────────────
    memory: {
      enabled: boolSetting(env, "MEMORY_ENABLED", true),
      topK: intSetting(env, "MEMORY_TOP_K", 3),
      store: choiceSetting(env, "MEMORY_STORE", ["sqlite", "pinecone"], "sqlite"),
      dbPath: expandHome(
        optional(env, "MEMORY_DB_PATH") ?? "~/.shell-recall/memory.db",
      ),
      collection: optional(env, "MEMORY_COLLECTION") ?? DEFAULT_COLLECTION,
      onIncompatible: choiceSetting(
        env,
        "MEMORY_ON_INCOMPATIBLE",
        ["reset", "fail"],
        "reset",
      ),
    },

    // ── Embeddings ────────────────────────────────────────
    embedding: {
      model: optional(env, "EMBEDDING_MODEL") ?? "baai/bge-m3",
      baseUrl:
        optional(env, "EMBEDDING_BASE_URL") ?? "https://openrouter.ai/api/v1",
      apiKey: optional(env, "EMBEDDING_API_KEY") ?? openRouterApiKey,
      dimension:
        rawDimension === undefined
          ? undefined
          : intSetting(env, "EMBEDDING_DIMENSION", 1),
    },

    pinecone: {
      apiKey: optional(env, "PINECONE_API_KEY"),
      index: optional(env, "PINECONE_INDEX"),
    },
  };
}
