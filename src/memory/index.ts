import type { AppConfig } from "../config.js";
import { OpenAIEmbeddingProvider, type EmbeddingProvider } from "./embedder.js";
import { MemoryLedger } from "./ledger.js";
import { createPineconeIndex } from "./pinecone.js";
import { PineconeVectorStore } from "./pinecone-store.js";
import { SqliteVectorStore } from "./sqlite-store.js";
import type { VectorStore } from "./types.js";

export { MemoryLedger, codeMarker, DEFAULT_COLLECTION } from "./ledger.js";
export { MemoryMigrator, decodeLegacyDocument } from "./migrator.js";
export {
  ConversationBuffer,
  loadConversation,
  saveConversation,
} from "./conversation-buffer.js";
export { buildMemoryContext, buildUserPrompt } from "./context-builder.js";
export { OpenAIEmbeddingProvider, SqliteVectorStore, PineconeVectorStore };
export type { EmbeddingProvider } from "./embedder.js";
export type * from "./types.js";

// ── Wiring from configuration ────────────────────────────

export function createVectorStore(config: AppConfig): VectorStore {
  if (config.memory.store === "pinecone") {
    return new PineconeVectorStore(
      createPineconeIndex(config.pinecone.apiKey, config.pinecone.index),
    );
  }
  return new SqliteVectorStore(config.memory.dbPath);
}

export function createEmbedder(config: AppConfig): EmbeddingProvider {
  return new OpenAIEmbeddingProvider({
    apiKey: config.embedding.apiKey,
    baseURL: config.embedding.baseUrl,
    model: config.embedding.model,
    dimension: config.embedding.dimension,
  });
}

/** Open the configured store and bring the ledger up on it. */
export async function openLedger(config: AppConfig): Promise<MemoryLedger> {
  const store = createVectorStore(config);
  try {
    return await MemoryLedger.open({
      store,
      embedder: createEmbedder(config),
      collection: config.memory.collection,
      dimension: config.embedding.dimension,
      onIncompatible: config.memory.onIncompatible,
    });
  } catch (err) {
    await store.close();
    throw err;
  }
}
