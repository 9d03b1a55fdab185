import OpenAI from "openai";
import { EmbeddingError, errorMessage } from "../errors.js";

// ── Embedder: OpenAI-compatible embeddings API ──────────

/** Turns text into a fixed-length vector. */
export interface EmbeddingProvider {
  readonly name: string;
  /** Known output dimensionality, when the model's is fixed and declared. */
  readonly dimension?: number;
  embed(text: string): Promise<number[]>;
}

/** The part of the OpenAI client this provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: {
      model: string;
      input: string;
      encoding_format: "float";
    }): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface OpenAIEmbeddingOptions {
  apiKey: string | undefined;
  baseURL: string;
  model: string;
  dimension?: number;
  /** Inputs longer than this are cut before sending. */
  maxInputChars?: number;
  client?: EmbeddingsClient;
}

/**
 * Embeddings from any OpenAI-compatible endpoint (OpenRouter by default).
 * The client is built on first use, so a missing key only surfaces when
 * something actually needs a vector.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly dimension?: number;
  private client: EmbeddingsClient | null;

  constructor(private readonly options: OpenAIEmbeddingOptions) {
    this.name = `openai:${options.model}`;
    this.dimension = options.dimension;
    this.client = options.client ?? null;
  }

  async embed(text: string): Promise<number[]> {
    const client = this.getClient();
    const input = text.slice(0, this.options.maxInputChars ?? 8000);

    let response: { data: Array<{ embedding: number[] }> };
    try {
      response = await client.embeddings.create({
        model: this.options.model,
        input,
        encoding_format: "float",
      });
    } catch (err) {
      throw new EmbeddingError(`Embedding request failed: ${errorMessage(err)}`, {
        cause: err,
        context: { model: this.options.model },
      });
    }

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new EmbeddingError("Embedding endpoint returned no vector", {
        context: { model: this.options.model },
      });
    }
    return embedding;
  }

  private getClient(): EmbeddingsClient {
    if (this.client) return this.client;
    if (!this.options.apiKey) {
      throw new EmbeddingError(
        "No embedding API key configured (set EMBEDDING_API_KEY or OPENROUTER_API_KEY)",
      );
    }
    this.client = new OpenAI({
      apiKey: this.options.apiKey,
      baseURL: this.options.baseURL,
    });
    return this.client;
  }
}
