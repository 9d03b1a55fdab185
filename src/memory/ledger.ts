import {
  EmbeddingError,
  MemoryError,
  StorageError,
  errorMessage,
} from "../errors.js";
import { log, type Logger } from "../logger.js";
import type { EmbeddingProvider } from "./embedder.js";
import { MemoryMigrator, type MigrationReport } from "./migrator.js";
import type {
  CollectionInfo,
  ExtraMetadata,
  MemoryMetadata,
  MemoryRole,
  MemoryStats,
  MetadataFilter,
  RecentMemory,
  SearchResult,
  VectorStore,
} from "./types.js";

// ── MemoryLedger: long-term vector memory ───────────────

export const DEFAULT_COLLECTION = "shell_assistant";

export type IncompatiblePolicy = "reset" | "fail";

/** Embedded once at open when the embedder does not declare its size. */
const DIMENSION_PROBE = "dimension check";

export interface MemoryLedgerOptions {
  store: VectorStore;
  embedder: EmbeddingProvider;
  collection?: string;
  /** Required dimensionality; defaults to the embedder's declared one. */
  dimension?: number;
  /**
   * What to do when the stored collection cannot hold this embedder's
   * vectors. `reset` drops it and starts empty; `fail` refuses to start.
   */
  onIncompatible?: IncompatiblePolicy;
  now?: () => Date;
  logger?: Logger;
}

/** Marker line appended to code memories so retrieval shows their origin. */
export function codeMarker(language: string, filePath: string): string {
  return `\n\n# [${language.toUpperCase()}] CODE MEMORY: ${filePath}\n`;
}

/** A caller-supplied string `type` wins over the default. */
function typeTag(metadata: ExtraMetadata, fallback: string): string {
  const type = metadata["type"];
  return typeof type === "string" ? type : fallback;
}

function buildFilter(role?: MemoryRole, type?: string): MetadataFilter {
  const filter: MetadataFilter = {};
  if (role) filter["role"] = role;
  if (type) filter["type"] = type;
  return filter;
}

/**
 * Records conversation turns and loaded code as embeddings and finds the
 * ones most relevant to a new query.
 *
 * Every failure reaches the caller as a typed error. Nothing is dropped
 * quietly: a lost record would only show up later as worse retrieval.
 */
export class MemoryLedger {
  private constructor(
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingProvider,
    private readonly now: () => Date,
    private readonly logger: Logger,
    readonly collection: string,
    readonly migration: MigrationReport,
  ) {}

  /** Open (or create) the collection, settle incompatibilities, then migrate. */
  static async open(options: MemoryLedgerOptions): Promise<MemoryLedger> {
    const logger = options.logger ?? log;
    const name = options.collection ?? DEFAULT_COLLECTION;
    const declared = options.dimension ?? options.embedder.dimension;
    const config = { name, metric: "cosine" as const, dimension: declared };

    let info = await options.store.open(config);
    let dimension = declared;
    if (dimension === undefined && info.dimension !== null) {
      // A previous run fixed the size; find out whether this model still matches it.
      dimension = (await embedWith(options.embedder, DIMENSION_PROBE)).length;
      logger.debug(
        { embedder: options.embedder.name, dimension },
        "📏 Learned embedding dimension",
      );
    }
    const problem = incompatibility(info, dimension);
    if (problem) {
      if ((options.onIncompatible ?? "reset") === "fail") {
        throw new StorageError(
          `Collection "${name}" is incompatible: ${problem}`,
          { context: { collection: name } },
        );
      }
      logger.warn(
        { collection: name, records: info.count, problem },
        "⚠️ Incompatible memory collection, recreating it empty",
      );
      await options.store.drop();
      info = await options.store.open({ ...config, dimension });
    }

    const migration = await new MemoryMigrator(options.store, logger).migrate(info);

    logger.info(
      {
        collection: name,
        embedder: options.embedder.name,
        records: info.count,
      },
      "🧠 Vector memory ready",
    );

    return new MemoryLedger(
      options.store,
      options.embedder,
      options.now ?? (() => new Date()),
      logger,
      name,
      migration,
    );
  }

  // ── Recording ──────────────────────────────────────────

  async recordMemory(
    role: MemoryRole,
    content: string,
    metadata: ExtraMetadata = {},
  ): Promise<string> {
    const meta: MemoryMetadata = {
      ...metadata,
      role,
      timestamp: this.now().toISOString(),
      type: typeTag(metadata, "text"),
    };
    return this.insert(content, meta);
  }

  async recordCodeMemory(
    role: MemoryRole,
    content: string,
    filePath: string,
    language: string,
    metadata: ExtraMetadata = {},
  ): Promise<string> {
    const document = `${content}${codeMarker(language, filePath)}`;
    const meta: MemoryMetadata = {
      ...metadata,
      role,
      timestamp: this.now().toISOString(),
      type: typeTag(metadata, "code"),
      file_path: filePath,
      language,
    };
    return this.insert(document, meta);
  }

  private async insert(document: string, metadata: MemoryMetadata): Promise<string> {
    const vector = await this.embed(document);
    const id = await this.store.insert(vector, document, metadata);
    this.logger.debug(
      { id, role: metadata.role, type: metadata.type },
      "💾 Memory recorded",
    );
    return id;
  }

  // ── Retrieval ──────────────────────────────────────────

  async searchRelevant(
    query: string,
    topK = 3,
    filterRole?: MemoryRole,
    filterType?: string,
  ): Promise<SearchResult[]> {
    const vector = await this.embed(query);
    const matches = await this.store.query(
      vector,
      topK,
      buildFilter(filterRole, filterType),
    );
    return matches.map((m) => ({
      content: m.document,
      metadata: m.metadata,
      distance: m.distance,
      relevanceScore: 1 - m.distance,
    }));
  }

  /** Newest first. Scans the whole collection. */
  async getRecent(
    limit = 10,
    filterRole?: MemoryRole,
    filterType?: string,
  ): Promise<RecentMemory[]> {
    const records = await this.store.getAll();
    return records
      .filter(
        (r) =>
          (!filterRole || r.metadata.role === filterRole) &&
          (!filterType || r.metadata.type === filterType),
      )
      .map((r) => ({
        content: r.document,
        metadata: r.metadata,
        timestamp: r.metadata.timestamp,
      }))
      .sort((a, b) =>
        a.timestamp === b.timestamp ? 0 : a.timestamp < b.timestamp ? 1 : -1,
      )
      .slice(0, Math.max(0, limit));
  }

  async stats(): Promise<MemoryStats> {
    const records = await this.store.getAll();
    const stats: MemoryStats = {
      totalCount: records.length,
      countsByRole: {},
      countsByType: {},
    };
    for (const { metadata } of records) {
      stats.countsByRole[metadata.role] = (stats.countsByRole[metadata.role] ?? 0) + 1;
      stats.countsByType[metadata.type] = (stats.countsByType[metadata.type] ?? 0) + 1;
    }
    return stats;
  }

  async clear(): Promise<void> {
    await this.store.reset();
    this.logger.info({ collection: this.collection }, "🧹 All memories cleared");
  }

  async info(): Promise<CollectionInfo> {
    return this.store.info();
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  // ── Embedding ──────────────────────────────────────────

  private embed(text: string): Promise<number[]> {
    return embedWith(this.embedder, text);
  }
}

async function embedWith(embedder: EmbeddingProvider, text: string): Promise<number[]> {
  let vector: number[];
  try {
    vector = await embedder.embed(text);
  } catch (err) {
    if (err instanceof MemoryError) throw err;
    throw new EmbeddingError(`${embedder.name} failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (vector.length === 0 || !vector.every((x) => Number.isFinite(x))) {
    throw new EmbeddingError(`${embedder.name} returned an unusable vector`);
  }
  return vector;
}

/** Why `info` cannot hold vectors of `dimension`, or null when it can. */
function incompatibility(
  info: CollectionInfo,
  dimension: number | undefined,
): string | null {
  if (info.metric !== "cosine") {
    return `metric is ${info.metric}, expected cosine`;
  }
  if (
    dimension !== undefined &&
    info.dimension !== null &&
    info.dimension !== dimension
  ) {
    return `dimension is ${info.dimension}, expected ${dimension}`;
  }
  return null;
}
