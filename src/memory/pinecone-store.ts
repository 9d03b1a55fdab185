import { randomUUID } from "crypto";
import { MemoryError, StorageError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type {
  PineconeIndexClient,
  PineconeMetadata,
  PineconeNamespaceClient,
  PineconeRecordLike,
} from "./pinecone.js";
import {
  assertVector,
  compactMetadata,
  parseMetadata,
} from "./records.js";
import {
  CURRENT_SCHEMA_VERSION,
  type CollectionConfig,
  type CollectionInfo,
  type MemoryMetadata,
  type MemoryRecord,
  type MetadataFilter,
  type ScoredRecord,
  type StoredRecord,
  type VectorStore,
} from "./types.js";

// ── Pinecone Vector Store ────────────────────────────────

/** Namespace holding one marker record per collection. */
export const MARKER_NAMESPACE = "__collections__";
/** Metadata key carrying the record's document text. */
export const DOCUMENT_KEY = "document";
const BATCH_SIZE = 100;

interface CollectionMarker {
  metric: string;
  schemaVersion: number | null;
  /** Namespace holding the records; the collection name unless a swap moved it. */
  activeNamespace: string;
}

/** Pinecone's `$eq` filter syntax for an all-must-match equality map. */
function toPineconeFilter(filter: MetadataFilter): object | undefined {
  const entries = Object.entries(filter);
  if (entries.length === 0) return undefined;
  return Object.fromEntries(entries.map(([k, v]) => [k, { $eq: v }]));
}

/** Pinecone answers 404 for a namespace that holds nothing. */
function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.name === "PineconeNotFoundError" || /\b404\b/.test(err.message);
}

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

/**
 * Vector store on a Pinecone serverless index: one namespace per collection.
 *
 * Dimensionality belongs to the index, so a collection can never disagree
 * with it; asking for a different dimension fails instead of resetting.
 * Pinecone has no namespace rename, so `replaceAll` fills a fresh namespace
 * and then points the collection's marker at it. Readers see either the old
 * records or the new ones, never a mix.
 */
export class PineconeVectorStore implements VectorStore {
  private collection: string | null = null;
  private active: string | null = null;
  private dimension: number | null = null;

  constructor(private readonly index: PineconeIndexClient) {}

  // ── Collection lifecycle ───────────────────────────────

  async open(config: CollectionConfig): Promise<CollectionInfo> {
    const stats = await this.call("describeIndexStats", () =>
      this.index.describeIndexStats(),
    );
    const dimension = stats.dimension;
    if (dimension === undefined) {
      throw new StorageError("Pinecone did not report the index dimension");
    }
    if (config.dimension !== undefined && config.dimension !== dimension) {
      throw new StorageError(
        `Pinecone index dimension is ${dimension}, expected ${config.dimension}; recreate the index to change it`,
        { context: { expected: config.dimension, actual: dimension } },
      );
    }
    this.dimension = dimension;

    let marker = await this.readMarker(config.name);
    if (!marker) {
      marker = {
        metric: config.metric,
        schemaVersion:
          config.schemaVersion === undefined
            ? CURRENT_SCHEMA_VERSION
            : config.schemaVersion,
        activeNamespace: config.name,
      };
      await this.writeMarker(config.name, marker);
    }
    this.collection = config.name;
    this.active = marker.activeNamespace;
    return this.info();
  }

  async info(): Promise<CollectionInfo> {
    const name = this.requireOpen();
    const marker = await this.readMarker(name);
    if (!marker) {
      throw new StorageError(`Collection "${name}" no longer exists`, {
        context: { collection: name },
      });
    }
    this.active = marker.activeNamespace;
    return {
      name,
      metric: marker.metric,
      dimension: this.dimension,
      schemaVersion: marker.schemaVersion,
      count: await this.count(marker.activeNamespace),
    };
  }

  async drop(): Promise<void> {
    const name = this.requireOpen();
    await this.clearNamespace(this.activeNamespace());
    await this.call("deleteMarker", () =>
      this.index.namespace(MARKER_NAMESPACE).deleteMany([name]),
    );
    this.collection = null;
    this.active = null;
  }

  async close(): Promise<void> {
    this.collection = null;
    this.active = null;
  }

  // ── Records ────────────────────────────────────────────

  async insert(
    vector: number[],
    document: string,
    metadata: MemoryMetadata,
    id: string = randomUUID(),
  ): Promise<string> {
    const name = this.activeNamespace();
    assertVector(vector, this.dimension);
    await this.call("upsert", () =>
      this.ns(name).upsert([this.toRecord(id, vector, document, metadata)]),
    );
    return id;
  }

  async query(
    vector: number[],
    topK: number,
    filter: MetadataFilter = {},
  ): Promise<ScoredRecord[]> {
    const name = this.activeNamespace();
    if (topK < 1) return [];
    assertVector(vector, this.dimension);

    const result = await this.call("query", () =>
      this.ns(name).query({
        vector,
        topK,
        filter: toPineconeFilter(filter),
        includeMetadata: true,
        includeValues: false,
      }),
    );

    // Cosine indexes report similarity as the score.
    const scored = (result.matches ?? []).map((m) => ({
      ...this.fromMetadata(m.id, m.metadata),
      distance: 1 - (m.score ?? 0),
    }));
    return scored.sort((a, b) => a.distance - b.distance);
  }

  getAll(options: { includeVectors: true }): Promise<StoredRecord[]>;
  getAll(options?: { includeVectors?: boolean }): Promise<MemoryRecord[]>;
  async getAll(
    options: { includeVectors?: boolean } = {},
  ): Promise<MemoryRecord[]> {
    const name = this.activeNamespace();
    const ids = await this.listIds(name);

    const records: MemoryRecord[] = [];
    for (const batch of chunk(ids, BATCH_SIZE)) {
      const fetched = await this.call("fetch", () => this.ns(name).fetch(batch));
      for (const id of batch) {
        const raw = fetched.records[id];
        if (!raw) continue; // deleted between list and fetch
        const record = this.fromMetadata(id, raw.metadata);
        if (options.includeVectors) record.vector = raw.values ?? [];
        records.push(record);
      }
    }

    // Listing is ordered by id; creation time is the closest thing to insertion order.
    return records.sort((a, b) =>
      a.metadata.timestamp === b.metadata.timestamp
        ? a.id.localeCompare(b.id)
        : a.metadata.timestamp < b.metadata.timestamp
          ? -1
          : 1,
    );
  }

  async reset(): Promise<void> {
    const name = this.requireOpen();
    const marker = await this.readMarker(name);
    const active = marker?.activeNamespace ?? name;
    await this.clearNamespace(active);
    await this.writeMarker(name, {
      metric: marker?.metric ?? "cosine",
      schemaVersion: CURRENT_SCHEMA_VERSION,
      activeNamespace: active,
    });
    this.active = active;
  }

  async replaceAll(
    records: StoredRecord[],
    schemaVersion: number,
  ): Promise<void> {
    const name = this.requireOpen();
    for (const r of records) assertVector(r.vector, this.dimension);

    const marker = await this.readMarker(name);
    const previous = marker?.activeNamespace ?? name;
    const staging = `${name}.v${schemaVersion}.${randomUUID().slice(0, 8)}`;

    try {
      for (const batch of chunk(records, BATCH_SIZE)) {
        await this.call("upsert", () =>
          this.ns(staging).upsert(
            batch.map((r) => this.toRecord(r.id, r.vector, r.document, r.metadata)),
          ),
        );
      }
    } catch (err) {
      await this.discard(staging, err);
      throw err;
    }

    await this.writeMarker(name, {
      metric: marker?.metric ?? "cosine",
      schemaVersion,
      activeNamespace: staging,
    });
    this.active = staging;

    try {
      await this.clearNamespace(previous);
    } catch (err) {
      log.warn(
        { collection: name, namespace: previous, error: errorMessage(err) },
        "⚠️ Could not clear the replaced Pinecone namespace",
      );
    }
  }

  // ── Internals ──────────────────────────────────────────

  private ns(name: string): PineconeNamespaceClient {
    return this.index.namespace(name);
  }

  private toRecord(
    id: string,
    vector: number[],
    document: string,
    metadata: MemoryMetadata,
  ): PineconeRecordLike {
    return {
      id,
      values: vector,
      metadata: { ...compactMetadata(metadata), [DOCUMENT_KEY]: document },
    };
  }

  private fromMetadata(
    id: string,
    raw: PineconeMetadata | undefined,
  ): MemoryRecord {
    const document = raw?.[DOCUMENT_KEY];
    if (typeof document !== "string") {
      throw new StorageError(`Record ${id} carries no document text`, {
        context: { recordId: id },
      });
    }
    return {
      id,
      document,
      metadata: parseMetadata(raw, id, [DOCUMENT_KEY]),
    };
  }

  private async listIds(name: string): Promise<string[]> {
    const ids: string[] = [];
    let paginationToken: string | undefined;
    do {
      const page = await this.call("listPaginated", () =>
        this.ns(name).listPaginated({ limit: BATCH_SIZE, paginationToken }),
      );
      for (const v of page.vectors ?? []) {
        if (v.id) ids.push(v.id);
      }
      paginationToken = page.pagination?.next;
    } while (paginationToken);
    return ids;
  }

  /** Best-effort removal of a half-written staging namespace. */
  private async discard(staging: string, cause: unknown): Promise<void> {
    try {
      await this.clearNamespace(staging);
    } catch (err) {
      log.warn(
        { namespace: staging, cause: errorMessage(cause), error: errorMessage(err) },
        "⚠️ Could not remove a partial Pinecone namespace",
      );
    }
  }

  private async count(name: string): Promise<number> {
    const stats = await this.call("describeIndexStats", () =>
      this.index.describeIndexStats(),
    );
    return stats.namespaces?.[name]?.recordCount ?? 0;
  }

  /** Index stats lag behind writes, so deleteAll always runs; 404 means already empty. */
  private async clearNamespace(name: string): Promise<void> {
    try {
      await this.ns(name).deleteAll();
    } catch (err) {
      if (isNotFound(err)) return;
      throw this.wrap("deleteAll", err);
    }
  }

  private async readMarker(name: string): Promise<CollectionMarker | null> {
    const fetched = await this.call("fetchMarker", () =>
      this.index.namespace(MARKER_NAMESPACE).fetch([name]),
    );
    const meta = fetched.records[name]?.metadata;
    if (!meta) return null;
    const version = meta["schemaVersion"];
    const metric = meta["metric"];
    const active = meta["activeNamespace"];
    return {
      metric: typeof metric === "string" ? metric : "cosine",
      schemaVersion: typeof version === "number" ? version : null,
      activeNamespace: typeof active === "string" ? active : name,
    };
  }

  private async writeMarker(
    name: string,
    marker: CollectionMarker,
  ): Promise<void> {
    const dimension = this.dimension ?? 1;
    // Cosine indexes reject all-zero vectors, so the marker points along the first axis.
    const values = Array.from({ length: dimension }, (_, i) => (i === 0 ? 1 : 0));
    const metadata: PineconeMetadata = {
      metric: marker.metric,
      activeNamespace: marker.activeNamespace,
      updatedAt: new Date().toISOString(),
    };
    if (marker.schemaVersion !== null) {
      metadata["schemaVersion"] = marker.schemaVersion;
    }
    await this.call("writeMarker", () =>
      this.index.namespace(MARKER_NAMESPACE).upsert([{ id: name, values, metadata }]),
    );
  }

  private requireOpen(): string {
    if (this.collection === null) {
      throw new StorageError("No collection is open on this store");
    }
    return this.collection;
  }

  private activeNamespace(): string {
    const name = this.requireOpen();
    return this.active ?? name;
  }

  private async call<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw this.wrap(op, err);
    }
  }

  private wrap(op: string, err: unknown): MemoryError {
    if (err instanceof MemoryError) return err;
    return new StorageError(`Pinecone ${op} failed: ${String(err)}`, {
      cause: err,
      context: { op, collection: this.collection },
    });
  }
}
