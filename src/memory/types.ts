// ── Memory Module: Shared Types ─────────────────────────

export type MemoryRole = "user" | "assistant";

export type MetadataValue = string | number | boolean;

export interface MemoryMetadata {
  role: MemoryRole;
  /** ISO-8601 creation time */
  timestamp: string;
  /** "text" | "code" | a caller-supplied tag such as "query" */
  type: string;
  file_path?: string;
  language?: string;
  [key: string]: MetadataValue | undefined;
}

/** Caller-supplied metadata merged over the defaults on record. */
export type ExtraMetadata = Record<string, MetadataValue>;

export interface MemoryRecord {
  id: string;
  document: string;
  metadata: MemoryMetadata;
  vector?: number[];
}

/** A record read back with its embedding. */
export interface StoredRecord extends MemoryRecord {
  vector: number[];
}

export interface ScoredRecord extends MemoryRecord {
  /** Cosine distance to the query, in [0, 2]. Smaller is closer. */
  distance: number;
}

/** All-must-match equality constraints on metadata. */
export type MetadataFilter = Record<string, MetadataValue>;

// ── Collections ──────────────────────────────────────────

export type DistanceMetric = "cosine";

/** Documents are plain text. */
export const CURRENT_SCHEMA_VERSION = 2;
/** Documents are JSON-serialized structures. */
export const LEGACY_SCHEMA_VERSION = 1;

export interface CollectionConfig {
  name: string;
  metric: DistanceMetric;
  /** Fixed dimensionality; when omitted the first insert establishes it. */
  dimension?: number;
  /**
   * Version stamped on a newly created collection. Defaults to the current
   * version; `null` creates an unversioned collection.
   */
  schemaVersion?: number | null;
}

export interface CollectionInfo {
  name: string;
  metric: string;
  dimension: number | null;
  schemaVersion: number | null;
  count: number;
}

/**
 * Durable collection of embedded records. Implementations serialize their
 * own access; callers issue one operation at a time.
 */
export interface VectorStore {
  /** Open the named collection, creating it when missing. */
  open(config: CollectionConfig): Promise<CollectionInfo>;
  /** Describe the open collection. */
  info(): Promise<CollectionInfo>;
  /** Delete the open collection entirely, configuration included. */
  drop(): Promise<void>;
  insert(
    vector: number[],
    document: string,
    metadata: MemoryMetadata,
    id?: string,
  ): Promise<string>;
  query(
    vector: number[],
    topK: number,
    filter?: MetadataFilter,
  ): Promise<ScoredRecord[]>;
  getAll(options: { includeVectors: true }): Promise<StoredRecord[]>;
  getAll(options?: { includeVectors?: boolean }): Promise<MemoryRecord[]>;
  /** Remove every record; name, metric and fixed dimension survive. */
  reset(): Promise<void>;
  /** Swap the whole content for `records` and stamp `schemaVersion`. */
  replaceAll(records: StoredRecord[], schemaVersion: number): Promise<void>;
  close(): Promise<void>;
}

// ── Ledger results ───────────────────────────────────────

export interface SearchResult {
  content: string;
  metadata: MemoryMetadata;
  distance: number;
  /** `1 - distance`; ranges over [-1, 1], not a probability. */
  relevanceScore: number;
}

export interface RecentMemory {
  content: string;
  metadata: MemoryMetadata;
  timestamp: string;
}

export interface MemoryStats {
  totalCount: number;
  countsByRole: Record<string, number>;
  countsByType: Record<string, number>;
}

// ── Conversation buffer ──────────────────────────────────

export type TurnRole = "user" | "assistant" | "system";

export interface ConversationTurn {
  role: TurnRole;
  content: string;
}
