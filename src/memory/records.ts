import { StorageError } from "../errors.js";
import type {
  MemoryMetadata,
  MetadataFilter,
  MetadataValue,
} from "./types.js";

// ── Record helpers shared by the store backends ──────────

function isMetadataValue(value: unknown): value is MetadataValue {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/**
 * Validate metadata read back from storage. Keys the store uses for its own
 * bookkeeping are passed in `skip` and left out of the result.
 */
export function parseMetadata(
  raw: unknown,
  recordId: string,
  skip: readonly string[] = [],
): MemoryMetadata {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new StorageError(`Record ${recordId} has no metadata object`, {
      context: { recordId },
    });
  }

  const fields = new Map<string, MetadataValue>();
  for (const [k, v] of Object.entries(raw)) {
    if (!skip.includes(k) && isMetadataValue(v)) fields.set(k, v);
  }

  const role = fields.get("role");
  const timestamp = fields.get("timestamp");
  const type = fields.get("type");
  if (
    (role !== "user" && role !== "assistant") ||
    typeof timestamp !== "string" ||
    typeof type !== "string"
  ) {
    throw new StorageError(
      `Record ${recordId} is missing role, timestamp or type metadata`,
      { context: { recordId } },
    );
  }

  const metadata: MemoryMetadata = { role, timestamp, type };
  for (const [k, v] of fields) {
    if (k !== "role" && k !== "timestamp" && k !== "type") metadata[k] = v;
  }
  return metadata;
}

/** True when every filter key is present in `metadata` with an equal value. */
export function matchesFilter(
  metadata: MemoryMetadata,
  filter: MetadataFilter,
): boolean {
  return Object.entries(filter).every(([k, v]) => metadata[k] === v);
}

/** Drop keys whose value is undefined so the metadata serializes cleanly. */
export function compactMetadata(
  metadata: MemoryMetadata,
): Record<string, MetadataValue> {
  const out: Record<string, MetadataValue> = {};
  for (const [k, v] of Object.entries(metadata)) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}

/** Throw unless `vector` is non-empty and every component is finite. */
export function assertVector(
  vector: readonly number[],
  expectedDimension: number | null,
): void {
  if (vector.length === 0) {
    throw new StorageError("Cannot store an empty vector");
  }
  if (!vector.every((x) => Number.isFinite(x))) {
    throw new StorageError("Vector contains non-finite components");
  }
  if (expectedDimension !== null && vector.length !== expectedDimension) {
    throw new StorageError(
      `Vector dimension ${vector.length} does not match collection dimension ${expectedDimension}`,
      { context: { expected: expectedDimension, actual: vector.length } },
    );
  }
}

// ── Cosine distance ──────────────────────────────────────

/**
 * `1 - cosineSimilarity(a, b)`, in [0, 2]. A zero-length side has no
 * direction and sits at distance 1 from everything.
 */
export function cosineDistance(
  a: readonly number[],
  b: readonly number[],
): number {
  if (a.length !== b.length) {
    throw new StorageError(
      `Cannot compare vectors of dimension ${a.length} and ${b.length}`,
    );
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 1;
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Rounding can push |similarity| a hair past 1.
  return 1 - Math.max(-1, Math.min(1, similarity));
}
