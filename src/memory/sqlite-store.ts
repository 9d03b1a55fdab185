import Database from "better-sqlite3";
import { randomUUID } from "crypto";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { MemoryError, StorageError } from "../errors.js";
import {
  assertVector,
  compactMetadata,
  cosineDistance,
  matchesFilter,
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

// ── SQLite Vector Store ──────────────────────────────────

interface CollectionRow {
  name: string;
  metric: string;
  dimension: number | null;
  dimension_fixed: number;
  schema_version: number | null;
}

interface RecordRow {
  seq: number;
  id: string;
  vector: Buffer;
  document: string;
  metadata: string;
}

const STAGING_SUFFIX = "::staging";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS collections (
    name TEXT PRIMARY KEY,
    metric TEXT NOT NULL,
    dimension INTEGER,
    dimension_fixed INTEGER NOT NULL DEFAULT 0,
    schema_version INTEGER,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS records (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    collection TEXT NOT NULL,
    id TEXT NOT NULL,
    vector BLOB NOT NULL,
    document TEXT NOT NULL,
    metadata TEXT NOT NULL,
    UNIQUE (collection, id)
  );

  CREATE INDEX IF NOT EXISTS idx_records_collection ON records(collection, seq);
`;

function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
    db.exec(SCHEMA);
    return db;
  } catch (err) {
    throw new StorageError(`Cannot open memory database at ${dbPath}`, {
      cause: err,
      context: { dbPath },
    });
  }
}

function encodeVector(vector: readonly number[]): Buffer {
  const buf = Buffer.alloc(vector.length * 8);
  vector.forEach((x, i) => buf.writeDoubleLE(x, i * 8));
  return buf;
}

function decodeVector(buf: Buffer): number[] {
  const out = new Array<number>(buf.length / 8);
  for (let i = 0; i < out.length; i++) out[i] = buf.readDoubleLE(i * 8);
  return out;
}

/**
 * Local, durable vector store on a single SQLite file.
 *
 * Vectors are kept as little-endian float64 blobs and compared in process,
 * so every query is a scan of the collection. better-sqlite3 is synchronous,
 * which serializes access within the process; WAL mode plus a busy timeout
 * covers a second process reading the same file.
 */
export class SqliteVectorStore implements VectorStore {
  private readonly db: Database.Database;
  private collection: string | null = null;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
  }

  // ── Collection lifecycle ───────────────────────────────

  async open(config: CollectionConfig): Promise<CollectionInfo> {
    return this.guard("open", () => {
      const existing = this.collectionRow(config.name);
      if (!existing) {
        const version =
          config.schemaVersion === undefined
            ? CURRENT_SCHEMA_VERSION
            : config.schemaVersion;
        this.db
          .prepare(
            `INSERT INTO collections (name, metric, dimension, dimension_fixed, schema_version, created_at)
             VALUES (?, ?, ?, ?, ?, ?)`,
          )
          .run(
            config.name,
            config.metric,
            config.dimension ?? null,
            config.dimension === undefined ? 0 : 1,
            version,
            new Date().toISOString(),
          );
      }
      this.collection = config.name;
      return this.describe(config.name);
    });
  }

  async info(): Promise<CollectionInfo> {
    return this.guard("info", () => this.describe(this.requireOpen()));
  }

  async drop(): Promise<void> {
    this.guard("drop", () => {
      const name = this.requireOpen();
      this.db.transaction(() => {
        this.db.prepare("DELETE FROM records WHERE collection = ?").run(name);
        this.db.prepare("DELETE FROM collections WHERE name = ?").run(name);
      })();
      this.collection = null;
    });
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
    this.collection = null;
  }

  // ── Records ────────────────────────────────────────────

  async insert(
    vector: number[],
    document: string,
    metadata: MemoryMetadata,
    id: string = randomUUID(),
  ): Promise<string> {
    return this.guard("insert", () => {
      const name = this.requireOpen();
      const row = this.requireCollection(name);
      assertVector(vector, row.dimension);

      this.db.transaction(() => {
        if (row.dimension === null) {
          this.db
            .prepare("UPDATE collections SET dimension = ? WHERE name = ?")
            .run(vector.length, name);
        }
        this.insertRow(name, id, vector, document, metadata);
      })();
      return id;
    });
  }

  async query(
    vector: number[],
    topK: number,
    filter: MetadataFilter = {},
  ): Promise<ScoredRecord[]> {
    return this.guard("query", () => {
      const name = this.requireOpen();
      if (topK < 1) return [];
      const row = this.requireCollection(name);
      const rows = this.recordRows(name);
      if (rows.length === 0) return [];
      if (row.dimension !== null) assertVector(vector, row.dimension);

      const scored: ScoredRecord[] = [];
      for (const r of rows) {
        const metadata = parseMetadata(JSON.parse(r.metadata), r.id);
        if (!matchesFilter(metadata, filter)) continue;
        scored.push({
          id: r.id,
          document: r.document,
          metadata,
          distance: cosineDistance(vector, decodeVector(r.vector)),
        });
      }
      // Array#sort is stable, so ties keep insertion order.
      scored.sort((a, b) => a.distance - b.distance);
      return scored.slice(0, topK);
    });
  }

  getAll(options: { includeVectors: true }): Promise<StoredRecord[]>;
  getAll(options?: { includeVectors?: boolean }): Promise<MemoryRecord[]>;
  async getAll(
    options: { includeVectors?: boolean } = {},
  ): Promise<MemoryRecord[]> {
    return this.guard("getAll", () => {
      const name = this.requireOpen();
      return this.recordRows(name).map((r) => {
        const record: MemoryRecord = {
          id: r.id,
          document: r.document,
          metadata: parseMetadata(JSON.parse(r.metadata), r.id),
        };
        if (options.includeVectors) record.vector = decodeVector(r.vector);
        return record;
      });
    });
  }

  async reset(): Promise<void> {
    this.guard("reset", () => {
      const name = this.requireOpen();
      this.db.transaction(() => {
        this.db.prepare("DELETE FROM records WHERE collection = ?").run(name);
        this.db
          .prepare(
            `UPDATE collections
               SET schema_version = ?,
                   dimension = CASE WHEN dimension_fixed = 1 THEN dimension ELSE NULL END
             WHERE name = ?`,
          )
          .run(CURRENT_SCHEMA_VERSION, name);
      })();
    });
  }

  async replaceAll(
    records: StoredRecord[],
    schemaVersion: number,
  ): Promise<void> {
    this.guard("replaceAll", () => {
      const name = this.requireOpen();
      const row = this.requireCollection(name);
      const dimension = row.dimension ?? records[0]?.vector.length ?? null;
      for (const r of records) assertVector(r.vector, dimension);

      const staging = `${name}${STAGING_SUFFIX}`;
      this.db.transaction(() => {
        this.db.prepare("DELETE FROM records WHERE collection = ?").run(staging);
        for (const r of records) {
          this.insertRow(staging, r.id, r.vector, r.document, r.metadata);
        }
        this.db.prepare("DELETE FROM records WHERE collection = ?").run(name);
        this.db
          .prepare("UPDATE records SET collection = ? WHERE collection = ?")
          .run(name, staging);
        this.db
          .prepare(
            "UPDATE collections SET schema_version = ?, dimension = ? WHERE name = ?",
          )
          .run(schemaVersion, row.dimension_fixed ? row.dimension : dimension, name);
      })();
    });
  }

  // ── Internals ──────────────────────────────────────────

  private insertRow(
    collection: string,
    id: string,
    vector: readonly number[],
    document: string,
    metadata: MemoryMetadata,
  ): void {
    this.db
      .prepare(
        `INSERT INTO records (collection, id, vector, document, metadata)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        collection,
        id,
        encodeVector(vector),
        document,
        JSON.stringify(compactMetadata(metadata)),
      );
  }

  private recordRows(collection: string): RecordRow[] {
    return this.db
      .prepare<[string], RecordRow>(
        `SELECT seq, id, vector, document, metadata
           FROM records WHERE collection = ? ORDER BY seq`,
      )
      .all(collection);
  }

  private collectionRow(name: string): CollectionRow | undefined {
    return this.db
      .prepare<[string], CollectionRow>(
        `SELECT name, metric, dimension, dimension_fixed, schema_version
           FROM collections WHERE name = ?`,
      )
      .get(name);
  }

  private requireCollection(name: string): CollectionRow {
    const row = this.collectionRow(name);
    if (!row) {
      throw new StorageError(`Collection "${name}" no longer exists`, {
        context: { collection: name },
      });
    }
    return row;
  }

  private describe(name: string): CollectionInfo {
    const row = this.requireCollection(name);
    const counted = this.db
      .prepare<[string], { n: number }>(
        "SELECT COUNT(*) AS n FROM records WHERE collection = ?",
      )
      .get(name);
    return {
      name: row.name,
      metric: row.metric,
      dimension: row.dimension,
      schemaVersion: row.schema_version,
      count: counted?.n ?? 0,
    };
  }

  private requireOpen(): string {
    if (this.collection === null) {
      throw new StorageError("No collection is open on this store");
    }
    return this.collection;
  }

  /** Run a synchronous database step, wrapping driver failures. */
  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof MemoryError) throw err;
      throw new StorageError(`SQLite ${op} failed: ${String(err)}`, {
        cause: err,
        context: { op, collection: this.collection },
      });
    }
  }
}
