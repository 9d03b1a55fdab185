import { beforeEach, describe, expect, it } from "vitest";
import { StorageError } from "../src/errors.js";
import {
  DOCUMENT_KEY,
  MARKER_NAMESPACE,
  PineconeVectorStore,
} from "../src/memory/pinecone-store.js";
import { createPineconeIndex } from "../src/memory/pinecone.js";
import { CURRENT_SCHEMA_VERSION } from "../src/memory/types.js";
import { FakePineconeIndex, meta } from "./helpers/fakes.js";

const COLLECTION = { name: "mem", metric: "cosine" as const };

describe("PineconeVectorStore", () => {
  let index: FakePineconeIndex;
  let store: PineconeVectorStore;

  beforeEach(() => {
    index = new FakePineconeIndex(2);
    store = new PineconeVectorStore(index);
  });

  // ── Collections ────────────────────────────────────────

  it("writes a marker for a new collection", async () => {
    const info = await store.open(COLLECTION);
    expect(info).toEqual({
      name: "mem",
      metric: "cosine",
      dimension: 2,
      schemaVersion: CURRENT_SCHEMA_VERSION,
      count: 0,
    });

    const marker = index.data.get(MARKER_NAMESPACE)?.get("mem");
    expect(marker?.values).toEqual([1, 0]);
    expect(marker?.metadata?.["schemaVersion"]).toBe(CURRENT_SCHEMA_VERSION);
  });

  it("reports an unversioned collection when the marker has no version", async () => {
    const info = await store.open({ ...COLLECTION, schemaVersion: null });
    expect(info.schemaVersion).toBeNull();
  });

  it("fails when the index dimension differs from the requested one", async () => {
    await expect(store.open({ ...COLLECTION, dimension: 3 })).rejects.toThrow(
      "Pinecone index dimension is 2, expected 3",
    );
  });

  it("wraps client failures in StorageError", async () => {
    index.failStats = true;
    await expect(store.open(COLLECTION)).rejects.toBeInstanceOf(StorageError);
  });

  it("drop removes the records and the marker", async () => {
    await store.open(COLLECTION);
    await store.insert([1, 0], "a", meta("user", "2024-01-01T00:00:00.000Z"));
    await store.drop();

    expect(index.data.get("mem")?.size).toBe(0);
    expect(index.data.get(MARKER_NAMESPACE)?.has("mem")).toBe(false);
  });

  // ── Records ────────────────────────────────────────────

  it("stores the document beside the metadata and reads it back", async () => {
    await store.open(COLLECTION);
    const id = await store.insert(
      [1, 0],
      "hello",
      meta("user", "2024-01-01T00:00:00.000Z"),
    );

    expect(index.data.get("mem")?.get(id)?.metadata?.[DOCUMENT_KEY]).toBe("hello");
    const [record] = await store.getAll();
    expect(record?.document).toBe("hello");
    expect(record?.metadata).toEqual(meta("user", "2024-01-01T00:00:00.000Z"));
  });

  it("rejects vectors of the wrong dimension", async () => {
    await store.open(COLLECTION);
    await expect(
      store.insert([1, 0, 0], "a", meta("user", "2024-01-01T00:00:00.000Z")),
    ).rejects.toBeInstanceOf(StorageError);
  });

  it("turns similarity scores into distances", async () => {
    await store.open(COLLECTION);
    await store.insert([1, 0], "east", meta("user", "2024-01-01T00:00:00.000Z"), "e");
    await store.insert([0, 1], "north", meta("assistant", "2024-01-01T00:00:01.000Z"), "n");

    const results = await store.query([1, 0], 2);
    expect(results.map((r) => [r.id, r.distance])).toEqual([
      ["e", 0],
      ["n", 1],
    ]);
  });

  it("passes metadata filters to the index", async () => {
    await store.open(COLLECTION);
    await store.insert([1, 0], "mine", meta("user", "2024-01-01T00:00:00.000Z"));
    await store.insert([1, 0], "yours", meta("assistant", "2024-01-01T00:00:01.000Z"));

    const results = await store.query([1, 0], 5, { role: "assistant" });
    expect(results.map((r) => r.document)).toEqual(["yours"]);
  });

  it("lists every record across pages, oldest first", async () => {
    await store.open(COLLECTION);
    for (let i = 0; i < 105; i++) {
      const ts = new Date(Date.UTC(2024, 0, 1, 0, 0, i)).toISOString();
      await store.insert([1, 0], `doc ${i}`, meta("user", ts), `z${i}`);
    }

    const records = await store.getAll({ includeVectors: true });
    expect(records).toHaveLength(105);
    expect(records[0]?.document).toBe("doc 0");
    expect(records[104]?.document).toBe("doc 104");
    expect(records[0]?.vector).toEqual([1, 0]);
  });

  // ── Reset and replace ──────────────────────────────────

  it("reset empties the namespace and stamps the current version", async () => {
    await store.open({ ...COLLECTION, schemaVersion: 1 });
    await store.insert([1, 0], "a", meta("user", "2024-01-01T00:00:00.000Z"));
    await store.reset();

    const info = await store.info();
    expect(info.count).toBe(0);
    expect(info.schemaVersion).toBe(CURRENT_SCHEMA_VERSION);
  });

  it("reset on an empty namespace leaves it alone", async () => {
    await store.open(COLLECTION);
    await expect(store.reset()).resolves.toBeUndefined();
  });

  it("reset clears records the index stats have not caught up with", async () => {
    await store.open(COLLECTION);
    await store.insert([1, 0], "fresh", meta("user", "2024-01-01T00:00:00.000Z"));
    index.staleStats = true;

    await store.reset();
    expect(index.data.get("mem")?.size).toBe(0);
    expect(await store.getAll()).toEqual([]);
  });

  it("replaceAll swaps in a new namespace holding only the given records", async () => {
    await store.open({ ...COLLECTION, schemaVersion: 1 });
    await store.insert([1, 0], "old a", meta("user", "2024-01-01T00:00:00.000Z"), "a");
    await store.insert([0, 1], "old b", meta("user", "2024-01-01T00:00:01.000Z"), "b");

    await store.replaceAll(
      [
        {
          id: "a",
          document: "new a",
          metadata: meta("user", "2024-01-01T00:00:00.000Z"),
          vector: [1, 0],
        },
      ],
      CURRENT_SCHEMA_VERSION,
    );

    const info = await store.info();
    expect(info.count).toBe(1);
    expect(info.schemaVersion).toBe(CURRENT_SCHEMA_VERSION);
    expect((await store.getAll()).map((r) => r.document)).toEqual(["new a"]);

    const active = index.data.get(MARKER_NAMESPACE)?.get("mem")?.metadata?.["activeNamespace"];
    expect(active).not.toBe("mem");
    expect(typeof active === "string" && active.startsWith("mem.v2.")).toBe(true);
    expect(index.data.get("mem")?.size).toBe(0);
  });

  it("keeps the old records when replaceAll fails part way", async () => {
    await store.open({ ...COLLECTION, schemaVersion: 1 });
    const legacy = Array.from({ length: 150 }, (_, i) => ({
      id: `r${String(i).padStart(3, "0")}`,
      document: JSON.stringify({ content: `doc ${i}` }),
      metadata: meta("user", new Date(Date.UTC(2024, 0, 1, 0, 0, i)).toISOString()),
      vector: [1, 0],
    }));
    for (const r of legacy) await store.insert(r.vector, r.document, r.metadata, r.id);

    index.upsertsLeft = 1;
    const plain = legacy.map((r) => ({ ...r, document: `doc ${r.id}` }));
    await expect(store.replaceAll(plain, CURRENT_SCHEMA_VERSION)).rejects.toBeInstanceOf(
      StorageError,
    );
    index.upsertsLeft = Number.POSITIVE_INFINITY;

    const info = await store.info();
    expect(info.schemaVersion).toBe(1);
    const records = await store.getAll();
    expect(records).toHaveLength(150);
    expect(records.every((r) => r.document.startsWith('{"content":'))).toBe(true);

    const leftovers = [...index.data]
      .filter(([ns, recs]) => ns !== "mem" && ns !== MARKER_NAMESPACE && recs.size > 0)
      .map(([ns]) => ns);
    expect(leftovers).toEqual([]);
  });

  it("reset after a swap empties the active namespace", async () => {
    await store.open(COLLECTION);
    await store.replaceAll(
      [
        {
          id: "a",
          document: "kept",
          metadata: meta("user", "2024-01-01T00:00:00.000Z"),
          vector: [1, 0],
        },
      ],
      CURRENT_SCHEMA_VERSION,
    );
    await store.reset();

    expect(await store.getAll()).toEqual([]);
    expect((await store.info()).count).toBe(0);
  });

  it("finds a swapped collection again after reopening", async () => {
    await store.open(COLLECTION);
    await store.replaceAll(
      [
        {
          id: "a",
          document: "kept",
          metadata: meta("user", "2024-01-01T00:00:00.000Z"),
          vector: [1, 0],
        },
      ],
      CURRENT_SCHEMA_VERSION,
    );
    await store.close();

    const reopened = new PineconeVectorStore(index);
    await reopened.open(COLLECTION);
    expect((await reopened.getAll()).map((r) => r.document)).toEqual(["kept"]);
  });
});

describe("createPineconeIndex", () => {
  it("requires both an API key and an index name", () => {
    expect(() => createPineconeIndex(undefined, "memories")).toThrow(StorageError);
    expect(() => createPineconeIndex("test-key", undefined)).toThrow(StorageError);
  });
});
