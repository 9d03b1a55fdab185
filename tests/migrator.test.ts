import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MigrationError, StorageError } from "../src/errors.js";
import { MemoryMigrator, decodeLegacyDocument } from "../src/memory/migrator.js";
import { SqliteVectorStore } from "../src/memory/sqlite-store.js";
import {
  CURRENT_SCHEMA_VERSION,
  LEGACY_SCHEMA_VERSION,
} from "../src/memory/types.js";
import { meta } from "./helpers/fakes.js";

describe("decodeLegacyDocument", () => {
  it("unwraps a JSON string", () => {
    expect(decodeLegacyDocument('"plain text"')).toBe("plain text");
  });

  it("takes the content field of an object", () => {
    expect(decodeLegacyDocument('{"content":"hello","extra":1}')).toBe("hello");
  });

  it("joins the leaf values of any other structure", () => {
    expect(decodeLegacyDocument('{"k":"v"}')).toBe("v");
    expect(decodeLegacyDocument('{"a":["x",{"b":2}],"c":true}')).toBe("x\n2\ntrue");
  });

  it("rejects invalid JSON", () => {
    expect(() => decodeLegacyDocument("not json")).toThrow(MigrationError);
  });

  it("rejects structures with no text", () => {
    expect(() => decodeLegacyDocument("{}")).toThrow("decodes to no text");
    expect(() => decodeLegacyDocument("null")).toThrow(MigrationError);
  });
});

describe("MemoryMigrator", () => {
  let store: SqliteVectorStore;

  beforeEach(() => {
    store = new SqliteVectorStore(":memory:");
  });

  afterEach(async () => {
    await store.close();
  });

  async function legacyCollection(
    documents: string[],
    schemaVersion: number | null = LEGACY_SCHEMA_VERSION,
  ) {
    await store.open({ name: "mem", metric: "cosine", schemaVersion });
    for (const [i, doc] of documents.entries()) {
      await store.insert(
        [1, i],
        doc,
        meta("user", `2024-01-01T00:00:0${i}.000Z`),
        `r${i}`,
      );
    }
    return store.info();
  }

  it("decodes every legacy record and keeps ids, metadata and vectors", async () => {
    const info = await legacyCollection(['{"k":"v"}', '"plain"', '{"content":"hi"}']);

    const report = await new MemoryMigrator(store).migrate(info);
    expect(report).toEqual({
      fromVersion: LEGACY_SCHEMA_VERSION,
      toVersion: CURRENT_SCHEMA_VERSION,
      migrated: 3,
    });

    const after = await store.info();
    expect(after.count).toBe(3);
    expect(after.schemaVersion).toBe(CURRENT_SCHEMA_VERSION);

    const records = await store.getAll({ includeVectors: true });
    expect(records.map((r) => r.document)).toEqual(["v", "plain", "hi"]);
    expect(records.map((r) => r.id)).toEqual(["r0", "r1", "r2"]);
    expect(records[2]?.vector).toEqual([1, 2]);
    expect(records[1]?.metadata).toEqual(meta("user", "2024-01-01T00:00:01.000Z"));
  });

  it("treats an unversioned collection with records as legacy", async () => {
    const info = await legacyCollection(['{"k":"v"}'], null);
    const report = await new MemoryMigrator(store).migrate(info);

    expect(report.fromVersion).toBeNull();
    expect(report.migrated).toBe(1);
    expect((await store.getAll()).map((r) => r.document)).toEqual(["v"]);
  });

  it("stamps an empty unversioned collection without migrating", async () => {
    const info = await legacyCollection([], null);
    const report = await new MemoryMigrator(store).migrate(info);

    expect(report.migrated).toBe(0);
    expect((await store.info()).schemaVersion).toBe(CURRENT_SCHEMA_VERSION);
  });

  it("leaves a current collection untouched", async () => {
    await store.open({ name: "mem", metric: "cosine" });
    await store.insert([1, 0], '{"k":"v"}', meta("user", "2024-01-01T00:00:00.000Z"));
    const report = await new MemoryMigrator(store).migrate(await store.info());

    expect(report.migrated).toBe(0);
    expect((await store.getAll()).map((r) => r.document)).toEqual(['{"k":"v"}']);
  });

  it("aborts without writing when one record cannot be decoded", async () => {
    const info = await legacyCollection(['{"k":"v"}', "not json"]);

    await expect(new MemoryMigrator(store).migrate(info)).rejects.toThrow(
      "Cannot decode legacy record r1",
    );

    const after = await store.info();
    expect(after.schemaVersion).toBe(LEGACY_SCHEMA_VERSION);
    expect((await store.getAll()).map((r) => r.document)).toEqual([
      '{"k":"v"}',
      "not json",
    ]);
  });

  it("refuses a collection newer than this build", async () => {
    const info = await legacyCollection(['"x"'], CURRENT_SCHEMA_VERSION + 1);
    await expect(new MemoryMigrator(store).migrate(info)).rejects.toBeInstanceOf(
      StorageError,
    );
  });
});
