import { MigrationError, StorageError, errorMessage } from "../errors.js";
import { log, type Logger } from "../logger.js";
import {
  CURRENT_SCHEMA_VERSION,
  LEGACY_SCHEMA_VERSION,
  type CollectionInfo,
  type StoredRecord,
  type VectorStore,
} from "./types.js";

// ── Memory Migrator: legacy JSON documents → plain text ─

export interface MigrationReport {
  fromVersion: number | null;
  toVersion: number;
  migrated: number;
}

function leafValues(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (typeof value === "number" || typeof value === "boolean") {
    return [String(value)];
  }
  if (Array.isArray(value)) return value.flatMap(leafValues);
  if (typeof value === "object" && value !== null) {
    return Object.values(value).flatMap(leafValues);
  }
  return [];
}

/**
 * Decode one legacy document into plain text.
 *
 * Legacy documents are JSON: a bare string, an object whose `content` is
 * the text, or any other structure whose leaf values make up the text
 * (`{"k":"v"}` → `"v"`).
 */
export function decodeLegacyDocument(raw: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new MigrationError(`Legacy document is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (typeof parsed === "string") return parsed;
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    !Array.isArray(parsed) &&
    "content" in parsed &&
    typeof parsed.content === "string"
  ) {
    return parsed.content;
  }

  const text = leafValues(parsed).join("\n");
  if (text.length === 0) {
    throw new MigrationError("Legacy document decodes to no text");
  }
  return text;
}

/**
 * Brings a collection up to the current schema version in one step.
 *
 * A collection without a version marker that holds records predates
 * versioning and is read as the legacy encoding. Every record is decoded
 * before anything is written; one undecodable record aborts the whole
 * migration and the collection stays as it was.
 */
export class MemoryMigrator {
  constructor(
    private readonly store: VectorStore,
    private readonly logger: Logger = log,
  ) {}

  async migrate(info: CollectionInfo): Promise<MigrationReport> {
    const fromVersion = info.schemaVersion;
    const noop: MigrationReport = {
      fromVersion,
      toVersion: CURRENT_SCHEMA_VERSION,
      migrated: 0,
    };

    if (fromVersion === CURRENT_SCHEMA_VERSION) return noop;

    if (fromVersion !== null && fromVersion > CURRENT_SCHEMA_VERSION) {
      throw new StorageError(
        `Collection "${info.name}" uses schema version ${fromVersion}, newer than supported version ${CURRENT_SCHEMA_VERSION}`,
        { context: { collection: info.name, schemaVersion: fromVersion } },
      );
    }

    if (info.count === 0) {
      await this.store.replaceAll([], CURRENT_SCHEMA_VERSION);
      return noop;
    }

    if (fromVersion !== null && fromVersion !== LEGACY_SCHEMA_VERSION) {
      throw new MigrationError(
        `No migration path from schema version ${fromVersion}`,
        { context: { collection: info.name, schemaVersion: fromVersion } },
      );
    }

    this.logger.info(
      { collection: info.name, records: info.count, fromVersion },
      "🔄 Migrating legacy memory format...",
    );

    const records = await this.store.getAll({ includeVectors: true });
    const decoded: StoredRecord[] = records.map((r) => {
      try {
        return { ...r, document: decodeLegacyDocument(r.document) };
      } catch (err) {
        throw new MigrationError(
          `Cannot decode legacy record ${r.id}: ${errorMessage(err)}`,
          { cause: err, context: { collection: info.name, recordId: r.id } },
        );
      }
    });

    await this.store.replaceAll(decoded, CURRENT_SCHEMA_VERSION);

    this.logger.info(
      { collection: info.name, migrated: decoded.length },
      "✅ Memory migration complete",
    );
    return { ...noop, migrated: decoded.length };
  }
}
