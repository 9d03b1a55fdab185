// ── Error Taxonomy ───────────────────────────────────────

/**
 * Base class for every failure the memory core reports.
 * Carries a machine-readable code and structured context for logging.
 */
export class MemoryError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    cause?: unknown;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = "MemoryError";
    this.code = params.code;
    this.context = params.context;
  }
}

/** The embedding provider is misconfigured, unreachable, or returned nothing usable. */
export class EmbeddingError extends MemoryError {
  constructor(
    message: string,
    options: { cause?: unknown; context?: Record<string, unknown> } = {},
  ) {
    super({ message, code: "EMBEDDING_FAILED", ...options });
    this.name = "EmbeddingError";
  }
}

/** The vector store rejected an operation (dimension mismatch, unavailable collection, corrupt row). */
export class StorageError extends MemoryError {
  constructor(
    message: string,
    options: { cause?: unknown; context?: Record<string, unknown> } = {},
  ) {
    super({ message, code: "STORAGE_FAILED", ...options });
    this.name = "StorageError";
  }
}

/** A legacy record could not be decoded; the collection was left as it was. */
export class MigrationError extends MemoryError {
  constructor(
    message: string,
    options: { cause?: unknown; context?: Record<string, unknown> } = {},
  ) {
    super({ message, code: "MIGRATION_FAILED", ...options });
    this.name = "MigrationError";
  }
}

/** An environment setting is present but unusable. */
export class ConfigError extends MemoryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ message, code: "CONFIG_INVALID", context });
    this.name = "ConfigError";
  }
}

/** Human-readable message for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
