import { Pinecone } from "@pinecone-database/pinecone";
import { StorageError } from "../errors.js";

// ── Pinecone Client ───────────────────────────────────────

export type PineconeMetadata = Record<
  string,
  string | number | boolean | string[]
>;

export interface PineconeRecordLike {
  id: string;
  values: number[];
  metadata?: PineconeMetadata;
}

/** The slice of a Pinecone namespace handle the vector store relies on. */
export interface PineconeNamespaceClient {
  upsert(records: PineconeRecordLike[]): Promise<void>;
  query(options: {
    vector: number[];
    topK: number;
    filter?: object;
    includeMetadata?: boolean;
    includeValues?: boolean;
  }): Promise<{
    matches?: Array<{ id: string; score?: number; metadata?: PineconeMetadata }>;
  }>;
  fetch(ids: string[]): Promise<{
    records: Record<string, { id: string; values?: number[]; metadata?: PineconeMetadata }>;
  }>;
  listPaginated(options?: {
    limit?: number;
    paginationToken?: string;
  }): Promise<{
    vectors?: Array<{ id?: string }>;
    pagination?: { next?: string };
  }>;
  deleteMany(ids: string[]): Promise<void>;
  deleteAll(): Promise<void>;
}

export interface PineconeIndexClient {
  namespace(name: string): PineconeNamespaceClient;
  describeIndexStats(): Promise<{
    dimension?: number;
    namespaces?: Record<string, { recordCount?: number }>;
  }>;
}

/** Open a handle on a serverless index. The index must use the cosine metric. */
export function createPineconeIndex(
  apiKey: string | undefined,
  indexName: string | undefined,
): PineconeIndexClient {
  if (!apiKey || !indexName) {
    throw new StorageError(
      "PINECONE_API_KEY and PINECONE_INDEX must be set to use the Pinecone store",
    );
  }
  return new Pinecone({ apiKey }).index(indexName);
}
