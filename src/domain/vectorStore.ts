import { InputError } from "./errors.js";
import { CollectionConfig, EmbeddingRecord, SearchHit } from "./types.js";

export interface VectorStore {
  createCollection(name: string, config: CollectionConfig): Promise<void>;
  getCollection(name: string): Promise<CollectionConfig | null>;
  countRecords(name: string): Promise<number>;
  /** Resolves to false when the collection did not exist. */
  deleteCollection(name: string): Promise<boolean>;
  /** Removes every record and keeps the collection config; returns the removed count. */
  clearCollection(name: string): Promise<number>;
  upsert(name: string, records: EmbeddingRecord[]): Promise<void>;
  search(name: string, vector: number[], topK: number): Promise<SearchHit[]>;
  close(): Promise<void>;
}

const COLLECTION_NAME_PATTERN = /^[a-z][a-z0-9_]{0,47}$/;

export function assertCollectionName(name: string): void {
  if (!COLLECTION_NAME_PATTERN.test(name)) {
    throw new InputError(
      "INVALID_COLLECTION_NAME",
      `Invalid collection name '${name}'. Use lowercase letters, digits and underscores (max 48, starting with a letter).`,
    );
  }
}
