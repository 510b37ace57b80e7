import { CollectionNotFoundError, DimensionMismatchError } from "../../domain/errors.js";
import { CollectionConfig, EmbeddingRecord, SearchHit } from "../../domain/types.js";
import { VectorStore, assertCollectionName } from "../../domain/vectorStore.js";
import { similarityScore } from "../../utils/vector.js";

export interface InMemoryCollectionSnapshot {
  name: string;
  config: CollectionConfig;
  records: EmbeddingRecord[];
}

export interface InMemoryVectorStoreSnapshot {
  collections: InMemoryCollectionSnapshot[];
}

interface CollectionEntry {
  config: CollectionConfig;
  records: Map<string, EmbeddingRecord>;
}

/** Brute-force store for local runs and tests. */
export class InMemoryVectorStore implements VectorStore {
  protected collections = new Map<string, CollectionEntry>();

  async createCollection(name: string, config: CollectionConfig): Promise<void> {
    assertCollectionName(name);
    if (this.collections.has(name)) {
      return;
    }
    this.collections.set(name, { config: { ...config }, records: new Map() });
  }

  async getCollection(name: string): Promise<CollectionConfig | null> {
    const entry = this.collections.get(name);
    return entry ? { ...entry.config } : null;
  }

  async countRecords(name: string): Promise<number> {
    return this.requireEntry(name).records.size;
  }

  async deleteCollection(name: string): Promise<boolean> {
    return this.collections.delete(name);
  }

  async clearCollection(name: string): Promise<number> {
    const entry = this.requireEntry(name);
    const removed = entry.records.size;
    entry.records.clear();
    return removed;
  }

  async upsert(name: string, records: EmbeddingRecord[]): Promise<void> {
    const entry = this.requireEntry(name);
    for (const record of records) {
      if (record.vector.length !== entry.config.dimension) {
        throw new DimensionMismatchError(
          entry.config.dimension,
          record.vector.length,
          `record ${record.id} for collection '${name}'`,
        );
      }
    }
    for (const record of records) {
      entry.records.set(record.id, {
        ...record,
        vector: [...record.vector],
        metadata: { ...record.metadata },
      });
    }
  }

  async search(name: string, vector: number[], topK: number): Promise<SearchHit[]> {
    const entry = this.requireEntry(name);
    if (vector.length !== entry.config.dimension) {
      throw new DimensionMismatchError(entry.config.dimension, vector.length, "query vector");
    }
    if (topK <= 0) {
      return [];
    }

    const scored: SearchHit[] = [];
    for (const record of entry.records.values()) {
      scored.push({
        id: record.id,
        score: similarityScore(entry.config.distance, vector, record.vector),
        content: record.content,
        metadata: { ...record.metadata },
      });
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  async close(): Promise<void> {}

  exportSnapshot(): InMemoryVectorStoreSnapshot {
    return {
      collections: [...this.collections.entries()].map(([name, entry]) => ({
        name,
        config: { ...entry.config },
        records: [...entry.records.values()],
      })),
    };
  }

  importSnapshot(snapshot: InMemoryVectorStoreSnapshot): void {
    this.collections = new Map(
      snapshot.collections.map((collection) => [
        collection.name,
        {
          config: { ...collection.config },
          records: new Map(collection.records.map((record) => [record.id, record])),
        },
      ]),
    );
  }

  private requireEntry(name: string): CollectionEntry {
    const entry = this.collections.get(name);
    if (!entry) {
      throw new CollectionNotFoundError(name);
    }
    return entry;
  }
}
