import { AppConfig } from "../../config/env.js";
import { ConfigurationError } from "../../domain/errors.js";
import { VectorStore } from "../../domain/vectorStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { FileBackedVectorStore } from "./fileBackedVectorStore.js";
import { InMemoryVectorStore } from "./inMemoryVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export async function createVectorStore(config: AppConfig): Promise<VectorStore> {
  switch (config.vectorStore) {
    case "memory":
      return new InMemoryVectorStore();
    case "file": {
      const store = new FileBackedVectorStore(config.indexFilePath, {
        maxBytes: config.maxIndexFileBytes,
      });
      await store.initialize();
      return store;
    }
    case "pgvector": {
      if (!config.databaseUrl) {
        throw new ConfigurationError("DATABASE_URL is required when VECTOR_STORE=pgvector.");
      }
      const store = new PgVectorStore(createPostgresPool(config.databaseUrl));
      await store.initialize();
      return store;
    }
  }
}
