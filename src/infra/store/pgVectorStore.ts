import { QueryResultRow } from "pg";
import {
  AppError,
  CollectionNotFoundError,
  DataError,
  DimensionMismatchError,
  VectorStoreError,
  describeError,
} from "../../domain/errors.js";
import {
  CollectionConfig,
  DistanceMetric,
  EmbeddingRecord,
  SearchHit,
} from "../../domain/types.js";
import { VectorStore, assertCollectionName } from "../../domain/vectorStore.js";
import { toVectorLiteral } from "../../utils/vector.js";
import { chunkMetadataSchema, collectionConfigSchema } from "./recordSchema.js";

export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

/** The slice of `pg.Pool` the store uses. */
export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
  end(): Promise<void>;
}

interface CollectionRow {
  dimension: number;
  distance: string;
}

interface SearchRow {
  id: string;
  content: string;
  metadata: unknown;
  score: number | string;
}

const DISTANCE_SQL: Record<DistanceMetric, { operator: string; opsClass: string; score: string }> = {
  cosine: { operator: "<=>", opsClass: "vector_cosine_ops", score: "1 - (embedding <=> $1::vector)" },
  euclidean: { operator: "<->", opsClass: "vector_l2_ops", score: "-(embedding <-> $1::vector)" },
  // <#> is the negative inner product.
  dot: { operator: "<#>", opsClass: "vector_ip_ops", score: "-(embedding <#> $1::vector)" },
};

// pgvector's HNSW index supports up to 2000 dimensions.
const MAX_INDEXED_DIMENSION = 2000;

/**
 * pgvector-backed collections: a registry table holds each collection's
 * schema and every collection gets its own table with a fixed-size vector
 * column.
 */
export class PgVectorStore implements VectorStore {
  private initialized = false;

  constructor(private readonly pool: SqlPool) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.run("initialize", async () => {
      await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS vector_collections (
          name TEXT PRIMARY KEY,
          dimension INTEGER NOT NULL,
          distance TEXT NOT NULL,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `);
    });

    this.initialized = true;
  }

  async createCollection(name: string, config: CollectionConfig): Promise<void> {
    assertCollectionName(name);
    await this.initialize();

    const table = tableName(name);
    const distanceSql = DISTANCE_SQL[config.distance];
    await this.transaction("create collection", async (client) => {
      const inserted = await client.query(
        `
          INSERT INTO vector_collections (name, dimension, distance)
          VALUES ($1, $2, $3)
          ON CONFLICT (name) DO NOTHING
        `,
        [name, config.dimension, config.distance],
      );
      if (inserted.rowCount === 0) {
        return;
      }

      await client.query(`
        CREATE TABLE IF NOT EXISTS ${table} (
          id TEXT PRIMARY KEY,
          content TEXT NOT NULL,
          metadata JSONB NOT NULL,
          embedding VECTOR(${config.dimension}) NOT NULL
        )
      `);
      if (config.dimension <= MAX_INDEXED_DIMENSION) {
        await client.query(`
          CREATE INDEX IF NOT EXISTS ${indexName(name)}
          ON ${table} USING hnsw (embedding ${distanceSql.opsClass})
        `);
      }
    });
  }

  async getCollection(name: string): Promise<CollectionConfig | null> {
    await this.initialize();
    const result = await this.run("describe collection", () =>
      this.pool.query<CollectionRow>(
        `SELECT dimension, distance FROM vector_collections WHERE name = $1`,
        [name],
      ),
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    const parsed = collectionConfigSchema.safeParse(row);
    if (!parsed.success) {
      throw new DataError(
        "COLLECTION_CONFIG_INVALID",
        `Collection '${name}' has an unreadable configuration row.`,
      );
    }
    return parsed.data;
  }

  async countRecords(name: string): Promise<number> {
    await this.requireCollection(name);
    const result = await this.run("count records", () =>
      this.pool.query<{ count: string }>(`SELECT COUNT(*)::text AS count FROM ${tableName(name)}`),
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async deleteCollection(name: string): Promise<boolean> {
    assertCollectionName(name);
    await this.initialize();

    return this.transaction("delete collection", async (client) => {
      const deleted = await client.query(`DELETE FROM vector_collections WHERE name = $1`, [name]);
      await client.query(`DROP TABLE IF EXISTS ${tableName(name)}`);
      return (deleted.rowCount ?? 0) > 0;
    });
  }

  async clearCollection(name: string): Promise<number> {
    await this.requireCollection(name);
    const table = tableName(name);

    return this.transaction("clear collection", async (client) => {
      const count = await client.query<{ count: string }>(
        `SELECT COUNT(*)::text AS count FROM ${table}`,
      );
      await client.query(`TRUNCATE TABLE ${table}`);
      return Number(count.rows[0]?.count ?? 0);
    });
  }

  async upsert(name: string, records: EmbeddingRecord[]): Promise<void> {
    const config = await this.requireCollection(name);
    for (const record of records) {
      if (record.vector.length !== config.dimension) {
        throw new DimensionMismatchError(
          config.dimension,
          record.vector.length,
          `record ${record.id} for collection '${name}'`,
        );
      }
    }
    if (records.length === 0) {
      return;
    }

    const table = tableName(name);
    await this.transaction("upsert records", async (client) => {
      for (const record of records) {
        await client.query(
          `
            INSERT INTO ${table} (id, content, metadata, embedding)
            VALUES ($1, $2, $3::jsonb, $4::vector)
            ON CONFLICT (id)
            DO UPDATE SET content = EXCLUDED.content, metadata = EXCLUDED.metadata, embedding = EXCLUDED.embedding
          `,
          [record.id, record.content, JSON.stringify(record.metadata), toVectorLiteral(record.vector)],
        );
      }
    });
  }

  async search(name: string, vector: number[], topK: number): Promise<SearchHit[]> {
    const config = await this.requireCollection(name);
    if (vector.length !== config.dimension) {
      throw new DimensionMismatchError(config.dimension, vector.length, "query vector");
    }

    const distanceSql = DISTANCE_SQL[config.distance];
    const result = await this.run("search", () =>
      this.pool.query<SearchRow>(
        `
          SELECT id, content, metadata, ${distanceSql.score} AS score
          FROM ${tableName(name)}
          ORDER BY embedding ${distanceSql.operator} $1::vector
          LIMIT $2
        `,
        [toVectorLiteral(vector), topK],
      ),
    );

    return result.rows.map((row) => {
      const metadata = chunkMetadataSchema.safeParse(row.metadata);
      if (!metadata.success) {
        throw new DataError(
          "RECORD_METADATA_INVALID",
          `Record ${row.id} in collection '${name}' has unreadable metadata.`,
        );
      }
      return {
        id: row.id,
        score: Number(row.score),
        content: row.content,
        metadata: metadata.data,
      };
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async requireCollection(name: string): Promise<CollectionConfig> {
    assertCollectionName(name);
    const config = await this.getCollection(name);
    if (!config) {
      throw new CollectionNotFoundError(name);
    }
    return config;
  }

  private async transaction<T>(action: string, work: (client: SqlPoolClient) => Promise<T>): Promise<T> {
    return this.run(action, async () => {
      const client = await this.pool.connect();
      try {
        await client.query("BEGIN");
        const result = await work(client);
        await client.query("COMMIT");
        return result;
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      } finally {
        client.release();
      }
    });
  }

  private async run<T>(action: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new VectorStoreError(`Vector store ${action} failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}

function tableName(collection: string): string {
  return `"vc_${collection}"`;
}

function indexName(collection: string): string {
  return `"vc_${collection}_embedding_idx"`;
}
