import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DataError } from "../../domain/errors.js";
import { CollectionConfig, EmbeddingRecord, SearchHit } from "../../domain/types.js";
import { InMemoryVectorStore, InMemoryVectorStoreSnapshot } from "./inMemoryVectorStore.js";
import { chunkMetadataSchema, collectionConfigSchema } from "./recordSchema.js";

const CURRENT_FORMAT_VERSION = 1;

const snapshotFileSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  snapshot: z.object({
    collections: z.array(
      z.object({
        name: z.string(),
        config: collectionConfigSchema,
        records: z.array(
          z.object({
            id: z.string(),
            vector: z.array(z.number()),
            content: z.string(),
            metadata: chunkMetadataSchema,
          }),
        ),
      }),
    ),
  }),
});

type SnapshotFile = z.infer<typeof snapshotFileSchema>;

export interface FileBackedVectorStoreOptions {
  maxBytes: number;
}

export interface IndexFileInfo {
  path: string;
  exists: boolean;
  formatVersion: number;
  maxBytes: number;
  sizeBytes: number;
}

/**
 * In-memory store that persists a JSON snapshot after every mutation so the
 * ingestion CLI and the server can share an index without a database.
 * Reads reload the snapshot when another process has rewritten it.
 */
export class FileBackedVectorStore extends InMemoryVectorStore {
  private loadedMtimeMs: number | null = null;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: FileBackedVectorStoreOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    await this.reloadIfChanged();
  }

  async createCollection(name: string, config: CollectionConfig): Promise<void> {
    await this.mutate(() => super.createCollection(name, config));
  }

  async getCollection(name: string): Promise<CollectionConfig | null> {
    await this.reloadIfChanged();
    return super.getCollection(name);
  }

  async countRecords(name: string): Promise<number> {
    await this.reloadIfChanged();
    return super.countRecords(name);
  }

  async deleteCollection(name: string): Promise<boolean> {
    return this.mutate(
      () => super.deleteCollection(name),
      (deleted) => deleted,
    );
  }

  async clearCollection(name: string): Promise<number> {
    return this.mutate(() => super.clearCollection(name));
  }

  async upsert(name: string, records: EmbeddingRecord[]): Promise<void> {
    await this.mutate(() => super.upsert(name, records));
  }

  async search(name: string, vector: number[], topK: number): Promise<SearchHit[]> {
    await this.reloadIfChanged();
    return super.search(name, vector, topK);
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  async getFileInfo(): Promise<IndexFileInfo> {
    const stat = await this.statFile();
    return {
      path: this.absolutePath,
      exists: stat !== null,
      formatVersion: CURRENT_FORMAT_VERSION,
      maxBytes: this.options.maxBytes,
      sizeBytes: stat?.size ?? 0,
    };
  }

  /** Applies a change and writes it out; a failed write restores the previous state. */
  private async mutate<T>(
    change: () => Promise<T>,
    needsWrite: (result: T) => boolean = () => true,
  ): Promise<T> {
    await this.reloadIfChanged();
    const previous = this.exportSnapshot();
    const result = await change();
    if (!needsWrite(result)) {
      return result;
    }
    try {
      await this.persist();
    } catch (error) {
      this.importSnapshot(previous);
      throw error;
    }
    return result;
  }

  private persist(): Promise<void> {
    const run = this.writeChain.then(() => this.writeSnapshot());
    // The caller receives the failure; the chain itself stays usable for later writes.
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async writeSnapshot(): Promise<void> {
    const payload: SnapshotFile = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new DataError(
        "INDEX_FILE_TOO_LARGE",
        `Index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes). Use VECTOR_STORE=pgvector for larger corpora.`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await fs.rename(tempPath, this.absolutePath);

    const stat = await this.statFile();
    this.loadedMtimeMs = stat?.mtimeMs ?? null;
  }

  private async reloadIfChanged(): Promise<void> {
    await this.writeChain;
    const stat = await this.statFile();
    if (!stat) {
      return;
    }
    if (this.loadedMtimeMs !== null && stat.mtimeMs === this.loadedMtimeMs) {
      return;
    }

    const raw = await fs.readFile(this.absolutePath, "utf-8");
    this.importSnapshot(parseSnapshotFile(raw, this.absolutePath));
    this.loadedMtimeMs = stat.mtimeMs;
  }

  private async statFile(): Promise<{ size: number; mtimeMs: number } | null> {
    try {
      const stat = await fs.stat(this.absolutePath);
      return { size: stat.size, mtimeMs: stat.mtimeMs };
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }
  }
}

function parseSnapshotFile(raw: string, filePath: string): InMemoryVectorStoreSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new DataError("INDEX_FILE_CORRUPT", `Index file ${filePath} is not valid JSON.`);
  }

  const parsed = snapshotFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new DataError("INDEX_FILE_CORRUPT", `Invalid index snapshot format in ${filePath}.`, {
      detail: parsed.error.issues.slice(0, 5),
    });
  }
  if (parsed.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new DataError(
      "INDEX_FILE_CORRUPT",
      `Unsupported index format version: ${parsed.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  return parsed.data.snapshot;
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
