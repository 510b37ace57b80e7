import { randomUUID } from "node:crypto";
import path from "node:path";
import { DimensionMismatchError, InputError, toAppError } from "../domain/errors.js";
import { DocumentFileType, EmbeddingRecord, LoadedDocument } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { DirectoryScanResult, scanDirectory } from "../infra/parsers/documentLoader.js";
import { ChunkingOptions, assertValidChunking, chunkDocument } from "../pipelines/chunking.js";
import { BatchEmbedder } from "../pipelines/embedding.js";
import { createLogger } from "../utils/logger.js";
import { CollectionManager } from "./collectionManager.js";

const logger = createLogger("ingestion");

export type DocumentLoader = (filePath: string) => Promise<LoadedDocument>;

export type IngestionProgressEvent =
  | { type: "document-started"; path: string; index: number; total: number }
  | { type: "batch-stored"; path: string; batchNumber: number; totalBatches: number; records: number }
  | { type: "document-finished"; path: string; chunkCount: number }
  | { type: "document-failed"; path: string; code: string; reason: string };

export interface IngestOptions {
  sourceLabel?: string | null;
  onProgress?: (event: IngestionProgressEvent) => void;
}

export interface IngestedDocument {
  path: string;
  fileType: DocumentFileType;
  pageCount: number;
  chunkCount: number;
}

export interface FailedDocument {
  path: string;
  code: string;
  reason: string;
  retryable: boolean;
}

export interface IngestionReport {
  collection: string;
  succeeded: IngestedDocument[];
  failed: FailedDocument[];
  totalChunks: number;
}

export interface IngestionServiceDeps {
  collectionName: string;
  store: VectorStore;
  collections: CollectionManager;
  embedder: BatchEmbedder;
  loadDocument: DocumentLoader;
  chunking: ChunkingOptions;
}

export class IngestionService {
  constructor(private readonly deps: IngestionServiceDeps) {
    assertValidChunking(deps.chunking);
  }

  get collectionName(): string {
    return this.deps.collectionName;
  }

  async ingestFile(filePath: string, options: IngestOptions = {}): Promise<IngestedDocument> {
    const { collectionName, store, embedder } = this.deps;
    await this.requireCompatibleCollection();

    const document = await this.deps.loadDocument(path.resolve(filePath));
    const chunks = chunkDocument(document, this.deps.chunking);
    if (chunks.length === 0) {
      throw new InputError("EMPTY_DOCUMENT", `No extractable text in ${document.path}.`);
    }

    const indexedAt = new Date().toISOString();
    const sourceLabel = options.sourceLabel?.trim() || null;

    for await (const batch of embedder.embedBatches(chunks.map((chunk) => chunk.text))) {
      const records: EmbeddingRecord[] = batch.vectors.map((vector, i) => {
        const chunk = chunks[batch.offset + i];
        return {
          id: randomUUID(),
          vector,
          content: chunk.text,
          metadata: {
            source: chunk.source,
            page: chunk.page,
            fileType: chunk.fileType,
            chunkId: chunk.index,
            chunkSize: chunk.text.length,
            startOffset: chunk.start,
            sourceLabel,
            indexedAt,
          },
        };
      });

      await store.upsert(collectionName, records);
      options.onProgress?.({
        type: "batch-stored",
        path: document.path,
        batchNumber: batch.batchNumber,
        totalBatches: batch.totalBatches,
        records: records.length,
      });
    }

    const pageCount = document.sections.length;
    logger.info("Document ingested", {
      collection: collectionName,
      path: document.path,
      pageCount,
      chunkCount: chunks.length,
    });
    return { path: document.path, fileType: document.fileType, pageCount, chunkCount: chunks.length };
  }

  /** Ingests documents one after another; a failing document does not stop the rest. */
  async ingestPaths(paths: string[], options: IngestOptions = {}): Promise<IngestionReport> {
    await this.requireCompatibleCollection();

    const report: IngestionReport = {
      collection: this.deps.collectionName,
      succeeded: [],
      failed: [],
      totalChunks: 0,
    };

    for (const [index, rawPath] of paths.entries()) {
      const filePath = path.resolve(rawPath);
      options.onProgress?.({ type: "document-started", path: filePath, index, total: paths.length });
      try {
        const ingested = await this.ingestFile(filePath, options);
        report.succeeded.push(ingested);
        report.totalChunks += ingested.chunkCount;
        options.onProgress?.({
          type: "document-finished",
          path: filePath,
          chunkCount: ingested.chunkCount,
        });
      } catch (error) {
        const appError = toAppError(error);
        logger.error("Document ingestion failed", appError, { path: filePath });
        report.failed.push({
          path: filePath,
          code: appError.code,
          reason: appError.message,
          retryable: appError.retryable,
        });
        options.onProgress?.({
          type: "document-failed",
          path: filePath,
          code: appError.code,
          reason: appError.message,
        });
      }
    }

    return report;
  }

  async ingestDirectory(directory: string, options: IngestOptions = {}): Promise<IngestionReport> {
    await this.requireCompatibleCollection();
    const scan = await scanDirectory(directory);
    return this.ingestPaths(scan.files, options);
  }

  listCandidates(directory: string): Promise<DirectoryScanResult> {
    return scanDirectory(directory);
  }

  private async requireCompatibleCollection(): Promise<void> {
    const config = await this.deps.collections.requireCollection(this.deps.collectionName);
    if (config.dimension !== this.deps.embedder.dimension) {
      throw new DimensionMismatchError(
        config.dimension,
        this.deps.embedder.dimension,
        `collection '${this.deps.collectionName}' against configured embeddings`,
      );
    }
  }
}
