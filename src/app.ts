import { AppConfig } from "./config/env.js";
import { VectorStore } from "./domain/vectorStore.js";
import { DefaultAiClient } from "./infra/ai/defaultAiClient.js";
import { AiClient } from "./infra/ai/types.js";
import { loadDocument } from "./infra/parsers/documentLoader.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { BatchEmbedder } from "./pipelines/embedding.js";
import { ChatService } from "./services/chatService.js";
import { CollectionManager } from "./services/collectionManager.js";
import { DocumentLoader, IngestionService } from "./services/ingestionService.js";

export interface AppServices {
  config: AppConfig;
  store: VectorStore;
  aiClient: AiClient;
  collections: CollectionManager;
  ingestion: IngestionService;
  chat: ChatService;
  close(): Promise<void>;
}

export interface AppServiceOverrides {
  store?: VectorStore;
  aiClient?: AiClient;
  loadDocument?: DocumentLoader;
}

/** Wires the store, model clients and services from config; shared by the server and the CLIs. */
export async function createAppServices(
  config: AppConfig,
  overrides: AppServiceOverrides = {},
): Promise<AppServices> {
  const store = overrides.store ?? (await createVectorStore(config));
  const aiClient = overrides.aiClient ?? new DefaultAiClient(config);
  const collections = new CollectionManager(store);
  const embedder = new BatchEmbedder(aiClient, {
    batchSize: config.embeddingBatchSize,
    dimension: config.vectorDimension,
  });

  const ingestion = new IngestionService({
    collectionName: config.collectionName,
    store,
    collections,
    embedder,
    loadDocument: overrides.loadDocument ?? loadDocument,
    chunking: { chunkSize: config.chunkSize, overlap: config.chunkOverlap },
  });

  const chat = new ChatService({
    collectionName: config.collectionName,
    store,
    collections,
    embedder,
    chat: aiClient,
    topK: config.topK,
    followUps: { enabled: config.followUpQuestions, maxQuestions: config.maxFollowUpQuestions },
  });

  return {
    config,
    store,
    aiClient,
    collections,
    ingestion,
    chat,
    close: () => store.close(),
  };
}
