import { CollectionNotFoundError } from "../domain/errors.js";
import { CollectionConfig, CollectionStatus } from "../domain/types.js";
import { VectorStore, assertCollectionName } from "../domain/vectorStore.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("collections");

export interface CreateCollectionOptions extends CollectionConfig {
  /** Drop an existing collection and start empty. */
  recreate?: boolean;
}

export type CreateAction = "created" | "unchanged" | "recreated";

export interface CreateCollectionResult {
  action: CreateAction;
  status: CollectionStatus;
}

export class CollectionManager {
  constructor(private readonly store: VectorStore) {}

  async create(name: string, options: CreateCollectionOptions): Promise<CreateCollectionResult> {
    assertCollectionName(name);
    const config: CollectionConfig = { dimension: options.dimension, distance: options.distance };
    const existing = await this.store.getCollection(name);

    let action: CreateAction;
    if (!existing) {
      await this.store.createCollection(name, config);
      action = "created";
    } else if (options.recreate) {
      await this.store.deleteCollection(name);
      await this.store.createCollection(name, config);
      action = "recreated";
    } else {
      action = "unchanged";
      if (existing.dimension !== config.dimension || existing.distance !== config.distance) {
        logger.warn("Existing collection keeps its original configuration", {
          collection: name,
          existing,
          requested: config,
        });
      }
    }

    logger.info(`Collection ${action}`, { collection: name });
    return { action, status: await this.status(name) };
  }

  async status(name: string): Promise<CollectionStatus> {
    assertCollectionName(name);
    const config = await this.store.getCollection(name);
    if (!config) {
      return { name, exists: false, vectorCount: 0, config: null };
    }
    return { name, exists: true, vectorCount: await this.store.countRecords(name), config };
  }

  async clear(name: string): Promise<{ removed: number }> {
    await this.requireCollection(name);
    const removed = await this.store.clearCollection(name);
    logger.info("Collection cleared", { collection: name, removed });
    return { removed };
  }

  async delete(name: string): Promise<{ deleted: boolean }> {
    assertCollectionName(name);
    const deleted = await this.store.deleteCollection(name);
    if (deleted) {
      logger.info("Collection deleted", { collection: name });
    }
    return { deleted };
  }

  async requireCollection(name: string): Promise<CollectionConfig> {
    assertCollectionName(name);
    const config = await this.store.getCollection(name);
    if (!config) {
      throw new CollectionNotFoundError(name);
    }
    return config;
  }
}
