import { describe, expect, it } from "vitest";
import { CollectionNotFoundError, InputError } from "../src/domain/errors.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";
import { CollectionManager } from "../src/services/collectionManager.js";

const config = { dimension: 2, distance: "cosine" as const };

async function seeded() {
  const store = new InMemoryVectorStore();
  const manager = new CollectionManager(store);
  await manager.create("support_docs", config);
  await store.upsert("support_docs", [
    {
      id: "r1",
      vector: [1, 0],
      content: "Refunds take five days.",
      metadata: {
        source: "/docs/faq.docx",
        page: null,
        fileType: "docx",
        chunkId: 0,
        chunkSize: 23,
        startOffset: 0,
        sourceLabel: null,
        indexedAt: "2026-01-01T00:00:00.000Z",
      },
    },
  ]);
  return { store, manager };
}

describe("CollectionManager", () => {
  it("creates a missing collection and reports its status", async () => {
    const manager = new CollectionManager(new InMemoryVectorStore());

    const result = await manager.create("support_docs", config);

    expect(result).toEqual({
      action: "created",
      status: { name: "support_docs", exists: true, vectorCount: 0, config },
    });
  });

  it("leaves an existing collection and its records alone", async () => {
    const { manager } = await seeded();

    const first = await manager.create("support_docs", config);
    const second = await manager.create("support_docs", config);

    expect(first.action).toBe("unchanged");
    expect(second).toEqual(first);
    expect(second.status.vectorCount).toBe(1);
  });

  it("recreates an existing collection empty when asked", async () => {
    const { manager } = await seeded();

    const result = await manager.create("support_docs", { ...config, recreate: true });

    expect(result.action).toBe("recreated");
    expect(result.status.vectorCount).toBe(0);
  });

  it("clears records and keeps the configuration", async () => {
    const { manager } = await seeded();

    expect(await manager.clear("support_docs")).toEqual({ removed: 1 });
    expect(await manager.clear("support_docs")).toEqual({ removed: 0 });
    expect(await manager.status("support_docs")).toEqual({
      name: "support_docs",
      exists: true,
      vectorCount: 0,
      config,
    });
  });

  it("fails to clear a missing collection", async () => {
    const manager = new CollectionManager(new InMemoryVectorStore());

    await expect(manager.clear("support_docs")).rejects.toThrow(CollectionNotFoundError);
  });

  it("deletes idempotently", async () => {
    const { manager } = await seeded();

    expect(await manager.delete("support_docs")).toEqual({ deleted: true });
    expect(await manager.delete("support_docs")).toEqual({ deleted: false });
    expect(await manager.status("support_docs")).toEqual({
      name: "support_docs",
      exists: false,
      vectorCount: 0,
      config: null,
    });
  });

  it("requires the collection for reads", async () => {
    const manager = new CollectionManager(new InMemoryVectorStore());

    const error = await manager.requireCollection("support_docs").catch((caught: unknown) => caught);
    if (!(error instanceof CollectionNotFoundError)) {
      throw new Error("expected CollectionNotFoundError");
    }
    expect(error.code).toBe("COLLECTION_NOT_FOUND");
    expect(error.httpStatus).toBe(404);
    await expect(manager.status("Support Docs")).rejects.toThrow(InputError);
  });
});
