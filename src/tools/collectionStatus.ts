import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { AppServices } from "../app.js";
import { runTool } from "./toolResult.js";

export function registerCollectionStatusTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "collection_status",
    {
      title: "Collection Status",
      description: "Reports whether the document collection exists, its vector count and its configuration.",
      inputSchema: {},
    },
    async () =>
      runTool("collection_status", async () => {
        const status = await services.collections.status(services.config.collectionName);
        return {
          name: status.name,
          exists: status.exists,
          vector_count: status.vectorCount,
          dimension: status.config?.dimension ?? null,
          distance: status.config?.distance ?? null,
          store: services.config.vectorStore,
        };
      }),
  );
}
