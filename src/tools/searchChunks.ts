import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AppServices } from "../app.js";
import { describeSource } from "../pipelines/prompting.js";
import { runTool } from "./toolResult.js";

export function registerSearchChunksTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves the most similar chunks from the ingested support documents.",
      inputSchema: {
        query: z.string().min(1).describe("Search query"),
        top_k: z.number().int().min(1).max(50).optional().describe("Max hits"),
      },
    },
    async ({ query, top_k }) =>
      runTool("search_chunks", async () => {
        const hits = await services.chat.retrieve(query, { topK: top_k });
        return {
          query: query.trim(),
          hits: hits.map((hit) => ({
            score: Number(hit.score.toFixed(4)),
            source: describeSource(hit),
            path: hit.metadata.source,
            page: hit.metadata.page,
            chunk_id: hit.metadata.chunkId,
            snippet: hit.content.slice(0, 240),
          })),
        };
      }),
  );
}
