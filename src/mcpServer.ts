import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AppServices } from "./app.js";
import { registerAskQuestionTool } from "./tools/askQuestion.js";
import { registerCollectionStatusTool } from "./tools/collectionStatus.js";
import { registerIngestDocumentsTool } from "./tools/ingestDocuments.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

export const SERVER_NAME = "support-qa-service";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(services: AppServices): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running (collection ${services.config.collectionName}). hello ${who}`,
          },
        ],
      };
    },
  );

  registerCollectionStatusTool(server, services);
  registerSearchChunksTool(server, services);
  registerAskQuestionTool(server, services);
  registerIngestDocumentsTool(server, services);

  return server;
}
