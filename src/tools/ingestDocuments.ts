import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AppServices } from "../app.js";
import { InputError } from "../domain/errors.js";
import { runTool } from "./toolResult.js";

export function registerIngestDocumentsTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "ingest_documents",
    {
      title: "Ingest Documents",
      description: "Chunks, embeds and stores local PDF/DOCX files into the document collection.",
      inputSchema: {
        paths: z.array(z.string()).optional().describe("File paths to ingest"),
        directory: z.string().optional().describe("Directory scanned recursively for .pdf/.docx"),
        source_label: z.string().optional().describe("Label stored with every chunk"),
      },
    },
    async ({ paths, directory, source_label }) =>
      runTool("ingest_documents", async () => {
        const options = { sourceLabel: source_label ?? null };
        const report =
          paths && paths.length > 0
            ? await services.ingestion.ingestPaths(paths, options)
            : await services.ingestion.ingestDirectory(requireDirectory(directory), options);

        return {
          collection: report.collection,
          ingested_count: report.succeeded.length,
          chunk_count: report.totalChunks,
          succeeded: report.succeeded,
          failed: report.failed,
        };
      }),
  );
}

function requireDirectory(directory: string | undefined): string {
  if (!directory?.trim()) {
    throw new InputError("INVALID_REQUEST", "Provide either paths or directory.");
  }
  return directory;
}
