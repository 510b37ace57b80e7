import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AppServices } from "../app.js";
import { describeSource } from "../pipelines/prompting.js";
import { runTool } from "./toolResult.js";

export function registerAskQuestionTool(server: McpServer, services: AppServices) {
  server.registerTool(
    "ask_question",
    {
      title: "Ask Question",
      description:
        "Answers a customer question from the ingested documents and suggests follow-up questions.",
      inputSchema: {
        question: z.string().min(1).describe("Customer question"),
        top_k: z.number().int().min(1).max(50).optional().describe("Retrieval size"),
      },
    },
    async ({ question, top_k }) =>
      runTool("ask_question", async () => {
        const startedAt = Date.now();
        const turn = await services.chat.ask(question, { topK: top_k });
        return {
          answer: turn.answer,
          follow_up_questions: turn.followUpQuestions,
          sources: turn.hits.map((hit) => ({
            source: describeSource(hit),
            path: hit.metadata.source,
            page: hit.metadata.page,
            score: Number(hit.score.toFixed(4)),
          })),
          model: services.aiClient.chatModel,
          latency_ms: Date.now() - startedAt,
        };
      }),
  );
}
