import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { InputError, RequestAbortedError, describeError, toAppError } from "../domain/errors.js";
import { ConversationMessage, SearchHit } from "../domain/types.js";
import { describeSource } from "../pipelines/prompting.js";
import { ChatService } from "../services/chatService.js";
import { CollectionManager } from "../services/collectionManager.js";
import { createLogger } from "../utils/logger.js";
import { SseWriter } from "./sse.js";

const logger = createLogger("http");

export const MCP_PATH = "/mcp";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

type SessionMap = Record<string, SessionEntry>;

export interface HttpApiDeps {
  collectionName: string;
  collections: CollectionManager;
  chat: ChatService;
  corsOrigin: string;
  /** Serves MCP on /mcp when given. */
  mcpServerFactory?: () => McpServer;
}

export interface HttpApi {
  handle(req: IncomingMessage, res: ServerResponse): Promise<void>;
  close(): Promise<void>;
}

export interface RunningHttpServer {
  port: number;
  close(): Promise<void>;
}

// System messages are accepted from chat clients but never forwarded to the model.
const messageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

const chatStreamSchema = z.object({
  messages: z
    .array(messageSchema)
    .min(1, "messages must contain at least one message")
    .refine((messages) => messages.at(-1)?.role === "user", {
      message: "The last message must come from the user",
    }),
  top_k: z.number().int().min(1).max(50).optional(),
});

const searchSchema = z.object({
  query: z.string(),
  top_k: z.number().int().min(1).max(50).optional(),
});

export function createHttpApi(deps: HttpApiDeps): HttpApi {
  const sessions: SessionMap = {};

  const handle = async (req: IncomingMessage, res: ServerResponse) => {
    applyCors(res, deps.corsOrigin);
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (req.method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      if (url.pathname === "/healthz" && req.method === "GET") {
        writeJson(res, 200, { ok: true });
        return;
      }

      if (url.pathname === "/chat/stream" && req.method === "POST") {
        await handleChatStream(req, res, deps);
        return;
      }

      if (url.pathname === "/api/collection" && req.method === "GET") {
        writeJson(res, 200, await deps.collections.status(deps.collectionName));
        return;
      }

      if (url.pathname === "/api/search" && req.method === "POST") {
        const input = parseBody(searchSchema, await readJsonBody(req));
        const hits = await deps.chat.retrieve(input.query, { topK: input.top_k });
        writeJson(res, 200, { query: input.query.trim(), hits: hits.map(toHitView) });
        return;
      }

      if (url.pathname === MCP_PATH && deps.mcpServerFactory) {
        await handleMcpRequest(req, res, sessions, deps.mcpServerFactory);
        return;
      }

      writeJson(res, 404, {
        error: { code: "NOT_FOUND", message: `No route for ${req.method} ${url.pathname}` },
      });
    } catch (error) {
      writeError(res, error);
    }
  };

  const close = async () => {
    await Promise.all(
      Object.values(sessions).map(async (entry) => {
        await entry.transport.close();
        await entry.server.close();
      }),
    );
  };

  return { handle, close };
}

export async function startHttpServer(
  api: HttpApi,
  host: string,
  port: number,
): Promise<RunningHttpServer> {
  const httpServer = createServer((req, res) => {
    api.handle(req, res).catch((error: unknown) => writeError(res, error));
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => resolve());
  });

  const address = httpServer.address();
  const boundPort = address && typeof address === "object" ? address.port : port;

  return {
    port: boundPort,
    close: async () => {
      await api.close();
      httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}

/**
 * Retrieval happens before the event stream opens so setup failures still
 * get a JSON status. After that every outcome ends with `done` or `error`.
 */
async function handleChatStream(req: IncomingMessage, res: ServerResponse, deps: HttpApiDeps) {
  const input = parseBody(chatStreamSchema, await readJsonBody(req));
  const history = input.messages
    .slice(0, -1)
    .filter((message): message is ConversationMessage => message.role !== "system");
  const question = input.messages[input.messages.length - 1].content;
  const startedAt = Date.now();

  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });

  const hits = await deps.chat.retrieve(question, { topK: input.top_k });
  if (controller.signal.aborted || res.destroyed) {
    logger.info("Chat stream cancelled by client before answering", {
      latencyMs: Date.now() - startedAt,
    });
    return;
  }

  const sse = new SseWriter(res);
  sse.open();
  sse.send("context", { sources: hits.map(toHitView) });

  try {
    const answer = await deps.chat.streamAnswer(question, hits, {
      history,
      signal: controller.signal,
      onToken: (token) => sse.send("token", { content: token }),
    });
    const questions = await deps.chat.suggestFollowUps(question, answer, {
      signal: controller.signal,
    });
    sse.send("followups", { questions });
    sse.send("done", "[DONE]");
    logger.info("Chat stream completed", {
      hits: hits.length,
      answerChars: answer.length,
      followUps: questions.length,
      latencyMs: Date.now() - startedAt,
    });
  } catch (error) {
    if (error instanceof RequestAbortedError || controller.signal.aborted) {
      logger.info("Chat stream cancelled by client", { latencyMs: Date.now() - startedAt });
    } else {
      const appError = toAppError(error);
      logger.error("Chat stream failed", appError);
      sse.send("error", {
        code: appError.code,
        message: appError.message,
        retryable: appError.retryable,
      });
    }
  } finally {
    sse.end();
  }
}

async function handleMcpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: SessionMap,
  serverFactory: () => McpServer,
) {
  if (req.method === "POST") {
    const body = await readJsonBody(req);
    await handleMcpPost(req, res, body, sessions, serverFactory);
    return;
  }

  if (req.method === "GET" || req.method === "DELETE") {
    const sessionId = getSessionId(req);
    const entry = sessionId ? sessions[sessionId] : undefined;
    if (!entry) {
      res.writeHead(400, { "Content-Type": "text/plain" });
      res.end("Missing or invalid mcp-session-id");
      return;
    }
    await entry.transport.handleRequest(req, res);
    return;
  }

  writeJson(res, 405, { error: { code: "METHOD_NOT_ALLOWED", message: "Method not allowed" } });
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: SessionMap,
  serverFactory: () => McpServer,
) {
  const sessionId = getSessionId(req);
  const existing = sessionId ? sessions[sessionId] : undefined;

  if (existing) {
    await existing.transport.handleRequest(req, res, body);
    return;
  }

  if (sessionId) {
    writeJsonRpcError(res, 404, -32001, "Session not found");
    return;
  }

  if (!isInitializeRequest(body)) {
    writeJsonRpcError(res, 400, -32000, "Initialize request is required when session is not established");
    return;
  }

  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (newSessionId) => {
      sessions[newSessionId] = { server, transport };
    },
  });

  transport.onclose = () => {
    const closedSessionId = transport.sessionId;
    if (!closedSessionId || !sessions[closedSessionId]) {
      return;
    }
    delete sessions[closedSessionId];
    server.close().catch((error: unknown) => {
      logger.warn("MCP session close failed", { reason: describeError(error) });
    });
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

function toHitView(hit: SearchHit, index: number) {
  return {
    rank: index + 1,
    id: hit.id,
    score: Number(hit.score.toFixed(4)),
    source: hit.metadata.source,
    label: describeSource(hit),
    page: hit.metadata.page,
    chunk_id: hit.metadata.chunkId,
    snippet: hit.content.slice(0, 240),
  };
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "body"}: ${issue.message}`,
    );
    throw new InputError("INVALID_REQUEST", problems.join("; "), { detail: { problems } });
  }
  return parsed.data;
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new InputError("INVALID_JSON", "Request body is not valid JSON.");
  }
}

function applyCors(res: ServerResponse, origin: string) {
  res.setHeader("Access-Control-Allow-Origin", origin);
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, Accept, mcp-session-id");
  res.setHeader("Access-Control-Expose-Headers", "mcp-session-id");
}

function writeJson(res: ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function writeError(res: ServerResponse, error: unknown) {
  const appError = toAppError(error);
  if (appError.httpStatus >= 500) {
    logger.error("Request failed", appError);
  } else {
    logger.debug("Request rejected", { code: appError.code, reason: appError.message });
  }

  if (res.headersSent) {
    res.end();
    return;
  }
  writeJson(res, appError.httpStatus, {
    error: { code: appError.code, message: appError.message, retryable: appError.retryable },
  });
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function writeJsonRpcError(res: ServerResponse, httpCode: number, code: number, message: string) {
  writeJson(res, httpCode, {
    jsonrpc: "2.0",
    error: { code, message },
    id: null,
  });
}
