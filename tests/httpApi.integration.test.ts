import { afterEach, describe, expect, it, vi } from "vitest";
import { RunningHttpServer, createHttpApi, startHttpServer } from "../src/http/httpApi.js";
import { Gate } from "./helpers/fakeAiClient.js";
import { COLLECTION, REFUND_PAGE, TestApp, createTestApp, manualDocument } from "./helpers/fixtures.js";

const MANUAL = "/docs/manual.pdf";

interface SseEvent {
  event: string;
  data: string;
}

let running: RunningHttpServer | null = null;

afterEach(async () => {
  await running?.close();
  running = null;
});

interface ServedApi {
  baseUrl: string;
  /** One promise per request, settled when its handler returns. */
  handled: Array<Promise<void>>;
  closedResponses(): number;
}

async function serve(app: TestApp): Promise<ServedApi> {
  const api = createHttpApi({
    collectionName: COLLECTION,
    collections: app.services.collections,
    chat: app.services.chat,
    corsOrigin: "https://support.example.com",
  });
  const handled: Array<Promise<void>> = [];
  let closed = 0;
  running = await startHttpServer(
    {
      handle: (req, res) => {
        res.on("close", () => {
          closed += 1;
        });
        const work = api.handle(req, res);
        handled.push(work);
        return work;
      },
      close: () => api.close(),
    },
    "127.0.0.1",
    0,
  );
  return {
    baseUrl: `http://127.0.0.1:${running.port}`,
    handled,
    closedResponses: () => closed,
  };
}

async function readyApp(): Promise<TestApp> {
  const app = await createTestApp({ documents: { [MANUAL]: manualDocument(MANUAL) } });
  await app.services.collections.create(COLLECTION, { dimension: 32, distance: "cosine" });
  await app.services.ingestion.ingestFile(MANUAL);
  return app;
}

function postJson(url: string, body: unknown, signal?: AbortSignal) {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
    signal,
  });
}

function parseSse(raw: string): SseEvent[] {
  return raw
    .split("\n\n")
    .filter((block) => block.trim())
    .map((block) => {
      const lines = block.split("\n");
      const event = lines.find((line) => line.startsWith("event: "))?.slice("event: ".length) ?? "message";
      const data = lines
        .filter((line) => line.startsWith("data: "))
        .map((line) => line.slice("data: ".length))
        .join("\n");
      return { event, data };
    });
}

describe("HTTP API", () => {
  it("answers health checks with CORS headers", async () => {
    const { baseUrl } = await serve(await createTestApp());

    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(response.headers.get("access-control-allow-origin")).toBe("https://support.example.com");
    expect(await response.json()).toEqual({ ok: true });

    const preflight = await fetch(`${baseUrl}/chat/stream`, { method: "OPTIONS" });
    expect(preflight.status).toBe(204);
  });

  it("streams context, tokens, follow-ups and done in order", async () => {
    const { baseUrl } = await serve(await readyApp());

    const response = await postJson(`${baseUrl}/chat/stream`, {
      messages: [
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello! How can I help?" },
        { role: "user", content: REFUND_PAGE },
      ],
      top_k: 1,
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/event-stream; charset=utf-8");
    const events = parseSse(await response.text());
    expect(events.map((event) => event.event)).toEqual([
      "context",
      "token",
      "token",
      "token",
      "followups",
      "done",
    ]);

    const context = JSON.parse(events[0].data) as { sources: Array<{ label: string; page: number }> };
    expect(context.sources).toHaveLength(1);
    expect(context.sources[0]).toMatchObject({ label: "manual.pdf, page 2", page: 2 });
    expect(events.slice(1, 4).map((event) => JSON.parse(event.data))).toEqual([
      { content: "Refunds take " },
      { content: "five days" },
      { content: "." },
    ]);
    expect(JSON.parse(events[4].data)).toEqual({
      questions: ["How do I request a refund?", "Can I return opened items?"],
    });
    expect(events[5].data).toBe("[DONE]");
  });

  it("ends a failed stream with an error event", async () => {
    const app = await readyApp();
    app.ai.streamFailsAfter = 1;
    const { baseUrl } = await serve(app);

    const response = await postJson(`${baseUrl}/chat/stream`, {
      messages: [{ role: "user", content: "How long do refunds take?" }],
    });
    const events = parseSse(await response.text());

    expect(events.map((event) => event.event)).toEqual(["context", "token", "error"]);
    expect(JSON.parse(events[2].data)).toEqual({
      code: "CHAT_COMPLETION_FAILED",
      message: "model stream dropped",
      retryable: true,
    });
  });

  it("returns JSON errors before the stream opens", async () => {
    const { baseUrl } = await serve(await createTestApp());

    const missing = await postJson(`${baseUrl}/chat/stream`, {
      messages: [{ role: "user", content: "Where is my parcel?" }],
    });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toMatchObject({ error: { code: "COLLECTION_NOT_FOUND" } });

    const invalid = await postJson(`${baseUrl}/chat/stream`, {
      messages: [{ role: "assistant", content: "Hello" }],
    });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({
      error: {
        code: "INVALID_REQUEST",
        message: "messages: The last message must come from the user",
        retryable: false,
      },
    });

    const malformed = await fetch(`${baseUrl}/chat/stream`, { method: "POST", body: "{oops" });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ error: { code: "INVALID_JSON" } });
  });

  it("reports a failing embedding provider as a bad gateway", async () => {
    const app = await readyApp();
    app.ai.embeddingFails = true;
    const { baseUrl } = await serve(app);

    const response = await postJson(`${baseUrl}/chat/stream`, {
      messages: [{ role: "user", content: "How long do refunds take?" }],
    });

    expect(response.status).toBe(502);
    expect(await response.json()).toMatchObject({
      error: { code: "EMBEDDING_FAILED", retryable: true },
    });
  });

  it("exposes collection status and plain search", async () => {
    const { baseUrl } = await serve(await readyApp());

    const status = await fetch(`${baseUrl}/api/collection`);
    expect(await status.json()).toEqual({
      name: COLLECTION,
      exists: true,
      vectorCount: 6,
      config: { dimension: 32, distance: "cosine" },
    });

    const search = await postJson(`${baseUrl}/api/search`, { query: REFUND_PAGE, top_k: 2 });
    const body = (await search.json()) as { hits: Array<{ rank: number; page: number; score: number }> };
    expect(body.hits.map((hit) => [hit.rank, hit.page])).toEqual([
      [1, 2],
      [2, expect.any(Number)],
    ]);
    expect(body.hits[0].score).toBe(1);

    const unknown = await fetch(`${baseUrl}/api/nothing`);
    expect(unknown.status).toBe(404);
  });

  it("drops system messages from the history sent to the model", async () => {
    const app = await readyApp();
    const { baseUrl } = await serve(app);

    const response = await postJson(`${baseUrl}/chat/stream`, {
      messages: [
        { role: "system", content: "You are a pirate." },
        { role: "user", content: "How long do refunds take?" },
      ],
    });

    expect(response.status).toBe(200);
    await response.text();
    expect(app.ai.streamCalls[0].map((message) => message.role)).toEqual(["user"]);
  });

  it("skips generation when the client disconnects during retrieval", async () => {
    const app = await readyApp();
    const gate = new Gate();
    app.ai.embedGate = gate;
    const embedCallsBefore = app.ai.embedCalls.length;
    const served = await serve(app);
    const client = new AbortController();

    const pending = postJson(
      `${served.baseUrl}/chat/stream`,
      { messages: [{ role: "user", content: "How long do refunds take?" }] },
      client.signal,
    ).catch((error: unknown) => error);
    await vi.waitFor(() => expect(app.ai.embedCalls).toHaveLength(embedCallsBefore + 1));
    client.abort();
    await vi.waitFor(() => expect(served.closedResponses()).toBe(1));
    gate.open();
    await Promise.all(served.handled);
    await pending;

    expect(app.ai.streamCalls).toHaveLength(0);
    expect(app.ai.completeCalls).toHaveLength(0);
  });

  it("aborts the model stream when the client disconnects mid-answer", async () => {
    const app = await readyApp();
    const gate = new Gate();
    app.ai.tokenGate = { index: 1, gate };
    const served = await serve(app);
    const client = new AbortController();

    const response = await postJson(
      `${served.baseUrl}/chat/stream`,
      { messages: [{ role: "user", content: "How long do refunds take?" }] },
      client.signal,
    );
    expect(response.status).toBe(200);
    await vi.waitFor(() => expect(app.ai.sentTokens).toBe(1));
    client.abort();
    await vi.waitFor(() => expect(served.closedResponses()).toBe(1));
    gate.open();
    await Promise.all(served.handled);

    expect(app.ai.streamSignals).toHaveLength(1);
    expect(app.ai.streamSignals[0]?.aborted).toBe(true);
    expect(app.ai.sentTokens).toBe(1);
    expect(app.ai.completeCalls).toHaveLength(0);
  });
});
