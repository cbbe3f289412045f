/**
 * Integration test: real HTTP + WebSocket server on a loopback port, stub model, in-memory store.
 */

import * as http from "http";
import WebSocket from "ws";
import { createRelayServer, type RelayServer } from "../../src/server";
import { SessionRegistry, INVALID_SESSION_ID_REASON, SESSION_ACTIVE_REASON, WELCOME_MESSAGE } from "../../src/session/registry";
import { MessageRouter } from "../../src/router/message-router";
import { PostSessionSummarizer, NO_CONVERSATION_SUMMARY } from "../../src/summarizer/post-session";
import { InMemoryTranscriptStore } from "../../src/store";
import { InMemoryVectorStore, KnowledgeBase } from "../../src/retrieval";
import { StubEmbedder } from "../../src/adapters/embeddings";
import { StubLLM, type Message } from "../../src/adapters/llm";
import { rawDataToString } from "../../src/transport/ws";
import type { ServerMessage } from "../../src/transport/types";

const SESSION = "11111111-1111-1111-1111-111111111111";

function reply(messages: Message[]): string {
  return messages[0]?.content.startsWith("Conversation History:") ? "User greeted the assistant." : "Hello there";
}

interface HttpResult {
  status: number;
  body: unknown;
}

function request(port: number, method: string, path: string, body?: unknown): Promise<HttpResult> {
  return new Promise((resolve, reject) => {
    const payload = body === undefined ? undefined : JSON.stringify(body);
    const req = http.request(
      { host: "127.0.0.1", port, method, path, agent: false, headers: payload ? { "Content-Type": "application/json" } : {} },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () => {
          const text = Buffer.concat(chunks).toString("utf8");
          resolve({ status: res.statusCode ?? 0, body: text ? JSON.parse(text) : null });
        });
      }
    );
    req.on("error", reject);
    if (payload) req.write(payload);
    req.end();
  });
}

class TestClient {
  readonly messages: ServerMessage[] = [];
  private waiters: Array<() => void> = [];
  readonly closed: Promise<{ code: number; reason: string }>;

  constructor(readonly ws: WebSocket) {
    ws.on("message", (data) => {
      this.messages.push(JSON.parse(rawDataToString(data)));
      for (const wake of this.waiters.splice(0)) wake();
    });
    this.closed = new Promise((resolve) => {
      ws.once("close", (code, reason) => resolve({ code, reason: reason.toString() }));
    });
  }

  static connect(url: string): Promise<TestClient> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url);
      const client = new TestClient(ws);
      ws.once("open", () => resolve(client));
      ws.once("error", reject);
    });
  }

  async waitFor(type: ServerMessage["type"], count = 1): Promise<void> {
    while (this.messages.filter((m) => m.type === type).length < count) {
      await new Promise<void>((wake) => this.waiters.push(wake));
    }
  }

  send(text: string): void {
    this.ws.send(text);
  }

  async close(): Promise<void> {
    this.ws.close(1000);
    await this.closed;
  }
}

describe("relay server", () => {
  let store: InMemoryTranscriptStore;
  let relay: RelayServer;
  let port: number;

  async function start(knowledgeBase: KnowledgeBase | null = null): Promise<void> {
    store = new InMemoryTranscriptStore();
    const llm = new StubLLM({ reply });
    const registry = new SessionRegistry({ store, summarizer: new PostSessionSummarizer(store, llm) });
    const router = new MessageRouter({ registry, store, llm });
    relay = createRelayServer({ registry, router, store, knowledgeBase });
    port = await relay.listen(0, "127.0.0.1");
  }

  afterEach(async () => {
    await relay.close();
  });

  it("answers the health check", async () => {
    await start();
    expect(await request(port, "GET", "/health")).toEqual({
      status: 200,
      body: { status: "healthy", service: "session-relay", version: "1.0.0" },
    });
  });

  it("runs a full session and summarizes it on disconnect", async () => {
    await start();
    const client = await TestClient.connect(`ws://127.0.0.1:${port}/ws/session/${SESSION}?user_id=alice`);
    await client.waitFor("system");
    expect(client.messages).toEqual([{ type: "system", content: WELCOME_MESSAGE }]);

    client.send("hi");
    await client.waitFor("ai_response_complete");
    expect(client.messages.slice(1)).toEqual([
      { type: "typing", content: true },
      { type: "ai_response_chunk", content: "Hello " },
      { type: "ai_response_chunk", content: "there" },
      { type: "typing", content: false },
      { type: "ai_response_complete", content: true },
    ]);

    await client.close();
    await relay.close();

    const session = await store.getSession(SESSION);
    expect(session?.user_id).toBe("alice");
    expect(session?.session_summary).toBe("User greeted the assistant.");
    expect(typeof session?.end_time).toBe("string");
    const events = await store.getSessionEvents(SESSION);
    expect(events.map((e) => [e.event_type, e.content])).toEqual([
      ["system_event", "Session started"],
      ["user_message", "hi"],
      ["ai_response", "Hello there"],
      ["system_event", "Session ended and summary generated"],
    ]);
  });

  it("handles a burst of messages one at a time with the socket paused", async () => {
    const pause = jest.spyOn(WebSocket.prototype, "pause");
    const resume = jest.spyOn(WebSocket.prototype, "resume");
    try {
      await start();
      const client = await TestClient.connect(`ws://127.0.0.1:${port}/ws/session/${SESSION}`);
      await client.waitFor("system");
      client.send("one");
      client.send("two");
      client.send("three");
      await client.waitFor("ai_response_complete", 3);

      const turn = ["typing", "ai_response_chunk", "ai_response_chunk", "typing", "ai_response_complete"];
      expect(client.messages.slice(1).map((m) => m.type)).toEqual([...turn, ...turn, ...turn]);

      await client.close();
      await relay.close();
      expect(pause).toHaveBeenCalledTimes(3);
      expect(resume).toHaveBeenCalled();
      const lastPause = Math.max(...pause.mock.invocationCallOrder);
      const lastResume = Math.max(...resume.mock.invocationCallOrder);
      expect(lastResume).toBeGreaterThan(lastPause);

      const users = (await store.getSessionEvents(SESSION)).filter((e) => e.event_type === "user_message");
      expect(users.map((e) => e.content)).toEqual(["one", "two", "three"]);
    } finally {
      pause.mockRestore();
      resume.mockRestore();
    }
  });

  it("serves session records and events over HTTP", async () => {
    await start();
    const client = await TestClient.connect(`ws://127.0.0.1:${port}/ws/session/${SESSION}`);
    await client.waitFor("system");

    const session = await request(port, "GET", `/api/session/${SESSION}`);
    expect(session.status).toBe(200);
    expect(session.body).toMatchObject({ session_id: SESSION, user_id: "anonymous", end_time: null });

    const events = await request(port, "GET", `/api/session/${SESSION}/events`);
    expect(events.status).toBe(200);
    expect(events.body).toMatchObject({
      session_id: SESSION,
      events: [{ event_type: "system_event", content: "Session started", metadata: { user_id: "anonymous" } }],
    });

    await client.close();
  });

  it("returns 404 for unknown sessions and routes", async () => {
    await start();
    expect(await request(port, "GET", `/api/session/${SESSION}`)).toEqual({
      status: 404,
      body: { detail: "Session not found" },
    });
    expect((await request(port, "GET", "/nowhere")).status).toBe(404);
  });

  it("closes connections with a malformed session id", async () => {
    await start();
    const client = await TestClient.connect(`ws://127.0.0.1:${port}/ws/session/not-a-uuid`);
    expect(await client.closed).toEqual({ code: 1008, reason: INVALID_SESSION_ID_REASON });
    expect(client.messages).toEqual([]);
  });

  it("refuses a second connection for a live session", async () => {
    await start();
    const first = await TestClient.connect(`ws://127.0.0.1:${port}/ws/session/${SESSION}?user_id=alice`);
    await first.waitFor("system");
    const second = await TestClient.connect(`ws://127.0.0.1:${port}/ws/session/${SESSION}?user_id=bob`);
    expect(await second.closed).toEqual({ code: 1008, reason: SESSION_ACTIVE_REASON });

    first.send("still here");
    await first.waitFor("ai_response_complete");
    await first.close();
  });

  it("closes a silent session with the no-conversation summary", async () => {
    await start();
    const client = await TestClient.connect(`ws://127.0.0.1:${port}/ws/session/${SESSION}`);
    await client.waitFor("system");
    await client.close();
    await relay.close();
    expect((await store.getSession(SESSION))?.session_summary).toBe(NO_CONVERSATION_SUMMARY);
  });

  it("refuses upgrades on other paths", async () => {
    await start();
    await expect(TestClient.connect(`ws://127.0.0.1:${port}/elsewhere`)).rejects.toThrow("Unexpected server response: 404");
  });

  it("answers 503 on document routes when retrieval is disabled", async () => {
    await start();
    expect(await request(port, "POST", "/api/documents", { filename: "a.txt", content: "text" })).toEqual({
      status: 503,
      body: { detail: "Retrieval is disabled" },
    });
  });

  it("ingests and searches documents", async () => {
    await start(new KnowledgeBase(new StubEmbedder(), new InMemoryVectorStore()));
    expect(await request(port, "POST", "/api/documents", { filename: "otters.txt", content: "Otters hold hands while sleeping" })).toEqual({
      status: 200,
      body: { filename: "otters.txt", chunks_processed: 1, message: "Document successfully ingested into Knowledge Base." },
    });

    const search = await request(port, "POST", "/api/documents/search", { query: "Otters hold hands while sleeping" });
    expect(search.status).toBe(200);
    expect(search.body).toMatchObject({
      query: "Otters hold hands while sleeping",
      matches: [{ content: "Otters hold hands while sleeping", metadata: { filename: "otters.txt" } }],
      context: "Otters hold hands while sleeping\n---\n",
    });

    expect(await request(port, "POST", "/api/documents", { filename: "blank.txt", content: "   " })).toEqual({
      status: 400,
      body: { detail: "Empty document" },
    });
    expect((await request(port, "POST", "/api/documents", { filename: "x.txt" })).status).toBe(400);
  });

  it("answers 413 when a request body is over the limit", async () => {
    await start(new KnowledgeBase(new StubEmbedder(), new InMemoryVectorStore()));
    const content = "a".repeat(5 * 1024 * 1024);
    expect(await request(port, "POST", "/api/documents", { filename: "big.txt", content })).toEqual({
      status: 413,
      body: { detail: "Request body too large" },
    });
  });
});
