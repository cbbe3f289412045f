/**
 * Unit tests for message routing: streaming relay, function commands and failure reporting.
 */

import { MessageRouter, withRetrievedContext, type MessageRouterOptions } from "../../../src/router/message-router";
import { SessionRegistry } from "../../../src/session/registry";
import { InMemoryTranscriptStore } from "../../../src/store";
import { StubLLM, type StubLLMOptions } from "../../../src/adapters/llm";
import { MockConnection } from "../../../src/transport/mock";

const SESSION = "5e6f7a8b-9c0d-4e1f-a2b3-c4d5e6f7a8b9";

interface Harness {
  store: InMemoryTranscriptStore;
  registry: SessionRegistry;
  llm: StubLLM;
  conn: MockConnection;
  router: MessageRouter;
  /** Messages sent after the welcome. */
  sent(): ReturnType<MockConnection["messages"]>;
}

async function setup(llmOpts: StubLLMOptions = {}, routerOpts: Partial<MessageRouterOptions> = {}): Promise<Harness> {
  const store = new InMemoryTranscriptStore();
  const registry = new SessionRegistry({ store });
  const llm = new StubLLM(llmOpts);
  const conn = new MockConnection();
  await registry.connect(conn, SESSION, "alice");
  const router = new MessageRouter({ registry, store, llm, ...routerOpts });
  return {
    store,
    registry,
    llm,
    conn,
    router,
    sent: () => conn.messages().slice(1),
  };
}

async function events(store: InMemoryTranscriptStore): Promise<Array<[string, string, Record<string, unknown>]>> {
  return (await store.getSessionEvents(SESSION)).map((e) => [e.event_type, e.content, e.metadata]);
}

describe("MessageRouter chat turns", () => {
  it("relays fragments between typing indicators and logs the full reply", async () => {
    const h = await setup({ chunks: ["Hel", "lo"] });
    await h.router.handle(SESSION, "hi");

    expect(h.sent()).toEqual([
      { type: "typing", content: true },
      { type: "ai_response_chunk", content: "Hel" },
      { type: "ai_response_chunk", content: "lo" },
      { type: "typing", content: false },
      { type: "ai_response_complete", content: true },
    ]);
    expect(await events(h.store)).toEqual([
      ["system_event", "Session started", { user_id: "alice" }],
      ["user_message", "hi", { message_type: "user_message" }],
      ["ai_response", "Hello", { chunk_count: 2 }],
    ]);
  });

  it("records the envelope type", async () => {
    const h = await setup({ reply: "ok" });
    await h.router.handle(SESSION, JSON.stringify({ type: "question", content: "what time is it" }));
    const [, userMessage] = await events(h.store);
    expect(userMessage).toEqual(["user_message", "what time is it", { message_type: "question" }]);
  });

  it("sends the running history with each request", async () => {
    const h = await setup({ reply: (messages) => `reply ${messages.length}` });
    await h.router.handle(SESSION, "first");
    await h.router.handle(SESSION, "second");
    expect(h.llm.calls[1].messages).toEqual([
      { role: "user", content: "first" },
      { role: "assistant", content: "reply 1" },
      { role: "user", content: "second" },
    ]);
    expect(h.llm.calls[1].options).toEqual({ stream: true, maxTokens: undefined, temperature: undefined });
  });

  it("passes token and temperature limits through", async () => {
    const h = await setup({ reply: "ok" }, { maxTokens: 64, temperature: 0.2 });
    await h.router.handle(SESSION, "hi");
    expect(h.llm.calls[0].options).toEqual({ stream: true, maxTokens: 64, temperature: 0.2 });
  });

  it("reports a stream that fails midway and keeps the history clean", async () => {
    const h = await setup({ chunks: ["a", "b"], failWith: new Error("upstream reset"), failAfterChunks: 1 });
    await h.router.handle(SESSION, "hi");

    expect(h.sent()).toEqual([
      { type: "typing", content: true },
      { type: "ai_response_chunk", content: "a" },
      { type: "typing", content: false },
      { type: "error", content: "Error generating response: upstream reset" },
    ]);
    expect((await events(h.store)).map(([type]) => type)).toEqual(["system_event", "user_message"]);
    expect(h.registry.historyFor(SESSION).length).toBe(0);
  });

  it("clears the typing indicator when the request itself fails", async () => {
    const h = await setup({ failWith: new Error("rate limited") });
    await h.router.handle(SESSION, "hi");
    expect(h.sent()).toEqual([
      { type: "typing", content: true },
      { type: "typing", content: false },
      { type: "error", content: "Error generating response: rate limited" },
    ]);
  });

  it("reports a failure to log the inbound message", async () => {
    const h = await setup({ reply: "ok" });
    jest.spyOn(h.store, "logEvent").mockRejectedValueOnce(new Error("db down"));
    await h.router.handle(SESSION, "hi");
    expect(h.sent()).toEqual([{ type: "error", content: "Error processing message: db down" }]);
    expect(h.llm.calls).toHaveLength(0);
  });

  it("does nothing visible for a session without a connection", async () => {
    const h = await setup({ reply: "ok" });
    const other = "6f7a8b9c-0d1e-4f2a-b3c4-d5e6f7a8b9c0";
    await expect(h.router.handle(other, "hi")).resolves.toBeUndefined();
    expect(h.sent()).toEqual([]);
  });
});

describe("MessageRouter function commands", () => {
  it("returns the function result and then streams a reply about it", async () => {
    const h = await setup({ chunks: ["Sunny", "!"] });
    await h.router.handle(SESSION, "/function get_weather");

    expect(h.sent()).toEqual([
      {
        type: "function_result",
        function: "get_weather",
        result: {
          result: "The weather is sunny with a temperature of 72°F",
          data: { temperature: 72, condition: "sunny" },
        },
      },
      { type: "typing", content: true },
      { type: "ai_response_chunk", content: "Sunny" },
      { type: "ai_response_chunk", content: "!" },
      { type: "typing", content: false },
      { type: "ai_response_complete", content: true },
    ]);
    expect(h.llm.calls[0].messages).toEqual([
      { role: "user", content: "Function get_weather returned: The weather is sunny with a temperature of 72°F" },
    ]);
    expect(await events(h.store)).toEqual([
      ["system_event", "Session started", { user_id: "alice" }],
      ["user_message", "/function get_weather", { message_type: "user_message" }],
      ["function_call", "Calling function: get_weather", { function: "get_weather", parameters: {} }],
      ["ai_response", "Sunny!", { chunk_count: 2 }],
    ]);
  });

  it("shows usage for the bare command", async () => {
    const h = await setup();
    await h.router.handle(SESSION, "/function");
    expect(h.sent()).toEqual([
      {
        type: "system",
        content:
          "Usage: /function <function_name> [parameters]\nAvailable functions: get_weather, get_user_info, search_database",
      },
    ]);
    expect(h.llm.calls).toHaveLength(0);
  });

  it("echoes parameters of unknown functions", async () => {
    const h = await setup({ reply: "done" });
    await h.router.handle(SESSION, '/FUNCTION launch {"target": "moon"}');
    const [result] = h.conn.messagesOfType("function_result");
    expect(result).toEqual({
      type: "function_result",
      function: "launch",
      result: { result: "Function launch executed", data: { target: "moon" } },
    });
  });

  it("reports malformed parameters without calling the model", async () => {
    const h = await setup();
    await h.router.handle(SESSION, "/function get_weather [1, 2]");
    expect(h.sent()).toEqual([{ type: "error", content: "Function call failed: Parameters must be a JSON object" }]);
    expect(h.llm.calls).toHaveLength(0);
  });
});

describe("MessageRouter retrieved context", () => {
  it("prepends context to the model request but logs the raw message", async () => {
    const contextProvider = jest.fn(async (query: string) => `Facts about ${query}\n---\n`);
    const h = await setup({ reply: "ok" }, { contextProvider });
    await h.router.handle(SESSION, "otters");
    expect(contextProvider).toHaveBeenCalledWith("otters");
    expect(h.llm.calls[0].messages).toEqual([
      { role: "user", content: withRetrievedContext("Facts about otters\n---\n", "otters") },
    ]);
    const [, userMessage] = await events(h.store);
    expect(userMessage[1]).toBe("otters");
  });

  it("continues without context when the lookup fails or finds nothing", async () => {
    const failing = await setup({ reply: "ok" }, { contextProvider: async () => Promise.reject(new Error("no index")) });
    await failing.router.handle(SESSION, "otters");
    expect(failing.llm.calls[0].messages).toEqual([{ role: "user", content: "otters" }]);

    const empty = await setup({ reply: "ok" }, { contextProvider: async () => "" });
    await empty.router.handle(SESSION, "otters");
    expect(empty.llm.calls[0].messages).toEqual([{ role: "user", content: "otters" }]);
  });
});

describe("withRetrievedContext", () => {
  it("frames the question with its context", () => {
    expect(withRetrievedContext("A\n---\n", "Q?")).toBe(
      "Use the following context if it is relevant to the question.\n\nContext:\nA\n---\nQuestion: Q?"
    );
  });

  it("puts the question on its own line after unterminated context", () => {
    expect(withRetrievedContext("plain facts", "Q?")).toBe(
      "Use the following context if it is relevant to the question.\n\nContext:\nplain facts\nQuestion: Q?"
    );
  });
});
