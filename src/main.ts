/**
 * Entry point: load config, wire store + LLM + summarizer + router, then serve HTTP and WebSocket sessions.
 * Without SUPABASE_URL the transcript store is in-memory; LLM_PROVIDER=stub runs with no API key.
 */

import { loadConfig, validateConfig } from "./config";
import { createLLM } from "./adapters/llm";
import { createSupabaseClient, createTranscriptStore } from "./store";
import { createKnowledgeBase } from "./retrieval";
import { SessionRegistry } from "./session/registry";
import { PostSessionSummarizer } from "./summarizer/post-session";
import { MessageRouter } from "./router/message-router";
import { createRelayServer } from "./server";
import { logger, logError } from "./logging";

async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const supabase = createSupabaseClient(config);
  const store = createTranscriptStore(config, supabase);
  const llm = createLLM(config);
  const summarizer = new PostSessionSummarizer(store, llm, {
    maxTokens: config.chat.summaryMaxTokens,
    temperature: config.llm.temperature,
  });
  const registry = new SessionRegistry({
    store,
    summarizer,
    systemPrompt: config.chat.systemPrompt,
    maxTurns: config.chat.maxTurnsInMemory,
  });
  const knowledgeBase = createKnowledgeBase(config, supabase);
  const router = new MessageRouter({
    registry,
    store,
    llm,
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    contextProvider: knowledgeBase && config.retrieval.augmentChat ? (query) => knowledgeBase.query(query) : undefined,
  });

  const relay = createRelayServer({
    registry,
    router,
    store,
    knowledgeBase,
    heartbeatIntervalMs: config.server.heartbeatIntervalMs,
  });
  await relay.listen(config.server.port, config.server.host);
  logger.info(
    {
      event: "STARTUP",
      llmProvider: config.llm.provider,
      storeProvider: config.store.provider,
      retrieval: Boolean(knowledgeBase),
    },
    "Session relay started"
  );

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ event: "SHUTDOWN", signal }, "Shutting down");
    void relay.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logError(logger, err, { event: "SHUTDOWN_FAILED" });
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logError(logger, err);
  process.exit(1);
});
