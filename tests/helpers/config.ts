/**
 * Fully populated config for factory tests; override sections with spread.
 */

import type { AppConfig } from "../../src/config";

export function makeConfig(): AppConfig {
  return {
    server: { host: "127.0.0.1", port: 0, heartbeatIntervalMs: 0 },
    llm: { provider: "stub", maxTokens: 1024, temperature: 0.7 },
    store: { provider: "memory" },
    chat: { maxTurnsInMemory: 0, summaryMaxTokens: 512 },
    retrieval: {
      enabled: false,
      augmentChat: false,
      provider: "stub",
      embeddingModel: "text-embedding-3-small",
      embeddingDimensions: 384,
      matchThreshold: 0.1,
      matchCount: 3,
      chunkSize: 500,
    },
  };
}
