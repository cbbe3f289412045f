/**
 * Retrieval factory: Supabase-backed when a client is available, otherwise in-process.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "../config";
import { createEmbedder } from "../adapters/embeddings";
import { KnowledgeBase } from "./knowledge-base";
import { InMemoryVectorStore } from "./memory";
import { SupabaseVectorStore } from "./supabase";

export * from "./types";
export { chunkText, DEFAULT_CHUNK_SIZE } from "./chunker";
export { KnowledgeBase, renderContext, INGEST_MESSAGE } from "./knowledge-base";
export { InMemoryVectorStore, cosineSimilarity } from "./memory";
export { SupabaseVectorStore, toChunkMatch } from "./supabase";

/** Null when retrieval is disabled. */
export function createKnowledgeBase(config: AppConfig, client: SupabaseClient | null): KnowledgeBase | null {
  if (!config.retrieval.enabled) return null;
  const vectors = config.store.provider === "supabase" && client ? new SupabaseVectorStore(client) : new InMemoryVectorStore();
  return new KnowledgeBase(createEmbedder(config), vectors, {
    matchThreshold: config.retrieval.matchThreshold,
    matchCount: config.retrieval.matchCount,
    chunkSize: config.retrieval.chunkSize,
  });
}
