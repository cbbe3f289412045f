/**
 * Transcript store factory: Supabase when configured, otherwise in-process.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "../config";
import type { ITranscriptStore } from "./types";
import { SupabaseTranscriptStore } from "./supabase";
import { InMemoryTranscriptStore } from "./memory";
import { logger } from "../logging";

export * from "./types";
export { SupabaseTranscriptStore, toSessionRecord, toEventRecord, SESSION_TABLE, EVENT_TABLE } from "./supabase";
export { InMemoryTranscriptStore } from "./memory";

/** Server-side client: no auth session persistence. Null when Supabase is not configured. */
export function createSupabaseClient(config: AppConfig): SupabaseClient | null {
  const { supabaseUrl, supabaseKey } = config.store;
  if (!supabaseUrl || !supabaseKey) return null;
  return createClient(supabaseUrl, supabaseKey, { auth: { persistSession: false } });
}

export function createTranscriptStore(config: AppConfig, client = createSupabaseClient(config)): ITranscriptStore {
  if (config.store.provider === "supabase" && client) {
    return new SupabaseTranscriptStore(client);
  }
  logger.warn({ event: "STORE_IN_MEMORY" }, "Using in-memory transcript store; transcripts are lost on restart");
  return new InMemoryTranscriptStore();
}
