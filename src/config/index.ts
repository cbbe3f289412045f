/**
 * Env-based configuration for the relay.
 * Load from .env.local, then .env (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { ConfigError } from "../errors";

// dotenv never overrides a variable that is already set, so .env.local wins over .env.
loadEnv({ path: path.resolve(process.cwd(), ".env.local") });
loadEnv({ path: path.resolve(process.cwd(), ".env") });

export const LLM_PROVIDERS = ["groq", "openai", "anthropic", "stub"] as const;
export const STORE_PROVIDERS = ["supabase", "memory"] as const;
export const EMBEDDING_PROVIDERS = ["openai", "stub"] as const;

export type LlmProvider = (typeof LLM_PROVIDERS)[number];
export type StoreProvider = (typeof STORE_PROVIDERS)[number];
export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

export interface AppConfig {
  /** HTTP + WebSocket listener */
  server: {
    host: string;
    port: number;
    /** WebSocket ping interval (ms); 0 disables the heartbeat. */
    heartbeatIntervalMs: number;
  };

  /** Completion engine provider and options */
  llm: {
    provider: LlmProvider;
    groqApiKey?: string;
    groqModel?: string;
    openaiApiKey?: string;
    openaiModel?: string;
    openaiBaseUrl?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
    maxTokens: number;
    temperature: number;
  };

  /** Transcript store */
  store: {
    provider: StoreProvider;
    supabaseUrl?: string;
    supabaseKey?: string;
  };

  /** Conversation behaviour */
  chat: {
    /** Optional first turn of every conversation history. */
    systemPrompt?: string;
    /** Max user/assistant turns kept per session history (0 = unbounded). */
    maxTurnsInMemory: number;
    /** Token limit for the post-session summary. */
    summaryMaxTokens: number;
  };

  /** Document embedding and similarity search */
  retrieval: {
    enabled: boolean;
    /** Prepend retrieved context to plain chat turns. */
    augmentChat: boolean;
    provider: EmbeddingProvider;
    openaiApiKey?: string;
    embeddingModel: string;
    embeddingDimensions: number;
    matchThreshold: number;
    matchCount: number;
    chunkSize: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getInt(key: string, defaultValue: number, min = 0): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getFloat(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) ? defaultValue : n;
}

function getBool(key: string, defaultValue = false): boolean {
  const v = getEnv(key)?.toLowerCase();
  if (v === undefined) return defaultValue;
  return v === "1" || v === "true" || v === "yes";
}

function pick<T extends string>(allowed: readonly T[], value: string | undefined, fallback: T): T {
  const v = value?.toLowerCase();
  return allowed.find((a) => a === v) ?? fallback;
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER, STORE_PROVIDER and EMBEDDING_PROVIDER select adapters.
 */
export function loadConfig(): AppConfig {
  const supabaseUrl = getEnv("SUPABASE_URL");
  const openaiApiKey = getEnv("OPENAI_API_KEY");

  return {
    server: {
      host: getEnv("HOST") || "0.0.0.0",
      port: getInt("PORT", 8000),
      heartbeatIntervalMs: getInt("HEARTBEAT_INTERVAL_MS", 30_000),
    },
    llm: {
      provider: pick(LLM_PROVIDERS, getEnv("LLM_PROVIDER"), "groq"),
      groqApiKey: getEnv("GROQ_API_KEY"),
      groqModel: getEnv("GROQ_MODEL_NAME") || "llama-3.3-70b-versatile",
      openaiApiKey,
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      openaiBaseUrl: getEnv("OPENAI_BASE_URL"),
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      maxTokens: getInt("LLM_MAX_TOKENS", 1024, 1),
      temperature: getFloat("LLM_TEMPERATURE", 0.7),
    },
    store: {
      provider: pick(STORE_PROVIDERS, getEnv("STORE_PROVIDER"), supabaseUrl ? "supabase" : "memory"),
      supabaseUrl,
      supabaseKey: getEnv("SUPABASE_KEY"),
    },
    chat: {
      systemPrompt: getEnv("SYSTEM_PROMPT"),
      maxTurnsInMemory: getInt("MAX_TURNS_IN_MEMORY", 0),
      summaryMaxTokens: getInt("SUMMARY_MAX_TOKENS", 512, 1),
    },
    retrieval: {
      enabled: getBool("RETRIEVAL_ENABLED"),
      augmentChat: getBool("RETRIEVAL_AUGMENT_CHAT"),
      provider: pick(EMBEDDING_PROVIDERS, getEnv("EMBEDDING_PROVIDER"), "openai"),
      openaiApiKey,
      embeddingModel: getEnv("EMBEDDING_MODEL_NAME") || "text-embedding-3-small",
      embeddingDimensions: getInt("EMBEDDING_DIMENSIONS", 384, 1),
      matchThreshold: getFloat("RETRIEVAL_MATCH_THRESHOLD", 0.1),
      matchCount: getInt("RETRIEVAL_MATCH_COUNT", 3, 1),
      chunkSize: getInt("RETRIEVAL_CHUNK_SIZE", 500, 1),
    },
  };
}

/** Throws ConfigError listing every variable the selected providers need but which is unset. */
export function validateConfig(config: AppConfig): void {
  const missing: string[] = [];
  if (config.store.provider === "supabase") {
    if (!config.store.supabaseUrl) missing.push("SUPABASE_URL");
    if (!config.store.supabaseKey) missing.push("SUPABASE_KEY");
  }
  const { llm } = config;
  if (llm.provider === "groq" && !llm.groqApiKey) missing.push("GROQ_API_KEY");
  if (llm.provider === "openai" && !llm.openaiApiKey) missing.push("OPENAI_API_KEY");
  if (llm.provider === "anthropic" && !llm.anthropicApiKey) missing.push("ANTHROPIC_API_KEY");
  if (
    config.retrieval.enabled &&
    config.retrieval.provider === "openai" &&
    !config.retrieval.openaiApiKey &&
    !missing.includes("OPENAI_API_KEY")
  ) {
    missing.push("OPENAI_API_KEY");
  }
  if (missing.length > 0) throw new ConfigError(missing);
}
