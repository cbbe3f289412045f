/**
 * Completion engine factory. A provider without its API key falls back to the stub
 * (validateConfig rejects that combination at startup, so this only happens in tests and local runs).
 */

import { GROQ_BASE_URL, type AppConfig } from "../../config";
import { logger } from "../../logging";
import type { ILLM } from "./types";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";

export type { ILLM, Message, ChatOptions, ChatResponse } from "./types";
export { StubLLM, splitIntoFragments } from "./stub";
export type { StubLLMOptions } from "./stub";
export { OpenAILLM } from "./openai";
export { AnthropicLLM, toAnthropicTurns } from "./anthropic";

export const DEFAULT_MODELS = {
  groq: "llama-3.3-70b-versatile",
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-sonnet-20241022",
} as const;

export function createLLM(config: AppConfig): ILLM {
  const llm = config.llm;
  switch (llm.provider) {
    case "groq":
      if (llm.groqApiKey) {
        return new OpenAILLM({ apiKey: llm.groqApiKey, model: llm.groqModel || DEFAULT_MODELS.groq, baseURL: GROQ_BASE_URL });
      }
      break;
    case "openai":
      if (llm.openaiApiKey) {
        return new OpenAILLM({ apiKey: llm.openaiApiKey, model: llm.openaiModel || DEFAULT_MODELS.openai, baseURL: llm.openaiBaseUrl });
      }
      break;
    case "anthropic":
      if (llm.anthropicApiKey) {
        return new AnthropicLLM({ apiKey: llm.anthropicApiKey, model: llm.anthropicModel || DEFAULT_MODELS.anthropic });
      }
      break;
    case "stub":
      return new StubLLM();
  }
  logger.warn({ event: "LLM_STUB_FALLBACK", provider: llm.provider }, "No API key for provider; using stub LLM");
  return new StubLLM();
}
