/**
 * Chat Completions adapter for OpenAI and for OpenAI-compatible hosts.
 * Groq is served by pointing `baseURL` at its endpoint.
 */

import OpenAI from "openai";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface OpenAILlmConfig {
  apiKey: string;
  model: string;
  /** Alternate endpoint, e.g. Groq's OpenAI-compatible API. */
  baseURL?: string;
}

/** Minimal view of a streamed completion chunk. */
interface CompletionChunk {
  choices: Array<{ delta?: { content?: string | null } }>;
}

const DEFAULT_MAX_TOKENS = 1024;

async function* contentDeltas(chunks: AsyncIterable<CompletionChunk>): AsyncIterable<string> {
  for await (const chunk of chunks) {
    const piece = chunk.choices[0]?.delta?.content;
    if (piece) yield piece;
  }
}

export class OpenAILLM implements ILLM {
  private readonly client: OpenAI;

  constructor(private readonly cfg: OpenAILlmConfig) {
    this.client = new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL });
  }

  get model(): string {
    return this.cfg.model;
  }

  async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatResponse> {
    const request = {
      model: this.cfg.model,
      messages: messages.map(({ role, content }) => ({ role, content })),
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature,
    };
    if (!options.stream) {
      const completion = await this.client.chat.completions.create({ ...request, stream: false });
      return { text: completion.choices[0]?.message?.content ?? "" };
    }
    const chunks = await this.client.chat.completions.create({ ...request, stream: true });
    return { text: "", stream: contentDeltas(chunks) };
  }
}
