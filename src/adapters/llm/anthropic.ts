/**
 * Anthropic Messages adapter.
 * The API takes system text as a top-level field and only user/assistant turns in `messages`.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

export interface AnthropicTurn {
  role: "user" | "assistant";
  content: string;
}

const DEFAULT_MAX_TOKENS = 1024;

/** System turns are joined with blank lines; undefined when there are none. */
export function toAnthropicTurns(messages: Message[]): { system?: string; turns: AnthropicTurn[] } {
  const system: string[] = [];
  const turns: AnthropicTurn[] = [];
  for (const { role, content } of messages) {
    if (role === "system") system.push(content);
    else turns.push({ role, content });
  }
  return { system: system.length > 0 ? system.join("\n\n") : undefined, turns };
}

export class AnthropicLLM implements ILLM {
  private readonly client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatResponse> {
    const { system, turns } = toAnthropicTurns(messages);
    const request = {
      model: this.cfg.model,
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature,
      system,
      messages: turns,
    };

    if (options.stream) {
      const events = this.client.messages.stream(request);
      const text = (async function* (): AsyncIterable<string> {
        for await (const event of events) {
          if (event.type === "content_block_delta" && event.delta.type === "text_delta") yield event.delta.text;
        }
      })();
      return { text: "", stream: text };
    }

    const reply = await this.client.messages.create(request);
    return { text: reply.content.map((block) => (block.type === "text" ? block.text : "")).join("") };
  }
}
