/**
 * Stub LLM adapter for tests and for running without a provider key.
 * Replies with a fixed text; streaming splits it into word-sized fragments.
 * Can be told to fail before or during a stream.
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface StubLLMOptions {
  /** Fixed reply (default echoes the last user turn). */
  reply?: string | ((messages: Message[]) => string);
  /** Explicit stream fragments; overrides splitting the reply. */
  chunks?: string[];
  /** Reject the chat() call itself. */
  failWith?: Error;
  /** Throw after this many fragments have been yielded (requires failWith). */
  failAfterChunks?: number;
}

export class StubLLM implements ILLM {
  /** Every message list passed to chat(), in call order. */
  readonly calls: Array<{ messages: Message[]; options?: ChatOptions }> = [];

  constructor(private readonly opts: StubLLMOptions = {}) {}

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages: messages.map((m) => ({ ...m })), options });
    const { failWith, failAfterChunks } = this.opts;
    if (failWith && failAfterChunks === undefined) throw failWith;

    const text = this.replyFor(messages);
    if (!options?.stream) return { text };

    const chunks = this.opts.chunks ?? splitIntoFragments(text);
    const stream = (async function* (): AsyncIterable<string> {
      for (let i = 0; i < chunks.length; i++) {
        if (failWith && failAfterChunks === i) throw failWith;
        yield chunks[i];
      }
      if (failWith && failAfterChunks !== undefined && failAfterChunks >= chunks.length) throw failWith;
    })();
    return { text: "", stream };
  }

  private replyFor(messages: Message[]): string {
    const { reply } = this.opts;
    if (typeof reply === "function") return reply(messages);
    if (reply !== undefined) return reply;
    if (this.opts.chunks) return this.opts.chunks.join("");
    const lastUser = [...messages].reverse().find((m) => m.role === "user");
    return lastUser ? `You said: ${lastUser.content}` : "";
  }
}

/** "a b c" -> ["a ", "b ", "c"]; concatenation always equals the input. */
export function splitIntoFragments(text: string): string[] {
  return text.match(/\S+\s*|\s+/g) ?? [];
}
