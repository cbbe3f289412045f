/**
 * LLM adapter types.
 * Implementations can be swapped via config (Groq, OpenAI, Anthropic, stub).
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  /** If true, response is streamed (fragments as they arrive). */
  stream?: boolean;
  /** Max tokens to generate. */
  maxTokens?: number;
  /** Sampling temperature. */
  temperature?: number;
}

export interface ChatResponse {
  /** Full text of the assistant reply (non-streaming). Empty when streaming. */
  text: string;
  /** If streaming was requested, yields fragments in arrival order. */
  stream?: AsyncIterable<string>;
}

/**
 * LLM adapter interface: ordered turns in, assistant reply out.
 */
export interface ILLM {
  /**
   * Get assistant reply for the given messages.
   * @param messages - Conversation history (system + user + assistant turns).
   */
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
