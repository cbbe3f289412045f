/**
 * Per-session conversation history: the role-tagged turns sent to the completion engine.
 * Owned by the session's registry entry and released with it.
 */

import type { Message } from "../adapters/llm";

export interface ConversationHistoryConfig {
  /** Optional first turn, kept for the lifetime of the history. */
  systemPrompt?: string;
  /** Max user/assistant turns to keep (0 = unbounded). Trimmed oldest-first, a whole exchange at a time. */
  maxTurns?: number;
}

export class ConversationHistory {
  private readonly system: Message | null;
  private turns: Message[] = [];
  private readonly maxTurns: number;

  constructor(config: ConversationHistoryConfig = {}) {
    const prompt = config.systemPrompt?.trim();
    this.system = prompt ? { role: "system", content: prompt } : null;
    this.maxTurns = config.maxTurns ?? 0;
  }

  appendUser(content: string): void {
    this.turns.push({ role: "user", content });
  }

  /** Call only once the full reply has arrived, so roles stay alternating. */
  appendAssistant(content: string): void {
    this.turns.push({ role: "assistant", content });
    this.trim();
  }

  /** Drop a trailing user turn whose reply never arrived. */
  discardPendingUser(): void {
    const last = this.turns[this.turns.length - 1];
    if (last?.role === "user") this.turns.pop();
  }

  /** Full message list for the next request (system prompt first, when set). */
  messages(): Message[] {
    const turns = this.turns.map((t) => ({ ...t }));
    return this.system ? [{ ...this.system }, ...turns] : turns;
  }

  get length(): number {
    return this.turns.length;
  }

  clear(): void {
    this.turns = [];
  }

  private trim(): void {
    if (this.maxTurns <= 0) return;
    while (this.turns.length > this.maxTurns) {
      // Remove a user turn together with its reply.
      this.turns.splice(0, this.turns[0]?.role === "user" && this.turns[1]?.role === "assistant" ? 2 : 1);
    }
  }
}
