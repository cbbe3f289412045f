/**
 * Mock connection for tests and local wiring checks: records every frame instead of sending it.
 */

import type { ClientConnection, ServerMessage } from "./types";

export interface MockConnectionOptions {
  /** Make send() reject, as a broken socket would. */
  failSends?: boolean;
}

export class MockConnection implements ClientConnection {
  readonly frames: string[] = [];
  closed: { code: number; reason: string } | null = null;

  constructor(private readonly opts: MockConnectionOptions = {}) {}

  async send(data: string): Promise<void> {
    if (this.opts.failSends) throw new Error("socket is not writable");
    this.frames.push(data);
  }

  close(code: number, reason: string): void {
    if (!this.closed) this.closed = { code, reason };
  }

  isOpen(): boolean {
    return this.closed === null;
  }

  /** Frames decoded as server messages, in send order. */
  messages(): ServerMessage[] {
    return this.frames.map((f): ServerMessage => JSON.parse(f));
  }

  messagesOfType<T extends ServerMessage["type"]>(type: T): Array<Extract<ServerMessage, { type: T }>> {
    return this.messages().filter((m): m is Extract<ServerMessage, { type: T }> => m.type === type);
  }
}
