/**
 * Transport-facing types: the per-session connection handle and the wire messages.
 */

/** WebSocket close code for a policy violation (RFC 6455 §7.4.1). */
export const CLOSE_POLICY_VIOLATION = 1008;

/** One live client connection. The registry only ever talks to clients through this. */
export interface ClientConnection {
  /** Send one text frame. Rejects when the transport fails. */
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
  isOpen(): boolean;
}

/** Messages the relay sends to clients. */
export type ServerMessage =
  | { type: "system"; content: string }
  | { type: "error"; content: string }
  | { type: "typing"; content: boolean }
  | { type: "ai_response_chunk"; content: string }
  | { type: "ai_response_complete"; content: true }
  | { type: "function_result"; function: string; result: unknown };
