/**
 * Session registry: live connection handles plus per-session state, keyed by session id.
 *
 * Lifecycle per session: connecting -> active -> tearing_down -> closed.
 * A closed session has no entry; a later connect with the same id starts a new lifecycle.
 * Map access is synchronous, so no lookup or send ever waits on another session's remote calls.
 */

import type { ITranscriptStore } from "../store";
import { CLOSE_POLICY_VIOLATION, type ClientConnection, type ServerMessage } from "../transport/types";
import { ConversationHistory } from "./conversation";
import { describeError } from "../errors";
import { logger, logError, logSessionTransition } from "../logging";

export type SessionState = "connecting" | "active" | "tearing_down" | "closed";

export const WELCOME_MESSAGE = "Connected to AI assistant. How can I help you today?";
export const INVALID_SESSION_ID_REASON = "Invalid session_id format. Must be a valid UUID.";
export const SESSION_ACTIVE_REASON = "Session already active";

const SESSION_ID_PATTERN = /^(?:[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}|[0-9a-f]{32})$/i;

/** UUID-shaped: 32 hex digits, optionally hyphenated 8-4-4-4-12. Version and variant bits are not checked. */
export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}

/** Runs once per teardown; must not reject, but the registry guards against it anyway. */
export interface SessionSummarizer {
  summarize(sessionId: string): Promise<void>;
}

export interface SessionRegistryOptions {
  store: ITranscriptStore;
  summarizer?: SessionSummarizer;
  /** First turn of every new conversation history. */
  systemPrompt?: string;
  /** Cap on user/assistant turns per history (0 = unbounded). */
  maxTurns?: number;
  welcomeMessage?: string;
}

interface SessionEntry {
  userId: string;
  state: SessionState;
  /** Null once teardown has started; sends become no-ops. */
  connection: ClientConnection | null;
  history: ConversationHistory;
}

export class SessionRegistry {
  private readonly entries = new Map<string, SessionEntry>();
  private readonly store: ITranscriptStore;
  private readonly summarizer: SessionSummarizer | null;
  private readonly welcomeMessage: string;

  constructor(private readonly opts: SessionRegistryOptions) {
    this.store = opts.store;
    this.summarizer = opts.summarizer ?? null;
    this.welcomeMessage = opts.welcomeMessage ?? WELCOME_MESSAGE;
  }

  /**
   * Register a connection and open the session record.
   * Returns false when the connection was refused (and closed with a protocol error).
   * A persistence failure does not refuse the connection; the client gets an error message instead.
   */
  async connect(connection: ClientConnection, sessionId: string, userId: string): Promise<boolean> {
    if (!isValidSessionId(sessionId)) {
      logger.warn({ event: "SESSION_ID_INVALID", sessionIdLength: sessionId.length }, "Refusing connection: malformed session id");
      connection.close(CLOSE_POLICY_VIOLATION, INVALID_SESSION_ID_REASON);
      return false;
    }
    if (this.entries.has(sessionId)) {
      logger.warn({ event: "SESSION_ALREADY_ACTIVE", sessionId }, "Refusing connection: session already has a live connection");
      connection.close(CLOSE_POLICY_VIOLATION, SESSION_ACTIVE_REASON);
      return false;
    }

    const entry: SessionEntry = {
      userId,
      state: "connecting",
      connection,
      history: this.newHistory(),
    };
    this.entries.set(sessionId, entry);
    logSessionTransition(logger, sessionId, null, "connecting");
    this.transition(sessionId, entry, "active");

    try {
      await this.store.createSession(userId, sessionId);
      await this.store.logEvent(sessionId, "system_event", "Session started", { user_id: userId });
      await this.send(sessionId, { type: "system", content: this.welcomeMessage });
      logger.info({ event: "SESSION_CONNECTED", sessionId, userId }, "Session connected");
    } catch (err) {
      logError(logger, err, { event: "SESSION_INIT_FAILED", sessionId });
      await this.send(sessionId, { type: "error", content: `Session initialization failed: ${describeError(err)}` });
    }
    return true;
  }

  /**
   * Tear the session down: drop the handle, run the summarizer, release in-memory state.
   * No-op for unknown sessions and for sessions already tearing down.
   */
  async disconnect(sessionId: string): Promise<void> {
    const entry = this.entries.get(sessionId);
    if (!entry || entry.state === "tearing_down" || entry.state === "closed") return;

    entry.connection = null;
    this.transition(sessionId, entry, "tearing_down");
    try {
      await this.summarizer?.summarize(sessionId);
    } catch (err) {
      logError(logger, err, { event: "POST_SESSION_FAILED", sessionId });
    } finally {
      entry.history.clear();
      this.entries.delete(sessionId);
      this.transition(sessionId, entry, "closed");
      logger.info({ event: "SESSION_CLOSED", sessionId }, "Session closed");
    }
  }

  /** Best effort: dropped when the session has no live connection; transport failures are logged. */
  async send(sessionId: string, message: ServerMessage): Promise<void> {
    const connection = this.entries.get(sessionId)?.connection;
    if (!connection || !connection.isOpen()) {
      logger.debug({ event: "SEND_DROPPED", sessionId, type: message.type }, "No live connection; message dropped");
      return;
    }
    try {
      await connection.send(JSON.stringify(message));
    } catch (err) {
      logger.warn({ event: "SEND_FAILED", sessionId, type: message.type, err: describeError(err) }, "Send to client failed");
    }
  }

  /**
   * History for the session's next completion request.
   * Sessions without an entry get a throwaway history that is not retained.
   */
  historyFor(sessionId: string): ConversationHistory {
    return this.entries.get(sessionId)?.history ?? this.newHistory();
  }

  /** Undefined once the session is closed (or was never connected). */
  getState(sessionId: string): SessionState | undefined {
    return this.entries.get(sessionId)?.state;
  }

  getUserId(sessionId: string): string | undefined {
    return this.entries.get(sessionId)?.userId;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Close every live connection (shutdown). Teardown follows from each transport's close event. */
  closeAll(code: number, reason: string): void {
    for (const entry of this.entries.values()) {
      entry.connection?.close(code, reason);
    }
  }

  private newHistory(): ConversationHistory {
    return new ConversationHistory({ systemPrompt: this.opts.systemPrompt, maxTurns: this.opts.maxTurns });
  }

  private transition(sessionId: string, entry: SessionEntry, to: SessionState): void {
    logSessionTransition(logger, sessionId, entry.state, to);
    entry.state = to;
  }
}
