/**
 * Transcript store types.
 * Rows mirror the session_metadata and event_log tables (see sql/schema.sql).
 */

export const EVENT_TYPES = ["user_message", "ai_response", "function_call", "system_event"] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export type EventMetadata = Record<string, unknown>;

export interface SessionRecord {
  session_id: string;
  user_id: string;
  /** ISO-8601 timestamp. */
  start_time: string;
  end_time?: string | null;
  duration_seconds?: number | null;
  session_summary?: string | null;
  created_at?: string | null;
}

export interface EventRecord {
  event_id?: string;
  session_id: string;
  event_type: EventType;
  content: string;
  metadata: EventMetadata;
  /** ISO-8601 timestamp. */
  timestamp: string;
}

export interface SessionUpdate {
  endTime?: Date;
  durationSeconds?: number;
  summary?: string;
}

/**
 * Append-only event log plus one metadata row per session.
 * Every method rejects with StoreError when the backend call fails.
 */
export interface ITranscriptStore {
  createSession(userId: string, sessionId: string): Promise<SessionRecord>;

  logEvent(sessionId: string, eventType: EventType, content: string, metadata?: EventMetadata): Promise<EventRecord>;

  /** Null when no row exists. */
  getSession(sessionId: string): Promise<SessionRecord | null>;

  /** All events of the session ordered by timestamp ascending. */
  getSessionEvents(sessionId: string): Promise<EventRecord[]>;

  /** Only the fields present in the update are written. */
  updateSession(sessionId: string, update: SessionUpdate): Promise<SessionRecord | null>;
}
