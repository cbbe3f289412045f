/**
 * Supabase (PostgREST) transcript store.
 * Tables: session_metadata (one row per session) and event_log (append-only).
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { StoreError } from "../errors";
import { logger } from "../logging";
import {
  EVENT_TYPES,
  type EventMetadata,
  type EventRecord,
  type EventType,
  type ITranscriptStore,
  type SessionRecord,
  type SessionUpdate,
} from "./types";

export const SESSION_TABLE = "session_metadata";
export const EVENT_TABLE = "event_log";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function optionalString(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

function isEventType(v: unknown): v is EventType {
  return EVENT_TYPES.some((t) => t === v);
}

function firstRow(data: unknown): unknown {
  return Array.isArray(data) && data.length > 0 ? data[0] : undefined;
}

/** Narrow a session_metadata row. Throws StoreError when the identity columns are missing. */
export function toSessionRecord(row: unknown): SessionRecord {
  if (!isRecord(row) || typeof row.session_id !== "string" || typeof row.user_id !== "string") {
    throw new StoreError("read_session", "malformed session_metadata row");
  }
  return {
    session_id: row.session_id,
    user_id: row.user_id,
    start_time: typeof row.start_time === "string" ? row.start_time : "",
    end_time: optionalString(row.end_time),
    duration_seconds: typeof row.duration_seconds === "number" ? row.duration_seconds : null,
    session_summary: optionalString(row.session_summary),
    created_at: optionalString(row.created_at),
  };
}

/** Narrow an event_log row; null for rows this relay did not write (unknown event_type). */
export function toEventRecord(row: unknown): EventRecord | null {
  if (!isRecord(row) || typeof row.session_id !== "string" || !isEventType(row.event_type)) return null;
  return {
    ...(typeof row.event_id === "string" ? { event_id: row.event_id } : {}),
    session_id: row.session_id,
    event_type: row.event_type,
    content: typeof row.content === "string" ? row.content : "",
    metadata: isRecord(row.metadata) ? row.metadata : {},
    timestamp: typeof row.timestamp === "string" ? row.timestamp : "",
  };
}

export class SupabaseTranscriptStore implements ITranscriptStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createSession(userId: string, sessionId: string): Promise<SessionRecord> {
    const row: SessionRecord = { session_id: sessionId, user_id: userId, start_time: this.now().toISOString() };
    const { data, error } = await this.client.from(SESSION_TABLE).insert(row).select();
    if (error) throw new StoreError("create_session", error.message, error.code);
    const inserted = firstRow(data);
    return inserted === undefined ? row : toSessionRecord(inserted);
  }

  async logEvent(
    sessionId: string,
    eventType: EventType,
    content: string,
    metadata: EventMetadata = {}
  ): Promise<EventRecord> {
    const row: EventRecord = {
      session_id: sessionId,
      event_type: eventType,
      content,
      metadata,
      timestamp: this.now().toISOString(),
    };
    const { data, error } = await this.client.from(EVENT_TABLE).insert(row).select();
    if (error) throw new StoreError("log_event", error.message, error.code);
    return toEventRecord(firstRow(data)) ?? row;
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    const { data, error } = await this.client.from(SESSION_TABLE).select("*").eq("session_id", sessionId);
    if (error) throw new StoreError("get_session", error.message, error.code);
    const row = firstRow(data);
    return row === undefined ? null : toSessionRecord(row);
  }

  async getSessionEvents(sessionId: string): Promise<EventRecord[]> {
    const { data, error } = await this.client
      .from(EVENT_TABLE)
      .select("*")
      .eq("session_id", sessionId)
      .order("timestamp", { ascending: true });
    if (error) throw new StoreError("get_session_events", error.message, error.code);
    const rows: unknown[] = Array.isArray(data) ? data : [];
    const events: EventRecord[] = [];
    for (const row of rows) {
      const event = toEventRecord(row);
      if (event) events.push(event);
      else logger.warn({ event: "EVENT_ROW_SKIPPED", sessionId }, "Skipping event_log row with unknown shape");
    }
    return events;
  }

  async updateSession(sessionId: string, update: SessionUpdate): Promise<SessionRecord | null> {
    const patch: Record<string, string | number> = {};
    if (update.endTime) patch.end_time = update.endTime.toISOString();
    if (update.durationSeconds !== undefined) patch.duration_seconds = update.durationSeconds;
    if (update.summary) patch.session_summary = update.summary;
    const { data, error } = await this.client
      .from(SESSION_TABLE)
      .update(patch)
      .eq("session_id", sessionId)
      .select();
    if (error) throw new StoreError("update_session", error.message, error.code);
    const row = firstRow(data);
    return row === undefined ? null : toSessionRecord(row);
  }
}
