/**
 * In-process transcript store for local runs and tests.
 * Enforces the same constraints as the SQL schema: unique session_id, and events only for existing sessions.
 */

import * as crypto from "crypto";
import { StoreError } from "../errors";
import type {
  EventMetadata,
  EventRecord,
  EventType,
  ITranscriptStore,
  SessionRecord,
  SessionUpdate,
} from "./types";

function copyEvent(event: EventRecord): EventRecord {
  return { ...event, metadata: structuredClone(event.metadata) };
}

export class InMemoryTranscriptStore implements ITranscriptStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly events: EventRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createSession(userId: string, sessionId: string): Promise<SessionRecord> {
    if (this.sessions.has(sessionId)) {
      throw new StoreError(
        "create_session",
        'duplicate key value violates unique constraint "session_metadata_pkey"',
        "23505"
      );
    }
    const startTime = this.now().toISOString();
    const row: SessionRecord = {
      session_id: sessionId,
      user_id: userId,
      start_time: startTime,
      end_time: null,
      duration_seconds: null,
      session_summary: null,
      created_at: startTime,
    };
    this.sessions.set(sessionId, row);
    return { ...row };
  }

  async logEvent(
    sessionId: string,
    eventType: EventType,
    content: string,
    metadata: EventMetadata = {}
  ): Promise<EventRecord> {
    if (!this.sessions.has(sessionId)) {
      throw new StoreError(
        "log_event",
        'insert or update on table "event_log" violates foreign key constraint "event_log_session_id_fkey"',
        "23503"
      );
    }
    const row: EventRecord = {
      event_id: crypto.randomUUID(),
      session_id: sessionId,
      event_type: eventType,
      content,
      metadata: structuredClone(metadata),
      timestamp: this.now().toISOString(),
    };
    this.events.push(row);
    return copyEvent(row);
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    const row = this.sessions.get(sessionId);
    return row ? { ...row } : null;
  }

  async getSessionEvents(sessionId: string): Promise<EventRecord[]> {
    // Array.prototype.sort is stable, so events sharing a timestamp keep insertion order.
    return this.events
      .filter((e) => e.session_id === sessionId)
      .sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0))
      .map(copyEvent);
  }

  async updateSession(sessionId: string, update: SessionUpdate): Promise<SessionRecord | null> {
    const row = this.sessions.get(sessionId);
    if (!row) return null;
    if (update.endTime) row.end_time = update.endTime.toISOString();
    if (update.durationSeconds !== undefined) row.duration_seconds = update.durationSeconds;
    if (update.summary) row.session_summary = update.summary;
    return { ...row };
  }
}
