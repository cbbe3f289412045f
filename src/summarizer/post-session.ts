/**
 * Post-session summarizer: once per teardown, turn the transcript into a short summary and close the session record.
 * Never rejects. A session that was already closed (end_time set) is left alone, so teardown can be re-run safely.
 */

import type { ILLM } from "../adapters/llm";
import type { EventRecord, ITranscriptStore, SessionRecord } from "../store";
import type { SessionSummarizer } from "../session/registry";
import { describeError } from "../errors";
import { logger, logError, logLlmCall } from "../logging";

export const NO_CONVERSATION_SUMMARY = "No conversation occurred in this session.";
export const EMPTY_SUMMARY_FALLBACK = "No summary was generated.";

const DEFAULT_SUMMARY_MAX_TOKENS = 512;
const CONVERSATIONAL_EVENT_TYPES = new Set<EventRecord["event_type"]>(["user_message", "ai_response", "function_call"]);

export interface PostSessionSummarizerOptions {
  maxTokens?: number;
  temperature?: number;
  now?: () => Date;
}

/** Timestamps without a zone designator are read as UTC. */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const trimmed = value.trim();
  const hasZone = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/.test(trimmed);
  const isDateTime = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/.test(trimmed);
  const normalized = isDateTime && !hasZone ? `${trimmed.replace(" ", "T")}Z` : trimmed;
  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/** Whole seconds from start to end, never negative. A missing or unparseable start counts as `end`. */
export function computeDurationSeconds(startTime: string | null | undefined, end: Date): number {
  const start = parseTimestamp(startTime) ?? end;
  const seconds = Math.floor((end.getTime() - start.getTime()) / 1000);
  return Math.max(0, seconds);
}

/**
 * Transcript text for the summary prompt. Only user messages, replies and function calls contribute.
 */
export function renderTranscript(events: EventRecord[]): string {
  let text = "Conversation History:\n\n";
  for (const event of events) {
    if (event.event_type === "user_message") text += `User: ${event.content}\n`;
    else if (event.event_type === "ai_response") text += `AI: ${event.content}\n`;
    else if (event.event_type === "function_call") text += `[Function Call: ${event.content}]\n`;
  }
  return text;
}

export function buildSummaryPrompt(events: EventRecord[]): string {
  return [
    renderTranscript(events),
    "",
    "Please provide a concise summary of this conversation session. Include:",
    "1. Main topics discussed",
    "2. Key questions asked by the user",
    "3. Important information provided",
    "4. Overall conversation outcome",
    "",
    "Keep the summary brief (3-5 sentences).",
  ].join("\n");
}

export class PostSessionSummarizer implements SessionSummarizer {
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly now: () => Date;

  constructor(
    private readonly store: ITranscriptStore,
    private readonly llm: ILLM,
    private readonly opts: PostSessionSummarizerOptions = {}
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  /** Concurrent calls for one session share a single run. */
  summarize(sessionId: string): Promise<void> {
    const running = this.inFlight.get(sessionId);
    if (running) return running;
    const run = this.run(sessionId).finally(() => this.inFlight.delete(sessionId));
    this.inFlight.set(sessionId, run);
    return run;
  }

  private async run(sessionId: string): Promise<void> {
    let session: SessionRecord | null = null;
    try {
      session = await this.store.getSession(sessionId);
      if (!session) {
        logger.info({ event: "SUMMARY_SKIPPED", sessionId, reason: "not_found" }, "No session record; nothing to summarize");
        return;
      }
      if (session.end_time) {
        logger.info({ event: "SUMMARY_SKIPPED", sessionId, reason: "already_closed" }, "Session already closed");
        return;
      }

      const events = await this.store.getSessionEvents(sessionId);
      const conversational = events.filter((e) => CONVERSATIONAL_EVENT_TYPES.has(e.event_type));
      if (conversational.length === 0) {
        const endTime = this.now();
        await this.store.updateSession(sessionId, {
          endTime,
          durationSeconds: computeDurationSeconds(session.start_time, endTime),
          summary: NO_CONVERSATION_SUMMARY,
        });
        logger.info({ event: "SUMMARY_EMPTY_SESSION", sessionId }, "Session closed without conversation");
        return;
      }

      logger.info({ event: "SUMMARY_STARTED", sessionId, eventCount: events.length }, "Summarizing session");
      const summary = await this.generateSummary(events);
      const endTime = this.now();
      const durationSeconds = computeDurationSeconds(session.start_time, endTime);
      await this.store.updateSession(sessionId, { endTime, durationSeconds, summary });
      await this.logCompletion(sessionId, durationSeconds, events.length);
    } catch (err) {
      logError(logger, err, { event: "SUMMARY_FAILED", sessionId });
      await this.closeAfterFailure(sessionId, session, err);
    }
  }

  /** The session row is already closed here, so a failure is only logged. */
  private async logCompletion(sessionId: string, durationSeconds: number, eventCount: number): Promise<void> {
    try {
      await this.store.logEvent(sessionId, "system_event", "Session ended and summary generated", {
        duration_seconds: durationSeconds,
        event_count: eventCount,
      });
      logger.info({ event: "SUMMARY_COMPLETED", sessionId, durationSeconds }, "Post-session processing completed");
    } catch (err) {
      logError(logger, err, { event: "SUMMARY_EVENT_FAILED", sessionId });
    }
  }

  private async generateSummary(events: EventRecord[]): Promise<string> {
    const started = Date.now();
    const response = await this.llm.chat([{ role: "user", content: buildSummaryPrompt(events) }], {
      stream: false,
      maxTokens: this.opts.maxTokens ?? DEFAULT_SUMMARY_MAX_TOKENS,
      temperature: this.opts.temperature,
    });
    const summary = response.text.trim();
    logLlmCall(logger, "summary", 1, summary.length, Date.now() - started);
    return summary || EMPTY_SUMMARY_FALLBACK;
  }

  /**
   * Best-effort end_time so no session is left open; a failure here is logged and dropped.
   * Duration is left unset when the session row could not be read.
   */
  private async closeAfterFailure(sessionId: string, session: SessionRecord | null, cause: unknown): Promise<void> {
    try {
      const endTime = this.now();
      await this.store.updateSession(sessionId, {
        endTime,
        ...(session ? { durationSeconds: computeDurationSeconds(session.start_time, endTime) } : {}),
        summary: `Summary generation failed: ${describeError(cause)}`,
      });
    } catch (err) {
      logError(logger, err, { event: "SESSION_END_UPDATE_FAILED", sessionId });
    }
  }
}
