/**
 * Structured logging for the relay: session lifecycle, model calls, store failures and errors.
 * Every record carries an upper-case `event` field. Message text is never logged, only lengths.
 *
 * Env:
 *   LOG_LEVEL  - silent | debug | info | warn | error (default: info; silent under tests)
 *   LOG_FILE   - If set, append all logs to this path as JSON (creates dirs if needed).
 */

import pino from "pino";
import { describeError } from "../errors";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "debug", "info", "warn", "error"];

export interface LoggerConfig {
  level?: LogLevel;
  /** Human-readable console output through pino-pretty. */
  pretty?: boolean;
  /** Extra JSON destination appended to alongside the console. */
  file?: string;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v);
}

function envConfig(): Required<Pick<LoggerConfig, "level" | "pretty">> & Pick<LoggerConfig, "file"> {
  const env = process.env.NODE_ENV;
  return {
    level: parseLogLevel(process.env.LOG_LEVEL) ?? (env === "test" ? "silent" : "info"),
    pretty: env !== "production" && env !== "test",
    file: process.env.LOG_FILE?.trim() || undefined,
  };
}

function destinations(pretty: boolean, file: string | undefined): pino.StreamEntry[] {
  const primary: pino.StreamEntry = pretty
    ? { stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }) }
    : { stream: process.stdout };
  if (!file) return [primary];
  return [primary, { stream: pino.destination({ dest: file, append: true, mkdir: true }) }];
}

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const defaults = envConfig();
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaults.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const [only, ...rest] = destinations(config.pretty ?? defaults.pretty, config.file ?? defaults.file);
  return rest.length === 0 ? pino(opts, only.stream) : pino(opts, pino.multistream([only, ...rest]));
}

export const logger = createLogger();

/** Completion call: sizes and timing only. */
export function logLlmCall(
  log: pino.Logger,
  purpose: "chat" | "summary",
  messageCount: number,
  responseLength: number,
  durationMs?: number
): void {
  log.info({ event: "LLM_CALL", purpose, messageCount, responseLength, durationMs }, "LLM completed");
}

export function logSessionTransition(log: pino.Logger, sessionId: string, from: string | null, to: string): void {
  log.debug({ event: "SESSION_STATE", sessionId, from, to }, `Session ${to}`);
}

/** Log any thrown value with its stack when it has one. */
export function logError(log: pino.Logger, err: unknown, context?: Record<string, unknown>): void {
  const stack = err instanceof Error ? err.stack : undefined;
  log.error({ err: describeError(err), stack, ...context }, "Error");
}
