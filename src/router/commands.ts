/**
 * Inbound message parsing: the optional JSON envelope and the /function command line.
 */

import { FunctionCallError } from "../errors";
import type { FunctionParameters } from "./functions";

export const DEFAULT_MESSAGE_TYPE = "user_message";
export const FUNCTION_COMMAND_PREFIX = "/function";

export interface InboundEnvelope {
  type: string;
  content: string;
}

export interface FunctionCommand {
  command: string;
  /** Undefined when the command has no function name (usage is shown instead). */
  functionName?: string;
  parameters: FunctionParameters;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * `{"type": "...", "content": "..."}` -> envelope; anything else (plain text, other JSON) is
 * taken verbatim as content with the default type.
 */
export function parseEnvelope(raw: string): InboundEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { type: DEFAULT_MESSAGE_TYPE, content: raw };
  }
  if (isRecord(parsed) && typeof parsed.content === "string") {
    return {
      type: typeof parsed.type === "string" && parsed.type ? parsed.type : DEFAULT_MESSAGE_TYPE,
      content: parsed.content,
    };
  }
  return { type: DEFAULT_MESSAGE_TYPE, content: raw };
}

export function isFunctionCommand(content: string): boolean {
  return content.toLowerCase().startsWith(FUNCTION_COMMAND_PREFIX);
}

const COMMAND_PATTERN = /^\s*(\S+)(?:\s+(\S+))?(?:\s+([\s\S]*))?$/;

/**
 * `/function <name> [json]`: at most three whitespace-separated parts, the last being the rest of the line.
 * Throws FunctionCallError when the parameters are present but not a JSON object.
 */
export function parseFunctionCommand(content: string): FunctionCommand {
  const match = COMMAND_PATTERN.exec(content);
  if (!match) return { command: content.trim(), parameters: {} };
  const [, command, functionName, rest] = match;
  const raw = rest?.trim();
  if (!functionName || !raw) return { command, functionName, parameters: {} };

  let parameters: unknown;
  try {
    parameters = JSON.parse(raw);
  } catch (err) {
    throw new FunctionCallError(`Invalid JSON parameters: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(parameters)) {
    throw new FunctionCallError("Parameters must be a JSON object");
  }
  return { command, functionName, parameters };
}
