/**
 * Error types shared across the relay.
 * Client-facing messages are built from describeError(), so messages here are written to be shown as-is.
 */

/** Missing or inconsistent environment configuration. */
export class ConfigError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(", ")}`);
    this.name = "ConfigError";
  }
}

/** A transcript or vector store call failed. */
export class StoreError extends Error {
  constructor(readonly operation: string, message: string, readonly code?: string) {
    super(`${operation} failed: ${message}`);
    this.name = "StoreError";
  }
}

export class EmptyDocumentError extends Error {
  constructor(readonly filename: string) {
    super("Empty document");
    this.name = "EmptyDocumentError";
  }
}

/** Malformed /function command (e.g. parameters that are not a JSON object). */
export class FunctionCallError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FunctionCallError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
