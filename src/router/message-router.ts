/**
 * Message router: logs each inbound message, then runs either the /function path or the streaming chat path.
 *
 * Per chat turn the client sees: typing(true), ai_response_chunk*, typing(false), ai_response_complete,
 * or on failure typing(true), ai_response_chunk*, typing(false), error.
 */

import type { ILLM } from "../adapters/llm";
import type { ITranscriptStore } from "../store";
import type { SessionRegistry } from "../session/registry";
import { createDefaultFunctions, type FunctionRegistry } from "./functions";
import { isFunctionCommand, parseEnvelope, parseFunctionCommand } from "./commands";
import { describeError } from "../errors";
import { logger, logError, logLlmCall } from "../logging";

/** Returns retrieved context for a query, or "" when there is none. */
export type ContextProvider = (query: string) => Promise<string>;

export interface MessageRouterOptions {
  registry: SessionRegistry;
  store: ITranscriptStore;
  llm: ILLM;
  functions?: FunctionRegistry;
  /** When set, plain chat turns carry retrieved context to the model. */
  contextProvider?: ContextProvider;
  maxTokens?: number;
  temperature?: number;
}

/** Rendered context already ends each match with a separator line; other text gets a newline before the question. */
export function withRetrievedContext(context: string, question: string): string {
  const body = context.endsWith("\n") ? context : `${context}\n`;
  return `Use the following context if it is relevant to the question.\n\nContext:\n${body}Question: ${question}`;
}

export class MessageRouter {
  private readonly registry: SessionRegistry;
  private readonly store: ITranscriptStore;
  private readonly llm: ILLM;
  private readonly functions: FunctionRegistry;
  private readonly contextProvider: ContextProvider | null;

  constructor(private readonly opts: MessageRouterOptions) {
    this.registry = opts.registry;
    this.store = opts.store;
    this.llm = opts.llm;
    this.functions = opts.functions ?? createDefaultFunctions();
    this.contextProvider = opts.contextProvider ?? null;
  }

  /** Handle one inbound frame. Never rejects; failures reach the client as an error message. */
  async handle(sessionId: string, rawMessage: string): Promise<void> {
    try {
      const envelope = parseEnvelope(rawMessage);
      // Logged before any processing so the transcript has the message even if the reply fails.
      await this.store.logEvent(sessionId, "user_message", envelope.content, { message_type: envelope.type });

      if (isFunctionCommand(envelope.content)) {
        await this.handleFunctionCall(sessionId, envelope.content);
        return;
      }
      await this.stream(sessionId, await this.augment(sessionId, envelope.content));
    } catch (err) {
      logError(logger, err, { event: "MESSAGE_FAILED", sessionId });
      await this.registry.send(sessionId, { type: "error", content: `Error processing message: ${describeError(err)}` });
    }
  }

  /**
   * Stream one completion for `userText` and relay every fragment in arrival order.
   * The assistant turn and the ai_response event are written only after the stream completes.
   */
  async stream(sessionId: string, userText: string): Promise<void> {
    const history = this.registry.historyFor(sessionId);
    await this.registry.send(sessionId, { type: "typing", content: true });
    history.appendUser(userText);

    const started = Date.now();
    let fullResponse = "";
    let chunkCount = 0;
    try {
      const response = await this.llm.chat(history.messages(), {
        stream: true,
        maxTokens: this.opts.maxTokens,
        temperature: this.opts.temperature,
      });
      const fragments: AsyncIterable<string> | string[] = response.stream ?? (response.text ? [response.text] : []);
      for await (const fragment of fragments) {
        fullResponse += fragment;
        chunkCount++;
        await this.registry.send(sessionId, { type: "ai_response_chunk", content: fragment });
      }
    } catch (err) {
      history.discardPendingUser();
      logger.warn({ event: "STREAM_FAILED", sessionId, chunkCount, err: describeError(err) }, "Completion stream failed");
      await this.registry.send(sessionId, { type: "typing", content: false });
      await this.registry.send(sessionId, { type: "error", content: `Error generating response: ${describeError(err)}` });
      return;
    }

    await this.registry.send(sessionId, { type: "typing", content: false });
    await this.registry.send(sessionId, { type: "ai_response_complete", content: true });
    history.appendAssistant(fullResponse);
    logLlmCall(logger, "chat", history.length, fullResponse.length, Date.now() - started);
    await this.store.logEvent(sessionId, "ai_response", fullResponse, { chunk_count: chunkCount });
  }

  private async handleFunctionCall(sessionId: string, content: string): Promise<void> {
    try {
      const { functionName, parameters } = parseFunctionCommand(content);
      if (!functionName) {
        await this.registry.send(sessionId, {
          type: "system",
          content: `Usage: /function <function_name> [parameters]\nAvailable functions: ${this.functions.names().join(", ")}`,
        });
        return;
      }

      await this.store.logEvent(sessionId, "function_call", `Calling function: ${functionName}`, {
        function: functionName,
        parameters,
      });
      const result = await this.functions.invoke(functionName, parameters);
      logger.info({ event: "FUNCTION_CALL", sessionId, function: functionName }, "Function executed");
      await this.registry.send(sessionId, { type: "function_result", function: functionName, result });

      // Not routed through handle(): the synthesized text must not be logged as a user_message.
      await this.stream(sessionId, `Function ${functionName} returned: ${result.result}`);
    } catch (err) {
      logError(logger, err, { event: "FUNCTION_CALL_FAILED", sessionId });
      await this.registry.send(sessionId, { type: "error", content: `Function call failed: ${describeError(err)}` });
    }
  }

  private async augment(sessionId: string, text: string): Promise<string> {
    if (!this.contextProvider) return text;
    try {
      const context = await this.contextProvider(text);
      if (!context.trim()) return text;
      logger.debug({ event: "CONTEXT_ATTACHED", sessionId, contextLength: context.length }, "Retrieved context attached");
      return withRetrievedContext(context, text);
    } catch (err) {
      logger.warn({ event: "CONTEXT_FAILED", sessionId, err: describeError(err) }, "Context retrieval failed; continuing without it");
      return text;
    }
  }
}
