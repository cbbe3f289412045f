/**
 * HTTP + WebSocket front door.
 *
 * HTTP: GET /health, GET /api/session/:id, GET /api/session/:id/events,
 * POST /api/documents, POST /api/documents/search.
 * WebSocket: upgrade on /ws/session/:id?user_id=...; any other upgrade path is refused.
 */

import * as http from "http";
import type { Duplex } from "stream";
import WebSocket, { WebSocketServer } from "ws";
import type { SessionRegistry } from "./session/registry";
import type { MessageRouter } from "./router/message-router";
import type { ITranscriptStore } from "./store";
import { renderContext, type KnowledgeBase } from "./retrieval";
import { attachSession, startHeartbeat } from "./transport/ws";
import { EmptyDocumentError, describeError } from "./errors";
import { logger, logError } from "./logging";

export const SERVICE_NAME = "session-relay";
export const SERVICE_VERSION = "1.0.0";
export const DEFAULT_USER_ID = "anonymous";

const MAX_BODY_BYTES = 5 * 1024 * 1024;
const WS_SESSION_PATH = /^\/ws\/session\/([^/]+)\/?$/;
const SESSION_PATH = /^\/api\/session\/([^/]+)\/?$/;
const SESSION_EVENTS_PATH = /^\/api\/session\/([^/]+)\/events\/?$/;

export interface RelayServerOptions {
  registry: SessionRegistry;
  router: MessageRouter;
  store: ITranscriptStore;
  /** Null when retrieval is disabled; the document routes then answer 503. */
  knowledgeBase?: KnowledgeBase | null;
  /** 0 disables the ping/pong heartbeat. */
  heartbeatIntervalMs?: number;
}

export interface RelayServer {
  server: http.Server;
  wss: WebSocketServer;
  /** Resolves with the bound port (useful with port 0). */
  listen(port: number, host?: string): Promise<number>;
  /** Close every session, wait for their teardown, then stop listening. */
  close(): Promise<void>;
}

class BodyError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = "BodyError";
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseJsonBody(req: http.IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    // Past the limit the rest of the body is read and discarded so the 413 still reaches the client.
    req.on("data", (chunk: Buffer) => {
      if (size > MAX_BODY_BYTES) return;
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        chunks.length = 0;
        reject(new BodyError("Request body too large", 413));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (size > MAX_BODY_BYTES) return;
      const body = Buffer.concat(chunks).toString("utf8");
      if (!body) {
        resolve({});
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch {
        reject(new BodyError("Invalid JSON body", 400));
        return;
      }
      if (isRecord(parsed)) resolve(parsed);
      else reject(new BodyError("Invalid JSON body", 400));
    });
    req.on("error", reject);
  });
}

function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.setHeader("Content-Type", "application/json");
  res.writeHead(status);
  res.end(JSON.stringify(data));
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

function rejectUpgrade(socket: Duplex, status: number, message: string): void {
  socket.write(`HTTP/1.1 ${status} ${message}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export function createRelayServer(opts: RelayServerOptions): RelayServer {
  const { registry, router, store } = opts;
  const knowledgeBase = opts.knowledgeBase ?? null;
  const sessions = new Set<Promise<void>>();

  async function handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? "";
    const { pathname } = new URL(req.url ?? "/", "http://localhost");

    if (method === "GET" && (pathname === "/health" || pathname === "/")) {
      sendJson(res, 200, { status: "healthy", service: SERVICE_NAME, version: SERVICE_VERSION });
      return;
    }

    const eventsMatch = SESSION_EVENTS_PATH.exec(pathname);
    if (method === "GET" && eventsMatch) {
      const sessionId = decodeSegment(eventsMatch[1]) ?? eventsMatch[1];
      const events = await store.getSessionEvents(sessionId);
      sendJson(res, 200, { session_id: sessionId, events });
      return;
    }

    const sessionMatch = SESSION_PATH.exec(pathname);
    if (method === "GET" && sessionMatch) {
      const session = await store.getSession(decodeSegment(sessionMatch[1]) ?? sessionMatch[1]);
      if (!session) {
        sendJson(res, 404, { detail: "Session not found" });
        return;
      }
      sendJson(res, 200, session);
      return;
    }

    if (method === "POST" && (pathname === "/api/documents" || pathname === "/api/documents/search")) {
      if (!knowledgeBase) {
        sendJson(res, 503, { detail: "Retrieval is disabled" });
        return;
      }
      let body: Record<string, unknown>;
      try {
        body = await parseJsonBody(req);
      } catch (err) {
        sendJson(res, err instanceof BodyError ? err.status : 400, { detail: describeError(err) });
        return;
      }

      if (pathname === "/api/documents") {
        const { filename, content } = body;
        if (typeof filename !== "string" || !filename || typeof content !== "string") {
          sendJson(res, 400, { detail: "Missing filename or content" });
          return;
        }
        try {
          sendJson(res, 200, await knowledgeBase.ingest(filename, content));
        } catch (err) {
          if (err instanceof EmptyDocumentError) {
            sendJson(res, 400, { detail: err.message });
            return;
          }
          throw err;
        }
        return;
      }

      const { query } = body;
      if (typeof query !== "string" || !query.trim()) {
        sendJson(res, 400, { detail: "Missing query" });
        return;
      }
      const matches = await knowledgeBase.search(query);
      sendJson(res, 200, { query, matches, context: renderContext(matches) });
      return;
    }

    sendJson(res, 404, { detail: "Not found" });
  }

  const server = http.createServer((req, res) => {
    handleRequest(req, res).catch((err: unknown) => {
      logError(logger, err, { event: "HTTP_REQUEST_FAILED", method: req.method, url: req.url });
      if (!res.headersSent) sendJson(res, 500, { detail: describeError(err) });
      else res.end();
    });
  });

  const wss = new WebSocketServer({ noServer: true });
  const stopHeartbeat = startHeartbeat(wss, opts.heartbeatIntervalMs ?? 0);

  server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const match = WS_SESSION_PATH.exec(url.pathname);
    const sessionId = match ? decodeSegment(match[1]) : null;
    if (sessionId === null) {
      rejectUpgrade(socket, 404, "Not Found");
      return;
    }
    const userId = url.searchParams.get("user_id") || DEFAULT_USER_ID;
    wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
      wss.emit("connection", ws, req);
      logger.info({ event: "WS_CONNECTED", sessionId, userId }, "Client connected");
      const done = attachSession(ws, sessionId, userId, registry, router);
      sessions.add(done);
      void done.finally(() => sessions.delete(done));
    });
  });

  return {
    server,
    wss,
    listen(port: number, host?: string): Promise<number> {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => {
          server.off("error", reject);
          const address = server.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info({ event: "SERVER_LISTENING", host, port: bound }, "Server listening");
          resolve(bound);
        });
      });
    },
    async close(): Promise<void> {
      stopHeartbeat();
      registry.closeAll(1001, "Server shutting down");
      await Promise.allSettled([...sessions]);
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      if (server.listening) {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        });
      }
      logger.info({ event: "SERVER_CLOSED" }, "Server closed");
    },
  };
}
