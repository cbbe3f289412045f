/**
 * `ws` binding: wraps a server-side WebSocket as a ClientConnection and feeds its frames to the router.
 *
 * Each socket gets one promise chain: connect, then every inbound message in arrival order, then teardown.
 * That keeps a session's handling serialized while other sessions run independently.
 */

import WebSocket, { type WebSocketServer } from "ws";
import type { ClientConnection } from "./types";
import type { SessionRegistry } from "../session/registry";
import type { MessageRouter } from "../router/message-router";
import { describeError } from "../errors";
import { logger, logError } from "../logging";

export class WsConnection implements ClientConnection {
  constructor(private readonly socket: WebSocket) {}

  send(data: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("WebSocket is not open"));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }
}

export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Run one session over `socket`. Resolves once the socket has closed and teardown has finished.
 */
export function attachSession(
  socket: WebSocket,
  sessionId: string,
  userId: string,
  registry: SessionRegistry,
  router: MessageRouter
): Promise<void> {
  let accepted = false;
  let queue: Promise<void> = registry.connect(new WsConnection(socket), sessionId, userId).then((ok) => {
    accepted = ok;
  });

  const enqueue = (label: string, task: () => Promise<void>): Promise<void> => {
    queue = queue.then(task).catch((err: unknown) => logError(logger, err, { event: "SESSION_TASK_FAILED", sessionId, task: label }));
    return queue;
  };

  // The socket stays paused while any message is queued; frames already buffered may still arrive.
  let pending = 0;
  socket.on("message", (data) => {
    const text = rawDataToString(data);
    pending += 1;
    socket.pause();
    void enqueue("message", async () => {
      if (accepted) await router.handle(sessionId, text);
    }).then(() => {
      pending -= 1;
      if (pending === 0) socket.resume();
    });
  });

  socket.on("error", (err) => {
    logger.warn({ event: "WS_ERROR", sessionId, err: describeError(err) }, "WebSocket error");
  });

  return new Promise<void>((resolve) => {
    socket.on("close", (code) => {
      logger.info({ event: "WS_CLOSED", sessionId, code }, "Client disconnected");
      enqueue("disconnect", async () => {
        if (accepted) await registry.disconnect(sessionId);
      }).then(resolve, resolve);
    });
  });
}

/**
 * Ping every client each interval; a client that has not answered the previous ping is terminated,
 * which closes its socket and tears its session down. Returns a stop function.
 */
export function startHeartbeat(wss: WebSocketServer, intervalMs: number): () => void {
  if (intervalMs <= 0) return () => undefined;
  const alive = new WeakMap<WebSocket, boolean>();
  wss.on("connection", (socket: WebSocket) => {
    alive.set(socket, true);
    socket.on("pong", () => alive.set(socket, true));
  });
  const timer = setInterval(() => {
    for (const socket of wss.clients) {
      if (alive.get(socket) === false) {
        logger.warn({ event: "WS_HEARTBEAT_TIMEOUT" }, "Client missed heartbeat; terminating");
        socket.terminate();
        continue;
      }
      alive.set(socket, false);
      socket.ping();
    }
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
