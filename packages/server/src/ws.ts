// packages/server/src/ws.ts

import type { FastifyInstance } from "fastify";
import type WebSocket from "ws";
import type { RawData } from "ws";
import type { Connection } from "./connectionRegistry";
import type { Coordinator } from "./coordinator";
import { logCoordinator } from "./logger";
import { ReconnectParamsSchema, ReconnectQuerySchema } from "./schemas";

export const UNAUTHORIZED_CLOSE_CODE = 4401;

export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString();
  if (Array.isArray(data)) return Buffer.concat(data).toString();
  return Buffer.from(data).toString();
}

export function computePayloadBytes(data: RawData): number {
  if (Buffer.isBuffer(data)) return data.byteLength;
  if (Array.isArray(data)) {
    return data.reduce((acc, chunk) => acc + chunk.byteLength, 0);
  }
  return data.byteLength;
}

/** Per-connection fixed-window message budget. */
export class RateLimiter {
  private readonly windows = new WeakMap<
    object,
    { windowStartMs: number; messageCount: number }
  >();

  constructor(
    private readonly windowMs: number,
    private readonly maxMessages: number,
    private readonly now: () => number = Date.now
  ) {}

  consume(connection: object): boolean {
    const now = this.now();
    const current = this.windows.get(connection);
    if (!current || now - current.windowStartMs >= this.windowMs) {
      this.windows.set(connection, { windowStartMs: now, messageCount: 1 });
      return true;
    }
    if (current.messageCount >= this.maxMessages) {
      return false;
    }
    current.messageCount += 1;
    return true;
  }
}

export function registerCoordinatorWebSocket(
  server: FastifyInstance,
  coordinator: Coordinator
) {
  const { maxPayloadBytes, rateLimitWindowMs, rateLimitMaxMessages } =
    coordinator.config.ws;
  const limiter = new RateLimiter(
    rateLimitWindowMs,
    rateLimitMaxMessages,
    coordinator.now
  );

  function attachHandlers(socket: WebSocket, connection: Connection) {
    async function handleIncomingMessage(data: RawData) {
      if (computePayloadBytes(data) > maxPayloadBytes) {
        logCoordinator(server.log, { tag: "ws:payload_too_large" });
        return;
      }
      if (!limiter.consume(connection)) {
        logCoordinator(server.log, { tag: "ws:rate_limited" });
        return;
      }
      try {
        await coordinator.dispatcher.handleFrame(connection, rawDataToString(data));
      } catch (error) {
        server.log.error({ tag: "coordinator:ws_unhandled_error", err: error });
      }
    }

    async function handleSocketTermination(kind: "close" | "error") {
      try {
        await coordinator.handleConnectionClosed(connection);
      } catch (error) {
        server.log.error({ tag: "coordinator:disconnect_error", err: error, kind });
      }
    }

    socket.on("message", (data: RawData) => {
      void handleIncomingMessage(data);
    });
    socket.on("close", () => {
      void handleSocketTermination("close");
    });
    socket.on("error", () => {
      void handleSocketTermination("error");
    });
  }

  server.get("/ws/auth", { websocket: true }, (socket) => {
    attachHandlers(socket, socket);
    coordinator.pairing.open(socket);
  });

  server.get("/ws/:identityId", { websocket: true }, (socket, request) => {
    const params = ReconnectParamsSchema.safeParse(request.params);
    const query = ReconnectQuerySchema.safeParse(request.query);
    if (!params.success || !query.success) {
      socket.close(UNAUTHORIZED_CLOSE_CODE, "invalid identity");
      return;
    }
    attachHandlers(socket, socket);
    void coordinator
      .reattach(params.data.identityId, query.data.token, socket)
      .then((result) => {
        if (!result.ok) socket.close(UNAUTHORIZED_CLOSE_CODE, result.message);
      })
      .catch((error) => {
        server.log.error({ tag: "coordinator:reattach_error", err: error });
        socket.close(UNAUTHORIZED_CLOSE_CODE, "reconnect failed");
      });
  });
}
