import type { IncomingMessage } from "node:http";
import type { WebSocket, WebSocketServer } from "ws";

import type { StatEvent } from "../services/eventQueue";
import { createConsoleLogger, type Logger } from "../services/logger";

export type GatewayErrorCode = "INVALID_MESSAGE" | "SUBSCRIPTION_REQUIRED" | "PAYLOAD_TOO_LARGE" | "HEARTBEAT_TIMEOUT";

export type GatewayError = Readonly<{
  code: GatewayErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

export type MessageEnvelope = Readonly<{
  type: string;
  payload?: unknown;
}>;

export type SubscribePayload = Readonly<{
  userId: string;
}>;

export type WebsocketGatewayDeps = Readonly<{
  wss: WebSocketServer;
  maxIncomingPayloadBytes?: number;
  heartbeatTimeoutMs?: number;
  nowMs?: () => number;
  logger?: Logger;
}>;

export type WebsocketGateway = Readonly<{
  close(): Promise<void>;
  publish(events: ReadonlyArray<StatEvent>): number;
  subscriberCount(userId: string): number;
}>;

const DEFAULT_MAX_INCOMING_PAYLOAD_BYTES = 2 * 1024;
const DEFAULT_HEARTBEAT_TIMEOUT_MS = 45_000;

function makeError(code: GatewayErrorCode, message: string, context?: Record<string, unknown>): GatewayError {
  return context ? { code, message, context } : { code, message };
}

function safeJsonParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isEnvelope(value: unknown): value is MessageEnvelope {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return typeof v.type === "string";
}

function isSubscribePayload(value: unknown): value is SubscribePayload {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return typeof v.userId === "string" && v.userId.trim() !== "";
}

function send(ws: WebSocket, type: string, payload: unknown): void {
  ws.send(JSON.stringify({ type, payload }));
}

function sendError(ws: WebSocket, error: GatewayError): void {
  send(ws, "error", error);
}

function closePolicy(ws: WebSocket): void {
  try {
    ws.close(1008, "Policy violation");
  } catch {
    // Already closed.
  }
}

export function createWebsocketGateway(deps: WebsocketGatewayDeps): WebsocketGateway {
  const maxIncomingPayloadBytes = deps.maxIncomingPayloadBytes ?? DEFAULT_MAX_INCOMING_PAYLOAD_BYTES;
  const heartbeatTimeoutMs = deps.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? createConsoleLogger();

  if (!Number.isFinite(maxIncomingPayloadBytes) || maxIncomingPayloadBytes <= 0) {
    throw new Error("websocketGateway requires a positive maxIncomingPayloadBytes.");
  }
  if (!Number.isFinite(heartbeatTimeoutMs) || heartbeatTimeoutMs <= 0) {
    throw new Error("websocketGateway requires a positive heartbeatTimeoutMs.");
  }

  const connections = new Set<WebSocket>();
  const userIdBySocket = new Map<WebSocket, string>();
  const lastHeartbeatBySocket = new Map<WebSocket, number>();

  function cleanup(ws: WebSocket): void {
    connections.delete(ws);
    userIdBySocket.delete(ws);
    lastHeartbeatBySocket.delete(ws);
  }

  function handleEnvelope(ws: WebSocket, envelope: MessageEnvelope): void {
    if (envelope.type === "subscribe") {
      if (!isSubscribePayload(envelope.payload)) {
        sendError(ws, makeError("INVALID_MESSAGE", "Invalid subscribe payload."));
        closePolicy(ws);
        return;
      }
      const userId = envelope.payload.userId.trim();
      userIdBySocket.set(ws, userId);
      lastHeartbeatBySocket.set(ws, nowMs());
      send(ws, "subscribe_ok", { userId });
      return;
    }

    if (!userIdBySocket.has(ws)) {
      sendError(ws, makeError("SUBSCRIPTION_REQUIRED", "Subscribe before sending other messages."));
      closePolicy(ws);
      return;
    }

    if (envelope.type === "heartbeat") {
      lastHeartbeatBySocket.set(ws, nowMs());
      send(ws, "heartbeat_ok", { nowMs: nowMs() });
      return;
    }

    sendError(ws, makeError("INVALID_MESSAGE", "Unknown message type.", { type: envelope.type }));
    closePolicy(ws);
  }

  deps.wss.on("connection", (ws: WebSocket, _req: IncomingMessage) => {
    connections.add(ws);

    ws.on("close", () => cleanup(ws));
    ws.on("error", () => cleanup(ws));

    ws.on("message", (data: Buffer | ArrayBuffer | Buffer[]) => {
      const buffer = Array.isArray(data) ? Buffer.concat(data) : Buffer.isBuffer(data) ? data : Buffer.from(data);
      if (buffer.byteLength > maxIncomingPayloadBytes) {
        sendError(ws, makeError("PAYLOAD_TOO_LARGE", "Payload too large.", { maxBytes: maxIncomingPayloadBytes }));
        closePolicy(ws);
        return;
      }

      const parsed = safeJsonParse(buffer.toString("utf8"));
      if (!parsed.ok || !isEnvelope(parsed.value)) {
        sendError(ws, makeError("INVALID_MESSAGE", "Invalid message envelope."));
        closePolicy(ws);
        return;
      }

      handleEnvelope(ws, parsed.value);
    });
  });

  const heartbeatTimer = setInterval(() => {
    const now = nowMs();
    for (const ws of connections) {
      const last = lastHeartbeatBySocket.get(ws);
      if (typeof last !== "number") continue;
      if (now - last > heartbeatTimeoutMs) {
        sendError(ws, makeError("HEARTBEAT_TIMEOUT", "Heartbeat timeout."));
        closePolicy(ws);
      }
    }
  }, Math.min(heartbeatTimeoutMs, 5_000));

  return {
    async close(): Promise<void> {
      clearInterval(heartbeatTimer);
      for (const ws of connections) {
        ws.terminate();
      }
      await new Promise<void>((resolve) => deps.wss.close(() => resolve()));
    },

    publish(events: ReadonlyArray<StatEvent>): number {
      let delivered = 0;
      for (const event of events) {
        const message = JSON.stringify({ type: "stat_event", payload: event });
        for (const ws of connections) {
          if (ws.readyState !== ws.OPEN) continue;
          if (userIdBySocket.get(ws) !== event.userId) continue;
          try {
            ws.send(message);
            delivered += 1;
          } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            logger.error(`Realtime publish failed for ${event.userId}: ${reason}`);
          }
        }
      }
      return delivered;
    },

    subscriberCount(userId: string): number {
      let count = 0;
      for (const subscribed of userIdBySocket.values()) {
        if (subscribed === userId) count += 1;
      }
      return count;
    }
  };
}
