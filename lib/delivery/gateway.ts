/**
 * WebSocket Gateway for conversation delivery
 *
 * Accepts upgrades on one path, authenticates the caller and checks that they
 * belong to the conversation, then hands the socket to a ConnectionSession.
 * Keeps the socket alive with protocol pings and closes sessions whose peer
 * stopped answering.
 *
 *   ws://host/ws?conversation_id=...&client_id=...&token=...
 */

import { STATUS_CODES, type IncomingMessage, type Server as HTTPServer } from "http";
import type { Duplex } from "stream";
import { v4 as uuidv4 } from "uuid";
import { WebSocket, WebSocketServer } from "ws";
import type { SessionAuthorizer } from "./auth";
import type { ConnectionSession } from "./connectionSession";
import { handleDeliveryError } from "./errorHandler";
import { incrementCounter, setGauge } from "./metrics";
import type { SyncIdentity } from "./periodicSync";
import { createWsTransport, type SessionTransport } from "./transport";
import { CLOSE_GOING_AWAY, type ClientId, type ConversationId, type DeliveryLogger, type UserId } from "./types";

const MAX_ID_LENGTH = 256;

export type ConnectRequest = {
  path: string;
  conversationId: ConversationId | null;
  clientId: ClientId | null;
  token: string | null;
  /** Only honoured when no authorizer is configured. */
  devUserId: UserId | null;
};

export type UpgradeDecision =
  | { ok: true; userId: UserId; conversationId: ConversationId }
  | { ok: false; status: 400 | 401 | 403 | 503; reason: string };

export type DeliveryGatewayOptions = {
  path?: string;
  /** Null runs without authentication, taking user_id from the query. */
  authorizer: SessionAuthorizer | null;
  openSession: (transport: SessionTransport, identity: SyncIdentity) => ConnectionSession;
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  logger?: DeliveryLogger;
};

export interface DeliveryGateway {
  readonly sessionCount: number;
  shutdown(): Promise<void>;
}

function readId(value: string | null): string | null {
  const trimmed = value?.trim();
  if (!trimmed || trimmed.length > MAX_ID_LENGTH) return null;
  return trimmed;
}

export function parseConnectRequest(url: string | undefined, authorizationHeader: string | undefined): ConnectRequest {
  const parsed = new URL(url ?? "/", "http://localhost");
  const params = parsed.searchParams;

  let token = readId(params.get("token"));
  if (!token && authorizationHeader?.startsWith("Bearer ")) {
    token = readId(authorizationHeader.slice("Bearer ".length));
  }

  return {
    path: parsed.pathname,
    conversationId: readId(params.get("conversation_id")),
    clientId: readId(params.get("client_id")),
    token,
    devUserId: readId(params.get("user_id")),
  };
}

export async function authorizeUpgrade(
  request: ConnectRequest,
  authorizer: SessionAuthorizer | null,
): Promise<UpgradeDecision> {
  const { conversationId } = request;
  if (!conversationId) {
    return { ok: false, status: 400, reason: "missing conversation_id" };
  }

  if (!authorizer) {
    return request.devUserId
      ? { ok: true, userId: request.devUserId, conversationId }
      : { ok: false, status: 401, reason: "missing user_id" };
  }

  if (!request.token) {
    return { ok: false, status: 401, reason: "missing token" };
  }

  try {
    const identity = await authorizer.authenticate(request.token);
    if (!identity) {
      return { ok: false, status: 401, reason: "invalid token" };
    }
    const member = await authorizer.isMember(conversationId, identity.userId);
    if (!member) {
      return { ok: false, status: 403, reason: "not a member of this conversation" };
    }
    return { ok: true, userId: identity.userId, conversationId };
  } catch (error) {
    handleDeliveryError(error, { component: "Gateway", action: "authorize", conversationId });
    return { ok: false, status: 503, reason: "authorization unavailable" };
  }
}

function rejectUpgrade(socket: Duplex, status: number): void {
  socket.write(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ""}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

// Initialize WebSocket gateway
export function initDeliveryGateway(server: HTTPServer, options: DeliveryGatewayOptions): DeliveryGateway {
  const {
    path = "/ws",
    authorizer,
    openSession,
    heartbeatIntervalMs = 5000,
    heartbeatTimeoutMs = 30000,
    logger = console,
  } = options;

  const wss = new WebSocketServer({ noServer: true });
  const sessions = new Set<ConnectionSession>();
  let closed = false;

  if (!authorizer) {
    logger.warn("[Gateway] no authorizer configured, trusting user_id from the query string");
  }

  function updateConnectionMetrics() {
    setGauge("delivery.gateway.connections", sessions.size);
  }

  function startSession(ws: WebSocket, identity: SyncIdentity) {
    const session = openSession(createWsTransport(ws), identity);
    sessions.add(session);
    updateConnectionMetrics();

    // Ping/pong keepalive
    let lastPong = Date.now();
    ws.on("pong", () => {
      lastPong = Date.now();
    });
    const pingInterval = setInterval(() => {
      if (Date.now() - lastPong > heartbeatTimeoutMs) {
        clearInterval(pingInterval);
        incrementCounter("delivery.gateway.heartbeat_timeouts");
        void session.close(CLOSE_GOING_AWAY, "heartbeat_timeout");
      } else if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      }
    }, heartbeatIntervalMs);

    void session
      .run()
      .catch((error: unknown) => {
        logger.error(`[Gateway] session for client ${identity.clientId} ended with an error:`, error);
      })
      .finally(() => {
        clearInterval(pingInterval);
        sessions.delete(session);
        updateConnectionMetrics();
      });
  }

  async function handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const connect = parseConnectRequest(request.url, request.headers.authorization);
    if (connect.path !== path) {
      rejectUpgrade(socket, 404);
      return;
    }

    const decision = await authorizeUpgrade(connect, authorizer);
    if (closed) {
      rejectUpgrade(socket, 503);
      return;
    }
    if (!decision.ok) {
      incrementCounter("delivery.gateway.rejected", { status: String(decision.status) });
      logger.warn(`[Gateway] rejected upgrade with ${decision.status}: ${decision.reason}`);
      rejectUpgrade(socket, decision.status);
      return;
    }

    const identity: SyncIdentity = {
      userId: decision.userId,
      clientId: connect.clientId ?? uuidv4(),
      conversationId: decision.conversationId,
    };

    wss.handleUpgrade(request, socket, head, (ws) => {
      incrementCounter("delivery.gateway.accepted");
      startSession(ws, identity);
    });
  }

  const onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    handleUpgrade(request, socket, head).catch((error: unknown) => {
      logger.error("[Gateway] upgrade failed:", error);
      rejectUpgrade(socket, 500);
    });
  };
  server.on("upgrade", onUpgrade);

  logger.log(`[Gateway] WebSocket delivery available on ${path}`);
  updateConnectionMetrics();

  return {
    get sessionCount() {
      return sessions.size;
    },
    async shutdown() {
      if (closed) return;
      closed = true;
      server.off("upgrade", onUpgrade);
      await Promise.all(Array.from(sessions, (session) => session.close(CLOSE_GOING_AWAY, "server_shutdown")));
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}
