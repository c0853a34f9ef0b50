import express from "express";
import { createServer, type IncomingMessage } from "node:http";
import type { AddressInfo } from "node:net";
import { WebSocketServer, type WebSocket } from "ws";
import { Hub } from "./hub.js";
import { createConnectHandler, createIngressHandler } from "./ingress.js";
import { RESERVED_PREFIX, TUNNEL_PATH } from "./protocol.js";
import { TunnelSession } from "./session.js";

const TAG = "Server";

export const HEALTH_PATH = `${RESERVED_PREFIX}/health`;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Clients only ever send the handshake. */
const MAX_CLIENT_PAYLOAD = 64 * 1024;

export interface RelayServerConfig {
  host: string;
  port: number;
  secret: string;
  handshakeTimeoutMs?: number;
  /** Upper bound for receiving one webhook request, headers and body. */
  requestTimeoutMs?: number;
  maxBodyBytes?: number;
  /** Per-client send buffer above which the client counts as stalled. */
  maxBufferedBytes?: number;
}

export interface RelayServer {
  readonly hub: Hub;
  start(): Promise<void>;
  stop(): Promise<void>;
  address(): AddressInfo;
}

function describePeer(req: IncomingMessage): string {
  const forwarded = req.headers["x-forwarded-for"];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(",")[0]?.trim();
  const address = first || req.socket.remoteAddress || "unknown";
  return `${address}:${req.socket.remotePort ?? 0}`;
}

export function createRelayServer(config: RelayServerConfig): RelayServer {
  const hub = new Hub();
  const sessions = new Set<TunnelSession>();
  const requestTimeout = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  const app = express();
  app.disable("x-powered-by");

  // ── Health check ──────────────────────────────────────────────────────────

  app.get(HEALTH_PATH, (_req, res) => {
    res.json({ status: "ok", clients: hub.size });
  });

  app.use(RESERVED_PREFIX, (_req, res) => {
    res.status(404).end();
  });

  // ── Ingress ───────────────────────────────────────────────────────────────

  app.use(createIngressHandler({ hub, maxBodyBytes: config.maxBodyBytes }));

  const server = createServer(
    {
      requestTimeout,
      headersTimeout: Math.min(requestTimeout, 60_000),
      // Node only enforces the two timeouts above on this interval.
      connectionsCheckingInterval: Math.min(requestTimeout, 30_000),
    },
    app
  );
  server.on("connect", createConnectHandler({ hub }));
  const wss = new WebSocketServer({ server, path: TUNNEL_PATH, maxPayload: MAX_CLIENT_PAYLOAD });

  function boundAddress(): AddressInfo {
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Relay server is not listening");
    }
    return address;
  }

  // ── WebSocket handling ────────────────────────────────────────────────────

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const peer = describePeer(req);
    console.log(`[${TAG}] Tunnel connected from ${peer}`);

    const session = new TunnelSession(ws, {
      hub,
      secret: config.secret,
      peer,
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      maxBufferedBytes: config.maxBufferedBytes,
    });
    sessions.add(session);

    ws.on("message", (raw) => {
      if (!Buffer.isBuffer(raw)) {
        console.warn(`[${TAG}] Ignoring non-buffer message from ${peer}`);
        return;
      }
      session.handleMessage(raw);
    });

    ws.on("close", () => {
      session.handleClose();
      sessions.delete(session);
    });

    ws.on("error", (err: Error) => {
      console.error(`[${TAG}] WebSocket error from ${peer}:`, err.message);
      session.handleError(err);
    });
  });

  return {
    hub,

    start() {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          const { address, port } = boundAddress();
          console.log(`[${TAG}] Listening on ${address}:${port}`);
          resolve();
        });
      });
    },

    stop() {
      return new Promise((resolve) => {
        for (const session of sessions) {
          session.shutdown();
        }
        sessions.clear();
        wss.close(() => {
          server.close(() => resolve());
          server.closeAllConnections();
        });
      });
    },

    address: boundAddress,
  };
}
