import type { Request, RequestHandler, Response } from "express";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import getRawBody from "raw-body";
import { describeError } from "./errors.js";
import type { Hub } from "./hub.js";
import { encodeRequest, isHttpMethod } from "./protocol.js";
import type { HeaderPair, RelayedRequest } from "./types.js";

const TAG = "Ingress";

export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

export interface IngressOptions {
  hub: Pick<Hub, "broadcast">;
  maxBodyBytes?: number;
}

/** Node keeps raw headers as a flat [name, value, name, value, ...] list. */
export function pairRawHeaders(raw: readonly string[]): HeaderPair[] {
  const headers: HeaderPair[] = [];
  for (let i = 0; i + 1 < raw.length; i += 2) {
    headers.push([raw[i], raw[i + 1]]);
  }
  return headers;
}

/**
 * Catch-all handler for webhook calls. Every request is answered 200 with an
 * empty body once it has been handed to the hub; the sender never learns
 * whether any client received it.
 */
export function createIngressHandler(options: IngressOptions): RequestHandler {
  const limit = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  async function relay(req: Request): Promise<void> {
    const method = req.method;
    const path = req.originalUrl;

    // Content-Encoding is left untouched; the local server decodes it.
    const body = await getRawBody(req, { length: req.headers["content-length"], limit });

    if (!isHttpMethod(method)) {
      console.warn(`[${TAG}] Dropping ${method} ${path}: unsupported method`);
      return;
    }

    const request: RelayedRequest = {
      method,
      path,
      headers: pairRawHeaders(req.rawHeaders),
      body,
    };
    const count = options.hub.broadcast(encodeRequest(request));
    console.log(`[${TAG}] ${method} ${path} (${body.length} bytes) → ${count} client(s)`);
  }

  async function handle(req: Request, res: Response): Promise<void> {
    try {
      await relay(req);
    } catch (err) {
      console.warn(`[${TAG}] Dropping ${req.method} ${req.originalUrl}: ${describeError(err)}`);
      // Discard whatever is left of the body.
      req.resume();
    }
    if (!res.headersSent && !res.destroyed) {
      res.status(200).end();
    }
  }

  return (req, res) => {
    void handle(req, res);
  };
}

/** Written straight to the socket for CONNECT, which bypasses express. */
const CONNECT_RESPONSE = "HTTP/1.1 200 OK\r\nContent-Length: 0\r\nConnection: close\r\n\r\n";

/**
 * Node hands CONNECT to the server's `connect` event instead of the request
 * handler. The target is relayed as the path; anything after the headers
 * belongs to the would-be tunnel, so the body is empty.
 */
export function createConnectHandler(
  options: IngressOptions
): (req: IncomingMessage, socket: Duplex, head: Buffer) => void {
  return (req, socket) => {
    socket.on("error", (err) => {
      console.warn(`[${TAG}] CONNECT socket error: ${err.message}`);
    });

    const path = req.url ?? "";
    const request: RelayedRequest = {
      method: "CONNECT",
      path,
      headers: pairRawHeaders(req.rawHeaders),
      body: Buffer.alloc(0),
    };
    const count = options.hub.broadcast(encodeRequest(request));
    console.log(`[${TAG}] CONNECT ${path} (0 bytes) → ${count} client(s)`);

    socket.end(CONNECT_RESPONSE);
  };
}
