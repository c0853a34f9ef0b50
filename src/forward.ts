import { request as httpRequest, type IncomingMessage, type RequestOptions } from "node:http";
import { request as httpsRequest } from "node:https";
import { ForwardError, describeError } from "./errors.js";
import type { RelayedRequest } from "./types.js";

const TAG = "Forward";

export const DEFAULT_FORWARD_TIMEOUT_MS = 30_000;

/**
 * Headers that describe the inbound hop rather than the request. The local
 * request gets its own.
 */
const HOP_BY_HOP = new Set([
  "host",
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
  "te",
  "trailer",
  "expect",
  "content-length",
]);

export interface ForwardRequestInit {
  /** Local origin; its path is never used. */
  origin: URL;
  /** Relayed path and query, byte for byte. */
  path: string;
  method: string;
  headers: Record<string, string[]>;
  body: Buffer | undefined;
}

export interface ForwardResult {
  status: number;
  durationMs: number;
}

export interface ForwardOptions {
  timeoutMs?: number;
}

export type Forwarder = (request: RelayedRequest, local: URL) => Promise<ForwardResult | null>;

/**
 * Only the origin of `local` is used. The relayed path is sent as is: no dot
 * segment removal, no re-encoding.
 */
export function buildForwardRequest(request: RelayedRequest, local: URL): ForwardRequestInit {
  const path = request.path.startsWith("/") ? request.path : `/${request.path}`;

  const headers: Record<string, string[]> = {};
  for (const [name, value] of request.headers) {
    const key = name.toLowerCase();
    if (HOP_BY_HOP.has(key)) continue;
    (headers[key] ??= []).push(value);
  }

  const allowsBody = request.method !== "GET" && request.method !== "HEAD";
  const body = allowsBody && request.body.length > 0 ? request.body : undefined;
  if (body) headers["content-length"] = [String(body.length)];

  return { origin: new URL(local.origin), path, method: request.method, headers, body };
}

function send(init: ForwardRequestInit, timeoutMs: number): Promise<number> {
  if (init.method === "CONNECT") {
    // A 200 would turn the socket into a tunnel, not a response.
    return Promise.reject(new Error("CONNECT cannot be replayed"));
  }

  const options: RequestOptions = {
    method: init.method,
    path: init.path,
    headers: init.headers,
    signal: AbortSignal.timeout(timeoutMs),
  };

  return new Promise((resolve, reject) => {
    const onResponse = (res: IncomingMessage): void => {
      res.on("error", reject);
      res.on("end", () => resolve(res.statusCode ?? 0));
      // Drain so the socket is released.
      res.resume();
    };
    const req =
      init.origin.protocol === "https:"
        ? httpsRequest(init.origin, options, onResponse)
        : httpRequest(init.origin, options, onResponse);
    req.on("error", reject);
    req.end(init.body);
  });
}

/**
 * Replay `request` against the local server. The outcome is only logged:
 * failures resolve to null and never reach the tunnel.
 */
export async function forwardRequest(
  request: RelayedRequest,
  local: URL,
  options: ForwardOptions = {}
): Promise<ForwardResult | null> {
  const init = buildForwardRequest(request, local);
  const start = performance.now();

  try {
    const status = await send(init, options.timeoutMs ?? DEFAULT_FORWARD_TIMEOUT_MS);
    const durationMs = Math.round(performance.now() - start);
    console.log(`[${TAG}] ${request.method} ${request.path} - ${status} (${durationMs}ms)`);
    return { status, durationMs };
  } catch (err) {
    const error = new ForwardError(
      `${request.method} ${request.path} → ${init.origin.origin}: ${describeError(err)}`,
      { cause: err }
    );
    console.error(`[${TAG}] ${error.message}`);
    return null;
  }
}
