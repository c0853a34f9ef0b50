// ── Data model ──────────────────────────────────────────────────────────────

export const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "CONNECT",
  "OPTIONS",
  "TRACE",
  "PATCH",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type HeaderPair = readonly [name: string, value: string];

/** One inbound webhook call, as relayed to every tunnel client. */
export interface RelayedRequest {
  readonly method: HttpMethod;
  /** Path plus query string, exactly as received. */
  readonly path: string;
  /** Original order, duplicates kept. */
  readonly headers: readonly HeaderPair[];
  readonly body: Buffer;
}

// ── Frames: client → server ─────────────────────────────────────────────────

export interface HelloFrame {
  type: "hello";
  protocolVersion: number;
  secret: string;
}

export type ClientFrame = HelloFrame;

// ── Frames: server → client ─────────────────────────────────────────────────

export interface AcceptFrame {
  type: "accept";
  protocolVersion: number;
}

export interface RejectFrame {
  type: "reject";
  reason: string;
}

export interface RequestFrame {
  type: "request";
  request: RelayedRequest;
}

export type ServerFrame = AcceptFrame | RejectFrame | RequestFrame;
