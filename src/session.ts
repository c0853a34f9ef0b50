import { createHash, timingSafeEqual } from "node:crypto";
import { DecodeError, TransportError, describeError } from "./errors.js";
import type { ClientConnection, FrameSink, Hub } from "./hub.js";
import { debug } from "./log.js";
import { PROTOCOL_VERSION, encodeAccept, encodeReject, parseClientFrame } from "./protocol.js";
import type { HelloFrame } from "./types.js";

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_BUFFERED_BYTES = 8 * 1024 * 1024;

/** RFC 6455 "policy violation". */
const CLOSE_POLICY = 1008;
/** RFC 6455 "going away". */
const CLOSE_GOING_AWAY = 1001;

/** The subset of a `ws` WebSocket a session writes to. */
export interface TunnelTransport {
  readonly bufferedAmount: number;
  send(data: Buffer, callback: (err?: Error) => void): void;
  close(code: number, reason: string): void;
  terminate(): void;
}

export type SessionState = "connected" | "authenticated" | "closed";

export interface SessionOptions {
  hub: Hub;
  secret: string;
  /** Peer description used in log lines. */
  peer: string;
  handshakeTimeoutMs?: number;
  maxBufferedBytes?: number;
}

function secretsMatch(presented: string, expected: string): boolean {
  const a = createHash("sha256").update(presented).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

/**
 * Server side of one tunnel connection.
 *
 * connected ──HELLO ok──▶ authenticated ──close/error/stall──▶ closed
 *     └──────HELLO bad / timeout──────────────────────────────▶ closed
 */
export class TunnelSession implements FrameSink {
  private current: SessionState = "connected";
  private connection: ClientConnection | null = null;
  private handshakeTimer: ReturnType<typeof setTimeout> | null;
  private readonly tag: string;
  private readonly maxBufferedBytes: number;

  constructor(
    private readonly transport: TunnelTransport,
    private readonly options: SessionOptions
  ) {
    this.tag = `Session ${options.peer}`;
    this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.handshakeTimer = setTimeout(() => {
      this.handshakeTimer = null;
      console.warn(`[${this.tag}] Handshake timed out`);
      this.reject("handshake timeout");
    }, options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS);
  }

  get state(): SessionState {
    return this.current;
  }

  get connectionId(): string | null {
    return this.connection?.id ?? null;
  }

  /** Feed one inbound WebSocket message. */
  handleMessage(data: Buffer): void {
    if (this.current === "closed") return;
    if (this.current === "authenticated") {
      debug(this.tag, `Ignoring ${data.length}-byte message after handshake`);
      return;
    }

    const hello = this.parseHello(data);
    if (!hello) return;

    if (hello.protocolVersion !== PROTOCOL_VERSION) {
      console.warn(
        `[${this.tag}] Protocol version mismatch (server ${PROTOCOL_VERSION}, client ${hello.protocolVersion})`
      );
      this.reject(`protocol version mismatch: server ${PROTOCOL_VERSION}, client ${hello.protocolVersion}`);
      return;
    }

    if (!secretsMatch(hello.secret, this.options.secret)) {
      console.warn(`[${this.tag}] Authentication failed`);
      this.reject("authentication failed");
      return;
    }

    this.clearHandshakeTimer();
    this.current = "authenticated";
    this.connection = this.options.hub.register(this);
    this.transport.send(encodeAccept({ protocolVersion: PROTOCOL_VERSION }), (err) => {
      if (err) this.fail(new TransportError("Failed to send accept", { cause: err }));
    });
    console.log(`[${this.tag}] Authenticated as ${this.connection.id}`);
  }

  /** The transport closed, for whatever reason. */
  handleClose(): void {
    if (this.current === "closed") return;
    this.teardown();
    console.log(`[${this.tag}] Disconnected`);
  }

  handleError(err: Error): void {
    this.fail(new TransportError(err.message, { cause: err }));
  }

  /** Called by the Hub for every broadcast frame. */
  deliver(frame: Buffer): void {
    if (this.current !== "authenticated") return;

    if (this.transport.bufferedAmount > this.maxBufferedBytes) {
      this.fail(
        new TransportError(`Peer stalled (${this.transport.bufferedAmount} bytes buffered)`)
      );
      return;
    }

    this.transport.send(frame, (err) => {
      if (err) this.fail(new TransportError("Write failed", { cause: err }));
    });
  }

  /** Server shutdown. */
  shutdown(): void {
    if (this.current === "closed") return;
    this.teardown();
    this.transport.close(CLOSE_GOING_AWAY, "server shutting down");
  }

  private parseHello(data: Buffer): HelloFrame | null {
    try {
      return parseClientFrame(data);
    } catch (err) {
      console.warn(`[${this.tag}] ${describeError(err)}`);
      this.reject(err instanceof DecodeError ? "malformed handshake" : describeError(err));
      return null;
    }
  }

  private reject(reason: string): void {
    if (this.current === "closed") return;
    this.teardown();
    this.transport.send(encodeReject({ reason }), (err) => {
      if (err) debug(this.tag, `Reject not delivered: ${err.message}`);
    });
    this.transport.close(CLOSE_POLICY, reason.slice(0, 120));
  }

  private fail(error: TransportError): void {
    if (this.current === "closed") return;
    console.warn(`[${this.tag}] ${error.message}`);
    this.teardown();
    this.transport.terminate();
  }

  private teardown(): void {
    this.current = "closed";
    this.clearHandshakeTimer();
    if (this.connection) {
      this.options.hub.unregister(this.connection);
    }
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer != null) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }
  }
}
