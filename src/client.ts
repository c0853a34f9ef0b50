import { WebSocket } from "ws";
import { AuthError, TransportError, describeError } from "./errors.js";
import { forwardRequest, type Forwarder } from "./forward.js";
import type { HistoryStore } from "./history.js";
import { debug } from "./log.js";
import { PROTOCOL_VERSION, encodeHello, parseServerFrame } from "./protocol.js";
import type { RelayedRequest, ServerFrame } from "./types.js";

const TAG = "Client";

export const DEFAULT_CLIENT_HANDSHAKE_TIMEOUT_MS = 10_000;
export const DEFAULT_PING_INTERVAL_MS = 20_000;
export const DEFAULT_RECONNECT_DELAY_MS = 5_000;

/** RFC 6455 "normal closure". */
const CLOSE_NORMAL = 1000;

export type ClientState = "disconnected" | "connecting" | "authenticating" | "relaying";

export interface TunnelClientOptions {
  /** Tunnel endpoint, e.g. wss://hooks.example.com/__hookcast__/tunnel */
  remote: URL;
  secret: string;
  /** Local origin requests are replayed against. */
  local: URL;
  /** Received requests are recorded here when set. */
  history?: Pick<HistoryStore, "add">;
  forward?: Forwarder;
  handshakeTimeoutMs?: number;
  pingIntervalMs?: number;
  reconnectDelayMs?: number;
  onStateChange?: (state: ClientState) => void;
}

/**
 * Developer-side end of the tunnel.
 *
 * disconnected → connecting → authenticating → relaying → disconnected
 */
export class TunnelClient {
  private current: ClientState = "disconnected";
  private socket: WebSocket | null = null;
  private stopped = false;
  private wake: (() => void) | null = null;
  private readonly forward: Forwarder;
  private readonly hello: Buffer;

  /** Throws `RangeError` when the secret does not fit a HELLO frame. */
  constructor(private readonly options: TunnelClientOptions) {
    this.forward = options.forward ?? ((request, local) => forwardRequest(request, local));
    this.hello = encodeHello({ protocolVersion: PROTOCOL_VERSION, secret: options.secret });
  }

  get state(): ClientState {
    return this.current;
  }

  /**
   * Keep a tunnel open until `stop()`. Lost connections are retried after
   * `reconnectDelayMs`; a rejected handshake is not, and rejects with the
   * `AuthError`.
   */
  async run(): Promise<void> {
    this.stopped = false;
    const delay = this.options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;

    while (!this.stopped) {
      try {
        await this.connectOnce();
      } catch (err) {
        if (err instanceof AuthError) throw err;
        console.error(`[${TAG}] Failed with error: ${describeError(err)}`);
      }
      if (this.stopped) break;

      console.log(`[${TAG}] Trying again in ${delay / 1000} seconds...`);
      await this.pause(delay);
    }
  }

  /**
   * One connection. Resolves once it closes after a successful handshake
   * (or on `stop()`); rejects with `AuthError` when the server refuses the
   * secret and with `TransportError` when the connection or handshake fails.
   */
  connectOnce(): Promise<void> {
    return new Promise((resolve, reject) => {
      const { remote } = this.options;
      const handshakeTimeout = this.options.handshakeTimeoutMs ?? DEFAULT_CLIENT_HANDSHAKE_TIMEOUT_MS;

      this.setState("connecting");
      const ws = new WebSocket(remote, { handshakeTimeout });
      this.socket = ws;

      let failure: Error | null = null;
      let handshakeTimer: ReturnType<typeof setTimeout> | null = null;
      let pingTimer: ReturnType<typeof setInterval> | null = null;

      const abort = (error: Error): void => {
        failure ??= error;
        ws.terminate();
      };

      ws.on("open", () => {
        this.setState("authenticating");
        ws.send(this.hello);
        handshakeTimer = setTimeout(() => {
          abort(new TransportError("Handshake timed out"));
        }, handshakeTimeout);
      });

      ws.on("message", (data) => {
        if (!Buffer.isBuffer(data)) return;

        let frame: ServerFrame;
        try {
          frame = parseServerFrame(data);
        } catch (err) {
          if (this.current !== "relaying") {
            abort(new TransportError(`Bad handshake reply: ${describeError(err)}`));
            return;
          }
          // Not fatal: drop this one frame and keep relaying.
          console.warn(`[${TAG}] Discarding malformed message: ${describeError(err)}`);
          return;
        }

        if (this.current === "authenticating") {
          if (frame.type === "accept") {
            if (handshakeTimer) clearTimeout(handshakeTimer);
            this.setState("relaying");
            console.log(`[${TAG}] Connected successfully, waiting for events`);
            pingTimer = setInterval(() => {
              if (ws.readyState === WebSocket.OPEN) ws.ping();
            }, this.options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS);
          } else if (frame.type === "reject") {
            failure ??= new AuthError(frame.reason);
          } else {
            abort(new TransportError("Request received before the handshake completed"));
          }
          return;
        }

        if (frame.type === "request") {
          this.relay(frame.request);
        } else {
          debug(TAG, `Ignoring unexpected ${frame.type} frame`);
        }
      });

      ws.on("error", (err: Error) => {
        failure ??= new TransportError(err.message, { cause: err });
      });

      ws.on("close", (code: number) => {
        if (handshakeTimer) clearTimeout(handshakeTimer);
        if (pingTimer) clearInterval(pingTimer);
        const wasRelaying = this.current === "relaying";
        this.socket = null;
        this.setState("disconnected");

        if (!failure && !wasRelaying && !this.stopped) {
          failure = new TransportError(`Connection closed during handshake (code ${code})`);
        }
        if (failure) {
          reject(failure);
          return;
        }
        console.log(`[${TAG}] Disconnected (code ${code})`);
        resolve();
      });
    });
  }

  stop(): void {
    this.stopped = true;
    this.wake?.();
    if (this.socket && this.socket.readyState !== WebSocket.CLOSED) {
      this.socket.close(CLOSE_NORMAL, "client stopping");
    }
  }

  private relay(request: RelayedRequest): void {
    const { history, local } = this.options;
    debug(TAG, `Received ${request.method} ${request.path}`);

    if (history) {
      history
        .add({ receivedAt: new Date(), local: local.origin, request })
        .catch((err: unknown) => {
          console.warn(`[${TAG}] Could not record ${request.method} ${request.path}: ${describeError(err)}`);
        });
    }

    this.forward(request, local).catch((err: unknown) => {
      console.error(`[${TAG}] Forwarding ${request.method} ${request.path} failed: ${describeError(err)}`);
    });
  }

  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  private setState(state: ClientState): void {
    if (this.current === state) return;
    this.current = state;
    this.options.onStateChange?.(state);
  }
}
