export type RelayErrorCode =
  | "AUTH"
  | "DECODE"
  | "TRANSPORT"
  | "FORWARD"
  | "CONFIG";

export class RelayError extends Error {
  constructor(
    readonly code: RelayErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Secret or protocol version refused during the handshake. */
export class AuthError extends RelayError {
  constructor(message: string) {
    super("AUTH", message);
  }
}

/** A frame that does not match the wire format. The frame is dropped. */
export class DecodeError extends RelayError {
  constructor(message: string) {
    super("DECODE", message);
  }
}

/** Read or write failure on a tunnel connection. The session ends. */
export class TransportError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSPORT", message, options);
  }
}

/** The local HTTP request failed. Logged only. */
export class ForwardError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FORWARD", message, options);
  }
}

export class ConfigError extends RelayError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
