import { DecodeError } from "./errors.js";
import {
  HTTP_METHODS,
  type AcceptFrame,
  type HeaderPair,
  type HelloFrame,
  type HttpMethod,
  type RejectFrame,
  type RelayedRequest,
  type ServerFrame,
} from "./types.js";

export const PROTOCOL_VERSION = 1;

/** Paths under this prefix are never relayed. */
export const RESERVED_PREFIX = "/__hookcast__";
export const TUNNEL_PATH = `${RESERVED_PREFIX}/tunnel`;

const TYPE_HELLO = 0x01;

const TYPE_ACCEPT = 0x10;
const TYPE_REJECT = 0x11;
const TYPE_REQUEST = 0x12;

const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

const utf8 = new TextDecoder("utf-8", { fatal: true });

function ensureRemaining(buf: Buffer, offset: number, need: number): void {
  if (offset + need > buf.length) {
    throw new DecodeError(`Protocol: truncated (need ${need} at offset ${offset}, length ${buf.length})`);
  }
}

function ensureConsumed(buf: Buffer, offset: number): void {
  if (offset !== buf.length) {
    throw new DecodeError(`Protocol: ${buf.length - offset} trailing byte(s)`);
  }
}

function readU16(buf: Buffer, offset: { value: number }): number {
  ensureRemaining(buf, offset.value, 2);
  const n = buf.readUInt16BE(offset.value);
  offset.value += 2;
  return n;
}

function readU32(buf: Buffer, offset: { value: number }): number {
  ensureRemaining(buf, offset.value, 4);
  const n = buf.readUInt32BE(offset.value);
  offset.value += 4;
  return n;
}

function readChunk(buf: Buffer, offset: { value: number }, len: number): Buffer {
  ensureRemaining(buf, offset.value, len);
  const chunk = buf.subarray(offset.value, offset.value + len);
  offset.value += len;
  return chunk;
}

function decodeText(chunk: Buffer): string {
  try {
    return utf8.decode(chunk);
  } catch {
    throw new DecodeError("Protocol: text field is not valid UTF-8");
  }
}

function readShortString(buf: Buffer, offset: { value: number }): string {
  return decodeText(readChunk(buf, offset, readU16(buf, offset)));
}

function readLongString(buf: Buffer, offset: { value: number }): string {
  return decodeText(readChunk(buf, offset, readU32(buf, offset)));
}

function readBytes(buf: Buffer, offset: { value: number }): Buffer {
  // Copy so the decoded body does not pin the whole frame.
  return Buffer.from(readChunk(buf, offset, readU32(buf, offset)));
}

function readType(buf: Buffer): number {
  ensureRemaining(buf, 0, 1);
  return buf[0];
}

export function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}

// ── Writing ─────────────────────────────────────────────────────────────────

/** Accumulates length-prefixed fields and concatenates them once. */
class FrameWriter {
  private readonly parts: Buffer[] = [];

  constructor(type: number) {
    this.parts.push(Buffer.of(type));
  }

  u16(n: number): this {
    const b = Buffer.alloc(2);
    b.writeUInt16BE(n, 0);
    this.parts.push(b);
    return this;
  }

  u32(n: number): this {
    const b = Buffer.alloc(4);
    b.writeUInt32BE(n, 0);
    this.parts.push(b);
    return this;
  }

  shortString(s: string, field: string): this {
    const bytes = Buffer.from(s, "utf-8");
    if (bytes.length > U16_MAX) {
      throw new RangeError(`Protocol: ${field} exceeds ${U16_MAX} bytes`);
    }
    this.u16(bytes.length);
    this.parts.push(bytes);
    return this;
  }

  longString(s: string, field: string): this {
    return this.bytes(Buffer.from(s, "utf-8"), field);
  }

  bytes(bytes: Buffer, field: string): this {
    if (bytes.length > U32_MAX) {
      throw new RangeError(`Protocol: ${field} exceeds ${U32_MAX} bytes`);
    }
    this.u32(bytes.length);
    this.parts.push(bytes);
    return this;
  }

  finish(): Buffer {
    return Buffer.concat(this.parts);
  }
}

// ── Handshake ───────────────────────────────────────────────────────────────

export function encodeHello(hello: Omit<HelloFrame, "type">): Buffer {
  return new FrameWriter(TYPE_HELLO)
    .u16(hello.protocolVersion)
    .shortString(hello.secret, "secret")
    .finish();
}

export function encodeAccept(accept: Omit<AcceptFrame, "type">): Buffer {
  return new FrameWriter(TYPE_ACCEPT).u16(accept.protocolVersion).finish();
}

export function encodeReject(reject: Omit<RejectFrame, "type">): Buffer {
  return new FrameWriter(TYPE_REJECT).shortString(reject.reason, "reason").finish();
}

/**
 * Parse a frame sent by a tunnel client. HELLO is the only frame a client
 * ever sends.
 */
export function parseClientFrame(buffer: Buffer): HelloFrame {
  const type = readType(buffer);
  if (type !== TYPE_HELLO) {
    throw new DecodeError(`Protocol: unknown client frame type ${type}`);
  }
  const offset = { value: 1 };
  const protocolVersion = readU16(buffer, offset);
  const secret = readShortString(buffer, offset);
  ensureConsumed(buffer, offset.value);
  return { type: "hello", protocolVersion, secret };
}

// ── Relayed requests ────────────────────────────────────────────────────────

export function encodeRequest(request: RelayedRequest): Buffer {
  if (request.headers.length > U16_MAX) {
    throw new RangeError(`Protocol: more than ${U16_MAX} headers`);
  }
  const writer = new FrameWriter(TYPE_REQUEST)
    .shortString(request.method, "method")
    .longString(request.path, "path")
    .u16(request.headers.length);
  for (const [name, value] of request.headers) {
    writer.shortString(name, "header name").longString(value, "header value");
  }
  return writer.bytes(request.body, "body").finish();
}

function readRequestBody(buffer: Buffer, offset: { value: number }): RelayedRequest {
  const method = readShortString(buffer, offset);
  if (!isHttpMethod(method)) {
    throw new DecodeError(`Protocol: invalid method ${JSON.stringify(method)}`);
  }
  const path = readLongString(buffer, offset);
  const count = readU16(buffer, offset);
  const headers: HeaderPair[] = [];
  for (let i = 0; i < count; i++) {
    const name = readShortString(buffer, offset);
    const value = readLongString(buffer, offset);
    headers.push([name, value]);
  }
  const body = readBytes(buffer, offset);
  return { method, path, headers, body };
}

export function decodeRequest(buffer: Buffer): RelayedRequest {
  const type = readType(buffer);
  if (type !== TYPE_REQUEST) {
    throw new DecodeError(`Protocol: expected request frame, got type ${type}`);
  }
  const offset = { value: 1 };
  const request = readRequestBody(buffer, offset);
  ensureConsumed(buffer, offset.value);
  return request;
}

/** Parse any frame the server sends to a tunnel client. */
export function parseServerFrame(buffer: Buffer): ServerFrame {
  const offset = { value: 1 };

  switch (readType(buffer)) {
    case TYPE_ACCEPT: {
      const protocolVersion = readU16(buffer, offset);
      ensureConsumed(buffer, offset.value);
      return { type: "accept", protocolVersion };
    }
    case TYPE_REJECT: {
      const reason = readShortString(buffer, offset);
      ensureConsumed(buffer, offset.value);
      return { type: "reject", reason };
    }
    case TYPE_REQUEST:
      return { type: "request", request: decodeRequest(buffer) };
    default:
      throw new DecodeError(`Protocol: unknown server frame type ${buffer[0]}`);
  }
}
