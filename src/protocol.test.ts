import { describe, expect, it } from "vitest";
import { DecodeError } from "./errors.js";
import {
  PROTOCOL_VERSION,
  decodeRequest,
  encodeAccept,
  encodeHello,
  encodeReject,
  encodeRequest,
  parseClientFrame,
  parseServerFrame,
} from "./protocol.js";
import type { RelayedRequest } from "./types.js";

const webhook: RelayedRequest = {
  method: "POST",
  path: "/webhook?source=test&x=1",
  headers: [
    ["Content-Type", "application/json"],
    ["X-Signature", "sha256=abc"],
    ["Set-Cookie", "a=1"],
    ["Set-Cookie", "b=2"],
  ],
  body: Buffer.from('{"id":1}'),
};

describe("encodeRequest / decodeRequest", () => {
  it("round-trips method, path, headers in order and body", () => {
    const decoded = decodeRequest(encodeRequest(webhook));
    expect(decoded.method).toBe("POST");
    expect(decoded.path).toBe("/webhook?source=test&x=1");
    expect(decoded.headers).toEqual([
      ["Content-Type", "application/json"],
      ["X-Signature", "sha256=abc"],
      ["Set-Cookie", "a=1"],
      ["Set-Cookie", "b=2"],
    ]);
    expect(decoded.body.equals(Buffer.from('{"id":1}'))).toBe(true);
  });

  it("keeps arbitrary binary bodies intact", () => {
    const body = Buffer.alloc(256);
    for (let i = 0; i < 256; i++) body[i] = i;
    const decoded = decodeRequest(encodeRequest({ ...webhook, body }));
    expect(decoded.body.equals(body)).toBe(true);
  });

  it("handles an empty body and no headers", () => {
    const decoded = decodeRequest(
      encodeRequest({ method: "GET", path: "/", headers: [], body: Buffer.alloc(0) })
    );
    expect(decoded).toEqual({ method: "GET", path: "/", headers: [], body: Buffer.alloc(0) });
  });

  it("round-trips non-ASCII header values", () => {
    const decoded = decodeRequest(
      encodeRequest({ ...webhook, headers: [["X-Name", "José ☃"]] })
    );
    expect(decoded.headers).toEqual([["X-Name", "José ☃"]]);
  });

  it("lays the frame out as type, method, path, headers, body", () => {
    const frame = encodeRequest({
      method: "GET",
      path: "/a",
      headers: [["k", "v"]],
      body: Buffer.from("x"),
    });
    expect([...frame]).toEqual([
      0x12,
      0x00, 0x03, 0x47, 0x45, 0x54, // "GET"
      0x00, 0x00, 0x00, 0x02, 0x2f, 0x61, // "/a"
      0x00, 0x01, // one header
      0x00, 0x01, 0x6b, // "k"
      0x00, 0x00, 0x00, 0x01, 0x76, // "v"
      0x00, 0x00, 0x00, 0x01, 0x78, // body "x"
    ]);
  });
});

describe("decodeRequest errors", () => {
  const frame = encodeRequest(webhook);

  it("rejects an empty buffer", () => {
    expect(() => decodeRequest(Buffer.alloc(0))).toThrow(DecodeError);
  });

  it("rejects a truncated frame", () => {
    expect(() => decodeRequest(frame.subarray(0, frame.length - 1))).toThrow(/truncated/);
  });

  it("rejects a length prefix that runs past the end", () => {
    const bad = Buffer.from(frame);
    // Path length lives after type (1) + method length (2) + "POST" (4).
    bad.writeUInt32BE(0xffffff, 7);
    expect(() => decodeRequest(bad)).toThrow(DecodeError);
  });

  it("rejects trailing bytes", () => {
    expect(() => decodeRequest(Buffer.concat([frame, Buffer.of(0)]))).toThrow(/trailing/);
  });

  it("rejects an unknown verb", () => {
    const bad = Buffer.from(frame);
    bad.write("BREW", 3, "utf-8");
    expect(() => decodeRequest(bad)).toThrow(/invalid method "BREW"/);
  });

  it("rejects invalid UTF-8 in a header value", () => {
    const bad = encodeRequest({ ...webhook, headers: [["X-Test", "ab"]] });
    // The value bytes are the last two before the 4-byte body length and body.
    const valueOffset = bad.length - 4 - webhook.body.length - 2;
    bad[valueOffset] = 0xff;
    expect(() => decodeRequest(bad)).toThrow(/UTF-8/);
  });

  it("rejects a frame of another type", () => {
    expect(() => decodeRequest(encodeAccept({ protocolVersion: 1 }))).toThrow(/expected request frame/);
  });
});

describe("handshake frames", () => {
  it("parses a hello", () => {
    const frame = encodeHello({ protocolVersion: PROTOCOL_VERSION, secret: "test-secret" });
    expect(parseClientFrame(frame)).toEqual({
      type: "hello",
      protocolVersion: PROTOCOL_VERSION,
      secret: "test-secret",
    });
  });

  it("rejects anything but a hello from a client", () => {
    expect(() => parseClientFrame(encodeRequest(webhook))).toThrow(/unknown client frame type 18/);
  });

  it("parses accept and reject", () => {
    expect(parseServerFrame(encodeAccept({ protocolVersion: 7 }))).toEqual({
      type: "accept",
      protocolVersion: 7,
    });
    expect(parseServerFrame(encodeReject({ reason: "authentication failed" }))).toEqual({
      type: "reject",
      reason: "authentication failed",
    });
  });

  it("parses a relayed request from the server", () => {
    const frame = parseServerFrame(encodeRequest(webhook));
    expect(frame.type).toBe("request");
    if (frame.type === "request") {
      expect(frame.request.path).toBe("/webhook?source=test&x=1");
    }
  });

  it("rejects an unknown server frame type", () => {
    expect(() => parseServerFrame(Buffer.of(0x7f))).toThrow(/unknown server frame type 127/);
  });

  it("refuses to encode a secret longer than its length prefix", () => {
    expect(() => encodeHello({ protocolVersion: 1, secret: "x".repeat(70_000) })).toThrow(RangeError);
  });
});
