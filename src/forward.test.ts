import { createServer, type IncomingHttpHeaders } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildForwardRequest, forwardRequest } from "./forward.js";
import type { RelayedRequest } from "./types.js";

const request: RelayedRequest = {
  method: "POST",
  path: "/hooks/github?delivery=7",
  headers: [
    ["Host", "hooks.example.com"],
    ["Connection", "keep-alive"],
    ["Content-Length", "11"],
    ["Transfer-Encoding", "chunked"],
    ["Content-Type", "application/json"],
    ["X-Tag", "a"],
    ["X-Tag", "b"],
  ],
  body: Buffer.from('{"ok":true}'),
};

describe("buildForwardRequest", () => {
  it("targets the local origin with the relayed path and query", () => {
    const init = buildForwardRequest(request, new URL("http://localhost:3000/ignored/path"));
    expect(init.origin.href).toBe("http://localhost:3000/");
    expect(init.path).toBe("/hooks/github?delivery=7");
    expect(init.method).toBe("POST");
  });

  it("keeps dot segments in the relayed path", () => {
    const init = buildForwardRequest({ ...request, path: "/hooks/../admin?x=1" }, new URL("http://127.0.0.1:3000/"));
    expect(init.path).toBe("/hooks/../admin?x=1");
  });

  it("drops hop-by-hop headers, keeps repeated ones and sets the body length", () => {
    const { headers } = buildForwardRequest(request, new URL("http://localhost:3000/"));
    expect(headers).toEqual({
      "content-type": ["application/json"],
      "x-tag": ["a", "b"],
      "content-length": ["11"],
    });
  });

  it("sends no body for GET and HEAD or when empty", () => {
    const local = new URL("http://localhost:3000/");
    expect(buildForwardRequest({ ...request, method: "GET" }, local).body).toBeUndefined();
    expect(buildForwardRequest({ ...request, method: "HEAD" }, local).body).toBeUndefined();
    expect(buildForwardRequest({ ...request, body: Buffer.alloc(0) }, local).body).toBeUndefined();
    expect(buildForwardRequest(request, local).body?.toString()).toBe('{"ok":true}');
  });

  it("adds a leading slash to a bare path", () => {
    const init = buildForwardRequest({ ...request, path: "bare" }, new URL("http://127.0.0.1:8080/"));
    expect(init.path).toBe("/bare");
  });
});

describe("forwardRequest", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function listen(status: number): Promise<{
    origin: string;
    received: Array<{ url: string | undefined; headers: IncomingHttpHeaders; body: string }>;
    close: () => Promise<void>;
  }> {
    const received: Array<{ url: string | undefined; headers: IncomingHttpHeaders; body: string }> = [];
    const server = createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on("data", (chunk: Buffer) => chunks.push(chunk));
      req.on("end", () => {
        received.push({ url: req.url, headers: req.headers, body: Buffer.concat(chunks).toString() });
        res.writeHead(status, { Location: "/elsewhere" });
        res.end("done");
      });
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Local server is not listening");
    }
    return {
      origin: `http://127.0.0.1:${address.port}`,
      received,
      close: () => new Promise((resolve) => server.close(() => resolve())),
    };
  }

  it("replays the request and reports the status", async () => {
    const local = await listen(201);
    try {
      const result = await forwardRequest(request, new URL(local.origin));

      expect(result?.status).toBe(201);
      expect(local.received).toHaveLength(1);
      expect(local.received[0].url).toBe("/hooks/github?delivery=7");
      expect(local.received[0].body).toBe('{"ok":true}');
      expect(local.received[0].headers["x-tag"]).toBe("a, b");
      expect(local.received[0].headers.host).toBe(new URL(local.origin).host);
    } finally {
      await local.close();
    }
  });

  it("sends the path exactly as it was received", async () => {
    const local = await listen(204);
    try {
      await forwardRequest({ ...request, path: "/hooks/../admin?x=1" }, new URL(local.origin));
      expect(local.received[0].url).toBe("/hooks/../admin?x=1");
    } finally {
      await local.close();
    }
  });

  it("does not replay CONNECT", async () => {
    const local = await listen(200);
    try {
      const result = await forwardRequest({ ...request, method: "CONNECT" }, new URL(local.origin));
      expect(result).toBeNull();
      expect(local.received).toEqual([]);
    } finally {
      await local.close();
    }
  });

  it("does not follow redirects", async () => {
    const local = await listen(302);
    try {
      const result = await forwardRequest(request, new URL(local.origin));
      expect(result?.status).toBe(302);
      expect(local.received).toHaveLength(1);
    } finally {
      await local.close();
    }
  });

  it("resolves to null and logs when the local server is down", async () => {
    const local = await listen(200);
    await local.close();

    const result = await forwardRequest(request, new URL(local.origin));

    expect(result).toBeNull();
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
