import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "./errors.js";
import { HistoryStore } from "./history.js";
import type { RelayedRequest } from "./types.js";

const request: RelayedRequest = {
  method: "POST",
  path: "/hooks/stripe?attempt=1",
  headers: [
    ["Content-Type", "application/octet-stream"],
    ["X-Tag", "a"],
    ["X-Tag", "b"],
  ],
  body: Buffer.from([0, 1, 2, 253, 254, 255]),
};

describe("HistoryStore", () => {
  let dir: string;
  let store: HistoryStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hookcast-history-"));
    store = new HistoryStore(join(dir, "history"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("lists nothing before the first request", async () => {
    expect(await store.list()).toEqual([]);
    expect(await store.clear()).toBe(0);
  });

  it("stores a request and reads it back", async () => {
    const receivedAt = new Date("2026-03-01T12:00:00.000Z");
    const id = await store.add({ receivedAt, local: "http://localhost:3000", request });

    const item = await store.get(id);
    expect(item).not.toBeNull();
    expect(item?.id).toBe(id);
    expect(item?.receivedAt.toISOString()).toBe("2026-03-01T12:00:00.000Z");
    expect(item?.local).toBe("http://localhost:3000");
    expect(item?.request.method).toBe("POST");
    expect(item?.request.path).toBe("/hooks/stripe?attempt=1");
    expect(item?.request.headers).toEqual([
      ["Content-Type", "application/octet-stream"],
      ["X-Tag", "a"],
      ["X-Tag", "b"],
    ]);
    expect([...(item?.request.body ?? [])]).toEqual([0, 1, 2, 253, 254, 255]);
  });

  it("lists items oldest first", async () => {
    const later = await store.add({ receivedAt: new Date(2_000), local: "http://l", request });
    const earlier = await store.add({ receivedAt: new Date(1_000), local: "http://l", request });

    expect((await store.list()).map((item) => item.id)).toEqual([earlier, later]);
  });

  it("returns null for unknown or unsafe ids", async () => {
    expect(await store.get("missing-id")).toBeNull();
    expect(await store.get("../profiles")).toBeNull();
  });

  it("deletes one item", async () => {
    const id = await store.add({ receivedAt: new Date(), local: "http://l", request });
    await store.delete(id);

    expect(await store.get(id)).toBeNull();
    await expect(store.delete(id)).rejects.toThrow(`${id} not found`);
    await expect(store.delete("../x")).rejects.toBeInstanceOf(ConfigError);
  });

  it("clears every item and reports how many", async () => {
    await store.add({ receivedAt: new Date(1), local: "http://l", request });
    await store.add({ receivedAt: new Date(2), local: "http://l", request });

    expect(await store.clear()).toBe(2);
    expect(await store.list()).toEqual([]);
  });

  it("skips corrupt files when listing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const id = await store.add({ receivedAt: new Date(), local: "http://l", request });
    await writeFile(join(dir, "history", "broken.json"), "{ not json");

    const items = await store.list();

    expect(items.map((item) => item.id)).toEqual([id]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(await readdir(join(dir, "history"))).toHaveLength(2);
  });
});
