import { randomBytes } from "node:crypto";
import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";
import { HTTP_METHODS, type RelayedRequest } from "./types.js";

const TAG = "History";

const ID_PATTERN = /^[a-z0-9-]+$/;

const StoredItemSchema = z.object({
  receivedAt: z.string().datetime(),
  local: z.string(),
  request: z.object({
    method: z.enum(HTTP_METHODS),
    path: z.string(),
    headers: z.array(z.tuple([z.string(), z.string()])),
    /** Base64 */
    body: z.string(),
  }),
});

export interface HistoryItem {
  id: string;
  receivedAt: Date;
  /** Local origin the request was forwarded to. */
  local: string;
  request: RelayedRequest;
}

function newItemId(now: Date): string {
  return `${now.getTime().toString(36)}-${randomBytes(3).toString("hex")}`;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Requests received by the client, one JSON file per item so they can be
 * listed and replayed later.
 */
export class HistoryStore {
  constructor(private readonly dir: string) {}

  async add(item: Omit<HistoryItem, "id">): Promise<string> {
    const id = newItemId(item.receivedAt);
    const stored: z.infer<typeof StoredItemSchema> = {
      receivedAt: item.receivedAt.toISOString(),
      local: item.local,
      request: {
        method: item.request.method,
        path: item.request.path,
        headers: item.request.headers.map(([name, value]): [string, string] => [name, value]),
        body: item.request.body.toString("base64"),
      },
    };
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.fileFor(id), JSON.stringify(stored, null, 2) + "\n");
    return id;
  }

  async get(id: string): Promise<HistoryItem | null> {
    if (!ID_PATTERN.test(id)) return null;
    return this.read(id);
  }

  /** Oldest first. Unreadable files are skipped. */
  async list(): Promise<HistoryItem[]> {
    const items: HistoryItem[] = [];
    for (const id of await this.ids()) {
      try {
        const item = await this.read(id);
        if (item) items.push(item);
      } catch (err) {
        console.warn(`[${TAG}] Skipping ${id}: ${describeError(err)}`);
      }
    }
    return items.sort(
      (a, b) => a.receivedAt.getTime() - b.receivedAt.getTime() || a.id.localeCompare(b.id)
    );
  }

  async delete(id: string): Promise<void> {
    if (!ID_PATTERN.test(id)) {
      throw new ConfigError(`${id} not found`);
    }
    try {
      await rm(this.fileFor(id));
    } catch (err) {
      if (isNotFound(err)) throw new ConfigError(`${id} not found`);
      throw err;
    }
  }

  /** Returns the number of items removed. */
  async clear(): Promise<number> {
    const ids = await this.ids();
    await Promise.all(ids.map((id) => rm(this.fileFor(id), { force: true })));
    return ids.length;
  }

  private fileFor(id: string): string {
    return join(this.dir, `${id}.json`);
  }

  private async ids(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return names
      .filter((name) => name.endsWith(".json"))
      .map((name) => name.slice(0, -".json".length))
      .filter((id) => ID_PATTERN.test(id));
  }

  private async read(id: string): Promise<HistoryItem | null> {
    let text: string;
    try {
      text = await readFile(this.fileFor(id), "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    const stored = StoredItemSchema.parse(JSON.parse(text));
    return {
      id,
      receivedAt: new Date(stored.receivedAt),
      local: stored.local,
      request: {
        method: stored.request.method,
        path: stored.request.path,
        headers: stored.request.headers,
        body: Buffer.from(stored.request.body, "base64"),
      },
    };
  }
}
