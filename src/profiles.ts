import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { TUNNEL_PATH } from "./protocol.js";

/** The HELLO frame carries the secret behind a u16 length. */
const MAX_SECRET_BYTES = 0xffff;

const ProfileSchema = z.object({
  /** e.g. wss://hooks.example.com/ */
  remote: z.string().url(),
  secret: z
    .string()
    .min(1)
    .refine((s) => Buffer.byteLength(s, "utf-8") <= MAX_SECRET_BYTES, {
      message: `must be at most ${MAX_SECRET_BYTES} bytes`,
    }),
  /** e.g. http://localhost:3000/ */
  local: z.string().url(),
});

const ProfilesFileSchema = z.record(z.string(), ProfileSchema);

export type Profile = z.infer<typeof ProfileSchema>;

export interface PreparedProfile {
  remote: URL;
  secret: string;
  local: URL;
}

/** Check the schemes and point `remote` at the tunnel endpoint. */
export function prepareProfile(profile: Profile): PreparedProfile {
  const remote = new URL(profile.remote);
  const local = new URL(profile.local);

  if (remote.protocol !== "ws:" && remote.protocol !== "wss:") {
    throw new ConfigError("remote must use the ws or wss scheme");
  }
  if (local.protocol !== "http:" && local.protocol !== "https:") {
    throw new ConfigError("local must use the http or https scheme");
  }

  remote.pathname = TUNNEL_PATH;
  remote.search = "";
  local.pathname = "/";
  local.search = "";

  return { remote, secret: profile.secret, local };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Named connection profiles kept in a single JSON file. */
export class ProfileStore {
  private constructor(
    private readonly file: string,
    private profiles: Record<string, Profile>
  ) {}

  static async load(file: string): Promise<ProfileStore> {
    let text: string;
    try {
      text = await readFile(file, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return new ProfileStore(file, {});
      throw err;
    }

    const parsed = ProfilesFileSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new ConfigError(`${file}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    return new ProfileStore(file, parsed.data);
  }

  list(): Array<[name: string, profile: Profile]> {
    return Object.entries(this.profiles).sort(([a], [b]) => a.localeCompare(b));
  }

  get(name: string): Profile | undefined {
    return Object.hasOwn(this.profiles, name) ? this.profiles[name] : undefined;
  }

  async add(name: string, profile: Profile): Promise<void> {
    if (this.get(name)) {
      throw new ConfigError(`profile ${name} already exists`);
    }
    const parsed = ProfileSchema.safeParse(profile);
    if (!parsed.success) {
      throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
    }
    prepareProfile(parsed.data);
    await this.save({ ...this.profiles, [name]: parsed.data });
  }

  async delete(name: string): Promise<void> {
    if (!this.get(name)) {
      throw new ConfigError(`profile ${name} doesn't exist`);
    }
    const rest = { ...this.profiles };
    delete rest[name];
    await this.save(rest);
  }

  private async save(profiles: Record<string, Profile>): Promise<void> {
    await mkdir(dirname(this.file), { recursive: true });
    await writeFile(this.file, JSON.stringify(profiles, null, 2) + "\n");
    this.profiles = profiles;
  }
}
