import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { RelayServerConfig } from "./server.js";

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.HOOKCAST_HOME || join(homedir(), ".hookcast");
}

export function resolveProfilesPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(resolveHomeDir(env), "profiles.json");
}

export function resolveHistoryDir(env: NodeJS.ProcessEnv = process.env): string {
  return join(resolveHomeDir(env), "history");
}

/** `host:port`, with IPv6 hosts in brackets. An empty host means all interfaces. */
export function parseBindAddress(value: string): { host: string; port: number } {
  const sep = value.lastIndexOf(":");
  if (sep === -1) {
    throw new ConfigError(`Bind address "${value}" must be host:port`);
  }

  let host = value.slice(0, sep);
  const portText = value.slice(sep + 1);
  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
  } else if (host.includes(":")) {
    throw new ConfigError(`Bind address "${value}": IPv6 hosts must be in brackets`);
  }

  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new ConfigError(`Bind address "${value}" has an invalid port`);
  }
  return { host: host || "0.0.0.0", port };
}

const optionalPositiveInt = z.coerce.number().int().positive().optional();

const ServerEnvSchema = z.object({
  HOOKCAST_BIND_ADDR: z.string({ required_error: "bind address is required" }).min(1),
  HOOKCAST_SECRET: z.string({ required_error: "secret is required" }).min(1),
  HOOKCAST_HANDSHAKE_TIMEOUT_MS: optionalPositiveInt,
  HOOKCAST_REQUEST_TIMEOUT_MS: optionalPositiveInt,
  HOOKCAST_MAX_BODY_BYTES: optionalPositiveInt,
});

export interface ServerOverrides {
  bindAddr?: string;
  secret?: string;
}

/** Flags win over environment variables. */
export function loadServerConfig(
  overrides: ServerOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): RelayServerConfig {
  const parsed = ServerEnvSchema.safeParse({
    ...env,
    HOOKCAST_BIND_ADDR: overrides.bindAddr ?? env.HOOKCAST_BIND_ADDR,
    HOOKCAST_SECRET: overrides.secret ?? env.HOOKCAST_SECRET,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid server configuration: ${issues.join("; ")}`);
  }

  const { host, port } = parseBindAddress(parsed.data.HOOKCAST_BIND_ADDR);
  return {
    host,
    port,
    secret: parsed.data.HOOKCAST_SECRET,
    handshakeTimeoutMs: parsed.data.HOOKCAST_HANDSHAKE_TIMEOUT_MS,
    requestTimeoutMs: parsed.data.HOOKCAST_REQUEST_TIMEOUT_MS,
    maxBodyBytes: parsed.data.HOOKCAST_MAX_BODY_BYTES,
  };
}
