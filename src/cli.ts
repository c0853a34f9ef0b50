import { Command } from "commander";
import { TunnelClient } from "./client.js";
import { loadServerConfig, resolveHistoryDir, resolveProfilesPath } from "./config.js";
import { ConfigError } from "./errors.js";
import { forwardRequest } from "./forward.js";
import { HistoryStore } from "./history.js";
import { setDebug } from "./log.js";
import { ProfileStore, prepareProfile, type PreparedProfile } from "./profiles.js";
import { createRelayServer } from "./server.js";

const TAG = "CLI";

export const VERSION = "0.3.0";

/** Run `handler` once on the first SIGINT/SIGTERM. Returns a disposer. */
function onShutdownSignal(handler: (signal: NodeJS.Signals) => void): () => void {
  const listener = (signal: NodeJS.Signals): void => {
    dispose();
    handler(signal);
  };
  const dispose = (): void => {
    process.off("SIGINT", listener);
    process.off("SIGTERM", listener);
  };
  process.once("SIGINT", listener);
  process.once("SIGTERM", listener);
  return dispose;
}

async function loadProfile(name: string): Promise<PreparedProfile> {
  const store = await ProfileStore.load(resolveProfilesPath());
  const profile = store.get(name);
  if (!profile) {
    throw new ConfigError(`Profile ${name} doesn't exist (add it with: hookcast profiles add ${name} ...)`);
  }
  return prepareProfile(profile);
}

export function createProgram(): Command {
  const program = new Command()
    .name("hookcast")
    .description("Relay webhooks to every connected developer machine")
    .version(VERSION)
    .option("--debug", "Verbose logging")
    .hook("preAction", (command) => {
      if (command.opts<{ debug?: boolean }>().debug) setDebug(true);
    });

  // ── Server ──
  program
    .command("server")
    .description("Start a server to relay requests to clients")
    .option("--bind-addr <addr>", "Address to listen on, host:port (env HOOKCAST_BIND_ADDR)")
    .option("--secret <secret>", "Secret clients need to connect (env HOOKCAST_SECRET)")
    .action(async (opts: { bindAddr?: string; secret?: string }) => {
      const server = createRelayServer(loadServerConfig(opts));
      await server.start();
      await new Promise<void>((resolve) => {
        onShutdownSignal((signal) => {
          console.warn(`[${TAG}] ${signal} received, shutting down`);
          resolve();
        });
      });
      await server.stop();
    });

  // ── Client ──
  program
    .command("connect")
    .description("Connect to a remote server and relay requests to a local server")
    .option("--profile <name>", "Profile to use", "default")
    .option("--no-history", "Do not record received requests")
    .action(async (opts: { profile: string; history: boolean }) => {
      const profile = await loadProfile(opts.profile);
      console.log(`[${TAG}] Local origin: ${profile.local.origin}`);
      console.log(`[${TAG}] Remote origin: ${profile.remote.href}`);

      const client = new TunnelClient({
        ...profile,
        history: opts.history ? new HistoryStore(resolveHistoryDir()) : undefined,
      });
      const dispose = onShutdownSignal((signal) => {
        console.warn(`[${TAG}] ${signal} received, shutting down`);
        client.stop();
      });
      try {
        await client.run();
      } finally {
        dispose();
      }
    });

  // ── Profiles ──
  const profiles = program.command("profiles").description("Manage connection profiles");

  profiles
    .command("list")
    .description("List profiles")
    .action(async () => {
      const store = await ProfileStore.load(resolveProfilesPath());
      const entries = store.list();
      if (entries.length === 0) {
        console.log("No profiles");
        return;
      }
      for (const [name, profile] of entries) {
        console.log(`[${name}] Remote: ${profile.remote} Local: ${profile.local}`);
      }
    });

  profiles
    .command("add")
    .description("Add a profile")
    .argument("[name]", "Name of the profile", "default")
    .requiredOption("--remote <url>", "Remote origin to receive requests from (e.g. wss://hooks.example.com/)")
    .requiredOption("--secret <secret>", "Secret of the remote server")
    .requiredOption("--local <url>", "Local origin to forward requests to (e.g. http://localhost:3000/)")
    .action(async (name: string, opts: { remote: string; secret: string; local: string }) => {
      const store = await ProfileStore.load(resolveProfilesPath());
      await store.add(name, opts);
      console.log(`Profile ${name} added`);
    });

  profiles
    .command("delete")
    .description("Delete a profile")
    .argument("<name>", "Name of the profile")
    .action(async (name: string) => {
      const store = await ProfileStore.load(resolveProfilesPath());
      await store.delete(name);
      console.log(`Profile ${name} deleted`);
    });

  // ── History ──
  const history = program.command("history").description("Manage and replay previously received requests");

  history
    .command("list")
    .description("List previously received requests")
    .action(async () => {
      const items = await new HistoryStore(resolveHistoryDir()).list();
      if (items.length === 0) {
        console.log("History is empty");
        return;
      }
      for (const item of items) {
        console.log(
          `[${item.id} ${item.receivedAt.toISOString()}] ${item.request.method} ${item.request.path}`
        );
      }
    });

  history
    .command("delete")
    .description("Delete a previously received request")
    .argument("<id>", "Identifier of the request")
    .action(async (id: string) => {
      await new HistoryStore(resolveHistoryDir()).delete(id);
      console.log("Item deleted");
    });

  history
    .command("clear")
    .description("Clear all previously received requests")
    .action(async () => {
      const removed = await new HistoryStore(resolveHistoryDir()).clear();
      console.log(`History has been cleared (${removed} item(s))`);
    });

  history
    .command("replay")
    .description("Replay a previously received request")
    .argument("<id>", "Identifier of the request")
    .option("--local <url>", "Local origin to replay against (defaults to the one it was forwarded to)")
    .action(async (id: string, opts: { local?: string }) => {
      const item = await new HistoryStore(resolveHistoryDir()).get(id);
      if (!item) {
        throw new ConfigError(`${id} not found`);
      }
      const local = new URL(opts.local ?? item.local);
      const result = await forwardRequest(item.request, local);
      if (!result) process.exitCode = 1;
    });

  return program;
}
