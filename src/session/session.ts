import type { Config } from "../config/schema.js";
import { DNS_PROVIDERS, type DnsProvider } from "../dns/providers.js";
import { discoverActiveConnection } from "../network/connection.js";
import type { NmcliClient } from "../network/nmcli.js";
import type { CommandRunner } from "../system/exec.js";
import type { SessionIO } from "./io.js";

/**
 * Per-process context handed to every menu action.
 * `connection` is captured once and never re-validated.
 */
export interface Session {
  readonly connection: string;
  readonly providers: readonly DnsProvider[];
  readonly nmcli: NmcliClient;
  /** Runs the resolver status command with the terminal attached. */
  readonly runner: CommandRunner;
  readonly io: SessionIO;
  readonly config: Config;
}

export interface CreateSessionOptions {
  nmcli: NmcliClient;
  runner: CommandRunner;
  io: SessionIO;
  config: Config;
  providers?: readonly DnsProvider[];
}

/** Discovers the active connection; throws DISCOVERY_FAILED if there is none. */
export async function createSession(opts: CreateSessionOptions): Promise<Session> {
  const connection = await discoverActiveConnection(opts.nmcli);
  return {
    connection,
    providers: opts.providers ?? DNS_PROVIDERS,
    nmcli: opts.nmcli,
    runner: opts.runner,
    io: opts.io,
    config: opts.config,
  };
}
