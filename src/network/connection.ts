import type { NmcliClient } from "./nmcli.js";
import { DnsSwapError } from "../errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("connection");

/** `nmcli -t` output: one `NAME:DEVICE` pair per active connection. */
export const ACTIVE_CONNECTIONS_ARGS = [
  "-t",
  "-f",
  "NAME,DEVICE",
  "connection",
  "show",
  "--active",
] as const;

/**
 * Name of the first listed connection bound to a device.
 * Later lines are never consulted once a match is found.
 */
export function parseActiveConnection(output: string): string {
  for (const line of output.split(/\r?\n/)) {
    const [name = "", device] = line.split(":");
    if (device) return name;
  }
  throw new DnsSwapError("No active connection found", "DISCOVERY_FAILED");
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decodeStrict(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new DnsSwapError("Active connection list is not valid UTF-8", "DISCOVERY_FAILED", err);
  }
}

export async function discoverActiveConnection(nmcli: NmcliClient): Promise<string> {
  const result = await nmcli.query([...ACTIVE_CONNECTIONS_ARGS]);
  if (result.exitCode !== 0) {
    throw new DnsSwapError("Failed to get active connections", "DISCOVERY_FAILED", {
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }
  const name = parseActiveConnection(decodeStrict(result.stdoutBytes));
  log.debug(`Active connection: ${name}`);
  return name;
}

/**
 * Down then up, so NetworkManager applies the modified profile.
 * The down step is best-effort: the connection may already be down.
 */
export async function restartConnection(nmcli: NmcliClient, connection: string): Promise<void> {
  try {
    const down = await nmcli.runPrivileged(["connection", "down", connection]);
    if (down.exitCode !== 0) {
      log.debug(`Ignoring failed "connection down ${connection}": ${down.stderr.trim()}`);
    }
  } catch (err) {
    log.debug(`Ignoring failed "connection down ${connection}"`, err);
  }

  const up = await nmcli.runPrivileged(["connection", "up", connection]);
  if (up.exitCode !== 0) {
    throw new DnsSwapError(
      `Failed to restart connection: ${up.stderr.trim()}`,
      "COMMAND_FAILED",
      { exitCode: up.exitCode },
    );
  }
}
