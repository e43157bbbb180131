import ipaddr from "ipaddr.js";
import type { NmcliClient } from "./nmcli.js";
import { restartConnection } from "./connection.js";
import { DnsSwapError } from "../errors.js";

export interface ApplyDnsOptions {
  /** Reject values that are not IP literals before touching the connection. */
  validateAddresses?: boolean;
}

/** nmcli takes several servers as one space-separated value. */
export function formatDnsValue(primary: string, secondary: string): string {
  return `${primary} ${secondary}`;
}

export function buildStaticDnsArgs(connection: string, dns: string): string[] {
  return ["connection", "mod", connection, "ipv4.dns", dns, "ipv4.ignore-auto-dns", "yes"];
}

export function buildAutomaticDnsArgs(connection: string): string[] {
  return [
    "connection",
    "mod",
    connection,
    "ipv4.dns",
    "",
    "ipv4.ignore-auto-dns",
    "no",
    "ipv6.ignore-auto-dns",
    "no",
  ];
}

export function isIpAddress(value: string): boolean {
  return ipaddr.IPv4.isValidFourPartDecimal(value) || ipaddr.IPv6.isValid(value);
}

function assertIpAddress(value: string, label: string): void {
  if (!isIpAddress(value)) {
    throw new DnsSwapError(`Invalid ${label} DNS address: "${value}"`, "INVALID_ADDRESS", {
      value,
    });
  }
}

/**
 * Pin the connection's IPv4 DNS to `primary secondary` and restart it.
 * No rollback: if the restart fails the modified profile stays in place.
 */
export async function applyDns(
  nmcli: NmcliClient,
  connection: string,
  primary: string,
  secondary: string,
  options: ApplyDnsOptions = {},
): Promise<void> {
  if (options.validateAddresses) {
    assertIpAddress(primary, "primary");
    assertIpAddress(secondary, "secondary");
  }

  await nmcli.execute(buildStaticDnsArgs(connection, formatDnsValue(primary, secondary)));
  await restartConnection(nmcli, connection);
}

/** Hand DNS back to DHCP / router advertisements. */
export async function applyAutomaticDns(nmcli: NmcliClient, connection: string): Promise<void> {
  await nmcli.execute(buildAutomaticDnsArgs(connection));
  await restartConnection(nmcli, connection);
}

/** Lines of `nmcli connection show <name>` worth showing. */
export function filterDnsLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .filter((line) => line.includes("ipv4.dns") || line.includes("ipv4.ignore-auto-dns"));
}
