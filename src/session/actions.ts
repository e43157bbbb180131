import { formatProviderLabel } from "../dns/providers.js";
import { applyAutomaticDns, applyDns, filterDnsLines } from "../network/dns.js";
import { createLogger } from "../utils/logger.js";
import type { Session } from "./session.js";

const log = createLogger("actions");

/** What the menu loop should do after an action returns. */
export type LoopResult = "continue" | "exit";

export type MenuAction = (session: Session) => Promise<LoopResult>;

export async function selectProvider(session: Session): Promise<LoopResult> {
  const { io, providers } = session;
  const index = await io.selectOption("Select DNS Provider", providers.map(formatProviderLabel));
  const provider = providers[index];
  if (!provider) return "continue";

  await applyDns(session.nmcli, session.connection, provider.primary, provider.secondary, {
    validateAddresses: session.config.validateAddresses,
  });
  io.success(`DNS set to ${provider.name} (${provider.primary}, ${provider.secondary})`);
  return "continue";
}

export async function setCustomDns(session: Session): Promise<LoopResult> {
  const { io } = session;
  const primary = await io.ask("Enter primary DNS: ");
  const secondary = await io.ask("Enter secondary DNS: ");

  await applyDns(session.nmcli, session.connection, primary, secondary, {
    validateAddresses: session.config.validateAddresses,
  });
  io.success(`DNS set to custom: ${primary}, ${secondary}`);
  return "continue";
}

export async function setAutomaticDns(session: Session): Promise<LoopResult> {
  await applyAutomaticDns(session.nmcli, session.connection);
  session.io.success("Switched to automatic DNS (Router)");
  return "continue";
}

export async function showCurrentDns(session: Session): Promise<LoopResult> {
  const { io } = session;

  const result = await session.nmcli.query(["connection", "show", session.connection]);
  if (result.exitCode === 0) {
    for (const line of filterDnsLines(result.stdout)) io.print(line);
  } else {
    log.warn(`Could not read settings of ${session.connection}: ${result.stderr.trim()}`);
  }

  io.print("");
  io.print("System DNS configuration:");
  const [command = "resolvectl", ...args] = session.config.resolverStatus;
  const code = await session.runner.passthrough(command, args);
  if (code !== 0) log.debug(`${command} exited with ${code}`);
  return "continue";
}

export async function exitSession(session: Session): Promise<LoopResult> {
  session.io.print("Goodbye!");
  return "exit";
}
