import { homedir } from "node:os";
import { join, resolve } from "node:path";

/**
 * Default config location:
 * $DNSSWAP_CONFIG_PATH > $XDG_CONFIG_HOME/dnsswap/config.yaml > ~/.config/dnsswap/config.yaml
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.DNSSWAP_CONFIG_PATH) return env.DNSSWAP_CONFIG_PATH;
  const base = env.XDG_CONFIG_HOME || join(env.HOME ?? homedir(), ".config");
  return join(base, "dnsswap", "config.yaml");
}

/** Expand a leading ~ against HOME. */
export function resolvePathLike(path: string, env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME ?? env.USERPROFILE ?? homedir();
  if (path === "~") return home;
  if (path.startsWith("~/")) return resolve(home, path.slice(2));
  return path;
}
