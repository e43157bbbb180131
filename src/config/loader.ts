/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { ZodError } from "zod";
import { configSchema, defaultConfig, type Config } from "./schema.js";
import { expandEnvVarsDeep } from "./expand-env.js";
import { createLogger } from "../utils/logger.js";
import { resolvePathLike } from "../utils/paths.js";
import { DnsSwapError } from "../errors.js";

const log = createLogger("config");

export async function loadConfig(
  path: string,
  env: Record<string, string | undefined> = process.env,
): Promise<Config> {
  const expandedPath = resolvePathLike(path);

  let content: string;
  try {
    content = await readFile(expandedPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      log.debug(`No config at ${expandedPath}, using defaults`);
      return defaultConfig();
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err) {
    throw new DnsSwapError(
      `Config is not valid YAML (${expandedPath}): ${err instanceof Error ? err.message : String(err)}`,
      "CONFIG_INVALID",
    );
  }

  // An empty file parses to null.
  const expanded = expandEnvVarsDeep(raw ?? {}, env);

  try {
    const config = configSchema.parse(expanded);
    log.debug(`Config loaded from ${expandedPath}`);
    return config;
  } catch (err) {
    if (err instanceof ZodError) {
      throw new DnsSwapError(formatZodError(err), "CONFIG_INVALID", err.issues);
    }
    throw err;
  }
}

export function formatZodError(error: ZodError): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `Config validation failed:\n${lines.join("\n")}`;
}
