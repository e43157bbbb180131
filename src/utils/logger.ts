/**
 * Logger utility
 */

import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogObj } from "tslog";

/** Optional file transport: if LOG_FILE is set, also append formatted lines. */
function buildAttachedTransports(): ((logObj: ILogObj) => void)[] {
  const logFile = process.env.LOG_FILE;
  if (!logFile) return [];

  try {
    mkdirSync(dirname(logFile), { recursive: true });
  } catch (err) {
    // The transport below reports its own write failures; keep going without it.
    console.error(`Cannot create log directory for ${logFile}: ${String(err)}`);
    return [];
  }

  return [
    (logObj: ILogObj) => {
      const parts = Object.values(logObj).filter(
        (v) => typeof v === "string" || typeof v === "number",
      );
      try {
        appendFileSync(logFile, `${new Date().toISOString()} ${parts.join(" ")}\n`);
      } catch (err) {
        // Never route this through the logger itself (it would recurse).
        process.stderr.write(`log file write failed: ${String(err)}\n`);
      }
    },
  ];
}

/** tslog level id for a LOG_LEVEL value; unknown or unset means info. */
export function resolveMinLevel(level: string | undefined): number {
  switch (level) {
    case "silly":
      return 0;
    case "trace":
      return 1;
    case "debug":
      return 2;
    case "warn":
      return 4;
    case "error":
      return 5;
    default:
      return 3; // info
  }
}

export const logger = new Logger({
  name: "dnsswap",
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  attachedTransports: buildAttachedTransports(),
});

export function createLogger(name: string) {
  return logger.getSubLogger({ name });
}
