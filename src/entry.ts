#!/usr/bin/env node
/**
 * dnsswap entry point
 */

import { program } from "commander";
import { join, dirname } from "node:path";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { runApp } from "./app.js";
import { createDefaultSessionIO } from "./session/io.js";
import { defaultConfigPath } from "./utils/paths.js";
import { logger } from "./utils/logger.js";

const log = logger;

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")) as {
  name: string;
  version: string;
};

const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
if (Number.isNaN(nodeMajor) || nodeMajor < 20) {
  log.error(`Node.js ${process.versions.node} is not supported. Please upgrade to >= 20.0.0.`);
  process.exit(1);
}

program
  .name("dnsswap")
  .description("Switch the DNS servers of the active NetworkManager connection")
  .version(pkg.version)
  .option(
    "-c, --config <path>",
    "Config file path (default: ~/.config/dnsswap/config.yaml)",
    defaultConfigPath(),
  )
  .action(async (options: { config: string }) => {
    const { io, close } = createDefaultSessionIO();
    let code: number;
    try {
      code = await runApp({ configPath: options.config, io });
    } catch (err) {
      log.error("dnsswap failed", err);
      code = 1;
    } finally {
      close();
    }
    process.exit(code);
  });

await program.parseAsync();
