import { loadConfig } from "./config/loader.js";
import type { Config } from "./config/schema.js";
import { errorMessage } from "./errors.js";
import { NmcliClient } from "./network/nmcli.js";
import type { SessionIO } from "./session/io.js";
import { runMenuLoop } from "./session/menu.js";
import { createSession } from "./session/session.js";
import { systemRunner, type CommandRunner } from "./system/exec.js";
import { logger } from "./utils/logger.js";

const log = logger;

export const EXIT_STARTUP_FAILED = 1;

export interface RunAppOptions {
  configPath: string;
  io: SessionIO;
  runner?: CommandRunner;
  /** Defaults to process.getuid(); root never needs the sudo prefix. */
  isRoot?: boolean;
}

export function createNmcliClient(config: Config, runner: CommandRunner, isRoot: boolean): NmcliClient {
  return new NmcliClient(runner, {
    binary: config.nmcli,
    sudo: config.sudo && !isRoot,
    sudoCommand: config.sudoCommand,
  });
}

/**
 * Load config, discover the active connection and run the menu.
 * Resolves to the process exit code; never exits the process itself.
 */
export async function runApp(opts: RunAppOptions): Promise<number> {
  const runner = opts.runner ?? systemRunner;
  const isRoot = opts.isRoot ?? process.getuid?.() === 0;

  let config: Config;
  try {
    config = await loadConfig(opts.configPath);
  } catch (err) {
    log.error(`Failed to load config: ${errorMessage(err)}`);
    return EXIT_STARTUP_FAILED;
  }

  const nmcli = createNmcliClient(config, runner, isRoot);

  try {
    const session = await createSession({ nmcli, runner, io: opts.io, config });
    return await runMenuLoop(session);
  } catch (err) {
    log.fatal(`Cannot start: ${errorMessage(err)}`);
    return EXIT_STARTUP_FAILED;
  }
}
