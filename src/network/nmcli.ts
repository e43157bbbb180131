/**
 * Thin client over the NetworkManager CLI.
 */

import type { CommandResult, CommandRunner } from "../system/exec.js";
import { DnsSwapError } from "../errors.js";

export interface NmcliOptions {
  /** nmcli binary name or path */
  binary: string;
  /** Prefix privileged calls with `sudoCommand` */
  sudo: boolean;
  sudoCommand: string;
}

export class NmcliClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: NmcliOptions,
  ) {}

  /** Read-only call, run as the current user. */
  query(args: string[]): Promise<CommandResult> {
    return this.runner.run(this.options.binary, args);
  }

  /** Privileged call whose outcome the caller classifies. */
  runPrivileged(args: string[]): Promise<CommandResult> {
    if (!this.options.sudo) {
      return this.runner.run(this.options.binary, args);
    }
    return this.runner.run(this.options.sudoCommand, [this.options.binary, ...args]);
  }

  /** Privileged call; a non-zero exit becomes COMMAND_FAILED. */
  async execute(args: string[]): Promise<CommandResult> {
    const result = await this.runPrivileged(args);
    if (result.exitCode !== 0) {
      throw new DnsSwapError(`Command failed: ${result.stderr.trim()}`, "COMMAND_FAILED", {
        args,
        exitCode: result.exitCode,
      });
    }
    return result;
  }
}
