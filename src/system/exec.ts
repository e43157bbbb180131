import { spawn } from "node:child_process";
import { createLogger } from "../utils/logger.js";

const log = createLogger("exec");

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** stdout decoded as UTF-8 (invalid bytes become U+FFFD) */
  stdout: string;
  /** stdout as received, for callers that must reject invalid text */
  stdoutBytes: Buffer;
  stderr: string;
  durationMs: number;
}

/**
 * Process boundary used by everything that talks to nmcli or resolvectl.
 * Neither method rejects on a non-zero exit or a spawn failure; callers
 * decide what a failure means.
 */
export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
  /** Run with the terminal's stdio attached. Resolves to the exit code. */
  passthrough(command: string, args: string[]): Promise<number | null>;
}

export function runCommand(command: string, args: string[]): Promise<CommandResult> {
  const started = Date.now();
  log.debug(`exec: ${command} ${args.join(" ")}`);

  return new Promise<CommandResult>((resolvePromise) => {
    const child = spawn(command, args, {
      shell: false,
      windowsHide: true,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    child.stdout?.on("data", (d) => stdoutChunks.push(Buffer.from(d)));
    child.stderr?.on("data", (d) => stderrChunks.push(Buffer.from(d)));

    // "error" (e.g. ENOENT) may be followed by "close"; only the first one counts.
    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      resolvePromise({
        exitCode: null,
        signal: null,
        stdout: "",
        stdoutBytes: Buffer.alloc(0),
        stderr: err.message,
        durationMs: Date.now() - started,
      });
    });

    child.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      const durationMs = Date.now() - started;
      log.debug(`exit ${code ?? signal} after ${durationMs}ms: ${command}`);
      const stdoutBytes = Buffer.concat(stdoutChunks);
      resolvePromise({
        exitCode: code,
        signal,
        stdout: stdoutBytes.toString("utf8"),
        stdoutBytes,
        stderr: Buffer.concat(stderrChunks).toString("utf8"),
        durationMs,
      });
    });
  });
}

export function runPassthrough(command: string, args: string[]): Promise<number | null> {
  log.debug(`exec (inherit): ${command} ${args.join(" ")}`);

  return new Promise<number | null>((resolvePromise) => {
    const child = spawn(command, args, { shell: false, stdio: "inherit" });
    let settled = false;

    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      log.debug(`${command} could not be started: ${err.message}`);
      resolvePromise(null);
    });
    child.on("close", (code) => {
      if (settled) return;
      settled = true;
      resolvePromise(code);
    });
  });
}

export const systemRunner: CommandRunner = {
  run: runCommand,
  passthrough: runPassthrough,
};
