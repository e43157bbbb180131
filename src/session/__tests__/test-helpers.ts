import { defaultConfig, type Config } from "../../config/schema.js";
import { DNS_PROVIDERS } from "../../dns/providers.js";
import { NmcliClient } from "../../network/nmcli.js";
import type { CommandResult, CommandRunner } from "../../system/exec.js";
import type { SessionIO } from "../io.js";
import type { Session } from "../session.js";

export interface RecordedCall {
  command: string;
  args: string[];
  passthrough: boolean;
}

type Responder = (command: string, args: string[]) => Partial<CommandResult> | undefined;

/** In-process stand-in for child processes. Unmatched calls exit 0 with no output. */
export function createFakeRunner(respond: Responder = () => undefined) {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = {
    run: async (command, args) => {
      calls.push({ command, args, passthrough: false });
      const response = respond(command, args);
      const stdout = response?.stdout ?? "";
      return {
        exitCode: 0,
        signal: null,
        stdout,
        stdoutBytes: Buffer.from(stdout, "utf8"),
        stderr: "",
        durationMs: 0,
        ...response,
      };
    },
    passthrough: async (command, args) => {
      calls.push({ command, args, passthrough: true });
      return respond(command, args)?.exitCode ?? 0;
    },
  };
  return { runner, calls };
}

export function createTestNmcli(runner: CommandRunner): NmcliClient {
  return new NmcliClient(runner, { binary: "nmcli", sudo: true, sudoCommand: "sudo" });
}

export function createTestIO(opts: { selectAnswers?: number[]; askAnswers?: string[] } = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const sel = [...(opts.selectAnswers ?? [])];
  const answers = [...(opts.askAnswers ?? [])];
  const prompts: { prompt: string; options: readonly string[] }[] = [];

  const io: SessionIO = {
    print: (msg) => out.push(msg),
    header: (t) => out.push(`HEADER:${t}`),
    success: (msg) => out.push(`SUCCESS:${msg}`),
    warn: (msg) => out.push(`WARN:${msg}`),
    error: (msg) => err.push(msg),
    selectOption: async (prompt, options) => {
      prompts.push({ prompt, options });
      const v = sel.shift();
      if (v === undefined) throw new Error("Unexpected selectOption()");
      return v;
    },
    ask: async () => {
      const v = answers.shift();
      if (v === undefined) throw new Error("Unexpected ask()");
      return v;
    },
  };

  return { io, out, err, prompts };
}

export function createTestSession(opts: {
  runner: CommandRunner;
  io: SessionIO;
  connection?: string;
  config?: Partial<Config>;
}): Session {
  return {
    connection: opts.connection ?? "Home WiFi",
    providers: DNS_PROVIDERS,
    nmcli: createTestNmcli(opts.runner),
    runner: opts.runner,
    io: opts.io,
    config: { ...defaultConfig(), ...opts.config },
  };
}
