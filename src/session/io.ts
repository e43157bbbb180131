import { createInterface } from "node:readline";
import { DnsSwapError } from "../errors.js";

export const COLORS = {
  RED: "\x1b[0;31m",
  GREEN: "\x1b[0;32m",
  YELLOW: "\x1b[1;33m",
  CYAN: "\x1b[0;36m",
  NC: "\x1b[0m",
};

/** Everything the menu loop needs from the terminal. */
export interface SessionIO {
  print: (msg: string) => void;
  header: (title: string) => void;
  success: (msg: string) => void;
  warn: (msg: string) => void;
  /** Written to stderr verbatim. */
  error: (msg: string) => void;
  /** Resolves to the zero-based index of the chosen option. */
  selectOption: (prompt: string, options: readonly string[]) => Promise<number>;
  ask: (question: string) => Promise<string>;
}

type RL = ReturnType<typeof createInterface>;

function uiSuccess(msg: string): void { console.log(`${COLORS.GREEN}✓${COLORS.NC} ${msg}`); }
function uiWarn(msg: string): void { console.log(`${COLORS.YELLOW}!${COLORS.NC} ${msg}`); }
function uiError(msg: string): void { console.error(msg); }
function uiHeader(title: string): void {
  const rule = "=".repeat(40);
  console.log(`${COLORS.CYAN}${rule}${COLORS.NC}`);
  console.log(`${COLORS.CYAN}${title.padStart(Math.floor((40 + title.length) / 2))}${COLORS.NC}`);
  console.log(`${COLORS.CYAN}${rule}${COLORS.NC}`);
}

/**
 * Prompt on `rl` and resolve to the raw answer (no trimming).
 * Rejects with INPUT_CLOSED once the interface is closed, whether the
 * question was pending at the time or asked afterwards.
 */
export function createAsk(rl: RL): (q: string) => Promise<string> {
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return (q: string): Promise<string> =>
    new Promise((resolve, reject) => {
      if (closed) {
        reject(new DnsSwapError("input closed", "INPUT_CLOSED"));
        return;
      }
      const onClose = () => reject(new DnsSwapError("input closed", "INPUT_CLOSED"));
      rl.once("close", onClose);
      rl.question(q, (ans) => {
        rl.removeListener("close", onClose);
        resolve(ans);
      });
    });
}

export interface SelectOptionDeps {
  ask: (q: string) => Promise<string>;
  print?: (msg: string) => void;
  warn?: (msg: string) => void;
}

/** Numbered menu; re-prompts until the answer is a number in range. */
export async function selectOption(
  deps: SelectOptionDeps,
  prompt: string,
  options: readonly string[],
): Promise<number> {
  const print = deps.print ?? ((msg: string) => console.log(msg));
  const warn = deps.warn ?? uiWarn;
  print(prompt);
  options.forEach((opt, i) => print(`  ${i + 1}) ${opt}`));
  while (true) {
    const ans = (await deps.ask(`Pick a number [1-${options.length}]: `)).trim();
    const num = /^\d+$/.test(ans) ? Number.parseInt(ans, 10) : Number.NaN;
    if (num >= 1 && num <= options.length) return num - 1;
    warn(`Please type a number between 1 and ${options.length}.`);
  }
}

export function createReadlineSessionIO(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): { io: SessionIO; close: () => void } {
  const rl = createInterface({ input, output });
  const ask = createAsk(rl);
  return {
    io: {
      print: (msg) => console.log(msg),
      header: uiHeader,
      success: uiSuccess,
      warn: uiWarn,
      error: uiError,
      selectOption: (prompt, options) => selectOption({ ask }, prompt, options),
      ask,
    },
    close: () => rl.close(),
  };
}

export function createDefaultSessionIO(): { io: SessionIO; close: () => void } {
  return createReadlineSessionIO(process.stdin, process.stdout);
}
