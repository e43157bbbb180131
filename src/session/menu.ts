import { errorMessage, isDnsSwapError } from "../errors.js";
import {
  exitSession,
  selectProvider,
  setAutomaticDns,
  setCustomDns,
  showCurrentDns,
  type LoopResult,
  type MenuAction,
} from "./actions.js";
import type { Session } from "./session.js";

export const EXIT_OK = 0;
export const EXIT_INPUT_CLOSED = 1;

export interface MenuItem {
  label: string;
  action: MenuAction;
}

export const MENU_ITEMS: readonly MenuItem[] = [
  { label: "Select DNS Provider", action: selectProvider },
  { label: "Custom DNS", action: setCustomDns },
  { label: "Automatic DNS (Router)", action: setAutomaticDns },
  { label: "Show Current DNS", action: showCurrentDns },
  { label: "Exit", action: exitSession },
];

/** One banner + prompt + dispatch. Errors propagate to the loop. */
export async function showMenu(session: Session): Promise<LoopResult> {
  const { io } = session;
  io.header("dnsswap - DNS switcher");
  io.print(`Current Connection: ${session.connection}`);
  io.print("");

  const index = await io.selectOption(
    "Choose an option",
    MENU_ITEMS.map((item) => item.label),
  );
  const item = MENU_ITEMS[index];
  if (!item) return "continue";
  return item.action(session);
}

/**
 * Prompt until the user picks Exit. Action errors are printed and the
 * menu is shown again; only a closed input stream ends the loop early.
 * Resolves to the process exit code.
 */
export async function runMenuLoop(session: Session): Promise<number> {
  const { io } = session;
  while (true) {
    let result: LoopResult;
    try {
      result = await showMenu(session);
    } catch (err) {
      if (isDnsSwapError(err, "INPUT_CLOSED")) {
        io.error("Error: input closed");
        return EXIT_INPUT_CLOSED;
      }
      io.error(`Error: ${errorMessage(err)}`);
      result = "continue";
    }

    if (result === "exit") return EXIT_OK;
    io.print("");
  }
}
