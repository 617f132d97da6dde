import type { State } from "./state.js";

export interface Command {
  /** Rejects before any work is done when the command cannot run. */
  checkFastFails(args: string[], state: State): Promise<void>;
  execute(args: string[], state: State): Promise<void>;
}
