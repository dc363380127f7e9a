import type { CheckResult } from "./types.js";

export type LoopState =
  | { kind: "prompting" }
  | { kind: "reviewing_pages" }
  | { kind: "reviewing_details" }
  | { kind: "showing_help" }
  | { kind: "reloading" }
  | { kind: "repairing" }
  | { kind: "done"; result: CheckResult };

export const COMMAND_KEYS = "y,a,r,p,d,?";

const PROMPTING: LoopState = { kind: "prompting" };

/** Where a single operator answer leads. End of input counts as abort. */
export function stateForCommand(command: string | null): LoopState {
  switch (command) {
    case null:
    case "a":
      return { kind: "done", result: "aborted" };
    case "y":
      return { kind: "repairing" };
    case "r":
      return { kind: "reloading" };
    case "p":
      return { kind: "reviewing_pages" };
    case "d":
      return { kind: "reviewing_details" };
    default:
      return { kind: "showing_help" };
  }
}

export function stateAfterScan(remaining: number): LoopState {
  return remaining === 0 ? { kind: "done", result: "ok" } : PROMPTING;
}

export type DecisionLoopHooks = {
  ask(): Promise<string | null>;
  // both return the number of records still found afterwards
  repair(): Promise<number>;
  reload(): Promise<number>;
  showPages(): Promise<void>;
  showDetails(): Promise<void>;
  showHelp(): void;
};

/** Runs until a terminal state is reached; there is no iteration limit. */
export async function runDecisionLoop(hooks: DecisionLoopHooks): Promise<CheckResult> {
  let state: LoopState = PROMPTING;
  for (;;) {
    switch (state.kind) {
      case "done":
        return state.result;
      case "prompting":
        state = stateForCommand(await hooks.ask());
        break;
      case "repairing":
        state = stateAfterScan(await hooks.repair());
        break;
      case "reloading":
        state = stateAfterScan(await hooks.reload());
        break;
      case "reviewing_pages":
        await hooks.showPages();
        state = PROMPTING;
        break;
      case "reviewing_details":
        await hooks.showDetails();
        state = PROMPTING;
        break;
      case "showing_help":
        hooks.showHelp();
        state = PROMPTING;
        break;
    }
  }
}
