import type { StopwatchCommand } from "../tools/stopwatchTool.js";
import type { StopwatchSnapshot } from "../types.js";

export interface Keypress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
}

export interface KeyState extends Pick<StopwatchSnapshot, "status" | "activeSplit"> {
  splitsFull: boolean;
}

export type KeyAction =
  | { kind: "command"; command: StopwatchCommand; prompt?: string }
  | { kind: "redraw" }
  | { kind: "quit" };

/**
 * Maps a keypress to what the terminal front end should do. A name prompt is
 * attached only when the command would be accepted, so a rejected command never
 * asks for input first.
 */
export function actionForKey(key: Keypress, state: KeyState): KeyAction | null {
  if (key.ctrl && key.name === "c") {
    return { kind: "quit" };
  }
  if (key.ctrl) {
    return null;
  }

  switch (key.name ?? key.sequence) {
    case "s":
      return state.status === "idle"
        ? { kind: "command", command: { action: "start" }, prompt: "Enter main goal: " }
        : { kind: "command", command: { action: "start" } };
    case "r":
      return { kind: "command", command: { action: "reset" } };
    case "g":
      return withPrompt(
        { action: "open_split", nested: false },
        state.status === "running" && !state.splitsFull,
        "Enter subgoal name: "
      );
    case "n":
      return withPrompt(
        { action: "open_split", nested: true },
        state.status === "running" && state.activeSplit !== null && !state.splitsFull,
        "Enter nested subgoal name: "
      );
    case "h":
      return { kind: "command", command: { action: "close_split" } };
    case "u":
      return { kind: "command", command: { action: "move_up" } };
    case "t":
      return { kind: "command", command: { action: "save" } };
    case "d":
      return { kind: "redraw" };
    case "q":
      return { kind: "quit" };
    default:
      return null;
  }
}

function withPrompt(command: StopwatchCommand, accepted: boolean, prompt: string): KeyAction {
  return accepted ? { kind: "command", command, prompt } : { kind: "command", command };
}
