import type { Frame } from "../playback/frame-sink.js";
import type { FinishReason } from "../playback/types.js";

// Presenter state machine
export type PresenterMode = "presenting" | "jump" | "help" | "finished";

export interface PresenterState {
  mode: PresenterMode;
  frame: Frame | null;
  jumpInput: string;
  /** Message shown after an invalid jump */
  notice: string | null;
  finishReason: FinishReason | null;
}

export type PresenterAction =
  | { type: "SHOW_FRAME"; frame: Frame }
  | { type: "OPEN_JUMP" }
  | { type: "SET_JUMP_INPUT"; value: string }
  | { type: "CLOSE_JUMP"; notice?: string }
  | { type: "TOGGLE_HELP" }
  | { type: "FINISHED"; reason: FinishReason };

export const initialPresenterState: PresenterState = {
  mode: "presenting",
  frame: null,
  jumpInput: "",
  notice: null,
  finishReason: null,
};
