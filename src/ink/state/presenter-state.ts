import type { PresenterAction, PresenterState } from "../types.js";

export function presenterReducer(state: PresenterState, action: PresenterAction): PresenterState {
  if (state.mode === "finished") {
    return state;
  }

  switch (action.type) {
    case "SHOW_FRAME":
      return { ...state, frame: action.frame, notice: null };

    case "OPEN_JUMP":
      return { ...state, mode: "jump", jumpInput: "", notice: null };

    case "SET_JUMP_INPUT":
      if (state.mode !== "jump") return state;
      return { ...state, jumpInput: action.value.replace(/\D/g, "") };

    case "CLOSE_JUMP":
      return { ...state, mode: "presenting", jumpInput: "", notice: action.notice ?? null };

    case "TOGGLE_HELP":
      if (state.mode === "jump") return state;
      return { ...state, mode: state.mode === "help" ? "presenting" : "help" };

    case "FINISHED":
      return { ...state, mode: "finished", finishReason: action.reason };

    default:
      return state;
  }
}
