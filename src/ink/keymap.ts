import type { Key } from "ink";
import type { PlaybackSignal } from "../playback/types.js";

export type PresenterCommand =
  | { type: "signal"; signal: PlaybackSignal }
  | { type: "open_jump" }
  | { type: "toggle_help" }
  | { type: "none" };

export type KeyInfo = Pick<Key, "leftArrow" | "rightArrow" | "upArrow" | "downArrow" | "return" | "escape" | "ctrl">;

export const PRESENTER_HINTS = [
  { key: "space/→", label: "next" },
  { key: "←", label: "back" },
  { key: "g", label: "jump" },
  { key: "?", label: "help" },
  { key: "q", label: "quit" },
] as const;

export const HELP_ENTRIES = [
  { key: "space, enter, l, j, d, →, ↓", label: "next page" },
  { key: "h, k, a, b, ←, ↑", label: "previous page" },
  { key: "s", label: "first page" },
  { key: "g", label: "jump to page" },
  { key: "z", label: "redraw" },
  { key: "?", label: "show/hide this help" },
  { key: "q", label: "quit" },
] as const;

const signal = (value: PlaybackSignal): PresenterCommand => ({ type: "signal", signal: value });

/**
 * Translate a key press into a presenter command. Any printable key without a
 * binding advances, so a presenter can use whatever key is at hand.
 */
export function mapKey(input: string, key: KeyInfo): PresenterCommand {
  if (key.ctrl && input === "c") return signal({ type: "quit" });
  if (key.rightArrow || key.downArrow || key.return) return signal({ type: "advance" });
  if (key.leftArrow || key.upArrow) return signal({ type: "back" });
  if (key.escape || key.ctrl || input === "") return { type: "none" };

  switch (input) {
    case "q":
    case "Q":
      return signal({ type: "quit" });
    case "h":
    case "H":
    case "k":
    case "K":
    case "a":
    case "A":
    case "b":
    case "B":
      return signal({ type: "back" });
    case "s":
    case "S":
      return signal({ type: "first" });
    case "z":
    case "Z":
      return signal({ type: "redraw" });
    case "g":
    case "G":
      return { type: "open_jump" };
    case "?":
      return { type: "toggle_help" };
    default:
      return signal({ type: "advance" });
  }
}

/**
 * Parse the 1-indexed page typed into the jump prompt. Returns the 0-indexed
 * page, or null when the input is not a page of the document.
 */
export function parseJumpInput(value: string, totalPages: number): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const page = parseInt(trimmed, 10);
  if (page < 1 || page > totalPages) return null;
  return page - 1;
}
