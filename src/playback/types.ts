import type { StyleSet } from "../markup/types.js";

// =============================================================================
// Signals
// =============================================================================

export type PlaybackSignal =
  | { type: "advance" }
  | { type: "back" }
  | { type: "first" }
  | { type: "jump"; page: number }
  | { type: "redraw" }
  | { type: "quit" };

export type PlaybackSignalType = PlaybackSignal["type"];

/**
 * Source of advance/quit requests. `next` suspends playback until a signal
 * is available.
 */
export interface SignalSource {
  next(): Promise<PlaybackSignal>;
}

// =============================================================================
// Engine state
// =============================================================================

export type PlaybackState = "idle" | "rendering" | "awaiting_advance" | "finished";

export type FinishReason = "end" | "quit";

export interface PlaybackResult {
  reason: FinishReason;
  /** 0-indexed pages in the order they were rendered */
  pagesShown: number[];
}

// =============================================================================
// Terminal sink
// =============================================================================

export interface PageStatus {
  /** 1-indexed */
  page: number;
  total: number;
  name: string;
  header?: string;
  footer?: string;
  /** The page is drawn inside a frame two columns narrower than the terminal */
  border?: boolean;
}

/**
 * Output collaborator. Attributes are absolute: `setAttributes` replaces the
 * whole attribute state, it does not toggle individual flags.
 */
export interface TerminalSink {
  readonly columns: number;
  clear(): void;
  /** Move the cursor to `column` on the current line */
  cursorTo(column: number): void;
  setAttributes(style: StyleSet): void;
  resetAttributes(): void;
  write(text: string): void;
  newline(): void;
  setStatus(status: PageStatus): void;
  flush(): void;
}

// =============================================================================
// Events
// =============================================================================

export type PlaybackEvent =
  | { type: "playback_start"; totalPages: number; timestamp: number }
  | { type: "page_rendered"; page: number; totalPages: number; name: string; step: number; timestamp: number }
  | { type: "signal"; signal: PlaybackSignal; state: PlaybackState; timestamp: number }
  | { type: "playback_finished"; reason: FinishReason; pagesShown: number; timestamp: number };

export type PlaybackEventCallback = (event: PlaybackEvent) => void;
