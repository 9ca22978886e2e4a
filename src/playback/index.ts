/**
 * Page playback engine and its collaborators
 */

export * from "./types.js";
export { PlaybackEngine, play, type PlaybackOptions } from "./engine.js";
export { FrameSink, type Frame, type FrameLine, type FrameSegment } from "./frame-sink.js";
export { SignalQueue, AutoAdvanceSource, scriptedSignals } from "./signals.js";
export { PlaybackSession, type PlaybackSessionOptions } from "./session.js";
export { wrapRuns, wrapText, alignColumn, lineLength, textWidth, DEFAULT_INDENT, type LayoutLine } from "./layout.js";
export { resolveDisplayDate, formatShortDate, TODAY_SENTINEL } from "./date.js";
