import type { PlaybackEvent, PlaybackEventCallback } from "../../playback/types.js";

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type PlaybackEventInput = DistributiveOmit<PlaybackEvent, "timestamp">;

// Helper to emit events with timestamp
export function emit(callback: PlaybackEventCallback | undefined, event: PlaybackEventInput): void {
  if (!callback) return;
  callback({ ...event, timestamp: Date.now() });
}
