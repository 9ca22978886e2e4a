import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { PlaybackEvent } from "../../playback/types.js";

export interface JsonEventLoggerOptions {
  filePath: string;
  sessionId: string;
  /** Called once, on the first failed write */
  onError?: (error: Error) => void;
}

export interface JsonEventLogger {
  log: (event: PlaybackEvent) => void;
  /** Resolves when every queued line has been written */
  flush: () => Promise<void>;
}

/**
 * Append playback events to a JSONL file. Writes are chained so lines keep
 * their emission order.
 */
export function createJsonEventLogger(options: JsonEventLoggerOptions): JsonEventLogger {
  const { filePath, sessionId } = options;
  let reported = false;
  let queue: Promise<void> = mkdir(dirname(filePath), { recursive: true }).then(() => undefined);

  const report = (error: unknown) => {
    if (reported) return;
    reported = true;
    const normalized = error instanceof Error ? error : new Error(String(error));
    if (options.onError) {
      options.onError(normalized);
    } else {
      console.error(`Event log disabled: ${normalized.message}`);
    }
  };

  queue = queue.catch(report);

  return {
    log: (event: PlaybackEvent) => {
      const payload = { ...event, sessionId };
      queue = queue
        .then(() => {
          if (reported) return;
          return appendFile(filePath, `${JSON.stringify(payload)}\n`, "utf-8");
        })
        .catch(report);
    },
    flush: () => queue,
  };
}
