import type { Document } from "../markup/types.js";
import { play } from "./engine.js";
import { FrameSink, type Frame } from "./frame-sink.js";
import { AutoAdvanceSource, SignalQueue } from "./signals.js";
import type { PlaybackEventCallback, PlaybackResult, PlaybackSignal } from "./types.js";

export interface PlaybackSessionOptions {
  document: Document;
  columns: number;
  indent: number;
  /** Seconds between automatic advances; null waits for keys */
  autoplaySeconds: number | null;
  onFrame: (frame: Frame) => void;
  onEvent?: PlaybackEventCallback;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * One playback run wired to a signal queue and a frame sink. Signals sent
 * before `start` are buffered; `close` ends playback with quit.
 */
export class PlaybackSession {
  private readonly queue = new SignalQueue();
  private readonly sink: FrameSink;
  private running: Promise<PlaybackResult> | null = null;

  constructor(private readonly options: PlaybackSessionOptions) {
    this.sink = new FrameSink(options.columns, (frame) => options.onFrame(frame));
  }

  get columns(): number {
    return this.sink.columns;
  }

  get isClosed(): boolean {
    return this.queue.isClosed;
  }

  /** Start playback once; later calls return the same run */
  start(): Promise<PlaybackResult> {
    if (!this.running) {
      const { document, indent, autoplaySeconds, onEvent, sleep } = this.options;
      const source = autoplaySeconds !== null ? new AutoAdvanceSource(this.queue, autoplaySeconds * 1000) : this.queue;
      this.running = play(document, this.sink, source, { indent, onEvent, sleep });
    }
    return this.running;
  }

  send(signal: PlaybackSignal): void {
    this.queue.push(signal);
  }

  /** Re-layout the current page at a new width */
  resize(columns: number): void {
    if (this.sink.columns === columns) return;
    this.sink.resize(columns);
    this.queue.push({ type: "redraw" });
  }

  close(): void {
    this.queue.close();
  }
}
