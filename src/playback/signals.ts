import type { PlaybackSignal, SignalSource } from "./types.js";

const QUIT: PlaybackSignal = { type: "quit" };
const ADVANCE: PlaybackSignal = { type: "advance" };

type Waiter = (signal: PlaybackSignal) => void;

/**
 * Push-based signal source fed by the key handler. Signals pushed while
 * nobody waits are buffered in order. Once closed, every wait resolves with
 * quit.
 */
export class SignalQueue implements SignalSource {
  private readonly pending: PlaybackSignal[] = [];
  private waiters: Waiter[] = [];
  private closed = false;

  get size(): number {
    return this.pending.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(signal: PlaybackSignal): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(signal);
    } else {
      this.pending.push(signal);
    }
  }

  next(): Promise<PlaybackSignal> {
    const buffered = this.take();
    if (buffered) return Promise.resolve(buffered);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Wait at most `timeoutMs` for a pushed signal, then resolve with
   * `fallback` instead.
   */
  nextWithin(timeoutMs: number, fallback: PlaybackSignal): Promise<PlaybackSignal> {
    const buffered = this.take();
    if (buffered) return Promise.resolve(buffered);

    return new Promise((resolve) => {
      const waiter: Waiter = (signal) => {
        clearTimeout(timer);
        resolve(signal);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(fallback);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.pending.length = 0;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(QUIT);
  }

  private take(): PlaybackSignal | null {
    const signal = this.pending.shift();
    if (signal) return signal;
    return this.closed ? QUIT : null;
  }
}

/**
 * Timed playback: advances every `intervalMs` unless a key signal arrives
 * first, which is then delivered as-is.
 */
export class AutoAdvanceSource implements SignalSource {
  readonly intervalMs: number;
  private readonly queue: SignalQueue;

  constructor(queue: SignalQueue, intervalMs: number) {
    this.queue = queue;
    this.intervalMs = intervalMs;
  }

  next(): Promise<PlaybackSignal> {
    return this.queue.nextWithin(this.intervalMs, ADVANCE);
  }
}

/** Fixed script of signals; ends with quit once exhausted */
export function scriptedSignals(signals: readonly PlaybackSignal[]): SignalSource {
  let index = 0;
  return {
    next: () => Promise.resolve(signals[index++] ?? QUIT),
  };
}
