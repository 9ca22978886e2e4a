import { emit } from "../core/events/emit.js";
import { DEFAULT_STYLE } from "../markup/types.js";
import type { Block, Document, PauseBlock, StyleSet } from "../markup/types.js";
import { resolveDisplayDate } from "./date.js";
import { DEFAULT_INDENT, alignColumn, lineLength, textWidth, wrapRuns, wrapText } from "./layout.js";
import type {
  FinishReason,
  PlaybackEventCallback,
  PlaybackResult,
  PlaybackSignal,
  PlaybackState,
  SignalSource,
  TerminalSink,
} from "./types.js";

export interface PlaybackOptions {
  /** Left/right margin in columns (default: 3) */
  indent?: number;
  onEvent?: PlaybackEventCallback;
  /** Clock used to resolve the "today" date */
  now?: () => Date;
  /** Timer used for `--sleep` pauses */
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const BOLD: StyleSet = { ...DEFAULT_STYLE, bold: true };

/**
 * Walks a compiled document page by page. Rendering is synchronous; the
 * engine only suspends while waiting for the next signal.
 */
export class PlaybackEngine {
  private currentState: PlaybackState = "idle";
  private pageIndex = 0;
  /** Pauses already passed on the current page */
  private step = 0;
  private stoppedAt: PauseBlock | null = null;
  private finishReason: FinishReason | null = null;
  private readonly shown: number[] = [];
  private readonly indent: number;
  /** Drawing width of the current page; a border takes one column per side */
  private columns = 0;

  constructor(
    private readonly document: Document,
    private readonly sink: TerminalSink,
    private readonly options: PlaybackOptions = {}
  ) {
    this.indent = options.indent ?? DEFAULT_INDENT;
  }

  get state(): PlaybackState {
    return this.currentState;
  }

  get currentPage(): number {
    return this.pageIndex;
  }

  get totalPages(): number {
    return this.document.pages.length;
  }

  async run(signals: SignalSource): Promise<PlaybackResult> {
    if (this.state !== "idle") {
      throw new Error(`Playback already started (state: ${this.currentState})`);
    }

    emit(this.options.onEvent, { type: "playback_start", totalPages: this.totalPages });
    this.renderPage(0);

    while (this.currentState !== "finished") {
      const seconds = this.stoppedAt?.seconds;
      if (seconds !== undefined) {
        await (this.options.sleep ?? defaultSleep)(seconds * 1000);
        this.reveal();
        continue;
      }

      const signal = await signals.next();
      emit(this.options.onEvent, { type: "signal", signal, state: this.currentState });
      this.handle(signal);
    }

    return this.result();
  }

  /**
   * Apply one signal. Signals that do not lead anywhere (back on the first
   * page, jumps out of range, anything after finishing) are ignored.
   */
  handle(signal: PlaybackSignal): void {
    if (this.currentState === "finished") return;

    switch (signal.type) {
      case "quit":
        this.finish("quit");
        return;

      case "advance":
        if (this.stoppedAt) {
          this.reveal();
        } else if (this.pageIndex + 1 < this.totalPages) {
          this.renderPage(this.pageIndex + 1);
        } else {
          this.finish("end");
        }
        return;

      case "back":
        if (this.pageIndex > 0) {
          this.renderPage(this.pageIndex - 1);
        }
        return;

      case "first":
        this.renderPage(0);
        return;

      case "jump":
        if (Number.isInteger(signal.page) && signal.page >= 0 && signal.page < this.totalPages) {
          this.renderPage(signal.page);
        }
        return;

      case "redraw":
        this.draw();
        return;
    }
  }

  result(): PlaybackResult {
    return { reason: this.finishReason ?? "quit", pagesShown: [...this.shown] };
  }

  private finish(reason: FinishReason): void {
    this.currentState = "finished";
    this.finishReason = reason;
    emit(this.options.onEvent, { type: "playback_finished", reason, pagesShown: this.shown.length });
  }

  private renderPage(index: number): void {
    this.pageIndex = index;
    this.step = 0;
    this.shown.push(index);
    this.draw();
  }

  /** Show the rest of the page up to its next pause */
  private reveal(): void {
    this.step++;
    this.draw();
  }

  /**
   * Draw the current page from the top, stopping at the pause that follows
   * `step` earlier ones.
   */
  private draw(): void {
    this.currentState = "rendering";
    const index = this.pageIndex;
    const page = this.document.pages[index];
    const sink = this.sink;
    this.columns = page.border ? Math.max(0, sink.columns - 2) : sink.columns;
    sink.clear();

    let first = true;
    const separate = () => {
      if (!first) sink.newline();
      first = false;
    };

    if (index === 0) {
      for (const entry of this.titleCard()) {
        separate();
        this.renderCentered(entry.text, entry.style);
      }
    }

    let passed = 0;
    this.stoppedAt = null;
    for (const block of page.blocks) {
      if (block.kind === "pause") {
        if (passed === this.step) {
          this.stoppedAt = block;
          break;
        }
        passed++;
        continue;
      }
      separate();
      this.renderBlock(block);
    }

    sink.resetAttributes();
    sink.setStatus({
      page: index + 1,
      total: this.totalPages,
      name: page.name,
      ...(page.header !== undefined ? { header: page.header } : {}),
      ...(page.footer !== undefined ? { footer: page.footer } : {}),
      ...(page.border ? { border: true } : {}),
    });
    sink.flush();

    this.currentState = this.stoppedAt?.seconds !== undefined ? "rendering" : "awaiting_advance";
    emit(this.options.onEvent, {
      type: "page_rendered",
      page: index + 1,
      totalPages: this.totalPages,
      name: page.name,
      step: this.step,
    });
  }

  private titleCard(): Array<{ text: string; style: StyleSet }> {
    const { title, author, date } = this.document;
    const entries: Array<{ text: string; style: StyleSet }> = [];
    if (title !== undefined) entries.push({ text: title, style: BOLD });
    if (author !== undefined) entries.push({ text: author, style: DEFAULT_STYLE });
    if (date !== undefined) {
      const now = this.options.now ? this.options.now() : new Date();
      entries.push({ text: resolveDisplayDate(date, now), style: DEFAULT_STYLE });
    }
    return entries;
  }

  private renderBlock(block: Block): void {
    switch (block.kind) {
      case "heading":
        this.renderCentered(block.text, BOLD);
        return;

      case "paragraph": {
        const width = textWidth(this.columns, this.indent);
        for (const line of wrapRuns(block.runs, width)) {
          this.sink.cursorTo(alignColumn(lineLength(line), block.align, this.columns, this.indent));
          for (const run of line) {
            this.sink.setAttributes(run.style);
            this.sink.write(run.text);
          }
          this.sink.newline();
        }
        return;
      }

      case "verbatim":
        this.renderVerbatim(block.lines);
        return;

      case "rule":
        this.sink.cursorTo(0);
        this.sink.setAttributes(BOLD);
        this.sink.write("-".repeat(this.columns));
        this.sink.newline();
        return;

      case "pause":
        return;
    }
  }

  private renderCentered(text: string, style: StyleSet): void {
    const width = textWidth(this.columns, this.indent);
    for (const line of wrapText(text, width)) {
      this.sink.cursorTo(alignColumn(Array.from(line).length, "center", this.columns, this.indent));
      this.sink.setAttributes(style);
      this.sink.write(line);
      this.sink.newline();
    }
  }

  private renderVerbatim(lines: readonly string[]): void {
    const width = textWidth(this.columns, this.indent);
    const rule = "-".repeat(Math.max(0, width - 2));
    const sink = this.sink;

    sink.setAttributes(DEFAULT_STYLE);
    sink.cursorTo(this.indent);
    sink.write(`.${rule}.`);
    sink.newline();
    for (const line of lines) {
      for (const part of wrapText(line, width - 4)) {
        sink.cursorTo(this.indent);
        sink.write(`| ${part.padEnd(width - 4)} |`);
        sink.newline();
      }
    }
    sink.cursorTo(this.indent);
    sink.write(`\`${rule}'`);
    sink.newline();
  }
}

/**
 * Play `document` to `sink` until the last page is advanced past or a quit
 * signal arrives. Quitting is a normal outcome, not an error.
 */
export function play(
  document: Document,
  sink: TerminalSink,
  signals: SignalSource,
  options: PlaybackOptions = {}
): Promise<PlaybackResult> {
  return new PlaybackEngine(document, sink, options).run(signals);
}
