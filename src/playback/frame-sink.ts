import { DEFAULT_STYLE, styleEquals } from "../markup/types.js";
import type { StyleSet } from "../markup/types.js";
import type { PageStatus, TerminalSink } from "./types.js";

export interface FrameSegment {
  text: string;
  style: StyleSet;
}

export type FrameLine = FrameSegment[];

export interface Frame {
  lines: FrameLine[];
  status: PageStatus | null;
  columns: number;
}

/**
 * TerminalSink that records output into frames (lines of styled segments)
 * for the Ink presenter. `flush` publishes the current frame.
 */
export class FrameSink implements TerminalSink {
  private lines: FrameLine[] = [[]];
  private style: StyleSet = DEFAULT_STYLE;
  private status: PageStatus | null = null;
  private width: number;
  private readonly onFrame?: (frame: Frame) => void;

  constructor(columns: number, onFrame?: (frame: Frame) => void) {
    this.width = Math.max(1, columns);
    this.onFrame = onFrame;
  }

  get columns(): number {
    return this.width;
  }

  resize(columns: number): void {
    this.width = Math.max(1, columns);
  }

  clear(): void {
    this.lines = [[]];
    this.status = null;
  }

  cursorTo(column: number): void {
    const length = this.currentLineLength();
    if (column > length) {
      this.append(" ".repeat(column - length), DEFAULT_STYLE);
    }
  }

  setAttributes(style: StyleSet): void {
    this.style = style;
  }

  resetAttributes(): void {
    this.style = DEFAULT_STYLE;
  }

  write(text: string): void {
    if (text) this.append(text, this.style);
  }

  newline(): void {
    this.lines.push([]);
  }

  setStatus(status: PageStatus): void {
    this.status = status;
  }

  flush(): void {
    this.onFrame?.(this.frame);
  }

  /** Snapshot of the current frame, without the empty line after a final newline */
  get frame(): Frame {
    const lines = this.lines.map((line) => line.map((segment) => ({ ...segment })));
    if (lines.length > 1 && lines[lines.length - 1].length === 0) {
      lines.pop();
    }
    return { lines, status: this.status, columns: this.width };
  }

  private currentLineLength(): number {
    return this.lines[this.lines.length - 1].reduce((sum, segment) => sum + Array.from(segment.text).length, 0);
  }

  private append(text: string, style: StyleSet): void {
    const line = this.lines[this.lines.length - 1];
    const last = line[line.length - 1];
    if (last && styleEquals(last.style, style)) {
      last.text += text;
    } else {
      line.push({ text, style });
    }
  }
}
