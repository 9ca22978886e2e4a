import { DEFAULT_STYLE } from "../markup/types.js";
import type { Alignment, StyleSet, StyledRun } from "../markup/types.js";

export const DEFAULT_INDENT = 3;

interface Unit {
  char: string;
  style: StyleSet;
}

/** One wrapped output line: consecutive runs, none of them spanning a break */
export type LayoutLine = StyledRun[];

/**
 * Split plain text into lines of at most `width` characters, breaking at the
 * last space that fits and cutting words that are longer than a line.
 */
export function wrapText(text: string, width: number): string[] {
  const units = Array.from(text, (char) => ({ char, style: DEFAULT_STYLE }));
  return wrapUnits(units, width).map((line) => line.map((unit) => unit.char).join(""));
}

function wrapUnits(units: Unit[], width: number): Unit[][] {
  const limit = Math.max(1, width);
  if (units.length === 0) return [[]];

  const lines: Unit[][] = [];
  let start = 0;
  while (start < units.length) {
    if (units.length - start <= limit) {
      lines.push(units.slice(start));
      break;
    }

    let breakAt = -1;
    for (let i = start + limit; i > start; i--) {
      if (units[i].char === " ") {
        breakAt = i;
        break;
      }
    }

    if (breakAt === -1) {
      lines.push(units.slice(start, start + limit));
      start += limit;
    } else {
      lines.push(units.slice(start, breakAt));
      start = breakAt + 1;
    }
  }
  return lines;
}

function unitsToRuns(units: Unit[]): StyledRun[] {
  const runs: StyledRun[] = [];
  let current: Unit[] = [];

  for (const unit of units) {
    if (current.length > 0 && current[0].style !== unit.style) {
      runs.push({ text: current.map((u) => u.char).join(""), style: current[0].style });
      current = [];
    }
    current.push(unit);
  }
  if (current.length > 0) {
    runs.push({ text: current.map((u) => u.char).join(""), style: current[0].style });
  }
  return runs;
}

/**
 * Lay out a paragraph's runs: hard breaks at "\n", soft wraps at `width`.
 * Run boundaries are kept; a run split by a wrap continues on the next line
 * with the same style.
 */
export function wrapRuns(runs: readonly StyledRun[], width: number): LayoutLine[] {
  const logical: Unit[][] = [[]];
  for (const run of runs) {
    for (const char of run.text) {
      if (char === "\n") {
        logical.push([]);
      } else {
        logical[logical.length - 1].push({ char, style: run.style });
      }
    }
  }

  return logical.flatMap((units) => wrapUnits(units, width).map(unitsToRuns));
}

export function lineLength(line: LayoutLine): number {
  return line.reduce((sum, run) => sum + Array.from(run.text).length, 0);
}

/**
 * Starting column for a line of `length` characters.
 */
export function alignColumn(length: number, align: Alignment, columns: number, indent: number): number {
  switch (align) {
    case "center":
      return Math.max(0, Math.floor((columns - length) / 2));
    case "right":
      return Math.max(0, columns - indent - length);
    case "left":
      return indent;
  }
}

export function textWidth(columns: number, indent: number): number {
  return Math.max(1, columns - 2 * indent);
}
