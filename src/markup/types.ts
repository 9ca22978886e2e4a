/**
 * Document model and token types for the presentation markup
 */

// =============================================================================
// Styles
// =============================================================================

export const COLOR_NAMES = [
  "white",
  "yellow",
  "red",
  "green",
  "blue",
  "cyan",
  "magenta",
  "black",
  "default",
] as const;

export type ColorName = (typeof COLOR_NAMES)[number];

const COLOR_SET: ReadonlySet<string> = new Set(COLOR_NAMES);

export function isColorName(value: string): value is ColorName {
  return COLOR_SET.has(value);
}

/**
 * Resolved combination of character attributes at a point in text
 */
export interface StyleSet {
  readonly bold: boolean;
  readonly underline: boolean;
  readonly reverse: boolean;
  readonly color?: ColorName;
}

export const DEFAULT_STYLE: StyleSet = {
  bold: false,
  underline: false,
  reverse: false,
};

export function styleEquals(a: StyleSet, b: StyleSet): boolean {
  return a.bold === b.bold && a.underline === b.underline && a.reverse === b.reverse && a.color === b.color;
}

export interface StyledRun {
  readonly text: string;
  readonly style: StyleSet;
}

// =============================================================================
// Document
// =============================================================================

export type Alignment = "left" | "center" | "right";

export interface HeadingBlock {
  readonly kind: "heading";
  readonly text: string;
}

export interface ParagraphBlock {
  readonly kind: "paragraph";
  readonly runs: readonly StyledRun[];
  readonly align: Alignment;
}

export interface VerbatimBlock {
  readonly kind: "verbatim";
  readonly lines: readonly string[];
}

export interface RuleBlock {
  readonly kind: "rule";
}

/**
 * Stop partway through a page. Without `seconds` playback waits for the next
 * advance; with it, playback continues on its own after that many seconds.
 */
export interface PauseBlock {
  readonly kind: "pause";
  readonly seconds?: number;
}

export type Block = HeadingBlock | ParagraphBlock | VerbatimBlock | RuleBlock | PauseBlock;

export interface Page {
  /** "Title" for page 0, the --newpage argument, or "slide N" */
  readonly name: string;
  readonly header?: string;
  readonly footer?: string;
  /** Frame the page with a border */
  readonly border?: boolean;
  readonly blocks: readonly Block[];
}

export interface Document {
  readonly title?: string;
  readonly author?: string;
  /** Literal text, including the "today" sentinel */
  readonly date?: string;
  readonly pages: readonly Page[];
}

// =============================================================================
// Tokens
// =============================================================================

export const DIRECTIVE_NAMES = [
  "title",
  "author",
  "date",
  "newpage",
  "heading",
  "beginoutput",
  "endoutput",
  "center",
  "right",
  "horline",
  "header",
  "footer",
  "withborder",
  "sleep",
  "boldon",
  "boldoff",
  "ulon",
  "uloff",
  "revon",
  "revoff",
  "color",
  "fgcolor",
  "bgcolor",
  "comment",
  "pause",
] as const;

export type DirectiveName = (typeof DIRECTIVE_NAMES)[number];

// Written "--##" and "---", never as a word after the prefix
const UNSPELLED_DIRECTIVES: ReadonlySet<string> = new Set(["comment", "pause"]);
const DIRECTIVE_SET: ReadonlySet<string> = new Set(DIRECTIVE_NAMES);

export function isDirectiveName(value: string): value is DirectiveName {
  return DIRECTIVE_SET.has(value) && !UNSPELLED_DIRECTIVES.has(value);
}

export type InlineTag = "b" | "u" | "rev" | "c";

export type Token =
  | { kind: "directive"; name: DirectiveName; argument?: string; line: number }
  | { kind: "inline_open"; tag: InlineTag; argument?: ColorName; line: number }
  | { kind: "inline_close"; tag: InlineTag; line: number }
  | { kind: "escaped"; text: string; line: number }
  | { kind: "text"; text: string; line: number }
  | { kind: "verbatim_line"; text: string; line: number }
  | { kind: "line_break"; line: number }
  | { kind: "blank_line"; line: number };

export type TokenKind = Token["kind"];

/** Tokens that may appear inside a paragraph */
export type InlineToken = Extract<Token, { kind: "inline_open" | "inline_close" | "escaped" | "text" | "line_break" }>;
