import { MarkupError } from "./errors.js";
import { isColorName, isDirectiveName } from "./types.js";
import type { InlineTag, InlineToken, Token } from "./types.js";

export const DIRECTIVE_PREFIX = "--";
export const ESCAPE_MARKER = "\\";
export const PAUSE_MARKER = "---";

const DIRECTIVE_WORD = /^--([A-Za-z/][A-Za-z0-9/]*)/;
const INLINE_TAG = /--(\/?)(rev|b|u|c)(?![A-Za-z0-9])/y;
const ESCAPED_SPELLING = /--[A-Za-z#/]*/y;
const COLOR_WORD = /[A-Za-z]+/y;

/** Directives whose argument is running text with inline tags */
const INLINE_ARGUMENT_DIRECTIVES = new Set(["center", "right"]);

export interface InlineTagMatch {
  token: Extract<Token, { kind: "inline_open" | "inline_close" }>;
  /** Characters consumed, including the separator after an opening tag */
  length: number;
}

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

function parseTagName(value: string): InlineTag | null {
  switch (value) {
    case "b":
    case "u":
    case "rev":
    case "c":
      return value;
    default:
      return null;
  }
}

export function splitLines(source: string): string[] {
  const lines = source.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Match an inline tag spelling at `index`. Returns null when the text there
 * is not a tag (plain dashes, longer words such as `--bold`).
 */
export function matchInlineTag(text: string, index: number, line: number): InlineTagMatch | null {
  INLINE_TAG.lastIndex = index;
  const match = INLINE_TAG.exec(text);
  if (!match) return null;

  const tag = parseTagName(match[2]);
  if (!tag) return null;
  const closing = match[1] === "/";
  const end = index + match[0].length;

  if (closing) {
    return { token: { kind: "inline_close", tag, line }, length: match[0].length };
  }

  if (tag !== "c") {
    const separator = isWhitespace(text[end]) ? 1 : 0;
    return { token: { kind: "inline_open", tag, line }, length: match[0].length + separator };
  }

  if (!isWhitespace(text[end])) {
    throw new MarkupError("UnknownDirective", line, "--c requires a color name");
  }

  let nameStart = end;
  while (isWhitespace(text[nameStart])) nameStart++;

  COLOR_WORD.lastIndex = nameStart;
  const colorMatch = COLOR_WORD.exec(text);
  if (!colorMatch) {
    throw new MarkupError("UnknownDirective", line, "--c requires a color name");
  }

  const color = colorMatch[0];
  if (!isColorName(color)) {
    throw new MarkupError("UnknownDirective", line, `unknown color "${color}"`);
  }

  const nameEnd = nameStart + color.length;
  const separator = isWhitespace(text[nameEnd]) ? 1 : 0;
  return {
    token: { kind: "inline_open", tag: "c", argument: color, line },
    length: nameEnd + separator - index,
  };
}

/**
 * Tokenize running text: escaped literals first, then inline tags, then plain text.
 */
export function* scanInline(text: string, line: number): Generator<InlineToken, void, undefined> {
  let buffer = "";
  let i = 0;

  while (i < text.length) {
    if (text[i] === ESCAPE_MARKER && text.startsWith(DIRECTIVE_PREFIX, i + 1)) {
      ESCAPED_SPELLING.lastIndex = i + 1;
      const spelling = ESCAPED_SPELLING.exec(text)?.[0] ?? DIRECTIVE_PREFIX;
      if (buffer) {
        yield { kind: "text", text: buffer, line };
        buffer = "";
      }
      yield { kind: "escaped", text: spelling, line };
      i += 1 + spelling.length;
      continue;
    }

    if (text.startsWith(DIRECTIVE_PREFIX, i)) {
      const tag = matchInlineTag(text, i, line);
      if (tag) {
        if (buffer) {
          yield { kind: "text", text: buffer, line };
          buffer = "";
        }
        yield tag.token;
        i += tag.length;
        continue;
      }
    }

    buffer += text[i];
    i++;
  }

  if (buffer) {
    yield { kind: "text", text: buffer, line };
  }
}

/**
 * Recognize a directive line. Returns null for running text (including lines
 * that open with an inline tag) and throws for unknown directive spellings.
 */
function matchDirective(text: string, line: number): Extract<Token, { kind: "directive" }> | null {
  if (!text.startsWith(DIRECTIVE_PREFIX)) return null;

  if (text.startsWith(PAUSE_MARKER)) {
    return { kind: "directive", name: "pause", line };
  }

  if (text.startsWith("--##")) {
    return { kind: "directive", name: "comment", argument: text.slice(4), line };
  }

  const match = DIRECTIVE_WORD.exec(text);
  if (!match) return null;

  const word = match[1];
  const rest = text.slice(DIRECTIVE_PREFIX.length + word.length);
  if (isDirectiveName(word) && (rest === "" || isWhitespace(rest[0]))) {
    return {
      kind: "directive",
      name: word,
      argument: rest === "" ? undefined : rest.slice(1),
      line,
    };
  }

  if (matchInlineTag(text, 0, line)) return null;

  throw new MarkupError("UnknownDirective", line, `unknown directive "--${word}"`);
}

/**
 * Lazily tokenize the input. Lines inside an output block are passed through
 * untouched; only the block delimiters are recognized there.
 */
export function* lex(source: string | readonly string[]): Generator<Token, void, undefined> {
  const lines = typeof source === "string" ? splitLines(source) : source;
  let inVerbatim = false;

  for (let index = 0; index < lines.length; index++) {
    const text = lines[index];
    const line = index + 1;

    if (inVerbatim) {
      const trimmed = text.trimEnd();
      if (trimmed === "--endoutput") {
        inVerbatim = false;
        yield { kind: "directive", name: "endoutput", line };
      } else if (trimmed === "--beginoutput") {
        yield { kind: "directive", name: "beginoutput", line };
      } else {
        yield { kind: "verbatim_line", text, line };
      }
      continue;
    }

    if (text.trim() === "") {
      yield { kind: "blank_line", line };
      continue;
    }

    const directive = matchDirective(text, line);
    if (directive) {
      yield directive;
      if (directive.name === "beginoutput") {
        inVerbatim = true;
      } else if (INLINE_ARGUMENT_DIRECTIVES.has(directive.name)) {
        yield* scanInline(directive.argument ?? "", line);
        yield { kind: "line_break", line };
      }
      continue;
    }

    yield* scanInline(text, line);
    yield { kind: "line_break", line };
  }
}
