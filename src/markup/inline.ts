import { MarkupError } from "./errors.js";
import { DEFAULT_STYLE } from "./types.js";
import type { ColorName, InlineTag, InlineToken, StyleSet, StyledRun } from "./types.js";

interface OpenTag {
  tag: InlineTag;
  color?: ColorName;
  line: number;
}

const TAG_SPELLINGS: Record<InlineTag, string> = {
  b: "--b",
  u: "--u",
  rev: "--rev",
  c: "--c",
};

/**
 * Style snapshot for the current stack on top of `base`, the attributes set
 * by line-level directives. Attributes are on while any tag of their kind is
 * open; the innermost color wins over the base color.
 */
export function styleFromStack(stack: readonly OpenTag[], base: StyleSet = DEFAULT_STYLE): StyleSet {
  let color: ColorName | undefined = base.color;
  for (let i = stack.length - 1; i >= 0; i--) {
    const entry = stack[i];
    if (entry.tag === "c") {
      color = entry.color;
      break;
    }
  }

  const style: StyleSet = {
    bold: base.bold || stack.some((entry) => entry.tag === "b"),
    underline: base.underline || stack.some((entry) => entry.tag === "u"),
    reverse: base.reverse || stack.some((entry) => entry.tag === "rev"),
  };
  return color ? { ...style, color } : style;
}

/**
 * Turn a paragraph's inline tokens into styled runs. Runs are split at every
 * stack change, even when the restored style equals the previous one; text
 * under an unchanged stack is concatenated. Empty runs are not emitted.
 */
export function resolveInline(tokens: Iterable<InlineToken>, base: StyleSet = DEFAULT_STYLE): StyledRun[] {
  const stack: OpenTag[] = [];
  const runs: StyledRun[] = [];
  let style: StyleSet = base;
  let buffer = "";

  const flush = () => {
    if (buffer) {
      runs.push({ text: buffer, style });
      buffer = "";
    }
  };

  const restyle = () => {
    flush();
    style = styleFromStack(stack, base);
  };

  for (const token of tokens) {
    switch (token.kind) {
      case "text":
      case "escaped":
        buffer += token.text;
        break;

      case "line_break":
        buffer += "\n";
        break;

      case "inline_open":
        stack.push({ tag: token.tag, color: token.argument, line: token.line });
        restyle();
        break;

      case "inline_close": {
        const top = stack[stack.length - 1];
        if (!top) {
          throw new MarkupError(
            "MismatchedTag",
            token.line,
            `--/${token.tag} closes ${TAG_SPELLINGS[token.tag]} but no tag is open`
          );
        }
        if (top.tag !== token.tag) {
          throw new MarkupError(
            "MismatchedTag",
            token.line,
            `--/${token.tag} does not match innermost open ${TAG_SPELLINGS[top.tag]} from line ${top.line}`
          );
        }
        stack.pop();
        restyle();
        break;
      }
    }
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    throw new MarkupError(
      "UnclosedTag",
      unclosed.line,
      `${TAG_SPELLINGS[unclosed.tag]} is not closed before the end of the paragraph`
    );
  }

  flush();
  return runs;
}

