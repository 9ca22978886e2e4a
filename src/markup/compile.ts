import { MarkupError } from "./errors.js";
import { resolveInline } from "./inline.js";
import { lex } from "./lexer.js";
import { DEFAULT_STYLE, isColorName } from "./types.js";
import type { Alignment, Block, ColorName, Document, InlineToken, Page, StyleSet, Token } from "./types.js";

export type CompileMode = "normal" | "in_verbatim";

export type CompileResult =
  | { success: true; document: Document }
  | { success: false; error: MarkupError };

interface PageDraft {
  name: string;
  header?: string;
  footer?: string;
  border?: boolean;
  blocks: Block[];
}

interface ParagraphDraft {
  align: Alignment;
  /** Line-level attributes in effect when the paragraph started */
  base: StyleSet;
  tokens: InlineToken[];
}

interface VerbatimDraft {
  lines: string[];
  openedAt: number;
}

type DirectiveToken = Extract<Token, { kind: "directive" }>;

/**
 * Builds one Document from one token stream. All "current page" and
 * "current paragraph" state lives on the instance; create a new compiler per
 * input.
 */
export class DocumentCompiler {
  private mode: CompileMode = "normal";
  private title?: string;
  private author?: string;
  private date?: string;
  private header?: string;
  private footer?: string;
  private base: StyleSet = DEFAULT_STYLE;
  private readonly pages: PageDraft[] = [];
  private paragraph: ParagraphDraft | null = null;
  private verbatim: VerbatimDraft | null = null;

  constructor() {
    this.pages.push({ name: "Title", blocks: [] });
  }

  compile(tokens: Iterable<Token>): Document {
    for (const token of tokens) {
      this.dispatch(token);
    }
    return this.finish();
  }

  private get currentPage(): PageDraft {
    return this.pages[this.pages.length - 1];
  }

  private dispatch(token: Token): void {
    switch (this.mode) {
      case "normal":
        this.dispatchNormal(token);
        return;
      case "in_verbatim":
        this.dispatchVerbatim(token);
        return;
    }
  }

  private dispatchNormal(token: Token): void {
    switch (token.kind) {
      case "directive":
        this.sealParagraph();
        this.applyDirective(token);
        return;

      case "blank_line":
        this.sealParagraph();
        return;

      case "line_break":
        if (!this.paragraph) return;
        if (this.paragraph.align === "left") {
          this.paragraph.tokens.push(token);
        } else {
          this.sealParagraph();
        }
        return;

      case "text":
      case "escaped":
      case "inline_open":
      case "inline_close":
        this.openParagraph("left").tokens.push(token);
        return;

      case "verbatim_line":
        throw new Error(`Output line outside an output block at line ${token.line}`);
    }
  }

  private dispatchVerbatim(token: Token): void {
    const verbatim = this.verbatim;
    if (!verbatim) {
      throw new Error("Verbatim mode without an open output block");
    }

    if (token.kind === "verbatim_line") {
      verbatim.lines.push(token.text);
      return;
    }

    if (token.kind === "directive" && token.name === "endoutput") {
      this.currentPage.blocks.push({ kind: "verbatim", lines: verbatim.lines });
      this.verbatim = null;
      this.mode = "normal";
      return;
    }

    if (token.kind === "directive" && token.name === "beginoutput") {
      throw new MarkupError(
        "NestedVerbatim",
        token.line,
        `--beginoutput inside the output block opened at line ${verbatim.openedAt}`
      );
    }

    throw new Error(`Unexpected ${token.kind} token inside an output block at line ${token.line}`);
  }

  private applyDirective(token: DirectiveToken): void {
    const argument = token.argument ?? "";

    switch (token.name) {
      case "title":
        this.title = argument;
        return;
      case "author":
        this.author = argument;
        return;
      case "date":
        this.date = argument;
        return;

      case "header":
        this.header = argument;
        this.currentPage.header = argument;
        return;
      case "footer":
        this.footer = argument;
        this.currentPage.footer = argument;
        return;

      case "newpage": {
        const name = argument.trim();
        this.pages.push({
          name: name || `slide ${this.pages.length + 1}`,
          header: this.header,
          footer: this.footer,
          blocks: [],
        });
        return;
      }

      case "heading":
        this.currentPage.blocks.push({ kind: "heading", text: argument });
        return;

      case "horline":
        this.currentPage.blocks.push({ kind: "rule" });
        return;

      case "center":
        this.openParagraph("center");
        return;
      case "right":
        this.openParagraph("right");
        return;

      case "beginoutput":
        this.verbatim = { lines: [], openedAt: token.line };
        this.mode = "in_verbatim";
        return;

      case "endoutput":
        throw new MarkupError("UnmatchedEndOutput", token.line, "--endoutput without a matching --beginoutput");

      case "pause":
        this.currentPage.blocks.push({ kind: "pause" });
        return;

      case "sleep":
        this.currentPage.blocks.push({ kind: "pause", seconds: parseSeconds(argument, token.line) });
        return;

      case "withborder":
        this.currentPage.border = true;
        return;

      case "boldon":
      case "boldoff":
        this.base = { ...this.base, bold: token.name === "boldon" };
        return;
      case "ulon":
      case "uloff":
        this.base = { ...this.base, underline: token.name === "ulon" };
        return;
      case "revon":
      case "revoff":
        this.base = { ...this.base, reverse: token.name === "revon" };
        return;

      case "color":
      case "fgcolor":
        this.base = { ...this.base, color: parseColor(token.name, argument, token.line) };
        return;

      // Background colors are not drawn; the name is still checked
      case "bgcolor":
        parseColor(token.name, argument, token.line);
        return;

      case "comment":
        return;
    }
  }

  private openParagraph(align: Alignment): ParagraphDraft {
    if (!this.paragraph) {
      this.paragraph = { align, base: this.base, tokens: [] };
    }
    return this.paragraph;
  }

  private sealParagraph(): void {
    const paragraph = this.paragraph;
    this.paragraph = null;
    if (!paragraph) return;

    const tokens = [...paragraph.tokens];
    while (tokens.length > 0 && tokens[tokens.length - 1].kind === "line_break") {
      tokens.pop();
    }
    if (tokens.length === 0) return;

    this.currentPage.blocks.push({
      kind: "paragraph",
      runs: resolveInline(tokens, paragraph.base),
      align: paragraph.align,
    });
  }

  private finish(): Document {
    if (this.verbatim) {
      throw new MarkupError(
        "UnterminatedVerbatim",
        this.verbatim.openedAt,
        "--beginoutput is never closed by --endoutput"
      );
    }
    this.sealParagraph();

    const pages: Page[] = this.pages.map((draft) => ({
      name: draft.name,
      ...(draft.header !== undefined ? { header: draft.header } : {}),
      ...(draft.footer !== undefined ? { footer: draft.footer } : {}),
      ...(draft.border ? { border: true } : {}),
      blocks: draft.blocks,
    }));

    return {
      ...(this.title !== undefined ? { title: this.title } : {}),
      ...(this.author !== undefined ? { author: this.author } : {}),
      ...(this.date !== undefined ? { date: this.date } : {}),
      pages,
    };
  }
}

function parseSeconds(argument: string, line: number): number {
  const value = argument.trim();
  if (!/^\d+(\.\d+)?$/.test(value)) {
    throw new MarkupError("InvalidArgument", line, `--sleep expects a number of seconds, got "${value}"`);
  }
  return Number(value);
}

function parseColor(directive: string, argument: string, line: number): ColorName {
  const value = argument.trim();
  if (!isColorName(value)) {
    throw new MarkupError("InvalidArgument", line, `--${directive} expects a color name, got "${value}"`);
  }
  return value;
}

/**
 * Compile markup source into a Document. Throws MarkupError on the first
 * problem; no partial document is returned.
 */
export function compile(source: string | readonly string[]): Document {
  return new DocumentCompiler().compile(lex(source));
}

export function safeCompile(source: string | readonly string[]): CompileResult {
  try {
    return { success: true, document: compile(source) };
  } catch (error) {
    if (error instanceof MarkupError) {
      return { success: false, error };
    }
    throw error;
  }
}
