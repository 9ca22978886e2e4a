import { describe, it } from "node:test";
import assert from "node:assert";
import React from "react";
import { HelpPage } from "../../src/ink/components/HelpPage.js";
import { progressCells } from "../../src/ink/components/ProgressBar.js";
import { FRAME_BORDER, FrameLineView, SlideView, textStyleProps } from "../../src/ink/components/SlideView.js";
import { StatusBar, formatSlideNumber } from "../../src/ink/components/StatusBar.js";
import { PresenterView } from "../../src/ink/Presenter.js";
import { initialPresenterState } from "../../src/ink/types.js";
import type { PresenterState } from "../../src/ink/types.js";
import type { Frame } from "../../src/playback/frame-sink.js";

const PLAIN = { bold: false, underline: false, reverse: false };
const BOLD = { bold: true, underline: false, reverse: false };

const FRAME: Frame = {
  lines: [[{ text: "   Hi", style: PLAIN }], [], [{ text: "bold", style: BOLD }]],
  status: { page: 2, total: 3, name: "Intro", header: "Top" },
  columns: 40,
};

function childrenOf(node: React.ReactElement): unknown {
  const props: unknown = node.props;
  if (typeof props === "object" && props !== null && "children" in props) {
    return props.children;
  }
  return undefined;
}

function walk(node: unknown, visit: (element: React.ReactElement) => void): void {
  if (Array.isArray(node)) {
    for (const child of node) walk(child, visit);
    return;
  }
  if (!React.isValidElement(node)) return;
  visit(node);
  walk(childrenOf(node), visit);
}

function collectSignature(node: unknown): string[] {
  const out: string[] = [];
  walk(node, (element) => {
    if (typeof element.type === "function") {
      out.push(element.type.name || "Anonymous");
    }
  });
  return out;
}

function collectText(node: unknown): string[] {
  const out: string[] = [];
  const visitText = (value: unknown) => {
    if (typeof value === "string") {
      out.push(value);
    } else if (Array.isArray(value)) {
      for (const item of value) visitText(item);
    }
  };
  walk(node, (element) => visitText(childrenOf(element)));
  return out;
}

function view(state: PresenterState, showStatus = true) {
  const noop = () => {};
  return PresenterView({
    state,
    totalPages: 3,
    showStatus,
    onJumpChange: noop,
    onJumpSubmit: noop,
    onJumpCancel: noop,
  });
}

describe("PresenterView", () => {
  const presenting: PresenterState = { ...initialPresenterState, frame: FRAME };

  it("shows the slide, status line and key hints", () => {
    assert.deepStrictEqual(collectSignature(view(presenting)), ["SlideView", "StatusBar", "KeyHints"]);
  });

  it("hides the status line when disabled", () => {
    assert.deepStrictEqual(collectSignature(view(presenting, false)), ["SlideView"]);
  });

  it("adds the jump prompt while jumping", () => {
    const signature = collectSignature(view({ ...presenting, mode: "jump", jumpInput: "2" }));
    assert.deepStrictEqual(signature, ["SlideView", "JumpPrompt", "StatusBar", "KeyHints"]);
  });

  it("replaces everything with the help page", () => {
    assert.deepStrictEqual(collectSignature(view({ ...presenting, mode: "help" })), ["HelpPage"]);
  });

  it("marks the end of the presentation", () => {
    const tree = view({ ...presenting, mode: "finished", finishReason: "end" });
    assert.deepStrictEqual(collectText(tree), ["end of presentation"]);
  });
});

describe("SlideView", () => {
  it("renders the header and one row per frame line", () => {
    const tree = SlideView({ frame: FRAME });
    assert.deepStrictEqual(collectSignature(tree), ["Text", "FrameLineView", "FrameLineView", "FrameLineView"]);
    assert.deepStrictEqual(collectText(tree), ["Top"]);
  });

  it("shows a placeholder before the first frame", () => {
    assert.deepStrictEqual(collectText(SlideView({ frame: null })), ["loading…"]);
  });

  it("frames bordered pages", () => {
    const borderStyles = (frame: Frame): unknown[] => {
      const out: unknown[] = [];
      walk(SlideView({ frame }), (element) => {
        const props: unknown = element.props;
        if (typeof props === "object" && props !== null && "borderStyle" in props && props.borderStyle !== undefined) {
          out.push(props.borderStyle);
        }
      });
      return out;
    };

    assert.deepStrictEqual(borderStyles(FRAME), []);
    const bordered: Frame = { ...FRAME, status: { page: 2, total: 3, name: "Intro", border: true } };
    assert.deepStrictEqual(borderStyles(bordered), [FRAME_BORDER]);
  });
});

describe("FrameLineView", () => {
  it("renders each segment with its attributes", () => {
    const tree = FrameLineView({ line: FRAME.lines[2] });
    assert.deepStrictEqual(collectText(tree), ["bold"]);

    const segments: Array<Record<string, unknown>> = [];
    walk(childrenOf(tree), (element) => {
      const props: unknown = element.props;
      if (typeof props === "object" && props !== null) {
        segments.push({ ...props });
      }
    });
    assert.deepStrictEqual(segments, [{ bold: true, underline: false, inverse: false, children: "bold" }]);
  });

  it("keeps empty lines visible", () => {
    assert.deepStrictEqual(collectText(FrameLineView({ line: [] })), [" "]);
  });
});

describe("textStyleProps", () => {
  it("maps reverse onto inverse", () => {
    assert.deepStrictEqual(textStyleProps({ bold: false, underline: true, reverse: true }), {
      bold: false,
      underline: true,
      inverse: true,
    });
  });

  it("passes named colors and leaves the default color unset", () => {
    assert.strictEqual(textStyleProps({ ...PLAIN, color: "red" }).color, "red");
    assert.strictEqual("color" in textStyleProps({ ...PLAIN, color: "default" }), false);
  });
});

describe("StatusBar", () => {
  it("shows the slide number, name and notice", () => {
    const status = { page: 2, total: 3, name: "Intro" };
    assert.strictEqual(formatSlideNumber(status), "[slide 2/3]");
    assert.deepStrictEqual(collectText(StatusBar({ status, notice: 'no slide "9"' })), [
      "[slide 2/3]",
      " ",
      "Intro",
      " ",
      'no slide "9"',
    ]);
    assert.deepStrictEqual(collectSignature(StatusBar({ status })), ["Text", "Text", "ProgressBar"]);
  });

  it("fills the progress bar in proportion", () => {
    assert.deepStrictEqual(progressCells(1, 4, 20), { filled: 5, empty: 15 });
    assert.deepStrictEqual(progressCells(9, 3, 10), { filled: 10, empty: 0 });
    assert.deepStrictEqual(progressCells(0, 0, 10), { filled: 0, empty: 10 });
  });
});

describe("HelpPage", () => {
  it("lists the key bindings", () => {
    const tree = HelpPage();
    assert.deepStrictEqual(collectSignature(tree), ["Text", "KeyHints", "Text"]);
    assert.deepStrictEqual(collectText(tree), ["termdeck help", "press any key to return"]);
  });
});
