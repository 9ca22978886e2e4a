import { describe, it } from "node:test";
import assert from "node:assert";
import { alignColumn, lineLength, textWidth, wrapRuns, wrapText } from "../src/playback/layout.js";
import { DEFAULT_STYLE } from "../src/markup/types.js";
import type { StyleSet } from "../src/markup/types.js";

const BOLD: StyleSet = { bold: true, underline: false, reverse: false };

describe("wrapText", () => {
  it("breaks at the last space that fits", () => {
    assert.deepStrictEqual(wrapText("hello world foo", 11), ["hello world", "foo"]);
  });

  it("cuts words longer than a line", () => {
    assert.deepStrictEqual(wrapText("abcdefgh", 3), ["abc", "def", "gh"]);
  });

  it("keeps short text on one line", () => {
    assert.deepStrictEqual(wrapText("short", 40), ["short"]);
  });

  it("returns one empty line for empty text", () => {
    assert.deepStrictEqual(wrapText("", 5), [""]);
  });
});

describe("wrapRuns", () => {
  it("breaks lines at newlines and keeps run boundaries", () => {
    const runs = [
      { text: "ab ", style: BOLD },
      { text: "cd\nef", style: DEFAULT_STYLE },
    ];
    assert.deepStrictEqual(wrapRuns(runs, 10), [
      [
        { text: "ab ", style: BOLD },
        { text: "cd", style: DEFAULT_STYLE },
      ],
      [{ text: "ef", style: DEFAULT_STYLE }],
    ]);
  });

  it("continues a wrapped run on the next line with its style", () => {
    assert.deepStrictEqual(wrapRuns([{ text: "aaa bbb", style: BOLD }], 4), [
      [{ text: "aaa", style: BOLD }],
      [{ text: "bbb", style: BOLD }],
    ]);
  });

  it("keeps empty lines from consecutive newlines", () => {
    assert.deepStrictEqual(wrapRuns([{ text: "a\n\nb", style: DEFAULT_STYLE }], 10), [
      [{ text: "a", style: DEFAULT_STYLE }],
      [],
      [{ text: "b", style: DEFAULT_STYLE }],
    ]);
  });
});

describe("lineLength", () => {
  it("sums the characters of every run", () => {
    assert.strictEqual(
      lineLength([
        { text: "ab", style: BOLD },
        { text: "cde", style: DEFAULT_STYLE },
      ]),
      5
    );
  });
});

describe("alignColumn", () => {
  it("indents left-aligned lines", () => {
    assert.strictEqual(alignColumn(10, "left", 80, 3), 3);
  });

  it("centers on the full width", () => {
    assert.strictEqual(alignColumn(10, "center", 80, 3), 35);
    assert.strictEqual(alignColumn(11, "center", 80, 3), 34);
  });

  it("right-aligns inside the margin", () => {
    assert.strictEqual(alignColumn(10, "right", 80, 3), 67);
  });

  it("never goes below column zero", () => {
    assert.strictEqual(alignColumn(100, "center", 80, 3), 0);
    assert.strictEqual(alignColumn(100, "right", 80, 3), 0);
  });
});

describe("textWidth", () => {
  it("subtracts both margins", () => {
    assert.strictEqual(textWidth(80, 3), 74);
  });

  it("is at least one column", () => {
    assert.strictEqual(textWidth(4, 3), 1);
  });
});
