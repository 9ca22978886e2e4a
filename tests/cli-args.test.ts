import { describe, it } from "node:test";
import assert from "node:assert";
import { readFileSync } from "node:fs";
import { getHelpText, getValidationError, parseArgs } from "../src/cli/args.js";
import { summarizeDocument } from "../src/cli/summary.js";
import { compile } from "../src/markup/compile.js";

describe("parseArgs", () => {
  it("sets defaults", () => {
    assert.deepStrictEqual(parseArgs([]), { check: false, version: false, help: false });
  });

  it("parses the file and long flags", () => {
    const result = parseArgs(["talk.tpp", "--autoplay", "2.5", "--log", "./events.jsonl", "--check"]);
    assert.deepStrictEqual(result, {
      file: "talk.tpp",
      autoplaySeconds: 2.5,
      eventLogPath: "./events.jsonl",
      check: true,
      version: false,
      help: false,
    });
  });

  it("parses short flags", () => {
    const result = parseArgs(["-s", "3", "-l", "out.jsonl", "-c", "deck.tpp"]);
    assert.strictEqual(result.autoplaySeconds, 3);
    assert.strictEqual(result.eventLogPath, "out.jsonl");
    assert.strictEqual(result.check, true);
    assert.strictEqual(result.file, "deck.tpp");
  });

  it("keeps the first positional argument", () => {
    assert.strictEqual(parseArgs(["a.tpp", "b.tpp"]).file, "a.tpp");
  });

  it("records autoplay values that are not positive numbers", () => {
    assert.strictEqual(parseArgs(["x.tpp", "--autoplay", "soon"]).invalidAutoplay, "soon");
    assert.strictEqual(parseArgs(["x.tpp", "-s", "0"]).invalidAutoplay, "0");
    assert.strictEqual(parseArgs(["x.tpp", "-s", "0"]).autoplaySeconds, undefined);
  });

  it("parses help and version", () => {
    assert.strictEqual(parseArgs(["--help"]).help, true);
    assert.strictEqual(parseArgs(["-h"]).help, true);
    assert.strictEqual(parseArgs(["--version"]).version, true);
    assert.strictEqual(parseArgs(["-v"]).version, true);
  });
});

describe("getValidationError", () => {
  it("requires a file", () => {
    assert.strictEqual(getValidationError(parseArgs([])), "Error: a presentation file is required");
  });

  it("skips validation for help and version", () => {
    assert.strictEqual(getValidationError(parseArgs(["--help"])), null);
    assert.strictEqual(getValidationError(parseArgs(["-v"])), null);
  });

  it("rejects a bad autoplay interval", () => {
    assert.strictEqual(
      getValidationError(parseArgs(["x.tpp", "-s", "-1"])),
      'Error: --autoplay expects a positive number of seconds, got "-1"'
    );
  });

  it("accepts a file", () => {
    assert.strictEqual(getValidationError(parseArgs(["x.tpp"])), null);
  });
});

describe("getHelpText", () => {
  it("documents every option", () => {
    const help = getHelpText();
    for (const flag of ["--autoplay", "--log", "--check", "--version", "--help"]) {
      assert.ok(help.includes(flag), `help text mentions ${flag}`);
    }
  });
});

describe("summarizeDocument", () => {
  it("outlines the sample deck", () => {
    const source = readFileSync(new URL("./fixtures/inline-formatting.tpp", import.meta.url), "utf-8");
    assert.strictEqual(
      summarizeDocument(compile(source)),
      [
        "title:  Inline Formatting",
        "author: Example",
        "date:   today",
        "pages:  3",
        "  1. Title (0 blocks)",
        "  2. slide 2 (4 blocks: heading, paragraph, paragraph, verbatim)",
        "  3. slide 3 (2 blocks: heading, paragraph)",
      ].join("\n")
    );
  });

  it("uses the singular for one block", () => {
    assert.strictEqual(summarizeDocument(compile("--horline")), "pages:  1\n  1. Title (1 block: rule)");
  });
});
