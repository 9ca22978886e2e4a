import { describe, it } from "node:test";
import assert from "node:assert";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    assert.deepStrictEqual(loadConfig({}, {}), {
      autoplaySeconds: null,
      eventLogPath: null,
      indent: 3,
      showStatus: true,
    });
  });

  it("reads the environment", () => {
    const config = loadConfig(
      {},
      {
        TERMDECK_AUTOPLAY_SECONDS: "1.5",
        TERMDECK_EVENT_LOG: "/tmp/events.jsonl",
        TERMDECK_INDENT: "0",
        TERMDECK_SHOW_STATUS: "off",
      }
    );
    assert.deepStrictEqual(config, {
      autoplaySeconds: 1.5,
      eventLogPath: "/tmp/events.jsonl",
      indent: 0,
      showStatus: false,
    });
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({}, { TERMDECK_INDENT: "", TERMDECK_AUTOPLAY_SECONDS: "", TERMDECK_SHOW_STATUS: "" });
    assert.strictEqual(config.indent, 3);
    assert.strictEqual(config.autoplaySeconds, null);
    assert.strictEqual(config.showStatus, true);
  });

  it("accepts common spellings of true", () => {
    for (const value of ["1", "true", "YES", "on"]) {
      assert.strictEqual(loadConfig({}, { TERMDECK_SHOW_STATUS: value }).showStatus, true);
    }
  });

  it("lets command-line options override the environment", () => {
    const config = loadConfig(
      { autoplaySeconds: 2, eventLogPath: "cli.jsonl" },
      { TERMDECK_AUTOPLAY_SECONDS: "10", TERMDECK_EVENT_LOG: "env.jsonl" }
    );
    assert.strictEqual(config.autoplaySeconds, 2);
    assert.strictEqual(config.eventLogPath, "cli.jsonl");
  });

  it("rejects an out-of-range indent", () => {
    assert.throws(() => loadConfig({}, { TERMDECK_INDENT: "50" }), /^Error: Invalid environment: TERMDECK_INDENT:/);
  });

  it("rejects an autoplay interval that is not a number", () => {
    assert.throws(() => loadConfig({}, { TERMDECK_AUTOPLAY_SECONDS: "soon" }), /Invalid environment: TERMDECK_AUTOPLAY_SECONDS/);
  });

  it("rejects a status flag that is neither true nor false", () => {
    assert.throws(() => loadConfig({}, { TERMDECK_SHOW_STATUS: "maybe" }), /Invalid environment: TERMDECK_SHOW_STATUS/);
  });

  it("rejects invalid command-line options", () => {
    assert.throws(() => loadConfig({ autoplaySeconds: -1 }, {}), /Invalid options: autoplaySeconds:/);
  });
});
