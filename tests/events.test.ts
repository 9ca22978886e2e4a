import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { emit } from "../src/core/events/emit.js";
import { createJsonEventLogger } from "../src/core/events/json-logger.js";
import type { PlaybackEvent } from "../src/playback/types.js";

describe("emit", () => {
  it("adds a timestamp", () => {
    const received: PlaybackEvent[] = [];
    const before = Date.now();
    emit((event) => received.push(event), { type: "playback_start", totalPages: 4 });

    assert.strictEqual(received.length, 1);
    const [event] = received;
    assert.strictEqual(event.type, "playback_start");
    assert.ok(event.timestamp >= before);
  });

  it("does nothing without a callback", () => {
    assert.doesNotThrow(() => emit(undefined, { type: "playback_start", totalPages: 1 }));
  });
});

describe("createJsonEventLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "termdeck-events-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per event", async () => {
    const filePath = join(dir, "logs", "events.jsonl");
    const logger = createJsonEventLogger({ filePath, sessionId: "session-1" });

    logger.log({ type: "playback_start", totalPages: 2, timestamp: 1 });
    logger.log({ type: "page_rendered", page: 1, totalPages: 2, name: "Title", step: 0, timestamp: 2 });
    await logger.flush();

    const lines = (await readFile(filePath, "utf-8")).trim().split("\n");
    assert.deepStrictEqual(
      lines.map((line) => JSON.parse(line)),
      [
        { type: "playback_start", totalPages: 2, timestamp: 1, sessionId: "session-1" },
        { type: "page_rendered", page: 1, totalPages: 2, name: "Title", step: 0, timestamp: 2, sessionId: "session-1" },
      ]
    );
  });

  it("reports the first failure once and keeps going", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "not a directory");

    const errors: Error[] = [];
    const logger = createJsonEventLogger({
      filePath: join(blocker, "events.jsonl"),
      sessionId: "session-2",
      onError: (error) => errors.push(error),
    });

    logger.log({ type: "playback_start", totalPages: 1, timestamp: 1 });
    logger.log({ type: "playback_finished", reason: "end", pagesShown: 1, timestamp: 2 });
    await logger.flush();

    assert.strictEqual(errors.length, 1);
  });
});
