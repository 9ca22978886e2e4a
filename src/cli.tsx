#!/usr/bin/env node
import "dotenv/config";
import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import { render } from "ink";
import React from "react";
import { getHelpText, getValidationError, parseArgs } from "./cli/args.js";
import { summarizeDocument } from "./cli/summary.js";
import { loadConfig } from "./config.js";
import { createJsonEventLogger } from "./core/events/json-logger.js";
import { Presenter } from "./ink/Presenter.js";
import { formatMarkupError } from "./markup/errors.js";
import { safeCompile } from "./markup/compile.js";

const PACKAGE_VERSION = "1.0.0";

async function main(): Promise<void> {
  const parsed = parseArgs();

  if (parsed.help) {
    console.log(getHelpText());
    process.exit(0);
  }

  if (parsed.version) {
    console.log(`termdeck ${PACKAGE_VERSION}`);
    process.exit(0);
  }

  const validationError = getValidationError(parsed);
  if (validationError || !parsed.file) {
    console.error(validationError ?? "Error: a presentation file is required");
    console.error("Run 'termdeck --help' for usage");
    process.exit(1);
  }

  const file = parsed.file;
  const config = loadConfig({
    autoplaySeconds: parsed.autoplaySeconds,
    eventLogPath: parsed.eventLogPath,
  });

  const source = await readFile(file, "utf-8");
  const compiled = safeCompile(source);
  if (!compiled.success) {
    console.error(formatMarkupError(compiled.error, file));
    process.exit(1);
  }

  if (parsed.check) {
    console.log(summarizeDocument(compiled.document));
    return;
  }

  const logger = config.eventLogPath
    ? createJsonEventLogger({ filePath: config.eventLogPath, sessionId: randomUUID() })
    : null;

  const instance = render(
    <Presenter document={compiled.document} config={config} onEvent={logger?.log} />
  );

  try {
    await instance.waitUntilExit();
  } finally {
    await logger?.flush();
  }
}

main().catch((error: unknown) => {
  console.error("\nError:", error instanceof Error ? error.message : String(error));

  if (process.env.DEBUG === "true" && error instanceof Error) {
    console.error("\nStack trace:", error.stack);
  }

  process.exit(1);
});
