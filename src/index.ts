export * from "./markup/index.js";
export * from "./playback/index.js";
export { emit, type PlaybackEventInput } from "./core/events/emit.js";
export { createJsonEventLogger, type JsonEventLogger, type JsonEventLoggerOptions } from "./core/events/json-logger.js";
export { loadConfig, type Config, type CLIOptions } from "./config.js";
