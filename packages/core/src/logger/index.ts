import type { FolioLogger } from "../types/config.js";

export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { isLogLevel, type LogLevel } from "./levels.js";
export { buildRedactKeys, redactData } from "./redact.js";

/** Logger that discards everything. Used by tests and embedded callers. */
export function createNoopLogger(): FolioLogger {
	const noop = () => {};
	return { debug: noop, info: noop, warn: noop, error: noop };
}
