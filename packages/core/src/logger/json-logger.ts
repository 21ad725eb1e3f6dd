// =============================================================================
// JSON LOGGER — one JSON object per line, for log shippers
// =============================================================================

import type { FolioLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name written into every line. Default: `"folio"` */
	service?: string;
	/** Keys whose values are replaced with "[REDACTED]". Default: common PII keys */
	redactKeys?: string[];
	/** Line sink. Default: stdout for debug/info, stderr for warn/error */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

/**
 * Create a structured JSON logger implementing `FolioLogger`.
 *
 * @example
 * ```ts
 * import { createJsonLogger } from "@folio/core/logger";
 *
 * const logger = createJsonLogger({ level: "debug", service: "ledger-api" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): FolioLogger {
	const { level = "info", service = "folio", write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const safeData = redactData(data, redactKeys);
		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...safeData,
		};

		write(JSON.stringify(entry), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
