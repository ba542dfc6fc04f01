import { getConfig } from "./config";
import pino from "pino";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type Logger = pino.Logger;

// =============================================================================
// Module name extraction
// =============================================================================

export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const lastSlashIndex = moduleUrl.lastIndexOf("/");
	const fileNameWithExtension = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
	const parts = fileNameWithExtension.split(".");
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

// =============================================================================
// Pretty formatting (inline, no transport needed)
// =============================================================================

const LEVEL_COLORS: Record<number, string> = {
	10: "\x1b[90m", // trace - gray
	20: "\x1b[36m", // debug - cyan
	30: "\x1b[32m", // info - green
	40: "\x1b[33m", // warn - yellow
	50: "\x1b[31m", // error - red
	60: "\x1b[35m", // fatal - magenta
};

const LEVEL_NAMES: Record<number, string> = {
	10: "TRACE",
	20: "DEBUG",
	30: "INFO",
	40: "WARN",
	50: "ERROR",
	60: "FATAL",
};

const RESET = "\x1b[0m";

function formatTime(timestamp: number): string {
	const date = new Date(timestamp);
	const pad = (n: number) => n.toString().padStart(2, "0");
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

interface LogRecord {
	time: number;
	level: number;
	module?: string;
	msg?: string;
}

function isLogRecord(value: unknown): value is LogRecord {
	if (!value || typeof value !== "object") {
		return false;
	}
	return "time" in value && typeof value.time === "number" && "level" in value && typeof value.level === "number";
}

/**
 * Renders one pino JSON line as `[time] LEVEL module - msg`.
 * Lines that are not pino records are returned unchanged.
 */
export function formatLogLine(chunk: string): string {
	let parsed: unknown;
	try {
		parsed = JSON.parse(chunk);
	} catch {
		return chunk;
	}
	if (!isLogRecord(parsed)) {
		return chunk;
	}
	const color = LEVEL_COLORS[parsed.level] ?? "";
	const levelName = LEVEL_NAMES[parsed.level] ?? "LOG";
	const moduleName = parsed.module ?? "unknown";
	const msg = parsed.msg ?? "";
	return `${color}[${formatTime(parsed.time)}] ${levelName}${RESET} ${moduleName} - ${msg}\n`;
}

// Diagnostics go to stderr so command output on stdout stays clean
function prettyDestination(): pino.DestinationStream {
	return {
		write(chunk: string): void {
			process.stderr.write(formatLogLine(chunk));
		},
	};
}

// =============================================================================
// Logger creation
// =============================================================================

let rootLogger: pino.Logger | undefined;

function getRootLogger(): pino.Logger {
	if (!rootLogger) {
		const config = getConfig();
		rootLogger = pino(
			{
				level: config.LOG_LEVEL,
			},
			prettyDestination(),
		);
	}
	return rootLogger;
}

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * To use in a module, call `getLog(import.meta)` near the top of the file (after imports).
 *
 * @param module the module meta or module name
 */
export function getLog(module: string | ImportMeta): Logger {
	const moduleName = getModuleName(module);
	return getRootLogger().child({ module: moduleName });
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Log an error with proper formatting
 */
export function logError(logger: Logger, err: unknown, message: string): void {
	if (err instanceof Error) {
		logger.error({ err }, message);
	} else {
		logger.error({ err: String(err) }, message);
	}
}

/**
 * Reset the logger (useful for testing)
 */
export function resetLogger(): void {
	rootLogger = undefined;
}
