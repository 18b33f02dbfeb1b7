/**
 * Stderr logger. stdout is reserved for the MCP protocol.
 */

import type { LogData, Logger } from "./config.js"
import type { LogLevel } from "./config/loadConfig.js"

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

type Sink = (line: string) => void

function format(tag: string, message: string, data?: LogData): string {
	if (!data || Object.keys(data).length === 0) return `[${tag}] ${message}`
	return `[${tag}] ${message} ${JSON.stringify(data)}`
}

export function createLogger(level: LogLevel = "info", sink: Sink = (line) => console.error(line)): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (lineLevel: LogLevel, tag: string, message: string, data?: LogData) => {
		if (LEVEL_ORDER[lineLevel] < threshold) return
		sink(format(tag, message, data))
	}

	return {
		debug: (message, data) => emit("debug", "DEBUG", message, data),
		info: (message, data) => emit("info", "INFO", message, data),
		warn: (message, data) => emit("warn", "WARN", message, data),
		error: (message, data) => emit("error", "ERROR", message, data),
	}
}

export const silentLogger: Logger = createLogger("silent")
