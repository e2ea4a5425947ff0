/**
 * Logger used across the gate
 *
 * Writes to stderr so stdout stays free for command output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export type LogData = Record<string, unknown>

export interface Logger {
	debug(message: string, data?: LogData): void
	info(message: string, data?: LogData): void
	warn(message: string, data?: LogData): void
	error(message: string, data?: LogData): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

export function createLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level]

	const write = (lvl: Exclude<LogLevel, "silent">, message: string, data?: LogData) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		const tag = `[${lvl.toUpperCase()}]`
		if (data) {
			console.error(tag, message, JSON.stringify(data))
		} else {
			console.error(tag, message)
		}
	}

	return {
		debug: (message, data) => write("debug", message, data),
		info: (message, data) => write("info", message, data),
		warn: (message, data) => write("warn", message, data),
		error: (message, data) => write("error", message, data),
	}
}

export const silentLogger: Logger = createLogger("silent")
