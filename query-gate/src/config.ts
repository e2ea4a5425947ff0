/**
 * Shared constants and error types for the query gate
 *
 * Includes:
 * - Cost estimation constants
 * - Error classes for programmer errors and backend failures
 * - SQLSTATE classification used to decide which backend failures are retryable
 */

/**
 * Cost estimation constants
 *
 * The byte estimate is a crude proxy: a fixed number of bytes per character
 * of SQL text. It gates admission only and is never used for billing.
 */
export const COST_MODEL = {
	bytesPerSqlChar: 2048,
	bytesPerTib: 1024 ** 4,
}

/**
 * Failure signals the executor retries unless configured otherwise
 */
export const DEFAULT_RETRYABLE_SIGNALS = ["transient_error", "timeout"] as const

/**
 * Error types for structured error handling
 *
 * Thrown only for programmer errors (bad configuration, invalid arguments).
 * Expected outcomes such as a rejected query or an exhausted budget are
 * returned as data instead.
 */
export class QueryGateError extends Error {
	constructor(
		public type: "configuration" | "invalid_argument",
		message: string,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "QueryGateError"
	}
}

/**
 * Failure raised by a query backend
 *
 * `signal` is the classification the executor matches against its retryable
 * set ("transient_error", "timeout", "sqlstate_42P01", ...).
 */
export class QueryBackendError extends Error {
	constructor(
		public signal: string,
		message: string,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "QueryBackendError"
	}
}

/**
 * SQLSTATE classification for backend failures
 */
export const SQLSTATE_CLASSIFICATION = {
	// Statement canceled by statement_timeout
	timeout: ["57014"],

	// Worth retrying as-is: connection drops, contention, server restarts
	transient: [
		"08", // Connection exception (08000, 08003, 08006, ...)
		"40001", // Serialization failure
		"40P01", // Deadlock detected
		"53300", // Too many connections
		"57P01", // Admin shutdown
		"57P02", // Crash shutdown
		"57P03", // Cannot connect now
	],
}

/** Socket-level error codes raised by the driver before any SQLSTATE exists */
const TRANSIENT_SOCKET_CODES = ["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EPIPE", "EAI_AGAIN"]

function matchesSqlstate(sqlstate: string, entries: string[]): boolean {
	if (entries.includes(sqlstate)) return true
	// Two-character entries are class prefixes
	return entries.some((entry) => entry.length === 2 && sqlstate.startsWith(entry))
}

/**
 * Read the `code` property that pg and socket errors carry
 */
export function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
		return error.code
	}
	return undefined
}

/**
 * Map a driver error onto a backend failure signal
 *
 * @returns "timeout", "transient_error", "sqlstate_<code>" or "backend_error"
 */
export function classifyDriverError(error: unknown): string {
	const code = errorCode(error)
	if (code === undefined) return "backend_error"
	if (TRANSIENT_SOCKET_CODES.includes(code)) return "transient_error"
	if (!/^[0-9A-Z]{5}$/.test(code)) return "backend_error"
	if (matchesSqlstate(code, SQLSTATE_CLASSIFICATION.timeout)) return "timeout"
	if (matchesSqlstate(code, SQLSTATE_CLASSIFICATION.transient)) return "transient_error"
	return `sqlstate_${code}`
}
