/**
 * Canonical serialization and content hashing
 *
 * Object keys are sorted, so two values that differ only in key order
 * serialize (and hash) identically.
 */

import crypto from "crypto"
import { QueryGateError } from "./config.js"

/**
 * Deterministic JSON text for any value.
 *
 * - object keys sorted; undefined, function and symbol members dropped
 * - undefined inside arrays, NaN and ±Infinity become null
 * - bigint becomes its decimal string, Date its ISO string, bytes base64
 * - circular structures throw QueryGateError("invalid_argument")
 */
export function canonicalize(value: unknown): string {
	return serialize(value, new Set())
}

export function sha256Hex(text: string): string {
	return crypto.createHash("sha256").update(text).digest("hex")
}

/** SHA-256 of the canonical serialization */
export function contentHash(value: unknown): string {
	return sha256Hex(canonicalize(value))
}

function serialize(value: unknown, seen: Set<object>): string {
	if (value === null) return "null"
	if (typeof value === "string") return JSON.stringify(value)
	if (typeof value === "number") return Number.isFinite(value) ? JSON.stringify(value) : "null"
	if (typeof value === "boolean") return value ? "true" : "false"
	if (typeof value === "bigint") return JSON.stringify(value.toString())
	if (typeof value !== "object") return "null"

	if (value instanceof Date) {
		return Number.isNaN(value.getTime()) ? "null" : JSON.stringify(value.toISOString())
	}
	if (value instanceof Uint8Array) {
		return JSON.stringify(Buffer.from(value).toString("base64"))
	}

	if (seen.has(value)) {
		throw new QueryGateError("invalid_argument", "Cannot canonicalize a circular structure")
	}
	seen.add(value)
	try {
		if (Array.isArray(value)) {
			return `[${value.map((item) => serialize(item, seen)).join(",")}]`
		}
		const entries = Object.entries(value)
			.filter(([, member]) => member !== undefined && typeof member !== "function" && typeof member !== "symbol")
			.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		return `{${entries.map(([key, member]) => `${JSON.stringify(key)}:${serialize(member, seen)}`).join(",")}}`
	} finally {
		// Shared (non-circular) references may appear more than once
		seen.delete(value)
	}
}
