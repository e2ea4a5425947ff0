/**
 * Unified config loader for the query gate.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * Missing keys fall back to the schema defaults; anything present must be
 * well-formed or loading fails with a QueryGateError.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { DEFAULT_RETRYABLE_SIGNALS, QueryGateError } from "../config.js"

// ── Schema ───────────────────────────────────────────────────────────

const positiveInt = z.number().int().positive()
const nonNegativeInt = z.number().int().nonnegative()
const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_$]*$/, "must be a plain SQL identifier")

const TenantOverrideSchema = z
	.object({
		default_limit: positiveInt.optional(),
		max_join_depth: nonNegativeInt.optional(),
		max_subquery_depth: nonNegativeInt.optional(),
		partition_lookback_days: positiveInt.optional(),
		hourly_budget_bytes: positiveInt.optional(),
		per_query_max_bytes: positiveInt.optional(),
		per_query_max_bytes_with_approval: positiveInt.optional(),
	})
	.strict()

export const QueryGateConfigSchema = z.object({
	database: z
		.object({
			connection_string: z.string().default(""),
			statement_timeout_ms: positiveInt.default(30_000),
			pool_max: positiveInt.default(5),
		})
		.default({}),
	safety: z
		.object({
			default_limit: positiveInt.default(10_000),
			max_join_depth: nonNegativeInt.default(5),
			max_subquery_depth: nonNegativeInt.default(3),
			partition_lookback_days: positiveInt.default(30),
			partitioned_tables: z.record(identifier).default({}),
		})
		.default({}),
	budget: z
		.object({
			window_seconds: z.number().positive().default(3600),
			hourly_budget_bytes: positiveInt.default(50 * 1024 ** 3),
			per_query_max_bytes: positiveInt.default(10 * 1024 ** 3),
			per_query_max_bytes_with_approval: positiveInt.default(100 * 1024 ** 3),
			usd_per_tib: z.number().nonnegative().default(5),
		})
		.default({}),
	executor: z
		.object({
			max_retries: nonNegativeInt.default(3),
			call_timeout_ms: positiveInt.default(30_000),
			retryable_signals: z.array(z.string().min(1)).default([...DEFAULT_RETRYABLE_SIGNALS]),
		})
		.default({}),
	tenants: z.record(TenantOverrideSchema).default({}),
	logging: z
		.object({
			level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
		})
		.default({}),
})

export type QueryGateConfig = z.infer<typeof QueryGateConfigSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): Record<string, unknown> {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	let parsed: unknown
	try {
		parsed = yaml.load(raw)
	} catch (error) {
		throw new QueryGateError("configuration", `Cannot parse ${filePath}: ${String(error)}`, { filePath })
	}
	if (parsed === undefined || parsed === null) return {}
	if (!isPlainObject(parsed)) {
		throw new QueryGateError("configuration", `${filePath} must contain a mapping at the top level`, { filePath })
	}
	return parsed
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(right) && isPlainObject(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

/** Get (or create) a nested section of the raw config. */
function section(cfg: Record<string, unknown>, name: string): Record<string, unknown> {
	const existing = cfg[name]
	if (isPlainObject(existing)) return existing
	const created: Record<string, unknown> = {}
	cfg[name] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: Record<string, unknown>): void {
	// database
	const db = section(cfg, "database")
	db.connection_string = env("DATABASE_URL") ?? db.connection_string
	db.statement_timeout_ms = envInt("STATEMENT_TIMEOUT_MS") ?? db.statement_timeout_ms

	// safety
	const s = section(cfg, "safety")
	s.default_limit = envInt("DEFAULT_QUERY_LIMIT") ?? s.default_limit
	s.max_join_depth = envInt("MAX_JOIN_DEPTH") ?? s.max_join_depth
	s.max_subquery_depth = envInt("MAX_SUBQUERY_DEPTH") ?? s.max_subquery_depth
	s.partition_lookback_days = envInt("PARTITION_LOOKBACK_DAYS") ?? s.partition_lookback_days

	// budget
	const b = section(cfg, "budget")
	b.window_seconds = envFloat("BUDGET_WINDOW_SECONDS") ?? b.window_seconds
	b.hourly_budget_bytes = envInt("TENANT_HOURLY_BUDGET_BYTES") ?? b.hourly_budget_bytes
	b.per_query_max_bytes = envInt("PER_QUERY_MAX_BYTES") ?? b.per_query_max_bytes
	b.per_query_max_bytes_with_approval = envInt("PER_QUERY_MAX_BYTES_WITH_APPROVAL") ?? b.per_query_max_bytes_with_approval

	// executor
	const e = section(cfg, "executor")
	e.max_retries = envInt("EXECUTOR_MAX_RETRIES") ?? e.max_retries
	e.call_timeout_ms = envInt("EXECUTOR_CALL_TIMEOUT_MS") ?? e.call_timeout_ms

	// logging
	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL") ?? l.level
}

// ── Validation ───────────────────────────────────────────────────────

/**
 * Validate a raw config object and fill in defaults.
 *
 * Throws QueryGateError("configuration") listing every invalid key.
 */
export function parseConfig(raw: unknown): QueryGateConfig {
	const result = QueryGateConfigSchema.safeParse(raw ?? {})
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
		throw new QueryGateError("configuration", `Invalid configuration: ${issues.join("; ")}`, { issues })
	}
	return result.data
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: QueryGateConfig | null = null

export function loadConfig(): QueryGateConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: Record<string, unknown> = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = parseConfig(merged)
	return _config
}

export function getConfig(): QueryGateConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
