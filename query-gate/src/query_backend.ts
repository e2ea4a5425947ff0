/**
 * Query backend abstraction
 *
 * A backend runs one SQL statement for a step and either returns rows or
 * throws a QueryBackendError whose `signal` the executor classifies as
 * retryable or not.
 */

import { QueryBackendError } from "./config.js"

export interface QueryResultPayload {
	rows: Record<string, unknown>[]
	bytesScanned: number
}

export interface ExecuteOptions {
	/** Aborted when the executor's per-call timeout expires */
	signal?: AbortSignal
}

export interface QueryBackend {
	execute(stepId: string, sql: string, options?: ExecuteOptions): Promise<QueryResultPayload>
	close?(): Promise<void>
}

/**
 * Run `call` with an abort signal, rejecting with a `timeout` signal once
 * `ms` elapse.
 */
export async function withTimeout<T>(call: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> {
	const controller = new AbortController()
	let timer: ReturnType<typeof setTimeout> | undefined
	const expired = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			// Reject before aborting so the timeout wins the race
			reject(new QueryBackendError("timeout", `Backend call timed out after ${ms}ms`))
			controller.abort()
		}, ms)
	})
	try {
		return await Promise.race([call(controller.signal), expired])
	} finally {
		clearTimeout(timer)
	}
}

// ============================================================================
// Scripted backend
// ============================================================================

export interface ScriptedFailure {
	/** Signal thrown, e.g. "transient_error" */
	mode: string
	/** Number of calls for the step that fail before it succeeds */
	failCount: number
}

export interface ScriptedResponse {
	match: RegExp
	rows: Record<string, unknown>[]
	bytesScanned: number
}

export interface ScriptedQueryBackendOptions {
	/** Keyed by step id ("step_1", ...) */
	failureSchedule?: Record<string, ScriptedFailure>
	responses?: ScriptedResponse[]
	fallback?: QueryResultPayload
	/** Simulated latency per call */
	delayMs?: number
}

export const SCRIPTED_FALLBACK: QueryResultPayload = {
	rows: [{ health_check: 1 }],
	bytesScanned: 1024,
}

/**
 * Backend with canned responses and a per-step failure schedule.
 * Used for dry runs (scripts/gate_sql.ts) and tests.
 */
export class ScriptedQueryBackend implements QueryBackend {
	readonly calls: Array<{ stepId: string; sql: string }> = []
	private readonly counts = new Map<string, number>()

	constructor(private readonly options: ScriptedQueryBackendOptions = {}) {}

	async execute(stepId: string, sql: string, options: ExecuteOptions = {}): Promise<QueryResultPayload> {
		this.calls.push({ stepId, sql })

		const rule = this.options.failureSchedule?.[stepId]
		if (rule) {
			const n = this.counts.get(stepId) ?? 0
			this.counts.set(stepId, n + 1)
			if (n < rule.failCount) throw new QueryBackendError(rule.mode, rule.mode)
		}

		if (this.options.delayMs !== undefined) await sleep(this.options.delayMs, options.signal)

		const payload = this.options.responses?.find((response) => response.match.test(sql)) ??
			this.options.fallback ??
			SCRIPTED_FALLBACK
		return { rows: payload.rows.map((row) => ({ ...row })), bytesScanned: payload.bytesScanned }
	}

	/** Calls made for a step so far */
	attempts(stepId: string): number {
		return this.calls.filter((call) => call.stepId === stepId).length
	}
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new QueryBackendError("aborted", "Call aborted"))
			return
		}
		let timer: ReturnType<typeof setTimeout> | undefined
		const onAbort = () => {
			clearTimeout(timer)
			reject(new QueryBackendError("aborted", "Call aborted"))
		}
		timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort)
			resolve()
		}, ms)
		signal?.addEventListener("abort", onAbort, { once: true })
	})
}
