/**
 * Retrying executor
 *
 * Runs a checked plan strictly in order. Each step is an explicit attempt
 * loop: a failure whose signal is in the retryable set is retried at once
 * until `maxRetries` is spent; anything else ends the step. After the first
 * failed step the rest of the plan is reported as skipped.
 */

import type { BudgetLedger } from "./budget_ledger.js"
import { contentHash } from "./canonical_hash.js"
import type { Clock } from "./clock.js"
import { systemClock } from "./clock.js"
import { DEFAULT_RETRYABLE_SIGNALS, QueryBackendError, QueryGateError } from "./config.js"
import type { Logger } from "./logger.js"
import { silentLogger } from "./logger.js"
import { assertNever, stepName } from "./plan.js"
import type { PlanStep, QueryPlan } from "./plan.js"
import { withTimeout } from "./query_backend.js"
import type { QueryBackend, QueryResultPayload } from "./query_backend.js"
import type { IdempotentStepCache } from "./step_cache.js"
import type { StepOutcome } from "./step_outcome.js"

/** Identifies a run for idempotent replay and usage accounting */
export interface ExecutionScope {
	tenantId: string
	workflowId: string
}

export interface RetryingExecutorOptions {
	backend: QueryBackend
	maxRetries?: number
	callTimeoutMs?: number
	retryableSignals?: Iterable<string>
	clock?: Clock
	stepCache?: IdempotentStepCache
	ledger?: BudgetLedger
	logger?: Logger
}

type Attempt = { ok: true; payload: QueryResultPayload } | { ok: false; signal: string; error: string }

export class RetryingExecutor {
	private readonly backend: QueryBackend
	private readonly maxRetries: number
	private readonly callTimeoutMs: number
	private readonly retryableSignals: ReadonlySet<string>
	private readonly clock: Clock
	private readonly stepCache?: IdempotentStepCache
	private readonly ledger?: BudgetLedger
	private readonly logger: Logger

	constructor(options: RetryingExecutorOptions) {
		this.backend = options.backend
		this.maxRetries = options.maxRetries ?? 3
		this.callTimeoutMs = options.callTimeoutMs ?? 30_000
		this.retryableSignals = new Set<string>(options.retryableSignals ?? DEFAULT_RETRYABLE_SIGNALS)
		this.clock = options.clock ?? systemClock
		this.stepCache = options.stepCache
		this.ledger = options.ledger
		this.logger = options.logger ?? silentLogger

		if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
			throw new QueryGateError("configuration", `maxRetries must be an integer >= 0, got ${this.maxRetries}`)
		}
		if (!Number.isInteger(this.callTimeoutMs) || this.callTimeoutMs <= 0) {
			throw new QueryGateError("configuration", `callTimeoutMs must be a positive integer, got ${this.callTimeoutMs}`)
		}
	}

	/**
	 * With a scope, steps go through the step cache (when configured) and
	 * freshly executed steps have their scanned bytes recorded in the ledger.
	 */
	async run(plan: QueryPlan, scope?: ExecutionScope): Promise<StepOutcome[]> {
		const outcomes: StepOutcome[] = []
		let halted = false

		for (const step of plan.steps) {
			if (halted) {
				outcomes.push(this.skipped(step))
				continue
			}
			const outcome = await this.runStep(step, scope)
			outcomes.push(outcome)
			if (outcome.status === "failed") halted = true
		}
		return outcomes
	}

	private async runStep(step: PlanStep, scope?: ExecutionScope): Promise<StepOutcome> {
		if (!scope) return this.execute(step)

		if (!this.stepCache) {
			const outcome = await this.execute(step)
			await this.recordUsage(scope.tenantId, outcome)
			return outcome
		}

		const key = this.stepCache.key(scope.tenantId, scope.workflowId, stepName(step), stepPayload(step))
		const { outcome, replayed } = await this.stepCache.runOnce(key, () => this.execute(step))
		if (replayed) {
			this.logger.debug("Step replayed", { step: outcome.stepName, workflowId: scope.workflowId })
			return outcome
		}
		await this.recordUsage(scope.tenantId, outcome)
		return outcome
	}

	private async execute(step: PlanStep): Promise<StepOutcome> {
		const name = stepName(step)
		const startedAt = this.timestamp()
		let retries = 0

		for (;;) {
			const attempt = await this.attempt(step)

			if (attempt.ok) {
				const output = { rows: attempt.payload.rows, bytesScanned: attempt.payload.bytesScanned }
				return {
					stepName: name,
					status: "success",
					output,
					outputHash: contentHash(output),
					startedAt,
					finishedAt: this.timestamp(),
					retryCount: retries,
				}
			}

			if (!this.retryableSignals.has(attempt.signal) || retries >= this.maxRetries) {
				this.logger.warn("Step failed", { step: name, signal: attempt.signal, retries })
				return {
					stepName: name,
					status: "failed",
					output: {},
					outputHash: contentHash({}),
					startedAt,
					finishedAt: this.timestamp(),
					retryCount: retries,
					error: attempt.error,
				}
			}

			retries++
			this.logger.debug("Retrying step", { step: name, signal: attempt.signal, retry: retries })
		}
	}

	private async attempt(step: PlanStep): Promise<Attempt> {
		switch (step.tool) {
			case "execute_query":
				try {
					const payload = await withTimeout(
						(signal) => this.backend.execute(`step_${step.stepId}`, step.inputs.sql, { signal }),
						this.callTimeoutMs,
					)
					return { ok: true, payload }
				} catch (error) {
					return { ok: false, ...describeFailure(error) }
				}
			default:
				return assertNever(step.tool)
		}
	}

	private skipped(step: PlanStep): StepOutcome {
		const now = this.timestamp()
		return {
			stepName: stepName(step),
			status: "skipped",
			output: {},
			outputHash: contentHash({}),
			startedAt: now,
			finishedAt: now,
			retryCount: 0,
		}
	}

	private async recordUsage(tenantId: string, outcome: StepOutcome): Promise<void> {
		if (!this.ledger || outcome.status !== "success") return
		const bytes = outcome.output.bytesScanned
		if (typeof bytes === "number") await this.ledger.record(tenantId, bytes)
	}

	private timestamp(): Date {
		return new Date(this.clock.now() * 1000)
	}
}

/** The part of a step that decides its result */
function stepPayload(step: PlanStep): Record<string, unknown> {
	switch (step.tool) {
		case "execute_query":
			return { tool: step.tool, sql: step.inputs.sql }
		default:
			return assertNever(step.tool)
	}
}

function describeFailure(error: unknown): { signal: string; error: string } {
	if (error instanceof QueryBackendError) {
		const detail = error.message === error.signal ? error.signal : `${error.signal}: ${error.message}`
		return { signal: error.signal, error: detail }
	}
	if (error instanceof Error) return { signal: error.message, error: error.message }
	return { signal: String(error), error: String(error) }
}
