/**
 * Query gate: validate → gate → execute → audit
 *
 * The one entry point callers need. A submitted plan is validated, checked
 * by the PolicyGate, executed by the RetryingExecutor under a workflow id,
 * and every gate decision and step invocation is written as an audit entry.
 */

import { v4 as uuidv4 } from "uuid"
import { BudgetLedger } from "./budget_ledger.js"
import type { Clock } from "./clock.js"
import { systemClock } from "./clock.js"
import { QueryGateError } from "./config.js"
import type { QueryGateConfig } from "./config/loadConfig.js"
import { tenantLimitsResolver } from "./config/tenantLimits.js"
import type { TenantLimitsResolver } from "./config/tenantLimits.js"
import { RetryingExecutor } from "./executor.js"
import { createLogger } from "./logger.js"
import type { Logger } from "./logger.js"
import { PostgresQueryBackend, createPgPool, pgConnectionSource } from "./pg_query_backend.js"
import { validatePlan } from "./plan.js"
import type { QueryPlan } from "./plan.js"
import { PolicyGate } from "./policy_gate.js"
import type { GateDecision } from "./policy_gate.js"
import type { QueryBackend } from "./query_backend.js"
import { IdempotentStepCache } from "./step_cache.js"
import type { StepOutcome } from "./step_outcome.js"
import { InMemoryUsageEventStore } from "./usage_store.js"
import type { UsageEventStore } from "./usage_store.js"

export interface GateRequest {
	tenantId: string
	/** Reuse to replay a workflow; defaults to a fresh UUID */
	workflowId?: string
	/** Untrusted plan input, validated before use */
	plan: unknown
}

export const APPROVAL_MESSAGE = "Preview this query, then approve and run."

interface ResponseBase {
	workflowId: string
	summary: string
	warnings: string[]
}

export interface ErrorResponse extends ResponseBase {
	responseType: "error"
	errors: string[]
}

export interface BlockedResponse extends ResponseBase {
	responseType: "blocked"
	reasons: string[]
	decision: GateDecision
	approval?: { required: true; message: string }
}

export interface ExecutionResponse extends ResponseBase {
	responseType: "executed" | "failed"
	decision: GateDecision
	/** The plan as executed, with rewritten SQL */
	plan: QueryPlan
	outcomes: StepOutcome[]
}

export type GateResponse = ErrorResponse | BlockedResponse | ExecutionResponse

/**
 * Audit log entry
 */
interface AuditLogEntry {
	event: "security_gate_decision" | "tool_invocation"
	tenant_id: string
	workflow_id: string
	timestamp: Date
	[key: string]: unknown
}

export interface QueryGateParts {
	policy: PolicyGate
	executor: RetryingExecutor
	limitsFor: TenantLimitsResolver
	backend?: QueryBackend
	clock?: Clock
	logger?: Logger
}

export class QueryGate {
	private readonly policy: PolicyGate
	private readonly executor: RetryingExecutor
	private readonly limitsFor: TenantLimitsResolver
	private readonly backend?: QueryBackend
	private readonly clock: Clock
	private readonly logger: Logger

	constructor(parts: QueryGateParts) {
		this.policy = parts.policy
		this.executor = parts.executor
		this.limitsFor = parts.limitsFor
		this.backend = parts.backend
		this.clock = parts.clock ?? systemClock
		this.logger = parts.logger ?? createLogger()
	}

	async submit(request: GateRequest): Promise<GateResponse> {
		const { tenantId } = request
		const workflowId = request.workflowId ?? uuidv4()

		const validation = validatePlan(request.plan)
		if (!validation.valid) {
			this.logger.warn("Plan validation failed", { tenantId, workflowId, errors: validation.errors })
			return {
				responseType: "error",
				summary: "Plan validation failed",
				workflowId,
				errors: validation.errors,
				warnings: [],
			}
		}

		const gate = await this.policy.preExecute(tenantId, validation.plan)
		this.audit({
			event: "security_gate_decision",
			tenant_id: tenantId,
			workflow_id: workflowId,
			timestamp: this.now(),
			allowed: gate.allowed,
			reasons: gate.reasons,
			decision: gate.decision,
		})

		if (!gate.allowed) {
			const blocked: BlockedResponse = {
				responseType: "blocked",
				summary: "Query blocked by safety/cost gates",
				workflowId,
				reasons: gate.reasons,
				decision: gate.decision,
				warnings: [],
			}
			if (gate.decision.approvalRequired) {
				blocked.approval = { required: true, message: APPROVAL_MESSAGE }
			}
			return blocked
		}

		const outcomes = await this.executor.run(gate.plan, { tenantId, workflowId })
		for (const outcome of outcomes) {
			this.audit({
				event: "tool_invocation",
				tenant_id: tenantId,
				workflow_id: workflowId,
				timestamp: this.now(),
				tool: outcome.stepName,
				status: outcome.status,
				output_hash: outcome.outputHash,
				retry_count: outcome.retryCount,
				error: outcome.error ?? null,
			})
		}

		const rowLimit = this.limitsFor(tenantId).defaultLimit
		const warnings = outcomes.length > 0 ? this.policy.postExecute(outcomes[0].output, rowLimit) : []
		const failed = outcomes.some((outcome) => outcome.status === "failed")

		return {
			responseType: failed ? "failed" : "executed",
			summary: failed ? "Query execution failed" : `Executed ${outcomes.length} step(s)`,
			workflowId,
			decision: gate.decision,
			plan: gate.plan,
			outcomes,
			warnings,
		}
	}

	async close(): Promise<void> {
		await this.backend?.close?.()
	}

	private audit(entry: AuditLogEntry): void {
		this.logger.info("AUDIT_LOG", entry)
	}

	private now(): Date {
		return new Date(this.clock.now() * 1000)
	}
}

export interface QueryGateDependencies {
	/** Defaults to a Postgres backend on database.connection_string */
	backend?: QueryBackend
	/** Defaults to an in-memory store */
	store?: UsageEventStore
	clock?: Clock
	logger?: Logger
}

/**
 * Wire a QueryGate from configuration.
 */
export function createQueryGate(config: QueryGateConfig, deps: QueryGateDependencies = {}): QueryGate {
	const logger = deps.logger ?? createLogger(config.logging.level)
	const clock = deps.clock ?? systemClock
	const limitsFor = tenantLimitsResolver(config)

	let backend = deps.backend
	if (!backend) {
		if (!config.database.connection_string) {
			throw new QueryGateError(
				"configuration",
				"database.connection_string (DATABASE_URL) is required when no backend is supplied",
			)
		}
		const pool = createPgPool(config.database.connection_string, config.database.pool_max)
		backend = new PostgresQueryBackend(pgConnectionSource(pool), {
			statementTimeoutMs: config.database.statement_timeout_ms,
			logger,
		})
	}

	const ledger = new BudgetLedger({
		store: deps.store ?? new InMemoryUsageEventStore(),
		clock,
		windowSeconds: config.budget.window_seconds,
		budgetFor: (tenantId) => limitsFor(tenantId).hourlyBudgetBytes,
		logger,
	})

	const executor = new RetryingExecutor({
		backend,
		maxRetries: config.executor.max_retries,
		callTimeoutMs: config.executor.call_timeout_ms,
		retryableSignals: config.executor.retryable_signals,
		clock,
		stepCache: new IdempotentStepCache(),
		ledger,
		logger,
	})

	return new QueryGate({
		policy: new PolicyGate({ ledger, limitsFor, logger }),
		executor,
		limitsFor,
		backend,
		clock,
		logger,
	})
}
