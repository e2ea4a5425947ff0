/**
 * Policy gate ("critic")
 *
 * Composes SQL safety, per-query byte caps and the tenant's rolling budget
 * into one decision per plan. Steps are checked in order and the first
 * blocking step decides; a plan is never partially approved.
 */

import type { BudgetLedger } from "./budget_ledger.js"
import { COST_MODEL } from "./config.js"
import type { TenantLimits, TenantLimitsResolver } from "./config/tenantLimits.js"
import type { Logger } from "./logger.js"
import { silentLogger } from "./logger.js"
import { assertNever, clonePlan } from "./plan.js"
import type { QueryPlan } from "./plan.js"
import { SafetyAnalyzer } from "./sql_safety.js"

export type NextAction = "none" | "revise_query" | "narrow_scope" | "preview_then_approve" | "wait_or_reduce_cost"

export interface GateDecision {
	allowed: boolean
	reasons: string[]
	/** Implies allowed=false and nextAction=preview_then_approve */
	approvalRequired: boolean
	nextAction: NextAction
	/** Plan total up to and including the deciding step */
	estimatedBytes: number
	estimatedCostUsd: number
}

export interface PreExecuteResult {
	allowed: boolean
	reasons: string[]
	/** Copy of the input plan with rewritten SQL and approved estimates */
	plan: QueryPlan
	decision: GateDecision
}

export interface PolicyGateOptions {
	ledger: BudgetLedger
	limitsFor: TenantLimitsResolver
	logger?: Logger
}

export const GATE_REASONS = {
	hardCap: "Query exceeds hard max bytes with approval",
	softCap: "Query exceeds per-query limit and requires approval",
	budget: "Hourly budget exceeded",
}

/**
 * Crude byte estimate: proportional to statement length, capped one byte
 * past the hard limit.
 */
export function estimateBytes(sql: string, limits: TenantLimits): number {
	return Math.min(sql.length * COST_MODEL.bytesPerSqlChar, limits.perQueryMaxBytesWithApproval + 1)
}

export function estimateCostUsd(bytes: number, usdPerTib: number): number {
	return Math.round((bytes / COST_MODEL.bytesPerTib) * usdPerTib * 10_000) / 10_000
}

export class PolicyGate {
	private readonly ledger: BudgetLedger
	private readonly limitsFor: TenantLimitsResolver
	private readonly logger: Logger
	private readonly analyzers = new Map<string, { limits: TenantLimits; analyzer: SafetyAnalyzer }>()

	constructor(options: PolicyGateOptions) {
		this.ledger = options.ledger
		this.limitsFor = options.limitsFor
		this.logger = options.logger ?? silentLogger
	}

	async preExecute(tenantId: string, plan: QueryPlan): Promise<PreExecuteResult> {
		const limits = this.limitsFor(tenantId)
		const analyzer = this.analyzerFor(tenantId, limits)
		const checked = clonePlan(plan)
		let planBytes = 0

		const decide = (
			reasons: string[],
			nextAction: NextAction,
			approvalRequired = false,
		): PreExecuteResult => {
			const allowed = nextAction === "none"
			const decision: GateDecision = {
				allowed,
				reasons,
				approvalRequired,
				nextAction,
				estimatedBytes: planBytes,
				estimatedCostUsd: estimateCostUsd(planBytes, limits.usdPerTib),
			}
			if (!allowed) {
				this.logger.debug("Plan blocked", { tenantId, nextAction, reasons })
			}
			return { allowed, reasons, plan: checked, decision }
		}

		for (const step of checked.steps) {
			switch (step.tool) {
				case "execute_query": {
					const verdict = analyzer.evaluate(step.inputs.sql)
					if (!verdict.allowed) return decide(verdict.reasons, "revise_query")
					if (verdict.rewrittenSql !== undefined) step.inputs.sql = verdict.rewrittenSql

					const estimate = estimateBytes(step.inputs.sql, limits)
					planBytes += estimate

					if (estimate > limits.perQueryMaxBytesWithApproval) {
						return decide([GATE_REASONS.hardCap], "narrow_scope")
					}
					if (estimate > limits.perQueryMaxBytes) {
						return decide([GATE_REASONS.softCap], "preview_then_approve", true)
					}

					// The whole plan so far has to fit, not just this step
					const budget = await this.ledger.check(tenantId, planBytes)
					if (!budget.allowed) {
						const reasons = [GATE_REASONS.budget]
						if (budget.suggestion) reasons.push(budget.suggestion)
						return decide(reasons, "wait_or_reduce_cost")
					}

					step.inputs.estimatedBytes = estimate
					break
				}
				default:
					assertNever(step.tool)
			}
		}

		return decide([], "none")
	}

	/**
	 * Advisory warnings about executed output; never blocks.
	 *
	 * @param rowLimit - LIMIT the gate injects, to flag results that hit it
	 */
	postExecute(output: Record<string, unknown>, rowLimit?: number): string[] {
		const warnings: string[] = []
		const rows = output.rows
		if (Array.isArray(rows)) {
			if (rows.length === 0) {
				warnings.push("No data returned")
			} else if (rowLimit !== undefined && rows.length >= rowLimit) {
				warnings.push(`Result truncated at ${rowLimit} rows`)
			}
		}
		return warnings
	}

	private analyzerFor(tenantId: string, limits: TenantLimits): SafetyAnalyzer {
		const cached = this.analyzers.get(tenantId)
		if (cached && cached.limits === limits) return cached.analyzer
		const analyzer = new SafetyAnalyzer(limits)
		this.analyzers.set(tenantId, { limits, analyzer })
		return analyzer
	}
}
