import { describe, it, expect } from "vitest"
import { BUDGET_SUGGESTION, BudgetLedger } from "./budget_ledger.js"
import { ManualClock } from "./clock.js"
import type { TenantLimits } from "./config/tenantLimits.js"
import { queryPlan } from "./plan.js"
import { GATE_REASONS, PolicyGate, estimateBytes, estimateCostUsd } from "./policy_gate.js"
import { InMemoryUsageEventStore } from "./usage_store.js"

// ============================================================================
// Test Fixtures
// ============================================================================

const BASE_LIMITS: TenantLimits = {
	defaultLimit: 10000,
	maxJoinDepth: 5,
	maxSubqueryDepth: 3,
	partitionLookbackDays: 30,
	partitionedTables: {},
	hourlyBudgetBytes: 1_000_000,
	perQueryMaxBytes: 100_000,
	perQueryMaxBytesWithApproval: 200_000,
	usdPerTib: 5,
}

// "SELECT id FROM users LIMIT 10000" is 32 characters
const REWRITTEN = "SELECT id FROM users LIMIT 10000"
const REWRITTEN_BYTES = 32 * 2048

function createGate(overrides: Partial<TenantLimits> = {}) {
	const limits: TenantLimits = { ...BASE_LIMITS, ...overrides }
	const ledger = new BudgetLedger({
		store: new InMemoryUsageEventStore(),
		clock: new ManualClock(1_000),
		budgetFor: () => limits.hourlyBudgetBytes,
	})
	const gate = new PolicyGate({ ledger, limitsFor: () => limits })
	return { gate, ledger }
}

// ============================================================================
// preExecute
// ============================================================================

describe("PolicyGate.preExecute", () => {
	it("should approve a safe plan and return the rewritten copy", async () => {
		const { gate } = createGate()
		const plan = queryPlan("list users", ["SELECT id FROM users"])

		const result = await gate.preExecute("acme", plan)

		expect(result.allowed).toBe(true)
		expect(result.reasons).toEqual([])
		expect(result.decision).toEqual({
			allowed: true,
			reasons: [],
			approvalRequired: false,
			nextAction: "none",
			estimatedBytes: REWRITTEN_BYTES,
			estimatedCostUsd: 0,
		})
		expect(result.plan.steps[0].inputs).toEqual({ sql: REWRITTEN, estimatedBytes: REWRITTEN_BYTES })
		expect(plan.steps[0].inputs).toEqual({ sql: "SELECT id FROM users" })
	})

	it("should ask for a revision when the SQL is unsafe", async () => {
		const { gate } = createGate()
		const result = await gate.preExecute("acme", queryPlan("cleanup", ["DELETE FROM users"]))

		expect(result.allowed).toBe(false)
		expect(result.reasons).toEqual(["Blocked operation: DELETE"])
		expect(result.decision.nextAction).toBe("revise_query")
		expect(result.decision.approvalRequired).toBe(false)
		expect(result.decision.estimatedBytes).toBe(0)
	})

	it("should require approval above the per-query limit", async () => {
		const { gate } = createGate({ perQueryMaxBytes: 50_000 })
		const result = await gate.preExecute("acme", queryPlan("list users", ["SELECT id FROM users"]))

		expect(result.allowed).toBe(false)
		expect(result.reasons).toEqual([GATE_REASONS.softCap])
		expect(result.decision).toMatchObject({
			approvalRequired: true,
			nextAction: "preview_then_approve",
			estimatedBytes: REWRITTEN_BYTES,
		})
	})

	it("should reject outright above the hard cap", async () => {
		const { gate } = createGate({ perQueryMaxBytes: 50_000, perQueryMaxBytesWithApproval: 60_000 })
		const result = await gate.preExecute("acme", queryPlan("list users", ["SELECT id FROM users"]))

		expect(result.allowed).toBe(false)
		expect(result.reasons).toEqual(["Query exceeds hard max bytes with approval"])
		expect(result.decision).toMatchObject({
			approvalRequired: false,
			nextAction: "narrow_scope",
			estimatedBytes: 60_001,
		})
	})

	it("should deny when the tenant budget cannot cover the estimate", async () => {
		const { gate, ledger } = createGate({ hourlyBudgetBytes: 100_000 })
		await ledger.record("acme", 50_000)

		const result = await gate.preExecute("acme", queryPlan("list users", ["SELECT id FROM users"]))

		expect(result.allowed).toBe(false)
		expect(result.reasons).toEqual(["Hourly budget exceeded", BUDGET_SUGGESTION])
		expect(result.decision.nextAction).toBe("wait_or_reduce_cost")
	})

	it("should count every step of the plan against the budget", async () => {
		const { gate } = createGate({ hourlyBudgetBytes: 100_000 })
		const plan = queryPlan("two lists", ["SELECT id FROM users", "SELECT id FROM users"])

		const result = await gate.preExecute("acme", plan)

		expect(result.allowed).toBe(false)
		expect(result.decision.nextAction).toBe("wait_or_reduce_cost")
		expect(result.decision.estimatedBytes).toBe(2 * REWRITTEN_BYTES)
	})

	it("should stop at the first blocking step", async () => {
		const { gate } = createGate()
		const plan = queryPlan("mixed", ["DROP TABLE users", "SELECT pg_sleep(1)"])
		const result = await gate.preExecute("acme", plan)
		expect(result.reasons).toEqual(["Blocked operation: DROP"])
	})

	it("should never write to the ledger", async () => {
		const { gate, ledger } = createGate()
		await gate.preExecute("acme", queryPlan("list users", ["SELECT id FROM users"]))
		expect(await ledger.usage("acme")).toBe(0)
	})
})

// ============================================================================
// postExecute
// ============================================================================

describe("PolicyGate.postExecute", () => {
	const { gate } = createGate()

	it("should warn when no rows come back", () => {
		expect(gate.postExecute({ rows: [] })).toEqual(["No data returned"])
	})

	it("should warn when the row limit was hit", () => {
		expect(gate.postExecute({ rows: [{ id: 1 }, { id: 2 }] }, 2)).toEqual(["Result truncated at 2 rows"])
	})

	it("should stay quiet for ordinary results", () => {
		expect(gate.postExecute({ rows: [{ id: 1 }] }, 2)).toEqual([])
		expect(gate.postExecute({})).toEqual([])
	})
})

// ============================================================================
// Estimates
// ============================================================================

describe("estimates", () => {
	it("should cap the byte estimate one past the hard limit", () => {
		expect(estimateBytes("SELECT 1", BASE_LIMITS)).toBe(8 * 2048)
		expect(estimateBytes("x".repeat(1000), BASE_LIMITS)).toBe(200_001)
	})

	it("should price a tebibyte at the configured rate", () => {
		expect(estimateCostUsd(1024 ** 4, 5)).toBe(5)
		expect(estimateCostUsd(1024 ** 4 / 2, 6.25)).toBe(3.125)
	})
})
