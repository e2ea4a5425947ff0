import { describe, it, expect } from "vitest"
import { BUDGET_SUGGESTION, BudgetLedger } from "./budget_ledger.js"
import { ManualClock } from "./clock.js"
import { QueryGateError } from "./config.js"
import { InMemoryUsageEventStore } from "./usage_store.js"

const MIB = 1024 * 1024

function createLedger(budget: number, clock = new ManualClock(10_000)) {
	const store = new InMemoryUsageEventStore()
	const ledger = new BudgetLedger({ store, clock, budgetFor: () => budget })
	return { ledger, store, clock }
}

describe("BudgetLedger", () => {
	it("should report the remaining headroom after the estimate", async () => {
		const { ledger } = createLedger(1000)
		expect(await ledger.check("acme", 100)).toEqual({
			allowed: true,
			bytesUsed: 100,
			bytesRemaining: 900,
			budget: 1000,
		})
	})

	it("should deny an estimate that would overshoot the budget", async () => {
		const { ledger } = createLedger(MIB)
		await ledger.record("acme", MIB - 1024)

		const status = await ledger.check("acme", 2048)
		expect(status).toEqual({
			allowed: false,
			bytesUsed: MIB - 1024,
			bytesRemaining: 1024,
			budget: MIB,
			suggestion: BUDGET_SUGGESTION,
		})
	})

	it("should allow an estimate that exactly fills the budget", async () => {
		const { ledger } = createLedger(1000)
		await ledger.record("acme", 900)
		const status = await ledger.check("acme", 100)
		expect(status.allowed).toBe(true)
		expect(status.bytesUsed + status.bytesRemaining).toBe(status.budget)
		expect(status.bytesRemaining).toBe(0)
	})

	it("should clamp remaining bytes at zero when already over budget", async () => {
		const { ledger } = createLedger(1000)
		await ledger.record("acme", 1500)
		const status = await ledger.check("acme", 1)
		expect(status.allowed).toBe(false)
		expect(status.bytesRemaining).toBe(0)
		expect(status.bytesUsed).toBe(1500)
	})

	it("should forget usage once it leaves the rolling window", async () => {
		const { ledger, clock, store } = createLedger(1000)
		await ledger.record("acme", 600)
		expect(await ledger.usage("acme")).toBe(600)

		clock.advance(3599)
		expect(await ledger.usage("acme")).toBe(600)

		clock.advance(1)
		expect(await ledger.usage("acme")).toBe(0)
		expect(store.tenantCount).toBe(0)
	})

	it("should decay usage event by event", async () => {
		const { ledger, clock } = createLedger(1000)
		await ledger.record("acme", 300)
		clock.advance(1800)
		await ledger.record("acme", 200)

		clock.advance(1800)
		expect(await ledger.usage("acme")).toBe(200)
		expect((await ledger.check("acme", 800)).allowed).toBe(true)
	})

	it("should keep tenants independent", async () => {
		const { ledger } = createLedger(1000)
		await ledger.record("acme", 1000)
		expect((await ledger.check("acme", 1)).allowed).toBe(false)
		expect((await ledger.check("globex", 1000)).allowed).toBe(true)
	})

	it("should never record speculative checks", async () => {
		const { ledger } = createLedger(1000)
		await ledger.check("acme", 700)
		await ledger.check("acme", 700)
		expect(await ledger.usage("acme")).toBe(0)
	})

	it("should reject negative or non-finite byte counts", async () => {
		const { ledger } = createLedger(1000)
		await expect(ledger.record("acme", -1)).rejects.toThrow(QueryGateError)
		await expect(ledger.check("acme", Number.NaN)).rejects.toThrow(QueryGateError)
	})

	it("should reject a non-positive budget", async () => {
		const { ledger } = createLedger(0)
		await expect(ledger.check("acme", 1)).rejects.toThrow("Budget for tenant acme must be a positive integer")
	})

	it("should serialize concurrent records for one tenant", async () => {
		const { ledger } = createLedger(10_000)
		await Promise.all(Array.from({ length: 20 }, () => ledger.record("acme", 50)))
		expect(await ledger.usage("acme")).toBe(1000)
	})
})
