import { describe, it, expect } from "vitest"
import { IdempotentStepCache } from "./step_cache.js"
import type { StepOutcome } from "./step_outcome.js"

function outcome(status: StepOutcome["status"], rows: unknown[] = [{ id: 1 }]): StepOutcome {
	return {
		stepName: "execute_query#1",
		status,
		output: status === "success" ? { rows } : {},
		outputHash: "hash",
		startedAt: new Date(0),
		finishedAt: new Date(1000),
		retryCount: 0,
		error: status === "failed" ? "permanent_error" : undefined,
	}
}

describe("IdempotentStepCache", () => {
	it("should derive the same key regardless of payload key order", () => {
		const cache = new IdempotentStepCache()
		const a = cache.key("acme", "wf-1", "execute_query#1", { tool: "execute_query", sql: "SELECT 1" })
		const b = cache.key("acme", "wf-1", "execute_query#1", { sql: "SELECT 1", tool: "execute_query" })
		expect(a).toBe(b)
		expect(a).toMatch(/^[0-9a-f]{64}$/)
	})

	it("should separate keys by tenant, workflow, step and payload", () => {
		const cache = new IdempotentStepCache()
		const base = cache.key("acme", "wf-1", "execute_query#1", { sql: "SELECT 1" })
		expect(cache.key("globex", "wf-1", "execute_query#1", { sql: "SELECT 1" })).not.toBe(base)
		expect(cache.key("acme", "wf-2", "execute_query#1", { sql: "SELECT 1" })).not.toBe(base)
		expect(cache.key("acme", "wf-1", "execute_query#1", { sql: "SELECT 2" })).not.toBe(base)
		expect(cache.key("acme", "wf-1", "execute_query#2", { sql: "SELECT 1" })).not.toBe(base)
	})

	it("should hand out copies so callers cannot change stored outcomes", () => {
		const cache = new IdempotentStepCache()
		cache.put("k", outcome("success"))
		const first = cache.get("k")
		if (first) first.output.rows = []
		expect(cache.get("k")?.output).toEqual({ rows: [{ id: 1 }] })
	})

	it("should run once and replay afterwards", async () => {
		const cache = new IdempotentStepCache()
		let runs = 0
		const run = async () => {
			runs++
			return outcome("success")
		}

		const first = await cache.runOnce("k", run)
		const second = await cache.runOnce("k", run)

		expect(runs).toBe(1)
		expect(first.replayed).toBe(false)
		expect(second.replayed).toBe(true)
		expect(second.outcome).toEqual(first.outcome)
		expect(cache.size).toBe(1)
	})

	it("should not store failed outcomes", async () => {
		const cache = new IdempotentStepCache()
		let runs = 0
		const run = async () => {
			runs++
			return outcome("failed")
		}

		await cache.runOnce("k", run)
		const again = await cache.runOnce("k", run)

		expect(runs).toBe(2)
		expect(again.replayed).toBe(false)
		expect(cache.size).toBe(0)
	})

	it("should let concurrent callers share one run", async () => {
		const cache = new IdempotentStepCache()
		let runs = 0
		let finish: () => void = () => {}
		const gate = new Promise<void>((resolve) => {
			finish = resolve
		})
		const run = async () => {
			runs++
			await gate
			return outcome("success")
		}

		const pending = [cache.runOnce("k", run), cache.runOnce("k", run), cache.runOnce("k", run)]
		finish()
		const results = await Promise.all(pending)

		expect(runs).toBe(1)
		expect(results.map((r) => r.replayed)).toEqual([false, true, true])
	})

	it("should release the in-flight slot when a run throws", async () => {
		const cache = new IdempotentStepCache()
		await expect(
			cache.runOnce("k", async () => {
				throw new Error("boom")
			}),
		).rejects.toThrow("boom")
		const retry = await cache.runOnce("k", async () => outcome("success"))
		expect(retry.replayed).toBe(false)
	})
})
