import { describe, it, expect, beforeEach, afterEach } from "vitest"
import type { PGlite } from "@electric-sql/pglite"
import { QueryBackendError, QueryGateError, classifyDriverError } from "./config.js"
import { RetryingExecutor } from "./executor.js"
import { PostgresQueryBackend } from "./pg_query_backend.js"
import type { ConnectionSource, PooledConnection } from "./pg_query_backend.js"
import { queryPlan } from "./plan.js"
import { createTestDb, pgliteConnectionSource } from "./test/db.js"

let db: PGlite
let backend: PostgresQueryBackend

beforeEach(async () => {
	db = createTestDb()
	await db.exec("CREATE TABLE users (id INT PRIMARY KEY, name TEXT)")
	await db.exec("INSERT INTO users VALUES (1, 'ada'), (2, 'grace')")
	backend = new PostgresQueryBackend(pgliteConnectionSource(db), { statementTimeoutMs: 5000 })
})

afterEach(async () => {
	await db.close()
})

describe("PostgresQueryBackend", () => {
	it("should return rows and their serialized size", async () => {
		const result = await backend.execute("step_1", "SELECT id, name FROM users ORDER BY id")
		expect(result.rows).toEqual([
			{ id: 1, name: "ada" },
			{ id: 2, name: "grace" },
		])
		// [{"id":1,"name":"ada"},{"id":2,"name":"grace"}]
		expect(result.bytesScanned).toBe(47)
	})

	it("should classify a missing table by SQLSTATE", async () => {
		await expect(backend.execute("step_1", "SELECT * FROM nowhere")).rejects.toMatchObject({
			name: "QueryBackendError",
			signal: "sqlstate_42P01",
		})
	})

	it("should refuse writes inside the read-only transaction", async () => {
		await expect(backend.execute("step_1", "INSERT INTO users VALUES (3, 'linus')")).rejects.toMatchObject({
			signal: "sqlstate_25006",
		})
		const count = await db.query<{ n: number }>("SELECT count(*)::int AS n FROM users")
		expect(count.rows[0].n).toBe(2)
	})

	it("should leave the connection usable after a failure", async () => {
		await expect(backend.execute("step_1", "SELECT * FROM nowhere")).rejects.toBeInstanceOf(QueryBackendError)
		const result = await backend.execute("step_2", "SELECT 1 AS n")
		expect(result.rows).toEqual([{ n: 1 }])
	})

	it("should not start a call that is already aborted", async () => {
		const controller = new AbortController()
		controller.abort()
		await expect(backend.execute("step_1", "SELECT 1", { signal: controller.signal })).rejects.toMatchObject({
			signal: "aborted",
		})
	})

	it("should reject a non-positive statement timeout", () => {
		expect(() => new PostgresQueryBackend(pgliteConnectionSource(db), { statementTimeoutMs: 0 })).toThrow(
			QueryGateError,
		)
	})
})

describe("PostgresQueryBackend — connection handling", () => {
	function fakeSource(connection: PooledConnection): ConnectionSource {
		return { connect: async () => connection }
	}

	it("should discard a connection whose rollback fails", async () => {
		const released: Array<Error | undefined> = []
		const connection: PooledConnection = {
			query: async (text) => {
				if (text === "BEGIN READ ONLY" || text.startsWith("SET LOCAL")) return { rows: [] }
				if (text === "ROLLBACK") throw new Error("connection lost")
				throw Object.assign(new Error("server closed the connection"), { code: "08006" })
			},
			release: (error) => {
				released.push(error)
			},
		}
		const flaky = new PostgresQueryBackend(fakeSource(connection), { statementTimeoutMs: 1000 })

		await expect(flaky.execute("step_1", "SELECT 1")).rejects.toMatchObject({ signal: "transient_error" })
		expect(released).toHaveLength(1)
		expect(released[0]?.message).toBe("connection lost")
	})

	it("should map connect failures through the same classification", async () => {
		const source: ConnectionSource = {
			connect: async () => {
				throw Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" })
			},
		}
		const down = new PostgresQueryBackend(source, { statementTimeoutMs: 1000 })
		await expect(down.execute("step_1", "SELECT 1")).rejects.toMatchObject({ signal: "transient_error" })
	})
})

describe("PostgresQueryBackend — aborted calls", () => {
	const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

	/**
	 * Connection source whose SELECTs take `queryMs`. Releasing a connection
	 * with an error ends its running SELECT, as pg does when it destroys a
	 * client.
	 */
	function slowSource(queryMs: number, connectMs = 0) {
		const statements: string[] = []
		const stats = { statements, running: 0, maxRunning: 0, released: 0, discarded: 0 }
		const source: ConnectionSource = {
			connect: async () => {
				if (connectMs > 0) await delay(connectMs)
				let cancel: ((error: Error) => void) | undefined
				return {
					query: (text) => {
						stats.statements.push(text)
						if (!text.startsWith("SELECT")) return Promise.resolve({ rows: [] })
						stats.running++
						stats.maxRunning = Math.max(stats.maxRunning, stats.running)
						return new Promise<{ rows: unknown[] }>((resolve, reject) => {
							const timer = setTimeout(() => {
								stats.running--
								cancel = undefined
								resolve({ rows: [{ n: 1 }] })
							}, queryMs)
							cancel = (error) => {
								clearTimeout(timer)
								stats.running--
								cancel = undefined
								reject(error)
							}
						})
					},
					release: (error) => {
						if (!error) {
							stats.released++
							return
						}
						stats.discarded++
						cancel?.(error)
					},
				}
			},
		}
		return { source, stats }
	}

	it("should end a timed-out query before the executor retries", async () => {
		const { source, stats } = slowSource(150)
		const executor = new RetryingExecutor({
			backend: new PostgresQueryBackend(source, { statementTimeoutMs: 1000 }),
			callTimeoutMs: 30,
			maxRetries: 2,
		})

		const [outcome] = await executor.run(queryPlan("g", ["SELECT 1"]))

		expect(outcome.status).toBe("failed")
		expect(outcome.retryCount).toBe(2)
		expect(outcome.error).toBe("timeout: Backend call timed out after 30ms")
		expect(stats.maxRunning).toBe(1)
		expect(stats.running).toBe(0)
		expect(stats.discarded).toBe(3)
		expect(stats.statements.filter((text) => text === "COMMIT" || text === "ROLLBACK")).toEqual([])
	})

	it("should send nothing on a connection that arrives after the timeout", async () => {
		const { source, stats } = slowSource(10, 100)
		const executor = new RetryingExecutor({
			backend: new PostgresQueryBackend(source, { statementTimeoutMs: 1000 }),
			callTimeoutMs: 20,
			maxRetries: 0,
		})

		const [outcome] = await executor.run(queryPlan("g", ["SELECT 1"]))
		expect(outcome.status).toBe("failed")

		await delay(150)
		expect(stats.statements).toEqual([])
		expect(stats.released).toBe(1)
		expect(stats.discarded).toBe(0)
	})
})

describe("classifyDriverError", () => {
	it("should map driver codes to signals", () => {
		expect(classifyDriverError({ code: "57014" })).toBe("timeout")
		expect(classifyDriverError({ code: "40001" })).toBe("transient_error")
		expect(classifyDriverError({ code: "08003" })).toBe("transient_error")
		expect(classifyDriverError({ code: "ETIMEDOUT" })).toBe("transient_error")
		expect(classifyDriverError({ code: "42601" })).toBe("sqlstate_42601")
	})

	it("should fall back to a generic signal", () => {
		expect(classifyDriverError(new Error("boom"))).toBe("backend_error")
		expect(classifyDriverError({ code: "weird" })).toBe("backend_error")
		expect(classifyDriverError(null)).toBe("backend_error")
	})
})
