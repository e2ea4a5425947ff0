/**
 * Postgres query backend
 *
 * Each call checks out a pooled connection and runs the statement inside a
 * READ ONLY transaction with a local statement_timeout, so even SQL that
 * slipped past the safety analyzer cannot write. Driver errors are mapped
 * to failure signals with classifyDriverError().
 */

import pg from "pg"
import type { Pool } from "pg"
import { z } from "zod"
import { canonicalize } from "./canonical_hash.js"
import { QueryBackendError, QueryGateError, classifyDriverError, errorCode } from "./config.js"
import type { Logger } from "./logger.js"
import { silentLogger } from "./logger.js"
import type { ExecuteOptions, QueryBackend, QueryResultPayload } from "./query_backend.js"

export interface PooledConnection {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
	/** Passing an error discards the connection instead of returning it */
	release(error?: Error): void
}

export interface ConnectionSource {
	connect(): Promise<PooledConnection>
	end?(): Promise<void>
}

export function createPgPool(connectionString: string, max: number): Pool {
	return new pg.Pool({ connectionString, max })
}

export function pgConnectionSource(pool: Pool): ConnectionSource {
	return {
		connect: async () => {
			const client = await pool.connect()
			return {
				query: (text, values) => client.query(text, values),
				release: (error) => client.release(error),
			}
		},
		end: () => pool.end(),
	}
}

export interface PostgresQueryBackendOptions {
	statementTimeoutMs: number
	logger?: Logger
}

const RowSchema = z.record(z.unknown())

export class PostgresQueryBackend implements QueryBackend {
	private readonly statementTimeoutMs: number
	private readonly logger: Logger

	constructor(
		private readonly source: ConnectionSource,
		options: PostgresQueryBackendOptions,
	) {
		if (!Number.isInteger(options.statementTimeoutMs) || options.statementTimeoutMs <= 0) {
			throw new QueryGateError("configuration", "statementTimeoutMs must be a positive integer", {
				statementTimeoutMs: options.statementTimeoutMs,
			})
		}
		this.statementTimeoutMs = options.statementTimeoutMs
		this.logger = options.logger ?? silentLogger
	}

	/**
	 * An abort (the executor's call timeout) discards the connection, which
	 * ends any statement still running on it, and no further statement is
	 * sent once the signal has fired.
	 */
	async execute(stepId: string, sql: string, options: ExecuteOptions = {}): Promise<QueryResultPayload> {
		const { signal } = options
		if (signal?.aborted) throw abortedError()

		const client = await this.connect()

		// Connected after the caller gave up: hand the connection back untouched
		if (signal?.aborted) {
			client.release()
			throw abortedError()
		}

		let released = false
		const release = (error?: Error) => {
			if (released) return
			released = true
			signal?.removeEventListener("abort", onAbort)
			client.release(error)
		}
		const onAbort = () => {
			this.logger.warn("Backend call aborted, discarding connection", { stepId })
			release(new Error("Backend call aborted"))
		}
		signal?.addEventListener("abort", onAbort, { once: true })

		const run = async (text: string) => {
			if (released) throw abortedError()
			return client.query(text)
		}

		try {
			await run("BEGIN READ ONLY")
			await run(`SET LOCAL statement_timeout = ${this.statementTimeoutMs}`)
			const result = await run(sql)
			await run("COMMIT")

			const rows = result.rows.map((row) => RowSchema.parse(row))
			release()
			return { rows, bytesScanned: Buffer.byteLength(canonicalize(rows)) }
		} catch (error) {
			if (!released) release(await this.rollback(client, stepId))
			throw toBackendError(error)
		}
	}

	async close(): Promise<void> {
		await this.source.end?.()
	}

	private async connect(): Promise<PooledConnection> {
		try {
			return await this.source.connect()
		} catch (error) {
			throw toBackendError(error)
		}
	}

	/** Returns the rollback error when the connection must be discarded */
	private async rollback(client: PooledConnection, stepId: string): Promise<Error | undefined> {
		try {
			await client.query("ROLLBACK")
			return undefined
		} catch (error) {
			this.logger.warn("Rollback failed, discarding connection", { stepId, error: String(error) })
			return error instanceof Error ? error : new Error(String(error))
		}
	}
}

function abortedError(): QueryBackendError {
	return new QueryBackendError("aborted", "Backend call aborted")
}

function toBackendError(error: unknown): QueryBackendError {
	if (error instanceof QueryBackendError) return error
	const message = error instanceof Error ? error.message : String(error)
	return new QueryBackendError(classifyDriverError(error), message, { code: errorCode(error) })
}
