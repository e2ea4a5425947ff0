/**
 * Postgres-backed usage event store
 *
 * Lets several gate processes share one budget per tenant. Per-tenant
 * serialization still happens in-process (BudgetLedger), so processes
 * racing on the same tenant can overshoot by one query each.
 */

import type { Pool } from "pg"
import { z } from "zod"
import type { UsageEvent, UsageEventStore } from "./usage_store.js"

/** The slice of a pg Pool / PGlite instance the store needs */
export interface Queryable {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
}

export function poolQueryable(pool: Pool): Queryable {
	return { query: (text, values) => pool.query(text, values) }
}

const UsageRowSchema = z.object({
	tenant_id: z.string(),
	ts: z.coerce.number(),
	bytes: z.coerce.number(),
})

export class PostgresUsageEventStore implements UsageEventStore {
	constructor(private readonly db: Queryable) {}

	/** Create the table and index if missing */
	async ensureSchema(): Promise<void> {
		await this.db.query(`
			CREATE TABLE IF NOT EXISTS usage_events (
				id BIGSERIAL PRIMARY KEY,
				tenant_id TEXT NOT NULL,
				ts DOUBLE PRECISION NOT NULL,
				bytes DOUBLE PRECISION NOT NULL CHECK (bytes >= 0)
			)
		`)
		await this.db.query("CREATE INDEX IF NOT EXISTS usage_events_tenant_ts_idx ON usage_events (tenant_id, ts)")
	}

	async append(event: UsageEvent): Promise<void> {
		await this.db.query("INSERT INTO usage_events (tenant_id, ts, bytes) VALUES ($1, $2, $3)", [
			event.tenantId,
			event.timestamp,
			event.bytes,
		])
	}

	async prune(tenantId: string, cutoff: number): Promise<number> {
		const result = await this.db.query("DELETE FROM usage_events WHERE tenant_id = $1 AND ts <= $2 RETURNING id", [
			tenantId,
			cutoff,
		])
		return result.rows.length
	}

	async list(tenantId: string): Promise<UsageEvent[]> {
		const result = await this.db.query(
			"SELECT tenant_id, ts, bytes FROM usage_events WHERE tenant_id = $1 ORDER BY ts, id",
			[tenantId],
		)
		return result.rows.map((row) => {
			const parsed = UsageRowSchema.parse(row)
			return { tenantId: parsed.tenant_id, timestamp: parsed.ts, bytes: parsed.bytes }
		})
	}
}
