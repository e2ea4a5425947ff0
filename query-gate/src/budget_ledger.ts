/**
 * Sliding-window budget accounting per tenant
 *
 * Every check looks back exactly `windowSeconds` from now, so usage decays
 * continuously instead of resetting on clock-aligned hours. Checks are
 * speculative and never write; only `record` (called after a step actually
 * ran) appends usage.
 */

import type { Clock } from "./clock.js"
import { systemClock } from "./clock.js"
import { QueryGateError } from "./config.js"
import { KeyedMutex } from "./keyed_mutex.js"
import type { Logger } from "./logger.js"
import { silentLogger } from "./logger.js"
import type { UsageEventStore } from "./usage_store.js"

export interface BudgetStatus {
	allowed: boolean
	/** Usage in the window; includes the estimate when allowed */
	bytesUsed: number
	bytesRemaining: number
	budget: number
	suggestion?: string
}

export interface BudgetLedgerOptions {
	store: UsageEventStore
	budgetFor: (tenantId: string) => number
	clock?: Clock
	windowSeconds?: number
	logger?: Logger
}

export const BUDGET_SUGGESTION = "Try sampling or a narrower time range"

export class BudgetLedger {
	private readonly store: UsageEventStore
	private readonly budgetFor: (tenantId: string) => number
	private readonly clock: Clock
	private readonly windowSeconds: number
	private readonly logger: Logger
	private readonly locks = new KeyedMutex()

	constructor(options: BudgetLedgerOptions) {
		this.store = options.store
		this.budgetFor = options.budgetFor
		this.clock = options.clock ?? systemClock
		this.windowSeconds = options.windowSeconds ?? 3600
		this.logger = options.logger ?? silentLogger

		if (!(this.windowSeconds > 0)) {
			throw new QueryGateError("configuration", `windowSeconds must be positive, got ${this.windowSeconds}`)
		}
	}

	async check(tenantId: string, estimatedBytes: number): Promise<BudgetStatus> {
		requireBytes("estimatedBytes", estimatedBytes)
		const budget = this.budget(tenantId)

		return this.locks.runExclusive(tenantId, async () => {
			const used = await this.windowUsage(tenantId)

			if (used + estimatedBytes > budget) {
				this.logger.warn("Tenant budget exceeded", { tenantId, used, estimatedBytes, budget })
				return {
					allowed: false,
					bytesUsed: used,
					bytesRemaining: Math.max(0, budget - used),
					budget,
					suggestion: BUDGET_SUGGESTION,
				}
			}

			const projected = used + Math.ceil(estimatedBytes)
			return { allowed: true, bytesUsed: projected, bytesRemaining: budget - projected, budget }
		})
	}

	async record(tenantId: string, actualBytes: number): Promise<void> {
		requireBytes("actualBytes", actualBytes)
		await this.locks.runExclusive(tenantId, () =>
			this.store.append({ tenantId, timestamp: this.clock.now(), bytes: actualBytes }),
		)
		this.logger.debug("Usage recorded", { tenantId, bytes: actualBytes })
	}

	/** Bytes counted against the tenant right now */
	async usage(tenantId: string): Promise<number> {
		return this.locks.runExclusive(tenantId, () => this.windowUsage(tenantId))
	}

	private async windowUsage(tenantId: string): Promise<number> {
		await this.store.prune(tenantId, this.clock.now() - this.windowSeconds)
		const events = await this.store.list(tenantId)
		return Math.floor(events.reduce((sum, event) => sum + event.bytes, 0))
	}

	private budget(tenantId: string): number {
		const budget = this.budgetFor(tenantId)
		if (!Number.isInteger(budget) || budget <= 0) {
			throw new QueryGateError("configuration", `Budget for tenant ${tenantId} must be a positive integer`, {
				tenantId,
				budget,
			})
		}
		return budget
	}
}

function requireBytes(name: string, value: number): void {
	if (!Number.isFinite(value) || value < 0) {
		throw new QueryGateError("invalid_argument", `${name} must be a finite number >= 0, got ${value}`)
	}
}
