/**
 * Usage event storage for the budget ledger
 */

export interface UsageEvent {
	tenantId: string
	/** Seconds since the epoch */
	timestamp: number
	bytes: number
}

/**
 * Ordered, append-only event log per tenant.
 *
 * The ledger serializes calls per tenant; implementations need no locking
 * of their own.
 */
export interface UsageEventStore {
	append(event: UsageEvent): Promise<void>
	/** Remove events with timestamp <= cutoff; returns how many were removed */
	prune(tenantId: string, cutoff: number): Promise<number>
	/** Events in timestamp order */
	list(tenantId: string): Promise<UsageEvent[]>
}

export class InMemoryUsageEventStore implements UsageEventStore {
	private readonly events = new Map<string, UsageEvent[]>()

	async append(event: UsageEvent): Promise<void> {
		const list = this.events.get(event.tenantId) ?? []
		// Keep timestamp order even if the clock steps backwards
		let at = list.length
		while (at > 0 && list[at - 1].timestamp > event.timestamp) at--
		list.splice(at, 0, { ...event })
		this.events.set(event.tenantId, list)
	}

	async prune(tenantId: string, cutoff: number): Promise<number> {
		const list = this.events.get(tenantId)
		if (!list) return 0
		let expired = 0
		while (expired < list.length && list[expired].timestamp <= cutoff) expired++
		list.splice(0, expired)
		if (list.length === 0) this.events.delete(tenantId)
		return expired
	}

	async list(tenantId: string): Promise<UsageEvent[]> {
		return (this.events.get(tenantId) ?? []).map((event) => ({ ...event }))
	}

	/** Tenants with at least one live event */
	get tenantCount(): number {
		return this.events.size
	}
}
