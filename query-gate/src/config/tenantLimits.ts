/**
 * Per-tenant limits: global safety/budget settings overlaid with the
 * tenant's overrides from `tenants.<id>`.
 */

import { QueryGateError } from "../config.js"
import type { QueryGateConfig } from "./loadConfig.js"

export interface TenantLimits {
	defaultLimit: number
	maxJoinDepth: number
	maxSubqueryDepth: number
	partitionLookbackDays: number
	/** Fully qualified table name → date partition column */
	partitionedTables: Record<string, string>
	hourlyBudgetBytes: number
	/** Soft cap: above this a query needs approval */
	perQueryMaxBytes: number
	/** Hard cap: above this a query is rejected outright */
	perQueryMaxBytesWithApproval: number
	usdPerTib: number
}

export type TenantLimitsResolver = (tenantId: string) => TenantLimits

export function resolveTenantLimits(config: QueryGateConfig, tenantId: string): TenantLimits {
	const override = config.tenants[tenantId] ?? {}
	const limits: TenantLimits = {
		defaultLimit: override.default_limit ?? config.safety.default_limit,
		maxJoinDepth: override.max_join_depth ?? config.safety.max_join_depth,
		maxSubqueryDepth: override.max_subquery_depth ?? config.safety.max_subquery_depth,
		partitionLookbackDays: override.partition_lookback_days ?? config.safety.partition_lookback_days,
		partitionedTables: config.safety.partitioned_tables,
		hourlyBudgetBytes: override.hourly_budget_bytes ?? config.budget.hourly_budget_bytes,
		perQueryMaxBytes: override.per_query_max_bytes ?? config.budget.per_query_max_bytes,
		perQueryMaxBytesWithApproval:
			override.per_query_max_bytes_with_approval ?? config.budget.per_query_max_bytes_with_approval,
		usdPerTib: config.budget.usd_per_tib,
	}

	if (limits.perQueryMaxBytes > limits.perQueryMaxBytesWithApproval) {
		throw new QueryGateError(
			"configuration",
			`per_query_max_bytes (${limits.perQueryMaxBytes}) exceeds per_query_max_bytes_with_approval (${limits.perQueryMaxBytesWithApproval}) for tenant ${tenantId}`,
			{ tenantId },
		)
	}
	return limits
}

/**
 * Resolver bound to one config, caching each tenant's limits
 */
export function tenantLimitsResolver(config: QueryGateConfig): TenantLimitsResolver {
	const cache = new Map<string, TenantLimits>()
	return (tenantId) => {
		const cached = cache.get(tenantId)
		if (cached) return cached
		const limits = resolveTenantLimits(config, tenantId)
		cache.set(tenantId, limits)
		return limits
	}
}
