/**
 * Public API
 */

export { QueryGate, createQueryGate, APPROVAL_MESSAGE } from "./query_gate.js"
export type {
	GateRequest,
	GateResponse,
	ErrorResponse,
	BlockedResponse,
	ExecutionResponse,
	QueryGateDependencies,
} from "./query_gate.js"

export { PolicyGate, GATE_REASONS, estimateBytes, estimateCostUsd } from "./policy_gate.js"
export type { GateDecision, NextAction, PreExecuteResult } from "./policy_gate.js"

export { SafetyAnalyzer } from "./sql_safety.js"
export type { SafetyLimits, SqlVerdict } from "./sql_safety.js"
export { tokenizeSql, maskSql } from "./sql_tokenizer.js"
export type { SqlToken, SqlTokenKind } from "./sql_tokenizer.js"

export { BudgetLedger, BUDGET_SUGGESTION } from "./budget_ledger.js"
export type { BudgetStatus, BudgetLedgerOptions } from "./budget_ledger.js"
export { InMemoryUsageEventStore } from "./usage_store.js"
export type { UsageEvent, UsageEventStore } from "./usage_store.js"
export { PostgresUsageEventStore, poolQueryable } from "./pg_usage_store.js"
export type { Queryable } from "./pg_usage_store.js"

export { RetryingExecutor } from "./executor.js"
export type { ExecutionScope, RetryingExecutorOptions } from "./executor.js"
export { IdempotentStepCache } from "./step_cache.js"
export type { StepOutcome, StepStatus } from "./step_outcome.js"

export { ScriptedQueryBackend, withTimeout } from "./query_backend.js"
export type { QueryBackend, QueryResultPayload, ScriptedFailure } from "./query_backend.js"
export { PostgresQueryBackend, createPgPool, pgConnectionSource } from "./pg_query_backend.js"

export { validatePlan, queryPlan, queryStep, stepName } from "./plan.js"
export type { QueryPlan, PlanStep, ExecuteQueryStep } from "./plan.js"

export { canonicalize, contentHash } from "./canonical_hash.js"
export { ManualClock, systemClock } from "./clock.js"
export type { Clock } from "./clock.js"
export { QueryGateError, QueryBackendError, classifyDriverError } from "./config.js"
export { loadConfig, getConfig, resetConfig, parseConfig } from "./config/loadConfig.js"
export type { QueryGateConfig } from "./config/loadConfig.js"
export { resolveTenantLimits } from "./config/tenantLimits.js"
export type { TenantLimits } from "./config/tenantLimits.js"
export { createLogger, silentLogger } from "./logger.js"
export type { Logger, LogLevel } from "./logger.js"
