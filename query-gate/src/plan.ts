/**
 * Query plan model
 *
 * A plan is an ordered list of steps, each naming a tool and its inputs.
 * Tools form a tagged union on `tool`; adding one means adding a schema to
 * PlanStepSchema and a case everywhere steps are switched on.
 */

import { z } from "zod"

export const ExecuteQueryStepSchema = z.object({
	stepId: z.number().int().nonnegative(),
	tool: z.literal("execute_query"),
	inputs: z.object({
		sql: z.string({ required_error: "execute_query missing sql" }).min(1, "execute_query missing sql"),
		/** Set by the policy gate once the step is approved */
		estimatedBytes: z.number().int().nonnegative().optional(),
	}),
	riskFlags: z.array(z.string()).default([]),
})

export const PlanStepSchema = z.discriminatedUnion("tool", [ExecuteQueryStepSchema])

export const QueryPlanSchema = z
	.object({
		goal: z.string().min(1, "plan missing goal"),
		steps: z.array(PlanStepSchema).min(1, "plan has no steps"),
		requiredApprovals: z.array(z.string()).default([]),
	})
	.superRefine((plan, ctx) => {
		const seen = new Set<number>()
		plan.steps.forEach((step, index) => {
			if (seen.has(step.stepId)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["steps", index, "stepId"],
					message: `duplicate stepId ${step.stepId}`,
				})
			}
			seen.add(step.stepId)
		})
	})

export type ExecuteQueryStep = z.infer<typeof ExecuteQueryStepSchema>
export type PlanStep = z.infer<typeof PlanStepSchema>
export type QueryPlan = z.infer<typeof QueryPlanSchema>
export type ToolName = PlanStep["tool"]

export type PlanValidation = { valid: true; plan: QueryPlan } | { valid: false; errors: string[] }

/**
 * Validate untrusted plan input.
 *
 * Errors read `<path>: <message>`, e.g. `steps.0.inputs.sql: execute_query missing sql`.
 */
export function validatePlan(raw: unknown): PlanValidation {
	const result = QueryPlanSchema.safeParse(raw)
	if (result.success) return { valid: true, plan: result.data }
	return {
		valid: false,
		errors: result.error.issues.map((issue) => `${issue.path.join(".") || "plan"}: ${issue.message}`),
	}
}

/** Name used in outcomes, audit entries and idempotency keys */
export function stepName(step: PlanStep): string {
	return `${step.tool}#${step.stepId}`
}

export function queryStep(stepId: number, sql: string): ExecuteQueryStep {
	return { stepId, tool: "execute_query", inputs: { sql }, riskFlags: [] }
}

export function queryPlan(goal: string, sqls: string[]): QueryPlan {
	return { goal, steps: sqls.map((sql, index) => queryStep(index + 1, sql)), requiredApprovals: [] }
}

export function clonePlan(plan: QueryPlan): QueryPlan {
	return {
		goal: plan.goal,
		requiredApprovals: [...plan.requiredApprovals],
		steps: plan.steps.map((step) => ({ ...step, inputs: { ...step.inputs }, riskFlags: [...step.riskFlags] })),
	}
}

export function assertNever(value: never): never {
	throw new Error(`Unhandled plan step: ${JSON.stringify(value)}`)
}
