export type StepStatus = "success" | "failed" | "skipped"

/**
 * Result of one plan step
 *
 * `failed` always carries `error`; `success` never does. `output` holds no
 * timestamps or generated ids, so `outputHash` is stable for identical
 * results.
 */
export interface StepOutcome {
	stepName: string
	status: StepStatus
	output: Record<string, unknown>
	outputHash: string
	startedAt: Date
	finishedAt: Date
	retryCount: number
	error?: string
}

export function cloneOutcome(outcome: StepOutcome): StepOutcome {
	return {
		...outcome,
		output: structuredClone(outcome.output),
		startedAt: new Date(outcome.startedAt.getTime()),
		finishedAt: new Date(outcome.finishedAt.getTime()),
	}
}
