/**
 * Idempotent step cache
 *
 * Outcomes are stored under a digest of (tenant, workflow, step, payload),
 * so replaying a workflow step with identical input returns the earlier
 * outcome instead of running it again. At most one execution per key is in
 * flight; concurrent callers with the same key wait for it.
 *
 * Process-local: nothing survives a restart.
 */

import { contentHash } from "./canonical_hash.js"
import { cloneOutcome } from "./step_outcome.js"
import type { StepOutcome } from "./step_outcome.js"

export interface CachedRun {
	outcome: StepOutcome
	/** True when the outcome came from the cache or another caller's run */
	replayed: boolean
}

export class IdempotentStepCache {
	private readonly outcomes = new Map<string, StepOutcome>()
	private readonly inFlight = new Map<string, Promise<StepOutcome>>()

	key(tenantId: string, workflowId: string, stepName: string, payload: unknown): string {
		return contentHash([tenantId, workflowId, stepName, payload])
	}

	get(key: string): StepOutcome | undefined {
		const outcome = this.outcomes.get(key)
		return outcome ? cloneOutcome(outcome) : undefined
	}

	put(key: string, outcome: StepOutcome): void {
		this.outcomes.set(key, cloneOutcome(outcome))
	}

	/**
	 * Return the stored outcome for `key`, join a run already in flight, or
	 * call `run`. Only successful outcomes are stored, so a failed step runs
	 * again on replay.
	 */
	async runOnce(key: string, run: () => Promise<StepOutcome>): Promise<CachedRun> {
		const stored = this.get(key)
		if (stored) return { outcome: stored, replayed: true }

		const pending = this.inFlight.get(key)
		if (pending) return { outcome: cloneOutcome(await pending), replayed: true }

		const execution = run()
			.then((outcome) => {
				if (outcome.status === "success") this.put(key, outcome)
				return outcome
			})
			.finally(() => {
				this.inFlight.delete(key)
			})
		this.inFlight.set(key, execution)
		return { outcome: await execution, replayed: false }
	}

	get size(): number {
		return this.outcomes.size
	}
}
