/**
 * Time source, in seconds since the epoch (fractional)
 */
export interface Clock {
	now(): number
}

export const systemClock: Clock = {
	now: () => Date.now() / 1000,
}

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
	constructor(private current: number = 0) {}

	now(): number {
		return this.current
	}

	advance(seconds: number): void {
		this.current += seconds
	}

	set(seconds: number): void {
		this.current = seconds
	}
}
