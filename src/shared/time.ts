/**
 * Time utilities: injectable clock.
 *
 * Entry timestamps come from Clock.now() so tests can pin them without
 * touching Date.now().
 */

/** Injectable time source, epoch milliseconds. */
export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic tests. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

/** Render an epoch-ms timestamp as ISO-8601 UTC. */
export function toIsoString(epochMs: number): string {
	return new Date(epochMs).toISOString();
}
