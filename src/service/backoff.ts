/**
 * Backoff between version-conflict retries: exponential with jitter.
 *
 * Writers that lost the same race would otherwise re-read the same next
 * version together and collide again; spread-out delays let them take turns.
 */

import type { JournalConfig } from "../shared/config.js";

export type BackoffConfig = Pick<JournalConfig, "baseDelayMs" | "maxDelayMs" | "jitterFactor">;

/** Delay before retry number `attempt + 1`, in ms. */
export function computeDelay(attempt: number, config: BackoffConfig): number {
	const exponential = config.baseDelayMs * 2 ** attempt;
	const delay = Math.min(exponential, config.maxDelayMs);
	const jitter = 1 + (Math.random() - 0.5) * 2 * config.jitterFactor;
	return delay * jitter;
}

/** Resolves on a later timer tick, even for a zero delay. */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => {
		setTimeout(resolve, Math.max(0, ms));
	});
}
