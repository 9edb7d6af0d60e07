import { afterEach, describe, expect, it, vi } from "vitest";
import { computeDelay, sleep } from "./backoff.js";

const config = { baseDelayMs: 100, maxDelayMs: 5000, jitterFactor: 0.5 };

describe("computeDelay", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("doubles with each attempt", () => {
		vi.spyOn(Math, "random").mockReturnValue(0.5);
		expect([0, 1, 2, 3].map((attempt) => computeDelay(attempt, config))).toEqual([
			100, 200, 400, 800,
		]);
	});

	it("is capped at maxDelayMs", () => {
		vi.spyOn(Math, "random").mockReturnValue(0.5);
		expect(computeDelay(10, config)).toBe(5000);
	});

	it("spreads the delay by the jitter factor", () => {
		// rand=0 → 1 - 0.5 = 0.5; rand=1 → 1 + 0.5 = 1.5
		vi.spyOn(Math, "random").mockReturnValue(0);
		expect(computeDelay(0, config)).toBe(50);
		vi.spyOn(Math, "random").mockReturnValue(1);
		expect(computeDelay(0, config)).toBe(150);
	});

	it("is exact without jitter", () => {
		expect(computeDelay(2, { ...config, jitterFactor: 0 })).toBe(400);
	});
});

describe("sleep", () => {
	it("waits for a timer tick even at zero", async () => {
		const order: string[] = [];
		const slept = sleep(0).then(() => order.push("slept"));
		await Promise.resolve();
		order.push("microtask");
		await slept;
		expect(order).toEqual(["microtask", "slept"]);
	});
});
