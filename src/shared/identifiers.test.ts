import { describe, expect, it } from "vitest";
import { InvalidDataError } from "./errors.js";
import {
	activityId,
	idToNumber,
	journalId,
	journalableId,
	snapshotId,
	userId,
} from "./identifiers.js";

describe("identifiers", () => {
	it("accept positive integers", () => {
		expect(idToNumber(journalableId(1))).toBe(1);
		expect(idToNumber(userId(42))).toBe(42);
		expect(idToNumber(activityId(7))).toBe(7);
		expect(idToNumber(journalId(Number.MAX_SAFE_INTEGER))).toBe(Number.MAX_SAFE_INTEGER);
		expect(idToNumber(snapshotId(3))).toBe(3);
	});

	it.each([0, -1, 1.5, Number.NaN, Number.POSITIVE_INFINITY, Number.MAX_SAFE_INTEGER + 1])(
		"reject %s",
		(value) => {
			expect(() => journalableId(value)).toThrow(InvalidDataError);
		},
	);

	it("names the id type in the message", () => {
		expect(() => userId(0)).toThrow("UserId must be a positive integer, got 0");
	});
});
