import { describe, expect, it } from "vitest";
import { validate } from "../lib/validation/index.js";
import {
	FieldShape,
	fieldValueSchema,
	fieldValuesEqual,
	formatFieldValue,
	isFieldList,
	normalizeFieldValue,
} from "./field-value.js";

describe("normalizeFieldValue", () => {
	it("keeps JSON scalars", () => {
		expect(normalizeFieldValue("a")).toBe("a");
		expect(normalizeFieldValue(0)).toBe(0);
		expect(normalizeFieldValue(false)).toBe(false);
		expect(normalizeFieldValue(null)).toBeNull();
	});

	it("maps undefined and non-finite numbers to null", () => {
		expect(normalizeFieldValue(undefined)).toBeNull();
		expect(normalizeFieldValue(Number.NaN)).toBeNull();
		expect(normalizeFieldValue(Number.POSITIVE_INFINITY)).toBeNull();
	});

	it("deep-copies lists and objects", () => {
		const source = { tags: ["a", "b"], meta: { depth: 1 } };
		const copy = normalizeFieldValue(source);
		expect(copy).toEqual(source);
		expect(copy).not.toBe(source);
	});
});

describe("fieldValuesEqual", () => {
	it("compares scalars strictly", () => {
		expect(fieldValuesEqual(1, 1)).toBe(true);
		expect(fieldValuesEqual(1, "1")).toBe(false);
		expect(fieldValuesEqual(null, false)).toBe(false);
	});

	it("compares lists by position", () => {
		expect(fieldValuesEqual([1, 2], [1, 2])).toBe(true);
		expect(fieldValuesEqual([1, 2], [2, 1])).toBe(false);
		expect(fieldValuesEqual([1], [1, 1])).toBe(false);
	});

	it("ignores object key order", () => {
		expect(fieldValuesEqual({ a: 1, b: [true] }, { b: [true], a: 1 })).toBe(true);
		expect(fieldValuesEqual({ a: 1 }, { a: 1, b: null })).toBe(false);
	});

	it("does not equate a list with an object", () => {
		expect(fieldValuesEqual([], {})).toBe(false);
	});
});

describe("formatFieldValue", () => {
	it("renders null and absent as (empty)", () => {
		expect(formatFieldValue(null)).toBe("(empty)");
		expect(formatFieldValue(undefined)).toBe("(empty)");
	});

	it("renders other values as JSON text", () => {
		expect(formatFieldValue("Fix bug")).toBe('"Fix bug"');
		expect(formatFieldValue(5)).toBe("5");
		expect(formatFieldValue(true)).toBe("true");
		expect(formatFieldValue([1, 2])).toBe("[1,2]");
		expect(formatFieldValue({ k: "v" })).toBe('{"k":"v"}');
	});
});

describe("isFieldList", () => {
	it("is true only for arrays", () => {
		expect(isFieldList([])).toBe(true);
		expect(isFieldList({})).toBe(false);
		expect(isFieldList("[]")).toBe(false);
	});
});

describe("schemas", () => {
	it("fieldValueSchema accepts nested JSON", () => {
		expect(validate(fieldValueSchema, { a: [1, "x", null, { b: false }] }).ok).toBe(true);
	});

	it("fieldValueSchema rejects values outside JSON", () => {
		expect(validate(fieldValueSchema, () => 1).ok).toBe(false);
		expect(validate(fieldValueSchema, undefined).ok).toBe(false);
	});

	it("FieldShape.integer rejects fractions", () => {
		expect(validate(FieldShape.integer, 2).ok).toBe(true);
		expect(validate(FieldShape.integer, 2.5).ok).toBe(false);
	});
});

describe("__proto__ keys", () => {
	const parsed = (text: string) => JSON.parse(text);

	it("normalizeFieldValue keeps them as own keys", () => {
		const value = normalizeFieldValue(parsed('{"__proto__":1,"a":2}'));
		expect(JSON.stringify(value)).toBe('{"__proto__":1,"a":2}');
	});

	it("fieldValuesEqual compares their values", () => {
		expect(fieldValuesEqual(parsed('{"__proto__":1}'), parsed('{"__proto__":2}'))).toBe(false);
		expect(fieldValuesEqual(parsed('{"__proto__":1}'), parsed('{"__proto__":1}'))).toBe(true);
		expect(fieldValuesEqual(parsed('{"__proto__":1}'), {})).toBe(false);
	});

	it("fieldValueSchema validates and keeps them", () => {
		const result = validate(fieldValueSchema, parsed('{"nested":{"__proto__":[1,2]}}'));
		expect(result.ok && JSON.stringify(result.value)).toBe('{"nested":{"__proto__":[1,2]}}');
		const invalid = Object.fromEntries([["__proto__", () => 1]]);
		expect(validate(fieldValueSchema, invalid).ok).toBe(false);
	});
});
