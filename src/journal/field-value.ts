/**
 * FieldValue: the JSON value model stored in snapshots.
 *
 * Snapshots keep heterogeneous entity state, so values are plain JSON:
 * null, booleans, numbers, strings, arrays and objects. Equality is
 * structural and ignores object key order.
 */

import { z } from "../lib/validation/index.js";

export type FieldValue =
	| null
	| boolean
	| number
	| string
	| readonly FieldValue[]
	| { readonly [key: string]: FieldValue };

/** What setters accept; `undefined` is stored as null, like a JSON encoder would. */
export type FieldInput = FieldValue | undefined;

const fieldValueShape: z.ZodType<FieldValue, z.ZodTypeDef, unknown> = z.lazy(() =>
	z.union([
		z.null(),
		z.boolean(),
		z.number(),
		z.string(),
		z.array(fieldValueShape),
		z.record(z.string(), fieldValueShape),
	]),
);

/**
 * Check `data` against `shape` and hand back the input itself.
 * zod rebuilds objects by assignment and leaves "__proto__" keys out of its
 * output; here they are ordinary JSON keys and must survive decoding.
 */
export function keepingOwnKeys<T>(
	shape: z.ZodType<T, z.ZodTypeDef, unknown>,
): z.ZodType<T, z.ZodTypeDef, unknown> {
	return z.unknown().superRefine((value, ctx): value is T => {
		const result = shape.safeParse(value);
		if (!result.success) {
			for (const issue of result.error.issues) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
			}
		}
		return result.success;
	});
}

export const fieldValueSchema = keepingOwnKeys(fieldValueShape);

/** Target shapes for Snapshot.getAs()/read(). */
export const FieldShape = {
	string: z.string(),
	integer: z.number().int(),
	number: z.number(),
	boolean: z.boolean(),
	nullableString: z.string().nullable(),
	nullableInteger: z.number().int().nullable(),
	nullableNumber: z.number().nullable(),
	integerList: z.array(z.number().int()),
	stringList: z.array(z.string()),
} as const;

const EMPTY = "(empty)";

export function isFieldList(value: FieldValue): value is readonly FieldValue[] {
	return Array.isArray(value);
}

/**
 * Deep-copy a value into the stored form: undefined and non-finite numbers
 * become null, object keys holding undefined are dropped.
 */
export function normalizeFieldValue(value: FieldInput): FieldValue {
	if (value === undefined || value === null) return null;
	if (typeof value === "number") return Number.isFinite(value) ? value : null;
	if (typeof value === "string" || typeof value === "boolean") return value;
	if (isFieldList(value)) return value.map((item) => normalizeFieldValue(item));

	// fromEntries defines own properties, so a "__proto__" key stays a key.
	const entries: Array<[string, FieldValue]> = [];
	for (const [key, item] of Object.entries(value)) {
		if (item !== undefined) {
			entries.push([key, normalizeFieldValue(item)]);
		}
	}
	return Object.fromEntries(entries);
}

/** Structural equality over the JSON model. */
export function fieldValuesEqual(a: FieldValue, b: FieldValue): boolean {
	if (a === b) return true;
	if (a === null || b === null) return false;
	if (typeof a !== "object" || typeof b !== "object") return false;

	if (isFieldList(a) || isFieldList(b)) {
		if (!isFieldList(a) || !isFieldList(b) || a.length !== b.length) return false;
		return a.every((item, i) => {
			const other = b[i];
			return other !== undefined && fieldValuesEqual(item, other);
		});
	}

	const aKeys = Object.keys(a);
	if (aKeys.length !== Object.keys(b).length) return false;
	return aKeys.every((key) => {
		const left = a[key];
		const right = b[key];
		return left !== undefined && right !== undefined && fieldValuesEqual(left, right);
	});
}

/** Display form used in change lines: JSON text, "(empty)" for null or absent. */
export function formatFieldValue(value: FieldValue | undefined): string {
	if (value === undefined || value === null) return EMPTY;
	return JSON.stringify(value);
}
