/**
 * Snapshot: complete recorded state of one journalable entity at one version.
 *
 * A type-tagged map from field name to FieldValue. The container has no
 * schema; kind-specific builders (snapshot-builders.ts) fix the field names
 * used for each kind. Stored separately from entry metadata.
 */

import type { ValidationError, ValidationIssue } from "../lib/validation/index.js";
import { validate, z } from "../lib/validation/index.js";
import { InvalidDataError } from "../shared/errors.js";
import { type Result, err, map, ok } from "../shared/result.js";
import {
	type FieldInput,
	type FieldValue,
	fieldValueSchema,
	fieldValuesEqual,
	keepingOwnKeys,
	normalizeFieldValue,
} from "./field-value.js";

/** Key holding the data type in the serialized form. Reserved: cannot be used as a field. */
export const DATA_TYPE_KEY = "_type";

/** Serialized form: `{ "_type": "WorkPackageJournal", "subject": "...", ... }`. */
export type SnapshotJson = { readonly [field: string]: FieldValue };

/** Why read() could not produce a value of the requested shape. */
export type SnapshotFieldError =
	| { readonly kind: "not_found"; readonly field: string }
	| {
			readonly kind: "type_mismatch";
			readonly field: string;
			readonly value: FieldValue;
			readonly issues: readonly ValidationIssue[];
	  };

const snapshotJsonSchema = keepingOwnKeys(
	z.object({ [DATA_TYPE_KEY]: z.string().min(1) }).catchall(fieldValueSchema),
);

export class Snapshot {
	readonly dataType: string;
	private readonly fields: Map<string, FieldValue>;

	constructor(dataType: string) {
		this.dataType = dataType;
		this.fields = new Map();
	}

	// ── Factories ──────────────────────────────────────────────────

	static of(dataType: string, fields: Readonly<Record<string, FieldInput>>): Snapshot {
		const snapshot = new Snapshot(dataType);
		for (const [field, value] of Object.entries(fields)) {
			snapshot.set(field, value);
		}
		return snapshot;
	}

	/** Decode the `{ _type, ...fields }` form produced by toJSON(). */
	static fromJSON(data: unknown): Result<Snapshot, ValidationError> {
		return map(validate(snapshotJsonSchema, data, "Invalid snapshot"), (parsed) => {
			const snapshot = new Snapshot(parsed[DATA_TYPE_KEY]);
			for (const [field, value] of Object.entries(parsed)) {
				if (field !== DATA_TYPE_KEY) {
					snapshot.fields.set(field, normalizeFieldValue(value));
				}
			}
			return snapshot;
		});
	}

	// ── Mutation ───────────────────────────────────────────────────

	/**
	 * Insert or overwrite a field. The value is deep-copied.
	 * @throws InvalidDataError for the reserved `_type` field name
	 */
	set(field: string, value: FieldInput): this {
		if (field === DATA_TYPE_KEY) {
			throw new InvalidDataError(`"${DATA_TYPE_KEY}" is reserved for the snapshot data type`, {
				dataType: this.dataType,
			});
		}
		this.fields.set(field, normalizeFieldValue(value));
		return this;
	}

	// ── Queries ────────────────────────────────────────────────────

	get(field: string): FieldValue | undefined {
		return this.fields.get(field);
	}

	has(field: string): boolean {
		return this.fields.has(field);
	}

	/** Read a field as `shape`, telling a missing field apart from one of the wrong shape. */
	read<T>(field: string, shape: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T, SnapshotFieldError> {
		const value = this.fields.get(field);
		if (value === undefined) {
			return err({ kind: "not_found", field });
		}
		const parsed = validate(shape, value);
		if (!parsed.ok) {
			return err({ kind: "type_mismatch", field, value, issues: parsed.error.issues });
		}
		return ok(parsed.value);
	}

	/** Lenient read: undefined when the field is missing or has the wrong shape. */
	getAs<T>(field: string, shape: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
		const result = this.read(field, shape);
		return result.ok ? result.value : undefined;
	}

	/** Field names in lexicographic order. */
	fieldNames(): string[] {
		return [...this.fields.keys()].sort();
	}

	entries(): Array<readonly [string, FieldValue]> {
		return this.fieldNames().map((field) => [field, this.fields.get(field) ?? null] as const);
	}

	get size(): number {
		return this.fields.size;
	}

	equals(other: Snapshot): boolean {
		if (this.dataType !== other.dataType || this.size !== other.size) return false;
		for (const [field, value] of this.fields) {
			const theirs = other.fields.get(field);
			if (theirs === undefined || !fieldValuesEqual(value, theirs)) return false;
		}
		return true;
	}

	clone(): Snapshot {
		const copy = new Snapshot(this.dataType);
		for (const [field, value] of this.fields) {
			copy.fields.set(field, normalizeFieldValue(value));
		}
		return copy;
	}

	toJSON(): SnapshotJson {
		const header: readonly [string, FieldValue] = [DATA_TYPE_KEY, this.dataType];
		return Object.fromEntries([header, ...this.entries()]);
	}
}
