import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { ChangeType, JournalDiff } from "./diff.js";
import type { FieldInput } from "./field-value.js";
import { Snapshot } from "./snapshot.js";

const fieldName = fc.constantFrom("subject", "status_id", "priority_id", "due_date", "tags");
const fieldValue = fc.oneof(
	fc.constant(null),
	fc.boolean(),
	fc.integer({ min: -5, max: 5 }),
	fc.constantFrom("a", "b", ""),
	fc.array(fc.integer({ min: 0, max: 3 }), { maxLength: 3 }),
);
const snapshot = fc
	.dictionary(fieldName, fieldValue)
	.map((fields) => Snapshot.of("WorkPackageJournal", fields));

describe("JournalDiff (property-based)", () => {
	it("a snapshot diffed against itself is empty", () => {
		fc.assert(
			fc.property(snapshot, (s) => {
				expect(JournalDiff.compute(s, s.clone()).isEmpty()).toBe(true);
			}),
		);
	});

	it("is empty exactly when the snapshots are equal", () => {
		fc.assert(
			fc.property(snapshot, snapshot, (a, b) => {
				expect(JournalDiff.compute(a, b).isEmpty()).toBe(a.equals(b));
			}),
		);
	});

	it("properties are unique and sorted", () => {
		fc.assert(
			fc.property(snapshot, snapshot, (a, b) => {
				const properties = JournalDiff.compute(a, b).properties();
				expect(properties).toEqual([...new Set(properties)].sort());
			}),
		);
	});

	it("swapping the arguments swaps added and removed", () => {
		fc.assert(
			fc.property(snapshot, snapshot, (a, b) => {
				const forward = JournalDiff.compute(a, b);
				const backward = JournalDiff.compute(b, a);
				expect(backward.properties()).toEqual(forward.properties());
				for (const detail of forward.changes) {
					const mirrored = backward.forProperty(detail.property)?.changeType;
					const expected =
						detail.changeType === ChangeType.Added
							? ChangeType.Removed
							: detail.changeType === ChangeType.Removed
								? ChangeType.Added
								: ChangeType.Changed;
					expect(mirrored).toBe(expected);
				}
			}),
		);
	});

	it("applying the diff to the older snapshot yields the newer one", () => {
		fc.assert(
			fc.property(snapshot, snapshot, (a, b) => {
				const applied = a.clone();
				const kept = new Set(a.fieldNames());
				for (const detail of JournalDiff.compute(a, b).changes) {
					if (detail.changeType === ChangeType.Removed) {
						kept.delete(detail.property);
					} else {
						applied.set(detail.property, detail.newValue);
						kept.add(detail.property);
					}
				}
				const fields: Record<string, FieldInput> = {};
				for (const field of kept) fields[field] = applied.get(field);
				const rebuilt = Snapshot.of("WorkPackageJournal", fields);
				expect(rebuilt.equals(b)).toBe(true);
			}),
		);
	});
});
