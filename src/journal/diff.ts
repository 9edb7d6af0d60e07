/**
 * Journal diff: field-level differences between two snapshots.
 *
 * A field that changed value yields `changed`, a field only in the newer
 * snapshot yields `added`, a field only in the older one yields `removed`.
 * Equal fields yield nothing. Details are ordered by field name
 * (code-unit order) so feeds and tests see a stable sequence.
 */

import { type FieldValue, fieldValuesEqual, formatFieldValue } from "./field-value.js";
import type { Snapshot } from "./snapshot.js";

export const ChangeType = {
	Changed: "changed",
	Added: "added",
	Removed: "removed",
} as const;

export type ChangeType = (typeof ChangeType)[keyof typeof ChangeType];

/** One property's change between two versions. */
export type JournalDetails =
	| {
			readonly property: string;
			readonly changeType: typeof ChangeType.Changed;
			readonly oldValue: FieldValue;
			readonly newValue: FieldValue;
	  }
	| {
			readonly property: string;
			readonly changeType: typeof ChangeType.Added;
			readonly newValue: FieldValue;
	  }
	| {
			readonly property: string;
			readonly changeType: typeof ChangeType.Removed;
			readonly oldValue: FieldValue;
	  };

export const JournalDetails = {
	changed: (property: string, oldValue: FieldValue, newValue: FieldValue): JournalDetails => ({
		property,
		changeType: ChangeType.Changed,
		oldValue,
		newValue,
	}),
	added: (property: string, newValue: FieldValue): JournalDetails => ({
		property,
		changeType: ChangeType.Added,
		newValue,
	}),
	removed: (property: string, oldValue: FieldValue): JournalDetails => ({
		property,
		changeType: ChangeType.Removed,
		oldValue,
	}),
} as const;

/**
 * Human-readable line for one detail:
 * `subject: "A" → "B"`, `priority_id set to 5`, `due_date removed (was "2024-05-01")`.
 */
export function formatDetail(detail: JournalDetails): string {
	switch (detail.changeType) {
		case ChangeType.Changed:
			return `${detail.property}: ${formatFieldValue(detail.oldValue)} → ${formatFieldValue(detail.newValue)}`;
		case ChangeType.Added:
			return `${detail.property} set to ${formatFieldValue(detail.newValue)}`;
		case ChangeType.Removed:
			return `${detail.property} removed (was ${formatFieldValue(detail.oldValue)})`;
	}
}

export class JournalDiff {
	readonly changes: readonly JournalDetails[];

	private constructor(changes: readonly JournalDetails[]) {
		this.changes = changes;
	}

	static empty(): JournalDiff {
		return new JournalDiff([]);
	}

	/** Wrap details that were computed elsewhere (e.g. decoded from the wire), keeping their order. */
	static fromChanges(changes: readonly JournalDetails[]): JournalDiff {
		return new JournalDiff([...changes]);
	}

	/** Diff `previous` → `current`. Data types are not compared. */
	static compute(previous: Snapshot, current: Snapshot): JournalDiff {
		const properties = new Set([...previous.fieldNames(), ...current.fieldNames()]);
		const changes: JournalDetails[] = [];

		for (const property of [...properties].sort()) {
			const oldValue = previous.get(property);
			const newValue = current.get(property);

			if (oldValue === undefined && newValue !== undefined) {
				changes.push(JournalDetails.added(property, newValue));
			} else if (oldValue !== undefined && newValue === undefined) {
				changes.push(JournalDetails.removed(property, oldValue));
			} else if (
				oldValue !== undefined &&
				newValue !== undefined &&
				!fieldValuesEqual(oldValue, newValue)
			) {
				changes.push(JournalDetails.changed(property, oldValue, newValue));
			}
		}

		return new JournalDiff(changes);
	}

	get size(): number {
		return this.changes.length;
	}

	isEmpty(): boolean {
		return this.changes.length === 0;
	}

	forProperty(property: string): JournalDetails | undefined {
		return this.changes.find((detail) => detail.property === property);
	}

	properties(): string[] {
		return this.changes.map((detail) => detail.property);
	}

	formatForDisplay(): string[] {
		return this.changes.map(formatDetail);
	}
}
