/**
 * Wire representation of entries and diffs (camelCase JSON, as served in
 * HAL+JSON responses). Encoding is total; decoding validates with zod and
 * returns a Result.
 */

import { ValidationError, validate, z } from "../lib/validation/index.js";
import {
	activityId,
	journalId,
	journalableId,
	snapshotId,
	userId,
} from "../shared/identifiers.js";
import { type Result, err, flatMap, map, ok } from "../shared/result.js";
import { toIsoString } from "../shared/time.js";
import { CauseType } from "./cause.js";
import { ChangeType, JournalDetails, JournalDiff } from "./diff.js";
import { type FieldValue, fieldValueSchema, normalizeFieldValue } from "./field-value.js";
import { JournalEntry } from "./journal-entry.js";
import { fromWireName, toWireName } from "./journalable-kind.js";
import { JournalVersion } from "./version.js";

export interface JournalEntryWire {
	readonly id: number | null;
	readonly journalableType: string;
	readonly journalableId: number;
	readonly version: number;
	readonly userId: number;
	readonly notes: string | null;
	readonly activityId: number | null;
	readonly createdAt: string;
	readonly updatedAt: string;
	readonly causeType: CauseType;
	readonly causeContext: string | null;
	readonly dataId: number | null;
}

export interface JournalDetailsWire {
	readonly property: string;
	readonly changeType: ChangeType;
	readonly oldValue: FieldValue;
	readonly newValue: FieldValue;
}

const idSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);
const timestampSchema = z
	.string()
	.datetime({ offset: true })
	.transform((value) => Date.parse(value));

const entryWireSchema = z.object({
	id: idSchema.nullable(),
	journalableType: z.string(),
	journalableId: idSchema,
	version: idSchema,
	userId: idSchema,
	notes: z.string().nullable(),
	activityId: idSchema.nullable(),
	createdAt: timestampSchema,
	updatedAt: timestampSchema,
	causeType: z.nativeEnum(CauseType),
	causeContext: z.string().nullable(),
	dataId: idSchema.nullable(),
});

const detailsWireSchema = z.object({
	property: z.string().min(1),
	changeType: z.nativeEnum(ChangeType),
	oldValue: fieldValueSchema.optional(),
	newValue: fieldValueSchema.optional(),
});

// ── Entries ──────────────────────────────────────────────────────────

export function entryToWire(entry: JournalEntry): JournalEntryWire {
	return {
		id: entry.id,
		journalableType: toWireName(entry.journalableType),
		journalableId: entry.journalableId,
		version: entry.version.value,
		userId: entry.userId,
		notes: entry.notes,
		activityId: entry.activityId,
		createdAt: toIsoString(entry.createdAt),
		updatedAt: toIsoString(entry.updatedAt),
		causeType: entry.cause.causeType,
		causeContext: entry.cause.context,
		dataId: entry.dataId,
	};
}

export function entryFromWire(data: unknown): Result<JournalEntry, ValidationError> {
	return flatMap(validate(entryWireSchema, data, "Invalid journal entry"), (wire) => {
		const kind = fromWireName(wire.journalableType);
		if (kind === undefined) {
			return err(
				new ValidationError("Invalid journal entry", [
					{
						path: ["journalableType"],
						message: `Unknown journalable type "${wire.journalableType}"`,
					},
				]),
			);
		}
		return ok(
			JournalEntry.fromProps({
				id: wire.id === null ? null : journalId(wire.id),
				journalableType: kind,
				journalableId: journalableId(wire.journalableId),
				version: JournalVersion.of(wire.version),
				userId: userId(wire.userId),
				notes: wire.notes,
				activityId: wire.activityId === null ? null : activityId(wire.activityId),
				createdAt: wire.createdAt,
				updatedAt: wire.updatedAt,
				dataId: wire.dataId === null ? null : snapshotId(wire.dataId),
				cause: { causeType: wire.causeType, context: wire.causeContext },
			}),
		);
	});
}

// ── Diffs ────────────────────────────────────────────────────────────

/** Encode a diff; `null` stands in for the side a change type does not have. */
export function diffToWire(diff: JournalDiff): JournalDetailsWire[] {
	return diff.changes.map((detail) => ({
		property: detail.property,
		changeType: detail.changeType,
		oldValue: detail.changeType === ChangeType.Added ? null : detail.oldValue,
		newValue: detail.changeType === ChangeType.Removed ? null : detail.newValue,
	}));
}

export function diffFromWire(data: unknown): Result<JournalDiff, ValidationError> {
	return map(validate(z.array(detailsWireSchema), data, "Invalid journal diff"), (items) =>
		JournalDiff.fromChanges(
			items.map((item) => {
				const oldValue = normalizeFieldValue(item.oldValue);
				const newValue = normalizeFieldValue(item.newValue);
				switch (item.changeType) {
					case ChangeType.Changed:
						return JournalDetails.changed(item.property, oldValue, newValue);
					case ChangeType.Added:
						return JournalDetails.added(item.property, newValue);
					case ChangeType.Removed:
						return JournalDetails.removed(item.property, oldValue);
				}
			}),
		),
	);
}
