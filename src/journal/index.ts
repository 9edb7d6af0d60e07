export {
	JournalableKind,
	ALL_JOURNALABLE_KINDS,
	toWireName,
	fromWireName,
	dataTypeName,
	isJournalableKind,
} from "./journalable-kind.js";
export { JournalVersion } from "./version.js";
export { CauseType, type JournalCause, DEFAULT_CAUSE, journalCause, isCauseType } from "./cause.js";
export {
	type FieldValue,
	type FieldInput,
	FieldShape,
	fieldValueSchema,
	isFieldList,
	normalizeFieldValue,
	fieldValuesEqual,
	formatFieldValue,
} from "./field-value.js";
export { Snapshot, type SnapshotJson, type SnapshotFieldError, DATA_TYPE_KEY } from "./snapshot.js";
export {
	TaskField,
	ProjectField,
	UserField,
	emptySnapshot,
	TaskSnapshotBuilder,
	ProjectSnapshotBuilder,
	UserSnapshotBuilder,
} from "./snapshot-builders.js";
export { ChangeType, JournalDetails, JournalDiff, formatDetail } from "./diff.js";
export { JournalEntry, type JournalEntryProps } from "./journal-entry.js";
export { EntryBuilder } from "./entry-builder.js";
export {
	type JournalEntryWire,
	type JournalDetailsWire,
	entryToWire,
	entryFromWire,
	diffToWire,
	diffFromWire,
} from "./wire.js";
