// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type JournalableId,
	type UserId,
	type ActivityId,
	type JournalId,
	type SnapshotId,
	journalableId,
	userId,
	activityId,
	journalId,
	snapshotId,
	idToNumber,
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
	tryCatchAsync,
	ErrorCategory,
	JournalError,
	VersionConflictError,
	NotFoundError,
	InvalidDataError,
	StoreError,
	ConfigError,
	classifyError,
	isVersionConflict,
	isNotFound,
	isInvalidData,
	type Clock,
	SystemClock,
	FakeClock,
	toIsoString,
	type JournalConfig,
	DEFAULT_JOURNAL_CONFIG,
	resolveConfig,
	configFromEnv,
} from "./shared/index.js";

// ── Journal Core ─────────────────────────────────────────────────────
export {
	JournalableKind,
	ALL_JOURNALABLE_KINDS,
	toWireName,
	fromWireName,
	dataTypeName,
	isJournalableKind,
	JournalVersion,
	CauseType,
	type JournalCause,
	DEFAULT_CAUSE,
	journalCause,
	isCauseType,
	type FieldValue,
	type FieldInput,
	FieldShape,
	fieldValueSchema,
	isFieldList,
	normalizeFieldValue,
	fieldValuesEqual,
	formatFieldValue,
	Snapshot,
	type SnapshotJson,
	type SnapshotFieldError,
	DATA_TYPE_KEY,
	TaskField,
	ProjectField,
	UserField,
	emptySnapshot,
	TaskSnapshotBuilder,
	ProjectSnapshotBuilder,
	UserSnapshotBuilder,
	ChangeType,
	JournalDetails,
	JournalDiff,
	formatDetail,
	JournalEntry,
	type JournalEntryProps,
	EntryBuilder,
	type JournalEntryWire,
	type JournalDetailsWire,
	entryToWire,
	entryFromWire,
	diffToWire,
	diffFromWire,
} from "./journal/index.js";

// ── Store ────────────────────────────────────────────────────────────
export { type JournalStore, type StoredJournal, MemoryJournalStore } from "./store/index.js";

// ── Service ──────────────────────────────────────────────────────────
export {
	JournalService,
	type JournalCreatedEvent,
	type JournalServiceEvents,
	type JournalServiceOptions,
	type RecordRequest,
} from "./service/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LogLevel, type LoggerConfig, createLogger } from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue, validate, z } from "./lib/validation/index.js";
export { TypedEmitter, type EventMap } from "./lib/events/index.js";
