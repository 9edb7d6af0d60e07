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
} from "./identifiers.js";

export {
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
} from "./result.js";

export {
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
} from "./errors.js";

export { type Clock, SystemClock, FakeClock, toIsoString } from "./time.js";
export {
	type JournalConfig,
	DEFAULT_JOURNAL_CONFIG,
	resolveConfig,
	configFromEnv,
} from "./config.js";
