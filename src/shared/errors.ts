/**
 * JournalError hierarchy: structured errors for the journal boundaries.
 *
 * The pure core (versions, snapshots, diffs, builders) never fails on
 * well-formed input. These errors come from malformed input, the store port,
 * and configuration. The category tells the service whether to retry.
 */

export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

interface JournalErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & JournalErrorOptions;

/** Base class for every error raised around the journal core. */
export class JournalError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "JournalError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/**
 * Another writer already claimed the version for this entity.
 * Retryable: re-read the latest version, recompute the diff, insert again.
 */
export class VersionConflictError extends JournalError {
	readonly expected: number;
	readonly actual: number;

	constructor(message: string, expected: number, actual: number, context: ErrorContext = {}) {
		super(message, "VERSION_CONFLICT", ErrorCategory.Retryable, {
			...context,
			expected,
			actual,
		});
		this.name = "VersionConflictError";
		this.expected = expected;
		this.actual = actual;
	}
}

/** A journal, version or snapshot the caller asked for does not exist. */
export class NotFoundError extends JournalError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NOT_FOUND", ErrorCategory.NonRetryable, context);
		this.name = "NotFoundError";
	}
}

/** Input that cannot be journaled as given (bad id, gap in versions, wrong data type). */
export class InvalidDataError extends JournalError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_DATA", ErrorCategory.NonRetryable, context);
		this.name = "InvalidDataError";
	}
}

/** Unclassified failure raised by a store implementation. */
export class StoreError extends JournalError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "STORE_ERROR", ErrorCategory.Retryable, context);
		this.name = "StoreError";
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends JournalError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Map any thrown value to a JournalError; unknown failures become StoreError. */
export function classifyError(error: unknown): JournalError {
	if (error instanceof JournalError) return error;
	if (error instanceof Error) {
		return new StoreError(error.message, { cause: error });
	}
	return new StoreError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isVersionConflict(e: unknown): e is VersionConflictError {
	return e instanceof VersionConflictError;
}

export function isNotFound(e: unknown): e is NotFoundError {
	return e instanceof NotFoundError;
}

export function isInvalidData(e: unknown): e is InvalidDataError {
	return e instanceof InvalidDataError;
}
