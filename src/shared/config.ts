/**
 * Journal service configuration.
 *
 * Defaults suit an in-process store; configFromEnv() lets deployments
 * override them without code changes.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface JournalConfig {
	/** How many times a version conflict is retried before the error is returned */
	readonly maxConflictRetries: number;
	/** Delay before the first retry; doubles on each later one */
	readonly baseDelayMs: number;
	/** Cap on the delay between retries */
	readonly maxDelayMs: number;
	/** Random spread applied to each delay, 0..1 */
	readonly jitterFactor: number;
	/** Record an entry even when nothing changed and there are no notes */
	readonly recordEmptyUpdates: boolean;
	/** Level of the service's default logger */
	readonly logLevel: LogLevel;
}

export const DEFAULT_JOURNAL_CONFIG: JournalConfig = {
	maxConflictRetries: 3,
	baseDelayMs: 10,
	maxDelayMs: 500,
	jitterFactor: 0.1,
	recordEmptyUpdates: false,
	logLevel: "info",
};

const LOG_LEVELS: readonly LogLevel[] = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
];

/** Mutable builder shape for Partial<JournalConfig>. */
interface MutableJournalConfig {
	maxConflictRetries?: number;
	baseDelayMs?: number;
	maxDelayMs?: number;
	jitterFactor?: number;
	recordEmptyUpdates?: boolean;
	logLevel?: LogLevel;
}

/** Merge overrides onto the defaults. */
export function resolveConfig(overrides: Partial<JournalConfig> = {}): JournalConfig {
	return {
		maxConflictRetries: overrides.maxConflictRetries ?? DEFAULT_JOURNAL_CONFIG.maxConflictRetries,
		baseDelayMs: overrides.baseDelayMs ?? DEFAULT_JOURNAL_CONFIG.baseDelayMs,
		maxDelayMs: overrides.maxDelayMs ?? DEFAULT_JOURNAL_CONFIG.maxDelayMs,
		jitterFactor: overrides.jitterFactor ?? DEFAULT_JOURNAL_CONFIG.jitterFactor,
		recordEmptyUpdates: overrides.recordEmptyUpdates ?? DEFAULT_JOURNAL_CONFIG.recordEmptyUpdates,
		logLevel: overrides.logLevel ?? DEFAULT_JOURNAL_CONFIG.logLevel,
	};
}

/**
 * Reads config values from environment variables.
 * Supported: JOURNAL_MAX_CONFLICT_RETRIES, JOURNAL_RETRY_BASE_DELAY_MS,
 * JOURNAL_RETRY_MAX_DELAY_MS, JOURNAL_RETRY_JITTER_FACTOR,
 * JOURNAL_RECORD_EMPTY_UPDATES, JOURNAL_LOG_LEVEL. Empty values are ignored.
 * @throws ConfigError if a variable holds a value outside its domain
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<JournalConfig> {
	const result: MutableJournalConfig = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const retries = env["JOURNAL_MAX_CONFLICT_RETRIES"];
	if (retries) {
		result.maxConflictRetries = nonNegativeInt("JOURNAL_MAX_CONFLICT_RETRIES", retries);
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const baseDelay = env["JOURNAL_RETRY_BASE_DELAY_MS"];
	if (baseDelay) {
		result.baseDelayMs = nonNegativeInt("JOURNAL_RETRY_BASE_DELAY_MS", baseDelay);
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const maxDelay = env["JOURNAL_RETRY_MAX_DELAY_MS"];
	if (maxDelay) {
		result.maxDelayMs = nonNegativeInt("JOURNAL_RETRY_MAX_DELAY_MS", maxDelay);
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const jitter = env["JOURNAL_RETRY_JITTER_FACTOR"];
	if (jitter) {
		const parsed = Number(jitter);
		if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
			throw new ConfigError(
				`Invalid JOURNAL_RETRY_JITTER_FACTOR: "${jitter}" must be a number between 0 and 1`,
			);
		}
		result.jitterFactor = parsed;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const recordEmpty = env["JOURNAL_RECORD_EMPTY_UPDATES"];
	if (recordEmpty) {
		if (recordEmpty !== "true" && recordEmpty !== "false") {
			throw new ConfigError(
				`Invalid JOURNAL_RECORD_EMPTY_UPDATES: "${recordEmpty}" must be "true" or "false"`,
			);
		}
		result.recordEmptyUpdates = recordEmpty === "true";
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = env["JOURNAL_LOG_LEVEL"];
	if (level) {
		const match = LOG_LEVELS.find((candidate) => candidate === level);
		if (match === undefined) {
			throw new ConfigError(`Invalid JOURNAL_LOG_LEVEL: "${level}"`, {
				allowed: LOG_LEVELS,
			});
		}
		result.logLevel = match;
	}

	return result;
}

function nonNegativeInt(name: string, raw: string): number {
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < 0) {
		throw new ConfigError(`Invalid ${name}: "${raw}" must be a non-negative integer`);
	}
	return parsed;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}
