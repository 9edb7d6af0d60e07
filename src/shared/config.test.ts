import { describe, expect, it } from "vitest";
import { DEFAULT_JOURNAL_CONFIG, configFromEnv, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("JournalConfig", () => {
	describe("DEFAULT_JOURNAL_CONFIG", () => {
		it("retries conflicts with backoff and skips empty updates", () => {
			expect(DEFAULT_JOURNAL_CONFIG).toEqual({
				maxConflictRetries: 3,
				baseDelayMs: 10,
				maxDelayMs: 500,
				jitterFactor: 0.1,
				recordEmptyUpdates: false,
				logLevel: "info",
			});
		});
	});

	describe("resolveConfig", () => {
		it("returns the defaults without overrides", () => {
			expect(resolveConfig()).toEqual(DEFAULT_JOURNAL_CONFIG);
		});

		it("applies overrides field by field", () => {
			expect(resolveConfig({ maxConflictRetries: 0, logLevel: "silent" })).toEqual({
				maxConflictRetries: 0,
				baseDelayMs: 10,
				maxDelayMs: 500,
				jitterFactor: 0.1,
				recordEmptyUpdates: false,
				logLevel: "silent",
			});
		});
	});

	describe("configFromEnv", () => {
		it("returns an empty object when nothing is set", () => {
			expect(configFromEnv({})).toEqual({});
		});

		it("reads every supported variable", () => {
			const config = configFromEnv({
				JOURNAL_MAX_CONFLICT_RETRIES: "5",
				JOURNAL_RETRY_BASE_DELAY_MS: "20",
				JOURNAL_RETRY_MAX_DELAY_MS: "1000",
				JOURNAL_RETRY_JITTER_FACTOR: "0.25",
				JOURNAL_RECORD_EMPTY_UPDATES: "true",
				JOURNAL_LOG_LEVEL: "debug",
			});
			expect(config).toEqual({
				maxConflictRetries: 5,
				baseDelayMs: 20,
				maxDelayMs: 1000,
				jitterFactor: 0.25,
				recordEmptyUpdates: true,
				logLevel: "debug",
			});
		});

		it("accepts zero retries", () => {
			expect(configFromEnv({ JOURNAL_MAX_CONFLICT_RETRIES: "0" })).toEqual({
				maxConflictRetries: 0,
			});
		});

		it.each(["-1", "2.5", "three", "3abc"])("rejects retries %s", (raw) => {
			expect(() => configFromEnv({ JOURNAL_MAX_CONFLICT_RETRIES: raw })).toThrow(ConfigError);
		});

		it("ignores empty values for every variable", () => {
			expect(
				configFromEnv({
					JOURNAL_MAX_CONFLICT_RETRIES: "",
					JOURNAL_RETRY_BASE_DELAY_MS: "",
					JOURNAL_RETRY_MAX_DELAY_MS: "",
					JOURNAL_RETRY_JITTER_FACTOR: "",
					JOURNAL_RECORD_EMPTY_UPDATES: "",
					JOURNAL_LOG_LEVEL: "",
				}),
			).toEqual({});
		});

		it("reads false for empty updates", () => {
			expect(configFromEnv({ JOURNAL_RECORD_EMPTY_UPDATES: "false" })).toEqual({
				recordEmptyUpdates: false,
			});
		});

		it.each(["-5", "1.5", "soon"])("rejects base delay %s", (raw) => {
			expect(() => configFromEnv({ JOURNAL_RETRY_BASE_DELAY_MS: raw })).toThrow(
				`Invalid JOURNAL_RETRY_BASE_DELAY_MS: "${raw}" must be a non-negative integer`,
			);
		});

		it.each(["-0.1", "1.5", "abc"])("rejects jitter factor %s", (raw) => {
			expect(() => configFromEnv({ JOURNAL_RETRY_JITTER_FACTOR: raw })).toThrow(ConfigError);
		});

		it("rejects a boolean other than true or false", () => {
			expect(() => configFromEnv({ JOURNAL_RECORD_EMPTY_UPDATES: "yes" })).toThrow(
				'Invalid JOURNAL_RECORD_EMPTY_UPDATES: "yes" must be "true" or "false"',
			);
		});

		it("rejects an unknown log level and lists the allowed ones", () => {
			try {
				configFromEnv({ JOURNAL_LOG_LEVEL: "verbose" });
				expect.unreachable();
			} catch (e) {
				expect(e).toBeInstanceOf(ConfigError);
				if (e instanceof ConfigError) {
					expect(e.message).toBe('Invalid JOURNAL_LOG_LEVEL: "verbose"');
					expect(e.context).toEqual({
						allowed: ["trace", "debug", "info", "warn", "error", "fatal", "silent"],
					});
				}
			}
		});
	});
});
