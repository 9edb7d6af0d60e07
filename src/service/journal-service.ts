/**
 * JournalService: records and reads entity journals through a JournalStore.
 *
 * Writes are optimistic: the next version is read, the entry is built, and
 * the store's uniqueness rule decides. A VersionConflictError backs off,
 * re-reads the latest version and recomputes the diff, up to
 * `maxConflictRetries` times.
 * Store failures come back as error Results; nothing here throws for them.
 */

import { JournalDiff } from "../journal/diff.js";
import { EntryBuilder } from "../journal/entry-builder.js";
import type { JournalEntry } from "../journal/journal-entry.js";
import { type JournalableKind, dataTypeName } from "../journal/journalable-kind.js";
import type { Snapshot } from "../journal/snapshot.js";
import { JournalVersion } from "../journal/version.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { createLogger } from "../lib/logger/index.js";
import { type JournalConfig, resolveConfig } from "../shared/config.js";
import {
	InvalidDataError,
	type JournalError,
	NotFoundError,
	VersionConflictError,
	classifyError,
	isVersionConflict,
} from "../shared/errors.js";
import type { JournalableId } from "../shared/identifiers.js";
import { type Result, err, mapErr, ok, tryCatchAsync } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import type { JournalStore } from "../store/journal-store.js";
import { entityKey } from "../store/journal-store.js";
import { computeDelay, sleep } from "./backoff.js";
import type {
	JournalCreatedEvent,
	JournalServiceEvents,
	JournalServiceOptions,
	RecordRequest,
} from "./types.js";

export class JournalService {
	private readonly store: JournalStore;
	private readonly config: JournalConfig;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly emitter = new TypedEmitter<JournalServiceEvents>();

	constructor(store: JournalStore, options: JournalServiceOptions = {}) {
		this.store = store;
		this.config = resolveConfig(options.config);
		this.clock = options.clock ?? SystemClock;
		const base = options.logger ?? createLogger({ level: this.config.logLevel });
		this.logger = base.child({ component: "journal-service" });
	}

	/** Subscribe to service events; returns an unsubscribe function. */
	on<K extends keyof JournalServiceEvents & string>(
		event: K,
		handler: JournalServiceEvents[K],
	): () => void {
		return this.emitter.on(event, handler);
	}

	// ── Writes ─────────────────────────────────────────────────────

	/**
	 * Record the creation of an entity as version 1.
	 * Fails with VersionConflictError when the entity already has a journal.
	 */
	async recordCreation(request: RecordRequest): Promise<Result<JournalEntry, JournalError>> {
		const checked = this.checkDataType(request);
		if (!checked.ok) return checked;

		const next = await this.call("nextVersion", request, () =>
			this.store.nextVersion(request.kind, request.journalableId),
		);
		if (!next.ok) return next;

		if (!next.value.isInitial()) {
			return err(
				new VersionConflictError(
					`${entityKey(request.kind, request.journalableId)} already has a journal`,
					next.value.value,
					JournalVersion.initial().value,
					{ journalableType: request.kind, journalableId: request.journalableId },
				),
			);
		}

		return this.insert(this.buildEntry(request, next.value), request.snapshot, null);
	}

	/**
	 * Record an update at the next version with the diff against the previous
	 * snapshot. Falls back to a creation when the entity has no journal yet.
	 * Resolves to `null` when nothing changed and there are no notes, unless
	 * `recordEmptyUpdates` is set.
	 */
	async recordUpdate(request: RecordRequest): Promise<Result<JournalEntry | null, JournalError>> {
		const checked = this.checkDataType(request);
		if (!checked.ok) return checked;

		for (let attempt = 0; ; attempt++) {
			const result = await this.attemptUpdate(request);
			if (result.ok) return result;
			const conflict = result.error;
			if (!isVersionConflict(conflict)) return result;

			const context = {
				journalableType: request.kind,
				journalableId: request.journalableId,
				attempt,
				expected: conflict.expected,
				actual: conflict.actual,
			};
			if (attempt >= this.config.maxConflictRetries) {
				this.logger.warn(context, "Version conflict retries exhausted");
				return result;
			}
			const delayMs = computeDelay(attempt, this.config);
			this.logger.warn({ ...context, delayMs }, "Version conflict, retrying");
			await sleep(delayMs);
		}
	}

	/** Remove every entry and snapshot of one entity; resolves to the number removed. */
	async deleteHistory(
		kind: JournalableKind,
		id: JournalableId,
	): Promise<Result<number, JournalError>> {
		const result = await this.call("deleteForEntity", { kind, journalableId: id }, () =>
			this.store.deleteForEntity(kind, id),
		);
		if (result.ok) {
			this.logger.info(
				{ journalableType: kind, journalableId: id, removed: result.value },
				"Journal history deleted",
			);
		}
		return result;
	}

	// ── Reads ──────────────────────────────────────────────────────

	async history(
		kind: JournalableKind,
		id: JournalableId,
	): Promise<Result<readonly JournalEntry[], JournalError>> {
		return this.call("history", { kind, journalableId: id }, () => this.store.history(kind, id));
	}

	async currentSnapshot(
		kind: JournalableKind,
		id: JournalableId,
	): Promise<Result<Snapshot | null, JournalError>> {
		return this.call("latestSnapshot", { kind, journalableId: id }, () =>
			this.store.latestSnapshot(kind, id),
		);
	}

	/** Diff the snapshots of two recorded versions; NotFoundError when either is missing. */
	async diffBetween(
		kind: JournalableKind,
		id: JournalableId,
		from: JournalVersion,
		to: JournalVersion,
	): Promise<Result<JournalDiff, JournalError>> {
		const target = { kind, journalableId: id };
		const older = await this.call("entryByVersion", target, () =>
			this.store.entryByVersion(kind, id, from),
		);
		if (!older.ok) return older;
		const newer = await this.call("entryByVersion", target, () =>
			this.store.entryByVersion(kind, id, to),
		);
		if (!newer.ok) return newer;

		if (older.value === null || newer.value === null) {
			const missing = older.value === null ? from : to;
			return err(
				new NotFoundError(`${entityKey(kind, id)} has no version ${missing.value}`, {
					journalableType: kind,
					journalableId: id,
					version: missing.value,
				}),
			);
		}
		return ok(JournalDiff.compute(older.value.snapshot, newer.value.snapshot));
	}

	// ── Internals ──────────────────────────────────────────────────

	private async attemptUpdate(
		request: RecordRequest,
	): Promise<Result<JournalEntry | null, JournalError>> {
		const next = await this.call("nextVersion", request, () =>
			this.store.nextVersion(request.kind, request.journalableId),
		);
		if (!next.ok) return next;

		const entry = this.buildEntry(request, next.value);
		if (next.value.isInitial()) {
			return this.insert(entry, request.snapshot, null);
		}

		const previousVersion = JournalVersion.of(next.value.value - 1);
		const previous = await this.call("entryByVersion", request, () =>
			this.store.entryByVersion(request.kind, request.journalableId, previousVersion),
		);
		if (!previous.ok) return previous;
		if (previous.value === null) {
			return err(
				new NotFoundError(
					`${entityKey(request.kind, request.journalableId)} has no version ${previousVersion.value}`,
					{
						journalableType: request.kind,
						journalableId: request.journalableId,
						version: previousVersion.value,
					},
				),
			);
		}

		const diff = JournalDiff.compute(previous.value.snapshot, request.snapshot);
		if (diff.isEmpty() && !entry.hasNotes() && !this.config.recordEmptyUpdates) {
			this.logger.debug(
				{ journalableType: request.kind, journalableId: request.journalableId },
				"Nothing changed, update not journaled",
			);
			return ok(null);
		}

		return this.insert(entry, request.snapshot, diff);
	}

	private async insert(
		entry: JournalEntry,
		snapshot: Snapshot,
		diff: JournalDiff | null,
	): Promise<Result<JournalEntry, JournalError>> {
		const target = { kind: entry.journalableType, journalableId: entry.journalableId };
		const stored = await this.call("insert", target, () => this.store.insert(entry, snapshot));
		if (!stored.ok) return stored;

		this.logger.info(
			{
				journalableType: entry.journalableType,
				journalableId: entry.journalableId,
				version: stored.value.entry.version.value,
				changes: diff?.size ?? null,
			},
			"Journal recorded",
		);
		this.publish({
			entry: stored.value.entry,
			snapshot: stored.value.snapshot,
			diff,
			timestamp: this.clock.now(),
		});
		return ok(stored.value.entry);
	}

	private buildEntry(request: RecordRequest, version: JournalVersion): JournalEntry {
		let builder = EntryBuilder.forKind(
			request.kind,
			request.journalableId,
			version,
			request.userId,
		);
		if (request.notes !== undefined) builder = builder.notes(request.notes);
		if (request.activityId !== undefined) builder = builder.activity(request.activityId);
		if (request.cause !== undefined) {
			builder = builder.cause(request.cause.causeType);
			if (request.cause.context !== null) builder = builder.causeContext(request.cause.context);
		}
		return builder.build(this.clock);
	}

	private checkDataType(request: RecordRequest): Result<void, JournalError> {
		const expected = dataTypeName(request.kind);
		if (request.snapshot.dataType !== expected) {
			return err(
				new InvalidDataError(
					`Snapshot data type "${request.snapshot.dataType}" does not match ${request.kind}`,
					{ expected, actual: request.snapshot.dataType },
				),
			);
		}
		return ok(undefined);
	}

	/** Run a store call, converting a rejection into a classified error Result. */
	private async call<T>(
		operation: string,
		target: { readonly kind: JournalableKind; readonly journalableId: JournalableId },
		fn: () => Promise<T>,
	): Promise<Result<T, JournalError>> {
		const result = mapErr(await tryCatchAsync(fn), classifyError);
		if (!result.ok && !isVersionConflict(result.error)) {
			this.logger.error(
				{
					operation,
					journalableType: target.kind,
					journalableId: target.journalableId,
					code: result.error.code,
					error: result.error.message,
				},
				"Journal store call failed",
			);
		}
		return result;
	}

	private publish(event: JournalCreatedEvent): void {
		try {
			this.emitter.emit("journal_created", event);
		} catch (e) {
			this.logger.error(
				{ error: e instanceof Error ? e.message : String(e), version: event.entry.version.value },
				"journal_created handler threw",
			);
		}
	}
}
