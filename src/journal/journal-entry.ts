/**
 * JournalEntry: one audit record saying who changed which entity, when, why,
 * and at which version. The field-level state lives in the Snapshot the
 * entry points to through `dataId`.
 *
 * Identity is (journalableType, journalableId, version). Entries are
 * immutable; editNotes() is the one sanctioned change and returns a copy
 * with a fresh `updatedAt`.
 */

import type { ActivityId, JournalId, JournalableId, SnapshotId, UserId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { type CauseType, DEFAULT_CAUSE, type JournalCause, journalCause } from "./cause.js";
import type { JournalableKind } from "./journalable-kind.js";
import { JournalVersion } from "./version.js";

export interface JournalEntryProps {
	/** Assigned by the store on insert */
	readonly id: JournalId | null;
	readonly journalableType: JournalableKind;
	readonly journalableId: JournalableId;
	readonly version: JournalVersion;
	readonly userId: UserId;
	readonly notes: string | null;
	readonly activityId: ActivityId | null;
	/** Epoch ms */
	readonly createdAt: number;
	/** Epoch ms; moves only when notes are edited */
	readonly updatedAt: number;
	/** Snapshot reference, assigned by the store on insert */
	readonly dataId: SnapshotId | null;
	readonly cause: JournalCause;
}

export class JournalEntry implements JournalEntryProps {
	readonly id: JournalId | null;
	readonly journalableType: JournalableKind;
	readonly journalableId: JournalableId;
	readonly version: JournalVersion;
	readonly userId: UserId;
	readonly notes: string | null;
	readonly activityId: ActivityId | null;
	readonly createdAt: number;
	readonly updatedAt: number;
	readonly dataId: SnapshotId | null;
	readonly cause: JournalCause;

	private constructor(props: JournalEntryProps) {
		this.id = props.id;
		this.journalableType = props.journalableType;
		this.journalableId = props.journalableId;
		this.version = props.version;
		this.userId = props.userId;
		this.notes = props.notes;
		this.activityId = props.activityId;
		this.createdAt = props.createdAt;
		this.updatedAt = props.updatedAt;
		this.dataId = props.dataId;
		this.cause = props.cause;
	}

	// ── Factories ──────────────────────────────────────────────────

	static fromProps(props: JournalEntryProps): JournalEntry {
		return new JournalEntry(props);
	}

	/** Bare entry stamped with `clock.now()`: no notes, no activity, default cause. */
	static create(
		journalableType: JournalableKind,
		journalableId: JournalableId,
		version: JournalVersion,
		userId: UserId,
		clock: Clock = SystemClock,
	): JournalEntry {
		const now = clock.now();
		return new JournalEntry({
			id: null,
			journalableType,
			journalableId,
			version,
			userId,
			notes: null,
			activityId: null,
			createdAt: now,
			updatedAt: now,
			dataId: null,
			cause: DEFAULT_CAUSE,
		});
	}

	/** Entry recording the creation of an entity (version 1). */
	static initial(
		journalableType: JournalableKind,
		journalableId: JournalableId,
		userId: UserId,
		clock: Clock = SystemClock,
	): JournalEntry {
		return JournalEntry.create(
			journalableType,
			journalableId,
			JournalVersion.initial(),
			userId,
			clock,
		);
	}

	// ── Copies ─────────────────────────────────────────────────────

	withNotes(notes: string): JournalEntry {
		return new JournalEntry({ ...this.toProps(), notes });
	}

	withCause(causeType: CauseType, context: string | null = null): JournalEntry {
		return new JournalEntry({ ...this.toProps(), cause: journalCause(causeType, context) });
	}

	/** Replace the notes of a recorded entry and bump `updatedAt`. */
	editNotes(notes: string | null, clock: Clock = SystemClock): JournalEntry {
		return new JournalEntry({ ...this.toProps(), notes, updatedAt: clock.now() });
	}

	/** Attach the ids a store assigned on insert. */
	withStorageIds(id: JournalId, dataId: SnapshotId): JournalEntry {
		return new JournalEntry({ ...this.toProps(), id, dataId });
	}

	// ── Queries ────────────────────────────────────────────────────

	isInitial(): boolean {
		return this.version.isInitial();
	}

	hasNotes(): boolean {
		return this.notes !== null && this.notes.trim().length > 0;
	}

	/** Zero-based position in the entity's activity feed. */
	anchor(): number {
		return this.version.value - 1;
	}

	toProps(): JournalEntryProps {
		return {
			id: this.id,
			journalableType: this.journalableType,
			journalableId: this.journalableId,
			version: this.version,
			userId: this.userId,
			notes: this.notes,
			activityId: this.activityId,
			createdAt: this.createdAt,
			updatedAt: this.updatedAt,
			dataId: this.dataId,
			cause: this.cause,
		};
	}
}
