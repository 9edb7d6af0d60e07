/**
 * JournalStore: persistence port for journal entries and their snapshots.
 *
 * Contract for implementations:
 * - (journalableType, journalableId, version) is unique. insert() rejects a
 *   version that is already taken with VersionConflictError, so two writers
 *   racing for the same "next" version cannot both succeed.
 * - Versions have no gaps: insert() rejects a version beyond latest + 1
 *   with InvalidDataError.
 * - insert() assigns `id` and `dataId` and returns the stored pair.
 *
 * Store failures surface as rejected promises; JournalService converts them
 * into Result values.
 */

import type { JournalEntry } from "../journal/journal-entry.js";
import type { JournalableKind } from "../journal/journalable-kind.js";
import type { Snapshot } from "../journal/snapshot.js";
import type { JournalVersion } from "../journal/version.js";
import type { JournalableId } from "../shared/identifiers.js";

/** An entry as persisted, together with the snapshot it references. */
export interface StoredJournal {
	readonly entry: JournalEntry;
	readonly snapshot: Snapshot;
}

export interface JournalStore {
	/** Version the next entry of this entity must carry (initial when none exist). */
	nextVersion(kind: JournalableKind, id: JournalableId): Promise<JournalVersion>;
	insert(entry: JournalEntry, snapshot: Snapshot): Promise<StoredJournal>;
	latestSnapshot(kind: JournalableKind, id: JournalableId): Promise<Snapshot | null>;
	entryByVersion(
		kind: JournalableKind,
		id: JournalableId,
		version: JournalVersion,
	): Promise<StoredJournal | null>;
	/** All entries of one entity, oldest version first. */
	history(kind: JournalableKind, id: JournalableId): Promise<readonly JournalEntry[]>;
	/** Cascade delete; resolves to the number of entries removed. */
	deleteForEntity(kind: JournalableKind, id: JournalableId): Promise<number>;
}

/** Map key for one entity's journal. */
export function entityKey(kind: JournalableKind, id: JournalableId): string {
	return `${kind}:${id}`;
}
