/**
 * MemoryJournalStore: in-process JournalStore.
 *
 * Keeps entries per entity in version order and snapshots in a separate map
 * keyed by `dataId`. Snapshots are cloned on the way in and out, so callers
 * cannot change recorded state after the fact. Used by tests and by
 * single-process deployments; not persisted across restarts.
 */

import type { JournalEntry } from "../journal/journal-entry.js";
import type { JournalableKind } from "../journal/journalable-kind.js";
import type { Snapshot } from "../journal/snapshot.js";
import { JournalVersion } from "../journal/version.js";
import { InvalidDataError, NotFoundError, VersionConflictError } from "../shared/errors.js";
import { type JournalableId, type SnapshotId, journalId, snapshotId } from "../shared/identifiers.js";
import { type JournalStore, type StoredJournal, entityKey } from "./journal-store.js";

export class MemoryJournalStore implements JournalStore {
	private readonly entriesByEntity = new Map<string, JournalEntry[]>();
	private readonly snapshots = new Map<SnapshotId, Snapshot>();
	private nextJournalId = 1;
	private nextSnapshotId = 1;

	async nextVersion(kind: JournalableKind, id: JournalableId): Promise<JournalVersion> {
		return this.expectedVersion(kind, id);
	}

	async insert(entry: JournalEntry, snapshot: Snapshot): Promise<StoredJournal> {
		const kind = entry.journalableType;
		const id = entry.journalableId;
		const expected = this.expectedVersion(kind, id);
		const offset = entry.version.compare(expected);

		if (offset < 0) {
			throw new VersionConflictError(
				`Version ${entry.version.value} of ${entityKey(kind, id)} is already recorded`,
				expected.value,
				entry.version.value,
				{ journalableType: kind, journalableId: id },
			);
		}
		if (offset > 0) {
			throw new InvalidDataError(
				`Version ${entry.version.value} of ${entityKey(kind, id)} would skip version ${expected.value}`,
				{ journalableType: kind, journalableId: id, expected: expected.value },
			);
		}

		const dataId = snapshotId(this.nextSnapshotId++);
		const stored = entry.withStorageIds(journalId(this.nextJournalId++), dataId);
		this.snapshots.set(dataId, snapshot.clone());

		const key = entityKey(kind, id);
		const list = this.entriesByEntity.get(key);
		if (list) {
			list.push(stored);
		} else {
			this.entriesByEntity.set(key, [stored]);
		}

		return { entry: stored, snapshot: snapshot.clone() };
	}

	async latestSnapshot(kind: JournalableKind, id: JournalableId): Promise<Snapshot | null> {
		const latest = this.entriesByEntity.get(entityKey(kind, id))?.at(-1);
		return latest ? this.snapshotOf(latest).clone() : null;
	}

	async entryByVersion(
		kind: JournalableKind,
		id: JournalableId,
		version: JournalVersion,
	): Promise<StoredJournal | null> {
		const entry = this.entriesByEntity
			.get(entityKey(kind, id))
			?.find((candidate) => candidate.version.equals(version));
		return entry ? { entry, snapshot: this.snapshotOf(entry).clone() } : null;
	}

	async history(kind: JournalableKind, id: JournalableId): Promise<readonly JournalEntry[]> {
		return [...(this.entriesByEntity.get(entityKey(kind, id)) ?? [])];
	}

	async deleteForEntity(kind: JournalableKind, id: JournalableId): Promise<number> {
		const key = entityKey(kind, id);
		const entries = this.entriesByEntity.get(key) ?? [];
		for (const entry of entries) {
			if (entry.dataId !== null) this.snapshots.delete(entry.dataId);
		}
		this.entriesByEntity.delete(key);
		return entries.length;
	}

	/** Total number of entries across all entities. */
	get size(): number {
		let total = 0;
		for (const entries of this.entriesByEntity.values()) {
			total += entries.length;
		}
		return total;
	}

	private expectedVersion(kind: JournalableKind, id: JournalableId): JournalVersion {
		const latest = this.entriesByEntity.get(entityKey(kind, id))?.at(-1);
		return latest ? latest.version.next() : JournalVersion.initial();
	}

	private snapshotOf(entry: JournalEntry): Snapshot {
		const snapshot = entry.dataId === null ? undefined : this.snapshots.get(entry.dataId);
		if (snapshot === undefined) {
			throw new NotFoundError(`Snapshot of journal ${entry.id} is missing`, {
				journalId: entry.id,
				dataId: entry.dataId,
			});
		}
		return snapshot;
	}
}
