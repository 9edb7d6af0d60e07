/**
 * EntryBuilder: fluent, immutable builder for JournalEntry.
 *
 * The kind, entity id, version and acting user are required up front;
 * everything else is optional. Every method returns a new builder.
 *
 * @example
 * ```ts
 * const entry = EntryBuilder.task(journalableId(1), JournalVersion.of(2), userId(10))
 *   .notes("reopened")
 *   .cause(CauseType.Api)
 *   .build();
 * ```
 */

import type { ActivityId, JournalableId, UserId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { type CauseType, DEFAULT_CAUSE, type JournalCause } from "./cause.js";
import { JournalEntry } from "./journal-entry.js";
import { JournalableKind } from "./journalable-kind.js";
import type { JournalVersion } from "./version.js";

interface EntryDraft {
	readonly journalableType: JournalableKind;
	readonly journalableId: JournalableId;
	readonly version: JournalVersion;
	readonly userId: UserId;
	readonly notes: string | null;
	readonly activityId: ActivityId | null;
	readonly cause: JournalCause;
}

export class EntryBuilder {
	private readonly draft: EntryDraft;

	private constructor(draft: EntryDraft) {
		this.draft = draft;
	}

	static forKind(
		kind: JournalableKind,
		journalableId: JournalableId,
		version: JournalVersion,
		userId: UserId,
	): EntryBuilder {
		return new EntryBuilder({
			journalableType: kind,
			journalableId,
			version,
			userId,
			notes: null,
			activityId: null,
			cause: DEFAULT_CAUSE,
		});
	}

	static task(id: JournalableId, version: JournalVersion, userId: UserId): EntryBuilder {
		return EntryBuilder.forKind(JournalableKind.Task, id, version, userId);
	}

	static project(id: JournalableId, version: JournalVersion, userId: UserId): EntryBuilder {
		return EntryBuilder.forKind(JournalableKind.Project, id, version, userId);
	}

	static user(id: JournalableId, version: JournalVersion, userId: UserId): EntryBuilder {
		return EntryBuilder.forKind(JournalableKind.User, id, version, userId);
	}

	static wikiPage(id: JournalableId, version: JournalVersion, userId: UserId): EntryBuilder {
		return EntryBuilder.forKind(JournalableKind.WikiPage, id, version, userId);
	}

	notes(text: string): EntryBuilder {
		return new EntryBuilder({ ...this.draft, notes: text });
	}

	activity(id: ActivityId): EntryBuilder {
		return new EntryBuilder({ ...this.draft, activityId: id });
	}

	cause(causeType: CauseType): EntryBuilder {
		return new EntryBuilder({ ...this.draft, cause: { ...this.draft.cause, causeType } });
	}

	causeContext(context: string): EntryBuilder {
		return new EntryBuilder({ ...this.draft, cause: { ...this.draft.cause, context } });
	}

	/** Finalize with `createdAt === updatedAt === clock.now()`. */
	build(clock: Clock = SystemClock): JournalEntry {
		const now = clock.now();
		return JournalEntry.fromProps({
			...this.draft,
			id: null,
			dataId: null,
			createdAt: now,
			updatedAt: now,
		});
	}
}
