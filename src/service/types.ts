import type { JournalCause } from "../journal/cause.js";
import type { JournalDiff } from "../journal/diff.js";
import type { JournalEntry } from "../journal/journal-entry.js";
import type { JournalableKind } from "../journal/journalable-kind.js";
import type { Snapshot } from "../journal/snapshot.js";
import type { Logger } from "../lib/logger/index.js";
import type { JournalConfig } from "../shared/config.js";
import type { ActivityId, JournalableId, UserId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";

/** What a collaborator hands over after persisting a mutation. */
export interface RecordRequest {
	readonly kind: JournalableKind;
	readonly journalableId: JournalableId;
	readonly userId: UserId;
	/** Post-mutation state; its data type must match the kind */
	readonly snapshot: Snapshot;
	readonly notes?: string | undefined;
	readonly cause?: JournalCause | undefined;
	readonly activityId?: ActivityId | undefined;
}

export interface JournalCreatedEvent {
	readonly entry: JournalEntry;
	readonly snapshot: Snapshot;
	/** Null for the initial version */
	readonly diff: JournalDiff | null;
	/** Epoch ms */
	readonly timestamp: number;
}

export type JournalServiceEvents = {
	journal_created: (event: JournalCreatedEvent) => void;
};

export interface JournalServiceOptions {
	readonly config?: Partial<JournalConfig> | undefined;
	/** Defaults to a pino logger at `config.logLevel` */
	readonly logger?: Logger | undefined;
	readonly clock?: Clock | undefined;
}
