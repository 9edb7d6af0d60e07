/**
 * JournalableKind: the closed set of entity categories that keep a journal.
 *
 * Each kind has exactly one wire name, used wherever a kind crosses the
 * storage or HTTP boundary. The mapping is total and injective; parsing also
 * accepts the legacy "Wiki" alias.
 */

export const JournalableKind = {
	Task: "task",
	Project: "project",
	User: "user",
	WikiPage: "wiki_page",
	Meeting: "meeting",
	Budget: "budget",
	Document: "document",
	TimeEntry: "time_entry",
	News: "news",
	Message: "message",
} as const;

export type JournalableKind = (typeof JournalableKind)[keyof typeof JournalableKind];

export const ALL_JOURNALABLE_KINDS: readonly JournalableKind[] = Object.values(JournalableKind);

const WIRE_NAMES: Readonly<Record<JournalableKind, string>> = {
	task: "WorkPackage",
	project: "Project",
	user: "User",
	wiki_page: "WikiContent",
	meeting: "Meeting",
	budget: "Budget",
	document: "Document",
	time_entry: "TimeEntry",
	news: "News",
	message: "Message",
};

const LEGACY_ALIASES: ReadonlyMap<string, JournalableKind> = new Map([
	["Wiki", JournalableKind.WikiPage],
]);

const KIND_BY_WIRE_NAME: ReadonlyMap<string, JournalableKind> = new Map(
	ALL_JOURNALABLE_KINDS.map((kind) => [WIRE_NAMES[kind], kind]),
);

export function toWireName(kind: JournalableKind): string {
	return WIRE_NAMES[kind];
}

/** Parse a wire name; undefined for names outside the closed set. */
export function fromWireName(name: string): JournalableKind | undefined {
	return KIND_BY_WIRE_NAME.get(name) ?? LEGACY_ALIASES.get(name);
}

/** Snapshot data type stored for a kind, e.g. "WorkPackageJournal". */
export function dataTypeName(kind: JournalableKind): string {
	return `${WIRE_NAMES[kind]}Journal`;
}

export function isJournalableKind(value: string): value is JournalableKind {
	return ALL_JOURNALABLE_KINDS.some((kind) => kind === value);
}
