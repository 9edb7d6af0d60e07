/**
 * Cause: what triggered a journaled change.
 */

export const CauseType = {
	UserAction: "user_action",
	SystemChange: "system_change",
	Workflow: "workflow",
	Import: "import",
	Api: "api",
	BulkUpdate: "bulk_update",
} as const;

export type CauseType = (typeof CauseType)[keyof typeof CauseType];

export interface JournalCause {
	readonly causeType: CauseType;
	/** Free text such as a job id or an import source */
	readonly context: string | null;
}

export const DEFAULT_CAUSE: JournalCause = {
	causeType: CauseType.UserAction,
	context: null,
};

export function journalCause(
	causeType: CauseType = CauseType.UserAction,
	context: string | null = null,
): JournalCause {
	return { causeType, context };
}

export function isCauseType(value: string): value is CauseType {
	return Object.values(CauseType).some((type) => type === value);
}
