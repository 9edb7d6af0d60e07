/**
 * Task history: records a work package's changes and prints its activity feed.
 *
 * Run: npx tsx examples/task-history.ts
 */

import {
	CauseType,
	JournalService,
	JournalVersion,
	JournalableKind,
	MemoryJournalStore,
	TaskSnapshotBuilder,
	configFromEnv,
	journalCause,
	journalableId,
	userId,
} from "../src/index.js";

const service = new JournalService(new MemoryJournalStore(), { config: configFromEnv() });
const taskId = journalableId(1);

const draft = TaskSnapshotBuilder.create().subject("Export fails for large projects").statusId(1);

await service.recordCreation({
	kind: JournalableKind.Task,
	journalableId: taskId,
	userId: userId(1),
	snapshot: draft.build(),
});

await service.recordUpdate({
	kind: JournalableKind.Task,
	journalableId: taskId,
	userId: userId(2),
	snapshot: draft.statusId(2).assignedToId(2).estimatedHours(4).build(),
	notes: "Reproduced with 10k work packages",
});

await service.recordUpdate({
	kind: JournalableKind.Task,
	journalableId: taskId,
	userId: userId(2),
	snapshot: draft.statusId(3).assignedToId(2).estimatedHours(4).doneRatio(100).build(),
	cause: journalCause(CauseType.Workflow, "close on merge"),
});

const history = await service.history(JournalableKind.Task, taskId);
if (!history.ok) {
	console.error(history.error.toJSON());
	process.exit(1);
}

for (const entry of history.value) {
	console.log(`#${entry.version.value} by user ${entry.userId} (${entry.cause.causeType})`);
	if (entry.notes) console.log(`  "${entry.notes}"`);
	if (entry.isInitial()) continue;

	const diff = await service.diffBetween(
		JournalableKind.Task,
		taskId,
		JournalVersion.of(entry.version.value - 1),
		entry.version,
	);
	if (diff.ok) {
		for (const line of diff.value.formatForDisplay()) console.log(`  ${line}`);
	}
}
