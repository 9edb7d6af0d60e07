import { describe, expect, it } from "vitest";
import { activityId, journalId, journalableId, snapshotId, userId } from "../shared/identifiers.js";
import { FakeClock } from "../shared/time.js";
import { CauseType, DEFAULT_CAUSE } from "./cause.js";
import { JournalEntry } from "./journal-entry.js";
import { JournalableKind } from "./journalable-kind.js";
import { JournalVersion } from "./version.js";

const T0 = Date.UTC(2024, 4, 1, 9, 0, 0);

describe("JournalEntry", () => {
	describe("create", () => {
		it("stamps both timestamps from the clock", () => {
			const entry = JournalEntry.create(
				JournalableKind.Task,
				journalableId(42),
				JournalVersion.of(3),
				userId(7),
				new FakeClock(T0),
			);

			expect(entry.toProps()).toEqual({
				id: null,
				journalableType: "task",
				journalableId: 42,
				version: JournalVersion.of(3),
				userId: 7,
				notes: null,
				activityId: null,
				createdAt: T0,
				updatedAt: T0,
				dataId: null,
				cause: DEFAULT_CAUSE,
			});
		});

		it("initial() is version 1", () => {
			const entry = JournalEntry.initial(
				JournalableKind.Project,
				journalableId(1),
				userId(1),
				new FakeClock(T0),
			);
			expect(entry.version.value).toBe(1);
			expect(entry.isInitial()).toBe(true);
			expect(entry.anchor()).toBe(0);
		});
	});

	describe("copies", () => {
		const clock = new FakeClock(T0);
		const base = JournalEntry.create(
			JournalableKind.Task,
			journalableId(5),
			JournalVersion.of(4),
			userId(2),
			clock,
		);

		it("withNotes replaces notes only", () => {
			const noted = base.withNotes("Moved to backlog");
			expect(noted.notes).toBe("Moved to backlog");
			expect(noted.updatedAt).toBe(T0);
			expect(base.notes).toBeNull();
		});

		it("withCause sets type and context", () => {
			const caused = base.withCause(CauseType.Workflow, "status transition");
			expect(caused.cause).toEqual({ causeType: "workflow", context: "status transition" });
			expect(base.withCause(CauseType.Api).cause).toEqual({ causeType: "api", context: null });
		});

		it("editNotes bumps updatedAt and keeps createdAt", () => {
			const later = new FakeClock(T0 + 60_000);
			const edited = base.editNotes("typo fixed", later);
			expect(edited.notes).toBe("typo fixed");
			expect(edited.createdAt).toBe(T0);
			expect(edited.updatedAt).toBe(T0 + 60_000);
		});

		it("withStorageIds attaches store ids", () => {
			const stored = base.withStorageIds(journalId(11), snapshotId(12));
			expect(stored.id).toBe(11);
			expect(stored.dataId).toBe(12);
			expect(base.id).toBeNull();
		});
	});

	describe("queries", () => {
		const entry = JournalEntry.fromProps({
			id: journalId(1),
			journalableType: JournalableKind.WikiPage,
			journalableId: journalableId(9),
			version: JournalVersion.of(6),
			userId: userId(3),
			notes: "   ",
			activityId: activityId(4),
			createdAt: T0,
			updatedAt: T0,
			dataId: snapshotId(2),
			cause: DEFAULT_CAUSE,
		});

		it("whitespace-only notes do not count", () => {
			expect(entry.hasNotes()).toBe(false);
			expect(entry.withNotes("real note").hasNotes()).toBe(true);
			expect(entry.editNotes(null).hasNotes()).toBe(false);
		});

		it("anchor is version minus one", () => {
			expect(entry.anchor()).toBe(5);
			expect(entry.isInitial()).toBe(false);
		});

		it("fromProps and toProps round trip", () => {
			expect(JournalEntry.fromProps(entry.toProps()).toProps()).toEqual(entry.toProps());
		});
	});
});
