import { describe, expect, it } from "vitest";
import { JournalableKind } from "./journalable-kind.js";
import {
	ProjectSnapshotBuilder,
	TaskSnapshotBuilder,
	UserSnapshotBuilder,
	emptySnapshot,
} from "./snapshot-builders.js";

describe("emptySnapshot", () => {
	it("tags the snapshot with the kind's data type", () => {
		const snapshot = emptySnapshot(JournalableKind.Meeting);
		expect(snapshot.dataType).toBe("MeetingJournal");
		expect(snapshot.size).toBe(0);
	});
});

describe("TaskSnapshotBuilder", () => {
	it("builds a work package snapshot with the canonical field names", () => {
		const snapshot = TaskSnapshotBuilder.create()
			.subject("Fix login redirect")
			.statusId(1)
			.priorityId(2)
			.assignedToId(null)
			.doneRatio(40)
			.dueDate("2024-06-30")
			.build();

		expect(snapshot.toJSON()).toEqual({
			_type: "WorkPackageJournal",
			assigned_to_id: null,
			done_ratio: 40,
			due_date: "2024-06-30",
			priority_id: 2,
			status_id: 1,
			subject: "Fix login redirect",
		});
	});

	it("is immutable: a setter does not change the builder it was called on", () => {
		const base = TaskSnapshotBuilder.create().subject("A");
		const changed = base.subject("B").statusId(3);

		expect(base.build().get("subject")).toBe("A");
		expect(base.build().has("status_id")).toBe(false);
		expect(changed.build().get("subject")).toBe("B");
	});

	it("build() returns a fresh snapshot each time", () => {
		const builder = TaskSnapshotBuilder.create().subject("A");
		const first = builder.build();
		first.set("subject", "mutated");
		expect(builder.build().get("subject")).toBe("A");
	});
});

describe("ProjectSnapshotBuilder", () => {
	it("writes the public flag under public", () => {
		const snapshot = ProjectSnapshotBuilder.create()
			.name("Alpha")
			.identifier("alpha")
			.isPublic(true)
			.active(false)
			.build();

		expect(snapshot.dataType).toBe("ProjectJournal");
		expect(snapshot.fieldNames()).toEqual(["active", "identifier", "name", "public"]);
		expect(snapshot.get("public")).toBe(true);
	});
});

describe("UserSnapshotBuilder", () => {
	it("builds a user snapshot", () => {
		const snapshot = UserSnapshotBuilder.create()
			.login("jdoe")
			.firstName("Jane")
			.lastName("Doe")
			.mail("jdoe@example.com")
			.admin(false)
			.status(1)
			.language(null)
			.build();

		expect(snapshot.toJSON()).toEqual({
			_type: "UserJournal",
			admin: false,
			firstname: "Jane",
			language: null,
			lastname: "Doe",
			login: "jdoe",
			mail: "jdoe@example.com",
			status: 1,
		});
	});
});
