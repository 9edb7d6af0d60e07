/**
 * Kind-specific snapshot builders.
 *
 * Each kind enumerates its field names once; the builders expose typed
 * setters over them so call sites cannot misspell a field, while the
 * underlying Snapshot stays a plain JSON map. Builders are immutable: every
 * setter returns a new builder.
 *
 * @example
 * ```ts
 * const snapshot = TaskSnapshotBuilder.create()
 *   .subject("Fix login redirect")
 *   .statusId(1)
 *   .assignedToId(null)
 *   .build();
 * ```
 */

import type { FieldInput } from "./field-value.js";
import { JournalableKind, dataTypeName } from "./journalable-kind.js";
import { Snapshot } from "./snapshot.js";

// ── Field enumerations ───────────────────────────────────────────────

export const TaskField = {
	Subject: "subject",
	Description: "description",
	TypeId: "type_id",
	ProjectId: "project_id",
	StatusId: "status_id",
	PriorityId: "priority_id",
	AssignedToId: "assigned_to_id",
	ResponsibleId: "responsible_id",
	VersionId: "version_id",
	CategoryId: "category_id",
	ParentId: "parent_id",
	AuthorId: "author_id",
	DoneRatio: "done_ratio",
	EstimatedHours: "estimated_hours",
	StartDate: "start_date",
	DueDate: "due_date",
} as const;

export type TaskField = (typeof TaskField)[keyof typeof TaskField];

export const ProjectField = {
	Name: "name",
	Identifier: "identifier",
	Description: "description",
	Public: "public",
	Active: "active",
	ParentId: "parent_id",
	StatusCode: "status_code",
} as const;

export type ProjectField = (typeof ProjectField)[keyof typeof ProjectField];

export const UserField = {
	Login: "login",
	FirstName: "firstname",
	LastName: "lastname",
	Mail: "mail",
	Admin: "admin",
	Status: "status",
	Language: "language",
} as const;

export type UserField = (typeof UserField)[keyof typeof UserField];

/** Copy `snapshot` with one more field set. */
function withField(snapshot: Snapshot, field: string, value: FieldInput): Snapshot {
	return snapshot.clone().set(field, value);
}

/** Empty snapshot tagged with the data type of `kind`. */
export function emptySnapshot(kind: JournalableKind): Snapshot {
	return new Snapshot(dataTypeName(kind));
}

// ── Task ─────────────────────────────────────────────────────────────

export class TaskSnapshotBuilder {
	private readonly snapshot: Snapshot;

	private constructor(snapshot: Snapshot) {
		this.snapshot = snapshot;
	}

	static create(): TaskSnapshotBuilder {
		return new TaskSnapshotBuilder(emptySnapshot(JournalableKind.Task));
	}

	private with(field: TaskField, value: FieldInput): TaskSnapshotBuilder {
		return new TaskSnapshotBuilder(withField(this.snapshot, field, value));
	}

	subject(subject: string): TaskSnapshotBuilder {
		return this.with(TaskField.Subject, subject);
	}

	description(description: string | null): TaskSnapshotBuilder {
		return this.with(TaskField.Description, description);
	}

	typeId(id: number): TaskSnapshotBuilder {
		return this.with(TaskField.TypeId, id);
	}

	projectId(id: number): TaskSnapshotBuilder {
		return this.with(TaskField.ProjectId, id);
	}

	statusId(id: number): TaskSnapshotBuilder {
		return this.with(TaskField.StatusId, id);
	}

	priorityId(id: number): TaskSnapshotBuilder {
		return this.with(TaskField.PriorityId, id);
	}

	assignedToId(id: number | null): TaskSnapshotBuilder {
		return this.with(TaskField.AssignedToId, id);
	}

	responsibleId(id: number | null): TaskSnapshotBuilder {
		return this.with(TaskField.ResponsibleId, id);
	}

	versionId(id: number | null): TaskSnapshotBuilder {
		return this.with(TaskField.VersionId, id);
	}

	categoryId(id: number | null): TaskSnapshotBuilder {
		return this.with(TaskField.CategoryId, id);
	}

	parentId(id: number | null): TaskSnapshotBuilder {
		return this.with(TaskField.ParentId, id);
	}

	authorId(id: number): TaskSnapshotBuilder {
		return this.with(TaskField.AuthorId, id);
	}

	/** Percent complete, 0-100. */
	doneRatio(ratio: number): TaskSnapshotBuilder {
		return this.with(TaskField.DoneRatio, ratio);
	}

	estimatedHours(hours: number | null): TaskSnapshotBuilder {
		return this.with(TaskField.EstimatedHours, hours);
	}

	/** ISO date, YYYY-MM-DD. */
	startDate(date: string | null): TaskSnapshotBuilder {
		return this.with(TaskField.StartDate, date);
	}

	/** ISO date, YYYY-MM-DD. */
	dueDate(date: string | null): TaskSnapshotBuilder {
		return this.with(TaskField.DueDate, date);
	}

	build(): Snapshot {
		return this.snapshot.clone();
	}
}

// ── Project ──────────────────────────────────────────────────────────

export class ProjectSnapshotBuilder {
	private readonly snapshot: Snapshot;

	private constructor(snapshot: Snapshot) {
		this.snapshot = snapshot;
	}

	static create(): ProjectSnapshotBuilder {
		return new ProjectSnapshotBuilder(emptySnapshot(JournalableKind.Project));
	}

	private with(field: ProjectField, value: FieldInput): ProjectSnapshotBuilder {
		return new ProjectSnapshotBuilder(withField(this.snapshot, field, value));
	}

	name(name: string): ProjectSnapshotBuilder {
		return this.with(ProjectField.Name, name);
	}

	identifier(identifier: string): ProjectSnapshotBuilder {
		return this.with(ProjectField.Identifier, identifier);
	}

	description(description: string | null): ProjectSnapshotBuilder {
		return this.with(ProjectField.Description, description);
	}

	isPublic(value: boolean): ProjectSnapshotBuilder {
		return this.with(ProjectField.Public, value);
	}

	active(value: boolean): ProjectSnapshotBuilder {
		return this.with(ProjectField.Active, value);
	}

	parentId(id: number | null): ProjectSnapshotBuilder {
		return this.with(ProjectField.ParentId, id);
	}

	statusCode(code: string | null): ProjectSnapshotBuilder {
		return this.with(ProjectField.StatusCode, code);
	}

	build(): Snapshot {
		return this.snapshot.clone();
	}
}

// ── User ─────────────────────────────────────────────────────────────

export class UserSnapshotBuilder {
	private readonly snapshot: Snapshot;

	private constructor(snapshot: Snapshot) {
		this.snapshot = snapshot;
	}

	static create(): UserSnapshotBuilder {
		return new UserSnapshotBuilder(emptySnapshot(JournalableKind.User));
	}

	private with(field: UserField, value: FieldInput): UserSnapshotBuilder {
		return new UserSnapshotBuilder(withField(this.snapshot, field, value));
	}

	login(login: string): UserSnapshotBuilder {
		return this.with(UserField.Login, login);
	}

	firstName(name: string): UserSnapshotBuilder {
		return this.with(UserField.FirstName, name);
	}

	lastName(name: string): UserSnapshotBuilder {
		return this.with(UserField.LastName, name);
	}

	mail(mail: string): UserSnapshotBuilder {
		return this.with(UserField.Mail, mail);
	}

	admin(value: boolean): UserSnapshotBuilder {
		return this.with(UserField.Admin, value);
	}

	/** Account status code (active, registered, locked, ...). */
	status(status: number): UserSnapshotBuilder {
		return this.with(UserField.Status, status);
	}

	language(language: string | null): UserSnapshotBuilder {
		return this.with(UserField.Language, language);
	}

	build(): Snapshot {
		return this.snapshot.clone();
	}
}
