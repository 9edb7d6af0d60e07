/**
 * Domain identifiers: branded integers for compile-time safety.
 *
 * Keeps a user id from being passed where a journalable entity id is
 * expected, although both are plain positive integers at runtime.
 */

import { InvalidDataError } from "./errors.js";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Id of the entity a journal belongs to (task, project, user, ...). */
export type JournalableId = Brand<number, "JournalableId">;
/** Id of the user who performed the change. */
export type UserId = Brand<number, "UserId">;
/** Groups journal entries produced by one user action. */
export type ActivityId = Brand<number, "ActivityId">;
/** Storage id of a journal entry, assigned by the store. */
export type JournalId = Brand<number, "JournalId">;
/** Storage id of a snapshot, assigned by the store. */
export type SnapshotId = Brand<number, "SnapshotId">;

function createBrandedId<B extends string>(value: number, label: B): Brand<number, B> {
	if (!Number.isSafeInteger(value) || value <= 0) {
		throw new InvalidDataError(`${label} must be a positive integer, got ${value}`, {
			label,
			value,
		});
	}
	return value as Brand<number, B>;
}

/** Throws InvalidDataError unless `value` is a positive safe integer. */
export function journalableId(value: number): JournalableId {
	return createBrandedId(value, "JournalableId");
}

export function userId(value: number): UserId {
	return createBrandedId(value, "UserId");
}

export function activityId(value: number): ActivityId {
	return createBrandedId(value, "ActivityId");
}

export function journalId(value: number): JournalId {
	return createBrandedId(value, "JournalId");
}

export function snapshotId(value: number): SnapshotId {
	return createBrandedId(value, "SnapshotId");
}

/** Strip the brand from any identifier. */
export function idToNumber(id: JournalableId | UserId | ActivityId | JournalId | SnapshotId): number {
	return id as number;
}
