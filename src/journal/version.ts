/**
 * JournalVersion: per-entity, strictly increasing version number.
 *
 * Version 1 records the creation of an entity. Every later entry of the same
 * entity carries the previous version + 1. Uniqueness across writers is the
 * store's job (see JournalStore.insert); this type only does the arithmetic.
 */

import { InvalidDataError } from "../shared/errors.js";

const INITIAL = 1;

export class JournalVersion {
	readonly value: number;

	private constructor(value: number) {
		this.value = value;
	}

	// ── Factories ──────────────────────────────────────────────────

	static initial(): JournalVersion {
		return new JournalVersion(INITIAL);
	}

	/** @throws InvalidDataError unless `value` is a positive safe integer */
	static of(value: number): JournalVersion {
		if (!Number.isSafeInteger(value) || value < INITIAL) {
			throw new InvalidDataError(`JournalVersion must be a positive integer, got ${value}`, {
				value,
			});
		}
		return new JournalVersion(value);
	}

	// ── Queries ────────────────────────────────────────────────────

	next(): JournalVersion {
		return new JournalVersion(this.value + 1);
	}

	isInitial(): boolean {
		return this.value === INITIAL;
	}

	compare(other: JournalVersion): number {
		return this.value - other.value;
	}

	equals(other: JournalVersion): boolean {
		return this.value === other.value;
	}

	toJSON(): number {
		return this.value;
	}

	toString(): string {
		return `v${this.value}`;
	}
}
