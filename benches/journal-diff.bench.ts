import { bench, describe } from "vitest";
import { JournalDiff } from "../src/journal/diff.js";
import { Snapshot } from "../src/journal/snapshot.js";

function buildSnapshot(fields: number, offset: number): Snapshot {
	const snapshot = new Snapshot("WorkPackageJournal");
	for (let i = 0; i < fields; i++) {
		snapshot.set(`field_${i}`, i % 3 === 0 ? i + offset : `value ${i}`);
	}
	snapshot.set("watcher_ids", [1, 2, 3, offset]);
	return snapshot;
}

const small = [buildSnapshot(16, 0), buildSnapshot(16, 1)] as const;
const large = [buildSnapshot(200, 0), buildSnapshot(200, 1)] as const;

describe("journal diff", () => {
	bench("compute 16 fields", () => {
		JournalDiff.compute(small[0], small[1]);
	});

	bench("compute 200 fields", () => {
		JournalDiff.compute(large[0], large[1]);
	});

	bench("compute + format 200 fields", () => {
		JournalDiff.compute(large[0], large[1]).formatForDisplay();
	});
});
