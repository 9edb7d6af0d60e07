export { JournalService } from "./journal-service.js";
export type {
	JournalCreatedEvent,
	JournalServiceEvents,
	JournalServiceOptions,
	RecordRequest,
} from "./types.js";
