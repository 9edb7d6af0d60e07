export { type JournalStore, type StoredJournal, entityKey } from "./journal-store.js";
export { MemoryJournalStore } from "./memory-journal-store.js";
