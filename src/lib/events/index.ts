import { EventEmitter } from "eventemitter3";

/**
 * Map of event name to handler signature.
 * Example: { journal_created: (event: JournalCreatedEvent) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * Type-safe emitter over eventemitter3.
 *
 * `on()` hands back an unsubscribe function so callers do not have to keep
 * the handler reference around.
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): () => void {
		this.ee.on(event, handler);
		return () => {
			this.ee.off(event, handler);
		};
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): void {
		this.ee.once(event, handler);
	}

	/** Invoke every handler for `event` synchronously; false when nobody listens. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	removeAllListeners(): void {
		this.ee.removeAllListeners();
	}
}
