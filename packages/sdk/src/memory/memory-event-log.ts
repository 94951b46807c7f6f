import { EventNotifier, ItemId } from "../protocol/types.js";
import { CHALLENGE_ISSUED, EscrowEvent } from "../modules/escrow/types.js";

type Listener = (event: EscrowEvent) => void;
type ListenerErrorHandler = (error: unknown, event: EscrowEvent) => void;

/**
 * Append-only in-memory event log.
 */
export class MemoryEventLog implements EventNotifier {
	private events: EscrowEvent[] = [];
	private listeners: Set<Listener> = new Set();

	/**
	 * @param onListenerError - Receives what a listener throws; the event is
	 * still recorded and the remaining listeners still run
	 */
	constructor(
		private readonly onListenerError: ListenerErrorHandler = (error, event) =>
			console.error(`Event listener failed on ${event.type}:`, error),
	) {}

	publish(event: EscrowEvent): void {
		const stored: EscrowEvent =
			event.type === CHALLENGE_ISSUED
				? { ...event, challenge: Uint8Array.from(event.challenge) }
				: { ...event };
		this.events.push(stored);
		for (const listener of this.listeners) {
			try {
				listener(stored);
			} catch (error) {
				this.onListenerError(error, stored);
			}
		}
	}

	/**
	 * @returns A function that removes the listener
	 */
	subscribe(listener: Listener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	all(): EscrowEvent[] {
		return [...this.events];
	}

	forItem(itemId: ItemId): EscrowEvent[] {
		return this.events.filter((event) => event.itemId === itemId);
	}
}
