/**
 * Type-Safe Event Emitter
 * Provides publish-subscribe pattern for token lifecycle notifications
 */

import { getLogger } from "../utils";

const logger = getLogger("EventEmitter");

/**
 * Event listener function type
 */
export type EventListener<T> = (data: T) => void | Promise<void>;

/**
 * Event subscription handle for cleanup
 */
export interface EventSubscription {
	unsubscribe(): void;
}

type ListenerTable<EventMap> = {
	[K in keyof EventMap]?: Set<EventListener<EventMap[K]>>;
};

/**
 * Type-safe event emitter. Listener failures are logged and never reach
 * the emitter.
 */
export class EventEmitter<EventMap extends object> {
	private listeners: ListenerTable<EventMap> = {};
	private onceListeners: ListenerTable<EventMap> = {};

	/**
	 * Subscribe to an event
	 */
	on<K extends keyof EventMap>(
		event: K,
		listener: EventListener<EventMap[K]>,
	): EventSubscription {
		const set = this.listeners[event] ?? new Set<EventListener<EventMap[K]>>();
		set.add(listener);
		this.listeners[event] = set;

		return {
			unsubscribe: () => this.off(event, listener),
		};
	}

	/**
	 * Subscribe to an event once (auto-unsubscribe after first emission)
	 */
	once<K extends keyof EventMap>(
		event: K,
		listener: EventListener<EventMap[K]>,
	): EventSubscription {
		const set =
			this.onceListeners[event] ?? new Set<EventListener<EventMap[K]>>();
		set.add(listener);
		this.onceListeners[event] = set;

		return {
			unsubscribe: () => this.off(event, listener),
		};
	}

	/**
	 * Unsubscribe from an event
	 */
	off<K extends keyof EventMap>(
		event: K,
		listener: EventListener<EventMap[K]>,
	): void {
		this.listeners[event]?.delete(listener);
		this.onceListeners[event]?.delete(listener);
	}

	/**
	 * Emit an event to all subscribers and wait for them
	 */
	async emit<K extends keyof EventMap>(
		event: K,
		data: EventMap[K],
	): Promise<void> {
		const regular = [...(this.listeners[event] ?? [])];
		const once = [...(this.onceListeners[event] ?? [])];
		delete this.onceListeners[event];

		for (const listener of [...regular, ...once]) {
			try {
				await listener(data);
			} catch (error) {
				logger.error(`Error in listener for '${String(event)}'`, error);
			}
		}
	}

	/**
	 * Remove all listeners for an event
	 */
	removeAllListeners<K extends keyof EventMap>(event?: K): void {
		if (event !== undefined) {
			delete this.listeners[event];
			delete this.onceListeners[event];
		} else {
			this.listeners = {};
			this.onceListeners = {};
		}
	}

	/**
	 * Get number of listeners for an event
	 */
	listenerCount<K extends keyof EventMap>(event: K): number {
		const regular = this.listeners[event]?.size ?? 0;
		const once = this.onceListeners[event]?.size ?? 0;
		return regular + once;
	}
}

/**
 * Create a typed event emitter
 */
export function createEventEmitter<
	EventMap extends object,
>(): EventEmitter<EventMap> {
	return new EventEmitter<EventMap>();
}
