import { createLogger } from '../logging.js';

const logger = createLogger('event-hub');

type Handler<T> = (payload: T) => void;

type HandlerTable<EventMap> = { [K in keyof EventMap]?: Set<Handler<EventMap[K]>> };

export interface EventRecord<EventMap> {
	event: keyof EventMap & string;
	payload: EventMap[keyof EventMap];
	timestamp: number;
}

export class EventHub<EventMap extends { [K in keyof EventMap]: EventMap[K] }> {
	private handlers: HandlerTable<EventMap> = {};
	private history: Array<EventRecord<EventMap>> = [];
	private maxHistory: number;

	constructor(options?: { maxHistory?: number }) {
		this.maxHistory = options?.maxHistory ?? 100;
	}

	on<K extends keyof EventMap & string>(event: K, handler: Handler<EventMap[K]>): () => void {
		const set = this.handlers[event] ?? new Set<Handler<EventMap[K]>>();
		set.add(handler);
		this.handlers[event] = set;

		return () => {
			this.handlers[event]?.delete(handler);
		};
	}

	once<K extends keyof EventMap & string>(event: K, handler: Handler<EventMap[K]>): () => void {
		const off = this.on(event, (payload) => {
			off();
			handler(payload);
		});
		return off;
	}

	emit<K extends keyof EventMap & string>(event: K, payload: EventMap[K]): void {
		this.recordHistory(event, payload);
		const handlers = this.handlers[event];
		if (!handlers) return;

		for (const handler of [...handlers]) {
			try {
				handler(payload);
			} catch (error) {
				logger.error(`Error in event handler for "${event}": ${error}`);
			}
		}
	}

	off<K extends keyof EventMap & string>(event: K, handler?: Handler<EventMap[K]>): void {
		if (handler) {
			this.handlers[event]?.delete(handler);
		} else {
			delete this.handlers[event];
		}
	}

	getHistory(event?: keyof EventMap & string): Array<EventRecord<EventMap>> {
		if (event) {
			return this.history.filter((h) => h.event === event);
		}
		return [...this.history];
	}

	private recordHistory<K extends keyof EventMap & string>(event: K, payload: EventMap[K]): void {
		this.history.push({ event, payload, timestamp: Date.now() });
		if (this.history.length > this.maxHistory) {
			this.history = this.history.slice(-this.maxHistory);
		}
	}
}
