import EventEmitter from "eventemitter3";

// biome-ignore lint/suspicious/noExplicitAny: handler signatures vary per event
export type EventMap = Record<string, (...args: any[]) => void>;

type Listener = (...args: unknown[]) => void;

/**
 * Synchronous in-process notifications with checked event names and
 * arguments. Components extend it to report their own progress; business
 * events between components go through the EventBus instead.
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly emitter = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, listener: TEvents[K]): this {
		this.emitter.on(event, listener as Listener);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, listener: TEvents[K]): this {
		this.emitter.off(event, listener as Listener);
		return this;
	}

	/** False when no listener was registered. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.emitter.emit(event, ...args);
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.emitter.listenerCount(event);
	}
}
